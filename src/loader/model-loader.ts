/**
 * Model Loader
 *
 * Reference loader for model documents written in YAML (or JSON, which
 * YAML accepts). A document holds a library of named block definitions and
 * names the root block:
 *
 *   root: Scaler
 *   blocks:
 *     Gain:
 *       parameters: [{ name: k, type: Real, value: 1 }]
 *       inputs: [{ name: u, type: Real }]
 *       outputs: [{ name: y, type: Real }]
 *     Scaler:
 *       inputs: [{ name: u, type: Real }]
 *       outputs: [{ name: y, type: Real }]
 *       instances: [{ name: gain, block: Gain, parameters: { k: 2 } }]
 *       connections: [[u, gain.u], { from: gain.y, to: y }]
 *
 * The loader only checks document structure and block references; semantic
 * checks stay with validate().
 */

import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import { ModelError } from '../error-classes.js';
import {
  connect,
  defineComposite,
  defineElementary,
  instance,
  type ConnectorSpec,
} from '../model/blocks.js';
import {
  isSignalTypeName,
  type Block,
  type BlockInstance,
  type Connection,
  type Parameter,
  type SignalValue,
} from '../types.js';

// ============================================================
// TYPES
// ============================================================

/** Parsed model document */
export interface ModelDocument {
  readonly root: Block;
  /** Every block of the library, by name */
  readonly blocks: ReadonlyMap<string, Block>;
}

/**
 * Model-loading collaborator: turns a textual document into block definitions.
 */
export interface ModelLoader {
  load(source: string): ModelDocument;
}

type RawRecord = Record<string, unknown>;

// ============================================================
// LOADING
// ============================================================

/**
 * Parse a model document.
 *
 * @throws ModelError (BF-M004) for malformed documents
 * @throws ModelError (BF-M005) for unknown block references
 * @throws ModelError (BF-M006) for circular block references
 * @throws ModelError (BF-M001, BF-M002) for malformed definitions or endpoints
 */
export function parseModel(source: string): ModelDocument {
  let data: unknown;
  try {
    data = yaml.parse(source);
  } catch (err) {
    throw new ModelError('BF-M004', {
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  if (!isRecord(data)) {
    throw new ModelError('BF-M004', { reason: 'document must be a mapping' });
  }
  const library = data['blocks'];
  if (!isRecord(library)) {
    throw new ModelError('BF-M004', { reason: 'blocks must be a mapping' });
  }
  const rootName = data['root'];
  if (typeof rootName !== 'string') {
    throw new ModelError('BF-M004', { reason: 'root must be a block name' });
  }
  if (!Object.hasOwn(library, rootName)) {
    throw new ModelError('BF-M004', { reason: `root block "${rootName}" is not defined` });
  }

  const built = new Map<string, Block>();

  const build = (name: string, chain: readonly string[]): Block => {
    // Check for circular containment
    if (chain.includes(name)) {
      throw new ModelError('BF-M006', { chain: [...chain, name].join(' -> ') });
    }

    const cached = built.get(name);
    if (cached) return cached;

    const raw = library[name];
    if (!isRecord(raw)) {
      throw new ModelError('BF-M001', { block: name, reason: 'definition must be a mapping' });
    }

    const block = readBlock(name, raw, (ref, instanceName) => {
      if (!Object.hasOwn(library, ref)) {
        throw new ModelError('BF-M005', { instance: instanceName, block: name, ref });
      }
      return build(ref, [...chain, name]);
    });
    built.set(name, block);
    return block;
  };

  for (const name of Object.keys(library)) {
    build(name, []);
  }

  const root = built.get(rootName);
  if (!root) {
    throw new ModelError('BF-M004', { reason: `root block "${rootName}" is not defined` });
  }
  return { root, blocks: built };
}

/**
 * Read and parse a model document file.
 */
export async function loadModelFile(filePath: string): Promise<ModelDocument> {
  const source = await fs.readFile(filePath, 'utf-8');
  return parseModel(source);
}

/** YAML/JSON document loader */
export const yamlModelLoader: ModelLoader = {
  load: parseModel,
};

// ============================================================
// BLOCK DEFINITIONS
// ============================================================

function readBlock(
  name: string,
  raw: RawRecord,
  resolve: (ref: string, instanceName: string) => Block
): Block {
  const fail = (reason: string): ModelError =>
    new ModelError('BF-M001', { block: name, reason });

  const kind = raw['kind'];
  if (kind !== undefined && kind !== 'elementary' && kind !== 'composite') {
    throw fail(`kind must be "elementary" or "composite"`);
  }

  const spec = {
    name,
    typeId: optionalString(raw, 'typeId', fail),
    description: optionalString(raw, 'description', fail),
    parameters: listOf(raw, 'parameters', fail).map((entry) => readParameter(entry, fail)),
    inputs: listOf(raw, 'inputs', fail).map((entry) => readConnector(entry, fail)),
    outputs: listOf(raw, 'outputs', fail).map((entry) => readConnector(entry, fail)),
  };

  const composite =
    kind === 'composite' ||
    (kind === undefined && ('instances' in raw || 'connections' in raw));
  if (!composite) {
    return defineElementary(spec);
  }

  const instances = listOf(raw, 'instances', fail).map((entry) =>
    readInstance(entry, fail, resolve)
  );
  const connections = listOf(raw, 'connections', fail).map((entry) =>
    readConnection(entry, fail)
  );
  return defineComposite({ ...spec, instances, connections });
}

function readConnector(entry: unknown, fail: (reason: string) => ModelError): ConnectorSpec {
  if (!isRecord(entry)) throw fail('connectors must be mappings');
  const name = entry['name'];
  const type = entry['type'];
  if (typeof name !== 'string') throw fail('connectors need a string name');
  if (!isSignalTypeName(type)) {
    throw fail(`connector "${name}" has unknown type "${String(type)}"`);
  }
  const where = (reason: string): ModelError => fail(`connector "${name}": ${reason}`);

  return {
    name,
    type,
    quantity: optionalString(entry, 'quantity', where),
    unit: optionalString(entry, 'unit', where),
    min: optionalNumber(entry, 'min', where),
    max: optionalNumber(entry, 'max', where),
    nominal: optionalNumber(entry, 'nominal', where),
    start: optionalValue(entry, 'start', where),
    literals: optionalStrings(entry, 'literals', where),
    description: optionalString(entry, 'description', where),
  };
}

function readParameter(entry: unknown, fail: (reason: string) => ModelError): Parameter {
  if (!isRecord(entry)) throw fail('parameters must be mappings');
  const name = entry['name'];
  const type = entry['type'];
  if (typeof name !== 'string') throw fail('parameters need a string name');
  if (!isSignalTypeName(type)) {
    throw fail(`parameter "${name}" has unknown type "${String(type)}"`);
  }
  const where = (reason: string): ModelError => fail(`parameter "${name}": ${reason}`);

  return {
    name,
    type,
    value: optionalValue(entry, 'value', where),
    min: optionalNumber(entry, 'min', where),
    max: optionalNumber(entry, 'max', where),
    unit: optionalString(entry, 'unit', where),
    literals: optionalStrings(entry, 'literals', where),
    description: optionalString(entry, 'description', where),
  };
}

function readInstance(
  entry: unknown,
  fail: (reason: string) => ModelError,
  resolve: (ref: string, instanceName: string) => Block
): BlockInstance {
  if (!isRecord(entry)) throw fail('instances must be mappings');
  const name = entry['name'];
  const ref = entry['block'];
  if (typeof name !== 'string' || typeof ref !== 'string') {
    throw fail('instances need a string name and block');
  }

  const rawParameters = entry['parameters'];
  let parameters: Record<string, SignalValue> | undefined;
  if (rawParameters !== undefined) {
    if (!isRecord(rawParameters)) {
      throw fail(`instance "${name}": parameters must be a mapping`);
    }
    parameters = {};
    for (const [key, value] of Object.entries(rawParameters)) {
      if (!isSignalValue(value)) {
        throw fail(`instance "${name}": parameter "${key}" must be a number, boolean or string`);
      }
      parameters[key] = value;
    }
  }

  return instance(name, resolve(ref, name), parameters);
}

function readConnection(entry: unknown, fail: (reason: string) => ModelError): Connection {
  if (Array.isArray(entry)) {
    const [from, to]: unknown[] = entry;
    if (entry.length !== 2 || typeof from !== 'string' || typeof to !== 'string') {
      throw fail('connection pairs must be [from, to] strings');
    }
    return connect(from, to);
  }
  if (!isRecord(entry)) throw fail('connections must be pairs or mappings');

  const from = entry['from'];
  const to = entry['to'];
  if (typeof from !== 'string' || typeof to !== 'string') {
    throw fail('connections need string from and to endpoints');
  }
  return connect(from, to, optionalString(entry, 'description', fail));
}

// ============================================================
// FIELD READERS
// ============================================================

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSignalValue(value: unknown): value is SignalValue {
  return (
    typeof value === 'number' || typeof value === 'boolean' || typeof value === 'string'
  );
}

function listOf(
  raw: RawRecord,
  key: string,
  fail: (reason: string) => ModelError
): unknown[] {
  const value = raw[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) throw fail(`${key} must be a list`);
  return value;
}

function optionalString(
  raw: RawRecord,
  key: string,
  fail: (reason: string) => ModelError
): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') throw fail(`${key} must be a string`);
  return value;
}

function optionalNumber(
  raw: RawRecord,
  key: string,
  fail: (reason: string) => ModelError
): number | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number') throw fail(`${key} must be a number`);
  return value;
}

function optionalValue(
  raw: RawRecord,
  key: string,
  fail: (reason: string) => ModelError
): SignalValue | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!isSignalValue(value)) throw fail(`${key} must be a number, boolean or string`);
  return value;
}

function optionalStrings(
  raw: RawRecord,
  key: string,
  fail: (reason: string) => ModelError
): string[] | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!isStringList(value)) throw fail(`${key} must be a list of strings`);
  return value;
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}
