/**
 * Block Builders
 *
 * Construct frozen block definitions and look up their parts.
 * Builders only reject malformed records (a missing name, an unknown type);
 * semantic problems such as dangling connections are left to validate().
 */

import { ModelError } from '../error-classes.js';
import {
  isSignalTypeName,
  type Block,
  type BlockInstance,
  type Causality,
  type CompositeBlock,
  type Connection,
  type Connector,
  type ElementaryBlock,
  type Endpoint,
  type Parameter,
  type SignalValue,
} from '../types.js';
import { PATH_SEPARATOR } from './paths.js';

// ============================================================
// SPEC TYPES
// ============================================================

/** Connector as written in a block spec; causality comes from the list it sits in */
export type ConnectorSpec = Omit<Connector, 'causality'>;

/** Connection as a record or as a [from, to] endpoint string pair */
export type ConnectionSpec = Connection | readonly [string, string];

export interface ElementarySpec {
  readonly name: string;
  /** Defaults to `name` */
  readonly typeId?: string | undefined;
  readonly parameters?: readonly Parameter[] | undefined;
  readonly inputs?: readonly ConnectorSpec[] | undefined;
  readonly outputs?: readonly ConnectorSpec[] | undefined;
  readonly description?: string | undefined;
}

export interface CompositeSpec extends ElementarySpec {
  readonly instances?: readonly BlockInstance[] | undefined;
  readonly connections?: readonly ConnectionSpec[] | undefined;
}

// ============================================================
// BUILDERS
// ============================================================

/**
 * Define an elementary block.
 *
 * @example
 * const Gain = defineElementary({
 *   name: 'Gain',
 *   parameters: [{ name: 'k', type: 'Real', value: 1 }],
 *   inputs: [{ name: 'u', type: 'Real' }],
 *   outputs: [{ name: 'y', type: 'Real' }],
 * });
 */
export function defineElementary(spec: ElementarySpec): ElementaryBlock {
  const block: ElementaryBlock = { kind: 'elementary', ...baseFields(spec) };
  return Object.freeze(block);
}

/**
 * Define a composite block from child instances and connections.
 *
 * @example
 * const Scaler = defineComposite({
 *   name: 'Scaler',
 *   inputs: [{ name: 'u', type: 'Real' }],
 *   outputs: [{ name: 'y', type: 'Real' }],
 *   instances: [instance('gain', Gain, { k: 2 })],
 *   connections: [['u', 'gain.u'], ['gain.y', 'y']],
 * });
 */
export function defineComposite(spec: CompositeSpec): CompositeBlock {
  const instances = (spec.instances ?? []).map((child) =>
    instance(child.name, child.block, child.parameters)
  );
  const connections = (spec.connections ?? []).map(toConnection);

  const block: CompositeBlock = {
    kind: 'composite',
    ...baseFields(spec),
    instances: Object.freeze(instances),
    connections: Object.freeze(connections),
  };
  return Object.freeze(block);
}

/**
 * Create a named instance of a block with optional parameter overrides.
 */
export function instance(
  name: string,
  block: Block,
  parameters?: Readonly<Record<string, SignalValue>>
): BlockInstance {
  if (typeof name !== 'string') {
    throw new ModelError('BF-M001', {
      block: String(name),
      reason: 'instance name must be a string',
    });
  }
  return Object.freeze({
    name,
    block,
    parameters:
      parameters === undefined ? undefined : Object.freeze({ ...parameters }),
  });
}

/**
 * Create a connection from two endpoint strings.
 * "gain.y" names connector y of child gain; "y" names the enclosing boundary connector.
 */
export function connect(
  from: string,
  to: string,
  description?: string
): Connection {
  return Object.freeze({
    from: parseEndpoint(from),
    to: parseEndpoint(to),
    description,
  });
}

/**
 * Parse "instance.connector" or "connector".
 * @throws ModelError (BF-M002) for empty segments or more than one separator
 */
export function parseEndpoint(text: string): Endpoint {
  const parts = text.trim().split(PATH_SEPARATOR);
  if (parts.length > 2 || parts.some((part) => part.length === 0)) {
    throw new ModelError('BF-M002', { endpoint: text });
  }

  const [first, second] = parts;
  if (first === undefined) {
    throw new ModelError('BF-M002', { endpoint: text });
  }
  return second === undefined
    ? Object.freeze({ connector: first })
    : Object.freeze({ instance: first, connector: second });
}

// ============================================================
// LOOKUPS
// ============================================================

/**
 * Find a connector by name, optionally restricted to one causality.
 */
export function findConnector(
  block: Block,
  name: string,
  causality?: Causality
): Connector | undefined {
  if (causality !== 'output') {
    const input = block.inputs.find((c) => c.name === name);
    if (input) return input;
  }
  if (causality !== 'input') {
    return block.outputs.find((c) => c.name === name);
  }
  return undefined;
}

export function findInstance(
  block: CompositeBlock,
  name: string
): BlockInstance | undefined {
  return block.instances.find((child) => child.name === name);
}

export function findParameter(
  block: Block,
  name: string
): Parameter | undefined {
  return block.parameters.find((p) => p.name === name);
}

/**
 * Bind parameter values: declared defaults overlaid by overrides.
 * Required parameters without an override are left out; validate() reports them.
 * Overrides for undeclared parameters are ignored here and reported by validate().
 */
export function bindParameters(
  block: Block,
  overrides?: Readonly<Record<string, SignalValue>>
): Record<string, SignalValue> {
  const bound: Record<string, SignalValue> = {};
  for (const param of block.parameters) {
    const override = overrides?.[param.name];
    const value = override ?? param.value;
    if (value !== undefined) {
      bound[param.name] = value;
    }
  }
  return bound;
}

// ============================================================
// HELPERS
// ============================================================

function baseFields(spec: ElementarySpec) {
  if (typeof spec.name !== 'string') {
    throw new ModelError('BF-M001', {
      block: String(spec.name),
      reason: 'name must be a string',
    });
  }

  return {
    name: spec.name,
    typeId: spec.typeId ?? spec.name,
    parameters: Object.freeze(
      (spec.parameters ?? []).map((p) => freezeParameter(spec.name, p))
    ),
    inputs: Object.freeze(
      (spec.inputs ?? []).map((c) => freezeConnector(spec.name, c, 'input'))
    ),
    outputs: Object.freeze(
      (spec.outputs ?? []).map((c) => freezeConnector(spec.name, c, 'output'))
    ),
    description: spec.description,
  };
}

function freezeConnector(
  block: string,
  spec: ConnectorSpec,
  causality: Causality
): Connector {
  if (!isSignalTypeName(spec.type)) {
    throw new ModelError('BF-M001', {
      block,
      reason: `connector "${spec.name}" has unknown type "${String(spec.type)}"`,
    });
  }
  return Object.freeze({
    ...spec,
    causality,
    literals:
      spec.literals === undefined ? undefined : Object.freeze([...spec.literals]),
  });
}

function freezeParameter(block: string, spec: Parameter): Parameter {
  if (!isSignalTypeName(spec.type)) {
    throw new ModelError('BF-M001', {
      block,
      reason: `parameter "${spec.name}" has unknown type "${String(spec.type)}"`,
    });
  }
  return Object.freeze({
    ...spec,
    literals:
      spec.literals === undefined ? undefined : Object.freeze([...spec.literals]),
  });
}

function toConnection(spec: ConnectionSpec): Connection {
  if (isEndpointPair(spec)) {
    return connect(spec[0], spec[1]);
  }
  return Object.freeze({
    from: Object.freeze({ ...spec.from }),
    to: Object.freeze({ ...spec.to }),
    description: spec.description,
  });
}

function isEndpointPair(
  spec: ConnectionSpec
): spec is readonly [string, string] {
  return Array.isArray(spec);
}
