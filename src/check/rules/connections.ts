/**
 * Connection Rules
 * Endpoint resolution, legal shapes, single-assignment and type agreement
 * for the connections of one composite.
 */

import { childPath, formatEndpoint, signalKey } from '../../model/paths.js';
import { describeType, isTypeCompatible } from '../../model/values.js';
import { isComposite, type CompositeBlock } from '../../types.js';
import type {
  BlockScope,
  Diagnostic,
  ValidationContext,
  ValidationRule,
} from '../types.js';
import {
  createDiagnostic,
  describeConnection,
  resolveConnections,
  type EndpointResolution,
  type ResolvedConnection,
} from './helpers.js';

// ============================================================
// CONNECTION_UNKNOWN_ENDPOINT RULE
// ============================================================

/**
 * Every connection endpoint must name an existing instance and connector.
 */
export const CONNECTION_UNKNOWN_ENDPOINT: ValidationRule = {
  code: 'CONNECTION_UNKNOWN_ENDPOINT',
  category: 'connections',
  severity: 'error',
  mandatory: true,
  kinds: ['composite'],

  check(scope: BlockScope, _context: ValidationContext): Diagnostic[] {
    const block = compositeOf(scope);
    if (!block) return [];

    const diagnostics: Diagnostic[] = [];
    for (const resolved of resolveConnections(block, scope.path)) {
      for (const [end, endpoint] of [
        [resolved.from, resolved.connection.from],
        [resolved.to, resolved.connection.to],
      ] as const) {
        if (end.status === 'unknown-instance') {
          diagnostics.push(
            createDiagnostic(
              CONNECTION_UNKNOWN_ENDPOINT,
              `Connection ${describeConnection(resolved.connection)} in ${scope.path} references unknown instance "${endpoint.instance ?? ''}"`,
              { path: scope.path }
            )
          );
        } else if (end.status === 'unknown-connector') {
          diagnostics.push(
            createDiagnostic(
              CONNECTION_UNKNOWN_ENDPOINT,
              `Connection ${describeConnection(resolved.connection)} in ${scope.path} references unknown connector "${formatEndpoint(endpoint)}"`,
              { path: end.path, connector: endpoint.connector }
            )
          );
        }
      }
    }
    return diagnostics;
  },
};

// ============================================================
// CONNECTION_ILLEGAL_SHAPE RULE
// ============================================================

/**
 * Legal shapes: parent-input -> child-input, child-output -> child-input,
 * child-output -> parent-output.
 */
export const CONNECTION_ILLEGAL_SHAPE: ValidationRule = {
  code: 'CONNECTION_ILLEGAL_SHAPE',
  category: 'connections',
  severity: 'error',
  mandatory: true,
  kinds: ['composite'],

  check(scope: BlockScope, _context: ValidationContext): Diagnostic[] {
    const block = compositeOf(scope);
    if (!block) return [];

    const diagnostics: Diagnostic[] = [];
    for (const resolved of resolveConnections(block, scope.path)) {
      const { connection, from, to } = resolved;
      const reason = illegalShapeReason(resolved);
      if (reason === null) continue;

      diagnostics.push(
        createDiagnostic(
          CONNECTION_ILLEGAL_SHAPE,
          `Connection ${describeConnection(connection)} in ${scope.path} is not allowed: ${reason}`,
          {
            path: to.status === 'wrong-causality' ? to.path : from.path,
            connector:
              to.status === 'wrong-causality'
                ? connection.to.connector
                : connection.from.connector,
          }
        )
      );
    }
    return diagnostics;
  },
};

function illegalShapeReason(resolved: ResolvedConnection): string | null {
  const { connection, from, to } = resolved;
  if (from.status === 'wrong-causality') {
    return connection.from.instance === undefined
      ? 'a block output cannot be read inside the block'
      : 'a child input cannot be a source';
  }
  if (to.status === 'wrong-causality') {
    return connection.to.instance === undefined
      ? 'a block input cannot be written inside the block'
      : 'a child output cannot be a destination';
  }
  if (connection.from.instance === undefined && connection.to.instance === undefined) {
    return 'a block input cannot feed a block output directly';
  }
  return null;
}

// ============================================================
// INPUT_UNCONNECTED RULE
// ============================================================

/**
 * Every child input is the destination of a connection.
 * Root inputs are external and need none.
 */
export const INPUT_UNCONNECTED: ValidationRule = {
  code: 'INPUT_UNCONNECTED',
  category: 'connections',
  severity: 'error',
  mandatory: true,
  kinds: ['composite'],

  check(scope: BlockScope, _context: ValidationContext): Diagnostic[] {
    const block = compositeOf(scope);
    if (!block) return [];

    const fed = destinationCounts(resolveConnections(block, scope.path));
    const diagnostics: Diagnostic[] = [];
    for (const child of block.instances) {
      const path = childPath(scope.path, child.name);
      for (const input of child.block.inputs) {
        if ((fed.get(signalKey(path, input.name)) ?? 0) > 0) continue;
        diagnostics.push(
          createDiagnostic(
            INPUT_UNCONNECTED,
            `Input ${path}.${input.name} is not connected`,
            { path, connector: input.name }
          )
        );
      }
    }
    return diagnostics;
  },
};

// ============================================================
// INPUT_MULTIPLE_SOURCES RULE
// ============================================================

/**
 * No connector is the destination of more than one connection.
 */
export const INPUT_MULTIPLE_SOURCES: ValidationRule = {
  code: 'INPUT_MULTIPLE_SOURCES',
  category: 'connections',
  severity: 'error',
  mandatory: true,
  kinds: ['composite'],

  check(scope: BlockScope, _context: ValidationContext): Diagnostic[] {
    const block = compositeOf(scope);
    if (!block) return [];

    const resolved = resolveConnections(block, scope.path);
    const sources = new Map<string, string[]>();
    const locations = new Map<string, { path: string; connector: string }>();
    for (const { connection, to } of resolved) {
      if (to.status !== 'ok') continue;
      const key = signalKey(to.path, to.connector.name);
      const list = sources.get(key) ?? [];
      list.push(formatEndpoint(connection.from));
      sources.set(key, list);
      locations.set(key, { path: to.path, connector: to.connector.name });
    }

    const diagnostics: Diagnostic[] = [];
    for (const [key, list] of sources) {
      const location = locations.get(key);
      if (list.length < 2 || !location) continue;
      diagnostics.push(
        createDiagnostic(
          INPUT_MULTIPLE_SOURCES,
          `${location.path}.${location.connector} has ${list.length} sources: ${list.join(', ')}`,
          location
        )
      );
    }
    return diagnostics;
  },
};

// ============================================================
// OUTPUT_UNCONNECTED RULE
// ============================================================

/**
 * Every composite output passes through exactly one child output.
 * Outputs with two or more sources are reported by INPUT_MULTIPLE_SOURCES.
 */
export const OUTPUT_UNCONNECTED: ValidationRule = {
  code: 'OUTPUT_UNCONNECTED',
  category: 'connections',
  severity: 'error',
  mandatory: true,
  kinds: ['composite'],

  check(scope: BlockScope, _context: ValidationContext): Diagnostic[] {
    const block = compositeOf(scope);
    if (!block) return [];

    const resolved = resolveConnections(block, scope.path).filter(
      ({ connection, from }) =>
        connection.from.instance !== undefined && from.status === 'ok'
    );
    const fed = destinationCounts(resolved);

    return block.outputs
      .filter((output) => (fed.get(signalKey(scope.path, output.name)) ?? 0) === 0)
      .map((output) =>
        createDiagnostic(
          OUTPUT_UNCONNECTED,
          `Output ${scope.path}.${output.name} has no child output source`,
          { path: scope.path, connector: output.name }
        )
      );
  },
};

// ============================================================
// CONNECTION_TYPE_MISMATCH RULE
// ============================================================

/**
 * Connected types are identical or on the configured compatible list.
 */
export const CONNECTION_TYPE_MISMATCH: ValidationRule = {
  code: 'CONNECTION_TYPE_MISMATCH',
  category: 'connections',
  severity: 'error',
  mandatory: true,
  kinds: ['composite'],

  check(scope: BlockScope, context: ValidationContext): Diagnostic[] {
    const block = compositeOf(scope);
    if (!block) return [];

    const diagnostics: Diagnostic[] = [];
    for (const { connection, from, to } of resolveConnections(block, scope.path)) {
      if (from.status !== 'ok' || to.status !== 'ok') continue;
      if (isTypeCompatible(from.connector, to.connector, context.config.compatibleTypes)) {
        continue;
      }
      diagnostics.push(
        createDiagnostic(
          CONNECTION_TYPE_MISMATCH,
          `Connection ${describeConnection(connection)} in ${scope.path} connects ${describeType(from.connector)} to ${describeType(to.connector)}`,
          { path: to.path, connector: to.connector.name }
        )
      );
    }
    return diagnostics;
  },
};

// ============================================================
// CONNECTION_UNIT_MISMATCH RULE
// ============================================================

/**
 * Both ends declare a unit and the units differ.
 */
export const CONNECTION_UNIT_MISMATCH: ValidationRule = {
  code: 'CONNECTION_UNIT_MISMATCH',
  category: 'connections',
  severity: 'warning',
  mandatory: false,
  kinds: ['composite'],

  check(scope: BlockScope, _context: ValidationContext): Diagnostic[] {
    const block = compositeOf(scope);
    if (!block) return [];

    const diagnostics: Diagnostic[] = [];
    for (const { connection, from, to } of resolveConnections(block, scope.path)) {
      const fromUnit = unitOf(from);
      const toUnit = unitOf(to);
      if (fromUnit === undefined || toUnit === undefined || fromUnit === toUnit) {
        continue;
      }
      diagnostics.push(
        createDiagnostic(
          CONNECTION_UNIT_MISMATCH,
          `Connection ${describeConnection(connection)} in ${scope.path} connects unit "${fromUnit}" to unit "${toUnit}"`,
          { path: to.path, connector: connection.to.connector }
        )
      );
    }
    return diagnostics;
  },
};

// ============================================================
// HELPERS
// ============================================================

function compositeOf(scope: BlockScope): CompositeBlock | null {
  return isComposite(scope.block) ? scope.block : null;
}

function unitOf(end: EndpointResolution): string | undefined {
  return end.status === 'ok' ? end.connector.unit : undefined;
}

/**
 * Count connections per resolved destination signal.
 */
function destinationCounts(resolved: readonly ResolvedConnection[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const { to } of resolved) {
    if (to.status !== 'ok') continue;
    const key = signalKey(to.path, to.connector.name);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}
