/**
 * Dependency Graph Builder
 *
 * Derives the scheduling graph of one composite level from its connections.
 * Nodes are child instance paths; an edge records that a child consumes a
 * sibling's output. Parent-input sources and connections into the
 * composite's own outputs do not order children.
 */

import { ModelError } from '../error-classes.js';
import { findConnector, findInstance } from '../model/blocks.js';
import { childPath } from '../model/paths.js';
import type { CompositeBlock, Connection } from '../types.js';

// ============================================================
// TYPES
// ============================================================

export interface DependencyGraph {
  /** Path of the composite this graph schedules */
  readonly scope: string;
  /** Child instance paths in declaration order */
  readonly nodes: readonly string[];
  /** node -> producers it reads from */
  readonly dependencies: ReadonlyMap<string, ReadonlySet<string>>;
  /** node -> consumers reading from it */
  readonly dependents: ReadonlyMap<string, ReadonlySet<string>>;
}

export interface GraphBuildOptions {
  /**
   * Skip connections with unknown endpoints instead of throwing.
   * The validator uses this so cycles are still found in a model that
   * also has dangling references.
   */
  readonly ignoreUnresolved?: boolean | undefined;
}

// ============================================================
// BUILDER
// ============================================================

/**
 * Build the dependency graph of a composite block.
 *
 * @param block - Composite whose children are scheduled
 * @param scopePath - Qualified path of the composite instance
 * @throws ModelError (BF-M003) for unknown instances or connectors, unless ignoreUnresolved
 */
export function buildDependencyGraph(
  block: CompositeBlock,
  scopePath: string,
  options: GraphBuildOptions = {}
): DependencyGraph {
  const nodes: string[] = [];
  const dependencies = new Map<string, Set<string>>();
  const dependents = new Map<string, Set<string>>();

  for (const child of block.instances) {
    const path = childPath(scopePath, child.name);
    if (dependencies.has(path)) continue;
    nodes.push(path);
    dependencies.set(path, new Set());
    dependents.set(path, new Set());
  }

  for (const connection of block.connections) {
    const edge = resolveEdge(block, scopePath, connection, options);
    if (edge === null) continue;

    const [producer, consumer] = edge;
    dependencies.get(consumer)?.add(producer);
    dependents.get(producer)?.add(consumer);
  }

  return { scope: scopePath, nodes, dependencies, dependents };
}

/**
 * Resolve a connection to a [producer, consumer] edge.
 * Returns null for connections that do not order two children.
 */
function resolveEdge(
  block: CompositeBlock,
  scopePath: string,
  connection: Connection,
  options: GraphBuildOptions
): [string, string] | null {
  const fail = (kind: string, name: string): null => {
    if (options.ignoreUnresolved === true) return null;
    throw new ModelError('BF-M003', { path: scopePath, kind, name }, scopePath);
  };

  const { from, to } = connection;

  // Source side
  let producer: string | null = null;
  if (from.instance === undefined) {
    if (!findConnector(block, from.connector, 'input')) {
      return fail('input', from.connector);
    }
  } else {
    const source = findInstance(block, from.instance);
    if (!source) return fail('instance', from.instance);
    if (!findConnector(source.block, from.connector, 'output')) {
      return fail('connector', `${from.instance}.${from.connector}`);
    }
    producer = childPath(scopePath, from.instance);
  }

  // Destination side
  if (to.instance === undefined) {
    if (!findConnector(block, to.connector, 'output')) {
      return fail('output', to.connector);
    }
    return null;
  }

  const target = findInstance(block, to.instance);
  if (!target) return fail('instance', to.instance);
  if (!findConnector(target.block, to.connector, 'input')) {
    return fail('connector', `${to.instance}.${to.connector}`);
  }

  return producer === null
    ? null
    : [producer, childPath(scopePath, to.instance)];
}
