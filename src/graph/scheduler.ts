/**
 * Scheduler
 *
 * Kahn's algorithm over a dependency graph. Ready nodes are taken in
 * declaration order so the evaluation order is reproducible across runs.
 * Nodes left over are on, or downstream of, a cycle. Within each strongly
 * connected component, loops are reported until every member is named.
 */

import { AlgebraicLoopError } from '../error-classes.js';
import type { DependencyGraph } from './dependency-graph.js';

// ============================================================
// TYPES
// ============================================================

export interface Schedule {
  /** Scheduled nodes in evaluation order */
  readonly order: readonly string[];
  /** Each cycle lists its instance paths, producer before consumer */
  readonly cycles: readonly (readonly string[])[];
}

// ============================================================
// SCHEDULING
// ============================================================

/**
 * Compute the evaluation order and any cycles of a graph.
 * Never throws; `cycles` is empty for acyclic graphs.
 */
export function scheduleGraph(graph: DependencyGraph): Schedule {
  const position = positions(graph);
  const pending = new Map<string, number>();
  const ready: string[] = [];

  for (const node of graph.nodes) {
    const count = graph.dependencies.get(node)?.size ?? 0;
    pending.set(node, count);
    if (count === 0) ready.push(node);
  }

  const order: string[] = [];
  let node = ready.shift();
  while (node !== undefined) {
    order.push(node);
    pending.delete(node);

    for (const consumer of graph.dependents.get(node) ?? []) {
      const count = pending.get(consumer);
      if (count === undefined) continue;
      pending.set(consumer, count - 1);
      if (count - 1 === 0) {
        insertByPosition(ready, consumer, position);
      }
    }

    node = ready.shift();
  }

  const leftover = graph.nodes.filter((n) => pending.has(n));
  return { order, cycles: leftover.length === 0 ? [] : findCycles(graph, leftover) };
}

/**
 * Compute the evaluation order of a graph.
 * @throws AlgebraicLoopError carrying every cycle found
 */
export function computeOrder(graph: DependencyGraph): readonly string[] {
  const { order, cycles } = scheduleGraph(graph);
  if (cycles.length > 0) {
    throw new AlgebraicLoopError(cycles);
  }
  return order;
}

// ============================================================
// CYCLE RECONSTRUCTION
// ============================================================

/**
 * Find cycles among `candidates` so that every member of a cyclic strongly
 * connected component lies on at least one reported cycle.
 * Cycles are reported in order of their earliest declared member.
 */
function findCycles(
  graph: DependencyGraph,
  candidates: readonly string[]
): string[][] {
  const position = positions(graph);
  const components = stronglyConnected(graph, candidates);

  const cycles: string[][] = [];
  for (const component of components) {
    const members = new Set(component);
    const first = component[0];
    if (first === undefined) continue;

    const selfLoop = graph.dependents.get(first)?.has(first) ?? false;
    if (component.length === 1 && !selfLoop) continue;

    const covered = new Set<string>();
    const record = (cycle: string[]): void => {
      cycles.push(cycle);
      for (const node of cycle) covered.add(node);
    };

    record(walkCycle(graph, first, members, position));
    for (const member of component) {
      if (!covered.has(member)) {
        record(cycleThrough(graph, member, members, position));
      }
    }
  }

  return cycles.sort(
    (a, b) => (position.get(a[0] ?? '') ?? 0) - (position.get(b[0] ?? '') ?? 0)
  );
}

/**
 * Follow earliest-declared successors inside a component until a node repeats.
 * The loop is rotated to start at its earliest declared member.
 */
function walkCycle(
  graph: DependencyGraph,
  start: string,
  members: ReadonlySet<string>,
  position: ReadonlyMap<string, number>
): string[] {
  const walk: string[] = [];
  let current: string | undefined = start;

  while (current !== undefined && !walk.includes(current)) {
    walk.push(current);
    current = nextInComponent(graph, current, members, position);
  }

  return rotateToEarliest(
    current === undefined ? walk : walk.slice(walk.indexOf(current)),
    position
  );
}

/**
 * Shortest loop from `start` back to itself inside a component.
 * Successors are explored in declaration order.
 */
function cycleThrough(
  graph: DependencyGraph,
  start: string,
  members: ReadonlySet<string>,
  position: ReadonlyMap<string, number>
): string[] {
  const previous = new Map<string, string>();
  const queue: string[] = [start];

  for (let node = queue.shift(); node !== undefined; node = queue.shift()) {
    for (const consumer of successorsInComponent(graph, node, members, position)) {
      if (consumer === start) {
        const loop = [node];
        for (let back = previous.get(node); back !== undefined; back = previous.get(back)) {
          loop.unshift(back);
        }
        return rotateToEarliest(loop, position);
      }
      if (!previous.has(consumer)) {
        previous.set(consumer, node);
        queue.push(consumer);
      }
    }
  }

  return [start];
}

function rotateToEarliest(
  loop: readonly string[],
  position: ReadonlyMap<string, number>
): string[] {
  let pivot = 0;
  loop.forEach((node, i) => {
    const best = loop[pivot];
    if (best !== undefined && (position.get(node) ?? 0) < (position.get(best) ?? 0)) {
      pivot = i;
    }
  });
  return [...loop.slice(pivot), ...loop.slice(0, pivot)];
}

function nextInComponent(
  graph: DependencyGraph,
  node: string,
  members: ReadonlySet<string>,
  position: ReadonlyMap<string, number>
): string | undefined {
  return successorsInComponent(graph, node, members, position)[0];
}

function successorsInComponent(
  graph: DependencyGraph,
  node: string,
  members: ReadonlySet<string>,
  position: ReadonlyMap<string, number>
): string[] {
  return [...(graph.dependents.get(node) ?? [])]
    .filter((consumer) => members.has(consumer))
    .sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
}

/**
 * Tarjan's strongly connected components over the candidate nodes.
 * Members of each component are sorted by declaration position.
 */
function stronglyConnected(
  graph: DependencyGraph,
  candidates: readonly string[]
): string[][] {
  const allowed = new Set(candidates);
  const position = positions(graph);
  const index = new Map<string, number>();
  const lowLink = new Map<string, number>();
  const stack: string[] = [];
  const onStack = new Set<string>();
  const components: string[][] = [];
  let counter = 0;

  const visit = (node: string): void => {
    index.set(node, counter);
    lowLink.set(node, counter);
    counter++;
    stack.push(node);
    onStack.add(node);

    for (const consumer of graph.dependents.get(node) ?? []) {
      if (!allowed.has(consumer)) continue;
      if (!index.has(consumer)) {
        visit(consumer);
        lowLink.set(node, Math.min(lowLink.get(node) ?? 0, lowLink.get(consumer) ?? 0));
      } else if (onStack.has(consumer)) {
        lowLink.set(node, Math.min(lowLink.get(node) ?? 0, index.get(consumer) ?? 0));
      }
    }

    if (lowLink.get(node) === index.get(node)) {
      const component: string[] = [];
      let member = stack.pop();
      while (member !== undefined) {
        onStack.delete(member);
        component.push(member);
        if (member === node) break;
        member = stack.pop();
      }
      component.sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
      components.push(component);
    }
  };

  for (const node of candidates) {
    if (!index.has(node)) visit(node);
  }

  return components;
}

// ============================================================
// HELPERS
// ============================================================

function positions(graph: DependencyGraph): Map<string, number> {
  return new Map(graph.nodes.map((node, i) => [node, i]));
}

/**
 * Insert into a list kept sorted by declaration position.
 */
function insertByPosition(
  list: string[],
  node: string,
  position: ReadonlyMap<string, number>
): void {
  const rank = position.get(node) ?? 0;
  const at = list.findIndex((other) => (position.get(other) ?? 0) > rank);
  if (at === -1) {
    list.push(node);
  } else {
    list.splice(at, 0, node);
  }
}
