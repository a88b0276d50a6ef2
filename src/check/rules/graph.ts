/**
 * Graph Rules
 * Acyclicity of the connections feeding child inputs.
 */

import { formatCycle } from '../../error-classes.js';
import { buildDependencyGraph } from '../../graph/dependency-graph.js';
import { scheduleGraph } from '../../graph/scheduler.js';
import { isComposite } from '../../types.js';
import type {
  BlockScope,
  Diagnostic,
  ValidationContext,
  ValidationRule,
} from '../types.js';
import { createDiagnostic } from './helpers.js';

// ============================================================
// ALGEBRAIC_LOOP RULE
// ============================================================

/**
 * Reports every cycle in the dependency graph of a composite, naming each
 * instance on it. Uses the scheduler's cycle detector on a lenient graph so
 * dangling references do not hide a loop.
 */
export const ALGEBRAIC_LOOP: ValidationRule = {
  code: 'ALGEBRAIC_LOOP',
  category: 'graph',
  severity: 'error',
  mandatory: true,
  kinds: ['composite'],

  check(scope: BlockScope, _context: ValidationContext): Diagnostic[] {
    if (!isComposite(scope.block)) return [];

    const graph = buildDependencyGraph(scope.block, scope.path, {
      ignoreUnresolved: true,
    });
    const { cycles } = scheduleGraph(graph);

    return cycles.map((cycle) =>
      createDiagnostic(
        ALGEBRAIC_LOOP,
        `Algebraic loop in ${scope.path}: ${formatCycle(cycle)}`,
        { path: cycle[0] ?? scope.path },
        cycle
      )
    );
  },
};
