/**
 * Blockflow Runtime
 *
 * Public API for running validated block models.
 *
 * Module Structure:
 * - core/: Execution engine
 *   - types.ts: Public types (ContextOptions, ImplementationRegistry, events, snapshots)
 *   - registry.ts: Implementation registry factory
 *   - signals.ts: Signal table keyed by (instance path, connector)
 *   - evaluate.ts: Block evaluator (internal)
 *   - context.ts: ExecutionContext state machine
 *   - snapshot.ts: Snapshot parsing
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  ContextOptions,
  ContextSnapshot,
  ContextState,
  ElementaryCall,
  ElementaryDefinition,
  ElementaryFn,
  ElementaryInit,
  ElementaryOutputs,
  ErrorEvent,
  EvaluateEvent,
  EvaluatedEvent,
  Fault,
  ImplementationRegistry,
  InstanceState,
  ObservabilityCallbacks,
  RuntimeCallbacks,
  SignalRef,
  SnapshotSignal,
  StateValue,
  StepEndEvent,
  StepStartEvent,
} from './core/types.js';

// ============================================================
// REGISTRY
// ============================================================

export { createImplementationRegistry, mergeRegistries } from './core/registry.js';

// ============================================================
// EXECUTION
// ============================================================

export { ExecutionContext } from './core/context.js';
export { SignalTable, type SignalEntry } from './core/signals.js';
export { parseSnapshot, SNAPSHOT_VERSION } from './core/snapshot.js';
