/**
 * Runtime Types
 *
 * Public types for implementation registries, context configuration,
 * observability and snapshots. These types are the primary interface for
 * host applications.
 */

import type { ValidationConfig } from '../../check/types.js';
import type { SignalTypeName, SignalValue } from '../../types.js';

// ============================================================
// ELEMENTARY IMPLEMENTATIONS
// ============================================================

/** Value an implementation may keep between steps */
export type StateValue = SignalValue | readonly SignalValue[];

/** Instance-local state variables, owned by the execution context */
export type InstanceState = Map<string, StateValue>;

/** Arguments passed to an elementary implementation on every step */
export interface ElementaryCall {
  /** Qualified instance path */
  readonly path: string;
  readonly typeId: string;
  /** Index of the step being computed (0-based) */
  readonly step: number;
  readonly inputs: Readonly<Record<string, SignalValue>>;
  readonly parameters: Readonly<Record<string, SignalValue>>;
  /** Mutable state carried across steps and captured by snapshot() */
  readonly state: InstanceState;
  /** Route a message through the context's onLog callback */
  log(message: string): void;
}

/** Arguments passed when instance state is seeded */
export interface ElementaryInit {
  readonly path: string;
  readonly typeId: string;
  readonly parameters: Readonly<Record<string, SignalValue>>;
}

/** Output values keyed by output connector name */
export type ElementaryOutputs = Record<string, SignalValue>;

/** Plain evaluation function for stateless implementations */
export type ElementaryFn = (call: ElementaryCall) => ElementaryOutputs;

/** Full implementation definition */
export interface ElementaryDefinition {
  readonly evaluate: ElementaryFn;
  /** Seed instance state; called by initialize() and reset() */
  readonly initialize?:
    | ((init: ElementaryInit) => Record<string, StateValue>)
    | undefined;
  readonly description?: string | undefined;
}

/**
 * Lookup from type identifier to elementary implementation.
 * Supplied explicitly to every context; never resolved from global state.
 */
export interface ImplementationRegistry {
  get(typeId: string): ElementaryDefinition | undefined;
  has(typeId: string): boolean;
  typeIds(): string[];
  readonly size: number;
}

// ============================================================
// CALLBACKS
// ============================================================

/** I/O callbacks for runtime operations */
export interface RuntimeCallbacks {
  /** Called when an implementation calls log() */
  onLog: (message: string, path: string) => void;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before each step evaluates its order */
  onStepStart?: (event: StepStartEvent) => void;
  /** Called after a step completes */
  onStepEnd?: (event: StepEndEvent) => void;
  /** Called before an instance is evaluated */
  onEvaluate?: (event: EvaluateEvent) => void;
  /** Called after an instance wrote its outputs */
  onEvaluated?: (event: EvaluatedEvent) => void;
  /** Called when a step fails */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a step */
export interface StepStartEvent {
  /** Path of the context's root instance */
  path: string;
  /** Step index (0-based) */
  step: number;
  /** Number of instances in the cached order */
  total: number;
}

/** Event emitted after a step */
export interface StepEndEvent {
  path: string;
  step: number;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted before an instance is evaluated */
export interface EvaluateEvent {
  path: string;
  typeId: string;
  inputs: Readonly<Record<string, SignalValue>>;
}

/** Event emitted after an instance is evaluated */
export interface EvaluatedEvent {
  path: string;
  outputs: Readonly<Record<string, SignalValue>>;
  durationMs: number;
}

/** Event emitted on a failed step */
export interface ErrorEvent {
  /** The original error, unchanged */
  error: unknown;
  /** Innermost instance being evaluated when the error was raised */
  path: string;
  step: number;
}

// ============================================================
// CONTEXT CONFIGURATION AND STATE
// ============================================================

/** Options for creating an execution context */
export interface ContextOptions {
  /** Parameter overrides for the root instance */
  parameters?: Readonly<Record<string, SignalValue>>;
  /** Root instance path (defaults to the root block's name) */
  rootPath?: string;
  /** I/O callbacks */
  callbacks?: Partial<RuntimeCallbacks>;
  /** Observability callbacks, inherited by nested contexts */
  observability?: ObservabilityCallbacks;
  /** Checked before every instance evaluation */
  signal?: AbortSignal;
  /** Keep the last N values of every root output */
  history?: number;
  /** Validator configuration used by initialize() and revalidate() */
  validation?: Partial<ValidationConfig>;
}

/** Lifecycle states */
export type ContextState = 'unvalidated' | 'initialized' | 'stepping' | 'faulted';

/** Recorded failure of the last step */
export interface Fault {
  readonly error: unknown;
  readonly path: string;
  readonly step: number;
}

/** Reference to one signal */
export interface SignalRef {
  readonly path: string;
  readonly connector: string;
}

// ============================================================
// SNAPSHOTS
// ============================================================

/** One persisted signal value */
export interface SnapshotSignal {
  readonly path: string;
  readonly connector: string;
  readonly type: SignalTypeName;
  readonly value: SignalValue;
}

/**
 * Persisted state of a context.
 * Holds no graph or order data; both are rederived from the model.
 */
export interface ContextSnapshot {
  readonly version: 1;
  /** Root instance path of the context that took the snapshot */
  readonly root: string;
  readonly step: number;
  readonly signals: readonly SnapshotSignal[];
  /** Instance path -> implementation state variables */
  readonly state: Readonly<Record<string, Readonly<Record<string, StateValue>>>>;
}
