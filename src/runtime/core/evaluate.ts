/**
 * Block Evaluator
 *
 * Evaluates one instance against the owning context's signal table:
 * resolves its inputs from their connection sources, runs the registered
 * elementary implementation or the nested composite context, and writes
 * the outputs back.
 */

import { RuntimeError } from '../../error-classes.js';
import { describeType, formatValue, isValueOfType } from '../../model/values.js';
import type { Block, SignalValue } from '../../types.js';
import type { SignalTable } from './signals.js';
import type {
  ElementaryOutputs,
  ImplementationRegistry,
  InstanceState,
  ObservabilityCallbacks,
  RuntimeCallbacks,
  SignalRef,
} from './types.js';

// ============================================================
// TYPES
// ============================================================

/**
 * Handle on the nested context of a composite instance.
 * Created by the owning context; the nested context never sees its parent.
 */
export interface NestedScope {
  /** Copy inputs in, run one internal step, copy outputs out */
  run(inputs: Readonly<Record<string, SignalValue>>): ElementaryOutputs;
}

/** Runtime record of one instance inside a context */
export interface InstanceRuntime {
  readonly path: string;
  readonly block: Block;
  /** Bound parameter values (defaults overlaid by overrides) */
  readonly parameters: Readonly<Record<string, SignalValue>>;
  /** Implementation state; empty for composites */
  state: InstanceState;
  /** Input connector -> the signal feeding it */
  readonly sources: ReadonlyMap<string, SignalRef>;
  /** Present for composite instances */
  readonly nested?: NestedScope | undefined;
}

/** What the evaluator needs from the owning context */
export interface EvaluationEnv {
  readonly table: SignalTable;
  readonly registry: ImplementationRegistry;
  /** Index of the step being computed */
  readonly step: number;
  readonly callbacks: RuntimeCallbacks;
  readonly observability: ObservabilityCallbacks;
}

// ============================================================
// EVALUATION
// ============================================================

/**
 * Evaluate one instance and write its outputs into the signal table.
 *
 * @throws RuntimeError (BF-R001) when an input has no value
 * @throws RuntimeError (BF-R002, BF-R003) for missing or ill-typed outputs
 * @throws RuntimeError (BF-R009) when no implementation is registered
 */
export function evaluateInstance(runtime: InstanceRuntime, env: EvaluationEnv): void {
  const inputs = resolveInputs(runtime, env);

  env.observability.onEvaluate?.({
    path: runtime.path,
    typeId: runtime.block.typeId,
    inputs,
  });

  const startTime = performance.now();
  const outputs =
    runtime.nested === undefined
      ? evaluateElementary(runtime, env, inputs)
      : runtime.nested.run(inputs);

  writeOutputs(runtime, env, outputs);

  env.observability.onEvaluated?.({
    path: runtime.path,
    outputs,
    durationMs: performance.now() - startTime,
  });
}

/**
 * Copy every input from its source into the instance's own input signal and
 * return the current input values.
 * A missing source value leaves the input untouched, so a declared start
 * value or an externally set value is used instead.
 */
export function resolveInputs(
  runtime: InstanceRuntime,
  env: EvaluationEnv
): Record<string, SignalValue> {
  const inputs: Record<string, SignalValue> = {};

  for (const connector of runtime.block.inputs) {
    const source = runtime.sources.get(connector.name);
    const fed = source === undefined ? undefined : env.table.read(source);
    if (fed !== undefined) {
      env.table.set(runtime.path, connector.name, fed);
    }

    const value = env.table.get(runtime.path, connector.name);
    if (value === undefined) {
      throw new RuntimeError(
        'BF-R001',
        { path: runtime.path, connector: connector.name, step: env.step },
        runtime.path
      );
    }
    inputs[connector.name] = value;
  }

  return inputs;
}

function evaluateElementary(
  runtime: InstanceRuntime,
  env: EvaluationEnv,
  inputs: Readonly<Record<string, SignalValue>>
): ElementaryOutputs {
  const { path, block } = runtime;
  const definition = env.registry.get(block.typeId);
  if (!definition) {
    throw new RuntimeError('BF-R009', { typeId: block.typeId, path }, path);
  }

  // Implementation errors propagate unchanged
  const result: unknown = definition.evaluate({
    path,
    typeId: block.typeId,
    step: env.step,
    inputs,
    parameters: runtime.parameters,
    state: runtime.state,
    log: (message) => env.callbacks.onLog(message, path),
  });

  return checkOutputs(runtime, result);
}

/**
 * Check that an implementation returned every declared output with a value
 * of the declared type. Undeclared keys are dropped.
 */
function checkOutputs(runtime: InstanceRuntime, result: unknown): ElementaryOutputs {
  const { path, block } = runtime;
  const returned = new Map<string, unknown>(
    typeof result === 'object' && result !== null ? Object.entries(result) : []
  );

  const outputs: ElementaryOutputs = {};
  for (const connector of block.outputs) {
    const value = returned.get(connector.name);
    if (value === undefined) {
      throw new RuntimeError(
        'BF-R002',
        { typeId: block.typeId, path, connector: connector.name },
        path
      );
    }
    if (!isValueOfType(value, connector)) {
      throw new RuntimeError(
        'BF-R003',
        {
          value: formatValue(value),
          path,
          connector: connector.name,
          expected: describeType(connector),
        },
        path
      );
    }
    outputs[connector.name] = value;
  }

  return outputs;
}

function writeOutputs(
  runtime: InstanceRuntime,
  env: EvaluationEnv,
  outputs: Readonly<ElementaryOutputs>
): void {
  for (const connector of runtime.block.outputs) {
    const value = outputs[connector.name];
    if (value !== undefined) {
      env.table.set(runtime.path, connector.name, value);
    }
  }
}
