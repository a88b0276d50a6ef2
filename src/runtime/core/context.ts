/**
 * Execution Context
 *
 * Owns the signal table, instance runtime state, step counter and event
 * scope of one model instantiation, and drives the block evaluator over the
 * cached evaluation order. Public API for host applications.
 *
 * Composite instances get a nested context of their own whose root path is
 * the instance path, so each level keeps its own order and scope counter.
 */

import { validate } from '../../check/validator.js';
import type { ValidationReport } from '../../check/types.js';
import {
  AbortError,
  ConfigError,
  ContextStateError,
  RuntimeError,
  ValidationError,
} from '../../error-classes.js';
import { buildDependencyGraph } from '../../graph/dependency-graph.js';
import { computeOrder } from '../../graph/scheduler.js';
import { bindParameters, findConnector } from '../../model/blocks.js';
import {
  childPath,
  endpointPath,
  isWithinPath,
  signalKey,
} from '../../model/paths.js';
import { describeType, formatValue, isValueOfType } from '../../model/values.js';
import {
  isComposite,
  type Block,
  type Causality,
  type CompositeBlock,
  type Connector,
  type SignalValue,
} from '../../types.js';
import {
  evaluateInstance,
  type EvaluationEnv,
  type InstanceRuntime,
  type NestedScope,
} from './evaluate.js';
import { SignalTable, type SignalEntry } from './signals.js';
import { cloneStateValue, parseSnapshot } from './snapshot.js';
import type {
  ContextOptions,
  ContextSnapshot,
  ContextState,
  ElementaryOutputs,
  Fault,
  ImplementationRegistry,
  InstanceState,
  ObservabilityCallbacks,
  RuntimeCallbacks,
  SignalRef,
  SnapshotSignal,
  StateValue,
} from './types.js';

const defaultCallbacks: RuntimeCallbacks = {
  onLog: (message, path) => {
    console.log(`[${path}] ${message}`);
  },
};

export class ExecutionContext {
  readonly block: Block;
  readonly registry: ImplementationRegistry;
  /** Qualified path of the root instance */
  readonly rootPath: string;

  private readonly options: ContextOptions;
  private readonly callbacks: RuntimeCallbacks;
  private readonly observability: ObservabilityCallbacks;
  private readonly table = new SignalTable();

  private lifecycle: ContextState = 'unvalidated';
  private steps = 0;
  /** Event-scope counter: open step() calls on this context */
  private depth = 0;
  private lastFault: Fault | undefined;
  /** Instance being evaluated by the open step, if any */
  private activePath: string | undefined;
  /** Nested contexts report failures to their parent, not to onError */
  private isNested = false;

  private cachedOrder: readonly string[] = [];
  private readonly runtimes = new Map<string, InstanceRuntime>();
  /** Composite child path -> its nested context */
  private readonly children = new Map<string, ExecutionContext>();
  /** Root output -> the child output passed through to it */
  private readonly rootSources = new Map<string, SignalRef>();
  private readonly outputHistory = new Map<string, SignalValue[]>();

  constructor(
    block: Block,
    registry: ImplementationRegistry,
    options: ContextOptions = {}
  ) {
    if (
      options.history !== undefined &&
      (!Number.isSafeInteger(options.history) || options.history < 1)
    ) {
      throw new ConfigError('BF-C001', {
        reason: `history must be a positive integer, got ${formatValue(options.history)}`,
      });
    }

    this.block = block;
    this.registry = registry;
    this.rootPath = options.rootPath ?? block.name;
    this.options = options;
    this.callbacks = { ...defaultCallbacks, ...options.callbacks };
    this.observability = options.observability ?? {};
  }

  // ============================================================
  // LIFECYCLE
  // ============================================================

  /**
   * Validate the model, cache the evaluation orders, bind parameters, seed
   * start values and create instance state.
   *
   * @returns The validation report (may carry warnings)
   * @throws ValidationError when the report has errors; the context stays unvalidated
   */
  initialize(): ValidationReport {
    if (this.lifecycle !== 'unvalidated') {
      throw new ContextStateError('initialize', this.lifecycle, this.rootPath);
    }

    const report = this.revalidate();
    if (!report.valid) {
      throw new ValidationError(report, this.rootPath);
    }

    this.prepare();
    this.seed();
    return report;
  }

  /**
   * Evaluate one step.
   *
   * @param inputs - Values for root input connectors, applied before evaluation
   * @returns Root output values after the step
   * @throws The original error of a failed evaluation; the context is then faulted
   */
  step(inputs?: Readonly<Record<string, SignalValue>>): Record<string, SignalValue> {
    this.assertRunnable('step');
    this.assertIdle('step');

    // Check every input before writing any
    const writes = Object.entries(inputs ?? {}).map(([connector, value]) => ({
      table: this.checkInput(this.rootPath, connector, value),
      connector,
      value,
    }));
    for (const { table, connector, value } of writes) {
      table.set(this.rootPath, connector, value);
    }

    this.runStep();
    return this.rootOutputs();
  }

  /**
   * Return to the freshly initialized state: signals cleared and re-seeded,
   * instance state re-created, step counter at 0, fault cleared.
   * Cached orders are kept.
   */
  reset(): void {
    if (this.lifecycle === 'unvalidated') {
      throw new ContextStateError('reset', this.lifecycle, this.rootPath);
    }
    this.assertIdle('reset');
    this.seed();
  }

  /**
   * Re-run the validator. Never touches signals or instance state.
   */
  revalidate(): ValidationReport {
    return validate(this.block, this.registry, {
      config: this.options.validation,
      parameters: this.options.parameters,
      rootPath: this.rootPath,
    });
  }

  // ============================================================
  // SIGNAL ACCESS
  // ============================================================

  /**
   * Bind a value to an input connector at any level of the instance tree.
   * Inputs fed by a connection are overwritten when their instance is evaluated.
   *
   * @throws RuntimeError (BF-R004) for unknown inputs, (BF-R003) for ill-typed values
   */
  setInput(instance: string, connector: string, value: SignalValue): void {
    if (this.lifecycle === 'unvalidated') {
      throw new ContextStateError('setInput', this.lifecycle, this.rootPath);
    }

    this.checkInput(instance, connector, value).set(instance, connector, value);
  }

  /**
   * Current value of an output connector, or undefined before it was computed.
   * @throws RuntimeError (BF-R004) for unknown outputs
   */
  getOutput(instance: string, connector: string): SignalValue | undefined {
    const { owner } = this.locate(instance, connector, 'output');
    return owner.table.get(instance, connector);
  }

  /**
   * Current value of any connector, or undefined when it has none.
   * @throws RuntimeError (BF-R004) for unknown connectors
   */
  getSignal(instance: string, connector: string): SignalValue | undefined {
    const { owner } = this.locate(instance, connector);
    return owner.table.get(instance, connector);
  }

  /**
   * Every bound signal across all levels, sorted by path then connector.
   */
  signals(): SignalEntry[] {
    const collected = new Map<string, SignalEntry>();
    this.collectSignals(collected);
    return [...collected.values()].sort(compareSignals);
  }

  /**
   * Values of a root output over the last steps, oldest first.
   * Empty unless the history option is set.
   */
  history(connector: string): SignalValue[] {
    if (!findConnector(this.block, connector, 'output')) {
      throw new RuntimeError(
        'BF-R004',
        { causality: 'output', path: this.rootPath, connector },
        this.rootPath
      );
    }
    return [...(this.outputHistory.get(connector) ?? [])];
  }

  // ============================================================
  // SNAPSHOTS
  // ============================================================

  /**
   * Capture signals, step counter and instance state.
   * Graphs and orders are not captured; restore() rederives them.
   */
  snapshot(): ContextSnapshot {
    this.assertRunnable('snapshot');
    this.assertIdle('snapshot');

    const signals: SnapshotSignal[] = [];
    for (const entry of this.signals()) {
      const declared = this.ownerOf(entry.path)?.connectorAt(entry.path, entry.connector);
      if (declared) {
        signals.push({ ...entry, type: declared.type });
      }
    }

    const state: Record<string, Record<string, StateValue>> = {};
    this.collectState(state);

    return {
      version: 1,
      root: this.rootPath,
      step: this.steps,
      signals,
      state,
    };
  }

  /**
   * Create an initialized context over `block` and load a snapshot into it.
   *
   * @param blob - Snapshot as returned by snapshot(), possibly after a JSON round trip
   * @throws ValidationError when the model does not validate
   * @throws RuntimeError (BF-R007) when the blob does not match the layout or the model
   */
  static restore(
    block: Block,
    registry: ImplementationRegistry,
    blob: unknown,
    options: ContextOptions = {}
  ): ExecutionContext {
    const snapshot = parseSnapshot(blob);
    const context = new ExecutionContext(block, registry, options);
    context.initialize();

    if (snapshot.root !== context.rootPath) {
      throw new RuntimeError('BF-R007', {
        reason: `snapshot root "${snapshot.root}" does not match "${context.rootPath}"`,
      });
    }
    context.load(snapshot);
    return context;
  }

  // ============================================================
  // INTROSPECTION
  // ============================================================

  get state(): ContextState {
    return this.lifecycle;
  }

  /** Number of completed steps */
  get stepCount(): number {
    return this.steps;
  }

  get fault(): Fault | undefined {
    return this.lastFault;
  }

  get eventDepth(): number {
    return this.depth;
  }

  /** Cached evaluation order of this level's instances */
  get order(): readonly string[] {
    return this.cachedOrder;
  }

  // ============================================================
  // PREPARATION
  // ============================================================

  /**
   * Build runtimes, nested contexts and the cached order.
   * Nested contexts are prepared without validating again.
   */
  private prepare(): void {
    this.runtimes.clear();
    this.children.clear();
    this.rootSources.clear();

    const { block, rootPath } = this;
    if (!isComposite(block)) {
      this.runtimes.set(rootPath, {
        path: rootPath,
        block,
        parameters: bindParameters(block, this.options.parameters),
        state: new Map(),
        sources: new Map(),
      });
      this.cachedOrder = [rootPath];
      return;
    }

    this.cachedOrder = computeOrder(buildDependencyGraph(block, rootPath));

    for (const child of block.instances) {
      const path = childPath(rootPath, child.name);
      const parameters = bindParameters(child.block, child.parameters);

      let nested: NestedScope | undefined;
      if (isComposite(child.block)) {
        const context = this.createNested(child.block, path, child.parameters);
        this.children.set(path, context);
        nested = { run: (inputs) => context.runNested(inputs) };
      }

      this.runtimes.set(path, {
        path,
        block: child.block,
        parameters,
        state: new Map(),
        sources: inputSources(block, rootPath, child.name),
        nested,
      });
    }

    for (const { from, to } of block.connections) {
      if (to.instance === undefined && from.instance !== undefined) {
        this.rootSources.set(to.connector, {
          path: endpointPath(rootPath, from),
          connector: from.connector,
        });
      }
    }
  }

  private createNested(
    block: CompositeBlock,
    path: string,
    parameters: Readonly<Record<string, SignalValue>> | undefined
  ): ExecutionContext {
    const context = new ExecutionContext(block, this.registry, {
      parameters,
      rootPath: path,
      callbacks: this.callbacks,
      observability: this.observability,
      signal: this.options.signal,
    });
    context.isNested = true;
    context.prepare();
    return context;
  }

  /**
   * Clear signals and re-create everything initialize() seeds, on every level.
   */
  private seed(): void {
    this.table.clear();
    this.outputHistory.clear();
    this.steps = 0;
    this.lastFault = undefined;
    this.activePath = undefined;
    this.lifecycle = 'initialized';

    this.seedStartValues(this.rootPath, this.block);
    for (const runtime of this.runtimes.values()) {
      if (runtime.path !== this.rootPath) {
        this.seedStartValues(runtime.path, runtime.block);
      }
      runtime.state = runtime.nested === undefined ? this.initialState(runtime) : new Map();
    }

    for (const child of this.children.values()) {
      child.seed();
    }
  }

  private seedStartValues(path: string, block: Block): void {
    for (const connector of [...block.inputs, ...block.outputs]) {
      if (connector.start !== undefined) {
        this.table.set(path, connector.name, connector.start);
      }
    }
  }

  private initialState(runtime: InstanceRuntime): InstanceState {
    const definition = this.registry.get(runtime.block.typeId);
    const seeded =
      definition?.initialize?.({
        path: runtime.path,
        typeId: runtime.block.typeId,
        parameters: runtime.parameters,
      }) ?? {};
    return new Map(Object.entries(seeded));
  }

  // ============================================================
  // STEPPING
  // ============================================================

  /**
   * Evaluate the cached order once inside this context's event scope.
   */
  private runStep(): void {
    const step = this.steps;
    this.assertIdle('step');

    this.observability.onStepStart?.({
      path: this.rootPath,
      step,
      total: this.cachedOrder.length,
    });

    const startTime = performance.now();
    const env: EvaluationEnv = {
      table: this.table,
      registry: this.registry,
      step,
      callbacks: this.callbacks,
      observability: this.observability,
    };

    this.depth++;
    try {
      for (const path of this.cachedOrder) {
        const runtime = this.runtimes.get(path);
        if (runtime === undefined) continue;

        this.activePath = path;
        if (this.options.signal?.aborted === true) {
          throw new AbortError(step, path);
        }
        evaluateInstance(runtime, env);
      }
      this.activePath = undefined;

      this.writeRootOutputs();
      this.steps = step + 1;
      this.lifecycle = 'stepping';
      this.recordHistory();
    } catch (error) {
      this.recordFault(error, step);
      throw error;
    } finally {
      this.depth--;
    }

    this.observability.onStepEnd?.({
      path: this.rootPath,
      step,
      durationMs: performance.now() - startTime,
    });
  }

  /**
   * Step a nested context on behalf of its parent's evaluation.
   */
  private runNested(inputs: Readonly<Record<string, SignalValue>>): ElementaryOutputs {
    this.assertRunnable('step');
    for (const [connector, value] of Object.entries(inputs)) {
      this.table.set(this.rootPath, connector, value);
    }
    this.runStep();
    return this.rootOutputs();
  }

  private writeRootOutputs(): void {
    for (const [connector, source] of this.rootSources) {
      const value = this.table.read(source);
      if (value !== undefined) {
        this.table.set(this.rootPath, connector, value);
      }
    }
  }

  private rootOutputs(): Record<string, SignalValue> {
    const outputs: Record<string, SignalValue> = {};
    for (const connector of this.block.outputs) {
      const value = this.table.get(this.rootPath, connector.name);
      if (value !== undefined) {
        outputs[connector.name] = value;
      }
    }
    return outputs;
  }

  private recordHistory(): void {
    const limit = this.options.history;
    if (limit === undefined) return;

    for (const [connector, value] of Object.entries(this.rootOutputs())) {
      const values = this.outputHistory.get(connector) ?? [];
      values.push(value);
      if (values.length > limit) values.splice(0, values.length - limit);
      this.outputHistory.set(connector, values);
    }
  }

  /**
   * Move to faulted, keeping the innermost failing instance path.
   */
  private recordFault(error: unknown, step: number): void {
    const active = this.activePath;
    const nestedFault =
      active === undefined ? undefined : this.children.get(active)?.fault;
    const path = nestedFault?.path ?? active ?? this.rootPath;

    this.lastFault = { error, path, step };
    this.lifecycle = 'faulted';
    this.activePath = undefined;

    if (!this.isNested) {
      this.observability.onError?.({ error, path, step });
    }
  }

  // ============================================================
  // RESTORE
  // ============================================================

  private load(snapshot: ContextSnapshot): void {
    this.clearSignals();

    for (const signal of snapshot.signals) {
      const owner = this.ownerOf(signal.path);
      const declared = owner?.connectorAt(signal.path, signal.connector);
      if (!owner || !declared) {
        throw new RuntimeError('BF-R007', {
          reason: `unknown signal ${signal.path}.${signal.connector}`,
        });
      }
      if (declared.type !== signal.type || !isValueOfType(signal.value, declared)) {
        throw new RuntimeError('BF-R007', {
          reason: `signal ${signal.path}.${signal.connector} is not a ${describeType(declared)}`,
        });
      }
      owner.writeRestored(signal.path, signal.connector, signal.value);
    }

    for (const [path, variables] of Object.entries(snapshot.state)) {
      const runtime = this.ownerOf(path)?.runtimes.get(path);
      if (!runtime || runtime.nested !== undefined) {
        throw new RuntimeError('BF-R007', {
          reason: `no elementary instance at ${path}`,
        });
      }
      runtime.state = new Map(
        Object.entries(variables).map(([name, value]) => [name, cloneStateValue(value)])
      );
    }

    this.setStepCount(snapshot.step);
  }

  private clearSignals(): void {
    this.table.clear();
    for (const child of this.children.values()) {
      child.clearSignals();
    }
  }

  /** Write a restored value here and into the nested context sharing it */
  private writeRestored(path: string, connector: string, value: SignalValue): void {
    this.table.set(path, connector, value);
    this.children.get(path)?.table.set(path, connector, value);
  }

  private setStepCount(step: number): void {
    this.steps = step;
    this.lifecycle = step > 0 ? 'stepping' : 'initialized';
    for (const child of this.children.values()) {
      child.setStepCount(step);
    }
  }

  // ============================================================
  // LOOKUPS
  // ============================================================

  /**
   * Context whose signal table holds the connectors of `path`.
   */
  private ownerOf(path: string): ExecutionContext | undefined {
    if (path === this.rootPath || this.runtimes.has(path)) return this;
    for (const [nestedPath, child] of this.children) {
      if (isWithinPath(path, nestedPath)) return child.ownerOf(path);
    }
    return undefined;
  }

  private connectorAt(path: string, name: string, causality?: Causality): Connector | undefined {
    const block = path === this.rootPath ? this.block : this.runtimes.get(path)?.block;
    return block === undefined ? undefined : findConnector(block, name, causality);
  }

  private locate(
    instance: string,
    connector: string,
    causality?: Causality
  ): { owner: ExecutionContext; declared: Connector } {
    const owner = this.ownerOf(instance);
    const declared = owner?.connectorAt(instance, connector, causality);
    if (!owner || !declared) {
      throw new RuntimeError(
        'BF-R004',
        { causality: causality ?? 'signal', path: instance, connector },
        instance
      );
    }
    return { owner, declared };
  }

  private collectSignals(into: Map<string, SignalEntry>): void {
    for (const entry of this.table.list()) {
      const key = signalKey(entry.path, entry.connector);
      if (!into.has(key)) into.set(key, entry);
    }
    for (const child of this.children.values()) {
      child.collectSignals(into);
    }
  }

  private collectState(into: Record<string, Record<string, StateValue>>): void {
    for (const runtime of this.runtimes.values()) {
      if (runtime.nested !== undefined) continue;
      into[runtime.path] = Object.fromEntries(
        [...runtime.state].map(([name, value]) => [name, cloneStateValue(value)])
      );
    }
    for (const child of this.children.values()) {
      child.collectState(into);
    }
  }

  // ============================================================
  // GUARDS
  // ============================================================

  /** Type-check a value for an input and return the table that holds it */
  private checkInput(instance: string, connector: string, value: SignalValue): SignalTable {
    const { owner, declared } = this.locate(instance, connector, 'input');
    if (!isValueOfType(value, declared)) {
      throw new RuntimeError(
        'BF-R003',
        {
          value: formatValue(value),
          path: instance,
          connector,
          expected: describeType(declared),
        },
        instance
      );
    }
    return owner.table;
  }

  private assertRunnable(operation: string): void {
    if (this.lifecycle === 'unvalidated' || this.lifecycle === 'faulted') {
      throw new ContextStateError(operation, this.lifecycle, this.rootPath);
    }
  }

  /** Refuse to re-enter while this context's event scope is open */
  private assertIdle(operation: string): void {
    if (this.depth > 0) {
      throw new RuntimeError(
        'BF-R008',
        { operation, path: this.rootPath, step: this.steps },
        this.rootPath
      );
    }
  }
}

// ============================================================
// HELPERS
// ============================================================

/**
 * Map each input of one child to the signal feeding it.
 */
function inputSources(
  block: CompositeBlock,
  scopePath: string,
  instance: string
): Map<string, SignalRef> {
  const sources = new Map<string, SignalRef>();
  for (const { from, to } of block.connections) {
    if (to.instance === instance) {
      sources.set(to.connector, {
        path: endpointPath(scopePath, from),
        connector: from.connector,
      });
    }
  }
  return sources;
}

function compareSignals(a: SignalEntry, b: SignalEntry): number {
  if (a.path !== b.path) return a.path < b.path ? -1 : 1;
  if (a.connector === b.connector) return 0;
  return a.connector < b.connector ? -1 : 1;
}
