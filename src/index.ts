/**
 * Blockflow
 * Exports the block model, scheduler, validator and runtime
 */

// ============================================================
// BLOCK MODEL
// ============================================================
export {
  type Block,
  type BlockInstance,
  type BlockKind,
  type Causality,
  type CompositeBlock,
  type Connection,
  type Connector,
  type ElementaryBlock,
  type Endpoint,
  type Parameter,
  type SignalTypeName,
  type SignalValue,
  isComposite,
  isElementary,
  isSignalTypeName,
  SIGNAL_TYPES,
} from './types.js';
export {
  bindParameters,
  connect,
  type CompositeSpec,
  type ConnectionSpec,
  type ConnectorSpec,
  defineComposite,
  defineElementary,
  type ElementarySpec,
  findConnector,
  findInstance,
  findParameter,
  instance,
  parseEndpoint,
} from './model/blocks.js';
export { childPath, PATH_SEPARATOR } from './model/paths.js';
export { describeType, isTypeCompatible, isValueOfType } from './model/values.js';

// ============================================================
// GRAPH AND SCHEDULING
// ============================================================
export {
  buildDependencyGraph,
  type DependencyGraph,
  type GraphBuildOptions,
} from './graph/dependency-graph.js';
export { computeOrder, type Schedule, scheduleGraph } from './graph/scheduler.js';

// ============================================================
// VALIDATION
// ============================================================
export { createReport, validate } from './check/validator.js';
export {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  resolveConfig,
} from './check/config.js';
export { VALIDATION_RULES } from './check/rules/index.js';
export type {
  Diagnostic,
  DiagnosticLocation,
  RuleState,
  Severity,
  TypeCompatibility,
  ValidateOptions,
  ValidationConfig,
  ValidationReport,
  ValidationRule,
} from './check/types.js';

// ============================================================
// RUNTIME
// ============================================================
export * from './runtime/index.js';

// ============================================================
// MODEL LOADING
// ============================================================
export {
  loadModelFile,
  type ModelDocument,
  type ModelLoader,
  parseModel,
  yamlModelLoader,
} from './loader/model-loader.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';
export {
  AbortError,
  AlgebraicLoopError,
  ConfigError,
  ContextStateError,
  createError,
  EngineError,
  type EngineErrorData,
  formatCycle,
  ModelError,
  RuntimeError,
  ValidationError,
} from './error-classes.js';
