/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'model' | 'validation' | 'runtime' | 'config';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: BF-{category}{3-digit} (e.g., BF-R001) */
  readonly errorId: string;
  /** Error category (determines ID prefix) */
  readonly category: ErrorCategory;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

/** All error definitions indexed by error ID */
const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Model Errors (BF-M0xx)
  {
    errorId: 'BF-M001',
    category: 'model',
    description: 'Invalid block definition',
    messageTemplate: 'Invalid block definition {block}: {reason}',
    cause: 'A block definition is missing a required field or has a malformed one.',
    resolution: 'Fix the named field in the block definition.',
  },
  {
    errorId: 'BF-M002',
    category: 'model',
    description: 'Invalid connection endpoint',
    messageTemplate: 'Invalid connection endpoint "{endpoint}"',
    cause: 'An endpoint string is empty or has more than one instance segment.',
    resolution:
      'Write endpoints as "instance.connector", or "connector" for the enclosing block boundary.',
  },
  {
    errorId: 'BF-M003',
    category: 'model',
    description: 'Unresolved connection reference',
    messageTemplate: 'Connection in {path} references unknown {kind} "{name}"',
    cause: 'A connection names an instance or connector that does not exist.',
    resolution: 'Run validate() to see every dangling reference, then fix the connections.',
  },
  {
    errorId: 'BF-M004',
    category: 'model',
    description: 'Malformed model document',
    messageTemplate: 'Malformed model document: {reason}',
    cause: 'The model document could not be parsed or does not have the expected shape.',
    resolution: 'Check the document against the expected blocks/root layout.',
  },
  {
    errorId: 'BF-M005',
    category: 'model',
    description: 'Unknown block reference',
    messageTemplate: 'Instance "{instance}" in {block} references unknown block "{ref}"',
    cause: 'An instance refers to a block name missing from the document library.',
    resolution: 'Define the block in the blocks section or fix the reference.',
  },
  {
    errorId: 'BF-M006',
    category: 'model',
    description: 'Circular block reference',
    messageTemplate: 'Circular block reference: {chain}',
    cause: 'A composite block contains itself directly or through other composites.',
    resolution: 'Break the containment chain; composites must form a tree.',
  },

  // Validation Errors (BF-V0xx)
  {
    errorId: 'BF-V001',
    category: 'validation',
    description: 'Model failed validation',
    messageTemplate: 'Model {path} failed validation with {count} error(s): {summary}',
    cause: 'initialize() or restore() ran the validator and it reported errors.',
    resolution: 'Inspect error.report.errors and fix every reported problem.',
  },
  {
    errorId: 'BF-V002',
    category: 'validation',
    description: 'Algebraic loop',
    messageTemplate: 'Algebraic loop: {cycle}',
    cause: 'Connections feeding child inputs form a cycle.',
    resolution:
      'Break the loop with a block whose output does not depend on its input in the same step.',
  },

  // Runtime Errors (BF-R0xx)
  {
    errorId: 'BF-R001',
    category: 'runtime',
    description: 'Missing input value',
    messageTemplate: 'Input {path}.{connector} has no value at step {step}',
    cause: 'An input was read before any value was bound to it or to its source.',
    resolution:
      'Set the external input with setInput() or step(inputs), or declare a start value.',
  },
  {
    errorId: 'BF-R002',
    category: 'runtime',
    description: 'Missing implementation output',
    messageTemplate: 'Implementation "{typeId}" did not produce output {path}.{connector}',
    cause: 'An elementary implementation returned without a declared output.',
    resolution: 'Return every declared output from the implementation.',
  },
  {
    errorId: 'BF-R003',
    category: 'runtime',
    description: 'Invalid signal value',
    messageTemplate: 'Invalid value {value} for {path}.{connector}: expected {expected}',
    cause: 'A value does not match the connector type, is not finite, or is not an enumeration literal.',
    resolution: 'Produce a value of the declared connector type.',
  },
  {
    errorId: 'BF-R004',
    category: 'runtime',
    description: 'Unknown signal',
    messageTemplate: 'Unknown {causality} connector {path}.{connector}',
    cause: 'The instance path or connector name does not exist in this model.',
    resolution: 'Use the qualified instance path (root name, then child names joined by ".").',
  },
  {
    errorId: 'BF-R005',
    category: 'runtime',
    description: 'Invalid context state',
    messageTemplate: 'Cannot {operation}: context is {state}',
    cause: 'A lifecycle operation was called in a state that does not allow it.',
    resolution: 'Call initialize() first; after a fault call reset() or construct a new context.',
  },
  {
    errorId: 'BF-R006',
    category: 'runtime',
    description: 'Step aborted',
    messageTemplate: 'Step {step} aborted before evaluating {path}',
    cause: 'The AbortSignal passed in the context options was aborted.',
    resolution: 'Reset the context before stepping again.',
  },
  {
    errorId: 'BF-R007',
    category: 'runtime',
    description: 'Invalid snapshot',
    messageTemplate: 'Invalid snapshot: {reason}',
    cause: 'The snapshot blob does not match the snapshot layout or this model.',
    resolution: 'Restore a snapshot taken from a context over the same model.',
  },
  {
    errorId: 'BF-R008',
    category: 'runtime',
    description: 'Step already in progress',
    messageTemplate: 'Cannot {operation} {path}: step {step} is still in progress',
    cause: 'The context was driven from inside one of its own evaluations.',
    resolution: 'Do not drive a context from one of its own implementations.',
  },
  {
    errorId: 'BF-R009',
    category: 'runtime',
    description: 'Missing implementation',
    messageTemplate: 'No implementation registered for type "{typeId}" at {path}',
    cause: 'An elementary instance was evaluated against a registry without its type.',
    resolution: 'Register the type, or run validate() to list every unknown type.',
  },

  // Config Errors (BF-C0xx)
  {
    errorId: 'BF-C001',
    category: 'config',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration: {reason}',
    cause: 'The validator configuration file is malformed or names an unknown rule.',
    resolution: 'Fix the configuration file; see createDefaultConfig() for the known rules.',
  },
  {
    errorId: 'BF-C002',
    category: 'config',
    description: 'Mandatory rule override',
    messageTemplate: 'Invalid configuration: rule {code} cannot be set to "{state}"',
    cause: 'The configuration tries to disable or downgrade a rule backing a language invariant.',
    resolution: 'Remove the override; mandatory rules always report errors.',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Expected {expected}, got {actual}", {expected: "Real", actual: "true"})
 * // Returns: "Expected Real, got true"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template.charAt(i + 1) !== '{') {
      const close = template.indexOf('}', i + 1);

      // Unclosed brace - return template unchanged
      if (close === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        try {
          result += String(value);
        } catch {
          result += Object.prototype.toString.call(value);
        }
      }

      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
