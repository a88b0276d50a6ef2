/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { ValidationReport } from './check/types.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface EngineErrorData {
  readonly errorId: string;
  readonly message: string;
  /** Qualified instance path the error belongs to */
  readonly path?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Factory function for creating errors from registry.
 *
 * Looks up the error definition, renders its message template with context
 * and creates an EngineError with structured metadata.
 *
 * @param errorId - Error identifier (format: BF-{category}{3-digit})
 * @param context - Key-value pairs for template placeholder replacement
 * @param path - Instance path where the error occurred
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError("BF-R004", { causality: "input", path: "plant", connector: "u" })
 * // EngineError: "Unknown input connector plant.u"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  path?: string | undefined
): EngineError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  return new EngineError({
    errorId,
    message: renderMessage(definition.messageTemplate, context),
    path,
    context,
  });
}

/**
 * Render the message for a registered error of the expected category.
 * Throws TypeError for unknown IDs or IDs of another category.
 */
function renderForCategory(
  errorId: string,
  category: ErrorCategory,
  context: Record<string, unknown>
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all engine errors.
 * Provides structured data for host applications to format as needed.
 */
export class EngineError extends Error {
  readonly errorId: string;
  readonly path?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: EngineErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(data.message);
    this.name = 'EngineError';
    this.errorId = data.errorId;
    this.path = data.path;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): EngineErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      path: this.path,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: EngineErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return `[${this.errorId}] ${this.message}`;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Malformed model structure (builders, loader, strict graph building) */
export class ModelError extends EngineError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    path?: string
  ) {
    super({
      errorId,
      message: renderForCategory(errorId, 'model', context),
      path,
      context,
    });
    this.name = 'ModelError';
  }
}

/** Raised when a model is refused because validation reported errors */
export class ValidationError extends EngineError {
  readonly report: ValidationReport;

  constructor(report: ValidationReport, path: string) {
    const summary = report.errors
      .slice(0, 3)
      .map((d) => d.message)
      .join('; ');
    const context = { path, count: report.errors.length, summary };
    super({
      errorId: 'BF-V001',
      message: renderForCategory('BF-V001', 'validation', context),
      path,
      context,
    });
    this.name = 'ValidationError';
    this.report = report;
  }
}

/** Dependency cycles among connections feeding child inputs */
export class AlgebraicLoopError extends EngineError {
  /** Instance paths on the first cycle, producer before consumer */
  readonly cycle: readonly string[];
  /** Every reported cycle; together they name each instance on a loop */
  readonly cycles: readonly (readonly string[])[];

  constructor(cycles: readonly (readonly string[])[]) {
    const context = { cycle: cycles.map(formatCycle).join('; ') };
    const first = cycles[0] ?? [];
    super({
      errorId: 'BF-V002',
      message: renderForCategory('BF-V002', 'validation', context),
      path: first[0],
      context,
    });
    this.name = 'AlgebraicLoopError';
    this.cycle = [...first];
    this.cycles = cycles.map((cycle) => [...cycle]);
  }
}

/** Runtime execution errors */
export class RuntimeError extends EngineError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    path?: string
  ) {
    super({
      errorId,
      message: renderForCategory(errorId, 'runtime', context),
      path,
      context,
    });
    this.name = 'RuntimeError';
  }
}

/** Lifecycle misuse (stepping a faulted context, initializing twice, ...) */
export class ContextStateError extends RuntimeError {
  readonly operation: string;
  readonly state: string;

  constructor(operation: string, state: string, path?: string) {
    super('BF-R005', { operation, state }, path);
    this.name = 'ContextStateError';
    this.operation = operation;
    this.state = state;
  }
}

/** Invalid validator configuration */
export class ConfigError extends EngineError {
  constructor(errorId: string, context: Record<string, unknown>) {
    super({
      errorId,
      message: renderForCategory(errorId, 'config', context),
      context,
    });
    this.name = 'ConfigError';
  }
}

/** Abort errors (when a step is cancelled via AbortSignal) */
export class AbortError extends RuntimeError {
  constructor(step: number, path: string) {
    super('BF-R006', { step, path }, path);
    this.name = 'AbortError';
  }
}

// ============================================================
// HELPERS
// ============================================================

/**
 * Render a cycle as "a -> b -> a".
 */
export function formatCycle(cycle: readonly string[]): string {
  const first = cycle[0];
  if (first === undefined) return '';
  return [...cycle, first].join(' -> ');
}
