/**
 * Check Types
 * Type definitions for the semantic validator.
 */

import type { ImplementationRegistry } from '../runtime/core/types.js';
import type { Block, BlockKind, SignalTypeName, SignalValue } from '../types.js';

// ============================================================
// SEVERITY AND RULE STATE
// ============================================================

/** Diagnostic severity levels */
export type Severity = 'error' | 'warning' | 'info';

/** Rule state configuration */
export type RuleState = 'on' | 'off' | 'warn';

// ============================================================
// DIAGNOSTIC DATA
// ============================================================

/** Where a diagnostic points in the instance tree */
export interface DiagnosticLocation {
  /** Qualified instance path */
  readonly path: string;
  readonly connector?: string | undefined;
  readonly parameter?: string | undefined;
}

/**
 * A single problem found during validation.
 */
export interface Diagnostic {
  readonly severity: Severity;
  readonly message: string;
  readonly location: DiagnosticLocation;
  /** Rule code (e.g., INPUT_UNCONNECTED) */
  readonly rule: string;
  /** Every instance path involved, for problems spanning several instances */
  readonly related?: readonly string[] | undefined;
}

/**
 * Aggregated validation result.
 * `valid` is false when at least one error-severity diagnostic was reported.
 */
export interface ValidationReport {
  readonly valid: boolean;
  /** All diagnostics in traversal order */
  readonly diagnostics: readonly Diagnostic[];
  readonly errors: readonly Diagnostic[];
  readonly warnings: readonly Diagnostic[];
}

// ============================================================
// VALIDATION CONFIGURATION
// ============================================================

/** Pair of types whose values may flow from the first into the second */
export type TypeCompatibility = readonly [SignalTypeName, SignalTypeName];

/**
 * Configuration for rules, severity overrides and type compatibility.
 */
export interface ValidationConfig {
  /** Per-rule enable/disable/warn state */
  readonly rules: Readonly<Record<string, RuleState>>;
  /** Severity overrides by rule code */
  readonly severity: Readonly<Record<string, Severity>>;
  /** Allowed connections between different types (e.g., Integer -> Real) */
  readonly compatibleTypes: readonly TypeCompatibility[];
}

/** Options accepted by validate() */
export interface ValidateOptions {
  /** Merged over createDefaultConfig() */
  readonly config?: Partial<ValidationConfig> | undefined;
  /** Parameter overrides for the root instance */
  readonly parameters?: Readonly<Record<string, SignalValue>> | undefined;
  /** Root instance path (defaults to the root block's name) */
  readonly rootPath?: string | undefined;
}

// ============================================================
// VALIDATION CONTEXT
// ============================================================

/**
 * One instance of the tree as seen by the rules.
 */
export interface BlockScope {
  /** Qualified instance path */
  readonly path: string;
  readonly block: Block;
  /** Instantiation-time parameter overrides */
  readonly overrides: Readonly<Record<string, SignalValue>>;
}

/**
 * Shared, read-only context for validation passes.
 */
export interface ValidationContext {
  readonly registry: ImplementationRegistry;
  readonly config: ValidationConfig;
}

// ============================================================
// VALIDATION RULES
// ============================================================

/** Rule category for grouping and organization */
export type RuleCategory =
  | 'structure'
  | 'connections'
  | 'graph'
  | 'implementations'
  | 'values';

/**
 * Validation rule interface.
 * Rules are stateless; all context is passed via ValidationContext.
 * Rules return diagnostics, never throw.
 */
export interface ValidationRule {
  /** Unique rule code (e.g., INPUT_UNCONNECTED) */
  readonly code: string;

  /** Rule category for grouping */
  readonly category: RuleCategory;

  /** Default severity level */
  readonly severity: Severity;

  /**
   * Mandatory rules back language invariants: they cannot be disabled or
   * downgraded by configuration.
   */
  readonly mandatory: boolean;

  /** Block kinds this rule applies to */
  readonly kinds: readonly BlockKind[];

  /**
   * Check one instance, returning diagnostics for violations.
   * Called once for each instance whose block kind matches `kinds`.
   */
  check(scope: BlockScope, context: ValidationContext): Diagnostic[];
}
