/**
 * Model Validator
 * Orchestrates validation by walking the instance tree and invoking enabled rules.
 */

import { childPath } from '../model/paths.js';
import type { ImplementationRegistry } from '../runtime/core/types.js';
import { isComposite, type Block } from '../types.js';
import { resolveConfig } from './config.js';
import { VALIDATION_RULES } from './rules/index.js';
import type {
  BlockScope,
  Diagnostic,
  ValidateOptions,
  ValidationConfig,
  ValidationContext,
  ValidationReport,
} from './types.js';

// ============================================================
// VALIDATION ORCHESTRATOR
// ============================================================

/**
 * Validate a block and every instance beneath it.
 * Every enabled rule runs on every matching instance; nothing stops at the
 * first problem.
 *
 * @param block - Root block definition
 * @param registry - Implementations the model will run against
 * @throws ConfigError when options.config is invalid
 */
export function validate(
  block: Block,
  registry: ImplementationRegistry,
  options: ValidateOptions = {}
): ValidationReport {
  const context: ValidationContext = {
    registry,
    config: resolveConfig(options.config),
  };
  const diagnostics: Diagnostic[] = [];

  const visit = (scope: BlockScope): void => {
    for (const rule of VALIDATION_RULES) {
      // Skip if rule not enabled
      if (!isRuleEnabled(rule.code, context.config)) {
        continue;
      }

      // Skip if rule doesn't apply to this block kind
      if (!rule.kinds.includes(scope.block.kind)) {
        continue;
      }

      for (const diagnostic of rule.check(scope, context)) {
        diagnostics.push(applySeverity(diagnostic, context.config));
      }
    }

    if (isComposite(scope.block)) {
      for (const child of scope.block.instances) {
        visit({
          path: childPath(scope.path, child.name),
          block: child.block,
          overrides: child.parameters ?? {},
        });
      }
    }
  };

  visit({
    path: options.rootPath ?? block.name,
    block,
    overrides: options.parameters ?? {},
  });

  return createReport(diagnostics);
}

/**
 * Build a report from diagnostics.
 */
export function createReport(diagnostics: readonly Diagnostic[]): ValidationReport {
  const errors = diagnostics.filter((d) => d.severity === 'error');
  return {
    valid: errors.length === 0,
    diagnostics: [...diagnostics],
    errors,
    warnings: diagnostics.filter((d) => d.severity === 'warning'),
  };
}

// ============================================================
// HELPERS
// ============================================================

/**
 * Check if a rule is enabled based on configuration.
 * Rules are enabled if state is 'on' or 'warn'.
 */
function isRuleEnabled(ruleCode: string, config: ValidationConfig): boolean {
  const state = config.rules[ruleCode];
  return state === 'on' || state === 'warn';
}

/**
 * 'warn' downgrades a rule to warning; otherwise a configured severity wins.
 */
function applySeverity(diagnostic: Diagnostic, config: ValidationConfig): Diagnostic {
  const severity =
    config.rules[diagnostic.rule] === 'warn'
      ? 'warning'
      : (config.severity[diagnostic.rule] ?? diagnostic.severity);
  return severity === diagnostic.severity ? diagnostic : { ...diagnostic, severity };
}
