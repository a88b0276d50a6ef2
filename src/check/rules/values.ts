/**
 * Value Rules
 * Parameter binding and declared start values.
 */

import { findParameter } from '../../model/blocks.js';
import {
  describeType,
  formatValue,
  isValueOfType,
  isWithinBounds,
} from '../../model/values.js';
import type {
  BlockScope,
  Diagnostic,
  ValidationContext,
  ValidationRule,
} from '../types.js';
import { createDiagnostic } from './helpers.js';

// ============================================================
// PARAMETER_UNBOUND RULE
// ============================================================

/**
 * Every parameter has a declared default or an instantiation-time override.
 */
export const PARAMETER_UNBOUND: ValidationRule = {
  code: 'PARAMETER_UNBOUND',
  category: 'values',
  severity: 'error',
  mandatory: true,
  kinds: ['elementary', 'composite'],

  check(scope: BlockScope, _context: ValidationContext): Diagnostic[] {
    return scope.block.parameters
      .filter((param) => param.value === undefined && scope.overrides[param.name] === undefined)
      .map((param) =>
        createDiagnostic(
          PARAMETER_UNBOUND,
          `Parameter ${scope.path}.${param.name} has no default and no override`,
          { path: scope.path, parameter: param.name }
        )
      );
  },
};

// ============================================================
// PARAMETER_INVALID RULE
// ============================================================

/**
 * Overrides name declared parameters; bound values match the declared type
 * and lie within min/max.
 */
export const PARAMETER_INVALID: ValidationRule = {
  code: 'PARAMETER_INVALID',
  category: 'values',
  severity: 'error',
  mandatory: true,
  kinds: ['elementary', 'composite'],

  check(scope: BlockScope, _context: ValidationContext): Diagnostic[] {
    const { block, path, overrides } = scope;
    const diagnostics: Diagnostic[] = [];

    for (const name of Object.keys(overrides)) {
      if (findParameter(block, name)) continue;
      diagnostics.push(
        createDiagnostic(
          PARAMETER_INVALID,
          `Override "${name}" on ${path} does not match any parameter of ${block.name}`,
          { path, parameter: name }
        )
      );
    }

    for (const param of block.parameters) {
      const value = overrides[param.name] ?? param.value;
      if (value === undefined) continue;

      if (!isValueOfType(value, param)) {
        diagnostics.push(
          createDiagnostic(
            PARAMETER_INVALID,
            `Parameter ${path}.${param.name} is ${formatValue(value)}, expected ${describeType(param)}`,
            { path, parameter: param.name }
          )
        );
      } else if (!isWithinBounds(value, param)) {
        diagnostics.push(
          createDiagnostic(
            PARAMETER_INVALID,
            `Parameter ${path}.${param.name} is ${formatValue(value)}, outside ${formatBounds(param)}`,
            { path, parameter: param.name }
          )
        );
      }
    }

    return diagnostics;
  },
};

// ============================================================
// CONNECTOR_START_INVALID RULE
// ============================================================

/**
 * Declared start values match the connector type.
 */
export const CONNECTOR_START_INVALID: ValidationRule = {
  code: 'CONNECTOR_START_INVALID',
  category: 'values',
  severity: 'error',
  mandatory: true,
  kinds: ['elementary', 'composite'],

  check(scope: BlockScope, _context: ValidationContext): Diagnostic[] {
    const { block, path } = scope;
    return [...block.inputs, ...block.outputs]
      .filter((c) => c.start !== undefined && !isValueOfType(c.start, c))
      .map((c) =>
        createDiagnostic(
          CONNECTOR_START_INVALID,
          `Start value ${formatValue(c.start)} of ${path}.${c.name} is not a ${describeType(c)}`,
          { path, connector: c.name }
        )
      );
  },
};

// ============================================================
// CONNECTOR_START_OUT_OF_BOUNDS RULE
// ============================================================

/**
 * Declared start values lie within min/max.
 */
export const CONNECTOR_START_OUT_OF_BOUNDS: ValidationRule = {
  code: 'CONNECTOR_START_OUT_OF_BOUNDS',
  category: 'values',
  severity: 'warning',
  mandatory: false,
  kinds: ['elementary', 'composite'],

  check(scope: BlockScope, _context: ValidationContext): Diagnostic[] {
    const { block, path } = scope;
    const diagnostics: Diagnostic[] = [];
    for (const connector of [...block.inputs, ...block.outputs]) {
      const { start } = connector;
      if (start === undefined || isWithinBounds(start, connector)) continue;
      diagnostics.push(
        createDiagnostic(
          CONNECTOR_START_OUT_OF_BOUNDS,
          `Start value ${formatValue(start)} of ${path}.${connector.name} is outside ${formatBounds(connector)}`,
          { path, connector: connector.name }
        )
      );
    }
    return diagnostics;
  },
};

function formatBounds(bounds: {
  readonly min?: number | undefined;
  readonly max?: number | undefined;
}): string {
  return `[${bounds.min ?? '-Infinity'}, ${bounds.max ?? 'Infinity'}]`;
}
