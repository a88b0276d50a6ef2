/**
 * Implementation Rules
 */

import { isElementary } from '../../types.js';
import type {
  BlockScope,
  Diagnostic,
  ValidationContext,
  ValidationRule,
} from '../types.js';
import { createDiagnostic } from './helpers.js';

// ============================================================
// UNKNOWN_BLOCK_TYPE RULE
// ============================================================

/**
 * Every elementary instance's type resolves in the supplied registry.
 * Composites are checked by recursing into their children instead.
 */
export const UNKNOWN_BLOCK_TYPE: ValidationRule = {
  code: 'UNKNOWN_BLOCK_TYPE',
  category: 'implementations',
  severity: 'error',
  mandatory: true,
  kinds: ['elementary'],

  check(scope: BlockScope, context: ValidationContext): Diagnostic[] {
    if (!isElementary(scope.block)) return [];
    const { typeId } = scope.block;
    if (context.registry.has(typeId)) return [];

    return [
      createDiagnostic(
        UNKNOWN_BLOCK_TYPE,
        `No implementation registered for type "${typeId}" used by ${scope.path}`,
        { path: scope.path }
      ),
    ];
  },
};
