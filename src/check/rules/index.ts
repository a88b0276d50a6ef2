/**
 * Validation Rules Registry
 * Barrel export for all validation rules.
 */

import type { ValidationRule } from '../types.js';
import {
  STRUCTURE_EMPTY_NAME,
  STRUCTURE_INVALID_NAME,
  STRUCTURE_DUPLICATE_NAME,
} from './structure.js';
import {
  CONNECTION_UNKNOWN_ENDPOINT,
  CONNECTION_ILLEGAL_SHAPE,
  INPUT_UNCONNECTED,
  INPUT_MULTIPLE_SOURCES,
  OUTPUT_UNCONNECTED,
  CONNECTION_TYPE_MISMATCH,
  CONNECTION_UNIT_MISMATCH,
} from './connections.js';
import { ALGEBRAIC_LOOP } from './graph.js';
import { UNKNOWN_BLOCK_TYPE } from './implementations.js';
import {
  PARAMETER_UNBOUND,
  PARAMETER_INVALID,
  CONNECTOR_START_INVALID,
  CONNECTOR_START_OUT_OF_BOUNDS,
} from './values.js';

// ============================================================
// RE-EXPORT INDIVIDUAL RULES
// ============================================================

export {
  STRUCTURE_EMPTY_NAME,
  STRUCTURE_INVALID_NAME,
  STRUCTURE_DUPLICATE_NAME,
} from './structure.js';
export {
  CONNECTION_UNKNOWN_ENDPOINT,
  CONNECTION_ILLEGAL_SHAPE,
  INPUT_UNCONNECTED,
  INPUT_MULTIPLE_SOURCES,
  OUTPUT_UNCONNECTED,
  CONNECTION_TYPE_MISMATCH,
  CONNECTION_UNIT_MISMATCH,
} from './connections.js';
export { ALGEBRAIC_LOOP } from './graph.js';
export { UNKNOWN_BLOCK_TYPE } from './implementations.js';
export {
  PARAMETER_UNBOUND,
  PARAMETER_INVALID,
  CONNECTOR_START_INVALID,
  CONNECTOR_START_OUT_OF_BOUNDS,
} from './values.js';

// ============================================================
// RULE REGISTRY
// ============================================================

/**
 * All registered validation rules.
 * Applied to every instance of the tree, in this order.
 */
export const VALIDATION_RULES: readonly ValidationRule[] = [
  STRUCTURE_EMPTY_NAME,
  STRUCTURE_INVALID_NAME,
  STRUCTURE_DUPLICATE_NAME,
  CONNECTION_UNKNOWN_ENDPOINT,
  CONNECTION_ILLEGAL_SHAPE,
  INPUT_UNCONNECTED,
  INPUT_MULTIPLE_SOURCES,
  OUTPUT_UNCONNECTED,
  CONNECTION_TYPE_MISMATCH,
  CONNECTION_UNIT_MISMATCH,
  ALGEBRAIC_LOOP,
  UNKNOWN_BLOCK_TYPE,
  PARAMETER_UNBOUND,
  PARAMETER_INVALID,
  CONNECTOR_START_INVALID,
  CONNECTOR_START_OUT_OF_BOUNDS,
];
