/**
 * Signal Values
 *
 * Type membership, compatibility and formatting for signal and parameter values.
 */

import type { SignalTypeName, SignalValue } from '../types.js';

/** Anything that declares a signal type (connector or parameter) */
export interface TypedSlot {
  readonly type: SignalTypeName;
  readonly literals?: readonly string[] | undefined;
}

/**
 * Check whether a value belongs to a declared type.
 * Real values must be finite; Integer values must be safe integers;
 * Enumeration values must be one of the declared literals when any are declared.
 */
export function isValueOfType(value: unknown, slot: TypedSlot): value is SignalValue {
  switch (slot.type) {
    case 'Real':
      return typeof value === 'number' && Number.isFinite(value);
    case 'Integer':
      return typeof value === 'number' && Number.isSafeInteger(value);
    case 'Boolean':
      return typeof value === 'boolean';
    case 'String':
      return typeof value === 'string';
    case 'Enumeration':
      return (
        typeof value === 'string' &&
        (slot.literals === undefined || slot.literals.includes(value))
      );
  }
}

/**
 * Human-readable type description used in error messages.
 * Enumerations list their literals: Enumeration(on|off)
 */
export function describeType(slot: TypedSlot): string {
  if (slot.type === 'Enumeration' && slot.literals !== undefined) {
    return `Enumeration(${slot.literals.join('|')})`;
  }
  if (slot.type === 'Real') {
    return 'finite Real';
  }
  return slot.type;
}

/**
 * Format any value for diagnostics.
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (value === undefined) return 'undefined';
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (value === null) return 'null';
  return Object.prototype.toString.call(value);
}

/**
 * Check whether values of type `from` may flow into a slot of type `to`.
 * Identical types are always compatible; enumerations also need identical literal sets.
 * Other pairs must appear in `allowed` as [from, to].
 */
export function isTypeCompatible(
  from: TypedSlot,
  to: TypedSlot,
  allowed: readonly (readonly [SignalTypeName, SignalTypeName])[]
): boolean {
  if (from.type === to.type) {
    if (from.type !== 'Enumeration') return true;
    return sameLiterals(from.literals, to.literals);
  }
  return allowed.some(([a, b]) => a === from.type && b === to.type);
}

function sameLiterals(
  a: readonly string[] | undefined,
  b: readonly string[] | undefined
): boolean {
  if (a === undefined || b === undefined) return a === b;
  if (a.length !== b.length) return false;
  const set = new Set(a);
  return b.every((literal) => set.has(literal));
}

/**
 * Check a numeric value against optional bounds.
 */
export function isWithinBounds(
  value: SignalValue,
  bounds: { readonly min?: number | undefined; readonly max?: number | undefined }
): boolean {
  if (typeof value !== 'number') return true;
  if (bounds.min !== undefined && value < bounds.min) return false;
  if (bounds.max !== undefined && value > bounds.max) return false;
  return true;
}
