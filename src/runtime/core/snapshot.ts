/**
 * Snapshot Parsing
 *
 * Checks an opaque snapshot blob (for example one read back from JSON)
 * against the snapshot layout before a context restores it.
 */

import { RuntimeError } from '../../error-classes.js';
import { isSignalTypeName, type SignalValue } from '../../types.js';
import type { ContextSnapshot, SnapshotSignal, StateValue } from './types.js';

/** Current snapshot layout version */
export const SNAPSHOT_VERSION = 1;

/**
 * Parse a snapshot blob.
 * @throws RuntimeError (BF-R007) when the blob does not match the layout
 */
export function parseSnapshot(blob: unknown): ContextSnapshot {
  if (!isRecord(blob)) {
    throw invalid('expected an object');
  }

  if (blob['version'] !== SNAPSHOT_VERSION) {
    throw invalid(`unsupported version ${String(blob['version'])}`);
  }

  const root = blob['root'];
  if (typeof root !== 'string') {
    throw invalid('root must be a string');
  }

  const step = blob['step'];
  if (typeof step !== 'number' || !Number.isSafeInteger(step) || step < 0) {
    throw invalid('step must be a non-negative integer');
  }

  const rawSignals = blob['signals'];
  if (!Array.isArray(rawSignals)) {
    throw invalid('signals must be an array');
  }
  const signals = rawSignals.map((entry: unknown, index) => parseSignal(entry, index));

  const rawState = blob['state'];
  if (!isRecord(rawState)) {
    throw invalid('state must be an object');
  }
  const state: Record<string, Record<string, StateValue>> = {};
  for (const [path, variables] of Object.entries(rawState)) {
    if (!isRecord(variables)) {
      throw invalid(`state of ${path} must be an object`);
    }
    const parsed: Record<string, StateValue> = {};
    for (const [name, value] of Object.entries(variables)) {
      if (!isStateValue(value)) {
        throw invalid(`state variable ${path}.${name} has an unsupported value`);
      }
      parsed[name] = cloneStateValue(value);
    }
    state[path] = parsed;
  }

  return { version: SNAPSHOT_VERSION, root, step, signals, state };
}

function parseSignal(entry: unknown, index: number): SnapshotSignal {
  if (!isRecord(entry)) {
    throw invalid(`signal #${index} must be an object`);
  }
  const { path, connector, type, value } = entry;
  if (typeof path !== 'string' || typeof connector !== 'string') {
    throw invalid(`signal #${index} needs a string path and connector`);
  }
  if (!isSignalTypeName(type)) {
    throw invalid(`signal ${path}.${connector} has unknown type ${String(type)}`);
  }
  if (!isSignalValue(value)) {
    throw invalid(`signal ${path}.${connector} has an unsupported value`);
  }
  return { path, connector, type, value };
}

// ============================================================
// HELPERS
// ============================================================

/**
 * Copy a state value so snapshots never share arrays with live state.
 */
export function cloneStateValue(value: StateValue): StateValue {
  return typeof value === 'object' ? Object.freeze([...value]) : value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSignalValue(value: unknown): value is SignalValue {
  return (
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

function isStateValue(value: unknown): value is StateValue {
  return isSignalValue(value) || (Array.isArray(value) && value.every(isSignalValue));
}

function invalid(reason: string): RuntimeError {
  return new RuntimeError('BF-R007', { reason });
}
