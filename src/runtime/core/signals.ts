/**
 * Signal Table
 *
 * Current value of every connector instance, keyed by
 * (instance path, connector name). Values persist until overwritten.
 */

import { signalKey } from '../../model/paths.js';
import type { SignalValue } from '../../types.js';
import type { SignalRef } from './types.js';

/** One stored signal */
export interface SignalEntry extends SignalRef {
  readonly value: SignalValue;
}

export class SignalTable {
  private readonly entries = new Map<string, SignalEntry>();

  get(path: string, connector: string): SignalValue | undefined {
    return this.entries.get(signalKey(path, connector))?.value;
  }

  has(path: string, connector: string): boolean {
    return this.entries.has(signalKey(path, connector));
  }

  set(path: string, connector: string, value: SignalValue): void {
    this.entries.set(signalKey(path, connector), { path, connector, value });
  }

  /** Read through a reference */
  read(ref: SignalRef): SignalValue | undefined {
    return this.get(ref.path, ref.connector);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  /** Entries in insertion order */
  list(): SignalEntry[] {
    return [...this.entries.values()];
  }
}
