import { ValidatorRecord } from '../models/Validator';
import { Bech32String } from '../types';

export type WatchPhase = 'unpolled' | 'ok' | 'error';

export interface WatchEntry {
  readonly phase: WatchPhase;
  /** Last successfully decoded record; kept through failures. */
  readonly record: ValidatorRecord | null;
  readonly consecutiveFailures: number;
  readonly lastError: string | null;
  readonly unableToQueryReported: boolean;
  readonly lastPolledAt: Date | null;
}

const UNPOLLED: WatchEntry = {
  phase: 'unpolled',
  record: null,
  consecutiveFailures: 0,
  lastError: null,
  unableToQueryReported: false,
  lastPolledAt: null,
};

/**
 * Last-known state per watched address. Entries are replaced, never
 * mutated, and only the orchestrator writes to it.
 */
export class WatchState {
  private readonly entries = new Map<Bech32String, WatchEntry>();

  get(address: Bech32String): WatchEntry {
    return this.entries.get(address) ?? UNPOLLED;
  }

  get size(): number {
    return this.entries.size;
  }

  recordSuccess(address: Bech32String, record: ValidatorRecord, at: Date): WatchEntry {
    return this.put(address, {
      phase: 'ok',
      record,
      consecutiveFailures: 0,
      lastError: null,
      unableToQueryReported: false,
      lastPolledAt: at,
    });
  }

  recordFailure(address: Bech32String, message: string, at: Date): WatchEntry {
    const previous = this.get(address);
    return this.put(address, {
      ...previous,
      phase: 'error',
      consecutiveFailures: previous.consecutiveFailures + 1,
      lastError: message,
      lastPolledAt: at,
    });
  }

  markUnableToQueryReported(address: Bech32String): WatchEntry {
    return this.put(address, { ...this.get(address), unableToQueryReported: true });
  }

  /** Drops entries for addresses nobody watches any more. */
  retain(addresses: ReadonlySet<Bech32String>): void {
    for (const address of Array.from(this.entries.keys())) {
      if (!addresses.has(address)) this.entries.delete(address);
    }
  }

  private put(address: Bech32String, entry: WatchEntry): WatchEntry {
    this.entries.set(address, entry);
    return entry;
  }
}
