import { Address } from '@ton/core';
import { SafeCastOverflow } from '../errors';
import { addressKey } from '../functions/computePoolId';

const MAX_INT256 = (BigInt(1) << BigInt(255)) - BigInt(1);
const MIN_INT256 = -(BigInt(1) << BigInt(255));

export interface DeltaEntry {
  target: Address;
  currency: Address;
  delta: bigint;
}

export interface SyncCheckpoint {
  currency: Address;
  reserves: bigint;
}

/**
 * Signed balances per (actor, currency) for one session, plus the number of
 * entries that are not zero. A positive entry is owed to the actor.
 */
export class Ledger {
  private readonly entries: Map<string, DeltaEntry> = new Map();
  private count = 0;
  private synced: SyncCheckpoint | null = null;

  get nonzeroDeltaCount(): number {
    return this.count;
  }

  currencyDelta(target: Address, currency: Address): bigint {
    return this.entries.get(entryKey(target, currency))?.delta ?? BigInt(0);
  }

  accountDelta(currency: Address, delta: bigint, target: Address): void {
    if (delta === BigInt(0)) return;

    const key = entryKey(target, currency);
    const previous = this.entries.get(key)?.delta ?? BigInt(0);
    const next = previous + delta;
    if (next > MAX_INT256 || next < MIN_INT256) {
      throw new SafeCastOverflow(next, 'int256');
    }

    if (next === BigInt(0)) {
      this.count--;
      this.entries.delete(key);
    } else {
      if (previous === BigInt(0)) this.count++;
      this.entries.set(key, { target, currency, delta: next });
    }
  }

  /**
   * Entries that are not zero, in insertion order.
   */
  nonzeroEntries(): DeltaEntry[] {
    return Array.from(this.entries.values(), (entry) => ({ ...entry }));
  }

  sync(currency: Address, reserves: bigint): void {
    this.synced = { currency, reserves };
  }

  getSynced(): SyncCheckpoint | null {
    return this.synced;
  }

  resetSync(): void {
    this.synced = null;
  }
}

function entryKey(target: Address, currency: Address): string {
  return `${addressKey(target)}|${addressKey(currency)}`;
}
