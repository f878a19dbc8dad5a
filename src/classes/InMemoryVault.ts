import { Address } from '@ton/core';
import { InsufficientBalance } from '../errors';
import { addressKey } from '../functions/computePoolId';
import { Checkpointable, Custody, Rollback } from '../types/services';
import { toUint256 } from '../utils/safeCast';

/**
 * External balances per (holder, asset), with the engine as one of the
 * holders. Payments into the engine are plain transfers to its address.
 */
export class InMemoryVault implements Custody, Checkpointable {
  private balances: Map<string, bigint> = new Map();

  constructor(public readonly engine: Address) {}

  /** Credits `holder` out of thin air. */
  deposit(holder: Address, currency: Address, amount: bigint): void {
    this.credit(holder, currency, amount);
  }

  balanceOfHolder(holder: Address, currency: Address): bigint {
    return this.balances.get(key(holder, currency)) ?? BigInt(0);
  }

  transferFrom(from: Address, to: Address, currency: Address, amount: bigint): void {
    const balance = this.balanceOfHolder(from, currency);
    if (balance < toUint256(amount)) {
      throw new InsufficientBalance(from, currency, balance, amount);
    }
    this.balances.set(key(from, currency), balance - amount);
    this.credit(to, currency, amount);
  }

  balanceOf(currency: Address): bigint {
    return this.balanceOfHolder(this.engine, currency);
  }

  transfer(currency: Address, to: Address, amount: bigint): void {
    this.transferFrom(this.engine, to, currency, amount);
  }

  checkpoint(): Rollback {
    const balances = new Map(this.balances);
    return () => {
      this.balances = balances;
    };
  }

  private credit(holder: Address, currency: Address, amount: bigint): void {
    const balance = this.balanceOfHolder(holder, currency) + toUint256(amount);
    this.balances.set(key(holder, currency), toUint256(balance));
  }
}

function key(holder: Address, currency: Address): string {
  return `${addressKey(holder)}|${addressKey(currency)}`;
}
