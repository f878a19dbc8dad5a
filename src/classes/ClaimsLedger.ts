import { Address } from '@ton/core';
import { MaxUint256 } from '../constants';
import { InsufficientBalance, InsufficientPermission } from '../errors';
import { addressKey } from '../functions/computePoolId';
import { Checkpointable, ClaimsService, Rollback } from '../types/services';
import { toUint256 } from '../utils/safeCast';

/**
 * Multi-token claim balances. Token ids are the 256-bit integer of the
 * asset's account hash; balances are kept per full address, so assets on
 * different workchains never share one. An allowance of 2^256-1 is never
 * spent. Amounts are unsigned.
 */
export class ClaimsLedger implements ClaimsService, Checkpointable {
  private balances: Map<string, bigint> = new Map();
  private allowances: Map<string, bigint> = new Map();
  private operators: Set<string> = new Set();

  static toId(currency: Address): bigint {
    return BigInt('0x' + currency.hash.toString('hex'));
  }

  balanceOf(owner: Address, currency: Address): bigint {
    return this.balances.get(balanceKey(owner, currency)) ?? BigInt(0);
  }

  allowance(owner: Address, spender: Address, currency: Address): bigint {
    return this.allowances.get(allowanceKey(owner, spender, currency)) ?? BigInt(0);
  }

  isOperator(owner: Address, operator: Address): boolean {
    return this.operators.has(operatorKey(owner, operator));
  }

  approve(owner: Address, spender: Address, currency: Address, amount: bigint): void {
    this.allowances.set(allowanceKey(owner, spender, currency), toUint256(amount));
  }

  setOperator(owner: Address, operator: Address, approved: boolean): void {
    if (approved) {
      this.operators.add(operatorKey(owner, operator));
    } else {
      this.operators.delete(operatorKey(owner, operator));
    }
  }

  mint(to: Address, currency: Address, amount: bigint): void {
    const key = balanceKey(to, currency);
    this.balances.set(key, toUint256(this.balanceOf(to, currency) + toUint256(amount)));
  }

  burn(from: Address, currency: Address, amount: bigint): void {
    this.debit(from, currency, amount);
  }

  burnFrom(spender: Address, from: Address, currency: Address, amount: bigint): void {
    this.spendAllowance(spender, from, currency, toUint256(amount));
    this.debit(from, currency, amount);
  }

  transfer(sender: Address, to: Address, currency: Address, amount: bigint): void {
    this.debit(sender, currency, amount);
    this.mint(to, currency, amount);
  }

  transferFrom(
    spender: Address,
    from: Address,
    to: Address,
    currency: Address,
    amount: bigint
  ): void {
    this.spendAllowance(spender, from, currency, toUint256(amount));
    this.transfer(from, to, currency, amount);
  }

  checkpoint(): Rollback {
    const balances = new Map(this.balances);
    const allowances = new Map(this.allowances);
    const operators = new Set(this.operators);
    return () => {
      this.balances = balances;
      this.allowances = allowances;
      this.operators = operators;
    };
  }

  private spendAllowance(
    spender: Address,
    owner: Address,
    currency: Address,
    amount: bigint
  ): void {
    if (spender.equals(owner) || this.isOperator(owner, spender)) return;

    const allowed = this.allowance(owner, spender, currency);
    if (allowed === MaxUint256) return;
    if (allowed < amount) {
      throw new InsufficientPermission(owner, spender, currency);
    }
    this.allowances.set(allowanceKey(owner, spender, currency), allowed - amount);
  }

  private debit(owner: Address, currency: Address, amount: bigint): void {
    const balance = this.balanceOf(owner, currency);
    if (balance < toUint256(amount)) {
      throw new InsufficientBalance(owner, currency, balance, amount);
    }
    this.balances.set(balanceKey(owner, currency), balance - amount);
  }
}

function balanceKey(owner: Address, currency: Address): string {
  return `${addressKey(owner)}|${addressKey(currency)}`;
}

function allowanceKey(owner: Address, spender: Address, currency: Address): string {
  return `${addressKey(owner)}|${addressKey(spender)}|${addressKey(currency)}`;
}

function operatorKey(owner: Address, operator: Address): string {
  return `${addressKey(owner)}|${addressKey(operator)}`;
}
