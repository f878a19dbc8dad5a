import { Address, Cell } from '@ton/core';
import { BalanceDelta } from '../types/BalanceDelta';
import {
  FeeGrowthGlobals,
  ManagerContext,
  ModifyLiquidityResult,
} from '../types/ManagerContext';
import { ModifyLiquidityParams, PoolId, PoolKey, SwapParams } from '../types/PoolKey';
import { PositionInfo } from '../types/PositionInfo';
import { Slot0 } from '../types/Slot0';
import { NumberedTickInfo, TickInfo } from '../types/TickInfo';
import { FeeGrowthInside } from '../utils/tickLibrary';
import type { Session } from './Session';

/**
 * A session seen by one actor. Every call is made as `sender`.
 */
export class SessionContext implements ManagerContext {
  constructor(
    private readonly session: Session,
    public readonly sender: Address
  ) {}

  isUnlocked(): boolean {
    return this.session.isUnlocked();
  }

  get nonzeroDeltaCount(): number {
    return this.session.ledger.nonzeroDeltaCount;
  }

  initialize(key: PoolKey, sqrtPriceX96: bigint): number {
    return this.session.run(() =>
      this.session.initialize(this.sender, key, sqrtPriceX96)
    );
  }

  modifyLiquidity(
    key: PoolKey,
    params: ModifyLiquidityParams,
    hookData: Cell = Cell.EMPTY
  ): ModifyLiquidityResult {
    return this.session.run(() =>
      this.session.modifyLiquidity(this.sender, key, params, hookData)
    );
  }

  swap(key: PoolKey, params: SwapParams, hookData: Cell = Cell.EMPTY): BalanceDelta {
    return this.session.run(() =>
      this.session.swap(this.sender, key, params, hookData)
    );
  }

  donate(
    key: PoolKey,
    amount0: bigint,
    amount1: bigint,
    hookData: Cell = Cell.EMPTY
  ): BalanceDelta {
    return this.session.run(() =>
      this.session.donate(this.sender, key, amount0, amount1, hookData)
    );
  }

  sync(currency: Address): void {
    this.session.run(() => this.session.sync(currency));
  }

  settle(): bigint {
    return this.session.run(() => this.session.settle(this.sender));
  }

  settleFor(recipient: Address): bigint {
    return this.session.run(() => this.session.settle(recipient));
  }

  take(currency: Address, to: Address, amount: bigint): void {
    this.session.run(() => this.session.take(this.sender, currency, to, amount));
  }

  clear(currency: Address, amount: bigint): void {
    this.session.run(() => this.session.clear(this.sender, currency, amount));
  }

  mint(to: Address, currency: Address, amount: bigint): void {
    this.session.run(() => this.session.mint(this.sender, to, currency, amount));
  }

  burn(from: Address, currency: Address, amount: bigint): void {
    this.session.run(() => this.session.burn(this.sender, from, currency, amount));
  }

  updateDynamicLPFee(key: PoolKey, newDynamicLPFee: number): void {
    this.session.run(() =>
      this.session.updateDynamicLPFee(this.sender, key, newDynamicLPFee)
    );
  }

  currencyDelta(target: Address, currency: Address): bigint {
    return this.session.ledger.currencyDelta(target, currency);
  }

  getSyncedCurrency(): Address | null {
    return this.session.ledger.getSynced()?.currency ?? null;
  }

  getSyncedReserves(): bigint {
    return this.session.ledger.getSynced()?.reserves ?? BigInt(0);
  }

  // ========== READS ==========

  getSlot0(id: PoolId): Slot0 {
    return this.session.view.getSlot0(id);
  }

  getLiquidity(id: PoolId): bigint {
    return this.session.view.getLiquidity(id);
  }

  getPositionInfo(
    id: PoolId,
    owner: Address,
    tickLower: number,
    tickUpper: number,
    salt?: bigint
  ): PositionInfo {
    return this.session.view.getPositionInfo(id, owner, tickLower, tickUpper, salt);
  }

  getTickInfo(id: PoolId, tick: number): TickInfo {
    return this.session.view.getTickInfo(id, tick);
  }

  getTicks(id: PoolId): NumberedTickInfo[] {
    return this.session.view.getTicks(id);
  }

  getTickBitmap(id: PoolId, wordPos: number): bigint {
    return this.session.view.getTickBitmap(id, wordPos);
  }

  getFeeGrowthGlobals(id: PoolId): FeeGrowthGlobals {
    return this.session.view.getFeeGrowthGlobals(id);
  }

  getFeeGrowthInside(id: PoolId, tickLower: number, tickUpper: number): FeeGrowthInside {
    return this.session.view.getFeeGrowthInside(id, tickLower, tickUpper);
  }

  protocolFeesAccrued(currency: Address): bigint {
    return this.session.view.protocolFeesAccrued(currency);
  }
}
