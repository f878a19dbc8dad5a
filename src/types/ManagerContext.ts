import { Address, Cell } from '@ton/core';
import { BalanceDelta } from './BalanceDelta';
import { ModifyLiquidityParams, PoolId, PoolKey, SwapParams } from './PoolKey';
import { PositionInfo } from './PositionInfo';
import { Slot0 } from './Slot0';
import { NumberedTickInfo, TickInfo } from './TickInfo';

export interface FeeGrowthGlobals {
  feeGrowthGlobal0X128: bigint;
  feeGrowthGlobal1X128: bigint;
}

/**
 * Read-only view of pool state. Uninitialized pools, ticks and positions
 * read as zero.
 */
export interface PoolStateReader {
  getSlot0(id: PoolId): Slot0;
  getLiquidity(id: PoolId): bigint;
  getPositionInfo(
    id: PoolId,
    owner: Address,
    tickLower: number,
    tickUpper: number,
    salt?: bigint
  ): PositionInfo;
  getTickInfo(id: PoolId, tick: number): TickInfo;
  getTicks(id: PoolId): NumberedTickInfo[];
  getTickBitmap(id: PoolId, wordPos: number): bigint;
  getFeeGrowthGlobals(id: PoolId): FeeGrowthGlobals;
  getFeeGrowthInside(
    id: PoolId,
    tickLower: number,
    tickUpper: number
  ): { feeGrowthInside0X128: bigint; feeGrowthInside1X128: bigint };
  protocolFeesAccrued(currency: Address): bigint;
}

export interface ModifyLiquidityResult {
  /** Principal plus fees, net of any hook delta. */
  callerDelta: BalanceDelta;
  feesAccrued: BalanceDelta;
}

/**
 * The engine as seen from inside a session, bound to one actor: the caller
 * that opened the session, or a hook being dispatched.
 */
export interface ManagerContext extends PoolStateReader {
  readonly sender: Address;

  isUnlocked(): boolean;

  initialize(key: PoolKey, sqrtPriceX96: bigint): number;

  modifyLiquidity(
    key: PoolKey,
    params: ModifyLiquidityParams,
    hookData?: Cell
  ): ModifyLiquidityResult;

  swap(key: PoolKey, params: SwapParams, hookData?: Cell): BalanceDelta;

  donate(
    key: PoolKey,
    amount0: bigint,
    amount1: bigint,
    hookData?: Cell
  ): BalanceDelta;

  /** Checkpoints the engine's custody balance of `currency`. */
  sync(currency: Address): void;

  /** Credits the sender with what was paid in since the last sync. */
  settle(): bigint;

  settleFor(recipient: Address): bigint;

  take(currency: Address, to: Address, amount: bigint): void;

  /** Forfeits an exact positive delta. */
  clear(currency: Address, amount: bigint): void;

  /** Turns a credit into a claim held by `to`. */
  mint(to: Address, currency: Address, amount: bigint): void;

  /** Redeems a claim held by `from` into a credit of the sender. */
  burn(from: Address, currency: Address, amount: bigint): void;

  updateDynamicLPFee(key: PoolKey, newDynamicLPFee: number): void;

  currencyDelta(target: Address, currency: Address): bigint;

  readonly nonzeroDeltaCount: number;

  getSyncedCurrency(): Address | null;

  getSyncedReserves(): bigint;
}
