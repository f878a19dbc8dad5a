import { Address } from '@ton/core';
import { Pool } from '../entities/Pool';
import { FeeGrowthGlobals, PoolStateReader } from '../types/ManagerContext';
import { PoolId } from '../types/PoolKey';
import { PositionInfo } from '../types/PositionInfo';
import { Slot0 } from '../types/Slot0';
import { emptyTickInfo, NumberedTickInfo, TickInfo } from '../types/TickInfo';
import { FeeGrowthInside } from '../utils/tickLibrary';

/**
 * Read-only queries over whichever pools `lookup` resolves. Returned values
 * are copies.
 */
export class StateView implements PoolStateReader {
  constructor(
    private readonly lookup: (id: PoolId) => Pool | undefined,
    private readonly accrued: (currency: Address) => bigint
  ) {}

  getSlot0(id: PoolId): Slot0 {
    return this.lookup(id)?.slot0 ?? Slot0.EMPTY;
  }

  getLiquidity(id: PoolId): bigint {
    return this.lookup(id)?.liquidity ?? BigInt(0);
  }

  getPositionInfo(
    id: PoolId,
    owner: Address,
    tickLower: number,
    tickUpper: number,
    salt: bigint = BigInt(0)
  ): PositionInfo {
    const position = this.lookup(id)?.getPosition(owner, tickLower, tickUpper, salt);
    return {
      liquidity: position?.liquidity ?? BigInt(0),
      feeGrowthInside0LastX128: position?.feeGrowthInside0LastX128 ?? BigInt(0),
      feeGrowthInside1LastX128: position?.feeGrowthInside1LastX128 ?? BigInt(0),
    };
  }

  getTickInfo(id: PoolId, tick: number): TickInfo {
    const info = this.lookup(id)?.ticks.get(tick);
    return info ? { ...info } : emptyTickInfo();
  }

  getTicks(id: PoolId): NumberedTickInfo[] {
    return this.lookup(id)?.getTicks() ?? [];
  }

  getTickBitmap(id: PoolId, wordPos: number): bigint {
    return this.lookup(id)?.tickBitmap.getWord(wordPos) ?? BigInt(0);
  }

  getFeeGrowthGlobals(id: PoolId): FeeGrowthGlobals {
    const pool = this.lookup(id);
    return {
      feeGrowthGlobal0X128: pool?.feeGrowthGlobal0X128 ?? BigInt(0),
      feeGrowthGlobal1X128: pool?.feeGrowthGlobal1X128 ?? BigInt(0),
    };
  }

  getFeeGrowthInside(
    id: PoolId,
    tickLower: number,
    tickUpper: number
  ): FeeGrowthInside {
    const pool = this.lookup(id);
    if (!pool) {
      return { feeGrowthInside0X128: BigInt(0), feeGrowthInside1X128: BigInt(0) };
    }
    return pool.getFeeGrowthInside(tickLower, tickUpper);
  }

  protocolFeesAccrued(currency: Address): bigint {
    return this.accrued(currency);
  }
}
