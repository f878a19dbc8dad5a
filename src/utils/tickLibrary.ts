import { MAX_TICK, MaxUint128, MIN_TICK } from '../constants';
import { TickInfo } from '../types/TickInfo';
import { subIn256 } from './fullMath';

export { subIn256 };

export interface FeeGrowthInside {
  feeGrowthInside0X128: bigint;
  feeGrowthInside1X128: bigint;
}

export abstract class TickLibrary {
  /**
   * Cannot be constructed.
   */
  // eslint-disable-next-line no-useless-constructor, no-empty-function
  private constructor() {}

  /**
   * Fee growth per unit of liquidity accumulated inside [tickLower, tickUpper),
   * derived from the global accumulators and the boundary ticks' outside values.
   * Missing ticks read as zero.
   */
  public static getFeeGrowthInside(
    tickLower: number,
    tickUpper: number,
    tickCurrent: number,
    feeGrowthGlobal0X128: bigint,
    feeGrowthGlobal1X128: bigint,
    ticks: ReadonlyMap<number, TickInfo>
  ): FeeGrowthInside {
    const lowOuterFeeGrowth0 = ticks.get(tickLower)?.feeGrowthOutside0X128 ?? BigInt(0);
    const lowOuterFeeGrowth1 = ticks.get(tickLower)?.feeGrowthOutside1X128 ?? BigInt(0);
    const highOuterFeeGrowth0 = ticks.get(tickUpper)?.feeGrowthOutside0X128 ?? BigInt(0);
    const highOuterFeeGrowth1 = ticks.get(tickUpper)?.feeGrowthOutside1X128 ?? BigInt(0);

    let feeGrowthBelow0X128: bigint;
    let feeGrowthBelow1X128: bigint;

    if (tickCurrent >= tickLower) {
      feeGrowthBelow0X128 = lowOuterFeeGrowth0;
      feeGrowthBelow1X128 = lowOuterFeeGrowth1;
    } else {
      feeGrowthBelow0X128 = subIn256(feeGrowthGlobal0X128, lowOuterFeeGrowth0);
      feeGrowthBelow1X128 = subIn256(feeGrowthGlobal1X128, lowOuterFeeGrowth1);
    }

    let feeGrowthAbove0X128: bigint;
    let feeGrowthAbove1X128: bigint;

    if (tickCurrent < tickUpper) {
      feeGrowthAbove0X128 = highOuterFeeGrowth0;
      feeGrowthAbove1X128 = highOuterFeeGrowth1;
    } else {
      feeGrowthAbove0X128 = subIn256(feeGrowthGlobal0X128, highOuterFeeGrowth0);
      feeGrowthAbove1X128 = subIn256(feeGrowthGlobal1X128, highOuterFeeGrowth1);
    }

    return {
      feeGrowthInside0X128: subIn256(
        subIn256(feeGrowthGlobal0X128, feeGrowthBelow0X128),
        feeGrowthAbove0X128
      ),
      feeGrowthInside1X128: subIn256(
        subIn256(feeGrowthGlobal1X128, feeGrowthBelow1X128),
        feeGrowthAbove1X128
      ),
    };
  }

  /**
   * Maximum gross liquidity a single tick may reference, so that the sum over
   * every usable tick fits in uint128.
   */
  public static tickSpacingToMaxLiquidityPerTick(tickSpacing: number): bigint {
    const minTick = Math.trunc(MIN_TICK / tickSpacing) * tickSpacing;
    const maxTick = Math.trunc(MAX_TICK / tickSpacing) * tickSpacing;
    const numTicks = BigInt((maxTick - minTick) / tickSpacing + 1);
    return MaxUint128 / numTicks;
  }
}
