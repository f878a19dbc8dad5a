import { MaxUint128 } from '../constants';
import { LiquidityOverflow, LiquidityUnderflow } from '../errors';

export abstract class LiquidityMath {
  /**
   * Cannot be constructed.
   */
  private constructor() {}

  /**
   * Adds a signed liquidity delta to an unsigned liquidity value.
   */
  public static addDelta(x: bigint, y: bigint): bigint {
    const z = x + y;
    if (z < BigInt(0)) {
      throw new LiquidityUnderflow(x, y);
    }
    if (z > MaxUint128) {
      throw new LiquidityOverflow(x, y);
    }
    return z;
  }
}
