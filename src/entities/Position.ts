import { Q128 } from '../constants';
import { CannotUpdateEmptyPosition } from '../errors';
import { PositionInfo } from '../types/PositionInfo';
import { FullMath, subIn256 } from '../utils/fullMath';
import { LiquidityMath } from '../utils/liquidityMath';

export interface FeesOwed {
  feesOwed0: bigint;
  feesOwed1: bigint;
}

/**
 * Liquidity owned by (owner, tickLower, tickUpper, salt) and the fee growth
 * inside its range when it was last touched.
 */
export class Position implements PositionInfo {
  constructor(
    public liquidity: bigint = BigInt(0),
    public feeGrowthInside0LastX128: bigint = BigInt(0),
    public feeGrowthInside1LastX128: bigint = BigInt(0)
  ) {}

  clone(): Position {
    return new Position(
      this.liquidity,
      this.feeGrowthInside0LastX128,
      this.feeGrowthInside1LastX128
    );
  }

  /**
   * Credits the fees earned since the last update and applies the liquidity
   * change. Fees are computed on the liquidity held before the change.
   */
  update(
    liquidityDelta: bigint,
    feeGrowthInside0X128: bigint,
    feeGrowthInside1X128: bigint
  ): FeesOwed {
    const liquidity = this.liquidity;

    if (liquidityDelta === BigInt(0)) {
      // disallow pokes for 0 liquidity positions
      if (liquidity === BigInt(0)) throw new CannotUpdateEmptyPosition();
    } else {
      this.liquidity = LiquidityMath.addDelta(liquidity, liquidityDelta);
    }

    const feesOwed0 = FullMath.mulDiv(
      subIn256(feeGrowthInside0X128, this.feeGrowthInside0LastX128),
      liquidity,
      Q128
    );
    const feesOwed1 = FullMath.mulDiv(
      subIn256(feeGrowthInside1X128, this.feeGrowthInside1LastX128),
      liquidity,
      Q128
    );

    this.feeGrowthInside0LastX128 = feeGrowthInside0X128;
    this.feeGrowthInside1LastX128 = feeGrowthInside1X128;

    return { feesOwed0, feesOwed1 };
  }
}
