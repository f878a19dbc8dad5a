import { PIPS_DENOMINATOR } from '../constants';
import { FullMath } from './fullMath';
import { SqrtPriceMath } from './sqrtPriceMath';

export interface SwapStepResult {
  sqrtPriceNextX96: bigint;
  amountIn: bigint;
  amountOut: bigint;
  feeAmount: bigint;
}

export abstract class SwapMath {
  static MAX_SWAP_FEE: bigint = BigInt(PIPS_DENOMINATOR);

  /**
   * Cannot be constructed.
   */
  private constructor() {}

  /**
   * The price a step may move to: the next tick's price, bounded by the
   * caller's limit.
   */
  public static getSqrtPriceTarget(
    zeroForOne: boolean,
    sqrtPriceNextX96: bigint,
    sqrtPriceLimitX96: bigint
  ): bigint {
    if (zeroForOne) {
      return sqrtPriceNextX96 < sqrtPriceLimitX96
        ? sqrtPriceLimitX96
        : sqrtPriceNextX96;
    }
    return sqrtPriceNextX96 > sqrtPriceLimitX96
      ? sqrtPriceLimitX96
      : sqrtPriceNextX96;
  }

  /**
   * Computes one step of a swap between the current price and a target.
   * @param amountRemaining negative for exact input, positive for exact output
   * @param feePips fee in hundredths of a bip, applied to the input
   */
  public static computeSwapStep(
    sqrtPriceCurrentX96: bigint,
    sqrtPriceTargetX96: bigint,
    liquidity: bigint,
    amountRemaining: bigint,
    feePips: bigint
  ): SwapStepResult {
    let sqrtPriceNextX96: bigint;
    let amountIn: bigint;
    let amountOut: bigint;
    let feeAmount: bigint;

    const zeroForOne = sqrtPriceCurrentX96 >= sqrtPriceTargetX96;
    const exactIn = amountRemaining < BigInt(0);

    if (exactIn) {
      const amountRemainingLessFee = FullMath.mulDiv(
        -amountRemaining,
        SwapMath.MAX_SWAP_FEE - feePips,
        SwapMath.MAX_SWAP_FEE
      );

      amountIn = zeroForOne
        ? SqrtPriceMath.getAmount0Delta(
            sqrtPriceTargetX96,
            sqrtPriceCurrentX96,
            liquidity,
            true
          )
        : SqrtPriceMath.getAmount1Delta(
            sqrtPriceCurrentX96,
            sqrtPriceTargetX96,
            liquidity,
            true
          );

      if (amountRemainingLessFee >= amountIn) {
        sqrtPriceNextX96 = sqrtPriceTargetX96;
        feeAmount =
          feePips === SwapMath.MAX_SWAP_FEE
            ? amountIn
            : FullMath.mulDivRoundingUp(
                amountIn,
                feePips,
                SwapMath.MAX_SWAP_FEE - feePips
              );
      } else {
        amountIn = amountRemainingLessFee;
        sqrtPriceNextX96 = SqrtPriceMath.getNextSqrtPriceFromInput(
          sqrtPriceCurrentX96,
          liquidity,
          amountRemainingLessFee,
          zeroForOne
        );
        // we didn't reach the target, so take the remainder of the maximum input as fee
        feeAmount = -amountRemaining - amountIn;
      }

      amountOut = zeroForOne
        ? SqrtPriceMath.getAmount1Delta(
            sqrtPriceNextX96,
            sqrtPriceCurrentX96,
            liquidity,
            false
          )
        : SqrtPriceMath.getAmount0Delta(
            sqrtPriceCurrentX96,
            sqrtPriceNextX96,
            liquidity,
            false
          );
    } else {
      amountOut = zeroForOne
        ? SqrtPriceMath.getAmount1Delta(
            sqrtPriceTargetX96,
            sqrtPriceCurrentX96,
            liquidity,
            false
          )
        : SqrtPriceMath.getAmount0Delta(
            sqrtPriceCurrentX96,
            sqrtPriceTargetX96,
            liquidity,
            false
          );

      if (amountRemaining >= amountOut) {
        sqrtPriceNextX96 = sqrtPriceTargetX96;
      } else {
        amountOut = amountRemaining;
        sqrtPriceNextX96 = SqrtPriceMath.getNextSqrtPriceFromOutput(
          sqrtPriceCurrentX96,
          liquidity,
          amountOut,
          zeroForOne
        );
      }

      amountIn = zeroForOne
        ? SqrtPriceMath.getAmount0Delta(
            sqrtPriceNextX96,
            sqrtPriceCurrentX96,
            liquidity,
            true
          )
        : SqrtPriceMath.getAmount1Delta(
            sqrtPriceCurrentX96,
            sqrtPriceNextX96,
            liquidity,
            true
          );
      feeAmount = FullMath.mulDivRoundingUp(
        amountIn,
        feePips,
        SwapMath.MAX_SWAP_FEE - feePips
      );
    }

    return { sqrtPriceNextX96, amountIn, amountOut, feeAmount };
  }
}
