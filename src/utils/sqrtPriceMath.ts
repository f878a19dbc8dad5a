import { MaxUint160, MaxUint256, Q96 } from '../constants';
import {
  InvalidPriceOrLiquidity,
  NotEnoughLiquidity,
  PriceOverflow,
} from '../errors';
import { FullMath } from './fullMath';
import { toUint160 } from './safeCast';

function multiplyIn256(x: bigint, y: bigint): bigint {
  return (x * y) & MaxUint256;
}

function addIn256(x: bigint, y: bigint): bigint {
  return (x + y) & MaxUint256;
}

export abstract class SqrtPriceMath {
  /**
   * Cannot be constructed.
   */
  private constructor() {}

  /**
   * Amount of currency0 between two prices for the given liquidity.
   * Unsigned, rounded up or down.
   */
  public static getAmount0Delta(
    sqrtPriceAX96: bigint,
    sqrtPriceBX96: bigint,
    liquidity: bigint,
    roundUp: boolean
  ): bigint {
    if (sqrtPriceAX96 > sqrtPriceBX96) {
      [sqrtPriceAX96, sqrtPriceBX96] = [sqrtPriceBX96, sqrtPriceAX96];
    }
    if (sqrtPriceAX96 <= BigInt(0)) {
      throw new InvalidPriceOrLiquidity();
    }

    const numerator1 = liquidity << BigInt(96);
    const numerator2 = sqrtPriceBX96 - sqrtPriceAX96;

    return roundUp
      ? FullMath.divRoundingUp(
          FullMath.mulDivRoundingUp(numerator1, numerator2, sqrtPriceBX96),
          sqrtPriceAX96
        )
      : FullMath.mulDiv(numerator1, numerator2, sqrtPriceBX96) / sqrtPriceAX96;
  }

  public static getAmount1Delta(
    sqrtPriceAX96: bigint,
    sqrtPriceBX96: bigint,
    liquidity: bigint,
    roundUp: boolean
  ): bigint {
    if (sqrtPriceAX96 > sqrtPriceBX96) {
      [sqrtPriceAX96, sqrtPriceBX96] = [sqrtPriceBX96, sqrtPriceAX96];
    }

    return roundUp
      ? FullMath.mulDivRoundingUp(liquidity, sqrtPriceBX96 - sqrtPriceAX96, Q96)
      : FullMath.mulDiv(liquidity, sqrtPriceBX96 - sqrtPriceAX96, Q96);
  }

  /**
   * Signed amount of currency0 for a signed liquidity change. Adding
   * liquidity yields a negative amount (owed by the caller), rounded up in
   * magnitude; removing yields a positive amount rounded down.
   */
  public static getAmount0DeltaSigned(
    sqrtPriceAX96: bigint,
    sqrtPriceBX96: bigint,
    liquidity: bigint
  ): bigint {
    return liquidity < BigInt(0)
      ? SqrtPriceMath.getAmount0Delta(sqrtPriceAX96, sqrtPriceBX96, -liquidity, false)
      : -SqrtPriceMath.getAmount0Delta(sqrtPriceAX96, sqrtPriceBX96, liquidity, true);
  }

  public static getAmount1DeltaSigned(
    sqrtPriceAX96: bigint,
    sqrtPriceBX96: bigint,
    liquidity: bigint
  ): bigint {
    return liquidity < BigInt(0)
      ? SqrtPriceMath.getAmount1Delta(sqrtPriceAX96, sqrtPriceBX96, -liquidity, false)
      : -SqrtPriceMath.getAmount1Delta(sqrtPriceAX96, sqrtPriceBX96, liquidity, true);
  }

  public static getNextSqrtPriceFromInput(
    sqrtPX96: bigint,
    liquidity: bigint,
    amountIn: bigint,
    zeroForOne: boolean
  ): bigint {
    if (sqrtPX96 <= BigInt(0) || liquidity <= BigInt(0)) {
      throw new InvalidPriceOrLiquidity();
    }

    return zeroForOne
      ? SqrtPriceMath.getNextSqrtPriceFromAmount0RoundingUp(
          sqrtPX96,
          liquidity,
          amountIn,
          true
        )
      : SqrtPriceMath.getNextSqrtPriceFromAmount1RoundingDown(
          sqrtPX96,
          liquidity,
          amountIn,
          true
        );
  }

  public static getNextSqrtPriceFromOutput(
    sqrtPX96: bigint,
    liquidity: bigint,
    amountOut: bigint,
    zeroForOne: boolean
  ): bigint {
    if (sqrtPX96 <= BigInt(0) || liquidity <= BigInt(0)) {
      throw new InvalidPriceOrLiquidity();
    }

    return zeroForOne
      ? SqrtPriceMath.getNextSqrtPriceFromAmount1RoundingDown(
          sqrtPX96,
          liquidity,
          amountOut,
          false
        )
      : SqrtPriceMath.getNextSqrtPriceFromAmount0RoundingUp(
          sqrtPX96,
          liquidity,
          amountOut,
          false
        );
  }

  public static getNextSqrtPriceFromAmount0RoundingUp(
    sqrtPX96: bigint,
    liquidity: bigint,
    amount: bigint,
    add: boolean
  ): bigint {
    if (amount === BigInt(0)) {
      return sqrtPX96;
    }

    const numerator1 = liquidity << BigInt(96);

    if (add) {
      const product = multiplyIn256(amount, sqrtPX96);
      if (product / amount === sqrtPX96) {
        const denominator = addIn256(numerator1, product);
        if (denominator >= numerator1) {
          return FullMath.mulDivRoundingUp(numerator1, sqrtPX96, denominator);
        }
      }

      return FullMath.divRoundingUp(numerator1, numerator1 / sqrtPX96 + amount);
    } else {
      const product = multiplyIn256(amount, sqrtPX96);
      if (product / amount !== sqrtPX96 || numerator1 <= product) {
        throw new PriceOverflow();
      }
      const denominator = numerator1 - product;
      return toUint160(
        FullMath.mulDivRoundingUp(numerator1, sqrtPX96, denominator)
      );
    }
  }

  public static getNextSqrtPriceFromAmount1RoundingDown(
    sqrtPX96: bigint,
    liquidity: bigint,
    amount: bigint,
    add: boolean
  ): bigint {
    if (add) {
      const quotient =
        amount <= MaxUint160
          ? (amount << BigInt(96)) / liquidity
          : FullMath.mulDiv(amount, Q96, liquidity);

      return toUint160(sqrtPX96 + quotient);
    } else {
      const quotient =
        amount <= MaxUint160
          ? FullMath.divRoundingUp(amount << BigInt(96), liquidity)
          : FullMath.mulDivRoundingUp(amount, Q96, liquidity);

      if (sqrtPX96 <= quotient) {
        throw new NotEnoughLiquidity();
      }
      return sqrtPX96 - quotient;
    }
  }
}
