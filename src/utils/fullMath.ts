import { MaxUint256 } from '../constants';
import { MulDivOverflow } from '../errors';

export abstract class FullMath {
  /**
   * Cannot be constructed.
   */
  private constructor() {}

  /**
   * floor(a * b / denominator), failing when the result does not fit in 256 bits.
   */
  public static mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
    if (denominator === BigInt(0)) {
      throw new MulDivOverflow(a, b, denominator);
    }
    const result = (a * b) / denominator;
    if (result > MaxUint256) {
      throw new MulDivOverflow(a, b, denominator);
    }
    return result;
  }

  public static mulDivRoundingUp(
    a: bigint,
    b: bigint,
    denominator: bigint
  ): bigint {
    const product = a * b;
    let result = FullMath.mulDiv(a, b, denominator);
    if (product % denominator !== BigInt(0)) {
      result += BigInt(1);
      if (result > MaxUint256) {
        throw new MulDivOverflow(a, b, denominator);
      }
    }
    return result;
  }

  public static divRoundingUp(x: bigint, y: bigint): bigint {
    return x / y + (x % y > BigInt(0) ? BigInt(1) : BigInt(0));
  }
}

/** Subtraction modulo 2^256, the way fee-growth accumulators wrap. */
export function subIn256(x: bigint, y: bigint): bigint {
  return BigInt.asUintN(256, x - y);
}

export function addIn256(x: bigint, y: bigint): bigint {
  return BigInt.asUintN(256, x + y);
}
