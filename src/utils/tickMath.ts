import {
  MAX_SQRT_PRICE,
  MAX_TICK,
  MaxUint256,
  MIN_SQRT_PRICE,
  MIN_TICK,
} from '../constants';
import { InvalidSqrtPrice, InvalidTick } from '../errors';
import { mostSignificantBit } from './bitMath';

const Q32 = BigInt(2) ** BigInt(32);

function mulShift(val: bigint, mulBy: string): bigint {
  return (val * BigInt(mulBy)) >> BigInt(128);
}

export abstract class TickMath {
  /**
   * Cannot be constructed.
   */
  private constructor() {}

  public static MIN_TICK: number = MIN_TICK;

  public static MAX_TICK: number = MAX_TICK;

  public static MIN_SQRT_PRICE: bigint = MIN_SQRT_PRICE;

  public static MAX_SQRT_PRICE: bigint = MAX_SQRT_PRICE;

  /**
   * Lowest tick usable with the given spacing.
   */
  public static minUsableTick(tickSpacing: number): number {
    return Math.trunc(MIN_TICK / tickSpacing) * tickSpacing;
  }

  public static maxUsableTick(tickSpacing: number): number {
    return Math.trunc(MAX_TICK / tickSpacing) * tickSpacing;
  }

  /**
   * Returns the sqrt price as a Q64.96 for the given tick, sqrt(1.0001)^tick
   * @param tick the tick for which to compute the sqrt price
   */
  public static getSqrtPriceAtTick(tick: number): bigint {
    if (!Number.isInteger(tick) || tick < MIN_TICK || tick > MAX_TICK) {
      throw new InvalidTick(tick);
    }
    const absTick: number = tick < 0 ? tick * -1 : tick;

    let ratio: bigint =
      (absTick & 0x1) != 0
        ? BigInt('0xfffcb933bd6fad37aa2d162d1a594001')
        : BigInt('0x100000000000000000000000000000000');
    if ((absTick & 0x2) != 0) ratio = mulShift(ratio, '0xfff97272373d413259a46990580e213a');
    if ((absTick & 0x4) != 0) ratio = mulShift(ratio, '0xfff2e50f5f656932ef12357cf3c7fdcc');
    if ((absTick & 0x8) != 0) ratio = mulShift(ratio, '0xffe5caca7e10e4e61c3624eaa0941cd0');
    if ((absTick & 0x10) != 0) ratio = mulShift(ratio, '0xffcb9843d60f6159c9db58835c926644');
    if ((absTick & 0x20) != 0) ratio = mulShift(ratio, '0xff973b41fa98c081472e6896dfb254c0');
    if ((absTick & 0x40) != 0) ratio = mulShift(ratio, '0xff2ea16466c96a3843ec78b326b52861');
    if ((absTick & 0x80) != 0) ratio = mulShift(ratio, '0xfe5dee046a99a2a811c461f1969c3053');
    if ((absTick & 0x100) != 0) ratio = mulShift(ratio, '0xfcbe86c7900a88aedcffc83b479aa3a4');
    if ((absTick & 0x200) != 0) ratio = mulShift(ratio, '0xf987a7253ac413176f2b074cf7815e54');
    if ((absTick & 0x400) != 0) ratio = mulShift(ratio, '0xf3392b0822b70005940c7a398e4b70f3');
    if ((absTick & 0x800) != 0) ratio = mulShift(ratio, '0xe7159475a2c29b7443b29c7fa6e889d9');
    if ((absTick & 0x1000) != 0) ratio = mulShift(ratio, '0xd097f3bdfd2022b8845ad8f792aa5825');
    if ((absTick & 0x2000) != 0) ratio = mulShift(ratio, '0xa9f746462d870fdf8a65dc1f90e061e5');
    if ((absTick & 0x4000) != 0) ratio = mulShift(ratio, '0x70d869a156d2a1b890bb3df62baf32f7');
    if ((absTick & 0x8000) != 0) ratio = mulShift(ratio, '0x31be135f97d08fd981231505542fcfa6');
    if ((absTick & 0x10000) != 0) ratio = mulShift(ratio, '0x9aa508b5b7a84e1c677de54f3e99bc9');
    if ((absTick & 0x20000) != 0) ratio = mulShift(ratio, '0x5d6af8dedb81196699c329225ee604');
    if ((absTick & 0x40000) != 0) ratio = mulShift(ratio, '0x2216e584f5fa1ea926041bedfe98');
    if ((absTick & 0x80000) != 0) ratio = mulShift(ratio, '0x48a170391f7dc42444e8fa2');

    if (tick > 0) ratio = MaxUint256 / ratio;

    // back to Q96, rounding up
    return ratio % Q32 > BigInt(0) ? ratio / Q32 + BigInt(1) : ratio / Q32;
  }

  /**
   * Returns the greatest tick whose sqrt price is at or below the given one:
   * getSqrtPriceAtTick(tick) <= sqrtPriceX96 < getSqrtPriceAtTick(tick + 1)
   * @param sqrtPriceX96 the sqrt price as a Q64.96
   */
  public static getTickAtSqrtPrice(sqrtPriceX96: bigint): number {
    if (sqrtPriceX96 < MIN_SQRT_PRICE || sqrtPriceX96 >= MAX_SQRT_PRICE) {
      throw new InvalidSqrtPrice(sqrtPriceX96);
    }

    const sqrtPriceX128 = sqrtPriceX96 << BigInt(32);
    const msb = mostSignificantBit(sqrtPriceX128);

    let r: bigint;
    if (msb >= 128) {
      r = sqrtPriceX128 >> BigInt(msb - 127);
    } else {
      r = sqrtPriceX128 << BigInt(127 - msb);
    }

    let log_2 = BigInt(msb - 128) << BigInt(64);

    for (let i = 0; i < 14; i++) {
      r = (r * r) >> BigInt(127);
      const f = r >> BigInt(128);
      log_2 = log_2 | (f << BigInt(63 - i));
      r = r >> f;
    }

    const log_sqrt10001 = log_2 * BigInt('255738958999603826347141');
    const tickLow = Number(
      (log_sqrt10001 - BigInt('3402992956809132418596140100660247210')) >>
        BigInt(128)
    );
    const tickHigh = Number(
      (log_sqrt10001 + BigInt('291339464771989622907027621153398088495')) >>
        BigInt(128)
    );

    return tickLow === tickHigh
      ? tickLow
      : TickMath.getSqrtPriceAtTick(tickHigh) <= sqrtPriceX96
      ? tickHigh
      : tickLow;
  }
}
