import { MaxUint160 } from '../constants';
import { SafeCastOverflow } from '../errors';

const TICK_OFFSET = BigInt(160);
const PROTOCOL_FEE_OFFSET = BigInt(184);
const LP_FEE_OFFSET = BigInt(208);

const MASK_24 = BigInt(0xffffff);
const UINT24_MAX = 0xffffff;
const INT24_MIN = -(2 ** 23);
const INT24_MAX = 2 ** 23 - 1;

function checkUint24(value: number, type: string): bigint {
  if (!Number.isInteger(value) || value < 0 || value > UINT24_MAX) {
    throw new SafeCastOverflow(BigInt(Math.trunc(value)), type);
  }
  return BigInt(value);
}

/**
 * Top of book packed in one word.
 *
 * | bits    | field        |
 * |---------|--------------|
 * | 0-159   | sqrtPriceX96 |
 * | 160-183 | tick (int24) |
 * | 184-207 | protocolFee  |
 * | 208-231 | lpFee        |
 */
export class Slot0 {
  static readonly EMPTY = new Slot0(BigInt(0));

  private constructor(private readonly word: bigint) {}

  static of(
    sqrtPriceX96: bigint,
    tick: number,
    protocolFee: number,
    lpFee: number
  ): Slot0 {
    return Slot0.EMPTY.withSqrtPriceX96(sqrtPriceX96)
      .withTick(tick)
      .withProtocolFee(protocolFee)
      .withLpFee(lpFee);
  }

  static fromPacked(word: bigint): Slot0 {
    return new Slot0(BigInt.asUintN(256, word));
  }

  sqrtPriceX96(): bigint {
    return this.word & MaxUint160;
  }

  tick(): number {
    return Number(BigInt.asIntN(24, this.word >> TICK_OFFSET));
  }

  protocolFee(): number {
    return Number((this.word >> PROTOCOL_FEE_OFFSET) & MASK_24);
  }

  lpFee(): number {
    return Number((this.word >> LP_FEE_OFFSET) & MASK_24);
  }

  withSqrtPriceX96(sqrtPriceX96: bigint): Slot0 {
    if (sqrtPriceX96 < BigInt(0) || sqrtPriceX96 > MaxUint160) {
      throw new SafeCastOverflow(sqrtPriceX96, 'uint160');
    }
    return new Slot0((this.word & ~MaxUint160) | sqrtPriceX96);
  }

  withTick(tick: number): Slot0 {
    if (!Number.isInteger(tick) || tick < INT24_MIN || tick > INT24_MAX) {
      throw new SafeCastOverflow(BigInt(Math.trunc(tick)), 'int24');
    }
    const field = BigInt.asUintN(24, BigInt(tick)) << TICK_OFFSET;
    return new Slot0((this.word & ~(MASK_24 << TICK_OFFSET)) | field);
  }

  withProtocolFee(protocolFee: number): Slot0 {
    const field = checkUint24(protocolFee, 'uint24') << PROTOCOL_FEE_OFFSET;
    return new Slot0((this.word & ~(MASK_24 << PROTOCOL_FEE_OFFSET)) | field);
  }

  withLpFee(lpFee: number): Slot0 {
    const field = checkUint24(lpFee, 'uint24') << LP_FEE_OFFSET;
    return new Slot0((this.word & ~(MASK_24 << LP_FEE_OFFSET)) | field);
  }

  toPacked(): bigint {
    return this.word;
  }

  equals(other: Slot0): boolean {
    return this.word === other.word;
  }
}
