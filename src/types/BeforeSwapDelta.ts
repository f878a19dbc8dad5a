import { toInt128 } from '../utils/safeCast';

const SHIFT_128 = BigInt(128);

/**
 * Adjustment returned by a before-swap hook: the specified-currency amount in
 * the upper 128 bits, the unspecified-currency amount in the lower 128 bits.
 */
export class BeforeSwapDelta {
  static readonly ZERO = new BeforeSwapDelta(BigInt(0));

  private constructor(private readonly word: bigint) {}

  static of(deltaSpecified: bigint, deltaUnspecified: bigint): BeforeSwapDelta {
    return new BeforeSwapDelta(
      BigInt.asUintN(
        256,
        (toInt128(deltaSpecified) << SHIFT_128) |
          BigInt.asUintN(128, toInt128(deltaUnspecified))
      )
    );
  }

  static fromPacked(word: bigint): BeforeSwapDelta {
    return new BeforeSwapDelta(BigInt.asUintN(256, word));
  }

  getSpecifiedDelta(): bigint {
    return BigInt.asIntN(128, this.word >> SHIFT_128);
  }

  getUnspecifiedDelta(): bigint {
    return BigInt.asIntN(128, this.word);
  }

  toPacked(): bigint {
    return BigInt.asIntN(256, this.word);
  }

  equals(other: BeforeSwapDelta): boolean {
    return this.word === other.word;
  }

  isZero(): boolean {
    return this.word === BigInt(0);
  }
}
