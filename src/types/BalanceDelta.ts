import { toInt128 } from '../utils/safeCast';

const SHIFT_128 = BigInt(128);

function pack(amount0: bigint, amount1: bigint): bigint {
  return BigInt.asUintN(
    256,
    (toInt128(amount0) << SHIFT_128) | BigInt.asUintN(128, toInt128(amount1))
  );
}

/**
 * Two signed 128-bit amounts packed in one 256-bit word: amount0 in the upper
 * half, amount1 in the lower half. A positive amount is owed to the holder of
 * the delta, a negative amount is owed by it.
 */
export class BalanceDelta {
  static readonly ZERO = new BalanceDelta(BigInt(0));

  private constructor(private readonly word: bigint) {}

  static of(amount0: bigint, amount1: bigint): BalanceDelta {
    return new BalanceDelta(pack(amount0, amount1));
  }

  /**
   * Reads a packed word. Accepts the signed or unsigned view of it.
   */
  static fromPacked(word: bigint): BalanceDelta {
    return new BalanceDelta(BigInt.asUintN(256, word));
  }

  amount0(): bigint {
    return BigInt.asIntN(128, this.word >> SHIFT_128);
  }

  amount1(): bigint {
    return BigInt.asIntN(128, this.word);
  }

  /** The word as a signed 256-bit integer. */
  toPacked(): bigint {
    return BigInt.asIntN(256, this.word);
  }

  add(other: BalanceDelta): BalanceDelta {
    return BalanceDelta.of(
      this.amount0() + other.amount0(),
      this.amount1() + other.amount1()
    );
  }

  sub(other: BalanceDelta): BalanceDelta {
    return BalanceDelta.of(
      this.amount0() - other.amount0(),
      this.amount1() - other.amount1()
    );
  }

  equals(other: BalanceDelta): boolean {
    return this.word === other.word;
  }

  isZero(): boolean {
    return this.word === BigInt(0);
  }

  toString(): string {
    return `BalanceDelta(${this.amount0()}, ${this.amount1()})`;
  }
}
