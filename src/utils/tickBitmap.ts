import { MaxUint256 } from '../constants';
import { TickMisaligned } from '../errors';
import { leastSignificantBit, mostSignificantBit } from './bitMath';

export interface NextInitializedTick {
  tickNext: number;
  initialized: boolean;
}

/**
 * Compressed tick index: the tick divided by the spacing, rounded toward
 * negative infinity.
 */
export function compress(tick: number, tickSpacing: number): number {
  return Math.floor(tick / tickSpacing);
}

function position(compressed: number): { wordPos: number; bitPos: number } {
  return { wordPos: compressed >> 8, bitPos: compressed & 0xff };
}

/**
 * Packed map of initialized ticks: one bit per compressed tick, 256 ticks
 * per word.
 */
export class TickBitmap {
  constructor(private readonly words: Map<number, bigint> = new Map()) {}

  clone(): TickBitmap {
    return new TickBitmap(new Map(this.words));
  }

  getWord(wordPos: number): bigint {
    return this.words.get(wordPos) ?? BigInt(0);
  }

  flipTick(tick: number, tickSpacing: number): void {
    if (tick % tickSpacing !== 0) {
      throw new TickMisaligned(tick, tickSpacing);
    }
    const { wordPos, bitPos } = position(tick / tickSpacing);
    const word = this.getWord(wordPos) ^ (BigInt(1) << BigInt(bitPos));
    if (word === BigInt(0)) {
      this.words.delete(wordPos);
    } else {
      this.words.set(wordPos, word);
    }
  }

  isInitialized(tick: number, tickSpacing: number): boolean {
    if (tick % tickSpacing !== 0) return false;
    const { wordPos, bitPos } = position(tick / tickSpacing);
    return ((this.getWord(wordPos) >> BigInt(bitPos)) & BigInt(1)) === BigInt(1);
  }

  /**
   * Next initialized tick in the same word as the current tick: to the left
   * (at or below) when `lte`, otherwise strictly to the right. When none is
   * initialized, returns the word boundary.
   */
  nextInitializedTickWithinOneWord(
    tick: number,
    tickSpacing: number,
    lte: boolean
  ): NextInitializedTick {
    let compressed = compress(tick, tickSpacing);

    if (lte) {
      const { wordPos, bitPos } = position(compressed);
      // all the 1s at or to the right of the current bitPos
      const mask =
        (BigInt(1) << BigInt(bitPos)) - BigInt(1) + (BigInt(1) << BigInt(bitPos));
      const masked = this.getWord(wordPos) & mask;

      const initialized = masked !== BigInt(0);
      const tickNext = initialized
        ? (compressed - (bitPos - mostSignificantBit(masked))) * tickSpacing
        : (compressed - bitPos) * tickSpacing;
      return { tickNext, initialized };
    }

    // start from the word of the next tick, since the current tick state doesn't matter
    compressed += 1;
    const { wordPos, bitPos } = position(compressed);
    // all the 1s at or to the left of the bitPos
    const mask = ~((BigInt(1) << BigInt(bitPos)) - BigInt(1)) & MaxUint256;
    const masked = this.getWord(wordPos) & mask;

    const initialized = masked !== BigInt(0);
    const tickNext = initialized
      ? (compressed + (leastSignificantBit(masked) - bitPos)) * tickSpacing
      : (compressed + (255 - bitPos)) * tickSpacing;
    return { tickNext, initialized };
  }
}
