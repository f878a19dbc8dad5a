import { describe, expect, it } from 'vitest';
import { TickMisaligned } from '../errors';
import { compress, TickBitmap } from './tickBitmap';

describe('TickBitmap', () => {
  it('should compress toward negative infinity', () => {
    expect(compress(-1, 60)).toBe(-1);
    expect(compress(59, 60)).toBe(0);
    expect(compress(-60, 60)).toBe(-1);
    expect(compress(-61, 60)).toBe(-2);
  });

  it('should flip ticks on and off', () => {
    const bitmap = new TickBitmap();
    bitmap.flipTick(600, 60);
    expect(bitmap.isInitialized(600, 60)).toBe(true);
    expect(bitmap.getWord(0)).toBe(1n << 10n);

    bitmap.flipTick(600, 60);
    expect(bitmap.isInitialized(600, 60)).toBe(false);
    expect(bitmap.getWord(0)).toBe(0n);
  });

  it('should store negative ticks in negative words', () => {
    const bitmap = new TickBitmap();
    bitmap.flipTick(-600, 60);
    expect(bitmap.getWord(-1)).toBe(1n << 246n);
  });

  it('should reject ticks off the spacing', () => {
    expect(() => new TickBitmap().flipTick(61, 60)).toThrow(TickMisaligned);
  });

  it('should find the next initialized tick at or below', () => {
    const bitmap = new TickBitmap();
    bitmap.flipTick(-600, 60);
    bitmap.flipTick(600, 60);

    expect(bitmap.nextInitializedTickWithinOneWord(-1, 60, true)).toEqual({
      tickNext: -600,
      initialized: true,
    });
    expect(bitmap.nextInitializedTickWithinOneWord(600, 60, true)).toEqual({
      tickNext: 600,
      initialized: true,
    });
    // nothing initialized at or below 0 within word 0
    expect(bitmap.nextInitializedTickWithinOneWord(0, 60, true)).toEqual({
      tickNext: 0,
      initialized: false,
    });
  });

  it('should find the next initialized tick strictly above', () => {
    const bitmap = new TickBitmap();
    bitmap.flipTick(600, 60);

    expect(bitmap.nextInitializedTickWithinOneWord(-21, 60, false)).toEqual({
      tickNext: 600,
      initialized: true,
    });
    expect(bitmap.nextInitializedTickWithinOneWord(600, 60, false)).toEqual({
      tickNext: 255 * 60,
      initialized: false,
    });
  });

  it('should copy words on clone', () => {
    const bitmap = new TickBitmap();
    const copy = bitmap.clone();
    copy.flipTick(60, 60);
    expect(bitmap.isInitialized(60, 60)).toBe(false);
    expect(copy.isInitialized(60, 60)).toBe(true);
  });
});
