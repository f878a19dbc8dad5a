import { describe, expect, it } from 'vitest';
import { ALICE, hookAddress, poolKey, TOKEN_0, TOKEN_1 } from '../test/fixtures';
import {
  compareCurrencies,
  computePoolId,
  computePositionKey,
  createPoolKey,
  sortsBefore,
} from './computePoolId';

describe('computePoolId', () => {
  it('should map structurally equal keys to the same id', () => {
    expect(computePoolId(poolKey())).toBe(computePoolId({ ...poolKey() }));
    expect(computePoolId(poolKey())).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should give every field its own id', () => {
    const ids = new Set([
      computePoolId(poolKey(3000, 60)),
      computePoolId(poolKey(500, 60)),
      computePoolId(poolKey(3000, 10)),
      computePoolId(poolKey(3000, 60, hookAddress(0x80))),
      computePoolId({ ...poolKey(), currency1: ALICE }),
    ]);
    expect(ids.size).toBe(5);
  });
});

describe('computePositionKey', () => {
  it('should separate positions by range and salt', () => {
    const base = computePositionKey(ALICE, -60, 60);
    expect(computePositionKey(ALICE, -60, 60, 0n)).toBe(base);
    expect(computePositionKey(ALICE, -60, 60, 1n)).not.toBe(base);
    expect(computePositionKey(ALICE, -120, 60)).not.toBe(base);
  });
});

describe('currency order', () => {
  it('should order by account hash', () => {
    expect(compareCurrencies(TOKEN_0, TOKEN_1)).toBeLessThan(0);
    expect(compareCurrencies(TOKEN_1, TOKEN_0)).toBeGreaterThan(0);
    expect(compareCurrencies(TOKEN_0, TOKEN_0)).toBe(0);
    expect(sortsBefore(TOKEN_0, TOKEN_1)).toBe(true);
  });

  it('should sort the pair when building a key', () => {
    const key = createPoolKey(TOKEN_1, TOKEN_0, 3000, 60);
    expect(key.currency0.equals(TOKEN_0)).toBe(true);
    expect(key.currency1.equals(TOKEN_1)).toBe(true);
    expect(key.hooks).toBeNull();
  });
});
