import {
  MaxInt128,
  MaxUint160,
  MaxUint256,
  MinInt128,
} from '../constants';
import { SafeCastOverflow } from '../errors';

export function toInt128(value: bigint): bigint {
  if (value > MaxInt128 || value < MinInt128) {
    throw new SafeCastOverflow(value, 'int128');
  }
  return value;
}

export function toUint160(value: bigint): bigint {
  if (value < BigInt(0) || value > MaxUint160) {
    throw new SafeCastOverflow(value, 'uint160');
  }
  return value;
}

/**
 * Token amounts held by claims and custody.
 */
export function toUint256(value: bigint): bigint {
  if (value < BigInt(0) || value > MaxUint256) {
    throw new SafeCastOverflow(value, 'uint256');
  }
  return value;
}

/**
 * Reads an unsigned amount as a signed 128-bit delta.
 */
export function uintToInt128(value: bigint): bigint {
  return toInt128(toUint256(value));
}
