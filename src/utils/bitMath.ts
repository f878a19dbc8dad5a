import invariant from 'tiny-invariant';
import { MaxUint256 } from '../constants';

const POWERS_OF_2 = [128, 64, 32, 16, 8, 4, 2, 1].map(
  (pow: number): [number, bigint] => [pow, BigInt(2) ** BigInt(pow)]
);

export function mostSignificantBit(x: bigint): number {
  invariant(x > BigInt(0), 'ZERO');
  invariant(x <= MaxUint256, 'MAX');

  let msb = 0;
  for (const [power, min] of POWERS_OF_2) {
    if (x >= min) {
      x = x >> BigInt(power);
      msb += power;
    }
  }
  return msb;
}

export function leastSignificantBit(x: bigint): number {
  invariant(x > BigInt(0), 'ZERO');
  invariant(x <= MaxUint256, 'MAX');

  // isolate the lowest set bit, then its position is its msb
  return mostSignificantBit(x & -x);
}
