import { Address, beginCell, Cell } from '@ton/core';
import { PoolId, PoolKey } from '../types/PoolKey';

export function packPoolKey(key: PoolKey): Cell {
  return beginCell()
    .storeAddress(key.currency0)
    .storeAddress(key.currency1)
    .storeUint(key.fee, 24)
    .storeInt(key.tickSpacing, 24)
    .storeAddress(key.hooks)
    .endCell();
}

/**
 * Pool id: the hash of the cell holding every field of the key.
 */
export function computePoolId(key: PoolKey): PoolId {
  return packPoolKey(key).hash().toString('hex');
}

/**
 * Position key: the hash of (owner, tickLower, tickUpper, salt).
 */
export function computePositionKey(
  owner: Address,
  tickLower: number,
  tickUpper: number,
  salt: bigint = BigInt(0)
): string {
  return beginCell()
    .storeAddress(owner)
    .storeInt(tickLower, 24)
    .storeInt(tickUpper, 24)
    .storeUint(salt, 256)
    .endCell()
    .hash()
    .toString('hex');
}

/**
 * Total order over assets: by account hash, then by workchain.
 * Negative when `a` sorts first.
 */
export function compareCurrencies(a: Address, b: Address): number {
  return Buffer.compare(a.hash, b.hash) || a.workChain - b.workChain;
}

export function sortsBefore(currencyA: Address, currencyB: Address): boolean {
  return compareCurrencies(currencyA, currencyB) < 0;
}

/**
 * Builds a key with the two assets in pool order.
 */
export function createPoolKey(
  currencyA: Address,
  currencyB: Address,
  fee: number,
  tickSpacing: number,
  hooks: Address | null = null
): PoolKey {
  const [currency0, currency1] = sortsBefore(currencyA, currencyB)
    ? [currencyA, currencyB]
    : [currencyB, currencyA];
  return { currency0, currency1, fee, tickSpacing, hooks };
}

/** Map key for an asset or actor identity. */
export function addressKey(address: Address): string {
  return address.toRawString();
}
