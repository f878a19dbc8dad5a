import { Address } from '@ton/core';
import {
  ALL_HOOK_MASK,
  HookCallback,
  HookFlag,
  HookPermissions,
} from '../types/hooks';

/** Permission name and its flag bit. */
export const HOOK_PERMISSION_FLAGS: ReadonlyArray<[keyof HookPermissions, HookFlag]> = [
  ['beforeInitialize', HookFlag.BEFORE_INITIALIZE],
  ['afterInitialize', HookFlag.AFTER_INITIALIZE],
  ['beforeAddLiquidity', HookFlag.BEFORE_ADD_LIQUIDITY],
  ['afterAddLiquidity', HookFlag.AFTER_ADD_LIQUIDITY],
  ['beforeRemoveLiquidity', HookFlag.BEFORE_REMOVE_LIQUIDITY],
  ['afterRemoveLiquidity', HookFlag.AFTER_REMOVE_LIQUIDITY],
  ['beforeSwap', HookFlag.BEFORE_SWAP],
  ['afterSwap', HookFlag.AFTER_SWAP],
  ['beforeDonate', HookFlag.BEFORE_DONATE],
  ['afterDonate', HookFlag.AFTER_DONATE],
  ['beforeSwapReturnDelta', HookFlag.BEFORE_SWAP_RETURNS_DELTA],
  ['afterSwapReturnDelta', HookFlag.AFTER_SWAP_RETURNS_DELTA],
  ['afterAddLiquidityReturnDelta', HookFlag.AFTER_ADD_LIQUIDITY_RETURNS_DELTA],
  ['afterRemoveLiquidityReturnDelta', HookFlag.AFTER_REMOVE_LIQUIDITY_RETURNS_DELTA],
];

/** Flags that invoke a callback, with the callback they invoke. */
export const CALLBACK_FLAGS: ReadonlyArray<[HookFlag, HookCallback]> = [
  [HookFlag.BEFORE_INITIALIZE, 'beforeInitialize'],
  [HookFlag.AFTER_INITIALIZE, 'afterInitialize'],
  [HookFlag.BEFORE_ADD_LIQUIDITY, 'beforeAddLiquidity'],
  [HookFlag.AFTER_ADD_LIQUIDITY, 'afterAddLiquidity'],
  [HookFlag.BEFORE_REMOVE_LIQUIDITY, 'beforeRemoveLiquidity'],
  [HookFlag.AFTER_REMOVE_LIQUIDITY, 'afterRemoveLiquidity'],
  [HookFlag.BEFORE_SWAP, 'beforeSwap'],
  [HookFlag.AFTER_SWAP, 'afterSwap'],
  [HookFlag.BEFORE_DONATE, 'beforeDonate'],
  [HookFlag.AFTER_DONATE, 'afterDonate'],
];

/** Returns-delta flags and the flag each one depends on. */
export const RETURNS_DELTA_FLAGS: ReadonlyArray<[HookFlag, HookFlag]> = [
  [HookFlag.BEFORE_SWAP_RETURNS_DELTA, HookFlag.BEFORE_SWAP],
  [HookFlag.AFTER_SWAP_RETURNS_DELTA, HookFlag.AFTER_SWAP],
  [HookFlag.AFTER_ADD_LIQUIDITY_RETURNS_DELTA, HookFlag.AFTER_ADD_LIQUIDITY],
  [HookFlag.AFTER_REMOVE_LIQUIDITY_RETURNS_DELTA, HookFlag.AFTER_REMOVE_LIQUIDITY],
];

/**
 * Flag bits carried by an address: the low 14 bits of its account hash.
 */
export function permissionsFromAddress(address: Address): number {
  const hash = address.hash;
  return ((hash[hash.length - 2] << 8) | hash[hash.length - 1]) & ALL_HOOK_MASK;
}

export function hasPermission(permissions: number, flag: HookFlag): boolean {
  return (permissions & flag) !== 0;
}

export function encodePermissions(permissions: HookPermissions): number {
  let bits = 0;
  for (const [name, flag] of HOOK_PERMISSION_FLAGS) {
    if (permissions[name]) bits |= flag;
  }
  return bits;
}

export function decodePermissions(bits: number): HookPermissions {
  return {
    beforeInitialize: hasPermission(bits, HookFlag.BEFORE_INITIALIZE),
    afterInitialize: hasPermission(bits, HookFlag.AFTER_INITIALIZE),
    beforeAddLiquidity: hasPermission(bits, HookFlag.BEFORE_ADD_LIQUIDITY),
    afterAddLiquidity: hasPermission(bits, HookFlag.AFTER_ADD_LIQUIDITY),
    beforeRemoveLiquidity: hasPermission(bits, HookFlag.BEFORE_REMOVE_LIQUIDITY),
    afterRemoveLiquidity: hasPermission(bits, HookFlag.AFTER_REMOVE_LIQUIDITY),
    beforeSwap: hasPermission(bits, HookFlag.BEFORE_SWAP),
    afterSwap: hasPermission(bits, HookFlag.AFTER_SWAP),
    beforeDonate: hasPermission(bits, HookFlag.BEFORE_DONATE),
    afterDonate: hasPermission(bits, HookFlag.AFTER_DONATE),
    beforeSwapReturnDelta: hasPermission(bits, HookFlag.BEFORE_SWAP_RETURNS_DELTA),
    afterSwapReturnDelta: hasPermission(bits, HookFlag.AFTER_SWAP_RETURNS_DELTA),
    afterAddLiquidityReturnDelta: hasPermission(
      bits,
      HookFlag.AFTER_ADD_LIQUIDITY_RETURNS_DELTA
    ),
    afterRemoveLiquidityReturnDelta: hasPermission(
      bits,
      HookFlag.AFTER_REMOVE_LIQUIDITY_RETURNS_DELTA
    ),
  };
}
