import { Address, Cell } from '@ton/core';
import { BalanceDelta } from './BalanceDelta';
import { BeforeSwapDelta } from './BeforeSwapDelta';
import type { ManagerContext } from './ManagerContext';
import { ModifyLiquidityParams, PoolKey, SwapParams } from './PoolKey';

/**
 * Hook permission bits. An extension's address carries its flags in the low
 * 14 bits of its account hash.
 */
export enum HookFlag {
  BEFORE_INITIALIZE = 1 << 13,
  AFTER_INITIALIZE = 1 << 12,
  BEFORE_ADD_LIQUIDITY = 1 << 11,
  AFTER_ADD_LIQUIDITY = 1 << 10,
  BEFORE_REMOVE_LIQUIDITY = 1 << 9,
  AFTER_REMOVE_LIQUIDITY = 1 << 8,
  BEFORE_SWAP = 1 << 7,
  AFTER_SWAP = 1 << 6,
  BEFORE_DONATE = 1 << 5,
  AFTER_DONATE = 1 << 4,
  BEFORE_SWAP_RETURNS_DELTA = 1 << 3,
  AFTER_SWAP_RETURNS_DELTA = 1 << 2,
  AFTER_ADD_LIQUIDITY_RETURNS_DELTA = 1 << 1,
  AFTER_REMOVE_LIQUIDITY_RETURNS_DELTA = 1 << 0,
}

export const ALL_HOOK_MASK = (1 << 14) - 1;

export type HookPermissions = {
  beforeInitialize: boolean;
  afterInitialize: boolean;
  beforeAddLiquidity: boolean;
  afterAddLiquidity: boolean;
  beforeRemoveLiquidity: boolean;
  afterRemoveLiquidity: boolean;
  beforeSwap: boolean;
  afterSwap: boolean;
  beforeDonate: boolean;
  afterDonate: boolean;
  beforeSwapReturnDelta: boolean;
  afterSwapReturnDelta: boolean;
  afterAddLiquidityReturnDelta: boolean;
  afterRemoveLiquidityReturnDelta: boolean;
};

/**
 * Acknowledgement tag every callback returns. It must name the callback that
 * was invoked.
 */
export enum HookSelector {
  beforeInitialize = 'beforeInitialize',
  afterInitialize = 'afterInitialize',
  beforeAddLiquidity = 'beforeAddLiquidity',
  afterAddLiquidity = 'afterAddLiquidity',
  beforeRemoveLiquidity = 'beforeRemoveLiquidity',
  afterRemoveLiquidity = 'afterRemoveLiquidity',
  beforeSwap = 'beforeSwap',
  afterSwap = 'afterSwap',
  beforeDonate = 'beforeDonate',
  afterDonate = 'afterDonate',
}

export interface HookAck {
  selector: HookSelector;
}

export interface BeforeSwapResult extends HookAck {
  /** Read only with BEFORE_SWAP_RETURNS_DELTA. */
  delta?: BeforeSwapDelta;
  /** Read only on dynamic-fee pools, and only with OVERRIDE_FEE_FLAG set. */
  lpFeeOverride?: number;
}

export interface AfterSwapResult extends HookAck {
  /** Read only with AFTER_SWAP_RETURNS_DELTA. */
  unspecifiedDelta?: bigint;
}

export interface AfterModifyLiquidityResult extends HookAck {
  /** Read only with the matching after-liquidity returns-delta flag. */
  delta?: BalanceDelta;
}

/**
 * An extension. Implements the callbacks its permissions name; every
 * callback receives a manager handle bound to the hook itself, so it can
 * trade or settle its own ledger entries.
 */
export interface Hook {
  readonly address: Address;

  getHookPermissions(): HookPermissions;

  beforeInitialize?(
    manager: ManagerContext,
    sender: Address,
    key: PoolKey,
    sqrtPriceX96: bigint
  ): HookAck;

  afterInitialize?(
    manager: ManagerContext,
    sender: Address,
    key: PoolKey,
    sqrtPriceX96: bigint,
    tick: number
  ): HookAck;

  beforeAddLiquidity?(
    manager: ManagerContext,
    sender: Address,
    key: PoolKey,
    params: ModifyLiquidityParams,
    hookData: Cell
  ): HookAck;

  afterAddLiquidity?(
    manager: ManagerContext,
    sender: Address,
    key: PoolKey,
    params: ModifyLiquidityParams,
    delta: BalanceDelta,
    feesAccrued: BalanceDelta,
    hookData: Cell
  ): AfterModifyLiquidityResult;

  beforeRemoveLiquidity?(
    manager: ManagerContext,
    sender: Address,
    key: PoolKey,
    params: ModifyLiquidityParams,
    hookData: Cell
  ): HookAck;

  afterRemoveLiquidity?(
    manager: ManagerContext,
    sender: Address,
    key: PoolKey,
    params: ModifyLiquidityParams,
    delta: BalanceDelta,
    feesAccrued: BalanceDelta,
    hookData: Cell
  ): AfterModifyLiquidityResult;

  beforeSwap?(
    manager: ManagerContext,
    sender: Address,
    key: PoolKey,
    params: SwapParams,
    hookData: Cell
  ): BeforeSwapResult;

  afterSwap?(
    manager: ManagerContext,
    sender: Address,
    key: PoolKey,
    params: SwapParams,
    delta: BalanceDelta,
    hookData: Cell
  ): AfterSwapResult;

  beforeDonate?(
    manager: ManagerContext,
    sender: Address,
    key: PoolKey,
    amount0: bigint,
    amount1: bigint,
    hookData: Cell
  ): HookAck;

  afterDonate?(
    manager: ManagerContext,
    sender: Address,
    key: PoolKey,
    amount0: bigint,
    amount1: bigint,
    hookData: Cell
  ): HookAck;
}

/** Callback names, in flag order. */
export type HookCallback = `${HookSelector}`;
