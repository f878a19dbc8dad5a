import { Address } from '@ton/core';

/**
 * Identifies a pool. Two structurally equal keys address the same pool.
 */
export interface PoolKey {
  /** The lower asset of the pair, by address order. */
  readonly currency0: Address;
  readonly currency1: Address;
  /** Static LP fee in hundredths of a bip, or DYNAMIC_FEE_FLAG. */
  readonly fee: number;
  readonly tickSpacing: number;
  /** Extension attached to the pool, null when there is none. */
  readonly hooks: Address | null;
}

/** Hex digest of a PoolKey. */
export type PoolId = string;

export interface SwapParams {
  zeroForOne: boolean;
  /** Negative for exact input, positive for exact output. */
  amountSpecified: bigint;
  sqrtPriceLimitX96: bigint;
}

export interface ModifyLiquidityParams {
  tickLower: number;
  tickUpper: number;
  liquidityDelta: bigint;
  salt?: bigint;
}
