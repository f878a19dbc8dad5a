import { MAX_SQRT_PRICE, MIN_SQRT_PRICE } from '../constants';
import { PoolNotInitialized } from '../errors';
import { Pool, PoolSwapResult } from '../entities/Pool';
import { computePoolId } from '../functions/computePoolId';
import { PoolKey } from '../types/PoolKey';
import type { PoolManager } from './PoolManager';

/**
 * Quotes swaps against a copy of a pool's committed state. Hooks are not
 * run, so quotes for hooked pools only cover the core swap.
 */
export class SwapSimulator {
  constructor(
    private readonly pool: Pool,
    public readonly tickSpacing: number
  ) {}

  static fromManager(manager: PoolManager, key: PoolKey): SwapSimulator {
    const id = computePoolId(key);
    const pool = manager.getPool(id);
    if (!pool) throw new PoolNotInitialized(id);
    return new SwapSimulator(pool, key.tickSpacing);
  }

  /**
   * Given an input amount of a token, return the computed output amount
   * @param zeroForOne Whether the trade is zero for one
   * @param inputAmount The input amount for which to quote the output amount
   * @param sqrtPriceLimitX96 The Q64.96 sqrt price limit
   */
  public swapExactIn(
    zeroForOne: boolean,
    inputAmount: bigint,
    sqrtPriceLimitX96?: bigint
  ): bigint {
    const { swapDelta } = this.swap(zeroForOne, -inputAmount, sqrtPriceLimitX96);
    return zeroForOne ? swapDelta.amount1() : swapDelta.amount0();
  }

  /**
   * Given a desired output amount of a token, return the computed input amount
   * @param zeroForOne Whether the trade is zero for one
   * @param outputAmount the output amount for which to quote the input amount
   * @param sqrtPriceLimitX96 The Q64.96 sqrt price limit
   */
  public swapExactOut(
    zeroForOne: boolean,
    outputAmount: bigint,
    sqrtPriceLimitX96?: bigint
  ): bigint {
    const { swapDelta } = this.swap(zeroForOne, outputAmount, sqrtPriceLimitX96);
    return -(zeroForOne ? swapDelta.amount0() : swapDelta.amount1());
  }

  /**
   * Runs the swap on a fresh copy of the pool
   * @param amountSpecified negative for exact input, positive for exact output
   * @param sqrtPriceLimitX96 defaults to the furthest price in the swap direction
   */
  public swap(
    zeroForOne: boolean,
    amountSpecified: bigint,
    sqrtPriceLimitX96?: bigint
  ): PoolSwapResult {
    return this.pool.clone().swap({
      tickSpacing: this.tickSpacing,
      zeroForOne,
      amountSpecified,
      sqrtPriceLimitX96:
        sqrtPriceLimitX96 ??
        (zeroForOne ? MIN_SQRT_PRICE + BigInt(1) : MAX_SQRT_PRICE - BigInt(1)),
      lpFeeOverride: 0,
    });
  }
}
