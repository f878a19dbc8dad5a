import { SwapSimulator } from '../classes/SwapSimulator';
import type { PoolManager } from '../classes/PoolManager';
import { PoolKey } from '../types/PoolKey';

/**
 * Output of an exact-input swap on the committed state of a pool.
 */
export function getSwapEstimate(
  manager: PoolManager,
  key: PoolKey,
  amountIn: bigint,
  zeroForOne: boolean
): bigint {
  return SwapSimulator.fromManager(manager, key).swapExactIn(zeroForOne, amountIn);
}
