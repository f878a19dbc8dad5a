import { Address, Cell } from '@ton/core';
import { HookDeltaExceedsSwapAmount, InvalidHookResponse } from '../errors';
import { BalanceDelta } from '../types/BalanceDelta';
import { BeforeSwapDelta } from '../types/BeforeSwapDelta';
import { AfterModifyLiquidityResult, HookFlag, HookSelector } from '../types/hooks';
import { ManagerContext } from '../types/ManagerContext';
import { ModifyLiquidityParams, PoolKey, SwapParams } from '../types/PoolKey';
import { hasPermission } from '../utils/hookPermissions';
import { LPFeeLibrary } from '../utils/lpFeeLibrary';
import { HookRegistration } from './HookRegistry';

/**
 * What the dispatcher needs from the session: who is calling, the pool's
 * hook, and a handle bound to that hook for it to act through.
 */
export interface HookCallContext {
  sender: Address;
  registration: HookRegistration | null;
  contextFor(actor: Address): ManagerContext;
}

export interface BeforeSwapOutcome {
  amountToSwap: bigint;
  beforeSwapDelta: BeforeSwapDelta;
  lpFeeOverride: number;
}

export interface HookedDelta {
  /** What is left for the caller once the hook took its part. */
  callerDelta: BalanceDelta;
  /** Accounted to the hook. */
  hookDelta: BalanceDelta;
}

function selectorOf(response: unknown): unknown {
  if (typeof response === 'object' && response !== null && 'selector' in response) {
    return response.selector;
  }
  return response;
}

/**
 * Dispatches lifecycle callbacks and folds returned deltas. A callback runs
 * only if its flag is set and the caller is not the hook itself.
 */
export abstract class Hooks {
  /**
   * Cannot be constructed.
   */
  private constructor() {}

  private static target(
    ctx: HookCallContext,
    flag: HookFlag
  ): HookRegistration | null {
    const registration = ctx.registration;
    if (!registration) return null;
    if (ctx.sender.equals(registration.address)) return null;
    return hasPermission(registration.permissions, flag) ? registration : null;
  }

  private static checkAck(
    registration: HookRegistration,
    expected: HookSelector,
    response: unknown
  ): void {
    const selector = selectorOf(response);
    if (selector !== expected) {
      throw new InvalidHookResponse(registration.address, expected, selector);
    }
  }

  public static beforeInitialize(
    ctx: HookCallContext,
    key: PoolKey,
    sqrtPriceX96: bigint
  ): void {
    const target = Hooks.target(ctx, HookFlag.BEFORE_INITIALIZE);
    if (!target?.hook.beforeInitialize) return;
    const response = target.hook.beforeInitialize(
      ctx.contextFor(target.address),
      ctx.sender,
      key,
      sqrtPriceX96
    );
    Hooks.checkAck(target, HookSelector.beforeInitialize, response);
  }

  public static afterInitialize(
    ctx: HookCallContext,
    key: PoolKey,
    sqrtPriceX96: bigint,
    tick: number
  ): void {
    const target = Hooks.target(ctx, HookFlag.AFTER_INITIALIZE);
    if (!target?.hook.afterInitialize) return;
    const response = target.hook.afterInitialize(
      ctx.contextFor(target.address),
      ctx.sender,
      key,
      sqrtPriceX96,
      tick
    );
    Hooks.checkAck(target, HookSelector.afterInitialize, response);
  }

  public static beforeModifyLiquidity(
    ctx: HookCallContext,
    key: PoolKey,
    params: ModifyLiquidityParams,
    hookData: Cell
  ): void {
    if (params.liquidityDelta > BigInt(0)) {
      const target = Hooks.target(ctx, HookFlag.BEFORE_ADD_LIQUIDITY);
      if (!target?.hook.beforeAddLiquidity) return;
      const response = target.hook.beforeAddLiquidity(
        ctx.contextFor(target.address),
        ctx.sender,
        key,
        params,
        hookData
      );
      Hooks.checkAck(target, HookSelector.beforeAddLiquidity, response);
    } else {
      const target = Hooks.target(ctx, HookFlag.BEFORE_REMOVE_LIQUIDITY);
      if (!target?.hook.beforeRemoveLiquidity) return;
      const response = target.hook.beforeRemoveLiquidity(
        ctx.contextFor(target.address),
        ctx.sender,
        key,
        params,
        hookData
      );
      Hooks.checkAck(target, HookSelector.beforeRemoveLiquidity, response);
    }
  }

  /**
   * Runs the after-add or after-remove callback. With the matching
   * returns-delta flag, the hook's delta moves from the caller to the hook.
   */
  public static afterModifyLiquidity(
    ctx: HookCallContext,
    key: PoolKey,
    params: ModifyLiquidityParams,
    delta: BalanceDelta,
    feesAccrued: BalanceDelta,
    hookData: Cell
  ): HookedDelta {
    const adding = params.liquidityDelta > BigInt(0);
    const target = Hooks.target(
      ctx,
      adding ? HookFlag.AFTER_ADD_LIQUIDITY : HookFlag.AFTER_REMOVE_LIQUIDITY
    );
    const unchanged = { callerDelta: delta, hookDelta: BalanceDelta.ZERO };
    if (!target) return unchanged;

    const manager = ctx.contextFor(target.address);
    let response: AfterModifyLiquidityResult;
    let returnsDeltaFlag: HookFlag;
    if (adding) {
      if (!target.hook.afterAddLiquidity) return unchanged;
      response = target.hook.afterAddLiquidity(
        manager,
        ctx.sender,
        key,
        params,
        delta,
        feesAccrued,
        hookData
      );
      Hooks.checkAck(target, HookSelector.afterAddLiquidity, response);
      returnsDeltaFlag = HookFlag.AFTER_ADD_LIQUIDITY_RETURNS_DELTA;
    } else {
      if (!target.hook.afterRemoveLiquidity) return unchanged;
      response = target.hook.afterRemoveLiquidity(
        manager,
        ctx.sender,
        key,
        params,
        delta,
        feesAccrued,
        hookData
      );
      Hooks.checkAck(target, HookSelector.afterRemoveLiquidity, response);
      returnsDeltaFlag = HookFlag.AFTER_REMOVE_LIQUIDITY_RETURNS_DELTA;
    }

    if (!hasPermission(target.permissions, returnsDeltaFlag)) return unchanged;
    const hookDelta = response.delta ?? BalanceDelta.ZERO;
    return { callerDelta: delta.sub(hookDelta), hookDelta };
  }

  /**
   * Runs the before-swap callback and applies what it returned: an LP fee
   * override on dynamic-fee pools, and a specified-currency delta that
   * changes the amount left to swap.
   */
  public static beforeSwap(
    ctx: HookCallContext,
    key: PoolKey,
    params: SwapParams,
    hookData: Cell
  ): BeforeSwapOutcome {
    const outcome: BeforeSwapOutcome = {
      amountToSwap: params.amountSpecified,
      beforeSwapDelta: BeforeSwapDelta.ZERO,
      lpFeeOverride: 0,
    };

    const target = Hooks.target(ctx, HookFlag.BEFORE_SWAP);
    if (!target?.hook.beforeSwap) return outcome;

    const response = target.hook.beforeSwap(
      ctx.contextFor(target.address),
      ctx.sender,
      key,
      params,
      hookData
    );
    Hooks.checkAck(target, HookSelector.beforeSwap, response);

    if (LPFeeLibrary.isDynamicFee(key.fee) && response.lpFeeOverride !== undefined) {
      outcome.lpFeeOverride = response.lpFeeOverride;
    }

    if (hasPermission(target.permissions, HookFlag.BEFORE_SWAP_RETURNS_DELTA)) {
      outcome.beforeSwapDelta = response.delta ?? BeforeSwapDelta.ZERO;
      const hookDeltaSpecified = outcome.beforeSwapDelta.getSpecifiedDelta();

      if (hookDeltaSpecified !== BigInt(0)) {
        const exactInput = outcome.amountToSwap < BigInt(0);
        outcome.amountToSwap += hookDeltaSpecified;
        if (
          exactInput
            ? outcome.amountToSwap > BigInt(0)
            : outcome.amountToSwap < BigInt(0)
        ) {
          throw new HookDeltaExceedsSwapAmount(
            params.amountSpecified,
            outcome.amountToSwap
          );
        }
      }
    }

    return outcome;
  }

  /**
   * Runs the after-swap callback and splits the swap delta between caller
   * and hook, combining the before-swap delta with any after-swap
   * unspecified delta.
   */
  public static afterSwap(
    ctx: HookCallContext,
    key: PoolKey,
    params: SwapParams,
    swapDelta: BalanceDelta,
    hookData: Cell,
    beforeSwapDelta: BeforeSwapDelta
  ): HookedDelta {
    const registration = ctx.registration;
    if (!registration || ctx.sender.equals(registration.address)) {
      return { callerDelta: swapDelta, hookDelta: BalanceDelta.ZERO };
    }

    const hookDeltaSpecified = beforeSwapDelta.getSpecifiedDelta();
    let hookDeltaUnspecified = beforeSwapDelta.getUnspecifiedDelta();

    const target = Hooks.target(ctx, HookFlag.AFTER_SWAP);
    if (target?.hook.afterSwap) {
      const response = target.hook.afterSwap(
        ctx.contextFor(target.address),
        ctx.sender,
        key,
        params,
        swapDelta,
        hookData
      );
      Hooks.checkAck(target, HookSelector.afterSwap, response);
      if (hasPermission(target.permissions, HookFlag.AFTER_SWAP_RETURNS_DELTA)) {
        hookDeltaUnspecified += response.unspecifiedDelta ?? BigInt(0);
      }
    }

    if (hookDeltaSpecified === BigInt(0) && hookDeltaUnspecified === BigInt(0)) {
      return { callerDelta: swapDelta, hookDelta: BalanceDelta.ZERO };
    }

    // the specified currency is currency0 for exact-input zeroForOne and exact-output oneForZero
    const hookDelta =
      params.amountSpecified < BigInt(0) === params.zeroForOne
        ? BalanceDelta.of(hookDeltaSpecified, hookDeltaUnspecified)
        : BalanceDelta.of(hookDeltaUnspecified, hookDeltaSpecified);

    return { callerDelta: swapDelta.sub(hookDelta), hookDelta };
  }

  public static beforeDonate(
    ctx: HookCallContext,
    key: PoolKey,
    amount0: bigint,
    amount1: bigint,
    hookData: Cell
  ): void {
    const target = Hooks.target(ctx, HookFlag.BEFORE_DONATE);
    if (!target?.hook.beforeDonate) return;
    const response = target.hook.beforeDonate(
      ctx.contextFor(target.address),
      ctx.sender,
      key,
      amount0,
      amount1,
      hookData
    );
    Hooks.checkAck(target, HookSelector.beforeDonate, response);
  }

  public static afterDonate(
    ctx: HookCallContext,
    key: PoolKey,
    amount0: bigint,
    amount1: bigint,
    hookData: Cell
  ): void {
    const target = Hooks.target(ctx, HookFlag.AFTER_DONATE);
    if (!target?.hook.afterDonate) return;
    const response = target.hook.afterDonate(
      ctx.contextFor(target.address),
      ctx.sender,
      key,
      amount0,
      amount1,
      hookData
    );
    Hooks.checkAck(target, HookSelector.afterDonate, response);
  }
}
