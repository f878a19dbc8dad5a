import { Address } from '@ton/core';
import { beforeEach, describe, expect, it } from 'vitest';
import { DYNAMIC_FEE_FLAG, MIN_SQRT_PRICE, OVERRIDE_FEE_FLAG, Q96 } from '../constants';
import { HookDeltaExceedsSwapAmount, InvalidHookResponse, ManagerLocked } from '../errors';
import { computePoolId } from '../functions/computePoolId';
import { getSwapEstimate } from '../functions/getSwapEstimate';
import {
  addLiquidity,
  ALICE,
  BOB,
  createEngine,
  makeHook,
  poolKey,
  runSession,
  settlePool,
  TestEngine,
  TOKEN_0,
  TOKEN_1,
} from '../test/fixtures';
import { BalanceDelta } from '../types/BalanceDelta';
import { BeforeSwapDelta } from '../types/BeforeSwapDelta';
import { Hook, HookSelector } from '../types/hooks';
import { PoolKey } from '../types/PoolKey';

const LIQUIDITY = 10n ** 18n;
const ADD_AMOUNT = 29553010879137170n;
const REMOVE_AMOUNT = 29553010879137169n;

describe('Hooks', () => {
  let engine: TestEngine;

  beforeEach(() => {
    engine = createEngine();
  });

  function openPool(hook: Hook, fee = 3000): PoolKey {
    engine.manager.registerHook(hook);
    const key = poolKey(fee, 60, hook.address);
    engine.manager.initialize(ALICE, key, Q96);
    return key;
  }

  function swapExactIn(actor: Address, key: PoolKey, amountIn: bigint): BalanceDelta {
    return runSession(engine.manager, actor, (session) => {
      const delta = session.swap(key, {
        zeroForOne: true,
        amountSpecified: -amountIn,
        sqrtPriceLimitX96: MIN_SQRT_PRICE + 1n,
      });
      settlePool(session, engine.vault, key);
      return delta;
    });
  }

  describe('dispatch', () => {
    it('should call each callback with the original sender', () => {
      const calls: string[] = [];
      const record = (name: HookSelector, sender: Address) => {
        calls.push(`${name}:${sender.equals(ALICE) ? 'alice' : 'other'}`);
        return { selector: name };
      };
      const hook = makeHook(
        {
          beforeInitialize: true,
          afterInitialize: true,
          beforeAddLiquidity: true,
          beforeRemoveLiquidity: true,
          beforeDonate: true,
          afterDonate: true,
        },
        {
          beforeInitialize: (_, sender) => record(HookSelector.beforeInitialize, sender),
          afterInitialize: (_, sender) => record(HookSelector.afterInitialize, sender),
          beforeAddLiquidity: (_, sender) => record(HookSelector.beforeAddLiquidity, sender),
          beforeRemoveLiquidity: (_, sender) =>
            record(HookSelector.beforeRemoveLiquidity, sender),
          beforeDonate: (_, sender) => record(HookSelector.beforeDonate, sender),
          afterDonate: (_, sender) => record(HookSelector.afterDonate, sender),
        }
      );

      const key = openPool(hook);
      addLiquidity(engine, ALICE, key, -600, 600, LIQUIDITY);
      runSession(engine.manager, ALICE, (session) => {
        session.donate(key, 10n, 0n);
        session.modifyLiquidity(key, { tickLower: -600, tickUpper: 600, liquidityDelta: -1n });
        settlePool(session, engine.vault, key);
      });

      expect(calls).toEqual([
        'beforeInitialize:alice',
        'afterInitialize:alice',
        'beforeAddLiquidity:alice',
        'beforeDonate:alice',
        'afterDonate:alice',
        'beforeRemoveLiquidity:alice',
      ]);
    });

    it('should not call a hook on its own actions', () => {
      let calls = 0;
      const hook = makeHook(
        { afterSwap: true },
        {
          afterSwap: () => {
            calls++;
            return { selector: HookSelector.afterSwap };
          },
        }
      );
      const key = openPool(hook);
      addLiquidity(engine, ALICE, key, -600, 600, LIQUIDITY);
      engine.vault.deposit(hook.address, TOKEN_0, 10n ** 6n);

      swapExactIn(hook.address, key, 1000n);
      expect(calls).toBe(0);

      swapExactIn(BOB, key, 1000n);
      expect(calls).toBe(1);
    });

    it('should abort on a wrong acknowledgement', () => {
      const hook = makeHook(
        { beforeSwap: true },
        { beforeSwap: () => ({ selector: HookSelector.afterSwap }) }
      );
      const key = openPool(hook);
      addLiquidity(engine, ALICE, key, -600, 600, LIQUIDITY);

      const id = computePoolId(key);

      expect(() => swapExactIn(BOB, key, 1000n)).toThrow(InvalidHookResponse);
      expect(engine.manager.getSlot0(id).sqrtPriceX96()).toBe(Q96);
      expect(engine.manager.getSlot0(id).tick()).toBe(0);
      expect(engine.manager.getLiquidity(id)).toBe(LIQUIDITY);
      expect(engine.manager.getFeeGrowthGlobals(id)).toEqual({
        feeGrowthGlobal0X128: 0n,
        feeGrowthGlobal1X128: 0n,
      });
    });

    it('should not call a callback the hook address does not grant', () => {
      const calls: string[] = [];
      const hook = makeHook(
        { beforeSwap: true },
        {
          beforeSwap: () => {
            calls.push('beforeSwap');
            return { selector: HookSelector.beforeSwap };
          },
          afterSwap: () => {
            calls.push('afterSwap');
            return { selector: HookSelector.afterSwap };
          },
        }
      );
      const key = openPool(hook);
      addLiquidity(engine, ALICE, key, -600, 600, LIQUIDITY);

      expect(swapExactIn(BOB, key, 1000n).amount1()).toBe(996n);
      expect(calls).toEqual(['beforeSwap']);
    });

    it('should lock ledger operations during a standalone initialize', () => {
      const hook = makeHook(
        { afterInitialize: true },
        {
          afterInitialize: (manager) => {
            manager.sync(TOKEN_0);
            return { selector: HookSelector.afterInitialize };
          },
        }
      );
      engine.manager.registerHook(hook);
      const key = poolKey(3000, 60, hook.address);

      expect(() => engine.manager.initialize(ALICE, key, Q96)).toThrow(ManagerLocked);
      expect(engine.manager.getPool(computePoolId(key))).toBeUndefined();

      const tick = runSession(engine.manager, ALICE, (session) =>
        session.initialize(key, Q96)
      );
      expect(tick).toBe(0);
    });
  });

  describe('returned deltas', () => {
    it('should take part of an exact input before the swap', () => {
      const hook = makeHook(
        { beforeSwap: true, beforeSwapReturnDelta: true },
        {
          beforeSwap: (manager) => {
            manager.take(TOKEN_0, manager.sender, 100n);
            return {
              selector: HookSelector.beforeSwap,
              delta: BeforeSwapDelta.of(100n, 0n),
            };
          },
        }
      );
      const key = openPool(hook);
      addLiquidity(engine, ALICE, key, -600, 600, LIQUIDITY);
      const quote = getSwapEstimate(engine.manager, key, 900n, true);

      const delta = swapExactIn(BOB, key, 1000n);

      expect(quote).toBe(896n);
      expect(delta.amount0()).toBe(-1000n);
      expect(delta.amount1()).toBe(quote);
      expect(engine.vault.balanceOfHolder(hook.address, TOKEN_0)).toBe(100n);
      expect(engine.manager.getSlot0(computePoolId(key)).sqrtPriceX96()).toBe(
        79228162514264266525882175041n
      );
    });

    it('should not take more than the swap amount', () => {
      const hook = makeHook(
        { beforeSwap: true, beforeSwapReturnDelta: true },
        {
          beforeSwap: () => ({
            selector: HookSelector.beforeSwap,
            delta: BeforeSwapDelta.of(1001n, 0n),
          }),
        }
      );
      const key = openPool(hook);
      addLiquidity(engine, ALICE, key, -600, 600, LIQUIDITY);

      expect(() => swapExactIn(BOB, key, 1000n)).toThrow(HookDeltaExceedsSwapAmount);
    });

    it('should take part of the output after the swap', () => {
      const hook = makeHook(
        { afterSwap: true, afterSwapReturnDelta: true },
        {
          afterSwap: (manager) => {
            manager.take(TOKEN_1, manager.sender, 10n);
            return { selector: HookSelector.afterSwap, unspecifiedDelta: 10n };
          },
        }
      );
      const key = openPool(hook);
      addLiquidity(engine, ALICE, key, -600, 600, LIQUIDITY);

      const delta = swapExactIn(BOB, key, 1000n);

      expect(delta.amount0()).toBe(-1000n);
      expect(delta.amount1()).toBe(986n);
      expect(engine.vault.balanceOfHolder(hook.address, TOKEN_1)).toBe(10n);
    });

    it('should move liquidity deltas between caller and hook', () => {
      const hook = makeHook(
        {
          afterAddLiquidity: true,
          afterAddLiquidityReturnDelta: true,
          afterRemoveLiquidity: true,
          afterRemoveLiquidityReturnDelta: true,
        },
        {
          // pays part of the deposit
          afterAddLiquidity: (manager) => {
            manager.sync(TOKEN_0);
            engine.vault.transferFrom(manager.sender, engine.vault.engine, TOKEN_0, 5n);
            manager.settle();
            return {
              selector: HookSelector.afterAddLiquidity,
              delta: BalanceDelta.of(-5n, 0n),
            };
          },
          // keeps part of the withdrawal
          afterRemoveLiquidity: (manager) => {
            manager.take(TOKEN_0, manager.sender, 3n);
            return {
              selector: HookSelector.afterRemoveLiquidity,
              delta: BalanceDelta.of(3n, 0n),
            };
          },
        }
      );
      const key = openPool(hook);
      engine.vault.deposit(hook.address, TOKEN_0, 5n);

      const added = runSession(engine.manager, ALICE, (session) => {
        const { callerDelta } = session.modifyLiquidity(key, {
          tickLower: -600,
          tickUpper: 600,
          liquidityDelta: LIQUIDITY,
        });
        settlePool(session, engine.vault, key);
        return callerDelta;
      });
      expect(added.amount0()).toBe(-(ADD_AMOUNT - 5n));
      expect(added.amount1()).toBe(-ADD_AMOUNT);

      const removed = runSession(engine.manager, ALICE, (session) => {
        const { callerDelta } = session.modifyLiquidity(key, {
          tickLower: -600,
          tickUpper: 600,
          liquidityDelta: -LIQUIDITY,
        });
        settlePool(session, engine.vault, key);
        return callerDelta;
      });
      expect(removed.amount0()).toBe(REMOVE_AMOUNT - 3n);
      expect(removed.amount1()).toBe(REMOVE_AMOUNT);
      expect(engine.vault.balanceOfHolder(hook.address, TOKEN_0)).toBe(3n);
    });
  });

  describe('fee override', () => {
    it('should apply an override flagged by a dynamic-fee hook', () => {
      const hook = makeHook(
        { beforeSwap: true },
        {
          beforeSwap: () => ({
            selector: HookSelector.beforeSwap,
            lpFeeOverride: 10000 | OVERRIDE_FEE_FLAG,
          }),
        }
      );
      const key = openPool(hook, DYNAMIC_FEE_FLAG);
      const id = computePoolId(key);
      engine.manager.updateDynamicLPFee(hook.address, key, 5000);
      addLiquidity(engine, ALICE, key, -600, 600, LIQUIDITY);

      const delta = swapExactIn(BOB, key, 1_000_000n);

      expect(delta.amount1()).toBe(989999n);
      expect(engine.manager.getFeeGrowthGlobals(id).feeGrowthGlobal0X128).toBe(
        3402823669209384634633746n
      );
      expect(engine.manager.getSlot0(id).lpFee()).toBe(5000);
    });

    it('should ignore an override on a static-fee pool', () => {
      const hook = makeHook(
        { beforeSwap: true },
        {
          beforeSwap: () => ({
            selector: HookSelector.beforeSwap,
            lpFeeOverride: 10000 | OVERRIDE_FEE_FLAG,
          }),
        }
      );
      const key = openPool(hook);
      addLiquidity(engine, ALICE, key, -600, 600, LIQUIDITY);

      expect(swapExactIn(BOB, key, 1000n).amount1()).toBe(996n);
    });
  });
});
