import { beforeEach, describe, expect, it } from 'vitest';
import { Q96 } from '../constants';
import { PoolNotInitialized } from '../errors';
import { computePoolId } from '../functions/computePoolId';
import { getSwapEstimate } from '../functions/getSwapEstimate';
import { addLiquidity, ALICE, createEngine, poolKey, TestEngine } from '../test/fixtures';
import { SwapSimulator } from './SwapSimulator';

describe('SwapSimulator', () => {
  const key = poolKey();
  let engine: TestEngine;

  beforeEach(() => {
    engine = createEngine();
    engine.manager.initialize(ALICE, key, Q96);
    addLiquidity(engine, ALICE, key, -600, 600, 10n ** 18n);
  });

  it('should quote exact input', () => {
    const simulator = SwapSimulator.fromManager(engine.manager, key);
    expect(simulator.swapExactIn(true, 10n ** 15n)).toBe(996006981039903n);
    expect(getSwapEstimate(engine.manager, key, 1000n, true)).toBe(996n);
  });

  it('should quote exact output', () => {
    const simulator = SwapSimulator.fromManager(engine.manager, key);
    expect(simulator.swapExactOut(true, 896n)).toBe(900n);
    expect(simulator.swapExactOut(false, 10n ** 15n)).toBe(1004013040121367n);
  });

  it('should leave the pool untouched', () => {
    const simulator = SwapSimulator.fromManager(engine.manager, key);
    simulator.swapExactIn(true, 10n ** 15n);
    simulator.swapExactIn(true, 10n ** 15n);

    const slot0 = engine.manager.getSlot0(computePoolId(key));
    expect(slot0.sqrtPriceX96()).toBe(Q96);
    expect(slot0.tick()).toBe(0);
  });

  it('should stop at the price limit', () => {
    const simulator = SwapSimulator.fromManager(engine.manager, key);
    const limit = Q96 - (1n << 86n);
    const { state } = simulator.swap(true, -(10n ** 18n), limit);
    expect(state.sqrtPriceX96).toBe(limit);
  });

  it('should need an initialized pool', () => {
    expect(() => SwapSimulator.fromManager(engine.manager, poolKey(500))).toThrow(
      PoolNotInitialized
    );
  });
});
