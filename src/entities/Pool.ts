import { Address } from '@ton/core';
import {
  MAX_SQRT_PRICE,
  MAX_TICK,
  MIN_SQRT_PRICE,
  MIN_TICK,
  PIPS_DENOMINATOR,
  Q128,
} from '../constants';
import {
  InvalidFeeForExactOut,
  NoLiquidityToReceiveFees,
  PoolAlreadyInitialized,
  PoolNotInitialized,
  PriceLimitAlreadyExceeded,
  PriceLimitOutOfBounds,
  TickLiquidityOverflow,
  TickLowerOutOfBounds,
  TicksMisordered,
  TickUpperOutOfBounds,
} from '../errors';
import { computePositionKey } from '../functions/computePoolId';
import { BalanceDelta } from '../types/BalanceDelta';
import { PoolId } from '../types/PoolKey';
import { Slot0 } from '../types/Slot0';
import { emptyTickInfo, NumberedTickInfo, TickInfo } from '../types/TickInfo';
import { addIn256, FullMath, subIn256 } from '../utils/fullMath';
import { LiquidityMath } from '../utils/liquidityMath';
import { LPFeeLibrary } from '../utils/lpFeeLibrary';
import { ProtocolFeeLibrary } from '../utils/protocolFeeLibrary';
import { toInt128, uintToInt128 } from '../utils/safeCast';
import { SqrtPriceMath } from '../utils/sqrtPriceMath';
import { SwapMath } from '../utils/swapMath';
import { TickBitmap } from '../utils/tickBitmap';
import { FeeGrowthInside, TickLibrary } from '../utils/tickLibrary';
import { TickMath } from '../utils/tickMath';
import { Position } from './Position';

export interface PoolSwapParams {
  tickSpacing: number;
  zeroForOne: boolean;
  /** Negative for exact input, positive for exact output. */
  amountSpecified: bigint;
  sqrtPriceLimitX96: bigint;
  /** Fee set by a before-swap hook; applied only if it carries OVERRIDE_FEE_FLAG. */
  lpFeeOverride: number;
}

export interface SwapState {
  amountSpecifiedRemaining: bigint;
  amountCalculated: bigint;
  sqrtPriceX96: bigint;
  tick: number;
  feeGrowthGlobalX128: bigint;
  liquidity: bigint;
}

interface StepComputations {
  sqrtPriceStartX96: bigint;
  tickNext: number;
  initialized: boolean;
  sqrtPriceNextX96: bigint;
  amountIn: bigint;
  amountOut: bigint;
  feeAmount: bigint;
}

export interface PoolSwapResult {
  swapDelta: BalanceDelta;
  /** Part of the input kept for the protocol, in the input currency. */
  amountToProtocol: bigint;
  /** Total fee rate applied, in pips. */
  swapFee: number;
  state: SwapState;
}

export interface PoolModifyLiquidityParams {
  owner: Address;
  tickLower: number;
  tickUpper: number;
  liquidityDelta: bigint;
  tickSpacing: number;
  salt: bigint;
}

export interface PoolModifyLiquidityResult {
  /** Principal owed by (negative) or to (positive) the owner. */
  delta: BalanceDelta;
  /** Fees earned by the position since it was last touched. */
  feeDelta: BalanceDelta;
}

interface TickUpdate {
  flipped: boolean;
  liquidityGrossAfter: bigint;
}

/**
 * State of one pool and the operations that move it. Callers are expected to
 * have validated the key; every method works on this instance only.
 */
export class Pool {
  public slot0: Slot0 = Slot0.EMPTY;
  public feeGrowthGlobal0X128: bigint = BigInt(0);
  public feeGrowthGlobal1X128: bigint = BigInt(0);
  public liquidity: bigint = BigInt(0);
  public readonly ticks: Map<number, TickInfo> = new Map();
  public tickBitmap: TickBitmap = new TickBitmap();
  public readonly positions: Map<string, Position> = new Map();

  constructor(public readonly id: PoolId) {}

  /**
   * Deep copy, used as the working state of a session.
   */
  clone(): Pool {
    const copy = new Pool(this.id);
    copy.slot0 = this.slot0;
    copy.feeGrowthGlobal0X128 = this.feeGrowthGlobal0X128;
    copy.feeGrowthGlobal1X128 = this.feeGrowthGlobal1X128;
    copy.liquidity = this.liquidity;
    for (const [tick, info] of this.ticks) {
      copy.ticks.set(tick, { ...info });
    }
    copy.tickBitmap = this.tickBitmap.clone();
    for (const [key, position] of this.positions) {
      copy.positions.set(key, position.clone());
    }
    return copy;
  }

  isInitialized(): boolean {
    return this.slot0.sqrtPriceX96() !== BigInt(0);
  }

  checkPoolInitialized(): void {
    if (!this.isInitialized()) throw new PoolNotInitialized(this.id);
  }

  initialize(sqrtPriceX96: bigint, lpFee: number): number {
    if (this.isInitialized()) throw new PoolAlreadyInitialized(this.id);

    const tick = TickMath.getTickAtSqrtPrice(sqrtPriceX96);
    this.slot0 = Slot0.of(sqrtPriceX96, tick, 0, lpFee);
    return tick;
  }

  setProtocolFee(protocolFee: number): void {
    this.checkPoolInitialized();
    this.slot0 = this.slot0.withProtocolFee(protocolFee);
  }

  setLPFee(lpFee: number): void {
    this.checkPoolInitialized();
    this.slot0 = this.slot0.withLpFee(lpFee);
  }

  getPosition(
    owner: Address,
    tickLower: number,
    tickUpper: number,
    salt: bigint
  ): Position | undefined {
    return this.positions.get(
      computePositionKey(owner, tickLower, tickUpper, salt)
    );
  }

  getFeeGrowthInside(tickLower: number, tickUpper: number): FeeGrowthInside {
    return TickLibrary.getFeeGrowthInside(
      tickLower,
      tickUpper,
      this.slot0.tick(),
      this.feeGrowthGlobal0X128,
      this.feeGrowthGlobal1X128,
      this.ticks
    );
  }

  /**
   * Initialized ticks in ascending order.
   */
  getTicks(): NumberedTickInfo[] {
    return Array.from(this.ticks.entries())
      .sort(([a], [b]) => a - b)
      .map(([tickNum, info]) => ({ tickNum, ...info }));
  }

  modifyLiquidity(params: PoolModifyLiquidityParams): PoolModifyLiquidityResult {
    const { tickLower, tickUpper, tickSpacing } = params;
    const liquidityDelta = toInt128(params.liquidityDelta);
    checkTicks(tickLower, tickUpper);

    let flippedLower = false;
    let flippedUpper = false;

    if (liquidityDelta !== BigInt(0)) {
      const lower = this.updateTick(tickLower, liquidityDelta, false);
      const upper = this.updateTick(tickUpper, liquidityDelta, true);
      flippedLower = lower.flipped;
      flippedUpper = upper.flipped;

      if (liquidityDelta > BigInt(0)) {
        const maxLiquidityPerTick =
          TickLibrary.tickSpacingToMaxLiquidityPerTick(tickSpacing);
        if (lower.liquidityGrossAfter > maxLiquidityPerTick) {
          throw new TickLiquidityOverflow(tickLower);
        }
        if (upper.liquidityGrossAfter > maxLiquidityPerTick) {
          throw new TickLiquidityOverflow(tickUpper);
        }
      }

      if (flippedLower) this.tickBitmap.flipTick(tickLower, tickSpacing);
      if (flippedUpper) this.tickBitmap.flipTick(tickUpper, tickSpacing);
    }

    const { feeGrowthInside0X128, feeGrowthInside1X128 } =
      this.getFeeGrowthInside(tickLower, tickUpper);

    const positionKey = computePositionKey(
      params.owner,
      tickLower,
      tickUpper,
      params.salt
    );
    const position = this.positions.get(positionKey) ?? new Position();
    const { feesOwed0, feesOwed1 } = position.update(
      liquidityDelta,
      feeGrowthInside0X128,
      feeGrowthInside1X128
    );
    this.positions.set(positionKey, position);

    const feeDelta = BalanceDelta.of(feesOwed0, feesOwed1);

    // clear any tick data that is no longer needed
    if (liquidityDelta < BigInt(0)) {
      if (flippedLower) this.ticks.delete(tickLower);
      if (flippedUpper) this.ticks.delete(tickUpper);
    }

    let delta = BalanceDelta.ZERO;
    if (liquidityDelta !== BigInt(0)) {
      const tick = this.slot0.tick();
      const sqrtPriceX96 = this.slot0.sqrtPriceX96();
      const sqrtPriceLowerX96 = TickMath.getSqrtPriceAtTick(tickLower);
      const sqrtPriceUpperX96 = TickMath.getSqrtPriceAtTick(tickUpper);

      if (tick < tickLower) {
        // range is above the price: only currency0 is needed to move into it
        delta = BalanceDelta.of(
          SqrtPriceMath.getAmount0DeltaSigned(
            sqrtPriceLowerX96,
            sqrtPriceUpperX96,
            liquidityDelta
          ),
          BigInt(0)
        );
      } else if (tick < tickUpper) {
        delta = BalanceDelta.of(
          SqrtPriceMath.getAmount0DeltaSigned(
            sqrtPriceX96,
            sqrtPriceUpperX96,
            liquidityDelta
          ),
          SqrtPriceMath.getAmount1DeltaSigned(
            sqrtPriceLowerX96,
            sqrtPriceX96,
            liquidityDelta
          )
        );
        this.liquidity = LiquidityMath.addDelta(this.liquidity, liquidityDelta);
      } else {
        delta = BalanceDelta.of(
          BigInt(0),
          SqrtPriceMath.getAmount1DeltaSigned(
            sqrtPriceLowerX96,
            sqrtPriceUpperX96,
            liquidityDelta
          )
        );
      }
    }

    return { delta, feeDelta };
  }

  /**
   * Executes a swap against this pool and returns the resulting delta for the
   * swapper. Walks initialized ticks one bitmap word at a time until the amount
   * is used up or the price limit is reached.
   */
  swap(params: PoolSwapParams): PoolSwapResult {
    const slot0Start = this.slot0;
    const zeroForOne = params.zeroForOne;

    const protocolFee = zeroForOne
      ? ProtocolFeeLibrary.getZeroForOneFee(slot0Start.protocolFee())
      : ProtocolFeeLibrary.getOneForZeroFee(slot0Start.protocolFee());

    const state: SwapState = {
      amountSpecifiedRemaining: params.amountSpecified,
      amountCalculated: BigInt(0),
      sqrtPriceX96: slot0Start.sqrtPriceX96(),
      tick: slot0Start.tick(),
      feeGrowthGlobalX128: zeroForOne
        ? this.feeGrowthGlobal0X128
        : this.feeGrowthGlobal1X128,
      liquidity: this.liquidity,
    };

    const lpFee = LPFeeLibrary.isOverride(params.lpFeeOverride)
      ? LPFeeLibrary.removeOverrideFlagAndValidate(params.lpFeeOverride)
      : slot0Start.lpFee();

    const swapFee =
      protocolFee === 0
        ? lpFee
        : ProtocolFeeLibrary.calculateSwapFee(protocolFee, lpFee);

    // a swap fee of 100% makes exact output swaps impossible
    if (swapFee >= PIPS_DENOMINATOR && params.amountSpecified > BigInt(0)) {
      throw new InvalidFeeForExactOut(swapFee);
    }

    let amountToProtocol = BigInt(0);

    if (params.amountSpecified === BigInt(0)) {
      return { swapDelta: BalanceDelta.ZERO, amountToProtocol, swapFee, state };
    }

    const sqrtPriceLimitX96 = params.sqrtPriceLimitX96;
    if (zeroForOne) {
      if (sqrtPriceLimitX96 >= slot0Start.sqrtPriceX96()) {
        throw new PriceLimitAlreadyExceeded(
          slot0Start.sqrtPriceX96(),
          sqrtPriceLimitX96
        );
      }
      if (sqrtPriceLimitX96 <= MIN_SQRT_PRICE) {
        throw new PriceLimitOutOfBounds(sqrtPriceLimitX96);
      }
    } else {
      if (sqrtPriceLimitX96 <= slot0Start.sqrtPriceX96()) {
        throw new PriceLimitAlreadyExceeded(
          slot0Start.sqrtPriceX96(),
          sqrtPriceLimitX96
        );
      }
      if (sqrtPriceLimitX96 >= MAX_SQRT_PRICE) {
        throw new PriceLimitOutOfBounds(sqrtPriceLimitX96);
      }
    }

    const exactOutput = params.amountSpecified > BigInt(0);
    const swapFeePips = BigInt(swapFee);

    while (
      state.amountSpecifiedRemaining !== BigInt(0) &&
      state.sqrtPriceX96 !== sqrtPriceLimitX96
    ) {
      const sqrtPriceStartX96 = state.sqrtPriceX96;

      let { tickNext, initialized } =
        this.tickBitmap.nextInitializedTickWithinOneWord(
          state.tick,
          params.tickSpacing,
          zeroForOne
        );

      // the bitmap is not aware of the tick bounds
      if (tickNext <= MIN_TICK) {
        tickNext = MIN_TICK;
      }
      if (tickNext >= MAX_TICK) {
        tickNext = MAX_TICK;
      }

      const sqrtPriceNextX96 = TickMath.getSqrtPriceAtTick(tickNext);

      const stepResult = SwapMath.computeSwapStep(
        state.sqrtPriceX96,
        SwapMath.getSqrtPriceTarget(zeroForOne, sqrtPriceNextX96, sqrtPriceLimitX96),
        state.liquidity,
        state.amountSpecifiedRemaining,
        swapFeePips
      );

      const step: StepComputations = {
        sqrtPriceStartX96,
        tickNext,
        initialized,
        sqrtPriceNextX96,
        amountIn: stepResult.amountIn,
        amountOut: stepResult.amountOut,
        feeAmount: stepResult.feeAmount,
      };
      state.sqrtPriceX96 = stepResult.sqrtPriceNextX96;

      if (exactOutput) {
        state.amountSpecifiedRemaining -= step.amountOut;
        state.amountCalculated -= step.amountIn + step.feeAmount;
      } else {
        state.amountSpecifiedRemaining += step.amountIn + step.feeAmount;
        state.amountCalculated += step.amountOut;
      }

      // the protocol takes its cut of the step fee before LPs are credited
      if (protocolFee > 0) {
        const delta =
          swapFee === protocolFee
            ? step.feeAmount
            : ((step.amountIn + step.feeAmount) * BigInt(protocolFee)) /
              BigInt(PIPS_DENOMINATOR);
        step.feeAmount -= delta;
        amountToProtocol += delta;
      }

      if (state.liquidity > BigInt(0)) {
        state.feeGrowthGlobalX128 = addIn256(
          state.feeGrowthGlobalX128,
          FullMath.mulDiv(step.feeAmount, Q128, state.liquidity)
        );
      }

      if (state.sqrtPriceX96 === step.sqrtPriceNextX96) {
        // if the tick is initialized, run the tick transition
        if (step.initialized) {
          const [feeGrowthGlobal0X128, feeGrowthGlobal1X128] = zeroForOne
            ? [state.feeGrowthGlobalX128, this.feeGrowthGlobal1X128]
            : [this.feeGrowthGlobal0X128, state.feeGrowthGlobalX128];
          let liquidityNet = this.crossTick(
            step.tickNext,
            feeGrowthGlobal0X128,
            feeGrowthGlobal1X128
          );
          // if we're moving leftward, we interpret liquidityNet as the opposite sign
          if (zeroForOne) liquidityNet = -liquidityNet;

          state.liquidity = LiquidityMath.addDelta(state.liquidity, liquidityNet);
        }

        state.tick = zeroForOne ? step.tickNext - 1 : step.tickNext;
      } else if (state.sqrtPriceX96 !== step.sqrtPriceStartX96) {
        // recompute unless we're on a lower tick boundary (i.e. already transitioned ticks), and haven't moved
        state.tick = TickMath.getTickAtSqrtPrice(state.sqrtPriceX96);
      }
    }

    this.slot0 = slot0Start
      .withTick(state.tick)
      .withSqrtPriceX96(state.sqrtPriceX96);
    this.liquidity = state.liquidity;
    if (zeroForOne) {
      this.feeGrowthGlobal0X128 = state.feeGrowthGlobalX128;
    } else {
      this.feeGrowthGlobal1X128 = state.feeGrowthGlobalX128;
    }

    const amountSpecifiedUsed =
      params.amountSpecified - state.amountSpecifiedRemaining;
    // the specified amount is currency0 when exact input zeroForOne or exact output oneForZero
    const swapDelta =
      zeroForOne !== params.amountSpecified < BigInt(0)
        ? BalanceDelta.of(state.amountCalculated, amountSpecifiedUsed)
        : BalanceDelta.of(amountSpecifiedUsed, state.amountCalculated);

    return { swapDelta, amountToProtocol, swapFee, state };
  }

  /**
   * Adds the donated amounts to the fee growth of in-range liquidity.
   * Returns what the donor owes.
   */
  donate(amount0: bigint, amount1: bigint): BalanceDelta {
    if (this.liquidity === BigInt(0)) {
      throw new NoLiquidityToReceiveFees(this.id);
    }
    const delta = BalanceDelta.of(-uintToInt128(amount0), -uintToInt128(amount1));
    if (amount0 > BigInt(0)) {
      this.feeGrowthGlobal0X128 = addIn256(
        this.feeGrowthGlobal0X128,
        FullMath.mulDiv(amount0, Q128, this.liquidity)
      );
    }
    if (amount1 > BigInt(0)) {
      this.feeGrowthGlobal1X128 = addIn256(
        this.feeGrowthGlobal1X128,
        FullMath.mulDiv(amount1, Q128, this.liquidity)
      );
    }
    return delta;
  }

  private updateTick(
    tick: number,
    liquidityDelta: bigint,
    upper: boolean
  ): TickUpdate {
    const info = this.ticks.get(tick) ?? emptyTickInfo();

    const liquidityGrossBefore = info.liquidityGross;
    const liquidityGrossAfter = LiquidityMath.addDelta(
      liquidityGrossBefore,
      liquidityDelta
    );

    const flipped =
      (liquidityGrossAfter === BigInt(0)) !== (liquidityGrossBefore === BigInt(0));

    if (liquidityGrossBefore === BigInt(0)) {
      // by convention, we assume that all growth before a tick was initialized happened _below_ the tick
      if (tick <= this.slot0.tick()) {
        info.feeGrowthOutside0X128 = this.feeGrowthGlobal0X128;
        info.feeGrowthOutside1X128 = this.feeGrowthGlobal1X128;
      }
    }

    // when the lower (upper) tick is crossed left to right, liquidity must be added (removed)
    info.liquidityNet = toInt128(
      upper ? info.liquidityNet - liquidityDelta : info.liquidityNet + liquidityDelta
    );
    info.liquidityGross = liquidityGrossAfter;
    this.ticks.set(tick, info);

    return { flipped, liquidityGrossAfter };
  }

  private crossTick(
    tick: number,
    feeGrowthGlobal0X128: bigint,
    feeGrowthGlobal1X128: bigint
  ): bigint {
    const info = this.ticks.get(tick) ?? emptyTickInfo();
    info.feeGrowthOutside0X128 = subIn256(
      feeGrowthGlobal0X128,
      info.feeGrowthOutside0X128
    );
    info.feeGrowthOutside1X128 = subIn256(
      feeGrowthGlobal1X128,
      info.feeGrowthOutside1X128
    );
    this.ticks.set(tick, info);
    return info.liquidityNet;
  }
}

function checkTicks(tickLower: number, tickUpper: number): void {
  if (tickLower >= tickUpper) throw new TicksMisordered(tickLower, tickUpper);
  if (tickLower < MIN_TICK) throw new TickLowerOutOfBounds(tickLower);
  if (tickUpper > MAX_TICK) throw new TickUpperOutOfBounds(tickUpper);
}
