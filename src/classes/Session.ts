import { Address, Cell } from '@ton/core';
import { MAX_TICK_SPACING, MIN_TICK_SPACING } from '../constants';
import {
  CurrenciesOutOfOrderOrEqual,
  ManagerLocked,
  MustClearExactPositiveDelta,
  SwapAmountCannotBeZero,
  SyncedReservesDecreased,
  TickSpacingTooLarge,
  TickSpacingTooSmall,
  UnauthorizedDynamicLPFeeUpdate,
} from '../errors';
import { Pool } from '../entities/Pool';
import {
  addressKey,
  compareCurrencies,
  computePoolId,
} from '../functions/computePoolId';
import { BalanceDelta } from '../types/BalanceDelta';
import { ModifyLiquidityResult } from '../types/ManagerContext';
import { ModifyLiquidityParams, PoolId, PoolKey, SwapParams } from '../types/PoolKey';
import {
  ClaimsService,
  Custody,
  isCheckpointable,
  Rollback,
} from '../types/services';
import { Logger } from '../utils/logger';
import { LPFeeLibrary } from '../utils/lpFeeLibrary';
import { ProtocolFeeLibrary } from '../utils/protocolFeeLibrary';
import { uintToInt128 } from '../utils/safeCast';
import { HookRegistration, HookRegistry } from './HookRegistry';
import { HookCallContext, Hooks } from './Hooks';
import { Ledger } from './Ledger';
import { SessionContext } from './SessionContext';
import { StateView } from './StateView';

/** Committed engine state. */
export interface EngineState {
  pools: Map<PoolId, Pool>;
  /** Keyed by asset address. */
  protocolFeesAccrued: Map<string, bigint>;
}

export interface SessionServices {
  hooks: HookRegistry;
  claims: ClaimsService;
  custody: Custody;
  logger: Logger;
}

/**
 * One unit of work against the engine. Pools are copied on first access and
 * only replace the committed ones on `commit`; claims and custody are
 * checkpointed on creation and restored on `rollback`.
 *
 * An unlocked session carries the ledger. A locked one only allows
 * initialize and admin updates.
 */
export class Session {
  readonly ledger = new Ledger();
  readonly view: StateView;

  private readonly pools: Map<PoolId, Pool> = new Map();
  private readonly protocolFees: Map<string, bigint>;
  private readonly rollbacks: Rollback[] = [];
  private unlocked: boolean;
  private closed = false;
  private failure: { error: unknown } | null = null;

  constructor(
    private readonly state: EngineState,
    private readonly services: SessionServices,
    unlocked: boolean
  ) {
    this.unlocked = unlocked;
    this.protocolFees = new Map(state.protocolFeesAccrued);
    for (const service of [services.claims, services.custody]) {
      if (isCheckpointable(service)) this.rollbacks.push(service.checkpoint());
    }
    this.view = new StateView(
      (id) => this.readPool(id),
      (currency) => this.protocolFees.get(addressKey(currency)) ?? BigInt(0)
    );
  }

  isUnlocked(): boolean {
    return this.unlocked;
  }

  close(): void {
    this.closed = true;
    this.unlocked = false;
  }

  /**
   * Runs one operation. An error is remembered even if the caller catches
   * it, so the session can no longer commit.
   */
  run<R>(operation: () => R): R {
    try {
      return operation();
    } catch (error) {
      this.failure ??= { error };
      throw error;
    }
  }

  throwIfFailed(): void {
    if (this.failure) throw this.failure.error;
  }

  commit(): void {
    for (const [id, pool] of this.pools) {
      if (pool.isInitialized()) this.state.pools.set(id, pool);
    }
    this.state.protocolFeesAccrued = this.protocolFees;
  }

  rollback(): void {
    for (const restore of this.rollbacks.reverse()) restore();
  }

  context(actor: Address): SessionContext {
    return new SessionContext(this, actor);
  }

  // ========== POOLS ==========

  initialize(sender: Address, key: PoolKey, sqrtPriceX96: bigint): number {
    this.requireOpen('initialize');
    if (key.tickSpacing > MAX_TICK_SPACING) {
      throw new TickSpacingTooLarge(key.tickSpacing);
    }
    if (key.tickSpacing < MIN_TICK_SPACING) {
      throw new TickSpacingTooSmall(key.tickSpacing);
    }
    if (compareCurrencies(key.currency0, key.currency1) >= 0) {
      throw new CurrenciesOutOfOrderOrEqual(key.currency0, key.currency1);
    }
    const registration = this.services.hooks.validateForPool(key.hooks, key.fee);
    const lpFee = LPFeeLibrary.getInitialLPFee(key.fee);

    const hooks = this.hookContext(sender, registration);
    Hooks.beforeInitialize(hooks, key, sqrtPriceX96);

    const id = computePoolId(key);
    const tick = this.writePool(id).initialize(sqrtPriceX96, lpFee);

    Hooks.afterInitialize(hooks, key, sqrtPriceX96, tick);

    this.services.logger.debug(
      { poolId: id, sqrtPriceX96: sqrtPriceX96.toString(), tick },
      'Pool initialized'
    );
    return tick;
  }

  modifyLiquidity(
    sender: Address,
    key: PoolKey,
    params: ModifyLiquidityParams,
    hookData: Cell
  ): ModifyLiquidityResult {
    this.requireUnlocked('modifyLiquidity');
    const id = computePoolId(key);
    const pool = this.writePool(id);
    pool.checkPoolInitialized();

    const hooks = this.hookContext(sender, this.registrationOf(key));
    Hooks.beforeModifyLiquidity(hooks, key, params, hookData);

    const { delta: principalDelta, feeDelta } = pool.modifyLiquidity({
      owner: sender,
      tickLower: params.tickLower,
      tickUpper: params.tickUpper,
      liquidityDelta: params.liquidityDelta,
      tickSpacing: key.tickSpacing,
      salt: params.salt ?? BigInt(0),
    });

    // fee delta and principal delta are both accrued to the caller
    const { callerDelta, hookDelta } = Hooks.afterModifyLiquidity(
      hooks,
      key,
      params,
      principalDelta.add(feeDelta),
      feeDelta,
      hookData
    );

    if (!hookDelta.isZero() && key.hooks) {
      this.accountPoolBalanceDelta(key, hookDelta, key.hooks);
    }
    this.accountPoolBalanceDelta(key, callerDelta, sender);

    this.services.logger.debug(
      {
        poolId: id,
        tickLower: params.tickLower,
        tickUpper: params.tickUpper,
        liquidityDelta: params.liquidityDelta.toString(),
        callerDelta: callerDelta.toString(),
      },
      'Liquidity modified'
    );
    return { callerDelta, feesAccrued: feeDelta };
  }

  swap(
    sender: Address,
    key: PoolKey,
    params: SwapParams,
    hookData: Cell
  ): BalanceDelta {
    this.requireUnlocked('swap');
    if (params.amountSpecified === BigInt(0)) throw new SwapAmountCannotBeZero();
    const id = computePoolId(key);
    const pool = this.writePool(id);
    pool.checkPoolInitialized();

    const hooks = this.hookContext(sender, this.registrationOf(key));
    const { amountToSwap, beforeSwapDelta, lpFeeOverride } = Hooks.beforeSwap(
      hooks,
      key,
      params,
      hookData
    );

    const { swapDelta, amountToProtocol, swapFee } = pool.swap({
      tickSpacing: key.tickSpacing,
      zeroForOne: params.zeroForOne,
      amountSpecified: amountToSwap,
      sqrtPriceLimitX96: params.sqrtPriceLimitX96,
      lpFeeOverride,
    });

    if (amountToProtocol > BigInt(0)) {
      const inputCurrency = params.zeroForOne ? key.currency0 : key.currency1;
      this.accrueProtocolFee(inputCurrency, amountToProtocol);
    }

    const { callerDelta, hookDelta } = Hooks.afterSwap(
      hooks,
      key,
      params,
      swapDelta,
      hookData,
      beforeSwapDelta
    );

    if (!hookDelta.isZero() && key.hooks) {
      this.accountPoolBalanceDelta(key, hookDelta, key.hooks);
    }
    this.accountPoolBalanceDelta(key, callerDelta, sender);

    this.services.logger.debug(
      {
        poolId: id,
        zeroForOne: params.zeroForOne,
        amountSpecified: params.amountSpecified.toString(),
        swapFee,
        callerDelta: callerDelta.toString(),
      },
      'Swap executed'
    );
    return callerDelta;
  }

  donate(
    sender: Address,
    key: PoolKey,
    amount0: bigint,
    amount1: bigint,
    hookData: Cell
  ): BalanceDelta {
    this.requireUnlocked('donate');
    const id = computePoolId(key);
    const pool = this.writePool(id);
    pool.checkPoolInitialized();

    const hooks = this.hookContext(sender, this.registrationOf(key));
    Hooks.beforeDonate(hooks, key, amount0, amount1, hookData);

    const delta = pool.donate(amount0, amount1);
    this.accountPoolBalanceDelta(key, delta, sender);

    Hooks.afterDonate(hooks, key, amount0, amount1, hookData);

    this.services.logger.debug(
      { poolId: id, amount0: amount0.toString(), amount1: amount1.toString() },
      'Donation received'
    );
    return delta;
  }

  updateDynamicLPFee(sender: Address, key: PoolKey, newDynamicLPFee: number): void {
    this.requireOpen('updateDynamicLPFee');
    if (!LPFeeLibrary.isDynamicFee(key.fee) || !key.hooks || !sender.equals(key.hooks)) {
      throw new UnauthorizedDynamicLPFeeUpdate(sender);
    }
    LPFeeLibrary.validate(newDynamicLPFee);
    const id = computePoolId(key);
    this.writePool(id).setLPFee(newDynamicLPFee);
    this.services.logger.debug({ poolId: id, lpFee: newDynamicLPFee }, 'LP fee updated');
  }

  setProtocolFee(key: PoolKey, newProtocolFee: number): void {
    this.requireOpen('setProtocolFee');
    ProtocolFeeLibrary.validate(newProtocolFee);
    const id = computePoolId(key);
    this.writePool(id).setProtocolFee(newProtocolFee);
    this.services.logger.info(
      { poolId: id, protocolFee: newProtocolFee },
      'Protocol fee updated'
    );
  }

  // ========== LEDGER ==========

  sync(currency: Address): void {
    this.requireUnlocked('sync');
    this.ledger.sync(currency, this.services.custody.balanceOf(currency));
  }

  /**
   * Credits `recipient` with what custody received since the last sync.
   * Without a sync nothing was paid.
   */
  settle(recipient: Address): bigint {
    this.requireUnlocked('settle');
    const synced = this.ledger.getSynced();
    if (!synced) return BigInt(0);

    const balance = this.services.custody.balanceOf(synced.currency);
    if (balance < synced.reserves) {
      throw new SyncedReservesDecreased(synced.currency, synced.reserves, balance);
    }
    const paid = balance - synced.reserves;
    this.ledger.resetSync();
    this.ledger.accountDelta(synced.currency, paid, recipient);
    return paid;
  }

  take(sender: Address, currency: Address, to: Address, amount: bigint): void {
    this.requireUnlocked('take');
    this.ledger.accountDelta(currency, -uintToInt128(amount), sender);
    this.services.custody.transfer(currency, to, amount);
  }

  clear(sender: Address, currency: Address, amount: bigint): void {
    this.requireUnlocked('clear');
    const current = this.ledger.currencyDelta(sender, currency);
    const amountDelta = uintToInt128(amount);
    if (current !== amountDelta) {
      throw new MustClearExactPositiveDelta(currency, current, amount);
    }
    this.ledger.accountDelta(currency, -amountDelta, sender);
  }

  mint(sender: Address, to: Address, currency: Address, amount: bigint): void {
    this.requireUnlocked('mint');
    this.ledger.accountDelta(currency, -uintToInt128(amount), sender);
    this.services.claims.mint(to, currency, amount);
  }

  burn(sender: Address, from: Address, currency: Address, amount: bigint): void {
    this.requireUnlocked('burn');
    this.ledger.accountDelta(currency, uintToInt128(amount), sender);
    this.services.claims.burnFrom(sender, from, currency, amount);
  }

  requireUnlocked(operation: string): void {
    this.requireOpen(operation);
    if (!this.unlocked) throw new ManagerLocked(operation);
  }

  /** A closed session rejects everything, locked or not. */
  requireOpen(operation: string): void {
    if (this.closed) throw new ManagerLocked(operation);
  }

  private accountPoolBalanceDelta(
    key: PoolKey,
    delta: BalanceDelta,
    target: Address
  ): void {
    this.ledger.accountDelta(key.currency0, delta.amount0(), target);
    this.ledger.accountDelta(key.currency1, delta.amount1(), target);
  }

  private accrueProtocolFee(currency: Address, amount: bigint): void {
    const key = addressKey(currency);
    this.protocolFees.set(key, (this.protocolFees.get(key) ?? BigInt(0)) + amount);
  }

  private registrationOf(key: PoolKey): HookRegistration | null {
    return key.hooks ? this.services.hooks.resolve(key.hooks) : null;
  }

  private hookContext(
    sender: Address,
    registration: HookRegistration | null
  ): HookCallContext {
    return {
      sender,
      registration,
      contextFor: (actor) => this.context(actor),
    };
  }

  private readPool(id: PoolId): Pool | undefined {
    return this.pools.get(id) ?? this.state.pools.get(id);
  }

  private writePool(id: PoolId): Pool {
    let pool = this.pools.get(id);
    if (!pool) {
      pool = this.state.pools.get(id)?.clone() ?? new Pool(id);
      this.pools.set(id, pool);
    }
    return pool;
  }
}
