import { Address, beginCell } from '@ton/core';
import {
  AlreadyUnlocked,
  ContractUnlocked,
  CurrencyNotSettled,
  InsufficientBalance,
  InvalidCaller,
} from '../errors';
import { Pool } from '../entities/Pool';
import { addressKey } from '../functions/computePoolId';
import { Hook } from '../types/hooks';
import { FeeGrowthGlobals, ManagerContext } from '../types/ManagerContext';
import { PoolId, PoolKey } from '../types/PoolKey';
import { PositionInfo } from '../types/PositionInfo';
import { ClaimsService, Custody } from '../types/services';
import { Slot0 } from '../types/Slot0';
import { NumberedTickInfo, TickInfo } from '../types/TickInfo';
import { createLogger, Logger } from '../utils/logger';
import { FeeGrowthInside } from '../utils/tickLibrary';
import { ClaimsLedger } from './ClaimsLedger';
import { HookRegistration, HookRegistry } from './HookRegistry';
import { InMemoryVault } from './InMemoryVault';
import { EngineState, Session } from './Session';
import { StateView } from './StateView';

/** Address the engine holds custody under unless one is given. */
export const DEFAULT_ENGINE_ADDRESS = new Address(
  0,
  beginCell().storeStringTail('pool-manager').endCell().hash()
);

/**
 * Receives the manager once a session is open. Every operation it performs
 * through the handle is made as `address`.
 */
export interface UnlockCallback<TPayload, TResult> {
  readonly address: Address;
  onUnlocked(manager: ManagerContext, payload: TPayload): TResult;
}

export interface PoolManagerOptions {
  /** Engine identity in custody. */
  address?: Address;
  /** Only this actor may set and collect protocol fees. */
  protocolFeeController?: Address;
  claims?: ClaimsService;
  custody?: Custody;
  /** Registered before the manager is returned. */
  hooks?: Hook[];
  logger?: Logger;
}

/**
 * Singleton pool engine. Holds every pool, runs sessions and answers reads
 * against committed state.
 *
 * @example
 * const manager = new PoolManager({ custody: vault });
 * manager.initialize(deployer, key, Q96);
 * manager.unlock(router, { amount: -1000n });
 */
export class PoolManager {
  public readonly address: Address;
  public readonly claims: ClaimsService;
  public readonly custody: Custody;
  public readonly hooks: HookRegistry;

  private readonly state: EngineState = {
    pools: new Map(),
    protocolFeesAccrued: new Map(),
  };
  private readonly view: StateView;
  private readonly log: Logger;
  private protocolFeeController: Address | null;
  private active: Session | null = null;

  constructor(options: PoolManagerOptions = {}) {
    this.log = createLogger('PoolManager', options.logger);
    this.address = options.address ?? DEFAULT_ENGINE_ADDRESS;
    this.claims = options.claims ?? new ClaimsLedger();
    this.custody = options.custody ?? new InMemoryVault(this.address);
    this.hooks = new HookRegistry(options.logger);
    this.protocolFeeController = options.protocolFeeController ?? null;
    this.view = new StateView(
      (id) => this.state.pools.get(id),
      (currency) =>
        this.state.protocolFeesAccrued.get(addressKey(currency)) ?? BigInt(0)
    );

    for (const hook of options.hooks ?? []) this.hooks.register(hook);
  }

  registerHook(hook: Hook): HookRegistration {
    return this.hooks.register(hook);
  }

  isUnlocked(): boolean {
    return this.active?.isUnlocked() ?? false;
  }

  /**
   * Opens a session, hands it to `caller` and commits everything it did if
   * the ledger nets to zero.
   */
  unlock<TPayload, TResult>(
    caller: UnlockCallback<TPayload, TResult>,
    payload: TPayload
  ): TResult {
    return this.transact(true, (session) => {
      const result = caller.onUnlocked(session.context(caller.address), payload);
      session.throwIfFailed();
      const { nonzeroDeltaCount } = session.ledger;
      if (nonzeroDeltaCount !== 0) throw new CurrencyNotSettled(nonzeroDeltaCount);
      return result;
    });
  }

  /**
   * Initializes a pool in its own transaction. Inside a session use the
   * session handle instead.
   */
  initialize(sender: Address, key: PoolKey, sqrtPriceX96: bigint): number {
    return this.transact(false, (session) =>
      session.run(() => session.initialize(sender, key, sqrtPriceX96))
    );
  }

  updateDynamicLPFee(sender: Address, key: PoolKey, newDynamicLPFee: number): void {
    this.transact(false, (session) =>
      session.run(() => session.updateDynamicLPFee(sender, key, newDynamicLPFee))
    );
  }

  // ========== PROTOCOL FEES ==========

  setProtocolFeeController(sender: Address, controller: Address | null): void {
    this.requireController(sender);
    this.protocolFeeController = controller;
    this.log.info(
      { controller: controller?.toRawString() ?? null },
      'Protocol fee controller updated'
    );
  }

  setProtocolFee(sender: Address, key: PoolKey, newProtocolFee: number): void {
    this.requireController(sender);
    this.transact(false, (session) =>
      session.run(() => session.setProtocolFee(key, newProtocolFee))
    );
  }

  /**
   * Pays accrued protocol fees out of custody. An amount of zero collects
   * everything accrued in `currency`.
   */
  collectProtocolFees(
    sender: Address,
    recipient: Address,
    currency: Address,
    amount: bigint
  ): bigint {
    this.requireController(sender);
    if (this.active) throw new ContractUnlocked('collectProtocolFees');

    const key = addressKey(currency);
    const accrued = this.state.protocolFeesAccrued.get(key) ?? BigInt(0);
    const amountCollected = amount === BigInt(0) ? accrued : amount;
    if (amountCollected > accrued || amountCollected < BigInt(0)) {
      throw new InsufficientBalance(this.address, currency, accrued, amountCollected);
    }

    this.custody.transfer(currency, recipient, amountCollected);
    this.state.protocolFeesAccrued.set(key, accrued - amountCollected);
    this.log.info(
      {
        currency: currency.toRawString(),
        recipient: recipient.toRawString(),
        amount: amountCollected.toString(),
      },
      'Protocol fees collected'
    );
    return amountCollected;
  }

  // ========== READS ==========

  getSlot0(id: PoolId): Slot0 {
    return this.view.getSlot0(id);
  }

  getLiquidity(id: PoolId): bigint {
    return this.view.getLiquidity(id);
  }

  getPositionInfo(
    id: PoolId,
    owner: Address,
    tickLower: number,
    tickUpper: number,
    salt?: bigint
  ): PositionInfo {
    return this.view.getPositionInfo(id, owner, tickLower, tickUpper, salt);
  }

  getTickInfo(id: PoolId, tick: number): TickInfo {
    return this.view.getTickInfo(id, tick);
  }

  getTicks(id: PoolId): NumberedTickInfo[] {
    return this.view.getTicks(id);
  }

  getTickBitmap(id: PoolId, wordPos: number): bigint {
    return this.view.getTickBitmap(id, wordPos);
  }

  getFeeGrowthGlobals(id: PoolId): FeeGrowthGlobals {
    return this.view.getFeeGrowthGlobals(id);
  }

  getFeeGrowthInside(id: PoolId, tickLower: number, tickUpper: number): FeeGrowthInside {
    return this.view.getFeeGrowthInside(id, tickLower, tickUpper);
  }

  protocolFeesAccrued(currency: Address): bigint {
    return this.view.protocolFeesAccrued(currency);
  }

  /**
   * A copy of the committed pool, for quoting.
   */
  getPool(id: PoolId): Pool | undefined {
    return this.state.pools.get(id)?.clone();
  }

  private requireController(sender: Address): void {
    if (!this.protocolFeeController || !sender.equals(this.protocolFeeController)) {
      throw new InvalidCaller(sender);
    }
  }

  private transact<TResult>(
    unlocked: boolean,
    body: (session: Session) => TResult
  ): TResult {
    if (this.active) throw new AlreadyUnlocked();

    const session = new Session(
      this.state,
      {
        hooks: this.hooks,
        claims: this.claims,
        custody: this.custody,
        logger: this.log,
      },
      unlocked
    );
    this.active = session;

    try {
      const result = body(session);
      session.commit();
      return result;
    } catch (error) {
      session.rollback();
      this.log.warn(
        { error: error instanceof Error ? error.name : String(error) },
        'Session aborted'
      );
      throw error;
    } finally {
      session.close();
      this.active = null;
    }
  }
}
