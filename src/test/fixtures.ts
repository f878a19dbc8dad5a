import { Address } from '@ton/core';
import { DEFAULT_TICK_SPACING } from '../constants';
import { InMemoryVault } from '../classes/InMemoryVault';
import { PoolManager, UnlockCallback } from '../classes/PoolManager';
import { Hook, HookPermissions } from '../types/hooks';
import { ManagerContext } from '../types/ManagerContext';
import { PoolKey } from '../types/PoolKey';
import { encodePermissions } from '../utils/hookPermissions';

/** Address whose account hash is 32 copies of `fill`. */
export function testAddress(fill: number): Address {
  return new Address(0, Buffer.alloc(32, fill));
}

/** Address carrying `flags` in the low 14 bits of its hash. */
export function hookAddress(flags: number, fill = 0x77): Address {
  const hash = Buffer.alloc(32, fill);
  hash[30] = (flags >> 8) & 0x3f;
  hash[31] = flags & 0xff;
  return new Address(0, hash);
}

export const TOKEN_0 = testAddress(0x01);
export const TOKEN_1 = testAddress(0x02);
export const ALICE = testAddress(0xa1);
export const BOB = testAddress(0xb0);
export const CONTROLLER = testAddress(0xc0);

export function permissions(enabled: Partial<HookPermissions> = {}): HookPermissions {
  return {
    beforeInitialize: false,
    afterInitialize: false,
    beforeAddLiquidity: false,
    afterAddLiquidity: false,
    beforeRemoveLiquidity: false,
    afterRemoveLiquidity: false,
    beforeSwap: false,
    afterSwap: false,
    beforeDonate: false,
    afterDonate: false,
    beforeSwapReturnDelta: false,
    afterSwapReturnDelta: false,
    afterAddLiquidityReturnDelta: false,
    afterRemoveLiquidityReturnDelta: false,
    ...enabled,
  };
}

/**
 * A hook at an address matching `enabled`, with the given callbacks.
 */
export function makeHook(
  enabled: Partial<HookPermissions>,
  callbacks: Omit<Hook, 'address' | 'getHookPermissions'> = {}
): Hook {
  const declared = permissions(enabled);
  return {
    ...callbacks,
    address: hookAddress(encodePermissions(declared)),
    getHookPermissions: () => declared,
  };
}

export interface TestEngine {
  manager: PoolManager;
  vault: InMemoryVault;
}

export function createEngine(hooks: Hook[] = []): TestEngine {
  const vault = new InMemoryVault(testAddress(0xee));
  const manager = new PoolManager({
    address: vault.engine,
    custody: vault,
    protocolFeeController: CONTROLLER,
    hooks,
  });
  for (const actor of [ALICE, BOB]) {
    vault.deposit(actor, TOKEN_0, 10n ** 24n);
    vault.deposit(actor, TOKEN_1, 10n ** 24n);
  }
  return { manager, vault };
}

export function poolKey(
  fee = 3000,
  tickSpacing = DEFAULT_TICK_SPACING,
  hooks: Address | null = null
): PoolKey {
  return { currency0: TOKEN_0, currency1: TOKEN_1, fee, tickSpacing, hooks };
}

/**
 * Opens a session as `actor` and runs `body` inside it.
 */
export function runSession<R>(
  manager: PoolManager,
  actor: Address,
  body: (session: ManagerContext) => R
): R {
  const caller: UnlockCallback<(session: ManagerContext) => R, R> = {
    address: actor,
    onUnlocked: (session, run) => run(session),
  };
  return manager.unlock(caller, body);
}

/**
 * Pays what `session.sender` owes in `currency` and takes what it is owed.
 */
export function settleCurrency(
  session: ManagerContext,
  vault: InMemoryVault,
  currency: Address
): void {
  const actor = session.sender;
  const delta = session.currencyDelta(actor, currency);
  if (delta < 0n) {
    session.sync(currency);
    vault.transferFrom(actor, vault.engine, currency, -delta);
    session.settle();
  } else if (delta > 0n) {
    session.take(currency, actor, delta);
  }
}

export function settlePool(
  session: ManagerContext,
  vault: InMemoryVault,
  key: PoolKey
): void {
  settleCurrency(session, vault, key.currency0);
  settleCurrency(session, vault, key.currency1);
}

/**
 * Adds `liquidity` over [tickLower, tickUpper] as `actor` and settles it.
 */
export function addLiquidity(
  engine: TestEngine,
  actor: Address,
  key: PoolKey,
  tickLower: number,
  tickUpper: number,
  liquidity: bigint
): void {
  runSession(engine.manager, actor, (session) => {
    session.modifyLiquidity(key, { tickLower, tickUpper, liquidityDelta: liquidity });
    settlePool(session, engine.vault, key);
  });
}
