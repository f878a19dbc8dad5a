/**
 * Engine Error Classes
 *
 * Every failure raised by the engine extends PoolManagerError and carries the
 * taxonomy `kind` plus the offending values. A failing operation aborts the
 * whole session it runs in.
 */

import { Address } from '@ton/core';

export type PoolManagerErrorKind =
  | 'session'
  | 'pool'
  | 'swap'
  | 'hook'
  | 'ledger'
  | 'arithmetic'
  | 'fee'
  | 'access';

export abstract class PoolManagerError extends Error {
  abstract readonly kind: PoolManagerErrorKind;

  constructor(message: string) {
    super(message);
    this.name = 'PoolManagerError';
  }
}

// ========== SESSION ==========

/**
 * A session is already open; sessions cannot nest.
 */
export class AlreadyUnlocked extends PoolManagerError {
  readonly kind = 'session';

  constructor() {
    super('A session is already open');
    this.name = 'AlreadyUnlocked';
  }
}

/**
 * The operation needs an open session.
 */
export class ManagerLocked extends PoolManagerError {
  readonly kind = 'session';

  constructor(public readonly operation: string) {
    super(`${operation} requires an open session`);
    this.name = 'ManagerLocked';
  }
}

/**
 * The unlock callback returned with non-zero ledger entries.
 */
export class CurrencyNotSettled extends PoolManagerError {
  readonly kind = 'session';

  constructor(public readonly nonzeroDeltaCount: number) {
    super(`Session closed with ${nonzeroDeltaCount} unsettled ledger entries`);
    this.name = 'CurrencyNotSettled';
  }
}

/**
 * The operation is only allowed while no session is open.
 */
export class ContractUnlocked extends PoolManagerError {
  readonly kind = 'session';

  constructor(public readonly operation: string) {
    super(`${operation} is not allowed while a session is open`);
    this.name = 'ContractUnlocked';
  }
}

// ========== POOL LIFECYCLE ==========

export class PoolAlreadyInitialized extends PoolManagerError {
  readonly kind = 'pool';

  constructor(public readonly poolId: string) {
    super(`Pool ${poolId} is already initialized`);
    this.name = 'PoolAlreadyInitialized';
  }
}

export class PoolNotInitialized extends PoolManagerError {
  readonly kind = 'pool';

  constructor(public readonly poolId: string) {
    super(`Pool ${poolId} is not initialized`);
    this.name = 'PoolNotInitialized';
  }
}

export class CurrenciesOutOfOrderOrEqual extends PoolManagerError {
  readonly kind = 'pool';

  constructor(
    public readonly currency0: Address,
    public readonly currency1: Address
  ) {
    super(
      `Currencies must be strictly ordered: ${currency0.toRawString()} >= ${currency1.toRawString()}`
    );
    this.name = 'CurrenciesOutOfOrderOrEqual';
  }
}

export class TickSpacingTooLarge extends PoolManagerError {
  readonly kind = 'pool';

  constructor(public readonly tickSpacing: number) {
    super(`Tick spacing ${tickSpacing} is too large`);
    this.name = 'TickSpacingTooLarge';
  }
}

export class TickSpacingTooSmall extends PoolManagerError {
  readonly kind = 'pool';

  constructor(public readonly tickSpacing: number) {
    super(`Tick spacing ${tickSpacing} is too small`);
    this.name = 'TickSpacingTooSmall';
  }
}

export class TicksMisordered extends PoolManagerError {
  readonly kind = 'pool';

  constructor(
    public readonly tickLower: number,
    public readonly tickUpper: number
  ) {
    super(`tickLower ${tickLower} must be below tickUpper ${tickUpper}`);
    this.name = 'TicksMisordered';
  }
}

export class TickLowerOutOfBounds extends PoolManagerError {
  readonly kind = 'pool';

  constructor(public readonly tickLower: number) {
    super(`tickLower ${tickLower} is below the minimum tick`);
    this.name = 'TickLowerOutOfBounds';
  }
}

export class TickUpperOutOfBounds extends PoolManagerError {
  readonly kind = 'pool';

  constructor(public readonly tickUpper: number) {
    super(`tickUpper ${tickUpper} is above the maximum tick`);
    this.name = 'TickUpperOutOfBounds';
  }
}

export class TickMisaligned extends PoolManagerError {
  readonly kind = 'pool';

  constructor(
    public readonly tick: number,
    public readonly tickSpacing: number
  ) {
    super(`Tick ${tick} is not a multiple of tick spacing ${tickSpacing}`);
    this.name = 'TickMisaligned';
  }
}

export class TickLiquidityOverflow extends PoolManagerError {
  readonly kind = 'pool';

  constructor(public readonly tick: number) {
    super(`Gross liquidity at tick ${tick} exceeds the per-tick maximum`);
    this.name = 'TickLiquidityOverflow';
  }
}

export class InvalidTick extends PoolManagerError {
  readonly kind = 'pool';

  constructor(public readonly tick: number) {
    super(`Tick ${tick} is out of range`);
    this.name = 'InvalidTick';
  }
}

export class InvalidSqrtPrice extends PoolManagerError {
  readonly kind = 'pool';

  constructor(public readonly sqrtPriceX96: bigint) {
    super(`Sqrt price ${sqrtPriceX96} is out of range`);
    this.name = 'InvalidSqrtPrice';
  }
}

export class NoLiquidityToReceiveFees extends PoolManagerError {
  readonly kind = 'pool';

  constructor(public readonly poolId: string) {
    super(`Pool ${poolId} has no active liquidity to receive a donation`);
    this.name = 'NoLiquidityToReceiveFees';
  }
}

export class CannotUpdateEmptyPosition extends PoolManagerError {
  readonly kind = 'pool';

  constructor() {
    super('Cannot poke a position with zero liquidity');
    this.name = 'CannotUpdateEmptyPosition';
  }
}

// ========== SWAP ==========

export class SwapAmountCannotBeZero extends PoolManagerError {
  readonly kind = 'swap';

  constructor() {
    super('Swap amount cannot be zero');
    this.name = 'SwapAmountCannotBeZero';
  }
}

export class PriceLimitAlreadyExceeded extends PoolManagerError {
  readonly kind = 'swap';

  constructor(
    public readonly sqrtPriceCurrentX96: bigint,
    public readonly sqrtPriceLimitX96: bigint
  ) {
    super(
      `Price limit ${sqrtPriceLimitX96} is already exceeded by the current price ${sqrtPriceCurrentX96}`
    );
    this.name = 'PriceLimitAlreadyExceeded';
  }
}

export class PriceLimitOutOfBounds extends PoolManagerError {
  readonly kind = 'swap';

  constructor(public readonly sqrtPriceLimitX96: bigint) {
    super(`Price limit ${sqrtPriceLimitX96} is out of bounds`);
    this.name = 'PriceLimitOutOfBounds';
  }
}

export class InvalidFeeForExactOut extends PoolManagerError {
  readonly kind = 'swap';

  constructor(public readonly swapFee: number) {
    super(`Exact output swaps cannot use a ${swapFee} pips fee`);
    this.name = 'InvalidFeeForExactOut';
  }
}

export class NotEnoughLiquidity extends PoolManagerError {
  readonly kind = 'swap';

  constructor() {
    super('Not enough liquidity to produce the requested output');
    this.name = 'NotEnoughLiquidity';
  }
}

export class PriceOverflow extends PoolManagerError {
  readonly kind = 'swap';

  constructor() {
    super('Next sqrt price overflows');
    this.name = 'PriceOverflow';
  }
}

export class InvalidPriceOrLiquidity extends PoolManagerError {
  readonly kind = 'swap';

  constructor() {
    super('Sqrt price and liquidity must both be positive');
    this.name = 'InvalidPriceOrLiquidity';
  }
}

// ========== HOOKS ==========

export class InvalidHookResponse extends PoolManagerError {
  readonly kind = 'hook';

  constructor(
    public readonly hook: Address,
    public readonly expected: string,
    public readonly received: unknown
  ) {
    super(
      `Hook ${hook.toRawString()} acknowledged ${String(received)} instead of ${expected}`
    );
    this.name = 'InvalidHookResponse';
  }
}

export class HookAddressNotValid extends PoolManagerError {
  readonly kind = 'hook';

  constructor(public readonly hook: Address | null) {
    super(`Hook address ${hook?.toRawString() ?? 'none'} is not valid for this pool`);
    this.name = 'HookAddressNotValid';
  }
}

export class HookNotImplemented extends PoolManagerError {
  readonly kind = 'hook';

  constructor(
    public readonly hook: Address,
    public readonly callback: string
  ) {
    super(`Hook ${hook.toRawString()} declares ${callback} but does not implement it`);
    this.name = 'HookNotImplemented';
  }
}

export class HookAlreadyRegistered extends PoolManagerError {
  readonly kind = 'hook';

  constructor(public readonly hook: Address) {
    super(`Hook ${hook.toRawString()} is already registered`);
    this.name = 'HookAlreadyRegistered';
  }
}

export class HookNotRegistered extends PoolManagerError {
  readonly kind = 'hook';

  constructor(public readonly hook: Address) {
    super(`Hook ${hook.toRawString()} is not registered`);
    this.name = 'HookNotRegistered';
  }
}

export class HookDeltaExceedsSwapAmount extends PoolManagerError {
  readonly kind = 'hook';

  constructor(
    public readonly amountSpecified: bigint,
    public readonly amountToSwap: bigint
  ) {
    super(
      `Hook delta turns a swap of ${amountSpecified} into ${amountToSwap}`
    );
    this.name = 'HookDeltaExceedsSwapAmount';
  }
}

export class UnauthorizedDynamicLPFeeUpdate extends PoolManagerError {
  readonly kind = 'hook';

  constructor(public readonly sender: Address) {
    super(`${sender.toRawString()} cannot update the LP fee of this pool`);
    this.name = 'UnauthorizedDynamicLPFeeUpdate';
  }
}

// ========== LEDGER ==========

export class MustClearExactPositiveDelta extends PoolManagerError {
  readonly kind = 'ledger';

  constructor(
    public readonly currency: Address,
    public readonly delta: bigint,
    public readonly amount: bigint
  ) {
    super(
      `Cannot clear ${amount} of ${currency.toRawString()}: current delta is ${delta}`
    );
    this.name = 'MustClearExactPositiveDelta';
  }
}

/**
 * Custody holds less of the synced currency than it did at the sync.
 */
export class SyncedReservesDecreased extends PoolManagerError {
  readonly kind = 'ledger';

  constructor(
    public readonly currency: Address,
    public readonly reserves: bigint,
    public readonly balance: bigint
  ) {
    super(
      `Custody of ${currency.toRawString()} fell from ${reserves} to ${balance} since the sync`
    );
    this.name = 'SyncedReservesDecreased';
  }
}

export class InsufficientBalance extends PoolManagerError {
  readonly kind = 'ledger';

  constructor(
    public readonly owner: Address,
    public readonly currency: Address,
    public readonly balance: bigint,
    public readonly needed: bigint
  ) {
    super(
      `${owner.toRawString()} holds ${balance} of ${currency.toRawString()}, needs ${needed}`
    );
    this.name = 'InsufficientBalance';
  }
}

export class InsufficientPermission extends PoolManagerError {
  readonly kind = 'ledger';

  constructor(
    public readonly owner: Address,
    public readonly spender: Address,
    public readonly currency: Address
  ) {
    super(
      `${spender.toRawString()} may not move ${currency.toRawString()} of ${owner.toRawString()}`
    );
    this.name = 'InsufficientPermission';
  }
}

// ========== ARITHMETIC ==========

export class SafeCastOverflow extends PoolManagerError {
  readonly kind = 'arithmetic';

  constructor(
    public readonly value: bigint,
    public readonly type: string
  ) {
    super(`${value} does not fit in ${type}`);
    this.name = 'SafeCastOverflow';
  }
}

export class LiquidityUnderflow extends PoolManagerError {
  readonly kind = 'arithmetic';

  constructor(
    public readonly liquidity: bigint,
    public readonly delta: bigint
  ) {
    super(`Removing ${-delta} from liquidity ${liquidity} underflows`);
    this.name = 'LiquidityUnderflow';
  }
}

export class LiquidityOverflow extends PoolManagerError {
  readonly kind = 'arithmetic';

  constructor(
    public readonly liquidity: bigint,
    public readonly delta: bigint
  ) {
    super(`Adding ${delta} to liquidity ${liquidity} overflows`);
    this.name = 'LiquidityOverflow';
  }
}

export class MulDivOverflow extends PoolManagerError {
  readonly kind = 'arithmetic';

  constructor(
    public readonly a: bigint,
    public readonly b: bigint,
    public readonly denominator: bigint
  ) {
    super(`mulDiv(${a}, ${b}, ${denominator}) does not fit in 256 bits`);
    this.name = 'MulDivOverflow';
  }
}

// ========== FEES ==========

export class LPFeeTooLarge extends PoolManagerError {
  readonly kind = 'fee';

  constructor(public readonly fee: number) {
    super(`LP fee ${fee} exceeds the maximum`);
    this.name = 'LPFeeTooLarge';
  }
}

export class ProtocolFeeTooLarge extends PoolManagerError {
  readonly kind = 'fee';

  constructor(public readonly fee: number) {
    super(`Protocol fee ${fee} exceeds the maximum`);
    this.name = 'ProtocolFeeTooLarge';
  }
}

// ========== ACCESS ==========

export class InvalidCaller extends PoolManagerError {
  readonly kind = 'access';

  constructor(public readonly sender: Address) {
    super(`${sender.toRawString()} is not allowed to call this`);
    this.name = 'InvalidCaller';
  }
}
