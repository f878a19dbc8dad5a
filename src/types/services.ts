import { Address } from '@ton/core';

/** Restores a service to the state it had when the checkpoint was taken. */
export type Rollback = () => void;

/**
 * A collaborator whose changes can be undone when a session aborts.
 */
export interface Checkpointable {
  checkpoint(): Rollback;
}

export function isCheckpointable(service: object): service is Checkpointable {
  return 'checkpoint' in service && typeof service.checkpoint === 'function';
}

/**
 * Multi-token claim balances, keyed by (owner, currency).
 */
export interface ClaimsService {
  balanceOf(owner: Address, currency: Address): bigint;
  mint(to: Address, currency: Address, amount: bigint): void;
  /** Burns `from`'s claim; a spender other than `from` needs an allowance or operator approval. */
  burnFrom(spender: Address, from: Address, currency: Address, amount: bigint): void;
}

/**
 * The engine's external holdings.
 */
export interface Custody {
  /** Amount of `currency` the engine holds. */
  balanceOf(currency: Address): bigint;
  /** Pays `amount` of `currency` out of the engine to `to`. */
  transfer(currency: Address, to: Address, amount: bigint): void;
}
