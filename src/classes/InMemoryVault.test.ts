import { describe, expect, it } from 'vitest';
import { InsufficientBalance, SafeCastOverflow } from '../errors';
import { ALICE, BOB, testAddress, TOKEN_0, TOKEN_1 } from '../test/fixtures';
import { InMemoryVault } from './InMemoryVault';

describe('InMemoryVault', () => {
  const engineAddress = testAddress(0xee);

  it('should move balances between holders', () => {
    const vault = new InMemoryVault(engineAddress);
    vault.deposit(ALICE, TOKEN_0, 100n);
    vault.transferFrom(ALICE, engineAddress, TOKEN_0, 60n);
    vault.transfer(TOKEN_0, BOB, 25n);

    expect(vault.balanceOfHolder(ALICE, TOKEN_0)).toBe(40n);
    expect(vault.balanceOf(TOKEN_0)).toBe(35n);
    expect(vault.balanceOfHolder(BOB, TOKEN_0)).toBe(25n);
    expect(vault.balanceOf(TOKEN_1)).toBe(0n);
  });

  it('should not move more than the holder has', () => {
    const vault = new InMemoryVault(engineAddress);
    vault.deposit(ALICE, TOKEN_0, 10n);

    expect(() => vault.transferFrom(ALICE, BOB, TOKEN_0, 11n)).toThrow(InsufficientBalance);
    expect(() => vault.transfer(TOKEN_0, BOB, 1n)).toThrow(InsufficientBalance);
  });

  it('should reject negative amounts', () => {
    const vault = new InMemoryVault(engineAddress);
    vault.deposit(ALICE, TOKEN_0, 10n);

    expect(() => vault.deposit(BOB, TOKEN_0, -1n)).toThrow(SafeCastOverflow);
    expect(() => vault.transferFrom(BOB, ALICE, TOKEN_0, -10n)).toThrow(SafeCastOverflow);
    expect(() => vault.transfer(TOKEN_0, ALICE, -1n)).toThrow(SafeCastOverflow);

    expect(vault.balanceOfHolder(ALICE, TOKEN_0)).toBe(10n);
    expect(vault.balanceOfHolder(BOB, TOKEN_0)).toBe(0n);
    expect(vault.balanceOf(TOKEN_0)).toBe(0n);
  });

  it('should restore balances from a checkpoint', () => {
    const vault = new InMemoryVault(engineAddress);
    vault.deposit(ALICE, TOKEN_0, 10n);
    const restore = vault.checkpoint();

    vault.transferFrom(ALICE, BOB, TOKEN_0, 10n);
    restore();

    expect(vault.balanceOfHolder(ALICE, TOKEN_0)).toBe(10n);
    expect(vault.balanceOfHolder(BOB, TOKEN_0)).toBe(0n);
  });
});
