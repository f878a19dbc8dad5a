import { Address } from '@ton/core';
import { describe, expect, it } from 'vitest';
import { MaxUint256 } from '../constants';
import { InsufficientBalance, InsufficientPermission, SafeCastOverflow } from '../errors';
import { ALICE, BOB, CONTROLLER, TOKEN_0, TOKEN_1 } from '../test/fixtures';
import { ClaimsLedger } from './ClaimsLedger';

describe('ClaimsLedger', () => {
  it('should derive the token id from the asset hash', () => {
    expect(ClaimsLedger.toId(TOKEN_1)).toBe(BigInt('0x' + '02'.repeat(32)));
  });

  it('should mint and transfer balances', () => {
    const claims = new ClaimsLedger();
    claims.mint(ALICE, TOKEN_0, 100n);
    claims.transfer(ALICE, BOB, TOKEN_0, 30n);

    expect(claims.balanceOf(ALICE, TOKEN_0)).toBe(70n);
    expect(claims.balanceOf(BOB, TOKEN_0)).toBe(30n);
    expect(claims.balanceOf(BOB, TOKEN_1)).toBe(0n);
  });

  it('should not move more than the balance', () => {
    const claims = new ClaimsLedger();
    claims.mint(ALICE, TOKEN_0, 10n);

    expect(() => claims.transfer(ALICE, BOB, TOKEN_0, 11n)).toThrow(InsufficientBalance);
    expect(() => claims.burn(ALICE, TOKEN_0, 11n)).toThrow(InsufficientBalance);
  });

  it('should reject negative amounts', () => {
    const claims = new ClaimsLedger();
    claims.mint(ALICE, TOKEN_0, 100n);
    claims.setOperator(ALICE, BOB, true);

    expect(() => claims.mint(BOB, TOKEN_0, -1n)).toThrow(SafeCastOverflow);
    expect(() => claims.burn(ALICE, TOKEN_0, -1n)).toThrow(SafeCastOverflow);
    expect(() => claims.transfer(BOB, ALICE, TOKEN_0, -100n)).toThrow(SafeCastOverflow);
    expect(() => claims.transferFrom(BOB, ALICE, BOB, TOKEN_0, -1n)).toThrow(
      SafeCastOverflow
    );
    expect(() => claims.burnFrom(BOB, ALICE, TOKEN_0, -1n)).toThrow(SafeCastOverflow);
    expect(() => claims.approve(ALICE, BOB, TOKEN_0, -1n)).toThrow(SafeCastOverflow);

    expect(claims.balanceOf(ALICE, TOKEN_0)).toBe(100n);
    expect(claims.balanceOf(BOB, TOKEN_0)).toBe(0n);
  });

  it('should keep assets on different workchains apart', () => {
    const masterchainToken = new Address(-1, TOKEN_0.hash);
    const claims = new ClaimsLedger();
    claims.mint(ALICE, TOKEN_0, 100n);
    claims.approve(ALICE, BOB, TOKEN_0, 10n);

    expect(ClaimsLedger.toId(masterchainToken)).toBe(ClaimsLedger.toId(TOKEN_0));
    expect(claims.balanceOf(ALICE, masterchainToken)).toBe(0n);
    expect(claims.allowance(ALICE, BOB, masterchainToken)).toBe(0n);
    expect(() => claims.burn(ALICE, masterchainToken, 1n)).toThrow(InsufficientBalance);
  });

  it('should spend a finite allowance', () => {
    const claims = new ClaimsLedger();
    claims.mint(ALICE, TOKEN_0, 100n);
    claims.approve(ALICE, BOB, TOKEN_0, 50n);

    claims.transferFrom(BOB, ALICE, CONTROLLER, TOKEN_0, 20n);

    expect(claims.allowance(ALICE, BOB, TOKEN_0)).toBe(30n);
    expect(claims.balanceOf(CONTROLLER, TOKEN_0)).toBe(20n);
    expect(() => claims.transferFrom(BOB, ALICE, BOB, TOKEN_0, 31n)).toThrow(
      InsufficientPermission
    );
  });

  it('should never spend an infinite allowance', () => {
    const claims = new ClaimsLedger();
    claims.mint(ALICE, TOKEN_0, 100n);
    claims.approve(ALICE, BOB, TOKEN_0, MaxUint256);

    claims.burnFrom(BOB, ALICE, TOKEN_0, 60n);

    expect(claims.allowance(ALICE, BOB, TOKEN_0)).toBe(MaxUint256);
    expect(claims.balanceOf(ALICE, TOKEN_0)).toBe(40n);
  });

  it('should let an operator move any token without allowance', () => {
    const claims = new ClaimsLedger();
    claims.mint(ALICE, TOKEN_1, 100n);
    claims.setOperator(ALICE, BOB, true);

    claims.transferFrom(BOB, ALICE, BOB, TOKEN_1, 100n);
    expect(claims.balanceOf(BOB, TOKEN_1)).toBe(100n);
    expect(claims.allowance(ALICE, BOB, TOKEN_1)).toBe(0n);

    claims.setOperator(ALICE, BOB, false);
    expect(claims.isOperator(ALICE, BOB)).toBe(false);
  });

  it('should let the owner burn its own claims', () => {
    const claims = new ClaimsLedger();
    claims.mint(ALICE, TOKEN_0, 5n);
    claims.burnFrom(ALICE, ALICE, TOKEN_0, 5n);
    expect(claims.balanceOf(ALICE, TOKEN_0)).toBe(0n);
  });

  it('should restore balances, allowances and operators from a checkpoint', () => {
    const claims = new ClaimsLedger();
    claims.mint(ALICE, TOKEN_0, 100n);
    const restore = claims.checkpoint();

    claims.mint(ALICE, TOKEN_0, 1n);
    claims.approve(ALICE, BOB, TOKEN_0, 7n);
    claims.setOperator(ALICE, CONTROLLER, true);
    restore();

    expect(claims.balanceOf(ALICE, TOKEN_0)).toBe(100n);
    expect(claims.allowance(ALICE, BOB, TOKEN_0)).toBe(0n);
    expect(claims.isOperator(ALICE, CONTROLLER)).toBe(false);
  });
});
