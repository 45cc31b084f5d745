import { ethers } from 'ethers';
import { beforeEach, describe, expect, it } from 'vitest';
import { LedgerErrorCode } from '../model/Errors';
import { LedgerEvent } from '../model/LedgerEvents';
import { GaugeSystem } from './GaugeSystem';
import { ALICE, BOB, CAROL, GOVERNOR, MINTER, catchError, createTestSystem, fund } from './TestFixtures';

describe('GovernanceToken', () => {
  let system: GaugeSystem;
  let events: LedgerEvent[];

  beforeEach(() => {
    ({ system } = createTestSystem());
    events = [];
    system.store.subscribe((committed) => events.push(...committed));
  });

  it('mints with the minter role', () => {
    system.token.mint(MINTER, ALICE, 100n);

    expect(system.token.balanceOf(ALICE)).toBe(100n);
    expect(system.token.totalSupply()).toBe(100n);
    expect(events).toEqual([{ name: 'Transfer', from: ethers.ZeroAddress, to: ALICE, value: 100n }]);
    expect(catchError(() => system.token.mint(ALICE, ALICE, 1n))).toMatchObject({
      code: LedgerErrorCode.Unauthorized
    });
    expect(catchError(() => system.token.mint(MINTER, ethers.ZeroAddress, 1n))).toMatchObject({
      code: LedgerErrorCode.InvalidAddress
    });
  });

  it('burns from the holder', () => {
    fund(system, ALICE, 100n);
    system.token.burn(ALICE, 30n);

    expect(system.token.balanceOf(ALICE)).toBe(70n);
    expect(system.token.totalSupply()).toBe(70n);
    expect(catchError(() => system.token.burn(ALICE, 71n))).toMatchObject({
      code: LedgerErrorCode.InsufficientBalance
    });
  });

  it('transfers between holders', () => {
    fund(system, ALICE, 100n);
    system.token.transfer(ALICE, BOB, 40n);

    expect(system.token.balanceOf(ALICE)).toBe(60n);
    expect(system.token.balanceOf(BOB)).toBe(40n);
    expect(system.token.totalSupply()).toBe(100n);
    expect(catchError(() => system.token.transfer(ALICE, BOB, 61n))).toMatchObject({
      code: LedgerErrorCode.InsufficientBalance
    });
    expect(catchError(() => system.token.transfer(ALICE, ethers.ZeroAddress, 1n))).toMatchObject({
      code: LedgerErrorCode.InvalidAddress
    });
  });

  it('spends allowances on transferFrom', () => {
    fund(system, ALICE, 100n);
    system.token.approve(ALICE, BOB, 50n);
    expect(system.token.allowance(ALICE, BOB)).toBe(50n);

    system.token.transferFrom(BOB, ALICE, CAROL, 20n);
    expect(system.token.allowance(ALICE, BOB)).toBe(30n);
    expect(system.token.balanceOf(CAROL)).toBe(20n);

    expect(catchError(() => system.token.transferFrom(BOB, ALICE, CAROL, 31n))).toMatchObject({
      code: LedgerErrorCode.InsufficientAllowance
    });
    expect(system.token.allowance(ALICE, BOB)).toBe(30n);
  });

  it('never spends an infinite allowance', () => {
    fund(system, ALICE, 100n);
    system.token.approve(ALICE, BOB, ethers.MaxUint256);
    system.token.transferFrom(BOB, ALICE, CAROL, 20n);
    expect(system.token.allowance(ALICE, BOB)).toBe(ethers.MaxUint256);
  });

  it('starts non transferable unless configured otherwise', () => {
    ({ system } = createTestSystem({ transferable: false }));
    fund(system, ALICE, 100n);

    expect(system.token.transferable()).toBe(false);
    expect(catchError(() => system.token.transfer(ALICE, BOB, 1n))).toMatchObject({
      code: LedgerErrorCode.NotTransferable
    });
    // burns stay possible
    system.token.burn(ALICE, 1n);

    expect(catchError(() => system.token.enableTransfer(ALICE))).toMatchObject({
      code: LedgerErrorCode.Unauthorized
    });
    system.token.enableTransfer(GOVERNOR);
    system.token.transfer(ALICE, BOB, 1n);
    expect(system.token.balanceOf(BOB)).toBe(1n);
  });

  it('runs balance hooks before the balance changes', () => {
    fund(system, ALICE, 100n);
    const seen: bigint[] = [];
    system.token.registerHook({
      beforeBalanceDecrease: (user, nextBalance) => {
        seen.push(system.token.balanceOf(user), nextBalance);
      }
    });
    system.token.transfer(ALICE, BOB, 40n);
    expect(seen).toEqual([100n, 60n]);
  });

  it('cancels the change when a hook throws', () => {
    fund(system, ALICE, 100n);
    system.token.registerHook({
      beforeTransfer: () => {
        throw new Error('hook refused');
      }
    });
    expect(() => system.token.transfer(ALICE, BOB, 40n)).toThrow('hook refused');
    expect(system.token.balanceOf(ALICE)).toBe(100n);
  });
});
