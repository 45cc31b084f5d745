import { ethers } from 'ethers';
import { LedgerError, LedgerErrorCode } from '../model/Errors';
import logger from '../utils/Logger';
import { assertAmount, isNullAddress, toAddress } from '../utils/TokenUtils';
import { Authorizer, CoreRoles, requireRole } from './Authorization';
import { BalanceHook, BalanceHost } from './Collaborators';
import { LedgerStore, StagedCell, StagedTable } from './LedgerStore';

function allowanceKey(owner: string, spender: string) {
  return `${owner}|${spender}`;
}

/**
 * Governance balance the gauge weights and delegations are bounded by.
 *
 * Hooks run inside the same transaction as the balance change, before it:
 * a hook that throws cancels the transfer, burn or loss settlement.
 */
export class GovernanceToken implements BalanceHost {
  private readonly store: LedgerStore;
  private readonly authorizer: Authorizer;
  private readonly balances: StagedTable<string, bigint>;
  private readonly allowances: StagedTable<string, bigint>;
  private readonly supply: StagedCell<bigint>;
  private readonly transferableCell: StagedCell<boolean>;
  private readonly hooks: BalanceHook[] = [];

  constructor(store: LedgerStore, authorizer: Authorizer, transferable: boolean) {
    this.store = store;
    this.authorizer = authorizer;
    this.balances = store.table('balances');
    this.allowances = store.table('allowances');
    this.supply = store.cell('totalSupply', 0n);
    this.transferableCell = store.cell('transferable', transferable);
  }

  registerHook(hook: BalanceHook) {
    this.hooks.push(hook);
  }

  balanceOf(user: string): bigint {
    return this.balances.getOr(toAddress(user), 0n);
  }

  totalSupply(): bigint {
    return this.supply.get();
  }

  allowance(owner: string, spender: string): bigint {
    return this.allowances.getOr(allowanceKey(toAddress(owner), toAddress(spender)), 0n);
  }

  transferable(): boolean {
    return this.transferableCell.get();
  }

  mint(caller: string, to: string, amount: bigint) {
    this.store.transact(() => {
      requireRole(this.authorizer, CoreRoles.TOKEN_MINTER, caller, 'GovernanceToken');
      assertAmount(amount, 'GovernanceToken.mint');
      const t = toAddress(to);
      if (isNullAddress(t)) {
        throw new LedgerError(LedgerErrorCode.InvalidAddress, 'GovernanceToken: mint to the null address');
      }
      this.balances.set(t, this.balanceOf(t) + amount);
      this.supply.set(this.supply.get() + amount);
      this.store.emit({ name: 'Transfer', from: ethers.ZeroAddress, to: t, value: amount });
      logger.debug(`GovernanceToken: minted ${amount} to ${t}`);
    });
  }

  burn(user: string, amount: bigint) {
    this.store.transact(() => {
      assertAmount(amount, 'GovernanceToken.burn');
      this.burnFrom(toAddress(user), amount);
    });
  }

  burnForLoss(user: string, amount: bigint) {
    this.store.transact(() => {
      assertAmount(amount, 'GovernanceToken.burnForLoss');
      this.burnFrom(toAddress(user), amount);
    });
  }

  transfer(from: string, to: string, amount: bigint) {
    this.store.transact(() => {
      this.move(toAddress(from), toAddress(to), amount);
    });
  }

  transferFrom(spender: string, from: string, to: string, amount: bigint) {
    this.store.transact(() => {
      const s = toAddress(spender);
      const f = toAddress(from);
      const key = allowanceKey(f, s);
      const allowed = this.allowances.getOr(key, 0n);
      if (allowed < amount) {
        throw new LedgerError(
          LedgerErrorCode.InsufficientAllowance,
          `GovernanceToken: ${s} may move ${allowed} of ${f}, not ${amount}`
        );
      }
      if (allowed != ethers.MaxUint256) {
        this.allowances.set(key, allowed - amount);
      }
      this.move(f, toAddress(to), amount);
    });
  }

  approve(owner: string, spender: string, amount: bigint) {
    this.store.transact(() => {
      assertAmount(amount, 'GovernanceToken.approve');
      const o = toAddress(owner);
      const s = toAddress(spender);
      this.allowances.set(allowanceKey(o, s), amount);
      this.store.emit({ name: 'Approval', owner: o, spender: s, value: amount });
    });
  }

  enableTransfer(caller: string) {
    this.store.transact(() => {
      requireRole(this.authorizer, CoreRoles.GOVERNOR, caller, 'GovernanceToken');
      this.transferableCell.set(true);
      this.store.emit({ name: 'TransferEnabled' });
    });
  }

  private move(from: string, to: string, amount: bigint) {
    assertAmount(amount, 'GovernanceToken.transfer');
    if (!this.transferable()) {
      throw new LedgerError(LedgerErrorCode.NotTransferable, 'GovernanceToken: transfers are not enabled');
    }
    if (isNullAddress(to)) {
      throw new LedgerError(LedgerErrorCode.InvalidAddress, 'GovernanceToken: transfer to the null address');
    }
    for (const hook of this.hooks) {
      hook.beforeTransfer?.(from, to, amount);
    }
    this.decreaseBalance(from, amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    this.store.emit({ name: 'Transfer', from, to, value: amount });
  }

  private burnFrom(user: string, amount: bigint) {
    this.decreaseBalance(user, amount);
    this.supply.set(this.supply.get() - amount);
    this.store.emit({ name: 'Transfer', from: user, to: ethers.ZeroAddress, value: amount });
    logger.debug(`GovernanceToken: burnt ${amount} from ${user}`);
  }

  private decreaseBalance(user: string, amount: bigint) {
    const balance = this.balanceOf(user);
    if (balance < amount) {
      throw new LedgerError(
        LedgerErrorCode.InsufficientBalance,
        `GovernanceToken: ${user} has ${balance}, cannot spend ${amount}`
      );
    }
    const nextBalance = balance - amount;
    for (const hook of this.hooks) {
      hook.beforeBalanceDecrease?.(user, nextBalance);
    }
    this.balances.set(user, nextBalance);
  }
}
