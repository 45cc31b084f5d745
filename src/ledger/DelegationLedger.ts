import { LedgerError, LedgerErrorCode } from '../model/Errors';
import logger from '../utils/Logger';
import { assertAmount, isNullAddress, toAddress } from '../utils/TokenUtils';
import { Authorizer, CoreRoles, requireRole } from './Authorization';
import CheckpointLog, { Checkpoint } from './CheckpointLog';
import { Clock } from './Clock';
import { BalanceHook, BalanceHost, ExemptionPolicy, LossGate } from './Collaborators';
import { LedgerStore, StagedCell, StagedTable } from './LedgerStore';

export interface DelegationLedgerOptions {
  maxDelegates: number;
  exemptionPolicy?: ExemptionPolicy;
}

function delegationKey(delegator: string, delegatee: string) {
  return `${delegator}|${delegatee}`;
}

/**
 * Votes delegated by balance holders, split across up to `maxDelegates`
 * delegatees each. Vote totals are checkpointed by timestamp for past lookups.
 */
export class DelegationLedger implements BalanceHook {
  private readonly store: LedgerStore;
  private readonly clock: Clock;
  private readonly balances: BalanceHost;
  private readonly authorizer: Authorizer;
  private readonly losses: Pick<LossGate, 'hasAnyPendingLoss'>;
  private readonly exemptionPolicy: ExemptionPolicy;

  private readonly delegatesVotes: StagedTable<string, bigint>;
  private readonly delegatedVotes: StagedTable<string, bigint>;
  private readonly delegateList: StagedTable<string, readonly string[]>;
  private readonly voteCheckpoints: StagedTable<string, Checkpoint>;
  private readonly maxDelegatesCell: StagedCell<number>;
  private readonly exempt: StagedTable<string, true>;

  constructor(
    store: LedgerStore,
    clock: Clock,
    balances: BalanceHost,
    authorizer: Authorizer,
    losses: Pick<LossGate, 'hasAnyPendingLoss'>,
    options: DelegationLedgerOptions
  ) {
    if (!Number.isInteger(options.maxDelegates) || options.maxDelegates < 0) {
      throw new Error(`DelegationLedger: invalid maxDelegates ${options.maxDelegates}`);
    }
    this.store = store;
    this.clock = clock;
    this.balances = balances;
    this.authorizer = authorizer;
    this.losses = losses;
    this.exemptionPolicy = options.exemptionPolicy || ((account) => !isNullAddress(account));

    this.delegatesVotes = store.table('delegatesVotesCount');
    this.delegatedVotes = store.table('userDelegatedVotes');
    this.delegateList = store.table('delegates');
    this.voteCheckpoints = store.table('voteCheckpoints');
    this.maxDelegatesCell = store.cell('maxDelegates', options.maxDelegates);
    this.exempt = store.table('canExceedMaxDelegates');
  }

  incrementDelegation(delegator: string, delegatee: string, amount: bigint) {
    this.store.transact(() => {
      this.increment(toAddress(delegator), toAddress(delegatee), amount);
    });
  }

  undelegate(delegator: string, delegatee: string, amount: bigint) {
    this.store.transact(() => {
      this.decrement(toAddress(delegator), toAddress(delegatee), amount);
    });
  }

  /**
   * Move every vote of `delegator` to `newDelegatee`. The null address only
   * clears the existing delegations.
   */
  delegate(delegator: string, newDelegatee: string) {
    this.store.transact(() => {
      const d = toAddress(delegator);
      const target = toAddress(newDelegatee);
      for (const delegatee of this.delegates(d)) {
        this.decrement(d, delegatee, this.delegatesVotesCount(d, delegatee));
      }
      const votes = this.freeVotes(d);
      if (!isNullAddress(target) && votes > 0n) {
        this.increment(d, target, votes);
      }
    });
  }

  /** undelegate whole delegations, oldest first, until `user` delegates no more than `targetBalance` */
  decrementVotesUntilFree(user: string, targetBalance: bigint) {
    this.store.transact(() => {
      const u = toAddress(user);
      const delegated = this.userDelegatedVotes(u);
      if (delegated <= targetBalance) {
        return;
      }
      let freed = 0n;
      for (const delegatee of this.delegates(u)) {
        if (delegated - freed <= targetBalance) {
          break;
        }
        const votes = this.delegatesVotesCount(u, delegatee);
        this.decrement(u, delegatee, votes);
        freed += votes;
      }
    });
  }

  beforeBalanceDecrease(user: string, nextBalance: bigint) {
    this.decrementVotesUntilFree(user, nextBalance);
  }

  setMaxDelegates(caller: string, maxDelegates: number) {
    this.store.transact(() => {
      requireRole(this.authorizer, CoreRoles.GAUGE_PARAMETERS, caller, 'DelegationLedger');
      if (!Number.isInteger(maxDelegates) || maxDelegates < 0) {
        throw new Error(`DelegationLedger: invalid maxDelegates ${maxDelegates}`);
      }
      const oldMaxDelegates = this.maxDelegatesCell.get();
      this.maxDelegatesCell.set(maxDelegates);
      this.store.emit({ name: 'MaxDelegatesUpdate', oldMaxDelegates, newMaxDelegates: maxDelegates });
    });
  }

  setExemptDelegator(caller: string, account: string, canExceedMaxDelegates: boolean) {
    this.store.transact(() => {
      requireRole(this.authorizer, CoreRoles.GAUGE_PARAMETERS, caller, 'DelegationLedger');
      const a = toAddress(account);
      if (canExceedMaxDelegates && !this.exemptionPolicy(a)) {
        throw new LedgerError(LedgerErrorCode.NotExemptTarget, `DelegationLedger: ${a} cannot be exempted`);
      }
      if (canExceedMaxDelegates) {
        this.exempt.set(a, true);
      } else {
        this.exempt.delete(a);
      }
      this.store.emit({ name: 'CanExceedMaxDelegatesUpdate', account: a, canExceedMaxDelegates });
    });
  }

  getVotes(account: string): bigint {
    return CheckpointLog.latest(this.voteCheckpoints.get(toAddress(account)));
  }

  getPastVotes(account: string, timestamp: number): bigint {
    const now = this.clock.now();
    if (timestamp >= now) {
      throw new LedgerError(LedgerErrorCode.FutureLookup, `DelegationLedger: ${timestamp} is not in the past`);
    }
    return CheckpointLog.valueAt(this.voteCheckpoints.get(toAddress(account)), timestamp);
  }

  delegates(delegator: string): readonly string[] {
    return this.delegateList.getOr(toAddress(delegator), []);
  }

  delegatesVotesCount(delegator: string, delegatee: string): bigint {
    return this.delegatesVotes.getOr(delegationKey(toAddress(delegator), toAddress(delegatee)), 0n);
  }

  userDelegatedVotes(delegator: string): bigint {
    return this.delegatedVotes.getOr(toAddress(delegator), 0n);
  }

  freeVotes(delegator: string): bigint {
    return this.balances.balanceOf(delegator) - this.userDelegatedVotes(delegator);
  }

  maxDelegates(): number {
    return this.maxDelegatesCell.get();
  }

  isExempt(account: string): boolean {
    return this.exempt.has(toAddress(account));
  }

  private increment(delegator: string, delegatee: string, amount: bigint) {
    assertAmount(amount, 'DelegationLedger.incrementDelegation');
    if (isNullAddress(delegatee)) {
      throw new LedgerError(LedgerErrorCode.InvalidAddress, 'DelegationLedger: delegation to the null address');
    }
    if (this.losses.hasAnyPendingLoss(delegator)) {
      throw new LedgerError(LedgerErrorCode.PendingLoss, `DelegationLedger: ${delegator} has pending losses`);
    }
    const free = this.freeVotes(delegator);
    if (amount > free) {
      throw new LedgerError(
        LedgerErrorCode.DelegationError,
        `DelegationLedger: ${delegator} has ${free} free votes, cannot delegate ${amount}`
      );
    }
    if (amount == 0n) {
      return;
    }

    const current = this.delegatesVotesCount(delegator, delegatee);
    const delegates = this.delegates(delegator);
    if (current == 0n) {
      if (delegates.length >= this.maxDelegates() && !this.isExempt(delegator)) {
        throw new LedgerError(
          LedgerErrorCode.DelegationError,
          `DelegationLedger: ${delegator} cannot delegate to more than ${this.maxDelegates()} accounts`
        );
      }
      this.delegateList.set(delegator, [...delegates, delegatee]);
    }
    this.delegatesVotes.set(delegationKey(delegator, delegatee), current + amount);
    this.delegatedVotes.set(delegator, this.userDelegatedVotes(delegator) + amount);
    this.writeVotes(delegatee, amount);

    this.store.emit({ name: 'Delegation', delegator, delegatee, amount });
    logger.debug(`DelegationLedger: ${delegator} delegated ${amount} to ${delegatee}`);
  }

  private decrement(delegator: string, delegatee: string, amount: bigint) {
    assertAmount(amount, 'DelegationLedger.undelegate');
    const current = this.delegatesVotesCount(delegator, delegatee);
    if (amount > current) {
      throw new LedgerError(
        LedgerErrorCode.UndelegationError,
        `DelegationLedger: ${delegator} delegated ${current} to ${delegatee}, cannot undelegate ${amount}`
      );
    }
    if (amount == 0n) {
      return;
    }

    const remaining = current - amount;
    const key = delegationKey(delegator, delegatee);
    if (remaining == 0n) {
      this.delegatesVotes.delete(key);
      this.delegateList.set(delegator, this.delegates(delegator).filter((_) => _ != delegatee));
    } else {
      this.delegatesVotes.set(key, remaining);
    }
    this.delegatedVotes.set(delegator, this.userDelegatedVotes(delegator) - amount);
    this.writeVotes(delegatee, -amount);

    this.store.emit({ name: 'Undelegation', delegator, delegatee, amount });
    logger.debug(`DelegationLedger: ${delegator} undelegated ${amount} from ${delegatee}`);
  }

  private writeVotes(delegatee: string, delta: bigint) {
    const head = this.voteCheckpoints.get(delegatee);
    const previousBalance = CheckpointLog.latest(head);
    const newBalance = previousBalance + delta;
    this.voteCheckpoints.set(delegatee, CheckpointLog.write(head, this.clock.now(), newBalance));
    this.store.emit({ name: 'DelegateVotesChanged', delegate: delegatee, previousBalance, newBalance });
  }
}
