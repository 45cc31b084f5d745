import { ArithmeticFault, LedgerError, LedgerErrorCode } from '../model/Errors';
import logger from '../utils/Logger';
import { assertAmount, isNullAddress, toAddress } from '../utils/TokenUtils';
import { Authorizer, CoreRoles, requireRole } from './Authorization';
import CheckpointLog, { Checkpoint } from './CheckpointLog';
import { Clock } from './Clock';
import {
  BalanceHook,
  BalanceHost,
  DebtCeilingOracle,
  ExemptionPolicy,
  GaugeStatusHook,
  LossGate
} from './Collaborators';
import { CycleClock } from './CycleClock';
import { GaugeRegistry } from './GaugeRegistry';
import { LedgerStore, StagedCell, StagedTable } from './LedgerStore';

export interface WeightLedgerOptions {
  maxGauges: number;
  debtCeiling?: DebtCeilingOracle;
  exemptionPolicy?: ExemptionPolicy;
}

interface DecrementOptions {
  checkDebtCeiling: boolean;
}

const defaultExemptionPolicy: ExemptionPolicy = (account) => !isNullAddress(account);

function userGaugeKey(user: string, gauge: string) {
  return `${user}|${gauge}`;
}

/**
 * Per user gauge weights and their aggregates.
 *
 * Live aggregates move with every allocation. Stored aggregates are the live
 * values as of the last completed cycle: each aggregate keeps a checkpoint log
 * keyed by cycle end, and the stored value is read from the newest checkpoint
 * written in an earlier cycle.
 *
 * A gauge's own aggregate always sums its users, deprecated or not. Type and
 * global aggregates only count active gauges.
 */
export class WeightLedger implements BalanceHook, GaugeStatusHook {
  private readonly store: LedgerStore;
  private readonly clock: Clock;
  private readonly cycles: CycleClock;
  private readonly registry: GaugeRegistry;
  private readonly balances: BalanceHost;
  private readonly authorizer: Authorizer;
  private readonly debtCeiling?: DebtCeilingOracle;
  private readonly exemptionPolicy: ExemptionPolicy;
  private lossGate?: LossGate;

  private readonly userGaugeWeight: StagedTable<string, bigint>;
  private readonly userWeight: StagedTable<string, bigint>;
  private readonly userGaugeList: StagedTable<string, readonly string[]>;
  private readonly gaugeWeight: StagedTable<string, Checkpoint>;
  private readonly typeWeight: StagedTable<number, Checkpoint>;
  private readonly totalWeightLog: StagedCell<Checkpoint | undefined>;
  private readonly maxGaugesCell: StagedCell<number>;
  private readonly exempt: StagedTable<string, true>;

  constructor(
    store: LedgerStore,
    clock: Clock,
    cycles: CycleClock,
    registry: GaugeRegistry,
    balances: BalanceHost,
    authorizer: Authorizer,
    options: WeightLedgerOptions
  ) {
    if (!Number.isInteger(options.maxGauges) || options.maxGauges < 0) {
      throw new Error(`WeightLedger: invalid maxGauges ${options.maxGauges}`);
    }
    this.store = store;
    this.clock = clock;
    this.cycles = cycles;
    this.registry = registry;
    this.balances = balances;
    this.authorizer = authorizer;
    this.debtCeiling = options.debtCeiling;
    this.exemptionPolicy = options.exemptionPolicy || defaultExemptionPolicy;

    this.userGaugeWeight = store.table('userGaugeWeight');
    this.userWeight = store.table('userWeight');
    this.userGaugeList = store.table('userGauges');
    this.gaugeWeight = store.table('gaugeWeight');
    this.typeWeight = store.table('typeWeight');
    this.totalWeightLog = store.cell<Checkpoint | undefined>('totalWeight', undefined);
    this.maxGaugesCell = store.cell('maxGauges', options.maxGauges);
    this.exempt = store.table('canExceedMaxGauges');

    registry.registerHook(this);
  }

  setLossGate(lossGate: LossGate) {
    this.lossGate = lossGate;
  }

  /**
   * Allocate `amount` more weight from `user` to `gauge`.
   * @returns the user's total allocated weight after the call
   */
  incrementWeight(user: string, gauge: string, amount: bigint): bigint {
    return this.store.transact(() => {
      const u = toAddress(user);
      this.incrementGaugeWeight(u, toAddress(gauge), amount, this.clock.now());
      return this.getUserWeight(u);
    });
  }

  /** All or nothing: one failing pair reverts every pair of the batch */
  incrementWeights(user: string, gauges: readonly string[], amounts: readonly bigint[]): bigint {
    return this.store.transact(() => {
      assertSameSize(gauges, amounts);
      const u = toAddress(user);
      const now = this.clock.now();
      for (let i = 0; i < gauges.length; i++) {
        this.incrementGaugeWeight(u, toAddress(gauges[i]), amounts[i], now);
      }
      return this.getUserWeight(u);
    });
  }

  decrementWeight(user: string, gauge: string, amount: bigint): bigint {
    return this.store.transact(() => {
      const u = toAddress(user);
      this.decrementGaugeWeight(u, toAddress(gauge), amount, this.clock.now(), { checkDebtCeiling: true });
      return this.getUserWeight(u);
    });
  }

  decrementWeights(user: string, gauges: readonly string[], amounts: readonly bigint[]): bigint {
    return this.store.transact(() => {
      assertSameSize(gauges, amounts);
      const u = toAddress(user);
      const now = this.clock.now();
      for (let i = 0; i < gauges.length; i++) {
        this.decrementGaugeWeight(u, toAddress(gauges[i]), amounts[i], now, { checkDebtCeiling: true });
      }
      return this.getUserWeight(u);
    });
  }

  /**
   * Free whole gauge allocations, in the order the user entered the gauges and
   * deprecated gauges included, until the user's total weight fits in `targetBalance`.
   */
  decrementUntilFree(user: string, targetBalance: bigint) {
    this.store.transact(() => {
      const u = toAddress(user);
      const used = this.getUserWeight(u);
      if (used <= targetBalance) {
        return;
      }

      const now = this.clock.now();
      let freed = 0n;
      for (const gauge of this.userGauges(u)) {
        if (used - freed <= targetBalance) {
          break;
        }
        const weight = this.getUserGaugeWeight(u, gauge);
        this.decrementGaugeWeight(u, gauge, weight, now, { checkDebtCeiling: true });
        freed += weight;
      }
      logger.debug(`WeightLedger: freed ${freed} weight of ${u} to fit balance ${targetBalance}`);
    });
  }

  beforeBalanceDecrease(user: string, nextBalance: bigint) {
    this.decrementUntilFree(user, nextBalance);
  }

  /**
   * Zero the allocation of `user` in `gauge` without the pending loss and
   * debt ceiling checks. Only the loss settlement goes through here.
   * @returns the weight removed
   */
  slashAllocation(user: string, gauge: string): bigint {
    return this.store.transact(() => {
      const u = toAddress(user);
      const g = toAddress(gauge);
      const weight = this.getUserGaugeWeight(u, g);
      this.applyDecrement(u, g, weight, this.clock.now());
      return weight;
    });
  }

  setMaxGauges(caller: string, maxGauges: number) {
    this.store.transact(() => {
      requireRole(this.authorizer, CoreRoles.GAUGE_PARAMETERS, caller, 'WeightLedger');
      if (!Number.isInteger(maxGauges) || maxGauges < 0) {
        throw new Error(`WeightLedger: invalid maxGauges ${maxGauges}`);
      }
      const oldMaxGauges = this.maxGaugesCell.get();
      this.maxGaugesCell.set(maxGauges);
      this.store.emit({ name: 'MaxGaugesUpdate', oldMaxGauges, newMaxGauges: maxGauges });
    });
  }

  setExempt(caller: string, account: string, canExceedMaxGauges: boolean) {
    this.store.transact(() => {
      requireRole(this.authorizer, CoreRoles.GAUGE_PARAMETERS, caller, 'WeightLedger');
      const a = toAddress(account);
      if (canExceedMaxGauges && !this.exemptionPolicy(a)) {
        throw new LedgerError(LedgerErrorCode.NotExemptTarget, `WeightLedger: ${a} cannot be exempted`);
      }
      if (canExceedMaxGauges) {
        this.exempt.set(a, true);
      } else {
        this.exempt.delete(a);
      }
      this.store.emit({ name: 'CanExceedMaxGaugesUpdate', account: a, canExceedMaxGauges });
    });
  }

  onGaugeActivated(gauge: string, gaugeType: number) {
    const weight = this.getGaugeWeight(gauge);
    if (weight > 0n) {
      const cycle = this.cycles.cycleEnd(this.clock.now());
      this.writeTypeWeight(gaugeType, cycle, weight);
      this.writeTotalWeight(cycle, weight);
    }
  }

  onGaugeDeprecated(gauge: string, gaugeType: number) {
    const weight = this.getGaugeWeight(gauge);
    if (weight > 0n) {
      const cycle = this.cycles.cycleEnd(this.clock.now());
      this.writeTypeWeight(gaugeType, cycle, -weight);
      this.writeTotalWeight(cycle, -weight);
    }
  }

  getUserGaugeWeight(user: string, gauge: string): bigint {
    return this.userGaugeWeight.getOr(userGaugeKey(toAddress(user), toAddress(gauge)), 0n);
  }

  /** weight allocated by `user` across all gauges, deprecated ones included */
  getUserWeight(user: string): bigint {
    return this.userWeight.getOr(toAddress(user), 0n);
  }

  freeWeight(user: string): bigint {
    return this.balances.balanceOf(user) - this.getUserWeight(user);
  }

  /** gauges where `user` has non zero weight, in the order they were entered */
  userGauges(user: string): readonly string[] {
    return this.userGaugeList.getOr(toAddress(user), []);
  }

  getGaugeWeight(gauge: string): bigint {
    return CheckpointLog.latest(this.gaugeWeight.get(toAddress(gauge)));
  }

  getStoredGaugeWeight(gauge: string): bigint {
    if (!this.registry.isActive(gauge)) {
      return 0n;
    }
    return CheckpointLog.valueBefore(this.gaugeWeight.get(toAddress(gauge)), this.currentCycle());
  }

  getPastGaugeWeight(gauge: string, cycleEnd: number): bigint {
    return CheckpointLog.valueAt(this.gaugeWeight.get(toAddress(gauge)), cycleEnd);
  }

  getTypeWeight(gaugeType: number): bigint {
    return CheckpointLog.latest(this.typeWeight.get(gaugeType));
  }

  getStoredTypeWeight(gaugeType: number): bigint {
    return CheckpointLog.valueBefore(this.typeWeight.get(gaugeType), this.currentCycle());
  }

  totalWeight(): bigint {
    return CheckpointLog.latest(this.totalWeightLog.get());
  }

  storedTotalWeight(): bigint {
    return CheckpointLog.valueBefore(this.totalWeightLog.get(), this.currentCycle());
  }

  getPastTotalWeight(cycleEnd: number): bigint {
    return CheckpointLog.valueAt(this.totalWeightLog.get(), cycleEnd);
  }

  /** share of `totalAmount` proportional to the gauge's live weight, rounded down */
  calculateAllocation(gauge: string, totalAmount: bigint): bigint {
    if (!this.registry.isActive(gauge)) {
      return 0n;
    }
    return proportion(totalAmount, this.getGaugeWeight(gauge), this.totalWeight());
  }

  calculateStoredAllocation(gauge: string, totalAmount: bigint): bigint {
    return proportion(totalAmount, this.getStoredGaugeWeight(gauge), this.storedTotalWeight());
  }

  maxGauges(): number {
    return this.maxGaugesCell.get();
  }

  isExempt(account: string): boolean {
    return this.exempt.has(toAddress(account));
  }

  currentCycle(): number {
    return this.cycles.cycleEnd(this.clock.now());
  }

  private incrementGaugeWeight(user: string, gauge: string, amount: bigint, now: number) {
    assertAmount(amount, 'WeightLedger.incrementWeight');
    if (!this.registry.isActive(gauge)) {
      throw new LedgerError(LedgerErrorCode.InvalidGauge, `WeightLedger: gauge ${gauge} is not live`);
    }
    if (this.cycles.inFreezeWindow(now)) {
      throw new LedgerError(LedgerErrorCode.FreezePeriod, 'WeightLedger: increments are frozen until next cycle');
    }
    if (this.lossGate && this.lossGate.hasPendingLoss(user, gauge)) {
      throw new LedgerError(LedgerErrorCode.PendingLoss, `WeightLedger: pending loss on gauge ${gauge}`);
    }
    if (amount == 0n) {
      return;
    }

    const current = this.getUserGaugeWeight(user, gauge);
    const gauges = this.userGauges(user);
    const added = current == 0n;
    if (added && gauges.length >= this.maxGauges() && !this.isExempt(user)) {
      throw new LedgerError(
        LedgerErrorCode.ExceedMaxGauges,
        `WeightLedger: ${user} cannot vote for more than ${this.maxGauges()} gauges`
      );
    }

    const newUserWeight = this.getUserWeight(user) + amount;
    const balance = this.balances.balanceOf(user);
    if (newUserWeight > balance) {
      throw new LedgerError(
        LedgerErrorCode.Overweight,
        `WeightLedger: ${user} would allocate ${newUserWeight} with a balance of ${balance}`
      );
    }

    if (added) {
      this.userGaugeList.set(user, [...gauges, gauge]);
      this.lossGate?.onAllocationOpened(user, gauge, now);
    }
    this.userGaugeWeight.set(userGaugeKey(user, gauge), current + amount);
    this.userWeight.set(user, newUserWeight);

    const cycle = this.cycles.cycleEnd(now);
    this.writeGaugeWeight(gauge, cycle, amount);
    this.writeTypeWeight(this.registry.gaugeType(gauge), cycle, amount);
    this.writeTotalWeight(cycle, amount);

    this.store.emit({ name: 'IncrementGaugeWeight', user, gauge, weight: amount, cycleEnd: cycle, when: now });
    logger.debug(`WeightLedger: ${user} +${amount} on ${gauge}`);
  }

  private decrementGaugeWeight(user: string, gauge: string, amount: bigint, now: number, options: DecrementOptions) {
    assertAmount(amount, 'WeightLedger.decrementWeight');
    if (this.lossGate && this.lossGate.hasPendingLoss(user, gauge)) {
      throw new LedgerError(LedgerErrorCode.PendingLoss, `WeightLedger: pending loss on gauge ${gauge}`);
    }
    const current = this.getUserGaugeWeight(user, gauge);
    if (amount > current) {
      throw new ArithmeticFault(`WeightLedger: cannot remove ${amount} from weight ${current} of ${user} on ${gauge}`);
    }
    if (amount == 0n) {
      return;
    }
    if (
      options.checkDebtCeiling &&
      this.debtCeiling &&
      this.registry.isActive(gauge) &&
      !this.debtCeiling.debtCeilingCheck(gauge, -amount)
    ) {
      throw new LedgerError(LedgerErrorCode.DebtCeilingUsed, `WeightLedger: debt ceiling used on gauge ${gauge}`);
    }

    this.applyDecrement(user, gauge, amount, now);
  }

  private applyDecrement(user: string, gauge: string, amount: bigint, now: number) {
    if (amount == 0n) {
      return;
    }
    const current = this.getUserGaugeWeight(user, gauge);
    const remaining = current - amount;
    const key = userGaugeKey(user, gauge);
    if (remaining == 0n) {
      this.userGaugeWeight.delete(key);
      this.userGaugeList.set(user, this.userGauges(user).filter((_) => _ != gauge));
    } else {
      this.userGaugeWeight.set(key, remaining);
    }
    this.userWeight.set(user, this.getUserWeight(user) - amount);

    const cycle = this.cycles.cycleEnd(now);
    this.writeGaugeWeight(gauge, cycle, -amount);
    if (this.registry.isActive(gauge)) {
      this.writeTypeWeight(this.registry.gaugeType(gauge), cycle, -amount);
      this.writeTotalWeight(cycle, -amount);
    }

    this.store.emit({ name: 'DecrementGaugeWeight', user, gauge, weight: amount, cycleEnd: cycle, when: now });
    logger.debug(`WeightLedger: ${user} -${amount} on ${gauge}`);
  }

  // a write in a new cycle appends a checkpoint, which leaves the
  // previous one as the stored value for readers of the next cycle
  private writeGaugeWeight(gauge: string, cycle: number, delta: bigint) {
    const head = this.gaugeWeight.get(gauge);
    this.gaugeWeight.set(gauge, CheckpointLog.write(head, cycle, checkedAdd(CheckpointLog.latest(head), delta)));
  }

  private writeTypeWeight(gaugeType: number, cycle: number, delta: bigint) {
    const head = this.typeWeight.get(gaugeType);
    this.typeWeight.set(gaugeType, CheckpointLog.write(head, cycle, checkedAdd(CheckpointLog.latest(head), delta)));
  }

  private writeTotalWeight(cycle: number, delta: bigint) {
    const head = this.totalWeightLog.get();
    this.totalWeightLog.set(CheckpointLog.write(head, cycle, checkedAdd(CheckpointLog.latest(head), delta)));
  }
}

function assertSameSize(gauges: readonly string[], amounts: readonly bigint[]) {
  if (gauges.length != amounts.length) {
    throw new LedgerError(
      LedgerErrorCode.SizeMismatch,
      `WeightLedger: ${gauges.length} gauges for ${amounts.length} amounts`
    );
  }
}

function checkedAdd(value: bigint, delta: bigint): bigint {
  const result = value + delta;
  if (result < 0n) {
    throw new ArithmeticFault(`WeightLedger: aggregate underflow (${value} + ${delta})`);
  }
  return result;
}

function proportion(totalAmount: bigint, weight: bigint, total: bigint): bigint {
  if (total == 0n) {
    return 0n;
  }
  return (totalAmount * weight) / total;
}
