import { LedgerError, LedgerErrorCode } from '../model/Errors';
import { Log, Warn } from '../utils/Logger';
import { toAddress } from '../utils/TokenUtils';
import { Authorizer, CoreRoles, requireRole } from './Authorization';
import { Clock } from './Clock';
import { BalanceHook, BalanceHost, LossGate } from './Collaborators';
import { GaugeRegistry } from './GaugeRegistry';
import { LedgerStore, StagedTable } from './LedgerStore';
import { WeightLedger } from './WeightLedger';

function lossAppliedKey(gauge: string, user: string) {
  return `${gauge}|${user}`;
}

/**
 * Gauge losses and their settlement.
 *
 * A user has a pending loss in a gauge when the gauge reported a loss after the
 * user's last acknowledgment there and the user still has weight in it. While
 * any loss is pending the user cannot transfer, and cannot move weight in the
 * affected gauge, until `applyLoss` burns the allocated weight.
 */
export class LossTracker implements LossGate, BalanceHook {
  private readonly store: LedgerStore;
  private readonly clock: Clock;
  private readonly registry: GaugeRegistry;
  private readonly weights: WeightLedger;
  private readonly balances: BalanceHost;
  private readonly authorizer: Authorizer;
  private readonly gaugeLoss: StagedTable<string, number>;
  private readonly gaugeLossApplied: StagedTable<string, number>;

  constructor(
    store: LedgerStore,
    clock: Clock,
    registry: GaugeRegistry,
    weights: WeightLedger,
    balances: BalanceHost,
    authorizer: Authorizer
  ) {
    this.store = store;
    this.clock = clock;
    this.registry = registry;
    this.weights = weights;
    this.balances = balances;
    this.authorizer = authorizer;
    this.gaugeLoss = store.table('lastGaugeLoss');
    this.gaugeLossApplied = store.table('lastGaugeLossApplied');

    weights.setLossGate(this);
  }

  reportLoss(caller: string, gauge: string) {
    this.store.transact(() => {
      requireRole(this.authorizer, CoreRoles.GAUGE_PNL_NOTIFIER, caller, 'LossTracker');
      const g = toAddress(gauge);
      if (!this.registry.exists(g)) {
        throw new LedgerError(LedgerErrorCode.InvalidGauge, `LossTracker: unknown gauge ${g}`);
      }
      const when = this.clock.now();
      this.gaugeLoss.set(g, when);
      this.store.emit({ name: 'GaugeLoss', gauge: g, when });
      Warn(`LossTracker: loss reported on gauge ${g} at ${when}`);
    });
  }

  /**
   * Burn the weight `user` allocated to `gauge` and acknowledge the gauge's loss.
   * Callable by anyone on behalf of any user.
   * @returns the amount burnt
   */
  applyLoss(gauge: string, user: string): bigint {
    return this.store.transact(() => {
      const g = toAddress(gauge);
      const u = toAddress(user);
      if (!this.hasPendingLoss(u, g)) {
        throw new LedgerError(LedgerErrorCode.NoLossToApply, `LossTracker: no loss to apply for ${u} on ${g}`);
      }

      const when = this.clock.now();
      this.gaugeLossApplied.set(lossAppliedKey(g, u), when);
      const weight = this.weights.slashAllocation(u, g);
      this.balances.burnForLoss(u, weight);

      this.store.emit({ name: 'GaugeLossApply', gauge: g, who: u, weight, when });
      Log(`LossTracker: applied loss of ${weight} to ${u} on gauge ${g}`);
      return weight;
    });
  }

  /**
   * Strictly later than the acknowledgment: a loss reported in the same second
   * the user entered the gauge is not pending for them.
   */
  hasPendingLoss(user: string, gauge: string): boolean {
    const u = toAddress(user);
    const g = toAddress(gauge);
    return this.lastGaugeLoss(g) > this.lastGaugeLossApplied(g, u) && this.weights.getUserGaugeWeight(u, g) > 0n;
  }

  hasAnyPendingLoss(user: string): boolean {
    return this.pendingLossGauges(user).length > 0;
  }

  pendingLossGauges(user: string): string[] {
    const u = toAddress(user);
    return this.weights.userGauges(u).filter((_) => this.hasPendingLoss(u, _));
  }

  /** timestamp of the last loss reported by `gauge`, 0 if none */
  lastGaugeLoss(gauge: string): number {
    return this.gaugeLoss.getOr(toAddress(gauge), 0);
  }

  /** timestamp up to which `user` has settled losses of `gauge`, 0 if never */
  lastGaugeLossApplied(gauge: string, user: string): number {
    return this.gaugeLossApplied.getOr(lossAppliedKey(toAddress(gauge), toAddress(user)), 0);
  }

  // entering a gauge acknowledges every loss it reported before
  onAllocationOpened(user: string, gauge: string, now: number) {
    this.gaugeLossApplied.set(lossAppliedKey(toAddress(gauge), toAddress(user)), now);
  }

  beforeTransfer(from: string) {
    const pending = this.pendingLossGauges(from);
    if (pending.length > 0) {
      throw new LedgerError(
        LedgerErrorCode.PendingLoss,
        `LossTracker: ${from} has pending losses on ${pending.join(', ')}`
      );
    }
  }
}
