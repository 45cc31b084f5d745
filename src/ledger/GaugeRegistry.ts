import { GaugeInfo, GaugeStatus } from '../model/Gauge';
import { LedgerError, LedgerErrorCode } from '../model/Errors';
import logger from '../utils/Logger';
import { isNullAddress, toAddress } from '../utils/TokenUtils';
import { Authorizer, CoreRoles, requireRole } from './Authorization';
import { GaugeStatusHook } from './Collaborators';
import { LedgerStore, StagedCell, StagedTable } from './LedgerStore';

/**
 * Set of allocation targets. A gauge is never deleted: removing it marks it
 * deprecated, adding it again flips it back to active.
 */
export class GaugeRegistry {
  private readonly store: LedgerStore;
  private readonly authorizer: Authorizer;
  private readonly gaugeInfo: StagedTable<string, GaugeInfo>;
  private readonly gaugeList: StagedCell<readonly string[]>;
  private readonly liveCount: StagedCell<number>;
  private readonly maxLive: StagedCell<number>;
  private readonly hooks: GaugeStatusHook[] = [];

  constructor(store: LedgerStore, authorizer: Authorizer, maxLiveGauges: number) {
    assertCount(maxLiveGauges, 'maxLiveGauges');
    this.store = store;
    this.authorizer = authorizer;
    this.gaugeInfo = store.table('gaugeInfo');
    this.gaugeList = store.cell('gaugeList', []);
    this.liveCount = store.cell('liveGaugeCount', 0);
    this.maxLive = store.cell('maxLiveGauges', maxLiveGauges);
  }

  registerHook(hook: GaugeStatusHook) {
    this.hooks.push(hook);
  }

  addGauge(caller: string, gaugeType: number, gauge: string): string {
    return this.store.transact(() => {
      requireRole(this.authorizer, CoreRoles.GAUGE_ADD, caller, 'GaugeRegistry');
      if (!Number.isInteger(gaugeType) || gaugeType < 0) {
        throw new LedgerError(LedgerErrorCode.InvalidGauge, `GaugeRegistry: invalid gauge type ${gaugeType}`);
      }
      const id = toAddress(gauge);
      if (isNullAddress(id)) {
        throw new LedgerError(LedgerErrorCode.InvalidGauge, 'GaugeRegistry: null gauge');
      }
      const info = this.gaugeInfo.get(id);
      if (info && info.status == GaugeStatus.ACTIVE) {
        throw new LedgerError(LedgerErrorCode.InvalidGauge, `GaugeRegistry: gauge ${id} is already live`);
      }
      if (this.liveCount.get() >= this.maxLive.get()) {
        throw new LedgerError(
          LedgerErrorCode.MaxLiveGauges,
          `GaugeRegistry: cannot have more than ${this.maxLive.get()} live gauges`
        );
      }

      if (!info) {
        this.gaugeList.set([...this.gaugeList.get(), id]);
      }
      this.gaugeInfo.set(id, { gaugeType, status: GaugeStatus.ACTIVE });
      this.liveCount.set(this.liveCount.get() + 1);
      for (const hook of this.hooks) {
        hook.onGaugeActivated(id, gaugeType);
      }

      this.store.emit({ name: 'AddGauge', gauge: id, gaugeType });
      logger.debug(`GaugeRegistry: ${info ? 're-added' : 'added'} gauge ${id} with type ${gaugeType}`);
      return id;
    });
  }

  removeGauge(caller: string, gauge: string) {
    this.store.transact(() => {
      requireRole(this.authorizer, CoreRoles.GAUGE_REMOVE, caller, 'GaugeRegistry');
      const id = toAddress(gauge);
      const info = this.gaugeInfo.get(id);
      if (!info || info.status != GaugeStatus.ACTIVE) {
        throw new LedgerError(LedgerErrorCode.InvalidGauge, `GaugeRegistry: gauge ${id} is not live`);
      }

      this.gaugeInfo.set(id, { gaugeType: info.gaugeType, status: GaugeStatus.DEPRECATED });
      this.liveCount.set(this.liveCount.get() - 1);
      for (const hook of this.hooks) {
        hook.onGaugeDeprecated(id, info.gaugeType);
      }

      this.store.emit({ name: 'RemoveGauge', gauge: id });
      logger.debug(`GaugeRegistry: removed gauge ${id}`);
    });
  }

  setMaxLiveGauges(caller: string, maxLiveGauges: number) {
    this.store.transact(() => {
      requireRole(this.authorizer, CoreRoles.GAUGE_PARAMETERS, caller, 'GaugeRegistry');
      assertCount(maxLiveGauges, 'maxLiveGauges');
      const oldValue = this.maxLive.get();
      this.maxLive.set(maxLiveGauges);
      this.store.emit({ name: 'MaxLiveGaugesUpdate', oldValue, newValue: maxLiveGauges });
    });
  }

  isActive(gauge: string): boolean {
    return this.gaugeInfo.get(toAddress(gauge))?.status == GaugeStatus.ACTIVE;
  }

  isDeprecated(gauge: string): boolean {
    return this.gaugeInfo.get(toAddress(gauge))?.status == GaugeStatus.DEPRECATED;
  }

  exists(gauge: string): boolean {
    return this.gaugeInfo.has(toAddress(gauge));
  }

  getGauge(gauge: string): GaugeInfo | undefined {
    return this.gaugeInfo.get(toAddress(gauge));
  }

  gaugeType(gauge: string): number {
    const info = this.getGauge(gauge);
    if (!info) {
      throw new LedgerError(LedgerErrorCode.InvalidGauge, `GaugeRegistry: unknown gauge ${gauge}`);
    }
    return info.gaugeType;
  }

  /** every gauge ever added, in order of first registration */
  gauges(): readonly string[] {
    return this.gaugeList.get();
  }

  liveGauges(): string[] {
    return this.gauges().filter((_) => this.gaugeInfo.get(_)?.status == GaugeStatus.ACTIVE);
  }

  deprecatedGauges(): string[] {
    return this.gauges().filter((_) => this.gaugeInfo.get(_)?.status == GaugeStatus.DEPRECATED);
  }

  liveGaugeCount(): number {
    return this.liveCount.get();
  }

  maxLiveGauges(): number {
    return this.maxLive.get();
  }
}

function assertCount(value: number, label: string) {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${label} must be a non negative integer, got ${value}`);
  }
}
