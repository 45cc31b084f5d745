import GaugeIndexer from '../../datafetch/GaugeIndexer';
import { GaugeSystem } from '../../ledger/GaugeSystem';
import { GaugeStatus } from '../../model/Gauge';
import { toAddress } from '../../utils/TokenUtils';
import {
  AllocationResponse,
  GaugeResponse,
  GaugeTypeResponse,
  GaugesResponse,
  TotalsResponse
} from '../model/GaugeResponse';

class GaugeController {
  private readonly system: GaugeSystem;
  private readonly indexer?: GaugeIndexer;

  constructor(system: GaugeSystem, indexer?: GaugeIndexer) {
    this.system = system;
    this.indexer = indexer;
  }

  GetGauges(): GaugesResponse {
    const now = Date.now();
    return {
      updated: now,
      updatedHuman: new Date(now).toISOString(),
      gauges: this.system.registry.gauges().map((_) => this.buildGauge(_))
    };
  }

  /** undefined when the gauge was never added */
  GetGauge(gauge: string): GaugeResponse | undefined {
    const address = toAddress(gauge);
    if (!this.system.registry.exists(address)) {
      return undefined;
    }
    return this.buildGauge(address);
  }

  GetAllocation(gauge: string, amount: bigint): AllocationResponse {
    const address = toAddress(gauge);
    return {
      gauge: address,
      amount: amount.toString(),
      allocation: this.system.weights.calculateAllocation(address, amount).toString(),
      storedAllocation: this.system.weights.calculateStoredAllocation(address, amount).toString()
    };
  }

  GetTotals(): TotalsResponse {
    const { registry, weights, cycles, clock } = this.system;
    const gaugeTypes = [...new Set(registry.gauges().map((_) => registry.gaugeType(_)))].sort((a, b) => a - b);
    const types: GaugeTypeResponse[] = gaugeTypes.map((gaugeType) => ({
      gaugeType,
      weight: weights.getTypeWeight(gaugeType).toString(),
      storedWeight: weights.getStoredTypeWeight(gaugeType).toString()
    }));

    return {
      currentCycle: weights.currentCycle(),
      inFreezeWindow: cycles.inFreezeWindow(clock.now()),
      totalWeight: weights.totalWeight().toString(),
      storedTotalWeight: weights.storedTotalWeight().toString(),
      liveGauges: registry.liveGaugeCount(),
      deprecatedGauges: registry.deprecatedGauges().length,
      types
    };
  }

  private buildGauge(gauge: string): GaugeResponse {
    const { registry, weights, losses } = this.system;
    const indexed = this.indexer?.getGauges().gauges[gauge];
    return {
      address: gauge,
      gaugeType: registry.gaugeType(gauge),
      status: registry.isActive(gauge) ? GaugeStatus.ACTIVE : GaugeStatus.DEPRECATED,
      weight: weights.getGaugeWeight(gauge).toString(),
      storedWeight: weights.getStoredGaugeWeight(gauge).toString(),
      lastLoss: losses.lastGaugeLoss(gauge),
      users: indexed
        ? Object.values(indexed.users)
            .filter((_) => _.weight > 0n)
            .map((_) => ({ address: _.address, weight: _.weight.toString(), lastLossApplied: _.lastLossApplied }))
        : []
    };
  }
}

export default GaugeController;
