import { GaugeStatus, GaugesFileStructure } from '../model/Gauge';
import { LedgerEvent } from '../model/LedgerEvents';
import { GAUGES_FILENAME } from '../utils/Constants';
import { Log } from '../utils/Logger';
import { WriteJSON } from '../utils/Utils';
import { LedgerStore } from '../ledger/LedgerStore';

/**
 * Keeps gauges.json in line with the ledger: one entry per gauge with its
 * weight, last loss and the users allocating to it.
 * The index starts empty and is rebuilt as the ledger replays its journal.
 */
export default class GaugeIndexer {
  readonly filename: string;
  private readonly gaugesFile: GaugesFileStructure;
  private dirty = false;

  constructor(filename = GAUGES_FILENAME) {
    this.filename = filename;
    this.gaugesFile = {
      gauges: {},
      updated: Date.now(),
      updatedHuman: new Date(Date.now()).toISOString()
    };
  }

  /** start folding the events committed on `store`, returns the unsubscribe function */
  attach(store: LedgerStore): () => void {
    return store.subscribe((events) => this.handleEvents(events));
  }

  handleEvents(events: readonly LedgerEvent[]) {
    for (const event of events) {
      this.handleEvent(event);
    }
  }

  getGauges(): GaugesFileStructure {
    return this.gaugesFile;
  }

  isDirty(): boolean {
    return this.dirty;
  }

  save() {
    this.gaugesFile.updated = Date.now();
    this.gaugesFile.updatedHuman = new Date().toISOString();
    WriteJSON(this.filename, this.gaugesFile);
    this.dirty = false;
    Log(`GaugeIndexer: saved ${Object.keys(this.gaugesFile.gauges).length} gauges`);
  }

  private handleEvent(event: LedgerEvent) {
    const gauges = this.gaugesFile.gauges;
    switch (event.name) {
      case 'AddGauge': {
        const gauge = gauges[event.gauge];
        if (gauge) {
          gauge.status = GaugeStatus.ACTIVE;
          gauge.gaugeType = event.gaugeType;
        } else {
          gauges[event.gauge] = {
            address: event.gauge,
            gaugeType: event.gaugeType,
            status: GaugeStatus.ACTIVE,
            weight: 0n,
            lastLoss: 0,
            users: {}
          };
        }
        break;
      }
      case 'RemoveGauge':
        if (gauges[event.gauge]) {
          gauges[event.gauge].status = GaugeStatus.DEPRECATED;
        }
        break;
      case 'IncrementGaugeWeight': {
        const gauge = gauges[event.gauge];
        if (!gauge) {
          throw new Error(`GaugeIndexer: increment on unknown gauge ${event.gauge}`);
        }
        gauge.weight += event.weight;
        const user = gauge.users[event.user];
        if (!user) {
          gauge.users[event.user] = { address: event.user, weight: event.weight, lastLossApplied: event.when };
        } else {
          // re-entering a gauge acknowledges its past losses
          if (user.weight == 0n) {
            user.lastLossApplied = event.when;
          }
          user.weight += event.weight;
        }
        break;
      }
      case 'DecrementGaugeWeight': {
        const gauge = gauges[event.gauge];
        if (!gauge || !gauge.users[event.user]) {
          throw new Error(`GaugeIndexer: decrement of unknown allocation ${event.user} on ${event.gauge}`);
        }
        gauge.weight -= event.weight;
        gauge.users[event.user].weight -= event.weight;
        break;
      }
      case 'GaugeLoss':
        if (gauges[event.gauge]) {
          gauges[event.gauge].lastLoss = event.when;
        }
        break;
      case 'GaugeLossApply': {
        const user = gauges[event.gauge]?.users[event.who];
        if (user) {
          user.lastLossApplied = event.when;
        }
        break;
      }
      default:
        return;
    }
    this.dirty = true;
  }
}
