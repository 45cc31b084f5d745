import fs from 'fs';
import GaugeIndexer from '../datafetch/GaugeIndexer';
import { ManualClock } from '../ledger/Clock';
import { GaugeSystem } from '../ledger/GaugeSystem';
import { OperationJournal, applyOperation } from '../ledger/OperationJournal';
import { LossApplierState } from '../model/LossApplierState';
import { LossApplierConfig } from '../model/NodeConfig';
import { Operation } from '../model/Operation';
import { LOSS_APPLIER_STATE_FILENAME } from '../utils/Constants';
import { Log } from '../utils/Logger';
import { ReadJSON, WaitUntilScheduled, WriteJSON } from '../utils/Utils';

export interface LossApplierRun {
  applied: number;
  failed: number;
  skipped: number;
}

/**
 * Apply pending gauge losses for every user still allocated to a gauge that
 * reported a loss since the user's last acknowledgment.
 */
export default class LossApplier {
  private readonly system: GaugeSystem;
  private readonly clock: ManualClock;
  private readonly indexer: GaugeIndexer;
  private readonly config: LossApplierConfig;
  private readonly stateFilename: string;
  private readonly journal?: OperationJournal;
  private running = false;

  constructor(
    system: GaugeSystem,
    clock: ManualClock,
    indexer: GaugeIndexer,
    config: LossApplierConfig,
    journal?: OperationJournal,
    stateFilename = LOSS_APPLIER_STATE_FILENAME
  ) {
    this.system = system;
    this.clock = clock;
    this.indexer = indexer;
    this.config = config;
    this.journal = journal;
    this.stateFilename = stateFilename;
  }

  runOnce(nowMs = Date.now()): LossApplierRun {
    const state = this.loadLastState();
    const run: LossApplierRun = { applied: 0, failed: 0, skipped: 0 };

    for (const gauge of Object.values(this.indexer.getGauges().gauges)) {
      for (const user of Object.values(gauge.users)) {
        if (user.lastLossApplied >= gauge.lastLoss || user.weight == 0n || user.weight < this.config.minSizeToApply) {
          continue;
        }

        const userLastState = state.gauges[gauge.address]?.users[user.address];
        if (userLastState && userLastState.lastCheckedTimestamp + this.config.retryDelaySec * 1000 > nowMs) {
          Log(
            `LossApplier: user ${user.address} for gauge ${gauge.address} was already tried at ${new Date(
              userLastState.lastCheckedTimestamp
            ).toISOString()}`
          );
          run.skipped++;
          continue;
        }

        Log(`LossApplier: applying loss of user ${user.address} for gauge ${gauge.address}`);
        const operation: Operation = {
          op: 'applyLoss',
          timestamp: Math.floor(nowMs / 1000),
          gauge: gauge.address,
          user: user.address
        };
        const result = this.journal
          ? this.journal.submit(this.system, this.clock, operation)
          : applyOperation(this.system, this.clock, operation);
        if (result.ok) {
          if (userLastState) {
            delete state.gauges[gauge.address].users[user.address];
            if (Object.keys(state.gauges[gauge.address].users).length == 0) {
              delete state.gauges[gauge.address];
            }
          }
          run.applied++;
        } else {
          if (!state.gauges[gauge.address]) {
            state.gauges[gauge.address] = { users: {} };
          }
          state.gauges[gauge.address].users[user.address] = {
            failReason: result.error || 'unknown',
            lastCheckedTimestamp: nowMs
          };
          run.failed++;
        }
      }
    }

    if (run.applied + run.failed > 0) {
      Log(`LossApplier: applied ${run.applied} losses, ${run.failed} failed, ${run.skipped} waiting for retry`);
    }
    this.saveLastState(state);
    return run;
  }

  async start() {
    this.running = true;
    while (this.running) {
      const startDate = Date.now();
      this.runOnce(startDate);
      await WaitUntilScheduled(startDate, this.config.runEverySec);
    }
  }

  stop() {
    this.running = false;
  }

  private loadLastState(): LossApplierState {
    if (!fs.existsSync(this.stateFilename)) {
      return {
        gauges: {}
      };
    } else {
      return ReadJSON<LossApplierState>(this.stateFilename);
    }
  }

  private saveLastState(state: LossApplierState) {
    WriteJSON(this.stateFilename, state);
  }
}
