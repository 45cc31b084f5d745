import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import GaugeIndexer from '../datafetch/GaugeIndexer';
import { ManualClock } from '../ledger/Clock';
import { GaugeSystem } from '../ledger/GaugeSystem';
import { OperationJournal } from '../ledger/OperationJournal';
import { ALICE, BOB, GAUGE_1, GAUGE_2, GOVERNOR, START, createTestSystem, fund } from '../ledger/TestFixtures';
import { LossApplierState } from '../model/LossApplierState';
import { LossApplierConfig } from '../model/NodeConfig';
import { ReadJSON } from '../utils/Utils';
import LossApplier from './LossApplier';

const CONFIG: LossApplierConfig = {
  enabled: true,
  runEverySec: 600,
  retryDelaySec: 3600,
  minSizeToApply: 0n
};

describe('LossApplier', () => {
  let dir: string;
  let stateFilename: string;
  let system: GaugeSystem;
  let clock: ManualClock;
  let indexer: GaugeIndexer;
  let journal: OperationJournal;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'loss-applier-'));
    stateFilename = path.join(dir, 'processors', 'loss-applier-state.json');
    ({ system, clock } = createTestSystem());
    indexer = new GaugeIndexer(path.join(dir, 'gauges.json'));
    indexer.attach(system.store);
    journal = new OperationJournal(path.join(dir, 'operations.jsonl'));

    system.registry.addGauge(GOVERNOR, 1, GAUGE_1);
    fund(system, ALICE, 100n);
    fund(system, BOB, 100n);
    system.weights.incrementWeight(ALICE, GAUGE_1, 40n);
    system.weights.incrementWeight(BOB, GAUGE_1, 10n);
    clock.advance(10);
    system.losses.reportLoss(GOVERNOR, GAUGE_1);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('applies every pending loss and journals it', () => {
    const applier = new LossApplier(system, clock, indexer, CONFIG, journal, stateFilename);

    expect(applier.runOnce((START + 20) * 1000)).toEqual({ applied: 2, failed: 0, skipped: 0 });

    expect(system.token.balanceOf(ALICE)).toBe(60n);
    expect(system.token.balanceOf(BOB)).toBe(90n);
    expect(clock.now()).toBe(START + 20);
    expect(journal.load()).toEqual([
      { op: 'applyLoss', timestamp: START + 20, gauge: GAUGE_1, user: ALICE },
      { op: 'applyLoss', timestamp: START + 20, gauge: GAUGE_1, user: BOB }
    ]);
    expect(ReadJSON<LossApplierState>(stateFilename)).toEqual({ gauges: {} });

    // nothing left to apply
    expect(applier.runOnce((START + 30) * 1000)).toEqual({ applied: 0, failed: 0, skipped: 0 });
  });

  it('leaves allocations below the minimum size', () => {
    const applier = new LossApplier(system, clock, indexer, { ...CONFIG, minSizeToApply: 20n }, journal, stateFilename);

    expect(applier.runOnce((START + 20) * 1000)).toEqual({ applied: 1, failed: 0, skipped: 0 });
    expect(system.losses.hasPendingLoss(BOB, GAUGE_1)).toBe(true);
  });

  it('records failures and retries them after the delay', () => {
    // an index entry the ledger has no pending loss for
    indexer.handleEvents([
      { name: 'AddGauge', gauge: GAUGE_2, gaugeType: 1 },
      { name: 'IncrementGaugeWeight', user: ALICE, gauge: GAUGE_2, weight: 5n, cycleEnd: 0, when: START },
      { name: 'GaugeLoss', gauge: GAUGE_2, when: START + 1 }
    ]);
    const applier = new LossApplier(system, clock, indexer, CONFIG, undefined, stateFilename);
    const firstRunMs = (START + 20) * 1000;

    expect(applier.runOnce(firstRunMs)).toEqual({ applied: 2, failed: 1, skipped: 0 });
    const state = ReadJSON<LossApplierState>(stateFilename);
    expect(state.gauges[GAUGE_2].users[ALICE].lastCheckedTimestamp).toBe(firstRunMs);
    expect(state.gauges[GAUGE_2].users[ALICE].failReason).toBe(
      `LossTracker: no loss to apply for ${ALICE} on ${GAUGE_2}`
    );

    expect(applier.runOnce(firstRunMs + 1000)).toEqual({ applied: 0, failed: 0, skipped: 1 });
    expect(applier.runOnce(firstRunMs + 3600 * 1000)).toEqual({ applied: 0, failed: 1, skipped: 0 });
  });
});
