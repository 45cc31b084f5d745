import fs from 'fs';
import { Server } from 'http';
import * as dotenv from 'dotenv';
import { createApi } from './api/Api';
import { GetNodeConfig } from './config/Config';
import GaugeIndexer from './datafetch/GaugeIndexer';
import { RoleRegistry } from './ledger/Authorization';
import { ManualClock } from './ledger/Clock';
import { createGaugeSystem } from './ledger/GaugeSystem';
import { OperationJournal } from './ledger/OperationJournal';
import { NodeConfig } from './model/NodeConfig';
import LossApplier from './processors/LossApplier';
import { API_PORT, APP_NAME, DATA_DIR, GAUGES_FILENAME, OPERATIONS_FILENAME } from './utils/Constants';
import { Err, Log } from './utils/Logger';
dotenv.config();

const JOURNAL_POLL_MS = 5000;

function nowSec() {
  return Math.floor(Date.now() / 1000);
}

function buildRoles(nodeConfig: NodeConfig): RoleRegistry {
  const roles = new RoleRegistry();
  for (const assignment of nodeConfig.roles) {
    for (const account of assignment.accounts) {
      roles.grantRole(assignment.role, account);
    }
  }
  return roles;
}

async function main() {
  process.title = APP_NAME;
  Log(`[GAUGE-NODE] STARTED, DATA_DIR: ${DATA_DIR}`);
  if (!fs.existsSync(DATA_DIR)) {
    fs.mkdirSync(DATA_DIR, { recursive: true });
  }

  // load configuration from working dir
  const nodeConfig = GetNodeConfig();

  const journal = new OperationJournal(OPERATIONS_FILENAME);
  const operations = journal.load();
  // replaying moves the clock through the journal timestamps, then it follows the wall clock
  const clock = new ManualClock(operations.length > 0 ? operations[0].timestamp : nowSec());
  const system = createGaugeSystem(nodeConfig.ledger, {
    authorizer: buildRoles(nodeConfig),
    minterAddress: nodeConfig.minterAddress,
    clock
  });

  const indexer = new GaugeIndexer(GAUGES_FILENAME);
  indexer.attach(system.store);

  journal.applyNew(system, clock);
  clock.advanceTo(nowSec());

  const timers: NodeJS.Timeout[] = [];
  timers.push(
    setInterval(() => {
      clock.advanceTo(nowSec());
      journal.applyNew(system, clock);
    }, JOURNAL_POLL_MS)
  );

  if (nodeConfig.processors.GAUGE_INDEXER.enabled) {
    indexer.save();
    timers.push(
      setInterval(() => {
        if (indexer.isDirty()) {
          indexer.save();
        }
      }, nodeConfig.processors.GAUGE_INDEXER.saveEverySec * 1000)
    );
  }

  let lossApplier: LossApplier | undefined = undefined;
  if (nodeConfig.processors.LOSS_APPLIER.enabled) {
    lossApplier = new LossApplier(system, clock, indexer, nodeConfig.processors.LOSS_APPLIER, journal);
    lossApplier.start().catch((e) => Err('LossApplier stopped', e));
  }

  let server: Server | undefined = undefined;
  if (nodeConfig.api.enabled) {
    server = createApi(system, indexer).listen(API_PORT, () => {
      Log(`⚡️[server]: Server is running. See doc: http://localhost:${API_PORT}/api-docs`);
    });
  }

  const cleanup = () => {
    Log('shutdown requested');
    lossApplier?.stop();
    for (const timer of timers) {
      clearInterval(timer);
    }
    if (nodeConfig.processors.GAUGE_INDEXER.enabled) {
      indexer.save();
    }
    server?.close();
    process.exit();
  };
  process.on('SIGINT', cleanup);
  process.on('SIGTERM', cleanup);
}

main().catch((e) => {
  Err('[GAUGE-NODE] failed to start', e);
  process.exit(1);
});
