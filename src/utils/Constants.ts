import path from 'path';
import * as dotenv from 'dotenv';
dotenv.config();

export const APP_NAME = process.env.APP_NAME || 'GAUGE_NODE';

export const GAUGE_NODE_CONFIG_FILE =
  process.env.GAUGE_NODE_CONFIG_FILE || path.join(process.cwd(), 'gauge-node-config.json');

export const DATA_DIR = process.env.DATA_DIR || path.join(process.cwd(), 'data');
export const GAUGES_FILENAME = path.join(DATA_DIR, 'gauges.json');
export const LOSS_APPLIER_STATE_FILENAME = path.join(DATA_DIR, 'processors', 'loss-applier-state.json');

export const API_PORT = process.env.API_PORT ? Number(process.env.API_PORT) : 17777;
export const OPERATIONS_FILENAME = path.join(DATA_DIR, 'operations.jsonl');
