import fs from 'fs';
import { DEFAULT_LEDGER_CONFIG, LedgerConfig, ledgerConfigSchema } from '../model/LedgerConfig';
import { NodeConfig, nodeConfigSchema } from '../model/NodeConfig';
import { GAUGE_NODE_CONFIG_FILE } from '../utils/Constants';
import { Log } from '../utils/Logger';
import { ReadJSON } from '../utils/Utils';
import { ParseWithSchema } from '../utils/Validation';

export { DEFAULT_LEDGER_CONFIG };

/**
 * Load the node configuration from the working dir (or GAUGE_NODE_CONFIG_FILE)
 */
export function GetNodeConfig(filename = GAUGE_NODE_CONFIG_FILE): NodeConfig {
  if (!fs.existsSync(filename)) {
    throw new Error(`CANNOT FIND NODE CONFIGURATION FILE ${filename}`);
  }
  Log(`GetNodeConfig: loading configuration from ${filename}`);
  return ParseNodeConfig(ReadJSON<unknown>(filename));
}

export function ParseNodeConfig(raw: unknown): NodeConfig {
  return ParseWithSchema(nodeConfigSchema, raw, 'node config');
}

export function ParseLedgerConfig(raw: unknown): LedgerConfig {
  return ParseWithSchema(ledgerConfigSchema, raw, 'ledger', ['ledger']);
}
