export enum GaugeStatus {
  ACTIVE = 'active',
  DEPRECATED = 'deprecated'
}

export interface GaugeInfo {
  gaugeType: number;
  status: GaugeStatus;
}

// index built from ledger events, written to gauges.json
export interface Gauge {
  address: string;
  gaugeType: number;
  status: GaugeStatus;
  weight: bigint;
  lastLoss: number; // unix timestamp sec
  users: { [userAddress: string]: GaugeUser };
}

export interface GaugeUser {
  address: string;
  weight: bigint;
  lastLossApplied: number; // unix timestamp sec
}

export interface GaugesFileStructure {
  updated: number;
  updatedHuman: string;
  gauges: { [gaugeAddress: string]: Gauge };
}
