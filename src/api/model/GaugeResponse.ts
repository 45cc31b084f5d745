// amounts are decimal strings
export interface GaugeResponse {
  address: string;
  gaugeType: number;
  status: string;
  weight: string;
  storedWeight: string;
  lastLoss: number;
  users: GaugeUserResponse[];
}

export interface GaugeUserResponse {
  address: string;
  weight: string;
  lastLossApplied: number;
}

export interface GaugesResponse {
  updated: number;
  updatedHuman: string;
  gauges: GaugeResponse[];
}

export interface AllocationResponse {
  gauge: string;
  amount: string;
  allocation: string;
  storedAllocation: string;
}

export interface TotalsResponse {
  currentCycle: number;
  inFreezeWindow: boolean;
  totalWeight: string;
  storedTotalWeight: string;
  liveGauges: number;
  deprecatedGauges: number;
  types: GaugeTypeResponse[];
}

export interface GaugeTypeResponse {
  gaugeType: number;
  weight: string;
  storedWeight: string;
}
