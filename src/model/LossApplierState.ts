export interface LossApplierState {
  gauges: { [gaugeAddress: string]: LossApplierGaugeState };
}

export interface LossApplierGaugeState {
  users: { [userAddress: string]: LossApplierUserState };
}

export interface LossApplierUserState {
  lastCheckedTimestamp: number; // in ms
  failReason: string;
}
