// Seams between the ledger components and the collaborators around them.

/** The fungible balance the weights are bounded by */
export interface BalanceHost {
  balanceOf(user: string): bigint;
  /** burn `amount` from `user` to settle a gauge loss */
  burnForLoss(user: string, amount: bigint): void;
}

/** Called by the BalanceHost inside the transaction of the balance change */
export interface BalanceHook {
  beforeTransfer?(from: string, to: string, amount: bigint): void;
  beforeBalanceDecrease?(user: string, nextBalance: bigint): void;
}

export interface LossGate {
  hasPendingLoss(user: string, gauge: string): boolean;
  hasAnyPendingLoss(user: string): boolean;
  /** a user just went from zero to non zero weight in `gauge` */
  onAllocationOpened(user: string, gauge: string, now: number): void;
}

/** Issuance side check: may `gauge` lose `weightDelta` (negative) of weight */
export interface DebtCeilingOracle {
  debtCeilingCheck(gauge: string, weightDelta: bigint): boolean;
}

/** Accounts allowed to be flagged as exempt from the max gauges / max delegates caps */
export type ExemptionPolicy = (account: string) => boolean;

export interface GaugeStatusHook {
  onGaugeActivated(gauge: string, gaugeType: number): void;
  onGaugeDeprecated(gauge: string, gaugeType: number): void;
}
