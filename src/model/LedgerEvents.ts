// events are buffered per transaction and delivered only once it commits

export type LedgerEvent =
  | { name: 'AddGauge'; gauge: string; gaugeType: number }
  | { name: 'RemoveGauge'; gauge: string }
  | { name: 'MaxLiveGaugesUpdate'; oldValue: number; newValue: number }
  | { name: 'IncrementGaugeWeight'; user: string; gauge: string; weight: bigint; cycleEnd: number; when: number }
  | { name: 'DecrementGaugeWeight'; user: string; gauge: string; weight: bigint; cycleEnd: number; when: number }
  | { name: 'MaxGaugesUpdate'; oldMaxGauges: number; newMaxGauges: number }
  | { name: 'CanExceedMaxGaugesUpdate'; account: string; canExceedMaxGauges: boolean }
  | { name: 'GaugeLoss'; gauge: string; when: number }
  | { name: 'GaugeLossApply'; gauge: string; who: string; weight: bigint; when: number }
  | { name: 'Transfer'; from: string; to: string; value: bigint }
  | { name: 'Approval'; owner: string; spender: string; value: bigint }
  | { name: 'TransferEnabled' }
  | { name: 'Delegation'; delegator: string; delegatee: string; amount: bigint }
  | { name: 'Undelegation'; delegator: string; delegatee: string; amount: bigint }
  | { name: 'DelegateVotesChanged'; delegate: string; previousBalance: bigint; newBalance: bigint }
  | { name: 'MaxDelegatesUpdate'; oldMaxDelegates: number; newMaxDelegates: number }
  | { name: 'CanExceedMaxDelegatesUpdate'; account: string; canExceedMaxDelegates: boolean }
  | { name: 'BufferUsed'; amountUsed: bigint; bufferRemaining: bigint }
  | { name: 'BufferReplenished'; amountReplenished: bigint; bufferRemaining: bigint }
  | { name: 'RateLimitPerSecondUpdate'; oldRateLimitPerSecond: bigint; newRateLimitPerSecond: bigint }
  | { name: 'BufferCapUpdate'; oldBufferCap: bigint; newBufferCap: bigint };

export type LedgerEventName = LedgerEvent['name'];

export type LedgerEventListener = (events: readonly LedgerEvent[]) => void;
