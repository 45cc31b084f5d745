export enum LedgerErrorCode {
  InvalidGauge = 'InvalidGauge',
  MaxLiveGauges = 'MaxLiveGauges',
  ExceedMaxGauges = 'ExceedMaxGauges',
  Overweight = 'Overweight',
  FreezePeriod = 'FreezePeriod',
  SizeMismatch = 'SizeMismatch',
  PendingLoss = 'PendingLoss',
  NoLossToApply = 'NoLossToApply',
  DebtCeilingUsed = 'DebtCeilingUsed',
  NotExemptTarget = 'NotExemptTarget',
  Unauthorized = 'Unauthorized',
  InvalidAddress = 'InvalidAddress',
  InsufficientBalance = 'InsufficientBalance',
  InsufficientAllowance = 'InsufficientAllowance',
  NotTransferable = 'NotTransferable',
  DelegationError = 'DelegationError',
  UndelegationError = 'UndelegationError',
  FutureLookup = 'FutureLookup',
  RateLimitHit = 'RateLimitHit',
  RateLimitTooHigh = 'RateLimitTooHigh'
}

/**
 * Business rule violation. The operation that threw it left the ledger unchanged.
 */
export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = 'LedgerError';
    this.code = code;
  }
}

/**
 * Underflow or negative amount. Points at a caller bug rather than a rejected request.
 */
export class ArithmeticFault extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArithmeticFault';
  }
}

export function isLedgerError(error: unknown, code?: LedgerErrorCode): error is LedgerError {
  return error instanceof LedgerError && (code === undefined || error.code == code);
}
