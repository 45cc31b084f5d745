export { CoreRoles, RoleRegistry, requireRole } from './ledger/Authorization';
export type { Authorizer } from './ledger/Authorization';
export { default as CheckpointLog } from './ledger/CheckpointLog';
export type { Checkpoint } from './ledger/CheckpointLog';
export { ManualClock, SystemClock } from './ledger/Clock';
export type { Clock } from './ledger/Clock';
export type {
  BalanceHook,
  BalanceHost,
  DebtCeilingOracle,
  ExemptionPolicy,
  GaugeStatusHook,
  LossGate
} from './ledger/Collaborators';
export { CycleClock } from './ledger/CycleClock';
export { DelegationLedger } from './ledger/DelegationLedger';
export type { DelegationLedgerOptions } from './ledger/DelegationLedger';
export { GaugeRegistry } from './ledger/GaugeRegistry';
export { createGaugeSystem } from './ledger/GaugeSystem';
export type { GaugeSystem, GaugeSystemDependencies } from './ledger/GaugeSystem';
export { GovernanceToken } from './ledger/GovernanceToken';
export { LedgerStore, StagedCell, StagedTable } from './ledger/LedgerStore';
export { LossTracker } from './ledger/LossTracker';
export { OperationJournal, applyOperation, parseOperation } from './ledger/OperationJournal';
export { RateLimitedMinter } from './ledger/RateLimitedMinter';
export type { RateLimitedMinterOptions } from './ledger/RateLimitedMinter';
export { WeightLedger } from './ledger/WeightLedger';
export type { WeightLedgerOptions } from './ledger/WeightLedger';

export { ArithmeticFault, LedgerError, LedgerErrorCode, isLedgerError } from './model/Errors';
export { GaugeStatus } from './model/Gauge';
export type { Gauge, GaugeInfo, GaugeUser, GaugesFileStructure } from './model/Gauge';
export { ledgerConfigSchema, minterConfigSchema } from './model/LedgerConfig';
export type { LedgerConfig, MinterConfig } from './model/LedgerConfig';
export type { LedgerEvent, LedgerEventListener, LedgerEventName } from './model/LedgerEvents';
export { nodeConfigSchema } from './model/NodeConfig';
export type { LossApplierConfig, NodeConfig, RoleAssignment } from './model/NodeConfig';
export { operationSchema } from './model/Operation';
export type { Operation, OperationName, ReplayResult } from './model/Operation';

export { DEFAULT_LEDGER_CONFIG, GetNodeConfig, ParseLedgerConfig, ParseNodeConfig } from './config/Config';
export { createApi } from './api/Api';
export { default as GaugeIndexer } from './datafetch/GaugeIndexer';
export { default as LossApplier } from './processors/LossApplier';
