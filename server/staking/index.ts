export {
  AuthorizationError,
  InvariantViolation,
  isStakingError,
  PreconditionError,
  ReentrancyError,
  StakingError,
  TransferFailedError,
  ValidationError,
} from './errors';
export type { PreconditionCode, StakingErrorCategory, StakingErrorCode } from './errors';
export { auditConservation } from './audit';
export type { ConservationReport } from './audit';
export { InMemoryAuthorityRegistry } from './authority';
export type { AuthorityCheck } from './authority';
export { DEFAULT_STAKING_CONFIG, loadStakingConfig, parseStakingConfig } from './config';
export type { StakingConfig } from './config';
export { canonicalJson, GENESIS_HASH, Journal, sha256Hex } from './journal';
export type { JournalIntegrityReport } from './journal';
export { StakeLedger, systemClock } from './ledger';
export type { StakeLedgerOptions } from './ledger';
export { CHECKPOINT_MIGRATIONS, CHECKPOINT_VERSION, migrateCheckpoint } from './migrations';
export type { CheckpointMigration, RawCheckpoint } from './migrations';
export { StakingRuntime } from './runtime';
export type { RuntimeAuditReport, StakingRuntimeComponents } from './runtime';
export { ABSENT_PARTICIPANT, LedgerState } from './state';
export type { LedgerSnapshot } from './state';
export { CheckpointFileStore } from './store';
export type { LoadedCheckpoint, StakingCheckpoint } from './store';
export { InMemoryVault } from './transfer';
export type { RecipientHook, TransferResult, ValueTransfer, VaultSnapshot } from './transfer';
