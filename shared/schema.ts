/**
 * Stake Ledger: Core Type Definitions
 *
 * These types define the fundamental data structures for:
 * - Participants (registered identities and their stake)
 * - Configuration (deposit floor and cooldown)
 * - Operations (envelopes submitted to the ledger)
 * - Journal (hash-chained notifications of every successful operation)
 */

// =============================================================================
// ENUMS
// =============================================================================

export enum OperationKind {
  SET_CONFIGURATION = 'SET_CONFIGURATION',
  REGISTER = 'REGISTER',
  UNREGISTER = 'UNREGISTER',
  STAKE = 'STAKE',
  UNSTAKE = 'UNSTAKE',
  SLASH = 'SLASH',
  SWEEP = 'SWEEP',
}

export enum NotificationType {
  CONFIGURATION_UPDATED = 'CONFIGURATION_UPDATED',
  REGISTERED = 'REGISTERED',
  UNREGISTERED = 'UNREGISTERED',
  STAKED = 'STAKED',
  UNSTAKED = 'UNSTAKED',
  SLASHED = 'SLASHED',
  WITHDRAWN = 'WITHDRAWN',
}

export enum ReentrancyGuardScope {
  UNREGISTER_ONLY = 'UNREGISTER_ONLY',
  ALL_WITHDRAWALS = 'ALL_WITHDRAWALS',
}

// =============================================================================
// PARTICIPANTS & CONFIGURATION
// =============================================================================

export interface ParticipantRecord {
  // Unix seconds; 0 means "not registered"
  registered_at: number;
  staked_amount: number;
}

export interface LedgerConfiguration {
  deposit_floor: number;
  // Seconds after registration before unstake/unregister are allowed
  cooldown_period: number;
}

// =============================================================================
// OPERATIONS
// =============================================================================

export interface SetConfigurationPayload {
  deposit_floor: number;
  cooldown_period: number;
}

export interface AmountPayload {
  amount: number;
}

export interface SlashPayload {
  target: string;
  amount: number;
}

export type EmptyPayload = Record<string, never>;

interface EnvelopeBase {
  id?: string;
  caller: string;
  created_at?: string;
}

export type OperationEnvelope =
  | (EnvelopeBase & { kind: OperationKind.SET_CONFIGURATION; payload: SetConfigurationPayload })
  | (EnvelopeBase & { kind: OperationKind.REGISTER; payload: AmountPayload })
  | (EnvelopeBase & { kind: OperationKind.UNREGISTER; payload?: EmptyPayload })
  | (EnvelopeBase & { kind: OperationKind.STAKE; payload: AmountPayload })
  | (EnvelopeBase & { kind: OperationKind.UNSTAKE; payload: AmountPayload })
  | (EnvelopeBase & { kind: OperationKind.SLASH; payload: SlashPayload })
  | (EnvelopeBase & { kind: OperationKind.SWEEP; payload: AmountPayload });

// =============================================================================
// JOURNAL
// =============================================================================

export type StakingNotification =
  | {
      type: NotificationType.CONFIGURATION_UPDATED;
      deposit_floor: number;
      cooldown_period: number;
    }
  | {
      type: Exclude<NotificationType, NotificationType.CONFIGURATION_UPDATED>;
      identity: string;
      amount: number;
    };

export type JournalEntry = StakingNotification & {
  id: string;
  sequence: number;
  // Unix seconds from the ledger clock
  timestamp: number;

  // Hash chaining
  prev_hash: string;
  event_hash: string;
};
