import { JournalEntry, OperationEnvelope, OperationKind } from '../../shared/schema';
import { auditConservation, ConservationReport } from './audit';
import { InMemoryAuthorityRegistry } from './authority';
import { DEFAULT_STAKING_CONFIG, StakingConfig } from './config';
import { ValidationError } from './errors';
import { Journal, JournalIntegrityReport } from './journal';
import { StakeLedger, StakeLedgerOptions } from './ledger';
import { CHECKPOINT_VERSION } from './migrations';
import { LedgerState } from './state';
import { CheckpointFileStore, StakingCheckpoint } from './store';
import { InMemoryVault } from './transfer';

export interface StakingRuntimeComponents {
  journal?: Journal;
  state?: LedgerState;
  authority?: InMemoryAuthorityRegistry;
  vault?: InMemoryVault;
}

export interface RuntimeAuditReport {
  ok: boolean;
  conservation: ConservationReport;
  journal: JournalIntegrityReport;
}

const OPERATION_KINDS = new Set<string>(Object.values(OperationKind));

export class StakingRuntime {
  readonly journal: Journal;
  readonly state: LedgerState;
  readonly authority: InMemoryAuthorityRegistry;
  readonly vault: InMemoryVault;
  readonly ledger: StakeLedger;

  constructor(components: StakingRuntimeComponents = {}, options?: StakeLedgerOptions) {
    this.journal = components.journal ?? new Journal();
    this.state = components.state ?? new LedgerState();
    this.authority = components.authority ?? new InMemoryAuthorityRegistry();
    this.vault = components.vault ?? new InMemoryVault();
    this.ledger = new StakeLedger(this.state, this.journal, this.authority, this.vault, options);
  }

  execute(envelope: OperationEnvelope): JournalEntry {
    this.assertValidEnvelope(envelope);
    const { caller } = envelope;

    switch (envelope.kind) {
      case OperationKind.SET_CONFIGURATION:
        return this.ledger.setConfiguration(
          caller,
          envelope.payload.deposit_floor,
          envelope.payload.cooldown_period,
        );
      case OperationKind.REGISTER:
        return this.ledger.register(caller, envelope.payload.amount);
      case OperationKind.UNREGISTER:
        return this.ledger.unregister(caller);
      case OperationKind.STAKE:
        return this.ledger.stake(caller, envelope.payload.amount);
      case OperationKind.UNSTAKE:
        return this.ledger.unstake(caller, envelope.payload.amount);
      case OperationKind.SLASH:
        return this.ledger.slash(caller, envelope.payload.target, envelope.payload.amount);
      case OperationKind.SWEEP:
        return this.ledger.sweep(caller, envelope.payload.amount);
    }
  }

  audit(): RuntimeAuditReport {
    const conservation = auditConservation(this.state, this.vault.custodyBalance());
    const journal = this.journal.verifyIntegrity();
    return { ok: conservation.ok && journal.ok, conservation, journal };
  }

  createCheckpoint(): StakingCheckpoint {
    return {
      version: CHECKPOINT_VERSION,
      saved_at: new Date().toISOString(),
      journal: this.journal.getEntries(),
      state: this.state.snapshot(),
      authority: this.authority.list(),
      vault: this.vault.snapshot(),
    };
  }

  async saveToStore(store: CheckpointFileStore): Promise<void> {
    await store.save(this.createCheckpoint());
  }

  /** A fresh ledger seeded from configuration: parameters and initial admins. */
  static fromConfig(config: StakingConfig = DEFAULT_STAKING_CONFIG, options?: StakeLedgerOptions): StakingRuntime {
    const state = new LedgerState();
    state.setConfiguration(config.configuration);
    return new StakingRuntime(
      { state, authority: new InMemoryAuthorityRegistry(config.admins) },
      { reentrancyGuard: config.reentrancy_guard, ...options },
    );
  }

  /** Rejects a checkpoint that owes stake or confiscated value but carries no vault to back it. */
  static fromCheckpoint(checkpoint: StakingCheckpoint, options?: StakeLedgerOptions): StakingRuntime {
    const state = new LedgerState(checkpoint.state);
    const owed = state.totalStaked() + state.getConfiscatedTotal();
    if (!checkpoint.vault && owed > 0) {
      throw new ValidationError('checkpoint owes value but has no vault', { owed });
    }
    return new StakingRuntime(
      {
        journal: new Journal(checkpoint.journal),
        state,
        authority: new InMemoryAuthorityRegistry(checkpoint.authority),
        vault: checkpoint.vault ? new InMemoryVault(checkpoint.vault) : undefined,
      },
      options,
    );
  }

  /**
   * Loads the persisted ledger, migrating older checkpoints first. The config
   * file only seeds a ledger that has never been saved.
   */
  static async loadFromStore(
    store: CheckpointFileStore,
    config: StakingConfig = DEFAULT_STAKING_CONFIG,
    options?: StakeLedgerOptions,
  ): Promise<StakingRuntime> {
    const loaded = await store.load();
    if (!loaded) {
      return StakingRuntime.fromConfig(config, options);
    }
    return StakingRuntime.fromCheckpoint(loaded.checkpoint, {
      reentrancyGuard: config.reentrancy_guard,
      ...options,
    });
  }

  private assertValidEnvelope(envelope: OperationEnvelope): void {
    if (!envelope || typeof envelope !== 'object') {
      throw new ValidationError('operation envelope is required');
    }
    if (!OPERATION_KINDS.has(envelope.kind)) {
      throw new ValidationError(`unsupported operation kind: ${String(envelope.kind)}`);
    }
    if (typeof envelope.caller !== 'string' || envelope.caller.trim().length === 0) {
      throw new ValidationError('operation caller is required');
    }
    if (envelope.kind !== OperationKind.UNREGISTER) {
      if (!envelope.payload || typeof envelope.payload !== 'object') {
        throw new ValidationError(`${envelope.kind} payload is required`);
      }
    }
    if (envelope.kind === OperationKind.SLASH && typeof envelope.payload.target !== 'string') {
      throw new ValidationError('slash target is required');
    }
  }
}
