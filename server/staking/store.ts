import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { JournalEntry } from '../../shared/schema';
import { ValidationError } from './errors';
import { Journal } from './journal';
import { CHECKPOINT_VERSION, migrateCheckpoint } from './migrations';
import { LedgerSnapshot } from './state';
import { VaultSnapshot } from './transfer';

export interface StakingCheckpoint {
  version: string;
  saved_at: string;
  journal: JournalEntry[];
  state: LedgerSnapshot;
  authority: string[];
  vault?: VaultSnapshot;
}

export interface LoadedCheckpoint {
  checkpoint: StakingCheckpoint;
  migrations: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function isCount(value: unknown): boolean {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

function assertValidState(state: unknown): void {
  if (!isRecord(state)) {
    throw new ValidationError('checkpoint state is required');
  }
  if (!isRecord(state.participants)) {
    throw new ValidationError('checkpoint state.participants must be an object');
  }
  for (const [identity, record] of Object.entries(state.participants)) {
    if (!isRecord(record) || !isCount(record.registered_at) || !isCount(record.staked_amount)) {
      throw new ValidationError(`checkpoint participant ${identity} is malformed`, record);
    }
    if (record.registered_at === 0 && record.staked_amount !== 0) {
      throw new ValidationError(`checkpoint participant ${identity} holds stake without a registration`);
    }
  }
  const configuration = state.configuration;
  if (!isRecord(configuration) || !isCount(configuration.deposit_floor) || !isCount(configuration.cooldown_period)) {
    throw new ValidationError('checkpoint state.configuration is malformed', configuration);
  }
  if (!isCount(state.confiscated_total)) {
    throw new ValidationError('checkpoint state.confiscated_total must be a non-negative safe integer');
  }
}

function assertValidVault(vault: unknown): void {
  if (vault === undefined) {
    return;
  }
  if (!isRecord(vault) || !isRecord(vault.balances) || !isCount(vault.custody)) {
    throw new ValidationError('checkpoint vault is malformed');
  }
  for (const [identity, balance] of Object.entries(vault.balances)) {
    if (!isCount(balance)) {
      throw new ValidationError(`checkpoint vault balance for ${identity} is malformed`);
    }
  }
}

export class CheckpointFileStore {
  constructor(private filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<LoadedCheckpoint | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    const { checkpoint, applied } = migrateCheckpoint(JSON.parse(raw));
    this.assertValidCheckpoint(checkpoint);
    this.validateJournalIntegrity(checkpoint);
    return { checkpoint, migrations: applied };
  }

  async save(checkpoint: StakingCheckpoint): Promise<void> {
    this.assertValidCheckpoint(checkpoint);
    await mkdir(dirname(this.filePath), { recursive: true });

    const payload = JSON.stringify(checkpoint, null, 2);
    const tempPath = `${this.filePath}.tmp`;
    await writeFile(tempPath, payload, 'utf8');
    await rm(this.filePath, { force: true });
    await rename(tempPath, this.filePath);
  }

  validateJournalIntegrity(checkpoint: StakingCheckpoint): void {
    const report = new Journal(checkpoint.journal).verifyIntegrity();
    if (!report.ok) {
      throw new ValidationError('journal integrity check failed', report.errors);
    }
  }

  private assertValidCheckpoint(checkpoint: unknown): asserts checkpoint is StakingCheckpoint {
    if (!checkpoint || typeof checkpoint !== 'object') {
      throw new ValidationError('checkpoint is required');
    }
    const fields: Record<string, unknown> = { ...checkpoint };
    if (fields.version !== CHECKPOINT_VERSION) {
      throw new ValidationError(`checkpoint version must be ${CHECKPOINT_VERSION}`);
    }
    if (typeof fields.saved_at !== 'string' || !fields.saved_at) {
      throw new ValidationError('checkpoint saved_at is required');
    }
    if (!Array.isArray(fields.journal) || !fields.journal.every(isRecord)) {
      throw new ValidationError('checkpoint journal must list entries');
    }
    assertValidState(fields.state);
    assertValidVault(fields.vault);
    if (!Array.isArray(fields.authority) || fields.authority.some((id) => typeof id !== 'string')) {
      throw new ValidationError('checkpoint authority must list identities');
    }
  }
}
