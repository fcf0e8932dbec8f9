import { ValidationError } from './errors';

export type RawCheckpoint = Record<string, unknown>;

export interface CheckpointMigration {
  from: string;
  to: string;
  migrate(checkpoint: RawCheckpoint): RawCheckpoint;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

// 1.0.0 kept a single operator in state.admin_id.
const moveAdminIntoAuthority: CheckpointMigration = {
  from: '1.0.0',
  to: '1.1.0',
  migrate(checkpoint) {
    const state = checkpoint.state;
    if (!isRecord(state)) {
      throw new ValidationError('checkpoint state is required');
    }
    const { admin_id, ...rest } = state;
    const authority: string[] = [];
    if (admin_id !== undefined && admin_id !== null && admin_id !== '') {
      if (typeof admin_id !== 'string') {
        throw new ValidationError('checkpoint admin_id must be a string');
      }
      authority.push(admin_id);
    }
    return { ...checkpoint, version: '1.1.0', state: rest, authority };
  },
};

export const CHECKPOINT_MIGRATIONS: readonly CheckpointMigration[] = [moveAdminIntoAuthority];

export const CHECKPOINT_VERSION = '1.1.0';

/**
 * Applies migrations in order until the checkpoint reaches `target`.
 * Returns the steps applied alongside the upgraded checkpoint.
 */
export function migrateCheckpoint(
  raw: unknown,
  target = CHECKPOINT_VERSION,
  migrations: readonly CheckpointMigration[] = CHECKPOINT_MIGRATIONS,
): { checkpoint: RawCheckpoint; applied: string[] } {
  if (!isRecord(raw)) {
    throw new ValidationError('checkpoint is required');
  }

  let checkpoint: RawCheckpoint = raw;
  const applied: string[] = [];
  const visited = new Set<string>();

  while (checkpoint.version !== target) {
    const version = checkpoint.version;
    if (typeof version !== 'string' || version.length === 0) {
      throw new ValidationError('checkpoint version is required');
    }
    if (visited.has(version)) {
      throw new ValidationError(`checkpoint migration cycle at ${version}`);
    }
    visited.add(version);

    const step = migrations.find((migration) => migration.from === version);
    if (!step) {
      throw new ValidationError(`unsupported checkpoint version: ${version}`);
    }
    checkpoint = step.migrate(checkpoint);
    if (checkpoint.version !== step.to) {
      throw new ValidationError(`migration ${step.from} -> ${step.to} produced ${String(checkpoint.version)}`);
    }
    applied.push(`${step.from}->${step.to}`);
  }

  return { checkpoint, applied };
}
