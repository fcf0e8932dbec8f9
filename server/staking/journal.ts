import { createHash } from 'crypto';
import { JournalEntry, StakingNotification } from '../../shared/schema';
import { InvariantViolation } from './errors';

export const GENESIS_HASH = 'GENESIS';

export interface JournalIntegrityReport {
  ok: boolean;
  errors: string[];
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => canonicalize(item));
  }

  if (value && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    const record: Record<string, unknown> = { ...value };
    for (const key of Object.keys(record).sort()) {
      sorted[key] = canonicalize(record[key]);
    }
    return sorted;
  }

  return value;
}

export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function sha256Hex(value: unknown): string {
  return createHash('sha256').update(canonicalJson(value)).digest('hex');
}

function hashEntry(entry: JournalEntry): string {
  const { event_hash: _omitted, ...rest } = entry;
  return sha256Hex(rest);
}

/**
 * Append-only, hash-chained record of every successful ledger operation.
 * Indexers poll it with `entriesSince`.
 */
export class Journal {
  private entries: JournalEntry[] = [];

  constructor(initialEntries?: JournalEntry[]) {
    if (initialEntries && initialEntries.length > 0) {
      this.entries = [...initialEntries];
    }
  }

  getEntries(): JournalEntry[] {
    return [...this.entries];
  }

  entriesSince(sequence: number): JournalEntry[] {
    return this.entries.filter((entry) => entry.sequence >= sequence);
  }

  get length(): number {
    return this.entries.length;
  }

  getLatestHash(): string {
    if (this.entries.length === 0) {
      return GENESIS_HASH;
    }
    return this.entries[this.entries.length - 1].event_hash;
  }

  append(notification: StakingNotification, timestamp: number): JournalEntry {
    const prev_hash = this.getLatestHash();
    const sequence = this.entries.length;
    const id = sha256Hex({ prev_hash, sequence, type: notification.type });

    const unsealed: JournalEntry = {
      ...notification,
      id,
      sequence,
      timestamp,
      prev_hash,
      event_hash: '',
    };
    const entry: JournalEntry = { ...unsealed, event_hash: hashEntry(unsealed) };

    this.entries.push(entry);
    return entry;
  }

  /** Discards entries appended after `length`; used when a transfer reverts. */
  rollbackTo(length: number): void {
    if (!Number.isSafeInteger(length) || length < 0 || length > this.entries.length) {
      throw new InvariantViolation('journal rollback point out of range', { length });
    }
    this.entries.length = length;
  }

  verifyIntegrity(): JournalIntegrityReport {
    const errors: string[] = [];
    for (let i = 0; i < this.entries.length; i += 1) {
      const entry = this.entries[i];
      const expectedPrev = i === 0 ? GENESIS_HASH : this.entries[i - 1].event_hash;
      if (entry.prev_hash !== expectedPrev) {
        errors.push(`entry ${entry.id} has invalid prev_hash`);
      }
      if (entry.sequence !== i) {
        errors.push(`entry ${entry.id} has sequence ${entry.sequence}, expected ${i}`);
      }
      if (entry.event_hash !== hashEntry(entry)) {
        errors.push(`entry ${entry.id} has invalid event_hash`);
      }
    }

    return { ok: errors.length === 0, errors };
  }
}
