import { LedgerConfiguration, ParticipantRecord } from '../../shared/schema';
import { InvariantViolation } from './errors';

export interface LedgerSnapshot {
  participants: Record<string, ParticipantRecord>;
  configuration: LedgerConfiguration;
  confiscated_total: number;
}

export const ABSENT_PARTICIPANT: Readonly<ParticipantRecord> = Object.freeze({
  registered_at: 0,
  staked_amount: 0,
});

function assertBalance(value: number, label: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvariantViolation(`${label} must be a non-negative safe integer`, { value });
  }
}

/**
 * Participant records, configuration and the confiscated pool.
 * Enforces record shape only; business rules live in StakeLedger.
 */
export class LedgerState {
  private participants: Map<string, ParticipantRecord> = new Map();
  private configuration: LedgerConfiguration = { deposit_floor: 0, cooldown_period: 0 };
  private confiscatedTotal = 0;

  constructor(snapshot?: LedgerSnapshot) {
    if (snapshot) {
      this.restore(snapshot);
    }
  }

  getParticipant(identity: string): ParticipantRecord {
    const record = this.participants.get(identity);
    return record ? { ...record } : { ...ABSENT_PARTICIPANT };
  }

  isRegistered(identity: string): boolean {
    return this.participants.has(identity);
  }

  listParticipants(): Array<{ identity: string; record: ParticipantRecord }> {
    return [...this.participants.entries()].map(([identity, record]) => ({
      identity,
      record: { ...record },
    }));
  }

  createParticipant(identity: string, registeredAt: number, stakedAmount: number): ParticipantRecord {
    if (this.participants.has(identity)) {
      throw new InvariantViolation(`participant already exists: ${identity}`);
    }
    if (!Number.isSafeInteger(registeredAt) || registeredAt <= 0) {
      throw new InvariantViolation('registered_at must be a positive safe integer', { registeredAt });
    }
    assertBalance(stakedAmount, 'staked_amount');

    const record: ParticipantRecord = { registered_at: registeredAt, staked_amount: stakedAmount };
    this.participants.set(identity, record);
    return { ...record };
  }

  setStakedAmount(identity: string, stakedAmount: number): ParticipantRecord {
    const existing = this.participants.get(identity);
    if (!existing) {
      throw new InvariantViolation(`participant not found: ${identity}`);
    }
    assertBalance(stakedAmount, 'staked_amount');

    const updated: ParticipantRecord = { ...existing, staked_amount: stakedAmount };
    this.participants.set(identity, updated);
    return { ...updated };
  }

  /** Removes the record and returns what it held. */
  deleteParticipant(identity: string): ParticipantRecord {
    const existing = this.participants.get(identity);
    if (!existing) {
      throw new InvariantViolation(`participant not found: ${identity}`);
    }
    this.participants.delete(identity);
    return { ...existing };
  }

  getConfiguration(): LedgerConfiguration {
    return { ...this.configuration };
  }

  setConfiguration(configuration: LedgerConfiguration): void {
    assertBalance(configuration.deposit_floor, 'deposit_floor');
    assertBalance(configuration.cooldown_period, 'cooldown_period');
    this.configuration = { ...configuration };
  }

  getConfiscatedTotal(): number {
    return this.confiscatedTotal;
  }

  setConfiscatedTotal(total: number): void {
    assertBalance(total, 'confiscated_total');
    this.confiscatedTotal = total;
  }

  totalStaked(): number {
    let total = 0;
    for (const record of this.participants.values()) {
      total += record.staked_amount;
    }
    return total;
  }

  snapshot(): LedgerSnapshot {
    const participants: Record<string, ParticipantRecord> = {};
    for (const [identity, record] of this.participants.entries()) {
      participants[identity] = { ...record };
    }

    return {
      participants,
      configuration: { ...this.configuration },
      confiscated_total: this.confiscatedTotal,
    };
  }

  restore(snapshot: LedgerSnapshot): void {
    const participants = new Map<string, ParticipantRecord>();
    for (const [identity, record] of Object.entries(snapshot.participants ?? {})) {
      if (!record || typeof record !== 'object') {
        throw new InvariantViolation(`participant record missing: ${identity}`);
      }
      if (record.registered_at === 0) {
        if (record.staked_amount !== 0) {
          throw new InvariantViolation(`unregistered participant holds stake: ${identity}`);
        }
        continue;
      }
      assertBalance(record.registered_at, 'registered_at');
      assertBalance(record.staked_amount, 'staked_amount');
      participants.set(identity, { ...record });
    }

    const configuration = snapshot.configuration ?? { deposit_floor: 0, cooldown_period: 0 };
    assertBalance(configuration.deposit_floor, 'deposit_floor');
    assertBalance(configuration.cooldown_period, 'cooldown_period');
    assertBalance(snapshot.confiscated_total ?? 0, 'confiscated_total');

    this.participants = participants;
    this.configuration = { ...configuration };
    this.confiscatedTotal = snapshot.confiscated_total ?? 0;
  }
}
