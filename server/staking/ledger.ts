import {
  JournalEntry,
  LedgerConfiguration,
  NotificationType,
  ParticipantRecord,
  ReentrancyGuardScope,
  StakingNotification,
} from '../../shared/schema';
import { AuthorityCheck } from './authority';
import {
  AuthorizationError,
  InvariantViolation,
  PreconditionError,
  ReentrancyError,
  TransferFailedError,
  ValidationError,
} from './errors';
import { Journal } from './journal';
import { LedgerSnapshot, LedgerState } from './state';
import { TransferResult, ValueTransfer } from './transfer';

type TransferFailure = Extract<TransferResult, { ok: false }>;

interface Savepoint {
  state: LedgerSnapshot;
  journalLength: number;
}

export interface StakeLedgerOptions {
  /** Unix seconds. */
  clock?: () => number;
  reentrancyGuard?: ReentrancyGuardScope;
}

export function systemClock(): number {
  return Math.floor(Date.now() / 1000);
}

function checkedAdd(left: number, right: number, label: string): number {
  const sum = left + right;
  if (!Number.isSafeInteger(sum)) {
    throw new InvariantViolation(`${label} overflow`, { left, right });
  }
  return sum;
}

export class StakeLedger {
  private clock: () => number;
  private guardScope: ReentrancyGuardScope;
  private locked = false;

  constructor(
    private state: LedgerState,
    private journal: Journal,
    private authority: AuthorityCheck,
    private transfer: ValueTransfer,
    options?: StakeLedgerOptions,
  ) {
    this.clock = options?.clock ?? systemClock;
    this.guardScope = options?.reentrancyGuard ?? ReentrancyGuardScope.UNREGISTER_ONLY;
  }

  get reentrancyGuard(): ReentrancyGuardScope {
    return this.guardScope;
  }

  get isLocked(): boolean {
    return this.locked;
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  getParticipant(identity: string): ParticipantRecord {
    return this.state.getParticipant(identity);
  }

  isRegistered(identity: string): boolean {
    return this.state.isRegistered(identity);
  }

  getConfiguration(): LedgerConfiguration {
    return this.state.getConfiguration();
  }

  getConfiscatedTotal(): number {
    return this.state.getConfiscatedTotal();
  }

  totalStaked(): number {
    return this.state.totalStaked();
  }

  listParticipants(): Array<{ identity: string; record: ParticipantRecord }> {
    return this.state.listParticipants();
  }

  /** First second at which the participant may unstake or unregister. */
  cooldownEndsAt(identity: string): number | undefined {
    if (!this.state.isRegistered(identity)) {
      return undefined;
    }
    const record = this.state.getParticipant(identity);
    return record.registered_at + this.state.getConfiguration().cooldown_period;
  }

  // ---------------------------------------------------------------------------
  // Operations
  // ---------------------------------------------------------------------------

  setConfiguration(caller: string, depositFloor: number, cooldownPeriod: number): JournalEntry {
    this.assertIdentity(caller, 'caller');
    this.assertAmount(depositFloor, 'deposit floor');
    this.assertAmount(cooldownPeriod, 'cooldown period');
    this.assertUnlocked('setConfiguration');
    this.assertAdmin(caller);

    const now = this.now();
    this.state.setConfiguration({ deposit_floor: depositFloor, cooldown_period: cooldownPeriod });
    return this.emit(
      {
        type: NotificationType.CONFIGURATION_UPDATED,
        deposit_floor: depositFloor,
        cooldown_period: cooldownPeriod,
      },
      now,
    );
  }

  register(caller: string, depositAmount: number): JournalEntry {
    this.assertIdentity(caller, 'caller');
    this.assertAmount(depositAmount, 'deposit amount');
    this.assertUnlocked('register');

    if (this.state.isRegistered(caller)) {
      throw new PreconditionError('ALREADY_REGISTERED', `already registered: ${caller}`);
    }
    const { deposit_floor } = this.state.getConfiguration();
    if (depositAmount < deposit_floor) {
      throw new PreconditionError('INSUFFICIENT_DEPOSIT', 'deposit below floor', {
        deposit_amount: depositAmount,
        deposit_floor,
      });
    }

    const now = this.now();
    this.collect(caller, depositAmount);
    this.state.createParticipant(caller, now, depositAmount);
    return this.emit(
      { type: NotificationType.REGISTERED, identity: caller, amount: depositAmount },
      now,
    );
  }

  unregister(caller: string): JournalEntry {
    this.assertIdentity(caller, 'caller');

    return this.withLock('unregister', () => {
      const now = this.now();
      const record = this.requireRegistered(caller);
      this.assertCooldownElapsed(caller, record, now);

      const savepoint = this.savepoint();
      const released = this.state.deleteParticipant(caller);
      this.sendOut('unregister', caller, released.staked_amount, savepoint);

      return this.emit(
        { type: NotificationType.UNREGISTERED, identity: caller, amount: released.staked_amount },
        now,
      );
    });
  }

  stake(caller: string, amount: number): JournalEntry {
    this.assertIdentity(caller, 'caller');
    this.assertAmount(amount, 'stake amount');
    this.assertUnlocked('stake');

    if (amount === 0) {
      throw new PreconditionError('ZERO_AMOUNT', 'stake amount must be greater than zero');
    }
    const record = this.requireRegistered(caller);
    const next = checkedAdd(record.staked_amount, amount, 'staked amount');

    const now = this.now();
    this.collect(caller, amount);
    this.state.setStakedAmount(caller, next);
    return this.emit({ type: NotificationType.STAKED, identity: caller, amount }, now);
  }

  unstake(caller: string, amount: number): JournalEntry {
    this.assertIdentity(caller, 'caller');
    this.assertAmount(amount, 'unstake amount');

    return this.guardWithdrawal('unstake', () => {
      const now = this.now();
      const record = this.requireRegistered(caller);
      if (amount > record.staked_amount) {
        throw new PreconditionError('INSUFFICIENT_STAKE', `insufficient stake for ${caller}`, {
          requested: amount,
          staked: record.staked_amount,
        });
      }
      this.assertCooldownElapsed(caller, record, now);

      const savepoint = this.savepoint();
      this.state.setStakedAmount(caller, record.staked_amount - amount);
      this.sendOut('unstake', caller, amount, savepoint);

      return this.emit({ type: NotificationType.UNSTAKED, identity: caller, amount }, now);
    });
  }

  slash(caller: string, target: string, amount: number): JournalEntry {
    this.assertIdentity(caller, 'caller');
    this.assertIdentity(target, 'target');
    this.assertAmount(amount, 'slash amount');
    this.assertUnlocked('slash');
    this.assertAdmin(caller);

    const record = this.state.getParticipant(target);
    if (amount > record.staked_amount) {
      throw new PreconditionError('INSUFFICIENT_STAKE', `insufficient stake for ${target}`, {
        requested: amount,
        staked: record.staked_amount,
      });
    }
    const confiscated = checkedAdd(this.state.getConfiscatedTotal(), amount, 'confiscated total');

    const now = this.now();
    if (amount > 0) {
      this.state.setStakedAmount(target, record.staked_amount - amount);
      this.state.setConfiscatedTotal(confiscated);
    }
    return this.emit({ type: NotificationType.SLASHED, identity: target, amount }, now);
  }

  sweep(caller: string, amount: number): JournalEntry {
    this.assertIdentity(caller, 'caller');
    this.assertAmount(amount, 'sweep amount');

    return this.guardWithdrawal('sweep', () => {
      this.assertAdmin(caller);
      const now = this.now();
      const available = this.state.getConfiscatedTotal();
      if (amount > available) {
        throw new PreconditionError('INSUFFICIENT_FUNDS', 'insufficient confiscated funds', {
          requested: amount,
          available,
        });
      }

      const savepoint = this.savepoint();
      this.state.setConfiscatedTotal(available - amount);
      this.sendOut('sweep', caller, amount, savepoint);

      return this.emit({ type: NotificationType.WITHDRAWN, identity: caller, amount }, now);
    });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private withLock<T>(operation: string, fn: () => T): T {
    this.assertUnlocked(operation);
    this.locked = true;
    try {
      return fn();
    } finally {
      this.locked = false;
    }
  }

  private guardWithdrawal<T>(operation: string, fn: () => T): T {
    if (this.guardScope === ReentrancyGuardScope.ALL_WITHDRAWALS) {
      return this.withLock(operation, fn);
    }
    this.assertUnlocked(operation);
    return fn();
  }

  private assertUnlocked(operation: string): void {
    if (this.locked) {
      throw new ReentrancyError(`${operation} rejected while a withdrawal is in flight`);
    }
  }

  private assertAdmin(caller: string): void {
    if (!this.authority.hasAdminCapability(caller)) {
      throw new AuthorizationError(`caller lacks admin capability: ${caller}`);
    }
  }

  private assertIdentity(identity: string, label: string): void {
    if (typeof identity !== 'string' || identity.trim().length === 0) {
      throw new ValidationError(`${label} identity is required`);
    }
  }

  private assertAmount(amount: number, label: string): void {
    if (!Number.isSafeInteger(amount) || amount < 0) {
      throw new ValidationError(`${label} must be a non-negative safe integer`, { amount });
    }
  }

  private requireRegistered(identity: string): ParticipantRecord {
    if (!this.state.isRegistered(identity)) {
      throw new PreconditionError('NOT_REGISTERED', `not registered: ${identity}`);
    }
    return this.state.getParticipant(identity);
  }

  private assertCooldownElapsed(identity: string, record: ParticipantRecord, now: number): void {
    const endsAt = record.registered_at + this.state.getConfiguration().cooldown_period;
    if (now < endsAt) {
      throw new PreconditionError('COOLDOWN_NOT_ELAPSED', `cooldown active for ${identity}`, {
        now,
        ends_at: endsAt,
      });
    }
  }

  private now(): number {
    const now = this.clock();
    if (!Number.isSafeInteger(now) || now <= 0) {
      throw new InvariantViolation('clock must return positive unix seconds', { now });
    }
    return now;
  }

  private collect(identity: string, amount: number): void {
    if (amount === 0) {
      return;
    }
    const result = this.transfer.collect(identity, amount);
    if (!result.ok) {
      throw new TransferFailedError(`could not collect ${amount} from ${identity}: ${result.reason}`, {
        cause: result.cause,
      });
    }
  }

  private savepoint(): Savepoint {
    return { state: this.state.snapshot(), journalLength: this.journal.length };
  }

  /**
   * Pays out after state is committed. A failed send has already undone every value
   * movement made while it was in flight, so state and journal return to the savepoint,
   * discarding whatever nested calls committed in between.
   */
  private sendOut(operation: string, identity: string, amount: number, savepoint: Savepoint): void {
    if (amount === 0) {
      return;
    }
    const result = this.transfer.send(identity, amount);
    if (!result.ok) {
      this.state.restore(savepoint.state);
      this.journal.rollbackTo(savepoint.journalLength);
      throw this.transferFailed(operation, identity, amount, result);
    }
  }

  private transferFailed(
    operation: string,
    identity: string,
    amount: number,
    result: TransferFailure,
  ): TransferFailedError {
    return new TransferFailedError(
      `${operation} transfer of ${amount} to ${identity} failed: ${result.reason}`,
      { cause: result.cause },
    );
  }

  private emit(notification: StakingNotification, now: number): JournalEntry {
    return this.journal.append(notification, now);
  }
}
