import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  JournalEntry,
  NotificationType,
  OperationEnvelope,
  OperationKind,
  ReentrancyGuardScope,
} from '../../shared/schema';
import {
  canonicalJson,
  CheckpointFileStore,
  InvariantViolation,
  isStakingError,
  Journal,
  LedgerState,
  loadStakingConfig,
  parseStakingConfig,
  StakingError,
  StakingErrorCode,
  StakingRuntime,
} from './index';
import { runDemo } from './demo';
import { StakingCheckpoint } from './store';

const START = 1_767_225_600;
const DAY = 86_400;

interface Fixture {
  runtime: StakingRuntime;
  clock: { now: number };
}

function createFixture(options?: {
  floor?: number;
  cooldown?: number;
  guard?: ReentrancyGuardScope;
}): Fixture {
  const clock = { now: START };
  const runtime = StakingRuntime.fromConfig(
    {
      configuration: {
        deposit_floor: options?.floor ?? 100,
        cooldown_period: options?.cooldown ?? DAY,
      },
      admins: ['operator'],
      reentrancy_guard: options?.guard ?? ReentrancyGuardScope.UNREGISTER_ONLY,
    },
    { clock: () => clock.now },
  );
  runtime.vault.fund('alice', 1000);
  runtime.vault.fund('bob', 1000);
  return { runtime, clock };
}

function assert(condition: boolean, message: string) {
  if (!condition) {
    throw new Error(message);
  }
}

function assertEqual<T>(actual: T, expected: T, message: string) {
  if (actual !== expected) {
    throw new Error(`${message}: expected ${String(expected)}, got ${String(actual)}`);
  }
}

function expectStakingError(fn: () => void, code: StakingErrorCode, message: string): StakingError {
  try {
    fn();
  } catch (error) {
    if (isStakingError(error)) {
      assertEqual(error.code, code, message);
      return error;
    }
    throw new Error(`${message}: expected StakingError ${code}, got ${String(error)}`);
  }
  throw new Error(`${message}: expected ${code} but call succeeded`);
}

async function expectRejects(promise: Promise<unknown>, code: StakingErrorCode, message: string) {
  try {
    await promise;
  } catch (error) {
    if (isStakingError(error)) {
      assertEqual(error.code, code, message);
      return;
    }
    throw new Error(`${message}: expected StakingError ${code}, got ${String(error)}`);
  }
  throw new Error(`${message}: expected ${code} but promise resolved`);
}

function assertConserved(runtime: StakingRuntime, message: string) {
  const report = runtime.audit();
  assert(report.ok, `${message}: audit failed ${report.conservation.errors.join('; ')}`);
  assertEqual(report.conservation.surplus, 0, `${message}: custody surplus`);
}

// Deterministic PRNG so the randomized sequences are reproducible.
function createRandom(seed: number): (max: number) => number {
  let state = seed >>> 0;
  return (max) => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    const value = ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    return Math.floor(value * (max + 1));
  };
}

function testCooldownScenario() {
  const { runtime, clock } = createFixture();
  const { ledger, vault } = runtime;

  ledger.register('alice', 100);
  assertEqual(ledger.getParticipant('alice').staked_amount, 100, 'registered stake');
  assertEqual(ledger.getParticipant('alice').registered_at, START, 'registered_at');
  assertEqual(vault.balanceOf('alice'), 900, 'deposit collected');

  expectStakingError(() => ledger.unstake('alice', 50), 'COOLDOWN_NOT_ELAPSED', 'unstake during cooldown');
  expectStakingError(() => ledger.unregister('alice'), 'COOLDOWN_NOT_ELAPSED', 'unregister during cooldown');

  clock.now = START + DAY - 1;
  expectStakingError(() => ledger.unstake('alice', 50), 'COOLDOWN_NOT_ELAPSED', 'unstake one second early');
  assertEqual(ledger.cooldownEndsAt('alice'), START + DAY, 'cooldown end');

  clock.now = START + DAY;
  const entry = ledger.unstake('alice', 50);
  assertEqual(entry.type, NotificationType.UNSTAKED, 'unstake notification');
  assertEqual(ledger.getParticipant('alice').staked_amount, 50, 'stake after unstake');
  assertEqual(vault.balanceOf('alice'), 950, 'caller receives unstaked amount');
  assertConserved(runtime, 'cooldown scenario');
}

function testSlashAndSweepScenario() {
  const { runtime } = createFixture();
  const { ledger, vault } = runtime;

  ledger.register('bob', 100);
  const slashed = ledger.slash('operator', 'bob', 40);
  assertEqual(slashed.type, NotificationType.SLASHED, 'slash notification');
  assertEqual(ledger.getParticipant('bob').staked_amount, 60, 'stake after slash');
  assertEqual(ledger.getConfiscatedTotal(), 40, 'confiscated after slash');
  assertEqual(vault.custodyBalance(), 100, 'slash keeps value in custody');

  expectStakingError(() => ledger.slash('alice', 'bob', 10), 'NOT_AUTHORIZED', 'non-admin slash');
  expectStakingError(() => ledger.sweep('bob', 1), 'NOT_AUTHORIZED', 'non-admin sweep');

  const withdrawn = ledger.sweep('operator', 40);
  assertEqual(withdrawn.type, NotificationType.WITHDRAWN, 'sweep notification');
  assertEqual(ledger.getConfiscatedTotal(), 0, 'confiscated after sweep');
  assertEqual(vault.balanceOf('operator'), 40, 'admin receives swept funds');
  expectStakingError(() => ledger.sweep('operator', 1), 'INSUFFICIENT_FUNDS', 'sweep beyond pool');
  assertConserved(runtime, 'slash scenario');
}

function testDepositFloorScenario() {
  const { runtime } = createFixture();
  expectStakingError(() => runtime.ledger.register('alice', 99), 'INSUFFICIENT_DEPOSIT', 'deposit below floor');
  assert(!runtime.ledger.isRegistered('alice'), 'failed registration leaves no record');

  const open = createFixture({ floor: 0 });
  open.runtime.ledger.register('carol', 0);
  assert(open.runtime.ledger.isRegistered('carol'), 'zero deposit registers on zero floor');
  assertEqual(open.runtime.ledger.getParticipant('carol').staked_amount, 0, 'zero stake');
  expectStakingError(() => open.runtime.ledger.stake('carol', 0), 'ZERO_AMOUNT', 'stake zero');
}

function testRegistration() {
  const { runtime } = createFixture();
  const { ledger, vault } = runtime;

  ledger.register('alice', 100);
  expectStakingError(() => ledger.register('alice', 100), 'ALREADY_REGISTERED', 'double registration');

  ledger.register('bob', 250);
  assertEqual(ledger.getParticipant('bob').staked_amount, 250, 'excess deposit retained as stake');
  assertEqual(vault.custodyBalance(), 350, 'custody holds both deposits');

  expectStakingError(() => ledger.register('dave', 100), 'TRANSFER_FAILED', 'unfunded deposit');
  assert(!ledger.isRegistered('dave'), 'failed collect leaves no record');
  assertConserved(runtime, 'registration');
}

function testUnregister() {
  const { runtime, clock } = createFixture();
  const { ledger, vault, journal } = runtime;

  expectStakingError(() => ledger.unregister('stranger'), 'NOT_REGISTERED', 'unregister unknown');

  ledger.register('alice', 100);
  clock.now = START + DAY;
  const entry = ledger.unregister('alice');
  assertEqual(entry.type, NotificationType.UNREGISTERED, 'unregister notification');
  assertEqual(entry.type === NotificationType.CONFIGURATION_UPDATED ? -1 : entry.amount, 100, 'released amount');
  assertEqual(vault.balanceOf('alice'), 1000, 'stake returned');

  const absent = ledger.getParticipant('alice');
  assertEqual(absent.registered_at, 0, 'absent registered_at');
  assertEqual(absent.staked_amount, 0, 'absent staked_amount');
  expectStakingError(() => ledger.unregister('alice'), 'NOT_REGISTERED', 'second unregister');

  const entriesBefore = journal.length;
  ledger.register('alice', 100);
  assertEqual(journal.length, entriesBefore + 1, 're-registration emits once');
  assertEqual(ledger.getParticipant('alice').registered_at, START + DAY, 're-registration restarts cooldown');
  assertConserved(runtime, 'unregister');
}

function testStake() {
  const { runtime } = createFixture();
  const { ledger, vault, journal } = runtime;

  expectStakingError(() => ledger.stake('dave', 5), 'NOT_REGISTERED', 'stake unregistered');
  expectStakingError(() => ledger.stake('dave', 0), 'ZERO_AMOUNT', 'zero checked before registration');

  ledger.register('alice', 100);
  ledger.stake('alice', 20);
  assertEqual(ledger.getParticipant('alice').staked_amount, 120, 'stake added');
  assertEqual(vault.balanceOf('alice'), 880, 'stake collected');

  const entriesBefore = journal.length;
  expectStakingError(() => ledger.stake('alice', 5000), 'TRANSFER_FAILED', 'stake beyond balance');
  assertEqual(ledger.getParticipant('alice').staked_amount, 120, 'failed stake unchanged');
  assertEqual(journal.length, entriesBefore, 'failed stake emits nothing');
  assertConserved(runtime, 'stake');
}

function testStakeOverflowIsFatal() {
  const clock = { now: START };
  const state = new LedgerState();
  state.createParticipant('whale', START, Number.MAX_SAFE_INTEGER);
  const runtime = new StakingRuntime({ state }, { clock: () => clock.now });
  runtime.vault.fund('whale', 10);

  let caught: unknown;
  try {
    runtime.ledger.stake('whale', 1);
  } catch (error) {
    caught = error;
  }
  assert(caught instanceof InvariantViolation, 'overflow raises InvariantViolation');
  assert(!isStakingError(caught), 'overflow is not a recoverable staking error');
  assertEqual(runtime.ledger.getParticipant('whale').staked_amount, Number.MAX_SAFE_INTEGER, 'no truncation');
  assertEqual(runtime.vault.balanceOf('whale'), 10, 'nothing collected on overflow');
}

function testUnstake() {
  const { runtime, clock } = createFixture();
  const { ledger } = runtime;

  expectStakingError(() => ledger.unstake('dave', 1), 'NOT_REGISTERED', 'unstake unregistered');

  ledger.register('alice', 100);
  expectStakingError(() => ledger.unstake('alice', 150), 'INSUFFICIENT_STAKE', 'stake checked before cooldown');

  clock.now = START + DAY;
  ledger.unstake('alice', 100);
  assertEqual(ledger.getParticipant('alice').staked_amount, 0, 'stake drained');
  assert(ledger.isRegistered('alice'), 'registration survives zero stake');
  assertEqual(ledger.getParticipant('alice').registered_at, START, 'registered_at kept');
  assertConserved(runtime, 'unstake');
}

function testSlashEdges() {
  const { runtime } = createFixture();
  const { ledger } = runtime;

  expectStakingError(() => ledger.slash('operator', 'ghost', 1), 'INSUFFICIENT_STAKE', 'slash absent target');
  ledger.slash('operator', 'ghost', 0);
  assert(!ledger.isRegistered('ghost'), 'zero slash creates no record');
  assertEqual(ledger.getConfiscatedTotal(), 0, 'zero slash moves nothing');

  ledger.register('alice', 100);
  ledger.slash('operator', 'alice', 100);
  assertEqual(ledger.getParticipant('alice').staked_amount, 0, 'slash ignores cooldown');
  assert(ledger.isRegistered('alice'), 'slash keeps registration');
  expectStakingError(() => ledger.slash('operator', 'alice', 1), 'INSUFFICIENT_STAKE', 'slash beyond stake');
  assertConserved(runtime, 'slash edges');
}

function testConfiguration() {
  const { runtime, clock } = createFixture();
  const { ledger } = runtime;

  expectStakingError(() => ledger.setConfiguration('alice', 1, 1), 'NOT_AUTHORIZED', 'non-admin configure');
  expectStakingError(() => ledger.setConfiguration('operator', -1, 1), 'VALIDATION_ERROR', 'negative floor');

  ledger.register('alice', 100);
  const entry = ledger.setConfiguration('operator', 50, 10);
  assert(entry.type === NotificationType.CONFIGURATION_UPDATED, 'configuration notification');
  if (entry.type === NotificationType.CONFIGURATION_UPDATED) {
    assertEqual(entry.deposit_floor, 50, 'notified floor');
    assertEqual(entry.cooldown_period, 10, 'notified cooldown');
  }
  assertEqual(ledger.getConfiguration().deposit_floor, 50, 'floor replaced');

  ledger.register('bob', 50);
  clock.now = START + 10;
  ledger.unstake('alice', 10);
  assertEqual(ledger.getParticipant('alice').staked_amount, 90, 'new cooldown applies to existing records');
}

function testInputValidation() {
  const { runtime } = createFixture();
  const { ledger } = runtime;

  expectStakingError(() => ledger.register('', 100), 'VALIDATION_ERROR', 'empty caller');
  expectStakingError(() => ledger.register('alice', 100.5), 'VALIDATION_ERROR', 'fractional amount');
  expectStakingError(() => ledger.stake('alice', -1), 'VALIDATION_ERROR', 'negative amount');
  expectStakingError(() => ledger.slash('operator', ' ', 1), 'VALIDATION_ERROR', 'blank target');
}

function testTransferFailureRollsBack() {
  const { runtime, clock } = createFixture();
  const { ledger, vault, journal } = runtime;

  ledger.register('alice', 100);
  ledger.register('bob', 100);
  clock.now = START + DAY;
  vault.refuse('alice');
  const entriesBefore = journal.length;

  const error = expectStakingError(() => ledger.unstake('alice', 40), 'TRANSFER_FAILED', 'refused unstake');
  assertEqual(error.category, 'EXTERNAL', 'transfer failure category');
  assert(error.retryable, 'transfer failure is retryable');
  assertEqual(ledger.getParticipant('alice').staked_amount, 100, 'unstake rolled back');

  expectStakingError(() => ledger.unregister('alice'), 'TRANSFER_FAILED', 'refused unregister');
  assert(ledger.isRegistered('alice'), 'unregister rolled back');
  assertEqual(ledger.getParticipant('alice').registered_at, START, 'registered_at restored');
  assertEqual(ledger.getParticipant('alice').staked_amount, 100, 'stake restored');

  ledger.slash('operator', 'bob', 30);
  vault.refuse('operator');
  expectStakingError(() => ledger.sweep('operator', 30), 'TRANSFER_FAILED', 'refused sweep');
  assertEqual(ledger.getConfiscatedTotal(), 30, 'sweep rolled back');

  assertEqual(journal.length, entriesBefore + 1, 'only the slash was journaled');
  assertEqual(ledger.isLocked, false, 'lock released after failure');

  vault.refuse('alice', false);
  ledger.unstake('alice', 40);
  assertEqual(vault.balanceOf('alice'), 940, 'retry succeeds once recipient accepts');
  assertConserved(runtime, 'transfer failure');
}

function testUnregisterHoldsGlobalLock() {
  const { runtime, clock } = createFixture();
  const { ledger, vault } = runtime;

  ledger.register('alice', 100);
  ledger.register('bob', 100);
  clock.now = START + DAY;

  let nested: unknown;
  const detach = vault.onReceive('alice', () => {
    try {
      ledger.stake('bob', 10);
    } catch (error) {
      nested = error;
      throw error;
    }
  });
  expectStakingError(() => ledger.unregister('alice'), 'TRANSFER_FAILED', 'reverted hook fails unregister');
  assert(isStakingError(nested, 'REENTRANT_CALL'), 'nested stake rejected while locked');
  assert(ledger.isRegistered('alice'), 'alice restored after reverted hook');
  assertEqual(ledger.getParticipant('bob').staked_amount, 100, 'nested stake not applied');
  detach();

  let seenDuringSend = { registered_at: -1, staked_amount: -1 };
  let nestedUnregister: unknown;
  vault.onReceive('alice', () => {
    seenDuringSend = ledger.getParticipant('alice');
    try {
      ledger.unregister('alice');
    } catch (error) {
      nestedUnregister = error;
    }
  });
  ledger.unregister('alice');
  assert(isStakingError(nestedUnregister, 'REENTRANT_CALL'), 'nested unregister rejected');
  assertEqual(seenDuringSend.registered_at, 0, 'record deleted before transfer');
  assertEqual(seenDuringSend.staked_amount, 0, 'stake cleared before transfer');
  assertEqual(vault.balanceOf('alice'), 1000, 'paid exactly once');
  assertEqual(ledger.isLocked, false, 'lock released');
  assertConserved(runtime, 'unregister lock');
}

function testUnstakeReliesOnOrdering() {
  const { runtime, clock } = createFixture();
  const { ledger, vault, journal } = runtime;

  ledger.register('alice', 100);
  clock.now = START + DAY;

  let seenDuringSend = -1;
  let nested: unknown;
  const detach = vault.onReceive('alice', () => {
    seenDuringSend = ledger.getParticipant('alice').staked_amount;
    try {
      ledger.unstake('alice', 100);
    } catch (error) {
      nested = error;
    }
  });
  ledger.unstake('alice', 60);
  detach();
  assertEqual(seenDuringSend, 40, 'decrement committed before transfer');
  assert(isStakingError(nested, 'INSUFFICIENT_STAKE'), 'reentrant double withdrawal rejected');
  assertEqual(ledger.getParticipant('alice').staked_amount, 40, 'single withdrawal applied');

  let entered = false;
  vault.onReceive('alice', () => {
    if (entered) {
      return;
    }
    entered = true;
    ledger.unstake('alice', 15);
  });
  ledger.unstake('alice', 15);
  assertEqual(ledger.getParticipant('alice').staked_amount, 10, 'nested unstake applied on committed balance');
  assertEqual(vault.balanceOf('alice'), 990, 'both withdrawals paid');

  const entries: JournalEntry[] = journal.getEntries();
  const last = entries[entries.length - 1];
  const previous = entries[entries.length - 2];
  assertEqual(previous.type, NotificationType.UNSTAKED, 'nested unstake journaled first');
  assertEqual(last.type, NotificationType.UNSTAKED, 'outer unstake journaled last');
  assertEqual(last.sequence, previous.sequence + 1, 'journal sequence');
  assertConserved(runtime, 'unstake ordering');
}

function journalTypes(runtime: StakingRuntime): string {
  return runtime.journal
    .getEntries()
    .map((entry) => entry.type)
    .join(',');
}

function testRevertedUnstakeDiscardsNestedUnregister() {
  const { runtime, clock } = createFixture();
  const { ledger, vault, journal } = runtime;

  ledger.register('alice', 100);
  clock.now = START + DAY;

  let entered = false;
  let journaledInside = 0;
  const detach = vault.onReceive('alice', () => {
    if (entered) {
      return;
    }
    entered = true;
    ledger.unregister('alice');
    journaledInside = journal.length;
    throw new Error('recipient rejects payout');
  });
  expectStakingError(() => ledger.unstake('alice', 60), 'TRANSFER_FAILED', 'reverted outer unstake');
  detach();

  assertEqual(journaledInside, 2, 'nested unregister journaled while in flight');
  assertEqual(journalTypes(runtime), 'REGISTERED', 'nested unregister discarded with the send');
  assert(journal.verifyIntegrity().ok, 'journal chain intact');
  assert(ledger.isRegistered('alice'), 'registration restored');
  assertEqual(ledger.getParticipant('alice').registered_at, START, 'original registered_at');
  assertEqual(ledger.getParticipant('alice').staked_amount, 100, 'stake restored');
  assertEqual(vault.balanceOf('alice'), 900, 'nested payout reverted');
  assertEqual(vault.custodyBalance(), 100, 'custody restored');
  assertConserved(runtime, 'reverted nested unregister');

  ledger.unstake('alice', 60);
  assertEqual(journalTypes(runtime), 'REGISTERED,UNSTAKED', 'retry journaled');
  assertEqual(ledger.getParticipant('alice').staked_amount, 40, 'retry applied');
  assertEqual(vault.balanceOf('alice'), 960, 'retry paid');
}

function testRevertedUnstakeDiscardsNestedReregister() {
  const { runtime, clock } = createFixture();
  const { ledger, vault } = runtime;

  ledger.register('alice', 100);
  clock.now = START + DAY;

  let entered = false;
  vault.onReceive('alice', () => {
    if (entered) {
      return;
    }
    entered = true;
    ledger.unregister('alice');
    ledger.register('alice', 150);
    throw new Error('recipient rejects payout');
  });
  expectStakingError(() => ledger.unstake('alice', 60), 'TRANSFER_FAILED', 'reverted outer unstake');

  assertEqual(journalTypes(runtime), 'REGISTERED', 'nested calls discarded');
  assertEqual(ledger.getParticipant('alice').registered_at, START, 'original registration kept');
  assertEqual(ledger.getParticipant('alice').staked_amount, 100, 'stake restored');
  assertEqual(vault.balanceOf('alice'), 900, 'nested deposit reverted');
  assertEqual(vault.custodyBalance(), 100, 'custody restored');
  assertConserved(runtime, 'reverted nested re-register');
}

function testGuardCoversAllWithdrawals() {
  const { runtime, clock } = createFixture({ guard: ReentrancyGuardScope.ALL_WITHDRAWALS });
  const { ledger, vault } = runtime;
  assertEqual(ledger.reentrancyGuard, ReentrancyGuardScope.ALL_WITHDRAWALS, 'guard scope');

  ledger.register('alice', 100);
  clock.now = START + DAY;

  let nested: unknown;
  vault.onReceive('alice', () => {
    try {
      ledger.unstake('alice', 10);
    } catch (error) {
      nested = error;
    }
  });
  ledger.unstake('alice', 30);
  assert(isStakingError(nested, 'REENTRANT_CALL'), 'nested unstake rejected under full guard');
  assertEqual(ledger.getParticipant('alice').staked_amount, 70, 'only outer unstake applied');

  ledger.register('bob', 100);
  ledger.slash('operator', 'bob', 20);
  let nestedSweep: unknown;
  vault.onReceive('operator', () => {
    try {
      ledger.sweep('operator', 5);
    } catch (error) {
      nestedSweep = error;
    }
  });
  ledger.sweep('operator', 10);
  assert(isStakingError(nestedSweep, 'REENTRANT_CALL'), 'nested sweep rejected under full guard');
  assertEqual(ledger.getConfiscatedTotal(), 10, 'only outer sweep applied');
  assertConserved(runtime, 'full guard');
}

function testErrorClassification() {
  const { runtime } = createFixture();
  const { ledger } = runtime;
  ledger.register('alice', 100);

  const cooldown = expectStakingError(() => ledger.unstake('alice', 1), 'COOLDOWN_NOT_ELAPSED', 'cooldown');
  assert(cooldown.retryable, 'cooldown is retryable');
  assertEqual(cooldown.category, 'PRECONDITION', 'cooldown category');

  const auth = expectStakingError(() => ledger.sweep('alice', 1), 'NOT_AUTHORIZED', 'auth');
  assert(!auth.retryable, 'authorization is never retryable');
  assertEqual(auth.category, 'AUTHORIZATION', 'auth category');

  const floor = expectStakingError(() => ledger.register('bob', 1), 'INSUFFICIENT_DEPOSIT', 'floor');
  assert(!floor.retryable, 'deposit sizing is not retryable');
}

function testJournal() {
  const { runtime, clock } = createFixture();
  const { ledger, journal } = runtime;

  ledger.register('alice', 100);
  ledger.stake('alice', 5);
  ledger.slash('operator', 'alice', 5);
  clock.now = START + DAY;
  ledger.sweep('operator', 5);
  ledger.unregister('alice');

  const entries = journal.getEntries();
  assertEqual(entries.length, 5, 'one entry per successful operation');
  assertEqual(entries[0].prev_hash, 'GENESIS', 'genesis link');
  assertEqual(entries[1].prev_hash, entries[0].event_hash, 'chain link');
  assertEqual(entries[3].timestamp, START + DAY, 'entry timestamp from ledger clock');
  assertEqual(
    entries.map((entry) => entry.type).join(','),
    'REGISTERED,STAKED,SLASHED,WITHDRAWN,UNREGISTERED',
    'notification order',
  );
  assertEqual(journal.entriesSince(3).length, 2, 'entriesSince');
  assert(journal.verifyIntegrity().ok, 'journal integrity');

  const tampered = entries.map((entry, index) =>
    index === 1 ? { ...entry, timestamp: entry.timestamp + 1 } : entry,
  );
  const report = new Journal(tampered).verifyIntegrity();
  assert(!report.ok, 'tampered journal detected');
  assertEqual(report.errors[0], `entry ${entries[1].id} has invalid event_hash`, 'tamper error');

  assertEqual(
    canonicalJson({ b: 1, B: 2, a: { d: 4, C: 3 } }),
    '{"B":2,"a":{"C":3,"d":4},"b":1}',
    'canonical keys in code-unit order',
  );

  let caught: unknown;
  try {
    journal.rollbackTo(journal.length + 1);
  } catch (error) {
    caught = error;
  }
  assert(caught instanceof InvariantViolation, 'rollback point out of range');
  assertEqual(journal.length, 5, 'journal untouched by bad rollback');
}

function testConservationUnderRandomSequences() {
  const identities = ['p1', 'p2', 'p3', 'p4'];
  for (const seed of [7, 42, 2026]) {
    const random = createRandom(seed);
    const { runtime, clock } = createFixture();
    const { ledger, vault } = runtime;
    for (const identity of identities) {
      vault.fund(identity, 100_000);
    }

    for (let step = 0; step < 400; step += 1) {
      const identity = identities[random(identities.length - 1)];
      const choice = random(7);
      try {
        switch (choice) {
          case 0:
            ledger.register(identity, random(200));
            break;
          case 1:
            ledger.stake(identity, random(50));
            break;
          case 2:
            ledger.unstake(identity, random(150));
            break;
          case 3:
            ledger.unregister(identity);
            break;
          case 4:
            ledger.slash(random(3) === 0 ? identity : 'operator', identities[random(3)], random(80));
            break;
          case 5:
            ledger.sweep('operator', random(80));
            break;
          case 6:
            vault.refuse(random(1) === 0 ? identity : 'operator', random(2) === 0);
            break;
          default:
            clock.now += random(DAY / 2);
        }
      } catch (error) {
        if (!isStakingError(error)) {
          throw error;
        }
      }
      assertConserved(runtime, `seed ${seed} step ${step}`);
    }
  }
}

function testRuntimeEnvelopes() {
  const { runtime } = createFixture();

  const entry = runtime.execute({ kind: OperationKind.REGISTER, caller: 'alice', payload: { amount: 100 } });
  assertEqual(entry.type, NotificationType.REGISTERED, 'envelope register');
  runtime.execute({ kind: OperationKind.SLASH, caller: 'operator', payload: { target: 'alice', amount: 10 } });
  assertEqual(runtime.ledger.getParticipant('alice').staked_amount, 90, 'envelope slash');

  const bogus: OperationEnvelope = JSON.parse('{"kind":"MINT","caller":"alice","payload":{}}');
  expectStakingError(() => runtime.execute(bogus), 'VALIDATION_ERROR', 'unknown kind');
  const missing: OperationEnvelope = JSON.parse('{"kind":"STAKE","caller":"alice"}');
  expectStakingError(() => runtime.execute(missing), 'VALIDATION_ERROR', 'missing payload');
  const noAmount: OperationEnvelope = JSON.parse('{"kind":"STAKE","caller":"alice","payload":{}}');
  expectStakingError(() => runtime.execute(noAmount), 'VALIDATION_ERROR', 'missing amount');
}

function testConfigParsing() {
  const config = parseStakingConfig({
    deposit_floor: 100,
    cooldown_period: 86400,
    admins: ['operator'],
    reentrancy_guard: 'ALL_WITHDRAWALS',
  });
  assertEqual(config.configuration.deposit_floor, 100, 'parsed floor');
  assertEqual(config.configuration.cooldown_period, 86400, 'parsed cooldown');
  assertEqual(config.admins.join(','), 'operator', 'parsed admins');
  assertEqual(config.reentrancy_guard, ReentrancyGuardScope.ALL_WITHDRAWALS, 'parsed guard');

  const defaults = parseStakingConfig({});
  assertEqual(defaults.reentrancy_guard, ReentrancyGuardScope.UNREGISTER_ONLY, 'default guard');
  assertEqual(defaults.configuration.deposit_floor, 0, 'default floor');

  expectStakingError(() => parseStakingConfig({ deposit_floor: -5 }), 'VALIDATION_ERROR', 'negative floor');
  expectStakingError(() => parseStakingConfig({ reentrancy_guard: 'NONE' }), 'VALIDATION_ERROR', 'bad guard');
  expectStakingError(() => parseStakingConfig({ admins: [''] }), 'VALIDATION_ERROR', 'blank admin');
  expectStakingError(() => parseStakingConfig([]), 'VALIDATION_ERROR', 'array config');
}

async function testConfigFile(dir: string) {
  const missing = await loadStakingConfig(join(dir, 'absent.json'));
  assertEqual(missing.admins.length, 0, 'missing config has no admins');
  assertEqual(missing.configuration.cooldown_period, 0, 'missing config cooldown');

  const filePath = join(dir, 'staking.json');
  await writeFile(filePath, JSON.stringify({ deposit_floor: 25, cooldown_period: 60, admins: ['ops'] }), 'utf8');
  const loaded = await loadStakingConfig(filePath);
  assertEqual(loaded.configuration.deposit_floor, 25, 'file floor');
  assertEqual(loaded.admins[0], 'ops', 'file admin');

  const brokenPath = join(dir, 'broken.json');
  await writeFile(brokenPath, '{ not json', 'utf8');
  await expectRejects(loadStakingConfig(brokenPath), 'VALIDATION_ERROR', 'broken config');
}

async function testCheckpointRoundTrip(dir: string) {
  const { runtime, clock } = createFixture();
  runtime.ledger.register('alice', 150);
  runtime.ledger.slash('operator', 'alice', 20);

  const store = new CheckpointFileStore(join(dir, 'nested', 'checkpoint.json'));
  await runtime.saveToStore(store);

  const loaded = await store.load();
  assert(loaded !== null, 'checkpoint saved');
  if (!loaded) {
    return;
  }
  assertEqual(loaded.migrations.length, 0, 'current checkpoint needs no migration');

  const config = parseStakingConfig({ deposit_floor: 1, admins: ['someone-else'] });
  const restored = await StakingRuntime.loadFromStore(store, config, { clock: () => clock.now });
  assertEqual(restored.ledger.getParticipant('alice').staked_amount, 130, 'stake persisted');
  assertEqual(restored.ledger.getConfiscatedTotal(), 20, 'pool persisted');
  assertEqual(restored.ledger.getConfiguration().deposit_floor, 100, 'checkpoint configuration wins');
  assertEqual(restored.authority.list().join(','), 'operator', 'authority persisted');
  assertEqual(restored.vault.balanceOf('alice'), 850, 'vault persisted');
  assertEqual(restored.journal.length, 2, 'journal persisted');
  assertConserved(restored, 'restored runtime');

  const raw = await readFile(store.path, 'utf8');
  const checkpoint: StakingCheckpoint = JSON.parse(raw);
  checkpoint.journal[0] = { ...checkpoint.journal[0], timestamp: checkpoint.journal[0].timestamp + 1 };
  await writeFile(store.path, JSON.stringify(checkpoint), 'utf8');
  await expectRejects(store.load(), 'VALIDATION_ERROR', 'tampered checkpoint journal');

  const base = runtime.createCheckpoint();
  const malformedPath = join(dir, 'malformed.json');
  const malformedStates: unknown[] = [
    { ...base.state, participants: { alice: null } },
    { ...base.state, participants: { alice: { registered_at: START } } },
    { ...base.state, participants: { alice: { registered_at: 0, staked_amount: 5 } } },
    { ...base.state, configuration: { deposit_floor: -1, cooldown_period: 0 } },
    { ...base.state, confiscated_total: '20' },
  ];
  for (const [index, state] of malformedStates.entries()) {
    await writeFile(malformedPath, JSON.stringify({ ...base, state }), 'utf8');
    await expectRejects(
      new CheckpointFileStore(malformedPath).load(),
      'VALIDATION_ERROR',
      `malformed state ${index}`,
    );
  }
  await writeFile(malformedPath, JSON.stringify({ ...base, vault: { balances: { alice: -1 }, custody: 150 } }), 'utf8');
  await expectRejects(new CheckpointFileStore(malformedPath).load(), 'VALIDATION_ERROR', 'malformed vault');

  const unbackedPath = join(dir, 'unbacked.json');
  await writeFile(unbackedPath, JSON.stringify({ ...base, vault: undefined }), 'utf8');
  await expectRejects(
    StakingRuntime.loadFromStore(new CheckpointFileStore(unbackedPath), config),
    'VALIDATION_ERROR',
    'owed value without a vault',
  );

  const fresh = await StakingRuntime.loadFromStore(new CheckpointFileStore(join(dir, 'none.json')), config);
  assertEqual(fresh.ledger.getConfiguration().deposit_floor, 1, 'config seeds a fresh ledger');
  assert(fresh.authority.hasAdminCapability('someone-else'), 'config seeds admins');
}

async function testCheckpointMigration(dir: string) {
  const legacyPath = join(dir, 'legacy.json');
  await writeFile(
    legacyPath,
    JSON.stringify({
      version: '1.0.0',
      saved_at: '2026-01-01T00:00:00.000Z',
      journal: [],
      state: {
        participants: { alice: { registered_at: START, staked_amount: 100 } },
        configuration: { deposit_floor: 100, cooldown_period: DAY },
        confiscated_total: 0,
        admin_id: 'operator',
      },
      vault: { balances: { alice: 900 }, custody: 100 },
    }),
    'utf8',
  );

  const loaded = await new CheckpointFileStore(legacyPath).load();
  assert(loaded !== null, 'legacy checkpoint loaded');
  if (!loaded) {
    return;
  }
  assertEqual(loaded.migrations.join(','), '1.0.0->1.1.0', 'migration applied');
  assertEqual(loaded.checkpoint.version, '1.1.0', 'migrated version');
  assertEqual(loaded.checkpoint.authority.join(','), 'operator', 'admin moved into authority');

  const runtime = StakingRuntime.fromCheckpoint(loaded.checkpoint, { clock: () => START + 1 });
  runtime.ledger.slash('operator', 'alice', 10);
  assertEqual(runtime.ledger.getParticipant('alice').staked_amount, 90, 'migrated admin can slash');
  assertConserved(runtime, 'migrated runtime');

  const futurePath = join(dir, 'future.json');
  await writeFile(futurePath, JSON.stringify({ version: '0.9.0', state: {} }), 'utf8');
  await expectRejects(new CheckpointFileStore(futurePath).load(), 'VALIDATION_ERROR', 'unknown version');
}

async function testDemo() {
  const summary = await runDemo();
  assertEqual(summary.journal_entries, 7, 'demo journal');
  assertEqual(summary.participants, 1, 'demo participants');
  assertEqual(summary.confiscated_total, 0, 'demo pool swept');
  assertEqual(summary.operator_balance, 40, 'demo operator balance');
  assert(summary.audit.ok, 'demo audit');
}

export async function runTests(): Promise<void> {
  testCooldownScenario();
  testSlashAndSweepScenario();
  testDepositFloorScenario();
  testRegistration();
  testUnregister();
  testStake();
  testStakeOverflowIsFatal();
  testUnstake();
  testSlashEdges();
  testConfiguration();
  testInputValidation();
  testTransferFailureRollsBack();
  testUnregisterHoldsGlobalLock();
  testUnstakeReliesOnOrdering();
  testRevertedUnstakeDiscardsNestedUnregister();
  testRevertedUnstakeDiscardsNestedReregister();
  testGuardCoversAllWithdrawals();
  testErrorClassification();
  testJournal();
  testConservationUnderRandomSequences();
  testRuntimeEnvelopes();
  testConfigParsing();

  const dir = await mkdtemp(join(tmpdir(), 'stake-ledger-'));
  try {
    await testConfigFile(dir);
    await testCheckpointRoundTrip(dir);
    await testCheckpointMigration(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
  await testDemo();
}
