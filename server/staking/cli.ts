import { readFile } from 'fs/promises';
import { OperationEnvelope } from '../../shared/schema';
import { loadStakingConfig } from './config';
import { runDemo } from './demo';
import { isStakingError, ValidationError } from './errors';
import { StakingRuntime } from './runtime';
import { CheckpointFileStore } from './store';
import { runTests } from './tests';

const DEFAULT_STORE = 'data/staking-checkpoint.json';
const DEFAULT_CONFIG = 'config/staking.json';

function getFlagValue(args: string[], flag: string, fallback?: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) {
    return fallback;
  }
  return args[index + 1] ?? fallback;
}

async function buildRuntime(args: string[]) {
  const storePath = getFlagValue(args, '--store', DEFAULT_STORE) ?? DEFAULT_STORE;
  const configPath = getFlagValue(args, '--config', DEFAULT_CONFIG) ?? DEFAULT_CONFIG;
  const config = await loadStakingConfig(configPath);
  const store = new CheckpointFileStore(storePath);
  const runtime = await StakingRuntime.loadFromStore(store, config);
  return { runtime, store };
}

async function commandApply(args: string[]) {
  const filePath = args[1];
  if (!filePath) {
    throw new ValidationError('apply requires an operation JSON file path');
  }
  const { runtime, store } = await buildRuntime(args);
  const raw = await readFile(filePath, 'utf8');
  const envelope = JSON.parse(raw) as OperationEnvelope;
  const entry = runtime.execute(envelope);
  await runtime.saveToStore(store);
  console.log(JSON.stringify(entry, null, 2));
}

async function commandFund(args: string[]) {
  const identity = args[1];
  const amount = Number(args[2]);
  if (!identity || !Number.isSafeInteger(amount)) {
    throw new ValidationError('fund requires <identity> <amount>');
  }
  const { runtime, store } = await buildRuntime(args);
  const balance = runtime.vault.fund(identity, amount);
  await runtime.saveToStore(store);
  console.log(JSON.stringify({ identity, balance }, null, 2));
}

async function commandJournal(args: string[]) {
  const { runtime } = await buildRuntime(args);
  const since = Number(getFlagValue(args, '--since', '0'));
  console.log(JSON.stringify(runtime.journal.entriesSince(Number.isFinite(since) ? since : 0), null, 2));
}

async function commandState(args: string[]) {
  const { runtime } = await buildRuntime(args);
  const summary = {
    configuration: runtime.ledger.getConfiguration(),
    participants: runtime.ledger.listParticipants().length,
    total_staked: runtime.ledger.totalStaked(),
    confiscated_total: runtime.ledger.getConfiscatedTotal(),
    custody: runtime.vault.custodyBalance(),
    admins: runtime.authority.list(),
  };
  console.log(JSON.stringify({ summary, snapshot: runtime.state.snapshot() }, null, 2));
}

async function commandVerify(args: string[]) {
  const { runtime } = await buildRuntime(args);
  const report = runtime.audit();
  console.log(JSON.stringify(report, null, 2));
  if (!report.ok) {
    process.exitCode = 1;
  }
}

async function commandDemo(args: string[]) {
  const summary = await runDemo(getFlagValue(args, '--store'));
  console.log(JSON.stringify(summary, null, 2));
}

async function commandTests() {
  await runTests();
  console.log('Staking tests passed');
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  switch (command) {
    case 'apply':
      await commandApply(args);
      return;
    case 'fund':
      await commandFund(args);
      return;
    case 'journal':
      await commandJournal(args);
      return;
    case 'state':
      await commandState(args);
      return;
    case 'verify':
      await commandVerify(args);
      return;
    case 'demo':
      await commandDemo(args);
      return;
    case 'tests':
      await commandTests();
      return;
    default:
      throw new ValidationError(`unknown command: ${command ?? '(none)'}`);
  }
}

main().catch((error: unknown) => {
  if (isStakingError(error)) {
    console.error(JSON.stringify({ code: error.code, category: error.category, message: error.message }));
  } else {
    console.error(error);
  }
  process.exit(1);
});
