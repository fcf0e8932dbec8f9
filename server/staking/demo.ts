import { OperationKind, ReentrancyGuardScope } from '../../shared/schema';
import { RuntimeAuditReport, StakingRuntime } from './runtime';
import { CheckpointFileStore } from './store';

export interface DemoSummary {
  journal_entries: number;
  participants: number;
  confiscated_total: number;
  operator_balance: number;
  audit: RuntimeAuditReport;
}

const DAY = 24 * 60 * 60;

export async function runDemo(storePath?: string): Promise<DemoSummary> {
  let now = Date.parse('2026-01-05T00:00:00.000Z') / 1000;
  const runtime = StakingRuntime.fromConfig(
    {
      configuration: { deposit_floor: 100, cooldown_period: DAY },
      admins: ['operator'],
      reentrancy_guard: ReentrancyGuardScope.UNREGISTER_ONLY,
    },
    { clock: () => now },
  );

  runtime.vault.fund('alice', 500);
  runtime.vault.fund('bob', 300);

  runtime.execute({ kind: OperationKind.REGISTER, caller: 'alice', payload: { amount: 150 } });
  runtime.execute({ kind: OperationKind.REGISTER, caller: 'bob', payload: { amount: 100 } });
  runtime.execute({ kind: OperationKind.STAKE, caller: 'alice', payload: { amount: 50 } });

  now += DAY;
  runtime.execute({ kind: OperationKind.UNSTAKE, caller: 'alice', payload: { amount: 75 } });
  runtime.execute({
    kind: OperationKind.SLASH,
    caller: 'operator',
    payload: { target: 'bob', amount: 40 },
  });
  runtime.execute({ kind: OperationKind.SWEEP, caller: 'operator', payload: { amount: 40 } });
  runtime.execute({ kind: OperationKind.UNREGISTER, caller: 'bob' });

  if (storePath) {
    await runtime.saveToStore(new CheckpointFileStore(storePath));
  }

  return {
    journal_entries: runtime.journal.length,
    participants: runtime.ledger.listParticipants().length,
    confiscated_total: runtime.ledger.getConfiscatedTotal(),
    operator_balance: runtime.vault.balanceOf('operator'),
    audit: runtime.audit(),
  };
}
