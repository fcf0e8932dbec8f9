import { LedgerState } from './state';

export interface ConservationReport {
  ok: boolean;
  held: number;
  owed: number;
  surplus: number;
  errors: string[];
}

/**
 * Checks that custody covers every participant's stake plus the confiscated pool.
 * A surplus is allowed; a deficit never is.
 */
export function auditConservation(state: LedgerState, held: number): ConservationReport {
  const errors: string[] = [];

  let staked = 0;
  for (const { identity, record } of state.listParticipants()) {
    if (record.registered_at === 0 && record.staked_amount !== 0) {
      errors.push(`participant ${identity} holds stake without registration`);
    }
    staked += record.staked_amount;
  }

  const owed = staked + state.getConfiscatedTotal();
  if (!Number.isSafeInteger(owed)) {
    errors.push('owed total exceeds safe integer range');
  }
  if (held < owed) {
    errors.push(`custody deficit: held ${held}, owed ${owed}`);
  }

  return { ok: errors.length === 0, held, owed, surplus: held - owed, errors };
}
