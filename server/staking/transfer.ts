import { ValidationError } from './errors';

export type TransferResult = { ok: true } | { ok: false; reason: string; cause?: unknown };

/**
 * Moves value between external identities and the ledger's custody.
 * A failed result never leaves a partial movement behind: a failed send also
 * undoes every movement made while it was in flight.
 */
export interface ValueTransfer {
  collect(identity: string, amount: number): TransferResult;
  send(identity: string, amount: number): TransferResult;
}

/** Runs after a recipient is credited; throwing reverts the send and everything done inside it. */
export type RecipientHook = (amount: number) => void;

export interface VaultSnapshot {
  balances: Record<string, number>;
  custody: number;
}

function failure(reason: string, cause?: unknown): TransferResult {
  return cause === undefined ? { ok: false, reason } : { ok: false, reason, cause };
}

export class InMemoryVault implements ValueTransfer {
  private balances = new Map<string, number>();
  private custody = 0;
  private hooks = new Map<string, RecipientHook>();
  private refusing = new Set<string>();

  constructor(snapshot?: VaultSnapshot) {
    if (snapshot) {
      this.restore(snapshot);
    }
  }

  fund(identity: string, amount: number): number {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      throw new ValidationError('fund amount must be a positive safe integer');
    }
    const next = this.balanceOf(identity) + amount;
    if (!Number.isSafeInteger(next)) {
      throw new ValidationError(`balance overflow for ${identity}`);
    }
    this.balances.set(identity, next);
    return next;
  }

  balanceOf(identity: string): number {
    return this.balances.get(identity) ?? 0;
  }

  custodyBalance(): number {
    return this.custody;
  }

  onReceive(identity: string, hook: RecipientHook): () => void {
    this.hooks.set(identity, hook);
    return () => {
      if (this.hooks.get(identity) === hook) {
        this.hooks.delete(identity);
      }
    };
  }

  refuse(identity: string, refusing = true): void {
    if (refusing) {
      this.refusing.add(identity);
    } else {
      this.refusing.delete(identity);
    }
  }

  collect(identity: string, amount: number): TransferResult {
    if (!Number.isSafeInteger(amount) || amount < 0) {
      return failure('invalid amount');
    }
    if (amount === 0) {
      return { ok: true };
    }
    const balance = this.balanceOf(identity);
    if (balance < amount) {
      return failure(`insufficient balance for ${identity}`);
    }
    if (!Number.isSafeInteger(this.custody + amount)) {
      return failure('custody overflow');
    }

    this.balances.set(identity, balance - amount);
    this.custody += amount;
    return { ok: true };
  }

  send(identity: string, amount: number): TransferResult {
    if (!Number.isSafeInteger(amount) || amount < 0) {
      return failure('invalid amount');
    }
    if (this.refusing.has(identity)) {
      return failure(`recipient refused transfer: ${identity}`);
    }
    if (amount > this.custody) {
      return failure('custody balance insufficient');
    }

    const before = this.snapshot();
    this.custody -= amount;
    this.balances.set(identity, this.balanceOf(identity) + amount);

    const hook = this.hooks.get(identity);
    if (hook) {
      try {
        hook(amount);
      } catch (error) {
        this.restore(before);
        const message = error instanceof Error ? error.message : String(error);
        return failure(`recipient hook reverted: ${message}`, error);
      }
    }

    return { ok: true };
  }

  snapshot(): VaultSnapshot {
    const balances: Record<string, number> = {};
    for (const [identity, balance] of this.balances.entries()) {
      balances[identity] = balance;
    }
    return { balances, custody: this.custody };
  }

  restore(snapshot: VaultSnapshot): void {
    const balances = new Map<string, number>();
    for (const [identity, balance] of Object.entries(snapshot.balances ?? {})) {
      if (!Number.isSafeInteger(balance) || balance < 0) {
        throw new ValidationError(`invalid vault balance for ${identity}`);
      }
      balances.set(identity, balance);
    }
    if (!Number.isSafeInteger(snapshot.custody) || snapshot.custody < 0) {
      throw new ValidationError('invalid vault custody balance');
    }
    this.balances = balances;
    this.custody = snapshot.custody;
  }
}
