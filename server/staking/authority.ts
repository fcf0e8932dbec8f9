import { ValidationError } from './errors';

export interface AuthorityCheck {
  hasAdminCapability(identity: string): boolean;
}

export class InMemoryAuthorityRegistry implements AuthorityCheck {
  private admins = new Set<string>();

  constructor(initialAdmins: Iterable<string> = []) {
    for (const identity of initialAdmins) {
      this.grant(identity);
    }
  }

  hasAdminCapability(identity: string): boolean {
    return this.admins.has(identity);
  }

  grant(identity: string): void {
    if (!identity) {
      throw new ValidationError('admin identity is required');
    }
    this.admins.add(identity);
  }

  revoke(identity: string): void {
    this.admins.delete(identity);
  }

  list(): string[] {
    return [...this.admins.values()].sort();
  }
}
