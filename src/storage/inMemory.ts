import { SecretNotFoundError } from '../errors';
import type { SecretStore } from '../secrets';
import type { AccountId } from '../types';

export class InMemorySecretStore implements SecretStore {
  private readonly secrets = new Map<AccountId, string>();

  constructor(initial: Record<AccountId, string> = {}) {
    for (const [accountId, secret] of Object.entries(initial)) this.secrets.set(accountId, secret);
  }

  lookupSecret(accountId: AccountId): string {
    const secret = this.secrets.get(accountId);
    if (secret === undefined) throw new SecretNotFoundError({ accountId });
    return secret;
  }
  set(accountId: AccountId, secret: string): void {
    this.secrets.set(accountId, secret);
  }
  delete(accountId: AccountId): boolean {
    return this.secrets.delete(accountId);
  }
  clear(): void {
    this.secrets.clear();
  }
}
