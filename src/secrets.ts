import type { AccountId } from './types';

/**
 * Resolves the stored base32 secret for an account. Implementations signal a
 * missing account by throwing `SecretNotFoundError`.
 */
export interface SecretStore {
  lookupSecret(accountId: AccountId): Promise<string> | string;
}
