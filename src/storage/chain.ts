import { SecretNotFoundError, isSecretNotFoundError } from '../errors';
import type { SecretStore } from '../secrets';
import type { AccountId } from '../types';

/**
 * Tries each store in order and returns the first secret found. Only
 * `SecretNotFoundError` moves on to the next store; other failures propagate.
 */
export function chainSecretStores(...stores: SecretStore[]): SecretStore {
  return {
    async lookupSecret(accountId: AccountId) {
      let notFound = new SecretNotFoundError({ accountId });
      for (const store of stores) {
        try {
          return await store.lookupSecret(accountId);
        } catch (e) {
          if (!isSecretNotFoundError(e)) throw e;
          notFound = e;
        }
      }
      throw notFound;
    },
  };
}
