import { SecretNotFoundError } from '../errors';
import type { SecretStore } from '../secrets';
import type { AccountId } from '../types';

export const DEFAULT_ENV_PREFIX = 'TOTP_SECRET_';

export type EnvLike = Record<string, string | undefined>;

/** `github.com` with the default prefix reads `TOTP_SECRET_GITHUB_COM`. */
export function envVariableName(accountId: AccountId, prefix = DEFAULT_ENV_PREFIX): string {
  return `${prefix}${accountId.toUpperCase().replace(/[^A-Z0-9]/g, '_')}`;
}

export function envSecretStore(env: EnvLike = process.env, prefix = DEFAULT_ENV_PREFIX): SecretStore {
  return {
    lookupSecret(accountId: AccountId) {
      const secret = env[envVariableName(accountId, prefix)];
      if (!secret) throw new SecretNotFoundError({ accountId });
      return secret;
    },
  };
}
