import * as fs from 'fs';
import { z } from 'zod';
import { isBase32 } from '../base32';
import { ConfigError, SecretNotFoundError } from '../errors';
import type { SecretStore } from '../secrets';
import type { AccountId } from '../types';

export const secretsFileSchema = z.object({
  accounts: z.record(z.string().min(1), z.string().min(1, 'secret must not be empty')),
});

// Checked per account on lookup, so one bad entry does not hide the others.
export const accountSecretSchema = z
  .string()
  .refine((secret) => isBase32(secret.toUpperCase()), 'secret is not valid base32');

export type SecretsFile = z.infer<typeof secretsFileSchema>;

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

/**
 * Reads `{ "accounts": { "<id>": "<base32>" } }` from disk on every lookup.
 * A missing file is treated as an empty store.
 */
export class JsonFileSecretStore implements SecretStore {
  constructor(readonly filePath: string) {}

  private read(): SecretsFile {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, 'utf-8');
    } catch (e) {
      if (isMissingFile(e)) return { accounts: {} };
      throw new ConfigError({ message: `Cannot read secrets file ${this.filePath}`, cause: e });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      throw new ConfigError({ message: `Secrets file ${this.filePath} is not valid JSON`, cause: e });
    }

    const parsed = secretsFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new ConfigError({
        message: `Secrets file ${this.filePath} has an invalid shape`,
        issues: parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
      });
    }
    return parsed.data;
  }

  lookupSecret(accountId: AccountId): string {
    const { accounts } = this.read();
    if (!Object.prototype.hasOwnProperty.call(accounts, accountId)) {
      throw new SecretNotFoundError({ accountId });
    }
    const secret = accountSecretSchema.safeParse(accounts[accountId]);
    if (!secret.success) {
      throw new ConfigError({
        message: `Secrets file ${this.filePath} has an invalid secret for account "${accountId}"`,
        issues: secret.error.issues.map((i) => `accounts.${accountId}: ${i.message}`),
      });
    }
    return secret.data;
  }

  listAccounts(): AccountId[] {
    return Object.keys(this.read().accounts).sort();
  }
}
