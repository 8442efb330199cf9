import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';
import { LOG_LEVELS, type LogLevel } from './logger';
import { DEFAULT_DIGITS, DEFAULT_STEP, MAX_DIGITS } from './totp';

export interface AppConfig {
  secretsFile: string;
  step: number;
  digits: number;
  logLevel: LogLevel;
}

export function defaultSecretsFile(homeDir = os.homedir()): string {
  return path.join(homeDir, '.config', 'totp', 'secrets.json');
}

const envSchema = z.object({
  TOTP_SECRETS_FILE: z.string().min(1).optional(),
  TOTP_STEP: z.coerce.number().int().positive().max(Number.MAX_SAFE_INTEGER).default(DEFAULT_STEP),
  TOTP_DIGITS: z.coerce.number().int().min(1).max(MAX_DIGITS).default(DEFAULT_DIGITS),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
});

/**
 * Read configuration from environment variables. Callers that want `.env`
 * support load it with dotenv before calling this.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  // Blank values count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError({ message: `Invalid configuration: ${issues.join('; ')}`, issues });
  }
  const cfg = parsed.data;
  return {
    secretsFile: path.resolve(cfg.TOTP_SECRETS_FILE ?? defaultSecretsFile()),
    step: cfg.TOTP_STEP,
    digits: cfg.TOTP_DIGITS,
    logLevel: cfg.LOG_LEVEL,
  };
}
