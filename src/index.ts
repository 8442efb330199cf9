export { ALPHABETS, decode, encode, isBase32, type DecodeOptions, type EncodeOptions } from './base32';
export {
  DEFAULT_DIGITS,
  DEFAULT_STEP,
  DEFAULT_WINDOW,
  MAX_DIGITS,
  counterAt,
  counterBytes,
  decodeSecret,
  generate,
  generateFromKey,
  secondsRemaining,
  truncate,
  verify,
} from './totp';
export { Authenticator, type AuthenticatorOptions } from './authenticator';
export { nodeHmacSha1, SHA1_DIGEST_BYTES } from './hmac';
export type { SecretStore } from './secrets';
export { InMemorySecretStore } from './storage/inMemory';
export { JsonFileSecretStore, secretsFileSchema, type SecretsFile } from './storage/jsonFile';
export { envSecretStore, envVariableName, DEFAULT_ENV_PREFIX, type EnvLike } from './storage/env';
export { chainSecretStores } from './storage/chain';
export { loadConfig, defaultSecretsFile, type AppConfig } from './config';
export { createLogger, createChildLogger, silentLogger, loggerOptions, type Logger, type LogLevel } from './logger';
export * from './errors';
export type * from './types';
