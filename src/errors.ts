export type OtpErrorCode = 'MALFORMED_INPUT' | 'INVALID_SECRET' | 'DIGEST_ERROR' | 'NOT_FOUND' | 'CONFIG_ERROR';

export class OtpError extends Error {
  readonly code: OtpErrorCode;

  constructor(params: { code: OtpErrorCode; message: string; cause?: unknown }) {
    super(params.message, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = 'OtpError';
    this.code = params.code;
  }
}

export class MalformedInputError extends OtpError {
  readonly missingBits: number;

  constructor(params: { missingBits: number; message?: string }) {
    super({
      code: 'MALFORMED_INPUT',
      message: params.message || `Base32 input is truncated: ${params.missingBits} bits missing`,
    });
    this.name = 'MalformedInputError';
    this.missingBits = params.missingBits;
  }
}

export class InvalidSecretError extends OtpError {
  constructor(params: { message?: string; cause?: unknown } = {}) {
    super({ code: 'INVALID_SECRET', message: params.message || 'TOTP secret is not valid base32', cause: params.cause });
    this.name = 'InvalidSecretError';
  }
}

export class DigestError extends OtpError {
  constructor(params: { message?: string; cause?: unknown } = {}) {
    super({ code: 'DIGEST_ERROR', message: params.message || 'HMAC-SHA1 computation failed', cause: params.cause });
    this.name = 'DigestError';
  }
}

export class SecretNotFoundError extends OtpError {
  readonly accountId: string;

  constructor(params: { accountId: string; message?: string }) {
    super({ code: 'NOT_FOUND', message: params.message || `No secret found for account "${params.accountId}"` });
    this.name = 'SecretNotFoundError';
    this.accountId = params.accountId;
  }
}

export class ConfigError extends OtpError {
  readonly issues: string[];

  constructor(params: { message: string; issues?: string[]; cause?: unknown }) {
    super({ code: 'CONFIG_ERROR', message: params.message, cause: params.cause });
    this.name = 'ConfigError';
    this.issues = params.issues ?? [];
  }
}

export function isOtpError(e: unknown): e is OtpError {
  return e instanceof OtpError;
}

export function isMalformedInputError(e: unknown): e is MalformedInputError {
  return e instanceof MalformedInputError;
}

export function isInvalidSecretError(e: unknown): e is InvalidSecretError {
  return e instanceof InvalidSecretError;
}

export function isDigestError(e: unknown): e is DigestError {
  return e instanceof DigestError;
}

export function isSecretNotFoundError(e: unknown): e is SecretNotFoundError {
  return e instanceof SecretNotFoundError;
}

export function isConfigError(e: unknown): e is ConfigError {
  return e instanceof ConfigError;
}
