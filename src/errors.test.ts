import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  DigestError,
  InvalidSecretError,
  MalformedInputError,
  OtpError,
  SecretNotFoundError,
  isConfigError,
  isOtpError,
  isSecretNotFoundError,
} from './errors';

describe('errors', () => {
  it('fills in default messages and codes', () => {
    expect(new MalformedInputError({ missingBits: 10 }).message).toBe('Base32 input is truncated: 10 bits missing');
    expect(new InvalidSecretError().message).toBe('TOTP secret is not valid base32');
    expect(new DigestError().code).toBe('DIGEST_ERROR');
    expect(new SecretNotFoundError({ accountId: 'github' }).message).toBe('No secret found for account "github"');
  });

  it('keeps names and the cause', () => {
    const cause = new Error('boom');
    const err = new InvalidSecretError({ cause });
    expect(err.name).toBe('InvalidSecretError');
    expect(err.cause).toBe(cause);
    expect(err).toBeInstanceOf(OtpError);
    expect(err).toBeInstanceOf(Error);
  });

  it('narrows with the type guards', () => {
    const notFound: unknown = new SecretNotFoundError({ accountId: 'bank' });
    expect(isOtpError(notFound)).toBe(true);
    expect(isConfigError(notFound)).toBe(false);
    if (isSecretNotFoundError(notFound)) expect(notFound.accountId).toBe('bank');
    expect(isOtpError(new Error('plain'))).toBe(false);
  });

  it('defaults config issues to an empty list', () => {
    expect(new ConfigError({ message: 'bad' }).issues).toEqual([]);
  });
});
