import { timingSafeEqual } from 'crypto';
import { decode } from './base32';
import { DigestError, InvalidSecretError } from './errors';
import { SHA1_DIGEST_BYTES, nodeHmacSha1 } from './hmac';
import type { HmacSha1, TotpOptions, VerifyOptions } from './types';

// RFC 6238 defaults: 30-second step, 6-digit codes.
export const DEFAULT_STEP = 30;
export const DEFAULT_DIGITS = 6;
// p < 2^31, so widths beyond 10 digits would only add leading zeros.
export const MAX_DIGITS = 10;
export const DEFAULT_WINDOW = 1;

interface ResolvedOptions {
  step: number;
  digits: number;
  hmac: HmacSha1;
}

function resolveOptions(stepOrOptions?: number | TotpOptions, digits?: number): ResolvedOptions {
  const opts: TotpOptions = typeof stepOrOptions === 'object' ? stepOrOptions : { step: stepOrOptions, digits };
  const resolved = {
    step: opts.step ?? DEFAULT_STEP,
    digits: opts.digits ?? DEFAULT_DIGITS,
    hmac: opts.hmac ?? nodeHmacSha1,
  };
  assertStep(resolved.step);
  assertDigits(resolved.digits);
  return resolved;
}

function assertTime(unixTimeSeconds: number): void {
  if (!Number.isFinite(unixTimeSeconds) || unixTimeSeconds < 0 || unixTimeSeconds > Number.MAX_SAFE_INTEGER) {
    throw new RangeError(`Time must be a non-negative number of seconds, got ${unixTimeSeconds}`);
  }
}

function assertStep(step: number): void {
  if (!Number.isSafeInteger(step) || step <= 0) {
    throw new RangeError(`Step must be a positive integer number of seconds, got ${step}`);
  }
}

function assertDigits(digits: number): void {
  if (!Number.isInteger(digits) || digits < 1 || digits > MAX_DIGITS) {
    throw new RangeError(`Digits must be an integer between 1 and ${MAX_DIGITS}, got ${digits}`);
  }
}

/**
 * Decode a user-supplied base32 secret into HMAC key bytes. Lowercase input is
 * accepted.
 */
export function decodeSecret(secretBase32: string): Uint8Array {
  let key: Uint8Array;
  try {
    key = decode(secretBase32.toUpperCase());
  } catch (e) {
    throw new InvalidSecretError({ cause: e });
  }
  if (key.length === 0) {
    throw new InvalidSecretError({ message: 'TOTP secret decodes to an empty key' });
  }
  return key;
}

export function counterAt(unixTimeSeconds: number, step = DEFAULT_STEP): number {
  assertTime(unixTimeSeconds);
  assertStep(step);
  return Math.floor(unixTimeSeconds / step);
}

/** Serialize a time-step counter as the 8-byte big-endian HMAC message. */
export function counterBytes(counter: number): Uint8Array {
  if (!Number.isSafeInteger(counter) || counter < 0) {
    throw new RangeError(`Counter must be a non-negative safe integer, got ${counter}`);
  }
  const bytes = new Uint8Array(8);
  const view = new DataView(bytes.buffer);
  view.setUint32(0, Math.floor(counter / 2 ** 32));
  view.setUint32(4, counter % 2 ** 32);
  return bytes;
}

/** RFC 4226 §5.3 dynamic truncation, rendered as a zero-padded decimal string. */
export function truncate(digest: Uint8Array, digits = DEFAULT_DIGITS): string {
  assertDigits(digits);
  if (digest.length !== SHA1_DIGEST_BYTES) {
    throw new DigestError({ message: `HMAC-SHA1 digest must be ${SHA1_DIGEST_BYTES} bytes, got ${digest.length}` });
  }
  const offset = digest[SHA1_DIGEST_BYTES - 1] & 0x0f;
  const view = new DataView(digest.buffer, digest.byteOffset, digest.byteLength);
  const p = view.getUint32(offset) & 0x7fffffff;
  return String(p % 10 ** digits).padStart(digits, '0');
}

function computeDigest(hmac: HmacSha1, key: Uint8Array, message: Uint8Array): Uint8Array {
  try {
    return hmac(key, message);
  } catch (e) {
    throw new DigestError({ cause: e });
  }
}

function codeAt(key: Uint8Array, counter: number, opts: ResolvedOptions): string {
  return truncate(computeDigest(opts.hmac, key, counterBytes(counter)), opts.digits);
}

/**
 * Compute the TOTP code for an already-decoded key.
 */
export function generateFromKey(key: Uint8Array, unixTimeSeconds: number, options: TotpOptions = {}): string {
  const opts = resolveOptions(options);
  if (key.length === 0) throw new InvalidSecretError({ message: 'TOTP key must not be empty' });
  return codeAt(key, counterAt(unixTimeSeconds, opts.step), opts);
}

/**
 * Compute the TOTP code for a base32 secret at the given Unix time.
 *
 * Accepts either positional `step`/`digits` or an options object, which can
 * also replace the HMAC-SHA1 implementation.
 *
 * @throws InvalidSecretError when the secret does not decode to a non-empty key.
 * @throws DigestError when the HMAC implementation fails.
 */
export function generate(secretBase32: string, unixTimeSeconds: number, step?: number, digits?: number): string;
export function generate(secretBase32: string, unixTimeSeconds: number, options?: TotpOptions): string;
export function generate(
  secretBase32: string,
  unixTimeSeconds: number,
  stepOrOptions?: number | TotpOptions,
  digits?: number
): string {
  const opts = resolveOptions(stepOrOptions, digits);
  assertTime(unixTimeSeconds);
  const key = decodeSecret(secretBase32);
  return codeAt(key, counterAt(unixTimeSeconds, opts.step), opts);
}

/** Seconds until the code for `unixTimeSeconds` changes, in `1..step`. */
export function secondsRemaining(unixTimeSeconds: number, step = DEFAULT_STEP): number {
  assertTime(unixTimeSeconds);
  assertStep(step);
  return step - (Math.floor(unixTimeSeconds) % step);
}

/**
 * Check `token` against the codes of the current step and `window` steps on
 * either side of it.
 */
export function verify(token: string, secretBase32: string, unixTimeSeconds: number, options: VerifyOptions = {}): boolean {
  const opts = resolveOptions(options);
  const window = options.window ?? DEFAULT_WINDOW;
  if (!Number.isInteger(window) || window < 0) {
    throw new RangeError(`Window must be a non-negative integer, got ${window}`);
  }
  const key = decodeSecret(secretBase32);
  const counter = counterAt(unixTimeSeconds, opts.step);

  if (token.length !== opts.digits || !/^\d+$/.test(token)) return false;

  const expected = Buffer.from(token);
  let matched = false;
  for (let delta = -window; delta <= window; delta++) {
    if (counter + delta < 0 || counter + delta > Number.MAX_SAFE_INTEGER) continue;
    const candidate = Buffer.from(codeAt(key, counter + delta, opts));
    // no early exit
    if (timingSafeEqual(candidate, expected)) matched = true;
  }
  return matched;
}
