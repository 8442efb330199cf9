export type AccountId = string;

/** Base32 alphabet selector: RFC 4648 §6 (`standard`) or §7 (`hex`). */
export type AlphabetName = 'standard' | 'hex';

/**
 * HMAC-SHA1 primitive. Must return the 20-byte digest of `message` keyed with `key`.
 */
export type HmacSha1 = (key: Uint8Array, message: Uint8Array) => Uint8Array;

/** Returns the current time in milliseconds since the Unix epoch, like `Date.now`. */
export type Clock = () => number;

export interface TotpOptions {
  step?: number; // seconds
  digits?: number;
  hmac?: HmacSha1;
}

export interface VerifyOptions extends TotpOptions {
  window?: number; // steps accepted on each side of the current one
}

export interface TotpSnapshot {
  code: string;
  counter: number;
  secondsRemaining: number;
  step: number;
  digits: number;
}
