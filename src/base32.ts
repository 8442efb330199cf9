import { MalformedInputError, isMalformedInputError } from './errors';
import type { AlphabetName } from './types';

export interface EncodeOptions {
  wrapLines?: boolean;
  alphabet?: AlphabetName;
}

export interface DecodeOptions {
  alphabet?: AlphabetName;
}

export const ALPHABETS: Readonly<Record<AlphabetName, string>> = {
  standard: 'ABCDEFGHIJKLMNOPQRSTUVWXYZ234567',
  hex: '0123456789ABCDEFGHIJKLMNOPQRSTUV',
};

const PAD = '=';
const GROUP_BYTES = 5;
const GROUP_SYMBOLS = 8;
const GROUP_BITS = 40;
const LINE_WIDTH = 72;

// Symbols carrying real bits for a final group of N bytes (index = N).
const SYMBOLS_FOR_BYTES = [0, 2, 4, 5, 7, 8];
// Bytes recovered from a padded group holding N symbols (index = N).
const BYTES_FOR_SYMBOLS = [0, 1, 1, 1, 2, 3, 3, 4];

const REVERSE: Readonly<Record<AlphabetName, ReadonlyMap<string, number>>> = {
  standard: reverseLookup(ALPHABETS.standard),
  hex: reverseLookup(ALPHABETS.hex),
};

function reverseLookup(symbols: string): Map<string, number> {
  const map = new Map<string, number>();
  for (let i = 0; i < symbols.length; i++) map.set(symbols[i], i);
  return map;
}

// The 40-bit group window fits a double exactly, so it is shifted with
// multiplication and division instead of 32-bit bitwise operators.
function symbolAt(window: number, index: number): number {
  return Math.floor(window / 2 ** (GROUP_BITS - 5 * (index + 1))) % 32;
}

function byteAt(window: number, index: number): number {
  return Math.floor(window / 2 ** (GROUP_BITS - 8 * (index + 1))) % 256;
}

/**
 * Encode bytes as RFC 4648 base32, padded with `=` to a multiple of 8 characters.
 *
 * With `wrapLines`, output is broken into 72-character lines and non-empty
 * output always ends with a newline.
 */
export function encode(bytes: Uint8Array, options: EncodeOptions = {}): string {
  const symbols = ALPHABETS[options.alphabet ?? 'standard'];
  const wrap = options.wrapLines ?? false;

  let out = '';
  let lineLength = 0;
  for (let start = 0; start < bytes.length; start += GROUP_BYTES) {
    const group = bytes.subarray(start, start + GROUP_BYTES);
    let window = 0;
    for (let i = 0; i < GROUP_BYTES; i++) {
      window = window * 256 + (i < group.length ? group[i] : 0);
    }

    const emitted = SYMBOLS_FOR_BYTES[group.length];
    for (let i = 0; i < GROUP_SYMBOLS; i++) {
      out += i < emitted ? symbols[symbolAt(window, i)] : PAD;
    }

    lineLength += GROUP_SYMBOLS;
    if (wrap && lineLength >= LINE_WIDTH) {
      out += '\n';
      lineLength = 0;
    }
  }
  if (wrap && lineLength > 0) out += '\n';
  return out;
}

/**
 * Decode base32 text. Characters outside the alphabet are skipped, so wrapped
 * or space-separated secrets decode the same as compact ones. The first `=`
 * ends the input; anything after it is ignored.
 *
 * @throws MalformedInputError when the input ends inside a group without padding.
 */
export function decode(text: string, options: DecodeOptions = {}): Uint8Array {
  const lookup = REVERSE[options.alphabet ?? 'standard'];
  const out: number[] = [];

  let window = 0;
  let pending = 0;
  let padded = false;
  for (const ch of text) {
    if (ch === PAD) {
      padded = true;
      break;
    }
    const value = lookup.get(ch);
    if (value === undefined) continue;

    window = window * 32 + value;
    pending++;
    if (pending === GROUP_SYMBOLS) {
      for (let i = 0; i < GROUP_BYTES; i++) out.push(byteAt(window, i));
      window = 0;
      pending = 0;
    }
  }

  if (pending > 0) {
    if (!padded) throw new MalformedInputError({ missingBits: GROUP_BITS - 5 * pending });
    window *= 2 ** (5 * (GROUP_SYMBOLS - pending));
    for (let i = 0; i < BYTES_FOR_SYMBOLS[pending]; i++) out.push(byteAt(window, i));
  }
  return Uint8Array.from(out);
}

/** True when `text` decodes to at least one byte. */
export function isBase32(text: string, options: DecodeOptions = {}): boolean {
  try {
    return decode(text, options).length > 0;
  } catch (e) {
    if (isMalformedInputError(e)) return false;
    throw e;
  }
}
