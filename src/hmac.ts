import { createHmac } from 'crypto';
import type { HmacSha1 } from './types';

export const SHA1_DIGEST_BYTES = 20;

export const nodeHmacSha1: HmacSha1 = (key, message) => {
  return new Uint8Array(createHmac('sha1', key).update(message).digest());
};
