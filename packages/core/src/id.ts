import { randomUUID } from 'node:crypto';

const BASE62_CHARS =
  '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz';
const BASE62_RADIX = 62n;

/** length of a 128 bit value written in base62 */
const CHANNEL_ID_LENGTH = 22;

/**
 * generates a unique connection identifier
 * @returns a random uuid written as 22 base62 characters
 */
export function generateChannelId(): string {
  let num = BigInt(`0x${randomUUID().replace(/-/g, '')}`);
  let result = '';

  while (num > 0n) {
    result = BASE62_CHARS[Number(num % BASE62_RADIX)] + result;
    num /= BASE62_RADIX;
  }

  return result.padStart(CHANNEL_ID_LENGTH, '0');
}
