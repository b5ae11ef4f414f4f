/**
 * @keybridge/crypto - Backup Key Codec
 *
 * Human-transcribable encoding of the master secret: upper-case Crockford
 * base32, MSB-first, shown in dash-separated groups of five symbols.
 * A 32-byte secret is 52 symbols, the last one carrying 4 zero pad bits.
 *
 * Decoding accepts what people actually type: lower case, spaces, missing
 * or extra dashes, and the look-alike letters O, I and L.
 */

import { CryptoError, type Result } from '../types';
import { BACKUP_KEY_ALPHABET, BACKUP_KEY_GROUP_SIZE, MASTER_SECRET_SIZE } from '../constants';

const BITS_PER_SYMBOL = 5;

/** Symbols in a backup key for a 32-byte secret */
export const BACKUP_KEY_SYMBOLS = Math.ceil((MASTER_SECRET_SIZE * 8) / BITS_PER_SYMBOL);

/**
 * Why a string could not be decoded into a master secret.
 */
export type BackupKeyDecodeError = 'empty' | 'invalid-character' | 'invalid-length' | 'non-canonical';

const LOOKALIKES: Record<string, string> = { O: '0', I: '1', L: '1' };

const SYMBOL_VALUES: ReadonlyMap<string, number> = new Map(
  Array.from(BACKUP_KEY_ALPHABET, (symbol, value) => [symbol, value] as const)
);

function normalize(input: string): string {
  return input
    .replace(/[\s-]+/g, '')
    .toUpperCase()
    .replace(/[OIL]/g, (c) => LOOKALIKES[c] ?? c);
}

function group(symbols: string): string {
  const groups: string[] = [];
  for (let i = 0; i < symbols.length; i += BACKUP_KEY_GROUP_SIZE) {
    groups.push(symbols.slice(i, i + BACKUP_KEY_GROUP_SIZE));
  }
  return groups.join('-');
}

/**
 * Encode a 32-byte master secret as a backup key.
 *
 * @returns e.g. `"ABCDE-FGHJK-...-XY"` (10 groups of 5 and a final group of 2)
 * @throws CryptoError 'INVALID_KEY_SIZE' if the secret is not 32 bytes
 */
export function encodeBackupKey(secret: Uint8Array): string {
  if (secret.length !== MASTER_SECRET_SIZE) {
    throw new CryptoError('Backup key encoding failed', 'INVALID_KEY_SIZE');
  }

  let symbols = '';
  let buffer = 0;
  let bits = 0;

  for (const byte of secret) {
    buffer = ((buffer << 8) | byte) & 0xfff;
    bits += 8;
    while (bits >= BITS_PER_SYMBOL) {
      bits -= BITS_PER_SYMBOL;
      symbols += BACKUP_KEY_ALPHABET[(buffer >> bits) & 0x1f];
    }
  }

  if (bits > 0) {
    symbols += BACKUP_KEY_ALPHABET[(buffer << (BITS_PER_SYMBOL - bits)) & 0x1f];
  }

  return group(symbols);
}

/**
 * Decode a backup key typed or pasted by a user.
 *
 * Never throws; every failure is a value the caller can show.
 */
export function decodeBackupKey(input: string): Result<Uint8Array, BackupKeyDecodeError> {
  const symbols = normalize(input);

  if (symbols.length === 0) {
    return { ok: false, error: 'empty' };
  }

  const values: number[] = [];
  for (const symbol of symbols) {
    const value = SYMBOL_VALUES.get(symbol);
    if (value === undefined) {
      return { ok: false, error: 'invalid-character' };
    }
    values.push(value);
  }

  if (values.length !== BACKUP_KEY_SYMBOLS) {
    return { ok: false, error: 'invalid-length' };
  }

  const secret = new Uint8Array(MASTER_SECRET_SIZE);
  let buffer = 0;
  let bits = 0;
  let offset = 0;

  for (const value of values) {
    buffer = ((buffer << BITS_PER_SYMBOL) | value) & 0xfff;
    bits += BITS_PER_SYMBOL;
    if (bits >= 8) {
      bits -= 8;
      secret[offset++] = (buffer >> bits) & 0xff;
    }
  }

  // Leftover bits are padding and must be zero, or two strings would map to one secret
  if ((buffer & ((1 << bits) - 1)) !== 0) {
    secret.fill(0);
    return { ok: false, error: 'non-canonical' };
  }

  return { ok: true, value: secret };
}

/**
 * Check whether a string decodes to a master secret.
 */
export function isValidBackupKey(input: string): boolean {
  const result = decodeBackupKey(input);
  if (result.ok) {
    result.value.fill(0);
  }
  return result.ok;
}

/**
 * Re-group a backup key for display, e.g. while the user is typing it.
 *
 * Whitespace and dashes are dropped, letters upper-cased and look-alikes
 * normalized; characters outside the alphabet are kept so the user sees them.
 */
export function formatBackupKey(raw: string): string {
  return group(normalize(raw));
}
