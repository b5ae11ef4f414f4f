/**
 * @keybridge/crypto - Encoding Utilities
 *
 * Hex, base64 and byte conversion utilities.
 */

import { CryptoError } from '../types';

const BASE64_REGEX = /^[A-Za-z0-9+/]*={0,2}$/;
const BASE64URL_REGEX = /^[A-Za-z0-9_-]*$/;

/**
 * Convert hex string to Uint8Array.
 * Handles optional 0x prefix.
 *
 * @param hex - Hex string (with or without 0x prefix)
 * @returns Byte array
 */
export function hexToBytes(hex: string): Uint8Array {
  const cleanHex = hex.startsWith('0x') ? hex.slice(2) : hex;

  if (cleanHex.length % 2 !== 0) {
    throw new CryptoError('Invalid hex string: odd length', 'INVALID_ENCODING');
  }

  const bytes = new Uint8Array(cleanHex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    const byte = parseInt(cleanHex.substring(i * 2, i * 2 + 2), 16);
    if (Number.isNaN(byte)) {
      throw new CryptoError('Invalid hex string: non-hex character', 'INVALID_ENCODING');
    }
    bytes[i] = byte;
  }

  return bytes;
}

/**
 * Convert Uint8Array to hex string (no prefix).
 *
 * @param bytes - Byte array
 * @returns Lower-case hex string without 0x prefix
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Encode bytes as standard (padded) base64.
 */
export function bytesToBase64(bytes: Uint8Array): string {
  let binary = '';
  for (const byte of bytes) {
    binary += String.fromCharCode(byte);
  }
  return btoa(binary);
}

/**
 * Decode standard base64 into bytes.
 *
 * @throws CryptoError with code 'INVALID_ENCODING' on malformed input
 */
export function base64ToBytes(base64: string): Uint8Array {
  if (!BASE64_REGEX.test(base64) || base64.length % 4 === 1) {
    throw new CryptoError('Invalid base64 string', 'INVALID_ENCODING');
  }

  try {
    return Uint8Array.from(atob(base64), (c) => c.charCodeAt(0));
  } catch {
    throw new CryptoError('Invalid base64 string', 'INVALID_ENCODING');
  }
}

/**
 * Encode bytes as unpadded base64url (RFC 4648 §5), as used in pairing links.
 */
export function bytesToBase64Url(bytes: Uint8Array): string {
  return bytesToBase64(bytes).replace(/\+/g, '-').replace(/\//g, '_').replace(/=+$/, '');
}

/**
 * Decode base64url (padding optional) into bytes.
 *
 * @throws CryptoError with code 'INVALID_ENCODING' on malformed input
 */
export function base64UrlToBytes(base64url: string): Uint8Array {
  const unpadded = base64url.replace(/=+$/, '');
  if (!BASE64URL_REGEX.test(unpadded)) {
    throw new CryptoError('Invalid base64url string', 'INVALID_ENCODING');
  }

  const base64 = unpadded.replace(/-/g, '+').replace(/_/g, '/');
  const padding = base64.length % 4 === 0 ? '' : '='.repeat(4 - (base64.length % 4));
  return base64ToBytes(base64 + padding);
}

/**
 * Concatenate multiple Uint8Arrays into one.
 *
 * @param arrays - Arrays to concatenate
 * @returns Combined array
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(totalLength);

  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }

  return result;
}

/**
 * Copy bytes into a standalone ArrayBuffer.
 *
 * Web Crypto wants a plain ArrayBuffer; views over shared or offset
 * buffers are copied so the exact bytes are passed.
 */
export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}
