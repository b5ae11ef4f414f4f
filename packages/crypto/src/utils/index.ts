/**
 * @keybridge/crypto - Utilities
 *
 * Re-exports for encoding, memory, and random utilities.
 */

export {
  hexToBytes,
  bytesToHex,
  bytesToBase64,
  base64ToBytes,
  bytesToBase64Url,
  base64UrlToBytes,
  concatBytes,
  toArrayBuffer,
} from './encoding';
export { clearBytes, clearAll, bytesEqual } from './memory';
export {
  generateRandomBytes,
  generateMasterSecret,
  generateDataKey,
  generateIv,
  generateNonce,
} from './random';
