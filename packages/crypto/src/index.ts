/**
 * @keybridge/crypto
 *
 * Cryptographic primitives for the Keybridge account trust core.
 * Provides key tree derivation, AES-256-GCM and XSalsa20-Poly1305 sealing,
 * X25519 public-key boxes, and the backup key codec.
 *
 * Security principles:
 * - All operations use Web Crypto API or audited libraries (@noble/*)
 * - Error messages are generic to prevent oracle attacks
 * - Keys are Uint8Array - never convert to/from strings for sensitive data
 * - Secrets are zero-filled as soon as they are consumed (best-effort)
 *
 * @example
 * ```typescript
 * import {
 *   generateMasterSecret,
 *   deriveKey,
 *   sealAesGcm,
 *   unsealAesGcm,
 *   EphemeralBoxKeypair,
 *   sealBox,
 * } from '@keybridge/crypto';
 *
 * const secret = generateMasterSecret();
 * const settingsKey = deriveKey(secret, ['Keybridge Settings', 'v1']);
 * const sealed = await sealAesGcm(plaintext, settingsKey);
 * const opened = await unsealAesGcm(sealed, settingsKey);
 *
 * // New device: one-shot key, the approving device seals to its public key
 * const ephemeral = EphemeralBoxKeypair.generate();
 * const bundle = sealBox(secret, ephemeral.publicKey);
 * const received = ephemeral.open(bundle);
 * ```
 */

export const CRYPTO_VERSION = '0.1.0';

// Key tree derivation
export {
  deriveKey,
  deriveRootState,
  deriveChildState,
  deriveBoxKeypair,
  type KeyTreeState,
} from './keys';

// AES-256-GCM
export { sealAesGcm, unsealAesGcm } from './aes';

// XSalsa20-Poly1305 secret box
export { sealSecretBox, openSecretBox } from './secretbox';

// X25519 public-key box
export {
  generateBoxKeypair,
  boxKeypairFromSeed,
  getBoxPublicKey,
  computeBoxKey,
  sealBox,
  openBox,
  EphemeralBoxKeypair,
} from './box';

// Backup key codec
export {
  encodeBackupKey,
  decodeBackupKey,
  isValidBackupKey,
  formatBackupKey,
  BACKUP_KEY_SYMBOLS,
  type BackupKeyDecodeError,
} from './backup';

// Utility functions (only safe public utilities)
export {
  hexToBytes,
  bytesToHex,
  bytesToBase64,
  base64ToBytes,
  bytesToBase64Url,
  base64UrlToBytes,
  concatBytes,
  clearBytes,
  clearAll,
  bytesEqual,
  generateRandomBytes,
  generateMasterSecret,
  generateDataKey,
} from './utils';

// Types
export {
  CryptoError,
  isCryptoError,
  type CryptoErrorCode,
  type BoxKeypair,
  type DerivationSegment,
  type Result,
} from './types';

// Constants
export {
  MASTER_SECRET_SIZE,
  DERIVED_KEY_SIZE,
  AES_KEY_SIZE,
  AES_IV_SIZE,
  AES_TAG_SIZE,
  SECRETBOX_KEY_SIZE,
  SECRETBOX_NONCE_SIZE,
  SECRETBOX_TAG_SIZE,
  BOX_PUBLIC_KEY_SIZE,
  BOX_SECRET_KEY_SIZE,
  BOX_MIN_BUNDLE_SIZE,
} from './constants';
