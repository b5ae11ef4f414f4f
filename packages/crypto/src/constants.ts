/**
 * @keybridge/crypto - Constants
 *
 * Cryptographic parameters and sizes. Every size here is part of a wire
 * format shared with other clients and must not change.
 */

/** Account master secret size in bytes */
export const MASTER_SECRET_SIZE = 32;

/** Size of every derived key in bytes (left half of an HMAC-SHA512 output) */
export const DERIVED_KEY_SIZE = 32;

/** AES-256-GCM key size in bytes (256 bits) */
export const AES_KEY_SIZE = 32;

/** AES-GCM IV size in bytes (96 bits) - optimal for GCM mode */
export const AES_IV_SIZE = 12;

/** AES-GCM authentication tag size in bytes (128 bits) */
export const AES_TAG_SIZE = 16;

/** AES-GCM algorithm name for Web Crypto API */
export const AES_GCM_ALGORITHM = 'AES-GCM';

/** XSalsa20-Poly1305 key size in bytes */
export const SECRETBOX_KEY_SIZE = 32;

/** XSalsa20-Poly1305 nonce size in bytes (192 bits) */
export const SECRETBOX_NONCE_SIZE = 24;

/** Poly1305 authenticator size in bytes */
export const SECRETBOX_TAG_SIZE = 16;

/** X25519 public key size in bytes */
export const BOX_PUBLIC_KEY_SIZE = 32;

/** X25519 secret scalar size in bytes */
export const BOX_SECRET_KEY_SIZE = 32;

/** Seed size accepted by boxKeypairFromSeed */
export const BOX_SEED_SIZE = 32;

/** Smallest possible sealed box: ephemeral public key + nonce + tag */
export const BOX_MIN_BUNDLE_SIZE = BOX_PUBLIC_KEY_SIZE + SECRETBOX_NONCE_SIZE + SECRETBOX_TAG_SIZE;

/** Crockford base32 alphabet used for backup keys */
export const BACKUP_KEY_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

/** Symbols per dash-separated backup key group */
export const BACKUP_KEY_GROUP_SIZE = 5;
