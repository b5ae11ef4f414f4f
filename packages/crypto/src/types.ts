/**
 * @keybridge/crypto - Type Definitions
 *
 * Core types for cryptographic operations.
 */

/**
 * X25519 keypair for public-key boxes.
 * Same shape whether derived from the master secret or freshly random.
 */
export type BoxKeypair = {
  /** 32-byte X25519 public key */
  publicKey: Uint8Array;
  /** 32-byte X25519 secret scalar */
  secretKey: Uint8Array;
};

/** One segment of a derivation path; numbers serialize in base 10 */
export type DerivationSegment = string | number;

/**
 * Outcome of an operation that never throws.
 * Used where callers are expected to branch on a failure (user input, network payloads).
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Error codes for categorized error handling.
 * Generic messages are still used externally to prevent oracle attacks.
 */
export type CryptoErrorCode =
  | 'ENCRYPTION_FAILED'
  | 'DECRYPTION_FAILED'
  | 'INVALID_KEY_SIZE'
  | 'INVALID_IV_SIZE'
  | 'INVALID_NONCE_SIZE'
  | 'INVALID_PUBLIC_KEY_SIZE'
  | 'INVALID_PRIVATE_KEY_SIZE'
  | 'INVALID_DERIVATION_PATH'
  | 'INVALID_ENCODING'
  | 'KEY_CONSUMED'
  | 'UNSUPPORTED_VERSION'
  | 'RANDOM_GENERATION_FAILED';

/**
 * Custom error class for cryptographic operations.
 * Provides error codes for internal handling while keeping messages generic.
 */
export class CryptoError extends Error {
  readonly code: CryptoErrorCode;

  constructor(message: string, code: CryptoErrorCode) {
    super(message);
    this.name = 'CryptoError';
    this.code = code;

    // Maintain proper stack trace for V8 (Node.js-specific)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, CryptoError);
    }
  }
}

/**
 * Narrow an unknown thrown value to a CryptoError, optionally of a given code.
 */
export function isCryptoError(error: unknown, code?: CryptoErrorCode): error is CryptoError {
  return error instanceof CryptoError && (code === undefined || error.code === code);
}
