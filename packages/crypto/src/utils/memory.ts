/**
 * @keybridge/crypto - Memory Utilities
 *
 * Best-effort memory clearing for sensitive data.
 *
 * IMPORTANT: JavaScript does not guarantee memory clearing.
 * The garbage collector controls actual memory deallocation, and copies
 * may exist in JIT-compiled code or V8 internals. These functions overwrite
 * buffer contents the moment a secret is no longer needed, but cannot
 * promise that no other copy of it survives in the process.
 */

/**
 * Clear sensitive data from a Uint8Array (best-effort).
 *
 * @param data - Buffer to clear (null-safe)
 */
export function clearBytes(data: Uint8Array | null | undefined): void {
  if (data) {
    data.fill(0);
  }
}

/**
 * Clear multiple buffers at once.
 *
 * @param buffers - Buffers to clear (null-safe)
 */
export function clearAll(...buffers: (Uint8Array | null | undefined)[]): void {
  for (const buffer of buffers) {
    clearBytes(buffer);
  }
}

/**
 * Constant-time comparison of two byte arrays.
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= a[i] ^ b[i];
  }
  return diff === 0;
}
