/**
 * Where a master secret comes from: created once for a new account, or
 * typed back in from a backup key. (Pairing is the third way; see pairing/.)
 */

import {
  decodeBackupKey,
  encodeBackupKey,
  generateMasterSecret,
  type BackupKeyDecodeError,
  type Result,
} from '@keybridge/crypto';

/**
 * Generate the secret for a brand-new account together with its backup key.
 */
export function createAccountSecret(): { secret: Uint8Array; backupKey: string } {
  const secret = generateMasterSecret();
  return { secret, backupKey: encodeBackupKey(secret) };
}

/**
 * Restore the master secret from a backup key the user entered.
 */
export function restoreFromBackupKey(input: string): Result<Uint8Array, BackupKeyDecodeError> {
  return decodeBackupKey(input);
}
