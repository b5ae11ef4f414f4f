/**
 * @keybridge/crypto - Backup Key Module
 */

export {
  encodeBackupKey,
  decodeBackupKey,
  isValidBackupKey,
  formatBackupKey,
  BACKUP_KEY_SYMBOLS,
  type BackupKeyDecodeError,
} from './codec';
