export {
  AccountEncryption,
  CONTENT_KEY_PATH,
  ANALYTICS_ID_PATH,
  DATA_KEY_VERSION,
} from './encryption';
export {
  AesRecordEncryptor,
  SecretBoxRecordEncryptor,
  RECORD_VERSION_AES,
  type RecordEncryptor,
} from './records';
export { ArtifactEncryption, type ArtifactHeader, type ArtifactBody } from './artifact';
export { CredentialStore, CREDENTIALS_KEY, type AccountCredentials } from './credentials';
export { createAccountSecret, restoreFromBackupKey } from './secret';
