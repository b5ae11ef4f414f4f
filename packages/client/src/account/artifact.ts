/**
 * Artifact encryption: header and body of an artifact are sealed
 * separately under the artifact's own data key, as base64 strings.
 */

import { base64ToBytes, bytesToBase64, generateDataKey, isCryptoError } from '@keybridge/crypto';
import { AesRecordEncryptor } from './records';

export type ArtifactHeader = {
  title: string | null;
};

export type ArtifactBody = {
  body: string | null;
};

/** Read an optional string field; undefined means the record is mis-shaped */
function optionalString(record: object, field: string): string | null | undefined {
  const value: unknown = field in record ? Reflect.get(record, field) : null;
  if (value === null || value === undefined) {
    return null;
  }
  return typeof value === 'string' ? value : undefined;
}

export class ArtifactEncryption {
  private readonly encryptor: AesRecordEncryptor;

  constructor(dataEncryptionKey: Uint8Array) {
    this.encryptor = new AesRecordEncryptor(dataEncryptionKey);
  }

  /** Fresh 32-byte key for a new artifact */
  static generateDataEncryptionKey(): Uint8Array {
    return generateDataKey();
  }

  async encryptHeader(header: ArtifactHeader): Promise<string> {
    const [record] = await this.encryptor.encrypt([header]);
    return bytesToBase64(record);
  }

  async decryptHeader(encrypted: string): Promise<ArtifactHeader | null> {
    const value = await this.decryptRecord(encrypted);
    if (value === null) {
      return null;
    }
    const title = optionalString(value, 'title');
    return title === undefined ? null : { title };
  }

  async encryptBody(body: ArtifactBody): Promise<string> {
    const [record] = await this.encryptor.encrypt([body]);
    return bytesToBase64(record);
  }

  async decryptBody(encrypted: string): Promise<ArtifactBody | null> {
    const value = await this.decryptRecord(encrypted);
    if (value === null) {
      return null;
    }
    const body = optionalString(value, 'body');
    return body === undefined ? null : { body };
  }

  destroy(): void {
    this.encryptor.destroy();
  }

  private async decryptRecord(encrypted: string): Promise<object | null> {
    let record: Uint8Array;
    try {
      record = base64ToBytes(encrypted);
    } catch (error) {
      if (!isCryptoError(error, 'INVALID_ENCODING')) throw error;
      return null;
    }
    const [value] = await this.encryptor.decrypt([record]);
    return typeof value === 'object' && value !== null && !Array.isArray(value) ? value : null;
  }
}
