/**
 * Opaque string storage supplied by the host app (secure keychain,
 * encrypted preferences, ...). Same surface as Web Storage, but async.
 */
export interface KeyValueStorage {
  getItem(key: string): Promise<string | null>;
  setItem(key: string, value: string): Promise<void>;
  removeItem(key: string): Promise<void>;
}
