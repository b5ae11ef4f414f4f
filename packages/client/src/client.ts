/**
 * Composition root: wires configuration, HTTP, storage and the account
 * store into one object per app instance.
 */

import type { AxiosInstance } from 'axios';
import { createApiClient } from './api/client';
import { HttpPairingApi, type PairingApi } from './api/pairing.api';
import { CredentialStore } from './account/credentials';
import { loadConfig, type ClientConfig } from './config';
import { PairingError } from './errors';
import { createLogger, setLogLevel } from './logger';
import { approvePairing } from './pairing/approve';
import { AccountLinker } from './pairing/linker';
import type { Clock } from './pairing/types';
import { createAccountStore, type AccountStore } from './stores/account.store';
import type { KeyValueStorage } from './storage/types';

const logger = createLogger('client');

export type KeybridgeClientOptions = {
  storage: KeyValueStorage;
  config?: Readonly<ClientConfig>;
  /** Replaces the HTTP pairing API (tests, alternative transports) */
  pairingApi?: PairingApi;
  clock?: Clock;
};

export type KeybridgeClient = {
  config: Readonly<ClientConfig>;
  http: AxiosInstance;
  pairingApi: PairingApi;
  store: AccountStore;
  credentials: CredentialStore;
  linker: AccountLinker;
  /** Sign in from persisted credentials; false if there are none */
  restore(): Promise<boolean>;
  /**
   * Approve another device's pairing link with this device's secret.
   *
   * @throws PairingError 'NOT_SIGNED_IN' without a session
   */
  approve(link: string, handoffToken?: string): Promise<void>;
  /** Clear the session and the persisted credentials */
  signOut(): Promise<void>;
};

export function createKeybridgeClient(options: KeybridgeClientOptions): KeybridgeClient {
  const config = options.config ?? loadConfig();
  setLogLevel(config.logLevel);

  const store = createAccountStore();
  const http = createApiClient(config, () => store.getState().token);
  const pairingApi = options.pairingApi ?? new HttpPairingApi(http, config.pairing);
  const credentials = new CredentialStore(options.storage);
  const linker = new AccountLinker({
    api: pairingApi,
    store,
    credentials,
    pairing: config.pairing,
    clock: options.clock,
  });

  return {
    config,
    http,
    pairingApi,
    store,
    credentials,
    linker,

    async restore() {
      const saved = await credentials.load();
      if (!saved) {
        return false;
      }
      store.getState().signIn(saved);
      return true;
    },

    async approve(link, handoffToken) {
      const { secret } = store.getState();
      if (!secret) {
        throw new PairingError('Cannot approve pairing while signed out', 'NOT_SIGNED_IN');
      }
      await approvePairing({ api: pairingApi, secret, link, handoffToken });
    },

    async signOut() {
      linker.cancel();
      store.getState().signOut();
      await credentials.clear();
      logger.info('Credentials cleared');
    },
  };
}
