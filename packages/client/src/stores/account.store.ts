import { createStore, type StoreApi } from 'zustand/vanilla';
import { AccountEncryption } from '../account/encryption';
import type { AccountCredentials } from '../account/credentials';
import { createLogger } from '../logger';

const logger = createLogger('account');

export type AccountStatus = 'signed-out' | 'signed-in';

export type AccountState = {
  status: AccountStatus;
  // Memory-only; persistence goes through CredentialStore
  secret: Uint8Array | null;
  token: string | null;
  encryption: AccountEncryption | null;

  // Actions
  signIn: (credentials: AccountCredentials) => void;
  signOut: () => void;
};

export type AccountStore = StoreApi<AccountState>;

/**
 * Account session store.
 *
 * Created explicitly and passed to whatever needs key material; there is
 * no module-level instance. The store takes ownership of the secret it is
 * given: signing out, or signing in over an existing session, zero-fills it.
 */
export function createAccountStore(): AccountStore {
  return createStore<AccountState>()((set, get) => {
    // Best-effort memory clearing - overwrite with zeros
    const wipe = (keep?: Uint8Array) => {
      const state = get();
      if (state.secret && state.secret !== keep) {
        state.secret.fill(0);
      }
      state.encryption?.destroy();
    };

    return {
      // State
      status: 'signed-out',
      secret: null,
      token: null,
      encryption: null,

      // Actions
      signIn: ({ secret, token }) => {
        const encryption = AccountEncryption.create(secret);
        wipe(secret);
        set({ status: 'signed-in', secret, token, encryption });
        logger.info('Signed in, account', encryption.anonId);
      },

      signOut: () => {
        wipe();
        set({ status: 'signed-out', secret: null, token: null, encryption: null });
        logger.info('Signed out');
      },
    };
  });
}
