/**
 * AccountLinker - "link this device" entry point.
 *
 * Owns at most one PairingSession: starting a new link cancels the
 * previous one. An approved pairing is persisted and signs the account in.
 */

import type { PairingApi } from '../api/pairing.api';
import type { CredentialStore } from '../account/credentials';
import type { PairingConfig } from '../config';
import { createLogger } from '../logger';
import type { AccountStore } from '../stores/account.store';
import { PairingSession } from './session';
import type { Clock, PairingOutcome } from './types';

const logger = createLogger('linker');

export type AccountLinkerOptions = {
  api: PairingApi;
  store: AccountStore;
  credentials: CredentialStore;
  pairing: Pick<PairingConfig, 'timeoutMs' | 'pollIntervalMs'>;
  clock?: Clock;
};

export type LinkAttempt = {
  /** Running session; show `session.link` as a QR code */
  session: PairingSession;
  /** Settles once the session is terminal and, if approved, the account is signed in */
  outcome: Promise<PairingOutcome>;
};

export class AccountLinker {
  private current: PairingSession | null = null;

  constructor(private readonly options: AccountLinkerOptions) {}

  get activeSession(): PairingSession | null {
    return this.current;
  }

  link(): LinkAttempt {
    this.cancel();

    const session = new PairingSession({
      api: this.options.api,
      timeoutMs: this.options.pairing.timeoutMs,
      pollIntervalMs: this.options.pairing.pollIntervalMs,
      clock: this.options.clock,
    });
    this.current = session;

    const outcome = session
      .start()
      .then((result) => this.settle(result))
      .finally(() => {
        if (this.current === session) {
          this.current = null;
        }
      });

    return { session, outcome };
  }

  cancel(): void {
    if (this.current) {
      logger.info('Cancelling previous pairing session');
      this.current.cancel();
      this.current = null;
    }
  }

  private async settle(outcome: PairingOutcome): Promise<PairingOutcome> {
    if (outcome.status !== 'approved') {
      logger.info(`Pairing ended: ${outcome.status}`);
      return outcome;
    }

    const { secret, token } = outcome.credentials;
    await this.options.credentials.save({ secret, token });
    this.options.store.getState().signIn({ secret, token });
    return outcome;
  }
}
