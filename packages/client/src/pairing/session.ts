/**
 * PairingSession - requesting side of device pairing.
 *
 * The new device publishes a one-shot X25519 public key (shown as a QR
 * link), then polls until an already signed-in device seals the account
 * secret to that key. The session is a single-use state machine:
 *
 * - Transient failures (network, 5xx, malformed bodies) are logged and
 *   retried after the poll interval; they never end the session.
 * - 403 ends it as `rejected`; running past the deadline ends it as `expired`.
 * - Every terminal state zero-fills the ephemeral secret key.
 * - cancel() interrupts the in-flight request and the current sleep.
 */

import { EphemeralBoxKeypair, clearBytes } from '@keybridge/crypto';
import type { PairingApi, PairingRequestResult, PairingWaitResult } from '../api/pairing.api';
import { DEFAULT_CONFIG } from '../config';
import { PairingError } from '../errors';
import { createLogger, fingerprint, type Logger } from '../logger';
import { formatPairingLink } from './link';
import { decodePairingPayload } from './payload';
import {
  systemClock,
  TERMINAL_PAIRING_STATES,
  type Clock,
  type PairingOutcome,
  type PairingState,
  type PairingStateListener,
} from './types';

export type PairingSessionOptions = {
  api: PairingApi;
  /** Wall-clock limit from start() (default 120 s) */
  timeoutMs?: number;
  /** Pause between polls and retries (default 1 s) */
  pollIntervalMs?: number;
  clock?: Clock;
  logger?: Logger;
};

type ApprovedResult = Extract<PairingWaitResult, { kind: 'approved' }>;
type TransportFailure = { kind: 'transport-error'; error: unknown };
type DeadlineReached = { kind: 'deadline' };

export class PairingSession {
  private readonly api: PairingApi;
  private readonly timeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly abortController = new AbortController();
  private readonly listeners = new Set<PairingStateListener>();

  private currentState: PairingState = 'idle';
  private keypair: EphemeralBoxKeypair | null = null;
  private startedAt: number | null = null;

  constructor(options: PairingSessionOptions) {
    this.api = options.api;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CONFIG.pairing.timeoutMs;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_CONFIG.pairing.pollIntervalMs;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('pairing');
  }

  get state(): PairingState {
    return this.currentState;
  }

  /** Clock time start() was called at, or null before */
  get createdAt(): number | null {
    return this.startedAt;
  }

  /** Ephemeral public key; available as soon as start() returns */
  get publicKey(): Uint8Array | null {
    return this.keypair?.publicKey ?? null;
  }

  /** QR link for the ephemeral public key */
  get link(): string | null {
    const publicKey = this.publicKey;
    return publicKey ? formatPairingLink(publicKey) : null;
  }

  get isTerminal(): boolean {
    return TERMINAL_PAIRING_STATES.includes(this.currentState);
  }

  /**
   * Subscribe to state transitions.
   *
   * @returns Unsubscribe function
   */
  onStateChange(listener: PairingStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Generate the ephemeral key and run the protocol to a terminal state.
   *
   * The key is generated before this returns, so `publicKey` and `link`
   * can be shown while the returned promise is pending. Never rejects;
   * every way the protocol can end is a PairingOutcome.
   *
   * @throws PairingError 'SESSION_ALREADY_STARTED' on a second call
   */
  start(): Promise<PairingOutcome> {
    if (this.startedAt !== null) {
      throw new PairingError('Pairing session already started', 'SESSION_ALREADY_STARTED');
    }

    const keypair = EphemeralBoxKeypair.generate();
    this.keypair = keypair;
    this.startedAt = this.clock.now();

    return this.run(keypair, this.startedAt + this.timeoutMs);
  }

  /**
   * Abort the session. No-op once a terminal state is reached.
   */
  cancel(): void {
    if (this.isTerminal) {
      return;
    }
    this.abortController.abort();
    this.keypair?.discard();
    this.logger.info('Pairing cancelled');
    this.transition('cancelled');
  }

  private get cancelled(): boolean {
    return this.abortController.signal.aborted;
  }

  private async run(keypair: EphemeralBoxKeypair, deadline: number): Promise<PairingOutcome> {
    try {
      const requestOutcome = await this.submitRequest(keypair, deadline);
      if (requestOutcome) {
        return requestOutcome;
      }

      this.transition('awaiting-approval');
      return await this.pollForApproval(keypair, deadline);
    } finally {
      keypair.discard();
    }
  }

  /**
   * Publish the public key, retrying transient errors until the deadline.
   *
   * @returns A terminal outcome, or null once the server accepted the request
   */
  private async submitRequest(
    keypair: EphemeralBoxKeypair,
    deadline: number
  ): Promise<PairingOutcome | null> {
    this.logger.info('Requesting pairing for key', fingerprint(keypair.publicKey));

    for (;;) {
      if (this.cancelled) return { status: 'cancelled' };
      if (this.clock.now() >= deadline) return this.finish({ status: 'expired' });

      const result = await this.callBefore(deadline, (signal) =>
        this.api.requestPairing(keypair.publicKey, signal)
      );

      if (this.cancelled) return { status: 'cancelled' };

      switch (result.kind) {
        case 'deadline':
          this.logger.warn('Pairing expired before the request was accepted');
          return this.finish({ status: 'expired' });
        case 'accepted':
          this.logger.info('Pairing request accepted');
          return null;
        case 'rejected':
          this.logger.warn('Pairing request rejected by server');
          return this.finish({ status: 'rejected' });
        case 'transport-error':
          this.logger.warn('Pairing request failed, retrying:', result.error);
          break;
      }

      await this.pause(deadline);
    }
  }

  private async pollForApproval(
    keypair: EphemeralBoxKeypair,
    deadline: number
  ): Promise<PairingOutcome> {
    for (;;) {
      if (this.cancelled) return { status: 'cancelled' };
      if (this.clock.now() >= deadline) {
        this.logger.warn('Pairing expired before approval');
        return this.finish({ status: 'expired' });
      }

      const result = await this.callBefore(deadline, (signal) =>
        this.api.waitForPairing(keypair.publicKey, signal)
      );

      if (this.cancelled) return { status: 'cancelled' };

      switch (result.kind) {
        case 'deadline':
          this.logger.warn('Pairing expired while waiting for the server');
          return this.finish({ status: 'expired' });
        case 'approved':
          return this.complete(keypair, result);
        case 'rejected':
          this.logger.warn('Pairing rejected by server');
          return this.finish({ status: 'rejected' });
        case 'pending':
          this.logger.debug('Pairing still pending');
          break;
        case 'transport-error':
          this.logger.warn('Pairing poll failed, retrying:', result.error);
          break;
      }

      await this.pause(deadline);
    }
  }

  /**
   * Open the bundle with the ephemeral key. One attempt only: the key is
   * consumed whether or not it opens.
   */
  private complete(keypair: EphemeralBoxKeypair, result: ApprovedResult): PairingOutcome {
    let plaintext: Uint8Array;
    try {
      plaintext = keypair.open(result.bundle);
    } catch (error) {
      this.logger.error('Pairing bundle could not be opened:', error);
      return this.finish({ status: 'failed', reason: 'decryption-failed' });
    }

    const payload = decodePairingPayload(plaintext);
    clearBytes(plaintext);

    if (!payload.ok) {
      this.logger.error('Pairing bundle held a malformed payload');
      return this.finish({ status: 'failed', reason: 'invalid-payload' });
    }

    this.logger.info('Pairing approved');
    return this.finish({
      status: 'approved',
      credentials: { ...payload.value, token: result.token },
    });
  }

  /**
   * Run one API call, cut off at the deadline.
   *
   * The call gets its own signal, aborted by cancel() and by the deadline.
   * A rejected call reads as a transport error.
   */
  private async callBefore<T extends PairingRequestResult | PairingWaitResult>(
    deadline: number,
    call: (signal: AbortSignal) => Promise<T>
  ): Promise<T | TransportFailure | DeadlineReached> {
    const attempt = new AbortController();
    const sessionSignal = this.abortController.signal;
    const onCancel = () => attempt.abort();
    sessionSignal.addEventListener('abort', onCancel, { once: true });

    try {
      const response: Promise<T | TransportFailure> = call(attempt.signal).catch(
        (error: unknown): TransportFailure => ({ kind: 'transport-error', error })
      );
      const expiry = this.clock
        .waitUntil(deadline, attempt.signal)
        .then((): DeadlineReached => ({ kind: 'deadline' }));
      return await Promise.race([response, expiry]);
    } finally {
      attempt.abort();
      sessionSignal.removeEventListener('abort', onCancel);
    }
  }

  /** Sleep one poll interval, but never past the deadline */
  private pause(deadline: number): Promise<void> {
    const remaining = Math.max(0, deadline - this.clock.now());
    return this.clock.sleep(Math.min(this.pollIntervalMs, remaining), this.abortController.signal);
  }

  private finish(outcome: PairingOutcome): PairingOutcome {
    this.keypair?.discard();
    this.transition(outcome.status);
    return outcome;
  }

  private transition(next: PairingState): void {
    if (this.currentState === next) {
      return;
    }
    this.currentState = next;

    for (const listener of this.listeners) {
      try {
        listener(next);
      } catch (error) {
        this.logger.error('Pairing state listener threw:', error);
      }
    }
  }
}
