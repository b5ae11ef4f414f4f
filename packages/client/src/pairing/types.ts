/**
 * Pairing state machine types.
 *
 * idle ──start()──▶ awaiting-approval ──▶ approved | rejected | expired | failed
 *   └──────────── cancel() from any non-terminal state ───────────▶ cancelled
 */

export type PairingState =
  | 'idle'
  | 'awaiting-approval'
  | 'approved'
  | 'rejected'
  | 'expired'
  | 'failed'
  | 'cancelled';

export const TERMINAL_PAIRING_STATES: readonly PairingState[] = [
  'approved',
  'rejected',
  'expired',
  'failed',
  'cancelled',
];

/** What the approving device handed over */
export type PairingCredentials = {
  /** 32-byte account master secret */
  secret: Uint8Array;
  /** Access token issued by the server on approval */
  token: string;
  /** Optional token the approving device appended to the payload */
  handoffToken?: string;
};

export type PairingFailureReason = 'decryption-failed' | 'invalid-payload';

export type PairingOutcome =
  | { status: 'approved'; credentials: PairingCredentials }
  | { status: 'rejected' }
  | { status: 'expired' }
  | { status: 'failed'; reason: PairingFailureReason }
  | { status: 'cancelled' };

export type PairingStateListener = (state: PairingState) => void;

/**
 * Time source for the polling loop. Swapped for a manual clock in tests.
 */
export interface Clock {
  now(): number;
  /** Resolve after `ms`, or as soon as `signal` aborts */
  sleep(ms: number, signal: AbortSignal): Promise<void>;
  /** Resolve once now() reaches `time`, or as soon as `signal` aborts */
  waitUntil(time: number, signal: AbortSignal): Promise<void>;
}

function sleepFor(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: sleepFor,
  waitUntil: (time, signal) => sleepFor(Math.max(0, time - Date.now()), signal),
};
