/**
 * In-process stand-ins for the pairing server and the clock.
 */

import type {
  PairingApi,
  PairingRequestResult,
  PairingWaitResult,
} from '../api/pairing.api';
import type { Clock } from '../pairing/types';

/**
 * Manual clock: sleeping advances time instantly, and advance() moves
 * time forward while a call is in flight. Deadline waiters fire when
 * time reaches them.
 */
export class ManualClock implements Clock {
  time = 0;
  readonly sleeps: number[] = [];
  private readonly waiters = new Set<{ time: number; resolve: () => void }>();

  now(): number {
    return this.time;
  }

  async sleep(ms: number, signal: AbortSignal): Promise<void> {
    this.sleeps.push(ms);
    if (!signal.aborted) {
      this.advance(ms);
    }
  }

  waitUntil(time: number, signal: AbortSignal): Promise<void> {
    if (signal.aborted || time <= this.time) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      const waiter = { time, resolve };
      this.waiters.add(waiter);
      signal.addEventListener(
        'abort',
        () => {
          this.waiters.delete(waiter);
          resolve();
        },
        { once: true }
      );
    });
  }

  /** Number of deadline waiters still pending */
  get pendingWaiters(): number {
    return this.waiters.size;
  }

  advance(ms: number): void {
    this.time += ms;
    for (const waiter of this.waiters) {
      if (waiter.time <= this.time) {
        this.waiters.delete(waiter);
        waiter.resolve();
      }
    }
  }
}

/**
 * PairingApi whose calls hang until their signal aborts, then reject.
 */
export class HangingPairingApi implements PairingApi {
  requestCalls = 0;
  waitCalls = 0;
  aborted = 0;
  /** Resolves once the first hanging call has been made */
  readonly inFlight: Promise<void>;
  private markInFlight: () => void = () => undefined;

  constructor(private readonly hangOn: 'request' | 'wait') {
    this.inFlight = new Promise<void>((resolve) => {
      this.markInFlight = resolve;
    });
  }

  async requestPairing(_publicKey: Uint8Array, signal?: AbortSignal): Promise<PairingRequestResult> {
    this.requestCalls++;
    if (this.hangOn === 'request') {
      return this.hang(signal);
    }
    return { kind: 'accepted' };
  }

  async waitForPairing(_publicKey: Uint8Array, signal?: AbortSignal): Promise<PairingWaitResult> {
    this.waitCalls++;
    return this.hang(signal);
  }

  async respondToPairing(): Promise<void> {
    // Approvals never arrive
  }

  private hang(signal?: AbortSignal): Promise<never> {
    this.markInFlight();
    return new Promise<never>((_resolve, reject) => {
      signal?.addEventListener(
        'abort',
        () => {
          this.aborted++;
          reject(new Error('aborted'));
        },
        { once: true }
      );
    });
  }
}

type Scripted<T> = T | ((publicKey: Uint8Array) => T);

/**
 * PairingApi that answers from a script, then falls back to
 * accepted / pending once the script runs out.
 */
export class ScriptedPairingApi implements PairingApi {
  requestCalls = 0;
  waitCalls = 0;
  readonly responses: { publicKey: Uint8Array; bundle: Uint8Array }[] = [];

  constructor(
    private readonly waitScript: Scripted<PairingWaitResult>[] = [],
    private readonly requestScript: Scripted<PairingRequestResult>[] = []
  ) {}

  async requestPairing(publicKey: Uint8Array): Promise<PairingRequestResult> {
    this.requestCalls++;
    return resolve(this.requestScript.shift(), publicKey) ?? { kind: 'accepted' };
  }

  async waitForPairing(publicKey: Uint8Array): Promise<PairingWaitResult> {
    this.waitCalls++;
    return resolve(this.waitScript.shift(), publicKey) ?? { kind: 'pending' };
  }

  async respondToPairing(publicKey: Uint8Array, bundle: Uint8Array): Promise<void> {
    this.responses.push({ publicKey, bundle });
  }
}

function isStepFunction<T>(step: Scripted<T>): step is (publicKey: Uint8Array) => T {
  return typeof step === 'function';
}

function resolve<T>(step: Scripted<T> | undefined, publicKey: Uint8Array): T | undefined {
  if (step === undefined) {
    return undefined;
  }
  return isStepFunction(step) ? step(publicKey) : step;
}

/**
 * Minimal pairing server shared by a requesting and an approving device.
 */
export class InMemoryPairingServer implements PairingApi {
  private readonly pending = new Map<string, { token: string; bundle: Uint8Array } | null>();

  constructor(private readonly token = 'test-token') {}

  async requestPairing(publicKey: Uint8Array): Promise<PairingRequestResult> {
    const id = keyId(publicKey);
    if (!this.pending.has(id)) {
      this.pending.set(id, null);
    }
    return { kind: 'accepted' };
  }

  async waitForPairing(publicKey: Uint8Array): Promise<PairingWaitResult> {
    const entry = this.pending.get(keyId(publicKey));
    if (entry === undefined) {
      return { kind: 'rejected' };
    }
    return entry ? { kind: 'approved', ...entry } : { kind: 'pending' };
  }

  async respondToPairing(publicKey: Uint8Array, bundle: Uint8Array): Promise<void> {
    this.pending.set(keyId(publicKey), { token: this.token, bundle });
  }
}

function keyId(publicKey: Uint8Array): string {
  return Array.from(publicKey, (b) => b.toString(16).padStart(2, '0')).join('');
}
