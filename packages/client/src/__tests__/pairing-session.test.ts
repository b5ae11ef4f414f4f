import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { generateBoxKeypair, sealBox } from '@keybridge/crypto';
import { PairingSession } from '../pairing/session';
import { encodePairingPayload } from '../pairing/payload';
import { PAIRING_LINK_PREFIX } from '../pairing/link';
import { systemClock, type PairingState } from '../pairing/types';
import type { PairingWaitResult } from '../api/pairing.api';
import { isPairingError } from '../errors';
import { getLogLevel, setLogLevel, type LogLevel } from '../logger';
import { HangingPairingApi, ManualClock, ScriptedPairingApi } from './helpers';

const SEVENS = new Uint8Array(32).fill(7);

function approveWith(secret: Uint8Array, handoffToken?: string) {
  return (publicKey: Uint8Array): PairingWaitResult => ({
    kind: 'approved',
    token: 'test-token',
    bundle: sealBox(encodePairingPayload(secret, handoffToken), publicKey),
  });
}

function createSession(api: ScriptedPairingApi, clock = new ManualClock()) {
  const session = new PairingSession({ api, clock, timeoutMs: 10_000, pollIntervalMs: 1_000 });
  const states: PairingState[] = [];
  session.onStateChange((state) => states.push(state));
  return { session, clock, states };
}

describe('PairingSession', () => {
  let previousLevel: LogLevel;

  beforeAll(() => {
    previousLevel = getLogLevel();
    setLogLevel('error');
  });

  afterAll(() => {
    setLogLevel(previousLevel);
  });

  describe('polling scenarios', () => {
    it('should reach approved after pending, pending, approved', async () => {
      const api = new ScriptedPairingApi([
        { kind: 'pending' },
        { kind: 'pending' },
        approveWith(SEVENS),
      ]);
      const { session, clock, states } = createSession(api);

      const outcome = await session.start();

      expect(outcome).toEqual({
        status: 'approved',
        credentials: { secret: SEVENS, token: 'test-token' },
      });
      expect(session.state).toBe('approved');
      expect(states).toEqual(['awaiting-approval', 'approved']);
      expect(api.waitCalls).toBe(3);
      expect(clock.sleeps).toEqual([1_000, 1_000]);
    });

    it('should expire when only pending answers arrive before the deadline', async () => {
      const api = new ScriptedPairingApi();
      const { session, clock, states } = createSession(api);

      const outcome = await session.start();

      expect(outcome).toEqual({ status: 'expired' });
      expect(states).toEqual(['awaiting-approval', 'expired']);
      // Polls at t = 0, 1000, ..., 9000
      expect(api.waitCalls).toBe(10);
      expect(clock.time).toBe(10_000);
    });

    it('should stop at once on a rejection', async () => {
      const api = new ScriptedPairingApi([{ kind: 'pending' }, { kind: 'rejected' }]);
      const { session, clock, states } = createSession(api);

      const outcome = await session.start();

      expect(outcome).toEqual({ status: 'rejected' });
      expect(states).toEqual(['awaiting-approval', 'rejected']);
      expect(api.waitCalls).toBe(2);
      expect(clock.sleeps).toEqual([1_000]);
    });
  });

  describe('transient errors', () => {
    it('should retry wait polls after a transport error', async () => {
      const api = new ScriptedPairingApi([
        { kind: 'transport-error', error: new Error('socket hang up') },
        approveWith(SEVENS, 'handoff'),
      ]);
      const { session } = createSession(api);

      const outcome = await session.start();

      expect(outcome).toEqual({
        status: 'approved',
        credentials: { secret: SEVENS, token: 'test-token', handoffToken: 'handoff' },
      });
      expect(api.waitCalls).toBe(2);
    });

    it('should treat a throwing api as a transport error', async () => {
      const api = new ScriptedPairingApi([
        () => {
          throw new Error('unexpected');
        },
        approveWith(SEVENS),
      ]);
      const { session } = createSession(api);

      const outcome = await session.start();

      expect(outcome.status).toBe('approved');
    });

    it('should retry the request submission until accepted', async () => {
      const api = new ScriptedPairingApi(
        [approveWith(SEVENS)],
        [{ kind: 'transport-error', error: new Error('offline') }, { kind: 'accepted' }]
      );
      const { session, states } = createSession(api);

      const outcome = await session.start();

      expect(outcome.status).toBe('approved');
      expect(api.requestCalls).toBe(2);
      expect(states).toEqual(['awaiting-approval', 'approved']);
    });

    it('should expire while the request keeps failing', async () => {
      const api = new ScriptedPairingApi(
        [],
        Array.from({ length: 20 }, () => ({ kind: 'transport-error', error: new Error('offline') }) as const)
      );
      const { session, states } = createSession(api);

      const outcome = await session.start();

      expect(outcome).toEqual({ status: 'expired' });
      expect(api.requestCalls).toBe(10);
      expect(api.waitCalls).toBe(0);
      expect(states).toEqual(['expired']);
    });

    it('should end as rejected when the request itself is refused', async () => {
      const api = new ScriptedPairingApi([], [{ kind: 'rejected' }]);
      const { session, states } = createSession(api);

      expect(await session.start()).toEqual({ status: 'rejected' });
      expect(api.waitCalls).toBe(0);
      expect(states).toEqual(['rejected']);
    });
  });

  describe('deadline during a call', () => {
    it('should expire while a wait poll hangs past the deadline', async () => {
      const api = new HangingPairingApi('wait');
      const clock = new ManualClock();
      const session = new PairingSession({ api, clock, timeoutMs: 10_000, pollIntervalMs: 1_000 });

      const outcome = session.start();
      await api.inFlight;
      expect(session.state).toBe('awaiting-approval');

      clock.advance(10_000);

      expect(await outcome).toEqual({ status: 'expired' });
      expect(session.state).toBe('expired');
      expect(api.waitCalls).toBe(1);
      expect(api.aborted).toBe(1);
      expect(clock.pendingWaiters).toBe(0);
    });

    it('should expire while the request itself hangs', async () => {
      const api = new HangingPairingApi('request');
      const clock = new ManualClock();
      const session = new PairingSession({ api, clock, timeoutMs: 10_000, pollIntervalMs: 1_000 });
      const states: PairingState[] = [];
      session.onStateChange((state) => states.push(state));

      const outcome = session.start();
      await api.inFlight;
      clock.advance(10_000);

      expect(await outcome).toEqual({ status: 'expired' });
      expect(states).toEqual(['expired']);
      expect(api.requestCalls).toBe(1);
      expect(api.waitCalls).toBe(0);
    });

    it('should not expire before the deadline is reached', async () => {
      const api = new HangingPairingApi('wait');
      const clock = new ManualClock();
      const session = new PairingSession({ api, clock, timeoutMs: 10_000, pollIntervalMs: 1_000 });

      const outcome = session.start();
      await api.inFlight;
      clock.advance(9_999);
      await Promise.resolve();

      expect(session.state).toBe('awaiting-approval');
      expect(clock.pendingWaiters).toBe(1);

      clock.advance(1);
      expect(await outcome).toEqual({ status: 'expired' });
    });

    it('should cancel a hanging call', async () => {
      const api = new HangingPairingApi('wait');
      const clock = new ManualClock();
      const session = new PairingSession({ api, clock, timeoutMs: 10_000, pollIntervalMs: 1_000 });

      const outcome = session.start();
      await api.inFlight;
      session.cancel();

      expect(await outcome).toEqual({ status: 'cancelled' });
      expect(api.aborted).toBe(1);
      expect(clock.pendingWaiters).toBe(0);
    });

    it('should expire on the system clock while the server never answers', async () => {
      const api = new HangingPairingApi('wait');
      const session = new PairingSession({ api, clock: systemClock, timeoutMs: 100, pollIntervalMs: 10 });
      const started = Date.now();

      expect(await session.start()).toEqual({ status: 'expired' });
      expect(Date.now() - started).toBeLessThan(2_000);
      expect(api.aborted).toBe(1);
    });
  });

  describe('bundle handling', () => {
    it('should fail without retrying when the bundle was sealed to another key', async () => {
      const stranger = generateBoxKeypair();
      const api = new ScriptedPairingApi([
        { kind: 'approved', token: 'test-token', bundle: sealBox(SEVENS, stranger.publicKey) },
      ]);
      const { session } = createSession(api);

      const outcome = await session.start();

      expect(outcome).toEqual({ status: 'failed', reason: 'decryption-failed' });
      expect(session.state).toBe('failed');
      expect(api.waitCalls).toBe(1);
    });

    it('should fail on a payload shorter than a secret', async () => {
      const api = new ScriptedPairingApi([
        (publicKey) => ({
          kind: 'approved',
          token: 'test-token',
          bundle: sealBox(new Uint8Array(10), publicKey),
        }),
      ]);
      const { session } = createSession(api);

      expect(await session.start()).toEqual({ status: 'failed', reason: 'invalid-payload' });
    });
  });

  describe('lifecycle', () => {
    it('should expose the public key and link as soon as start returns', async () => {
      const api = new ScriptedPairingApi([approveWith(SEVENS)]);
      const { session } = createSession(api);

      expect(session.publicKey).toBeNull();
      expect(session.link).toBeNull();

      const outcome = session.start();

      expect(session.publicKey?.length).toBe(32);
      expect(session.link?.startsWith(PAIRING_LINK_PREFIX)).toBe(true);
      expect(session.createdAt).toBe(0);
      await outcome;
    });

    it('should refuse a second start', async () => {
      const { session } = createSession(new ScriptedPairingApi([{ kind: 'rejected' }]));

      await session.start();

      let caught: unknown;
      try {
        void session.start();
      } catch (e) {
        caught = e;
      }
      expect(isPairingError(caught, 'SESSION_ALREADY_STARTED')).toBe(true);
    });

    it('should cancel while a poll is in flight', async () => {
      let session: PairingSession | undefined;
      const api = new ScriptedPairingApi([
        { kind: 'pending' },
        () => {
          session?.cancel();
          return { kind: 'pending' };
        },
      ]);
      const created = createSession(api);
      session = created.session;

      const outcome = await session.start();

      expect(outcome).toEqual({ status: 'cancelled' });
      expect(created.states).toEqual(['awaiting-approval', 'cancelled']);
      expect(api.waitCalls).toBe(2);
    });

    it('should cancel before the first request completes', async () => {
      const api = new ScriptedPairingApi();
      const { session, states } = createSession(api);

      const outcome = session.start();
      session.cancel();

      expect(await outcome).toEqual({ status: 'cancelled' });
      expect(api.requestCalls).toBe(1);
      expect(api.waitCalls).toBe(0);
      expect(states).toEqual(['cancelled']);
    });

    it('should ignore cancel after a terminal state', async () => {
      const { session, states } = createSession(new ScriptedPairingApi([{ kind: 'rejected' }]));

      await session.start();
      session.cancel();

      expect(session.state).toBe('rejected');
      expect(states).toEqual(['awaiting-approval', 'rejected']);
    });

    it('should stop notifying after unsubscribe and survive a throwing listener', async () => {
      const { session } = createSession(new ScriptedPairingApi([{ kind: 'rejected' }]));
      const seen: PairingState[] = [];
      const unsubscribe = session.onStateChange((state) => seen.push(state));
      session.onStateChange(() => {
        throw new Error('listener bug');
      });

      const outcome = session.start();
      unsubscribe();

      expect(await outcome).toEqual({ status: 'rejected' });
      expect(seen).toEqual([]);
    });
  });
});

describe('systemClock', () => {
  it('should wake early when the signal aborts', async () => {
    const controller = new AbortController();
    const started = Date.now();

    const sleeping = systemClock.sleep(60_000, controller.signal);
    controller.abort();
    await sleeping;

    expect(Date.now() - started).toBeLessThan(5_000);
  });

  it('should resolve immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(systemClock.sleep(60_000, controller.signal)).resolves.toBeUndefined();
  });
});
