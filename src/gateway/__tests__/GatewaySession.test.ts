import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DebugLogger } from '@shardline/debug-logger';
import { ConnectionClosed, LoginFailure } from '@/errors';
import { GatewaySession } from '../GatewaySession';
import type { DispatchRouter, GatewaySessionInit, SessionState } from '../GatewaySession';
import { READY_PAYLOAD, createFakeSocketFactory, flushMicrotasks } from './fakeSocket';
import type { FakeSocket } from './fakeSocket';
import { createCompressor } from './zlibStream';

const READY = READY_PAYLOAD;

function createHarness(overrides: Partial<GatewaySessionInit> = {}) {
  const { sockets, socketFactory } = createFakeSocketFactory();

  const session = new GatewaySession({
    token: 'test-secret',
    intents: 513,
    shardId: 0,
    shardCount: 1,
    gatewayUrl: 'wss://gateway.test',
    socketFactory,
    logger: new DebugLogger({ level: 'silent' }),
    ...overrides
  });

  const latest = (): FakeSocket => {
    const socket = sockets.at(-1);
    if (!socket) throw new Error('no socket was opened');
    return socket;
  };

  /** Opens the latest socket and plays HELLO. */
  const handshake = async (interval = 45000): Promise<FakeSocket> => {
    const socket = latest();
    socket.open();
    socket.receive({ op: 10, d: { heartbeat_interval: interval }, s: null, t: null });
    await flushMicrotasks();
    return socket;
  };

  /** Connects, handshakes and delivers READY as sequence 1. */
  const ready = async (): Promise<FakeSocket> => {
    const connecting = session.connect();
    const socket = await handshake();
    await connecting;
    socket.receive({ op: 0, s: 1, t: 'READY', d: READY });
    await flushMicrotasks();
    return socket;
  };

  return { session, sockets, latest, handshake, ready };
}

describe('GatewaySession', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('handshake', () => {
    it('connects to the versioned zlib-stream url and identifies after HELLO', async () => {
      const { session, latest, handshake } = createHarness();

      const connecting = session.connect();
      expect(session.getState()).toBe('connecting');
      expect(latest().url).toBe('wss://gateway.test/?v=10&encoding=json&compress=zlib-stream');

      const socket = await handshake();
      await connecting;

      expect(session.getState()).toBe('handshaking');
      expect(session.getHeartbeatInterval()).toBe(45000);
      expect(socket.sent).toEqual([
        {
          op: 2,
          d: {
            token: 'test-secret',
            intents: 513,
            properties: { os: process.platform, browser: 'shardline', device: 'shardline' },
            compress: true,
            large_threshold: 100,
            shard: [0, 1],
            presence: { since: null, afk: false }
          }
        }
      ]);
      session.close();
    });

    it('rejects instead of throwing when the gateway url is malformed', async () => {
      const { session, sockets } = createHarness({ gatewayUrl: 'not a url' });

      const connecting = session.connect();

      await expect(connecting).rejects.toBeInstanceOf(TypeError);
      expect(sockets).toHaveLength(0);
      expect(session.getState()).toBe('disconnected');
    });

    it('identifies as a mobile client when asked to', async () => {
      const { session, handshake } = createHarness({ mobile: true, shardId: 1, shardCount: 2 });

      const connecting = session.connect();
      const socket = await handshake();
      await connecting;

      expect(socket.sent[0]).toMatchObject({
        op: 2,
        d: { properties: { browser: 'Discord iOS' }, shard: [1, 2] }
      });
      session.close();
    });

    it('stores the session from READY and becomes active', async () => {
      const { session, ready } = createHarness();
      const onReady = vi.fn();
      session.on('ready', onReady);

      await ready();

      expect(session.getState()).toBe('active');
      expect(session.isConnected()).toBe(true);
      expect(session.getSessionInfo()).toEqual({
        sessionId: 'session-1',
        sequence: 1,
        resumeGatewayUrl: 'wss://resume.gateway.test'
      });
      expect(session.getUser()).toEqual({ id: '100', username: 'test-bot', bot: true });
      expect(onReady).toHaveBeenCalledTimes(1);
      session.close();
    });
  });

  describe('dispatch', () => {
    it('never moves the sequence backwards', async () => {
      const { session, ready } = createHarness();
      const socket = await ready();

      socket.receive({ op: 0, s: 5, t: 'TYPING_START', d: {} });
      socket.receive({ op: 0, s: 3, t: 'TYPING_START', d: {} });
      await flushMicrotasks();
      expect(session.getSessionInfo().sequence).toBe(5);

      socket.receive({ op: 0, s: 6, t: 'TYPING_START', d: {} });
      await flushMicrotasks();
      expect(session.getSessionInfo().sequence).toBe(6);
      session.close();
    });

    it('hands every dispatch to the router in arrival order', async () => {
      const route = vi.fn<DispatchRouter['route']>();
      const { session, ready } = createHarness({ router: { route } });
      const socket = await ready();

      socket.receive({ op: 0, s: 2, t: 'MESSAGE_CREATE', d: { id: 'm1' } });
      socket.receive({ op: 0, s: 3, t: 'MESSAGE_DELETE', d: { id: 'm1' } });
      await flushMicrotasks();

      expect(route.mock.calls.map(([, event]) => event)).toEqual([
        { name: 'READY', sequence: 1, data: READY },
        { name: 'MESSAGE_CREATE', sequence: 2, data: { id: 'm1' } },
        { name: 'MESSAGE_DELETE', sequence: 3, data: { id: 'm1' } }
      ]);
      expect(route.mock.calls[1]?.[0]).toBe(session);
      session.close();
    });

    it('counts frames that do not decode and keeps going', async () => {
      const { session, ready } = createHarness();
      const socket = await ready();

      socket.receiveRaw('{"op":0,');
      socket.receive({ op: 0, s: 2, t: 'MESSAGE_CREATE', d: {} });
      await flushMicrotasks();

      expect(session.getConnectionMetrics().droppedFrames).toBe(1);
      expect(session.getSessionInfo().sequence).toBe(2);
      session.close();
    });

    it('inflates split zlib-stream frames before handling them', async () => {
      vi.useRealTimers();
      const compress = createCompressor();
      const hello = await compress({ op: 10, d: { heartbeat_interval: 45000 } });
      const readyFrame = await compress({ op: 0, s: 1, t: 'READY', d: READY });
      const { session, latest } = createHarness();

      const connecting = session.connect();
      const socket = latest();
      socket.open();
      await connecting;

      socket.receiveBinary(hello.subarray(0, 6));
      socket.receiveBinary(hello.subarray(6));
      await vi.waitFor(() => expect(socket.ops()).toEqual([2]));

      socket.receiveBinary(readyFrame);
      await vi.waitFor(() => expect(session.getState()).toBe('active'));
      expect(session.getSessionInfo().sequence).toBe(1);
      expect(session.getConnectionMetrics().droppedFrames).toBe(0);
      session.close();
    });

    it('ignores unknown opcodes', async () => {
      const { session, ready } = createHarness();
      const socket = await ready();

      socket.receive({ op: 42, d: null });
      await flushMicrotasks();

      expect(session.getState()).toBe('active');
      session.close();
    });
  });

  describe('heartbeat', () => {
    it('beats interval - 2s after HELLO, then every interval, and measures ack latency', async () => {
      const { session, handshake } = createHarness();
      const connecting = session.connect();
      const socket = await handshake(45000);
      await connecting;

      vi.advanceTimersByTime(42999);
      expect(socket.ops()).toEqual([2]);

      vi.advanceTimersByTime(1);
      expect(socket.sent[1]).toEqual({ op: 1, d: null });

      vi.advanceTimersByTime(120);
      socket.receive({ op: 11 });
      await flushMicrotasks();
      expect(session.getLatency()).toBe(0.12);

      vi.advanceTimersByTime(44879);
      expect(socket.ops()).toEqual([2, 1]);
      vi.advanceTimersByTime(1);
      expect(socket.ops()).toEqual([2, 1, 1]);
      session.close();
    });

    it('restarts its timers when HELLO arrives again', async () => {
      const { session, handshake } = createHarness();
      const connecting = session.connect();
      const socket = await handshake(45000);
      await connecting;

      vi.advanceTimersByTime(10000);
      socket.receive({ op: 10, d: { heartbeat_interval: 45000 } });
      await flushMicrotasks();

      vi.advanceTimersByTime(43000);
      expect(socket.ops()).toEqual([2, 2, 1]);

      session.close();
      expect(vi.getTimerCount()).toBe(0);
    });

    it('reports infinite latency before the first ack', () => {
      const { session } = createHarness();

      expect(session.getLatency()).toBe(Infinity);
    });

    it('sends the current sequence and answers a server heartbeat request at once', async () => {
      const { session, ready } = createHarness();
      const socket = await ready();

      socket.receive({ op: 1, d: null });
      await flushMicrotasks();

      expect(socket.sent.at(-1)).toEqual({ op: 1, d: 1 });
      session.close();
    });

    it('closes a stale connection and reconnects with backoff', async () => {
      const { session, sockets, handshake } = createHarness();
      const connecting = session.connect();
      const socket = await handshake(45000);
      await connecting;

      vi.advanceTimersByTime(119999);
      expect(socket.ops()).toEqual([2, 1, 1]);
      expect(socket.closeCalls).toEqual([]);

      vi.advanceTimersByTime(1);
      expect(socket.closeCalls).toEqual([{ code: 4901, reason: 'Heartbeat ack timeout' }]);
      expect(session.getState()).toBe('disconnected');
      expect(session.getConnectionMetrics().staleConnections).toBe(1);

      vi.advanceTimersByTime(399);
      expect(sockets).toHaveLength(1);
      vi.advanceTimersByTime(1);
      expect(sockets).toHaveLength(2);
      expect(session.getState()).toBe('connecting');
      session.close();
    });

    it('honours watchdog overrides', async () => {
      const { session, handshake } = createHarness({ watchdogCheckIntervalMs: 1000, staleAfterMs: 5000 });
      const connecting = session.connect();
      const socket = await handshake(45000);
      await connecting;

      vi.advanceTimersByTime(48000);
      expect(socket.closeCalls).toEqual([]);

      vi.advanceTimersByTime(1000);
      expect(socket.closeCalls).toEqual([{ code: 4901, reason: 'Heartbeat ack timeout' }]);
      session.close();
    });
  });

  describe('reconnects', () => {
    it('resumes with the stored session after close code 4009', async () => {
      const { session, sockets, ready, handshake } = createHarness();
      const first = await ready();

      first.serverClose(4009);
      expect(sockets).toHaveLength(2);
      expect(sockets[1]?.url).toBe('wss://resume.gateway.test/?v=10&encoding=json&compress=zlib-stream');

      const second = await handshake();
      expect(session.getState()).toBe('resuming');
      expect(second.sent[0]).toEqual({ op: 6, d: { token: 'test-secret', session_id: 'session-1', seq: 1 } });

      const onResumed = vi.fn();
      session.on('resumed', onResumed);
      second.receive({ op: 0, s: 2, t: 'RESUMED', d: null });
      await flushMicrotasks();

      expect(session.getState()).toBe('active');
      expect(onResumed).toHaveBeenCalledTimes(1);
      session.close();
    });

    it('resumes after the server asks for a reconnect', async () => {
      const { session, sockets, ready, handshake } = createHarness();
      const first = await ready();

      first.receive({ op: 7, d: null });
      await flushMicrotasks();

      expect(first.closeCalls).toEqual([{ code: 4900, reason: 'Reconnect requested' }]);
      expect(sockets).toHaveLength(2);

      const second = await handshake();
      expect(second.sent[0]).toEqual({ op: 6, d: { token: 'test-secret', session_id: 'session-1', seq: 1 } });
      session.close();
    });

    it('identifies from scratch after INVALID_SESSION', async () => {
      const { session, sockets, ready, handshake } = createHarness();
      const first = await ready();

      first.receive({ op: 9, d: false });
      await flushMicrotasks();

      expect(first.closeCalls).toEqual([{ code: 4902, reason: 'Invalid session' }]);
      expect(session.getSessionInfo()).toEqual({ sessionId: null, sequence: null, resumeGatewayUrl: null });
      expect(sockets[1]?.url).toBe('wss://gateway.test/?v=10&encoding=json&compress=zlib-stream');

      const second = await handshake();
      expect(second.sent[0]?.op).toBe(2);
      expect(session.getState()).toBe('handshaking');
      session.close();
    });

    it('stops for good on an invalid token', async () => {
      const { session, sockets, ready } = createHarness();
      const onError = vi.fn();
      session.on('error', onError);
      const socket = await ready();

      socket.serverClose(4004);
      vi.advanceTimersByTime(10000);

      expect(sockets).toHaveLength(1);
      expect(session.getState()).toBe('disconnected');
      expect(session.getFailure()).toBeInstanceOf(LoginFailure);
      expect(onError).toHaveBeenCalledWith(session.getFailure());
    });

    it('keeps reconnecting through a long outage by default', async () => {
      const { session, sockets, latest } = createHarness();
      const onError = vi.fn();
      session.on('error', onError);
      const connecting = session.connect();
      latest().open();
      await connecting;

      for (let i = 0; i < 7; i++) {
        latest().serverClose(1006);
        vi.advanceTimersByTime(5000);
      }

      expect(sockets).toHaveLength(8);
      expect(session.getFailure()).toBeNull();
      expect(session.getState()).toBe('connecting');
      expect(onError).not.toHaveBeenCalled();

      latest().serverClose(1006);
      vi.advanceTimersByTime(4999);
      expect(sockets).toHaveLength(8);
      vi.advanceTimersByTime(1);
      expect(sockets).toHaveLength(9);
      session.close();
    });

    it('gives up with ConnectionClosed once an opt-in reconnect budget runs out', async () => {
      const { session, sockets } = createHarness({ maxReconnectAttempts: 2 });
      const onError = vi.fn();
      session.on('error', onError);
      const connecting = session.connect();
      sockets[0]?.open();
      await connecting;

      sockets[0]?.serverClose(4000);
      vi.advanceTimersByTime(400);
      expect(sockets).toHaveLength(2);

      sockets[1]?.serverClose(4000);
      vi.advanceTimersByTime(799);
      expect(sockets).toHaveLength(2);
      vi.advanceTimersByTime(1);
      expect(sockets).toHaveLength(3);

      sockets[2]?.serverClose(4000);
      vi.advanceTimersByTime(10000);

      expect(sockets).toHaveLength(3);
      const failure = session.getFailure();
      expect(failure).toBeInstanceOf(ConnectionClosed);
      expect(failure?.message).toBe('Websocket with shard ID 0 closed with code 4000');
      expect(onError).toHaveBeenCalledTimes(1);
    });
  });

  describe('close', () => {
    it('is idempotent and silences the old socket', async () => {
      const { session, sockets, ready } = createHarness();
      const states: SessionState[] = [];
      const socket = await ready();
      session.on('stateChange', (state) => states.push(state));

      session.close();
      session.close();

      expect(socket.closeCalls).toEqual([{ code: 1000, reason: 'Closed by client' }]);
      expect(states).toEqual(['disconnected']);
      expect(session.isConnected()).toBe(false);

      socket.serverClose(1000);
      socket.receive({ op: 0, s: 9, t: 'MESSAGE_CREATE', d: {} });
      await flushMicrotasks();
      vi.advanceTimersByTime(100000);

      expect(sockets).toHaveLength(1);
      expect(socket.ops()).toEqual([2]);
      expect(session.getSessionInfo().sequence).toBe(1);
    });

    it('can be called before connecting', () => {
      const { session } = createHarness();

      session.close();

      expect(session.getState()).toBe('disconnected');
    });
  });

  describe('outbound commands', () => {
    it('holds presence updates until connected', async () => {
      const { session, ready } = createHarness();
      const presence = { since: 0, afk: false, status: 'idle' as const };

      session.updatePresence(presence);
      const socket = await ready();
      expect(socket.sent[0]).toMatchObject({ op: 2, d: { presence } });

      session.updatePresence({ since: null, afk: false, status: 'dnd' });
      expect(socket.sent.at(-1)).toEqual({ op: 3, d: { since: null, afk: false, status: 'dnd' } });
      session.close();
    });

    it('requests guild members', async () => {
      const { session, ready } = createHarness();
      const socket = await ready();

      session.requestGuildMembers('200', { limit: 10 });
      session.requestGuildMembers('200', { userIds: ['1', '2'], presences: true });

      expect(socket.sent.slice(-2)).toEqual([
        { op: 8, d: { guild_id: '200', limit: 10, query: '' } },
        { op: 8, d: { guild_id: '200', limit: 0, user_ids: ['1', '2'], presences: true } }
      ]);
      session.close();
    });
  });
});
