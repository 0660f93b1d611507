import { DebugLogger } from '@shardline/debug-logger';
import { EventEmitter } from '@shardline/event-emitter';
import { ConnectionMonitor } from '@shardline/connection-monitor';
import type { ConnectionMetrics, HealthReport } from '@shardline/connection-monitor';
import {
  API_VERSION,
  DEFAULT_IDENTITY,
  DEFAULT_LARGE_THRESHOLD,
  HEARTBEAT_JITTER_OFFSET_MS,
  MAX_RECONNECT_DELAY_MS,
  MOBILE_BROWSER,
  WATCHDOG_MAX_CHECK_INTERVAL_MS,
  WATCHDOG_MIN_STALE_AFTER_MS
} from '@/constants';
import { ConnectionClosed, toError } from '@/errors';
import type { GatewayError } from '@/errors';
import type { Presence } from '@/presence/models';
import { classifyCloseCode, createCloseCodeError } from './closeCodes';
import { FrameDecompressor } from './FrameDecompressor';
import { LocalCloseCode, OpCode } from './opcodes';
import { createWebSocket } from './socket';
import type { GatewaySocket, RawFrame, SocketFactory } from './socket';
import { ReadySchema, decodeGatewayMessage } from './types';
import type { Dispatch, DispatchEvent, Identify, OutboundMessage, Ready, RequestGuildMembers } from './types';

export type SessionState = 'disconnected' | 'connecting' | 'handshaking' | 'resuming' | 'active';

/** Receives every dispatch. Implementations must not block the receive loop. */
export interface DispatchRouter {
  route(session: GatewaySession, event: DispatchEvent): void;
}

export interface GatewaySessionEvents extends Record<string, unknown> {
  ready: Ready;
  resumed: void;
  dispatch: DispatchEvent;
  stateChange: SessionState;
  heartbeatAck: number;
  disconnected: { code: number; reason: string };
  error: Error;
}

export interface GatewaySessionInit {
  token: string;
  intents: number;
  shardId: number;
  shardCount: number;
  gatewayUrl: string;
  apiVersion?: number;
  largeThreshold?: number;
  mobile?: boolean;
  presence?: Presence;
  /** Consecutive transient reconnects before failing with `ConnectionClosed`. Unlimited by default. */
  maxReconnectAttempts?: number;
  /** Defaults to `min(20s, interval / 2)` of the interval negotiated on HELLO. */
  watchdogCheckIntervalMs?: number;
  /** Defaults to `max(60s, interval * 1.5)` of the interval negotiated on HELLO. */
  staleAfterMs?: number;
  router?: DispatchRouter;
  socketFactory?: SocketFactory;
  logger?: DebugLogger;
  monitor?: ConnectionMonitor;
}

export interface RequestGuildMembersOptions {
  query?: string;
  limit?: number;
  presences?: boolean;
  userIds?: string | string[];
  nonce?: string;
}

export interface SessionInfo {
  sessionId: string | null;
  sequence: number | null;
  resumeGatewayUrl: string | null;
}

type Timer = ReturnType<typeof setTimeout>;

export class GatewaySession extends EventEmitter<GatewaySessionEvents> {
  readonly shardId: number;
  readonly shardCount: number;

  private readonly token: string;
  private readonly intents: number;
  private readonly gatewayUrl: string;
  private readonly apiVersion: number;
  private readonly largeThreshold: number;
  private readonly mobile: boolean;
  private readonly maxReconnectAttempts: number;
  private readonly watchdogOverrides: { checkIntervalMs?: number; staleAfterMs?: number };
  private readonly router: DispatchRouter | null;
  private readonly socketFactory: SocketFactory;
  private readonly logger: DebugLogger;
  private readonly monitor: ConnectionMonitor;
  private readonly decompressor = new FrameDecompressor();

  private presence: Presence | null;
  private socket: GatewaySocket | null = null;
  private generation = 0;
  private state: SessionState = 'disconnected';
  private receiveChain: Promise<void> = Promise.resolve();

  private sequence: number | null = null;
  private sessionId: string | null = null;
  private resumeGatewayUrl: string | null = null;
  private user: Ready['user'] | null = null;

  private heartbeatInterval: number | null = null;
  private heartbeatTimer: Timer | null = null;
  private watchdogTimer: ReturnType<typeof setInterval> | null = null;
  private reconnectTimer: Timer | null = null;
  private staleAfterMs = WATCHDOG_MIN_STALE_AFTER_MS;
  private lastHeartbeatSentAt = 0;
  private lastHeartbeatAckAt = 0;
  private firstUnackedHeartbeatAt = 0;
  private latency = Infinity;

  private connected = false;
  private closed = false;
  private failure: GatewayError | null = null;
  private reconnectAttempts = 0;

  constructor(init: GatewaySessionInit) {
    super();
    this.shardId = init.shardId;
    this.shardCount = init.shardCount;
    this.token = init.token;
    this.intents = init.intents;
    this.gatewayUrl = init.gatewayUrl;
    this.apiVersion = init.apiVersion ?? API_VERSION;
    this.largeThreshold = init.largeThreshold ?? DEFAULT_LARGE_THRESHOLD;
    this.mobile = init.mobile ?? false;
    this.presence = init.presence ?? null;
    this.maxReconnectAttempts = init.maxReconnectAttempts ?? Infinity;
    this.watchdogOverrides = { checkIntervalMs: init.watchdogCheckIntervalMs, staleAfterMs: init.staleAfterMs };
    this.router = init.router ?? null;
    this.socketFactory = init.socketFactory ?? createWebSocket;
    this.logger = init.logger ?? new DebugLogger({ namespace: `shard:${init.shardId}` });
    this.monitor = init.monitor ?? new ConnectionMonitor();

    this.setListenerErrorHandler((error, event) => {
      this.logger.logError(`Error in "${event}" listener`, error);
    });
  }

  /**
   * Opens a new connection, replacing the current one. Resolves once the
   * socket is open; the handshake follows when the server says HELLO.
   */
  connect(): Promise<void> {
    this.closed = false;
    this.failure = null;
    this.dropSocket(LocalCloseCode.RECONNECT, 'Opening a new connection');
    this.stopTimers();
    this.decompressor.reset();
    this.receiveChain = Promise.resolve();

    const generation = this.generation;

    this.setState('connecting');
    this.monitor.recordConnectAttempt();

    return new Promise((resolve, reject) => {
      let opened = false;

      try {
        const url = this.buildUrl(this.resumeGatewayUrl ?? this.gatewayUrl);
        this.logger.logInfo('Connecting to gateway', { url, resuming: this.sessionId !== null });

        this.socket = this.socketFactory(url, {
          open: () => {
            if (generation !== this.generation) return;
            opened = true;
            this.monitor.recordConnectSuccess();
            this.logger.logDebug('Socket open');
            resolve();
          },
          message: (frame) => {
            if (generation !== this.generation) return;
            this.enqueueFrame(generation, frame);
          },
          close: (code, reason) => {
            if (generation !== this.generation) return;
            this.handleClose(code, reason);
          },
          error: (error) => {
            if (generation !== this.generation) return;
            this.logger.logError('WebSocket error', error);
            if (!opened) {
              this.monitor.recordConnectFailure();
              reject(error);
            }
          }
        });
      } catch (error) {
        this.monitor.recordConnectFailure();
        this.setState('disconnected');
        reject(toError(error));
      }
    });
  }

  /** Stops the session. Safe to call repeatedly and from any state. */
  close(code: number = LocalCloseCode.NORMAL): void {
    const wasClosed = this.closed;
    const hadSocket = this.socket !== null;

    this.closed = true;
    this.connected = false;
    this.dropSocket(code, 'Closed by client');
    this.stopTimers();
    this.decompressor.reset();

    if (hadSocket) {
      this.monitor.recordDisconnect();
      this.emit('disconnected', { code, reason: 'Closed by client' });
    }
    if (!wasClosed) {
      this.logger.logInfo('Session closed', { code });
    }
    this.setState('disconnected');
  }

  /** Remembered for future identifies; sent right away when connected. */
  updatePresence(presence: Presence): void {
    this.presence = presence;

    if (!this.connected) {
      this.logger.logWarn('Not connected, presence will be sent on the next identify');
      return;
    }

    this.send({ op: OpCode.PRESENCE_UPDATE, d: presence });
  }

  requestGuildMembers(guildId: string, options: RequestGuildMembersOptions = {}): void {
    const data: RequestGuildMembers = {
      guild_id: guildId,
      limit: options.limit ?? 0
    };

    if (options.userIds !== undefined) {
      data.user_ids = options.userIds;
    } else {
      data.query = options.query ?? '';
    }
    if (options.presences !== undefined) data.presences = options.presences;
    if (options.nonce !== undefined) data.nonce = options.nonce;

    this.send({ op: OpCode.REQUEST_GUILD_MEMBERS, d: data });
  }

  getState(): SessionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.connected;
  }

  /** Seconds between the last heartbeat and its ack; `Infinity` before the first ack. */
  getLatency(): number {
    return this.latency;
  }

  getHeartbeatInterval(): number | null {
    return this.heartbeatInterval;
  }

  getSessionInfo(): SessionInfo {
    return {
      sessionId: this.sessionId,
      sequence: this.sequence,
      resumeGatewayUrl: this.resumeGatewayUrl
    };
  }

  getUser(): Ready['user'] | null {
    return this.user;
  }

  /** The error that stopped the session for good, if any. */
  getFailure(): GatewayError | null {
    return this.failure;
  }

  getConnectionMetrics(): Readonly<ConnectionMetrics> {
    return this.monitor.getMetrics();
  }

  getHealthStatus(): HealthReport {
    return this.monitor.getHealthStatus();
  }

  // ---------------------------------------------------------------------------
  // Receive path
  // ---------------------------------------------------------------------------

  private enqueueFrame(generation: number, frame: RawFrame): void {
    this.monitor.recordMessageReceived(frame.data.length);
    this.logger.logIncoming(frame.binary ? `<${frame.data.length} bytes>` : frame.data, 'network');

    this.receiveChain = this.receiveChain
      .then(() => this.processFrame(generation, frame))
      .catch((error: unknown) => {
        this.logger.logError('Failed to process gateway message', error);
        this.emit('error', toError(error));
      });
  }

  private async processFrame(generation: number, frame: RawFrame): Promise<void> {
    if (generation !== this.generation) return;

    const result = await this.decompressor.push(frame);
    if (generation !== this.generation) return;

    switch (result.kind) {
      case 'incomplete':
        return;
      case 'dropped':
        this.monitor.recordDroppedFrame();
        this.logger.logWarn('Dropped undecodable gateway frame', { error: result.error });
        return;
      case 'message':
        this.logger.logIncoming(result.payload, 'application');
        this.handleMessage(result.payload);
        return;
    }
  }

  private handleMessage(raw: unknown): void {
    const decoded = decodeGatewayMessage(raw);
    if (!decoded.ok) {
      this.logger.logDebug('Ignoring unrecognized gateway message', { op: decoded.op });
      return;
    }

    const message = decoded.message;
    switch (message.op) {
      case OpCode.DISPATCH:
        this.handleDispatch(message);
        break;
      case OpCode.HEARTBEAT:
        this.sendHeartbeat();
        break;
      case OpCode.RECONNECT:
        this.logger.logInfo('Gateway requested a reconnect');
        this.dropSocket(LocalCloseCode.RECONNECT, 'Reconnect requested');
        this.reconnectNow();
        break;
      case OpCode.INVALID_SESSION:
        this.logger.logWarn('Session invalidated', { resumable: message.d });
        this.sessionId = null;
        this.sequence = null;
        this.resumeGatewayUrl = null;
        this.dropSocket(LocalCloseCode.INVALID_SESSION, 'Invalid session');
        this.reconnectNow();
        break;
      case OpCode.HELLO:
        this.handleHello(message.d.heartbeat_interval);
        break;
      case OpCode.HEARTBEAT_ACK:
        this.handleHeartbeatAck();
        break;
      default: {
        const unhandled: never = message;
        this.logger.logDebug('Unhandled gateway message', unhandled);
      }
    }
  }

  private handleDispatch(message: Dispatch): void {
    if (this.sequence === null || message.s > this.sequence) {
      this.sequence = message.s;
    }

    const event: DispatchEvent = { name: message.t, sequence: message.s, data: message.d };

    if (event.name === 'READY') {
      this.handleReady(event.data);
    } else if (event.name === 'RESUMED') {
      this.handleResumed();
    }

    this.emit('dispatch', event);
    this.router?.route(this, event);
  }

  private handleReady(data: unknown): void {
    const result = ReadySchema.safeParse(data);
    if (!result.success) {
      this.logger.logError('Malformed READY payload', result.error);
      return;
    }

    const ready = result.data;
    this.sessionId = ready.session_id;
    this.resumeGatewayUrl = ready.resume_gateway_url;
    this.user = ready.user;
    this.reconnectAttempts = 0;
    this.connected = true;
    this.setState('active');
    this.logger.logInfo('Ready received', { sessionId: ready.session_id, guilds: ready.guilds.length });
    this.emit('ready', ready);
  }

  private handleResumed(): void {
    this.reconnectAttempts = 0;
    this.connected = true;
    this.setState('active');
    this.logger.logInfo('Session resumed', { sessionId: this.sessionId, sequence: this.sequence });
    this.emit('resumed', undefined);
  }

  private handleHello(interval: number): void {
    this.stopTimers();
    this.heartbeatInterval = interval;
    this.logger.logInfo('Hello received', { heartbeatInterval: interval });
    this.startHeartbeat(interval);
    this.startWatchdog(interval);

    if (this.sessionId !== null && this.sequence !== null) {
      this.setState('resuming');
      this.sendResume(this.sessionId, this.sequence);
    } else {
      this.setState('handshaking');
      this.sendIdentify();
    }
  }

  private handleHeartbeatAck(): void {
    const now = Date.now();
    this.lastHeartbeatAckAt = now;
    this.latency = (now - this.lastHeartbeatSentAt) / 1000;
    this.monitor.recordHeartbeatAck(this.latency);
    this.logger.logDebug('Heartbeat ACK received', { latency: this.latency });
    this.emit('heartbeatAck', this.latency);
  }

  // ---------------------------------------------------------------------------
  // Heartbeat and watchdog
  // ---------------------------------------------------------------------------

  private startHeartbeat(interval: number): void {
    this.lastHeartbeatSentAt = 0;
    this.lastHeartbeatAckAt = 0;
    this.firstUnackedHeartbeatAt = 0;

    const beat = (): void => {
      this.sendHeartbeat();
      this.heartbeatTimer = setTimeout(beat, interval);
    };
    this.heartbeatTimer = setTimeout(beat, Math.max(interval - HEARTBEAT_JITTER_OFFSET_MS, 0));
  }

  private startWatchdog(interval: number): void {
    const checkIntervalMs =
      this.watchdogOverrides.checkIntervalMs ?? Math.min(WATCHDOG_MAX_CHECK_INTERVAL_MS, interval / 2);
    this.staleAfterMs = this.watchdogOverrides.staleAfterMs ?? Math.max(WATCHDOG_MIN_STALE_AFTER_MS, interval * 1.5);

    this.watchdogTimer = setInterval(() => this.checkLiveness(), checkIntervalMs);
  }

  private checkLiveness(): void {
    const outstanding = this.lastHeartbeatSentAt > this.lastHeartbeatAckAt;
    const waited = Date.now() - this.firstUnackedHeartbeatAt;
    if (!outstanding || waited <= this.staleAfterMs) return;

    this.logger.logWarn('No heartbeat ack, connection is stale', { waited });
    this.monitor.recordStaleConnection();
    this.dropSocket(LocalCloseCode.STALE_CONNECTION, 'Heartbeat ack timeout');
    this.handleClose(LocalCloseCode.STALE_CONNECTION, 'Heartbeat ack timeout');
  }

  private sendHeartbeat(): void {
    const now = Date.now();
    if (this.lastHeartbeatSentAt <= this.lastHeartbeatAckAt) {
      this.firstUnackedHeartbeatAt = now;
    }
    this.lastHeartbeatSentAt = now;
    this.monitor.recordHeartbeatSent();
    this.send({ op: OpCode.HEARTBEAT, d: this.sequence });
  }

  private stopTimers(): void {
    if (this.heartbeatTimer) {
      clearTimeout(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    if (this.watchdogTimer) {
      clearInterval(this.watchdogTimer);
      this.watchdogTimer = null;
    }
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  // ---------------------------------------------------------------------------
  // Close handling
  // ---------------------------------------------------------------------------

  private handleClose(code: number, reason: string): void {
    this.stopTimers();
    this.connected = false;
    this.socket = null;
    this.monitor.recordDisconnect();
    this.logger.logInfo('WebSocket closed', { code, reason });
    this.emit('disconnected', { code, reason });

    if (this.closed) {
      this.setState('disconnected');
      return;
    }

    if (classifyCloseCode(code) === 'resumable') {
      this.reconnectNow();
      return;
    }

    const fatal = createCloseCodeError(code, this.shardId);
    if (fatal) {
      this.fail(fatal);
      return;
    }

    if (this.reconnectAttempts >= this.maxReconnectAttempts) {
      this.fail(new ConnectionClosed(this.shardId, code));
      return;
    }

    this.reconnectAttempts++;
    const delay = Math.min(200 * Math.pow(2, this.reconnectAttempts), MAX_RECONNECT_DELAY_MS);
    this.setState('disconnected');
    this.logger.logInfo(`Reconnecting in ${delay}ms (attempt ${this.reconnectAttempts})`);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.reconnectNow();
    }, delay);
  }

  private reconnectNow(): void {
    this.monitor.recordReconnect();
    this.connect().catch((error: unknown) => {
      this.logger.logWarn('Reconnect attempt failed', { error: toError(error) });
    });
  }

  private fail(error: GatewayError): void {
    this.closed = true;
    this.failure = error;
    this.connected = false;
    this.dropSocket(LocalCloseCode.NORMAL, error.message);
    this.stopTimers();
    this.decompressor.reset();
    this.setState('disconnected');
    this.logger.logError('Session stopped', error);
    this.emit('error', error);
  }

  /** Detaches the current socket so none of its callbacks reach this session again. */
  private dropSocket(code: number, reason: string): void {
    this.generation++;
    const socket = this.socket;
    this.socket = null;
    socket?.close(code, reason);
  }

  // ---------------------------------------------------------------------------
  // Send path
  // ---------------------------------------------------------------------------

  private sendIdentify(): void {
    const identify: Identify = {
      token: this.token,
      intents: this.intents,
      properties: {
        ...DEFAULT_IDENTITY,
        browser: this.mobile ? MOBILE_BROWSER : DEFAULT_IDENTITY.browser
      },
      compress: true,
      large_threshold: this.largeThreshold,
      shard: [this.shardId, this.shardCount],
      presence: this.presence ?? { since: null, afk: false }
    };

    this.monitor.recordIdentify();
    this.logger.logInfo('Identifying', { shard: identify.shard, intents: identify.intents });
    this.send({ op: OpCode.IDENTIFY, d: identify });
  }

  private sendResume(sessionId: string, sequence: number): void {
    this.monitor.recordResume();
    this.logger.logInfo('Resuming session', { sessionId, sequence });
    this.send({ op: OpCode.RESUME, d: { token: this.token, session_id: sessionId, seq: sequence } });
  }

  private send(message: OutboundMessage): void {
    const socket = this.socket;
    if (socket === null || !socket.isOpen) {
      this.logger.logWarn('WebSocket not open, dropping outbound message', { op: message.op });
      return;
    }

    const json = JSON.stringify(message);
    this.logger.logOutgoing(message.op, message.d, 'websocket');

    try {
      socket.send(json);
      this.monitor.recordMessageSent(Buffer.byteLength(json));
    } catch (error) {
      this.logger.logError('Failed to send message', error);
      this.emit('error', toError(error));
    }
  }

  private buildUrl(base: string): string {
    const url = new URL(base);
    url.searchParams.set('v', String(this.apiVersion));
    url.searchParams.set('encoding', 'json');
    url.searchParams.set('compress', 'zlib-stream');
    return url.toString();
  }

  private setState(state: SessionState): void {
    if (this.state === state) return;
    this.state = state;
    this.logger.logStateChange(state);
    this.emit('stateChange', state);
  }
}
