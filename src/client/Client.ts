import { DebugLogger } from '@shardline/debug-logger';
import { EventEmitter } from '@shardline/event-emitter';
import type { WaitForOptions } from '@shardline/event-emitter';
import { ConnectionMonitor } from '@shardline/connection-monitor';
import { parseClientOptions } from '@/config';
import type { ClientOptions, ClientOptionsInput } from '@/config';
import { ShardlineError, toError } from '@/errors';
import { GatewaySession } from '@/gateway/GatewaySession';
import type { SocketFactory } from '@/gateway/socket';
import { ReadySchema } from '@/gateway/types';
import type { GatewayBotInfo, Ready } from '@/gateway/types';
import { RestApp } from '@/rest/RestApp';
import type { Channel, Guild, Snowflake, User } from '@/rest/RestApp';
import { RestClient } from '@/rest/RestClient';
import type { FetchFunction } from '@/rest/RestClient';
import { EventRouter } from './EventRouter';
import type { DispatchHandler, HandlerErrorSink } from './EventRouter';
import { Shard } from './Shard';
import type { ShardContext, ShardLaunchOptions, ShardSessionInit } from './Shard';

export interface ClientDispatch {
  shardId: number;
  name: string;
  data: unknown;
}

export interface ClientEvents extends Record<string, unknown> {
  dispatch: ClientDispatch;
  shardReady: { shardId: number; user: Ready['user'] };
  shardError: { shardId: number; error: Error };
  error: Error;
}

export type ClientHandlers = Iterable<readonly [string, DispatchHandler<Client>]>;

export interface ClientDependencies {
  /** Dispatch handlers keyed by event name, e.g. `MESSAGE_CREATE`. */
  handlers?: ClientHandlers;
  /** Receives handler failures. Defaults to logging them and emitting `error`. */
  onError?: HandlerErrorSink;
  fetch?: FetchFunction;
  socketFactory?: SocketFactory;
  logger?: DebugLogger;
}

/**
 * Entry point for bots: owns the REST transport, the shard table and the
 * event router every shard dispatches into.
 */
export class Client extends EventEmitter<ClientEvents> implements ShardContext {
  readonly options: ClientOptions;
  readonly rest: RestClient;
  readonly api: RestApp;
  readonly shards: Map<number, Shard> = new Map();
  readonly router: EventRouter<Client>;
  readonly logger: DebugLogger;

  private readonly socketFactory: SocketFactory | undefined;
  private gatewayInfo: Promise<GatewayBotInfo> | null = null;
  private gatewayUrl: string | null = null;
  private currentUser: Ready['user'] | null = null;

  constructor(options: ClientOptionsInput, dependencies: ClientDependencies = {}) {
    super();
    this.options = parseClientOptions(options);
    this.logger =
      dependencies.logger ??
      new DebugLogger({ level: this.options.logLevel, wsDebug: this.options.wsDebug, namespace: 'client' });
    this.socketFactory = dependencies.socketFactory;

    this.setListenerErrorHandler((error, event) => {
      this.logger.logError(`Error in "${event}" listener`, error);
    });

    this.rest = new RestClient({
      token: this.options.token,
      apiVersion: this.options.rest.apiVersion,
      host: this.options.rest.host,
      ttl: this.options.rest.ttl,
      userAgent: this.options.rest.userAgent,
      fetch: dependencies.fetch,
      logger: this.logger.child('rest')
    });
    this.api = new RestApp(this.rest);

    const onError: HandlerErrorSink =
      dependencies.onError ??
      ((error, context) => {
        this.logger.logError(`Handler for ${context.event} on shard ${context.shardId} failed`, error);
        this.emit('error', toError(error));
      });
    this.router = new EventRouter<Client>(this, this.buildHandlerTable(dependencies.handlers ?? []), onError);
  }

  /** The bot user, known once any shard received READY. */
  get user(): Ready['user'] | null {
    return this.currentUser;
  }

  /** `GET gateway/bot`, requested once and shared by every caller. */
  getGatewayInfo(): Promise<GatewayBotInfo> {
    if (!this.gatewayInfo) {
      const request = this.api.getGatewayBot();
      this.gatewayInfo = request;
      request.catch(() => {
        // A failed lookup may be retried by the next call.
        if (this.gatewayInfo === request) this.gatewayInfo = null;
      });
    }
    return this.gatewayInfo;
  }

  /** Runs a single shard (id 0 of 1). */
  async run(): Promise<void> {
    await this.runShards(1, [0]);
  }

  async runShards(shardCount: number, shardIds?: Iterable<number>): Promise<void> {
    await this.resolveGatewayUrl();

    const ids = shardIds ? [...shardIds] : Array.from({ length: shardCount }, (_, id) => id);
    this.logger.logInfo(`Launching ${ids.length} of ${shardCount} shard(s)`, { ids });

    for (const id of ids) {
      new Shard(this, id, shardCount).launch(this.launchOptions());
    }
  }

  /** Runs as many shards as the API recommends. */
  async runAutosharded(): Promise<void> {
    const info = await this.getGatewayInfo();
    await this.runShards(info.shards);
  }

  /**
   * Resolves with the data of the next `name` dispatch accepted by `filter`,
   * from any shard.
   */
  async waitForEvent(name: string, options: WaitForOptions<unknown> = {}): Promise<unknown> {
    const filter = options.filter;
    const event = await this.waitFor('dispatch', {
      timeout: options.timeout,
      filter: (dispatch) => dispatch.name === name && (!filter || filter(dispatch.data))
    });
    return event.data;
  }

  fetchUser(userId: Snowflake): Promise<User> {
    return this.api.fetchUser(userId);
  }

  fetchGuild(guildId: Snowflake): Promise<Guild> {
    return this.api.fetchGuild(guildId);
  }

  fetchChannel(channelId: Snowflake): Promise<Channel> {
    return this.api.fetchChannel(channelId);
  }

  close(): void {
    for (const shard of this.shards.values()) {
      shard.close();
    }
    this.logger.logInfo('Client closed');
  }

  createSession(init: ShardSessionInit): GatewaySession {
    const gatewayUrl = this.gatewayUrl ?? this.options.gateway.url;
    if (gatewayUrl === undefined) {
      throw new ShardlineError('Gateway url is not resolved yet, start shards through run()');
    }

    const session = new GatewaySession({
      token: this.options.token,
      intents: this.options.intents,
      shardId: init.shardId,
      shardCount: init.shardCount,
      gatewayUrl,
      apiVersion: this.options.rest.apiVersion,
      largeThreshold: this.options.largeThreshold,
      mobile: init.mobile ?? this.options.mobile,
      presence: init.presence,
      maxReconnectAttempts: this.options.gateway.maxReconnectAttempts,
      watchdogCheckIntervalMs: this.options.gateway.watchdogCheckIntervalMs,
      staleAfterMs: this.options.gateway.staleAfterMs,
      router: this.router,
      socketFactory: this.socketFactory,
      logger: this.logger.child(`shard:${init.shardId}`),
      monitor: new ConnectionMonitor()
    });

    session.on('dispatch', (event) => {
      this.emit('dispatch', { shardId: init.shardId, name: event.name, data: event.data });
    });
    session.on('error', (error) => {
      this.emit('shardError', { shardId: init.shardId, error });
    });

    return session;
  }

  private async resolveGatewayUrl(): Promise<void> {
    if (this.gatewayUrl !== null) return;
    const info = await this.getGatewayInfo();
    this.gatewayUrl = this.options.gateway.url ?? info.url;
  }

  private launchOptions(): ShardLaunchOptions {
    return {
      activity: this.options.activity,
      status: this.options.status,
      mobile: this.options.mobile
    };
  }

  private buildHandlerTable(handlers: ClientHandlers): Map<string, DispatchHandler<Client>> {
    const table = new Map<string, DispatchHandler<Client>>(handlers);
    const userReady = table.get('READY');

    table.set('READY', async (client, data, shardId) => {
      const ready = ReadySchema.safeParse(data);
      if (ready.success) {
        client.currentUser = ready.data.user;
        client.emit('shardReady', { shardId, user: ready.data.user });
      }
      if (userReady) {
        await userReady(client, data, shardId);
      }
    });

    return table;
  }
}
