import type { DebugLogger } from '@shardline/debug-logger';
import { ShardlineError, toError } from '@/errors';
import type { GatewaySession } from '@/gateway/GatewaySession';
import { generatePresence } from '@/presence/models';
import type { Activity, Presence, Status } from '@/presence/models';
import { sleep } from '@/utils/sleep';

export interface ShardLaunchOptions {
  activity?: Activity;
  status?: Status;
  mobile?: boolean;
}

export interface ShardSessionInit {
  shardId: number;
  shardCount: number;
  presence?: Presence;
  mobile?: boolean;
}

/** What a shard needs from the client that owns it. */
export interface ShardContext {
  readonly shards: Map<number, Shard>;
  readonly logger: DebugLogger;
  createSession(init: ShardSessionInit): GatewaySession;
}

export class Shard {
  /** `null` until the first launch. */
  disconnected: boolean | null = null;

  private session: GatewaySession | null = null;
  private lastLaunch: ShardLaunchOptions = {};

  constructor(
    private readonly context: ShardContext,
    readonly id: number,
    readonly shardCount: number
  ) {}

  /** Seconds between the last heartbeat and its ack. */
  get latency(): number {
    return this.session?.getLatency() ?? Infinity;
  }

  get gateway(): GatewaySession | null {
    return this.session;
  }

  /** Starts a new gateway session for this shard without waiting for it to connect. */
  launch(options: ShardLaunchOptions = {}): this {
    this.lastLaunch = options;

    const presence =
      options.activity !== undefined || options.status !== undefined
        ? generatePresence(options.activity, options.status)
        : undefined;

    this.session?.close();
    const session = this.context.createSession({
      shardId: this.id,
      shardCount: this.shardCount,
      presence,
      mobile: options.mobile
    });
    this.session = session;
    this.context.shards.set(this.id, this);
    this.disconnected = false;

    session.connect().catch((error: unknown) => {
      this.context.logger.logWarn(`Shard ${this.id} failed to open its first connection`, { error: toError(error) });
    });

    return this;
  }

  updatePresence(activity?: Activity, status?: Status): this {
    if (!this.session) {
      throw new ShardlineError(`Shard ${this.id} has not been launched`);
    }
    this.session.updatePresence(generatePresence(activity, status));
    return this;
  }

  close(): void {
    this.session?.close();
    this.disconnected = true;
  }

  /** Closes the shard, waits, then launches it again with the last launch options. */
  async reconnect(waitSeconds = 3): Promise<void> {
    this.close();
    await sleep(waitSeconds * 1000);
    this.launch(this.lastLaunch);
  }
}
