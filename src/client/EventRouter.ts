import type { DispatchRouter, GatewaySession } from '@/gateway/GatewaySession';
import type { DispatchEvent } from '@/gateway/types';

export type DispatchHandler<TClient> = (client: TClient, data: unknown, shardId: number) => unknown;

export interface HandlerErrorContext {
  event: string;
  shardId: number;
}

export type HandlerErrorSink = (error: unknown, context: HandlerErrorContext) => void;

/**
 * Maps dispatch names to handlers. The table is fixed at construction; each
 * handler runs detached from the receive loop and its failures, sync or
 * async, go to the error sink.
 */
export class EventRouter<TClient> implements DispatchRouter {
  private readonly handlers: ReadonlyMap<string, DispatchHandler<TClient>>;

  constructor(
    private readonly client: TClient,
    handlers: Iterable<readonly [string, DispatchHandler<TClient>]>,
    private readonly onError: HandlerErrorSink
  ) {
    this.handlers = new Map(handlers);
  }

  has(event: string): boolean {
    return this.handlers.has(event);
  }

  get events(): string[] {
    return [...this.handlers.keys()];
  }

  route(session: GatewaySession, event: DispatchEvent): void {
    const handler = this.handlers.get(event.name);
    if (!handler) return;

    const shardId = session.shardId;
    Promise.resolve()
      .then(() => handler(this.client, event.data, shardId))
      .catch((error: unknown) => {
        this.onError(error, { event: event.name, shardId });
      });
  }
}
