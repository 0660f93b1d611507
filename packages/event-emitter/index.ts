export type EventCallback<T = void> = (data: T) => void;

export type ListenerErrorHandler = (error: unknown, event: string) => void;

export interface EventEmitterOptions {
    /** Receives anything a listener throws. Defaults to `console.error`. */
    onListenerError?: ListenerErrorHandler;
}

export interface WaitForOptions<T> {
    filter?: (data: T) => boolean;
    /** Milliseconds before the returned promise rejects with an `EventTimeoutError`. */
    timeout?: number;
}

export class EventTimeoutError extends Error {
    override readonly name = 'EventTimeoutError';

    constructor(readonly event: string, readonly timeout: number) {
        super(`Timed out after ${timeout}ms waiting for "${event}"`);
    }
}

const defaultListenerErrorHandler: ListenerErrorHandler = (error, event) => {
    console.error(`Error in event handler for ${event}:`, error);
};

export class EventEmitter<TEvents extends Record<string, unknown>> {
    private listeners: Map<keyof TEvents, Set<EventCallback<unknown>>> = new Map();
    private onListenerError: ListenerErrorHandler;

    constructor(options: EventEmitterOptions = {}) {
        this.onListenerError = options.onListenerError ?? defaultListenerErrorHandler;
    }

    protected setListenerErrorHandler(handler: ListenerErrorHandler): void {
        this.onListenerError = handler;
    }

    on<K extends keyof TEvents>(event: K, callback: EventCallback<TEvents[K]>): void {
        let eventListeners = this.listeners.get(event);
        if (!eventListeners) {
            eventListeners = new Set();
            this.listeners.set(event, eventListeners);
        }
        eventListeners.add(callback as EventCallback<unknown>);
    }

    once<K extends keyof TEvents>(event: K, callback: EventCallback<TEvents[K]>): void {
        const wrapper: EventCallback<TEvents[K]> = (data) => {
            this.off(event, wrapper);
            callback(data);
        };
        this.on(event, wrapper);
    }

    off<K extends keyof TEvents>(event: K, callback: EventCallback<TEvents[K]>): void {
        const eventListeners = this.listeners.get(event);
        if (eventListeners) {
            eventListeners.delete(callback as EventCallback<unknown>);
            if (eventListeners.size === 0) {
                this.listeners.delete(event);
            }
        }
    }

    emit<K extends keyof TEvents>(event: K, data: TEvents[K]): void {
        const eventListeners = this.listeners.get(event);
        if (!eventListeners) return;

        for (const callback of [...eventListeners]) {
            try {
                callback(data);
            } catch (error) {
                this.onListenerError(error, String(event));
            }
        }
    }

    /**
     * Resolves with the next emission of `event` accepted by `filter`.
     */
    waitFor<K extends keyof TEvents>(event: K, options: WaitForOptions<TEvents[K]> = {}): Promise<TEvents[K]> {
        return new Promise((resolve, reject) => {
            let timer: ReturnType<typeof setTimeout> | null = null;

            const listener: EventCallback<TEvents[K]> = (data) => {
                if (options.filter && !options.filter(data)) return;
                this.off(event, listener);
                if (timer) clearTimeout(timer);
                resolve(data);
            };

            if (options.timeout !== undefined) {
                const timeout = options.timeout;
                timer = setTimeout(() => {
                    this.off(event, listener);
                    reject(new EventTimeoutError(String(event), timeout));
                }, timeout);
            }

            this.on(event, listener);
        });
    }

    removeAllListeners<K extends keyof TEvents>(event?: K): void {
        if (event === undefined) {
            this.listeners.clear();
        } else {
            this.listeners.delete(event);
        }
    }

    listenerCount<K extends keyof TEvents>(event: K): number {
        return this.listeners.get(event)?.size ?? 0;
    }
}
