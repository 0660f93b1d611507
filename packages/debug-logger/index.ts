export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LoggerLevel = LogLevel | 'silent';
export type WireStage = 'application' | 'websocket' | 'network';

const LEVEL_WEIGHT: Record<LoggerLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

const REDACTED_KEYS = new Set(['token', 'authorization']);

export interface LogEntry {
    timestamp: number;
    direction: 'incoming' | 'outgoing' | 'internal';
    stage: string;
    level: LogLevel;
    namespace: string | null;
    message: string;
    data?: unknown;
}

export type LogSink = (line: string, entry: LogEntry) => void;

export interface DebugLoggerOptions {
    level?: LoggerLevel;
    namespace?: string;
    /** Logs every frame in and out of the gateway. Defaults to `WSDEBUG=true`. */
    wsDebug?: boolean;
    maxEntries?: number;
    sink?: LogSink;
}

interface SharedState {
    level: LoggerLevel;
    wsDebugEnabled: boolean;
    logs: LogEntry[];
    maxEntries: number;
    sink: LogSink;
}

const consoleSink: LogSink = (line, entry) => {
    if (entry.level === 'error') {
        console.error(line);
    } else if (entry.level === 'warn') {
        console.warn(line);
    } else {
        console.log(line);
    }
};

export class DebugLogger {
    private shared: SharedState;
    private readonly namespace: string | null;

    constructor(options: DebugLoggerOptions = {}) {
        this.namespace = options.namespace ?? null;
        this.shared = {
            level: options.level ?? 'info',
            wsDebugEnabled: options.wsDebug ?? process.env.WSDEBUG === 'true',
            logs: [],
            maxEntries: options.maxEntries ?? 1000,
            sink: options.sink ?? consoleSink
        };
    }

    /** A logger writing to the same buffer and sink under another namespace. */
    child(namespace: string): DebugLogger {
        const scoped = this.namespace ? `${this.namespace}:${namespace}` : namespace;
        const logger = new DebugLogger({ namespace: scoped });
        logger.shared = this.shared;
        return logger;
    }

    setLevel(level: LoggerLevel): void {
        this.shared.level = level;
    }

    getLevel(): LoggerLevel {
        return this.shared.level;
    }

    enableWSDebug(): void {
        this.shared.wsDebugEnabled = true;
    }

    disableWSDebug(): void {
        this.shared.wsDebugEnabled = false;
    }

    logIncoming(payload: unknown, stage: WireStage): void {
        if (!this.shared.wsDebugEnabled || !this.isEnabled('debug')) return;

        this.addLog({
            direction: 'incoming',
            stage,
            level: 'debug',
            message: 'Received gateway payload',
            data: redact(payload)
        });
    }

    logOutgoing(op: number | string, data: unknown, stage: WireStage): void {
        if (!this.shared.wsDebugEnabled || !this.isEnabled('debug')) return;

        this.addLog({
            direction: 'outgoing',
            stage,
            level: 'debug',
            message: `Sending gateway payload (op: ${op})`,
            data: { op, data: redact(data) }
        });
    }

    logStateChange(state: string, data?: unknown): void {
        if (!this.isEnabled('info')) return;

        this.addLog({
            direction: 'internal',
            stage: 'state',
            level: 'info',
            message: `State changed to: ${state}`,
            data
        });
    }

    logError(message: string, error?: unknown): void {
        if (!this.isEnabled('error')) return;

        this.addLog({
            direction: 'internal',
            stage: 'error',
            level: 'error',
            message,
            data: error
        });
    }

    logWarn(message: string, data?: unknown): void {
        if (!this.isEnabled('warn')) return;

        this.addLog({
            direction: 'internal',
            stage: 'warning',
            level: 'warn',
            message,
            data
        });
    }

    logInfo(message: string, data?: unknown): void {
        if (!this.isEnabled('info')) return;

        this.addLog({
            direction: 'internal',
            stage: 'info',
            level: 'info',
            message,
            data
        });
    }

    logDebug(message: string, data?: unknown): void {
        if (!this.isEnabled('debug')) return;

        this.addLog({
            direction: 'internal',
            stage: 'debug',
            level: 'debug',
            message,
            data
        });
    }

    private addLog(entry: Omit<LogEntry, 'timestamp' | 'namespace'>): void {
        const full: LogEntry = { timestamp: Date.now(), namespace: this.namespace, ...entry };
        const logs = this.shared.logs;
        logs.push(full);

        if (logs.length > this.shared.maxEntries) {
            logs.shift();
        }

        this.shared.sink(formatLogEntry(full), full);
    }

    getLogs(): LogEntry[] {
        return [...this.shared.logs];
    }

    getLogsPretty(): string {
        return this.shared.logs.map((entry) => formatLogEntry(entry)).join('\n');
    }

    clearLogs(): void {
        this.shared.logs.length = 0;
    }

    isEnabled(level: LogLevel = 'debug'): boolean {
        return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.shared.level];
    }

    isWSDebugEnabled(): boolean {
        return this.shared.wsDebugEnabled;
    }
}

export function formatLogEntry(entry: LogEntry): string {
    const timestamp = new Date(entry.timestamp).toISOString();
    const directionIcon =
        entry.direction === 'incoming' ? '[IN ]' :
            entry.direction === 'outgoing' ? '[OUT]' :
                '[INT]';
    const scope = entry.namespace ? ` (${entry.namespace})` : '';

    let message = `[${timestamp}] ${directionIcon} [${entry.stage}]${scope} ${entry.message}`;

    if (entry.data !== undefined) {
        message += ` ${JSON.stringify(entry.data, replaceErrors)}`;
    }

    return message;
}

function replaceErrors(_key: string, value: unknown): unknown {
    if (value instanceof Error) {
        return { name: value.name, message: value.message };
    }
    return value;
}

function redact(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(redact);
    }
    if (value === null || typeof value !== 'object' || value instanceof Error) {
        return value;
    }
    const result: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
        result[key] = REDACTED_KEYS.has(key.toLowerCase()) ? '[redacted]' : redact(inner);
    }
    return result;
}
