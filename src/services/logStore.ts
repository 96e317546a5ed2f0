export type LogSeverity = 'debug' | 'info' | 'warning' | 'error';

export interface LogEntry {
    id: string;
    scope: string;
    severity: LogSeverity;
    message: string;
    timestamp: number;
    metadata?: Record<string, unknown>;
}

interface AppendLogParams {
    scope: string;
    severity: LogSeverity;
    message: string;
    metadata?: Record<string, unknown>;
    timestamp?: number;
}

export const MAX_LOG_ENTRIES = 200;

/**
 * Bounded in-memory log, newest entry first. Owned by the caller (one per
 * transfer session, editor window, test...), never shared implicitly.
 */
export class LogStore {
    private items: LogEntry[] = [];

    private idCounter = 0;

    private readonly maxEntries: number;

    constructor(maxEntries: number = MAX_LOG_ENTRIES) {
        this.maxEntries = Math.max(1, Math.floor(maxEntries));
    }

    get entries(): readonly LogEntry[] {
        return this.items;
    }

    append(entry: AppendLogParams): LogEntry {
        const timestamp = entry.timestamp ?? Date.now();
        this.idCounter += 1;
        const nextEntry: LogEntry = {
            id: `log-${timestamp}-${this.idCounter}`,
            scope: entry.scope,
            severity: entry.severity,
            message: entry.message,
            metadata: entry.metadata,
            timestamp,
        };
        this.items = [nextEntry, ...this.items].slice(0, this.maxEntries);
        return nextEntry;
    }

    clear(): void {
        this.items = [];
    }
}

type LogFn = (message: string, metadata?: Record<string, unknown>) => void;

export interface Logger {
    debug: LogFn;
    info: LogFn;
    warning: LogFn;
    error: LogFn;
}

export interface LoggerOptions {
    store?: LogStore;
    /** Mirror entries to the console as `[Scope] message`. Default: true */
    console?: boolean;
}

const writeToConsole = (
    severity: LogSeverity,
    scope: string,
    message: string,
    metadata?: Record<string, unknown>,
): void => {
    const line = `[${scope}] ${message}`;
    const args: unknown[] = metadata ? [line, metadata] : [line];
    switch (severity) {
        case 'debug':
            console.debug(...args);
            break;
        case 'info':
            console.info(...args);
            break;
        case 'warning':
            console.warn(...args);
            break;
        case 'error':
            console.error(...args);
            break;
    }
};

export const createLogger = (scope: string, options: LoggerOptions = {}): Logger => {
    const mirror = options.console ?? true;
    const log =
        (severity: LogSeverity): LogFn =>
        (message, metadata) => {
            options.store?.append({ scope, severity, message, metadata });
            if (mirror) {
                writeToConsole(severity, scope, message, metadata);
            }
        };
    return {
        debug: log('debug'),
        info: log('info'),
        warning: log('warning'),
        error: log('error'),
    };
};

/** Logger that discards everything; handy for batch runs and tests. */
export const silentLogger: Logger = createLogger('silent', { console: false });
