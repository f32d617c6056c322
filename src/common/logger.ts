/**
 * Logging
 *
 * Leveled, optionally colored log lines for depscope, written to stderr so
 * that stdout stays free for results.
 *
 * Core operations never write to process streams themselves: they receive a
 * {@link LogSink}, which is a scoped {@link Logger} in the CLI and either
 * {@link silentLogger} or a memory sink in tests.
 *
 * Usage:
 *   const log = createLogger('walker');
 *   log.warn('Skipping unreadable directory', { path: 'src/private', error: message });
 *   const files = await log.time('Walk', () => walkFiles(root));
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

export interface LogEntry {
    level: LogLevel;
    scope: string;
    message: string;
    data?: LogData;
    timestamp: string;
    durationMs?: number;
}

export interface LoggerConfig {
    /** Lowest level written (default: LOG_LEVEL, else 'info') */
    level: LogLevel;
    /** 'pretty' for people, 'json' for one object per line (default: LOG_FORMAT, else 'pretty') */
    format: 'pretty' | 'json';
    timestamps: boolean;
    /** ANSI colors in pretty output (default: on unless CI is set) */
    color: boolean;
    /** Line writer (default: console.error) */
    output?: (line: string) => void;
}

/**
 * The logging surface injected into the walker, resolver, extractors and builder.
 */
export interface LogSink {
    debug(message: string, data?: LogData): void;
    info(message: string, data?: LogData): void;
    warn(message: string, data?: LogData): void;
    error(message: string, data?: LogData): void;
}

// ============================================================================
// Levels
// ============================================================================

interface LevelStyle {
    rank: number;
    label: string;
    color: string;
}

const LEVELS: Record<LogLevel, LevelStyle> = {
    debug: { rank: 0, label: 'DBG', color: '\x1b[90m' },
    info: { rank: 1, label: 'INF', color: '\x1b[36m' },
    warn: { rank: 2, label: 'WRN', color: '\x1b[33m' },
    error: { rank: 3, label: 'ERR', color: '\x1b[31m' },
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

/** Longest data value shown in pretty output before it is cut */
const MAX_VALUE_LENGTH = 80;

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVELS, value);
}

// ============================================================================
// Global configuration
// ============================================================================

function configFromEnvironment(): LoggerConfig {
    const { LOG_LEVEL, LOG_FORMAT, CI } = process.env;
    return {
        level: isLogLevel(LOG_LEVEL) ? LOG_LEVEL : 'info',
        format: LOG_FORMAT === 'json' ? 'json' : 'pretty',
        timestamps: true,
        color: !CI,
        output: (line) => console.error(line),
    };
}

let current: LoggerConfig = configFromEnvironment();

/**
 * Override some settings; the rest keep their current values.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
    current = { ...current, ...config };
}

/**
 * Back to the environment-derived defaults.
 */
export function resetLogger(): void {
    current = configFromEnvironment();
}

export function setLogLevel(level: LogLevel): void {
    current = { ...current, level };
}

export function getLogLevel(): LogLevel {
    return current.level;
}

// ============================================================================
// Formatting
// ============================================================================

function clockTime(date: Date): string {
    const ms = String(date.getMilliseconds()).padStart(3, '0');
    return `${date.toTimeString().slice(0, 8)}.${ms}`;
}

function paint(code: string, text: string): string {
    return current.color ? `${code}${text}${RESET}` : text;
}

/**
 * `key=value` pairs; strings as-is, anything else JSON-encoded, undefined
 * values left out.
 */
export function formatData(data: LogData): string {
    return Object.entries(data)
        .filter(([, value]) => value !== undefined)
        .map(([key, value]) => {
            const text = typeof value === 'string' ? value : JSON.stringify(value);
            const shown = text.length > MAX_VALUE_LENGTH ? `${text.slice(0, MAX_VALUE_LENGTH - 3)}...` : text;
            return `${key}=${shown}`;
        })
        .join(' ');
}

/**
 * `[time] LVL [scope] message (Nms) key=value ...`
 */
export function formatPretty(entry: LogEntry): string {
    const style = LEVELS[entry.level];
    const fields = entry.data ? formatData(entry.data) : '';
    const parts: string[] = [];
    if (current.timestamps) parts.push(paint(DIM, entry.timestamp));
    parts.push(paint(style.color, style.label));
    if (entry.scope) parts.push(paint(DIM, `[${entry.scope}]`));
    parts.push(entry.message);
    if (entry.durationMs !== undefined) parts.push(paint(DIM, `(${entry.durationMs}ms)`));
    if (fields) parts.push(paint(DIM, fields));
    return parts.join(' ');
}

export function formatJson(entry: LogEntry): string {
    return JSON.stringify({
        ts: entry.timestamp,
        level: entry.level,
        scope: entry.scope || undefined,
        msg: entry.message,
        ...entry.data,
        durationMs: entry.durationMs,
    });
}

// ============================================================================
// Logger
// ============================================================================

export class Logger implements LogSink {
    constructor(readonly scope: string = '') {}

    debug(message: string, data?: LogData): void {
        this.emit('debug', message, data);
    }

    info(message: string, data?: LogData): void {
        this.emit('info', message, data);
    }

    warn(message: string, data?: LogData): void {
        this.emit('warn', message, data);
    }

    error(message: string, data?: LogData): void {
        this.emit('error', message, data);
    }

    /**
     * Logger for a sub-component: "depscope" -> "depscope:walker".
     */
    child(name: string): Logger {
        return new Logger(this.scope ? `${this.scope}:${name}` : name);
    }

    /**
     * Run a step and log how long it took. A failing step is logged at
     * error level and its error rethrown.
     */
    async time<T>(message: string, step: () => Promise<T>, data?: LogData): Promise<T> {
        const started = Date.now();
        let result: T;
        try {
            result = await step();
        } catch (error) {
            const detail = error instanceof Error ? error.message : String(error);
            this.emit('error', `${message} (failed)`, { ...data, error: detail }, Date.now() - started);
            throw error;
        }
        this.emit('info', message, data, Date.now() - started);
        return result;
    }

    private emit(level: LogLevel, message: string, data?: LogData, durationMs?: number): void {
        if (LEVELS[level].rank < LEVELS[current.level].rank) return;

        const entry: LogEntry = {
            level,
            scope: this.scope,
            message,
            data,
            timestamp: clockTime(new Date()),
            durationMs,
        };
        current.output?.(current.format === 'json' ? formatJson(entry) : formatPretty(entry));
    }
}

export function createLogger(scope: string): Logger {
    return new Logger(scope);
}

// ============================================================================
// Sinks for library use and tests
// ============================================================================

/**
 * Discards everything.
 */
export const silentLogger: LogSink = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
};

export type RecordedEntry = Pick<LogEntry, 'level' | 'message' | 'data'>;

export interface MemorySink extends LogSink {
    readonly entries: readonly RecordedEntry[];
    /** Entries at the given level */
    at(level: LogLevel): RecordedEntry[];
}

/**
 * Records every entry in memory, regardless of the global level.
 */
export function createMemorySink(): MemorySink {
    const entries: RecordedEntry[] = [];
    const record = (level: LogLevel) => (message: string, data?: LogData) => {
        entries.push({ level, message, data });
    };
    return {
        entries,
        at: (level) => entries.filter(e => e.level === level),
        debug: record('debug'),
        info: record('info'),
        warn: record('warn'),
        error: record('error'),
    };
}
