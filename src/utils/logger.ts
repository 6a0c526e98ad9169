/* eslint-disable no-console */
/**
 * Centralized logging utility with consistent formatting and levels
 * @module Logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3
};

/**
 * Check whether an arbitrary value names a log level.
 * @param value
 */
export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_WEIGHTS, value);
}

/**
 * Lightweight logger tuned for browser environments with configurable levels.
 * Child loggers share their parent's level and add a scope tag to each line.
 */
export class Logger {
    private _level: LogLevel;
    private _scope: string | null;
    private _parent: Logger | null;

    constructor(scope: string | null = null, parent: Logger | null = null) {
        this._level = 'info';
        this._scope = scope;
        this._parent = parent;
    }

    /**
     * Set the minimum log level
     * @param level
     */
    setLevel(level: LogLevel): void {
        if (!isLogLevel(level)) {
            return;
        }
        if (this._parent) {
            this._parent.setLevel(level);
            return;
        }
        this._level = level;
    }

    getLevel(): LogLevel {
        return this._parent ? this._parent.getLevel() : this._level;
    }

    /**
     * Create a scoped logger, e.g. `logger.child('timeline')`
     * @param scope
     */
    child(scope: string): Logger {
        const fullScope = this._scope ? `${this._scope}:${scope}` : scope;
        return new Logger(fullScope, this._parent ?? this);
    }

    private _shouldLog(level: LogLevel): boolean {
        return LEVEL_WEIGHTS[level] >= LEVEL_WEIGHTS[this.getLevel()];
    }

    /**
     * Format log message with timestamp, level and optional scope
     * @param level
     * @param message
     * @param args
     * @param scope
     */
    static format(level: LogLevel, message: string, args: unknown[], scope: string | null = null): [string, ...unknown[]] {
        const scopeTag = scope ? ` [${scope}]` : '';
        try {
            const timestamp = new Date().toISOString().split('T')[1].split('.')[0];
            return [`[${timestamp}] [${level.toUpperCase()}]${scopeTag} ${message}`, ...args];
        } catch {
            return [`${scopeTag.trim()} ${message}`.trim(), ...args];
        }
    }

    debug(message: string, ...args: unknown[]): void {
        if (this._shouldLog('debug')) {
            // console.debug is filtered out by default in some browsers
            const parts = Logger.format('debug', message, args, this._scope);
            (console.debug || console.log).apply(console, parts);
        }
    }

    info(message: string, ...args: unknown[]): void {
        if (this._shouldLog('info')) {
            console.log(...Logger.format('info', message, args, this._scope));
        }
    }

    warn(message: string, ...args: unknown[]): void {
        if (this._shouldLog('warn')) {
            console.warn(...Logger.format('warn', message, args, this._scope));
        }
    }

    error(message: string, ...args: unknown[]): void {
        console.error(...Logger.format('error', message, args, this._scope));
    }

    /**
     * Log error with stack trace
     * @param message
     * @param error
     * @param args
     */
    exception(message: string, error: unknown, ...args: unknown[]): void {
        const errorMessage = error instanceof Error ? error.message : String(error);
        const errorStack = error instanceof Error ? error.stack ?? '' : '';
        this.error(message, errorMessage, errorStack, ...args);
    }
}

export const logger = new Logger();

/**
 * Apply a `?debug=<level>` query parameter to the root logger.
 * @param search - location.search style string
 * @returns the level applied, if any
 */
export function applyLogLevelFromQuery(search: string): LogLevel | null {
    try {
        const debugLevel = new URLSearchParams(search).get('debug');
        if (isLogLevel(debugLevel)) {
            logger.setLevel(debugLevel);
            return debugLevel;
        }
    } catch (error) {
        logger.warn('Ignoring unreadable debug parameter', error);
    }
    return null;
}

if (typeof window !== 'undefined' && window.location) {
    applyLogLevelFromQuery(window.location.search || '');
}
