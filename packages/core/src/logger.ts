/**
 * Logging Utility
 * Timestamped, scoped logging to the console with a bounded buffer for export
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

const logBuffer: string[] = [];
const MAX_BUFFER_SIZE = 500;

let threshold: LogLevel = 'info';

/**
 * Scoped logger returned by createLogger
 */
export interface Logger {
    debug(msg: string): void;
    info(msg: string): void;
    warn(msg: string): void;
    error(msg: string): void;
}

/**
 * Set the lowest level written to the console.
 * The buffer keeps every level regardless.
 */
export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

export function getLogLevel(): LogLevel {
    return threshold;
}

/**
 * Log a message with timestamp and scope tag
 * @param level - Severity
 * @param scope - Component tag, rendered as [Scope]
 * @param msg - Message to log
 */
export function log(level: LogLevel, scope: string, msg: string): void {
    const time = new Date().toLocaleTimeString('en-GB', { hour12: false });
    const entry = `[${time}] ${level.toUpperCase()} [${scope}] ${msg}`;

    // Always add to buffer
    logBuffer.push(entry);
    if (logBuffer.length > MAX_BUFFER_SIZE) {
        logBuffer.shift();
    }

    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) {
        return;
    }

    switch (level) {
        case 'debug':
            console.debug(entry);
            break;
        case 'info':
            console.log(entry);
            break;
        case 'warn':
            console.warn(entry);
            break;
        case 'error':
            console.error(entry);
            break;
    }
}

/**
 * Create a logger bound to a scope tag
 * @param scope - Component tag, e.g. 'Transport'
 */
export function createLogger(scope: string): Logger {
    return {
        debug: (msg) => log('debug', scope, msg),
        info: (msg) => log('info', scope, msg),
        warn: (msg) => log('warn', scope, msg),
        error: (msg) => log('error', scope, msg),
    };
}

/**
 * Get the log buffer
 */
export function getLogBuffer(): string[] {
    return [...logBuffer];
}

/**
 * Clear the log buffer
 */
export function clearLog(): void {
    logBuffer.length = 0;
}

/**
 * Message text of an unknown thrown value
 */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
