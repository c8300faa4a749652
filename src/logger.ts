// src/logger.ts

export interface Logger {
    info(...args: unknown[]): void;
    warn(...args: unknown[]): void;
    error(...args: unknown[]): void;
    debug(...args: unknown[]): void;
}

type LogLevel = keyof Logger;

/**
 * Wraps a partial logger, falling back to the console for any level it leaves out.
 */
export function createLogger(provided?: Partial<Logger>): Logger {
    const forward = (level: LogLevel) => (...args: unknown[]): void => {
        const target = provided?.[level];
        if (typeof target === 'function') {
            target.apply(provided, args);
        } else {
            console[level](...args);
        }
    };
    return {
        info: forward('info'),
        warn: forward('warn'),
        error: forward('error'),
        debug: forward('debug'),
    };
}

// Discards everything; used by tests and embedders that log elsewhere.
export const silentLogger: Logger = {
    info: () => {},
    warn: () => {},
    error: () => {},
    debug: () => {},
};
