/**
 * @fileoverview Logger contract
 *
 * Every component accepts a logger; the default writes to the console.
 *
 * @module @injection-detector/core/contracts/Logger
 */

/**
 * Logger interface for detector components.
 */
export interface DetectorLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

export type LogLevel = keyof DetectorLogger;

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: unknown): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

/**
 * Create a console logger whose lines carry a component prefix.
 *
 * @param scope - Prefix printed before every message
 * @param minLevel - Messages below this level are dropped
 */
export function createConsoleLogger(scope: string, minLevel: LogLevel = "debug"): DetectorLogger {
    const threshold = LOG_LEVELS.indexOf(minLevel);

    const write = (level: LogLevel, sink: (...args: unknown[]) => void) =>
        (msg: string, data?: Record<string, unknown>): void => {
            if (LOG_LEVELS.indexOf(level) >= threshold) {
                sink(`[${level.toUpperCase()}] [${scope}] ${msg}`, data ?? "");
            }
        };

    return {
        debug: write("debug", console.debug),
        info : write("info", console.info),
        warn : write("warn", console.warn),
        error: write("error", console.error),
    };
}
