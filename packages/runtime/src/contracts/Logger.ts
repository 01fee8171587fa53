/**
 * @fileoverview Logger Contract
 *
 * Structured logger used by the runtime, its managers and by plugin
 * authors through the Context.
 *
 * @module @deckhost/runtime/contracts/Logger
 */

/**
 * Severity carried by log records.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Numeric rank of each level, lowest first.
 */
export const LOG_LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
    debug: 10,
    info : 20,
    warn : 30,
    error: 40,
};

/**
 * Logger interface for the runtime.
 */
export interface RuntimeLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Type guard for log level strings (config files, env vars).
 */
export function isLogLevel(value: unknown): value is LogLevel {
    return value === "debug" || value === "info" || value === "warn" || value === "error";
}

/**
 * Default console logger.
 *
 * Records below `minLevel` are dropped before formatting.
 *
 * @param scope - Prefix printed in front of every line
 * @param minLevel - Lowest level that is written
 */
export function createConsoleLogger(scope = "deckhost", minLevel: LogLevel = "debug"): RuntimeLogger {
    const enabled = (level: LogLevel): boolean => LOG_LEVEL_RANK[level] >= LOG_LEVEL_RANK[minLevel];

    return {
        debug: (msg, data) => {
            if (enabled("debug")) console.debug(`[DEBUG] [${scope}] ${msg}`, data ?? "");
        },
        info: (msg, data) => {
            if (enabled("info")) console.info(`[INFO] [${scope}] ${msg}`, data ?? "");
        },
        warn: (msg, data) => {
            if (enabled("warn")) console.warn(`[WARN] [${scope}] ${msg}`, data ?? "");
        },
        error: (msg, data) => {
            if (enabled("error")) console.error(`[ERROR] [${scope}] ${msg}`, data ?? "");
        },
    };
}

/**
 * Create a logger that prefixes every message with `[scope]`.
 * Used to give each action and adapter its own tag.
 */
export function scopeLogger(logger: RuntimeLogger, scope: string): RuntimeLogger {
    return {
        debug: (msg, data) => logger.debug(`[${scope}] ${msg}`, data),
        info : (msg, data) => logger.info(`[${scope}] ${msg}`, data),
        warn : (msg, data) => logger.warn(`[${scope}] ${msg}`, data),
        error: (msg, data) => logger.error(`[${scope}] ${msg}`, data),
    };
}

/**
 * Write a message at a level chosen at run time.
 */
export function logAt(logger: RuntimeLogger, level: LogLevel, message: string, data?: Record<string, unknown>): void {
    switch (level) {
        case "debug":
            logger.debug(message, data);
            break;
        case "info":
            logger.info(message, data);
            break;
        case "warn":
            logger.warn(message, data);
            break;
        case "error":
            logger.error(message, data);
            break;
    }
}

/**
 * Render an unknown thrown value for a log record.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
