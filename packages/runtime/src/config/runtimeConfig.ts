/**
 * @fileoverview Runtime Configuration Loader
 *
 * Loads event-loop tuning and logging settings from a YAML file, then
 * applies environment overrides.
 *
 * @module @deckhost/runtime/config/runtimeConfig
 */

import { existsSync, readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { errorMessage, isLogLevel, type LogLevel, type RuntimeLogger } from "../contracts/Logger.js";
import { ConfigError } from "./errors.js";

export interface RuntimeConfig {
    /** Idle wait before a tick, in milliseconds */
    readonly tickIntervalMs: number;

    /** Sends attempted per drain */
    readonly drainPerTurn: number;

    /** Send buffer bound */
    readonly maxPendingSends: number;

    /** Delay before stopping onAppLaunch adapters */
    readonly appStopDebounceMs: number;

    /** Bound on waiting for adapter tasks at shutdown */
    readonly adapterJoinTimeoutMs: number;

    /** Per-adapter inbox capacity (unbounded when absent) */
    readonly inboxCapacity?: number;

    readonly logLevel: LogLevel;

    /** Log every frame sent and received */
    readonly logWire: boolean;
}

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
    tickIntervalMs      : 100,
    drainPerTurn        : 8,
    maxPendingSends     : 1000,
    appStopDebounceMs   : 250,
    adapterJoinTimeoutMs: 1000,
    logLevel            : "info",
    logWire             : false,
};

const runtimeConfigSchema = z
    .object({
        tickIntervalMs      : z.number().int().positive(),
        drainPerTurn        : z.number().int().positive(),
        maxPendingSends     : z.number().int().positive(),
        appStopDebounceMs   : z.number().int().nonnegative(),
        adapterJoinTimeoutMs: z.number().int().nonnegative(),
        inboxCapacity       : z.number().int().positive(),
        logLevel            : z.enum(["debug", "info", "warn", "error"]),
        logWire             : z.boolean(),
    })
    .partial()
    .strict();

/**
 * Validate parsed YAML content and merge it over the defaults.
 *
 * @throws ConfigError if a key is unknown or a value has the wrong type
 */
export function parseRuntimeConfig(content: string, filePath?: string): RuntimeConfig {
    let raw: unknown;
    try {
        raw = parseYaml(content);
    }
    catch (error) {
        throw new ConfigError(`Invalid YAML: ${errorMessage(error)}`, filePath, { cause: error });
    }

    // An empty file parses to null
    const result = runtimeConfigSchema.safeParse(raw ?? {});
    if (!result.success) {
        const detail = result.error.issues
            .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
            .join("; ");
        throw new ConfigError(`Invalid runtime config: ${detail}`, filePath);
    }

    return { ...DEFAULT_RUNTIME_CONFIG, ...result.data };
}

/**
 * Apply `DECK_LOG_LEVEL` and `DECK_LOG_WIRE` overrides.
 * Unrecognized values are ignored.
 */
export function applyEnvOverrides(config: RuntimeConfig, env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
    const level = env.DECK_LOG_LEVEL?.trim().toLowerCase();
    const wire = parseFlag(env.DECK_LOG_WIRE);

    return {
        ...config,
        logLevel: isLogLevel(level) ? level : config.logLevel,
        logWire : wire ?? config.logWire,
    };
}

/**
 * Load the runtime configuration from a YAML file.
 *
 * @param filePath - Path to the runtime.yml file
 * @throws ConfigError if the file doesn't exist or is invalid
 *
 * @example
 * ```typescript
 * const config = loadRuntimeConfig("./config/runtime.yml");
 * // { tickIntervalMs: 100, drainPerTurn: 8, ..., logLevel: "info", logWire: false }
 * ```
 */
export function loadRuntimeConfig(filePath: string, env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
    if (!existsSync(filePath)) {
        throw new ConfigError(`Runtime config file not found: ${filePath}`, filePath);
    }

    const content = readFileSync(filePath, "utf-8");
    return applyEnvOverrides(parseRuntimeConfig(content, filePath), env);
}

/**
 * Load the runtime configuration, falling back to the defaults.
 */
export function loadRuntimeConfigWithFallback(
    filePath: string,
    logger?: RuntimeLogger,
    env: NodeJS.ProcessEnv = process.env,
): RuntimeConfig {
    try {
        return loadRuntimeConfig(filePath, env);
    }
    catch (error) {
        logger?.warn(`Failed to load runtime config from ${filePath}; using defaults`, {
            error: errorMessage(error),
        });
        return applyEnvOverrides(DEFAULT_RUNTIME_CONFIG, env);
    }
}

function parseFlag(value: string | undefined): boolean | undefined {
    switch (value?.trim().toLowerCase()) {
        case "1":
        case "true":
        case "yes":
        case "on":
            return true;
        case "0":
        case "false":
        case "no":
        case "off":
            return false;
        default:
            return undefined;
    }
}
