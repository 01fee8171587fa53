/**
 * @fileoverview Configuration Errors
 *
 * @module @deckhost/runtime/config/errors
 */

/**
 * Why the launch arguments could not be parsed.
 */
export type LaunchArgErrorCode =
    | "missingPort"
    | "missingPluginUuid"
    | "missingRegisterEvent"
    | "invalidPort";

/**
 * Raised by {@link parseLaunchArgs} when a required flag is missing or invalid.
 */
export class LaunchArgError extends Error {
    constructor(
        public readonly code: LaunchArgErrorCode,
        message: string,
    ) {
        super(message);
        this.name = "LaunchArgError";
    }
}

/**
 * Raised when a runtime configuration file cannot be read or validated.
 */
export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly filePath?: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = "ConfigError";
    }
}
