/**
 * @fileoverview Configuration barrel exports
 *
 * @module @deckhost/runtime/config
 */

export { ConfigError, LaunchArgError } from "./errors.js";
export type { LaunchArgErrorCode } from "./errors.js";
export { parseLaunchArgs, wsUrl } from "./launchArgs.js";
export type { LaunchArgs } from "./launchArgs.js";
export {
    DEFAULT_RUNTIME_CONFIG,
    applyEnvOverrides,
    loadRuntimeConfig,
    loadRuntimeConfigWithFallback,
    parseRuntimeConfig,
} from "./runtimeConfig.js";
export type { RuntimeConfig } from "./runtimeConfig.js";
