/**
 * @fileoverview Launch Entry
 *
 * Wires launch arguments, the runtime config file and the WebSocket
 * transport to a {@link PluginRuntime}, and turns SIGINT / SIGTERM into an
 * exit request.
 *
 * @module @deckhost/runtime/plugins/runPlugin
 */

import { parseLaunchArgs, wsUrl } from "../config/launchArgs.js";
import { loadRuntimeConfigWithFallback, type RuntimeConfig } from "../config/runtimeConfig.js";
import { createConsoleLogger, type RuntimeLogger } from "../contracts/Logger.js";
import { PluginRuntime } from "../engine/PluginRuntime.js";
import { WebSocketTransport } from "../transport/WebSocketTransport.js";
import type { Plugin } from "./Plugin.js";
import { PluginLoader } from "./PluginLoader.js";

export interface RunPluginOptions {
    /** Launch arguments (default: `process.argv.slice(2)`) */
    readonly argv?: readonly string[];

    /** Runtime config file (default: `./config/runtime.yml`) */
    readonly configPath?: string;

    /** Directories of drop-in action and adapter modules */
    readonly pluginDirs?: readonly string[];

    readonly env?: NodeJS.ProcessEnv;

    /** Overrides the console logger built from the config's log level */
    readonly logger?: RuntimeLogger;
}

/**
 * Run a plugin until the controller closes the connection or the process
 * receives SIGINT / SIGTERM.
 *
 * @throws LaunchArgError if the launch arguments are invalid
 * @throws Error if the connection or the registration fails
 *
 * @example
 * ```typescript
 * runPlugin(plugin).catch((error) => {
 *     console.error(error);
 *     process.exit(1);
 * });
 * ```
 */
export async function runPlugin(plugin: Plugin, options: RunPluginOptions = {}): Promise<void> {
    const env = options.env ?? process.env;
    const args = parseLaunchArgs(options.argv ?? process.argv.slice(2));

    const bootLogger = options.logger ?? createConsoleLogger("deckhost", "info");
    const config: RuntimeConfig = loadRuntimeConfigWithFallback(
        options.configPath ?? "./config/runtime.yml",
        bootLogger,
        env,
    );
    const logger = options.logger ?? createConsoleLogger("deckhost", config.logLevel);

    if (options.pluginDirs && options.pluginDirs.length > 0) {
        const loaded = await new PluginLoader({ logger }).loadFromDirectories(options.pluginDirs);
        for (const factory of loaded.actions) {
            if (plugin.actions.some((existing) => existing.id === factory.id)) {
                logger.warn(`Skipping drop-in action ${factory.id}: id already registered`);
                continue;
            }
            plugin.addAction(factory);
        }
        for (const adapter of loaded.adapters) {
            if (plugin.adapters.some((existing) => existing.name === adapter.name)) {
                logger.warn(`Skipping drop-in adapter ${adapter.name}: name already registered`);
                continue;
            }
            plugin.addAdapter(adapter);
        }
    }

    const url = wsUrl(args.port, env);
    logger.info("Connecting to controller", { url, pluginUuid: args.pluginUuid });
    const transport = await WebSocketTransport.connect(url, { logger });

    const runtime = new PluginRuntime(plugin, {
        pluginUuid          : args.pluginUuid,
        registerEvent       : args.registerEvent,
        transport,
        logger,
        tickIntervalMs      : config.tickIntervalMs,
        drainPerTurn        : config.drainPerTurn,
        maxPendingSends     : config.maxPendingSends,
        logWire             : config.logWire,
        appStopDebounceMs   : config.appStopDebounceMs,
        adapterJoinTimeoutMs: config.adapterJoinTimeoutMs,
        inboxCapacity       : config.inboxCapacity,
    });

    const onSignal = (signal: NodeJS.Signals): void => {
        logger.info(`Received ${signal}; shutting down`);
        runtime.requestExit();
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);

    try {
        await runtime.run();
    }
    finally {
        process.off("SIGINT", onSignal);
        process.off("SIGTERM", onSignal);
    }
}
