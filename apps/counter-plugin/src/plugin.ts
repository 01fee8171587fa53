/**
 * @fileoverview Counter plugin assembly
 *
 * @module counter-plugin/plugin
 */

import { AppHooks, Plugin } from "@deckhost/runtime";
import { clockAction, counterAction } from "./actions/index.js";
import { createAppWatcherAdapter, createClockAdapter, type ClockAdapterConfig } from "./adapters/index.js";

export interface CounterPluginConfig {
    clock?: ClockAdapterConfig;
}

export function createCounterPlugin(config: CounterPluginConfig = {}): Plugin {
    const hooks = new AppHooks()
        .on("applicationDidLaunch", (cx, event) => {
            cx.logger.info(`Watched application launched: ${event.application}`);
        })
        .on("applicationDidTerminate", (cx, event) => {
            cx.logger.info(`Watched application terminated: ${event.application}`);
        })
        .on("deviceDidConnect", (cx, event) => {
            cx.logger.info(`Device connected: ${event.deviceInfo.name}`, { device: event.device });
        });

    return new Plugin()
        .addActions([counterAction, clockAction])
        .addAdapters([createClockAdapter(config.clock), createAppWatcherAdapter()])
        .setHooks(hooks);
}
