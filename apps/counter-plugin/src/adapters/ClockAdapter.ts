/**
 * @fileoverview Clock Adapter
 *
 * Publishes {@link ClockTick} on a fixed interval while the plugin runs.
 *
 * @module counter-plugin/adapters/ClockAdapter
 */

import { AdapterError, AdapterHandle, type Adapter } from "@deckhost/runtime";
import { ClockTick } from "../topics.js";

export interface ClockAdapterConfig {
    /** Publish interval in milliseconds (default: 1000) */
    intervalMs?: number;

    /** Clock (default: `Date.now`) */
    now?: () => number;
}

export function createClockAdapter(config: ClockAdapterConfig = {}): Adapter {
    const intervalMs = config.intervalMs ?? 1000;
    const now = config.now ?? (() => Date.now());

    return {
        name  : "clock",
        policy: "eager",
        labels: ["time"],

        start(_cx, bus) {
            if (!(intervalMs > 0)) {
                throw AdapterError.init(`interval must be positive, got ${intervalMs}`);
            }

            const timer = setInterval(() => {
                bus.publish(ClockTick, { now: now() });
            }, intervalMs);

            return AdapterHandle.fromShutdown(() => clearInterval(timer));
        },
    };
}
