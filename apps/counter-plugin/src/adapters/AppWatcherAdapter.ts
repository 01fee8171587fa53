/**
 * @fileoverview Application Watcher Adapter
 *
 * Runs while a watched application is open. On start it resets every
 * counter tile, then keeps a running total of counter changes until it
 * is stopped.
 *
 * @module counter-plugin/adapters/AppWatcherAdapter
 */

import { AdapterHandle, type Adapter, type AdapterInbox, type Bus } from "@deckhost/runtime";
import { COUNTER_ACTION_ID, CounterChanged, CounterReset } from "../topics.js";

async function watch(bus: Bus, inbox: AdapterInbox, signal: AbortSignal): Promise<void> {
    let changes = 0;

    for await (const envelope of inbox) {
        if (signal.aborted) {
            break;
        }

        const changed = envelope.read(CounterChanged);
        if (changed !== undefined) {
            changes += 1;
            bus.log("debug", `Counter ${changed.context} is at ${changed.count} (${changes} changes this session)`);
        }
    }

    bus.log("info", `Application watcher stopped after ${changes} counter changes`);
}

export function createAppWatcherAdapter(): Adapter {
    return {
        name  : "app-watcher",
        policy: "onAppLaunch",
        topics: [CounterChanged.name],
        labels: ["apps"],

        start(_cx, bus, inbox) {
            bus.notifyActionsById(COUNTER_ACTION_ID, CounterReset, { reason: "application launched" });

            const controller = new AbortController();
            return AdapterHandle.fromAbortController(controller, watch(bus, inbox, controller.signal));
        },
    };
}
