/**
 * @fileoverview Bus Contract
 *
 * Producer-side API of the runtime queue. Every method enqueues a
 * {@link RuntimeMessage} and returns immediately; delivery happens on the
 * event loop. Safe to call from action hooks, adapter tasks and timers.
 *
 * @module @deckhost/runtime/contracts/Bus
 */

import type { OutboundRequest } from "../protocol/outbound.js";
import type { LogLevel } from "./Logger.js";
import type { ActionTarget, AdapterControl, AdapterTarget, StartPolicy } from "./Targets.js";
import type { TopicId } from "./Topic.js";

/**
 * Bus interface.
 *
 * @example
 * ```typescript
 * bus.publish(VolumeChanged, 40);
 * bus.notifyActionsByContext(context, Highlight, { on: true });
 * bus.restartAdapters(AdapterTarget.label("audio"));
 * ```
 */
export interface Bus {
    /** Queue a request for the controller application */
    deck(request: OutboundRequest): void;

    /** Route a message through the runtime logger (and log hooks) */
    log(level: LogLevel, message: string): void;

    /** Broadcast to every action instance and adapter subscribed to the topic */
    publish<T>(topic: TopicId<T>, value: T): void;

    notifyActions<T>(target: ActionTarget, topic: TopicId<T>, value: T): void;
    notifyActionsAll<T>(topic: TopicId<T>, value: T): void;
    notifyActionsById<T>(actionId: string, topic: TopicId<T>, value: T): void;
    notifyActionsByContext<T>(context: string, topic: TopicId<T>, value: T): void;

    notifyAdapters<T>(target: AdapterTarget, topic: TopicId<T>, value: T): void;
    notifyAdaptersAll<T>(topic: TopicId<T>, value: T): void;
    notifyAdaptersByPolicy<T>(policy: StartPolicy, topic: TopicId<T>, value: T): void;
    notifyAdaptersByName<T>(name: string, topic: TopicId<T>, value: T): void;
    notifyAdaptersByLabel<T>(label: string, topic: TopicId<T>, value: T): void;

    /** Start, stop or restart adapters */
    adapters(control: AdapterControl): void;
    startAdapters(target: AdapterTarget): void;
    stopAdapters(target: AdapterTarget): void;
    restartAdapters(target: AdapterTarget): void;

    /** Ask the event loop to exit */
    exit(): void;
}
