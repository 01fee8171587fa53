/**
 * @fileoverview Adapter Contract
 *
 * Adapters are background workers (pollers, watchers, API clients) that
 * live beside the actions. They receive typed notifications through an
 * inbox and talk back to the runtime through the bus.
 *
 * @module @deckhost/runtime/contracts/Adapter
 */

import type { Context } from "../context/Context.js";
import type { Bus } from "./Bus.js";
import { isStartPolicy, type StartPolicy } from "./Targets.js";
import type { TopicEnvelope } from "./Topic.js";

/**
 * Receiving side of an adapter's notification queue.
 * Iteration ends once the adapter is stopped and the queue is drained.
 */
export interface AdapterInbox extends AsyncIterable<TopicEnvelope> {
    receive(timeoutMs?: number): Promise<TopicEnvelope | undefined>;
    tryReceive(): TopicEnvelope | undefined;
    readonly closed: boolean;
}

/**
 * Failure raised by an adapter's `start`.
 */
export class AdapterError extends Error {
    constructor(
        public readonly kind: "init" | "runtime",
        message: string,
        options?: { cause?: unknown },
    ) {
        super(`${kind === "init" ? "initialization" : "runtime"} failed: ${message}`, options);
        this.name = "AdapterError";
    }

    static init(message: string, cause?: unknown): AdapterError {
        return new AdapterError("init", message, { cause });
    }

    static runtime(message: string, cause?: unknown): AdapterError {
        return new AdapterError("runtime", message, { cause });
    }
}

/**
 * Handle returned by `Adapter.start`, used by the runtime to stop the
 * adapter and wait for its background work to finish.
 */
export class AdapterHandle {
    private stopped = false;

    private constructor(
        private readonly onShutdown: () => void,
        /** Settles when the adapter's background work has finished */
        public readonly done?: Promise<void>,
    ) {}

    /**
     * Handle with no background task to wait for.
     */
    static fromShutdown(shutdown: () => void): AdapterHandle {
        return new AdapterHandle(shutdown);
    }

    /**
     * Handle for a running task and the function that asks it to stop.
     */
    static fromTask(task: Promise<void>, shutdown: () => void): AdapterHandle {
        return new AdapterHandle(shutdown, task);
    }

    /**
     * Handle that stops the adapter by aborting the controller's signal.
     */
    static fromAbortController(controller: AbortController, task?: Promise<void>): AdapterHandle {
        return new AdapterHandle(() => controller.abort(), task);
    }

    /**
     * Signal the adapter to stop. Runs the shutdown function at most once.
     */
    shutdown(): void {
        if (this.stopped) {
            return;
        }
        this.stopped = true;
        this.onShutdown();
    }

    get isShutdown(): boolean {
        return this.stopped;
    }
}

/**
 * Adapter descriptor, registered once per plugin.
 *
 * @example
 * ```typescript
 * const clock: Adapter = {
 *     name: "clock",
 *     start(cx, bus) {
 *         const timer = setInterval(() => bus.publish(ClockTick, { now: Date.now() }), 1000);
 *         return AdapterHandle.fromShutdown(() => clearInterval(timer));
 *     },
 * };
 * ```
 */
export interface Adapter {
    /** Unique name within the plugin */
    readonly name: string;

    /** Defaults to "eager" */
    readonly policy?: StartPolicy;

    /** Topic names whose published values are forwarded to the inbox */
    readonly topics?: readonly string[];

    /** Free-form labels for group addressing */
    readonly labels?: readonly string[];

    /**
     * Start background work. Must not block; throw to report failure
     * (typically an {@link AdapterError}).
     */
    start(cx: Context, bus: Bus, inbox: AdapterInbox): AdapterHandle;
}

/**
 * Type guard to check if an object is an Adapter. A `policy`, when
 * present, must be one of {@link START_POLICIES}.
 */
export function isAdapter(obj: unknown): obj is Adapter {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "name" in obj &&
        typeof obj.name === "string" &&
        "start" in obj &&
        typeof obj.start === "function" &&
        (!("policy" in obj) || obj.policy === undefined || isStartPolicy(obj.policy))
    );
}

/**
 * Effective start policy of an adapter.
 */
export function adapterPolicy(adapter: Adapter): StartPolicy {
    return adapter.policy ?? "eager";
}
