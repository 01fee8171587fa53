/**
 * @fileoverview App Hooks
 *
 * Ordered listener list fired by the event loop.
 *
 * @module @deckhost/runtime/impl/AppHooks
 */

import type { Context } from "../context/Context.js";
import type {
    HookEvent,
    HookEventOf,
    HookKind,
    HookListener,
    HookSubscription,
} from "../contracts/Hooks.js";
import { errorMessage } from "../contracts/Logger.js";

interface HookEntry {
    readonly kind: HookKind | "*";
    readonly run: (cx: Context, event: HookEvent) => void;
}

/**
 * Hook registry.
 *
 * Features:
 * - Listeners run in registration order, wildcard or not
 * - Wildcard subscription ("*" for every hook)
 * - One-time listeners via once()
 * - A throwing listener is logged and the rest still run
 *
 * @example
 * ```typescript
 * const hooks = new AppHooks()
 *     .on("applicationDidLaunch", (cx, event) => cx.logger.info(`launched ${event.application}`))
 *     .on("*", (cx, event) => metrics.count(event.kind));
 * ```
 */
export class AppHooks {
    private entries: HookEntry[] = [];

    /**
     * Listen to one hook kind, or to every hook with "*".
     * Returns `this` for chaining; use {@link subscribe} for a handle.
     */
    on<K extends HookKind>(kind: K | "*", listener: HookListener<HookEventOf<K>>): this {
        this.subscribe(kind, listener);
        return this;
    }

    /**
     * Listen to one hook kind, or to every hook with "*".
     *
     * @returns Subscription handle for removing the listener
     */
    subscribe<K extends HookKind>(kind: K | "*", listener: HookListener<HookEventOf<K>>): HookSubscription {
        const matches = (event: HookEvent): event is HookEventOf<K> => kind === "*" || event.kind === kind;

        const entry: HookEntry = {
            kind,
            run: (cx, event) => {
                if (matches(event)) {
                    listener(cx, event);
                }
            },
        };
        this.entries.push(entry);

        return {
            unsubscribe: () => {
                this.entries = this.entries.filter((existing) => existing !== entry);
            },
        };
    }

    /**
     * Listen to the next matching hook only.
     */
    once<K extends HookKind>(kind: K | "*", listener: HookListener<HookEventOf<K>>): HookSubscription {
        const subscription = this.subscribe<K>(kind, (cx, event) => {
            subscription.unsubscribe();
            listener(cx, event);
        });
        return subscription;
    }

    /**
     * Remove listeners registered for a kind ("*" or no argument removes all).
     */
    clear(kind?: HookKind | "*"): void {
        if (kind === undefined || kind === "*") {
            this.entries = [];
        }
        else {
            this.entries = this.entries.filter((entry) => entry.kind !== kind);
        }
    }

    /**
     * Run every matching listener in registration order.
     */
    fire(cx: Context, event: HookEvent): void {
        for (const entry of [...this.entries]) {
            try {
                entry.run(cx, event);
            }
            catch (error) {
                cx.logger.error(`Hook listener failed on ${event.kind}`, { error: errorMessage(error) });
            }
        }
    }

    /**
     * Number of listeners registered for a kind. Useful for testing.
     */
    listenerCount(kind?: HookKind | "*"): number {
        if (kind === undefined) {
            return this.entries.length;
        }
        return this.entries.filter((entry) => entry.kind === kind).length;
    }
}
