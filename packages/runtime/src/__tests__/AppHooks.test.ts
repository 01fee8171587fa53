/**
 * @fileoverview Unit tests for AppHooks
 *
 * Tests cover:
 * - Registration order across kinds and wildcards
 * - Unsubscribe, once and clear
 * - Throwing listeners are logged and do not stop the rest
 *
 * @module @deckhost/runtime/__tests__/AppHooks
 */

import { describe, it, expect, vi } from "vitest";
import { AppHooks } from "../impl/AppHooks.js";
import { createMockLogger, createTestContext } from "./fixtures.js";

describe("AppHooks", () => {
    // Scenario: Listeners run in the order they were registered
    it("should run matching listeners in registration order", () => {
        const { cx } = createTestContext();
        const calls: string[] = [];
        const hooks = new AppHooks()
            .on("tick", () => calls.push("tick-1"))
            .on("*", (_cx, event) => calls.push(`any:${event.kind}`))
            .on("exit", () => calls.push("exit"))
            .on("tick", () => calls.push("tick-2"));

        hooks.fire(cx, { kind: "tick" });
        hooks.fire(cx, { kind: "exit" });

        expect(calls).toEqual(["tick-1", "any:tick", "tick-2", "any:exit", "exit"]);
    });

    // Scenario: Listeners receive the narrowed event
    it("should pass the event fields to the listener", () => {
        const { cx } = createTestContext();
        const seen: string[] = [];
        const hooks = new AppHooks().on("applicationDidLaunch", (_cx, event) => {
            seen.push(event.application);
        });

        hooks.fire(cx, { kind: "applicationDidLaunch", application: "com.example.music" });

        expect(seen).toEqual(["com.example.music"]);
    });

    // Scenario: Unsubscribed listener is not called again
    it("should stop calling a listener after unsubscribe", () => {
        const { cx } = createTestContext();
        const listener = vi.fn();
        const hooks = new AppHooks();
        const subscription = hooks.subscribe("tick", listener);

        hooks.fire(cx, { kind: "tick" });
        subscription.unsubscribe();
        hooks.fire(cx, { kind: "tick" });

        expect(listener).toHaveBeenCalledTimes(1);
        expect(hooks.listenerCount("tick")).toBe(0);
    });

    // Scenario: once() listener fires for the first matching event only
    it("should call a once listener a single time", () => {
        const { cx } = createTestContext();
        const listener = vi.fn();
        const hooks = new AppHooks();
        hooks.once("exit", listener);

        hooks.fire(cx, { kind: "tick" });
        hooks.fire(cx, { kind: "exit" });
        hooks.fire(cx, { kind: "exit" });

        expect(listener).toHaveBeenCalledTimes(1);
    });

    // Scenario: clear by kind keeps other listeners
    it("should clear listeners by kind or entirely", () => {
        const hooks = new AppHooks()
            .on("tick", () => undefined)
            .on("exit", () => undefined)
            .on("*", () => undefined);

        hooks.clear("tick");
        expect(hooks.listenerCount()).toBe(2);
        expect(hooks.listenerCount("*")).toBe(1);

        hooks.clear();
        expect(hooks.listenerCount()).toBe(0);
    });

    // Scenario: A throwing listener is logged; later listeners still run
    it("should log a throwing listener and continue", () => {
        const logger = createMockLogger();
        const { cx } = createTestContext(logger);
        const after = vi.fn();
        const hooks = new AppHooks()
            .on("init", () => {
                throw new Error("boom");
            })
            .on("init", after);

        hooks.fire(cx, { kind: "init" });

        expect(after).toHaveBeenCalledTimes(1);
        expect(logger.error).toHaveBeenCalledWith("Hook listener failed on init", { error: "boom" });
    });
});
