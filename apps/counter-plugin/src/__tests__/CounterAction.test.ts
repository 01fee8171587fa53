/**
 * @fileoverview Unit tests for the counter and clock actions
 *
 * Tests cover:
 * - Reading the stored count
 * - Key, dial and touch handling
 * - Reset notifications
 * - Clock rendering
 *
 * @module counter-plugin/__tests__/CounterAction
 */

import { describe, it, expect, vi } from "vitest";
import {
    AsyncQueue,
    Context,
    Emitter,
    TopicEnvelope,
    type RuntimeLogger,
    type RuntimeMessage,
} from "@deckhost/runtime";
import { ClockAction, formatClock } from "../actions/ClockAction.js";
import { CounterAction, readCount } from "../actions/CounterAction.js";
import { ClockTick, CounterChanged, CounterReset } from "../topics.js";

function createMockLogger(): RuntimeLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

function createContext() {
    const queue = new AsyncQueue<RuntimeMessage>();
    const logger = createMockLogger();
    const cx = new Context({ bus: new Emitter(queue, logger), pluginUuid: "counter-plugin", logger });

    const take = (): RuntimeMessage[] => {
        const items: RuntimeMessage[] = [];
        for (let item = queue.tryReceive(); item !== undefined; item = queue.tryReceive()) {
            items.push(item);
        }
        return items;
    };

    return { cx, take };
}

function requests(messages: RuntimeMessage[]): unknown[] {
    return messages.flatMap((message) => (message.type === "outgoing" ? [message.request] : []));
}

const tile = {
    action         : "dev.deckhost.counter",
    context        : "A1",
    device         : "dev-1",
    controller     : "Keypad",
    isInMultiAction: false,
};

const encoder = {
    action     : "dev.deckhost.counter",
    context    : "E1",
    device     : "dev-1",
    settings   : {},
    controller : "Encoder",
    coordinates: { column: 0, row: 0 },
};

describe("readCount", () => {
    // Scenario: only non-negative integers are accepted
    it("should fall back to zero for anything but a non-negative integer", () => {
        expect(readCount({ count: 4 })).toBe(4);
        expect(readCount({})).toBe(0);
        expect(readCount({ count: "4" })).toBe(0);
        expect(readCount({ count: -1 })).toBe(0);
        expect(readCount({ count: 1.5 })).toBe(0);
    });
});

describe("CounterAction", () => {
    // Scenario: tile appears with a stored count
    it("should show the stored count on appear", () => {
        const { cx, take } = createContext();
        const action = new CounterAction();

        action.willAppear(cx, { ...tile, event: "willAppear", settings: { count: 3 } });

        expect(action.value).toBe(3);
        expect(requests(take())).toEqual([{ event: "setTitle", context: "A1", title: "3" }]);
    });

    // Scenario: key press increments, persists and publishes
    it("should increment on key press", () => {
        const { cx, take } = createContext();
        const action = new CounterAction();
        action.willAppear(cx, { ...tile, event: "willAppear", settings: { count: 3 } });
        take();

        action.keyDown(cx, { ...tile, event: "keyDown", settings: {} });

        const messages = take();
        expect(requests(messages)).toEqual([
            { event: "setTitle", context: "A1", title: "4" },
            { event: "setSettings", context: "A1", settings: { count: 4 } },
            { event: "setGlobalSettings", context: "counter-plugin", settings: { totalPresses: 1 } },
        ]);

        const published = messages.find((message) => message.type === "publish");
        expect(published?.type === "publish" ? published.envelope.read(CounterChanged) : undefined).toEqual({
            context: "A1",
            count  : 4,
        });
    });

    // Scenario: the plugin-wide total accumulates across presses
    it("should count total presses in the global settings", () => {
        const { cx } = createContext();
        const action = new CounterAction();

        action.keyDown(cx, { ...tile, event: "keyDown", settings: {} });
        action.keyDown(cx, { ...tile, event: "keyDown", settings: {} });

        expect(cx.globals.get("totalPresses")).toBe(2);
    });

    // Scenario: dial rotation never goes below zero
    it("should add dial ticks and clamp at zero", () => {
        const { cx } = createContext();
        const action = new CounterAction();

        action.dialRotate(cx, { ...encoder, event: "dialRotate", pressed: false, ticks: 2 });
        expect(action.value).toBe(2);

        action.dialRotate(cx, { ...encoder, event: "dialRotate", pressed: false, ticks: -5 });
        expect(action.value).toBe(0);
    });

    // Scenario: dial press resets, touch increments
    it("should reset on dial press and increment on touch", () => {
        const { cx } = createContext();
        const action = new CounterAction();

        action.touchTap(cx, { ...encoder, event: "touchTap", hold: false, tapPos: [10, 10] });
        action.touchTap(cx, { ...encoder, event: "touchTap", hold: false, tapPos: [10, 10] });
        expect(action.value).toBe(2);

        action.dialDown(cx, { ...encoder, event: "dialDown" });
        expect(action.value).toBe(0);
    });

    // Scenario: reset notification
    it("should reset and flash OK on a reset notification", () => {
        const { cx, take } = createContext();
        const action = new CounterAction();
        action.keyDown(cx, { ...tile, event: "keyDown", settings: {} });
        take();

        action.onNotify(cx, "A1", TopicEnvelope.of(CounterReset, { reason: "test" }));

        expect(action.value).toBe(0);
        expect(requests(take())).toEqual([
            { event: "setTitle", context: "A1", title: "0" },
            { event: "setSettings", context: "A1", settings: { count: 0 } },
            { event: "showOk", context: "A1" },
        ]);
    });

    // Scenario: unrelated notifications are ignored
    it("should ignore other topics", () => {
        const { cx, take } = createContext();
        const action = new CounterAction();

        action.onNotify(cx, "A1", TopicEnvelope.of(ClockTick, { now: 0 }));

        expect(take()).toEqual([]);
    });
});

describe("ClockAction", () => {
    // Scenario: UTC time rendering
    it("should format timestamps as HH:MM:SS", () => {
        expect(formatClock(0)).toBe("00:00:00");
        expect(formatClock(Date.UTC(2024, 0, 1, 13, 5, 9))).toBe("13:05:09");
    });

    // Scenario: a clock tick updates the title
    it("should set the title on a clock tick", () => {
        const { cx, take } = createContext();

        new ClockAction().onNotify(cx, "C1", TopicEnvelope.of(ClockTick, { now: Date.UTC(2024, 0, 1, 8, 0, 0) }));

        expect(requests(take())).toEqual([{ event: "setTitle", context: "C1", title: "08:00:00" }]);
    });
});
