/**
 * @fileoverview Unit tests for the Plugin builder
 *
 * Tests cover:
 * - Action registration (last registration wins)
 * - Adapter registration and duplicate names
 * - Extensions and hooks
 *
 * @module @deckhost/runtime/__tests__/Plugin
 */

import { describe, it, expect } from "vitest";
import { actionFactory } from "../contracts/Action.js";
import { AdapterHandle, type Adapter } from "../contracts/Adapter.js";
import { AppHooks } from "../impl/AppHooks.js";
import { Plugin } from "../plugins/Plugin.js";

function adapter(name: string): Adapter {
    return { name, start: () => AdapterHandle.fromShutdown(() => undefined) };
}

describe("Plugin", () => {
    // Scenario: actions keep registration order
    it("should register actions in order", () => {
        const counter = actionFactory("counter", () => ({}));
        const clock = actionFactory("clock", () => ({}));

        const plugin = new Plugin().addActions([counter, clock]);

        expect(plugin.actions).toEqual([counter, clock]);
    });

    // Scenario: duplicate action ids
    it("should throw on a duplicate action id and keep the first factory", () => {
        const first = actionFactory("counter", () => ({}));
        const plugin = new Plugin().addAction(first);

        expect(() => plugin.addAction(actionFactory("counter", () => ({})))).toThrow(
            "Action already registered: counter",
        );
        expect(plugin.actions).toEqual([first]);
    });

    // Scenario: adapters keep registration order
    it("should register adapters in order", () => {
        const plugin = new Plugin().addAdapters([adapter("a"), adapter("b")]);

        expect(plugin.adapters.map((registered) => registered.name)).toEqual(["a", "b"]);
    });

    // Scenario: duplicate adapter names
    it("should reject a duplicate adapter name", () => {
        const plugin = new Plugin().addAdapter(adapter("clock"));

        expect(() => plugin.addAdapter(adapter("clock"))).toThrow("Adapter already registered: clock");
    });

    // Scenario: provide and setHooks
    it("should expose provided extensions and the hook registry", () => {
        class Store {
            items: string[] = [];
        }
        const store = new Store();
        const hooks = new AppHooks();

        const plugin = new Plugin().provide(store).setHooks(hooks);

        expect(plugin.extensions.require(Store)).toBe(store);
        expect(plugin.hooks).toBe(hooks);
    });
});
