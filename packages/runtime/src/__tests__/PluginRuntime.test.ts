/**
 * @fileoverview Unit tests for PluginRuntime
 *
 * Runs the event loop against an in-process fake transport.
 *
 * Tests cover:
 * - Startup order (registration, init hook, global settings request)
 * - Tile lifecycle end to end (appear, key press, disappear)
 * - Listener notification ahead of built-in handling and dispatch
 * - Publish fan-out to actions and adapters
 * - Application presence starting and stopping adapters
 * - Adapter control and log messages through the bus
 * - Send buffer retry and bound
 * - Malformed frames, dropped connections and shutdown
 *
 * @module @deckhost/runtime/__tests__/PluginRuntime
 */

import { describe, it, expect, vi } from "vitest";
import { z } from "zod";
import { actionFactory, type Action } from "../contracts/Action.js";
import { AdapterHandle, type Adapter } from "../contracts/Adapter.js";
import { AdapterTarget, type StartPolicy } from "../contracts/Targets.js";
import { defineTopic, type TopicEnvelope } from "../contracts/Topic.js";
import type { Context } from "../context/Context.js";
import { PluginRuntime, type RuntimeOptions } from "../engine/PluginRuntime.js";
import { AppHooks } from "../impl/AppHooks.js";
import { Plugin } from "../plugins/Plugin.js";
import type { KeyDownEvent } from "../protocol/inbound.js";
import { FakeTransport, TEST_PLUGIN_UUID, createMockLogger } from "./fixtures.js";

const Flash = defineTopic("flash", z.object({ color: z.string() }));
const Level = defineTopic("level", z.number().int());

/**
 * Action that records its lifecycle into a shared log
 */
class RecordingTile implements Action {
    readonly topics = [Flash.name];

    constructor(private readonly log: string[]) {}

    init(_cx: Context, context: string): void {
        this.log.push(`init:${context}`);
    }

    keyDown(cx: Context, event: KeyDownEvent): void {
        this.log.push(`keyDown:${event.context}`);
        cx.deck.setTitle(event.context, "1");
    }

    onNotify(_cx: Context, context: string, envelope: TopicEnvelope): void {
        const flash = envelope.read(Flash);
        if (flash !== undefined) {
            this.log.push(`flash:${context}:${flash.color}`);
        }
    }

    teardown(_cx: Context, context: string): void {
        this.log.push(`teardown:${context}`);
    }
}

/**
 * Adapter that records every Level value reaching its inbox
 */
function levelAdapter(name: string, policy: StartPolicy, received: number[]): Adapter {
    return {
        name,
        policy,
        topics: [Level.name],
        start(_cx, _bus, inbox) {
            const task = (async () => {
                for await (const envelope of inbox) {
                    const level = envelope.read(Level);
                    if (level !== undefined) {
                        received.push(level);
                    }
                }
            })();
            return AdapterHandle.fromTask(task, () => undefined);
        },
    };
}

function tileFrame(event: string, context: string, action = "counter"): Record<string, unknown> {
    return {
        event,
        action,
        context,
        device : "dev-1",
        payload: { controller: "Keypad", settings: {} },
    };
}

function startRuntime(plugin: Plugin, options: Partial<RuntimeOptions> = {}) {
    const transport = new FakeTransport();
    const logger = createMockLogger();
    const runtime = new PluginRuntime(plugin, {
        pluginUuid    : TEST_PLUGIN_UUID,
        registerEvent : "registerPlugin",
        transport,
        logger,
        tickIntervalMs: 5,
        ...options,
    });
    const running = runtime.run();
    return { runtime, transport, logger, running };
}

function messages(spy: { mock: { calls: unknown[][] } }): unknown[] {
    return spy.mock.calls.map((call) => call[0]);
}

describe("PluginRuntime", () => {
    describe("startup and shutdown", () => {
        // Scenario: registration goes out first, then the settings request
        it("should register, fire init and request global settings", async () => {
            const init = vi.fn();
            const plugin = new Plugin().setHooks(new AppHooks().on("init", init));
            const { runtime, transport, logger, running } = startRuntime(plugin);

            expect(transport.sentFrames()[0]).toEqual({ event: "registerPlugin", uuid: TEST_PLUGIN_UUID });
            expect(init).toHaveBeenCalledTimes(1);
            expect(transport.attached).toBe(true);
            await vi.waitFor(() => {
                expect(transport.sentFrames()[1]).toEqual({ event: "getGlobalSettings", context: TEST_PLUGIN_UUID });
            });

            runtime.requestExit();
            await running;

            expect(transport.closed).toBe(true);
            expect(transport.detached).toBe(true);
            expect(runtime.isRunning).toBe(false);
            expect(logger.info).toHaveBeenCalledWith("Runtime shutdown complete");
        });

        // Scenario: eager adapters start with the runtime and stop with it
        it("should start eager adapters and shut them down on exit", async () => {
            const plugin = new Plugin()
                .addAdapter(levelAdapter("eager", "eager", []))
                .addAdapter(levelAdapter("later", "manual", []));
            const { runtime, running } = startRuntime(plugin);

            expect(runtime.adapters.runningNames()).toEqual(["eager"]);

            runtime.requestExit();
            await running;

            expect(runtime.adapters.isTerminated).toBe(true);
            expect(runtime.adapters.runningNames()).toEqual([]);
        });

        // Scenario: the registration frame cannot be sent
        it("should fail and clean up when registration cannot be sent", async () => {
            const transport = new FakeTransport();
            transport.accepting = false;
            const runtime = new PluginRuntime(new Plugin(), {
                pluginUuid   : TEST_PLUGIN_UUID,
                registerEvent: "registerPlugin",
                transport,
                logger       : createMockLogger(),
            });

            await expect(runtime.run()).rejects.toThrow(`Failed to send registration for ${TEST_PLUGIN_UUID}`);
            expect(transport.closed).toBe(true);
        });

        // Scenario: run is single-use
        it("should refuse to run twice", async () => {
            const { runtime, running } = startRuntime(new Plugin());
            runtime.requestExit();
            await running;

            await expect(runtime.run()).rejects.toThrow("PluginRuntime.run() can only be called once");
        });

        // Scenario: the controller drops the connection
        it("should exit when the transport closes", async () => {
            const exit = vi.fn();
            const plugin = new Plugin().setHooks(new AppHooks().on("exit", exit));
            const { transport, running } = startRuntime(plugin);

            transport.drop();
            await running;

            expect(exit).toHaveBeenCalledTimes(1);
            expect(transport.closed).toBe(true);
        });

        // Scenario: idle turns fire the tick hook
        it("should fire tick hooks while idle", async () => {
            const tick = vi.fn();
            const plugin = new Plugin().setHooks(new AppHooks().on("tick", tick));
            const { runtime, running } = startRuntime(plugin);

            await vi.waitFor(() => {
                expect(tick).toHaveBeenCalled();
            });

            runtime.requestExit();
            await running;
        });
    });

    describe("tile lifecycle", () => {
        // Scenario: appear, key press, disappear on tile A1
        it("should run the counter scenario end to end", async () => {
            const log: string[] = [];
            const plugin = new Plugin().addAction(actionFactory("counter", () => new RecordingTile(log)));
            const { runtime, transport, running } = startRuntime(plugin);

            transport.deliver(tileFrame("willAppear", "A1"));
            await vi.waitFor(() => {
                expect(runtime.actions.has("counter", "A1")).toBe(true);
            });
            expect(log).toEqual(["init:A1"]);

            transport.deliver({ event: "keyDown", action: "counter", context: "A1", device: "dev-1" });
            await vi.waitFor(() => {
                expect(log).toContain("keyDown:A1");
            });
            await vi.waitFor(() => {
                expect(transport.sentFrames()).toContainEqual({
                    event  : "setTitle",
                    context: "A1",
                    payload: { title: "1" },
                });
            });

            runtime.bus.publish(Flash, { color: "red" });
            await vi.waitFor(() => {
                expect(log).toContain("flash:A1:red");
            });

            transport.deliver(tileFrame("willDisappear", "A1"));
            await vi.waitFor(() => {
                expect(runtime.actions.has("counter", "A1")).toBe(false);
            });

            runtime.bus.publish(Flash, { color: "blue" });
            runtime.requestExit();
            await running;

            expect(log).toEqual(["init:A1", "keyDown:A1", "flash:A1:red", "teardown:A1"]);
            expect(runtime.actions.subscriberCount(Flash.name)).toBe(0);
        });

        // Scenario: tiles of an unregistered action are ignored
        it("should ignore events for unregistered actions", async () => {
            const { runtime, transport, running } = startRuntime(new Plugin());

            transport.deliver(tileFrame("willAppear", "A1", "unknown"));
            runtime.requestExit();
            await running;

            expect(runtime.actions.size).toBe(0);
        });

        // Scenario: a global settings snapshot hydrates the cache
        it("should hydrate global settings from the controller", async () => {
            const seen = vi.fn();
            const plugin = new Plugin().setHooks(new AppHooks().on("didReceiveGlobalSettings", seen));
            const { runtime, transport, running } = startRuntime(plugin);

            transport.deliver({ event: "didReceiveGlobalSettings", payload: { settings: { theme: "dark" } } });
            await vi.waitFor(() => {
                expect(runtime.context.globals.get("theme")).toBe("dark");
            });

            runtime.requestExit();
            await running;

            expect(seen).toHaveBeenCalledTimes(1);
        });

        // Scenario: a frame that is not valid JSON
        it("should log malformed frames and keep running", async () => {
            const log: string[] = [];
            const plugin = new Plugin().addAction(actionFactory("counter", () => new RecordingTile(log)));
            const { runtime, transport, logger, running } = startRuntime(plugin);

            transport.deliver("{bad");
            transport.deliver(tileFrame("willAppear", "A1"));
            await vi.waitFor(() => {
                expect(runtime.actions.has("counter", "A1")).toBe(true);
            });

            runtime.requestExit();
            await running;

            const warning = messages(logger.warn).find(
                (message) => typeof message === "string" && message.startsWith("Unrecognized event: json parse error"),
            );
            expect(warning).toMatch(/ \| raw = \{bad$/);
        });
    });

    describe("message ordering", () => {
        // Scenario: listeners hear a tile event before the action handles it
        it("should notify listeners before dispatching to the action", async () => {
            const log: string[] = [];
            const tile: Action = {
                init() {
                    log.push("action:init");
                },
                keyDown() {
                    log.push("action:keyDown");
                },
            };
            const plugin = new Plugin()
                .addAction(actionFactory("counter", () => tile))
                .setHooks(new AppHooks().on("incoming", (_cx, hook) => {
                    log.push(`incoming:${hook.event.event}`);
                }));
            const { runtime, transport, running } = startRuntime(plugin);

            transport.deliver(tileFrame("willAppear", "A1"));
            transport.deliver(tileFrame("keyDown", "A1"));
            await vi.waitFor(() => {
                expect(log).toHaveLength(4);
            });

            runtime.requestExit();
            await running;

            expect(log).toEqual(["incoming:willAppear", "action:init", "incoming:keyDown", "action:keyDown"]);
        });

        // Scenario: launch listeners run before presence starts adapters
        it("should fire the launch hooks before starting onAppLaunch adapters", async () => {
            const log: string[] = [];
            const watcher: Adapter = {
                name  : "watcher",
                policy: "onAppLaunch",
                start() {
                    log.push("adapter:start");
                    return AdapterHandle.fromShutdown(() => undefined);
                },
            };
            const hooks = new AppHooks()
                .on("incoming", (_cx, hook) => {
                    log.push(`incoming:${hook.event.event}`);
                })
                .on("applicationDidLaunch", (_cx, hook) => {
                    log.push(`hook:${hook.application}`);
                });
            const { runtime, transport, running } = startRuntime(new Plugin().addAdapter(watcher).setHooks(hooks));

            transport.deliver({ event: "applicationDidLaunch", payload: { application: "com.example.music" } });
            await vi.waitFor(() => {
                expect(runtime.adapters.isRunning("watcher")).toBe(true);
            });

            runtime.requestExit();
            await running;

            expect(log).toEqual(["incoming:applicationDidLaunch", "hook:com.example.music", "adapter:start"]);
        });

        // Scenario: the settings hook runs before the cache is hydrated
        it("should fire the global settings hook before hydrating the cache", async () => {
            const cachedAtHook: unknown[] = [];
            const plugin = new Plugin().setHooks(new AppHooks().on("didReceiveGlobalSettings", (cx, hook) => {
                cachedAtHook.push(cx.globals.get("theme"), hook.settings.theme);
            }));
            const { runtime, transport, running } = startRuntime(plugin);

            transport.deliver({ event: "didReceiveGlobalSettings", payload: { settings: { theme: "dark" } } });
            await vi.waitFor(() => {
                expect(runtime.context.globals.get("theme")).toBe("dark");
            });

            runtime.requestExit();
            await running;

            expect(cachedAtHook).toEqual([undefined, "dark"]);
        });
    });

    describe("adapters", () => {
        // Scenario: a publish reaches subscribed adapters
        it("should fan published values out to adapter inboxes", async () => {
            const received: number[] = [];
            const plugin = new Plugin().addAdapter(levelAdapter("mixer", "eager", received));
            const { runtime, running } = startRuntime(plugin);

            runtime.bus.publish(Level, 7);
            runtime.bus.notifyAdaptersByName("mixer", Level, 8);
            await vi.waitFor(() => {
                expect(received).toEqual([7, 8]);
            });

            runtime.requestExit();
            await running;
        });

        // Scenario: onAppLaunch adapters follow application presence
        it("should start on application launch and stop after the debounce", async () => {
            const launched = vi.fn();
            const plugin = new Plugin()
                .addAdapter(levelAdapter("watcher", "onAppLaunch", []))
                .setHooks(new AppHooks().on("applicationDidLaunch", (_cx, event) => launched(event.application)));
            const { runtime, transport, running } = startRuntime(plugin, { appStopDebounceMs: 20 });

            expect(runtime.adapters.isRunning("watcher")).toBe(false);

            transport.deliver({ event: "applicationDidLaunch", payload: { application: "com.example.music" } });
            await vi.waitFor(() => {
                expect(runtime.adapters.isRunning("watcher")).toBe(true);
            });
            expect(launched).toHaveBeenCalledWith("com.example.music");

            transport.deliver({ event: "applicationDidTerminate", payload: { application: "com.example.music" } });
            await vi.waitFor(() => {
                expect(runtime.adapters.isRunning("watcher")).toBe(false);
            });

            runtime.requestExit();
            await running;
        });

        // Scenario: adapter control through the bus
        it("should stop and start adapters on control commands", async () => {
            const plugin = new Plugin().addAdapter(levelAdapter("poller", "manual", []));
            const { runtime, running } = startRuntime(plugin);

            runtime.bus.startAdapters(AdapterTarget.name("poller"));
            await vi.waitFor(() => {
                expect(runtime.adapters.isRunning("poller")).toBe(true);
            });

            runtime.bus.stopAdapters(AdapterTarget.policy("manual"));
            await vi.waitFor(() => {
                expect(runtime.adapters.isRunning("poller")).toBe(false);
            });

            runtime.requestExit();
            await running;
        });

        // Scenario: log records from adapters go to the runtime logger
        it("should route bus log records to the logger at their level", async () => {
            const { runtime, logger, running } = startRuntime(new Plugin());

            runtime.bus.log("warn", "from adapter");
            runtime.requestExit();
            await running;

            expect(messages(logger.warn)).toContain("from adapter");
        });
    });

    describe("send buffer", () => {
        // Scenario: the transport refuses a frame, then recovers
        it("should keep an unsent request and retry it on a later turn", async () => {
            const { runtime, transport, logger, running } = startRuntime(new Plugin());
            await vi.waitFor(() => {
                expect(transport.sentEvents()).toEqual(["registerPlugin", "getGlobalSettings"]);
            });

            transport.accepting = false;
            runtime.context.deck.showOk("A1");
            await vi.waitFor(() => {
                expect(messages(logger.warn)).toContain("Could not send showOk; will retry");
            });
            expect(runtime.pendingSends).toBe(1);

            transport.accepting = true;
            await vi.waitFor(() => {
                expect(transport.sentEvents()).toEqual(["registerPlugin", "getGlobalSettings", "showOk"]);
            });
            expect(runtime.pendingSends).toBe(0);

            runtime.requestExit();
            await running;
        });

        // Scenario: the buffer is bounded; the oldest request is dropped
        it("should drop the oldest request beyond maxPendingSends", async () => {
            const { runtime, transport, logger, running } = startRuntime(new Plugin(), { maxPendingSends: 2 });
            await vi.waitFor(() => {
                expect(transport.sentEvents()).toEqual(["registerPlugin", "getGlobalSettings"]);
            });

            transport.accepting = false;
            runtime.context.deck.showOk("A1");
            runtime.context.deck.showAlert("A1");
            runtime.context.deck.setState("A1", 1);
            await vi.waitFor(() => {
                expect(messages(logger.warn)).toContain("Send buffer full (2); dropped oldest showOk");
            });

            transport.accepting = true;
            await vi.waitFor(() => {
                expect(transport.sentEvents()).toEqual(["registerPlugin", "getGlobalSettings", "showAlert", "setState"]);
            });

            runtime.requestExit();
            await running;
        });
    });
});
