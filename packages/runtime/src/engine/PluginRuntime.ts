/**
 * @fileoverview PluginRuntime
 *
 * The event loop. Owns the runtime queue, both lifecycle managers, the
 * send buffer and the transport reader.
 *
 * Loop flow:
 * 1. Register with the controller application
 * 2. Fire the init hook, request global settings, start eager adapters
 * 3. Attach the transport reader
 * 4. Take one message per turn from the queue; when none arrives within
 *    the tick interval, drain the send buffer and run periodic work
 * 5. On exit: shut adapters down, then close the transport
 *
 * @module @deckhost/runtime/engine/PluginRuntime
 */

import { Context } from "../context/Context.js";
import type { HookEvent } from "../contracts/Hooks.js";
import { createConsoleLogger, errorMessage, logAt, type RuntimeLogger } from "../contracts/Logger.js";
import type { RuntimeMessage } from "../contracts/RuntimeMessage.js";
import { describeTarget } from "../contracts/Targets.js";
import type { WireTransport } from "../contracts/Transport.js";
import { AsyncQueue } from "../impl/AsyncQueue.js";
import { Emitter } from "../impl/Emitter.js";
import type { AppHooks } from "../impl/AppHooks.js";
import type { Plugin } from "../plugins/Plugin.js";
import { describeInbound, parseInbound, type InboundEvent } from "../protocol/inbound.js";
import { serializeOutbound, type OutboundRequest } from "../protocol/outbound.js";
import { ActionManager } from "./ActionManager.js";
import { AdapterManager } from "./AdapterManager.js";

/** Longest slice of a raw frame written to the log */
const MAX_LOGGED_FRAME = 4096;

/**
 * Runtime configuration options.
 */
export interface RuntimeOptions {
    /** Plugin UUID passed on launch */
    readonly pluginUuid: string;

    /** Registration event name passed on launch */
    readonly registerEvent: string;

    /** Open connection to the controller application */
    readonly transport: WireTransport;

    /** Logger for runtime operations */
    readonly logger?: RuntimeLogger;

    /** Idle wait before a tick, in milliseconds (default: 100) */
    readonly tickIntervalMs?: number;

    /** Sends attempted per drain (default: 8) */
    readonly drainPerTurn?: number;

    /** Send buffer bound; the oldest request is dropped beyond it (default: 1000) */
    readonly maxPendingSends?: number;

    /** Log every frame sent and received (default: false) */
    readonly logWire?: boolean;

    /** Delay before stopping onAppLaunch adapters (default: 250) */
    readonly appStopDebounceMs?: number;

    /** Bound on waiting for adapter tasks at shutdown (default: 1000) */
    readonly adapterJoinTimeoutMs?: number;

    /** Per-adapter inbox capacity (default: unbounded) */
    readonly inboxCapacity?: number;
}

type ResolvedOptions = Required<Omit<RuntimeOptions, "transport" | "logger" | "inboxCapacity">> & {
    readonly inboxCapacity?: number;
};

/**
 * PluginRuntime - runs one plugin against one connection.
 *
 * @example
 * ```typescript
 * const runtime = new PluginRuntime(plugin, {
 *     pluginUuid   : args.pluginUuid,
 *     registerEvent: args.registerEvent,
 *     transport    : await WebSocketTransport.connect(wsUrl(args.port)),
 * });
 *
 * process.once("SIGINT", () => runtime.requestExit());
 * await runtime.run();
 * ```
 */
export class PluginRuntime {
    private readonly config: ResolvedOptions;
    private readonly logger: RuntimeLogger;
    private readonly transport: WireTransport;
    private readonly hooks: AppHooks;

    private readonly queue = new AsyncQueue<RuntimeMessage>();
    private readonly sendBuffer: OutboundRequest[] = [];
    private state: "idle" | "running" | "stopped" = "idle";

    /** Producer side of the runtime queue */
    readonly bus: Emitter;

    /** Context handed to actions, adapters and hooks */
    readonly context: Context;

    readonly actions: ActionManager;
    readonly adapters: AdapterManager;

    constructor(plugin: Plugin, options: RuntimeOptions) {
        this.config = {
            pluginUuid          : options.pluginUuid,
            registerEvent       : options.registerEvent,
            tickIntervalMs      : options.tickIntervalMs ?? 100,
            drainPerTurn        : options.drainPerTurn ?? 8,
            maxPendingSends     : options.maxPendingSends ?? 1000,
            logWire             : options.logWire ?? false,
            appStopDebounceMs   : options.appStopDebounceMs ?? 250,
            adapterJoinTimeoutMs: options.adapterJoinTimeoutMs ?? 1000,
            inboxCapacity       : options.inboxCapacity,
        };
        this.logger = options.logger ?? createConsoleLogger();
        this.transport = options.transport;
        this.hooks = plugin.hooks;

        this.bus = new Emitter(this.queue, this.logger);
        this.context = new Context({
            bus       : this.bus,
            pluginUuid: options.pluginUuid,
            logger    : this.logger,
            extensions: plugin.extensions,
        });

        this.actions = new ActionManager(plugin.actions, this.logger);
        this.adapters = new AdapterManager(plugin.adapters, this.bus, this.logger, {
            appStopDebounceMs: this.config.appStopDebounceMs,
            joinTimeoutMs    : this.config.adapterJoinTimeoutMs,
            inboxCapacity    : this.config.inboxCapacity,
        });
    }

    /**
     * Run until exit is requested or the connection closes.
     *
     * @throws Error if called twice or if the registration cannot be sent
     */
    async run(): Promise<void> {
        if (this.state !== "idle") {
            throw new Error("PluginRuntime.run() can only be called once");
        }
        this.state = "running";

        try {
            this.register();

            this.hooks.fire(this.context, { kind: "init" });
            this.context.deck.getGlobalSettings();
            this.adapters.startByPolicy(this.context, "eager");
            this.attachReader();

            await this.loop();
        }
        finally {
            this.queue.close();
            this.transport.detach();
            await this.adapters.shutdown();
            this.transport.close();
            this.state = "stopped";
            this.logger.info("Runtime shutdown complete");
        }
    }

    /**
     * Ask the loop to exit. Safe to call from signal handlers.
     */
    requestExit(): void {
        this.bus.exit();
    }

    /** Requests waiting to be sent */
    get pendingSends(): number {
        return this.sendBuffer.length;
    }

    get isRunning(): boolean {
        return this.state === "running";
    }

    // ========================================================================
    // Startup
    // ========================================================================

    private register(): void {
        const frame = JSON.stringify({ event: this.config.registerEvent, uuid: this.config.pluginUuid });
        if (!this.transport.send(frame)) {
            throw new Error(`Failed to send registration for ${this.config.pluginUuid}`);
        }
        this.logger.info("Registered with controller", { pluginUuid: this.config.pluginUuid });
    }

    private attachReader(): void {
        this.transport.onMessage((text) => {
            try {
                this.readFrame(text);
            }
            catch (error) {
                this.logger.error("Transport reader failed; no further events will be read", {
                    error: errorMessage(error),
                });
                this.transport.detach();
            }
        });

        this.transport.onClose((reason) => {
            this.logger.debug("Transport closed", { reason });
            this.bus.exit();
        });
    }

    private readFrame(text: string): void {
        const parsed = parseInbound(text);
        if (!parsed.ok) {
            this.logger.warn(`Unrecognized event: ${parsed.error} | raw = ${text.slice(0, MAX_LOGGED_FRAME)}`);
            return;
        }

        if (this.config.logWire) {
            this.logger.debug(`Received ${describeInbound(parsed.event)}`, {
                raw: text.slice(0, MAX_LOGGED_FRAME),
            });
        }
        this.queue.push({ type: "incoming", event: parsed.event });
    }

    // ========================================================================
    // Loop
    // ========================================================================

    private async loop(): Promise<void> {
        while (true) {
            const message = await this.queue.receive(this.config.tickIntervalMs);

            if (message === undefined) {
                if (this.queue.closed) {
                    this.logger.error("Runtime queue closed unexpectedly");
                    return;
                }
                this.drainSends();
                this.hooks.fire(this.context, { kind: "tick" });
                this.adapters.tick();
                continue;
            }

            if (!this.handle(message)) {
                return;
            }
        }
    }

    /**
     * Handle one message.
     *
     * @returns false when the loop should exit
     */
    private handle(message: RuntimeMessage): boolean {
        const cx = this.context;

        switch (message.type) {
            case "incoming":
                this.handleIncoming(message.event);
                return true;

            case "outgoing": {
                this.hooks.fire(cx, { kind: "outgoing", request: message.request });
                const wasEmpty = this.sendBuffer.length === 0;
                this.enqueueSend(message.request);
                if (wasEmpty) {
                    this.drainSends();
                }
                return true;
            }

            case "log":
                this.hooks.fire(cx, { kind: "log", level: message.level, message: message.message });
                logAt(this.logger, message.level, message.message);
                return true;

            case "publish":
                this.hooks.fire(cx, { kind: "publish", envelope: message.envelope });
                this.actions.notifyTopic(cx, message.envelope.name, message.envelope);
                this.adapters.notifyTopic(message.envelope.name, message.envelope);
                return true;

            case "actionNotify":
                this.hooks.fire(cx, { kind: "actionNotify", target: message.target, envelope: message.envelope });
                this.actions.notifyTarget(cx, message.target, message.envelope);
                return true;

            case "adapterNotify":
                this.hooks.fire(cx, { kind: "adapterNotify", target: message.target, envelope: message.envelope });
                this.adapters.notifyTarget(message.target, message.envelope);
                return true;

            case "adapterControl": {
                const { op, target } = message.control;
                this.hooks.fire(cx, { kind: "adapterControl", control: message.control });
                this.logger.debug(`Adapter control: ${op} ${describeTarget(target)}`);
                switch (op) {
                    case "start":
                        this.adapters.startTarget(cx, target);
                        break;
                    case "stop":
                        this.adapters.stopTarget(target);
                        break;
                    case "restart":
                        this.adapters.restartTarget(cx, target);
                        break;
                }
                return true;
            }

            case "exit":
                this.hooks.fire(cx, { kind: "exit" });
                this.logger.info("Runtime exit requested");
                return false;
        }
    }

    /**
     * Listeners first (`incoming`, then the event's own hook), then the
     * built-in bookkeeping, then action dispatch.
     */
    private handleIncoming(event: InboundEvent): void {
        const cx = this.context;
        this.hooks.fire(cx, { kind: "incoming", event });

        const hook = lifecycleHook(event);
        if (hook !== undefined) {
            this.hooks.fire(cx, hook);
        }

        switch (event.event) {
            case "applicationDidLaunch":
                this.adapters.onAppLaunch(cx);
                break;
            case "applicationDidTerminate":
                this.adapters.onAppTerminate();
                break;
            case "didReceiveGlobalSettings":
                cx.globals.hydrate(event.settings);
                break;
            default:
                break;
        }

        this.actions.dispatch(cx, event);
    }

    // ========================================================================
    // Send buffer
    // ========================================================================

    private enqueueSend(request: OutboundRequest): void {
        this.sendBuffer.push(request);
        if (this.sendBuffer.length > this.config.maxPendingSends) {
            const dropped = this.sendBuffer.shift();
            this.logger.warn(`Send buffer full (${this.config.maxPendingSends}); dropped oldest ${dropped?.event}`);
        }
    }

    /**
     * Send up to `drainPerTurn` buffered requests. A request that cannot
     * be sent stays at the front for the next drain.
     */
    private drainSends(): void {
        for (let attempt = 0; attempt < this.config.drainPerTurn; attempt++) {
            const request = this.sendBuffer[0];
            if (request === undefined) {
                return;
            }

            let text: string;
            try {
                text = serializeOutbound(request);
            }
            catch (error) {
                this.sendBuffer.shift();
                this.logger.error(`Failed to serialize ${request.event}; dropped`, { error: errorMessage(error) });
                continue;
            }

            let sent: boolean;
            try {
                sent = this.transport.send(text);
            }
            catch (error) {
                this.logger.error(`Transport send threw for ${request.event}`, { error: errorMessage(error) });
                sent = false;
            }

            if (!sent) {
                this.logger.warn(`Could not send ${request.event}; will retry`, { pending: this.sendBuffer.length });
                return;
            }

            this.sendBuffer.shift();
            if (this.config.logWire) {
                this.logger.debug(`Sent ${request.event}`, { raw: text.slice(0, MAX_LOGGED_FRAME) });
            }
        }
    }
}

/**
 * Event-specific hook for the plugin-level events that carry one.
 */
function lifecycleHook(event: InboundEvent): HookEvent | undefined {
    switch (event.event) {
        case "applicationDidLaunch":
            return { kind: "applicationDidLaunch", application: event.application };
        case "applicationDidTerminate":
            return { kind: "applicationDidTerminate", application: event.application };
        case "deviceDidConnect":
            return { kind: "deviceDidConnect", device: event.device, deviceInfo: event.deviceInfo };
        case "deviceDidDisconnect":
            return { kind: "deviceDidDisconnect", device: event.device };
        case "deviceDidChange":
            return { kind: "deviceDidChange", device: event.device, deviceInfo: event.deviceInfo };
        case "didReceiveDeepLink":
            return { kind: "didReceiveDeepLink", url: event.url };
        case "didReceiveGlobalSettings":
            return { kind: "didReceiveGlobalSettings", settings: event.settings };
        default:
            return undefined;
    }
}
