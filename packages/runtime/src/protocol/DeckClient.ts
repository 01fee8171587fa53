/**
 * @fileoverview Deck Client
 *
 * Typed facade over the outbound vocabulary. Every call enqueues a request
 * through the bus; the event loop serializes and sends it.
 *
 * @module @deckhost/runtime/protocol/DeckClient
 */

import type { Bus } from "../contracts/Bus.js";
import type { DeckState, JsonObject } from "./inbound.js";
import type { RenderTarget, TriggerDescription } from "./outbound.js";

/**
 * Options for title and image updates.
 */
export interface RenderOptions {
    readonly state?: DeckState;
    readonly target?: RenderTarget;
}

/**
 * Client for the controller application.
 *
 * @example
 * ```typescript
 * cx.deck.setTitle(event.context, String(count));
 * cx.deck.showOk(event.context);
 * ```
 */
export class DeckClient {
    constructor(
        private readonly bus: Pick<Bus, "deck">,
        /** Plugin UUID; the context for plugin-wide requests */
        public readonly pluginUuid: string,
    ) {}

    /** Ask for the plugin's global settings (answered by didReceiveGlobalSettings) */
    getGlobalSettings(): void {
        this.bus.deck({ event: "getGlobalSettings", context: this.pluginUuid });
    }

    /** Replace the plugin's global settings */
    setGlobalSettings(settings: JsonObject): void {
        this.bus.deck({ event: "setGlobalSettings", context: this.pluginUuid, settings });
    }

    /** Ask for a tile's settings (answered by didReceiveSettings) */
    getSettings(context: string): void {
        this.bus.deck({ event: "getSettings", context });
    }

    setSettings(context: string, settings: JsonObject): void {
        this.bus.deck({ event: "setSettings", context, settings });
    }

    /**
     * Set a tile's title. An undefined title restores the user's own.
     */
    setTitle(context: string, title?: string, options: RenderOptions = {}): void {
        this.bus.deck({ event: "setTitle", context, title, state: options.state, target: options.target });
    }

    /**
     * Set a tile's image (file path or data URI). An undefined image restores the default.
     */
    setImage(context: string, image?: string, options: RenderOptions = {}): void {
        this.bus.deck({ event: "setImage", context, image, state: options.state, target: options.target });
    }

    setState(context: string, state: DeckState): void {
        this.bus.deck({ event: "setState", context, state });
    }

    setFeedback(context: string, payload: JsonObject): void {
        this.bus.deck({ event: "setFeedback", context, payload });
    }

    setFeedbackLayout(context: string, layout: string): void {
        this.bus.deck({ event: "setFeedbackLayout", context, layout });
    }

    setTriggerDescription(context: string, description: TriggerDescription): void {
        this.bus.deck({ event: "setTriggerDescription", context, description });
    }

    showAlert(context: string): void {
        this.bus.deck({ event: "showAlert", context });
    }

    showOk(context: string): void {
        this.bus.deck({ event: "showOk", context });
    }

    openUrl(url: string): void {
        this.bus.deck({ event: "openUrl", url });
    }

    sendToPropertyInspector(context: string, payload: unknown): void {
        this.bus.deck({ event: "sendToPropertyInspector", context, payload });
    }

    /** Write a line to the controller application's own log */
    logMessage(message: string): void {
        this.bus.deck({ event: "logMessage", message });
    }
}
