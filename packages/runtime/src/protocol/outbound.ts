/**
 * @fileoverview Outbound Wire Requests
 *
 * Typed vocabulary of requests the plugin sends to the controller
 * application, and their wire serialization.
 *
 * @module @deckhost/runtime/protocol/outbound
 */

import type { DeckState, JsonObject } from "./inbound.js";

/**
 * Which surfaces a title or image update applies to.
 */
export type RenderTarget = "both" | "hardware" | "software";

/**
 * Descriptions shown for encoder gestures.
 */
export interface TriggerDescription {
    readonly longTouch?: string;
    readonly push?: string;
    readonly rotate?: string;
    readonly touch?: string;
}

export type OutboundRequest =
    | { readonly event: "getGlobalSettings"; readonly context: string }
    | { readonly event: "getSettings"; readonly context: string }
    | { readonly event: "setGlobalSettings"; readonly context: string; readonly settings: JsonObject }
    | { readonly event: "setSettings"; readonly context: string; readonly settings: JsonObject }
    | {
        readonly event: "setTitle";
        readonly context: string;
        /** Omitted title resets to the user-configured one */
        readonly title?: string;
        readonly state?: DeckState;
        readonly target?: RenderTarget;
    }
    | {
        readonly event: "setImage";
        readonly context: string;
        /** Path or data URI; omitted image resets to the default */
        readonly image?: string;
        readonly state?: DeckState;
        readonly target?: RenderTarget;
    }
    | { readonly event: "setState"; readonly context: string; readonly state: DeckState }
    | { readonly event: "setFeedback"; readonly context: string; readonly payload: JsonObject }
    | { readonly event: "setFeedbackLayout"; readonly context: string; readonly layout: string }
    | { readonly event: "setTriggerDescription"; readonly context: string; readonly description: TriggerDescription }
    | { readonly event: "showAlert"; readonly context: string }
    | { readonly event: "showOk"; readonly context: string }
    | { readonly event: "openUrl"; readonly url: string }
    | { readonly event: "sendToPropertyInspector"; readonly context: string; readonly payload: unknown }
    | { readonly event: "logMessage"; readonly message: string };


/**
 * Serialize a request to its JSON wire form.
 *
 * @throws TypeError if a payload cannot be represented as JSON (cycles, bigint)
 */
export function serializeOutbound(request: OutboundRequest): string {
    return JSON.stringify(toWire(request));
}

function toWire(request: OutboundRequest): Record<string, unknown> {
    switch (request.event) {
        case "getGlobalSettings":
        case "getSettings":
        case "showAlert":
        case "showOk":
            return { event: request.event, context: request.context };

        case "setGlobalSettings":
        case "setSettings":
            return { event: request.event, context: request.context, payload: request.settings };

        case "setTitle":
            return {
                event  : request.event,
                context: request.context,
                payload: { title: request.title, state: request.state, target: request.target },
            };

        case "setImage":
            return {
                event  : request.event,
                context: request.context,
                payload: { image: request.image, state: request.state, target: request.target },
            };

        case "setState":
            return { event: request.event, context: request.context, payload: { state: request.state } };

        case "setFeedback":
        case "sendToPropertyInspector":
            return { event: request.event, context: request.context, payload: request.payload };

        case "setFeedbackLayout":
            return { event: request.event, context: request.context, payload: { layout: request.layout } };

        case "setTriggerDescription":
            return { event: request.event, context: request.context, payload: request.description };

        case "openUrl":
            return { event: request.event, payload: { url: request.url } };

        case "logMessage":
            return { event: request.event, payload: { message: request.message } };
    }
}
