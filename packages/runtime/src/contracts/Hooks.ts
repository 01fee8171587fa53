/**
 * @fileoverview App Hook Contract
 *
 * Observation points fired by the event loop. Hooks see every message the
 * loop handles plus the runtime lifecycle (init, tick, exit).
 *
 * @module @deckhost/runtime/contracts/Hooks
 */

import type { Context } from "../context/Context.js";
import type { DeviceInfo, InboundEvent, JsonObject } from "../protocol/inbound.js";
import type { OutboundRequest } from "../protocol/outbound.js";
import type { LogLevel } from "./Logger.js";
import type { ActionTarget, AdapterControl, AdapterTarget } from "./Targets.js";
import type { TopicEnvelope } from "./Topic.js";

export type HookEvent =
    // Controller events
    | { readonly kind: "incoming"; readonly event: InboundEvent }
    | { readonly kind: "applicationDidLaunch"; readonly application: string }
    | { readonly kind: "applicationDidTerminate"; readonly application: string }
    | { readonly kind: "deviceDidConnect"; readonly device: string; readonly deviceInfo: DeviceInfo }
    | { readonly kind: "deviceDidDisconnect"; readonly device: string }
    | { readonly kind: "deviceDidChange"; readonly device: string; readonly deviceInfo: DeviceInfo }
    | { readonly kind: "didReceiveDeepLink"; readonly url: string }
    | { readonly kind: "didReceiveGlobalSettings"; readonly settings: JsonObject }

    // Runtime traffic
    | { readonly kind: "outgoing"; readonly request: OutboundRequest }
    | { readonly kind: "log"; readonly level: LogLevel; readonly message: string }
    | { readonly kind: "publish"; readonly envelope: TopicEnvelope }
    | { readonly kind: "actionNotify"; readonly target: ActionTarget; readonly envelope: TopicEnvelope }
    | { readonly kind: "adapterNotify"; readonly target: AdapterTarget; readonly envelope: TopicEnvelope }
    | { readonly kind: "adapterControl"; readonly control: AdapterControl }

    // Lifecycle
    | { readonly kind: "init" }
    | { readonly kind: "tick" }
    | { readonly kind: "exit" };

export type HookKind = HookEvent["kind"];

/**
 * Narrowed hook event for a given kind.
 */
export type HookEventOf<K extends HookKind> = Extract<HookEvent, { kind: K }>;

/**
 * Hook listener. Runs synchronously on the event loop.
 */
export type HookListener<E extends HookEvent = HookEvent> = (cx: Context, event: E) => void;

/**
 * Registration handle.
 */
export interface HookSubscription {
    unsubscribe(): void;
}
