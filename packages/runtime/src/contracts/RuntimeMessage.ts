/**
 * @fileoverview Runtime Messages
 *
 * Everything that travels through the runtime's main queue. Producers
 * (the transport reader, adapters, action hooks) enqueue these; only the
 * event loop consumes them.
 *
 * @module @deckhost/runtime/contracts/RuntimeMessage
 */

import type { InboundEvent } from "../protocol/inbound.js";
import type { OutboundRequest } from "../protocol/outbound.js";
import type { LogLevel } from "./Logger.js";
import type { ActionTarget, AdapterControl, AdapterTarget } from "./Targets.js";
import type { TopicEnvelope } from "./Topic.js";

export type RuntimeMessage =
    /** Event received from the controller application */
    | { readonly type: "incoming"; readonly event: InboundEvent }
    /** Request to send to the controller application */
    | { readonly type: "outgoing"; readonly request: OutboundRequest }
    | { readonly type: "log"; readonly level: LogLevel; readonly message: string }
    /** Broadcast to every action and adapter subscribed to the topic */
    | { readonly type: "publish"; readonly envelope: TopicEnvelope }
    | { readonly type: "actionNotify"; readonly target: ActionTarget; readonly envelope: TopicEnvelope }
    | { readonly type: "adapterNotify"; readonly target: AdapterTarget; readonly envelope: TopicEnvelope }
    | { readonly type: "adapterControl"; readonly control: AdapterControl }
    | { readonly type: "exit" };
