/**
 * @fileoverview Wire protocol barrel exports
 *
 * @module @deckhost/runtime/protocol
 */

export type {
    ApplicationDidLaunchEvent,
    ApplicationDidTerminateEvent,
    Coordinates,
    DeckState,
    DeviceDidChangeEvent,
    DeviceDidConnectEvent,
    DeviceDidDisconnectEvent,
    DeviceInfo,
    DialDownEvent,
    DialRotateEvent,
    DialUpEvent,
    DidReceiveDeepLinkEvent,
    DidReceiveGlobalSettingsEvent,
    DidReceiveSettingsEvent,
    EncoderEventData,
    InboundEvent,
    InboundEventName,
    InboundParseResult,
    JsonObject,
    KeyDownEvent,
    KeyUpEvent,
    KeypadEventData,
    PropertyInspectorDidAppearEvent,
    PropertyInspectorDidDisappearEvent,
    SendToPluginEvent,
    SystemDidWakeUpEvent,
    TitleParameters,
    TitleParametersDidChangeEvent,
    TouchTapEvent,
    WillAppearEvent,
    WillDisappearEvent,
} from "./inbound.js";
export { describeInbound, isInboundEventName, parseInbound } from "./inbound.js";

export type { OutboundRequest, RenderTarget, TriggerDescription } from "./outbound.js";
export { serializeOutbound } from "./outbound.js";

export { DeckClient } from "./DeckClient.js";
export type { RenderOptions } from "./DeckClient.js";
