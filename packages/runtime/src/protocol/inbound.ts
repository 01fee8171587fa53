/**
 * @fileoverview Inbound Wire Events
 *
 * Typed vocabulary of events the controller application sends to the
 * plugin, and the zod schemas that validate raw frames into it.
 *
 * @module @deckhost/runtime/protocol/inbound
 */

import { z } from "zod";
import { errorMessage } from "../contracts/Logger.js";

/** Arbitrary JSON object (settings, property-inspector payloads). */
export type JsonObject = Record<string, unknown>;

/** Multi-state actions report which of two states they are in. */
export type DeckState = 0 | 1;

export interface Coordinates {
    readonly column: number;
    readonly row: number;
}

export interface DeviceInfo {
    readonly name: string;
    readonly type: number;
    readonly size: {
        readonly columns: number;
        readonly rows: number;
    };
}

export interface TitleParameters {
    readonly fontFamily: string;
    readonly fontSize: number;
    readonly fontStyle: string;
    readonly fontUnderline: boolean;
    readonly showTitle: boolean;
    readonly titleAlignment: string;
    readonly titleColor: string;
}

/**
 * Fields shared by key-style tile events.
 */
export interface KeypadEventData {
    readonly action: string;
    readonly context: string;
    readonly device: string;
    readonly settings: JsonObject;
    readonly controller: string;
    readonly isInMultiAction: boolean;
    readonly state?: DeckState;
    readonly coordinates?: Coordinates;
}

/**
 * Fields shared by encoder (dial / touch strip) tile events.
 */
export interface EncoderEventData {
    readonly action: string;
    readonly context: string;
    readonly device: string;
    readonly settings: JsonObject;
    readonly controller: string;
    readonly coordinates: Coordinates;
}

export type KeypadEvent<K extends string> = KeypadEventData & { readonly event: K };
export type EncoderEvent<K extends string> = EncoderEventData & { readonly event: K };

export type WillAppearEvent = KeypadEvent<"willAppear">;
export type WillDisappearEvent = KeypadEvent<"willDisappear">;
export type KeyDownEvent = KeypadEvent<"keyDown">;
export type KeyUpEvent = KeypadEvent<"keyUp">;
export type DidReceiveSettingsEvent = KeypadEvent<"didReceiveSettings">;
export type DialDownEvent = EncoderEvent<"dialDown">;
export type DialUpEvent = EncoderEvent<"dialUp">;

export interface DialRotateEvent extends EncoderEventData {
    readonly event: "dialRotate";
    readonly pressed: boolean;
    readonly ticks: number;
}

export interface TouchTapEvent extends EncoderEventData {
    readonly event: "touchTap";
    readonly hold: boolean;
    readonly tapPos: readonly [number, number];
}

export interface TitleParametersDidChangeEvent extends EncoderEventData {
    readonly event: "titleParametersDidChange";
    readonly state?: DeckState;
    readonly title: string;
    readonly titleParameters: TitleParameters;
}

export interface PropertyInspectorEvent<K extends string> {
    readonly event: K;
    readonly action: string;
    readonly context: string;
    readonly device: string;
}

export type PropertyInspectorDidAppearEvent = PropertyInspectorEvent<"propertyInspectorDidAppear">;
export type PropertyInspectorDidDisappearEvent = PropertyInspectorEvent<"propertyInspectorDidDisappear">;

/** Message sent from a tile's property inspector to the plugin. */
export interface SendToPluginEvent {
    readonly event: "sendToPlugin";
    readonly action: string;
    readonly context: string;
    readonly payload: JsonObject;
}

export interface ApplicationDidLaunchEvent {
    readonly event: "applicationDidLaunch";
    readonly application: string;
}

export interface ApplicationDidTerminateEvent {
    readonly event: "applicationDidTerminate";
    readonly application: string;
}

export interface DeviceDidConnectEvent {
    readonly event: "deviceDidConnect";
    readonly device: string;
    readonly deviceInfo: DeviceInfo;
}

export interface DeviceDidChangeEvent {
    readonly event: "deviceDidChange";
    readonly device: string;
    readonly deviceInfo: DeviceInfo;
}

export interface DeviceDidDisconnectEvent {
    readonly event: "deviceDidDisconnect";
    readonly device: string;
}

export interface DidReceiveGlobalSettingsEvent {
    readonly event: "didReceiveGlobalSettings";
    readonly settings: JsonObject;
}

export interface DidReceiveDeepLinkEvent {
    readonly event: "didReceiveDeepLink";
    readonly url: string;
}

export interface SystemDidWakeUpEvent {
    readonly event: "systemDidWakeUp";
}

/**
 * Everything the controller application can send.
 */
export type InboundEvent =
    | ApplicationDidLaunchEvent
    | ApplicationDidTerminateEvent
    | DeviceDidConnectEvent
    | DeviceDidDisconnectEvent
    | DeviceDidChangeEvent
    | WillAppearEvent
    | WillDisappearEvent
    | KeyDownEvent
    | KeyUpEvent
    | DialDownEvent
    | DialUpEvent
    | DialRotateEvent
    | TouchTapEvent
    | TitleParametersDidChangeEvent
    | PropertyInspectorDidAppearEvent
    | PropertyInspectorDidDisappearEvent
    | DidReceiveSettingsEvent
    | DidReceiveGlobalSettingsEvent
    | SendToPluginEvent
    | DidReceiveDeepLinkEvent
    | SystemDidWakeUpEvent;

export type InboundEventName = InboundEvent["event"];

// ============================================================================
// Schemas
// ============================================================================

const jsonObject = z.record(z.string(), z.unknown());

const coordinatesSchema = z.object({
    column: z.number().int(),
    row   : z.number().int(),
});

const deckStateSchema = z.union([z.literal(0), z.literal(1)]);

const deviceInfoSchema = z.object({
    name: z.string(),
    type: z.number().int(),
    size: z.object({
        columns: z.number().int(),
        rows   : z.number().int(),
    }),
});

const titleParametersSchema = z.object({
    fontFamily    : z.string(),
    fontSize      : z.number(),
    fontStyle     : z.string(),
    fontUnderline : z.boolean(),
    showTitle     : z.boolean(),
    titleAlignment: z.string(),
    titleColor    : z.string(),
});

const tileAddress = {
    action : z.string(),
    context: z.string(),
    device : z.string(),
};

/** Payload fields that degrade to "absent" rather than failing the frame. */
const lenientPayload = {
    settings       : jsonObject.optional().catch(undefined),
    controller     : z.string().optional(),
    isInMultiAction: z.boolean().optional().catch(undefined),
    state          : deckStateSchema.optional().catch(undefined),
    coordinates    : coordinatesSchema.optional().catch(undefined),
};

function keypadSchema<K extends string>(event: K, defaultController?: string) {
    return z
        .object({
            ...tileAddress,
            payload: z.object(lenientPayload).optional(),
        })
        .transform((wire, ctx): KeypadEvent<K> => {
            const controller = wire.payload?.controller ?? defaultController;
            if (controller === undefined) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: "missing payload.controller" });
                return z.NEVER;
            }
            return {
                event,
                action         : wire.action,
                context        : wire.context,
                device         : wire.device,
                settings       : wire.payload?.settings ?? {},
                controller,
                isInMultiAction: wire.payload?.isInMultiAction ?? false,
                state          : wire.payload?.state,
                coordinates    : wire.payload?.coordinates,
            };
        });
}

const encoderPayload = z.object({
    ...lenientPayload,
    controller : z.string(),
    coordinates: coordinatesSchema,
});

function encoderSchema<K extends string>(event: K) {
    return z
        .object({ ...tileAddress, payload: encoderPayload })
        .transform((wire): EncoderEvent<K> => ({
            event,
            action     : wire.action,
            context    : wire.context,
            device     : wire.device,
            settings   : wire.payload.settings ?? {},
            controller : wire.payload.controller,
            coordinates: wire.payload.coordinates,
        }));
}

function propertyInspectorSchema<K extends string>(event: K) {
    return z
        .object(tileAddress)
        .transform((wire): PropertyInspectorEvent<K> => ({
            event,
            action : wire.action,
            context: wire.context,
            device : wire.device,
        }));
}

function applicationSchema<K extends "applicationDidLaunch" | "applicationDidTerminate">(event: K) {
    return z
        .object({ payload: z.object({ application: z.string() }) })
        .transform((wire) => ({ event, application: wire.payload.application }));
}

type InboundSchemas = {
    readonly [K in InboundEventName]: z.ZodType<Extract<InboundEvent, { event: K }>, z.ZodTypeDef, unknown>;
};

const INBOUND_SCHEMAS: InboundSchemas = {
    applicationDidLaunch   : applicationSchema("applicationDidLaunch"),
    applicationDidTerminate: applicationSchema("applicationDidTerminate"),

    deviceDidConnect: z
        .object({ device: z.string(), deviceInfo: deviceInfoSchema })
        .transform((wire): DeviceDidConnectEvent => ({ event: "deviceDidConnect", ...wire })),
    deviceDidChange: z
        .object({ device: z.string(), deviceInfo: deviceInfoSchema })
        .transform((wire): DeviceDidChangeEvent => ({ event: "deviceDidChange", ...wire })),
    deviceDidDisconnect: z
        .object({ device: z.string() })
        .transform((wire): DeviceDidDisconnectEvent => ({ event: "deviceDidDisconnect", device: wire.device })),

    willAppear        : keypadSchema("willAppear"),
    willDisappear     : keypadSchema("willDisappear"),
    didReceiveSettings: keypadSchema("didReceiveSettings"),
    keyDown           : keypadSchema("keyDown", "Keypad"),
    keyUp             : keypadSchema("keyUp", "Keypad"),

    dialDown: encoderSchema("dialDown"),
    dialUp  : encoderSchema("dialUp"),
    dialRotate: z
        .object({
            ...tileAddress,
            payload: encoderPayload.extend({ pressed: z.boolean(), ticks: z.number().int() }),
        })
        .transform((wire): DialRotateEvent => ({
            event      : "dialRotate",
            action     : wire.action,
            context    : wire.context,
            device     : wire.device,
            settings   : wire.payload.settings ?? {},
            controller : wire.payload.controller,
            coordinates: wire.payload.coordinates,
            pressed    : wire.payload.pressed,
            ticks      : wire.payload.ticks,
        })),
    touchTap: z
        .object({
            ...tileAddress,
            payload: encoderPayload.extend({
                hold  : z.boolean(),
                tapPos: z.tuple([z.number().int(), z.number().int()]),
            }),
        })
        .transform((wire): TouchTapEvent => ({
            event      : "touchTap",
            action     : wire.action,
            context    : wire.context,
            device     : wire.device,
            settings   : wire.payload.settings ?? {},
            controller : wire.payload.controller,
            coordinates: wire.payload.coordinates,
            hold       : wire.payload.hold,
            tapPos     : wire.payload.tapPos,
        })),
    titleParametersDidChange: z
        .object({
            ...tileAddress,
            payload: encoderPayload.extend({
                title          : z.string(),
                titleParameters: titleParametersSchema,
            }),
        })
        .transform((wire): TitleParametersDidChangeEvent => ({
            event          : "titleParametersDidChange",
            action         : wire.action,
            context        : wire.context,
            device         : wire.device,
            settings       : wire.payload.settings ?? {},
            controller     : wire.payload.controller,
            coordinates    : wire.payload.coordinates,
            state          : wire.payload.state,
            title          : wire.payload.title,
            titleParameters: wire.payload.titleParameters,
        })),

    propertyInspectorDidAppear   : propertyInspectorSchema("propertyInspectorDidAppear"),
    propertyInspectorDidDisappear: propertyInspectorSchema("propertyInspectorDidDisappear"),

    sendToPlugin: z
        .object({ action: z.string(), context: z.string(), payload: jsonObject })
        .transform((wire): SendToPluginEvent => ({
            event  : "sendToPlugin",
            action : wire.action,
            context: wire.context,
            payload: wire.payload,
        })),

    didReceiveGlobalSettings: z
        .object({ payload: z.object({ settings: jsonObject.optional().catch(undefined) }).optional() })
        .transform((wire): DidReceiveGlobalSettingsEvent => ({
            event   : "didReceiveGlobalSettings",
            settings: wire.payload?.settings ?? {},
        })),

    didReceiveDeepLink: z
        .object({ payload: z.object({ url: z.string() }) })
        .transform((wire): DidReceiveDeepLinkEvent => ({ event: "didReceiveDeepLink", url: wire.payload.url })),

    systemDidWakeUp: z
        .object({})
        .transform((): SystemDidWakeUpEvent => ({ event: "systemDidWakeUp" })),
};

const eventHeadSchema = z.object({ event: z.string() });

/**
 * Result of parsing one inbound frame.
 */
export type InboundParseResult =
    | { readonly ok: true; readonly event: InboundEvent }
    | { readonly ok: false; readonly error: string };

/**
 * Whether a string names a known inbound event.
 */
export function isInboundEventName(name: string): name is InboundEventName {
    return Object.prototype.hasOwnProperty.call(INBOUND_SCHEMAS, name);
}

/**
 * Parse and validate a raw text frame.
 *
 * @param text - JSON text received from the transport
 */
export function parseInbound(text: string): InboundParseResult {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    }
    catch (error) {
        return { ok: false, error: `json parse error: ${errorMessage(error)}` };
    }

    const head = eventHeadSchema.safeParse(raw);
    if (!head.success) {
        return { ok: false, error: "missing event" };
    }

    const name = head.data.event;
    if (!isInboundEventName(name)) {
        return { ok: false, error: `unknown event: ${name}` };
    }

    const parsed = INBOUND_SCHEMAS[name].safeParse(raw);
    if (!parsed.success) {
        const detail = parsed.error.issues
            .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
            .join("; ");
        return { ok: false, error: `invalid ${name}: ${detail}` };
    }

    return { ok: true, event: parsed.data };
}

/**
 * Short label for log lines, e.g. `keyDown(action=counter, context=A1)`.
 */
export function describeInbound(event: InboundEvent): string {
    if ("action" in event && "context" in event) {
        return `${event.event}(action=${event.action}, context=${event.context})`;
    }
    return event.event;
}
