/**
 * @fileoverview Action Contract
 *
 * Per-tile handlers. The runtime creates one action instance for every
 * (action id, context) pair the controller application shows, and routes
 * tile events and typed notifications to it.
 *
 * Every hook is optional; a missing hook is a no-op. Hooks may return a
 * promise, which the runtime does not await (a rejection is logged).
 *
 * @module @deckhost/runtime/contracts/Action
 */

import type { Context } from "../context/Context.js";
import type {
    DialDownEvent,
    DialRotateEvent,
    DialUpEvent,
    DidReceiveSettingsEvent,
    InboundEvent,
    KeyDownEvent,
    KeyUpEvent,
    PropertyInspectorDidAppearEvent,
    PropertyInspectorDidDisappearEvent,
    SendToPluginEvent,
    TitleParametersDidChangeEvent,
    TouchTapEvent,
    WillAppearEvent,
    WillDisappearEvent,
} from "../protocol/inbound.js";
import type { TopicEnvelope } from "./Topic.js";

/**
 * Value a hook may return.
 */
export type HookResult = void | Promise<void>;

/**
 * Action instance interface.
 *
 * @example
 * ```typescript
 * class MuteAction implements Action {
 *     readonly topics = [MuteChanged.name];
 *
 *     keyDown(cx: Context, event: KeyDownEvent): void {
 *         cx.bus.publish(ToggleMute, {});
 *     }
 *
 *     onNotify(cx: Context, context: string, envelope: TopicEnvelope): void {
 *         const muted = envelope.read(MuteChanged);
 *         if (muted !== undefined) {
 *             cx.deck.setState(context, muted ? 1 : 0);
 *         }
 *     }
 * }
 * ```
 */
export interface Action {
    /**
     * Topic names this instance subscribes to for published broadcasts.
     * Read once, when the instance is made ready.
     */
    readonly topics?: readonly string[];

    /** Runs once, before the first event reaches the instance. */
    init?(cx: Context, context: string): HookResult;

    /** Runs once, when the instance is removed. */
    teardown?(cx: Context, context: string): HookResult;

    willAppear?(cx: Context, event: WillAppearEvent): HookResult;
    willDisappear?(cx: Context, event: WillDisappearEvent): HookResult;
    keyDown?(cx: Context, event: KeyDownEvent): HookResult;
    keyUp?(cx: Context, event: KeyUpEvent): HookResult;

    dialDown?(cx: Context, event: DialDownEvent): HookResult;
    dialUp?(cx: Context, event: DialUpEvent): HookResult;
    dialRotate?(cx: Context, event: DialRotateEvent): HookResult;
    touchTap?(cx: Context, event: TouchTapEvent): HookResult;

    titleParametersDidChange?(cx: Context, event: TitleParametersDidChangeEvent): HookResult;
    propertyInspectorDidAppear?(cx: Context, event: PropertyInspectorDidAppearEvent): HookResult;
    propertyInspectorDidDisappear?(cx: Context, event: PropertyInspectorDidDisappearEvent): HookResult;
    didReceiveSettings?(cx: Context, event: DidReceiveSettingsEvent): HookResult;
    didReceivePropertyInspectorMessage?(cx: Context, event: SendToPluginEvent): HookResult;

    /** Events not bound to a tile (device, application, settings, ...). */
    onGlobalEvent?(cx: Context, event: InboundEvent): HookResult;

    /** Typed broadcast addressed to this instance. */
    onNotify?(cx: Context, context: string, envelope: TopicEnvelope): HookResult;
}

/**
 * Registration entry: an action id and a constructor of fresh instances.
 */
export interface ActionFactory {
    /** Action id as declared in the plugin manifest (e.g. "com.example.counter") */
    readonly id: string;

    /** Build a new, uninitialized instance */
    create(): Action;
}

/**
 * Build a factory from an id and a constructor function.
 */
export function actionFactory(id: string, create: () => Action): ActionFactory {
    if (id.length === 0) {
        throw new Error("Action id must not be empty");
    }
    return { id, create };
}

/**
 * Type guard to check if an object is an ActionFactory.
 */
export function isActionFactory(obj: unknown): obj is ActionFactory {
    return (
        typeof obj === "object" &&
        obj !== null &&
        "id" in obj &&
        typeof obj.id === "string" &&
        "create" in obj &&
        typeof obj.create === "function"
    );
}
