/**
 * @fileoverview Counter Action
 *
 * Counts key presses and dial turns on a tile. The count lives in the
 * tile's settings so it survives the tile being hidden; a plugin-wide
 * total is kept in the global settings.
 *
 * Controls:
 * - Key press or touch: +1
 * - Dial rotation: +ticks (never below zero)
 * - Dial press: reset
 *
 * @module counter-plugin/actions/CounterAction
 */

import {
    actionFactory,
    scopeLogger,
    type Action,
    type ActionFactory,
    type Context,
    type DialDownEvent,
    type DialRotateEvent,
    type DidReceiveSettingsEvent,
    type JsonObject,
    type KeyDownEvent,
    type TopicEnvelope,
    type TouchTapEvent,
    type WillAppearEvent,
} from "@deckhost/runtime";
import { COUNTER_ACTION_ID, CounterChanged, CounterReset } from "../topics.js";

/**
 * Read the stored count from tile settings. Anything but a
 * non-negative integer counts as zero.
 */
export function readCount(settings: JsonObject): number {
    const value = settings.count;
    return typeof value === "number" && Number.isInteger(value) && value >= 0 ? value : 0;
}

export class CounterAction implements Action {
    readonly topics = [CounterReset.name];

    private count = 0;

    init(cx: Context, context: string): void {
        scopeLogger(cx.logger, "counter").debug("Tile ready", { context });
    }

    willAppear(cx: Context, event: WillAppearEvent): void {
        this.count = readCount(event.settings);
        cx.deck.setTitle(event.context, String(this.count));
    }

    didReceiveSettings(cx: Context, event: DidReceiveSettingsEvent): void {
        this.count = readCount(event.settings);
        cx.deck.setTitle(event.context, String(this.count));
    }

    keyDown(cx: Context, event: KeyDownEvent): void {
        this.change(cx, event.context, this.count + 1);
        cx.globals.update((draft) => {
            const total = draft.totalPresses;
            draft.totalPresses = (typeof total === "number" ? total : 0) + 1;
        });
    }

    touchTap(cx: Context, event: TouchTapEvent): void {
        this.change(cx, event.context, this.count + 1);
    }

    dialRotate(cx: Context, event: DialRotateEvent): void {
        this.change(cx, event.context, Math.max(0, this.count + event.ticks));
    }

    dialDown(cx: Context, event: DialDownEvent): void {
        this.change(cx, event.context, 0);
    }

    onNotify(cx: Context, context: string, envelope: TopicEnvelope): void {
        const reset = envelope.read(CounterReset);
        if (reset === undefined) {
            return;
        }

        scopeLogger(cx.logger, "counter").info(`Reset: ${reset.reason}`, { context });
        this.change(cx, context, 0);
        cx.deck.showOk(context);
    }

    teardown(cx: Context, context: string): void {
        scopeLogger(cx.logger, "counter").debug("Tile removed", { context, count: this.count });
    }

    get value(): number {
        return this.count;
    }

    private change(cx: Context, context: string, count: number): void {
        this.count = count;
        cx.deck.setTitle(context, String(count));
        cx.deck.setSettings(context, { count });
        cx.bus.publish(CounterChanged, { context, count });
    }
}

export const counterAction: ActionFactory = actionFactory(COUNTER_ACTION_ID, () => new CounterAction());
