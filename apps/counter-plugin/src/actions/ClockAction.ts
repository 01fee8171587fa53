/**
 * @fileoverview Clock Action
 *
 * Shows the time published by the clock adapter.
 *
 * @module counter-plugin/actions/ClockAction
 */

import { actionFactory, type Action, type ActionFactory, type Context, type TopicEnvelope } from "@deckhost/runtime";
import { CLOCK_ACTION_ID, ClockTick } from "../topics.js";

/**
 * Render a timestamp as HH:MM:SS in UTC.
 */
export function formatClock(now: number): string {
    return new Date(now).toISOString().slice(11, 19);
}

export class ClockAction implements Action {
    readonly topics = [ClockTick.name];

    onNotify(cx: Context, context: string, envelope: TopicEnvelope): void {
        const tick = envelope.read(ClockTick);
        if (tick !== undefined) {
            cx.deck.setTitle(context, formatClock(tick.now));
        }
    }
}

export const clockAction: ActionFactory = actionFactory(CLOCK_ACTION_ID, () => new ClockAction());
