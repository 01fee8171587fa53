/**
 * @fileoverview Counter plugin topics
 *
 * @module counter-plugin/topics
 */

import { defineTopic } from "@deckhost/runtime";
import { z } from "zod";

/** Action id of the counter tile, as declared in the plugin manifest */
export const COUNTER_ACTION_ID = "dev.deckhost.counter";

/** Action id of the clock tile */
export const CLOCK_ACTION_ID = "dev.deckhost.clock";

/** Published once a second by the clock adapter */
export const ClockTick = defineTopic("clock.tick", z.object({ now: z.number().int().nonnegative() }));

/** Sent to counter tiles to bring them back to zero */
export const CounterReset = defineTopic("counter.reset", z.object({ reason: z.string() }));

/** Published by counter tiles after every change */
export const CounterChanged = defineTopic(
    "counter.changed",
    z.object({ context: z.string(), count: z.number().int() }),
);
