/**
 * @fileoverview Shared test fixtures
 *
 * @module @deckhost/runtime/__tests__/fixtures
 */

import { vi } from "vitest";
import { Context } from "../context/Context.js";
import type { RuntimeLogger } from "../contracts/Logger.js";
import type { RuntimeMessage } from "../contracts/RuntimeMessage.js";
import type { WireTransport } from "../contracts/Transport.js";
import { AsyncQueue } from "../impl/AsyncQueue.js";
import { Emitter } from "../impl/Emitter.js";

export const TEST_PLUGIN_UUID = "test-plugin-uuid";

export interface MockLogger extends RuntimeLogger {
    debug: ReturnType<typeof vi.fn>;
    info: ReturnType<typeof vi.fn>;
    warn: ReturnType<typeof vi.fn>;
    error: ReturnType<typeof vi.fn>;
}

/**
 * Create a logger whose methods are spies
 */
export function createMockLogger(): MockLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

/**
 * Create a Context backed by a queue the test can inspect
 */
export function createTestContext(logger: RuntimeLogger = createMockLogger()): {
    cx: Context;
    queue: AsyncQueue<RuntimeMessage>;
} {
    const queue = new AsyncQueue<RuntimeMessage>();
    const cx = new Context({
        bus       : new Emitter(queue, logger),
        pluginUuid: TEST_PLUGIN_UUID,
        logger,
    });
    return { cx, queue };
}

/**
 * Take every message currently buffered in a queue
 */
export function drainQueue<T extends object>(queue: AsyncQueue<T>): T[] {
    const items: T[] = [];
    for (let item = queue.tryReceive(); item !== undefined; item = queue.tryReceive()) {
        items.push(item);
    }
    return items;
}

/**
 * In-process stand-in for the controller connection.
 *
 * Frames the runtime sends are recorded in `sent`; `deliver` hands a frame
 * to the runtime's reader; `accepting = false` makes `send` refuse.
 */
export class FakeTransport implements WireTransport {
    readonly sent: string[] = [];
    accepting = true;
    closed = false;
    detached = false;

    private messageListener: ((text: string) => void) | undefined;
    private readonly closeListeners: ((reason: string) => void)[] = [];

    send(text: string): boolean {
        if (!this.accepting) {
            return false;
        }
        this.sent.push(text);
        return true;
    }

    onMessage(listener: (text: string) => void): void {
        this.messageListener = listener;
        this.detached = false;
    }

    onClose(listener: (reason: string) => void): void {
        this.closeListeners.push(listener);
    }

    detach(): void {
        this.messageListener = undefined;
        this.detached = true;
    }

    close(): void {
        this.closed = true;
    }

    /** Whether the runtime has attached its reader */
    get attached(): boolean {
        return this.messageListener !== undefined;
    }

    /** Simulate a frame arriving from the controller */
    deliver(frame: unknown): void {
        this.messageListener?.(typeof frame === "string" ? frame : JSON.stringify(frame));
    }

    /** Simulate the controller dropping the connection */
    drop(reason = "closed (1006)"): void {
        for (const listener of this.closeListeners.splice(0)) {
            listener(reason);
        }
    }

    /** Sent frames parsed back to objects */
    sentFrames(): unknown[] {
        return this.sent.map((text) => JSON.parse(text));
    }

    /** Event names of sent frames, in order */
    sentEvents(): string[] {
        return this.sentFrames().map((frame) =>
            typeof frame === "object" && frame !== null && "event" in frame ? String(frame.event) : "?",
        );
    }
}

/**
 * Let pending promise callbacks run
 */
export async function flushPromises(): Promise<void> {
    for (let i = 0; i < 5; i++) {
        await Promise.resolve();
    }
}
