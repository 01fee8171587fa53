/**
 * @fileoverview Async Queue
 *
 * Multi-producer, single-consumer queue. Producers push synchronously and
 * never wait; the consumer awaits the next item with an optional timeout.
 * Used for the runtime's main message queue and for every adapter inbox.
 *
 * @module @deckhost/runtime/impl/AsyncQueue
 */

interface Waiter<T> {
    readonly resolve: (item: T | undefined) => void;
    timer?: NodeJS.Timeout;
}

/**
 * FIFO queue with non-blocking `push` and awaitable `receive`.
 *
 * Items must be objects so `undefined` can signal "nothing arrived".
 *
 * @example
 * ```typescript
 * const queue = new AsyncQueue<RuntimeMessage>();
 *
 * queue.push({ type: "exit" });
 *
 * const next = await queue.receive(100); // undefined after 100 ms of silence
 * ```
 */
export class AsyncQueue<T extends object> implements AsyncIterable<T> {
    private readonly buffer: T[] = [];
    private readonly waiters: Waiter<T>[] = [];
    private closedFlag = false;

    /**
     * @param capacity - Maximum buffered items; pushes beyond it are rejected
     */
    constructor(public readonly capacity: number = Number.POSITIVE_INFINITY) {
        if (!(capacity > 0)) {
            throw new RangeError(`Queue capacity must be positive, got ${capacity}`);
        }
    }

    /**
     * Enqueue an item without waiting.
     *
     * @returns false when the queue is closed or full (the item is dropped)
     */
    push(item: T): boolean {
        if (this.closedFlag) {
            return false;
        }

        const waiter = this.waiters.shift();
        if (waiter) {
            if (waiter.timer) {
                clearTimeout(waiter.timer);
            }
            waiter.resolve(item);
            return true;
        }

        if (this.buffer.length >= this.capacity) {
            return false;
        }

        this.buffer.push(item);
        return true;
    }

    /**
     * Take the next buffered item, if any, without waiting.
     */
    tryReceive(): T | undefined {
        return this.buffer.shift();
    }

    /**
     * Wait for the next item.
     *
     * @param timeoutMs - Give up after this many milliseconds (wait forever if omitted)
     * @returns The item, or undefined on timeout or when the queue is closed and drained
     */
    receive(timeoutMs?: number): Promise<T | undefined> {
        const buffered = this.buffer.shift();
        if (buffered !== undefined) {
            return Promise.resolve(buffered);
        }
        if (this.closedFlag) {
            return Promise.resolve(undefined);
        }

        return new Promise<T | undefined>((resolve) => {
            const waiter: Waiter<T> = { resolve };

            if (timeoutMs !== undefined) {
                waiter.timer = setTimeout(() => {
                    const index = this.waiters.indexOf(waiter);
                    if (index >= 0) {
                        this.waiters.splice(index, 1);
                    }
                    resolve(undefined);
                }, timeoutMs);
            }

            this.waiters.push(waiter);
        });
    }

    /**
     * Close the queue. Buffered items can still be received; pending
     * receivers resolve with undefined and further pushes are rejected.
     */
    close(): void {
        if (this.closedFlag) {
            return;
        }
        this.closedFlag = true;

        for (const waiter of this.waiters.splice(0)) {
            if (waiter.timer) {
                clearTimeout(waiter.timer);
            }
            waiter.resolve(undefined);
        }
    }

    get closed(): boolean {
        return this.closedFlag;
    }

    /** Number of buffered items */
    get size(): number {
        return this.buffer.length;
    }

    /**
     * Iterate until the queue is closed and drained.
     */
    async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
        while (true) {
            const item = await this.receive();
            if (item === undefined) {
                return;
            }
            yield item;
        }
    }
}
