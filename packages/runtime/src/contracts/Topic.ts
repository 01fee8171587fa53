/**
 * @fileoverview Topic Contract
 *
 * Typed broadcast channels and the erased envelope that carries them
 * through the runtime queue.
 *
 * A topic pairs a name with a zod schema describing its payload. An
 * envelope only yields its payload to the very token it was created with,
 * and only while the schema accepts it, so two topics that share a name
 * never cross-talk whatever their shapes.
 *
 * @module @deckhost/runtime/contracts/Topic
 *
 * @example
 * ```typescript
 * const VolumeChanged = defineTopic("volume.changed", z.number().int());
 *
 * bus.publish(VolumeChanged, 42);
 *
 * // In an action's onNotify:
 * const volume = envelope.read(VolumeChanged);
 * if (volume !== undefined) {
 *     cx.deck.setTitle(context, `${volume}%`);
 * }
 * ```
 */

import type { z } from "zod";

/**
 * Schema accepted as a topic's payload tag.
 */
export type PayloadSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * A named, typed topic token. Create once with {@link defineTopic} and
 * share it between producers and consumers.
 */
export interface TopicId<T> {
    /** Topic name used for indexing and fan-out */
    readonly name: string;

    /** Payload schema checked on extraction */
    readonly schema: PayloadSchema<T>;

    /** Payloads of the envelopes created with this token */
    readonly payloads: WeakMap<TopicEnvelope, T>;
}

/**
 * Define a topic.
 *
 * @param name - Topic name (not required to be unique; the token disambiguates)
 * @param schema - zod schema describing the payload
 */
export function defineTopic<T>(name: string, schema: PayloadSchema<T>): TopicId<T> {
    if (name.length === 0) {
        throw new Error("Topic name must not be empty");
    }
    return Object.freeze({ name, schema, payloads: new WeakMap<TopicEnvelope, T>() });
}

/**
 * Type-erased message: a topic name plus a payload that only the
 * originating topic token can read.
 */
export class TopicEnvelope {
    private constructor(
        /** Name of the topic the envelope was created with */
        public readonly name: string,
    ) {}

    /**
     * Wrap a value for the given topic.
     */
    static of<T>(topic: TopicId<T>, value: T): TopicEnvelope {
        const envelope = new TopicEnvelope(topic.name);
        topic.payloads.set(envelope, value);
        return envelope;
    }

    /**
     * Whether this envelope can be read as the given topic.
     */
    is<T>(topic: TopicId<T>): boolean {
        return this.name === topic.name
            && topic.payloads.has(this)
            && topic.schema.safeParse(topic.payloads.get(this)).success;
    }

    /**
     * Extract the payload as the given topic's type. The published value
     * is returned as is.
     *
     * @returns The payload, or undefined unless the envelope was created
     * with this topic and the payload passes its schema
     */
    read<T>(topic: TopicId<T>): T | undefined {
        if (!this.is(topic)) {
            return undefined;
        }
        return topic.payloads.get(this);
    }

    toString(): string {
        return `TopicEnvelope(${this.name})`;
    }
}
