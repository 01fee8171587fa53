/**
 * @fileoverview Queue-backed Bus
 *
 * @module @deckhost/runtime/impl/Emitter
 */

import type { Bus } from "../contracts/Bus.js";
import type { LogLevel, RuntimeLogger } from "../contracts/Logger.js";
import type { RuntimeMessage } from "../contracts/RuntimeMessage.js";
import {
    ActionTarget,
    AdapterTarget,
    type AdapterControl,
    type StartPolicy,
} from "../contracts/Targets.js";
import { TopicEnvelope, type TopicId } from "../contracts/Topic.js";
import type { OutboundRequest } from "../protocol/outbound.js";
import type { AsyncQueue } from "./AsyncQueue.js";

/**
 * {@link Bus} implementation that enqueues onto the runtime queue.
 * Messages sent after the queue has closed are dropped.
 */
export class Emitter implements Bus {
    constructor(
        private readonly queue: AsyncQueue<RuntimeMessage>,
        private readonly logger?: RuntimeLogger,
    ) {}

    deck(request: OutboundRequest): void {
        this.send({ type: "outgoing", request });
    }

    log(level: LogLevel, message: string): void {
        this.send({ type: "log", level, message });
    }

    publish<T>(topic: TopicId<T>, value: T): void {
        this.send({ type: "publish", envelope: TopicEnvelope.of(topic, value) });
    }

    notifyActions<T>(target: ActionTarget, topic: TopicId<T>, value: T): void {
        this.send({ type: "actionNotify", target, envelope: TopicEnvelope.of(topic, value) });
    }

    notifyActionsAll<T>(topic: TopicId<T>, value: T): void {
        this.notifyActions(ActionTarget.all(), topic, value);
    }

    notifyActionsById<T>(actionId: string, topic: TopicId<T>, value: T): void {
        this.notifyActions(ActionTarget.id(actionId), topic, value);
    }

    notifyActionsByContext<T>(context: string, topic: TopicId<T>, value: T): void {
        this.notifyActions(ActionTarget.context(context), topic, value);
    }

    notifyAdapters<T>(target: AdapterTarget, topic: TopicId<T>, value: T): void {
        this.send({ type: "adapterNotify", target, envelope: TopicEnvelope.of(topic, value) });
    }

    notifyAdaptersAll<T>(topic: TopicId<T>, value: T): void {
        this.notifyAdapters(AdapterTarget.all(), topic, value);
    }

    notifyAdaptersByPolicy<T>(policy: StartPolicy, topic: TopicId<T>, value: T): void {
        this.notifyAdapters(AdapterTarget.policy(policy), topic, value);
    }

    notifyAdaptersByName<T>(name: string, topic: TopicId<T>, value: T): void {
        this.notifyAdapters(AdapterTarget.name(name), topic, value);
    }

    notifyAdaptersByLabel<T>(label: string, topic: TopicId<T>, value: T): void {
        this.notifyAdapters(AdapterTarget.label(label), topic, value);
    }

    adapters(control: AdapterControl): void {
        this.send({ type: "adapterControl", control });
    }

    startAdapters(target: AdapterTarget): void {
        this.adapters({ op: "start", target });
    }

    stopAdapters(target: AdapterTarget): void {
        this.adapters({ op: "stop", target });
    }

    restartAdapters(target: AdapterTarget): void {
        this.adapters({ op: "restart", target });
    }

    exit(): void {
        this.send({ type: "exit" });
    }

    private send(message: RuntimeMessage): void {
        if (!this.queue.push(message)) {
            this.logger?.debug(`Runtime queue closed; dropped ${message.type} message`);
        }
    }
}
