/**
 * @fileoverview Action Lifecycle Manager
 *
 * Owns the action registry and the table of live per-tile instances.
 * Instances are created on demand from tile events, initialized once,
 * indexed by the topics they subscribe to, and torn down when their tile
 * disappears.
 *
 * Only the event loop calls into this class.
 *
 * @module @deckhost/runtime/engine/ActionManager
 */

import type { Action, ActionFactory, HookResult } from "../contracts/Action.js";
import { errorMessage, type RuntimeLogger } from "../contracts/Logger.js";
import type { ActionTarget } from "../contracts/Targets.js";
import type { TopicEnvelope } from "../contracts/Topic.js";
import type { Context } from "../context/Context.js";
import type { InboundEvent } from "../protocol/inbound.js";

/**
 * A live action instance.
 */
interface ActionRecord {
    readonly actionId: string;
    readonly context: string;
    readonly action: Action;

    /** Topics indexed for this instance (empty on the teardown-only path) */
    readonly topics: readonly string[];
}

function instanceKey(actionId: string, context: string): string {
    return `${actionId}\u0000${context}`;
}

export class ActionManager {
    private readonly factories: ReadonlyMap<string, ActionFactory>;
    private readonly instances = new Map<string, ActionRecord>();
    private readonly byTopic = new Map<string, string[]>();

    constructor(
        factories: Iterable<ActionFactory>,
        private readonly logger: RuntimeLogger,
    ) {
        const registry = new Map<string, ActionFactory>();
        for (const factory of factories) {
            registry.set(factory.id, factory);
        }
        this.factories = registry;
    }

    // ========================================================================
    // Lifecycle
    // ========================================================================

    /**
     * Make sure a ready instance exists for the tile.
     *
     * Constructs it through the registered factory if absent, captures its
     * topics, runs `init` once, stores it and indexes its topics.
     *
     * @returns The instance, or undefined if the action id is not registered
     */
    ensureReady(cx: Context, actionId: string, context: string): Action | undefined {
        const key = instanceKey(actionId, context);
        const existing = this.instances.get(key);
        if (existing) {
            return existing.action;
        }

        const action = this.construct(actionId);
        if (!action) {
            return undefined;
        }

        const topics = this.readTopics(action, actionId, context);
        this.invoke(actionId, context, "init", () => action.init?.(cx, context));

        this.instances.set(key, { actionId, context, action, topics });
        for (const topic of new Set(topics)) {
            const keys = this.byTopic.get(topic);
            if (keys) {
                keys.push(key);
            }
            else {
                this.byTopic.set(topic, [key]);
            }
        }

        this.logger.debug(`Action ready: ${actionId} @ ${context}`, { topics });
        return action;
    }

    /**
     * Make sure an instance exists so it can be torn down. Skips `init`
     * and topic indexing when the instance has to be constructed.
     *
     * @returns The instance, or undefined if the action id is not registered
     */
    ensureForTeardown(actionId: string, context: string): Action | undefined {
        const key = instanceKey(actionId, context);
        const existing = this.instances.get(key);
        if (existing) {
            return existing.action;
        }

        const action = this.construct(actionId);
        if (!action) {
            return undefined;
        }

        this.instances.set(key, { actionId, context, action, topics: [] });
        return action;
    }

    /**
     * De-index, run `teardown` and drop the instance. No-op if absent.
     */
    remove(cx: Context, actionId: string, context: string): void {
        const key = instanceKey(actionId, context);
        const record = this.instances.get(key);
        if (!record) {
            return;
        }

        this.instances.delete(key);
        for (const topic of record.topics) {
            const keys = this.byTopic.get(topic);
            if (!keys) {
                continue;
            }
            const remaining = keys.filter((existing) => existing !== key);
            if (remaining.length === 0) {
                this.byTopic.delete(topic);
            }
            else {
                this.byTopic.set(topic, remaining);
            }
        }

        this.invoke(actionId, context, "teardown", () => record.action.teardown?.(cx, context));
        this.logger.debug(`Action removed: ${actionId} @ ${context}`);
    }

    // ========================================================================
    // Notifications
    // ========================================================================

    /**
     * Deliver a published envelope to every instance subscribed to the topic.
     */
    notifyTopic(cx: Context, topicName: string, envelope: TopicEnvelope): void {
        const keys = this.byTopic.get(topicName);
        if (!keys) {
            return;
        }

        for (const key of [...keys]) {
            const record = this.instances.get(key);
            if (record) {
                this.notifyRecord(cx, record, envelope);
            }
        }
    }

    /**
     * Deliver an envelope to the addressed instances.
     *
     * A context target reaches at most one instance.
     */
    notifyTarget(cx: Context, target: ActionTarget, envelope: TopicEnvelope): void {
        switch (target.kind) {
            case "all":
                for (const record of this.liveRecords()) {
                    this.notifyRecord(cx, record, envelope);
                }
                break;

            case "context": {
                const record = this.liveRecords().find((candidate) => candidate.context === target.context);
                if (record) {
                    this.notifyRecord(cx, record, envelope);
                }
                break;
            }

            case "id":
                for (const record of this.liveRecords()) {
                    if (record.actionId === target.actionId) {
                        this.notifyRecord(cx, record, envelope);
                    }
                }
                break;
        }
    }

    // ========================================================================
    // Dispatch
    // ========================================================================

    /**
     * Route an inbound event to the matching hook.
     *
     * Tile events go through {@link ensureReady}; `willDisappear` goes
     * through {@link ensureForTeardown} and then {@link remove}; every other
     * event reaches `onGlobalEvent` on all live instances.
     */
    dispatch(cx: Context, event: InboundEvent): void {
        switch (event.event) {
            case "willAppear": {
                const action = this.ensureReady(cx, event.action, event.context);
                this.invoke(event.action, event.context, event.event, () => action?.willAppear?.(cx, event));
                break;
            }

            case "willDisappear": {
                const action = this.ensureForTeardown(event.action, event.context);
                this.invoke(event.action, event.context, event.event, () => action?.willDisappear?.(cx, event));
                this.remove(cx, event.action, event.context);
                break;
            }

            case "keyDown": {
                const action = this.ensureReady(cx, event.action, event.context);
                this.invoke(event.action, event.context, event.event, () => action?.keyDown?.(cx, event));
                break;
            }

            case "keyUp": {
                const action = this.ensureReady(cx, event.action, event.context);
                this.invoke(event.action, event.context, event.event, () => action?.keyUp?.(cx, event));
                break;
            }

            case "dialDown": {
                const action = this.ensureReady(cx, event.action, event.context);
                this.invoke(event.action, event.context, event.event, () => action?.dialDown?.(cx, event));
                break;
            }

            case "dialUp": {
                const action = this.ensureReady(cx, event.action, event.context);
                this.invoke(event.action, event.context, event.event, () => action?.dialUp?.(cx, event));
                break;
            }

            case "dialRotate": {
                const action = this.ensureReady(cx, event.action, event.context);
                this.invoke(event.action, event.context, event.event, () => action?.dialRotate?.(cx, event));
                break;
            }

            case "touchTap": {
                const action = this.ensureReady(cx, event.action, event.context);
                this.invoke(event.action, event.context, event.event, () => action?.touchTap?.(cx, event));
                break;
            }

            case "titleParametersDidChange": {
                const action = this.ensureReady(cx, event.action, event.context);
                this.invoke(event.action, event.context, event.event, () =>
                    action?.titleParametersDidChange?.(cx, event));
                break;
            }

            case "propertyInspectorDidAppear": {
                const action = this.ensureReady(cx, event.action, event.context);
                this.invoke(event.action, event.context, event.event, () =>
                    action?.propertyInspectorDidAppear?.(cx, event));
                break;
            }

            case "propertyInspectorDidDisappear": {
                const action = this.ensureReady(cx, event.action, event.context);
                this.invoke(event.action, event.context, event.event, () =>
                    action?.propertyInspectorDidDisappear?.(cx, event));
                break;
            }

            case "didReceiveSettings": {
                const action = this.ensureReady(cx, event.action, event.context);
                this.invoke(event.action, event.context, event.event, () => action?.didReceiveSettings?.(cx, event));
                break;
            }

            case "sendToPlugin": {
                const action = this.ensureReady(cx, event.action, event.context);
                this.invoke(event.action, event.context, event.event, () =>
                    action?.didReceivePropertyInspectorMessage?.(cx, event));
                break;
            }

            default:
                for (const record of this.liveRecords()) {
                    this.invoke(record.actionId, record.context, "onGlobalEvent", () =>
                        record.action.onGlobalEvent?.(cx, event));
                }
                break;
        }
    }

    // ========================================================================
    // Introspection
    // ========================================================================

    /** Whether an instance exists for the tile */
    has(actionId: string, context: string): boolean {
        return this.instances.has(instanceKey(actionId, context));
    }

    /** Number of live instances */
    get size(): number {
        return this.instances.size;
    }

    /** Number of instances indexed under a topic */
    subscriberCount(topicName: string): number {
        return this.byTopic.get(topicName)?.length ?? 0;
    }

    /** Registered action ids */
    registeredIds(): string[] {
        return [...this.factories.keys()];
    }

    // ========================================================================
    // Internals
    // ========================================================================

    private construct(actionId: string): Action | undefined {
        const factory = this.factories.get(actionId);
        if (!factory) {
            this.logger.debug(`No action registered for id ${actionId}; ignoring`);
            return undefined;
        }

        try {
            return factory.create();
        }
        catch (error) {
            this.logger.error(`Action factory failed for ${actionId}`, { error: errorMessage(error) });
            return undefined;
        }
    }

    /**
     * Static topic list of a new instance; a throwing `topics` leaves it
     * subscribed to nothing.
     */
    private readTopics(action: Action, actionId: string, context: string): string[] {
        try {
            return [...(action.topics ?? [])];
        }
        catch (error) {
            this.logger.error(`Action topics failed for ${actionId} @ ${context}`, { error: errorMessage(error) });
            return [];
        }
    }

    private liveRecords(): ActionRecord[] {
        return [...this.instances.values()];
    }

    private notifyRecord(cx: Context, record: ActionRecord, envelope: TopicEnvelope): void {
        this.invoke(record.actionId, record.context, "onNotify", () =>
            record.action.onNotify?.(cx, record.context, envelope));
    }

    /**
     * Run a hook, logging a throw or a rejected promise.
     */
    private invoke(actionId: string, context: string, hook: string, call: () => HookResult | undefined): void {
        const failed = (error: unknown): void => {
            this.logger.error(`Action hook ${hook} failed for ${actionId} @ ${context}`, {
                error: errorMessage(error),
            });
        };

        try {
            const result = call();
            if (result instanceof Promise) {
                result.catch(failed);
            }
        }
        catch (error) {
            failed(error);
        }
    }
}
