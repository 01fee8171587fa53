/**
 * @fileoverview Adapter Lifecycle Manager
 *
 * Starts and stops registered adapters by policy, name, topic or label,
 * forwards notifications to their inboxes, and tracks application presence
 * to run "onAppLaunch" adapters only while a watched application is up.
 *
 * Only the event loop calls into this class.
 *
 * @module @deckhost/runtime/engine/AdapterManager
 */

import { adapterPolicy, type Adapter, type AdapterHandle } from "../contracts/Adapter.js";
import type { Bus } from "../contracts/Bus.js";
import { errorMessage, type RuntimeLogger } from "../contracts/Logger.js";
import type { AdapterTarget, StartPolicy } from "../contracts/Targets.js";
import type { TopicEnvelope } from "../contracts/Topic.js";
import type { Context } from "../context/Context.js";
import { AsyncQueue } from "../impl/AsyncQueue.js";

export interface AdapterManagerOptions {
    /** Delay between the last application terminating and the stop (default 250) */
    readonly appStopDebounceMs?: number;

    /** How long `shutdown` waits for adapter tasks to finish (default 1000) */
    readonly joinTimeoutMs?: number;

    /** Per-adapter inbox capacity (default unbounded) */
    readonly inboxCapacity?: number;

    /** Clock in milliseconds (default `Date.now`) */
    readonly now?: () => number;
}

interface RunningAdapter {
    readonly name: string;
    readonly policy: StartPolicy;
    readonly topics: readonly string[];
    readonly labels: readonly string[];
    readonly inbox: AsyncQueue<TopicEnvelope>;
    readonly handle: AdapterHandle;

    /** Settles (never rejects) when the adapter's task has finished */
    finished?: Promise<void>;
    settled: boolean;
}

function addIndex(index: Map<string, number[]>, key: string, position: number): void {
    const positions = index.get(key);
    if (positions) {
        positions.push(position);
    }
    else {
        index.set(key, [position]);
    }
}

export class AdapterManager {
    private readonly registry: readonly Adapter[];
    private running: RunningAdapter[] = [];
    private byName = new Map<string, number[]>();
    private byTopic = new Map<string, number[]>();
    private byLabel = new Map<string, number[]>();
    private stopped: RunningAdapter[] = [];

    private appsUp = 0;
    private appStopDue: number | undefined;
    private terminated = false;

    private readonly appStopDebounceMs: number;
    private readonly joinTimeoutMs: number;
    private readonly inboxCapacity: number;
    private readonly now: () => number;

    constructor(
        adapters: Iterable<Adapter>,
        private readonly bus: Bus,
        private readonly logger: RuntimeLogger,
        options: AdapterManagerOptions = {},
    ) {
        this.registry = [...adapters];
        this.appStopDebounceMs = options.appStopDebounceMs ?? 250;
        this.joinTimeoutMs = options.joinTimeoutMs ?? 1000;
        this.inboxCapacity = options.inboxCapacity ?? Number.POSITIVE_INFINITY;
        this.now = options.now ?? (() => Date.now());
    }

    // ========================================================================
    // Core start / stop
    // ========================================================================

    /**
     * Start every registered adapter matching the predicate that is not
     * already running under its name.
     */
    startWhere(cx: Context, predicate: (adapter: Adapter) => boolean): void {
        if (!this.live("start")) {
            return;
        }

        for (const adapter of this.registry.filter(predicate)) {
            if (!this.isRunning(adapter.name)) {
                this.startAdapter(cx, adapter);
            }
        }
    }

    /**
     * Stop every running adapter for which `keep` returns false, then
     * rebuild the indices from the survivors.
     */
    stopWhere(keep: (adapter: RunningAdapterView) => boolean): void {
        if (!this.live("stop")) {
            return;
        }
        this.stopRecords(keep);
    }

    // ========================================================================
    // Control API
    // ========================================================================

    startAll(cx: Context): void {
        this.startWhere(cx, () => true);
    }

    stopAll(): void {
        this.stopWhere(() => false);
    }

    restartAll(cx: Context): void {
        this.stopAll();
        this.startAll(cx);
    }

    startByPolicy(cx: Context, policy: StartPolicy): void {
        this.startWhere(cx, (adapter) => adapterPolicy(adapter) === policy);
    }

    stopByPolicy(policy: StartPolicy): void {
        this.stopWhere((running) => running.policy !== policy);
    }

    restartByPolicy(cx: Context, policy: StartPolicy): void {
        this.stopByPolicy(policy);
        this.startByPolicy(cx, policy);
    }

    startByName(cx: Context, name: string): void {
        this.startWhere(cx, (adapter) => adapter.name === name);
    }

    stopByName(name: string): void {
        this.stopWhere((running) => running.name !== name);
    }

    restartByName(cx: Context, name: string): void {
        this.stopByName(name);
        this.startByName(cx, name);
    }

    startByTopic(cx: Context, topic: string): void {
        this.startWhere(cx, (adapter) => (adapter.topics ?? []).includes(topic));
    }

    stopByTopic(topic: string): void {
        this.stopWhere((running) => !running.topics.includes(topic));
    }

    restartByTopic(cx: Context, topic: string): void {
        this.stopByTopic(topic);
        this.startByTopic(cx, topic);
    }

    startByLabel(cx: Context, label: string): void {
        this.startWhere(cx, (adapter) => (adapter.labels ?? []).includes(label));
    }

    stopByLabel(label: string): void {
        this.stopWhere((running) => !running.labels.includes(label));
    }

    restartByLabel(cx: Context, label: string): void {
        this.stopByLabel(label);
        this.startByLabel(cx, label);
    }

    startTarget(cx: Context, target: AdapterTarget): void {
        switch (target.kind) {
            case "all":
                return this.startAll(cx);
            case "policy":
                return this.startByPolicy(cx, target.policy);
            case "name":
                return this.startByName(cx, target.name);
            case "label":
                return this.startByLabel(cx, target.label);
        }
    }

    stopTarget(target: AdapterTarget): void {
        switch (target.kind) {
            case "all":
                return this.stopAll();
            case "policy":
                return this.stopByPolicy(target.policy);
            case "name":
                return this.stopByName(target.name);
            case "label":
                return this.stopByLabel(target.label);
        }
    }

    restartTarget(cx: Context, target: AdapterTarget): void {
        this.stopTarget(target);
        this.startTarget(cx, target);
    }

    // ========================================================================
    // Notifications
    // ========================================================================

    /**
     * Push an envelope into the inbox of every addressed adapter.
     */
    notifyTarget(target: AdapterTarget, envelope: TopicEnvelope): void {
        if (!this.live("notify")) {
            return;
        }

        switch (target.kind) {
            case "all":
                this.running.forEach((running) => this.deliver(running, envelope));
                break;
            case "policy":
                this.running
                    .filter((running) => running.policy === target.policy)
                    .forEach((running) => this.deliver(running, envelope));
                break;
            case "name":
                this.deliverIndexed(this.byName.get(target.name), envelope);
                break;
            case "label":
                this.deliverIndexed(this.byLabel.get(target.label), envelope);
                break;
        }
    }

    /**
     * Push a published envelope to every adapter subscribed to the topic.
     */
    notifyTopic(topicName: string, envelope: TopicEnvelope): void {
        if (!this.live("notify")) {
            return;
        }
        this.deliverIndexed(this.byTopic.get(topicName), envelope);
    }

    // ========================================================================
    // Application presence
    // ========================================================================

    /**
     * A watched application launched. The first one starts the
     * "onAppLaunch" adapters; any launch cancels a pending stop.
     */
    onAppLaunch(cx: Context): void {
        if (!this.live("onAppLaunch")) {
            return;
        }

        const wasZero = this.appsUp === 0;
        this.appsUp += 1;
        this.appStopDue = undefined;

        if (wasZero) {
            this.startByPolicy(cx, "onAppLaunch");
        }
    }

    /**
     * A watched application terminated. When none are left, the
     * "onAppLaunch" adapters are stopped after the debounce delay.
     */
    onAppTerminate(): void {
        if (!this.live("onAppTerminate")) {
            return;
        }

        if (this.appsUp > 0) {
            this.appsUp -= 1;
        }
        if (this.appsUp === 0) {
            this.appStopDue = this.now() + this.appStopDebounceMs;
            this.logger.debug(`Scheduling stop of onAppLaunch adapters in ${this.appStopDebounceMs}ms`);
        }
    }

    /**
     * Run deferred work. Called by the event loop on idle turns.
     */
    tick(): void {
        if (this.terminated || this.appStopDue === undefined) {
            return;
        }

        if (this.now() >= this.appStopDue && this.appsUp === 0) {
            this.appStopDue = undefined;
            this.stopByPolicy("onAppLaunch");
            this.logger.debug("onAppLaunch adapters stopped (no applications left)");
        }
    }

    // ========================================================================
    // Shutdown
    // ========================================================================

    /**
     * Stop every adapter and wait (bounded) for their tasks to finish.
     * Terminal: later calls are ignored with a warning.
     */
    async shutdown(): Promise<void> {
        if (!this.live("shutdown")) {
            return;
        }
        this.terminated = true;
        this.appStopDue = undefined;

        this.stopRecords(() => false);
        await this.joinPending();
    }

    // ========================================================================
    // Introspection
    // ========================================================================

    isRunning(name: string): boolean {
        return (this.byName.get(name)?.length ?? 0) > 0;
    }

    /** Names of running adapters, in start order */
    runningNames(): string[] {
        return this.running.map((running) => running.name);
    }

    /** Number of watched applications currently up */
    get applicationsUp(): number {
        return this.appsUp;
    }

    /** Whether a debounced stop is scheduled */
    get stopPending(): boolean {
        return this.appStopDue !== undefined;
    }

    get isTerminated(): boolean {
        return this.terminated;
    }

    // ========================================================================
    // Internals
    // ========================================================================

    private live(operation: string): boolean {
        if (this.terminated) {
            this.logger.warn(`Adapter manager is shut down; ignoring ${operation}`);
            return false;
        }
        return true;
    }

    private startAdapter(cx: Context, adapter: Adapter): void {
        const inbox = new AsyncQueue<TopicEnvelope>(this.inboxCapacity);

        let handle: AdapterHandle;
        try {
            handle = adapter.start(cx, this.bus, inbox);
        }
        catch (error) {
            inbox.close();
            this.logger.error(`Failed to start adapter ${adapter.name}: ${errorMessage(error)}`);
            return;
        }

        const record: RunningAdapter = {
            name   : adapter.name,
            policy : adapterPolicy(adapter),
            topics : [...(adapter.topics ?? [])],
            labels : [...(adapter.labels ?? [])],
            inbox,
            handle,
            settled: handle.done === undefined,
        };
        record.finished = handle.done?.then(
            () => {
                record.settled = true;
            },
            (error: unknown) => {
                record.settled = true;
                this.logger.error(`Adapter ${adapter.name} task failed: ${errorMessage(error)}`);
            },
        );

        this.running.push(record);
        this.index(record, this.running.length - 1);
        this.logger.debug(`Started adapter: ${adapter.name}`);
    }

    private stopRecords(keep: (adapter: RunningAdapterView) => boolean): void {
        const previous = this.running;
        this.running = [];
        this.byName = new Map();
        this.byTopic = new Map();
        this.byLabel = new Map();

        for (const record of previous) {
            if (keep(record)) {
                this.running.push(record);
                this.index(record, this.running.length - 1);
                continue;
            }

            try {
                record.handle.shutdown();
            }
            catch (error) {
                this.logger.error(`Adapter ${record.name} shutdown failed: ${errorMessage(error)}`);
            }
            record.inbox.close();

            if (!record.settled) {
                this.stopped = this.stopped.filter((earlier) => !earlier.settled);
                this.stopped.push(record);
            }

            this.logger.debug(`Stopped adapter: ${record.name}`);
        }
    }

    private index(record: RunningAdapter, position: number): void {
        addIndex(this.byName, record.name, position);
        for (const topic of new Set(record.topics)) {
            addIndex(this.byTopic, topic, position);
        }
        for (const label of new Set(record.labels)) {
            addIndex(this.byLabel, label, position);
        }
    }

    private deliverIndexed(positions: readonly number[] | undefined, envelope: TopicEnvelope): void {
        for (const position of positions ?? []) {
            const record = this.running[position];
            if (record) {
                this.deliver(record, envelope);
            }
        }
    }

    private deliver(record: RunningAdapter, envelope: TopicEnvelope): void {
        if (!record.inbox.push(envelope)) {
            this.logger.debug(`Adapter ${record.name} inbox full or closed; dropped ${envelope.name}`);
        }
    }

    private async joinPending(): Promise<void> {
        const pending = this.stopped.filter((record) => !record.settled);
        this.stopped = [];
        if (pending.length === 0) {
            return;
        }

        let timer: NodeJS.Timeout | undefined;
        const timedOut = new Promise<void>((resolve) => {
            timer = setTimeout(resolve, this.joinTimeoutMs);
        });

        await Promise.race([Promise.all(pending.map((record) => record.finished)), timedOut]);
        clearTimeout(timer);

        const stillRunning = pending.filter((record) => !record.settled);
        if (stillRunning.length > 0) {
            this.logger.warn(
                `Adapter task(s) still running after ${this.joinTimeoutMs}ms: ${stillRunning.map((r) => r.name).join(", ")}`,
            );
        }
    }
}

/**
 * Read-only view of a running adapter, as seen by `stopWhere` predicates.
 */
export interface RunningAdapterView {
    readonly name: string;
    readonly policy: StartPolicy;
    readonly topics: readonly string[];
    readonly labels: readonly string[];
}
