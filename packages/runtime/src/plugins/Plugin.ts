/**
 * @fileoverview Plugin Assembly
 *
 * Collects what a plugin is made of (action factories, adapters, hooks and
 * extensions) before handing it to the runtime.
 *
 * @module @deckhost/runtime/plugins/Plugin
 */

import type { ActionFactory } from "../contracts/Action.js";
import type { Adapter } from "../contracts/Adapter.js";
import { Extensions, type ExtensionKey } from "../context/Extensions.js";
import { AppHooks } from "../impl/AppHooks.js";

/**
 * Chainable plugin builder.
 *
 * @example
 * ```typescript
 * const plugin = new Plugin()
 *     .addAction(actionFactory("com.example.counter", () => new CounterAction()))
 *     .addAdapter(clockAdapter)
 *     .provide(new CounterStore());
 *
 * await runPlugin(plugin);
 * ```
 */
export class Plugin {
    private readonly actionFactories = new Map<string, ActionFactory>();
    private readonly adapterList: Adapter[] = [];
    private appHooks = new AppHooks();

    /** Shared state handed to every Context */
    readonly extensions = new Extensions();

    /**
     * Register an action factory.
     *
     * @throws Error if an action with the same id is already registered
     */
    addAction(factory: ActionFactory): this {
        if (this.actionFactories.has(factory.id)) {
            throw new Error(`Action already registered: ${factory.id}`);
        }
        this.actionFactories.set(factory.id, factory);
        return this;
    }

    addActions(factories: Iterable<ActionFactory>): this {
        for (const factory of factories) {
            this.addAction(factory);
        }
        return this;
    }

    /**
     * Register an adapter.
     *
     * @throws Error if an adapter with the same name is already registered
     */
    addAdapter(adapter: Adapter): this {
        if (this.adapterList.some((existing) => existing.name === adapter.name)) {
            throw new Error(`Adapter already registered: ${adapter.name}`);
        }
        this.adapterList.push(adapter);
        return this;
    }

    addAdapters(adapters: Iterable<Adapter>): this {
        for (const adapter of adapters) {
            this.addAdapter(adapter);
        }
        return this;
    }

    /**
     * Register a typed extension.
     */
    provide<T extends object>(value: T, key?: ExtensionKey<T>): this {
        this.extensions.provide(value, key);
        return this;
    }

    /**
     * Replace the hook registry.
     */
    setHooks(hooks: AppHooks): this {
        this.appHooks = hooks;
        return this;
    }

    get actions(): readonly ActionFactory[] {
        return [...this.actionFactories.values()];
    }

    get adapters(): readonly Adapter[] {
        return [...this.adapterList];
    }

    get hooks(): AppHooks {
        return this.appHooks;
    }
}
