/**
 * @fileoverview Extensions Registry
 *
 * Plugin-specific shared state (stores, API clients, caches) keyed by
 * class. Provide once at assembly time; fetch anywhere through the Context.
 *
 * @module @deckhost/runtime/context/Extensions
 *
 * @example
 * ```typescript
 * class TemplateStore { ... }
 *
 * extensions.provide(new TemplateStore());
 * const store = cx.extensions.require(TemplateStore);
 * ```
 */

/**
 * Constructor used as the registry key.
 */
export type ExtensionKey<T> = abstract new (...args: never[]) => T;

export class ExtensionMissingError extends Error {
    constructor(public readonly extension: string) {
        super(`Missing required extension ${extension}`);
        this.name = "ExtensionMissingError";
    }
}

export class Extensions {
    private readonly values = new Map<unknown, unknown>();

    /**
     * Register a value under its own class (or under `key` when given,
     * e.g. an abstract base class). Replaces any earlier value.
     */
    provide<T extends object>(value: T, key?: ExtensionKey<T>): this {
        const registeredKey = key ?? value.constructor;
        if (typeof registeredKey !== "function") {
            throw new TypeError("Extension value has no constructor; pass an explicit key");
        }
        this.values.set(registeredKey, value);
        return this;
    }

    /**
     * Fetch the value registered for a class.
     */
    get<T>(key: ExtensionKey<T>): T | undefined {
        const value = this.values.get(key);
        return value instanceof key ? value : undefined;
    }

    /**
     * Fetch the value registered for a class.
     *
     * @throws ExtensionMissingError if none is registered
     */
    require<T>(key: ExtensionKey<T>): T {
        const value = this.get(key);
        if (value === undefined) {
            throw new ExtensionMissingError(key.name);
        }
        return value;
    }

    has(key: ExtensionKey<unknown>): boolean {
        return this.values.has(key);
    }
}
