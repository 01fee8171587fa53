/**
 * @fileoverview Global Settings Cache
 *
 * Plugin-wide settings mirrored from the controller application. Every
 * mutation pushes the full new snapshot back; only {@link GlobalSettings.hydrate}
 * writes without pushing (it applies a snapshot the controller sent).
 *
 * Mutations run against a copy. If the mutation throws, the error is
 * logged, the cache keeps its previous state and nothing is pushed.
 *
 * @module @deckhost/runtime/context/GlobalSettings
 */

import { errorMessage, type RuntimeLogger } from "../contracts/Logger.js";
import type { JsonObject } from "../protocol/inbound.js";

/**
 * Where pushes go; normally the {@link DeckClient}.
 */
export interface GlobalSettingsSink {
    setGlobalSettings(settings: JsonObject): void;
}

export class GlobalSettings {
    private map: JsonObject = {};

    constructor(
        private readonly sink: GlobalSettingsSink,
        private readonly logger: RuntimeLogger,
    ) {}

    /**
     * Replace the cache with a snapshot from the controller (no push).
     */
    hydrate(snapshot: JsonObject): void {
        this.map = { ...snapshot };
    }

    // ------------------------------------------------------------------------
    // Reads
    // ------------------------------------------------------------------------

    /** Copy of every setting */
    snapshot(): JsonObject {
        return { ...this.map };
    }

    get(key: string): unknown {
        return Object.prototype.hasOwnProperty.call(this.map, key) ? this.map[key] : undefined;
    }

    /**
     * Values for the given keys; absent keys are left out.
     */
    getMany(keys: readonly string[]): JsonObject {
        const out: JsonObject = {};
        for (const key of keys) {
            if (Object.prototype.hasOwnProperty.call(this.map, key)) {
                out[key] = this.map[key];
            }
        }
        return out;
    }

    has(key: string): boolean {
        return Object.prototype.hasOwnProperty.call(this.map, key);
    }

    // ------------------------------------------------------------------------
    // Writes (each pushes once)
    // ------------------------------------------------------------------------

    replace(settings: JsonObject): void {
        this.mutate("replace", (draft) => {
            for (const key of Object.keys(draft)) {
                delete draft[key];
            }
            Object.assign(draft, settings);
        });
    }

    set(key: string, value: unknown): void {
        this.mutate("set", (draft) => {
            draft[key] = value;
        });
    }

    setMany(entries: JsonObject): void {
        this.mutate("setMany", (draft) => {
            Object.assign(draft, entries);
        });
    }

    delete(key: string): void {
        this.mutate("delete", (draft) => {
            delete draft[key];
        });
    }

    deleteMany(keys: readonly string[]): void {
        this.mutate("deleteMany", (draft) => {
            for (const key of keys) {
                delete draft[key];
            }
        });
    }

    /** Clear everything (pushes an empty object) */
    deleteAll(): void {
        this.mutate("deleteAll", (draft) => {
            for (const key of Object.keys(draft)) {
                delete draft[key];
            }
        });
    }

    /**
     * Batch-edit the settings and push once.
     *
     * @returns The editor's return value, or undefined if it threw
     */
    update<R>(editor: (draft: JsonObject) => R): R | undefined {
        return this.mutate("update", editor);
    }

    private mutate<R>(operation: string, editor: (draft: JsonObject) => R): R | undefined {
        const draft: JsonObject = { ...this.map };
        let result: R;
        try {
            result = editor(draft);
        }
        catch (error) {
            this.logger.error(`Global settings ${operation} failed; keeping previous state`, {
                error: errorMessage(error),
            });
            return undefined;
        }

        this.map = draft;
        this.sink.setGlobalSettings({ ...draft });
        return result;
    }
}
