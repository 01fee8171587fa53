/**
 * @fileoverview Plugin Loader
 *
 * Loads action factories and adapters from compiled code files
 * (`.js` / `.mjs`) in a directory, so a plugin can pick up drop-in
 * extensions without being rebuilt.
 *
 * @module @deckhost/runtime/plugins/PluginLoader
 */

import { existsSync, readdirSync, statSync } from "fs";
import { extname, join, resolve } from "path";
import { pathToFileURL } from "url";
import { isActionFactory, type ActionFactory } from "../contracts/Action.js";
import { isAdapter, type Adapter } from "../contracts/Adapter.js";
import { createConsoleLogger, errorMessage, type RuntimeLogger } from "../contracts/Logger.js";

/**
 * Loaded components.
 */
export interface LoadedComponents {
    actions: ActionFactory[];
    adapters: Adapter[];
}

export interface PluginLoaderConfig {
    /** Logger for plugin loading */
    logger?: RuntimeLogger;
}

/**
 * Plugin Loader
 *
 * Every named export, the default export, and every item of a default
 * array export is checked; values that look like an {@link ActionFactory}
 * or an {@link Adapter} are collected.
 *
 * @example
 * ```typescript
 * const loader = new PluginLoader();
 * const loaded = await loader.loadFromDirectory("./extensions");
 *
 * plugin.addActions(loaded.actions).addAdapters(loaded.adapters);
 * ```
 */
export class PluginLoader {
    private readonly logger: RuntimeLogger;

    constructor(config: PluginLoaderConfig = {}) {
        this.logger = config.logger ?? createConsoleLogger("PluginLoader");
    }

    /**
     * Load every code file in a directory (not recursive). Files that
     * fail to import are logged and skipped.
     */
    async loadFromDirectory(dirPath: string): Promise<LoadedComponents> {
        const result: LoadedComponents = { actions: [], adapters: [] };

        if (!existsSync(dirPath)) {
            this.logger.warn("Plugin directory does not exist", { dirPath });
            return result;
        }

        if (!statSync(dirPath).isDirectory()) {
            this.logger.warn("Plugin path is not a directory", { dirPath });
            return result;
        }

        const files = readdirSync(dirPath).sort();

        for (const file of files) {
            const ext = extname(file).toLowerCase();
            if (ext !== ".js" && ext !== ".mjs") {
                continue;
            }

            const filePath = join(dirPath, file);
            try {
                const loaded = await this.loadCodeFile(filePath);
                result.actions.push(...loaded.actions);
                result.adapters.push(...loaded.adapters);
            }
            catch (error) {
                this.logger.error("Failed to load plugin file", {
                    filePath,
                    error: errorMessage(error),
                });
            }
        }

        this.logger.info("Plugins loaded from directory", {
            dirPath,
            actions : result.actions.length,
            adapters: result.adapters.length,
        });

        return result;
    }

    /**
     * Import one code file and collect its components.
     */
    async loadCodeFile(filePath: string): Promise<LoadedComponents> {
        const result: LoadedComponents = { actions: [], adapters: [] };

        const module: Record<string, unknown> = await import(pathToFileURL(resolve(filePath)).href);

        for (const [key, exported] of Object.entries(module)) {
            const candidates = key === "default" && Array.isArray(exported) ? exported : [exported];
            for (const candidate of candidates) {
                this.collect(candidate, key, result);
            }
        }

        return result;
    }

    /**
     * Load from several directories, in order.
     */
    async loadFromDirectories(dirPaths: readonly string[]): Promise<LoadedComponents> {
        const result: LoadedComponents = { actions: [], adapters: [] };

        for (const dirPath of dirPaths) {
            const loaded = await this.loadFromDirectory(dirPath);
            result.actions.push(...loaded.actions);
            result.adapters.push(...loaded.adapters);
        }

        return result;
    }

    private collect(candidate: unknown, exportName: string, result: LoadedComponents): void {
        if (isAdapter(candidate)) {
            result.adapters.push(candidate);
            this.logger.debug("Loaded adapter", { name: candidate.name, export: exportName });
        }
        else if (isActionFactory(candidate)) {
            result.actions.push(candidate);
            this.logger.debug("Loaded action", { id: candidate.id, export: exportName });
        }
    }
}
