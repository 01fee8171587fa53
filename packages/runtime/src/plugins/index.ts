/**
 * @fileoverview Plugin assembly barrel exports
 *
 * @module @deckhost/runtime/plugins
 */

export { Plugin } from "./Plugin.js";
export {
    PluginLoader,
    type LoadedComponents,
    type PluginLoaderConfig,
} from "./PluginLoader.js";
export { runPlugin, type RunPluginOptions } from "./runPlugin.js";
