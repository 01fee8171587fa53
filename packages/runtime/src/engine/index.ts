/**
 * @fileoverview Engine barrel exports
 *
 * @module @deckhost/runtime/engine
 */

export { ActionManager } from "./ActionManager.js";
export { AdapterManager } from "./AdapterManager.js";
export type { AdapterManagerOptions, RunningAdapterView } from "./AdapterManager.js";
export { PluginRuntime } from "./PluginRuntime.js";
export type { RuntimeOptions } from "./PluginRuntime.js";
