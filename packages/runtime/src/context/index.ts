/**
 * @fileoverview Context barrel exports
 *
 * @module @deckhost/runtime/context
 */

export { Context } from "./Context.js";
export type { ContextOptions } from "./Context.js";
export { GlobalSettings } from "./GlobalSettings.js";
export type { GlobalSettingsSink } from "./GlobalSettings.js";
export { Extensions, ExtensionMissingError } from "./Extensions.js";
export type { ExtensionKey } from "./Extensions.js";
