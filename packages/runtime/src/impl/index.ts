/**
 * @fileoverview Implementation barrel exports
 *
 * @module @deckhost/runtime/impl
 */

export { AppHooks } from "./AppHooks.js";
export { AsyncQueue } from "./AsyncQueue.js";
export { Emitter } from "./Emitter.js";
