/**
 * @fileoverview Transport barrel exports
 *
 * @module @deckhost/runtime/transport
 */

export { WebSocketTransport } from "./WebSocketTransport.js";
export type { WebSocketTransportOptions } from "./WebSocketTransport.js";
