/**
 * @fileoverview Contract barrel exports
 *
 * Interfaces and types shared by the runtime, actions and adapters.
 *
 * @module @deckhost/runtime/contracts
 */

// Action contract
export type { Action, ActionFactory, HookResult } from "./Action.js";
export { actionFactory, isActionFactory } from "./Action.js";

// Adapter contract
export type { Adapter, AdapterInbox } from "./Adapter.js";
export { AdapterError, AdapterHandle, adapterPolicy, isAdapter } from "./Adapter.js";

// Bus contract
export type { Bus } from "./Bus.js";

// App hooks contract
export type {
    HookEvent,
    HookEventOf,
    HookKind,
    HookListener,
    HookSubscription,
} from "./Hooks.js";

// Logger contract
export type { LogLevel, RuntimeLogger } from "./Logger.js";
export {
    LOG_LEVEL_RANK,
    createConsoleLogger,
    errorMessage,
    isLogLevel,
    logAt,
    scopeLogger,
} from "./Logger.js";

// Runtime queue messages
export type { RuntimeMessage } from "./RuntimeMessage.js";

// Addressing
export type { AdapterControl, StartPolicy } from "./Targets.js";
export { ActionTarget, AdapterTarget, START_POLICIES, describeTarget, isStartPolicy } from "./Targets.js";

// Topics
export type { PayloadSchema, TopicId } from "./Topic.js";
export { TopicEnvelope, defineTopic } from "./Topic.js";

// Transport contract
export type { WireTransport } from "./Transport.js";
