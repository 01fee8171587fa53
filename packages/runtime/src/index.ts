/**
 * @fileoverview deckhost Runtime
 *
 * Plugin host runtime for hardware control surfaces.
 *
 * The runtime provides:
 * - One event loop per plugin process, fed by a single runtime queue
 * - Per-tile action instances created on demand and torn down with their tile
 * - Background adapters started by policy, name or label
 * - Typed topics for broadcasts and targeted notifications
 *
 * @module @deckhost/runtime
 * @example
 * ```typescript
 * import { Plugin, actionFactory, runPlugin } from "@deckhost/runtime";
 *
 * const plugin = new Plugin()
 *     .addAction(actionFactory("com.example.counter", () => new CounterAction()))
 *     .addAdapter(clockAdapter);
 *
 * await runPlugin(plugin);
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export type {
    Action,
    ActionFactory,
    Adapter,
    AdapterControl,
    AdapterInbox,
    Bus,
    HookEvent,
    HookEventOf,
    HookKind,
    HookListener,
    HookResult,
    HookSubscription,
    LogLevel,
    PayloadSchema,
    RuntimeLogger,
    RuntimeMessage,
    StartPolicy,
    TopicId,
    WireTransport,
} from "./contracts/index.js";
export {
    ActionTarget,
    AdapterError,
    AdapterHandle,
    AdapterTarget,
    LOG_LEVEL_RANK,
    START_POLICIES,
    TopicEnvelope,
    actionFactory,
    adapterPolicy,
    createConsoleLogger,
    defineTopic,
    describeTarget,
    errorMessage,
    isActionFactory,
    isAdapter,
    isLogLevel,
    isStartPolicy,
    logAt,
    scopeLogger,
} from "./contracts/index.js";

// ============================================================================
// Wire protocol exports
// ============================================================================

export type * from "./protocol/index.js";
export { DeckClient, describeInbound, isInboundEventName, parseInbound, serializeOutbound } from "./protocol/index.js";

// ============================================================================
// Context exports
// ============================================================================

export { Context, ExtensionMissingError, Extensions, GlobalSettings } from "./context/index.js";
export type { ContextOptions, ExtensionKey, GlobalSettingsSink } from "./context/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export { AppHooks, AsyncQueue, Emitter } from "./impl/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export {
    ActionManager,
    AdapterManager,
    PluginRuntime,
    type AdapterManagerOptions,
    type RunningAdapterView,
    type RuntimeOptions,
} from "./engine/index.js";

// ============================================================================
// Configuration, transport and assembly exports
// ============================================================================

export {
    ConfigError,
    DEFAULT_RUNTIME_CONFIG,
    LaunchArgError,
    applyEnvOverrides,
    loadRuntimeConfig,
    loadRuntimeConfigWithFallback,
    parseLaunchArgs,
    parseRuntimeConfig,
    wsUrl,
    type LaunchArgErrorCode,
    type LaunchArgs,
    type RuntimeConfig,
} from "./config/index.js";

export { WebSocketTransport, type WebSocketTransportOptions } from "./transport/index.js";

export {
    Plugin,
    PluginLoader,
    runPlugin,
    type LoadedComponents,
    type PluginLoaderConfig,
    type RunPluginOptions,
} from "./plugins/index.js";
