export { createAppWatcherAdapter } from "./AppWatcherAdapter.js";
export { createClockAdapter, type ClockAdapterConfig } from "./ClockAdapter.js";
