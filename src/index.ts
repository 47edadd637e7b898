export { RouterClient } from "./router/client.js";
export type { RouterClientDeps } from "./router/client.js";
export { DeviceReconciler, sortDevices } from "./router/devices.js";
export type { DeviceReconcilerOptions } from "./router/devices.js";
export { CacheEntry, TransferCounters, CACHE_TIME_SECONDS_DEFAULT } from "./router/counters.js";
export type { TransferCountersOptions } from "./router/counters.js";
export { formatBytes, formatRates } from "./router/format.js";
export * from "./router/parsers.js";
export * from "./transport/index.js";
export { loadAgentConfig, parseRouterClientOptions, routerClientOptionsSchema } from "./config.js";
export type { AgentConfig, RouterClientInput } from "./config.js";
export { pollOnce, runPollLoop } from "./poller.js";
export type { PollLoopOptions } from "./poller.js";
export { ConfigError, TransportError } from "./errors.js";
export type {
  ByteTotals,
  CounterSnapshot,
  Device,
  DeviceTable,
  ParsedRecord,
  PollReport,
  RouterClientOptions,
  RouterMode,
  RouterProtocol,
  TransferRates,
} from "./types.js";
