export { InstanceCache } from "./services/instance-cache";
export type { InstanceCacheOptions } from "./services/instance-cache";
export { InstanceStore, indexSnapshots } from "./lib/store";
export type { StoreLookup, StoreView } from "./lib/store";
export { diffSnapshots, changedFields, diffToJSON, isEmptyDiff, summarizeDiff } from "./lib/diff";
export { RefreshScheduler, withTimeout } from "./lib/scheduler";
export { NotificationHub } from "./lib/notifications";
export type { Listener } from "./lib/notifications";
export { FileSnapshotSource, parseSnapshotDocument, parseSnapshotRecord } from "./lib/file-source";
export { CacheError, CliError } from "./lib/errors";
export { loadConfig, resolveConfig, DEFAULT_CONFIG } from "./lib/config";
export type { CacheConfig } from "./lib/config";
export { createLogger, silentLogger } from "./lib/logger";
export type { Logger, LogLevel } from "./lib/logger";
export * from "./lib/constants";
export * from "./lib/types";
