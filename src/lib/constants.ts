import type { SnapshotField } from "./types";

export const CLI_NAME = "slotcache";

export const DEFAULT_REFRESH_INTERVAL_MS = 3000;
export const MIN_REFRESH_INTERVAL_MS = 1000;
export const MAX_REFRESH_INTERVAL_MS = 10_000;

export const DEFAULT_MAX_AGE_SECONDS = 30;
export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

// Fields left out here (diskSizeBytes, path, version, observedAt) are still stored on every
// refresh; they just never raise a change notification on their own.
export const DEFAULT_SIGNIFICANT_FIELDS: readonly SnapshotField[] = [
  "name",
  "status",
  "cpuUsage",
  "memoryUsage",
  "diskUsageText",
  "running"
];

export const SNAPSHOT_FIELDS: readonly SnapshotField[] = [
  "index",
  "name",
  "status",
  "cpuUsage",
  "memoryUsage",
  "diskUsageText",
  "diskSizeBytes",
  "path",
  "version",
  "running",
  "observedAt"
];

export const CONFIG_DIR_NAME = ".slotcache";
export const CONFIG_FILE_NAME = "config.json";
export const ENV_PREFIX = "SLOTCACHE_";
