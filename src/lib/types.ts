import type { CacheError } from "./errors";

export type InstanceStatus = "running" | "stopped" | "starting" | "stopping" | "error" | "unknown";

export interface InstanceSnapshot {
  index: number;
  name: string;
  status: InstanceStatus;
  cpuUsage: number;
  memoryUsage: number;
  diskUsageText: string;
  diskSizeBytes: number;
  path: string;
  version: string;
  running: boolean;
  observedAt: number;
}

export type SnapshotField = keyof InstanceSnapshot;

export interface StoreEntry {
  snapshot: InstanceSnapshot;
  lastUpdated: number;
}

export type SnapshotMap = ReadonlyMap<number, InstanceSnapshot>;

export interface DiffResult {
  added: ReadonlyMap<number, InstanceSnapshot>;
  removed: ReadonlySet<number>;
  modified: ReadonlyMap<number, ReadonlySet<SnapshotField>>;
}

export interface SnapshotSource {
  fetchAll(): Promise<InstanceSnapshot[]>;
  fetchOne(index: number): Promise<InstanceSnapshot>;
}

export interface RefreshState {
  intervalMs: number;
  enabled: boolean;
  inFlight: boolean;
  lastAttempt?: number;
  lastSuccess?: number;
  lastFailure?: number;
}

export type RefreshOutcome =
  | { success: true; message: string; diff: DiffResult }
  | { success: false; message: string; error: CacheError };

export type RefreshScope = "all" | number;

export interface RefreshFailure {
  scope: RefreshScope;
  error: CacheError;
  at: number;
}

export interface RefreshStats {
  cycles: number;
  successes: number;
  failures: number;
  rejected: number;
  lastDurationMs?: number;
  averageDurationMs: number;
}

export interface CacheStats extends RefreshStats {
  cacheHits: number;
  cacheMisses: number;
  size: number;
}
