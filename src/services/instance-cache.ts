import { DEFAULT_MAX_AGE_SECONDS } from "../lib/constants";
import type { Logger } from "../lib/logger";
import { silentLogger } from "../lib/logger";
import type { Listener } from "../lib/notifications";
import { NotificationHub } from "../lib/notifications";
import { RefreshScheduler } from "../lib/scheduler";
import type { StoreLookup } from "../lib/store";
import { InstanceStore } from "../lib/store";
import type {
  CacheStats,
  DiffResult,
  InstanceSnapshot,
  RefreshFailure,
  RefreshOutcome,
  RefreshState,
  SnapshotField,
  SnapshotMap,
  SnapshotSource
} from "../lib/types";

export interface InstanceCacheOptions {
  source: SnapshotSource;
  refreshIntervalMs?: number;
  maxAgeSeconds?: number;
  fetchTimeoutMs?: number;
  significantFields?: readonly SnapshotField[];
  logger?: Logger;
  now?: () => number;
}

/**
 * Instance state cache for one managed executable. Construct one per session and hand it to
 * the consumers that render instance state.
 */
export class InstanceCache {
  private readonly store: InstanceStore;
  private readonly scheduler: RefreshScheduler;
  private readonly changes: NotificationHub<DiffResult>;
  private readonly failures: NotificationHub<RefreshFailure>;
  private readonly maxAgeSeconds: number;
  private readonly logger: Logger;
  private cacheHits = 0;
  private cacheMisses = 0;

  constructor(options: InstanceCacheOptions) {
    this.logger = options.logger ?? silentLogger;
    this.maxAgeSeconds = options.maxAgeSeconds ?? DEFAULT_MAX_AGE_SECONDS;
    this.store = new InstanceStore(options.now);
    this.changes = new NotificationHub<DiffResult>("change", this.logger);
    this.failures = new NotificationHub<RefreshFailure>("failure", this.logger);
    this.scheduler = new RefreshScheduler({
      source: options.source,
      store: this.store,
      changes: this.changes,
      failures: this.failures,
      intervalMs: options.refreshIntervalMs,
      fetchTimeoutMs: options.fetchTimeoutMs,
      significantFields: options.significantFields,
      logger: this.logger,
      now: options.now
    });
  }

  /** Store lookup only; never reaches the snapshot source. */
  peek(index: number, maxAgeSeconds = this.maxAgeSeconds): StoreLookup {
    return this.store.get(index, maxAgeSeconds);
  }

  /**
   * Cache-preferring read of one instance. A missing or stale entry triggers a single-instance
   * refresh (joining a cycle already in flight); if that fails the last stored value, if any,
   * is returned.
   */
  async get(index: number, maxAgeSeconds = this.maxAgeSeconds): Promise<InstanceSnapshot | undefined> {
    const lookup = this.store.get(index, maxAgeSeconds);
    if (lookup.found) {
      this.cacheHits += 1;
      return lookup.snapshot;
    }

    this.cacheMisses += 1;
    await this.scheduler.refreshOneJoining(index);
    return this.store.peek(index);
  }

  /** Cache-preferring read of every instance; stale data is served when the refresh fails. */
  async getAll(maxAgeSeconds = this.maxAgeSeconds): Promise<SnapshotMap> {
    const view = this.store.getAll(maxAgeSeconds);
    if (view.fresh) {
      this.cacheHits += 1;
      return view.snapshots;
    }

    this.cacheMisses += 1;
    await this.scheduler.refreshAllJoining();
    return this.store.snapshots();
  }

  /** Bypasses the freshness check. Throws the source failure instead of serving stale data. */
  async getAllFresh(): Promise<SnapshotMap> {
    const outcome = await this.scheduler.refreshAllJoining();
    if (!outcome.success) {
      throw outcome.error;
    }
    return this.store.snapshots();
  }

  refresh(): Promise<RefreshOutcome> {
    return this.scheduler.triggerManual();
  }

  refreshOne(index: number): Promise<RefreshOutcome> {
    return this.scheduler.refreshOne(index);
  }

  clear(): void {
    this.store.clear();
    this.logger.debug("Cache cleared");
  }

  startAutoRefresh(intervalMs?: number): void {
    this.scheduler.start(intervalMs);
  }

  stopAutoRefresh(): void {
    this.scheduler.stop();
  }

  setRefreshInterval(intervalMs: number): void {
    this.scheduler.setInterval(intervalMs);
  }

  isAutoRefreshing(): boolean {
    return this.scheduler.isRunning();
  }

  subscribe(listener: Listener<DiffResult>): () => boolean {
    return this.changes.subscribe(listener);
  }

  unsubscribe(listener: Listener<DiffResult>): boolean {
    return this.changes.unsubscribe(listener);
  }

  onRefreshFailed(listener: Listener<RefreshFailure>): () => boolean {
    return this.failures.subscribe(listener);
  }

  getRefreshState(): RefreshState {
    return this.scheduler.getState();
  }

  getStats(): CacheStats {
    return {
      ...this.scheduler.getStats(),
      cacheHits: this.cacheHits,
      cacheMisses: this.cacheMisses,
      size: this.store.size
    };
  }

  /** Stops auto refresh, waits for any in-flight cycle and drops every listener. */
  async dispose(): Promise<void> {
    if (this.scheduler.isRunning()) {
      this.scheduler.stop();
    }
    await this.scheduler.idle();
    this.changes.clear();
    this.failures.clear();
  }
}
