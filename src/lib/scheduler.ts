import { DEFAULT_FETCH_TIMEOUT_MS, DEFAULT_REFRESH_INTERVAL_MS, DEFAULT_SIGNIFICANT_FIELDS } from "./constants";
import { diffSnapshots, isEmptyDiff, summarizeDiff } from "./diff";
import { CacheError, toSourceError } from "./errors";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import { NotificationHub } from "./notifications";
import { indexSnapshots, InstanceStore } from "./store";
import type {
  DiffResult,
  InstanceSnapshot,
  RefreshFailure,
  RefreshOutcome,
  RefreshScope,
  RefreshState,
  RefreshStats,
  SnapshotField,
  SnapshotSource
} from "./types";
import { isPositiveInteger } from "./utils";

export interface RefreshSchedulerOptions {
  source: SnapshotSource;
  store: InstanceStore;
  changes: NotificationHub<DiffResult>;
  failures: NotificationHub<RefreshFailure>;
  intervalMs?: number;
  fetchTimeoutMs?: number;
  significantFields?: readonly SnapshotField[];
  logger?: Logger;
  now?: () => number;
}

type ConcurrencyPolicy = "reject" | "join";

interface InFlightCycle {
  scope: RefreshScope;
  outcome: Promise<RefreshOutcome>;
  // Settles when the guard is dropped, which for a timed-out cycle is after `outcome`.
  released: Promise<void>;
}

/**
 * Drives fetch-diff-commit-notify cycles, on a timer or on demand.
 *
 * At most one cycle is in flight at a time. Explicit refreshes issued while a cycle runs are
 * rejected with `refresh_in_progress`. The joining variants used by cache reads share the running
 * cycle when it covers what they asked for (the same scope, or a full cycle); otherwise they wait
 * for it to settle and run their own. `stop()` only halts future ticks.
 *
 * A cycle whose fetch times out reports its failure straight away, but keeps the guard until the
 * source call itself settles, so a slow source never has two fetches running at once.
 */
export class RefreshScheduler {
  private readonly source: SnapshotSource;
  private readonly store: InstanceStore;
  private readonly changes: NotificationHub<DiffResult>;
  private readonly failures: NotificationHub<RefreshFailure>;
  private readonly fetchTimeoutMs: number;
  private readonly significantFields: readonly SnapshotField[];
  private readonly logger: Logger;
  private readonly now: () => number;

  private readonly state: Omit<RefreshState, "inFlight">;
  private readonly stats: RefreshStats = { cycles: 0, successes: 0, failures: 0, rejected: 0, averageDurationMs: 0 };
  private timer: NodeJS.Timeout | undefined;
  private inFlight: InFlightCycle | undefined;
  private sourceCall: Promise<unknown> | undefined;

  constructor(options: RefreshSchedulerOptions) {
    const intervalMs = options.intervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
    assertInterval(intervalMs);

    this.source = options.source;
    this.store = options.store;
    this.changes = options.changes;
    this.failures = options.failures;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.significantFields = options.significantFields ?? DEFAULT_SIGNIFICANT_FIELDS;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.state = { intervalMs, enabled: false };
  }

  getState(): RefreshState {
    return { ...this.state, inFlight: this.inFlight !== undefined };
  }

  getStats(): RefreshStats {
    return { ...this.stats };
  }

  isRunning(): boolean {
    return this.state.enabled;
  }

  start(intervalMs?: number): void {
    if (this.state.enabled) {
      throw new CacheError({
        kind: "already_running",
        message: "Auto refresh is already running. Stop it before starting again."
      });
    }
    if (intervalMs !== undefined) {
      assertInterval(intervalMs);
      this.state.intervalMs = intervalMs;
    }

    this.state.enabled = true;
    this.arm();
    this.logger.info(`Auto refresh started with ${this.state.intervalMs}ms interval`);
  }

  stop(): void {
    if (!this.state.enabled) {
      throw new CacheError({
        kind: "not_running",
        message: "Auto refresh is not running."
      });
    }

    this.state.enabled = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.logger.info("Auto refresh stopped");
  }

  setInterval(intervalMs: number): void {
    assertInterval(intervalMs);
    this.state.intervalMs = intervalMs;
    this.logger.debug(`Refresh interval updated to ${intervalMs}ms`);
  }

  triggerManual(): Promise<RefreshOutcome> {
    return this.exclusive("all", "reject", () => this.runFullCycle());
  }

  refreshOne(index: number): Promise<RefreshOutcome> {
    return this.exclusive(index, "reject", () => this.runSingleCycle(index));
  }

  refreshAllJoining(): Promise<RefreshOutcome> {
    return this.exclusive("all", "join", () => this.runFullCycle());
  }

  refreshOneJoining(index: number): Promise<RefreshOutcome> {
    return this.exclusive(index, "join", () => this.runSingleCycle(index));
  }

  /** Resolves once the cycle currently in flight (if any) has settled. */
  async idle(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight.released;
    }
  }

  private exclusive(scope: RefreshScope, policy: ConcurrencyPolicy, cycle: () => Promise<RefreshOutcome>): Promise<RefreshOutcome> {
    const current = this.inFlight;
    if (current) {
      if (policy === "join") {
        return this.join(current, scope, cycle);
      }
      this.stats.rejected += 1;
      const error = new CacheError({
        kind: "refresh_in_progress",
        message: "Refresh already in progress."
      });
      this.logger.debug(`Rejected ${describeScope(scope)} refresh: another cycle is in flight`);
      return Promise.resolve({ success: false, message: error.message, error });
    }

    this.sourceCall = undefined;
    const pending = cycle();
    const sourceCall: Promise<unknown> = this.sourceCall ?? Promise.resolve();
    let sourceSettled = false;
    let cycleSettled = false;
    let markReleased: () => void = () => undefined;
    const released = new Promise<void>((resolve) => {
      markReleased = resolve;
    });
    const releaseGuard = () => {
      if (this.inFlight === running) {
        this.inFlight = undefined;
      }
      markReleased();
    };

    // Normally the source settles first and the guard is gone before callers see the outcome.
    void sourceCall.then(
      () => {
        sourceSettled = true;
        if (cycleSettled) {
          this.logger.debug(`${describeScope(scope)} refresh: source answered after the timeout, result discarded`);
          releaseGuard();
        }
      },
      (error: unknown) => {
        sourceSettled = true;
        if (cycleSettled) {
          this.logger.debug(`${describeScope(scope)} refresh: source failed after the timeout: ${error instanceof Error ? error.message : String(error)}`);
          releaseGuard();
        }
      }
    );
    const outcome = pending.then((result) => {
      cycleSettled = true;
      if (sourceSettled) {
        releaseGuard();
      }
      return result;
    });

    const running: InFlightCycle = { scope, outcome, released };
    this.inFlight = running;
    return outcome;
  }

  private async join(current: InFlightCycle, scope: RefreshScope, cycle: () => Promise<RefreshOutcome>): Promise<RefreshOutcome> {
    if (current.scope === "all" || current.scope === scope) {
      return current.outcome;
    }
    this.logger.debug(`${describeScope(scope)} refresh waiting for ${describeScope(current.scope).toLowerCase()} refresh to finish`);
    await this.idle();
    return this.exclusive(scope, "join", cycle);
  }

  private arm(): void {
    if (!this.state.enabled || this.timer) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = undefined;
      void this.tick();
    }, this.state.intervalMs);
  }

  private async tick(): Promise<void> {
    if (this.inFlight) {
      this.logger.debug("Skipping scheduled refresh: another cycle is in flight");
    } else {
      await this.exclusive("all", "reject", () => this.runFullCycle());
    }
    this.arm();
  }

  private async runFullCycle(): Promise<RefreshOutcome> {
    const startedAt = this.beginCycle();
    try {
      const fetched = await this.withTimeout(this.source.fetchAll(), "fetchAll");
      const next = indexSnapshots(fetched);
      // Diff and swap run without an await between them, so no reader sees one without the other.
      const diff = diffSnapshots(this.store.snapshots(), next, this.significantFields);
      this.store.replaceAll(next);
      return this.commitSuccess("all", diff, startedAt);
    } catch (error) {
      return this.commitFailure("all", toSourceError(error, "fetchAll"), startedAt);
    }
  }

  private async runSingleCycle(index: number): Promise<RefreshOutcome> {
    const startedAt = this.beginCycle();
    try {
      const snapshot = await this.withTimeout(this.source.fetchOne(index), `fetchOne(${index})`);
      assertMatchingIndex(index, snapshot);
      const previous = this.store.peek(index);
      const diff = diffSnapshots(
        previous ? new Map([[index, previous]]) : undefined,
        new Map([[index, snapshot]]),
        this.significantFields
      );
      this.store.upsert(snapshot);
      return this.commitSuccess(index, diff, startedAt);
    } catch (error) {
      return this.commitFailure(index, toSourceError(error, `fetchOne(${index})`), startedAt);
    }
  }

  private beginCycle(): number {
    const startedAt = this.now();
    this.state.lastAttempt = startedAt;
    this.stats.cycles += 1;
    return startedAt;
  }

  private commitSuccess(scope: RefreshScope, diff: DiffResult, startedAt: number): RefreshOutcome {
    const finishedAt = this.now();
    this.state.lastSuccess = finishedAt;
    this.stats.successes += 1;
    this.recordDuration(finishedAt - startedAt);

    const message = summarizeDiff(diff);
    if (isEmptyDiff(diff)) {
      this.logger.debug(`${describeScope(scope)} refresh: no changes`);
    } else {
      this.logger.debug(`${describeScope(scope)} refresh: ${message}`);
      this.changes.notify(diff);
    }
    return { success: true, message, diff };
  }

  private commitFailure(scope: RefreshScope, error: CacheError, startedAt: number): RefreshOutcome {
    const finishedAt = this.now();
    this.state.lastFailure = finishedAt;
    this.stats.failures += 1;
    this.recordDuration(finishedAt - startedAt);

    this.logger.warn(`${describeScope(scope)} refresh failed: ${error.message}`);
    this.failures.notify({ scope, error, at: finishedAt });
    return { success: false, message: error.message, error };
  }

  private recordDuration(durationMs: number): void {
    const count = this.stats.successes + this.stats.failures;
    this.stats.lastDurationMs = durationMs;
    this.stats.averageDurationMs = (this.stats.averageDurationMs * (count - 1) + durationMs) / count;
  }

  private withTimeout<T>(operation: Promise<T>, label: string): Promise<T> {
    this.sourceCall = operation;
    return withTimeout(operation, this.fetchTimeoutMs, label);
  }
}

export function withTimeout<T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const timeoutHandle = setTimeout(() => {
      if (!settled) {
        settled = true;
        reject(new CacheError({
          kind: "source_unavailable",
          message: `Snapshot source timed out after ${timeoutMs}ms: ${label}`
        }));
      }
    }, timeoutMs);

    operation.then(
      (value) => {
        clearTimeout(timeoutHandle);
        if (!settled) {
          settled = true;
          resolve(value);
        }
      },
      (error: unknown) => {
        clearTimeout(timeoutHandle);
        if (!settled) {
          settled = true;
          reject(error);
        }
      }
    );
  });
}

function assertInterval(intervalMs: number): void {
  if (!isPositiveInteger(intervalMs)) {
    throw new CacheError({
      kind: "invalid_interval",
      message: `Refresh interval must be a positive integer number of milliseconds (got ${String(intervalMs)}).`
    });
  }
}

function assertMatchingIndex(requested: number, snapshot: InstanceSnapshot): void {
  if (snapshot.index !== requested) {
    throw new CacheError({
      kind: "source_unavailable",
      message: `Snapshot source returned instance ${snapshot.index} when asked for ${requested}.`
    });
  }
}

function describeScope(scope: RefreshScope): string {
  return scope === "all" ? "Full" : `Instance ${scope}`;
}
