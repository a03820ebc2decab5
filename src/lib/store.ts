import { CacheError } from "./errors";
import type { InstanceSnapshot, SnapshotMap, StoreEntry } from "./types";

export type StoreLookup =
  | { found: true; snapshot: InstanceSnapshot }
  | { found: false; reason: "missing" | "stale"; snapshot?: InstanceSnapshot };

export interface StoreView {
  fresh: boolean;
  snapshots: SnapshotMap;
}

/**
 * Last-known snapshot per instance index.
 *
 * The entry map is never mutated once published: every write builds a replacement map and
 * swaps the reference, so a reader holding the previous map keeps seeing a complete set.
 */
export class InstanceStore {
  private entries: ReadonlyMap<number, StoreEntry> = new Map();
  private view: SnapshotMap = new Map();
  private lastFullRefresh: number | undefined;

  constructor(private readonly now: () => number = Date.now) {}

  get size(): number {
    return this.entries.size;
  }

  get lastFullRefreshAt(): number | undefined {
    return this.lastFullRefresh;
  }

  get(index: number, maxAgeSeconds: number): StoreLookup {
    const entry = this.entries.get(index);
    if (!entry) {
      return { found: false, reason: "missing" };
    }
    if (!this.isWithinAge(entry.lastUpdated, maxAgeSeconds)) {
      return { found: false, reason: "stale", snapshot: entry.snapshot };
    }
    return { found: true, snapshot: entry.snapshot };
  }

  getAll(maxAgeSeconds: number): StoreView {
    const fresh = this.lastFullRefresh !== undefined && this.isWithinAge(this.lastFullRefresh, maxAgeSeconds);
    return { fresh, snapshots: this.view };
  }

  snapshots(): SnapshotMap {
    return this.view;
  }

  peek(index: number): InstanceSnapshot | undefined {
    return this.entries.get(index)?.snapshot;
  }

  entry(index: number): StoreEntry | undefined {
    return this.entries.get(index);
  }

  replaceAll(next: SnapshotMap): void {
    const committedAt = this.now();
    const entries = new Map<number, StoreEntry>();
    for (const [index, snapshot] of next) {
      entries.set(index, Object.freeze({ snapshot: freezeSnapshot(snapshot), lastUpdated: committedAt }));
    }
    this.publish(entries);
    this.lastFullRefresh = committedAt;
  }

  upsert(snapshot: InstanceSnapshot): void {
    assertValidIndex(snapshot.index);
    const entries = new Map(this.entries);
    entries.set(snapshot.index, Object.freeze({ snapshot: freezeSnapshot(snapshot), lastUpdated: this.now() }));
    this.publish(entries);
  }

  clear(): void {
    this.publish(new Map());
    this.lastFullRefresh = undefined;
  }

  private publish(entries: Map<number, StoreEntry>): void {
    const view = new Map<number, InstanceSnapshot>();
    for (const [index, entry] of entries) {
      view.set(index, entry.snapshot);
    }
    this.entries = entries;
    this.view = view;
  }

  private isWithinAge(timestamp: number, maxAgeSeconds: number): boolean {
    if (!(maxAgeSeconds > 0)) {
      return false;
    }
    return this.now() - timestamp <= maxAgeSeconds * 1000;
  }
}

/**
 * Keys a fetched snapshot set by index. A set that repeats an index, or carries an index
 * that is not a non-negative integer, is a malformed source response.
 */
export function indexSnapshots(snapshots: Iterable<InstanceSnapshot>): Map<number, InstanceSnapshot> {
  const mapping = new Map<number, InstanceSnapshot>();
  for (const snapshot of snapshots) {
    assertValidIndex(snapshot.index);
    if (mapping.has(snapshot.index)) {
      throw new CacheError({
        kind: "source_unavailable",
        message: `Snapshot set contains instance index ${snapshot.index} more than once.`
      });
    }
    mapping.set(snapshot.index, snapshot);
  }
  return mapping;
}

function assertValidIndex(index: number): void {
  if (!Number.isInteger(index) || index < 0) {
    throw new CacheError({
      kind: "source_unavailable",
      message: `Invalid instance index: ${String(index)}`
    });
  }
}

function freezeSnapshot(snapshot: InstanceSnapshot): InstanceSnapshot {
  return Object.isFrozen(snapshot) ? snapshot : Object.freeze({ ...snapshot });
}
