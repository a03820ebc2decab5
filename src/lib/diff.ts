import { DEFAULT_SIGNIFICANT_FIELDS } from "./constants";
import type { DiffResult, InstanceSnapshot, SnapshotField, SnapshotMap } from "./types";

export interface DiffJSON {
  added: number[];
  removed: number[];
  modified: Record<string, SnapshotField[]>;
}

const EMPTY_MAP: SnapshotMap = new Map();

export function diffSnapshots(
  previous: SnapshotMap | undefined,
  next: SnapshotMap,
  significantFields: readonly SnapshotField[] = DEFAULT_SIGNIFICANT_FIELDS
): DiffResult {
  const old = previous ?? EMPTY_MAP;
  const added = new Map<number, InstanceSnapshot>();
  const removed = new Set<number>();
  const modified = new Map<number, ReadonlySet<SnapshotField>>();

  for (const [index, snapshot] of next) {
    const before = old.get(index);
    if (!before) {
      added.set(index, snapshot);
      continue;
    }

    const changed = changedFields(before, snapshot, significantFields);
    if (changed.size > 0) {
      modified.set(index, changed);
    }
  }

  for (const index of old.keys()) {
    if (!next.has(index)) {
      removed.add(index);
    }
  }

  return { added, removed, modified };
}

export function changedFields(
  before: InstanceSnapshot,
  after: InstanceSnapshot,
  significantFields: readonly SnapshotField[] = DEFAULT_SIGNIFICANT_FIELDS
): Set<SnapshotField> {
  const changed = new Set<SnapshotField>();
  for (const field of significantFields) {
    if (!sameValue(before[field], after[field])) {
      changed.add(field);
    }
  }
  return changed;
}

export function isEmptyDiff(diff: DiffResult): boolean {
  return diff.added.size === 0 && diff.removed.size === 0 && diff.modified.size === 0;
}

export function summarizeDiff(diff: DiffResult): string {
  return `Cache refreshed: +${diff.added.size} -${diff.removed.size} ~${diff.modified.size}`;
}

export function diffToJSON(diff: DiffResult): DiffJSON {
  const byIndex = (a: number, b: number) => a - b;
  const modified: Record<string, SnapshotField[]> = {};
  for (const index of [...diff.modified.keys()].sort(byIndex)) {
    modified[String(index)] = [...(diff.modified.get(index) ?? [])];
  }

  return {
    added: [...diff.added.keys()].sort(byIndex),
    removed: [...diff.removed].sort(byIndex),
    modified
  };
}

function sameValue(a: InstanceSnapshot[SnapshotField], b: InstanceSnapshot[SnapshotField]): boolean {
  // NaN readings compare equal to themselves so a dead sensor does not notify every cycle.
  if (typeof a === "number" && typeof b === "number") {
    return a === b || (Number.isNaN(a) && Number.isNaN(b));
  }
  return a === b;
}
