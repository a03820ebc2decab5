import fs from "node:fs";
import { CacheError } from "./errors";
import type { InstanceSnapshot, InstanceStatus, SnapshotSource } from "./types";
import { formatSize, isRecord, normalizeInputPath, parseMaybeBoolean, parseMaybeNumber } from "./utils";

/**
 * Reads instance snapshots from a JSON file on every fetch. The file holds either an array of
 * records or an object keyed by index; a record without an index takes its key or position.
 */
export class FileSnapshotSource implements SnapshotSource {
  readonly filePath: string;

  constructor(filePath: string, private readonly now: () => number = Date.now) {
    this.filePath = normalizeInputPath(filePath);
  }

  async fetchAll(): Promise<InstanceSnapshot[]> {
    const raw = await this.readFile();
    return parseSnapshotDocument(raw, this.now());
  }

  async fetchOne(index: number): Promise<InstanceSnapshot> {
    const snapshots = await this.fetchAll();
    const match = snapshots.find((snapshot) => snapshot.index === index);
    if (!match) {
      throw new CacheError({
        kind: "source_unavailable",
        message: `Instance ${index} not found in ${this.filePath}.`
      });
    }
    return match;
  }

  private async readFile(): Promise<string> {
    try {
      return await fs.promises.readFile(this.filePath, "utf8");
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      throw new CacheError({
        kind: "source_unavailable",
        message: code === "ENOENT"
          ? `Snapshot file does not exist: ${this.filePath}`
          : `Unable to read snapshot file: ${this.filePath}`,
        cause: error
      });
    }
  }
}

export function parseSnapshotDocument(raw: string, observedAt: number): InstanceSnapshot[] {
  if (!raw.trim()) {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw) as unknown;
  } catch (error) {
    throw new CacheError({
      kind: "source_unavailable",
      message: "Snapshot file is not valid JSON.",
      detail: error instanceof Error ? error.message : String(error),
      cause: error
    });
  }

  if (Array.isArray(parsed)) {
    return parsed.map((record, position) => parseSnapshotRecord(record, position, observedAt));
  }

  if (isRecord(parsed)) {
    if ("index" in parsed) {
      return [parseSnapshotRecord(parsed, undefined, observedAt)];
    }
    return Object.entries(parsed).map(([key, record]) => parseSnapshotRecord(record, parseMaybeNumber(key), observedAt));
  }

  throw new CacheError({
    kind: "source_unavailable",
    message: "Snapshot file must contain a JSON array or object."
  });
}

export function parseSnapshotRecord(record: unknown, fallbackIndex: number | undefined, observedAt: number): InstanceSnapshot {
  if (!isRecord(record)) {
    throw new CacheError({
      kind: "source_unavailable",
      message: `Snapshot record ${fallbackIndex ?? "?"} is not an object.`
    });
  }

  const index = parseMaybeNumber(record.index) ?? fallbackIndex;
  if (index === undefined || !Number.isInteger(index) || index < 0) {
    throw new CacheError({
      kind: "source_unavailable",
      message: `Snapshot record has no valid index: ${JSON.stringify(record.index ?? null)}`
    });
  }

  const status = normalizeStatus(stringField(record.status));
  const diskSizeBytes = Math.max(0, Math.trunc(parseMaybeNumber(record.diskSizeBytes) ?? 0));

  return {
    index,
    name: stringField(record.name) ?? `VM ${index}`,
    status,
    cpuUsage: parseMaybeNumber(record.cpuUsage) ?? 0,
    memoryUsage: parseMaybeNumber(record.memoryUsage) ?? 0,
    diskUsageText: stringField(record.diskUsageText) ?? formatSize(diskSizeBytes),
    diskSizeBytes,
    path: stringField(record.path) ?? "",
    version: stringField(record.version) ?? "",
    running: parseMaybeBoolean(record.running) ?? status === "running",
    observedAt
  };
}

export function normalizeStatus(raw?: string): InstanceStatus {
  const value = (raw || "").trim().toLowerCase();
  switch (value) {
    case "running":
    case "started":
      return "running";
    case "stopped":
    case "exited":
    case "created":
      return "stopped";
    case "starting":
    case "launching":
      return "starting";
    case "stopping":
      return "stopping";
    case "error":
    case "crashed":
      return "error";
    default:
      return "unknown";
  }
}

function stringField(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}
