import type { InstanceSnapshot, SnapshotMap } from "./types";
import { formatPercent } from "./utils";

export const SNAPSHOT_HEADERS = ["INDEX", "NAME", "STATUS", "CPU", "MEM", "DISK", "RUNNING"];

export function renderTable(headers: string[], rows: string[][]): string {
  if (rows.length === 0) {
    return "";
  }

  const widths = headers.map((header, idx) => {
    const cellLengths = rows.map((row) => (row[idx] ?? "").length);
    return Math.max(header.length, ...cellLengths);
  });

  const pad = (cells: string[]) => cells.map((cell, idx) => (cell ?? "").padEnd(widths[idx] ?? 0)).join("  ").trimEnd();
  const body = rows.map(pad).join("\n");

  return `${pad(headers)}\n${widths.map((width) => "-".repeat(width)).join("  ")}\n${body}`;
}

export function snapshotRow(snapshot: InstanceSnapshot): string[] {
  return [
    String(snapshot.index),
    snapshot.name,
    snapshot.status,
    formatPercent(snapshot.cpuUsage),
    String(snapshot.memoryUsage),
    snapshot.diskUsageText,
    snapshot.running ? "yes" : "no"
  ];
}

export function sortedSnapshots(snapshots: SnapshotMap): InstanceSnapshot[] {
  return [...snapshots.values()].sort((a, b) => a.index - b.index);
}
