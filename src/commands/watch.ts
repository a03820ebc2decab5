import chalk from "chalk";
import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { diffToJSON } from "../lib/diff";
import { CacheError } from "../lib/errors";
import type { StoreLookup } from "../lib/store";
import { renderTable, SNAPSHOT_HEADERS, snapshotRow, sortedSnapshots } from "../lib/table";
import type { DiffResult, RefreshFailure, SnapshotMap } from "../lib/types";

interface WatchOptions {
  source?: string;
  config?: string;
  interval?: string;
  json?: boolean;
  verbose?: boolean;
}

export function registerWatchCommand(program: Command): void {
  program
    .command("watch")
    .description("Auto refresh the cache and print only what changed")
    .requiredOption("-s, --source <file>", "JSON file of instance snapshots")
    .option("-c, --config <file>", "Config file (defaults to ~/.slotcache/config.json)")
    .option("-i, --interval <ms>", "Refresh interval in milliseconds")
    .option("--json", "Print one JSON line per change set")
    .option("--verbose", "Log cache activity to stderr")
    .action(async (options: WatchOptions) => {
      const { cache, config } = await getCommandContext(options);
      const intervalMs = options.interval === undefined ? config.refreshIntervalMs : parseIntervalMs(options.interval);

      cache.subscribe((diff) => {
        const lines = options.json
          ? [JSON.stringify(diffToJSON(diff))]
          : formatDiffLines(diff, cache.peek.bind(cache)).map(colorizeDiffLine);
        for (const line of lines) {
          console.log(line);
        }
      });
      cache.onRefreshFailed((failure) => {
        console.error(chalk.red(formatFailure(failure)));
      });

      const initial = await cache.refresh();
      if (!initial.success) {
        console.error(chalk.yellow(`Initial refresh failed: ${initial.message}. Retrying on schedule.`));
      } else if (!options.json) {
        printInitialTable(await cache.getAll());
      }

      cache.startAutoRefresh(intervalMs);
      if (!options.json) {
        console.log(chalk.dim(`Refreshing every ${intervalMs}ms. Press Ctrl+C to stop.`));
      }

      await waitForShutdownSignal(async () => {
        await cache.dispose();
        const stats = cache.getStats();
        if (!options.json) {
          console.log(chalk.dim(`Stopped after ${stats.cycles} cycles (${stats.failures} failed).`));
        }
      });
    });
}

type Peek = (index: number) => StoreLookup;

export function formatDiffLines(diff: DiffResult, peek: Peek): string[] {
  const lines: string[] = [];
  const byIndex = (a: number, b: number) => a - b;

  for (const index of [...diff.added.keys()].sort(byIndex)) {
    const snapshot = diff.added.get(index);
    lines.push(`+ [${index}] ${snapshot?.name ?? "?"} (${snapshot?.status ?? "unknown"})`);
  }
  for (const index of [...diff.removed].sort(byIndex)) {
    lines.push(`- [${index}] removed`);
  }
  for (const index of [...diff.modified.keys()].sort(byIndex)) {
    const fields = [...(diff.modified.get(index) ?? [])].join(", ");
    const current = peek(index).snapshot;
    lines.push(`~ [${index}] ${current?.name ?? "?"}: ${fields}`);
  }
  return lines;
}

export function formatFailure(failure: RefreshFailure): string {
  const scope = failure.scope === "all" ? "full refresh" : `instance ${failure.scope}`;
  return `! ${scope} failed at ${new Date(failure.at).toISOString()}: ${failure.error.message}`;
}

export function parseIntervalMs(value: string): number {
  const numeric = Number(value);
  if (!Number.isInteger(numeric) || numeric <= 0) {
    throw new CacheError({
      kind: "invalid_interval",
      message: `--interval must be a positive integer number of milliseconds (got '${value}').`
    });
  }
  return numeric;
}

function colorizeDiffLine(line: string): string {
  if (line.startsWith("+")) {
    return chalk.green(line);
  }
  if (line.startsWith("-")) {
    return chalk.red(line);
  }
  return chalk.yellow(line);
}

function printInitialTable(snapshots: SnapshotMap): void {
  const ordered = sortedSnapshots(snapshots);
  if (ordered.length === 0) {
    console.log("No instances found.");
    return;
  }
  console.log(renderTable(SNAPSHOT_HEADERS, ordered.map(snapshotRow)));
}

async function waitForShutdownSignal(onShutdown: () => Promise<void>): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    let shuttingDown = false;
    const handle = async () => {
      if (shuttingDown) {
        return;
      }
      shuttingDown = true;
      process.off("SIGINT", handle);
      process.off("SIGTERM", handle);
      try {
        await onShutdown();
        resolve();
      } catch (error) {
        reject(error);
      }
    };

    process.on("SIGINT", handle);
    process.on("SIGTERM", handle);
  });
}
