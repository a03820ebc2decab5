import ora from "ora";
import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { renderTable, SNAPSHOT_HEADERS, snapshotRow, sortedSnapshots } from "../lib/table";
import type { SnapshotMap } from "../lib/types";

interface LsOptions {
  source?: string;
  config?: string;
  json?: boolean;
  verbose?: boolean;
}

export function registerLsCommand(program: Command): void {
  program
    .command("ls")
    .description("List every instance in the snapshot source")
    .requiredOption("-s, --source <file>", "JSON file of instance snapshots")
    .option("-c, --config <file>", "Config file (defaults to ~/.slotcache/config.json)")
    .option("--json", "Print snapshots as JSON")
    .option("--verbose", "Log cache activity to stderr")
    .action(async (options: LsOptions) => {
      const { cache } = await getCommandContext(options);

      const spinner = options.json ? undefined : ora("Fetching instances...").start();
      let snapshots: SnapshotMap;
      try {
        snapshots = await cache.getAllFresh();
        spinner?.stop();
      } catch (error) {
        spinner?.fail("Fetch failed.");
        throw error;
      }

      const ordered = sortedSnapshots(snapshots);
      if (options.json) {
        console.log(JSON.stringify(ordered, null, 2));
        return;
      }

      if (ordered.length === 0) {
        console.log("No instances found.");
        return;
      }

      console.log(renderTable(SNAPSHOT_HEADERS, ordered.map(snapshotRow)));
    });
}
