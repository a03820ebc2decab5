import { Command } from "commander";
import { getCommandContext, parseIndexArgument } from "../lib/command-context";
import { CliError } from "../lib/errors";
import type { InstanceSnapshot } from "../lib/types";

interface InspectOptions {
  source?: string;
  config?: string;
  json?: boolean;
  verbose?: boolean;
}

export function registerInspectCommand(program: Command): void {
  program
    .command("inspect <index>")
    .description("Show detailed state of one instance")
    .requiredOption("-s, --source <file>", "JSON file of instance snapshots")
    .option("-c, --config <file>", "Config file (defaults to ~/.slotcache/config.json)")
    .option("--json", "Print the snapshot as JSON")
    .option("--verbose", "Log cache activity to stderr")
    .action(async (rawIndex: string, options: InspectOptions) => {
      const index = parseIndexArgument(rawIndex);
      const { cache } = await getCommandContext(options);

      const outcome = await cache.refreshOne(index);
      const snapshot = cache.peek(index).snapshot;
      if (!outcome.success || !snapshot) {
        throw new CliError({
          kind: "not_found",
          message: `Instance ${index} is not available.`,
          detail: outcome.success ? undefined : outcome.message
        });
      }

      if (options.json) {
        console.log(JSON.stringify(snapshot, null, 2));
        return;
      }

      for (const line of describeSnapshot(snapshot)) {
        console.log(line);
      }
    });
}

export function describeSnapshot(snapshot: InstanceSnapshot): string[] {
  return [
    `index: ${snapshot.index}`,
    `name: ${snapshot.name}`,
    `status: ${snapshot.status}`,
    `running: ${snapshot.running ? "yes" : "no"}`,
    `cpu: ${snapshot.cpuUsage}`,
    `memory: ${snapshot.memoryUsage}`,
    `disk: ${snapshot.diskUsageText} (${snapshot.diskSizeBytes} bytes)`,
    `path: ${snapshot.path || "-"}`,
    `version: ${snapshot.version || "-"}`,
    `observed: ${new Date(snapshot.observedAt).toISOString()}`
  ];
}
