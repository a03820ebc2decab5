import { InstanceCache } from "../services/instance-cache";
import type { CacheConfig } from "./config";
import { loadConfig } from "./config";
import { CliError } from "./errors";
import { FileSnapshotSource } from "./file-source";
import type { Logger } from "./logger";
import { createLogger } from "./logger";

export interface CommandContext {
  config: CacheConfig;
  logger: Logger;
  cache: InstanceCache;
  source: FileSnapshotSource;
}

export interface CommandContextOptions {
  source?: string;
  config?: string;
  verbose?: boolean;
}

export async function getCommandContext(options: CommandContextOptions): Promise<CommandContext> {
  if (!options.source) {
    throw new CliError({
      kind: "validation",
      message: "Missing required option '--source <file>'.",
      hint: "Point --source at a JSON file of instance snapshots."
    });
  }

  const config = await loadConfig({ configPath: options.config });
  const logger = createLogger("cache", options.verbose ? "debug" : config.logLevel);
  const source = new FileSnapshotSource(options.source);
  const cache = new InstanceCache({
    source,
    refreshIntervalMs: config.refreshIntervalMs,
    maxAgeSeconds: config.maxAgeSeconds,
    fetchTimeoutMs: config.fetchTimeoutMs,
    significantFields: config.significantFields,
    logger
  });

  return { config, logger, cache, source };
}

export function parseIndexArgument(value: string): number {
  const numeric = Number(value);
  if (!Number.isInteger(numeric) || numeric < 0) {
    throw new CliError({
      kind: "validation",
      message: `Instance index must be a non-negative integer (got '${value}').`
    });
  }
  return numeric;
}
