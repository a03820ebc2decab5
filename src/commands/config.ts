import { Command } from "commander";
import type { CacheConfig } from "../lib/config";
import { defaultConfigPath, loadConfig } from "../lib/config";

interface ConfigOptions {
  config?: string;
  json?: boolean;
}

export function registerConfigCommand(program: Command): void {
  program
    .command("config")
    .description("Print the resolved cache configuration")
    .option("-c, --config <file>", "Config file (defaults to ~/.slotcache/config.json)")
    .option("--json", "Print the configuration as JSON")
    .action(async (options: ConfigOptions) => {
      const config = await loadConfig({ configPath: options.config });
      if (options.json) {
        console.log(JSON.stringify(config, null, 2));
        return;
      }

      console.log(`config file: ${options.config ?? defaultConfigPath()}`);
      for (const line of describeConfig(config)) {
        console.log(line);
      }
    });
}

export function describeConfig(config: CacheConfig): string[] {
  return [
    `refresh interval: ${config.refreshIntervalMs}ms`,
    `max age: ${config.maxAgeSeconds}s`,
    `fetch timeout: ${config.fetchTimeoutMs}ms`,
    `significant fields: ${config.significantFields.join(", ")}`,
    `log level: ${config.logLevel}`
  ];
}
