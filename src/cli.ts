#!/usr/bin/env node
import chalk from "chalk";
import { Command } from "commander";
import { registerConfigCommand } from "./commands/config";
import { registerInspectCommand } from "./commands/inspect";
import { registerLsCommand } from "./commands/ls";
import { registerWatchCommand } from "./commands/watch";
import { CLI_NAME } from "./lib/constants";
import { renderCliError, toCliError } from "./lib/errors";
import { readPackageMeta } from "./lib/package";

const pkg = readPackageMeta();
const program = new Command();
const normalizedArgv = process.argv.map((arg) => (arg === "-v" ? "--version" : arg));

program
  .name(CLI_NAME)
  .description(pkg.description ?? "Cached, diffed view of emulator instance state")
  .version(pkg.version ?? "0.0.0", "--version", "output the version number");

registerLsCommand(program);
registerInspectCommand(program);
registerWatchCommand(program);
registerConfigCommand(program);

program.parseAsync(normalizedArgv).catch((error: unknown) => {
  const cliError = toCliError(error);
  console.error(chalk.red(renderCliError(cliError)));
  process.exitCode = cliError.exitCode;
});
