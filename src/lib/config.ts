import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  CONFIG_DIR_NAME,
  CONFIG_FILE_NAME,
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_MAX_AGE_SECONDS,
  DEFAULT_REFRESH_INTERVAL_MS,
  DEFAULT_SIGNIFICANT_FIELDS,
  ENV_PREFIX,
  MAX_REFRESH_INTERVAL_MS,
  MIN_REFRESH_INTERVAL_MS,
  SNAPSHOT_FIELDS
} from "./constants";
import { CliError } from "./errors";
import type { LogLevel } from "./logger";
import { isLogLevel, LOG_LEVELS } from "./logger";
import type { SnapshotField } from "./types";
import { isRecord, normalizeInputPath, parseMaybeNumber } from "./utils";

export interface CacheConfig {
  refreshIntervalMs: number;
  maxAgeSeconds: number;
  fetchTimeoutMs: number;
  significantFields: readonly SnapshotField[];
  logLevel: LogLevel;
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

type PartialConfig = Partial<Record<keyof CacheConfig, unknown>>;

export const DEFAULT_CONFIG: CacheConfig = {
  refreshIntervalMs: DEFAULT_REFRESH_INTERVAL_MS,
  maxAgeSeconds: DEFAULT_MAX_AGE_SECONDS,
  fetchTimeoutMs: DEFAULT_FETCH_TIMEOUT_MS,
  significantFields: DEFAULT_SIGNIFICANT_FIELDS,
  logLevel: "info"
};

export function defaultConfigPath(): string {
  return path.join(os.homedir(), CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

/**
 * Resolves configuration from defaults, then the JSON config file, then `SLOTCACHE_*`
 * environment variables. A missing default config file is not an error; a missing file passed
 * explicitly is.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CacheConfig> {
  const explicitPath = options.configPath ? normalizeInputPath(options.configPath) : undefined;
  const fromFile = await readConfigFile(explicitPath ?? defaultConfigPath(), explicitPath !== undefined);
  const fromEnv = readEnvConfig(options.env ?? process.env);
  return resolveConfig({ ...fromFile, ...fromEnv });
}

export function resolveConfig(input: PartialConfig): CacheConfig {
  return {
    refreshIntervalMs: clampInterval(numberSetting("refreshIntervalMs", input.refreshIntervalMs, DEFAULT_CONFIG.refreshIntervalMs)),
    maxAgeSeconds: positiveSetting("maxAgeSeconds", input.maxAgeSeconds, DEFAULT_CONFIG.maxAgeSeconds),
    fetchTimeoutMs: positiveSetting("fetchTimeoutMs", input.fetchTimeoutMs, DEFAULT_CONFIG.fetchTimeoutMs),
    significantFields: fieldsSetting(input.significantFields),
    logLevel: logLevelSetting(input.logLevel)
  };
}

export function clampInterval(intervalMs: number): number {
  return Math.min(MAX_REFRESH_INTERVAL_MS, Math.max(MIN_REFRESH_INTERVAL_MS, Math.round(intervalMs)));
}

async function readConfigFile(filePath: string, required: boolean): Promise<PartialConfig> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, "utf8");
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === "ENOENT" && !required) {
      return {};
    }
    throw new CliError({
      kind: code === "ENOENT" ? "not_found" : "runtime",
      message: `Unable to read config file: ${filePath}`
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw) as unknown;
  } catch (error) {
    throw new CliError({
      kind: "validation",
      message: `Config file is not valid JSON: ${filePath}`,
      detail: error instanceof Error ? error.message : String(error)
    });
  }

  if (!isRecord(parsed)) {
    throw new CliError({
      kind: "validation",
      message: `Config file must contain a JSON object: ${filePath}`
    });
  }

  return {
    refreshIntervalMs: parsed.refreshIntervalMs,
    maxAgeSeconds: parsed.maxAgeSeconds,
    fetchTimeoutMs: parsed.fetchTimeoutMs,
    significantFields: parsed.significantFields,
    logLevel: parsed.logLevel
  };
}

function readEnvConfig(env: NodeJS.ProcessEnv): PartialConfig {
  const result: PartialConfig = {};
  const read = (name: string) => {
    const value = env[`${ENV_PREFIX}${name}`];
    return value === undefined || value.trim() === "" ? undefined : value.trim();
  };

  const interval = read("REFRESH_INTERVAL_MS");
  if (interval !== undefined) {
    result.refreshIntervalMs = interval;
  }
  const maxAge = read("MAX_AGE_SECONDS");
  if (maxAge !== undefined) {
    result.maxAgeSeconds = maxAge;
  }
  const timeout = read("FETCH_TIMEOUT_MS");
  if (timeout !== undefined) {
    result.fetchTimeoutMs = timeout;
  }
  const fields = read("SIGNIFICANT_FIELDS");
  if (fields !== undefined) {
    result.significantFields = fields.split(",").map((field) => field.trim()).filter(Boolean);
  }
  const logLevel = read("LOG_LEVEL");
  if (logLevel !== undefined) {
    result.logLevel = logLevel.toLowerCase();
  }
  return result;
}

function numberSetting(name: string, value: unknown, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const numeric = parseMaybeNumber(value);
  if (numeric === undefined) {
    throw new CliError({
      kind: "validation",
      message: `${name} must be a number (got ${JSON.stringify(value)}).`
    });
  }
  return numeric;
}

function positiveSetting(name: string, value: unknown, fallback: number): number {
  const numeric = numberSetting(name, value, fallback);
  if (numeric <= 0) {
    throw new CliError({
      kind: "validation",
      message: `${name} must be greater than zero (got ${numeric}).`
    });
  }
  return numeric;
}

function fieldsSetting(value: unknown): readonly SnapshotField[] {
  if (value === undefined) {
    return DEFAULT_CONFIG.significantFields;
  }
  if (!Array.isArray(value) || value.length === 0) {
    throw new CliError({
      kind: "validation",
      message: "significantFields must be a non-empty list of snapshot field names."
    });
  }

  const fields: SnapshotField[] = [];
  for (const candidate of value) {
    const field = SNAPSHOT_FIELDS.find((known) => known === candidate);
    if (!field) {
      throw new CliError({
        kind: "validation",
        message: `Unknown snapshot field: ${String(candidate)}`,
        hint: `Valid fields: ${SNAPSHOT_FIELDS.join(", ")}`
      });
    }
    if (!fields.includes(field)) {
      fields.push(field);
    }
  }
  return fields;
}

function logLevelSetting(value: unknown): LogLevel {
  if (value === undefined) {
    return DEFAULT_CONFIG.logLevel;
  }
  if (typeof value !== "string" || !isLogLevel(value)) {
    throw new CliError({
      kind: "validation",
      message: `logLevel must be one of ${LOG_LEVELS.join(", ")} (got ${JSON.stringify(value)}).`
    });
  }
  return value;
}
