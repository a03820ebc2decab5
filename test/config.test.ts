import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { clampInterval, DEFAULT_CONFIG, loadConfig, resolveConfig } from "../src/lib/config";
import { CliError } from "../src/lib/errors";

async function writeConfig(contents: string): Promise<string> {
  const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "slotcache-config-"));
  const filePath = path.join(dir, "config.json");
  await fs.promises.writeFile(filePath, contents, "utf8");
  return filePath;
}

test("resolveConfig falls back to defaults", () => {
  assert.deepEqual(resolveConfig({}), DEFAULT_CONFIG);
  assert.equal(DEFAULT_CONFIG.refreshIntervalMs, 3000);
  assert.equal(DEFAULT_CONFIG.maxAgeSeconds, 30);
});

test("refresh interval is clamped into 1000-10000 ms", () => {
  assert.equal(clampInterval(200), 1000);
  assert.equal(clampInterval(60_000), 10_000);
  assert.equal(resolveConfig({ refreshIntervalMs: "4500" }).refreshIntervalMs, 4500);
});

test("resolveConfig rejects invalid values with validation errors", () => {
  const isValidation = (error: unknown) => error instanceof CliError && error.kind === "validation";
  assert.throws(() => resolveConfig({ maxAgeSeconds: 0 }), isValidation);
  assert.throws(() => resolveConfig({ fetchTimeoutMs: "soon" }), isValidation);
  assert.throws(() => resolveConfig({ significantFields: ["status", "colour"] }), isValidation);
  assert.throws(() => resolveConfig({ significantFields: [] }), isValidation);
  assert.throws(() => resolveConfig({ logLevel: "loud" }), isValidation);
});

test("significant fields are deduplicated in order", () => {
  assert.deepEqual(resolveConfig({ significantFields: ["status", "path", "status"] }).significantFields, ["status", "path"]);
});

test("environment variables override the config file", async () => {
  const configPath = await writeConfig(JSON.stringify({ refreshIntervalMs: 5000, maxAgeSeconds: 10, logLevel: "warn" }));
  const config = await loadConfig({
    configPath,
    env: {
      SLOTCACHE_MAX_AGE_SECONDS: "45",
      SLOTCACHE_SIGNIFICANT_FIELDS: "status, running",
      SLOTCACHE_LOG_LEVEL: "DEBUG"
    }
  });

  assert.deepEqual(config, {
    refreshIntervalMs: 5000,
    maxAgeSeconds: 45,
    fetchTimeoutMs: 10_000,
    significantFields: ["status", "running"],
    logLevel: "debug"
  });
});

test("an explicit config path that does not exist is an error", async () => {
  const missing = path.join(os.tmpdir(), "slotcache-missing-config", "config.json");
  await assert.rejects(
    loadConfig({ configPath: missing, env: {} }),
    (error: unknown) => error instanceof CliError && error.kind === "not_found"
  );
});

test("a config file that is not a JSON object is rejected", async () => {
  const configPath = await writeConfig("[1, 2]");
  await assert.rejects(
    loadConfig({ configPath, env: {} }),
    (error: unknown) => error instanceof CliError && error.message === `Config file must contain a JSON object: ${configPath}`
  );
});
