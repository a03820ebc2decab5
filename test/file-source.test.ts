import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { CacheError } from "../src/lib/errors";
import { FileSnapshotSource, normalizeStatus, parseSnapshotDocument, parseSnapshotRecord } from "../src/lib/file-source";

async function writeTempFile(contents: string): Promise<string> {
  const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "slotcache-source-"));
  const filePath = path.join(dir, "snapshots.json");
  await fs.promises.writeFile(filePath, contents, "utf8");
  return filePath;
}

test("parseSnapshotRecord fills defaults and derives disk text from bytes", () => {
  const snapshot = parseSnapshotRecord({ index: 2, status: "Running", diskSizeBytes: 1536 }, undefined, 500);
  assert.deepEqual(snapshot, {
    index: 2,
    name: "VM 2",
    status: "running",
    cpuUsage: 0,
    memoryUsage: 0,
    diskUsageText: "1.5KB",
    diskSizeBytes: 1536,
    path: "",
    version: "",
    running: true,
    observedAt: 500
  });
});

test("parseSnapshotRecord keeps explicit values and parses numeric strings", () => {
  const snapshot = parseSnapshotRecord(
    { index: "4", name: "farm-4", status: "stopped", cpuUsage: "3.5", memoryUsage: 1024, diskUsageText: "2GB", running: "false" },
    undefined,
    0
  );
  assert.equal(snapshot.index, 4);
  assert.equal(snapshot.cpuUsage, 3.5);
  assert.equal(snapshot.diskUsageText, "2GB");
  assert.equal(snapshot.running, false);
});

test("parseSnapshotRecord rejects records without a usable index", () => {
  assert.throws(
    () => parseSnapshotRecord({ name: "orphan" }, undefined, 0),
    (error: unknown) => error instanceof CacheError && error.message === "Snapshot record has no valid index: null"
  );
  assert.throws(() => parseSnapshotRecord({ index: -3 }, undefined, 0), CacheError);
  assert.throws(() => parseSnapshotRecord("nope", 0, 0), CacheError);
});

test("parseSnapshotDocument accepts arrays, keyed objects and a single record", () => {
  assert.deepEqual(parseSnapshotDocument('[{"index": 5}, {"name": "by position"}]', 0).map((s) => s.index), [5, 1]);
  assert.deepEqual(parseSnapshotDocument('{"3": {"name": "three"}, "8": {"index": 8}}', 0).map((s) => s.index), [3, 8]);
  assert.deepEqual(parseSnapshotDocument('{"index": 6, "name": "solo"}', 0).map((s) => s.name), ["solo"]);
  assert.deepEqual(parseSnapshotDocument("   ", 0), []);
});

test("parseSnapshotDocument reports malformed JSON as source_unavailable", () => {
  assert.throws(
    () => parseSnapshotDocument("{not json", 0),
    (error: unknown) => error instanceof CacheError && error.kind === "source_unavailable" && error.message === "Snapshot file is not valid JSON."
  );
  assert.throws(() => parseSnapshotDocument("42", 0), CacheError);
});

test("normalizeStatus maps tool vocabulary onto known states", () => {
  assert.equal(normalizeStatus("STARTED"), "running");
  assert.equal(normalizeStatus("exited"), "stopped");
  assert.equal(normalizeStatus("launching"), "starting");
  assert.equal(normalizeStatus("crashed"), "error");
  assert.equal(normalizeStatus(undefined), "unknown");
});

test("FileSnapshotSource re-reads the file on every fetch", async () => {
  const filePath = await writeTempFile(JSON.stringify([{ index: 0, name: "a" }]));
  const source = new FileSnapshotSource(filePath, () => 42);

  assert.deepEqual((await source.fetchAll()).map((s) => s.name), ["a"]);
  await fs.promises.writeFile(filePath, JSON.stringify([{ index: 0, name: "b" }, { index: 1 }]), "utf8");
  const snapshots = await source.fetchAll();
  assert.deepEqual(snapshots.map((s) => s.name), ["b", "VM 1"]);
  assert.equal(snapshots[0]?.observedAt, 42);
});

test("FileSnapshotSource.fetchOne finds an index or fails", async () => {
  const filePath = await writeTempFile(JSON.stringify([{ index: 0 }, { index: 3, name: "three" }]));
  const source = new FileSnapshotSource(filePath);

  assert.equal((await source.fetchOne(3)).name, "three");
  await assert.rejects(
    source.fetchOne(9),
    (error: unknown) => error instanceof CacheError && error.message === `Instance 9 not found in ${filePath}.`
  );
});

test("FileSnapshotSource reports a missing file", async () => {
  const filePath = path.join(os.tmpdir(), "slotcache-does-not-exist", "snapshots.json");
  const source = new FileSnapshotSource(filePath);
  await assert.rejects(
    source.fetchAll(),
    (error: unknown) => error instanceof CacheError && error.message === `Snapshot file does not exist: ${filePath}`
  );
});
