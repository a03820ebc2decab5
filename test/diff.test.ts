import test from "node:test";
import assert from "node:assert/strict";
import { changedFields, diffSnapshots, diffToJSON, isEmptyDiff, summarizeDiff } from "../src/lib/diff";
import type { InstanceSnapshot } from "../src/lib/types";
import { makeSnapshot } from "./helpers";

function mapOf(...snapshots: InstanceSnapshot[]): Map<number, InstanceSnapshot> {
  return new Map(snapshots.map((snapshot) => [snapshot.index, snapshot]));
}

test("diff against an empty mapping classifies every index as added", () => {
  const diff = diffSnapshots(new Map(), mapOf(makeSnapshot(1)));
  assert.deepEqual([...diff.added.keys()], [1]);
  assert.equal(diff.removed.size, 0);
  assert.equal(diff.modified.size, 0);
});

test("diff with no previous mapping at all behaves like an empty one", () => {
  const diff = diffSnapshots(undefined, mapOf(makeSnapshot(0), makeSnapshot(2)));
  assert.deepEqual(diffToJSON(diff), { added: [0, 2], removed: [], modified: {} });
});

test("diff reports indices that disappeared as removed", () => {
  const diff = diffSnapshots(mapOf(makeSnapshot(1)), new Map());
  assert.equal(diff.added.size, 0);
  assert.deepEqual([...diff.removed], [1]);
  assert.equal(diff.modified.size, 0);
});

test("a change in a non-significant field yields an empty diff", () => {
  const diff = diffSnapshots(
    mapOf(makeSnapshot(1)),
    mapOf(makeSnapshot(1, { path: "/elsewhere", diskSizeBytes: 1, version: "5.0.0", observedAt: 99_999 }))
  );
  assert.equal(isEmptyDiff(diff), true);
});

test("a status change is reported as a modified field", () => {
  const diff = diffSnapshots(mapOf(makeSnapshot(1, { status: "running" })), mapOf(makeSnapshot(1, { status: "stopped" })));
  assert.deepEqual(diffToJSON(diff), { added: [], removed: [], modified: { "1": ["status"] } });
});

test("unchanged indices contribute no modified entry", () => {
  const diff = diffSnapshots(
    mapOf(makeSnapshot(1), makeSnapshot(2)),
    mapOf(makeSnapshot(1), makeSnapshot(2, { cpuUsage: 80, running: false }))
  );
  assert.equal(diff.modified.has(1), false);
  assert.deepEqual([...(diff.modified.get(2) ?? [])], ["cpuUsage", "running"]);
});

test("significant fields are configurable", () => {
  const previous = mapOf(makeSnapshot(1));
  const next = mapOf(makeSnapshot(1, { path: "/moved", status: "stopped" }));
  const diff = diffSnapshots(previous, next, ["path"]);
  assert.deepEqual(diffToJSON(diff).modified, { "1": ["path"] });
});

test("changedFields compares by value and treats NaN readings as equal", () => {
  const before = makeSnapshot(0, { cpuUsage: Number.NaN, name: "alpha" });
  const after = makeSnapshot(0, { cpuUsage: Number.NaN, name: "alpha" });
  assert.equal(changedFields(before, after).size, 0);
});

test("mixed additions, removals and modifications are all captured", () => {
  const diff = diffSnapshots(
    mapOf(makeSnapshot(0), makeSnapshot(1), makeSnapshot(2)),
    mapOf(makeSnapshot(1, { name: "renamed", memoryUsage: 4096 }), makeSnapshot(2), makeSnapshot(5))
  );
  assert.deepEqual(diffToJSON(diff), {
    added: [5],
    removed: [0],
    modified: { "1": ["name", "memoryUsage"] }
  });
  assert.equal(summarizeDiff(diff), "Cache refreshed: +1 -1 ~1");
});
