import type { InstanceSnapshot, SnapshotSource } from "../src/lib/types";

export function makeSnapshot(index: number, overrides: Partial<InstanceSnapshot> = {}): InstanceSnapshot {
  return {
    index,
    name: `VM ${index}`,
    status: "running",
    cpuUsage: 12.5,
    memoryUsage: 2048,
    diskUsageText: "1.5GB",
    diskSizeBytes: 1_610_612_736,
    path: `/vms/${index}`,
    version: "4.0.1",
    running: true,
    observedAt: 1_000,
    ...overrides
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

/** In-memory snapshot source with a gate to hold fetches open and counters for assertions. */
export class FakeSource implements SnapshotSource {
  snapshots: InstanceSnapshot[] = [];
  failure: Error | undefined;
  gate: Deferred<void> | undefined;
  fetchAllCalls = 0;
  fetchOneCalls = 0;
  active = 0;
  maxActive = 0;

  constructor(snapshots: InstanceSnapshot[] = []) {
    this.snapshots = snapshots;
  }

  async fetchAll(): Promise<InstanceSnapshot[]> {
    this.fetchAllCalls += 1;
    return await this.guarded(() => this.snapshots.map((snapshot) => ({ ...snapshot })));
  }

  async fetchOne(index: number): Promise<InstanceSnapshot> {
    this.fetchOneCalls += 1;
    return await this.guarded(() => {
      const match = this.snapshots.find((snapshot) => snapshot.index === index);
      if (!match) {
        throw new Error(`no instance ${index}`);
      }
      return { ...match };
    });
  }

  private async guarded<T>(produce: () => T): Promise<T> {
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.gate) {
        await this.gate.promise;
      }
      if (this.failure) {
        throw this.failure;
      }
      return produce();
    } finally {
      this.active -= 1;
    }
  }
}

export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeoutMs) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
