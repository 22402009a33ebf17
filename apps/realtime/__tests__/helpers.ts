/**
 * Test doubles shared by the realtime tests.
 */

import type { AnalyticsSnapshot } from "@linkcast/shared";
import type { SnapshotProvider } from "@linkcast/analytics";
import type { ConnectionHandle, Update } from "../src/types.js";

export type HandleMode = "ok" | "fail" | "hang";

/**
 * In-memory connection handle recording what the hub sends it
 */
export class FakeHandle implements ConnectionHandle {
  readonly sent: Update[] = [];
  sendMode: HandleMode = "ok";
  pingMode: HandleMode = "ok";
  pings = 0;
  closeCalls = 0;

  constructor(readonly id: string) {}

  async send(update: Update): Promise<void> {
    await this.act(this.sendMode);
    this.sent.push(update);
  }

  async ping(): Promise<void> {
    await this.act(this.pingMode);
    this.pings++;
  }

  close(): void {
    this.closeCalls++;
  }

  ofKind(kind: Update["kind"]): Update[] {
    return this.sent.filter((update) => update.kind === kind);
  }

  private act(mode: HandleMode): Promise<void> {
    if (mode === "fail") return Promise.reject(new Error("broken pipe"));
    if (mode === "hang") return new Promise<void>(() => undefined);
    return Promise.resolve();
  }
}

/**
 * Snapshot provider answering from a map; unknown topics resolve null
 */
export class StubSnapshots implements SnapshotProvider {
  readonly calls: Array<[string, number]> = [];
  readonly results = new Map<string, AnalyticsSnapshot>();
  error: Error | null = null;
  gate: Promise<void> | null = null;

  async getSnapshot(shortCode: string, windowDays: number): Promise<AnalyticsSnapshot | null> {
    this.calls.push([shortCode, windowDays]);
    if (this.gate) await this.gate;
    if (this.error) throw this.error;
    return this.results.get(shortCode) ?? null;
  }
}

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

export function deferred(): Deferred {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/**
 * Poll until `predicate` holds, failing after `timeoutMs`.
 */
export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

/**
 * Let pending promise callbacks run.
 */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
