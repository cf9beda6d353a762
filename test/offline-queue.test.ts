import { describe, it, expect, beforeEach } from "vitest";
import { QUEUE_META_KEY } from "../src/constants";
import { isProtocolError } from "../src/errors";
import { OfflineQueue } from "../src/offline-queue";
import type { BundleRecord } from "../src/types";
import { FailingStorage, MockStorage } from "./setup";

function record(deviceId: string): BundleRecord {
  return {
    userId: "alice",
    deviceId,
    registrationId: 7,
    identityPublicKey: "AQID",
    signedPreKeyId: 1,
    signedPreKeyPublic: "BAUG",
    signedPreKeySignature: "BwgJ",
  };
}

describe("OfflineQueue", () => {
  let storage: MockStorage;
  let queue: OfflineQueue;

  beforeEach(() => {
    storage = new MockStorage();
    queue = new OfflineQueue(storage, () => 5000);
  });

  it("should start empty", async () => {
    expect(await queue.peek()).toBeNull();
    expect(await queue.size()).toBe(0);
  });

  it("should assign increasing sequence numbers", async () => {
    const first = await queue.enqueue({ operationKind: "UploadKeys", payload: record("d1") });
    const second = await queue.enqueue({
      operationKind: "RefreshKeys",
      payload: { userId: "bob" },
    });

    expect(first.sequence).toBe(0);
    expect(second.sequence).toBe(1);
    expect(second.enqueuedAtEpochMs).toBe(5000);
  });

  it("should hand out operations in enqueue order", async () => {
    await queue.enqueue({ operationKind: "UploadKeys", payload: record("d1") });
    await queue.enqueue({ operationKind: "UploadKeys", payload: record("d2") });

    const head = await queue.peek();
    expect(head?.operationKind === "UploadKeys" && head.payload.deviceId).toBe("d1");

    await queue.remove(0);
    const next = await queue.peek();
    expect(next?.operationKind === "UploadKeys" && next.payload.deviceId).toBe("d2");
    expect(await queue.size()).toBe(1);
  });

  it("should survive a new queue over the same storage", async () => {
    await queue.enqueue({ operationKind: "UploadKeys", payload: record("d1") });
    await queue.enqueue({ operationKind: "RefreshKeys", payload: { userId: "bob" } });

    const reopened = new OfflineQueue(storage);
    expect(await reopened.list()).toEqual([
      { sequence: 0, operationKind: "UploadKeys", payload: record("d1"), enqueuedAtEpochMs: 5000 },
      {
        sequence: 1,
        operationKind: "RefreshKeys",
        payload: { userId: "bob" },
        enqueuedAtEpochMs: 5000,
      },
    ]);

    const next = await reopened.enqueue({ operationKind: "RefreshKeys", payload: { userId: "c" } });
    expect(next.sequence).toBe(2);
  });

  it("should skip entries lost between removal and head update", async () => {
    await queue.enqueue({ operationKind: "UploadKeys", payload: record("d1") });
    await queue.enqueue({ operationKind: "UploadKeys", payload: record("d2") });
    await storage.removeItem("signal_offline_queue_0");

    const head = await queue.peek();
    expect(head?.sequence).toBe(1);
    expect(JSON.parse(storage.raw(QUEUE_META_KEY) ?? "{}")).toEqual({ head: 1, tail: 2 });
  });

  it("should discard malformed entries", async () => {
    await queue.enqueue({ operationKind: "UploadKeys", payload: record("d1") });
    await queue.enqueue({ operationKind: "UploadKeys", payload: record("d2") });
    await storage.setItem("signal_offline_queue_0", "{not json");

    expect((await queue.peek())?.sequence).toBe(1);
    expect(storage.raw("signal_offline_queue_0")).toBeUndefined();
  });

  it("should clear every entry and the metadata", async () => {
    await queue.enqueue({ operationKind: "UploadKeys", payload: record("d1") });
    await queue.enqueue({ operationKind: "UploadKeys", payload: record("d2") });

    await queue.clear();

    expect(storage.keys()).toEqual([]);
    expect(await queue.size()).toBe(0);
  });

  it("should let a newer upload for the same device supersede the older one", async () => {
    await queue.enqueue({ operationKind: "UploadKeys", payload: record("d1") });
    await queue.enqueue({ operationKind: "UploadKeys", payload: record("d2") });
    const newer = { ...record("d1"), registrationId: 8 };
    await queue.enqueue({ operationKind: "UploadKeys", payload: newer });

    const operations = await queue.list();
    expect(operations.map((operation) => operation.sequence)).toEqual([1, 2]);
    expect(operations[1]?.payload).toEqual(newer);
    expect(storage.raw("signal_offline_queue_0")).toBeUndefined();
  });

  it("should keep one refresh per user", async () => {
    await queue.enqueue({ operationKind: "RefreshKeys", payload: { userId: "bob" } });
    await queue.enqueue({ operationKind: "RefreshKeys", payload: { userId: "carol" } });
    await queue.enqueue({ operationKind: "RefreshKeys", payload: { userId: "bob" } });

    expect(await queue.size()).toBe(2);
    expect((await queue.peek())?.payload).toEqual({ userId: "carol" });
  });

  it("should drop entries once their maximum age has passed", async () => {
    let now = 5000;
    const aging = new OfflineQueue(storage, () => now);
    const refresh = await aging.enqueue(
      { operationKind: "RefreshKeys", payload: { userId: "bob" } },
      { maxAgeMs: 1000 },
    );
    await aging.enqueue({ operationKind: "UploadKeys", payload: record("d1") });
    expect(refresh.expiresAtEpochMs).toBe(6000);

    now = 5999;
    expect((await aging.peek())?.sequence).toBe(0);

    now = 6000;
    expect((await aging.peek())?.sequence).toBe(1);
    expect(storage.raw("signal_offline_queue_0")).toBeUndefined();
  });

  it("should count what pruneExpired removes", async () => {
    let now = 5000;
    const aging = new OfflineQueue(storage, () => now);
    await aging.enqueue(
      { operationKind: "RefreshKeys", payload: { userId: "bob" } },
      { maxAgeMs: 10 },
    );
    await aging.enqueue(
      { operationKind: "RefreshKeys", payload: { userId: "carol" } },
      { maxAgeMs: 10 },
    );
    await aging.enqueue({ operationKind: "UploadKeys", payload: record("d1") });

    now = 9000;
    expect(await aging.pruneExpired()).toBe(2);
    expect(await aging.size()).toBe(1);
  });

  it("should reject a non-positive maximum age", async () => {
    const error = await queue
      .enqueue({ operationKind: "UploadKeys", payload: record("d1") }, { maxAgeMs: 0 })
      .catch((e: unknown) => e);

    expect(isProtocolError(error, "validation")).toBe(true);
    expect(await queue.size()).toBe(0);
  });

  it("should summarize pending operations", async () => {
    expect(await queue.stats()).toEqual({
      size: 0,
      byKind: { UploadKeys: 0, RefreshKeys: 0 },
      oldestEnqueuedAtEpochMs: null,
    });

    await queue.enqueue({ operationKind: "UploadKeys", payload: record("d1") });
    await queue.enqueue({ operationKind: "UploadKeys", payload: record("d2") });
    await queue.enqueue({ operationKind: "RefreshKeys", payload: { userId: "bob" } });

    expect(await queue.stats()).toEqual({
      size: 3,
      byKind: { UploadKeys: 2, RefreshKeys: 1 },
      oldestEnqueuedAtEpochMs: 5000,
    });
  });

  it("should report storage failures as storage errors", async () => {
    const failing = new FailingStorage().failOn("setItem");
    const broken = new OfflineQueue(failing);

    const error = await broken
      .enqueue({ operationKind: "UploadKeys", payload: record("d1") })
      .catch((e: unknown) => e);
    expect(isProtocolError(error, "storage")).toBe(true);
  });
});
