import { describe, it, expect, beforeEach } from "vitest";
import { isProtocolError } from "../src/errors";
import { MemoryDirectory } from "../src/memory-directory";
import type { JsonValue } from "../src/types";
import { flush } from "./setup";

describe("MemoryDirectory", () => {
  let directory: MemoryDirectory;

  beforeEach(() => {
    directory = new MemoryDirectory();
  });

  it("should read back what was written", async () => {
    await directory.put("a/b/c", { x: 1 });

    expect(await directory.get("a/b/c")).toEqual({ x: 1 });
    expect(await directory.get("a/b")).toEqual({ c: { x: 1 } });
    expect(await directory.get("a/missing")).toBeNull();
  });

  it("should copy values on the way in and out", async () => {
    const value = { x: 1 };
    await directory.put("a", value);
    value.x = 2;

    const read = await directory.get("a");
    expect(read).toEqual({ x: 1 });
  });

  it("should drop empty parents on removal", async () => {
    await directory.put("a/b/c", "v");
    await directory.remove("a/b/c");

    expect(await directory.get("a")).toBeNull();
  });

  it("should treat writing null as removal", async () => {
    await directory.put("a/b", "v");
    await directory.put("a/b", null);
    expect(await directory.get("a/b")).toBeNull();
  });

  it("should fail reads and writes while offline", async () => {
    directory.setOnline(false);

    const error = await directory.put("a", 1).catch((e: unknown) => e);
    expect(isProtocolError(error, "network")).toBe(true);
    await expect(directory.get("a")).rejects.toThrow("Directory is offline");
  });

  it("should honour an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    const error = await directory.get("a", { signal: controller.signal }).catch((e: unknown) => e);
    expect(isProtocolError(error) && error.code).toBe("ABORTED");
  });

  it("should deliver the current value and later changes to watchers", async () => {
    await directory.put("users/alice/devices/d1", { k: 1 });
    const seen: (JsonValue | null)[] = [];

    const unsubscribe = directory.watch("users/alice/devices", (value) => seen.push(value));
    await flush();
    await directory.put("users/alice/devices/d2", { k: 2 });
    await directory.put("users/bob/devices/d1", { k: 3 });
    await directory.remove("users/alice/devices/d1");
    unsubscribe();
    await directory.put("users/alice/devices/d3", { k: 4 });

    expect(seen).toEqual([
      { d1: { k: 1 } },
      { d1: { k: 1 }, d2: { k: 2 } },
      { d2: { k: 2 } },
    ]);
  });

  it("should report connection changes", () => {
    const states: boolean[] = [];
    const unsubscribe = directory.watchConnection((online) => states.push(online));

    directory.setOnline(false);
    directory.setOnline(false);
    directory.setOnline(true);
    unsubscribe();
    directory.setOnline(false);

    expect(states).toEqual([true, false, true]);
  });

  it("should pass watcher failures to the error callback", async () => {
    const errors: unknown[] = [];
    directory.watch("a", () => undefined, (error) => errors.push(error));

    directory.failWatchers(new Error("permission denied"));

    expect(errors).toHaveLength(1);
    expect(directory.watcherCount).toBe(0);
  });
});
