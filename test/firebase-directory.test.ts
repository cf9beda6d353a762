import { describe, it, expect, beforeEach, vi } from "vitest";

const firebase = vi.hoisted(() => {
  const listeners = new Map<
    string,
    { onValue: (snapshot: unknown) => void; onCancel?: (error: Error) => void }
  >();
  const snapshot = (value: unknown) => ({
    exists: () => value !== null && value !== undefined,
    val: () => value,
  });

  return {
    listeners,
    snapshot,
    app: { name: "test-app" },
    db: { kind: "database" },
    initializeApp: vi.fn(),
    deleteApp: vi.fn(),
    getDatabase: vi.fn(),
    ref: vi.fn((_db: unknown, path: string) => ({ path })),
    set: vi.fn(),
    get: vi.fn(),
    remove: vi.fn(),
    onValue: vi.fn(),
  };
});

vi.mock("firebase/app", () => ({
  initializeApp: firebase.initializeApp,
  deleteApp: firebase.deleteApp,
}));

vi.mock("firebase/database", () => ({
  getDatabase: firebase.getDatabase,
  ref: firebase.ref,
  set: firebase.set,
  get: firebase.get,
  remove: firebase.remove,
  onValue: firebase.onValue,
}));

import type { FirebaseApp } from "firebase/app";
import { FirebaseDirectory, toJsonValue } from "../src/firebase-directory";
import { isProtocolError } from "../src/errors";
import type { JsonValue } from "../src/types";
import { TEST_URL } from "./setup";

describe("FirebaseDirectory", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    firebase.listeners.clear();
    firebase.initializeApp.mockReturnValue(firebase.app);
    firebase.getDatabase.mockReturnValue(firebase.db);
    firebase.deleteApp.mockResolvedValue(undefined);
    firebase.set.mockResolvedValue(undefined);
    firebase.remove.mockResolvedValue(undefined);
    firebase.get.mockResolvedValue(firebase.snapshot(null));
    firebase.onValue.mockImplementation(
      (
        reference: { path: string },
        onValue: (snapshot: unknown) => void,
        onCancel?: (error: Error) => void,
      ) => {
        firebase.listeners.set(reference.path, { onValue, onCancel });
        return () => firebase.listeners.delete(reference.path);
      },
    );
  });

  it("should create a named app for the database URL", () => {
    new FirebaseDirectory({ databaseURL: TEST_URL });

    expect(firebase.initializeApp).toHaveBeenCalledWith(
      { databaseURL: TEST_URL },
      "keysync:x.example.com",
    );
    expect(firebase.getDatabase).toHaveBeenCalledWith(firebase.app, TEST_URL);
  });

  it("should reject a non-https database URL", () => {
    expect(() => new FirebaseDirectory({ databaseURL: "http://x.example.com" })).toThrow(
      "directoryEndpointUrl must use https",
    );
  });

  it("should write values at the given path", async () => {
    const directory = new FirebaseDirectory({ databaseURL: TEST_URL });
    await directory.put("signal_protocol/users/alice/devices/d1", { a: 1 });

    expect(firebase.set).toHaveBeenCalledWith(
      { path: "signal_protocol/users/alice/devices/d1" },
      { a: 1 },
    );
  });

  it("should return null for missing paths and the value otherwise", async () => {
    const directory = new FirebaseDirectory({ databaseURL: TEST_URL });
    expect(await directory.get("missing")).toBeNull();

    firebase.get.mockResolvedValueOnce(firebase.snapshot({ d1: { a: 1 } }));
    expect(await directory.get("present")).toEqual({ d1: { a: 1 } });
  });

  it("should propagate SDK failures", async () => {
    const directory = new FirebaseDirectory({ databaseURL: TEST_URL });
    firebase.set.mockRejectedValueOnce(new Error("PERMISSION_DENIED"));

    await expect(directory.put("a", 1)).rejects.toThrow("PERMISSION_DENIED");
  });

  it("should stop waiting when the signal aborts", async () => {
    const directory = new FirebaseDirectory({ databaseURL: TEST_URL });
    firebase.get.mockReturnValueOnce(new Promise(() => undefined));
    const controller = new AbortController();

    const pending = directory.get("slow", { signal: controller.signal });
    controller.abort();

    const error = await pending.catch((e: unknown) => e);
    expect(isProtocolError(error, "network")).toBe(true);
    expect(isProtocolError(error) && error.code).toBe("ABORTED");
  });

  it("should not call the SDK with an already aborted signal", async () => {
    const directory = new FirebaseDirectory({ databaseURL: TEST_URL });
    const controller = new AbortController();
    controller.abort();

    await expect(directory.put("a", 1, { signal: controller.signal })).rejects.toThrow(
      "Operation aborted",
    );
    expect(firebase.set).not.toHaveBeenCalled();
  });

  it("should give up on an in-flight write without cancelling it", async () => {
    const directory = new FirebaseDirectory({ databaseURL: TEST_URL });
    let finishWrite: () => void = () => undefined;
    firebase.set.mockReturnValueOnce(
      new Promise<void>((resolve) => {
        finishWrite = resolve;
      }),
    );
    const controller = new AbortController();

    const pending = directory.put("a", 1, { signal: controller.signal });
    controller.abort();
    const error = await pending.catch((e: unknown) => e);
    finishWrite();

    expect(isProtocolError(error) && error.code).toBe("ABORTED");
    expect(firebase.set).toHaveBeenCalledWith({ path: "a" }, 1);
  });

  it("should deliver watched values and report cancellation", () => {
    const directory = new FirebaseDirectory({ databaseURL: TEST_URL });
    const values: (JsonValue | null)[] = [];
    const errors: unknown[] = [];

    directory.watch("p", (value) => values.push(value), (error) => errors.push(error));
    const listener = firebase.listeners.get("p");
    listener?.onValue(firebase.snapshot({ a: "b" }));
    listener?.onValue(firebase.snapshot(null));
    listener?.onCancel?.(new Error("permission_denied"));

    expect(values).toEqual([{ a: "b" }, null]);
    expect(errors).toHaveLength(1);
  });

  it("should map .info/connected to connection state", () => {
    const directory = new FirebaseDirectory({ databaseURL: TEST_URL });
    const states: boolean[] = [];

    directory.watchConnection((online) => states.push(online));
    const listener = firebase.listeners.get(".info/connected");
    listener?.onValue(firebase.snapshot(false));
    listener?.onValue(firebase.snapshot(true));

    expect(states).toEqual([false, true]);
  });

  it("should release watches and the app it created on close", async () => {
    const directory = new FirebaseDirectory({ databaseURL: TEST_URL });
    directory.watch("p", () => undefined);

    await directory.close();

    expect(firebase.listeners.size).toBe(0);
    expect(firebase.deleteApp).toHaveBeenCalledWith(firebase.app);
  });

  it("should leave a host-provided app running", async () => {
    const hostApp: FirebaseApp = {
      name: "host",
      options: {},
      automaticDataCollectionEnabled: false,
    };
    const directory = new FirebaseDirectory({ databaseURL: TEST_URL, app: hostApp });

    await directory.close();

    expect(firebase.initializeApp).not.toHaveBeenCalled();
    expect(firebase.deleteApp).not.toHaveBeenCalled();
  });
});

describe("toJsonValue", () => {
  it("should keep JSON-representable data only", () => {
    expect(toJsonValue({ a: 1, b: [true, "x"], c: undefined, d: Number.NaN })).toEqual({
      a: 1,
      b: [true, "x"],
    });
    expect(toJsonValue(() => 1)).toBeNull();
  });
});
