import { throwIfAborted } from "./abort";
import { networkError } from "./errors";
import type {
  DirectoryTransport,
  JsonValue,
  OperationOptions,
  Unsubscribe,
} from "./types";

type JsonObject = { [key: string]: JsonValue };

interface Watcher {
  path: string[];
  onValue: (value: JsonValue | null) => void;
  onError?: (error: unknown) => void;
  last: string | undefined;
}

/**
 * In-process directory with the same path semantics as the Realtime
 * Database: writing null deletes, empty objects disappear, and a watcher
 * fires once with the current value and then on every change under its
 * path. `setOnline(false)` makes reads and writes fail.
 */
export class MemoryDirectory implements DirectoryTransport {
  private root: JsonObject = {};
  private watchers = new Set<Watcher>();
  private connectionListeners = new Set<(online: boolean) => void>();
  private online = true;

  async put(path: string, value: JsonValue, options?: OperationOptions): Promise<void> {
    this.checkAvailable(options);
    const segments = splitPath(path);
    if (value === null) {
      removeAt(this.root, segments);
    } else {
      setAt(this.root, segments, structuredClone(value));
    }
    this.notify();
  }

  async get(path: string, options?: OperationOptions): Promise<JsonValue | null> {
    this.checkAvailable(options);
    const value = getAt(this.root, splitPath(path));
    return value === null ? null : structuredClone(value);
  }

  async remove(path: string, options?: OperationOptions): Promise<void> {
    this.checkAvailable(options);
    removeAt(this.root, splitPath(path));
    this.notify();
  }

  watch(
    path: string,
    onValue: (value: JsonValue | null) => void,
    onError?: (error: unknown) => void,
  ): Unsubscribe {
    const watcher: Watcher = { path: splitPath(path), onValue, onError, last: undefined };
    this.watchers.add(watcher);
    queueMicrotask(() => {
      if (this.watchers.has(watcher)) this.deliver(watcher);
    });
    return () => {
      this.watchers.delete(watcher);
    };
  }

  watchConnection(listener: (online: boolean) => void): Unsubscribe {
    this.connectionListeners.add(listener);
    listener(this.online);
    return () => {
      this.connectionListeners.delete(listener);
    };
  }

  setOnline(online: boolean): void {
    if (this.online === online) return;
    this.online = online;
    for (const listener of [...this.connectionListeners]) {
      listener(online);
    }
  }

  isOnline(): boolean {
    return this.online;
  }

  /** Fail every active watcher, as a revoked permission would. */
  failWatchers(error: unknown): void {
    for (const watcher of [...this.watchers]) {
      this.watchers.delete(watcher);
      watcher.onError?.(error);
    }
  }

  get watcherCount(): number {
    return this.watchers.size;
  }

  async close(): Promise<void> {
    this.watchers.clear();
    this.connectionListeners.clear();
  }

  private checkAvailable(options?: OperationOptions): void {
    throwIfAborted(options?.signal);
    if (!this.online) {
      throw networkError("Directory is offline", { code: "OFFLINE" });
    }
  }

  private notify(): void {
    for (const watcher of [...this.watchers]) {
      this.deliver(watcher);
    }
  }

  private deliver(watcher: Watcher): void {
    const value = getAt(this.root, watcher.path);
    const serialized = JSON.stringify(value);
    if (serialized === watcher.last) return;
    watcher.last = serialized;
    watcher.onValue(value === null ? null : structuredClone(value));
  }
}

function splitPath(path: string): string[] {
  return path.split("/").filter((segment) => segment.length > 0);
}

function isObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function getAt(root: JsonObject, segments: string[]): JsonValue | null {
  let current: JsonValue = root;
  for (const segment of segments) {
    if (!isObject(current)) return null;
    const next: JsonValue | undefined = current[segment];
    if (next === undefined) return null;
    current = next;
  }
  if (isObject(current) && Object.keys(current).length === 0) return null;
  return current;
}

function setAt(root: JsonObject, segments: string[], value: JsonValue): void {
  if (segments.length === 0) {
    if (!isObject(value)) {
      throw networkError("Only an object can be written at the root", {
        code: "INVALID_ROOT_WRITE",
      });
    }
    for (const key of Object.keys(root)) delete root[key];
    Object.assign(root, value);
    return;
  }

  let current = root;
  for (const segment of segments.slice(0, -1)) {
    const next = current[segment];
    if (isObject(next)) {
      current = next;
    } else {
      const created: JsonObject = {};
      current[segment] = created;
      current = created;
    }
  }
  current[segments[segments.length - 1]] = value;
}

function removeAt(root: JsonObject, segments: string[]): void {
  if (segments.length === 0) {
    for (const key of Object.keys(root)) delete root[key];
    return;
  }

  const [head, ...rest] = segments;
  const child = root[head];
  if (rest.length === 0) {
    delete root[head];
    return;
  }
  if (!isObject(child)) return;
  removeAt(child, rest);
  if (Object.keys(child).length === 0) {
    delete root[head];
  }
}
