import { deleteApp, initializeApp } from "firebase/app";
import type { FirebaseApp } from "firebase/app";
import { get, getDatabase, onValue, ref, remove, set } from "firebase/database";
import type { Database } from "firebase/database";
import { raceAbort, throwIfAborted } from "./abort";
import { Logger } from "./logger";
import { validateDirectoryUrl } from "./validator";
import type {
  DirectoryTransport,
  JsonValue,
  OperationOptions,
  Unsubscribe,
} from "./types";

export interface FirebaseDirectoryOptions {
  databaseURL: string;
  /** Firebase app name; defaults to one derived from the database URL. */
  appName?: string;
  /** Use an app the host already initialized instead of creating one. */
  app?: FirebaseApp;
}

/**
 * Directory transport over the Firebase Realtime Database client SDK.
 */
export class FirebaseDirectory implements DirectoryTransport {
  private app: FirebaseApp;
  private db: Database;
  private ownsApp: boolean;
  private subscriptions = new Set<Unsubscribe>();

  constructor(options: FirebaseDirectoryOptions) {
    const databaseURL = validateDirectoryUrl(options.databaseURL);
    if (options.app) {
      this.app = options.app;
      this.ownsApp = false;
    } else {
      this.app = initializeApp(
        { databaseURL },
        options.appName ?? `keysync:${new URL(databaseURL).host}`,
      );
      this.ownsApp = true;
    }
    this.db = getDatabase(this.app, databaseURL);
  }

  /**
   * The SDK cannot cancel a write. An abort before the call leaves the
   * database untouched; an abort while the write is in flight only stops
   * waiting, and the write may still be applied.
   */
  async put(path: string, value: JsonValue, options?: OperationOptions): Promise<void> {
    throwIfAborted(options?.signal);
    await raceAbort(set(ref(this.db, path), value), options?.signal);
  }

  async get(path: string, options?: OperationOptions): Promise<JsonValue | null> {
    throwIfAborted(options?.signal);
    const snapshot = await raceAbort(get(ref(this.db, path)), options?.signal);
    if (!snapshot.exists()) return null;
    return toJsonValue(snapshot.val());
  }

  /** Abort behaves as for {@link put}. */
  async remove(path: string, options?: OperationOptions): Promise<void> {
    throwIfAborted(options?.signal);
    await raceAbort(remove(ref(this.db, path)), options?.signal);
  }

  watch(
    path: string,
    onChange: (value: JsonValue | null) => void,
    onError?: (error: unknown) => void,
  ): Unsubscribe {
    const unsubscribe = onValue(
      ref(this.db, path),
      (snapshot) => onChange(snapshot.exists() ? toJsonValue(snapshot.val()) : null),
      (error) => {
        this.subscriptions.delete(unsubscribe);
        if (onError) {
          onError(error);
        } else {
          Logger.error("FirebaseDirectory", `Watch on ${path} cancelled`, error);
        }
      },
    );
    this.subscriptions.add(unsubscribe);
    return () => {
      this.subscriptions.delete(unsubscribe);
      unsubscribe();
    };
  }

  watchConnection(listener: (online: boolean) => void): Unsubscribe {
    return this.watch(".info/connected", (value) => listener(value === true));
  }

  async close(): Promise<void> {
    for (const unsubscribe of [...this.subscriptions]) {
      unsubscribe();
    }
    this.subscriptions.clear();
    if (this.ownsApp) {
      await deleteApp(this.app);
    }
  }
}

/**
 * Snapshot values arrive untyped; keep only what JSON can represent.
 */
export function toJsonValue(value: unknown): JsonValue | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) {
    return value.map((item) => toJsonValue(item));
  }
  if (typeof value === "object") {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, child] of Object.entries(value)) {
      const converted = toJsonValue(child);
      if (converted !== null) result[key] = converted;
    }
    return result;
  }
  return null;
}
