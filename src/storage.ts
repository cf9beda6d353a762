// src/storage.ts
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { openString, sealString } from "./crypto";
import { securityError } from "./errors";
import { Mutex } from "./mutex";
import type { StorageAdapter } from "./types";

export class MemoryStorage implements StorageAdapter {
  private store = new Map<string, string>();

  async setItem(key: string, value: string): Promise<void> {
    this.store.set(key, value);
  }

  async getItem(key: string): Promise<string | null> {
    return this.store.get(key) ?? null;
  }

  async removeItem(key: string): Promise<void> {
    this.store.delete(key);
  }

  keys(): string[] {
    return Array.from(this.store.keys());
  }

  clear(): void {
    this.store.clear();
  }
}

/**
 * Seals every value with XChaCha20-Poly1305 before handing it to the wrapped
 * adapter. Keys are left readable so the inner store can still address them.
 */
export class EncryptedStorage implements StorageAdapter {
  private inner: StorageAdapter;
  private key: Uint8Array;

  constructor(inner: StorageAdapter, key: Uint8Array) {
    if (key.length !== 32) {
      throw new Error("Encryption key must be 32 bytes");
    }
    this.inner = inner;
    this.key = key;
  }

  async setItem(key: string, value: string): Promise<void> {
    await this.inner.setItem(key, sealString(this.key, value));
  }

  async getItem(key: string): Promise<string | null> {
    const sealed = await this.inner.getItem(key);
    if (sealed === null) return null;
    try {
      return openString(this.key, sealed);
    } catch (error) {
      throw securityError(`Stored value for ${key} failed authentication`, {
        code: "TAMPERED_VALUE",
        details: { key },
        cause: error,
      });
    }
  }

  async removeItem(key: string): Promise<void> {
    await this.inner.removeItem(key);
  }
}

/**
 * Key-value store persisted as one JSON file. Writes go to a temporary file
 * that is renamed over the original. Pair with {@link EncryptedStorage} for
 * encryption at rest.
 */
export class FileStorage implements StorageAdapter {
  private path: string;
  private cache: Map<string, string> | null = null;
  private lock = new Mutex();

  constructor(path: string) {
    this.path = path;
  }

  async setItem(key: string, value: string): Promise<void> {
    await this.lock.runExclusive(async () => {
      const entries = new Map(await this.load());
      entries.set(key, value);
      await this.flush(entries);
    });
  }

  async getItem(key: string): Promise<string | null> {
    const entries = await this.lock.runExclusive(() => this.load());
    return entries.get(key) ?? null;
  }

  async removeItem(key: string): Promise<void> {
    await this.lock.runExclusive(async () => {
      const entries = new Map(await this.load());
      if (entries.delete(key)) {
        await this.flush(entries);
      }
    });
  }

  private async load(): Promise<Map<string, string>> {
    if (this.cache) return this.cache;

    let contents: string;
    try {
      contents = await readFile(this.path, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        this.cache = new Map();
        return this.cache;
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(contents);
    const entries = new Map<string, string>();
    if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
      for (const [key, value] of Object.entries(parsed)) {
        if (typeof value === "string") entries.set(key, value);
      }
    }
    this.cache = entries;
    return entries;
  }

  private async flush(entries: Map<string, string>): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmpPath = `${this.path}.tmp`;
    await writeFile(tmpPath, JSON.stringify(Object.fromEntries(entries)), {
      encoding: "utf8",
      mode: 0o600,
    });
    await rename(tmpPath, this.path);
    this.cache = entries;
  }
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
