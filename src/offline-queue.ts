import { QUEUE_ENTRY_PREFIX, QUEUE_META_KEY } from "./constants";
import { validationError, wrapStorageError } from "./errors";
import { Logger } from "./logger";
import { Mutex } from "./mutex";
import { parseBundleRecord, validateUserId } from "./validator";
import type { BundleRecord, PendingOperation, QueueStats, StorageAdapter } from "./types";

export type OperationInput =
  | { operationKind: "UploadKeys"; payload: BundleRecord }
  | { operationKind: "RefreshKeys"; payload: { userId: string } };

export interface EnqueueOptions {
  /** Drop the operation unapplied once it has waited this long. */
  maxAgeMs?: number;
}

interface QueueMeta {
  /** Sequence of the oldest entry that may still exist. */
  head: number;
  /** Sequence the next enqueued entry receives. */
  tail: number;
}

/**
 * Persistent FIFO of directory operations deferred while offline.
 *
 * Entries live under `signal_offline_queue_<sequence>` next to a meta entry
 * holding the head and tail sequence numbers. An entry is written before the
 * tail moves and removed before the head moves, so an interrupted update
 * leaves at worst a gap that readers skip.
 *
 * A new operation supersedes queued ones with the same target: an upload
 * replaces earlier uploads for its device and a refresh replaces earlier
 * refreshes for its user. The newcomer goes to the back of the queue.
 * Expired entries are removed whenever they are read.
 */
export class OfflineQueue {
  private lock = new Mutex();

  constructor(
    private storage: StorageAdapter,
    private now: () => number = Date.now,
  ) {}

  async enqueue(input: OperationInput, options: EnqueueOptions = {}): Promise<PendingOperation> {
    if (options.maxAgeMs !== undefined && !(options.maxAgeMs > 0)) {
      throw validationError("maxAgeMs must be a positive number", "maxAgeMs", {
        received: options.maxAgeMs,
      });
    }

    return this.lock.runExclusive(async () => {
      const meta = await this.readMeta();
      const target = targetOf(input);
      let superseded = 0;
      for (let sequence = meta.head; sequence < meta.tail; sequence++) {
        const existing = await this.readEntry(sequence);
        if (existing && targetOf(existing) === target) {
          await this.delete(entryKey(sequence));
          superseded++;
        }
      }

      const enqueuedAtEpochMs = this.now();
      const operation: PendingOperation = {
        ...input,
        sequence: meta.tail,
        enqueuedAtEpochMs,
        ...(options.maxAgeMs === undefined
          ? {}
          : { expiresAtEpochMs: enqueuedAtEpochMs + options.maxAgeMs }),
      };

      await this.write(entryKey(operation.sequence), JSON.stringify(operation));
      await this.writeMeta({ head: meta.head, tail: meta.tail + 1 });

      Logger.log("OfflineQueue", "Queued operation", {
        operationKind: operation.operationKind,
        sequence: operation.sequence,
        superseded,
      });
      return operation;
    });
  }

  /** Oldest pending operation, or null when the queue is empty. */
  async peek(): Promise<PendingOperation | null> {
    return this.lock.runExclusive(async () => {
      const meta = await this.readMeta();
      for (let sequence = meta.head; sequence < meta.tail; sequence++) {
        const operation = await this.readEntry(sequence);
        if (operation) {
          if (sequence !== meta.head) {
            await this.writeMeta({ head: sequence, tail: meta.tail });
          }
          return operation;
        }
      }
      if (meta.head !== meta.tail) {
        await this.writeMeta({ head: meta.tail, tail: meta.tail });
      }
      return null;
    });
  }

  /** Drop an operation once it has been applied. */
  async remove(sequence: number): Promise<void> {
    await this.lock.runExclusive(async () => {
      const meta = await this.readMeta();
      await this.delete(entryKey(sequence));
      if (sequence === meta.head) {
        await this.writeMeta({ head: meta.head + 1, tail: meta.tail });
      }
    });
  }

  async list(): Promise<PendingOperation[]> {
    return this.lock.runExclusive(async () => {
      const meta = await this.readMeta();
      const operations: PendingOperation[] = [];
      for (let sequence = meta.head; sequence < meta.tail; sequence++) {
        const operation = await this.readEntry(sequence);
        if (operation) operations.push(operation);
      }
      return operations;
    });
  }

  async size(): Promise<number> {
    return (await this.list()).length;
  }

  async stats(): Promise<QueueStats> {
    const operations = await this.list();
    const byKind = { UploadKeys: 0, RefreshKeys: 0 };
    for (const operation of operations) {
      byKind[operation.operationKind]++;
    }
    return {
      size: operations.length,
      byKind,
      oldestEnqueuedAtEpochMs: operations[0]?.enqueuedAtEpochMs ?? null,
    };
  }

  /** Remove every expired entry; resolves to how many were dropped. */
  async pruneExpired(): Promise<number> {
    return this.lock.runExclusive(async () => {
      const meta = await this.readMeta();
      let pruned = 0;
      for (let sequence = meta.head; sequence < meta.tail; sequence++) {
        await this.readEntry(sequence, () => pruned++);
      }
      return pruned;
    });
  }

  async clear(): Promise<void> {
    await this.lock.runExclusive(async () => {
      const meta = await this.readMeta();
      for (let sequence = meta.head; sequence < meta.tail; sequence++) {
        await this.delete(entryKey(sequence));
      }
      await this.delete(QUEUE_META_KEY);
    });
  }

  private async readMeta(): Promise<QueueMeta> {
    const value = await this.read(QUEUE_META_KEY);
    if (value === null) return { head: 0, tail: 0 };

    const parsed = safeParse(value);
    if (
      parsed &&
      typeof parsed === "object" &&
      "head" in parsed &&
      "tail" in parsed &&
      Number.isInteger(parsed.head) &&
      Number.isInteger(parsed.tail) &&
      typeof parsed.head === "number" &&
      typeof parsed.tail === "number" &&
      parsed.head <= parsed.tail
    ) {
      return { head: parsed.head, tail: parsed.tail };
    }

    Logger.error("OfflineQueue", "Queue metadata is corrupt, starting empty");
    return { head: 0, tail: 0 };
  }

  private async writeMeta(meta: QueueMeta): Promise<void> {
    await this.write(QUEUE_META_KEY, JSON.stringify(meta));
  }

  private async readEntry(
    sequence: number,
    onExpired?: () => void,
  ): Promise<PendingOperation | null> {
    const value = await this.read(entryKey(sequence));
    if (value === null) return null;

    const operation = parseOperation(safeParse(value), sequence);
    if (!operation) {
      // An unreadable entry would block every entry behind it
      Logger.error("OfflineQueue", "Discarding malformed queue entry", { sequence });
      await this.delete(entryKey(sequence));
      return null;
    }

    if (operation.expiresAtEpochMs !== undefined && operation.expiresAtEpochMs <= this.now()) {
      Logger.warn("OfflineQueue", "Dropping expired operation", {
        operationKind: operation.operationKind,
        sequence,
      });
      await this.delete(entryKey(sequence));
      onExpired?.();
      return null;
    }
    return operation;
  }

  private async read(key: string): Promise<string | null> {
    try {
      return await this.storage.getItem(key);
    } catch (error) {
      throw wrapStorageError(error, "OfflineQueue.read");
    }
  }

  private async write(key: string, value: string): Promise<void> {
    try {
      await this.storage.setItem(key, value);
    } catch (error) {
      throw wrapStorageError(error, "OfflineQueue.write");
    }
  }

  private async delete(key: string): Promise<void> {
    try {
      await this.storage.removeItem(key);
    } catch (error) {
      throw wrapStorageError(error, "OfflineQueue.delete");
    }
  }
}

function targetOf(operation: OperationInput): string {
  switch (operation.operationKind) {
    case "UploadKeys":
      return `upload:${operation.payload.userId}/${operation.payload.deviceId}`;
    case "RefreshKeys":
      return `refresh:${operation.payload.userId}`;
  }
}

function entryKey(sequence: number): string {
  return `${QUEUE_ENTRY_PREFIX}${sequence}`;
}

function safeParse(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return null;
  }
}

function parseOperation(data: unknown, sequence: number): PendingOperation | null {
  if (!data || typeof data !== "object") return null;
  const entry: Record<string, unknown> = { ...data };
  if (typeof entry.enqueuedAtEpochMs !== "number") return null;
  const enqueuedAtEpochMs = entry.enqueuedAtEpochMs;
  const expiry =
    typeof entry.expiresAtEpochMs === "number"
      ? { expiresAtEpochMs: entry.expiresAtEpochMs }
      : {};

  try {
    if (entry.operationKind === "UploadKeys") {
      return {
        sequence,
        operationKind: "UploadKeys",
        payload: parseBundleRecord(entry.payload),
        enqueuedAtEpochMs,
        ...expiry,
      };
    }
    if (
      entry.operationKind === "RefreshKeys" &&
      entry.payload &&
      typeof entry.payload === "object" &&
      "userId" in entry.payload
    ) {
      return {
        sequence,
        operationKind: "RefreshKeys",
        payload: { userId: validateUserId(entry.payload.userId) },
        enqueuedAtEpochMs,
        ...expiry,
      };
    }
  } catch (error) {
    Logger.warn("OfflineQueue", "Queue entry failed validation", {
      sequence,
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  return null;
}
