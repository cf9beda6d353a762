import { throwIfAborted } from "./abort";
import {
  assertPublicOnly,
  decodeBundle,
  devicePath,
  encodeBundle,
  recordToJson,
  recordsEqual,
  userDevicesPath,
} from "./bundle";
import { describeError, isProtocolError, wrapNetworkError } from "./errors";
import { Logger, truncateId } from "./logger";
import type { OfflineQueue } from "./offline-queue";
import {
  parseBundleRecord,
  validatePreKeyBundle,
  validateString,
  validateUserId,
} from "./validator";
import type {
  BundleRecord,
  DirectoryTransport,
  DrainResult,
  JsonValue,
  KeyProvider,
  OperationOptions,
  PendingOperation,
  PreKeyBundle,
  QueueStats,
  Unsubscribe,
  UploadResult,
} from "./types";

export type ReconcileResult = UploadResult | "unchanged";

const QUEUED_REFRESH_MAX_AGE_MS = 24 * 60 * 60 * 1000;

export interface KeyDirectoryClientOptions {
  transport: DirectoryTransport;
  queue: OfflineQueue;
  /** Needed to check signed pre-key signatures on fetched bundles. */
  keyProvider?: KeyProvider;
  verifySignatures?: boolean;
  /** How long a queued peer refresh stays worth replaying. */
  refreshMaxAgeMs?: number;
}

/**
 * Publishes this device's bundle to the key directory and reads other
 * users' bundles from it. Writes that fail for lack of connectivity are
 * kept in the offline queue and replayed by {@link drainQueue}.
 */
export class KeyDirectoryClient {
  private transport: DirectoryTransport;
  private queue: OfflineQueue;
  private keyProvider?: KeyProvider;
  private verifySignatures: boolean;
  private peerCache = new Map<string, PreKeyBundle[]>();
  private subscriptions = new Set<Unsubscribe>();
  private draining: Promise<DrainResult> | null = null;
  private refreshMaxAgeMs: number;

  constructor(options: KeyDirectoryClientOptions) {
    this.transport = options.transport;
    this.queue = options.queue;
    this.keyProvider = options.keyProvider;
    this.verifySignatures = options.verifySignatures ?? true;
    this.refreshMaxAgeMs = options.refreshMaxAgeMs ?? QUEUED_REFRESH_MAX_AGE_MS;
  }

  /**
   * Write `bundle` to its device path. Operations already queued are drained
   * first; when they cannot all be applied the write joins the queue behind
   * them. A transport failure queues the write and resolves to "queued".
   *
   * An aborted signal rejects and queues nothing. If the abort lands while
   * the write is in flight the transport may still apply it.
   */
  async upload(bundle: PreKeyBundle, options: OperationOptions = {}): Promise<UploadResult> {
    throwIfAborted(options.signal);
    assertPublicOnly(bundle);
    validatePreKeyBundle(bundle);

    const record = encodeBundle(bundle);
    return this.putRecord(record, options);
  }

  /**
   * True iff at least one device of `userId` has a well-formed bundle.
   * Transport failures raise a network error rather than reporting false.
   */
  async hasKeysForUser(userId: string, options: OperationOptions = {}): Promise<boolean> {
    validateUserId(userId);
    const records = await this.readUserRecords(userId, options);
    return records.some((record) => decodeOwned(userId, record).length > 0);
  }

  /**
   * All usable bundles for `userId`. Records that are malformed, belong to
   * another user, or fail signature verification are dropped.
   */
  async fetchBundles(userId: string, options: OperationOptions = {}): Promise<PreKeyBundle[]> {
    validateUserId(userId);
    const records = await this.readUserRecords(userId, options);

    const bundles: PreKeyBundle[] = [];
    for (const record of records) {
      const bundle = await this.acceptRecord(userId, record);
      if (bundle) bundles.push(bundle);
    }
    return bundles;
  }

  /**
   * Fetch `userId`'s bundles into the peer cache. When the directory cannot
   * be reached the refresh is queued instead.
   */
  async refreshUserKeys(userId: string, options: OperationOptions = {}): Promise<UploadResult> {
    validateUserId(userId);
    try {
      const bundles = await this.fetchBundles(userId, options);
      this.peerCache.set(userId, bundles);
      Logger.debug("KeyDirectory", "Refreshed peer bundles", {
        userId,
        devices: bundles.length,
      });
      return "success";
    } catch (error) {
      if (!isRetryable(error)) throw error;
      await this.queue.enqueue(
        { operationKind: "RefreshKeys", payload: { userId } },
        { maxAgeMs: this.refreshMaxAgeMs },
      );
      Logger.warn("KeyDirectory", "Directory unreachable, refresh queued", {
        userId,
        reason: describeError(error),
      });
      return "queued";
    }
  }

  getCachedBundles(userId: string): PreKeyBundle[] {
    return [...(this.peerCache.get(userId) ?? [])];
  }

  /**
   * Make the remote copy of this device's record match `bundle`, uploading
   * only when it is missing or different.
   */
  async reconcile(bundle: PreKeyBundle, options: OperationOptions = {}): Promise<ReconcileResult> {
    throwIfAborted(options.signal);
    assertPublicOnly(bundle);
    validatePreKeyBundle(bundle);
    const local = encodeBundle(bundle);

    let remote: JsonValue | null;
    try {
      remote = await this.transport.get(devicePath(local.userId, local.deviceId), options);
    } catch (error) {
      if (!isRetryable(error)) throw error;
      await this.enqueueUpload(local, error);
      return "queued";
    }

    const remoteRecord = tryParseRecord(remote);
    if (remoteRecord && recordsEqual(remoteRecord, local)) {
      return "unchanged";
    }

    Logger.log(
      "KeyDirectory",
      remoteRecord ? "Remote bundle differs, republishing" : "Remote bundle missing, publishing",
      { deviceId: truncateId(local.deviceId, 32) },
    );
    return this.putRecord(local, options);
  }

  watchUser(
    userId: string,
    listener: (bundles: PreKeyBundle[]) => void,
    onError?: (error: unknown) => void,
  ): Unsubscribe {
    validateUserId(userId);
    return this.track(
      this.transport.watch(
        userDevicesPath(userId),
        (value) =>
          listener(parseUserRecords(value).flatMap((record) => decodeOwned(userId, record))),
        onError,
      ),
    );
  }

  watchDevice(
    userId: string,
    deviceId: string,
    listener: (bundle: PreKeyBundle | null) => void,
    onError?: (error: unknown) => void,
  ): Unsubscribe {
    validateUserId(userId);
    validateString(deviceId, "deviceId");
    return this.track(
      this.transport.watch(
        devicePath(userId, deviceId),
        (value) => {
          const record = tryParseRecord(value);
          const [bundle] = record ? decodeOwned(userId, record) : [];
          listener(bundle ?? null);
        },
        onError,
      ),
    );
  }

  async removeDevice(
    userId: string,
    deviceId: string,
    options: OperationOptions = {},
  ): Promise<void> {
    validateUserId(userId);
    validateString(deviceId, "deviceId");
    throwIfAborted(options.signal);
    try {
      await this.transport.remove(devicePath(userId, deviceId), options);
    } catch (error) {
      throw wrapNetworkError(error, "removeDevice");
    }
    Logger.log("KeyDirectory", "Removed device bundle", {
      deviceId: truncateId(deviceId, 32),
    });
  }

  /**
   * Replay queued operations oldest first. Stops at the first failure and
   * leaves it and everything behind it queued. Concurrent callers share the
   * drain already in flight.
   */
  drainQueue(): Promise<DrainResult> {
    if (!this.draining) {
      this.draining = this.runDrain().finally(() => {
        this.draining = null;
      });
    }
    return this.draining;
  }

  pendingOperations(): Promise<number> {
    return this.queue.size();
  }

  queueStats(): Promise<QueueStats> {
    return this.queue.stats();
  }

  /** Release every watch opened through this client. */
  close(): void {
    for (const unsubscribe of [...this.subscriptions]) {
      unsubscribe();
    }
    this.subscriptions.clear();
  }

  private async runDrain(): Promise<DrainResult> {
    let applied = 0;

    for (;;) {
      const operation = await this.queue.peek();
      if (!operation) break;

      try {
        await this.apply(operation);
      } catch (error) {
        Logger.warn("KeyDirectory", "Queue drain halted", {
          sequence: operation.sequence,
          operationKind: operation.operationKind,
          reason: describeError(error),
        });
        break;
      }
      await this.queue.remove(operation.sequence);
      applied++;
    }

    const remaining = await this.queue.size();
    if (applied > 0) {
      Logger.log("KeyDirectory", "Drained offline queue", { applied, remaining });
    }
    return { applied, remaining };
  }

  private async apply(operation: PendingOperation): Promise<void> {
    switch (operation.operationKind) {
      case "UploadKeys": {
        const record = operation.payload;
        await this.transport.put(
          devicePath(record.userId, record.deviceId),
          recordToJson(record),
        );
        return;
      }
      case "RefreshKeys": {
        const { userId } = operation.payload;
        this.peerCache.set(userId, await this.fetchBundles(userId));
        return;
      }
    }
  }

  private async putRecord(record: BundleRecord, options: OperationOptions): Promise<UploadResult> {
    // A later drain would replay older writes over this one
    if ((await this.queue.size()) > 0) {
      const { remaining } = await this.drainQueue();
      if (remaining > 0) {
        await this.enqueueUpload(record, "earlier operations are still queued");
        return "queued";
      }
    }

    try {
      await this.transport.put(
        devicePath(record.userId, record.deviceId),
        recordToJson(record),
        options,
      );
    } catch (error) {
      if (!isRetryable(error)) throw error;
      await this.enqueueUpload(record, error);
      return "queued";
    }

    Logger.log("KeyDirectory", "Uploaded bundle", {
      deviceId: truncateId(record.deviceId, 32),
    });
    return "success";
  }

  private async enqueueUpload(record: BundleRecord, cause: unknown): Promise<void> {
    await this.queue.enqueue({ operationKind: "UploadKeys", payload: record });
    Logger.warn("KeyDirectory", "Directory unreachable, upload queued", {
      deviceId: truncateId(record.deviceId, 32),
      reason: describeError(cause),
    });
  }

  private async readUserRecords(
    userId: string,
    options: OperationOptions,
  ): Promise<BundleRecord[]> {
    throwIfAborted(options.signal);
    let value: JsonValue | null;
    try {
      value = await this.transport.get(userDevicesPath(userId), options);
    } catch (error) {
      throw wrapNetworkError(error, "readUserRecords");
    }
    return parseUserRecords(value);
  }

  private async acceptRecord(
    userId: string,
    record: BundleRecord,
  ): Promise<PreKeyBundle | null> {
    const [bundle] = decodeOwned(userId, record);
    if (!bundle) return null;

    if (this.verifySignatures && this.keyProvider) {
      const valid = await this.keyProvider.verify(
        bundle.identityPublicKey,
        bundle.signedPreKeyPublic,
        bundle.signedPreKeySignature,
      );
      if (!valid) {
        Logger.warn("KeyDirectory", "Dropping bundle with invalid signature", {
          deviceId: truncateId(bundle.deviceId, 32),
        });
        return null;
      }
    }
    return bundle;
  }

  private track(unsubscribe: Unsubscribe): Unsubscribe {
    this.subscriptions.add(unsubscribe);
    return () => {
      if (this.subscriptions.delete(unsubscribe)) unsubscribe();
    };
  }
}

// Anything but an abort or a local contract violation is worth retrying
function isRetryable(error: unknown): boolean {
  if (!isProtocolError(error)) return true;
  return error.kind === "network" && error.code !== "ABORTED";
}

function tryParseRecord(value: unknown): BundleRecord | null {
  if (value === null || value === undefined) return null;
  try {
    return parseBundleRecord(value);
  } catch (error) {
    Logger.warn("KeyDirectory", "Ignoring malformed bundle record", {
      reason: describeError(error),
    });
    return null;
  }
}

function parseUserRecords(value: JsonValue | null): BundleRecord[] {
  if (!value || typeof value !== "object" || Array.isArray(value)) return [];
  const records: BundleRecord[] = [];
  for (const child of Object.values(value)) {
    const record = tryParseRecord(child);
    if (record) records.push(record);
  }
  return records;
}

function decodeOwned(userId: string, record: BundleRecord): PreKeyBundle[] {
  if (record.userId !== userId) {
    Logger.warn("KeyDirectory", "Ignoring bundle filed under another user", {
      deviceId: truncateId(record.deviceId, 32),
    });
    return [];
  }
  try {
    return [decodeBundle(record)];
  } catch (error) {
    Logger.warn("KeyDirectory", "Ignoring undecodable bundle record", {
      reason: describeError(error),
    });
    return [];
  }
}
