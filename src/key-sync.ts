import { encodeBundle, recordsEqual } from "./bundle";
import { resolveConfig } from "./config";
import type { ResolvedConfig } from "./config";
import { ERRORS } from "./constants";
import { SecureCredentialStore } from "./credential-store";
import {
  describeError,
  initializationError,
  isProtocolError,
  keyError,
} from "./errors";
import { FirebaseDirectory } from "./firebase-directory";
import { KeyDirectoryClient } from "./key-directory-client";
import type { ReconcileResult } from "./key-directory-client";
import { NobleKeyProvider } from "./key-provider";
import { Logger, truncateId } from "./logger";
import { Mutex } from "./mutex";
import { OfflineQueue } from "./offline-queue";
import { PreKeyManager } from "./prekey-manager";
import { validatePreKeyCount, validateUserId } from "./validator";
import type {
  DeviceIdentity,
  DirectoryConfig,
  DirectoryTransport,
  DrainResult,
  IdentityKeyPair,
  InitializeOptions,
  InstanceInfo,
  KeyProvider,
  KeysChangedEvent,
  LifecycleState,
  OperationOptions,
  PlatformFingerprintProvider,
  PreKeyBundle,
  QueueStats,
  StorageAdapter,
  Unsubscribe,
  UploadResult,
} from "./types";

export type TransportFactory = (config: ResolvedConfig) => DirectoryTransport;

export interface KeySyncDependencies {
  /** Encrypted-at-rest store for credentials. */
  storage: StorageAdapter;
  /** Store for the offline queue; defaults to `storage`. */
  queueStorage?: StorageAdapter;
  /**
   * Directory transport, or a factory called during `initialize`. A
   * transport passed as an instance is not closed by `dispose`.
   */
  transport?: DirectoryTransport | TransportFactory;
  keyProvider?: KeyProvider;
  fingerprintProvider?: PlatformFingerprintProvider;
  now?: () => number;
}

interface ActiveSession {
  userId: string;
  deviceId: string;
  config: ResolvedConfig;
  transport: DirectoryTransport;
  ownsTransport: boolean;
  client: KeyDirectoryClient;
  bundle: PreKeyBundle | null;
  online: boolean;
  cleanups: Unsubscribe[];
  userWatch: Unsubscribe | null;
  knownDevices: Map<string, string> | null;
}

const defaultTransport: TransportFactory = (config) =>
  new FirebaseDirectory({ databaseURL: config.directoryEndpointUrl });

/**
 * Entry point: owns the key lifecycle of one user on one device.
 *
 * Lifecycle is `uninitialized → initializing → ready → disposed`. A failed
 * `initialize` returns to `uninitialized` so it can be retried.
 */
export class KeySync {
  private store: SecureCredentialStore;
  private queue: OfflineQueue;
  private keyProvider: KeyProvider;
  private preKeys: PreKeyManager;
  private transportSource: DirectoryTransport | TransportFactory;
  private lifecycle = new Mutex();
  private state: LifecycleState = "uninitialized";
  private session: ActiveSession | null = null;
  private keysChangedListeners = new Set<(event: KeysChangedEvent) => void>();
  private background = new Set<Promise<void>>();

  constructor(dependencies: KeySyncDependencies) {
    const now = dependencies.now ?? Date.now;
    this.keyProvider = dependencies.keyProvider ?? new NobleKeyProvider();
    this.store = new SecureCredentialStore(dependencies.storage, {
      fingerprintProvider: dependencies.fingerprintProvider,
      now,
    });
    this.queue = new OfflineQueue(dependencies.queueStorage ?? dependencies.storage, now);
    this.preKeys = new PreKeyManager(this.store, this.keyProvider, now);
    this.transportSource = dependencies.transport ?? defaultTransport;

    Logger.log("KeySync", "Created with storage adapter");
  }

  /**
   * Prepare this device for `userId`: make sure identity, registration id,
   * device id and pre-keys exist, then publish the public bundle when
   * `autoSync` is on. Repeating the call for the same user is a no-op.
   */
  async initialize(
    userId: string,
    directoryConfig: DirectoryConfig,
    options: InitializeOptions = {},
  ): Promise<void> {
    validateUserId(userId);
    const config = resolveConfig({ ...options, ...directoryConfig });

    await this.lifecycle.runExclusive(async () => {
      if (this.state === "disposed") {
        throw initializationError(ERRORS.DISPOSED, { code: "DISPOSED" });
      }
      if (this.state === "ready" && this.session) {
        if (this.session.userId === userId) {
          Logger.debug("KeySync", "Already initialized for this user");
          return;
        }
        throw initializationError(ERRORS.ALREADY_INITIALIZED, {
          code: "ALREADY_INITIALIZED",
          details: { userId: this.session.userId },
        });
      }

      this.state = "initializing";
      let session: ActiveSession;
      try {
        session = await this.bootstrap(userId, config);
      } catch (error) {
        this.state = "uninitialized";
        Logger.error("KeySync", "Initialization failed", error);
        if (isProtocolError(error, "initialization")) throw error;
        throw initializationError(`Initialization failed: ${describeError(error)}`, {
          code: "INITIALIZATION_FAILED",
          details: isProtocolError(error) ? { kind: error.kind, code: error.code } : undefined,
          cause: error,
        });
      }

      this.session = session;
      this.state = "ready";
      if (this.keysChangedListeners.size > 0) {
        this.startUserWatch(session);
      }
      Logger.log("KeySync", "Initialized", {
        userId,
        deviceId: truncateId(session.deviceId, 32),
        hasKeys: session.bundle !== null,
      });
    });
  }

  /**
   * Publish the current bundle. Resolves to "queued" when the directory is
   * unreachable; the write is replayed by {@link drainQueue}.
   */
  async publishKeys(options: OperationOptions = {}): Promise<UploadResult> {
    const session = this.requireReady();
    const identity = await this.requireIdentity();
    const bundle = await this.prepareBundle(session, identity);
    return session.client.upload(bundle, options);
  }

  async hasKeysForUser(userId: string, options: OperationOptions = {}): Promise<boolean> {
    const session = this.requireReady();
    return session.client.hasKeysForUser(userId, options);
  }

  /** Snapshot of the instance; never rejects. */
  async getInstanceInfo(): Promise<InstanceInfo> {
    const session = this.state === "ready" ? this.session : null;
    let pendingOperations = 0;
    try {
      pendingOperations = await this.queue.size();
    } catch (error) {
      Logger.warn("KeySync", "Could not read offline queue size", {
        reason: describeError(error),
      });
    }

    return {
      userId: session?.userId ?? null,
      deviceId: session?.deviceId ?? null,
      isInitialized: session !== null,
      hasKeys: Boolean(session?.bundle),
      state: this.state,
      pendingOperations,
    };
  }

  /** Release watches and the transport. Safe to call more than once. */
  async dispose(): Promise<void> {
    await this.lifecycle.runExclusive(async () => {
      if (this.state === "disposed") return;
      await this.teardown();
      this.state = "disposed";
      Logger.log("KeySync", "Disposed");
    });
  }

  /**
   * Replace the identity key pair and every pre-key, then republish. Peers
   * holding the old identity must fetch the new bundle.
   */
  async rotateIdentity(options: OperationOptions = {}): Promise<UploadResult> {
    return this.lifecycle.runExclusive(async () => {
      const session = this.requireReady();
      const identity = await this.keyProvider.generateIdentityKeyPair();
      await this.store.storeIdentityKeyPair(identity);
      await this.preKeys.rotate(identity, session.config.preKeyCount);

      Logger.warn("KeySync", "Identity key pair rotated");
      const bundle = await this.prepareBundle(session, identity);
      return session.client.upload(bundle, options);
    });
  }

  /** Issue a fresh batch of one-time pre-keys and republish. */
  async refreshPreKeys(count?: number, options: OperationOptions = {}): Promise<UploadResult> {
    const session = this.requireReady();
    const batchSize =
      count === undefined ? session.config.preKeyCount : validatePreKeyCount(count);
    const identity = await this.requireIdentity();

    await this.preKeys.refreshPreKeys(batchSize);
    const bundle = await this.prepareBundle(session, identity);
    return session.client.upload(bundle, options);
  }

  async refreshUserKeys(userId: string, options: OperationOptions = {}): Promise<UploadResult> {
    return this.requireReady().client.refreshUserKeys(userId, options);
  }

  getCachedBundles(userId: string): PreKeyBundle[] {
    return this.requireReady().client.getCachedBundles(userId);
  }

  async fetchBundles(userId: string, options: OperationOptions = {}): Promise<PreKeyBundle[]> {
    return this.requireReady().client.fetchBundles(userId, options);
  }

  /**
   * Replay the offline queue, then make sure the directory holds this
   * device's current bundle.
   */
  async forceSync(options: OperationOptions = {}): Promise<ReconcileResult> {
    const session = this.requireReady();
    if (!session.bundle) {
      throw keyError(ERRORS.IDENTITY_NOT_FOUND, { code: "IDENTITY_NOT_FOUND" });
    }
    await session.client.drainQueue();
    return session.client.reconcile(session.bundle, options);
  }

  async drainQueue(): Promise<DrainResult> {
    return this.requireReady().client.drainQueue();
  }

  /** Queued operations by kind, after dropping expired ones. */
  async getQueueStats(): Promise<QueueStats> {
    return this.queue.stats();
  }

  /** Remove another device's bundle of the current user. */
  async removeDevice(deviceId: string, options: OperationOptions = {}): Promise<void> {
    const session = this.requireReady();
    await session.client.removeDevice(session.userId, deviceId, options);
  }

  async getDeviceIdentity(): Promise<DeviceIdentity | null> {
    return this.store.getDeviceIdentity();
  }

  /**
   * Dispose the instance and erase every credential and queued operation
   * from storage. The device gets a new identity on its next install.
   */
  async reset(): Promise<void> {
    await this.lifecycle.runExclusive(async () => {
      await this.teardown();
      this.state = "disposed";
      await this.queue.clear();
      await this.store.clearAll();
      Logger.warn("KeySync", "Reset all local key material");
    });
  }

  /**
   * Listen for changes to the current user's device bundles in the
   * directory. A removed device is reported with a null bundle.
   */
  onKeysChanged(listener: (event: KeysChangedEvent) => void): Unsubscribe {
    this.keysChangedListeners.add(listener);
    if (this.state === "ready" && this.session) {
      this.startUserWatch(this.session);
    }
    return () => {
      this.keysChangedListeners.delete(listener);
      if (this.keysChangedListeners.size === 0 && this.session?.userWatch) {
        this.session.userWatch();
        this.session.userWatch = null;
        this.session.knownDevices = null;
      }
    };
  }

  private async bootstrap(userId: string, config: ResolvedConfig): Promise<ActiveSession> {
    let identity = await this.store.getIdentityKeyPair();
    if (!identity && config.generateKeysIfAbsent) {
      identity = await this.keyProvider.generateIdentityKeyPair();
      await this.store.storeIdentityKeyPair(identity);
      Logger.log("KeySync", "Generated identity key pair");
    }

    let registrationId = await this.store.getRegistrationId();
    if (registrationId === null && config.generateKeysIfAbsent) {
      registrationId = this.keyProvider.generateRegistrationId();
      await this.store.storeRegistrationId(registrationId);
    }

    await this.store.storeCurrentUserId(userId);
    const deviceId = await this.store.getOrCreateDeviceId(userId);

    const ownsTransport = typeof this.transportSource === "function";
    const transport =
      typeof this.transportSource === "function"
        ? this.transportSource(config)
        : this.transportSource;

    const session: ActiveSession = {
      userId,
      deviceId,
      config,
      transport,
      ownsTransport,
      client: new KeyDirectoryClient({
        transport,
        queue: this.queue,
        keyProvider: this.keyProvider,
        verifySignatures: config.verifySignatures,
      }),
      bundle: null,
      online: true,
      cleanups: [],
      userWatch: null,
      knownDevices: null,
    };

    try {
      if (identity && registrationId !== null) {
        const bundle = await this.prepareBundle(session, identity);
        if (config.autoSync) {
          await session.client.upload(bundle);
        }
      } else {
        Logger.warn("KeySync", "No identity keys present and generation disabled");
      }

      if (config.autoSync) {
        this.startAutoSync(session);
      }
    } catch (error) {
      await this.releaseSession(session);
      throw error;
    }
    return session;
  }

  private async prepareBundle(
    session: ActiveSession,
    identity: IdentityKeyPair,
  ): Promise<PreKeyBundle> {
    const registrationId = await this.store.getRegistrationId();
    if (registrationId === null) {
      throw keyError(ERRORS.REGISTRATION_ID_NOT_FOUND, {
        code: "REGISTRATION_ID_NOT_FOUND",
      });
    }

    await this.preKeys.ensurePreKeys(identity, session.config.preKeyCount);
    const bundle = await this.preKeys.buildBundle({
      userId: session.userId,
      deviceId: session.deviceId,
      registrationId,
      identityPublicKey: identity.publicKey,
    });
    session.bundle = bundle;
    return bundle;
  }

  private async requireIdentity(): Promise<IdentityKeyPair> {
    const identity = await this.store.getIdentityKeyPair();
    if (!identity) {
      throw keyError(ERRORS.IDENTITY_NOT_FOUND, { code: "IDENTITY_NOT_FOUND" });
    }
    return identity;
  }

  private requireReady(): ActiveSession {
    if (this.state === "disposed") {
      throw initializationError(ERRORS.DISPOSED, { code: "DISPOSED" });
    }
    if (this.state !== "ready" || !this.session) {
      throw initializationError(ERRORS.NOT_INITIALIZED, { code: "NOT_INITIALIZED" });
    }
    return this.session;
  }

  private startAutoSync(session: ActiveSession): void {
    const { client, transport } = session;

    if (transport.watchConnection) {
      session.cleanups.push(
        transport.watchConnection((online) => {
          const reconnected = online && !session.online;
          session.online = online;
          if (reconnected) {
            this.runInBackground("Queue drain after reconnect", async () => {
              await client.drainQueue();
            });
          }
        }),
      );
    }

    session.cleanups.push(
      client.watchDevice(
        session.userId,
        session.deviceId,
        (remote) => {
          const local = session.bundle;
          if (!local || !session.online || this.session !== session) return;
          if (remote && recordsEqual(encodeBundle(remote), encodeBundle(local))) return;
          this.runInBackground("Republish own bundle", async () => {
            await client.reconcile(local);
          });
        },
        (error) => Logger.error("KeySync", "Own device watch failed", error),
      ),
    );
  }

  private startUserWatch(session: ActiveSession): void {
    if (session.userWatch) return;

    session.userWatch = session.client.watchUser(
      session.userId,
      (bundles) => {
        const current = new Map(
          bundles.map((bundle) => [bundle.deviceId, JSON.stringify(encodeBundle(bundle))]),
        );
        const previous = session.knownDevices;
        session.knownDevices = current;
        // The first delivery is the baseline
        if (!previous) return;

        for (const bundle of bundles) {
          if (previous.get(bundle.deviceId) !== current.get(bundle.deviceId)) {
            this.emitKeysChanged({ userId: session.userId, deviceId: bundle.deviceId, bundle });
          }
        }
        for (const deviceId of previous.keys()) {
          if (!current.has(deviceId)) {
            this.emitKeysChanged({ userId: session.userId, deviceId, bundle: null });
          }
        }
      },
      (error) => Logger.error("KeySync", "Device list watch failed", error),
    );
  }

  private emitKeysChanged(event: KeysChangedEvent): void {
    for (const listener of [...this.keysChangedListeners]) {
      try {
        listener(event);
      } catch (error) {
        Logger.error("KeySync", "Keys changed listener threw", error);
      }
    }
  }

  private runInBackground(context: string, task: () => Promise<void>): void {
    const run: Promise<void> = task()
      .catch((error: unknown) => {
        Logger.error("KeySync", `${context} failed`, error);
      })
      .finally(() => {
        this.background.delete(run);
      });
    this.background.add(run);
  }

  private async teardown(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (session) {
      await this.releaseSession(session);
    }
    await Promise.allSettled([...this.background]);
  }

  private async releaseSession(session: ActiveSession): Promise<void> {
    for (const cleanup of session.cleanups) cleanup();
    session.cleanups = [];
    session.userWatch?.();
    session.userWatch = null;
    session.client.close();

    if (session.ownsTransport && session.transport.close) {
      try {
        await session.transport.close();
      } catch (error) {
        Logger.error("KeySync", "Failed to close directory transport", error);
      }
    }
  }
}
