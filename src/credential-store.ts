import {
  ERRORS,
  IDENTITY_PRIVATE_KEY_LENGTH,
  IDENTITY_PUBLIC_KEY_LENGTH,
  MAX_REGISTRATION_ID,
  STORAGE_KEYS,
} from "./constants";
import { base64ToBytes, bytesToBase64 } from "./crypto";
import { deriveDeviceId } from "./device-id";
import {
  securityError,
  storageError,
  validationError,
  wrapStorageError,
} from "./errors";
import { Logger, truncateId } from "./logger";
import { KeyedMutex } from "./mutex";
import { NodeFingerprintProvider } from "./platform-fingerprint";
import { validateBytes, validateInteger, validateUserId } from "./validator";
import type {
  DeviceIdentity,
  IdentityKeyPair,
  PlatformFingerprintProvider,
  PreKeyRecord,
  SignedPreKeyRecord,
  StorageAdapter,
} from "./types";

export interface IdentityKeyLengths {
  publicKey: number;
  privateKey: number;
}

export interface CredentialStoreOptions {
  fingerprintProvider?: PlatformFingerprintProvider;
  /** Expected identity key sizes; `null` disables the length check. */
  identityKeyLengths?: IdentityKeyLengths | null;
  now?: () => number;
}

interface StoredSignedPreKey {
  id: number;
  pub: string;
  sec: string;
  sig: string;
  created: number;
}

interface StoredPreKey {
  id: number;
  pub: string;
  sec: string;
}

// Stores that share a storage adapter share its write locks
const adapterLocks = new WeakMap<StorageAdapter, KeyedMutex>();

function locksFor(storage: StorageAdapter): KeyedMutex {
  let locks = adapterLocks.get(storage);
  if (!locks) {
    locks = new KeyedMutex();
    adapterLocks.set(storage, locks);
  }
  return locks;
}

/**
 * Owns every on-device secret: identity key pair, registration id, device id
 * and the private halves of pre-keys. Binary values are stored as base64,
 * integers as decimal strings.
 */
export class SecureCredentialStore {
  private storage: StorageAdapter;
  private fingerprintProvider: PlatformFingerprintProvider;
  private identityKeyLengths: IdentityKeyLengths | null;
  private now: () => number;
  private locks: KeyedMutex;

  constructor(storage: StorageAdapter, options: CredentialStoreOptions = {}) {
    this.storage = storage;
    this.fingerprintProvider =
      options.fingerprintProvider ?? new NodeFingerprintProvider();
    this.identityKeyLengths =
      options.identityKeyLengths === undefined
        ? { publicKey: IDENTITY_PUBLIC_KEY_LENGTH, privateKey: IDENTITY_PRIVATE_KEY_LENGTH }
        : options.identityKeyLengths;
    this.now = options.now ?? Date.now;
    this.locks = locksFor(storage);
  }

  async storeIdentityKeyPair(pair: IdentityKeyPair): Promise<void> {
    const publicKey = validateBytes(pair?.publicKey, "identityKeyPair.publicKey");
    const privateKey = validateBytes(pair?.privateKey, "identityKeyPair.privateKey");
    this.checkLength(publicKey, "publicKey", (lengths) => {
      throw validationError(
        `identityKeyPair.publicKey must be ${lengths.publicKey} bytes`,
        "identityKeyPair.publicKey",
        { length: publicKey.length },
      );
    });
    this.checkLength(privateKey, "privateKey", (lengths) => {
      throw validationError(
        `identityKeyPair.privateKey must be ${lengths.privateKey} bytes`,
        "identityKeyPair.privateKey",
        { length: privateKey.length },
      );
    });

    await this.write(
      STORAGE_KEYS.IDENTITY_PRIVATE_KEY,
      bytesToBase64(privateKey),
      "storeIdentityKeyPair",
    );
    await this.write(
      STORAGE_KEYS.IDENTITY_PUBLIC_KEY,
      bytesToBase64(publicKey),
      "storeIdentityKeyPair",
    );
    Logger.debug("CredentialStore", "Stored identity key pair");
  }

  async getIdentityKeyPair(): Promise<IdentityKeyPair | null> {
    const encodedPrivate = await this.read(
      STORAGE_KEYS.IDENTITY_PRIVATE_KEY,
      "getIdentityKeyPair",
    );
    const encodedPublic = await this.read(
      STORAGE_KEYS.IDENTITY_PUBLIC_KEY,
      "getIdentityKeyPair",
    );

    if (encodedPrivate === null || encodedPublic === null) {
      if (encodedPrivate !== encodedPublic) {
        Logger.warn("CredentialStore", "Identity key pair is only half present");
      }
      return null;
    }

    const privateKey = this.decodeKey(encodedPrivate, STORAGE_KEYS.IDENTITY_PRIVATE_KEY);
    const publicKey = this.decodeKey(encodedPublic, STORAGE_KEYS.IDENTITY_PUBLIC_KEY);

    this.checkLength(publicKey, "publicKey", (lengths) => {
      throw securityError(ERRORS.INVALID_KEY_LENGTH, {
        code: "INVALID_KEY_LENGTH",
        details: { key: "publicKey", expected: lengths.publicKey, actual: publicKey.length },
      });
    });
    this.checkLength(privateKey, "privateKey", (lengths) => {
      throw securityError(ERRORS.INVALID_KEY_LENGTH, {
        code: "INVALID_KEY_LENGTH",
        details: { key: "privateKey", expected: lengths.privateKey, actual: privateKey.length },
      });
    });

    return { publicKey, privateKey };
  }

  async hasIdentityKeys(): Promise<boolean> {
    const privateKey = await this.read(STORAGE_KEYS.IDENTITY_PRIVATE_KEY, "hasIdentityKeys");
    const publicKey = await this.read(STORAGE_KEYS.IDENTITY_PUBLIC_KEY, "hasIdentityKeys");
    return privateKey !== null && publicKey !== null;
  }

  async storeRegistrationId(registrationId: number): Promise<void> {
    validateInteger(registrationId, "registrationId", {
      min: 1,
      max: MAX_REGISTRATION_ID,
    });
    await this.write(
      STORAGE_KEYS.REGISTRATION_ID,
      registrationId.toString(10),
      "storeRegistrationId",
    );
    Logger.debug("CredentialStore", "Stored registration ID");
  }

  async getRegistrationId(): Promise<number | null> {
    const value = await this.read(STORAGE_KEYS.REGISTRATION_ID, "getRegistrationId");
    if (value === null) return null;

    const parsed = /^\d+$/.test(value) ? Number.parseInt(value, 10) : NaN;
    if (!Number.isInteger(parsed) || parsed < 1 || parsed > MAX_REGISTRATION_ID) {
      throw securityError(ERRORS.INVALID_STORED_VALUE, {
        code: "INVALID_REGISTRATION_ID",
        details: { key: STORAGE_KEYS.REGISTRATION_ID },
      });
    }
    return parsed;
  }

  async storeCurrentUserId(userId: string): Promise<void> {
    validateUserId(userId);
    await this.write(STORAGE_KEYS.CURRENT_USER_ID, userId, "storeCurrentUserId");
  }

  async getCurrentUserId(): Promise<string | null> {
    return this.read(STORAGE_KEYS.CURRENT_USER_ID, "getCurrentUserId");
  }

  /**
   * Return the persisted device id, deriving and persisting one only when
   * none exists. Runs under the adapter's lock for the device id key, so
   * concurrent callers all observe the first committed value.
   */
  async getOrCreateDeviceId(userId: string): Promise<string> {
    validateUserId(userId);

    return this.locks.runExclusive(STORAGE_KEYS.CURRENT_DEVICE_ID, async () => {
      const existing = await this.read(
        STORAGE_KEYS.CURRENT_DEVICE_ID,
        "getOrCreateDeviceId",
      );
      if (existing) {
        Logger.debug("CredentialStore", "Retrieved existing device ID");
        return existing;
      }
      return this.createDeviceId(userId);
    });
  }

  async getDeviceId(): Promise<string | null> {
    const value = await this.read(STORAGE_KEYS.CURRENT_DEVICE_ID, "getDeviceId");
    return value ? value : null;
  }

  async getDeviceIdentity(): Promise<DeviceIdentity | null> {
    const value = await this.read(STORAGE_KEYS.DEVICE_IDENTITY, "getDeviceIdentity");
    if (value === null) return null;
    return parseDeviceIdentity(value);
  }

  /**
   * Replace the device id. The device then looks like a new device to peers.
   */
  async resetDeviceId(userId: string): Promise<string> {
    validateUserId(userId);
    Logger.warn("CredentialStore", "Resetting device ID");
    return this.locks.runExclusive(STORAGE_KEYS.CURRENT_DEVICE_ID, () =>
      this.createDeviceId(userId),
    );
  }

  async storeSignedPreKey(record: SignedPreKeyRecord): Promise<void> {
    const stored: StoredSignedPreKey = {
      id: record.id,
      pub: bytesToBase64(record.keyPair.publicKey),
      sec: bytesToBase64(record.keyPair.secretKey),
      sig: bytesToBase64(record.signature),
      created: record.createdAt,
    };
    await this.write(
      STORAGE_KEYS.SIGNED_PREKEY,
      JSON.stringify(stored),
      "storeSignedPreKey",
    );
  }

  async getSignedPreKey(): Promise<SignedPreKeyRecord | null> {
    const value = await this.read(STORAGE_KEYS.SIGNED_PREKEY, "getSignedPreKey");
    if (value === null) return null;

    const data = this.parseJson(value, STORAGE_KEYS.SIGNED_PREKEY);
    if (!isStoredSignedPreKey(data)) {
      throw securityError(ERRORS.INVALID_STORED_VALUE, {
        code: "INVALID_SIGNED_PREKEY",
        details: { key: STORAGE_KEYS.SIGNED_PREKEY },
      });
    }
    return {
      id: data.id,
      keyPair: {
        publicKey: this.decodeKey(data.pub, STORAGE_KEYS.SIGNED_PREKEY),
        secretKey: this.decodeKey(data.sec, STORAGE_KEYS.SIGNED_PREKEY),
      },
      signature: this.decodeKey(data.sig, STORAGE_KEYS.SIGNED_PREKEY),
      createdAt: data.created,
    };
  }

  async storePreKeys(preKeys: PreKeyRecord[]): Promise<void> {
    const stored: StoredPreKey[] = preKeys.map((preKey) => ({
      id: preKey.id,
      pub: bytesToBase64(preKey.keyPair.publicKey),
      sec: bytesToBase64(preKey.keyPair.secretKey),
    }));
    await this.write(STORAGE_KEYS.PREKEYS, JSON.stringify(stored), "storePreKeys");
  }

  async getPreKeys(): Promise<PreKeyRecord[]> {
    const value = await this.read(STORAGE_KEYS.PREKEYS, "getPreKeys");
    if (value === null) return [];

    const data = this.parseJson(value, STORAGE_KEYS.PREKEYS);
    if (!Array.isArray(data) || !data.every(isStoredPreKey)) {
      throw securityError(ERRORS.INVALID_STORED_VALUE, {
        code: "INVALID_PREKEYS",
        details: { key: STORAGE_KEYS.PREKEYS },
      });
    }
    return data.map((entry) => ({
      id: entry.id,
      keyPair: {
        publicKey: this.decodeKey(entry.pub, STORAGE_KEYS.PREKEYS),
        secretKey: this.decodeKey(entry.sec, STORAGE_KEYS.PREKEYS),
      },
    }));
  }

  async removePreKey(id: number): Promise<void> {
    const preKeys = await this.getPreKeys();
    const remaining = preKeys.filter((preKey) => preKey.id !== id);
    if (remaining.length !== preKeys.length) {
      await this.storePreKeys(remaining);
    }
  }

  async clearPreKeys(): Promise<void> {
    await this.remove(STORAGE_KEYS.SIGNED_PREKEY, "clearPreKeys");
    await this.remove(STORAGE_KEYS.PREKEYS, "clearPreKeys");
  }

  /**
   * Delete every entry this store owns. Keeps going past individual
   * failures and reports them together at the end.
   */
  async clearAll(): Promise<void> {
    const failures: { key: string; error: unknown }[] = [];

    for (const key of Object.values(STORAGE_KEYS)) {
      try {
        await this.storage.removeItem(key);
      } catch (error) {
        failures.push({ key, error });
      }
    }

    if (failures.length > 0) {
      Logger.error("CredentialStore", "Failed to clear some secure storage entries", {
        failedKeys: failures.map((failure) => failure.key),
      });
      throw storageError(
        `Failed to clear ${failures.length} secure storage entries`,
        {
          code: "CLEAR_INCOMPLETE",
          details: { failedKeys: failures.map((failure) => failure.key) },
          cause: new AggregateError(failures.map((failure) => failure.error)),
        },
      );
    }

    Logger.log("CredentialStore", "Cleared all secure storage data");
  }

  private async createDeviceId(userId: string): Promise<string> {
    const derived = await deriveDeviceId(userId, this.fingerprintProvider, this.now());
    const identity: DeviceIdentity = {
      userId,
      deviceId: derived.deviceId,
      platformFingerprintHash: derived.platformFingerprintHash,
      createdAtEpochMs: derived.createdAtEpochMs,
    };

    await this.write(STORAGE_KEYS.CURRENT_DEVICE_ID, derived.deviceId, "createDeviceId");
    await this.write(
      STORAGE_KEYS.DEVICE_IDENTITY,
      JSON.stringify(identity),
      "createDeviceId",
    );

    Logger.log("CredentialStore", "Generated new device ID", {
      deviceId: truncateId(derived.deviceId, 32),
    });
    return derived.deviceId;
  }

  private checkLength(
    key: Uint8Array,
    half: keyof IdentityKeyLengths,
    fail: (lengths: IdentityKeyLengths) => never,
  ): void {
    const lengths = this.identityKeyLengths;
    if (lengths && key.length !== lengths[half]) {
      fail(lengths);
    }
  }

  private decodeKey(encoded: string, storageKey: string): Uint8Array {
    try {
      return base64ToBytes(encoded);
    } catch (error) {
      throw securityError(ERRORS.INVALID_STORED_VALUE, {
        code: "MALFORMED_KEY_MATERIAL",
        details: { key: storageKey },
        cause: error,
      });
    }
  }

  private parseJson(value: string, storageKey: string): unknown {
    try {
      return JSON.parse(value);
    } catch (error) {
      throw securityError(ERRORS.INVALID_STORED_VALUE, {
        code: "MALFORMED_STORED_VALUE",
        details: { key: storageKey },
        cause: error,
      });
    }
  }

  private async read(key: string, context: string): Promise<string | null> {
    try {
      return await this.storage.getItem(key);
    } catch (error) {
      throw wrapStorageError(error, context);
    }
  }

  private async write(key: string, value: string, context: string): Promise<void> {
    try {
      await this.storage.setItem(key, value);
    } catch (error) {
      throw wrapStorageError(error, context);
    }
  }

  private async remove(key: string, context: string): Promise<void> {
    try {
      await this.storage.removeItem(key);
    } catch (error) {
      throw wrapStorageError(error, context);
    }
  }
}

function parseDeviceIdentity(value: string): DeviceIdentity {
  let data: unknown;
  try {
    data = JSON.parse(value);
  } catch (error) {
    throw securityError(ERRORS.INVALID_STORED_VALUE, {
      code: "MALFORMED_DEVICE_IDENTITY",
      cause: error,
    });
  }

  if (
    !data ||
    typeof data !== "object" ||
    !("userId" in data) ||
    !("deviceId" in data) ||
    !("platformFingerprintHash" in data) ||
    !("createdAtEpochMs" in data) ||
    typeof data.userId !== "string" ||
    typeof data.deviceId !== "string" ||
    typeof data.platformFingerprintHash !== "string" ||
    typeof data.createdAtEpochMs !== "number"
  ) {
    throw securityError(ERRORS.INVALID_STORED_VALUE, {
      code: "MALFORMED_DEVICE_IDENTITY",
    });
  }

  return {
    userId: data.userId,
    deviceId: data.deviceId,
    platformFingerprintHash: data.platformFingerprintHash,
    createdAtEpochMs: data.createdAtEpochMs,
  };
}

function isStoredSignedPreKey(data: unknown): data is StoredSignedPreKey {
  if (!data || typeof data !== "object") return false;
  const record: Record<string, unknown> = { ...data };
  return (
    typeof record.id === "number" &&
    typeof record.pub === "string" &&
    typeof record.sec === "string" &&
    typeof record.sig === "string" &&
    typeof record.created === "number"
  );
}

function isStoredPreKey(data: unknown): data is StoredPreKey {
  if (!data || typeof data !== "object") return false;
  const record: Record<string, unknown> = { ...data };
  return (
    typeof record.id === "number" &&
    typeof record.pub === "string" &&
    typeof record.sec === "string"
  );
}
