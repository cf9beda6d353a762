export interface IdentityKeyPair {
  publicKey: Uint8Array;
  privateKey: Uint8Array;
}

export interface KeyPair {
  publicKey: Uint8Array;
  secretKey: Uint8Array;
}

export interface PreKeyRecord {
  id: number;
  keyPair: KeyPair;
}

export interface SignedPreKeyRecord {
  id: number;
  keyPair: KeyPair;
  signature: Uint8Array;
  createdAt: number;
}

export interface DeviceIdentity {
  userId: string;
  deviceId: string;
  platformFingerprintHash: string;
  createdAtEpochMs: number;
}

/**
 * Public half of a device's key material. This is the only structure that
 * is ever written to the key directory.
 */
export interface PreKeyBundle {
  userId: string;
  deviceId: string;
  registrationId: number;
  identityPublicKey: Uint8Array;
  signedPreKeyId: number;
  signedPreKeyPublic: Uint8Array;
  signedPreKeySignature: Uint8Array;
  oneTimePreKeyId?: number;
  oneTimePreKeyPublic?: Uint8Array;
}

/** Wire form of {@link PreKeyBundle}: binary fields are base64url strings. */
export interface BundleRecord {
  userId: string;
  deviceId: string;
  registrationId: number;
  identityPublicKey: string;
  signedPreKeyId: number;
  signedPreKeyPublic: string;
  signedPreKeySignature: string;
  oneTimePreKeyId?: number;
  oneTimePreKeyPublic?: string;
}

export type LifecycleState =
  | "uninitialized"
  | "initializing"
  | "ready"
  | "disposed";

export interface InstanceInfo {
  userId: string | null;
  deviceId: string | null;
  isInitialized: boolean;
  hasKeys: boolean;
  state: LifecycleState;
  pendingOperations: number;
}

export type OperationKind = "UploadKeys" | "RefreshKeys";

export type PendingOperation =
  | {
      sequence: number;
      operationKind: "UploadKeys";
      payload: BundleRecord;
      enqueuedAtEpochMs: number;
      /** Dropped unapplied once this time has passed. */
      expiresAtEpochMs?: number;
    }
  | {
      sequence: number;
      operationKind: "RefreshKeys";
      payload: { userId: string };
      enqueuedAtEpochMs: number;
      expiresAtEpochMs?: number;
    };

export interface QueueStats {
  size: number;
  byKind: Record<OperationKind, number>;
  oldestEnqueuedAtEpochMs: number | null;
}

export type UploadResult = "success" | "queued";

export interface DrainResult {
  applied: number;
  remaining: number;
}

export interface OperationOptions {
  signal?: AbortSignal;
}

export type Unsubscribe = () => void;

// JSON values exchanged with the directory
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Minimal storage adapter interface. Implementations are expected to keep
 * values encrypted at rest and scoped to one application install.
 */
export interface StorageAdapter {
  setItem(key: string, value: string): Promise<void>;
  getItem(key: string): Promise<string | null>;
  removeItem(key: string): Promise<void>;
}

/**
 * Hierarchical, path-addressed document store holding published bundles.
 */
export interface DirectoryTransport {
  put(path: string, value: JsonValue, options?: OperationOptions): Promise<void>;
  get(path: string, options?: OperationOptions): Promise<JsonValue | null>;
  remove(path: string, options?: OperationOptions): Promise<void>;
  watch(
    path: string,
    onValue: (value: JsonValue | null) => void,
    onError?: (error: unknown) => void,
  ): Unsubscribe;
  /** Reports transport connectivity; called with the current state first. */
  watchConnection?(listener: (online: boolean) => void): Unsubscribe;
  close?(): Promise<void>;
}

/**
 * Cryptographic primitives consumed by the key lifecycle. The library never
 * performs key agreement or message encryption itself.
 */
export interface KeyProvider {
  generateIdentityKeyPair(): Promise<IdentityKeyPair>;
  generatePreKeys(startId: number, count: number): Promise<PreKeyRecord[]>;
  sign(privateKey: Uint8Array, data: Uint8Array): Promise<Uint8Array>;
  verify(
    publicKey: Uint8Array,
    data: Uint8Array,
    signature: Uint8Array,
  ): Promise<boolean>;
  generateRegistrationId(): number;
}

export interface PlatformFingerprintProvider {
  /** Best-effort string built from stable hardware or OS attributes. */
  getFingerprint(): Promise<string>;
  osName(): string;
}

export interface DirectoryConfig {
  directoryEndpointUrl: string;
}

export interface InitializeOptions {
  generateKeysIfAbsent?: boolean;
  autoSync?: boolean;
  preKeyCount?: number;
  verifySignatures?: boolean;
}

export interface KeysChangedEvent {
  userId: string;
  deviceId: string;
  bundle: PreKeyBundle | null;
}
