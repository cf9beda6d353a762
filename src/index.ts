export { KeySync } from "./key-sync";
export type { KeySyncDependencies, TransportFactory } from "./key-sync";
export { SecureCredentialStore } from "./credential-store";
export type { CredentialStoreOptions, IdentityKeyLengths } from "./credential-store";
export { KeyDirectoryClient } from "./key-directory-client";
export type { KeyDirectoryClientOptions, ReconcileResult } from "./key-directory-client";
export { OfflineQueue } from "./offline-queue";
export type { EnqueueOptions, OperationInput } from "./offline-queue";
export { PreKeyManager } from "./prekey-manager";
export type { BundleIdentity } from "./prekey-manager";
export { NobleKeyProvider } from "./key-provider";
export type { NobleKeyProviderOptions, PreKeyAlgorithm } from "./key-provider";
export { MemoryDirectory } from "./memory-directory";
export { FirebaseDirectory } from "./firebase-directory";
export type { FirebaseDirectoryOptions } from "./firebase-directory";
export { MemoryStorage, FileStorage, EncryptedStorage } from "./storage";
export { NodeFingerprintProvider, StaticFingerprintProvider } from "./platform-fingerprint";
export { deriveDeviceId } from "./device-id";
export type { DerivedDeviceId } from "./device-id";
export { resolveConfig } from "./config";
export type { ConfigInput, ResolvedConfig } from "./config";
export { Logger } from "./logger";
export type { LogLevel } from "./logger";
export {
  ProtocolError,
  isProtocolError,
  validationError,
  storageError,
  keyError,
  networkError,
  initializationError,
  securityError,
} from "./errors";
export type { ProtocolErrorKind, ProtocolErrorOptions } from "./errors";
export {
  validateUserId,
  validateDeviceId,
  validateMessage,
  validateGroupId,
  validateDirectoryUrl,
  validatePreKeyBundle,
  validatePreKeyCount,
  parseBundleRecord,
} from "./validator";
export { encodeBundle, decodeBundle, devicePath, userDevicesPath } from "./bundle";
export { STORAGE_KEYS } from "./constants";
export type {
  IdentityKeyPair,
  KeyPair,
  PreKeyRecord,
  SignedPreKeyRecord,
  DeviceIdentity,
  PreKeyBundle,
  BundleRecord,
  LifecycleState,
  InstanceInfo,
  OperationKind,
  PendingOperation,
  QueueStats,
  UploadResult,
  DrainResult,
  OperationOptions,
  Unsubscribe,
  JsonValue,
  StorageAdapter,
  DirectoryTransport,
  KeyProvider,
  PlatformFingerprintProvider,
  DirectoryConfig,
  InitializeOptions,
  KeysChangedEvent,
} from "./types";
