// Secure storage keys owned by the credential store
export const STORAGE_KEYS = {
  IDENTITY_PRIVATE_KEY: "signal_identity_private_key",
  IDENTITY_PUBLIC_KEY: "signal_identity_public_key",
  REGISTRATION_ID: "signal_registration_id",
  CURRENT_USER_ID: "signal_current_user_id",
  CURRENT_DEVICE_ID: "signal_current_device_id",
  DEVICE_IDENTITY: "signal_device_identity",
  SIGNED_PREKEY: "signal_signed_prekey",
  PREKEYS: "signal_prekeys",
} as const;

// Offline queue keys
export const QUEUE_META_KEY = "signal_offline_queue_meta";
export const QUEUE_ENTRY_PREFIX = "signal_offline_queue_";

// Directory layout
export const DIRECTORY_ROOT = "signal_protocol";

// Identity keys are Ed25519 by default
export const IDENTITY_PUBLIC_KEY_LENGTH = 32;
export const IDENTITY_PRIVATE_KEY_LENGTH = 32;

// Validation limits
export const MAX_ID_LENGTH = 255;
export const MAX_MESSAGE_BYTES = 1024 * 1024;
export const MAX_DEVICE_ID = 0x7fffffff;
export const ID_PATTERN = /^[A-Za-z0-9._-]+$/;

// Registration ids live in 1..0x3FFF
export const MAX_REGISTRATION_ID = 0x3fff;

// Pre-key constants
export const DEFAULT_PREKEY_COUNT = 20;
export const MAX_PREKEY_COUNT = 1000;
export const MAX_PREKEY_ID = 0xffffff;

// Device id derivation
export const DEVICE_ID_HASH_LENGTH = 8;
export const DEVICE_ID_RANDOM_LENGTH = 8;

export const ERRORS = {
  NOT_INITIALIZED: "Protocol instance is not initialized",
  ALREADY_INITIALIZED: "Protocol instance is already initialized for another user",
  DISPOSED: "Protocol instance has been disposed",
  IDENTITY_NOT_FOUND: "Identity key pair not found",
  REGISTRATION_ID_NOT_FOUND: "Registration id not found",
  SIGNED_PREKEY_NOT_FOUND: "Signed pre-key not found",
  PRIVATE_MATERIAL_IN_BUNDLE: "Bundle contains private key material",
  INVALID_KEY_LENGTH: "Decoded key material has an unexpected length",
  INVALID_STORED_VALUE: "Stored value is malformed",
  ABORTED: "Operation aborted",
} as const;
