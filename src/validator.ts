// validator.ts
import {
  ID_PATTERN,
  MAX_DEVICE_ID,
  MAX_ID_LENGTH,
  MAX_MESSAGE_BYTES,
  MAX_PREKEY_COUNT,
  MAX_REGISTRATION_ID,
} from "./constants";
import { validationError } from "./errors";
import { utf8ByteLength } from "./crypto";
import type { BundleRecord, PreKeyBundle } from "./types";

export interface ValidationOptions {
  allowEmpty?: boolean;
  minLength?: number;
  maxLength?: number;
}

// Basic type validators
export function validateString(
  value: unknown,
  name: string,
  options?: ValidationOptions,
): string {
  if (value === undefined || value === null) {
    throw validationError(`${name} is required`, name);
  }

  if (typeof value !== "string") {
    throw validationError(`${name} must be a string`, name, {
      received: typeof value,
    });
  }

  if (!options?.allowEmpty && value.trim() === "") {
    throw validationError(`${name} must not be empty`, name);
  }

  if (options?.minLength !== undefined && value.length < options.minLength) {
    throw validationError(
      `${name} must be at least ${options.minLength} characters`,
      name,
      { length: value.length, minLength: options.minLength },
    );
  }

  if (options?.maxLength !== undefined && value.length > options.maxLength) {
    throw validationError(
      `${name} must be at most ${options.maxLength} characters`,
      name,
      { length: value.length, maxLength: options.maxLength },
    );
  }

  return value;
}

export function validateInteger(
  value: unknown,
  name: string,
  options?: { min?: number; max?: number },
): number {
  if (value === undefined || value === null) {
    throw validationError(`${name} is required`, name);
  }

  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw validationError(`${name} must be an integer`, name, {
      received: value,
    });
  }

  if (options?.min !== undefined && value < options.min) {
    throw validationError(`${name} must be at least ${options.min}`, name, {
      value,
      min: options.min,
    });
  }

  if (options?.max !== undefined && value > options.max) {
    throw validationError(`${name} must be at most ${options.max}`, name, {
      value,
      max: options.max,
    });
  }

  return value;
}

export function validateBytes(value: unknown, name: string): Uint8Array {
  if (!(value instanceof Uint8Array)) {
    throw validationError(`${name} must be a Uint8Array`, name);
  }
  if (value.length === 0) {
    throw validationError(`${name} must not be empty`, name);
  }
  return value;
}

function validateIdentifier(value: unknown, name: string): string {
  const id = validateString(value, name, { maxLength: MAX_ID_LENGTH });
  if (!ID_PATTERN.test(id)) {
    throw validationError(
      `${name} can only contain letters, digits, dots, underscores and hyphens`,
      name,
    );
  }
  return id;
}

export function validateUserId(userId: unknown): string {
  return validateIdentifier(userId, "userId");
}

export function validateGroupId(groupId: unknown): string {
  return validateIdentifier(groupId, "groupId");
}

export function validateDeviceId(deviceId: unknown): number {
  return validateInteger(deviceId, "deviceId", { min: 0, max: MAX_DEVICE_ID });
}

export function validateMessage(message: unknown): string {
  const value = validateString(message, "message", { allowEmpty: true });
  if (value.length === 0) {
    throw validationError("message must not be empty", "message");
  }

  const bytes = utf8ByteLength(value);
  if (bytes > MAX_MESSAGE_BYTES) {
    throw validationError(
      `message must be at most ${MAX_MESSAGE_BYTES} bytes`,
      "message",
      { bytes, maxBytes: MAX_MESSAGE_BYTES },
    );
  }
  return value;
}

export function validateDirectoryUrl(url: unknown): string {
  const value = validateString(url, "directoryEndpointUrl");

  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw validationError(
      "directoryEndpointUrl must be a valid URL",
      "directoryEndpointUrl",
    );
  }

  if (parsed.protocol !== "https:") {
    throw validationError(
      "directoryEndpointUrl must use https",
      "directoryEndpointUrl",
      { protocol: parsed.protocol },
    );
  }

  if (!parsed.hostname) {
    throw validationError(
      "directoryEndpointUrl must include a host",
      "directoryEndpointUrl",
    );
  }

  return value;
}

export function validatePreKeyCount(count: unknown): number {
  return validateInteger(count, "preKeyCount", { min: 1, max: MAX_PREKEY_COUNT });
}

/**
 * Structural checks for a bundle about to be published.
 */
export function validatePreKeyBundle(bundle: PreKeyBundle): PreKeyBundle {
  if (!bundle || typeof bundle !== "object") {
    throw validationError("bundle must be an object", "bundle");
  }

  validateUserId(bundle.userId);
  validateString(bundle.deviceId, "deviceId");
  validateInteger(bundle.registrationId, "registrationId", {
    min: 1,
    max: MAX_REGISTRATION_ID,
  });
  validateBytes(bundle.identityPublicKey, "identityPublicKey");
  validateInteger(bundle.signedPreKeyId, "signedPreKeyId", { min: 0 });
  validateBytes(bundle.signedPreKeyPublic, "signedPreKeyPublic");
  validateBytes(bundle.signedPreKeySignature, "signedPreKeySignature");

  if (bundle.oneTimePreKeyId !== undefined || bundle.oneTimePreKeyPublic !== undefined) {
    validateInteger(bundle.oneTimePreKeyId, "oneTimePreKeyId", { min: 0 });
    validateBytes(bundle.oneTimePreKeyPublic, "oneTimePreKeyPublic");
  }

  return bundle;
}

/**
 * Parse a record read back from the directory. Throws a validation error
 * naming the first offending field.
 */
export function parseBundleRecord(data: unknown): BundleRecord {
  if (!data || typeof data !== "object" || Array.isArray(data)) {
    throw validationError("Bundle record must be an object", "bundle");
  }
  const record: Record<string, unknown> = { ...data };

  const result: BundleRecord = {
    userId: validateUserId(record.userId),
    deviceId: validateString(record.deviceId, "deviceId"),
    registrationId: validateInteger(record.registrationId, "registrationId", {
      min: 1,
      max: MAX_REGISTRATION_ID,
    }),
    identityPublicKey: validateString(record.identityPublicKey, "identityPublicKey"),
    signedPreKeyId: validateInteger(record.signedPreKeyId, "signedPreKeyId", {
      min: 0,
    }),
    signedPreKeyPublic: validateString(record.signedPreKeyPublic, "signedPreKeyPublic"),
    signedPreKeySignature: validateString(
      record.signedPreKeySignature,
      "signedPreKeySignature",
    ),
  };

  if (record.oneTimePreKeyId !== undefined && record.oneTimePreKeyId !== null) {
    result.oneTimePreKeyId = validateInteger(record.oneTimePreKeyId, "oneTimePreKeyId", {
      min: 0,
    });
    result.oneTimePreKeyPublic = validateString(
      record.oneTimePreKeyPublic,
      "oneTimePreKeyPublic",
    );
  }

  return result;
}

// Runtime type guards
export function isValidUserId(value: unknown): value is string {
  try {
    validateUserId(value);
    return true;
  } catch {
    return false;
  }
}

export function isBundleRecord(data: unknown): data is BundleRecord {
  try {
    parseBundleRecord(data);
    return true;
  } catch {
    return false;
  }
}
