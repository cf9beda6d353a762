import { DIRECTORY_ROOT, ERRORS } from "./constants";
import { base64ToBytes, bytesToBase64 } from "./crypto";
import { securityError, validationError } from "./errors";
import type { BundleRecord, JsonValue, PreKeyBundle } from "./types";

const PRIVATE_FIELD_NAMES = new Set(["privateKey", "secretKey", "privateKeys"]);

// Realtime Database keys may not contain "." so it is escaped in path segments
export function encodePathSegment(segment: string): string {
  return segment.replace(/%/g, "%25").replace(/\./g, "%2E");
}

export function decodePathSegment(segment: string): string {
  return segment.replace(/%2E/g, ".").replace(/%25/g, "%");
}

export function userDevicesPath(userId: string): string {
  return `${DIRECTORY_ROOT}/users/${encodePathSegment(userId)}/devices`;
}

export function devicePath(userId: string, deviceId: string): string {
  return `${userDevicesPath(userId)}/${encodePathSegment(deviceId)}`;
}

/**
 * Refuse anything that carries private key material, however deeply nested.
 */
export function assertPublicOnly(value: unknown, path = "bundle"): void {
  if (value === null || typeof value !== "object" || value instanceof Uint8Array) {
    return;
  }
  for (const [key, child] of Object.entries(value)) {
    if (PRIVATE_FIELD_NAMES.has(key)) {
      throw securityError(ERRORS.PRIVATE_MATERIAL_IN_BUNDLE, {
        code: "PRIVATE_MATERIAL_IN_BUNDLE",
        details: { field: `${path}.${key}` },
      });
    }
    assertPublicOnly(child, `${path}.${key}`);
  }
}

export function encodeBundle(bundle: PreKeyBundle): BundleRecord {
  const record: BundleRecord = {
    userId: bundle.userId,
    deviceId: bundle.deviceId,
    registrationId: bundle.registrationId,
    identityPublicKey: bytesToBase64(bundle.identityPublicKey),
    signedPreKeyId: bundle.signedPreKeyId,
    signedPreKeyPublic: bytesToBase64(bundle.signedPreKeyPublic),
    signedPreKeySignature: bytesToBase64(bundle.signedPreKeySignature),
  };
  if (bundle.oneTimePreKeyId !== undefined && bundle.oneTimePreKeyPublic) {
    record.oneTimePreKeyId = bundle.oneTimePreKeyId;
    record.oneTimePreKeyPublic = bytesToBase64(bundle.oneTimePreKeyPublic);
  }
  return record;
}

export function decodeBundle(record: BundleRecord): PreKeyBundle {
  try {
    const bundle: PreKeyBundle = {
      userId: record.userId,
      deviceId: record.deviceId,
      registrationId: record.registrationId,
      identityPublicKey: base64ToBytes(record.identityPublicKey),
      signedPreKeyId: record.signedPreKeyId,
      signedPreKeyPublic: base64ToBytes(record.signedPreKeyPublic),
      signedPreKeySignature: base64ToBytes(record.signedPreKeySignature),
    };
    if (record.oneTimePreKeyId !== undefined && record.oneTimePreKeyPublic) {
      bundle.oneTimePreKeyId = record.oneTimePreKeyId;
      bundle.oneTimePreKeyPublic = base64ToBytes(record.oneTimePreKeyPublic);
    }
    return bundle;
  } catch (error) {
    throw validationError("Bundle record contains malformed key data", "bundle", {
      deviceId: record.deviceId,
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}

export function recordToJson(record: BundleRecord): { [key: string]: JsonValue } {
  const json: { [key: string]: JsonValue } = {
    userId: record.userId,
    deviceId: record.deviceId,
    registrationId: record.registrationId,
    identityPublicKey: record.identityPublicKey,
    signedPreKeyId: record.signedPreKeyId,
    signedPreKeyPublic: record.signedPreKeyPublic,
    signedPreKeySignature: record.signedPreKeySignature,
  };
  if (record.oneTimePreKeyId !== undefined && record.oneTimePreKeyPublic !== undefined) {
    json.oneTimePreKeyId = record.oneTimePreKeyId;
    json.oneTimePreKeyPublic = record.oneTimePreKeyPublic;
  }
  return json;
}

export function recordsEqual(a: BundleRecord, b: BundleRecord): boolean {
  return JSON.stringify(recordToJson(a)) === JSON.stringify(recordToJson(b));
}
