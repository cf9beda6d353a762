import { describe, it, expect } from "vitest";
import { ProtocolError } from "../src/errors";
import {
  isBundleRecord,
  isValidUserId,
  parseBundleRecord,
  validateDeviceId,
  validateDirectoryUrl,
  validateGroupId,
  validateMessage,
  validatePreKeyBundle,
  validatePreKeyCount,
  validateUserId,
} from "../src/validator";
import type { PreKeyBundle } from "../src/types";

function captureError(fn: () => unknown): ProtocolError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ProtocolError) return error;
    throw error;
  }
  throw new Error("expected a ProtocolError");
}

function sampleBundle(): PreKeyBundle {
  return {
    userId: "alice",
    deviceId: "alice_device_abcd1234_1700000000000_AbCdEfGh",
    registrationId: 42,
    identityPublicKey: new Uint8Array(32).fill(1),
    signedPreKeyId: 1,
    signedPreKeyPublic: new Uint8Array(32).fill(2),
    signedPreKeySignature: new Uint8Array(64).fill(3),
  };
}

describe("validateUserId", () => {
  it("should accept identifiers made of the allowed characters", () => {
    for (const id of ["alice", "a", "user.name_01-x", "A".repeat(255), "..."]) {
      expect(validateUserId(id)).toBe(id);
    }
  });

  it("should reject empty, missing and non-string values", () => {
    expect(captureError(() => validateUserId("")).message).toBe("userId must not be empty");
    expect(captureError(() => validateUserId(undefined)).message).toBe("userId is required");
    expect(captureError(() => validateUserId(null)).message).toBe("userId is required");
    expect(captureError(() => validateUserId(42)).message).toBe("userId must be a string");
  });

  it("should reject identifiers longer than 255 characters", () => {
    const error = captureError(() => validateUserId("a".repeat(256)));
    expect(error.kind).toBe("validation");
    expect(error.message).toBe("userId must be at most 255 characters");
  });

  it("should reject characters outside the allowed set", () => {
    for (const id of ["alice smith", "bob@example", "ünicode", "a/b", "a:b"]) {
      const error = captureError(() => validateUserId(id));
      expect(error.kind).toBe("validation");
      expect(error.code).toBe("INVALID_USER_ID");
      expect(error.details).toEqual({ field: "userId" });
    }
  });

  it("should expose a boolean guard", () => {
    expect(isValidUserId("alice")).toBe(true);
    expect(isValidUserId("alice!")).toBe(false);
  });
});

describe("validateGroupId", () => {
  it("should apply user id rules under the groupId name", () => {
    expect(validateGroupId("team-1")).toBe("team-1");
    const error = captureError(() => validateGroupId("team 1"));
    expect(error.message).toBe(
      "groupId can only contain letters, digits, dots, underscores and hyphens",
    );
    expect(error.code).toBe("INVALID_GROUP_ID");
  });
});

describe("validateDeviceId", () => {
  it("should accept integers between 0 and 0x7FFFFFFF", () => {
    expect(validateDeviceId(0)).toBe(0);
    expect(validateDeviceId(0x7fffffff)).toBe(0x7fffffff);
  });

  it("should reject negative, fractional, oversized and missing ids", () => {
    expect(captureError(() => validateDeviceId(-1)).message).toBe(
      "deviceId must be at least 0",
    );
    expect(captureError(() => validateDeviceId(1.5)).message).toBe(
      "deviceId must be an integer",
    );
    expect(captureError(() => validateDeviceId(0x80000000)).message).toBe(
      `deviceId must be at most ${0x7fffffff}`,
    );
    expect(captureError(() => validateDeviceId(undefined)).message).toBe(
      "deviceId is required",
    );
  });
});

describe("validateMessage", () => {
  it("should accept messages up to 1 MiB of UTF-8", () => {
    const message = "a".repeat(1024 * 1024);
    expect(validateMessage(message)).toBe(message);
  });

  it("should reject empty messages", () => {
    expect(captureError(() => validateMessage("")).message).toBe(
      "message must not be empty",
    );
  });

  it("should count bytes rather than characters", () => {
    // "é" is two bytes in UTF-8
    const message = "é".repeat(512 * 1024 + 1);
    const error = captureError(() => validateMessage(message));
    expect(error.message).toBe("message must be at most 1048576 bytes");
    expect(error.details).toEqual({
      field: "message",
      bytes: 1024 * 1024 + 2,
      maxBytes: 1024 * 1024,
    });
  });
});

describe("validateDirectoryUrl", () => {
  it("should accept https URLs", () => {
    expect(validateDirectoryUrl("https://x.example.com")).toBe("https://x.example.com");
  });

  it("should reject non-https, malformed and empty URLs", () => {
    expect(captureError(() => validateDirectoryUrl("http://x.example.com")).message).toBe(
      "directoryEndpointUrl must use https",
    );
    expect(captureError(() => validateDirectoryUrl("not a url")).message).toBe(
      "directoryEndpointUrl must be a valid URL",
    );
    expect(captureError(() => validateDirectoryUrl("")).message).toBe(
      "directoryEndpointUrl must not be empty",
    );
  });
});

describe("validatePreKeyCount", () => {
  it("should accept 1 to 1000", () => {
    expect(validatePreKeyCount(1)).toBe(1);
    expect(validatePreKeyCount(1000)).toBe(1000);
  });

  it("should reject values outside the range", () => {
    expect(captureError(() => validatePreKeyCount(0)).code).toBe("INVALID_PRE_KEY_COUNT");
    expect(captureError(() => validatePreKeyCount(1001)).message).toBe(
      "preKeyCount must be at most 1000",
    );
  });
});

describe("validatePreKeyBundle", () => {
  it("should accept a complete bundle", () => {
    const bundle = sampleBundle();
    expect(validatePreKeyBundle(bundle)).toBe(bundle);
  });

  it("should require both one-time pre-key fields together", () => {
    const bundle = { ...sampleBundle(), oneTimePreKeyId: 3 };
    expect(captureError(() => validatePreKeyBundle(bundle)).message).toBe(
      "oneTimePreKeyPublic must be a Uint8Array",
    );
  });

  it("should reject empty key material", () => {
    const bundle = { ...sampleBundle(), identityPublicKey: new Uint8Array(0) };
    expect(captureError(() => validatePreKeyBundle(bundle)).message).toBe(
      "identityPublicKey must not be empty",
    );
  });
});

describe("parseBundleRecord", () => {
  const record = {
    userId: "alice",
    deviceId: "device-1",
    registrationId: 7,
    identityPublicKey: "AQID",
    signedPreKeyId: 1,
    signedPreKeyPublic: "BAUG",
    signedPreKeySignature: "BwgJ",
  };

  it("should keep known fields and drop the rest", () => {
    expect(parseBundleRecord({ ...record, extra: true })).toEqual(record);
  });

  it("should name the first invalid field", () => {
    const error = captureError(() => parseBundleRecord({ ...record, registrationId: "7" }));
    expect(error.message).toBe("registrationId must be an integer");
  });

  it("should reject non-objects", () => {
    expect(isBundleRecord(null)).toBe(false);
    expect(isBundleRecord([record])).toBe(false);
    expect(isBundleRecord(record)).toBe(true);
  });
});
