import { DEVICE_ID_HASH_LENGTH, DEVICE_ID_RANDOM_LENGTH } from "./constants";
import { randomToken, sha256Hex } from "./crypto";
import { Logger } from "./logger";
import type { PlatformFingerprintProvider } from "./types";

export interface DerivedDeviceId {
  deviceId: string;
  platformFingerprintHash: string;
  createdAtEpochMs: number;
}

/**
 * Build a device id of the form
 * `<userId>_device_<hash8>_<timestampMs>_<random8>`.
 *
 * `hash8` is the first eight hex characters of SHA-256 over the platform
 * fingerprint. When the fingerprint cannot be read the segment becomes
 * `<osName>_<random8>` instead; derivation itself never fails on that.
 * The id is advisory and human-debuggable, not a secret.
 */
export async function deriveDeviceId(
  userId: string,
  fingerprintProvider: PlatformFingerprintProvider,
  now: number = Date.now(),
): Promise<DerivedDeviceId> {
  const platformSegment = await platformIdentifier(fingerprintProvider);
  const random = randomToken(DEVICE_ID_RANDOM_LENGTH);

  return {
    deviceId: `${userId}_device_${platformSegment.segment}_${now}_${random}`,
    platformFingerprintHash: platformSegment.hash,
    createdAtEpochMs: now,
  };
}

async function platformIdentifier(
  provider: PlatformFingerprintProvider,
): Promise<{ segment: string; hash: string }> {
  try {
    const fingerprint = await provider.getFingerprint();
    if (!fingerprint) {
      throw new Error("Empty platform fingerprint");
    }
    const hash = sha256Hex(fingerprint).substring(0, DEVICE_ID_HASH_LENGTH);
    return { segment: hash, hash };
  } catch (error) {
    Logger.warn("DeviceId", "Failed to get platform identifier, using fallback", {
      reason: error instanceof Error ? error.message : String(error),
    });
    const segment = `${safeOsName(provider)}_${randomToken(DEVICE_ID_RANDOM_LENGTH)}`;
    return {
      segment,
      hash: sha256Hex(segment).substring(0, DEVICE_ID_HASH_LENGTH),
    };
  }
}

function safeOsName(provider: PlatformFingerprintProvider): string {
  try {
    return provider.osName() || "unknown";
  } catch {
    return "unknown";
  }
}
