import { DEFAULT_PREKEY_COUNT } from "./constants";
import { validationError } from "./errors";
import { validateDirectoryUrl, validatePreKeyCount } from "./validator";
import type { DirectoryConfig, InitializeOptions } from "./types";

export interface ResolvedConfig {
  readonly directoryEndpointUrl: string;
  readonly generateKeysIfAbsent: boolean;
  readonly autoSync: boolean;
  readonly preKeyCount: number;
  readonly verifySignatures: boolean;
}

export type ConfigInput = DirectoryConfig & InitializeOptions;

const DEFAULTS = {
  generateKeysIfAbsent: true,
  autoSync: true,
  preKeyCount: DEFAULT_PREKEY_COUNT,
  verifySignatures: true,
} as const;

/**
 * Validate the configuration surface and fill in defaults. Only recognized
 * options are read; anything else on the input object is ignored.
 */
export function resolveConfig(input: ConfigInput): ResolvedConfig {
  if (!input || typeof input !== "object") {
    throw validationError("Configuration must be an object", "config");
  }

  const directoryEndpointUrl = validateDirectoryUrl(input.directoryEndpointUrl);

  const preKeyCount =
    input.preKeyCount === undefined
      ? DEFAULTS.preKeyCount
      : validatePreKeyCount(input.preKeyCount);

  return Object.freeze({
    directoryEndpointUrl,
    generateKeysIfAbsent: readBoolean(
      input.generateKeysIfAbsent,
      "generateKeysIfAbsent",
      DEFAULTS.generateKeysIfAbsent,
    ),
    autoSync: readBoolean(input.autoSync, "autoSync", DEFAULTS.autoSync),
    preKeyCount,
    verifySignatures: readBoolean(
      input.verifySignatures,
      "verifySignatures",
      DEFAULTS.verifySignatures,
    ),
  });
}

function readBoolean(value: unknown, name: string, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (typeof value !== "boolean") {
    throw validationError(`${name} must be a boolean`, name, {
      received: typeof value,
    });
  }
  return value;
}
