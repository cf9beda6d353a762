import { readFile } from "node:fs/promises";
import * as os from "node:os";
import type { PlatformFingerprintProvider } from "./types";

const MACHINE_ID_PATHS = ["/etc/machine-id", "/var/lib/dbus/machine-id"];

/**
 * Node.js fingerprint: machine id where the OS exposes one, otherwise the
 * hostname, combined with platform, architecture and CPU model.
 */
export class NodeFingerprintProvider implements PlatformFingerprintProvider {
  async getFingerprint(): Promise<string> {
    const machineId = (await readMachineId()) ?? os.hostname();
    const cpuModel = os.cpus()[0]?.model ?? "unknown";
    return [os.platform(), os.arch(), cpuModel, machineId].join("_");
  }

  osName(): string {
    return os.platform();
  }
}

/**
 * Fixed fingerprint, for embedding hosts that compute their own attributes.
 */
export class StaticFingerprintProvider implements PlatformFingerprintProvider {
  constructor(
    private fingerprint: string,
    private osLabel: string = "unknown",
  ) {}

  async getFingerprint(): Promise<string> {
    return this.fingerprint;
  }

  osName(): string {
    return this.osLabel;
  }
}

async function readMachineId(): Promise<string | null> {
  for (const path of MACHINE_ID_PATHS) {
    // A missing or unreadable file moves on to the next location
    const value = await readFile(path, "utf8").then(
      (contents) => contents.trim(),
      () => "",
    );
    if (value) return value;
  }
  return null;
}
