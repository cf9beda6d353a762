import { ed25519, x25519 } from "@noble/curves/ed25519.js";
import { ml_kem768 } from "@noble/post-quantum/ml-kem.js";
import { randomBytes } from "@noble/hashes/utils.js";
import { MAX_REGISTRATION_ID } from "./constants";
import type { IdentityKeyPair, KeyPair, KeyProvider, PreKeyRecord } from "./types";

export type PreKeyAlgorithm = "x25519" | "ml-kem-768";

export interface NobleKeyProviderOptions {
  /** Algorithm for signed and one-time pre-keys. Identity keys are always Ed25519. */
  preKeyAlgorithm?: PreKeyAlgorithm;
}

/**
 * Default key provider backed by the noble libraries: Ed25519 identity keys
 * that sign pre-keys, and X25519 or ML-KEM-768 pre-keys.
 */
export class NobleKeyProvider implements KeyProvider {
  private preKeyAlgorithm: PreKeyAlgorithm;

  constructor(options: NobleKeyProviderOptions = {}) {
    this.preKeyAlgorithm = options.preKeyAlgorithm ?? "x25519";
  }

  async generateIdentityKeyPair(): Promise<IdentityKeyPair> {
    const privateKey = ed25519.utils.randomSecretKey();
    const publicKey = ed25519.getPublicKey(privateKey);
    return { publicKey, privateKey };
  }

  async generatePreKeys(startId: number, count: number): Promise<PreKeyRecord[]> {
    const preKeys: PreKeyRecord[] = [];
    for (let i = 0; i < count; i++) {
      preKeys.push({ id: startId + i, keyPair: this.generatePreKeyPair() });
    }
    return preKeys;
  }

  async sign(privateKey: Uint8Array, data: Uint8Array): Promise<Uint8Array> {
    return ed25519.sign(data, privateKey);
  }

  async verify(
    publicKey: Uint8Array,
    data: Uint8Array,
    signature: Uint8Array,
  ): Promise<boolean> {
    try {
      return ed25519.verify(signature, data, publicKey);
    } catch {
      // Malformed keys or signatures are simply invalid
      return false;
    }
  }

  generateRegistrationId(): number {
    const bytes = randomBytes(2);
    const value = ((bytes[0] << 8) | bytes[1]) % MAX_REGISTRATION_ID;
    return value + 1;
  }

  private generatePreKeyPair(): KeyPair {
    if (this.preKeyAlgorithm === "ml-kem-768") {
      const keyPair = ml_kem768.keygen();
      return { publicKey: keyPair.publicKey, secretKey: keyPair.secretKey };
    }
    const secretKey = x25519.utils.randomSecretKey();
    return { publicKey: x25519.getPublicKey(secretKey), secretKey };
  }
}
