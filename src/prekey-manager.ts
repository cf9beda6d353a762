import { ERRORS, MAX_PREKEY_ID } from "./constants";
import type { SecureCredentialStore } from "./credential-store";
import { keyError } from "./errors";
import { Logger } from "./logger";
import type {
  IdentityKeyPair,
  KeyProvider,
  PreKeyBundle,
  PreKeyRecord,
  SignedPreKeyRecord,
} from "./types";

export interface BundleIdentity {
  userId: string;
  deviceId: string;
  registrationId: number;
  identityPublicKey: Uint8Array;
}

/**
 * Keeps the signed pre-key and the batch of one-time pre-keys for this
 * device. Private halves live only in the credential store.
 */
export class PreKeyManager {
  constructor(
    private store: SecureCredentialStore,
    private keyProvider: KeyProvider,
    private now: () => number = Date.now,
  ) {}

  /**
   * Make sure a signed pre-key matching `identity` and at least one one-time
   * pre-key exist, generating whatever is missing.
   */
  async ensurePreKeys(identity: IdentityKeyPair, count: number): Promise<void> {
    const signed = await this.store.getSignedPreKey();
    if (!signed || !(await this.verifySignedPreKey(signed, identity.publicKey))) {
      if (signed) {
        Logger.warn("PreKeyManager", "Signed pre-key does not match identity, regenerating");
      }
      await this.generateSignedPreKey(identity, signed ? signed.id + 1 : 1);
    }

    const preKeys = await this.store.getPreKeys();
    if (preKeys.length === 0) {
      await this.refreshPreKeys(count);
    }
  }

  async generateSignedPreKey(
    identity: IdentityKeyPair,
    id: number = 1,
  ): Promise<SignedPreKeyRecord> {
    const [preKey] = await this.keyProvider.generatePreKeys(wrapId(id), 1);
    if (!preKey) {
      throw keyError("Key provider returned no signed pre-key", {
        code: "PREKEY_GENERATION_FAILED",
      });
    }

    const signature = await this.keyProvider.sign(
      identity.privateKey,
      preKey.keyPair.publicKey,
    );
    const record: SignedPreKeyRecord = {
      id: preKey.id,
      keyPair: preKey.keyPair,
      signature,
      createdAt: this.now(),
    };
    await this.store.storeSignedPreKey(record);
    Logger.log("PreKeyManager", "Generated signed pre-key", { id: record.id });
    return record;
  }

  /**
   * Replace the one-time pre-keys with a fresh batch. Ids continue after the
   * highest one issued so far.
   */
  async refreshPreKeys(count: number): Promise<PreKeyRecord[]> {
    const existing = await this.store.getPreKeys();
    const highest = existing.reduce((max, preKey) => Math.max(max, preKey.id), 0);

    const preKeys = await this.keyProvider.generatePreKeys(wrapId(highest + 1), count);
    if (preKeys.length === 0) {
      throw keyError("Key provider returned no pre-keys", {
        code: "PREKEY_GENERATION_FAILED",
      });
    }

    await this.store.storePreKeys(preKeys);
    Logger.log("PreKeyManager", "Generated one-time pre-keys", {
      count: preKeys.length,
      firstId: preKeys[0].id,
    });
    return preKeys;
  }

  /** New signed pre-key and one-time batch, signed by `identity`. */
  async rotate(identity: IdentityKeyPair, count: number): Promise<void> {
    const previous = await this.store.getSignedPreKey();
    await this.store.clearPreKeys();
    await this.generateSignedPreKey(identity, previous ? previous.id + 1 : 1);
    await this.refreshPreKeys(count);
  }

  async buildBundle(identity: BundleIdentity): Promise<PreKeyBundle> {
    const signed = await this.store.getSignedPreKey();
    if (!signed) {
      throw keyError(ERRORS.SIGNED_PREKEY_NOT_FOUND, {
        code: "SIGNED_PREKEY_NOT_FOUND",
      });
    }

    const bundle: PreKeyBundle = {
      userId: identity.userId,
      deviceId: identity.deviceId,
      registrationId: identity.registrationId,
      identityPublicKey: identity.identityPublicKey,
      signedPreKeyId: signed.id,
      signedPreKeyPublic: signed.keyPair.publicKey,
      signedPreKeySignature: signed.signature,
    };

    const [oneTime] = await this.store.getPreKeys();
    if (oneTime) {
      bundle.oneTimePreKeyId = oneTime.id;
      bundle.oneTimePreKeyPublic = oneTime.keyPair.publicKey;
    }
    return bundle;
  }

  /** Check a peer bundle's signed pre-key against its identity key. */
  async verifyBundle(bundle: PreKeyBundle): Promise<boolean> {
    return this.keyProvider.verify(
      bundle.identityPublicKey,
      bundle.signedPreKeyPublic,
      bundle.signedPreKeySignature,
    );
  }

  private verifySignedPreKey(
    record: SignedPreKeyRecord,
    identityPublicKey: Uint8Array,
  ): Promise<boolean> {
    return this.keyProvider.verify(
      identityPublicKey,
      record.keyPair.publicKey,
      record.signature,
    );
  }
}

function wrapId(id: number): number {
  return id > MAX_PREKEY_ID ? 1 : id;
}
