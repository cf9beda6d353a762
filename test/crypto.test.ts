import { describe, it, expect } from "vitest";
import {
  base64ToBytes,
  bytesToBase64,
  constantTimeEqual,
  openString,
  randomToken,
  sealString,
  sha256Hex,
  stringToBytes,
} from "../src/crypto";
import { NobleKeyProvider } from "../src/key-provider";

describe("Crypto utilities", () => {
  it("should encode base64 URL-safe without padding", () => {
    expect(bytesToBase64(new Uint8Array([0xfb, 0xff]))).toBe("-_8");
    expect(base64ToBytes("-_8")).toEqual(new Uint8Array([0xfb, 0xff]));
  });

  it("should also decode standard base64 with padding", () => {
    expect(base64ToBytes("+/8=")).toEqual(new Uint8Array([0xfb, 0xff]));
  });

  it("should reject characters outside the base64 alphabets", () => {
    expect(() => base64ToBytes("ab$c")).toThrow("Value is not valid base64");
  });

  it("should produce random tokens of the requested length", () => {
    const token = randomToken(8);
    expect(token).toMatch(/^[A-Za-z0-9_-]{8}$/);
    expect(randomToken(8)).not.toBe(token);
  });

  it("should hash strings with SHA-256", () => {
    expect(sha256Hex("abc")).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
  });

  it("should compare byte arrays", () => {
    expect(constantTimeEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(true);
    expect(constantTimeEqual(new Uint8Array([1, 2]), new Uint8Array([1, 3]))).toBe(false);
    expect(constantTimeEqual(new Uint8Array([1]), new Uint8Array([1, 2]))).toBe(false);
  });

  it("should seal and open strings with a 32-byte key", () => {
    const key = new Uint8Array(32).fill(7);
    const sealed = sealString(key, "test-secret");
    expect(sealed).not.toContain("test-secret");
    expect(openString(key, sealed)).toBe("test-secret");
  });

  it("should refuse to open with the wrong key", () => {
    const sealed = sealString(new Uint8Array(32).fill(7), "test-secret");
    expect(() => openString(new Uint8Array(32).fill(8), sealed)).toThrow();
  });

  it("should require 32-byte keys", () => {
    expect(() => sealString(new Uint8Array(16), "x")).toThrow("Key must be 32 bytes");
  });
});

describe("NobleKeyProvider", () => {
  const provider = new NobleKeyProvider();

  it("should generate 32-byte Ed25519 identity keys", async () => {
    const identity = await provider.generateIdentityKeyPair();
    expect(identity.publicKey.length).toBe(32);
    expect(identity.privateKey.length).toBe(32);
  });

  it("should sign and verify", async () => {
    const identity = await provider.generateIdentityKeyPair();
    const data = stringToBytes("signed pre-key");
    const signature = await provider.sign(identity.privateKey, data);

    expect(signature.length).toBe(64);
    expect(await provider.verify(identity.publicKey, data, signature)).toBe(true);
    expect(await provider.verify(identity.publicKey, stringToBytes("other"), signature)).toBe(
      false,
    );
  });

  it("should report malformed signatures as invalid", async () => {
    const identity = await provider.generateIdentityKeyPair();
    expect(
      await provider.verify(identity.publicKey, new Uint8Array([1]), new Uint8Array(3)),
    ).toBe(false);
  });

  it("should number pre-keys from the start id", async () => {
    const preKeys = await provider.generatePreKeys(5, 3);
    expect(preKeys.map((preKey) => preKey.id)).toEqual([5, 6, 7]);
    expect(preKeys[0].keyPair.publicKey.length).toBe(32);
  });

  it("should generate ML-KEM-768 pre-keys when configured", async () => {
    const pq = new NobleKeyProvider({ preKeyAlgorithm: "ml-kem-768" });
    const [preKey] = await pq.generatePreKeys(1, 1);
    expect(preKey.keyPair.publicKey.length).toBe(1184);
  });

  it("should keep registration ids within 1..0x3FFF", () => {
    for (let i = 0; i < 200; i++) {
      const id = provider.generateRegistrationId();
      expect(id).toBeGreaterThanOrEqual(1);
      expect(id).toBeLessThanOrEqual(0x3fff);
    }
  });
});
