import { sha256 } from "@noble/hashes/sha2.js";
import { bytesToHex, randomBytes, utf8ToBytes } from "@noble/hashes/utils.js";
import { xchacha20poly1305 } from "@noble/ciphers/chacha.js";

const BASE64_PATTERN = /^[A-Za-z0-9+/_-]*={0,2}$/;
const XCHACHA_NONCE_LENGTH = 24;

/**
 * Generate cryptographically secure random bytes
 */
export function getRandomBytes(length: number): Uint8Array {
  return randomBytes(length);
}

/**
 * Random base64url string of exactly `length` characters
 */
export function randomToken(length: number): string {
  const bytes = getRandomBytes(Math.ceil((length * 3) / 4));
  return bytesToBase64(bytes).substring(0, length);
}

/**
 * Hex-encoded SHA-256 of a UTF-8 string
 */
export function sha256Hex(input: string): string {
  return bytesToHex(sha256(utf8ToBytes(input)));
}

export function stringToBytes(str: string): Uint8Array {
  return new TextEncoder().encode(str);
}

export function bytesToString(bytes: Uint8Array): string {
  return new TextDecoder().decode(bytes);
}

export function utf8ByteLength(str: string): number {
  return stringToBytes(str).length;
}

/**
 * Convert Uint8Array to base64 string (URL-safe, unpadded)
 */
export function bytesToBase64(bytes: Uint8Array): string {
  if (typeof Buffer !== "undefined") {
    return Buffer.from(bytes)
      .toString("base64")
      .replace(/\+/g, "-")
      .replace(/\//g, "_")
      .replace(/=+$/, "");
  }

  const binary = Array.from(bytes)
    .map((byte) => String.fromCharCode(byte))
    .join("");
  return btoa(binary).replace(/\+/g, "-").replace(/\//g, "_").replace(/=+$/, "");
}

/**
 * Convert base64 string to Uint8Array (accepts standard and URL-safe input)
 */
export function base64ToBytes(base64: string): Uint8Array {
  if (!BASE64_PATTERN.test(base64)) {
    throw new Error("Value is not valid base64");
  }

  let normalized = base64.replace(/-/g, "+").replace(/_/g, "/");
  while (normalized.length % 4 !== 0) {
    normalized += "=";
  }

  if (typeof Buffer !== "undefined") {
    return new Uint8Array(Buffer.from(normalized, "base64"));
  }

  const binary = atob(normalized);
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
}

/**
 * Constant-time comparison of two Uint8Arrays
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }

  let result = 0;
  for (let i = 0; i < a.length; i++) {
    result |= a[i] ^ b[i];
  }

  return result === 0;
}

/**
 * Seal a UTF-8 string with XChaCha20-Poly1305. Output is nonce || ciphertext,
 * base64url encoded.
 */
export function sealString(key: Uint8Array, plaintext: string): string {
  if (key.length !== 32) {
    throw new Error("Key must be 32 bytes");
  }
  const nonce = getRandomBytes(XCHACHA_NONCE_LENGTH);
  const ciphertext = xchacha20poly1305(key, nonce).encrypt(stringToBytes(plaintext));
  const sealed = new Uint8Array(nonce.length + ciphertext.length);
  sealed.set(nonce, 0);
  sealed.set(ciphertext, nonce.length);
  return bytesToBase64(sealed);
}

export function openString(key: Uint8Array, sealed: string): string {
  if (key.length !== 32) {
    throw new Error("Key must be 32 bytes");
  }
  const bytes = base64ToBytes(sealed);
  if (bytes.length <= XCHACHA_NONCE_LENGTH) {
    throw new Error("Sealed value is too short");
  }
  const nonce = bytes.subarray(0, XCHACHA_NONCE_LENGTH);
  const ciphertext = bytes.subarray(XCHACHA_NONCE_LENGTH);
  return bytesToString(xchacha20poly1305(key, nonce).decrypt(ciphertext));
}
