/**
 * Ed25519 key material (tweetnacl).
 *
 * A KeyPair owns its secret for its whole lifetime. The secret never appears in
 * JSON.stringify, util.inspect or log output; `exportSecretKey()` is the only way out.
 *
 * Signing is synchronous, so `dispose()` can never run in the middle of a signature.
 */

import nacl from "tweetnacl";
import bs58 from "bs58";
import { inspect } from "node:util";
import { InvalidKeyMaterialError } from "../errors";
import { bytesEqual, bytesToHex, hexToBytes, isHex, utf8ToBytes } from "../codec/bytes";
import { sha256 } from "../codec/hash";
import { ADDRESS_BYTES, PUBLIC_KEY_BYTES, SIGNATURE_BYTES } from "../protocol/types";
import type { Address, PublicKeyHex, Signature } from "../protocol/types";

const SEED_BYTES = 32;
const NACL_SECRET_KEY_BYTES = 64;

export type SecretKeyFormat = "hex" | "base58";

/**
 * Address = last 20 bytes of SHA-256(publicKey).
 */
export function addressOf(publicKey: Uint8Array | PublicKeyHex): Address {
  const bytes = typeof publicKey === "string" ? hexToBytes(publicKey, PUBLIC_KEY_BYTES, "publicKey") : publicKey;
  if (bytes.length !== PUBLIC_KEY_BYTES) {
    throw new InvalidKeyMaterialError(`public key must be ${PUBLIC_KEY_BYTES} bytes (got ${bytes.length})`);
  }
  return bytesToHex(sha256(bytes).slice(-ADDRESS_BYTES));
}

export class KeyPair {
  readonly address: Address;
  readonly publicKeyHex: PublicKeyHex;
  #publicKey: Uint8Array;
  #secretKey: Uint8Array;
  #disposed = false;

  private constructor(keys: nacl.SignKeyPair) {
    this.#publicKey = new Uint8Array(keys.publicKey);
    this.#secretKey = new Uint8Array(keys.secretKey);
    this.publicKeyHex = bytesToHex(this.#publicKey);
    this.address = addressOf(this.#publicKey);
  }

  /** New key from the CSPRNG; every call is independent. */
  static generate(): KeyPair {
    return new KeyPair(nacl.sign.keyPair());
  }

  /**
   * Deterministic key: secret = SHA-256(seed).
   *
   * Meant for reproducible fixtures and deterministic accounts. It is a single
   * unsalted digest, not a key-derivation function: a low-entropy seed (a word, a
   * phrase) yields a key anyone can brute-force.
   */
  static fromSeed(seed: Uint8Array | string): KeyPair {
    const seedBytes = typeof seed === "string" ? utf8ToBytes(seed) : seed;
    return new KeyPair(nacl.sign.keyPair.fromSeed(sha256(seedBytes)));
  }

  /**
   * Accepts a 32-byte Ed25519 seed, or a 64-byte tweetnacl secret key whose last
   * 32 bytes must be the matching public key.
   */
  static fromSecretKey(secretKey: Uint8Array): KeyPair {
    if (secretKey.length === SEED_BYTES) {
      return new KeyPair(nacl.sign.keyPair.fromSeed(secretKey));
    }
    if (secretKey.length === NACL_SECRET_KEY_BYTES) {
      const derived = nacl.sign.keyPair.fromSeed(secretKey.slice(0, SEED_BYTES));
      if (!bytesEqual(derived.publicKey, secretKey.slice(SEED_BYTES))) {
        throw new InvalidKeyMaterialError("64-byte secret key does not embed its own public key");
      }
      return new KeyPair(derived);
    }
    throw new InvalidKeyMaterialError(
      `secret key must be ${SEED_BYTES} or ${NACL_SECRET_KEY_BYTES} bytes (got ${secretKey.length})`
    );
  }

  static fromSecretKeyHex(hex: string): KeyPair {
    if (!isHex(hex)) {
      throw new InvalidKeyMaterialError("secret key must be hex-encoded");
    }
    return KeyPair.fromSecretKey(hexToBytes(hex));
  }

  static fromSecretKeyB58(value: string): KeyPair {
    let bytes: Uint8Array;
    try {
      bytes = bs58.decode(value);
    } catch {
      throw new InvalidKeyMaterialError("secret key must be base58-encoded");
    }
    return KeyPair.fromSecretKey(bytes);
  }

  get publicKey(): Uint8Array {
    return new Uint8Array(this.#publicKey);
  }

  get disposed(): boolean {
    return this.#disposed;
  }

  /** Raw 64-byte Ed25519 signature over `message`. */
  signBytes(message: Uint8Array): Uint8Array {
    if (this.#disposed) {
      throw new InvalidKeyMaterialError("key pair has been disposed");
    }
    return nacl.sign.detached(message, this.#secretKey);
  }

  /**
   * Signature over `message`. Transaction signing always passes the 32-byte digest,
   * never the encoded fields.
   */
  sign(message: Uint8Array): Signature {
    return bytesToHex(this.signBytes(message));
  }

  /** Explicit export of the 32-byte secret seed. */
  exportSecretKey(format: SecretKeyFormat = "hex"): string {
    if (this.#disposed) {
      throw new InvalidKeyMaterialError("key pair has been disposed");
    }
    const seed = this.#secretKey.slice(0, SEED_BYTES);
    return format === "base58" ? bs58.encode(seed) : bytesToHex(seed);
  }

  publicKeyB58(): string {
    return bs58.encode(this.#publicKey);
  }

  /** Zero the secret. Later sign/export calls throw InvalidKeyMaterialError. */
  dispose(): void {
    this.#secretKey.fill(0);
    this.#disposed = true;
  }

  toJSON(): { address: Address; publicKey: PublicKeyHex } {
    return { address: this.address, publicKey: this.publicKeyHex };
  }

  [inspect.custom](): string {
    return `KeyPair { address: '${this.address}', publicKey: '${this.publicKeyHex}' }`;
  }
}

// ============================================================================
// Functional surface
// ============================================================================

export const generate = (): KeyPair => KeyPair.generate();
export const fromSeed = (seed: Uint8Array | string): KeyPair => KeyPair.fromSeed(seed);
export const fromSecretKey = (secretKey: Uint8Array): KeyPair => KeyPair.fromSecretKey(secretKey);

export function sign(keyPair: KeyPair, message: Uint8Array): Signature {
  return keyPair.sign(message);
}

/**
 * Ed25519 verification. Malformed signatures or keys yield false, never an exception.
 */
export function verify(
  signature: Signature | Uint8Array,
  message: Uint8Array,
  publicKey: PublicKeyHex | Uint8Array
): boolean {
  try {
    const sigBytes = typeof signature === "string" ? hexToBytes(signature) : signature;
    const keyBytes = typeof publicKey === "string" ? hexToBytes(publicKey) : publicKey;
    if (sigBytes.length !== SIGNATURE_BYTES || keyBytes.length !== PUBLIC_KEY_BYTES) {
      return false;
    }
    return nacl.sign.detached.verify(message, sigBytes, keyBytes);
  } catch {
    return false;
  }
}
