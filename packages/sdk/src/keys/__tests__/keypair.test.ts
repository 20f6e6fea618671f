import { describe, it, expect } from "vitest";
import { inspect } from "node:util";
import { InvalidKeyMaterialError } from "../../errors";
import { bytesToHex, hexToBytes, utf8ToBytes } from "../../codec/bytes";
import { KeyPair, addressOf, fromSeed, generate, sign, verify } from "../keypair";

const TEST_SEED_PUBLIC_KEY = "0x67d3b5eaf0c0bf6b5a602d359daecc86a7a74053490ec37ae08e71360587c870";
const TEST_SEED_ADDRESS = "0x09ffee7b4c4a35279d727b028ad3acaf9fed3a9f";

function flipBit(bytes: Uint8Array, bit: number): Uint8Array {
  const out = new Uint8Array(bytes);
  out[bit >> 3] ^= 1 << (bit & 7);
  return out;
}

describe("KeyPair.fromSeed", () => {
  it("derives the same key pair from the same seed", () => {
    const k1 = fromSeed("test");
    const k2 = fromSeed("test");

    expect(k1.address).toBe(k2.address);
    expect(k1.publicKeyHex).toBe(k2.publicKeyHex);
  });

  it("derives the secret as SHA-256 of the seed", () => {
    const k = KeyPair.fromSeed("test");

    expect(k.publicKeyHex).toBe(TEST_SEED_PUBLIC_KEY);
    expect(k.address).toBe(TEST_SEED_ADDRESS);
    expect(k.exportSecretKey()).toBe("0x9f86d081884c7d659a2feaa0c55ad015a3bf4f1b2b0b822cd15d6c15b0f00a08");
  });

  it("encodes the public key in base58", () => {
    expect(KeyPair.fromSeed("test").publicKeyB58()).toBe("7zJEPT7K2jno6BZid1V5EsrnG9kGdk1YAYMBAdDiRzYP");
  });

  it("treats string and UTF-8 byte seeds alike", () => {
    expect(KeyPair.fromSeed(utf8ToBytes("test")).address).toBe(TEST_SEED_ADDRESS);
  });
});

describe("addressOf", () => {
  it("is the last 20 bytes of SHA-256(publicKey)", () => {
    expect(addressOf(TEST_SEED_PUBLIC_KEY)).toBe(TEST_SEED_ADDRESS);
    expect(addressOf(hexToBytes(TEST_SEED_PUBLIC_KEY))).toBe(TEST_SEED_ADDRESS);
  });

  it("does not collide across a sample of generated keys", () => {
    const addresses = new Set<string>();
    for (let i = 0; i < 200; i++) {
      addresses.add(generate().address);
    }
    expect(addresses.size).toBe(200);
  });

  it("rejects public keys of the wrong length", () => {
    expect(() => addressOf(new Uint8Array(31))).toThrow(InvalidKeyMaterialError);
  });
});

describe("sign / verify", () => {
  it("verifies an honest signature", () => {
    const k = generate();
    const message = utf8ToBytes("compute receipt");
    const signature = sign(k, message);

    expect(signature).toMatch(/^0x[0-9a-f]{128}$/);
    expect(verify(signature, message, k.publicKeyHex)).toBe(true);
  });

  it("rejects any single-bit mutation of the message", () => {
    const k = generate();
    const message = utf8ToBytes("transfer 1000");
    const signature = k.signBytes(message);

    for (let bit = 0; bit < message.length * 8; bit += 7) {
      expect(verify(signature, flipBit(message, bit), k.publicKey)).toBe(false);
    }
  });

  it("rejects any single-bit mutation of the signature", () => {
    const k = generate();
    const message = utf8ToBytes("transfer 1000");
    const signature = k.signBytes(message);

    for (let bit = 0; bit < 512; bit += 13) {
      expect(verify(flipBit(signature, bit), message, k.publicKey)).toBe(false);
    }
  });

  it("returns false for malformed signatures and keys instead of throwing", () => {
    const k = generate();
    const message = utf8ToBytes("m");

    expect(verify("0x1234", message, k.publicKeyHex)).toBe(false);
    expect(verify("not hex", message, k.publicKeyHex)).toBe(false);
    expect(verify(k.sign(message), message, "0xabcd")).toBe(false);
  });

  it("is deterministic for a given key and message", () => {
    const message = utf8ToBytes("same");
    expect(fromSeed("test").sign(message)).toBe(fromSeed("test").sign(message));
  });
});

describe("secret key import", () => {
  it("round-trips the 32-byte secret through hex and base58", () => {
    const k = generate();

    expect(KeyPair.fromSecretKeyHex(k.exportSecretKey("hex")).address).toBe(k.address);
    expect(KeyPair.fromSecretKeyB58(k.exportSecretKey("base58")).address).toBe(k.address);
  });

  it("accepts a 64-byte secret key whose tail is the public key", () => {
    const k = fromSeed("test");
    const full = new Uint8Array(64);
    full.set(hexToBytes(k.exportSecretKey()), 0);
    full.set(k.publicKey, 32);

    expect(KeyPair.fromSecretKey(full).address).toBe(TEST_SEED_ADDRESS);
  });

  it("rejects a 64-byte secret key with a foreign public key", () => {
    const k = fromSeed("test");
    const full = new Uint8Array(64);
    full.set(hexToBytes(k.exportSecretKey()), 0);
    full.set(generate().publicKey, 32);

    expect(() => KeyPair.fromSecretKey(full)).toThrow(InvalidKeyMaterialError);
  });

  it("rejects wrong lengths and encodings", () => {
    expect(() => KeyPair.fromSecretKey(new Uint8Array(16))).toThrow(InvalidKeyMaterialError);
    expect(() => KeyPair.fromSecretKeyHex("zz")).toThrow(InvalidKeyMaterialError);
    expect(() => KeyPair.fromSecretKeyB58("0OIl")).toThrow(InvalidKeyMaterialError);
  });
});

describe("secret handling", () => {
  it("keeps the secret out of JSON and inspect output", () => {
    const k = fromSeed("test");
    const secret = k.exportSecretKey().slice(2);

    expect(JSON.stringify(k)).toBe(`{"address":"${TEST_SEED_ADDRESS}","publicKey":"${TEST_SEED_PUBLIC_KEY}"}`);
    expect(inspect(k)).toBe(`KeyPair { address: '${TEST_SEED_ADDRESS}', publicKey: '${TEST_SEED_PUBLIC_KEY}' }`);
    expect(inspect(k)).not.toContain(secret);
  });

  it("refuses to sign or export after dispose", () => {
    const k = generate();
    k.dispose();

    expect(k.disposed).toBe(true);
    expect(() => k.sign(new Uint8Array([1]))).toThrow(InvalidKeyMaterialError);
    expect(() => k.exportSecretKey()).toThrow(InvalidKeyMaterialError);
  });

  it("hands out copies of the public key", () => {
    const k = fromSeed("test");
    const copy = k.publicKey;
    copy.fill(0);

    expect(bytesToHex(k.publicKey)).toBe(TEST_SEED_PUBLIC_KEY);
  });
});
