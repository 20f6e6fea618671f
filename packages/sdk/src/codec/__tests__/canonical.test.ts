import { describe, it, expect } from "vitest";
import { ValidationError } from "../../errors";
import { bytesToHex, hexToBytes } from "../bytes";
import { FIXED_SECTION_BYTES, encodeTransaction, transactionHash } from "../canonical";
import type { TransactionFields } from "../../protocol/types";

const SENDER = "0x09ffee7b4c4a35279d727b028ad3acaf9fed3a9f";
const SENDER_PUBLIC_KEY = "0x67d3b5eaf0c0bf6b5a602d359daecc86a7a74053490ec37ae08e71360587c870";
const RECIPIENT = "0x" + "aa".repeat(20);

function fields(overrides: Partial<TransactionFields> = {}): TransactionFields {
  return {
    sender: SENDER,
    senderPublicKey: SENDER_PUBLIC_KEY,
    recipient: RECIPIENT,
    amount: 1000n,
    fee: 2_000_000n,
    gasLimit: 500_000,
    nonce: 0,
    ...overrides,
  };
}

describe("encodeTransaction", () => {
  it("lays out fixed-width little-endian fields followed by length-prefixed memo and payload", () => {
    const encoded = encodeTransaction(fields());

    expect(encoded.length).toBe(FIXED_SECTION_BYTES + 8);
    expect(bytesToHex(encoded.slice(0, 20))).toBe(SENDER);
    expect(bytesToHex(encoded.slice(20, 52))).toBe(SENDER_PUBLIC_KEY);
    expect(bytesToHex(encoded.slice(52, 72))).toBe(RECIPIENT);
    expect(bytesToHex(encoded.slice(72, 88))).toBe("0xe8030000000000000000000000000000");
    expect(bytesToHex(encoded.slice(88, 104))).toBe("0x80841e00000000000000000000000000");
    expect(bytesToHex(encoded.slice(104, 112))).toBe("0x20a1070000000000");
    expect(bytesToHex(encoded.slice(112, 120))).toBe("0x0000000000000000");
    expect(bytesToHex(encoded.slice(120))).toBe("0x0000000000000000");
  });

  it("hashes to the known digest for the reference transfer", () => {
    expect(transactionHash(fields())).toBe("0xaa758142c7dbf7790427516ed8b561bd4027beeaea943119453b4b9b523fb6aa");
  });

  it("encodes an absent memo and payload exactly like empty ones", () => {
    const absent = encodeTransaction(fields());
    const empty = encodeTransaction(fields({ memo: "", payload: new Uint8Array(0) }));

    expect(bytesToHex(empty)).toBe(bytesToHex(absent));
  });

  it("length-prefixes the memo in UTF-8 bytes", () => {
    const encoded = encodeTransaction(fields({ memo: "hé" }));

    // "hé" is 3 UTF-8 bytes
    expect(bytesToHex(encoded.slice(120, 127))).toBe("0x03000000" + "68c3a9");
    expect(bytesToHex(encoded.slice(127))).toBe("0x00000000");
  });

  it("encodes surrogate pairs as one 4-byte UTF-8 sequence", () => {
    const encoded = encodeTransaction(fields({ memo: "\u{1F600}" }));

    expect(bytesToHex(encoded.slice(120, 128))).toBe("0x04000000" + "f09f9880");
  });

  it("rejects a memo with an unpaired surrogate instead of substituting U+FFFD", () => {
    for (const memo of ["\uD800", "a\uDC00b", "\uDBFF\uD800"]) {
      let caught: unknown;
      try {
        encodeTransaction(fields({ memo }));
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ValidationError);
      expect(caught).toMatchObject({ code: "MALFORMED_FIELD", details: { field: "memo" } });
    }
    expect(() => transactionHash(fields({ memo: "\uFFFD" }))).not.toThrow();
  });

  it("keeps memo and payload boundaries unambiguous", () => {
    const a = encodeTransaction(fields({ memo: "ab", payload: hexToBytes("0x63") }));
    const b = encodeTransaction(fields({ memo: "a", payload: hexToBytes("0x6263") }));

    expect(bytesToHex(a)).not.toBe(bytesToHex(b));
  });

  it("is pure", () => {
    const f = fields({ memo: "x", payload: new Uint8Array([1, 2, 3]) });
    expect(bytesToHex(encodeTransaction(f))).toBe(bytesToHex(encodeTransaction(f)));
  });

  it("rejects out-of-range integers instead of truncating", () => {
    expect(() => encodeTransaction(fields({ amount: 1n << 128n }))).toThrow(ValidationError);
    expect(() => encodeTransaction(fields({ fee: -1n }))).toThrow(ValidationError);
    expect(() => encodeTransaction(fields({ nonce: 1.5 }))).toThrow(ValidationError);
    expect(() => encodeTransaction(fields({ gasLimit: Number.MAX_SAFE_INTEGER + 1 }))).toThrow(ValidationError);
  });

  it("accepts the largest u128 amount", () => {
    const encoded = encodeTransaction(fields({ amount: (1n << 128n) - 1n }));
    expect(bytesToHex(encoded.slice(72, 88))).toBe("0x" + "ff".repeat(16));
  });

  it("rejects malformed addresses", () => {
    expect(() => encodeTransaction(fields({ recipient: "0xaa" }))).toThrow(ValidationError);
  });
});
