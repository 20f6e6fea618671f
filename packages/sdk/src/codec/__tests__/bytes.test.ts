import { describe, it, expect } from "vitest";
import { isSdkError } from "../../errors";
import { bytesToHex, hexToBytes, isHex, lengthPrefixed, u32LE, u64LE, uintLE } from "../bytes";

describe("hex helpers", () => {
  it("decodes with or without the 0x prefix", () => {
    expect(Array.from(hexToBytes("0x0aFF"))).toEqual([10, 255]);
    expect(Array.from(hexToBytes("0aff"))).toEqual([10, 255]);
  });

  it("rejects odd-length and non-hex input instead of truncating", () => {
    expect(isHex("0xabc")).toBe(false);
    expect(isHex("0xzz")).toBe(false);

    let caught: unknown;
    try {
      hexToBytes("0xabc", undefined, "memo");
    } catch (error) {
      caught = error;
    }
    expect(isSdkError(caught, "MALFORMED_FIELD")).toBe(true);
  });

  it("enforces an expected byte length", () => {
    expect(isHex("0x" + "00".repeat(20), 20)).toBe(true);
    expect(() => hexToBytes("0x00", 20)).toThrow("hex must be 20 hex-encoded bytes");
  });

  it("encodes lowercase with the 0x prefix", () => {
    expect(bytesToHex(new Uint8Array([0xab, 0x01]))).toBe("0xab01");
    expect(bytesToHex(new Uint8Array(0))).toBe("0x");
  });
});

describe("little-endian integers", () => {
  it("writes least significant byte first", () => {
    expect(bytesToHex(u32LE(1))).toBe("0x01000000");
    expect(bytesToHex(u64LE(0x0102n))).toBe("0x0201000000000000");
  });

  it("throws OUT_OF_RANGE for negative or oversized values", () => {
    expect(() => uintLE(256n, 1, "byte")).toThrow("byte must be within 0..2^8-1 (got 256)");
    expect(() => uintLE(-1n, 4)).toThrow(/must be within/);
  });

  it("prefixes bytes with their u32 length", () => {
    expect(bytesToHex(lengthPrefixed(new Uint8Array([7, 8])))).toBe("0x020000000708");
  });
});
