/**
 * Byte and hex helpers shared by the codec, signer and RPC layers.
 *
 * Hex on the wire is always `0x`-prefixed lowercase. Parsers accept either case
 * and an optional prefix, but reject odd lengths and non-hex characters instead of
 * truncating the way `Buffer.from(hex, "hex")` does.
 */

import { ValidationError } from "../errors";

const HEX_BODY = /^[0-9a-fA-F]*$/;

export function strip0x(hex: string): string {
  return hex.startsWith("0x") || hex.startsWith("0X") ? hex.slice(2) : hex;
}

export function isHex(value: string, byteLength?: number): boolean {
  const body = strip0x(value);
  if (body.length % 2 !== 0 || !HEX_BODY.test(body)) return false;
  return byteLength === undefined || body.length === byteLength * 2;
}

/**
 * Decode hex into bytes.
 * @throws ValidationError (MALFORMED_FIELD) when the input is not even-length hex
 *   or does not match `byteLength`
 */
export function hexToBytes(hex: string, byteLength?: number, field = "hex"): Uint8Array {
  if (!isHex(hex, byteLength)) {
    const expected = byteLength === undefined ? "hex bytes" : `${byteLength} hex-encoded bytes`;
    throw new ValidationError(`${field} must be ${expected}`, "MALFORMED_FIELD", { field });
  }
  return new Uint8Array(Buffer.from(strip0x(hex), "hex"));
}

export function bytesToHex(bytes: Uint8Array): string {
  return "0x" + Buffer.from(bytes).toString("hex");
}

const UNPAIRED_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * UTF-8 encode a string.
 * @throws ValidationError (MALFORMED_FIELD) for an unpaired surrogate, which would
 *   otherwise encode as U+FFFD
 */
export function utf8ToBytes(value: string, field = "string"): Uint8Array {
  if (UNPAIRED_SURROGATE.test(value)) {
    throw new ValidationError(`${field} is not well-formed UTF-16`, "MALFORMED_FIELD", { field });
  }
  return new TextEncoder().encode(value);
}

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Fixed-width little-endian unsigned integer.
 * @throws ValidationError (OUT_OF_RANGE) for negative values or values that do not fit
 */
export function uintLE(value: bigint, byteWidth: number, field = "integer"): Uint8Array {
  const max = (1n << BigInt(byteWidth * 8)) - 1n;
  if (value < 0n || value > max) {
    throw new ValidationError(
      `${field} must be within 0..2^${byteWidth * 8}-1 (got ${value})`,
      "OUT_OF_RANGE",
      { field }
    );
  }
  const out = new Uint8Array(byteWidth);
  let rest = value;
  for (let i = 0; i < byteWidth; i++) {
    out[i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return out;
}

export const u32LE = (value: number | bigint, field?: string): Uint8Array => uintLE(BigInt(value), 4, field);
export const u64LE = (value: number | bigint, field?: string): Uint8Array => uintLE(BigInt(value), 8, field);
export const u128LE = (value: number | bigint, field?: string): Uint8Array => uintLE(BigInt(value), 16, field);

/** u32 LE length prefix followed by the bytes themselves. */
export function lengthPrefixed(bytes: Uint8Array, field = "bytes"): Uint8Array {
  return concatBytes([u32LE(bytes.length, `${field} length`), bytes]);
}
