/**
 * Contract call data: 4-byte selector = SHA-256(method name)[0..4], then each argument as
 * u32 LE length + bytes. Arguments are built with the `arg.*` helpers so widths stay fixed.
 */

import { concatBytes, hexToBytes, lengthPrefixed, u128LE, u64LE, utf8ToBytes } from "./bytes";
import { sha256 } from "./hash";
import { normalizeAddress, normalizeHash } from "../protocol/format";

export const SELECTOR_BYTES = 4;

export function selector(method: string): Uint8Array {
  return sha256(utf8ToBytes(method)).slice(0, SELECTOR_BYTES);
}

export const arg = {
  address: (value: string): Uint8Array => hexToBytes(normalizeAddress(value), 20, "address"),
  hash: (value: string): Uint8Array => hexToBytes(normalizeHash(value), 32, "hash"),
  u64: (value: number | bigint): Uint8Array => u64LE(value, "u64 argument"),
  u128: (value: number | bigint): Uint8Array => u128LE(value, "u128 argument"),
  bool: (value: boolean): Uint8Array => Uint8Array.of(value ? 1 : 0),
  bytes: (value: Uint8Array): Uint8Array => new Uint8Array(value),
  string: (value: string): Uint8Array => utf8ToBytes(value),
};

/** Length-prefixed arguments without a selector; also used for nested structures. */
export function concatCallArgs(args: readonly Uint8Array[]): Uint8Array {
  return concatBytes(args.map((value, i) => lengthPrefixed(value, `argument ${i}`)));
}

export function encodeCall(method: string, args: readonly Uint8Array[] = []): Uint8Array {
  return concatBytes([selector(method), concatCallArgs(args)]);
}
