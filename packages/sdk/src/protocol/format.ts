/**
 * Wire-format checks for addresses, hashes, public keys and signatures.
 * `normalize*` functions lowercase valid input and throw ValidationError otherwise.
 */

import { ValidationError } from "../errors";
import { isHex, strip0x } from "../codec/bytes";
import { ADDRESS_BYTES, HASH_BYTES, PUBLIC_KEY_BYTES, SIGNATURE_BYTES } from "./types";
import type { Address, Hash, PublicKeyHex, Signature } from "./types";

function isPrefixedHex(value: unknown, byteLength: number): value is string {
  return typeof value === "string" && value.startsWith("0x") && isHex(value, byteLength);
}

export const isAddress = (value: unknown): value is Address => isPrefixedHex(value, ADDRESS_BYTES);
export const isHash = (value: unknown): value is Hash => isPrefixedHex(value, HASH_BYTES);
export const isPublicKeyHex = (value: unknown): value is PublicKeyHex => isPrefixedHex(value, PUBLIC_KEY_BYTES);
export const isSignature = (value: unknown): value is Signature => isPrefixedHex(value, SIGNATURE_BYTES);

function normalize(value: string, byteLength: number, field: string, what: string): string {
  if (!isPrefixedHex(value, byteLength)) {
    throw new ValidationError(
      `${field} must be 0x-prefixed ${what} (${byteLength * 2} hex chars)`,
      "MALFORMED_FIELD",
      { field, value }
    );
  }
  return "0x" + strip0x(value).toLowerCase();
}

export function normalizeAddress(value: string, field = "address"): Address {
  return normalize(value, ADDRESS_BYTES, field, "address");
}

export function normalizeHash(value: string, field = "hash"): Hash {
  return normalize(value, HASH_BYTES, field, "hash");
}

export function normalizePublicKey(value: string, field = "publicKey"): PublicKeyHex {
  return normalize(value, PUBLIC_KEY_BYTES, field, "public key");
}

export function normalizeSignature(value: string, field = "signature"): Signature {
  return normalize(value, SIGNATURE_BYTES, field, "signature");
}
