/**
 * Canonical transaction encoding (layout version 1).
 *
 * The same logical transaction must hash identically in every implementation,
 * so the layout is fixed and never depends on which optional fields are present:
 *
 *   offset  size  field
 *   0       20    sender            raw address bytes
 *   20      32    senderPublicKey   raw Ed25519 public key
 *   52      20    recipient         raw address bytes
 *   72      16    amount            u128 little-endian
 *   88      16    fee               u128 little-endian
 *   104     8     gasLimit          u64 little-endian
 *   112     8     nonce             u64 little-endian
 *   120     4+n   memo              u32 LE byte length, then UTF-8 bytes
 *   ...     4+m   payload           u32 LE byte length, then raw bytes
 *
 * An absent memo or payload encodes exactly like an empty one (length 0).
 * Out-of-range or malformed fields throw ValidationError; nothing is truncated.
 */

import { ValidationError } from "../errors";
import { concatBytes, hexToBytes, lengthPrefixed, u128LE, u64LE, utf8ToBytes } from "./bytes";
import { digest } from "./hash";
import { ADDRESS_BYTES, PUBLIC_KEY_BYTES } from "../protocol/types";
import type { Hash, TransactionFields } from "../protocol/types";

/** Byte length of the fixed-width prefix (everything before memo). */
export const FIXED_SECTION_BYTES = 120;

function safeInteger(value: number, field: string): bigint {
  if (!Number.isSafeInteger(value)) {
    throw new ValidationError(`${field} must be a safe integer (got ${value})`, "OUT_OF_RANGE", { field });
  }
  return BigInt(value);
}

export function encodeTransaction(fields: TransactionFields): Uint8Array {
  return concatBytes([
    hexToBytes(fields.sender, ADDRESS_BYTES, "sender"),
    hexToBytes(fields.senderPublicKey, PUBLIC_KEY_BYTES, "senderPublicKey"),
    hexToBytes(fields.recipient, ADDRESS_BYTES, "recipient"),
    u128LE(fields.amount, "amount"),
    u128LE(fields.fee, "fee"),
    u64LE(safeInteger(fields.gasLimit, "gasLimit"), "gasLimit"),
    u64LE(safeInteger(fields.nonce, "nonce"), "nonce"),
    lengthPrefixed(utf8ToBytes(fields.memo ?? "", "memo"), "memo"),
    lengthPrefixed(fields.payload ?? new Uint8Array(0), "payload"),
  ]);
}

/**
 * digest(encodeTransaction(fields)).
 */
export function transactionHash(fields: TransactionFields): Hash {
  return digest(encodeTransaction(fields));
}

export { digest };
