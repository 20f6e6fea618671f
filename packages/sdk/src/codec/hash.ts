import { createHash } from "node:crypto";
import { bytesToHex } from "./bytes";
import type { Hash } from "../protocol/types";

/**
 * SHA-256 of raw bytes (32 bytes).
 */
export function sha256(input: Uint8Array): Uint8Array {
  return new Uint8Array(createHash("sha256").update(input).digest());
}

/**
 * Digest surfaced in its `0x` textual form.
 */
export function digest(input: Uint8Array): Hash {
  return bytesToHex(sha256(input));
}
