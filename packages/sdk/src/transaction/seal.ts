import type { SignedTransaction, Transaction } from "../protocol/types";

/**
 * Freeze a signed transaction. Typed arrays cannot be frozen, so the payload is held
 * privately and every read of `payload` returns a fresh copy.
 */
export function sealTransaction(tx: SignedTransaction): Transaction {
  const { payload, writes, ...rest } = tx;
  const sealed: SignedTransaction = { ...rest, writes: Object.freeze([...writes]) };
  if (payload !== undefined) {
    const stored = new Uint8Array(payload);
    Object.defineProperty(sealed, "payload", {
      enumerable: true,
      get: () => new Uint8Array(stored),
    });
  }
  return Object.freeze(sealed);
}
