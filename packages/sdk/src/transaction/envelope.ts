import { bytesToHex, hexToBytes } from "../codec/bytes";
import type { SignedTransaction, Transaction, TransactionEnvelope } from "../protocol/types";
import { sealTransaction } from "./seal";

/**
 * Wire envelope for `sendTransaction`. Bigints become decimal strings; empty or absent
 * payloads are omitted from `data`.
 */
export function toEnvelope(tx: SignedTransaction): TransactionEnvelope {
  const envelope: TransactionEnvelope = {
    from: tx.sender,
    to: tx.recipient,
    value: tx.amount.toString(),
    nonce: tx.nonce,
    signature: tx.signature,
    publicKey: tx.senderPublicKey,
    fee: tx.fee.toString(),
    gasLimit: tx.gasLimit,
    hash: tx.hash,
  };
  if (tx.payload !== undefined && tx.payload.length > 0) {
    envelope.data = bytesToHex(tx.payload);
  }
  if (tx.memo !== undefined && tx.memo !== "") {
    envelope.memo = tx.memo;
  }
  return envelope;
}

/**
 * Inverse of `toEnvelope`. The result is not trusted until `verifyTransaction` passes.
 */
export function fromEnvelope(envelope: TransactionEnvelope): Transaction {
  const tx: SignedTransaction = {
    sender: envelope.from.toLowerCase(),
    senderPublicKey: envelope.publicKey.toLowerCase(),
    recipient: envelope.to.toLowerCase(),
    amount: BigInt(envelope.value),
    fee: BigInt(envelope.fee),
    gasLimit: envelope.gasLimit,
    nonce: envelope.nonce,
    writes: [envelope.to.toLowerCase()],
    signature: envelope.signature.toLowerCase(),
    hash: envelope.hash.toLowerCase(),
  };
  if (envelope.memo !== undefined) tx.memo = envelope.memo;
  if (envelope.data !== undefined) tx.payload = hexToBytes(envelope.data, undefined, "data");
  return sealTransaction(tx);
}
