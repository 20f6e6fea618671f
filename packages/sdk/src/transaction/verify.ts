import { hexToBytes } from "../codec/bytes";
import { transactionHash } from "../codec/canonical";
import { addressOf, verify } from "../keys/keypair";
import type { SignedTransaction, TransactionFields } from "../protocol/types";

export function transactionFields(tx: SignedTransaction): TransactionFields {
  const fields: TransactionFields = {
    sender: tx.sender,
    senderPublicKey: tx.senderPublicKey,
    recipient: tx.recipient,
    amount: tx.amount,
    fee: tx.fee,
    gasLimit: tx.gasLimit,
    nonce: tx.nonce,
  };
  if (tx.memo !== undefined) fields.memo = tx.memo;
  if (tx.payload !== undefined) fields.payload = tx.payload;
  return fields;
}

/**
 * Checks the transaction invariant:
 * 1) hash == digest(encode(fields))
 * 2) signature verifies over the hash bytes under senderPublicKey
 * 3) sender == addressOf(senderPublicKey)
 *
 * Malformed input yields false.
 */
export function verifyTransaction(tx: SignedTransaction): boolean {
  try {
    const expectedHash = transactionHash(transactionFields(tx));
    if (expectedHash !== tx.hash.toLowerCase()) return false;
    if (addressOf(tx.senderPublicKey) !== tx.sender.toLowerCase()) return false;
    return verify(tx.signature, hexToBytes(tx.hash), tx.senderPublicKey);
  } catch {
    return false;
  }
}
