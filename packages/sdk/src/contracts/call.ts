import { ValidationError } from "../errors";
import type { KeyPair } from "../keys/keypair";
import type { Address, Transaction } from "../protocol/types";
import type { LedgerClient } from "../rpc/client";
import { buildTransaction } from "../transaction/builder";
import type { IntegerInput } from "../transaction/builder";

/**
 * @throws ValidationError (KEY_REQUIRED) when a write helper was constructed without a key pair
 */
export function requireKeyPair(keyPair: KeyPair | undefined, action: string): KeyPair {
  if (keyPair === undefined) {
    throw new ValidationError(`Key pair required to ${action}`, "KEY_REQUIRED", { action });
  }
  return keyPair;
}

/** @throws ValidationError (NON_POSITIVE_AMOUNT) */
export function requirePositive(value: bigint, field: string): bigint {
  if (value <= 0n) {
    throw new ValidationError(`${field} must be positive (got ${value})`, "NON_POSITIVE_AMOUNT", { field });
  }
  return value;
}

/**
 * Fetch the signer's nonce, build a call to `contract` with the configured fee and gas
 * limit, and sign it. Submission stays with the caller (`client.sendTransaction`).
 */
export async function signContractCall(
  client: LedgerClient,
  keyPair: KeyPair,
  contract: Address,
  data: Uint8Array,
  value: IntegerInput = 0n
): Promise<Transaction> {
  const draft = await client.draftCall(keyPair, contract, data, value);
  return buildTransaction(draft, keyPair);
}
