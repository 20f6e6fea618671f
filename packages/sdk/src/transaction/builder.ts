/**
 * Transaction Builder
 *
 * `TransactionDraft` is an immutable accumulator: every setter returns a new draft and
 * nothing is validated until `build()`. `build()` never throws and never touches the
 * network; it returns a BuildResult holding either a signed, frozen Transaction or the
 * first validation error.
 *
 * Build pipeline: validate -> canonical encode -> SHA-256 -> sign digest -> freeze.
 */

import { IncompleteTransactionError, InvalidKeyMaterialError, ValidationError } from "../errors";
import { bytesToHex } from "../codec/bytes";
import { encodeTransaction } from "../codec/canonical";
import { sha256 } from "../codec/hash";
import { addressOf } from "../keys/keypair";
import type { KeyPair } from "../keys/keypair";
import { normalizeAddress, normalizePublicKey } from "../protocol/format";
import type { Address, Bytes, PublicKeyHex, Transaction, TransactionFields } from "../protocol/types";
import { sealTransaction } from "./seal";

export type IntegerInput = bigint | number | string;

export type BuildResult =
  | { ok: true; transaction: Transaction }
  | { ok: false; error: ValidationError | InvalidKeyMaterialError };

interface DraftState {
  sender?: string;
  senderPublicKey?: string;
  recipient?: string;
  amount?: IntegerInput;
  fee?: IntegerInput;
  gasLimit?: IntegerInput;
  nonce?: IntegerInput;
  memo?: string;
  payload?: Bytes;
}

/** Required fields, in the order they are checked. */
export const REQUIRED_FIELDS = [
  "sender",
  "senderPublicKey",
  "recipient",
  "amount",
  "fee",
  "gasLimit",
  "nonce",
] as const;

const DECIMAL = /^-?\d+$/;

function toNonNegativeBigInt(value: IntegerInput, field: string): bigint {
  let result: bigint;
  if (typeof value === "bigint") {
    result = value;
  } else if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new ValidationError(`${field} must be an integer (got ${value})`, "MALFORMED_FIELD", { field });
    }
    result = BigInt(value);
  } else {
    const trimmed = value.trim();
    if (DECIMAL.test(trimmed)) {
      result = BigInt(trimmed);
    } else {
      throw new ValidationError(`${field} must be a decimal integer (got "${value}")`, "MALFORMED_FIELD", { field });
    }
  }
  if (result < 0n) {
    throw new ValidationError(`${field} must be non-negative (got ${result})`, "NEGATIVE_VALUE", { field });
  }
  return result;
}

function toNonNegativeSafeInteger(value: IntegerInput, field: string): number {
  const big = toNonNegativeBigInt(value, field);
  if (big > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new ValidationError(`${field} exceeds ${Number.MAX_SAFE_INTEGER}`, "OUT_OF_RANGE", { field });
  }
  return Number(big);
}

export class TransactionDraft {
  private constructor(private readonly state: Readonly<DraftState>) {}

  static empty(): TransactionDraft {
    return new TransactionDraft({});
  }

  /** Draft pre-filled with sender, public key, recipient, amount and nonce. */
  static transfer(keyPair: KeyPair, to: string, amount: IntegerInput, nonce: IntegerInput): TransactionDraft {
    return TransactionDraft.empty().fromKeyPair(keyPair).to(to).amount(amount).nonce(nonce);
  }

  /** Contract call: payload carries the call data, `value` defaults to zero. */
  static call(
    keyPair: KeyPair,
    contract: string,
    data: Bytes,
    nonce: IntegerInput,
    value: IntegerInput = 0n
  ): TransactionDraft {
    return TransactionDraft.empty().fromKeyPair(keyPair).to(contract).amount(value).payload(data).nonce(nonce);
  }

  private with(patch: Partial<DraftState>): TransactionDraft {
    return new TransactionDraft({ ...this.state, ...patch });
  }

  from(sender: string, senderPublicKey?: string): TransactionDraft {
    return senderPublicKey === undefined ? this.with({ sender }) : this.with({ sender, senderPublicKey });
  }

  /** Sets both sender address and sender public key from the key pair. */
  fromKeyPair(keyPair: KeyPair): TransactionDraft {
    return this.with({ sender: keyPair.address, senderPublicKey: keyPair.publicKeyHex });
  }

  senderPublicKey(publicKey: string): TransactionDraft {
    return this.with({ senderPublicKey: publicKey });
  }

  to(recipient: string): TransactionDraft {
    return this.with({ recipient });
  }

  amount(amount: IntegerInput): TransactionDraft {
    return this.with({ amount });
  }

  fee(fee: IntegerInput): TransactionDraft {
    return this.with({ fee });
  }

  gasLimit(gasLimit: IntegerInput): TransactionDraft {
    return this.with({ gasLimit });
  }

  nonce(nonce: IntegerInput): TransactionDraft {
    return this.with({ nonce });
  }

  memo(memo: string | undefined): TransactionDraft {
    return this.with({ memo });
  }

  payload(payload: Bytes | undefined): TransactionDraft {
    return this.with({ payload: payload === undefined ? undefined : new Uint8Array(payload) });
  }

  /** Names of required fields that are still unset, in check order. */
  missingFields(): string[] {
    return REQUIRED_FIELDS.filter((field) => this.state[field] === undefined);
  }

  /**
   * Validate and normalize the draft into the hashed field set.
   * @throws IncompleteTransactionError naming the first missing field
   * @throws ValidationError for malformed or inconsistent values
   */
  toFields(): TransactionFields {
    const [missing] = this.missingFields();
    if (missing !== undefined) {
      throw new IncompleteTransactionError(missing);
    }
    const s = this.state;
    const sender = normalizeAddress(s.sender ?? "", "sender");
    const senderPublicKey: PublicKeyHex = normalizePublicKey(s.senderPublicKey ?? "", "senderPublicKey");
    const recipient: Address = normalizeAddress(s.recipient ?? "", "recipient");

    if (addressOf(senderPublicKey) !== sender) {
      throw new ValidationError("sender is not the address of senderPublicKey", "SENDER_MISMATCH", {
        sender,
        senderPublicKey,
      });
    }

    const fields: TransactionFields = {
      sender,
      senderPublicKey,
      recipient,
      amount: toNonNegativeBigInt(s.amount ?? 0n, "amount"),
      fee: toNonNegativeBigInt(s.fee ?? 0n, "fee"),
      gasLimit: toNonNegativeSafeInteger(s.gasLimit ?? 0, "gasLimit"),
      nonce: toNonNegativeSafeInteger(s.nonce ?? 0, "nonce"),
    };
    if (s.memo !== undefined) fields.memo = s.memo;
    if (s.payload !== undefined) fields.payload = new Uint8Array(s.payload);
    return fields;
  }

  build(keyPair: KeyPair): BuildResult {
    try {
      return { ok: true, transaction: this.sign(keyPair) };
    } catch (error) {
      if (error instanceof ValidationError || error instanceof InvalidKeyMaterialError) {
        return { ok: false, error };
      }
      throw error;
    }
  }

  private sign(keyPair: KeyPair): Transaction {
    const fields = this.toFields();
    if (keyPair.publicKeyHex !== fields.senderPublicKey) {
      throw new ValidationError("signing key does not match senderPublicKey", "KEY_MISMATCH", {
        senderPublicKey: fields.senderPublicKey,
      });
    }
    const hashBytes = sha256(encodeTransaction(fields));
    const signature = keyPair.sign(hashBytes);
    return sealTransaction({
      ...fields,
      writes: [fields.recipient],
      signature,
      hash: bytesToHex(hashBytes),
    });
  }
}

/**
 * Throwing variant of `draft.build(keyPair)`.
 */
export function buildTransaction(draft: TransactionDraft, keyPair: KeyPair): Transaction {
  const result = draft.build(keyPair);
  if (!result.ok) {
    throw result.error;
  }
  return result.transaction;
}
