/**
 * Ledger RPC client.
 *
 * Typed wrapper over a JsonRpcTransport. Every result is validated with a zod schema before
 * it reaches the caller; nodes answering `null` for an unknown record yield `undefined`.
 */

import type { z } from "zod";
import { NotFoundError, RpcError, ValidationError } from "../errors";
import { isHex } from "../codec/bytes";
import { resolveConfig } from "../config";
import type { ClientConfig, ClientConfigInput } from "../config";
import { log } from "../client/logger";
import { isHash, normalizeAddress, normalizeHash } from "../protocol/format";
import type { Account, Address, Block, Hash, Transaction, TransactionReceipt } from "../protocol/types";
import { TransactionDraft } from "../transaction/builder";
import type { IntegerInput } from "../transaction/builder";
import type { KeyPair } from "../keys/keypair";
import { fromEnvelope, toEnvelope } from "../transaction/envelope";
import { pollUntil, SUCCESS } from "../tracker/poll";
import type { Classification } from "../tracker/poll";
import type { Clock } from "../tracker/clock";
import { HttpJsonRpcTransport } from "./transport";
import type { JsonRpcTransport } from "./transport";
import {
  accountSchema,
  bigintSchema,
  blockSchema,
  envelopeSchema,
  hashSchema,
  parseOptionalResult,
  parseResult,
  receiptSchema,
} from "./schemas";

export interface WaitOptions {
  timeoutMs?: number;
  intervalMs?: number;
}

export interface LedgerClientOptions {
  config?: ClientConfigInput;
  transport?: JsonRpcTransport;
  clock?: Clock;
}

/** Terminal classification of a receipt: `failed` is a remote failure, never a timeout. */
export function classifyReceipt(receipt: TransactionReceipt): Classification {
  if (receipt.status === "success") return SUCCESS;
  return { kind: "failure", code: "TRANSACTION_FAILED", reason: "transaction execution failed" };
}

export class LedgerClient {
  readonly config: ClientConfig;
  readonly transport: JsonRpcTransport;
  readonly clock: Clock | undefined;

  constructor(options: LedgerClientOptions = {}) {
    this.config = resolveConfig(options.config);
    this.transport =
      options.transport ??
      new HttpJsonRpcTransport(this.config.rpcUrl, { timeoutMs: this.config.requestTimeoutMs });
    this.clock = options.clock;
  }

  /**
   * Call `method` and validate its result against `schema`.
   * Exposed so domain helpers (AI jobs, staking, governance) share one code path.
   */
  async rpc<T>(method: string, params: readonly unknown[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const raw = await this.transport.request(method, params);
    return parseResult(method, schema, raw);
  }

  /** Like `rpc` but a null result becomes `undefined`. */
  async rpcOptional<T>(
    method: string,
    params: readonly unknown[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T | undefined> {
    const raw = await this.transport.request(method, params);
    return parseOptionalResult(method, schema, raw);
  }

  getChainId(): number {
    return this.config.chainId;
  }

  async getSlot(): Promise<number> {
    const raw = await this.transport.request("getSlot", []);
    if (typeof raw !== "number" || !Number.isSafeInteger(raw) || raw < 0) {
      throw new RpcError("Unexpected result shape for getSlot", "getSlot");
    }
    return raw;
  }

  async getLatestBlock(): Promise<Block> {
    return this.rpc("getLatestBlock", [], blockSchema);
  }

  async getBlock(slot: number): Promise<Block | undefined> {
    return this.rpcOptional("getBlock", [slot, false], blockSchema);
  }

  async getBlockByHash(hash: Hash): Promise<Block | undefined> {
    return this.rpcOptional("getBlockByHash", [normalizeHash(hash, "blockHash"), false], blockSchema);
  }

  async getAccount(address: Address): Promise<Account> {
    return this.rpc("getAccount", [normalizeAddress(address)], accountSchema);
  }

  async getBalance(address: Address): Promise<bigint> {
    const account = await this.getAccount(address);
    return account.balance;
  }

  async getNonce(address: Address): Promise<number> {
    const account = await this.getAccount(address);
    return account.nonce;
  }

  async getTransaction(hash: Hash): Promise<Transaction | undefined> {
    const envelope = await this.rpcOptional("getTransaction", [normalizeHash(hash)], envelopeSchema);
    return envelope === undefined ? undefined : fromEnvelope(envelope);
  }

  async sendTransaction(tx: Transaction): Promise<Hash> {
    const hash = await this.rpc("sendTransaction", [toEnvelope(tx)], hashSchema);
    log("info", "Transaction submitted", { hash, from: tx.sender, to: tx.recipient, nonce: tx.nonce });
    return hash;
  }

  /**
   * Submit an already-encoded transaction as `0x` hex. The bytes are passed through as
   * given; only the hex form is checked.
   */
  async sendRawTransaction(rawTx: string): Promise<Hash> {
    if (!rawTx.startsWith("0x") || !isHex(rawTx) || rawTx.length === 2) {
      throw new ValidationError("rawTx must be non-empty 0x-prefixed hex", "MALFORMED_FIELD", { field: "rawTx" });
    }
    const hash = await this.rpc("sendRawTransaction", [rawTx.toLowerCase()], hashSchema);
    log("info", "Raw transaction submitted", { hash, bytes: (rawTx.length - 2) / 2 });
    return hash;
  }

  async getTransactionReceipt(hash: Hash): Promise<TransactionReceipt | undefined> {
    return this.rpcOptional("getTransactionReceipt", [normalizeHash(hash)], receiptSchema);
  }

  /** @throws NotFoundError when the node has no receipt for `hash` */
  async getReceiptOrThrow(hash: Hash): Promise<TransactionReceipt> {
    const receipt = await this.getTransactionReceipt(hash);
    if (receipt === undefined) {
      throw new NotFoundError("transaction receipt", hash);
    }
    return receipt;
  }

  async estimateGas(tx: Transaction): Promise<bigint> {
    return this.rpc("estimateGas", [toEnvelope(tx)], bigintSchema);
  }

  /** false when the node cannot be reached or answers with an RPC error. */
  async isHealthy(): Promise<boolean> {
    try {
      await this.getSlot();
      return true;
    } catch (error) {
      if (error instanceof RpcError) {
        log("debug", "Health check failed", { error: error.message });
        return false;
      }
      throw error;
    }
  }

  /**
   * Poll `getTransactionReceipt` until the receipt is terminal.
   * Missing receipts count as pending. A `failed` receipt raises RemoteFailureError
   * (TRANSACTION_FAILED) carrying the receipt.
   */
  async waitForTransaction(hash: Hash, options: WaitOptions = {}): Promise<TransactionReceipt> {
    const { value } = await pollUntil<TransactionReceipt>(hash, {
      probe: (id) => this.getTransactionReceipt(id),
      classify: classifyReceipt,
      intervalMs: options.intervalMs ?? this.config.txWait.intervalMs,
      timeoutMs: options.timeoutMs ?? this.config.txWait.timeoutMs,
      clock: this.clock,
      validateId: (id) => (isHash(id) ? undefined : `transaction hash must be 0x-prefixed 32-byte hex (got "${id}")`),
      label: "transaction",
    });
    return value;
  }

  /**
   * Transfer draft with the sender's current nonce and the configured fee and gas limit.
   */
  async draftTransfer(keyPair: KeyPair, to: Address, amount: IntegerInput): Promise<TransactionDraft> {
    const nonce = await this.getNonce(keyPair.address);
    return TransactionDraft.transfer(keyPair, to, amount, nonce)
      .fee(this.config.defaultFee)
      .gasLimit(this.config.defaultGasLimit);
  }

  /**
   * Contract-call draft with the sender's current nonce and configured fee and gas limit.
   */
  async draftCall(
    keyPair: KeyPair,
    contract: Address,
    data: Uint8Array,
    value: IntegerInput = 0n
  ): Promise<TransactionDraft> {
    const nonce = await this.getNonce(keyPair.address);
    return TransactionDraft.call(keyPair, contract, data, nonce, value)
      .fee(this.config.defaultFee)
      .gasLimit(this.config.defaultGasLimit);
  }
}
