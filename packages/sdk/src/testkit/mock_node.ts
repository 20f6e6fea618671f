/**
 * In-process ledger node for tests. Implements JsonRpcTransport, so it plugs straight
 * into LedgerClient without HTTP.
 *
 * Receipts and jobs are scripted as sequences: each read returns the next state and the
 * last one repeats. Unknown ids read as `null`.
 */

import { RpcError } from "../errors";
import type { JsonRpcTransport } from "../rpc/transport";
import { envelopeSchema, vcrToWire } from "../rpc/schemas";
import { fromEnvelope } from "../transaction/envelope";
import { verifyTransaction } from "../transaction/verify";
import type { AIJob, ProofVerification, Transaction, TransactionReceipt, VerifiableComputeReceipt } from "../protocol/types";
import { jobToWire, makeReceipt, receiptToWire } from "./fixtures";

export type RpcHandler = (params: readonly unknown[]) => unknown;

export interface RecordedCall {
  method: string;
  params: readonly unknown[];
}

export interface MockLedgerNodeOptions {
  /** Store a success receipt for every accepted transaction. */
  autoConfirm?: boolean;
}

type MockAccount = { balance: bigint; nonce: number };

function stringParam(method: string, params: readonly unknown[], index: number): string {
  const value = params[index];
  if (typeof value !== "string") {
    throw new RpcError(`Invalid params for ${method}`, method, -32602);
  }
  return value.toLowerCase();
}

export class MockLedgerNode implements JsonRpcTransport {
  readonly calls: RecordedCall[] = [];
  readonly submitted: Transaction[] = [];
  slot = 0;
  proofVerification: ProofVerification = { valid: true, kzgValid: true, teeValid: true };

  private accounts = new Map<string, MockAccount>();
  private receipts = new Map<string, unknown[]>();
  private jobs = new Map<string, unknown[]>();
  private vcrs = new Map<string, unknown>();
  private envelopes = new Map<string, unknown>();
  private handlers = new Map<string, RpcHandler>();

  constructor(private readonly options: MockLedgerNodeOptions = {}) {}

  private acct(address: string): MockAccount {
    const key = address.toLowerCase();
    const existing = this.accounts.get(key);
    if (existing) return existing;
    const created = { balance: 0n, nonce: 0 };
    this.accounts.set(key, created);
    return created;
  }

  // --- test helpers ---
  setAccount(address: string, balance: bigint, nonce = 0): void {
    const a = this.acct(address);
    a.balance = balance;
    a.nonce = nonce;
  }

  scriptReceipts(hash: string, states: Array<TransactionReceipt | null>): void {
    this.receipts.set(
      hash.toLowerCase(),
      states.map((state) => (state === null ? null : receiptToWire(state)))
    );
  }

  scriptJob(jobId: string, states: Array<AIJob | null>): void {
    this.jobs.set(
      jobId.toLowerCase(),
      states.map((state) => (state === null ? null : jobToWire(state)))
    );
  }

  setVcr(jobId: string, vcr: VerifiableComputeReceipt): void {
    this.vcrs.set(jobId.toLowerCase(), vcrToWire(vcr));
  }

  /** Override or add a method; the handler result is returned as the raw RPC result. */
  on(method: string, handler: RpcHandler): void {
    this.handlers.set(method, handler);
  }

  callsTo(method: string): RecordedCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  // --- JsonRpcTransport ---
  async request(method: string, params: readonly unknown[]): Promise<unknown> {
    this.calls.push({ method, params });

    const handler = this.handlers.get(method);
    if (handler) return handler(params);

    switch (method) {
      case "getSlot":
        return this.slot;
      case "getAccount": {
        const address = stringParam(method, params, 0);
        const a = this.acct(address);
        return { address, balance: a.balance.toString(), nonce: a.nonce };
      }
      case "sendTransaction":
        return this.accept(params[0]);
      case "getTransaction":
        return this.envelopes.get(stringParam(method, params, 0)) ?? null;
      case "getTransactionReceipt":
        return this.advance(this.receipts, stringParam(method, params, 0));
      case "ai_getJob":
        return this.advance(this.jobs, stringParam(method, params, 0));
      case "ai_getVCR":
        return this.vcrs.get(stringParam(method, params, 0)) ?? null;
      case "ai_verifyVCR":
        return this.proofVerification;
      default:
        throw new RpcError(`RPC Error: Method not found (code: -32601)`, method, -32601);
    }
  }

  private accept(raw: unknown): string {
    const parsed = envelopeSchema.safeParse(raw);
    if (!parsed.success) {
      throw new RpcError("RPC Error: invalid transaction envelope (code: -32602)", "sendTransaction", -32602);
    }
    const tx = fromEnvelope(parsed.data);
    if (!verifyTransaction(tx)) {
      throw new RpcError("RPC Error: invalid signature (code: -32001)", "sendTransaction", -32001);
    }
    const sender = this.acct(tx.sender);
    if (tx.nonce !== sender.nonce) {
      throw new RpcError(`RPC Error: nonce mismatch, expected ${sender.nonce} (code: -32002)`, "sendTransaction", -32002);
    }
    sender.nonce++;
    this.submitted.push(tx);
    this.envelopes.set(tx.hash, raw);
    if (this.options.autoConfirm) {
      this.receipts.set(tx.hash, [receiptToWire({ ...makeReceipt(tx.hash), from: tx.sender, to: tx.recipient })]);
    }
    return tx.hash;
  }

  private advance(store: Map<string, unknown[]>, key: string): unknown {
    const states = store.get(key);
    if (states === undefined || states.length === 0) return null;
    return states.length > 1 ? states.shift() : states[0];
  }
}
