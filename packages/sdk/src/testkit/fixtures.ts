import { bytesToHex } from "../codec/bytes";
import type { AIJob, TransactionReceipt, VerifiableComputeReceipt } from "../protocol/types";
import { vcrToWire } from "../rpc/schemas";

export const repeatHash = (byte: string): string => "0x" + byte.repeat(32);
export const repeatAddress = (byte: string): string => "0x" + byte.repeat(20);

export function makeJob(overrides: Partial<AIJob> = {}): AIJob {
  return {
    id: repeatHash("11"),
    creator: repeatAddress("c1"),
    modelHash: repeatHash("22"),
    inputData: new Uint8Array([1, 2, 3]),
    aicLocked: 1_000n,
    status: "pending",
    ...overrides,
  };
}

export function makeVcr(overrides: Partial<VerifiableComputeReceipt> = {}): VerifiableComputeReceipt {
  return {
    jobId: repeatHash("11"),
    provider: repeatAddress("d1"),
    result: new Uint8Array([42]),
    executionTrace: repeatHash("33"),
    kzgCommitments: [new Uint8Array([7, 7])],
    teeAttestation: new Uint8Array([9]),
    timestamp: 1_700_000_000,
    ...overrides,
  };
}

export function makeReceipt(transactionHash: string, status: "success" | "failed" = "success"): TransactionReceipt {
  return {
    transactionHash,
    blockHash: repeatHash("bb"),
    blockSlot: 7,
    from: repeatAddress("a1"),
    to: repeatAddress("a2"),
    status,
    gasUsed: 21_000n,
    logs: [],
  };
}

/** JSON shape the node sends for a job. */
export function jobToWire(job: AIJob): Record<string, unknown> {
  return {
    id: job.id,
    creator: job.creator,
    modelHash: job.modelHash,
    inputData: bytesToHex(job.inputData),
    aicLocked: job.aicLocked.toString(),
    status: job.status,
    provider: job.provider ?? null,
    result: job.result === undefined ? null : bytesToHex(job.result),
    resultHash: job.resultHash ?? null,
    vcr: job.vcr === undefined ? null : vcrToWire(job.vcr),
  };
}

export function receiptToWire(receipt: TransactionReceipt): Record<string, unknown> {
  return {
    transactionHash: receipt.transactionHash,
    blockHash: receipt.blockHash,
    blockSlot: receipt.blockSlot,
    from: receipt.from,
    to: receipt.to,
    status: receipt.status,
    gasUsed: receipt.gasUsed.toString(),
    logs: receipt.logs.map((entry) => ({ address: entry.address, topics: entry.topics, data: bytesToHex(entry.data) })),
  };
}
