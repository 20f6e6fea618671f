import { z } from "zod";
import { RpcError } from "../errors";
import { bytesToHex, hexToBytes, isHex } from "../codec/bytes";
import { isAddress, isHash, isPublicKeyHex, isSignature } from "../protocol/format";
import { JOB_STATUSES } from "../protocol/types";
import type {
  Account,
  AIJob,
  Block,
  Delegation,
  JobStats,
  ModelInfo,
  ModelMetadata,
  ProofVerification,
  Proposal,
  ProviderReputation,
  TransactionEnvelope,
  TransactionReceipt,
  Validator,
  VerifiableComputeReceipt,
  Vote,
} from "../protocol/types";

// ============================================================================
// Primitives
// ============================================================================

export const addressSchema = z
  .string()
  .refine(isAddress, "expected 0x-prefixed 20-byte address")
  .transform((value) => value.toLowerCase());

export const hashSchema = z
  .string()
  .refine(isHash, "expected 0x-prefixed 32-byte hash")
  .transform((value) => value.toLowerCase());

/** `0x`-prefixed hex, possibly empty (`"0x"`). */
export const bytesSchema = z
  .string()
  .refine((value) => value.startsWith("0x") && isHex(value), "expected 0x-prefixed hex bytes")
  .transform((value) => hexToBytes(value));

/** Large integers arrive as decimal strings, 0x hex strings or safe JSON numbers. */
export const bigintSchema = z
  .union([
    z.string().regex(/^(\d+|0x[0-9a-fA-F]+)$/, "expected unsigned integer string"),
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  ])
  .transform((value) => BigInt(value));

/** JSON numbers above 2^53 - 1 have already lost precision, so they are rejected. */
const u64Schema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

/**
 * Freeze a decoded record together with its nested objects and arrays. Byte arrays are
 * left as they are: typed arrays with elements cannot be frozen.
 */
export function freezeRecord<T extends object>(value: T): T {
  for (const nested of Object.values(value)) {
    const field: unknown = nested;
    if (typeof field === "object" && field !== null && !ArrayBuffer.isView(field)) {
      freezeRecord(field);
    }
  }
  Object.freeze(value);
  return value;
}

// ============================================================================
// Ledger
// ============================================================================

export const accountSchema: z.ZodType<Account, z.ZodTypeDef, unknown> = z.object({
  address: addressSchema,
  balance: bigintSchema,
  nonce: u64Schema,
});

export const receiptSchema: z.ZodType<TransactionReceipt, z.ZodTypeDef, unknown> = z.object({
  transactionHash: hashSchema,
  blockHash: hashSchema,
  blockSlot: u64Schema,
  from: addressSchema,
  to: addressSchema,
  status: z.enum(["success", "failed"]),
  gasUsed: bigintSchema,
  logs: z
    .array(z.object({ address: addressSchema, topics: z.array(hashSchema), data: bytesSchema }))
    .default([]),
}).transform(freezeRecord);

export const blockSchema: z.ZodType<Block, z.ZodTypeDef, unknown> = z.object({
  slot: u64Schema,
  hash: hashSchema,
  parentHash: hashSchema,
  proposer: addressSchema,
  transactions: z.array(hashSchema).default([]),
  stateRoot: hashSchema,
  timestamp: u64Schema,
});

export const envelopeSchema: z.ZodType<TransactionEnvelope, z.ZodTypeDef, unknown> = z.object({
  from: addressSchema,
  to: addressSchema,
  value: z.string().regex(/^\d+$/),
  data: z.string().refine((value) => value.startsWith("0x") && isHex(value)).optional(),
  nonce: u64Schema,
  signature: z.string().refine(isSignature, "expected 64-byte signature"),
  publicKey: z.string().refine(isPublicKeyHex, "expected 32-byte public key"),
  fee: z.string().regex(/^\d+$/),
  gasLimit: u64Schema,
  memo: z.string().optional(),
  hash: hashSchema,
});

// ============================================================================
// AI jobs
// ============================================================================

export const vcrSchema: z.ZodType<VerifiableComputeReceipt, z.ZodTypeDef, unknown> = z.object({
  jobId: hashSchema,
  provider: addressSchema,
  result: bytesSchema,
  executionTrace: hashSchema,
  kzgCommitments: z.array(bytesSchema),
  teeAttestation: bytesSchema,
  timestamp: u64Schema,
}).transform(freezeRecord);

export const aiJobSchema: z.ZodType<AIJob, z.ZodTypeDef, unknown> = z.object({
  id: hashSchema,
  creator: addressSchema,
  modelHash: hashSchema,
  inputData: bytesSchema,
  aicLocked: bigintSchema,
  status: z.enum(JOB_STATUSES),
  provider: addressSchema.nullish().transform((value) => value ?? undefined),
  result: bytesSchema.nullish().transform((value) => value ?? undefined),
  resultHash: hashSchema.nullish().transform((value) => value ?? undefined),
  vcr: vcrSchema.nullish().transform((value) => value ?? undefined),
}).transform(freezeRecord);

// ============================================================================
// Model registry
// ============================================================================

export const modelMetadataSchema: z.ZodType<ModelMetadata, z.ZodTypeDef, unknown> = z.object({
  name: z.string().trim().min(1, "must not be empty"),
  version: z.string().trim().min(1, "must not be empty"),
  description: z.string(),
  inputSchema: z.record(z.unknown()).optional(),
  outputSchema: z.record(z.unknown()).optional(),
});

export const modelInfoSchema: z.ZodType<ModelInfo, z.ZodTypeDef, unknown> = z
  .object({
    hash: hashSchema,
    name: z.string(),
    version: z.string(),
    description: z.string(),
    registered: u64Schema,
    jobCount: u64Schema,
  })
  .transform(freezeRecord);

export const proofVerificationSchema: z.ZodType<ProofVerification, z.ZodTypeDef, unknown> = z.object({
  valid: z.boolean(),
  kzgValid: z.boolean(),
  teeValid: z.boolean(),
});

export const reputationSchema: z.ZodType<ProviderReputation, z.ZodTypeDef, unknown> = z.object({
  score: z.number(),
  completedJobs: z.number().int().nonnegative(),
  failedJobs: z.number().int().nonnegative(),
  averageTime: z.number().nonnegative(),
});

export const jobStatsSchema: z.ZodType<JobStats, z.ZodTypeDef, unknown> = z.object({
  totalJobs: z.number().int().nonnegative(),
  pendingJobs: z.number().int().nonnegative(),
  completedJobs: z.number().int().nonnegative(),
  challengedJobs: z.number().int().nonnegative(),
  totalVolume: bigintSchema,
});

// ============================================================================
// Staking / governance
// ============================================================================

export const validatorSchema: z.ZodType<Validator, z.ZodTypeDef, unknown> = z.object({
  address: addressSchema,
  stake: bigintSchema,
  delegatedStake: bigintSchema,
  commission: z.number().int().min(0).max(10_000),
  active: z.boolean(),
  uptime: z.number().min(0),
});

export const delegationSchema: z.ZodType<Delegation, z.ZodTypeDef, unknown> = z.object({
  delegator: addressSchema,
  validator: addressSchema,
  amount: bigintSchema,
  rewards: bigintSchema,
});

export const proposalSchema: z.ZodType<Proposal, z.ZodTypeDef, unknown> = z.object({
  id: u64Schema,
  proposer: addressSchema,
  title: z.string(),
  description: z.string(),
  votesFor: bigintSchema,
  votesAgainst: bigintSchema,
  status: z.enum(["active", "passed", "rejected", "executed"]),
  startSlot: u64Schema,
  endSlot: u64Schema,
});

export const voteSchema: z.ZodType<Vote, z.ZodTypeDef, unknown> = z.object({
  proposalId: u64Schema,
  voter: addressSchema,
  support: z.boolean(),
  votingPower: bigintSchema,
});

// ============================================================================
// Helpers
// ============================================================================

/**
 * Parse a raw JSON-RPC result.
 * @throws RpcError when the node's answer does not match the expected shape
 */
export function parseResult<T>(method: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new RpcError(`Unexpected result shape for ${method}: ${issues.join("; ")}`, method);
  }
  return parsed.data;
}

/** Null results become `undefined`; anything else must match the schema. */
export function parseOptionalResult<T>(
  method: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown
): T | undefined {
  return raw === null || raw === undefined ? undefined : parseResult(method, schema, raw);
}

/** JSON form of a VCR for `ai_verifyVCR`. */
export function vcrToWire(vcr: VerifiableComputeReceipt): Record<string, unknown> {
  return {
    jobId: vcr.jobId,
    provider: vcr.provider,
    result: bytesToHex(vcr.result),
    executionTrace: vcr.executionTrace,
    kzgCommitments: vcr.kzgCommitments.map(bytesToHex),
    teeAttestation: bytesToHex(vcr.teeAttestation),
    timestamp: vcr.timestamp,
  };
}
