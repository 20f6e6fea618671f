// packages/sdk/src/protocol/types.ts

export type Bytes = Uint8Array;

/** `0x` + 40 lowercase hex chars; derived from a public key, never chosen freely. */
export type Address = string;

/** `0x` + 64 lowercase hex chars (SHA-256). */
export type Hash = string;

/** `0x` + 128 lowercase hex chars (Ed25519). */
export type Signature = string;

/** `0x` + 64 lowercase hex chars (Ed25519 public key). */
export type PublicKeyHex = string;

export const ADDRESS_BYTES = 20;
export const HASH_BYTES = 32;
export const PUBLIC_KEY_BYTES = 32;
export const SIGNATURE_BYTES = 64;

/**
 * Fields covered by the transaction hash and signature.
 */
export interface TransactionFields {
  sender: Address;
  senderPublicKey: PublicKeyHex;
  recipient: Address;
  amount: bigint;
  fee: bigint;
  gasLimit: number;
  nonce: number;
  memo?: string;
  payload?: Bytes;
}

export interface SignedTransaction extends TransactionFields {
  /** Addresses whose state the transaction writes; always `[recipient]` for transfers and calls. */
  writes: readonly Address[];
  signature: Signature;
  hash: Hash;
}

export type Transaction = Readonly<SignedTransaction>;

/**
 * Shape sent to `sendTransaction`. Integers that may exceed 2^53 travel as decimal strings.
 */
export interface TransactionEnvelope {
  from: Address;
  to: Address;
  value: string;
  data?: string;
  nonce: number;
  signature: Signature;
  publicKey: PublicKeyHex;
  fee: string;
  gasLimit: number;
  memo?: string;
  hash: Hash;
}

export interface Account {
  address: Address;
  balance: bigint;
  nonce: number;
}

export type ExecutionStatus = "success" | "failed";

export interface TransactionLog {
  address: Address;
  topics: Hash[];
  data: Bytes;
}

export interface TransactionReceipt {
  transactionHash: Hash;
  blockHash: Hash;
  blockSlot: number;
  from: Address;
  to: Address;
  status: ExecutionStatus;
  gasUsed: bigint;
  logs: TransactionLog[];
}

export interface Block {
  slot: number;
  hash: Hash;
  parentHash: Hash;
  proposer: Address;
  transactions: Hash[];
  stateRoot: Hash;
  timestamp: number;
}

// ============================================================================
// AI jobs
// ============================================================================

export const JOB_STATUSES = ["pending", "assigned", "computing", "completed", "challenged", "settled"] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export interface VerifiableComputeReceipt {
  jobId: Hash;
  provider: Address;
  result: Bytes;
  executionTrace: Hash;
  kzgCommitments: Bytes[];
  teeAttestation: Bytes;
  timestamp: number;
}

export interface AIJob {
  id: Hash;
  creator: Address;
  modelHash: Hash;
  inputData: Bytes;
  aicLocked: bigint;
  status: JobStatus;
  provider?: Address;
  result?: Bytes;
  /** Result hash recorded on-chain when the provider submitted, if the node exposes it. */
  resultHash?: Hash;
  vcr?: VerifiableComputeReceipt;
}

/** A job that reached `completed` or `settled`; `result` is empty bytes when none was returned. */
export interface CompletedAIJob extends AIJob {
  status: "completed" | "settled";
  result: Bytes;
}

// ============================================================================
// Model registry
// ============================================================================

export interface ModelMetadata {
  name: string;
  version: string;
  description: string;
  /** JSON schema the model's input is expected to satisfy. */
  inputSchema?: Record<string, unknown>;
  outputSchema?: Record<string, unknown>;
}

export interface ModelInfo {
  hash: Hash;
  name: string;
  version: string;
  description: string;
  /** Slot at which the model was registered. */
  registered: number;
  jobCount: number;
}

export interface ProofVerification {
  valid: boolean;
  kzgValid: boolean;
  teeValid: boolean;
}

export interface ProviderReputation {
  score: number;
  completedJobs: number;
  failedJobs: number;
  averageTime: number;
}

export interface JobStats {
  totalJobs: number;
  pendingJobs: number;
  completedJobs: number;
  challengedJobs: number;
  totalVolume: bigint;
}

// ============================================================================
// Staking / governance
// ============================================================================

export interface Validator {
  address: Address;
  stake: bigint;
  delegatedStake: bigint;
  /** basis points (0-10000) */
  commission: number;
  active: boolean;
  uptime: number;
}

export interface Delegation {
  delegator: Address;
  validator: Address;
  amount: bigint;
  rewards: bigint;
}

export type ProposalStatus = "active" | "passed" | "rejected" | "executed";

export interface Proposal {
  id: number;
  proposer: Address;
  title: string;
  description: string;
  votesFor: bigint;
  votesAgainst: bigint;
  status: ProposalStatus;
  startSlot: number;
  endSlot: number;
}

export interface Vote {
  proposalId: number;
  voter: Address;
  support: boolean;
  votingPower: bigint;
}
