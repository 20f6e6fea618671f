// packages/sdk/src/index.ts

// Errors
export * from "./errors";

// Protocol types and formats
export * from "./protocol/types";
export * from "./protocol/format";

// Codec
export {
  strip0x,
  isHex,
  hexToBytes,
  bytesToHex,
  utf8ToBytes,
  concatBytes,
  bytesEqual,
  u32LE,
  u64LE,
  u128LE,
} from "./codec/bytes";
export { sha256, digest } from "./codec/hash";
export { encodeTransaction, transactionHash, FIXED_SECTION_BYTES } from "./codec/canonical";
export { arg, encodeCall, concatCallArgs, selector, SELECTOR_BYTES } from "./codec/calldata";

// Keys
export { KeyPair, addressOf, generate, fromSeed, fromSecretKey, sign, verify } from "./keys/keypair";
export type { SecretKeyFormat } from "./keys/keypair";

// Transactions
export { TransactionDraft, buildTransaction, REQUIRED_FIELDS } from "./transaction/builder";
export type { BuildResult, IntegerInput } from "./transaction/builder";
export { verifyTransaction, transactionFields } from "./transaction/verify";
export { toEnvelope, fromEnvelope } from "./transaction/envelope";

// Completion tracking
export { pollUntil, waitFor, PENDING, SUCCESS } from "./tracker/poll";
export type { Classification, PollOptions, PollResult } from "./tracker/poll";
export { systemClock } from "./tracker/clock";
export type { Clock } from "./tracker/clock";

// Receipts
export { verifyComputeReceipt, checkReceiptLocally } from "./receipt/verify";
export { RpcReceiptVerifier } from "./receipt/rpc_verifier";
export type { ReceiptVerifier, ReceiptVerification, LocalChecks, LocalCheckFailure } from "./receipt/types";

// RPC
export { LedgerClient, classifyReceipt } from "./rpc/client";
export type { LedgerClientOptions, WaitOptions } from "./rpc/client";
export { HttpJsonRpcTransport, jsonReplacer } from "./rpc/transport";
export type { JsonRpcTransport, HttpTransportOptions } from "./rpc/transport";

// AI jobs
export { AIJobs, classifyJob, toCompletedJob } from "./ai/jobs";
export type { JobOutcome, JobWaitOptions } from "./ai/jobs";
export { Models } from "./ai/models";
export { JobRequestDraft, prepareJobSubmission, DEFAULT_MAX_FEE } from "./ai/job_request";
export type { JobRequest, JobRequestBody, JobRequestResult, JobSubmission } from "./ai/job_request";

// Staking / governance
export { Staking, MAX_COMMISSION_BPS } from "./staking/staking";
export { Governance, DEFAULT_VOTING_SLOTS } from "./governance/governance";
export type { ProposalStatusView } from "./governance/governance";

// Config
export { DEFAULT_CONFIG, resolveConfig, loadConfigFromEnv } from "./config";
export type { ClientConfig, ClientConfigInput, WaitDefaults } from "./config";

// Logging / redaction
export { log } from "./client/logger";
export type { LogLevel } from "./client/logger";
export { redactSecrets, REDACTED } from "./security/redact";

// CLI
export { runCli, EXIT } from "./cli/main";
export type { CliIo, CliDeps } from "./cli/main";
