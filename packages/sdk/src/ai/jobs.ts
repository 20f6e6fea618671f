/**
 * AI job marketplace helpers.
 *
 * Reads go through the `ai_*` RPC namespace; writes are signed calls to the job escrow
 * contract. Waiting uses the shared completion tracker: `completed`/`settled` succeed,
 * `challenged` fails immediately with JOB_CHALLENGED.
 */

import { z } from "zod";
import { NotFoundError, SdkError } from "../errors";
import { arg, concatCallArgs, encodeCall } from "../codec/calldata";
import { requireKeyPair, requirePositive, signContractCall } from "../contracts/call";
import type { KeyPair } from "../keys/keypair";
import { isHash, normalizeAddress, normalizeHash } from "../protocol/format";
import type {
  Address,
  AIJob,
  Bytes,
  CompletedAIJob,
  Hash,
  JobStats,
  ProviderReputation,
  Transaction,
  VerifiableComputeReceipt,
} from "../protocol/types";
import { RpcReceiptVerifier } from "../receipt/rpc_verifier";
import type { ReceiptVerification, ReceiptVerifier } from "../receipt/types";
import { verifyComputeReceipt } from "../receipt/verify";
import type { LedgerClient, WaitOptions } from "../rpc/client";
import { aiJobSchema, jobStatsSchema, reputationSchema, vcrSchema } from "../rpc/schemas";
import { pollUntil, PENDING, SUCCESS } from "../tracker/poll";
import type { Classification } from "../tracker/poll";

export interface JobWaitOptions extends WaitOptions {
  /** Fail with NotFoundError instead of polling when the node does not know the job. */
  requireExisting?: boolean;
}

export type JobOutcome =
  | { jobId: Hash; ok: true; job: CompletedAIJob }
  | { jobId: Hash; ok: false; error: SdkError };

export function classifyJob(job: AIJob): Classification {
  switch (job.status) {
    case "completed":
    case "settled":
      return SUCCESS;
    case "challenged":
      return { kind: "failure", code: "JOB_CHALLENGED", reason: "result is being challenged" };
    default:
      return PENDING;
  }
}

/**
 * Terminal job with `result` always present: a completed job without result bytes
 * keeps its status and gets an empty result.
 */
export function toCompletedJob(job: AIJob): CompletedAIJob | undefined {
  if (job.status === "completed" || job.status === "settled") {
    return { ...job, status: job.status, result: job.result ?? new Uint8Array(0) };
  }
  return undefined;
}

/** Call data for `submitResult`: the receipt fields, each length-prefixed. */
function encodeReceipt(vcr: VerifiableComputeReceipt): Uint8Array {
  return concatCallArgs([
    arg.hash(vcr.jobId),
    arg.address(vcr.provider),
    arg.bytes(vcr.result),
    arg.hash(vcr.executionTrace),
    concatCallArgs(vcr.kzgCommitments.map(arg.bytes)),
    arg.bytes(vcr.teeAttestation),
    arg.u64(vcr.timestamp),
  ]);
}

const jobListSchema = z.array(aiJobSchema);

export class AIJobs {
  private readonly verifier: ReceiptVerifier;

  constructor(
    private readonly client: LedgerClient,
    private readonly keyPair?: KeyPair,
    verifier?: ReceiptVerifier
  ) {
    this.verifier = verifier ?? new RpcReceiptVerifier(client);
  }

  private get escrow(): Address {
    return this.client.config.contracts.jobEscrow;
  }

  // --------------------------------------------------------------------------
  // Reads
  // --------------------------------------------------------------------------

  async getJob(jobId: Hash): Promise<AIJob | undefined> {
    return this.client.rpcOptional("ai_getJob", [normalizeHash(jobId, "jobId")], aiJobSchema);
  }

  /** @throws NotFoundError when the node has no such job */
  async getJobOrThrow(jobId: Hash): Promise<AIJob> {
    const job = await this.getJob(jobId);
    if (job === undefined) {
      throw new NotFoundError("job", jobId);
    }
    return job;
  }

  async getVCR(jobId: Hash): Promise<VerifiableComputeReceipt | undefined> {
    return this.client.rpcOptional("ai_getVCR", [normalizeHash(jobId, "jobId")], vcrSchema);
  }

  async getJobsByCreator(creator: Address): Promise<AIJob[]> {
    return this.client.rpc("ai_getJobsByCreator", [normalizeAddress(creator, "creator")], jobListSchema);
  }

  async getJobsByProvider(provider: Address): Promise<AIJob[]> {
    return this.client.rpc("ai_getJobsByProvider", [normalizeAddress(provider, "provider")], jobListSchema);
  }

  async getPendingJobs(): Promise<AIJob[]> {
    return this.client.rpc("ai_getPendingJobs", [], jobListSchema);
  }

  async getJobStats(): Promise<JobStats> {
    return this.client.rpc("ai_getJobStats", [], jobStatsSchema);
  }

  async getProviderReputation(provider: Address): Promise<ProviderReputation> {
    return this.client.rpc("ai_getProviderReputation", [normalizeAddress(provider, "provider")], reputationSchema);
  }

  // --------------------------------------------------------------------------
  // Writes (signed, not submitted)
  // --------------------------------------------------------------------------

  /** Lock `aicAmount` in escrow for a job running `modelHash` on `input`. */
  async submitJob(modelHash: Hash, input: Bytes, aicAmount: bigint): Promise<Transaction> {
    const keyPair = requireKeyPair(this.keyPair, "submit a job");
    requirePositive(aicAmount, "aicAmount");
    const data = encodeCall("submitJob", [arg.hash(modelHash), arg.bytes(input)]);
    return signContractCall(this.client, keyPair, this.escrow, data, aicAmount);
  }

  async acceptJob(jobId: Hash): Promise<Transaction> {
    const keyPair = requireKeyPair(this.keyPair, "accept a job");
    const data = encodeCall("acceptJob", [arg.hash(jobId)]);
    return signContractCall(this.client, keyPair, this.escrow, data);
  }

  async submitResult(jobId: Hash, result: Bytes, vcr: VerifiableComputeReceipt): Promise<Transaction> {
    const keyPair = requireKeyPair(this.keyPair, "submit a result");
    const data = encodeCall("submitResult", [arg.hash(jobId), arg.bytes(result), encodeReceipt(vcr)]);
    return signContractCall(this.client, keyPair, this.escrow, data);
  }

  /** Challenge a submitted result, staking `stake` on the challenge. */
  async challengeResult(jobId: Hash, stake: bigint): Promise<Transaction> {
    const keyPair = requireKeyPair(this.keyPair, "challenge a result");
    requirePositive(stake, "stake");
    const data = encodeCall("challengeResult", [arg.hash(jobId)]);
    return signContractCall(this.client, keyPair, this.escrow, data, stake);
  }

  async claimPayment(jobId: Hash): Promise<Transaction> {
    const keyPair = requireKeyPair(this.keyPair, "claim payment");
    const data = encodeCall("claimPayment", [arg.hash(jobId)]);
    return signContractCall(this.client, keyPair, this.escrow, data);
  }

  // --------------------------------------------------------------------------
  // Waiting and verification
  // --------------------------------------------------------------------------

  /**
   * Wait until the job is `completed` or `settled`.
   * @throws RemoteFailureError (JOB_CHALLENGED) as soon as the job is seen challenged
   * @throws TimeoutError when the budget runs out first
   */
  async waitForJob(jobId: Hash, options: JobWaitOptions = {}): Promise<CompletedAIJob> {
    const { value } = await pollUntil<AIJob>(jobId, {
      probe: (id) => this.getJob(id),
      classify: classifyJob,
      intervalMs: options.intervalMs ?? this.client.config.jobWait.intervalMs,
      timeoutMs: options.timeoutMs ?? this.client.config.jobWait.timeoutMs,
      clock: this.client.clock,
      validateId: (id) => (isHash(id) ? undefined : `job id must be 0x-prefixed 32-byte hex (got "${id}")`),
      requireExisting: options.requireExisting,
      label: "job",
    });
    const completed = toCompletedJob(value);
    if (completed === undefined) {
      throw new SdkError(`job ${jobId} classified as complete in status ${value.status}`, "INVARIANT_BROKEN");
    }
    return completed;
  }

  /**
   * Wait for several jobs at once. Each wait runs its own loop; one failure does not
   * cancel the others. SDK errors are reported per job, anything else rejects.
   */
  async waitForJobs(jobIds: readonly Hash[], options: JobWaitOptions = {}): Promise<JobOutcome[]> {
    return Promise.all(
      jobIds.map(async (jobId): Promise<JobOutcome> => {
        try {
          return { jobId, ok: true, job: await this.waitForJob(jobId, options) };
        } catch (error) {
          if (error instanceof SdkError) {
            return { jobId, ok: false, error };
          }
          throw error;
        }
      })
    );
  }

  /**
   * Fetch the job and its receipt and run the receipt verification contract.
   * @throws NotFoundError when either record is missing
   */
  async verifyReceipt(jobId: Hash): Promise<ReceiptVerification> {
    const job = await this.getJobOrThrow(jobId);
    const vcr = job.vcr ?? (await this.getVCR(jobId));
    if (vcr === undefined) {
      throw new NotFoundError("compute receipt", jobId);
    }
    return verifyComputeReceipt(job, vcr, this.verifier);
  }
}
