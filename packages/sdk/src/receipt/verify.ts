/**
 * Receipt Verification Contract
 *
 * A VCR is only meaningful next to the job it references. Local cross-checks run first:
 *   1) vcr.jobId equals job.id
 *   2) vcr.provider equals the job's assigned provider
 *   3) digest(vcr.result) matches the result hash already recorded for the job, if any
 * Any local failure rejects the receipt without calling the external verifier.
 * Only then is proof checking delegated, and its three flags are surfaced separately.
 */

import { digest } from "../codec/hash";
import { log } from "../client/logger";
import type { AIJob, VerifiableComputeReceipt } from "../protocol/types";
import type { LocalCheckFailure, LocalChecks, ReceiptVerification, ReceiptVerifier } from "./types";

export function checkReceiptLocally(
  job: AIJob,
  vcr: VerifiableComputeReceipt
): { checks: LocalChecks; failures: LocalCheckFailure[] } {
  const failures: LocalCheckFailure[] = [];

  const jobIdMatches = vcr.jobId.toLowerCase() === job.id.toLowerCase();
  if (!jobIdMatches) failures.push("JOB_ID_MISMATCH");

  let providerMatches = false;
  if (job.provider === undefined) {
    failures.push("PROVIDER_UNASSIGNED");
  } else {
    providerMatches = vcr.provider.toLowerCase() === job.provider.toLowerCase();
    if (!providerMatches) failures.push("PROVIDER_MISMATCH");
  }

  let resultHashMatches = true;
  const recorded = job.resultHash ?? (job.result !== undefined ? digest(job.result) : undefined);
  if (recorded !== undefined) {
    resultHashMatches = digest(vcr.result) === recorded.toLowerCase();
    if (!resultHashMatches) failures.push("RESULT_HASH_MISMATCH");
  }

  return { checks: { jobIdMatches, providerMatches, resultHashMatches }, failures };
}

export async function verifyComputeReceipt(
  job: AIJob,
  vcr: VerifiableComputeReceipt,
  verifier: ReceiptVerifier
): Promise<ReceiptVerification> {
  const { checks, failures } = checkReceiptLocally(job, vcr);

  if (failures.length > 0) {
    log("warn", "Compute receipt rejected by local checks", { job_id: job.id, failures });
    return {
      valid: false,
      proofValid: false,
      attestationValid: false,
      verifierInvoked: false,
      checks,
      failures,
    };
  }

  const remote = await verifier.verify(vcr);
  return {
    valid: remote.valid,
    proofValid: remote.kzgValid,
    attestationValid: remote.teeValid,
    verifierInvoked: true,
    checks,
    failures,
  };
}
