import type { ProofVerification, VerifiableComputeReceipt } from "../protocol/types";

/**
 * External proof checker for Verifiable Compute Receipts (KZG commitments against the
 * execution trace, TEE attestation). Implementations can be swapped for tests.
 */
export interface ReceiptVerifier {
  verify(vcr: VerifiableComputeReceipt): Promise<ProofVerification>;
}

export type LocalCheckFailure = "JOB_ID_MISMATCH" | "PROVIDER_UNASSIGNED" | "PROVIDER_MISMATCH" | "RESULT_HASH_MISMATCH";

export interface LocalChecks {
  jobIdMatches: boolean;
  providerMatches: boolean;
  resultHashMatches: boolean;
}

/**
 * Partial-validity result. The three flags are never collapsed:
 * - valid: local checks passed AND the verifier judged the receipt valid
 * - proofValid: KZG commitments verified against the execution trace
 * - attestationValid: TEE attestation verified
 */
export interface ReceiptVerification {
  valid: boolean;
  proofValid: boolean;
  attestationValid: boolean;
  /** false when a local cross-check rejected the receipt before forwarding */
  verifierInvoked: boolean;
  checks: LocalChecks;
  failures: LocalCheckFailure[];
}
