import type { ProofVerification, VerifiableComputeReceipt } from "../protocol/types";
import type { LedgerClient } from "../rpc/client";
import { proofVerificationSchema, vcrToWire } from "../rpc/schemas";
import type { ReceiptVerifier } from "./types";

/** Delegates proof checking to the node's `ai_verifyVCR`. */
export class RpcReceiptVerifier implements ReceiptVerifier {
  constructor(private readonly client: LedgerClient) {}

  async verify(vcr: VerifiableComputeReceipt): Promise<ProofVerification> {
    return this.client.rpc("ai_verifyVCR", [vcrToWire(vcr)], proofVerificationSchema);
  }
}
