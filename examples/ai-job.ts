#!/usr/bin/env tsx
/**
 * Example: AI Job Lifecycle
 *
 * Submits a job to the escrow contract, waits for a provider to complete it and
 * verifies the compute receipt. The verification flags are printed separately:
 * a receipt can carry a valid proof and still fail attestation.
 *
 *   COMPUTECHAIN_RPC_URL=http://localhost:8545 tsx examples/ai-job.ts <modelHash>
 */

import { AIJobs, KeyPair, LedgerClient, bytesToHex, loadConfigFromEnv, utf8ToBytes } from "@computechain/sdk";

async function main() {
  const [modelHash] = process.argv.slice(2);
  if (modelHash === undefined) {
    console.error("Usage: ai-job.ts <modelHash>");
    process.exit(1);
  }

  const client = new LedgerClient({ config: loadConfigFromEnv() });
  const keyPair = KeyPair.fromSeed(process.env.EXAMPLE_SEED ?? "example-seed");
  const jobs = new AIJobs(client, keyPair);

  console.log("=== AI Job Lifecycle ===\n");

  const tx = await jobs.submitJob(modelHash, utf8ToBytes("What is 2 + 2?"), 10_000n);
  await client.sendTransaction(tx);
  await client.waitForTransaction(tx.hash);
  console.log(`Job submitted: ${tx.hash}`);

  // Jobs are keyed by the hash of the submitting transaction
  const job = await jobs.waitForJob(tx.hash, { intervalMs: 2_000, timeoutMs: 120_000 });
  console.log(`Status:   ${job.status}`);
  console.log(`Provider: ${job.provider ?? "(none)"}`);
  console.log(`Result:   ${bytesToHex(job.result)}`);

  const verification = await jobs.verifyReceipt(job.id);
  console.log("\nReceipt verification:");
  console.log(`  valid:             ${verification.valid}`);
  console.log(`  proof valid:       ${verification.proofValid}`);
  console.log(`  attestation valid: ${verification.attestationValid}`);
  if (verification.failures.length > 0) {
    console.log(`  local failures:    ${verification.failures.join(", ")}`);
  }

  keyPair.dispose();
  process.exit(verification.valid ? 0 : 2);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
