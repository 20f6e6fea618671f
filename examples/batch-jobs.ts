#!/usr/bin/env tsx
/**
 * Example: Waiting on Several Jobs
 *
 * Each wait runs its own polling loop; a challenged or timed-out job is reported
 * without cancelling the others.
 *
 *   tsx examples/batch-jobs.ts <jobId> [<jobId> ...]
 */

import { AIJobs, LedgerClient, loadConfigFromEnv } from "@computechain/sdk";

async function main() {
  const jobIds = process.argv.slice(2);
  if (jobIds.length === 0) {
    console.error("Usage: batch-jobs.ts <jobId> [<jobId> ...]");
    process.exit(1);
  }

  const jobs = new AIJobs(new LedgerClient({ config: loadConfigFromEnv() }));
  const outcomes = await jobs.waitForJobs(jobIds, { timeoutMs: 60_000 });

  for (const outcome of outcomes) {
    if (outcome.ok) {
      console.log(`${outcome.jobId}  ${outcome.job.status}  ${outcome.job.result.length} result bytes`);
    } else {
      console.log(`${outcome.jobId}  ${outcome.error.name}: ${outcome.error.message}`);
    }
  }

  process.exit(outcomes.every((outcome) => outcome.ok) ? 0 : 2);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
