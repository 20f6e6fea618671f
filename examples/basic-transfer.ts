#!/usr/bin/env tsx
/**
 * Example: Basic Transfer
 *
 * Derives a key from a seed, drafts a transfer with the sender's current nonce,
 * submits it and waits for the receipt.
 *
 *   COMPUTECHAIN_RPC_URL=http://localhost:8545 tsx examples/basic-transfer.ts <recipient> [amount]
 */

import {
  KeyPair,
  LedgerClient,
  RemoteFailureError,
  TimeoutError,
  buildTransaction,
  loadConfigFromEnv,
} from "@computechain/sdk";

async function main() {
  const [recipient, amount = "1000"] = process.argv.slice(2);
  if (recipient === undefined) {
    console.error("Usage: basic-transfer.ts <recipient> [amount]");
    process.exit(1);
  }

  const client = new LedgerClient({ config: loadConfigFromEnv() });
  const keyPair = KeyPair.fromSeed(process.env.EXAMPLE_SEED ?? "example-seed");

  try {
    console.log("=== Basic Transfer ===\n");
    console.log(`Sender:  ${keyPair.address}`);
    console.log(`Balance: ${await client.getBalance(keyPair.address)}`);

    const draft = await client.draftTransfer(keyPair, recipient, amount);
    const tx = buildTransaction(draft.memo("example transfer"), keyPair);
    console.log(`Hash:    ${tx.hash}`);

    await client.sendTransaction(tx);
    const receipt = await client.waitForTransaction(tx.hash);
    console.log(`\nIncluded in slot ${receipt.blockSlot}, gas used ${receipt.gasUsed}`);
  } catch (error) {
    if (error instanceof RemoteFailureError) {
      console.error(`\nTransaction failed: ${error.reasonCode}`);
      process.exit(2);
    }
    if (error instanceof TimeoutError) {
      console.error(`\nNo receipt after ${error.attempts} attempts`);
      process.exit(3);
    }
    throw error;
  } finally {
    keyPair.dispose();
  }
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
