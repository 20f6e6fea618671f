/**
 * computechain CLI
 *
 * Usage:
 *   computechain keygen [--seed <text>] [--show-secret]
 *   computechain address <publicKeyHex>
 *   computechain transfer --to <address> --amount <n> (--seed <text> | --secret <hex>)
 *                         [--nonce <n>] [--fee <n>] [--gas-limit <n>] [--memo <text>] [--send] [--wait]
 *   computechain wait-tx <hash> [--timeout <ms>] [--interval <ms>]
 *   computechain wait-job <jobId> [--timeout <ms>] [--interval <ms>]
 *   computechain verify-receipt <jobId>
 *
 * Global: --rpc-url <url> (else COMPUTECHAIN_RPC_URL). Output is JSON on stdout.
 *
 * Exit codes: 0 ok, 1 usage or validation, 2 remote failure, 3 timeout, 4 not found, 5 rpc error.
 */

import minimist from "minimist";
import { AIJobs } from "../ai/jobs";
import { bytesToHex } from "../codec/bytes";
import { loadConfigFromEnv } from "../config";
import {
  NotFoundError,
  RemoteFailureError,
  RpcError,
  SdkError,
  TimeoutError,
  ValidationError,
} from "../errors";
import { addressOf, KeyPair } from "../keys/keypair";
import { LedgerClient } from "../rpc/client";
import type { WaitOptions } from "../rpc/client";
import { jsonReplacer } from "../rpc/transport";
import type { JsonRpcTransport } from "../rpc/transport";
import type { Clock } from "../tracker/clock";
import { TransactionDraft, buildTransaction } from "../transaction/builder";
import { toEnvelope } from "../transaction/envelope";

export interface CliIo {
  stdout(line: string): void;
  stderr(line: string): void;
  env: Record<string, string | undefined>;
}

/** Injected in tests to keep the CLI in process. */
export interface CliDeps {
  transport?: JsonRpcTransport;
  clock?: Clock;
}

export const EXIT = {
  OK: 0,
  USAGE: 1,
  REMOTE_FAILURE: 2,
  TIMEOUT: 3,
  NOT_FOUND: 4,
  RPC: 5,
} as const;

const USAGE = [
  "Usage: computechain <command> [args...]",
  "",
  "Commands:",
  "  keygen [--seed <text>] [--show-secret]",
  "  address <publicKeyHex>",
  "  transfer --to <address> --amount <n> (--seed <text> | --secret <hex>) [--nonce <n>] [--fee <n>]",
  "           [--gas-limit <n>] [--memo <text>] [--send] [--wait]",
  "  wait-tx <hash> [--timeout <ms>] [--interval <ms>]",
  "  wait-job <jobId> [--timeout <ms>] [--interval <ms>]",
  "  verify-receipt <jobId>",
];

type Args = minimist.ParsedArgs;

function flag(args: Args, name: string): string | undefined {
  const value: unknown = args[name];
  if (Array.isArray(value)) {
    const last: unknown = value[value.length - 1];
    return typeof last === "string" ? last : undefined;
  }
  return typeof value === "string" ? value : undefined;
}

function numberFlag(args: Args, name: string): number | undefined {
  const raw = flag(args, name);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    throw new ValidationError(`--${name} must be a number (got "${raw}")`, "MALFORMED_FIELD", { field: name });
  }
  return n;
}

function positional(args: Args, index: number, name: string): string {
  const value: unknown = args._[index];
  if (typeof value !== "string" || value === "") {
    throw new ValidationError(`missing <${name}>`, "MISSING_ARGUMENT", { field: name });
  }
  return value;
}

function waitOptions(args: Args): WaitOptions {
  return { timeoutMs: numberFlag(args, "timeout"), intervalMs: numberFlag(args, "interval") };
}

function signerFrom(args: Args): KeyPair {
  const seed = flag(args, "seed");
  const secret = flag(args, "secret");
  if (seed !== undefined && secret !== undefined) {
    throw new ValidationError("use either --seed or --secret, not both", "CONFLICTING_FLAGS");
  }
  if (seed !== undefined) return KeyPair.fromSeed(seed);
  if (secret !== undefined) return KeyPair.fromSecretKeyHex(secret);
  throw new ValidationError("transfer requires --seed or --secret", "MISSING_ARGUMENT", { field: "seed" });
}

function exitCodeFor(error: SdkError): number {
  if (error instanceof RemoteFailureError) return EXIT.REMOTE_FAILURE;
  if (error instanceof TimeoutError) return EXIT.TIMEOUT;
  if (error instanceof NotFoundError) return EXIT.NOT_FOUND;
  if (error instanceof RpcError) return EXIT.RPC;
  return EXIT.USAGE;
}

export async function runCli(argv: readonly string[], io: CliIo, deps: CliDeps = {}): Promise<number> {
  const args = minimist([...argv], {
    // "_" keeps positionals such as 0x hashes from being coerced to numbers
    string: ["_", "seed", "secret", "to", "amount", "nonce", "fee", "gas-limit", "memo", "rpc-url", "timeout", "interval"],
    boolean: ["show-secret", "send", "wait"],
  });
  const [command] = args._;
  const print = (value: unknown): void => io.stdout(JSON.stringify(value, jsonReplacer, 2));

  if (typeof command !== "string") {
    USAGE.forEach((line) => io.stderr(line));
    return EXIT.USAGE;
  }

  const client = (): LedgerClient => {
    const config = loadConfigFromEnv(io.env);
    const rpcUrl = flag(args, "rpc-url") ?? config.rpcUrl;
    return new LedgerClient({ config: { ...config, rpcUrl }, transport: deps.transport, clock: deps.clock });
  };

  try {
    switch (command) {
      case "keygen": {
        const seed = flag(args, "seed");
        const keyPair = seed === undefined ? KeyPair.generate() : KeyPair.fromSeed(seed);
        const out: Record<string, string> = { address: keyPair.address, publicKey: keyPair.publicKeyHex };
        if (args["show-secret"] === true) out.secretKey = keyPair.exportSecretKey("hex");
        print(out);
        keyPair.dispose();
        return EXIT.OK;
      }

      case "address": {
        io.stdout(addressOf(positional(args, 1, "publicKeyHex")));
        return EXIT.OK;
      }

      case "transfer": {
        const keyPair = signerFrom(args);
        try {
          const ledger = client();
          const to = flag(args, "to");
          const amount = flag(args, "amount");
          let draft = TransactionDraft.empty()
            .fromKeyPair(keyPair)
            .fee(flag(args, "fee") ?? ledger.config.defaultFee)
            .gasLimit(flag(args, "gas-limit") ?? ledger.config.defaultGasLimit)
            .memo(flag(args, "memo"));
          if (to !== undefined) draft = draft.to(to);
          if (amount !== undefined) draft = draft.amount(amount);

          // Nonce is the only field fetched remotely; validate the rest before any call.
          draft.nonce(0).toFields();

          const nonce = flag(args, "nonce") ?? (await ledger.getNonce(keyPair.address));
          const tx = buildTransaction(draft.nonce(nonce), keyPair);

          if (args.send !== true) {
            print(toEnvelope(tx));
            return EXIT.OK;
          }
          const hash = await ledger.sendTransaction(tx);
          if (args.wait !== true) {
            print({ hash });
            return EXIT.OK;
          }
          const receipt = await ledger.waitForTransaction(hash, waitOptions(args));
          print({ hash, status: receipt.status, blockSlot: receipt.blockSlot });
          return EXIT.OK;
        } finally {
          keyPair.dispose();
        }
      }

      case "wait-tx": {
        const receipt = await client().waitForTransaction(positional(args, 1, "hash"), waitOptions(args));
        print(receipt);
        return EXIT.OK;
      }

      case "wait-job": {
        const job = await new AIJobs(client()).waitForJob(positional(args, 1, "jobId"), waitOptions(args));
        print({ id: job.id, status: job.status, provider: job.provider, result: bytesToHex(job.result) });
        return EXIT.OK;
      }

      case "verify-receipt": {
        const verification = await new AIJobs(client()).verifyReceipt(positional(args, 1, "jobId"));
        print(verification);
        return verification.valid ? EXIT.OK : EXIT.REMOTE_FAILURE;
      }

      default:
        io.stderr(`Unknown command: ${command}`);
        USAGE.forEach((line) => io.stderr(line));
        return EXIT.USAGE;
    }
  } catch (error) {
    if (error instanceof SdkError) {
      io.stderr(`Error [${error.code}]: ${error.message}`);
      return exitCodeFor(error);
    }
    throw error;
  }
}
