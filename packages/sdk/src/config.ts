/**
 * Client configuration.
 *
 * Defaults mirror the ledger's genesis: system contracts live at 0x1000…0001 (staking),
 * 0x1000…0002 (governance) and 0x1000…0003 (AI job escrow).
 */

import { z } from "zod";
import { ValidationError } from "./errors";
import { isAddress } from "./protocol/format";

export interface WaitDefaults {
  timeoutMs: number;
  intervalMs: number;
}

export interface ClientConfig {
  rpcUrl: string;
  chainId: number;
  requestTimeoutMs: number;
  defaultFee: bigint;
  defaultGasLimit: number;
  txWait: WaitDefaults;
  jobWait: WaitDefaults;
  contracts: {
    staking: string;
    governance: string;
    jobEscrow: string;
  };
}

export const DEFAULT_CONFIG: ClientConfig = {
  rpcUrl: "http://localhost:8545",
  chainId: 1,
  requestTimeoutMs: 30_000,
  defaultFee: 2_000_000n,
  defaultGasLimit: 500_000,
  txWait: { timeoutMs: 30_000, intervalMs: 1_000 },
  jobWait: { timeoutMs: 300_000, intervalMs: 2_000 },
  contracts: {
    staking: "0x1000000000000000000000000000000000000001",
    governance: "0x1000000000000000000000000000000000000002",
    jobEscrow: "0x1000000000000000000000000000000000000003",
  },
};

export type ClientConfigInput = Partial<Omit<ClientConfig, "txWait" | "jobWait" | "contracts">> & {
  txWait?: Partial<WaitDefaults>;
  jobWait?: Partial<WaitDefaults>;
  contracts?: Partial<ClientConfig["contracts"]>;
};

const positiveMs = z.number().int().positive();
const waitSchema = z.object({ timeoutMs: z.number().int().nonnegative(), intervalMs: positiveMs });
const contractAddress = z.string().refine(isAddress, "must be a 0x-prefixed 20-byte address");

const configSchema = z.object({
  rpcUrl: z.string().url(),
  chainId: z.number().int().nonnegative(),
  requestTimeoutMs: positiveMs,
  defaultFee: z.bigint().nonnegative(),
  defaultGasLimit: z.number().int().nonnegative(),
  txWait: waitSchema,
  jobWait: waitSchema,
  contracts: z.object({ staking: contractAddress, governance: contractAddress, jobEscrow: contractAddress }),
});

/**
 * Merge a partial config over DEFAULT_CONFIG and validate the result.
 * @throws ValidationError (INVALID_CONFIG) listing every offending path
 */
export function resolveConfig(input: ClientConfigInput = {}): ClientConfig {
  const merged: ClientConfig = {
    ...DEFAULT_CONFIG,
    ...input,
    txWait: { ...DEFAULT_CONFIG.txWait, ...input.txWait },
    jobWait: { ...DEFAULT_CONFIG.jobWait, ...input.jobWait },
    contracts: { ...DEFAULT_CONFIG.contracts, ...input.contracts },
  };
  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ValidationError(`Invalid client config: ${issues.join("; ")}`, "INVALID_CONFIG", { issues });
  }
  return {
    ...merged,
    contracts: {
      staking: merged.contracts.staking.toLowerCase(),
      governance: merged.contracts.governance.toLowerCase(),
      jobEscrow: merged.contracts.jobEscrow.toLowerCase(),
    },
  };
}

// Set-but-empty variables are errors; coercing "" would silently yield 0.
const integerVar = z
  .string()
  .trim()
  .min(1, "must not be empty")
  .regex(/^-?\d+$/, "must be an integer")
  .transform(Number);

const envSchema = z.object({
  COMPUTECHAIN_RPC_URL: z.string().min(1, "must not be empty").optional(),
  COMPUTECHAIN_CHAIN_ID: integerVar.optional(),
  COMPUTECHAIN_REQUEST_TIMEOUT_MS: integerVar.optional(),
  COMPUTECHAIN_DEFAULT_FEE: z
    .string()
    .regex(/^\d+$/, "must be a decimal integer")
    .transform((value) => BigInt(value))
    .optional(),
  COMPUTECHAIN_DEFAULT_GAS_LIMIT: integerVar.optional(),
});

/**
 * Read COMPUTECHAIN_* variables; unset variables fall back to defaults.
 */
export function loadConfigFromEnv(env: Record<string, string | undefined> = process.env): ClientConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ValidationError(`Invalid environment: ${issues.join("; ")}`, "INVALID_CONFIG", { issues });
  }
  const vars = parsed.data;
  const input: ClientConfigInput = {};
  if (vars.COMPUTECHAIN_RPC_URL !== undefined) input.rpcUrl = vars.COMPUTECHAIN_RPC_URL;
  if (vars.COMPUTECHAIN_CHAIN_ID !== undefined) input.chainId = vars.COMPUTECHAIN_CHAIN_ID;
  if (vars.COMPUTECHAIN_REQUEST_TIMEOUT_MS !== undefined) input.requestTimeoutMs = vars.COMPUTECHAIN_REQUEST_TIMEOUT_MS;
  if (vars.COMPUTECHAIN_DEFAULT_FEE !== undefined) input.defaultFee = vars.COMPUTECHAIN_DEFAULT_FEE;
  if (vars.COMPUTECHAIN_DEFAULT_GAS_LIMIT !== undefined) input.defaultGasLimit = vars.COMPUTECHAIN_DEFAULT_GAS_LIMIT;
  return resolveConfig(input);
}
