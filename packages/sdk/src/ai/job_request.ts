/**
 * Off-chain job submission envelope for compute gateways (`POST {endpoint}/v1/jobs`).
 *
 * Like TransactionDraft, `JobRequestDraft` is immutable and validates only on build.
 */

import { ValidationError } from "../errors";
import { isHash } from "../protocol/format";
import type { Hash } from "../protocol/types";

export const DEFAULT_MAX_FEE = 1_000_000n;

export interface JobRequest {
  jobId: string;
  modelHash: Hash;
  inputHash: Hash;
  maxFee: bigint;
  /** Unix seconds. */
  expiresAt: number;
  metadata?: Record<string, unknown>;
}

/** JSON-safe body: `maxFee` travels as a decimal string. */
export interface JobRequestBody {
  jobId: string;
  modelHash: Hash;
  inputHash: Hash;
  maxFee: string;
  expiresAt: number;
  metadata?: Record<string, unknown>;
}

export interface JobSubmission {
  url: string;
  method: "POST";
  headers: Record<string, string>;
  body: JobRequestBody;
}

export type JobRequestResult = { ok: true; request: JobRequest } | { ok: false; error: ValidationError };

interface JobRequestState {
  jobId?: string;
  modelHash?: string;
  inputHash?: string;
  maxFee: bigint;
  expiresAt?: number;
  metadata?: Record<string, unknown>;
}

function invalid(field: string, message: string): ValidationError {
  return new ValidationError(message, "MALFORMED_FIELD", { field });
}

export class JobRequestDraft {
  private constructor(
    private readonly endpoint: string,
    private readonly state: Readonly<JobRequestState>
  ) {}

  static create(endpoint: string): JobRequestDraft {
    return new JobRequestDraft(endpoint, { maxFee: DEFAULT_MAX_FEE });
  }

  private with(patch: Partial<JobRequestState>): JobRequestDraft {
    return new JobRequestDraft(this.endpoint, { ...this.state, ...patch });
  }

  id(jobId: string): JobRequestDraft {
    return this.with({ jobId });
  }

  model(modelHash: string): JobRequestDraft {
    return this.with({ modelHash });
  }

  input(inputHash: string): JobRequestDraft {
    return this.with({ inputHash });
  }

  maxFee(maxFee: bigint): JobRequestDraft {
    return this.with({ maxFee });
  }

  /** Accepts unix seconds or a Date. */
  expiresAt(timestamp: number | Date): JobRequestDraft {
    const seconds = timestamp instanceof Date ? Math.floor(timestamp.getTime() / 1000) : timestamp;
    return this.with({ expiresAt: seconds });
  }

  withMetadata(metadata: Record<string, unknown>): JobRequestDraft {
    return this.with({ metadata: { ...metadata } });
  }

  /**
   * Validate the draft. `nowMs` is injectable for tests.
   */
  build(nowMs: number = Date.now()): JobRequestResult {
    const s = this.state;
    if (s.jobId === undefined || s.jobId.trim() === "") {
      return { ok: false, error: invalid("jobId", "jobId must not be empty") };
    }
    if (!isHash(s.modelHash)) {
      return { ok: false, error: invalid("modelHash", "model hash must be 0x-prefixed 32-byte hex") };
    }
    if (!isHash(s.inputHash)) {
      return { ok: false, error: invalid("inputHash", "input hash must be 0x-prefixed 32-byte hex") };
    }
    if (s.maxFee <= 0n) {
      return { ok: false, error: invalid("maxFee", `max fee must be positive (got ${s.maxFee})`) };
    }
    if (s.expiresAt === undefined || !Number.isSafeInteger(s.expiresAt)) {
      return { ok: false, error: invalid("expiresAt", "expiry not set") };
    }
    if (s.expiresAt * 1000 <= nowMs) {
      return { ok: false, error: invalid("expiresAt", "expiry must be in the future") };
    }

    const request: JobRequest = {
      jobId: s.jobId,
      modelHash: s.modelHash.toLowerCase(),
      inputHash: s.inputHash.toLowerCase(),
      maxFee: s.maxFee,
      expiresAt: s.expiresAt,
    };
    if (s.metadata !== undefined) request.metadata = s.metadata;
    return { ok: true, request };
  }

  /** @throws ValidationError when the draft is incomplete or invalid */
  toSubmission(nowMs: number = Date.now()): JobSubmission {
    const result = this.build(nowMs);
    if (!result.ok) {
      throw result.error;
    }
    return prepareJobSubmission(this.endpoint, result.request);
  }
}

export function prepareJobSubmission(endpoint: string, request: JobRequest): JobSubmission {
  const body: JobRequestBody = {
    jobId: request.jobId,
    modelHash: request.modelHash,
    inputHash: request.inputHash,
    maxFee: request.maxFee.toString(),
    expiresAt: request.expiresAt,
  };
  if (request.metadata !== undefined) body.metadata = request.metadata;
  return {
    url: `${endpoint.replace(/\/+$/, "")}/v1/jobs`,
    method: "POST",
    headers: { "content-type": "application/json" },
    body,
  };
}
