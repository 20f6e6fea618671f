/**
 * SDK error taxonomy.
 *
 * - ValidationError: malformed or missing input, raised before any network or crypto call
 * - InvalidKeyMaterialError: wrong key length or format
 * - RemoteFailureError: the ledger reported an explicit failure (failed receipt, challenged job)
 * - TimeoutError: a wait ran out of budget; never a subclass of RemoteFailureError
 * - NotFoundError: the node has no record for the queried identifier
 * - RpcError: transport failure or JSON-RPC error object
 */

export const VALIDATION_FAILED = "VALIDATION_FAILED";
export const INCOMPLETE_TRANSACTION = "INCOMPLETE_TRANSACTION";
export const INVALID_KEY_MATERIAL = "INVALID_KEY_MATERIAL";
export const REMOTE_FAILURE = "REMOTE_FAILURE";
export const WAIT_TIMEOUT = "WAIT_TIMEOUT";
export const NOT_FOUND = "NOT_FOUND";
export const RPC_ERROR = "RPC_ERROR";

export class SdkError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "SdkError";
  }
}

export class ValidationError extends SdkError {
  constructor(message: string, code: string = VALIDATION_FAILED, details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = "ValidationError";
  }
}

/** A required transaction field was never set on the draft. */
export class IncompleteTransactionError extends ValidationError {
  constructor(public readonly field: string) {
    super(`Transaction requires ${field}`, INCOMPLETE_TRANSACTION, { field });
    this.name = "IncompleteTransactionError";
  }
}

export class InvalidKeyMaterialError extends SdkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, INVALID_KEY_MATERIAL, details);
    this.name = "InvalidKeyMaterialError";
  }
}

/**
 * The remote side reached a terminal failure state.
 * `reasonCode` is the classified reason (e.g. JOB_CHALLENGED); `state` is the last fetched artifact.
 */
export class RemoteFailureError extends SdkError {
  constructor(
    message: string,
    public readonly reasonCode: string,
    public readonly state?: unknown
  ) {
    super(message, REMOTE_FAILURE, { reasonCode });
    this.name = "RemoteFailureError";
  }
}

export class TimeoutError extends SdkError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
    public readonly attempts: number
  ) {
    super(message, WAIT_TIMEOUT, { timeoutMs, attempts });
    this.name = "TimeoutError";
  }
}

export class NotFoundError extends SdkError {
  constructor(
    public readonly resource: string,
    public readonly id: string
  ) {
    super(`${resource} ${id} not found`, NOT_FOUND, { resource, id });
    this.name = "NotFoundError";
  }
}

export class RpcError extends SdkError {
  constructor(
    message: string,
    public readonly method: string,
    public readonly rpcCode?: number,
    public readonly httpStatus?: number
  ) {
    super(message, RPC_ERROR, { method, rpcCode, httpStatus });
    this.name = "RpcError";
  }
}

export function isSdkError(error: unknown, code?: string): error is SdkError {
  return error instanceof SdkError && (code === undefined || error.code === code);
}
