/**
 * Completion Tracker
 *
 * One bounded polling state machine, instantiated for transaction receipts and AI jobs:
 *
 *   Waiting -> Terminal(success) | Terminal(failure) | TimedOut
 *
 * Each call owns its attempt counter and deadline; concurrent waits share no state.
 * Suspension happens only in `clock.sleep` (and in the awaited probe).
 *
 * Deadline rule: after every probe returns, elapsed time is checked BEFORE the fetched
 * state is examined, so a success arriving after the deadline still ends in TimeoutError.
 * The final sleep is clipped to the deadline, bounding a never-terminal wait by
 * timeout + one interval (plus probe latency).
 */

import { NotFoundError, RemoteFailureError, TimeoutError, ValidationError } from "../errors";
import { log } from "../client/logger";
import { systemClock } from "./clock";
import type { Clock } from "./clock";

export type Classification =
  | { kind: "pending" }
  | { kind: "success" }
  | { kind: "failure"; code: string; reason: string };

export const PENDING: Classification = { kind: "pending" };
export const SUCCESS: Classification = { kind: "success" };

export interface PollOptions<T> {
  /** Fetch the current remote state; `undefined` means "not found yet". */
  probe: (id: string) => Promise<T | undefined>;
  classify: (state: T) => Classification;
  intervalMs: number;
  timeoutMs: number;
  clock?: Clock;
  /** Return a message when `id` is structurally invalid; the wait then fails without probing. */
  validateId?: (id: string) => string | undefined;
  /** Treat "not found" as NotFoundError instead of pending. */
  requireExisting?: boolean;
  /** Resource name used in errors and logs (e.g. "transaction", "job"). */
  label?: string;
}

export interface PollResult<T> {
  value: T;
  attempts: number;
  elapsedMs: number;
}

function assertBudget(name: string, value: number, allowZero: boolean): void {
  const ok = Number.isFinite(value) && (allowZero ? value >= 0 : value > 0);
  if (!ok) {
    throw new ValidationError(`${name} must be a ${allowZero ? "non-negative" : "positive"} number (got ${value})`, "INVALID_WAIT_OPTIONS", {
      [name]: value,
    });
  }
}

export async function pollUntil<T>(id: string, options: PollOptions<T>): Promise<PollResult<T>> {
  const { probe, classify, intervalMs, timeoutMs, requireExisting = false, label = "resource" } = options;
  const clock = options.clock ?? systemClock;

  assertBudget("intervalMs", intervalMs, false);
  assertBudget("timeoutMs", timeoutMs, true);

  const invalid = options.validateId?.(id);
  if (invalid !== undefined) {
    throw new ValidationError(invalid, "INVALID_IDENTIFIER", { id, label });
  }

  const startedAt = clock.now();
  const deadline = startedAt + timeoutMs;
  let attempts = 0;

  for (;;) {
    attempts++;
    const state = await probe(id);
    const now = clock.now();
    const elapsedMs = now - startedAt;

    if (elapsedMs > timeoutMs) {
      throw new TimeoutError(`${label} ${id} did not complete within ${timeoutMs}ms`, timeoutMs, attempts);
    }

    if (state === undefined) {
      if (requireExisting) {
        throw new NotFoundError(label, id);
      }
      log("debug", `${label} not found yet`, { id, attempts, elapsed_ms: elapsedMs });
    } else {
      const outcome = classify(state);
      if (outcome.kind === "success") {
        log("debug", `${label} reached terminal success`, { id, attempts, elapsed_ms: elapsedMs });
        return { value: state, attempts, elapsedMs };
      }
      if (outcome.kind === "failure") {
        log("warn", `${label} reached terminal failure`, { id, attempts, code: outcome.code });
        throw new RemoteFailureError(`${label} ${id} failed: ${outcome.reason}`, outcome.code, state);
      }
      log("debug", `${label} still pending`, { id, attempts, elapsed_ms: elapsedMs });
    }

    const remaining = deadline - now;
    if (remaining <= 0) {
      throw new TimeoutError(`${label} ${id} did not complete within ${timeoutMs}ms`, timeoutMs, attempts);
    }
    await clock.sleep(Math.min(intervalMs, remaining));
  }
}

/**
 * Like `pollUntil` but resolves to the artifact alone.
 */
export async function waitFor<T>(id: string, options: PollOptions<T>): Promise<T> {
  const { value } = await pollUntil(id, options);
  return value;
}
