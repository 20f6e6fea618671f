import { describe, it, expect, beforeEach } from "vitest";
import { NotFoundError, RemoteFailureError, TimeoutError, ValidationError } from "../../errors";
import { bytesToHex } from "../../codec/bytes";
import { KeyPair } from "../../keys/keypair";
import { ManualClock, MockLedgerNode, makeJob, makeVcr, repeatAddress, repeatHash } from "../../testkit";
import { LedgerClient } from "../../rpc/client";
import { AIJobs, classifyJob, toCompletedJob } from "../jobs";

const JOB_ID = repeatHash("11");
const PROVIDER = repeatAddress("d1");
const ESCROW = "0x1000000000000000000000000000000000000003";

describe("classifyJob", () => {
  it("treats completed and settled as success and challenged as failure", () => {
    expect(classifyJob(makeJob({ status: "completed" }))).toEqual({ kind: "success" });
    expect(classifyJob(makeJob({ status: "settled" }))).toEqual({ kind: "success" });
    expect(classifyJob(makeJob({ status: "challenged" }))).toEqual({
      kind: "failure",
      code: "JOB_CHALLENGED",
      reason: "result is being challenged",
    });
    expect(classifyJob(makeJob({ status: "assigned" }))).toEqual({ kind: "pending" });
  });

  it("gives completed jobs without a result an empty result", () => {
    const completed = toCompletedJob(makeJob({ status: "completed" }));

    expect(completed?.status).toBe("completed");
    expect(completed?.result).toEqual(new Uint8Array(0));
    expect(toCompletedJob(makeJob({ status: "computing" }))).toBeUndefined();
  });
});

describe("AIJobs", () => {
  let node: MockLedgerNode;
  let clock: ManualClock;
  let client: LedgerClient;

  beforeEach(() => {
    node = new MockLedgerNode();
    clock = new ManualClock();
    client = new LedgerClient({ transport: node, clock });
  });

  describe("waitForJob", () => {
    it("polls through pending and computing until completed", async () => {
      node.scriptJob(JOB_ID, [
        makeJob({ status: "pending" }),
        makeJob({ status: "computing", provider: PROVIDER }),
        makeJob({ status: "completed", provider: PROVIDER, result: new Uint8Array([42]) }),
      ]);

      const job = await new AIJobs(client).waitForJob(JOB_ID, { intervalMs: 2000, timeoutMs: 10_000 });

      expect(job.status).toBe("completed");
      expect(job.provider).toBe(PROVIDER);
      expect(bytesToHex(job.result)).toBe("0x2a");
      expect(clock.now()).toBe(4000);
      expect(node.callsTo("ai_getJob")).toHaveLength(3);
    });

    it("fails as soon as the job is challenged", async () => {
      node.scriptJob(JOB_ID, [makeJob({ status: "computing" }), makeJob({ status: "challenged" }), makeJob({ status: "settled" })]);

      const error = await new AIJobs(client).waitForJob(JOB_ID).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RemoteFailureError);
      expect(error).toMatchObject({ reasonCode: "JOB_CHALLENGED" });
      expect(node.callsTo("ai_getJob")).toHaveLength(2);
    });

    it("returns an empty result for a completed job without output", async () => {
      node.scriptJob(JOB_ID, [makeJob({ status: "completed" })]);

      const job = await new AIJobs(client).waitForJob(JOB_ID);

      expect(job.result.length).toBe(0);
    });

    it("uses the configured job wait defaults", async () => {
      node.scriptJob(JOB_ID, [makeJob({ status: "pending" }), makeJob({ status: "settled" })]);
      const configured = new LedgerClient({ transport: node, clock, config: { jobWait: { intervalMs: 500 } } });

      await new AIJobs(configured).waitForJob(JOB_ID);

      expect(clock.sleeps).toEqual([500]);
    });

    it("treats an unknown job as pending unless existence is required", async () => {
      const jobs = new AIJobs(client);

      await expect(jobs.waitForJob(JOB_ID, { intervalMs: 1000, timeoutMs: 2000 })).rejects.toBeInstanceOf(TimeoutError);
      await expect(jobs.waitForJob(JOB_ID, { requireExisting: true })).rejects.toBeInstanceOf(NotFoundError);
    });

    it("rejects a malformed job id without polling", async () => {
      await expect(new AIJobs(client).waitForJob("job-1")).rejects.toMatchObject({ code: "INVALID_IDENTIFIER" });
      expect(node.calls).toEqual([]);
    });
  });

  describe("waitForJobs", () => {
    it("reports each job's outcome without one failure cancelling the others", async () => {
      const done = repeatHash("01");
      const challenged = repeatHash("02");
      const stuck = repeatHash("03");
      node.scriptJob(done, [makeJob({ id: done, status: "completed" })]);
      node.scriptJob(challenged, [makeJob({ id: challenged, status: "challenged" })]);
      node.scriptJob(stuck, [makeJob({ id: stuck, status: "pending" })]);

      const outcomes = await new AIJobs(client).waitForJobs([done, challenged, stuck], {
        intervalMs: 2000,
        timeoutMs: 10_000,
      });

      expect(outcomes.map((outcome) => [outcome.jobId, outcome.ok])).toEqual([
        [done, true],
        [challenged, false],
        [stuck, false],
      ]);
      const errors = outcomes.map((outcome) => (outcome.ok ? undefined : outcome.error));
      expect(errors[0]).toBeUndefined();
      expect(errors[1]).toBeInstanceOf(RemoteFailureError);
      expect(errors[2]).toBeInstanceOf(TimeoutError);
    });
  });

  describe("writes", () => {
    it("signs a submitJob call to the escrow contract", async () => {
      const keyPair = KeyPair.fromSeed("test");
      node.setAccount(keyPair.address, 10_000n, 2);

      const tx = await new AIJobs(client, keyPair).submitJob(repeatHash("22"), new Uint8Array([1, 2, 3]), 1000n);

      expect(tx.recipient).toBe(ESCROW);
      expect(tx.amount).toBe(1000n);
      expect(tx.nonce).toBe(2);
      expect(bytesToHex(tx.payload ?? new Uint8Array(0))).toBe(
        "0x9ce4b430" + "20000000" + "22".repeat(32) + "03000000" + "010203"
      );
    });

    it("encodes acceptJob with its selector", async () => {
      const keyPair = KeyPair.fromSeed("test");

      const tx = await new AIJobs(client, keyPair).acceptJob(JOB_ID);

      expect(bytesToHex(tx.payload ?? new Uint8Array(0)).slice(0, 10)).toBe("0xd0f428ef");
      expect(tx.amount).toBe(0n);
    });

    it("requires a key pair and a positive amount", async () => {
      await expect(new AIJobs(client).submitJob(repeatHash("22"), new Uint8Array(0), 1n)).rejects.toMatchObject({
        code: "KEY_REQUIRED",
      });
      await expect(
        new AIJobs(client, KeyPair.fromSeed("test")).submitJob(repeatHash("22"), new Uint8Array(0), 0n)
      ).rejects.toMatchObject({ code: "NON_POSITIVE_AMOUNT" });
    });
  });

  describe("verifyReceipt", () => {
    it("cross-checks the job and forwards the receipt to the node verifier", async () => {
      node.scriptJob(JOB_ID, [makeJob({ status: "completed", provider: PROVIDER, result: new Uint8Array([42]) })]);
      node.setVcr(JOB_ID, makeVcr());
      node.proofVerification = { valid: true, kzgValid: true, teeValid: false };

      const result = await new AIJobs(client).verifyReceipt(JOB_ID);

      expect(result).toMatchObject({ valid: true, proofValid: true, attestationValid: false, verifierInvoked: true });
      expect(node.callsTo("ai_verifyVCR")).toHaveLength(1);
    });

    it("uses the receipt embedded in the job when present", async () => {
      node.scriptJob(JOB_ID, [makeJob({ status: "completed", provider: PROVIDER, vcr: makeVcr() })]);

      const result = await new AIJobs(client).verifyReceipt(JOB_ID);

      expect(result.valid).toBe(true);
      expect(node.callsTo("ai_getVCR")).toEqual([]);
    });

    it("does not forward a receipt from another provider", async () => {
      node.scriptJob(JOB_ID, [makeJob({ status: "completed", provider: repeatAddress("e2") })]);
      node.setVcr(JOB_ID, makeVcr());

      const result = await new AIJobs(client).verifyReceipt(JOB_ID);

      expect(result.valid).toBe(false);
      expect(result.failures).toEqual(["PROVIDER_MISMATCH"]);
      expect(node.callsTo("ai_verifyVCR")).toEqual([]);
    });

    it("raises NotFoundError when the job or receipt is missing", async () => {
      const jobs = new AIJobs(client);

      await expect(jobs.verifyReceipt(JOB_ID)).rejects.toMatchObject({ message: `job ${JOB_ID} not found` });

      node.scriptJob(JOB_ID, [makeJob({ status: "completed", provider: PROVIDER })]);
      await expect(jobs.verifyReceipt(JOB_ID)).rejects.toMatchObject({
        message: `compute receipt ${JOB_ID} not found`,
      });
    });

    it("validates the job id", async () => {
      await expect(new AIJobs(client).verifyReceipt("0x12")).rejects.toBeInstanceOf(ValidationError);
    });
  });
});
