import { describe, it, expect } from "vitest";
import { jobToWire, makeJob, makeReceipt, makeVcr, receiptToWire, repeatAddress, repeatHash } from "../../testkit";
import { accountSchema, aiJobSchema, bigintSchema, blockSchema, receiptSchema, vcrSchema } from "../schemas";

const UNSAFE = 2 ** 60;

describe("decoded records", () => {
  it("freezes jobs down to their receipt and commitment list", () => {
    const job = aiJobSchema.parse(
      jobToWire(makeJob({ status: "completed", provider: repeatAddress("d1"), result: new Uint8Array([42]), vcr: makeVcr() }))
    );

    expect(Object.isFrozen(job)).toBe(true);
    expect(job.vcr).toBeDefined();
    expect(Object.isFrozen(job.vcr)).toBe(true);
    expect(Object.isFrozen(job.vcr?.kzgCommitments)).toBe(true);
    expect(Array.from(job.result ?? [])).toEqual([42]);
  });

  it("freezes a pending job without optional fields", () => {
    const job = aiJobSchema.parse(jobToWire(makeJob()));

    expect(Object.isFrozen(job)).toBe(true);
    expect(job.provider).toBeUndefined();
  });

  it("freezes receipts and their logs", () => {
    const wire = receiptToWire({
      ...makeReceipt(repeatHash("ab")),
      logs: [{ address: repeatAddress("a2"), topics: [repeatHash("01")], data: new Uint8Array([5]) }],
    });
    const receipt = receiptSchema.parse(wire);

    expect(Object.isFrozen(receipt)).toBe(true);
    expect(Object.isFrozen(receipt.logs)).toBe(true);
    expect(Object.isFrozen(receipt.logs[0])).toBe(true);
    expect(Object.isFrozen(receipt.logs[0]?.topics)).toBe(true);
  });

  it("freezes standalone receipts for compute jobs", () => {
    const wire = jobToWire(makeJob({ vcr: makeVcr() })).vcr;

    expect(Object.isFrozen(vcrSchema.parse(wire))).toBe(true);
  });
});

describe("integer fields", () => {
  it("rejects JSON numbers beyond the safe integer range", () => {
    const account = { address: repeatAddress("a1"), balance: "10", nonce: UNSAFE };

    expect(accountSchema.safeParse(account).success).toBe(false);
    expect(accountSchema.safeParse({ ...account, nonce: Number.MAX_SAFE_INTEGER }).success).toBe(true);
    expect(bigintSchema.safeParse(UNSAFE).success).toBe(false);
  });

  it("keeps large integers exact when they arrive as strings", () => {
    expect(bigintSchema.parse("1152921504606846976")).toBe(1n << 60n);
    expect(bigintSchema.parse("0x10")).toBe(16n);
  });

  it("rejects an unsafe block timestamp", () => {
    const block = {
      slot: 1,
      hash: repeatHash("01"),
      parentHash: repeatHash("00"),
      proposer: repeatAddress("a1"),
      transactions: [],
      stateRoot: repeatHash("02"),
      timestamp: UNSAFE,
    };

    expect(blockSchema.safeParse(block).success).toBe(false);
    expect(blockSchema.safeParse({ ...block, timestamp: 1_700_000_000 }).success).toBe(true);
  });
});
