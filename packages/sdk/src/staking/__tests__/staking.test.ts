import { describe, it, expect, beforeEach } from "vitest";
import { bytesToHex } from "../../codec/bytes";
import { KeyPair } from "../../keys/keypair";
import { MockLedgerNode, repeatAddress } from "../../testkit";
import { LedgerClient } from "../../rpc/client";
import { Staking } from "../staking";

const STAKING = "0x1000000000000000000000000000000000000001";
const VALIDATOR = repeatAddress("b1");

describe("Staking", () => {
  let node: MockLedgerNode;
  let client: LedgerClient;
  let keyPair: KeyPair;

  beforeEach(() => {
    node = new MockLedgerNode();
    client = new LedgerClient({ transport: node });
    keyPair = KeyPair.fromSeed("test");
  });

  it("parses validators with bigint stakes", async () => {
    node.on("staking_getValidators", () => [
      { address: VALIDATOR, stake: "1000", delegatedStake: "0x10", commission: 500, active: true, uptime: 99.5 },
    ]);

    await expect(new Staking(client).getValidators()).resolves.toEqual([
      { address: VALIDATOR, stake: 1000n, delegatedStake: 16n, commission: 500, active: true, uptime: 99.5 },
    ]);
  });

  it("returns undefined for an unknown validator", async () => {
    node.on("staking_getValidator", () => null);

    await expect(new Staking(client).getValidator(VALIDATOR)).resolves.toBeUndefined();
  });

  it("reads pending rewards", async () => {
    node.on("staking_getPendingRewards", () => "123");

    await expect(new Staking(client).getPendingRewards(keyPair.address)).resolves.toBe(123n);
  });

  it("bonds the stake as the value of registerValidator", async () => {
    const tx = await new Staking(client, keyPair).registerValidator(5000n, 250);

    expect(tx.recipient).toBe(STAKING);
    expect(tx.amount).toBe(5000n);
    expect(bytesToHex(tx.payload ?? new Uint8Array(0)).slice(10)).toBe("08000000" + "fa00000000000000");
  });

  it("rejects a commission outside 0..10000 basis points", async () => {
    const staking = new Staking(client, keyPair);

    await expect(staking.registerValidator(1n, 10_001)).rejects.toMatchObject({ code: "INVALID_COMMISSION" });
    await expect(staking.registerValidator(1n, 2.5)).rejects.toMatchObject({ code: "INVALID_COMMISSION" });
    await expect(staking.registerValidator(1n, 10_000)).resolves.toMatchObject({ amount: 1n });
  });

  it("sends the delegated amount as value and the validator as argument", async () => {
    const tx = await new Staking(client, keyPair).delegate(VALIDATOR, 700n);

    expect(tx.amount).toBe(700n);
    expect(bytesToHex(tx.payload ?? new Uint8Array(0)).slice(10)).toBe("14000000" + "b1".repeat(20));
  });

  it("carries the undelegated amount in the call data", async () => {
    const tx = await new Staking(client, keyPair).undelegate(VALIDATOR, 1n);

    expect(tx.amount).toBe(0n);
    expect(bytesToHex(tx.payload ?? new Uint8Array(0)).slice(-40)).toBe("10000000" + "01" + "00".repeat(15));
  });

  it("claims rewards with the bare selector", async () => {
    const tx = await new Staking(client, keyPair).claimRewards();

    expect(bytesToHex(tx.payload ?? new Uint8Array(0))).toBe("0xc76d0d0a");
  });

  it("requires a key pair and positive amounts for writes", async () => {
    await expect(new Staking(client).claimRewards()).rejects.toMatchObject({ code: "KEY_REQUIRED" });
    await expect(new Staking(client, keyPair).delegate(VALIDATOR, 0n)).rejects.toMatchObject({
      code: "NON_POSITIVE_AMOUNT",
    });
  });
});
