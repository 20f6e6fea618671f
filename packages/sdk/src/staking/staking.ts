/**
 * Validator staking: `staking_*` reads and signed calls to the staking contract.
 */

import { z } from "zod";
import { ValidationError } from "../errors";
import { arg, encodeCall } from "../codec/calldata";
import { requireKeyPair, requirePositive, signContractCall } from "../contracts/call";
import type { KeyPair } from "../keys/keypair";
import { normalizeAddress } from "../protocol/format";
import type { Address, Delegation, Transaction, Validator } from "../protocol/types";
import type { LedgerClient } from "../rpc/client";
import { bigintSchema, delegationSchema, validatorSchema } from "../rpc/schemas";

/** Commission is expressed in basis points. */
export const MAX_COMMISSION_BPS = 10_000;

export class Staking {
  constructor(
    private readonly client: LedgerClient,
    private readonly keyPair?: KeyPair
  ) {}

  private get contract(): Address {
    return this.client.config.contracts.staking;
  }

  async getValidator(address: Address): Promise<Validator | undefined> {
    return this.client.rpcOptional("staking_getValidator", [normalizeAddress(address, "validator")], validatorSchema);
  }

  async getValidators(): Promise<Validator[]> {
    return this.client.rpc("staking_getValidators", [], z.array(validatorSchema));
  }

  async getDelegation(delegator: Address, validator: Address): Promise<Delegation | undefined> {
    return this.client.rpcOptional(
      "staking_getDelegation",
      [normalizeAddress(delegator, "delegator"), normalizeAddress(validator, "validator")],
      delegationSchema
    );
  }

  async getDelegations(delegator: Address): Promise<Delegation[]> {
    return this.client.rpc("staking_getDelegations", [normalizeAddress(delegator, "delegator")], z.array(delegationSchema));
  }

  async getPendingRewards(address: Address): Promise<bigint> {
    return this.client.rpc("staking_getPendingRewards", [normalizeAddress(address)], bigintSchema);
  }

  async getTotalStake(): Promise<bigint> {
    return this.client.rpc("staking_getTotalStake", [], bigintSchema);
  }

  async getMinimumStake(): Promise<bigint> {
    return this.client.rpc("staking_getMinimumStake", [], bigintSchema);
  }

  /**
   * Register the signer as a validator, bonding `stake`.
   * @throws ValidationError (INVALID_COMMISSION) unless 0 <= commissionBps <= 10000
   */
  async registerValidator(stake: bigint, commissionBps: number): Promise<Transaction> {
    const keyPair = requireKeyPair(this.keyPair, "register a validator");
    requirePositive(stake, "stake");
    if (!Number.isInteger(commissionBps) || commissionBps < 0 || commissionBps > MAX_COMMISSION_BPS) {
      throw new ValidationError(
        `commission must be an integer between 0 and ${MAX_COMMISSION_BPS} basis points (got ${commissionBps})`,
        "INVALID_COMMISSION",
        { commissionBps }
      );
    }
    const data = encodeCall("registerValidator", [arg.u64(commissionBps)]);
    return signContractCall(this.client, keyPair, this.contract, data, stake);
  }

  async delegate(validator: Address, amount: bigint): Promise<Transaction> {
    const keyPair = requireKeyPair(this.keyPair, "delegate");
    requirePositive(amount, "amount");
    const data = encodeCall("delegate", [arg.address(validator)]);
    return signContractCall(this.client, keyPair, this.contract, data, amount);
  }

  async undelegate(validator: Address, amount: bigint): Promise<Transaction> {
    const keyPair = requireKeyPair(this.keyPair, "undelegate");
    requirePositive(amount, "amount");
    const data = encodeCall("undelegate", [arg.address(validator), arg.u128(amount)]);
    return signContractCall(this.client, keyPair, this.contract, data);
  }

  async claimRewards(): Promise<Transaction> {
    const keyPair = requireKeyPair(this.keyPair, "claim rewards");
    return signContractCall(this.client, keyPair, this.contract, encodeCall("claimRewards"));
  }
}
