/**
 * On-chain governance: `governance_*` reads and signed calls to the governance contract.
 */

import { z } from "zod";
import { ValidationError } from "../errors";
import { arg, encodeCall } from "../codec/calldata";
import { requireKeyPair, signContractCall } from "../contracts/call";
import type { KeyPair } from "../keys/keypair";
import { normalizeAddress } from "../protocol/format";
import type { Address, Proposal, Transaction, Vote } from "../protocol/types";
import type { LedgerClient } from "../rpc/client";
import { bigintSchema, proposalSchema, voteSchema } from "../rpc/schemas";

/** ~7 days of 6s slots. */
export const DEFAULT_VOTING_SLOTS = 100_800;

export const MAX_TITLE_LENGTH = 256;
export const MAX_DESCRIPTION_LENGTH = 10_000;

export interface ProposalStatusView {
  proposal: Proposal;
  hasQuorum: boolean;
  /** Slots left until voting closes, never negative. */
  slotsRemaining: number;
  canExecute: boolean;
}

function assertProposalId(proposalId: number): number {
  if (!Number.isSafeInteger(proposalId) || proposalId < 0) {
    throw new ValidationError(`proposalId must be a non-negative integer (got ${proposalId})`, "MALFORMED_FIELD", {
      field: "proposalId",
    });
  }
  return proposalId;
}

export class Governance {
  constructor(
    private readonly client: LedgerClient,
    private readonly keyPair?: KeyPair
  ) {}

  private get contract(): Address {
    return this.client.config.contracts.governance;
  }

  async getProposal(proposalId: number): Promise<Proposal | undefined> {
    return this.client.rpcOptional("governance_getProposal", [assertProposalId(proposalId)], proposalSchema);
  }

  async getActiveProposals(): Promise<Proposal[]> {
    return this.client.rpc("governance_getActiveProposals", [], z.array(proposalSchema));
  }

  async getAllProposals(): Promise<Proposal[]> {
    return this.client.rpc("governance_getAllProposals", [], z.array(proposalSchema));
  }

  async getVote(proposalId: number, voter: Address): Promise<Vote | undefined> {
    return this.client.rpcOptional(
      "governance_getVote",
      [assertProposalId(proposalId), normalizeAddress(voter, "voter")],
      voteSchema
    );
  }

  async getVotingPower(address: Address): Promise<bigint> {
    return this.client.rpc("governance_getVotingPower", [normalizeAddress(address)], bigintSchema);
  }

  async getQuorum(): Promise<bigint> {
    return this.client.rpc("governance_getQuorum", [], bigintSchema);
  }

  /** Status with quorum and timing context; `undefined` when the proposal does not exist. */
  async getProposalStatus(proposalId: number): Promise<ProposalStatusView | undefined> {
    const proposal = await this.getProposal(proposalId);
    if (proposal === undefined) return undefined;
    const [quorum, currentSlot] = await Promise.all([this.getQuorum(), this.client.getSlot()]);
    return {
      proposal,
      hasQuorum: proposal.votesFor + proposal.votesAgainst >= quorum,
      slotsRemaining: Math.max(0, proposal.endSlot - currentSlot),
      canExecute: proposal.status === "passed",
    };
  }

  async createProposal(title: string, description: string, votingSlots: number = DEFAULT_VOTING_SLOTS): Promise<Transaction> {
    const keyPair = requireKeyPair(this.keyPair, "create a proposal");
    if (title.length === 0 || title.length > MAX_TITLE_LENGTH) {
      throw new ValidationError(`title must be 1-${MAX_TITLE_LENGTH} characters`, "MALFORMED_FIELD", { field: "title" });
    }
    if (description.length === 0 || description.length > MAX_DESCRIPTION_LENGTH) {
      throw new ValidationError(`description must be 1-${MAX_DESCRIPTION_LENGTH} characters`, "MALFORMED_FIELD", {
        field: "description",
      });
    }
    if (!Number.isSafeInteger(votingSlots) || votingSlots <= 0) {
      throw new ValidationError(`votingSlots must be a positive integer (got ${votingSlots})`, "MALFORMED_FIELD", {
        field: "votingSlots",
      });
    }
    const data = encodeCall("createProposal", [arg.string(title), arg.string(description), arg.u64(votingSlots)]);
    return signContractCall(this.client, keyPair, this.contract, data);
  }

  async vote(proposalId: number, support: boolean): Promise<Transaction> {
    const keyPair = requireKeyPair(this.keyPair, "vote");
    const data = encodeCall("vote", [arg.u64(assertProposalId(proposalId)), arg.bool(support)]);
    return signContractCall(this.client, keyPair, this.contract, data);
  }

  async executeProposal(proposalId: number): Promise<Transaction> {
    const keyPair = requireKeyPair(this.keyPair, "execute a proposal");
    const data = encodeCall("executeProposal", [arg.u64(assertProposalId(proposalId))]);
    return signContractCall(this.client, keyPair, this.contract, data);
  }
}
