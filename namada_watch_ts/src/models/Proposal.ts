import { HexString, ProposalStatus, TallyType, VoteChoice } from '../types';
import { Address } from './Address';

export type AddRemove<T> = { op: 'add'; value: T } | { op: 'remove'; value: T };

export type PgfTarget =
  | { kind: 'internal'; target: Address; amount: bigint }
  | {
      kind: 'ibc';
      target: string;
      amount: bigint;
      portId: string;
      channelId: string;
    };

export type PgfAction =
  | { kind: 'continuous'; change: AddRemove<PgfTarget> }
  | { kind: 'retro'; target: PgfTarget };

export type ProposalType =
  | { kind: 'default'; dataHash: HexString | null }
  | { kind: 'pgfSteward'; changes: AddRemove<Address>[] }
  | { kind: 'pgfPayment'; actions: PgfAction[] };

/** A proposal as kept in governance storage. */
export interface StoredProposal {
  id: bigint;
  content: Record<string, string>;
  author: Address;
  proposalType: ProposalType;
  votingStartEpoch: bigint;
  votingEndEpoch: bigint;
  activationEpoch: bigint;
}

export interface ProposalTally {
  result: ProposalStatus.Passed | ProposalStatus.Rejected;
  tallyType: TallyType;
  totalVotingPower: bigint;
  totalYayPower: bigint;
  totalNayPower: bigint;
  totalAbstainPower: bigint;
}

export interface Vote {
  validator: Address;
  delegator: Address;
  choice: VoteChoice;
}

export interface ProposalRecord extends StoredProposal {
  readonly status: ProposalStatus;
  readonly tally: ProposalTally | null;
  /** Epoch the status was derived at. */
  readonly observedEpoch: bigint;
}

export function deriveProposalStatus(
  proposal: Pick<StoredProposal, 'votingStartEpoch' | 'votingEndEpoch'>,
  currentEpoch: bigint,
  tally: ProposalTally | null
): ProposalStatus {
  if (currentEpoch < proposal.votingStartEpoch) return ProposalStatus.Pending;
  if (currentEpoch <= proposal.votingEndEpoch) return ProposalStatus.OnGoing;
  return tally?.result ?? ProposalStatus.Unknown;
}

export function describeProposalType(proposalType: ProposalType): string {
  switch (proposalType.kind) {
    case 'default':
      return proposalType.dataHash ? `Default (hash ${proposalType.dataHash})` : 'Default';
    case 'pgfSteward':
      return `PGF steward: ${proposalType.changes
        .map((change) => `${change.op === 'add' ? 'Add' : 'Remove'}(${change.value})`)
        .join(', ')}`;
    case 'pgfPayment':
      return `PGF payment: ${proposalType.actions
        .map((action) =>
          action.kind === 'retro'
            ? `Retro(${action.target.target})`
            : `${action.change.op === 'add' ? 'Add' : 'Remove'}(${action.change.value.target})`
        )
        .join(', ')}`;
  }
}
