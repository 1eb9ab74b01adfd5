import { BorshReader } from './BorshReader';
import { RecordDecoder } from './RecordDecoder';
import { Address } from '../models/Address';
import {
  AddRemove,
  PgfAction,
  PgfTarget,
  ProposalTally,
  ProposalType,
  StoredProposal,
  Vote,
} from '../models/Proposal';
import { DecodeError, ProposalStatus, TallyType, VoteChoice } from '../types';

const HASH_LENGTH = 32;

const TALLY_RESULTS = [ProposalStatus.Passed, ProposalStatus.Rejected] as const;

const TALLY_TYPES: readonly TallyType[] = [
  TallyType.TwoThirds,
  TallyType.OneHalfOverOneThird,
  TallyType.LessOneHalfOverOneThirdNay,
];

const VOTE_CHOICES: readonly VoteChoice[] = [VoteChoice.Yay, VoteChoice.Nay, VoteChoice.Abstain];

function readAddRemove<T>(
  reader: BorshReader,
  field: string,
  readValue: (field: string) => T
): AddRemove<T> {
  const op = reader.variant(field, ['add', 'remove'] as const);
  return { op, value: readValue(`${field}.value`) };
}

function readPgfTarget(reader: BorshReader, field: string): PgfTarget {
  const kind = reader.variant(field, ['internal', 'ibc'] as const);
  switch (kind) {
    case 'internal':
      return {
        kind,
        target: reader.address(`${field}.target`),
        amount: reader.u256(`${field}.amount`),
      };
    case 'ibc':
      return {
        kind,
        target: reader.string(`${field}.target`),
        amount: reader.u256(`${field}.amount`),
        portId: reader.string(`${field}.portId`),
        channelId: reader.string(`${field}.channelId`),
      };
  }
}

function readPgfAction(reader: BorshReader, field: string): PgfAction {
  const kind = reader.variant(field, ['continuous', 'retro'] as const);
  switch (kind) {
    case 'continuous':
      return {
        kind,
        change: readAddRemove(reader, `${field}.change`, (f) => readPgfTarget(reader, f)),
      };
    case 'retro':
      return { kind, target: readPgfTarget(reader, `${field}.target`) };
  }
}

function readProposalType(reader: BorshReader): ProposalType {
  const tag = reader.u8('proposal.type');
  switch (tag) {
    case 0:
      return {
        kind: 'default',
        dataHash: reader.option('proposal.type.hash', () => reader.hex(HASH_LENGTH, 'proposal.type.hash')),
      };
    case 1:
      return {
        kind: 'pgfSteward',
        changes: reader.vec('proposal.type.stewards', (i) =>
          readAddRemove(reader, `proposal.type.stewards[${i}]`, (f): Address => reader.address(f))
        ),
      };
    case 2:
      return {
        kind: 'pgfPayment',
        actions: reader.vec('proposal.type.actions', (i) =>
          readPgfAction(reader, `proposal.type.actions[${i}]`)
        ),
      };
    default:
      throw new DecodeError('InvalidDiscriminant', `unknown proposal type ${tag}`, 'proposal.type');
  }
}

export class ProposalDecoder extends RecordDecoder<StoredProposal> {
  readonly kind = 'proposal';

  protected parse(reader: BorshReader): StoredProposal {
    return {
      id: reader.u64('proposal.id'),
      content: reader.stringMap('proposal.content'),
      author: reader.address('proposal.author'),
      proposalType: readProposalType(reader),
      votingStartEpoch: reader.u64('proposal.votingStartEpoch'),
      votingEndEpoch: reader.u64('proposal.votingEndEpoch'),
      activationEpoch: reader.u64('proposal.activationEpoch'),
    };
  }
}

export class ProposalResultDecoder extends RecordDecoder<ProposalTally> {
  readonly kind = 'proposalResult';

  protected parse(reader: BorshReader): ProposalTally {
    return {
      result: reader.variant('proposalResult.result', TALLY_RESULTS),
      tallyType: reader.variant('proposalResult.tallyType', TALLY_TYPES),
      totalVotingPower: reader.u256('proposalResult.totalVotingPower'),
      totalYayPower: reader.u256('proposalResult.totalYayPower'),
      totalNayPower: reader.u256('proposalResult.totalNayPower'),
      totalAbstainPower: reader.u256('proposalResult.totalAbstainPower'),
    };
  }
}

export class VotesDecoder extends RecordDecoder<Vote[]> {
  readonly kind = 'votes';
  protected readonly optional = false;

  protected parse(reader: BorshReader): Vote[] {
    return reader.vec('votes', (i) => ({
      validator: reader.address(`votes[${i}].validator`),
      delegator: reader.address(`votes[${i}].delegator`),
      choice: reader.variant(`votes[${i}].choice`, VOTE_CHOICES),
    }));
  }
}
