import { RecordDecoder } from './RecordDecoder';
import {
  AddressDecoder,
  CommissionDecoder,
  ConsensusKeyDecoder,
  EpochDecoder,
  MetadataDecoder,
  StakeDecoder,
  ValidatorStateDecoder,
} from './ValidatorDecoders';
import { ProposalDecoder, ProposalResultDecoder, VotesDecoder } from './GovernanceDecoders';
import { Address } from '../models/Address';
import { ConsensusKey } from '../models/ConsensusKey';
import { ProposalTally, StoredProposal, Vote } from '../models/Proposal';
import { CommissionPair, ValidatorMetadata, ValidatorStateReading } from '../models/Validator';
import { QueryResult, RecordKind } from '../types';

export interface RecordByKind {
  validatorState: ValidatorStateReading;
  commission: CommissionPair;
  stake: bigint;
  consensusKey: ConsensusKey;
  metadata: ValidatorMetadata;
  address: Address;
  epoch: bigint;
  proposal: StoredProposal;
  proposalResult: ProposalTally;
  votes: Vote[];
}

type DecoderTable = { [K in RecordKind]: RecordDecoder<RecordByKind[K]> };

// A kind without an entry here is a compile error.
const DECODERS: DecoderTable = {
  validatorState: new ValidatorStateDecoder(),
  commission: new CommissionDecoder(),
  stake: new StakeDecoder(),
  consensusKey: new ConsensusKeyDecoder(),
  metadata: new MetadataDecoder(),
  address: new AddressDecoder(),
  epoch: new EpochDecoder(),
  proposal: new ProposalDecoder(),
  proposalResult: new ProposalResultDecoder(),
  votes: new VotesDecoder(),
};

/** Decodes the raw value of an ABCI query for the expected record kind. */
export function decodeResponse<K extends RecordKind>(
  kind: K,
  bytes: Uint8Array
): QueryResult<RecordByKind[K]> {
  const decoder: RecordDecoder<RecordByKind[K]> = DECODERS[kind];
  return decoder.decode(bytes);
}
