export { Address, BECH32M_LIMIT, RAW_ADDRESS_LENGTH } from "./Address";
export { ConsensusKey, KeyScheme } from "./ConsensusKey";
export { Dec } from "./Dec";
export type {
  CommissionPair,
  ValidatorMetadata,
  ValidatorRecord,
  ValidatorStateReading,
} from "./Validator";
export type {
  AddRemove,
  PgfAction,
  PgfTarget,
  ProposalRecord,
  ProposalTally,
  ProposalType,
  StoredProposal,
  Vote,
} from "./Proposal";
export { deriveProposalStatus, describeProposalType } from "./Proposal";
