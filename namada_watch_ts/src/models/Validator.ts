import { TendermintAddress, ValidatorState } from '../types';
import { Address } from './Address';
import { ConsensusKey } from './ConsensusKey';
import { Dec } from './Dec';

export interface ValidatorStateReading {
  state: ValidatorState;
  /** Epoch the node evaluated the state at; older nodes omit it. */
  epoch: bigint | null;
}

export interface CommissionPair {
  commissionRate: Dec;
  maxCommissionChangePerEpoch: Dec;
  epoch: bigint | null;
}

export interface ValidatorMetadata {
  email: string;
  description: string | null;
  website: string | null;
  discordHandle: string | null;
  avatar: string | null;
  name: string | null;
}

export interface ValidatorRecord {
  readonly address: Address;
  readonly consensusKey: ConsensusKey | null;
  readonly consensusAddress: TendermintAddress | null;
  readonly state: ValidatorState;
  readonly commissionRate: Dec;
  readonly maxCommissionChangePerEpoch: Dec;
  /** Bonded stake in the native token's smallest unit. */
  readonly votingPower: bigint;
  readonly epoch: bigint | null;
}
