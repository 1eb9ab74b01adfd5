import { BorshWriter } from '../decoders/BorshWriter';
import { Address } from '../models/Address';
import { AddressPrefix, DecodeError, TendermintAddress } from '../types';

export interface ValidatorStatusRequest {
  kind: 'validatorState';
  address: Address;
}

export interface CommissionRequest {
  kind: 'commission';
  address: Address;
}

export interface StakeRequest {
  kind: 'stake';
  address: Address;
}

export interface ConsensusKeyRequest {
  kind: 'consensusKey';
  address: Address;
}

export interface MetadataRequest {
  kind: 'metadata';
  address: Address;
}

export interface OperatorAddressRequest {
  kind: 'address';
  consensusAddress: TendermintAddress;
}

export interface EpochRequest {
  kind: 'epoch';
}

export interface ProposalRequest {
  kind: 'proposal';
  id: bigint;
}

export interface ProposalResultRequest {
  kind: 'proposalResult';
  id: bigint;
}

export interface ProposalVotesRequest {
  kind: 'votes';
  id: bigint;
}

export type QueryRequest =
  | ValidatorStatusRequest
  | CommissionRequest
  | StakeRequest
  | ConsensusKeyRequest
  | MetadataRequest
  | OperatorAddressRequest
  | EpochRequest
  | ProposalRequest
  | ProposalResultRequest
  | ProposalVotesRequest;

export interface AbciQuery {
  path: string;
  /** Borsh encoding of the key the path names. */
  data: Uint8Array;
}

function validatorQuery(segment: string, address: Address): AbciQuery {
  if (address.prefix !== AddressPrefix.Address) {
    throw new DecodeError(
      'InvalidPrefix',
      `validator queries need a ${AddressPrefix.Address} address, got ${address.prefix}`
    );
  }
  return {
    path: `/vp/pos/validator/${segment}/${address.encode()}`,
    data: new BorshWriter().address(address).toBytes(),
  };
}

function proposalQuery(path: string, id: bigint): AbciQuery {
  return { path, data: new BorshWriter().u64(id).toBytes() };
}

export function buildQuery(request: QueryRequest): AbciQuery {
  switch (request.kind) {
    case 'validatorState':
      return validatorQuery('state', request.address);
    case 'commission':
      return validatorQuery('commission', request.address);
    case 'stake':
      return validatorQuery('stake', request.address);
    case 'consensusKey':
      return validatorQuery('consensus_key', request.address);
    case 'metadata':
      return validatorQuery('metadata', request.address);
    case 'address':
      return {
        path: `/vp/pos/validator_by_tm_addr/${request.consensusAddress}`,
        data: new BorshWriter().string(request.consensusAddress).toBytes(),
      };
    case 'epoch':
      return { path: '/shell/epoch', data: new Uint8Array() };
    case 'proposal':
      return proposalQuery(`/vp/governance/proposal/${request.id}`, request.id);
    case 'proposalResult':
      return proposalQuery(`/vp/governance/stored_proposal_result/${request.id}`, request.id);
    case 'votes':
      return proposalQuery(`/vp/governance/proposal/${request.id}/votes`, request.id);
  }
}
