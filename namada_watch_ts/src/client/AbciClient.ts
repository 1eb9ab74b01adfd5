import { AbciQuery, buildQuery, QueryRequest } from './QueryBuilder';
import { AbciTransport, classifyTransportError } from './transport';
import { decodeResponse, RecordByKind } from '../decoders/ResponseDecoder';
import { Address } from '../models/Address';
import { deriveProposalStatus, ProposalRecord, ProposalTally, Vote } from '../models/Proposal';
import { ValidatorMetadata, ValidatorRecord } from '../models/Validator';
import {
  DecodeError,
  isFailure,
  NOT_FOUND,
  ok,
  QueryResult,
  TendermintAddress,
} from '../types';
import { getLogger, Logger } from '../utils/logger';

export type ResultFor<R extends QueryRequest> = QueryResult<RecordByKind[R['kind']]>;

export interface ValidatorSource {
  queryValidator(address: Address, height?: number): Promise<QueryResult<ValidatorRecord>>;
}

export interface ProposalSource {
  currentEpoch(): Promise<QueryResult<bigint>>;
  queryProposal(id: bigint, epoch?: bigint): Promise<QueryResult<ProposalRecord>>;
}

/**
 * Typed reads over an ABCI transport. Holds no state between calls, so any
 * number of queries may be in flight at once.
 */
export class AbciClient implements ValidatorSource, ProposalSource {
  constructor(
    private readonly transport: AbciTransport,
    private readonly logger: Logger = getLogger('abci')
  ) {}

  async query<R extends QueryRequest>(request: R, height?: number): Promise<ResultFor<R>> {
    let query: AbciQuery;
    try {
      query = buildQuery(request);
    } catch (error) {
      if (error instanceof DecodeError) return { status: 'decodeError', error };
      throw error;
    }

    let bytes: Uint8Array;
    try {
      bytes = await this.transport.rawQuery(query.path, query.data, height);
    } catch (error) {
      const failure = classifyTransportError(error);
      this.logger.debug(`${query.path}: ${failure.message}`);
      return { status: 'transportError', error: failure };
    }

    return decodeResponse<R['kind']>(request.kind, bytes);
  }

  /**
   * Reads state, commission, stake and consensus key concurrently and
   * assembles them. A validator without state or commission is treated as
   * absent; a missing stake counts as zero voting power.
   */
  async queryValidator(address: Address, height?: number): Promise<QueryResult<ValidatorRecord>> {
    const [state, commission, stake, consensusKey] = await Promise.all([
      this.query({ kind: 'validatorState', address }, height),
      this.query({ kind: 'commission', address }, height),
      this.query({ kind: 'stake', address }, height),
      this.query({ kind: 'consensusKey', address }, height),
    ]);

    if (isFailure(state)) return state;
    if (isFailure(commission)) return commission;
    if (isFailure(stake)) return stake;
    if (isFailure(consensusKey)) return consensusKey;
    if (state.status === 'notFound' || commission.status === 'notFound') return NOT_FOUND;

    const key = consensusKey.status === 'ok' ? consensusKey.value : null;
    return ok({
      address,
      consensusKey: key,
      consensusAddress: key?.tendermintAddress ?? null,
      state: state.value.state,
      commissionRate: commission.value.commissionRate,
      maxCommissionChangePerEpoch: commission.value.maxCommissionChangePerEpoch,
      votingPower: stake.status === 'ok' ? stake.value : 0n,
      epoch: state.value.epoch ?? commission.value.epoch,
    });
  }

  /**
   * Reads a proposal and derives its status at `epoch` (the node's current
   * epoch when omitted). The stored tally is fetched once voting has ended.
   */
  async queryProposal(id: bigint, epoch?: bigint): Promise<QueryResult<ProposalRecord>> {
    const [proposal, current] = await Promise.all([
      this.query({ kind: 'proposal', id }),
      epoch === undefined ? this.currentEpoch() : Promise.resolve(ok(epoch)),
    ]);

    if (isFailure(proposal)) return proposal;
    if (isFailure(current)) return current;
    if (proposal.status === 'notFound') return NOT_FOUND;
    if (current.status === 'notFound') {
      return {
        status: 'decodeError',
        error: new DecodeError('LengthMismatch', 'node returned no epoch', 'epoch'),
      };
    }

    let tally: ProposalTally | null = null;
    if (current.value > proposal.value.votingEndEpoch) {
      const result = await this.query({ kind: 'proposalResult', id });
      if (isFailure(result)) return result;
      tally = result.status === 'ok' ? result.value : null;
    }

    return ok({
      ...proposal.value,
      status: deriveProposalStatus(proposal.value, current.value, tally),
      tally,
      observedEpoch: current.value,
    });
  }

  currentEpoch(): Promise<QueryResult<bigint>> {
    return this.query({ kind: 'epoch' });
  }

  operatorByConsensusAddress(consensusAddress: TendermintAddress): Promise<QueryResult<Address>> {
    return this.query({ kind: 'address', consensusAddress: consensusAddress.toUpperCase() });
  }

  validatorMetadata(address: Address): Promise<QueryResult<ValidatorMetadata>> {
    return this.query({ kind: 'metadata', address });
  }

  proposalVotes(id: bigint): Promise<QueryResult<Vote[]>> {
    return this.query({ kind: 'votes', id });
  }
}
