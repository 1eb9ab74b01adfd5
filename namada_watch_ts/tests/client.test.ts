import { describe, expect, it } from 'vitest';
import { AbciClient } from '../src/client/AbciClient';
import { buildQuery } from '../src/client/QueryBuilder';
import { AbciTransport } from '../src/client/transport';
import { BorshWriter } from '../src/decoders/BorshWriter';
import { Address } from '../src/models/Address';
import { DecodeError, ProposalStatus, QueryResult, ValidatorState } from '../src/types';
import { ED25519_KEY, ED25519_TM_ADDRESS, ESTABLISHED, sequence } from './fixtures';

const validator = Address.decode(ESTABLISHED);

/** Answers queries from a path table; unknown paths read as empty values. */
class FakeTransport implements AbciTransport {
  readonly paths: string[] = [];
  private readonly responses = new Map<string, Uint8Array | Error>();

  on(path: string, response: Uint8Array | Error): this {
    this.responses.set(path, response);
    return this;
  }

  async rawQuery(path: string): Promise<Uint8Array> {
    this.paths.push(path);
    const response = this.responses.get(path);
    if (response instanceof Error) throw response;
    return response ?? new Uint8Array();
  }
}

function statusOf<T>(result: QueryResult<T>): string {
  return result.status;
}

function valueOf<T>(result: QueryResult<T>): T {
  if (result.status !== 'ok') throw new Error(`expected ok, got ${result.status}`);
  return result.value;
}

const validatorPath = (segment: string) => `/vp/pos/validator/${segment}/${ESTABLISHED}`;

function withValidator(transport: FakeTransport): FakeTransport {
  return transport
    .on(validatorPath('state'), new BorshWriter().u8(1).u8(0).u64(12n).toBytes())
    .on(
      validatorPath('commission'),
      new BorshWriter().u8(1).i256(50_000_000_000n).i256(10_000_000_000n).toBytes()
    )
    .on(validatorPath('stake'), new BorshWriter().u8(1).u256(2_000_000n).toBytes())
    .on(validatorPath('consensus_key'), new BorshWriter().u8(1).u8(0).bytes(sequence(32)).toBytes());
}

function proposalBytes(id: bigint, start: bigint, end: bigint): Uint8Array {
  return new BorshWriter()
    .u8(1)
    .u64(id)
    .u32(0)
    .address(validator)
    .u8(0)
    .u8(0)
    .u64(start)
    .u64(end)
    .u64(end + 2n)
    .toBytes();
}

describe('buildQuery', () => {
  it('puts the address in the path and its raw bytes in the data', () => {
    const query = buildQuery({ kind: 'validatorState', address: validator });
    expect(query.path).toBe(`/vp/pos/validator/state/${ESTABLISHED}`);
    expect(Array.from(query.data)).toEqual(Array.from(validator.bytes));
  });

  it.each([
    ['commission', 'commission'],
    ['stake', 'stake'],
    ['consensusKey', 'consensus_key'],
    ['metadata', 'metadata'],
  ] as const)('routes %s queries', (kind, segment) => {
    expect(buildQuery({ kind, address: validator }).path).toBe(validatorPath(segment));
  });

  it('encodes proposal ids as u64', () => {
    const query = buildQuery({ kind: 'proposal', id: 7n });
    expect(query.path).toBe('/vp/governance/proposal/7');
    expect(Array.from(query.data)).toEqual([7, 0, 0, 0, 0, 0, 0, 0]);
    expect(buildQuery({ kind: 'votes', id: 7n }).path).toBe('/vp/governance/proposal/7/votes');
    expect(buildQuery({ kind: 'proposalResult', id: 7n }).path).toBe(
      '/vp/governance/stored_proposal_result/7'
    );
  });

  it('sends no data for the epoch', () => {
    const query = buildQuery({ kind: 'epoch' });
    expect(query.path).toBe('/shell/epoch');
    expect(query.data).toHaveLength(0);
  });

  it('encodes consensus addresses as strings', () => {
    const query = buildQuery({ kind: 'address', consensusAddress: ED25519_TM_ADDRESS });
    expect(query.path).toBe(`/vp/pos/validator_by_tm_addr/${ED25519_TM_ADDRESS}`);
    expect(Array.from(query.data.subarray(0, 4))).toEqual([40, 0, 0, 0]);
    expect(query.data).toHaveLength(44);
  });

  it('refuses public keys in validator queries', () => {
    expect(() => buildQuery({ kind: 'stake', address: Address.decode(ED25519_KEY) })).toThrow(
      DecodeError
    );
  });
});

describe('AbciClient', () => {
  describe('queryValidator', () => {
    it('assembles a record from the four reads', async () => {
      const client = new AbciClient(withValidator(new FakeTransport()));
      const record = valueOf(await client.queryValidator(validator));

      expect(record.state).toBe(ValidatorState.Consensus);
      expect(record.commissionRate.toString()).toBe('0.05');
      expect(record.maxCommissionChangePerEpoch.toString()).toBe('0.01');
      expect(record.votingPower).toBe(2_000_000n);
      expect(record.consensusAddress).toBe(ED25519_TM_ADDRESS);
      expect(record.epoch).toBe(12n);
    });

    it('reports a missing state as not found', async () => {
      const client = new AbciClient(
        withValidator(new FakeTransport()).on(validatorPath('state'), Uint8Array.from([0]))
      );
      expect(await client.queryValidator(validator)).toEqual({ status: 'notFound' });
    });

    it('defaults a missing stake and key', async () => {
      const transport = withValidator(new FakeTransport())
        .on(validatorPath('stake'), new Uint8Array())
        .on(validatorPath('consensus_key'), Uint8Array.from([0]));
      const record = valueOf(await new AbciClient(transport).queryValidator(validator));

      expect(record.votingPower).toBe(0n);
      expect(record.consensusKey).toBeNull();
      expect(record.consensusAddress).toBeNull();
    });

    it('classifies transport failures', async () => {
      const transport = withValidator(new FakeTransport()).on(
        validatorPath('commission'),
        new Error('connect ECONNREFUSED 127.0.0.1:26657')
      );
      const result = await new AbciClient(transport).queryValidator(validator);

      if (result.status !== 'transportError') throw new Error(result.status);
      expect(result.error.retryable).toBe(true);
    });

    it('prefers the state failure over later ones', async () => {
      const transport = withValidator(new FakeTransport())
        .on(validatorPath('state'), Uint8Array.from([1]))
        .on(validatorPath('commission'), new Error('Internal error'));
      const result = await new AbciClient(transport).queryValidator(validator);

      if (result.status !== 'decodeError') throw new Error(result.status);
      expect(result.error.field).toBe('state');
    });

    it('turns a public key into a decode error without querying', async () => {
      const transport = new FakeTransport();
      const result = await new AbciClient(transport).queryValidator(Address.decode(ED25519_KEY));

      if (result.status !== 'decodeError') throw new Error(result.status);
      expect(result.error.reason).toBe('InvalidPrefix');
      expect(transport.paths).toEqual([]);
    });
  });

  describe('queryProposal', () => {
    const epoch = (value: bigint) => new BorshWriter().u64(value).toBytes();

    it('marks a proposal in its voting window as ongoing', async () => {
      const transport = new FakeTransport()
        .on('/vp/governance/proposal/1', proposalBytes(1n, 10n, 20n))
        .on('/shell/epoch', epoch(15n));
      const proposal = valueOf(await new AbciClient(transport).queryProposal(1n));

      expect(proposal.status).toBe(ProposalStatus.OnGoing);
      expect(proposal.tally).toBeNull();
      expect(proposal.observedEpoch).toBe(15n);
      expect(transport.paths).not.toContain('/vp/governance/stored_proposal_result/1');
    });

    it('takes the stored result once voting has ended', async () => {
      const transport = new FakeTransport()
        .on('/vp/governance/proposal/1', proposalBytes(1n, 10n, 20n))
        .on(
          '/vp/governance/stored_proposal_result/1',
          new BorshWriter().u8(1).u8(1).u8(1).u256(9n).u256(3n).u256(6n).u256(0n).toBytes()
        );
      const proposal = valueOf(await new AbciClient(transport).queryProposal(1n, 25n));

      expect(proposal.status).toBe(ProposalStatus.Rejected);
      expect(proposal.tally?.totalNayPower).toBe(6n);
      expect(transport.paths).not.toContain('/shell/epoch');
    });

    it('is unknown after voting while no result is stored', async () => {
      const transport = new FakeTransport().on(
        '/vp/governance/proposal/1',
        proposalBytes(1n, 10n, 20n)
      );
      const proposal = valueOf(await new AbciClient(transport).queryProposal(1n, 21n));
      expect(proposal.status).toBe(ProposalStatus.Unknown);
    });

    it('reports a missing proposal as not found', async () => {
      const transport = new FakeTransport().on('/shell/epoch', epoch(3n));
      expect(statusOf(await new AbciClient(transport).queryProposal(9n))).toBe('notFound');
    });
  });

  it('looks up operators by upper-cased consensus address', async () => {
    const transport = new FakeTransport().on(
      `/vp/pos/validator_by_tm_addr/${ED25519_TM_ADDRESS}`,
      new BorshWriter().u8(1).address(validator).toBytes()
    );
    const client = new AbciClient(transport);
    const operator = valueOf(await client.operatorByConsensusAddress(ED25519_TM_ADDRESS.toLowerCase()));

    expect(operator.encode()).toBe(ESTABLISHED);
  });

  it('reads validator metadata', async () => {
    const transport = new FakeTransport().on(
      validatorPath('metadata'),
      new BorshWriter().u8(1).string('ops@example.org').u8(0).u8(0).u8(0).u8(0).toBytes()
    );
    const metadata = valueOf(await new AbciClient(transport).validatorMetadata(validator));
    expect(metadata.email).toBe('ops@example.org');
    expect(metadata.website).toBeNull();
  });

  it('reads proposal votes', async () => {
    const transport = new FakeTransport().on(
      '/vp/governance/proposal/2/votes',
      new BorshWriter().u32(1).address(validator).address(validator).u8(0).toBytes()
    );
    const votes = valueOf(await new AbciClient(transport).proposalVotes(2n));
    expect(votes.map((vote) => vote.choice)).toEqual(['Yay']);
  });

  it('reads the current epoch', async () => {
    const transport = new FakeTransport().on('/shell/epoch', new BorshWriter().u64(88n).toBytes());
    expect(valueOf(await new AbciClient(transport).currentEpoch())).toBe(88n);
  });
});
