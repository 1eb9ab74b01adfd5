import { describe, expect, it } from 'vitest';
import { BorshWriter } from '../src/decoders/BorshWriter';
import { decodeResponse } from '../src/decoders/ResponseDecoder';
import { Address } from '../src/models/Address';
import { Dec } from '../src/models/Dec';
import {
  ProposalStatus,
  QueryResult,
  TallyType,
  ValidatorState,
  VoteChoice,
} from '../src/types';
import { ED25519_TM_ADDRESS, ESTABLISHED, IMPLICIT, POS, sequence } from './fixtures';

const established = Address.decode(ESTABLISHED);
const implicit = Address.decode(IMPLICIT);

function some(): BorshWriter {
  return new BorshWriter().u8(1);
}

function valueOf<T>(result: QueryResult<T>): T {
  if (result.status !== 'ok') throw new Error(`expected ok, got ${result.status}`);
  return result.value;
}

function errorOf<T>(result: QueryResult<T>): { reason: string; field?: string } {
  if (result.status !== 'decodeError') throw new Error(`expected decodeError, got ${result.status}`);
  return { reason: result.error.reason, field: result.error.field };
}

describe('decodeResponse', () => {
  describe('envelope', () => {
    it('treats an empty value and Option::None as not found', () => {
      expect(decodeResponse('validatorState', new Uint8Array())).toEqual({ status: 'notFound' });
      expect(decodeResponse('commission', Uint8Array.from([0]))).toEqual({ status: 'notFound' });
      expect(decodeResponse('votes', new Uint8Array())).toEqual({ status: 'notFound' });
    });

    it('rejects an option tag of 2', () => {
      expect(errorOf(decodeResponse('stake', Uint8Array.from([2, 0])))).toEqual({
        reason: 'InvalidDiscriminant',
        field: 'stake.option',
      });
    });

    it('rejects trailing bytes', () => {
      const bytes = some().u256(10n).u8(0).toBytes();
      expect(errorOf(decodeResponse('stake', bytes))).toEqual({
        reason: 'LengthMismatch',
        field: 'stake',
      });
    });
  });

  describe('validatorState', () => {
    it('decodes each known state', () => {
      expect(valueOf(decodeResponse('validatorState', Uint8Array.from([1, 0])))).toEqual({
        state: ValidatorState.Consensus,
        epoch: null,
      });
      expect(valueOf(decodeResponse('validatorState', Uint8Array.from([1, 4]))).state).toBe(
        ValidatorState.Jailed
      );
    });

    it('keeps the trailing epoch when present', () => {
      const bytes = some().u8(2).u64(77n).toBytes();
      expect(valueOf(decodeResponse('validatorState', bytes))).toEqual({
        state: ValidatorState.BelowThreshold,
        epoch: 77n,
      });
    });

    it('maps an unknown discriminant to Unknown', () => {
      expect(valueOf(decodeResponse('validatorState', Uint8Array.from([1, 9]))).state).toBe(
        ValidatorState.Unknown
      );
    });

    it('fails on a truncated value', () => {
      expect(errorOf(decodeResponse('validatorState', Uint8Array.from([1])))).toEqual({
        reason: 'LengthMismatch',
        field: 'state',
      });
    });
  });

  describe('commission', () => {
    it('decodes both rates', () => {
      const bytes = some().i256(50_000_000_000n).i256(10_000_000_000n).toBytes();
      const pair = valueOf(decodeResponse('commission', bytes));

      expect(pair.commissionRate.equals(Dec.fromString('0.05'))).toBe(true);
      expect(pair.maxCommissionChangePerEpoch.toString()).toBe('0.01');
      expect(pair.epoch).toBeNull();
    });

    it('rejects rates outside [0, 1]', () => {
      const tooHigh = some().i256(2n * Dec.SCALE).i256(0n).toBytes();
      expect(errorOf(decodeResponse('commission', tooHigh))).toEqual({
        reason: 'OutOfRange',
        field: 'commission.rate',
      });

      const negative = some().i256(0n).i256(-1n).toBytes();
      expect(errorOf(decodeResponse('commission', negative))).toEqual({
        reason: 'OutOfRange',
        field: 'commission.maxChange',
      });
    });

    it('fails when the second rate is cut short', () => {
      const bytes = some().i256(0n).bytes(sequence(16)).toBytes();
      expect(errorOf(decodeResponse('commission', bytes))).toEqual({
        reason: 'LengthMismatch',
        field: 'commission.maxChange',
      });
    });
  });

  it('decodes stake as a 256-bit amount', () => {
    expect(valueOf(decodeResponse('stake', some().u256(1_500_000n).toBytes()))).toBe(1_500_000n);
  });

  describe('consensusKey', () => {
    it('decodes an ed25519 key', () => {
      const bytes = some().u8(0).bytes(sequence(32)).toBytes();
      expect(valueOf(decodeResponse('consensusKey', bytes)).tendermintAddress).toBe(
        ED25519_TM_ADDRESS
      );
    });

    it('rejects an unknown scheme', () => {
      const bytes = some().u8(5).bytes(sequence(32)).toBytes();
      expect(errorOf(decodeResponse('consensusKey', bytes))).toEqual({
        reason: 'InvalidDiscriminant',
        field: 'consensusKey.scheme',
      });
    });
  });

  describe('metadata', () => {
    const base = () =>
      some()
        .string('ops@example.org')
        .option(null, () => undefined)
        .option('https://validator.example', () => undefined)
        .option(null, () => undefined)
        .option(null, () => undefined);

    it('decodes metadata without a name', () => {
      const writer = new BorshWriter()
        .u8(1)
        .string('ops@example.org')
        .u8(0)
        .u8(1)
        .string('https://validator.example')
        .u8(0)
        .u8(0);
      expect(valueOf(decodeResponse('metadata', writer.toBytes()))).toEqual({
        email: 'ops@example.org',
        description: null,
        website: 'https://validator.example',
        discordHandle: null,
        avatar: null,
        name: null,
      });
    });

    it('decodes the trailing name when present', () => {
      const writer = new BorshWriter()
        .u8(1)
        .string('ops@example.org')
        .u8(0)
        .u8(0)
        .u8(0)
        .u8(0)
        .u8(1)
        .string('Example Validator');
      expect(valueOf(decodeResponse('metadata', writer.toBytes())).name).toBe('Example Validator');
    });

    it('fails when an option carries no value', () => {
      // website is Some but its string is missing.
      const bytes = base().toBytes();
      expect(errorOf(decodeResponse('metadata', bytes))).toEqual({
        reason: 'LengthMismatch',
        field: 'metadata.website.length',
      });
    });
  });

  it('decodes an operator address', () => {
    const address = valueOf(decodeResponse('address', some().address(established).toBytes()));
    expect(address.encode()).toBe(ESTABLISHED);
  });

  it('decodes a bare epoch', () => {
    expect(valueOf(decodeResponse('epoch', new BorshWriter().u64(42n).toBytes()))).toBe(42n);
  });

  describe('proposal', () => {
    it('decodes a default proposal', () => {
      const bytes = some()
        .u64(3n)
        .u32(1)
        .string('title')
        .string('Raise limits')
        .address(established)
        .u8(0)
        .u8(0)
        .u64(10n)
        .u64(20n)
        .u64(22n)
        .toBytes();
      const proposal = valueOf(decodeResponse('proposal', bytes));

      expect(proposal.id).toBe(3n);
      expect(proposal.content).toEqual({ title: 'Raise limits' });
      expect(proposal.author.encode()).toBe(ESTABLISHED);
      expect(proposal.proposalType).toEqual({ kind: 'default', dataHash: null });
      expect([proposal.votingStartEpoch, proposal.votingEndEpoch, proposal.activationEpoch]).toEqual(
        [10n, 20n, 22n]
      );
    });

    it('decodes steward changes', () => {
      const bytes = some()
        .u64(4n)
        .u32(0)
        .address(established)
        .u8(1)
        .u32(2)
        .u8(0)
        .address(implicit)
        .u8(1)
        .address(established)
        .u64(1n)
        .u64(2n)
        .u64(3n)
        .toBytes();
      const { proposalType } = valueOf(decodeResponse('proposal', bytes));

      if (proposalType.kind !== 'pgfSteward') throw new Error(proposalType.kind);
      expect(proposalType.changes.map(({ op, value }) => [op, value.encode()])).toEqual([
        ['add', IMPLICIT],
        ['remove', ESTABLISHED],
      ]);
    });

    it('decodes a retro PGF payment', () => {
      const bytes = some()
        .u64(5n)
        .u32(0)
        .address(established)
        .u8(2)
        .u32(1)
        .u8(1)
        .u8(0)
        .address(implicit)
        .u256(1_000_000n)
        .u64(1n)
        .u64(2n)
        .u64(3n)
        .toBytes();
      const { proposalType } = valueOf(decodeResponse('proposal', bytes));

      expect(proposalType).toEqual({
        kind: 'pgfPayment',
        actions: [
          { kind: 'retro', target: { kind: 'internal', target: implicit, amount: 1_000_000n } },
        ],
      });
    });

    it('rejects an unknown proposal type', () => {
      const bytes = some().u64(6n).u32(0).address(established).u8(7).toBytes();
      expect(errorOf(decodeResponse('proposal', bytes))).toEqual({
        reason: 'InvalidDiscriminant',
        field: 'proposal.type',
      });
    });

    it('rejects an author with an unknown discriminant', () => {
      const bytes = some()
        .u64(6n)
        .u32(0)
        .bytes(Uint8Array.from([99, ...sequence(20)]))
        .toBytes();
      expect(errorOf(decodeResponse('proposal', bytes))).toEqual({
        reason: 'InvalidDiscriminant',
        field: 'proposal.author',
      });
    });
  });

  it('decodes a stored proposal result', () => {
    const bytes = some().u8(0).u8(0).u256(100n).u256(70n).u256(20n).u256(10n).toBytes();
    expect(valueOf(decodeResponse('proposalResult', bytes))).toEqual({
      result: ProposalStatus.Passed,
      tallyType: TallyType.TwoThirds,
      totalVotingPower: 100n,
      totalYayPower: 70n,
      totalNayPower: 20n,
      totalAbstainPower: 10n,
    });
  });

  it('decodes votes', () => {
    const pos = Address.decode(POS);
    const bytes = new BorshWriter().u32(1).address(established).address(pos).u8(1).toBytes();
    const votes = valueOf(decodeResponse('votes', bytes));

    expect(votes).toHaveLength(1);
    expect(votes[0].validator.encode()).toBe(ESTABLISHED);
    expect(votes[0].delegator.encode()).toBe(POS);
    expect(votes[0].choice).toBe(VoteChoice.Nay);
  });
});
