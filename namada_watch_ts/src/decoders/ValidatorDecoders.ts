import { BorshReader } from './BorshReader';
import { RecordDecoder } from './RecordDecoder';
import { Address } from '../models/Address';
import { ConsensusKey, keyLength, schemeFromTag } from '../models/ConsensusKey';
import { Dec } from '../models/Dec';
import { CommissionPair, ValidatorMetadata, ValidatorStateReading } from '../models/Validator';
import { DecodeError, ValidatorState } from '../types';

// Discriminant order of the on-chain enum.
const VALIDATOR_STATES: readonly ValidatorState[] = [
  ValidatorState.Consensus,
  ValidatorState.BelowCapacity,
  ValidatorState.BelowThreshold,
  ValidatorState.Inactive,
  ValidatorState.Jailed,
];

function readRate(reader: BorshReader, field: string): Dec {
  const rate = new Dec(reader.i256(field));
  if (!rate.isWithinUnitInterval()) {
    throw new DecodeError('OutOfRange', `${rate} is outside [0, 1]`, field);
  }
  return rate;
}

export class ValidatorStateDecoder extends RecordDecoder<ValidatorStateReading> {
  readonly kind = 'validatorState';

  protected parse(reader: BorshReader): ValidatorStateReading {
    // Unknown discriminants come from newer chain versions; keep polling.
    const state = VALIDATOR_STATES[reader.u8('state')] ?? ValidatorState.Unknown;
    return { state, epoch: this.trailingEpoch(reader) };
  }
}

export class CommissionDecoder extends RecordDecoder<CommissionPair> {
  readonly kind = 'commission';

  protected parse(reader: BorshReader): CommissionPair {
    const commissionRate = readRate(reader, 'commission.rate');
    const maxCommissionChangePerEpoch = readRate(reader, 'commission.maxChange');
    return {
      commissionRate,
      maxCommissionChangePerEpoch,
      epoch: this.trailingEpoch(reader),
    };
  }
}

export class StakeDecoder extends RecordDecoder<bigint> {
  readonly kind = 'stake';

  protected parse(reader: BorshReader): bigint {
    return reader.u256('stake');
  }
}

export class ConsensusKeyDecoder extends RecordDecoder<ConsensusKey> {
  readonly kind = 'consensusKey';

  protected parse(reader: BorshReader): ConsensusKey {
    const tag = reader.u8('consensusKey.scheme');
    const scheme = schemeFromTag(tag);
    if (!scheme) {
      throw new DecodeError('InvalidDiscriminant', `unknown key scheme ${tag}`, 'consensusKey.scheme');
    }
    return new ConsensusKey(scheme, reader.fixed(keyLength(scheme), 'consensusKey.key'));
  }
}

export class MetadataDecoder extends RecordDecoder<ValidatorMetadata> {
  readonly kind = 'metadata';

  protected parse(reader: BorshReader): ValidatorMetadata {
    const optionalString = (field: string) => reader.option(field, () => reader.string(field));
    const metadata: ValidatorMetadata = {
      email: reader.string('metadata.email'),
      description: optionalString('metadata.description'),
      website: optionalString('metadata.website'),
      discordHandle: optionalString('metadata.discordHandle'),
      avatar: optionalString('metadata.avatar'),
      name: null,
    };
    if (reader.remaining > 0) {
      metadata.name = optionalString('metadata.name');
    }
    return metadata;
  }
}

export class AddressDecoder extends RecordDecoder<Address> {
  readonly kind = 'address';

  protected parse(reader: BorshReader): Address {
    return reader.address('address');
  }
}

export class EpochDecoder extends RecordDecoder<bigint> {
  readonly kind = 'epoch';
  protected readonly optional = false;

  protected parse(reader: BorshReader): bigint {
    return reader.u64('epoch');
  }
}
