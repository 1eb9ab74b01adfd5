import { Address } from '../src/models/Address';
import { Dec } from '../src/models/Dec';
import { ValidatorRecord } from '../src/models/Validator';
import { Notifier, WatchEvent } from '../src/monitor/Notifier';
import { ValidatorState } from '../src/types';

/** Established account whose hash is the bytes 0x01..0x14. */
export const ESTABLISHED = 'tnam1qyqsyqcyq5rqwzqfpg9scrgwpugpzysnzsvac3h3';
/** Implicit account whose hash is twenty 0xab bytes. */
export const IMPLICIT = 'tnam1qz46h2at4w46h2at4w46h2at4w46h2at4vgcj7rm';
/** The PoS internal address. */
export const POS = 'tnam1qgqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqc8j2fp';
/** ed25519 key 0x00..0x1f. */
export const ED25519_KEY = 'tpknam1qqqqzqsrqszsvpcgpy9qkrqdpc83qygjzv2p29shrqv35xcur50p7lgw8k3';
export const ED25519_TM_ADDRESS = '630DCD2966C4336691125448BBB25B4FF412A49C';

export function sequence(length: number, start = 0): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => (start + i) & 0xff);
}

export function validatorRecord(overrides: Partial<ValidatorRecord> = {}): ValidatorRecord {
  return {
    address: Address.decode(ESTABLISHED),
    consensusKey: null,
    consensusAddress: null,
    state: ValidatorState.Consensus,
    commissionRate: Dec.fromString('0.05'),
    maxCommissionChangePerEpoch: Dec.fromString('0.01'),
    votingPower: 1_500_000n,
    epoch: 10n,
    ...overrides,
  };
}

export class RecordingNotifier implements Notifier {
  readonly events: WatchEvent[] = [];

  async notify(event: WatchEvent): Promise<void> {
    this.events.push(event);
  }
}
