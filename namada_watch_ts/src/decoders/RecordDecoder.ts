import { BorshReader } from './BorshReader';
import { DecodeError, NOT_FOUND, QueryResult, RecordKind, ok } from '../types';

/**
 * Base for the per-kind decoders. Handles the envelope shared by every ABCI
 * storage read: an empty value means the key is absent, and most values are
 * wrapped in a Borsh `Option`.
 */
export abstract class RecordDecoder<T> {
  abstract readonly kind: RecordKind;

  /** Whether the value arrives wrapped in a Borsh `Option`. */
  protected readonly optional: boolean = true;

  decode(bytes: Uint8Array): QueryResult<T> {
    if (bytes.length === 0) return NOT_FOUND;

    const reader = new BorshReader(bytes);
    try {
      if (this.optional && !reader.bool(`${this.kind}.option`)) {
        return NOT_FOUND;
      }
      const value = this.parse(reader);
      reader.finish(this.kind);
      return ok(value);
    } catch (error) {
      if (error instanceof DecodeError) {
        return { status: 'decodeError', error };
      }
      throw error;
    }
  }

  protected abstract parse(reader: BorshReader): T;

  /** Newer nodes append the epoch a value was read at. */
  protected trailingEpoch(reader: BorshReader): bigint | null {
    return reader.remaining === 0 ? null : reader.u64(`${this.kind}.epoch`);
  }
}
