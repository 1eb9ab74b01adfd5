import { hexlify, toUtf8String } from 'ethers';
import { Address, RAW_ADDRESS_LENGTH } from '../models/Address';
import { DecodeError, HexString } from '../types';

const U256_BYTES = 32;
const U256_MAX = (1n << 256n) - 1n;
const I256_SIGN = 1n << 255n;

/**
 * Cursor over Borsh-encoded bytes. Every read checks the remaining length
 * first and names the field it was reading when it fails.
 */
export class BorshReader {
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {}

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  fixed(length: number, field: string): Uint8Array {
    if (this.remaining < length) {
      throw new DecodeError(
        'LengthMismatch',
        `need ${length} bytes, ${this.remaining} left`,
        field
      );
    }
    const slice = this.bytes.subarray(this.offset, this.offset + length);
    this.offset += length;
    return slice;
  }

  u8(field: string): number {
    return this.fixed(1, field)[0];
  }

  bool(field: string): boolean {
    const value = this.u8(field);
    if (value > 1) {
      throw new DecodeError('InvalidDiscriminant', `invalid bool ${value}`, field);
    }
    return value === 1;
  }

  u32(field: string): number {
    return Number(this.littleEndian(4, field));
  }

  u64(field: string): bigint {
    return this.littleEndian(8, field);
  }

  u256(field: string): bigint {
    return this.littleEndian(U256_BYTES, field);
  }

  /** Two's complement 256-bit integer. */
  i256(field: string): bigint {
    const raw = this.u256(field);
    return raw >= I256_SIGN ? raw - U256_MAX - 1n : raw;
  }

  hex(length: number, field: string): HexString {
    return hexlify(this.fixed(length, field));
  }

  string(field: string): string {
    const length = this.u32(`${field}.length`);
    const bytes = this.fixed(length, field);
    try {
      return toUtf8String(bytes);
    } catch {
      throw new DecodeError('InvalidEncoding', 'invalid UTF-8', field);
    }
  }

  address(field: string): Address {
    const raw = this.fixed(RAW_ADDRESS_LENGTH, field);
    try {
      return Address.fromRaw(raw);
    } catch (error) {
      if (error instanceof DecodeError) {
        throw new DecodeError(error.reason, error.message, field);
      }
      throw error;
    }
  }

  option<T>(field: string, read: () => T): T | null {
    const tag = this.u8(field);
    switch (tag) {
      case 0:
        return null;
      case 1:
        return read();
      default:
        throw new DecodeError('InvalidDiscriminant', `invalid option tag ${tag}`, field);
    }
  }

  vec<T>(field: string, read: (index: number) => T): T[] {
    const count = this.u32(`${field}.length`);
    const items: T[] = [];
    for (let i = 0; i < count; i++) {
      items.push(read(i));
    }
    return items;
  }

  stringMap(field: string): Record<string, string> {
    const count = this.u32(`${field}.length`);
    const entries: [string, string][] = [];
    for (let i = 0; i < count; i++) {
      const key = this.string(`${field}.key`);
      entries.push([key, this.string(`${field}.${key}`)]);
    }
    // Own properties, so a `__proto__` key is kept.
    return Object.fromEntries(entries);
  }

  /** Maps a one-byte discriminant through `variants`, failing on anything else. */
  variant<T>(field: string, variants: readonly T[]): T {
    const tag = this.u8(field);
    const value = variants[tag];
    if (value === undefined) {
      throw new DecodeError('InvalidDiscriminant', `unknown discriminant ${tag}`, field);
    }
    return value;
  }

  /** Fails unless every byte has been consumed. */
  finish(field: string): void {
    if (this.remaining !== 0) {
      throw new DecodeError(
        'LengthMismatch',
        `${this.remaining} unexpected trailing bytes`,
        field
      );
    }
  }

  private littleEndian(width: number, field: string): bigint {
    const bytes = this.fixed(width, field);
    let value = 0n;
    for (let i = width - 1; i >= 0; i--) {
      value = (value << 8n) | BigInt(bytes[i]);
    }
    return value;
  }
}
