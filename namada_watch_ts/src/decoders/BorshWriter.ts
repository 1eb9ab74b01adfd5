import { concat, getBytes, toUtf8Bytes } from 'ethers';
import { Address } from '../models/Address';

/** Builds Borsh-encoded bytes field by field. */
export class BorshWriter {
  private readonly chunks: Uint8Array[] = [];

  u8(value: number): this {
    this.chunks.push(new Uint8Array([value & 0xff]));
    return this;
  }

  u32(value: number): this {
    return this.littleEndian(BigInt(value), 4);
  }

  u64(value: bigint): this {
    return this.littleEndian(value, 8);
  }

  u256(value: bigint): this {
    return this.littleEndian(value, 32);
  }

  i256(value: bigint): this {
    return this.littleEndian(value < 0n ? (1n << 256n) + value : value, 32);
  }

  bytes(value: Uint8Array): this {
    this.chunks.push(Uint8Array.from(value));
    return this;
  }

  string(value: string): this {
    const encoded = toUtf8Bytes(value);
    return this.u32(encoded.length).bytes(encoded);
  }

  address(value: Address): this {
    return this.bytes(value.bytes);
  }

  option<T>(value: T | null, write: (value: T) => void): this {
    if (value === null) return this.u8(0);
    this.u8(1);
    write(value);
    return this;
  }

  toBytes(): Uint8Array {
    return getBytes(concat(this.chunks));
  }

  private littleEndian(value: bigint, width: number): this {
    if (value < 0n || value >= 1n << BigInt(width * 8)) {
      throw new RangeError(`${value} does not fit in ${width} bytes`);
    }
    const out = new Uint8Array(width);
    let rest = value;
    for (let i = 0; i < width; i++) {
      out[i] = Number(rest & 0xffn);
      rest >>= 8n;
    }
    this.chunks.push(out);
    return this;
  }
}
