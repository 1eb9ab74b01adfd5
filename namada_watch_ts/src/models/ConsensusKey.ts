import { concat, dataSlice, getBytes, hexlify, ripemd160, sha256 } from 'ethers';
import { AddressPrefix, HexString, TendermintAddress } from '../types';
import { Address } from './Address';

export enum KeyScheme {
  Ed25519 = 'ed25519',
  Secp256k1 = 'secp256k1',
}

const SCHEME_TAGS: Record<KeyScheme, number> = {
  [KeyScheme.Ed25519]: 0,
  [KeyScheme.Secp256k1]: 1,
};

const KEY_LENGTHS: Record<KeyScheme, number> = {
  [KeyScheme.Ed25519]: 32,
  [KeyScheme.Secp256k1]: 33,
};

export function schemeFromTag(tag: number): KeyScheme | undefined {
  return Object.values(KeyScheme).find((scheme) => SCHEME_TAGS[scheme] === tag);
}

export function keyLength(scheme: KeyScheme): number {
  return KEY_LENGTHS[scheme];
}

/** A validator's consensus public key. */
export class ConsensusKey {
  private readonly key: Uint8Array;

  constructor(
    public readonly scheme: KeyScheme,
    key: Uint8Array
  ) {
    if (key.length !== KEY_LENGTHS[scheme]) {
      throw new Error(
        `${scheme} keys are ${KEY_LENGTHS[scheme]} bytes, got ${key.length}`
      );
    }
    this.key = Uint8Array.from(key);
  }

  static fromAddress(address: Address): ConsensusKey {
    if (address.prefix !== AddressPrefix.PublicKey) {
      throw new Error(`${address.encode()} is not a public key`);
    }
    const bytes = address.bytes;
    const scheme = schemeFromTag(bytes[0]);
    if (!scheme) {
      throw new Error(`unknown key scheme ${bytes[0]}`);
    }
    return new ConsensusKey(scheme, bytes.subarray(1));
  }

  get hex(): HexString {
    return hexlify(this.key);
  }

  /**
   * The address CometBFT uses for this key: the first 20 bytes of the
   * SHA-256 digest for ed25519, RIPEMD-160 of the SHA-256 digest for
   * secp256k1.
   */
  get tendermintAddress(): TendermintAddress {
    const digest =
      this.scheme === KeyScheme.Ed25519
        ? dataSlice(sha256(this.key), 0, 20)
        : ripemd160(sha256(this.key));
    return digest.slice(2).toUpperCase();
  }

  toAddress(): Address {
    return new Address(
      AddressPrefix.PublicKey,
      getBytes(concat([new Uint8Array([SCHEME_TAGS[this.scheme]]), this.key]))
    );
  }

  equals(other: ConsensusKey): boolean {
    return this.scheme === other.scheme && this.hex === other.hex;
  }

  toString(): string {
    return `${this.scheme}(${this.hex})`;
  }
}
