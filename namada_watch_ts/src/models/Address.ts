import { bech32m } from 'bech32';
import { hexlify } from 'ethers';
import {
  AddressKind,
  AddressPrefix,
  Bech32String,
  DecodeError,
  HexString,
} from '../types';
import { maybeCoerceError } from '../utils/helpers';

/** bech32m allows strings up to 1023 characters; the library default is 90. */
export const BECH32M_LIMIT = 1023;
export const ADDRESS_HASH_LENGTH = 20;
export const RAW_ADDRESS_LENGTH = ADDRESS_HASH_LENGTH + 1;

const IMPLICIT_DISCRIMINANT = 0;
const ESTABLISHED_DISCRIMINANT = 1;

const INTERNAL_ADDRESS_NAMES: Readonly<Record<number, string>> = {
  2: 'PoS',
  3: 'PosSlashPool',
  4: 'Parameters',
  5: 'Governance',
  6: 'Ibc',
  7: 'EthBridge',
  8: 'EthBridgePool',
  9: 'Multitoken',
  10: 'Pgf',
  11: 'Erc20',
  12: 'Nut',
  13: 'IbcToken',
  14: 'Masp',
  15: 'TempStorage',
  16: 'ReplayProtection',
};

// Borsh `PublicKey` tags and the key length that follows each.
const PUBLIC_KEY_LENGTHS: Readonly<Record<number, number>> = {
  0: 32,
  1: 33,
};

function parsePrefix(value: string): AddressPrefix | undefined {
  return Object.values(AddressPrefix).find((prefix) => prefix === value);
}

// A character outside the alphabet is a corrupted character like any other.
const CORRUPTED = /checksum|unknown character/i;

function decodeBech32m(text: string): { prefix: string; words: number[] } {
  try {
    return bech32m.decode(text, BECH32M_LIMIT);
  } catch (error) {
    const message = maybeCoerceError(error).message;
    throw new DecodeError(
      CORRUPTED.test(message) ? 'InvalidChecksum' : 'InvalidEncoding',
      message
    );
  }
}

function validatePayload(prefix: AddressPrefix, payload: Uint8Array): void {
  switch (prefix) {
    case AddressPrefix.Address: {
      if (payload.length !== RAW_ADDRESS_LENGTH) {
        throw new DecodeError(
          'InvalidLength',
          `expected ${RAW_ADDRESS_LENGTH} address bytes, got ${payload.length}`
        );
      }
      const discriminant = payload[0];
      if (
        discriminant !== IMPLICIT_DISCRIMINANT &&
        discriminant !== ESTABLISHED_DISCRIMINANT &&
        INTERNAL_ADDRESS_NAMES[discriminant] === undefined
      ) {
        throw new DecodeError(
          'InvalidDiscriminant',
          `unknown address discriminant ${discriminant}`
        );
      }
      return;
    }
    case AddressPrefix.PublicKey: {
      const keyLength = PUBLIC_KEY_LENGTHS[payload[0]];
      if (keyLength === undefined) {
        throw new DecodeError(
          'InvalidDiscriminant',
          `unknown public key scheme ${payload[0]}`
        );
      }
      if (payload.length !== keyLength + 1) {
        throw new DecodeError(
          'InvalidLength',
          `expected ${keyLength + 1} public key bytes, got ${payload.length}`
        );
      }
      return;
    }
  }
}

/**
 * A Namada address or public key in its human-readable bech32m form.
 *
 * `tnam` payloads are the 21-byte raw address (discriminant followed by the
 * 20-byte hash), which is also how addresses appear inside Borsh data.
 */
export class Address {
  private readonly payload: Uint8Array;

  constructor(
    public readonly prefix: AddressPrefix,
    payload: Uint8Array
  ) {
    validatePayload(prefix, payload);
    this.payload = Uint8Array.from(payload);
  }

  static decode(text: string): Address {
    if (text.length > BECH32M_LIMIT) {
      throw new DecodeError(
        'InvalidLength',
        `address exceeds ${BECH32M_LIMIT} characters`
      );
    }
    if (text !== text.toLowerCase() && text !== text.toUpperCase()) {
      throw new DecodeError('InvalidEncoding', `mixed-case address ${text}`);
    }

    const decoded = decodeBech32m(text);
    const prefix = parsePrefix(decoded.prefix);
    if (!prefix) {
      throw new DecodeError(
        'InvalidPrefix',
        `unrecognized prefix "${decoded.prefix}"`
      );
    }

    const payload = bech32m.fromWordsUnsafe(decoded.words);
    if (!payload) {
      throw new DecodeError('InvalidLength', 'address payload has invalid padding');
    }
    return new Address(prefix, Uint8Array.from(payload));
  }

  static fromRaw(raw: Uint8Array): Address {
    return new Address(AddressPrefix.Address, raw);
  }

  get bytes(): Uint8Array {
    return Uint8Array.from(this.payload);
  }

  get kind(): AddressKind {
    if (this.prefix !== AddressPrefix.Address) {
      throw new Error(`${this.encode()} is not an account address`);
    }
    switch (this.payload[0]) {
      case IMPLICIT_DISCRIMINANT:
        return AddressKind.Implicit;
      case ESTABLISHED_DISCRIMINANT:
        return AddressKind.Established;
      default:
        return AddressKind.Internal;
    }
  }

  /** Name of the internal account (`PoS`, `Governance`, ...), if this is one. */
  get internalName(): string | null {
    if (this.prefix !== AddressPrefix.Address) return null;
    return INTERNAL_ADDRESS_NAMES[this.payload[0]] ?? null;
  }

  get hash(): HexString {
    return hexlify(this.payload.subarray(1));
  }

  encode(): Bech32String {
    return bech32m.encode(this.prefix, bech32m.toWords(this.payload), BECH32M_LIMIT);
  }

  equals(other: Address): boolean {
    return (
      this.prefix === other.prefix &&
      this.payload.length === other.payload.length &&
      this.payload.every((byte, i) => byte === other.payload[i])
    );
  }

  toString(): string {
    return this.encode();
  }

  toJSON(): string {
    return this.encode();
  }
}
