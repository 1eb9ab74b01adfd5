import Decimal from 'decimal.js';

// 256-bit values have up to 78 digits; the default 20 would round them.
const D = Decimal.clone({ precision: 96 });

/**
 * Fixed-point decimal stored as an integer scaled by 10^12, the layout the
 * chain uses for rates such as commission.
 */
export class Dec {
  static readonly PRECISION = 12;
  static readonly SCALE = 10n ** BigInt(Dec.PRECISION);
  static readonly ZERO = new Dec(0n);
  static readonly ONE = new Dec(Dec.SCALE);

  constructor(public readonly scaled: bigint) {}

  static fromString(value: string | number): Dec {
    const scaled = new D(value.toString()).mul(new D(10).pow(Dec.PRECISION));
    if (!scaled.isInteger()) {
      throw new Error(`${value} has more than ${Dec.PRECISION} decimal places`);
    }
    return new Dec(BigInt(scaled.toFixed(0)));
  }

  toDecimal(): Decimal {
    return new D(this.scaled.toString()).div(new D(10).pow(Dec.PRECISION));
  }

  isWithinUnitInterval(): boolean {
    return this.scaled >= 0n && this.scaled <= Dec.SCALE;
  }

  equals(other: Dec): boolean {
    return this.scaled === other.scaled;
  }

  toPercent(): string {
    return `${this.toDecimal().mul(100).toFixed()}%`;
  }

  toString(): string {
    return this.toDecimal().toFixed();
  }

  toJSON(): string {
    return this.toString();
  }
}
