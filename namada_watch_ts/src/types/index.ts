export type HexString = string;
export type Bech32String = string;
/** CometBFT consensus address: upper-case hex of the 20-byte key hash. */
export type TendermintAddress = string;

export enum AddressPrefix {
  Address = "tnam",
  PublicKey = "tpknam",
}

export enum AddressKind {
  Implicit = "implicit",
  Established = "established",
  Internal = "internal",
}

export enum ValidatorState {
  Consensus = "Consensus",
  BelowCapacity = "BelowCapacity",
  BelowThreshold = "BelowThreshold",
  Inactive = "Inactive",
  Jailed = "Jailed",
  Unknown = "Unknown",
}

export enum ProposalStatus {
  Pending = "Pending",
  OnGoing = "OnGoing",
  Passed = "Passed",
  Rejected = "Rejected",
  Unknown = "Unknown",
}

export enum TallyType {
  TwoThirds = "TwoThirds",
  OneHalfOverOneThird = "OneHalfOverOneThird",
  LessOneHalfOverOneThirdNay = "LessOneHalfOverOneThirdNay",
}

export enum VoteChoice {
  Yay = "Yay",
  Nay = "Nay",
  Abstain = "Abstain",
}

export type DecodeErrorReason =
  | "LengthMismatch"
  | "InvalidDiscriminant"
  | "OutOfRange"
  | "InvalidEncoding"
  | "InvalidChecksum"
  | "InvalidPrefix"
  | "InvalidLength";

export class DecodeError extends Error {
  constructor(
    public readonly reason: DecodeErrorReason,
    message: string,
    public readonly field?: string
  ) {
    super(field ? `${field}: ${message}` : message);
    this.name = "DecodeError";
  }
}

export class TransportError extends Error {
  constructor(
    message: string,
    public readonly retryable: boolean,
    public readonly code?: number
  ) {
    super(message);
    this.name = "TransportError";
  }
}

export type QueryResult<T> =
  | { status: "ok"; value: T }
  | { status: "notFound" }
  | { status: "transportError"; error: TransportError }
  | { status: "decodeError"; error: DecodeError };

export function ok<T>(value: T): QueryResult<T> {
  return { status: "ok", value };
}

export const NOT_FOUND = { status: "notFound" } as const;

export function isFailure<T>(
  result: QueryResult<T>
): result is Extract<QueryResult<T>, { status: "transportError" | "decodeError" }> {
  return result.status === "transportError" || result.status === "decodeError";
}

/** Record kinds the response decoder understands. */
export type RecordKind =
  | "validatorState"
  | "commission"
  | "stake"
  | "consensusKey"
  | "metadata"
  | "address"
  | "epoch"
  | "proposal"
  | "proposalResult"
  | "votes";
