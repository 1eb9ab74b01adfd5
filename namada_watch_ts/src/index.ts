export * from "./types";
export * from "./models";

export { BorshReader } from "./decoders/BorshReader";
export { BorshWriter } from "./decoders/BorshWriter";
export { decodeResponse } from "./decoders/ResponseDecoder";
export type { RecordByKind } from "./decoders/ResponseDecoder";

export { buildQuery } from "./client/QueryBuilder";
export type { AbciQuery, QueryRequest } from "./client/QueryBuilder";
export { classifyTransportError } from "./client/transport";
export type { AbciTransport } from "./client/transport";
export { CometTransport } from "./client/CometTransport";
export type { CometBackend, CometTransportOptions, ConsensusValidator } from "./client/CometTransport";
export { AbciClient } from "./client/AbciClient";
export type { ProposalSource, ResultFor, ValidatorSource } from "./client/AbciClient";

export { DEFAULT_CHANGE_POLICY, diffProposal, diffValidator } from "./monitor/ChangeDetector";
export type {
  ChangePolicy,
  ProposalChange,
  ValidatorChange,
  ValidatorChangeSet,
} from "./monitor/ChangeDetector";
export { describeChange, describeEvent, LoggingNotifier } from "./monitor/Notifier";
export type { Notifier, WatchEvent } from "./monitor/Notifier";
export { WatchState } from "./monitor/WatchState";
export type { WatchEntry, WatchPhase } from "./monitor/WatchState";
export { PollingOrchestrator } from "./monitor/PollingOrchestrator";
export type { AddressOutcome, CycleReport, PollingOptions } from "./monitor/PollingOrchestrator";
export { ProposalTracker } from "./monitor/ProposalTracker";
export type { ProposalTrackerOptions } from "./monitor/ProposalTracker";

export { InMemorySubscriptionStore } from "./store/SubscriptionStore";
export type { Subscription, SubscriptionStore } from "./store/SubscriptionStore";

export { ConfigError, loadConfig, parseConfig } from "./config";
export type { WatchConfig } from "./config";
export { createLogger, getLogger, setLogLevel } from "./utils/logger";
