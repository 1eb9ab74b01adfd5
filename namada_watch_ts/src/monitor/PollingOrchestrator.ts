import { ChangePolicy, DEFAULT_CHANGE_POLICY, diffValidator, ValidatorChangeSet } from './ChangeDetector';
import { Notifier, WatchEvent } from './Notifier';
import { ProposalTracker } from './ProposalTracker';
import { WatchEntry, WatchState } from './WatchState';
import { ValidatorSource } from '../client/AbciClient';
import { classifyTransportError } from '../client/transport';
import { Address } from '../models/Address';
import { ValidatorRecord } from '../models/Validator';
import { SubscriptionStore } from '../store/SubscriptionStore';
import { AddressPrefix, Bech32String, DecodeError, QueryResult, TransportError } from '../types';
import { abandonOnAbort, mapWithConcurrency, maybeCoerceError, sleep } from '../utils/helpers';
import { getLogger, Logger } from '../utils/logger';

export interface PollingOptions {
  /** Validator queries in flight at once. */
  concurrency: number;
  changePolicy: ChangePolicy;
  /** Consecutive hard failures before an `unableToQuery` event. */
  unableToQueryThreshold: number;
  proposals?: ProposalTracker;
  now: () => Date;
}

const DEFAULT_OPTIONS: PollingOptions = {
  concurrency: 8,
  changePolicy: DEFAULT_CHANGE_POLICY,
  unableToQueryThreshold: 3,
  now: () => new Date(),
};

export type AddressOutcome =
  | { address: Bech32String; outcome: 'baseline' }
  | { address: Bech32String; outcome: 'unchanged' }
  | { address: Bech32String; outcome: 'changed'; changes: ValidatorChangeSet }
  | { address: Bech32String; outcome: 'notFound' }
  | { address: Bech32String; outcome: 'retrying'; error: TransportError }
  | { address: Bech32String; outcome: 'failed'; error: TransportError | DecodeError }
  | { address: Bech32String; outcome: 'invalidAddress'; error: DecodeError }
  | { address: Bech32String; outcome: 'cancelled' };

export interface CycleReport {
  startedAt: Date;
  finishedAt: Date;
  outcomes: AddressOutcome[];
  proposalEvents: WatchEvent[];
  cancelled: boolean;
}

interface Target {
  key: Bech32String;
  address: Address;
  subscribers: string[];
}

interface Fetched {
  target: Target;
  /** Undefined when the query was abandoned. */
  result: QueryResult<ValidatorRecord> | undefined;
}

/**
 * Drives poll cycles over the watched validators.
 *
 * Queries for different addresses run concurrently and never touch the
 * watch state. Once every query of a cycle has settled, results are applied
 * one address at a time: the state is updated first, then the change is
 * handed to the notifier.
 */
export class PollingOrchestrator {
  private readonly state = new WatchState();
  private readonly options: PollingOptions;
  private cycle?: Promise<CycleReport>;
  private loop?: Promise<void>;
  private controller?: AbortController;

  constructor(
    private readonly source: ValidatorSource,
    private readonly store: SubscriptionStore,
    private readonly notifier: Notifier,
    options: Partial<PollingOptions> = {},
    private readonly logger: Logger = getLogger('poll')
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  entry(address: Bech32String): WatchEntry {
    return this.state.get(address);
  }

  async runCycle(signal?: AbortSignal): Promise<CycleReport> {
    if (this.cycle) {
      throw new Error('a poll cycle is already running');
    }
    this.cycle = this.executeCycle(signal);
    try {
      return await this.cycle;
    } finally {
      this.cycle = undefined;
    }
  }

  start(intervalMs: number): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.runLoop(intervalMs, controller.signal);
  }

  /** Aborts the running cycle, if any, and waits for the loop to exit. */
  async stop(): Promise<void> {
    this.controller?.abort();
    await this.loop;
    this.loop = undefined;
    this.controller = undefined;
  }

  private async runLoop(intervalMs: number, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        const report = await this.runCycle(signal);
        this.logger.info(summarize(report));
      } catch (error) {
        this.logger.error(`poll cycle failed: ${maybeCoerceError(error).message}`);
      }
      await sleep(intervalMs, signal);
    }
  }

  private async executeCycle(signal?: AbortSignal): Promise<CycleReport> {
    const startedAt = this.options.now();
    const { targets, invalid } = this.resolveTargets(await this.store.listSubscriptions());
    this.state.retain(new Set(targets.map((target) => target.key)));

    const fetched = await mapWithConcurrency(targets, this.options.concurrency, (target) =>
      this.fetch(target, signal)
    );

    // Every query has settled or been abandoned; apply serially.
    const outcomes: AddressOutcome[] = [...invalid];
    for (const item of fetched) {
      outcomes.push(await this.apply(item));
    }

    let proposalEvents: WatchEvent[] = [];
    if (this.options.proposals && !signal?.aborted) {
      try {
        proposalEvents = await this.options.proposals.poll(signal);
      } catch (error) {
        this.logger.error(`proposal poll failed: ${maybeCoerceError(error).message}`);
      }
    }

    return {
      startedAt,
      finishedAt: this.options.now(),
      outcomes,
      proposalEvents,
      cancelled: signal?.aborted ?? false,
    };
  }

  private resolveTargets(subscriptions: readonly { subscriberId: string; address: string }[]): {
    targets: Target[];
    invalid: AddressOutcome[];
  } {
    const byKey = new Map<Bech32String, Target>();
    const invalid = new Map<string, AddressOutcome>();

    for (const { subscriberId, address: text } of subscriptions) {
      let address: Address;
      try {
        address = Address.decode(text.trim());
        if (address.prefix !== AddressPrefix.Address) {
          throw new DecodeError('InvalidPrefix', `${text} is a public key, not a validator address`);
        }
      } catch (error) {
        if (!(error instanceof DecodeError)) throw error;
        invalid.set(text, { address: text, outcome: 'invalidAddress', error });
        continue;
      }
      const key = address.encode();
      const target = byKey.get(key);
      if (target) {
        if (!target.subscribers.includes(subscriberId)) target.subscribers.push(subscriberId);
      } else {
        byKey.set(key, { key, address, subscribers: [subscriberId] });
      }
    }

    return { targets: Array.from(byKey.values()), invalid: Array.from(invalid.values()) };
  }

  private async fetch(target: Target, signal?: AbortSignal): Promise<Fetched> {
    if (signal?.aborted) return { target, result: undefined };
    try {
      const result = await abandonOnAbort(this.source.queryValidator(target.address), signal);
      return { target, result };
    } catch (error) {
      return { target, result: { status: 'transportError', error: classifyTransportError(error) } };
    }
  }

  private async apply({ target, result }: Fetched): Promise<AddressOutcome> {
    const address = target.key;
    if (!result) return { address, outcome: 'cancelled' };

    switch (result.status) {
      case 'ok': {
        const previous = this.state.get(address).record;
        const changes = diffValidator(previous, result.value, this.options.changePolicy);
        const observedAt = this.options.now();
        this.state.recordSuccess(address, result.value, observedAt);
        if (changes.length === 0) {
          return { address, outcome: previous ? 'unchanged' : 'baseline' };
        }
        await this.emit({
          type: 'validatorChanged',
          address: target.address,
          subscribers: target.subscribers,
          changes,
          record: result.value,
          observedAt,
        });
        return { address, outcome: 'changed', changes };
      }
      case 'notFound':
        this.logger.debug(`${address}: not a validator`);
        return { address, outcome: 'notFound' };
      case 'transportError':
        if (result.error.retryable) {
          this.logger.debug(`${address}: ${result.error.message}; retrying next cycle`);
          return { address, outcome: 'retrying', error: result.error };
        }
        return this.fail(target, result.error);
      case 'decodeError':
        return this.fail(target, result.error);
    }
  }

  private async fail(target: Target, error: TransportError | DecodeError): Promise<AddressOutcome> {
    const address = target.key;
    const entry = this.state.recordFailure(address, error.message, this.options.now());
    this.logger.warn(`${address}: ${error.name}: ${error.message}`);

    if (
      entry.consecutiveFailures >= this.options.unableToQueryThreshold &&
      !entry.unableToQueryReported
    ) {
      this.state.markUnableToQueryReported(address);
      await this.emit({
        type: 'unableToQuery',
        address: target.address,
        subscribers: target.subscribers,
        reason: error.message,
        consecutiveFailures: entry.consecutiveFailures,
        observedAt: this.options.now(),
      });
    }
    return { address, outcome: 'failed', error };
  }

  private async emit(event: WatchEvent): Promise<void> {
    try {
      await this.notifier.notify(event);
    } catch (error) {
      this.logger.error(`notifier failed for ${event.type}: ${maybeCoerceError(error).message}`);
    }
  }
}

function summarize(report: CycleReport): string {
  const counts = new Map<AddressOutcome['outcome'], number>();
  for (const { outcome } of report.outcomes) {
    counts.set(outcome, (counts.get(outcome) ?? 0) + 1);
  }
  const parts = Array.from(counts, ([outcome, count]) => `${outcome}=${count}`);
  const elapsed = report.finishedAt.getTime() - report.startedAt.getTime();
  return `cycle ${report.cancelled ? 'cancelled' : 'done'} in ${elapsed}ms: ${parts.join(' ') || 'nothing watched'}`;
}
