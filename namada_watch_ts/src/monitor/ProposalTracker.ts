import { diffProposal } from './ChangeDetector';
import { Notifier, WatchEvent } from './Notifier';
import { ProposalSource } from '../client/AbciClient';
import { ProposalRecord } from '../models/Proposal';
import { ProposalStatus, QueryResult } from '../types';
import { abandonOnAbort, maybeCoerceError } from '../utils/helpers';
import { getLogger, Logger } from '../utils/logger';

export interface ProposalTrackerOptions {
  /** First proposal id to look for. */
  startId: bigint;
  /** Upper bound on proposal reads per poll when catching up. */
  maxNewPerPoll: number;
  now: () => Date;
}

const DEFAULT_OPTIONS: ProposalTrackerOptions = {
  startId: 0n,
  maxNewPerPoll: 20,
  now: () => new Date(),
};

function isFinal(proposal: ProposalRecord): boolean {
  return proposal.status === ProposalStatus.Passed || proposal.status === ProposalStatus.Rejected;
}

/**
 * Follows governance proposals: announces new ones and reports status
 * transitions of open ones. Proposals that already exist when tracking
 * starts form the baseline and are not announced.
 */
export class ProposalTracker {
  private nextId: bigint;
  private caughtUp = false;
  private readonly open = new Map<bigint, ProposalRecord>();
  private readonly options: ProposalTrackerOptions;

  constructor(
    private readonly source: ProposalSource,
    private readonly notifier: Notifier,
    options: Partial<ProposalTrackerOptions> = {},
    private readonly logger: Logger = getLogger('proposals')
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.nextId = this.options.startId;
  }

  get trackedIds(): bigint[] {
    return Array.from(this.open.keys());
  }

  get nextProposalId(): bigint {
    return this.nextId;
  }

  async poll(signal?: AbortSignal): Promise<WatchEvent[]> {
    const epoch = await this.source.currentEpoch();
    if (epoch.status !== 'ok') {
      this.logger.warn(`cannot read current epoch: ${describeFailure(epoch)}`);
      return [];
    }

    const events: WatchEvent[] = [];
    await this.collect(epoch.value, events, signal);

    for (const event of events) {
      try {
        await this.notifier.notify(event);
      } catch (error) {
        this.logger.error(`notifier failed: ${maybeCoerceError(error).message}`);
      }
    }
    return events;
  }

  // Pushes one event per change as it is applied; stops early on abort.
  private async collect(epoch: bigint, events: WatchEvent[], signal?: AbortSignal): Promise<void> {
    const announce = this.caughtUp;

    for (const [id, previous] of Array.from(this.open)) {
      if (signal?.aborted) return;
      const result = await abandonOnAbort(this.source.queryProposal(id, epoch), signal);
      if (!result) return;
      if (result.status !== 'ok') {
        this.logger.warn(`proposal #${id}: ${describeFailure(result)}`);
        continue;
      }
      const changes = diffProposal(previous, result.value);
      this.track(result.value);
      if (changes.length > 0) {
        events.push({
          type: 'proposalStatusChanged',
          proposal: result.value,
          changes,
          observedAt: this.options.now(),
        });
      }
    }

    for (let read = 0; read < this.options.maxNewPerPoll; read++) {
      if (signal?.aborted) return;
      const result = await abandonOnAbort(this.source.queryProposal(this.nextId, epoch), signal);
      if (!result) return;
      if (result.status === 'notFound') {
        this.caughtUp = true;
        break;
      }
      if (result.status !== 'ok') {
        this.logger.warn(`proposal #${this.nextId}: ${describeFailure(result)}`);
        break;
      }
      this.nextId += 1n;
      this.track(result.value);
      if (announce) {
        events.push({ type: 'newProposal', proposal: result.value, observedAt: this.options.now() });
      }
    }
  }

  private track(proposal: ProposalRecord): void {
    if (isFinal(proposal)) {
      this.open.delete(proposal.id);
    } else {
      this.open.set(proposal.id, proposal);
    }
  }
}

function describeFailure(result: QueryResult<unknown>): string {
  switch (result.status) {
    case 'transportError':
    case 'decodeError':
      return result.error.message;
    default:
      return result.status;
  }
}
