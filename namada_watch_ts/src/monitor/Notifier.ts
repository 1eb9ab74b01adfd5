import { ProposalChange, ValidatorChange, ValidatorChangeSet } from './ChangeDetector';
import { Address } from '../models/Address';
import { describeProposalType, ProposalRecord } from '../models/Proposal';
import { ValidatorRecord } from '../models/Validator';
import { formatAmount } from '../utils/helpers';
import { getLogger, Logger } from '../utils/logger';

export interface ValidatorChangedEvent {
  type: 'validatorChanged';
  address: Address;
  subscribers: readonly string[];
  changes: ValidatorChangeSet;
  record: ValidatorRecord;
  observedAt: Date;
}

/** Sent once an address has failed enough cycles in a row for a non-transient reason. */
export interface UnableToQueryEvent {
  type: 'unableToQuery';
  address: Address;
  subscribers: readonly string[];
  reason: string;
  consecutiveFailures: number;
  observedAt: Date;
}

export interface NewProposalEvent {
  type: 'newProposal';
  proposal: ProposalRecord;
  observedAt: Date;
}

export interface ProposalStatusChangedEvent {
  type: 'proposalStatusChanged';
  proposal: ProposalRecord;
  changes: readonly ProposalChange[];
  observedAt: Date;
}

export type WatchEvent =
  | ValidatorChangedEvent
  | UnableToQueryEvent
  | NewProposalEvent
  | ProposalStatusChangedEvent;

export interface Notifier {
  notify(event: WatchEvent): Promise<void>;
}

export function describeChange(change: ValidatorChange): string {
  switch (change.field) {
    case 'state':
      return `state ${change.old} -> ${change.new}`;
    case 'commissionRate':
      return `commission ${change.old.toPercent()} -> ${change.new.toPercent()}`;
    case 'votingPower':
      return `voting power ${formatAmount(change.old)} -> ${formatAmount(change.new)}`;
  }
}

export function describeEvent(event: WatchEvent): string {
  switch (event.type) {
    case 'validatorChanged':
      return `${event.address}: ${event.changes.map(describeChange).join(', ')}`;
    case 'unableToQuery':
      return `${event.address}: unable to query after ${event.consecutiveFailures} attempts (${event.reason})`;
    case 'newProposal':
      return `proposal #${event.proposal.id} (${describeProposalType(event.proposal.proposalType)}) ${event.proposal.status}, voting epochs ${event.proposal.votingStartEpoch}-${event.proposal.votingEndEpoch}`;
    case 'proposalStatusChanged':
      return `proposal #${event.proposal.id}: ${event.changes
        .map((change) => `${change.old} -> ${change.new}`)
        .join(', ')}`;
  }
}

/** Writes every event to the log; the default when no bot is attached. */
export class LoggingNotifier implements Notifier {
  constructor(private readonly logger: Logger = getLogger('notify')) {}

  async notify(event: WatchEvent): Promise<void> {
    const line = describeEvent(event);
    if (event.type === 'unableToQuery') {
      this.logger.warn(line);
    } else {
      this.logger.info(line);
    }
  }
}
