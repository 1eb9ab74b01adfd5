import { Dec } from '../models/Dec';
import { ProposalRecord } from '../models/Proposal';
import { ValidatorRecord } from '../models/Validator';
import { ProposalStatus, ValidatorState } from '../types';

export type ValidatorChange =
  | { field: 'state'; old: ValidatorState; new: ValidatorState }
  | { field: 'commissionRate'; old: Dec; new: Dec }
  | { field: 'votingPower'; old: bigint; new: bigint };

export type ValidatorChangeSet = readonly ValidatorChange[];

export interface ProposalChange {
  field: 'status';
  old: ProposalStatus;
  new: ProposalStatus;
}

export interface ChangePolicy {
  /** Voting power moves with every bond and unbond, so it is off by default. */
  trackVotingPower: boolean;
}

export const DEFAULT_CHANGE_POLICY: ChangePolicy = {
  trackVotingPower: false,
};

/**
 * Compares two observations of one validator. The first observation only
 * sets the baseline. Entries are ordered state, commission, voting power.
 */
export function diffValidator(
  previous: ValidatorRecord | null | undefined,
  current: ValidatorRecord,
  policy: ChangePolicy = DEFAULT_CHANGE_POLICY
): ValidatorChangeSet {
  if (!previous) return [];

  const changes: ValidatorChange[] = [];
  if (previous.state !== current.state) {
    changes.push({ field: 'state', old: previous.state, new: current.state });
  }
  if (!previous.commissionRate.equals(current.commissionRate)) {
    changes.push({
      field: 'commissionRate',
      old: previous.commissionRate,
      new: current.commissionRate,
    });
  }
  if (policy.trackVotingPower && previous.votingPower !== current.votingPower) {
    changes.push({ field: 'votingPower', old: previous.votingPower, new: current.votingPower });
  }
  return changes;
}

export function diffProposal(
  previous: ProposalRecord | null | undefined,
  current: ProposalRecord
): readonly ProposalChange[] {
  if (!previous || previous.status === current.status) return [];
  return [{ field: 'status', old: previous.status, new: current.status }];
}
