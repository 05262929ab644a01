import { GamificationRules, gamificationRules } from '../config/gamification';

export interface UserReputation {
  points: number;
  totalComplaints: number;
  resolvedComplaints: number;
  fakeComplaints: number;
  pendingComplaints: number;
}

export type ComplaintOutcomeEvent =
  | { type: 'registered'; userId: string }
  | { type: 'resolved'; userId: string; wasFake: boolean }
  | { type: 'flagged_fake'; userId: string }
  | { type: 'rejected'; userId: string };

export type ComplaintStatus = 'submitted' | 'in_progress' | 'resolved' | 'rejected' | 'closed';

export const COMPLAINT_STATUSES: readonly ComplaintStatus[] = ['submitted', 'in_progress', 'resolved', 'rejected', 'closed'];
export const PENDING_STATUSES: readonly ComplaintStatus[] = ['submitted', 'in_progress'];

export const isComplaintStatus = (value: unknown): value is ComplaintStatus =>
  typeof value === 'string' && COMPLAINT_STATUSES.some(status => status === value);

export const isPendingStatus = (status: ComplaintStatus): boolean => PENDING_STATUSES.includes(status);

export const EMPTY_REPUTATION: Readonly<UserReputation> = Object.freeze({
  points: 0,
  totalComplaints: 0,
  resolvedComplaints: 0,
  fakeComplaints: 0,
  pendingComplaints: 0,
});

const releasePending = (pending: number): number => Math.max(0, pending - 1);

/**
 * Counts a newly submitted complaint. Eligibility must already have been
 * checked with canRegisterComplaint.
 */
export const applyRegistration = (rep: UserReputation): UserReputation => ({
  ...rep,
  totalComplaints: rep.totalComplaints + 1,
  pendingComplaints: rep.pendingComplaints + 1,
});

/**
 * Closes a pending complaint as resolved. Only genuine complaints earn
 * points or count as resolved.
 */
export const applyResolution = (
  rep: UserReputation,
  wasFake: boolean,
  rules: GamificationRules = gamificationRules
): UserReputation => ({
  ...rep,
  pendingComplaints: releasePending(rep.pendingComplaints),
  resolvedComplaints: wasFake ? rep.resolvedComplaints : rep.resolvedComplaints + 1,
  points: wasFake ? rep.points : rep.points + rules.pointsResolved,
});

/**
 * Penalizes a complaint confirmed as fake. No deduplication happens here:
 * callers track which complaints were already penalized.
 */
export const applyFakeFlag = (rep: UserReputation, rules: GamificationRules = gamificationRules): UserReputation => ({
  ...rep,
  fakeComplaints: rep.fakeComplaints + 1,
  pendingComplaints: releasePending(rep.pendingComplaints),
  points: rep.points + rules.pointsFakePenalty,
});

export const applyRejection = (rep: UserReputation): UserReputation => ({
  ...rep,
  pendingComplaints: releasePending(rep.pendingComplaints),
});

// Manual correction by an administrator
export const applyPointAdjustment = (rep: UserReputation, delta: number): UserReputation => ({
  ...rep,
  points: rep.points + delta,
});

export const applyEvent = (
  rep: UserReputation,
  event: ComplaintOutcomeEvent,
  rules: GamificationRules = gamificationRules
): UserReputation => {
  switch (event.type) {
    case 'registered':
      return applyRegistration(rep);
    case 'resolved':
      return applyResolution(rep, event.wasFake, rules);
    case 'flagged_fake':
      return applyFakeFlag(rep, rules);
    case 'rejected':
      return applyRejection(rep);
  }
};

/**
 * Ledger event implied by a complaint moving from one status to another,
 * or null when the move has no effect on the reporter's reputation.
 */
export const eventForStatusChange = (
  userId: string,
  from: ComplaintStatus,
  to: ComplaintStatus,
  wasFake: boolean
): ComplaintOutcomeEvent | null => {
  if (!isPendingStatus(from) || from === to) return null;

  if (to === 'resolved') return { type: 'resolved', userId, wasFake };
  if (to === 'rejected' || to === 'closed') return { type: 'rejected', userId };

  // submitted -> in_progress keeps the complaint pending
  return null;
};

/**
 * Penalty a user would face for pending complaints above the limit.
 * Shown on the profile as a warning, never applied to the balance.
 */
export const calculateUnresolvedPenalty = (
  pendingCount: number,
  rules: GamificationRules = gamificationRules
): number => {
  if (pendingCount <= rules.maxPendingComplaints) return 0;
  return (pendingCount - rules.maxPendingComplaints) * rules.pointsUnresolvedPenalty;
};
