import { GamificationRules, gamificationRules } from '../config/gamification';

export type AccessDecision =
  | { status: 'allowed' }
  | {
      status: 'temporarily_restricted';
      reason: 'low_points';
      pointsNeeded: number;
      message: string;
    }
  | {
      status: 'temporarily_restricted';
      reason: 'pending_limit';
      pendingCount: number;
      maxPending: number;
      message: string;
    }
  | {
      status: 'permanently_banned';
      reason: 'points_below_ban_threshold';
      message: string;
    };

export type DeniedDecision = Exclude<AccessDecision, { status: 'allowed' }>;

const ALLOWED: AccessDecision = { status: 'allowed' };

export const isPermanentlyBanned = (points: number, rules: GamificationRules = gamificationRules): boolean =>
  points <= rules.permanentBanThreshold;

const banned = (points: number): AccessDecision => ({
  status: 'permanently_banned',
  reason: 'points_below_ban_threshold',
  message:
    `Your account has been permanently banned due to excessive fake complaints (${points} points). ` +
    'This account cannot be used anymore. Please contact support if you believe this is an error.',
});

/**
 * Decides whether a user may file a new complaint. Point thresholds are
 * checked before the pending limit, so a restricted user always sees the
 * points-based reason.
 */
export const canRegisterComplaint = (
  points: number,
  pendingCount: number,
  rules: GamificationRules = gamificationRules
): AccessDecision => {
  if (isPermanentlyBanned(points, rules)) {
    return banned(points);
  }

  if (points <= rules.minPointsToRegister) {
    const pointsNeeded = rules.minPointsToRegister - points + 1;
    return {
      status: 'temporarily_restricted',
      reason: 'low_points',
      pointsNeeded,
      message:
        `Your account is temporarily blocked due to low points (${points}). ` +
        `You need ${pointsNeeded} more point${pointsNeeded === 1 ? '' : 's'} to register complaints again; ` +
        'points are earned when your genuine complaints are resolved.',
    };
  }

  if (pendingCount >= rules.maxPendingComplaints) {
    return {
      status: 'temporarily_restricted',
      reason: 'pending_limit',
      pendingCount,
      maxPending: rules.maxPendingComplaints,
      message:
        `You have ${pendingCount} pending complaints. ` +
        'Please wait for some of them to be resolved before registering new ones. ' +
        `Maximum allowed pending complaints: ${rules.maxPendingComplaints}.`,
    };
  }

  return ALLOWED;
};

/**
 * Only a permanent ban blocks login. Re-evaluate on every authenticated
 * request so a session is dropped as soon as the balance crosses the threshold.
 */
export const canLogin = (points: number, rules: GamificationRules = gamificationRules): AccessDecision =>
  isPermanentlyBanned(points, rules) ? banned(points) : ALLOWED;
