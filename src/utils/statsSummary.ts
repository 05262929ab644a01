import { GamificationRules, gamificationRules } from '../config/gamification';
import { AccessDecision, canRegisterComplaint, isPermanentlyBanned } from './accessPolicy';
import { computeLevel } from './levelConfig';
import { UserReputation, calculateUnresolvedPenalty } from './reputationLedger';

export interface StatsSummary extends UserReputation {
  level: string;
  levelColor: string;
  nextLevel: string;
  progressToNext: number;
  successRate: number; // percent, one decimal
  canRegister: boolean;
  registrationMessage: string;
  registration: AccessDecision;
  isBlocked: boolean;
  isBanned: boolean;
  unresolvedPenalty: number;
}

export const calculateSuccessRate = (rep: UserReputation): number => {
  if (rep.totalComplaints === 0) return 0;
  return Math.round((rep.resolvedComplaints / rep.totalComplaints) * 1000) / 10;
};

export const buildStatsSummary = (rep: UserReputation, rules: GamificationRules = gamificationRules): StatsSummary => {
  const level = computeLevel(rep.points);
  const registration = canRegisterComplaint(rep.points, rep.pendingComplaints, rules);
  const canRegister = registration.status === 'allowed';

  return {
    ...rep,
    level: level.name,
    levelColor: level.color,
    nextLevel: level.nextLevel ? level.nextLevel.name : 'Max Level',
    progressToNext: level.progress,
    successRate: calculateSuccessRate(rep),
    canRegister,
    registrationMessage: registration.status === 'allowed' ? 'You can register a complaint.' : registration.message,
    registration,
    isBlocked: !canRegister,
    isBanned: isPermanentlyBanned(rep.points, rules),
    unresolvedPenalty: calculateUnresolvedPenalty(rep.pendingComplaints, rules),
  };
};
