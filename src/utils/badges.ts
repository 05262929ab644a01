import { UserReputation } from './reputationLedger';

export enum BadgeId {
  FIRST_STEP = 'first_step',
  PROBLEM_SOLVER = 'problem_solver',
  ACTIVE_REPORTER = 'active_reporter',
  COMMUNITY_HERO = 'community_hero',
  CIVIC_CHAMPION = 'civic_champion',
  POINT_MASTER = 'point_master',
  LEGENDARY_CITIZEN = 'legendary_citizen',
  TRUSTWORTHY = 'trustworthy',
}

export interface BadgeInfo {
  id: BadgeId;
  name: string;
  description: string;
  icon: string;
}

interface BadgeRule extends BadgeInfo {
  earned: (rep: UserReputation) => boolean;
}

const BADGE_RULES: readonly BadgeRule[] = [
  {
    id: BadgeId.FIRST_STEP,
    name: 'First Step',
    description: 'Registered your first complaint',
    icon: '🎯',
    earned: rep => rep.totalComplaints >= 1,
  },
  {
    id: BadgeId.PROBLEM_SOLVER,
    name: 'Problem Solver',
    description: 'Had your first complaint resolved',
    icon: '✅',
    earned: rep => rep.resolvedComplaints >= 1,
  },
  {
    id: BadgeId.ACTIVE_REPORTER,
    name: 'Active Reporter',
    description: '5 complaints resolved',
    icon: '🌟',
    earned: rep => rep.resolvedComplaints >= 5,
  },
  {
    id: BadgeId.COMMUNITY_HERO,
    name: 'Community Hero',
    description: '10 complaints resolved',
    icon: '🏆',
    earned: rep => rep.resolvedComplaints >= 10,
  },
  {
    id: BadgeId.CIVIC_CHAMPION,
    name: 'Civic Champion',
    description: '25 complaints resolved',
    icon: '👑',
    earned: rep => rep.resolvedComplaints >= 25,
  },
  {
    id: BadgeId.POINT_MASTER,
    name: 'Point Master',
    description: 'Earned 100+ points',
    icon: '💎',
    earned: rep => rep.points >= 100,
  },
  {
    id: BadgeId.LEGENDARY_CITIZEN,
    name: 'Legendary Citizen',
    description: 'Earned 500+ points',
    icon: '🔥',
    earned: rep => rep.points >= 500,
  },
  {
    id: BadgeId.TRUSTWORTHY,
    name: 'Trustworthy',
    description: 'No fake complaints detected',
    icon: '🛡️',
    earned: rep => rep.totalComplaints >= 5 && rep.fakeComplaints === 0,
  },
];

/**
 * Badges held by the snapshot right now. Nothing is remembered between
 * calls, so a badge disappears once its condition stops holding.
 */
export const computeBadges = (rep: UserReputation): BadgeId[] =>
  BADGE_RULES.filter(rule => rule.earned(rep)).map(rule => rule.id);

export const describeBadges = (ids: readonly BadgeId[]): BadgeInfo[] =>
  BADGE_RULES.filter(rule => ids.includes(rule.id)).map(({ id, name, description, icon }) => ({
    id,
    name,
    description,
    icon,
  }));
