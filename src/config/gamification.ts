// Point values and thresholds for the reputation system.
// Every value can be overridden from the environment (see .env.example).

export interface GamificationRules {
  pointsResolved: number;
  pointsFakePenalty: number;
  pointsUnresolvedPenalty: number; // per pending complaint above the limit
  minPointsToRegister: number; // at or below this, registration is blocked
  permanentBanThreshold: number; // at or below this, the account is banned
  maxPendingComplaints: number;
}

export const DEFAULT_RULES: Readonly<GamificationRules> = Object.freeze({
  pointsResolved: 10,
  pointsFakePenalty: -5,
  pointsUnresolvedPenalty: -5,
  minPointsToRegister: -20,
  permanentBanThreshold: -40,
  maxPendingComplaints: 2,
});

const readInt = (env: NodeJS.ProcessEnv, name: string, fallback: number): number => {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  return value;
};

export const loadGamificationRules = (env: NodeJS.ProcessEnv = process.env): Readonly<GamificationRules> => {
  const rules: GamificationRules = {
    pointsResolved: readInt(env, 'POINTS_RESOLVED', DEFAULT_RULES.pointsResolved),
    pointsFakePenalty: readInt(env, 'POINTS_FAKE_PENALTY', DEFAULT_RULES.pointsFakePenalty),
    pointsUnresolvedPenalty: readInt(env, 'POINTS_UNRESOLVED_PENALTY', DEFAULT_RULES.pointsUnresolvedPenalty),
    minPointsToRegister: readInt(env, 'MIN_POINTS_TO_REGISTER', DEFAULT_RULES.minPointsToRegister),
    permanentBanThreshold: readInt(env, 'PERMANENT_BAN_THRESHOLD', DEFAULT_RULES.permanentBanThreshold),
    maxPendingComplaints: readInt(env, 'MAX_PENDING_COMPLAINTS', DEFAULT_RULES.maxPendingComplaints),
  };

  if (rules.permanentBanThreshold > rules.minPointsToRegister) {
    throw new Error(
      `PERMANENT_BAN_THRESHOLD (${rules.permanentBanThreshold}) must not be above MIN_POINTS_TO_REGISTER (${rules.minPointsToRegister})`
    );
  }
  if (rules.maxPendingComplaints < 1) {
    throw new Error('MAX_PENDING_COMPLAINTS must be at least 1');
  }

  return Object.freeze(rules);
};

export const gamificationRules = loadGamificationRules();
