export interface LevelDefinition {
  name: string;
  minPoints: number;
  color: string;
}

// Highest tier first; the first tier whose minimum is reached wins.
export const LEVELS: readonly LevelDefinition[] = [
  { name: 'Guardian Citizen', minPoints: 500, color: '#F59E0B' },
  { name: 'Elite Citizen', minPoints: 200, color: '#8B5CF6' },
  { name: 'Super Citizen', minPoints: 100, color: '#10B981' },
  { name: 'Active Citizen', minPoints: 50, color: '#3B82F6' },
  { name: 'Novice Citizen', minPoints: 0, color: '#6B7280' },
];

export interface LevelState {
  name: string;
  color: string;
  minPoints: number;
  nextLevel: { name: string; minPoints: number } | null;
  progress: number; // 0..1 toward the next tier
}

export const computeLevel = (points: number): LevelState => {
  let index = LEVELS.findIndex(level => points >= level.minPoints);
  if (index === -1) index = LEVELS.length - 1; // negative balances stay Novice

  const current = LEVELS[index];
  const next = index > 0 ? LEVELS[index - 1] : undefined;

  if (!next) {
    return { name: current.name, color: current.color, minPoints: current.minPoints, nextLevel: null, progress: 1 };
  }

  const raw = (points - current.minPoints) / (next.minPoints - current.minPoints);

  return {
    name: current.name,
    color: current.color,
    minPoints: current.minPoints,
    nextLevel: { name: next.name, minPoints: next.minPoints },
    progress: Math.min(1, Math.max(0, raw)),
  };
};
