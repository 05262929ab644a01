import { randomUUID } from 'crypto';
import db from '../config/sqlite';
import { UserRole } from '../lib/permissions';
import { loadReputation } from '../services/reputationService';
import { generateAccessToken } from '../utils/jwt';
import { ComplaintStatus, EMPTY_REPUTATION, UserReputation } from '../utils/reputationLedger';

export interface TestUser {
  id: string;
  username: string;
  token: string;
}

let userCounter = 0;
let complaintCounter = 0;

export const resetDatabase = (): void => {
  db.exec('DELETE FROM point_adjustments; DELETE FROM complaints; DELETE FROM users;');
};

export const createTestUser = (
  options: { role?: UserRole; reputation?: Partial<UserReputation> } = {}
): TestUser => {
  userCounter += 1;
  const id = randomUUID();
  const username = `user_${userCounter}`;
  const rep = { ...EMPTY_REPUTATION, ...options.reputation };

  db.prepare(`
    INSERT INTO users (id, username, email, password_hash, role, points, total_complaints,
                       resolved_complaints, fake_complaints, pending_complaints)
    VALUES (?, ?, ?, 'unused:unused', ?, ?, ?, ?, ?, ?)
  `).run(
    id,
    username,
    `${username}@example.test`,
    options.role ?? UserRole.CITIZEN,
    rep.points,
    rep.totalComplaints,
    rep.resolvedComplaints,
    rep.fakeComplaints,
    rep.pendingComplaints
  );

  return { id, username, token: generateAccessToken(id) };
};

// Inserts a complaint row without touching the owner's counters
export const insertTestComplaint = (
  userId: string,
  options: { status?: ComplaintStatus; fake?: boolean; fakePenaltyApplied?: boolean } = {}
): string => {
  complaintCounter += 1;
  const id = `c${String(complaintCounter).padStart(7, '0')}`;

  db.prepare(`
    INSERT INTO complaints (id, user_id, description, status, fake, fake_penalty_applied)
    VALUES (?, ?, 'Test complaint', ?, ?, ?)
  `).run(id, userId, options.status ?? 'submitted', options.fake ? 1 : 0, options.fakePenaltyApplied ? 1 : 0);

  return id;
};

export const setPoints = (userId: string, points: number): void => {
  db.prepare('UPDATE users SET points = ? WHERE id = ?').run(points, userId);
};

export const reputationOf = (userId: string): UserReputation => {
  const rep = loadReputation(userId);
  if (!rep) throw new Error(`No user ${userId}`);
  return rep;
};
