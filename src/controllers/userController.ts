import { Request, Response } from 'express';
import db from '../config/sqlite';
import { authenticatedUserId } from '../middleware/auth';
import { loadReputation, rowToReputation } from '../services/reputationService';
import { canRegisterComplaint } from '../utils/accessPolicy';
import { computeBadges, describeBadges } from '../utils/badges';
import { computeLevel } from '../utils/levelConfig';
import { buildStatsSummary } from '../utils/statsSummary';
import { asInteger } from '../utils/validation';
import { UserRole, getRoleLabel, getRolePermissions, isValidRole } from '../lib/permissions';

interface ProfileRow {
  id: string;
  username: string;
  email: string;
  name: string | null;
  role: string;
  points: number;
  total_complaints: number;
  resolved_complaints: number;
  fake_complaints: number;
  pending_complaints: number;
  created_at: string;
}

interface LeaderboardRow {
  id: string;
  username: string;
  points: number;
  resolved_complaints: number;
}

// GET /api/v1/users/me
export const getMe = async (req: Request, res: Response) => {
  try {
    const userId = authenticatedUserId(req);
    const user = db
      .prepare<[string], ProfileRow>(`
        SELECT id, username, email, name, role, points, total_complaints, resolved_complaints,
               fake_complaints, pending_complaints, created_at
        FROM users WHERE id = ?
      `)
      .get(userId);

    if (!user) {
      return res.status(404).json({
        error: { code: 'NOT_FOUND', message: 'User not found' },
      });
    }

    const reputation = rowToReputation(user);
    const role = isValidRole(user.role) ? user.role : UserRole.CITIZEN;

    return res.status(200).json({
      id: user.id,
      username: user.username,
      email: user.email,
      name: user.name,
      role,
      roleLabel: getRoleLabel(role),
      permissions: getRolePermissions(role),
      createdAt: user.created_at,
      stats: buildStatsSummary(reputation),
      level_info: computeLevel(reputation.points),
      badges: describeBadges(computeBadges(reputation)),
    });
  } catch (error) {
    console.error('Get user error:', error);
    res.status(500).json({
      error: { code: 'INTERNAL_ERROR', message: 'Failed to get user' },
    });
  }
};

// GET /api/v1/users/me/eligibility
export const getEligibility = async (req: Request, res: Response) => {
  try {
    const reputation = loadReputation(authenticatedUserId(req));

    if (!reputation) {
      return res.status(404).json({
        error: { code: 'NOT_FOUND', message: 'User not found' },
      });
    }

    return res.status(200).json(canRegisterComplaint(reputation.points, reputation.pendingComplaints));
  } catch (error) {
    console.error('Get eligibility error:', error);
    res.status(500).json({
      error: { code: 'INTERNAL_ERROR', message: 'Failed to check eligibility' },
    });
  }
};

// GET /api/v1/users/leaderboard
export const getLeaderboard = async (req: Request, res: Response) => {
  try {
    const limit = Math.min(Math.max(asInteger(req.query.limit) ?? 10, 1), 100);

    const rows = db
      .prepare<[number], LeaderboardRow>(`
        SELECT id, username, points, resolved_complaints
        FROM users
        WHERE role = 'citizen'
        ORDER BY points DESC, resolved_complaints DESC, username ASC
        LIMIT ?
      `)
      .all(limit);

    return res.status(200).json({
      data: rows.map((row, index) => ({
        rank: index + 1,
        id: row.id,
        username: row.username,
        points: row.points,
        resolvedComplaints: row.resolved_complaints,
        level: computeLevel(row.points).name,
      })),
    });
  } catch (error) {
    console.error('Get leaderboard error:', error);
    res.status(500).json({
      error: { code: 'INTERNAL_ERROR', message: 'Failed to fetch leaderboard' },
    });
  }
};
