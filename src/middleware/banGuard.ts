import { Request, Response, NextFunction } from 'express';
import { loadReputation } from '../services/reputationService';
import { canLogin } from '../utils/accessPolicy';
import { decisionErrorBody } from '../utils/decisionResponse';

/**
 * Re-checks the ban on every authenticated request. A user whose balance
 * reached the ban threshold since login is told to drop the session.
 * Must run after authMiddleware.
 */
export const banGuard = (req: Request, res: Response, next: NextFunction) => {
  try {
    if (!req.userId) {
      return res.status(401).json({
        error: { code: 'UNAUTHORIZED', message: 'Authentication required' },
      });
    }

    const reputation = loadReputation(req.userId);
    if (!reputation) {
      return res.status(401).json({
        error: { code: 'UNAUTHORIZED', message: 'User no longer exists' },
      });
    }

    const decision = canLogin(reputation.points);
    if (decision.status !== 'allowed') {
      console.warn(`🚫 Banned user ${req.userId} forced out (${reputation.points} points)`);
      return res.status(401).json({ ...decisionErrorBody(decision), forceLogout: true });
    }

    next();
  } catch (error) {
    next(error);
  }
};
