import { Router } from 'express';
import { getMe, getEligibility, getLeaderboard } from '../controllers/userController';
import { getNotifications } from '../controllers/notificationController';
import { authMiddleware } from '../middleware/auth';
import { banGuard } from '../middleware/banGuard';

const router = Router();

router.get('/leaderboard', getLeaderboard);
router.get('/me', authMiddleware, banGuard, getMe);
router.get('/me/eligibility', authMiddleware, banGuard, getEligibility);
router.get('/me/notifications', authMiddleware, banGuard, getNotifications);

export default router;
