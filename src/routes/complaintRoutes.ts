import { Router } from 'express';
import { createComplaint, getMyComplaints, trackComplaint } from '../controllers/complaintController';
import { authMiddleware } from '../middleware/auth';
import { banGuard } from '../middleware/banGuard';
import { complaintLimiter } from '../middleware/rateLimiter';

const router = Router();

router.post('/', authMiddleware, banGuard, complaintLimiter, createComplaint);
router.get('/mine', authMiddleware, banGuard, getMyComplaints);
router.get('/:id', trackComplaint);

export default router;
