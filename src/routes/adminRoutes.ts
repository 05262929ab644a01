// src/routes/adminRoutes.ts

import { Router } from 'express';
import {
  updateComplaintStatus,
  flagComplaintFake,
  deleteComplaint,
  adjustUserPoints,
  getUsersWithStats
} from '../controllers/adminController';
import { authMiddleware } from '../middleware/auth';
import { banGuard } from '../middleware/banGuard';
import { roleMiddleware, requirePermission } from '../middleware/adminMiddleware';

const router = Router();

// All routes require authentication + a known role
router.use(authMiddleware, banGuard, roleMiddleware);

// ==================== COMPLAINT WORKFLOW (authority + admin) ====================
router.patch('/complaints/:id/status', requirePermission('UPDATE_STATUS'), updateComplaintStatus);
router.post('/complaints/:id/flag-fake', requirePermission('FLAG_FAKE'), flagComplaintFake);

// ==================== ADMIN ONLY ====================
router.delete('/complaints/:id', requirePermission('DELETE_COMPLAINTS'), deleteComplaint);
router.post('/users/:id/adjust-points', requirePermission('ADJUST_POINTS'), adjustUserPoints);
router.get('/users', requirePermission('VIEW_USERS'), getUsersWithStats);

export default router;
