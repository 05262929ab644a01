import { Request, Response } from 'express';
import { authenticatedUserId } from '../middleware/auth';
import { Complaint, listComplaintsByUser } from '../services/complaintRepository';

const RECENT_COMPLAINTS = 5;

export interface StatusNotification {
  complaintId: string;
  type: 'success' | 'info';
  message: string;
  date: string;
}

// Only resolved and in-progress complaints produce a notice
export const toStatusNotification = (complaint: Complaint): StatusNotification | null => {
  switch (complaint.status) {
    case 'resolved':
      return {
        complaintId: complaint.id,
        type: 'success',
        message: `Complaint ${complaint.id} marked as Resolved ✅`,
        date: complaint.createdAt,
      };
    case 'in_progress':
      return {
        complaintId: complaint.id,
        type: 'info',
        message: `Complaint ${complaint.id} is now In Progress 🔄`,
        date: complaint.createdAt,
      };
    default:
      return null;
  }
};

// GET /api/v1/users/me/notifications
export const getNotifications = async (req: Request, res: Response) => {
  try {
    const notifications = listComplaintsByUser(authenticatedUserId(req), RECENT_COMPLAINTS, 0)
      .map(toStatusNotification)
      .filter((notification): notification is StatusNotification => notification !== null);

    return res.status(200).json({ data: notifications });
  } catch (error) {
    console.error('Get notifications error:', error);
    res.status(500).json({
      error: { code: 'INTERNAL_ERROR', message: 'Failed to fetch notifications' },
    });
  }
};
