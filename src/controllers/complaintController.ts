import { Request, Response } from 'express';
import { authenticatedUserId } from '../middleware/auth';
import { NOT_CHECKED, fakeDetectionService } from '../services/fakeDetectionService';
import { loadReputation, withReputation } from '../services/reputationService';
import {
  Complaint,
  findComplaint,
  insertComplaint,
  listComplaintsByUser,
  listRecentComplaints,
} from '../services/complaintRepository';
import { DeniedDecision, canRegisterComplaint } from '../utils/accessPolicy';
import { decisionErrorBody } from '../utils/decisionResponse';
import { applyRegistration } from '../utils/reputationLedger';
import { handleDatabaseError } from '../utils/dbErrorHandler';
import { asInteger, asTrimmedString } from '../utils/validation';

const MAX_DESCRIPTION_LENGTH = 2000;

type RegistrationOutcome =
  | { kind: 'denied'; decision: DeniedDecision }
  | { kind: 'created'; complaint: Complaint };

// Public view used for tracking; no reporter identity or detector data
const toTrackingView = (complaint: Complaint) => ({
  id: complaint.id,
  issueType: complaint.issueType,
  location: complaint.location,
  status: complaint.status,
  createdAt: complaint.createdAt,
  updatedAt: complaint.updatedAt,
});

// POST /api/v1/complaints
export const createComplaint = async (req: Request, res: Response) => {
  try {
    const userId = authenticatedUserId(req);
    const description = asTrimmedString(req.body?.description);
    const issueType = asTrimmedString(req.body?.issue_type) ?? 'unknown';
    const location = asTrimmedString(req.body?.location) ?? null;

    if (!description || description.length > MAX_DESCRIPTION_LENGTH) {
      return res.status(400).json({
        error: {
          code: 'VALIDATION_ERROR',
          message: `Description is required (max ${MAX_DESCRIPTION_LENGTH} characters)`,
          fields: { description: 'Invalid description' },
        },
      });
    }

    // Fast rejection before consulting the detector
    const reputation = loadReputation(userId);
    if (!reputation) {
      return res.status(404).json({
        error: { code: 'NOT_FOUND', message: 'User not found' },
      });
    }
    const precheck = canRegisterComplaint(reputation.points, reputation.pendingComplaints);
    if (precheck.status !== 'allowed') {
      return res.status(403).json(decisionErrorBody(precheck));
    }

    const verdict = fakeDetectionService.enabled
      ? await fakeDetectionService.check({
          description,
          issueType,
          location,
          recentComplaints: listRecentComplaints(50).map(c => ({ description: c.description, location: c.location })),
        })
      : NOT_CHECKED;

    // Re-check under the user's lock: another submission may have landed meanwhile
    const update = await withReputation<RegistrationOutcome>(userId, current => {
      const decision = canRegisterComplaint(current.points, current.pendingComplaints);
      if (decision.status !== 'allowed') {
        return { reputation: current, result: { kind: 'denied', decision } };
      }

      const complaint = insertComplaint({
        userId,
        issueType,
        description,
        location,
        fake: verdict.fake,
        fakeScore: verdict.score,
      });
      return { reputation: applyRegistration(current), result: { kind: 'created', complaint } };
    });

    if (!update) {
      return res.status(404).json({
        error: { code: 'NOT_FOUND', message: 'User not found' },
      });
    }
    if (update.result.kind === 'denied') {
      return res.status(403).json(decisionErrorBody(update.result.decision));
    }

    const { complaint } = update.result;
    console.log(`📝 Complaint ${complaint.id} registered by ${userId}${complaint.fake ? ' (flagged for review)' : ''}`);

    return res.status(201).json({
      complaint,
      flaggedForReview: complaint.fake,
      message: complaint.fake
        ? `Report submitted but flagged for review. Complaint ID: ${complaint.id}`
        : `Report submitted successfully! Complaint ID: ${complaint.id}`,
      reputation: update.reputation,
    });
  } catch (error) {
    console.error('Create complaint error:', error);
    const handled = handleDatabaseError(error, 'Failed to register complaint');
    res.status(handled.status).json({ error: handled.error });
  }
};

// GET /api/v1/complaints/mine
export const getMyComplaints = async (req: Request, res: Response) => {
  try {
    const userId = authenticatedUserId(req);
    const limit = Math.min(Math.max(asInteger(req.query.limit) ?? 20, 1), 100);
    const offset = Math.max(asInteger(req.query.offset) ?? 0, 0);

    const complaints = listComplaintsByUser(userId, limit, offset);

    return res.status(200).json({
      data: complaints,
      limit,
      offset,
    });
  } catch (error) {
    console.error('Get my complaints error:', error);
    res.status(500).json({
      error: { code: 'INTERNAL_ERROR', message: 'Failed to fetch complaints' },
    });
  }
};

// GET /api/v1/complaints/:id
export const trackComplaint = async (req: Request, res: Response) => {
  try {
    const id = req.params.id.trim();
    const complaint = findComplaint(id);

    if (!complaint) {
      return res.status(404).json({
        error: { code: 'NOT_FOUND', message: `Complaint not found: ${id}` },
      });
    }

    return res.status(200).json(toTrackingView(complaint));
  } catch (error) {
    console.error('Track complaint error:', error);
    res.status(500).json({
      error: { code: 'INTERNAL_ERROR', message: 'Failed to fetch complaint' },
    });
  }
};
