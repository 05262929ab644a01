import { Request, Response } from 'express'
import { randomUUID } from 'crypto'
import db from '../config/sqlite'
import { authenticatedUserId } from '../middleware/auth'
import { withReputation, rowToReputation } from '../services/reputationService'
import {
  Complaint,
  deleteComplaint as removeComplaint,
  findComplaint,
  markFakePenaltyApplied,
  updateComplaintStatus as saveComplaintStatus,
} from '../services/complaintRepository'
import { canLogin } from '../utils/accessPolicy'
import { buildStatsSummary } from '../utils/statsSummary'
import {
  ComplaintOutcomeEvent,
  ComplaintStatus,
  applyEvent,
  applyFakeFlag,
  applyPointAdjustment,
  applyRejection,
  eventForStatusChange,
  isComplaintStatus,
  isPendingStatus,
} from '../utils/reputationLedger'
import { handleDatabaseError } from '../utils/dbErrorHandler'
import { asInteger, asTrimmedString } from '../utils/validation'

interface UserStatsRow {
  id: string
  username: string
  email: string
  role: string
  points: number
  total_complaints: number
  resolved_complaints: number
  fake_complaints: number
  pending_complaints: number
  manual_points: number
  created_at: string
}

type ComplaintChange =
  | { kind: 'missing' }
  | { kind: 'closed'; status: ComplaintStatus }
  | { kind: 'already_flagged' }
  | { kind: 'updated'; complaint: Complaint | null; event: ComplaintOutcomeEvent | null }

type PointAdjustment = { kind: 'applied' } | { kind: 'out_of_range' }

const notFound = (res: Response, id: string) =>
  res.status(404).json({
    error: { code: 'NOT_FOUND', message: `Complaint not found: ${id}` },
  })

const closedComplaint = (res: Response, status: ComplaintStatus) =>
  res.status(409).json({
    error: {
      code: 'INVALID_TRANSITION',
      message: `Complaint is already ${status}; only pending complaints can be changed`,
    },
  })

const failed = (res: Response, error: unknown, message: string) => {
  const handled = handleDatabaseError(error, message)
  res.status(handled.status).json({ error: handled.error })
}

// PATCH /api/v1/admin/complaints/:id/status
export const updateComplaintStatus = async (req: Request, res: Response) => {
  try {
    const { id } = req.params
    const status: unknown = req.body?.status

    if (!isComplaintStatus(status)) {
      return res.status(400).json({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'status must be one of submitted, in_progress, resolved, rejected, closed',
          fields: { status: 'Invalid status' },
        },
      })
    }

    const complaint = findComplaint(id)
    if (!complaint) return notFound(res, id)

    const update = await withReputation<ComplaintChange>(complaint.userId, current => {
      // Re-read inside the transaction; the complaint may have moved since
      const fresh = findComplaint(id)
      if (!fresh) return { reputation: current, result: { kind: 'missing' } }
      if (!isPendingStatus(fresh.status)) {
        return { reputation: current, result: { kind: 'closed', status: fresh.status } }
      }

      saveComplaintStatus(id, status)

      // A penalized fake complaint already released its pending slot
      const event = fresh.fakePenaltyApplied ? null : eventForStatusChange(fresh.userId, fresh.status, status, fresh.fake)

      return {
        reputation: event ? applyEvent(current, event) : current,
        result: { kind: 'updated', complaint: findComplaint(id), event },
      }
    })

    if (!update || update.result.kind === 'missing') return notFound(res, id)
    if (update.result.kind === 'closed') return closedComplaint(res, update.result.status)
    if (update.result.kind !== 'updated') return notFound(res, id)

    console.log(`📋 Status updated: ${id} ${complaint.status} -> ${status}`)

    return res.status(200).json({
      complaint: update.result.complaint,
      event: update.result.event ? update.result.event.type : null,
      reporter: update.reputation,
    })
  } catch (error) {
    console.error('Update complaint status error:', error)
    failed(res, error, 'Failed to update status')
  }
}

// POST /api/v1/admin/complaints/:id/flag-fake
export const flagComplaintFake = async (req: Request, res: Response) => {
  try {
    const { id } = req.params
    const complaint = findComplaint(id)
    if (!complaint) return notFound(res, id)

    const update = await withReputation<ComplaintChange>(complaint.userId, current => {
      const fresh = findComplaint(id)
      if (!fresh) return { reputation: current, result: { kind: 'missing' } }
      // The ledger does not deduplicate; the complaint row does
      if (fresh.fakePenaltyApplied) return { reputation: current, result: { kind: 'already_flagged' } }
      if (!isPendingStatus(fresh.status)) {
        return { reputation: current, result: { kind: 'closed', status: fresh.status } }
      }

      markFakePenaltyApplied(id)
      return {
        reputation: applyFakeFlag(current),
        result: { kind: 'updated', complaint: findComplaint(id), event: { type: 'flagged_fake', userId: fresh.userId } },
      }
    })

    if (!update || update.result.kind === 'missing') return notFound(res, id)
    if (update.result.kind === 'closed') return closedComplaint(res, update.result.status)
    if (update.result.kind === 'already_flagged') {
      return res.status(409).json({
        error: { code: 'ALREADY_FLAGGED', message: 'Complaint was already flagged as fake' },
      })
    }

    const banned = canLogin(update.reputation.points).status === 'permanently_banned'
    console.log(`🚩 Complaint ${id} flagged fake; reporter now at ${update.reputation.points} points${banned ? ' (banned)' : ''}`)

    return res.status(200).json({
      complaint: update.result.complaint,
      reporter: update.reputation,
      reporterBanned: banned,
    })
  } catch (error) {
    console.error('Flag fake error:', error)
    failed(res, error, 'Failed to flag complaint')
  }
}

// DELETE /api/v1/admin/complaints/:id
export const deleteComplaint = async (req: Request, res: Response) => {
  try {
    const { id } = req.params
    const complaint = findComplaint(id)
    if (!complaint) return notFound(res, id)

    const update = await withReputation<ComplaintChange>(complaint.userId, current => {
      const fresh = findComplaint(id)
      if (!fresh) return { reputation: current, result: { kind: 'missing' } }

      removeComplaint(id)

      // Deleting an open complaint frees its pending slot
      const releasesSlot = isPendingStatus(fresh.status) && !fresh.fakePenaltyApplied
      return {
        reputation: releasesSlot ? applyRejection(current) : current,
        result: {
          kind: 'updated',
          complaint: null,
          event: releasesSlot ? { type: 'rejected', userId: fresh.userId } : null,
        },
      }
    })

    if (!update || update.result.kind === 'missing') return notFound(res, id)

    console.log(`🗑️ Admin deleted complaint: ${id}`)
    return res.status(200).json({ success: true, reporter: update.reputation })
  } catch (error) {
    console.error('Delete complaint error:', error)
    failed(res, error, 'Failed to delete complaint')
  }
}

// POST /api/v1/admin/users/:id/adjust-points
export const adjustUserPoints = async (req: Request, res: Response) => {
  try {
    const actorId = authenticatedUserId(req)
    const { id } = req.params
    const delta = asInteger(req.body?.points_delta)
    const reason = asTrimmedString(req.body?.reason) ?? null

    if (delta === undefined || delta === 0) {
      return res.status(400).json({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'points_delta must be a non-zero integer',
          fields: { points_delta: 'Invalid points' },
        },
      })
    }

    const update = await withReputation<PointAdjustment>(id, current => {
      const points = current.points + delta
      if (!Number.isSafeInteger(points)) {
        return { reputation: current, result: { kind: 'out_of_range' } }
      }

      db.prepare('UPDATE users SET manual_points = manual_points + ? WHERE id = ?').run(delta, id)
      db.prepare(`
        INSERT INTO point_adjustments (id, user_id, actor_id, delta, reason) VALUES (?, ?, ?, ?, ?)
      `).run(randomUUID(), id, actorId, delta, reason)

      return { reputation: applyPointAdjustment(current, delta), result: { kind: 'applied' } }
    })

    if (!update) {
      return res.status(404).json({
        error: { code: 'NOT_FOUND', message: 'User not found' },
      })
    }
    if (update.result.kind === 'out_of_range') {
      return res.status(400).json({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'points_delta would take the balance out of range',
          fields: { points_delta: 'Invalid points' },
        },
      })
    }

    console.log(`⚖️ Admin ${actorId} adjusted points for ${id}: ${delta > 0 ? '+' : ''}${delta}, new total: ${update.reputation.points}`)

    return res.status(200).json({
      success: true,
      newPoints: update.reputation.points,
      banned: canLogin(update.reputation.points).status === 'permanently_banned',
    })
  } catch (error) {
    console.error('Adjust points error:', error)
    failed(res, error, 'Failed to adjust points')
  }
}

// GET /api/v1/admin/users
export const getUsersWithStats = async (req: Request, res: Response) => {
  try {
    const rows = db
      .prepare<[], UserStatsRow>(`
        SELECT id, username, email, role, points, total_complaints, resolved_complaints,
               fake_complaints, pending_complaints, manual_points, created_at
        FROM users
        ORDER BY created_at DESC, rowid DESC
      `)
      .all()

    const users = rows.map(row => ({
      id: row.id,
      username: row.username,
      email: row.email,
      role: row.role,
      manualPoints: row.manual_points,
      createdAt: row.created_at,
      stats: buildStatsSummary(rowToReputation(row)),
    }))

    return res.status(200).json({ data: users, total: users.length })
  } catch (error) {
    console.error('Get users error:', error)
    failed(res, error, 'Failed to fetch users')
  }
}
