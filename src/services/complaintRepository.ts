import { randomUUID } from 'crypto'
import db from '../config/sqlite'
import { ComplaintStatus, isComplaintStatus } from '../utils/reputationLedger'

export interface ComplaintRow {
  id: string
  user_id: string
  issue_type: string
  description: string
  location: string | null
  status: string
  fake: number
  fake_score: number
  fake_penalty_applied: number
  created_at: string
  updated_at: string
}

export interface Complaint {
  id: string
  userId: string
  issueType: string
  description: string
  location: string | null
  status: ComplaintStatus
  fake: boolean
  fakeScore: number
  fakePenaltyApplied: boolean
  createdAt: string
  updatedAt: string
}

export interface NewComplaint {
  userId: string
  issueType: string
  description: string
  location: string | null
  fake: boolean
  fakeScore: number
}

export const toComplaint = (row: ComplaintRow): Complaint => ({
  id: row.id,
  userId: row.user_id,
  issueType: row.issue_type,
  description: row.description,
  location: row.location,
  // Unknown legacy values are treated as still open
  status: isComplaintStatus(row.status) ? row.status : 'submitted',
  fake: row.fake === 1,
  fakeScore: row.fake_score,
  fakePenaltyApplied: row.fake_penalty_applied === 1,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
})

// Short ids are what citizens copy to track a complaint
export const generateComplaintId = (): string => randomUUID().replace(/-/g, '').slice(0, 8)

export const findComplaint = (id: string): Complaint | null => {
  const row = db.prepare<[string], ComplaintRow>('SELECT * FROM complaints WHERE id = ?').get(id)
  return row ? toComplaint(row) : null
}

export const listComplaintsByUser = (userId: string, limit = 50, offset = 0): Complaint[] =>
  db
    .prepare<[string, number, number], ComplaintRow>(`
      SELECT * FROM complaints WHERE user_id = ?
      ORDER BY created_at DESC, rowid DESC
      LIMIT ? OFFSET ?
    `)
    .all(userId, limit, offset)
    .map(toComplaint)

export const listRecentComplaints = (limit = 50): Complaint[] =>
  db
    .prepare<[number], ComplaintRow>('SELECT * FROM complaints ORDER BY created_at DESC, rowid DESC LIMIT ?')
    .all(limit)
    .map(toComplaint)

export const insertComplaint = (complaint: NewComplaint): Complaint => {
  const id = generateComplaintId()

  db.prepare(`
    INSERT INTO complaints (id, user_id, issue_type, description, location, status, fake, fake_score)
    VALUES (?, ?, ?, ?, ?, 'submitted', ?, ?)
  `).run(
    id,
    complaint.userId,
    complaint.issueType,
    complaint.description,
    complaint.location,
    complaint.fake ? 1 : 0,
    complaint.fakeScore
  )

  const created = findComplaint(id)
  if (!created) {
    throw new Error(`Complaint ${id} missing right after insert`)
  }
  return created
}

export const updateComplaintStatus = (id: string, status: ComplaintStatus): void => {
  db.prepare('UPDATE complaints SET status = ?, updated_at = CURRENT_TIMESTAMP WHERE id = ?').run(status, id)
}

export const markFakePenaltyApplied = (id: string): void => {
  db.prepare(`
    UPDATE complaints SET fake = 1, fake_penalty_applied = 1, updated_at = CURRENT_TIMESTAMP WHERE id = ?
  `).run(id)
}

export const deleteComplaint = (id: string): void => {
  db.prepare('DELETE FROM complaints WHERE id = ?').run(id)
}
