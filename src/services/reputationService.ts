import db from '../config/sqlite'
import { UserReputation } from '../utils/reputationLedger'
import { withRetry } from '../utils/databaseRetry'
import { withUserLock } from '../utils/userLock'

interface ReputationRow {
  points: number
  total_complaints: number
  resolved_complaints: number
  fake_complaints: number
  pending_complaints: number
}

export interface ReputationUpdate<T> {
  reputation: UserReputation
  result: T
}

export const rowToReputation = (row: ReputationRow): UserReputation => ({
  points: row.points,
  totalComplaints: row.total_complaints,
  resolvedComplaints: row.resolved_complaints,
  fakeComplaints: row.fake_complaints,
  pendingComplaints: row.pending_complaints,
})

export const loadReputation = (userId: string): UserReputation | null => {
  const row = db
    .prepare<[string], ReputationRow>(`
      SELECT points, total_complaints, resolved_complaints, fake_complaints, pending_complaints
      FROM users WHERE id = ?
    `)
    .get(userId)

  return row ? rowToReputation(row) : null
}

const saveReputation = (userId: string, rep: UserReputation): void => {
  db.prepare(`
    UPDATE users
    SET points = ?, total_complaints = ?, resolved_complaints = ?, fake_complaints = ?,
        pending_complaints = ?, updated_at = CURRENT_TIMESTAMP
    WHERE id = ?
  `).run(
    rep.points,
    rep.totalComplaints,
    rep.resolvedComplaints,
    rep.fakeComplaints,
    rep.pendingComplaints,
    userId
  )
}

/**
 * Read-modify-write of one user's reputation. Runs under the per-user lock and
 * inside a single transaction, so `work` may also write complaint rows that
 * must commit together with the new balance. Resolves to null for an unknown user.
 */
export const withReputation = <T>(
  userId: string,
  work: (current: UserReputation) => ReputationUpdate<T>
): Promise<ReputationUpdate<T> | null> =>
  withUserLock(userId, () =>
    withRetry(() =>
      db.transaction((): ReputationUpdate<T> | null => {
        const current = loadReputation(userId)
        if (!current) return null

        const update = work(current)
        if (update.reputation !== current) {
          saveReputation(userId, update.reputation)

          const delta = update.reputation.points - current.points
          if (delta !== 0) {
            console.log(`🏅 Points ${delta > 0 ? '+' : ''}${delta} for user ${userId} (now ${update.reputation.points})`)
          }
        }
        return update
      })()
    )
  )
