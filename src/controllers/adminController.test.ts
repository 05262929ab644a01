import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import app from '../app';
import db from '../config/sqlite';
import { UserRole } from '../lib/permissions';
import { TestUser, createTestUser, insertTestComplaint, reputationOf, resetDatabase, setPoints } from '../test/helpers';

const bearer = (user: TestUser) => `Bearer ${user.token}`;

const setStatus = (actor: TestUser, complaintId: string, status: string) =>
  request(app)
    .patch(`/api/v1/admin/complaints/${complaintId}/status`)
    .set('Authorization', bearer(actor))
    .send({ status });

const flagFake = (actor: TestUser, complaintId: string) =>
  request(app).post(`/api/v1/admin/complaints/${complaintId}/flag-fake`).set('Authorization', bearer(actor));

describe('admin workflow', () => {
  let admin: TestUser;
  let authority: TestUser;
  let reporter: TestUser;

  beforeEach(() => {
    resetDatabase();
    admin = createTestUser({ role: UserRole.ADMIN });
    authority = createTestUser({ role: UserRole.AUTHORITY });
    reporter = createTestUser({ reputation: { totalComplaints: 1, pendingComplaints: 1 } });
  });

  describe('status changes', () => {
    it('rewards the reporter when a complaint is resolved', async () => {
      const id = insertTestComplaint(reporter.id);

      const res = await setStatus(authority, id, 'resolved');

      expect(res.status).toBe(200);
      expect(res.body.event).toBe('resolved');
      expect(res.body.complaint.status).toBe('resolved');
      expect(res.body.reporter).toEqual({
        points: 10,
        totalComplaints: 1,
        resolvedComplaints: 1,
        fakeComplaints: 0,
        pendingComplaints: 0,
      });
    });

    it('leaves the reputation alone while a complaint stays open', async () => {
      const id = insertTestComplaint(reporter.id);

      const res = await setStatus(authority, id, 'in_progress');

      expect(res.status).toBe(200);
      expect(res.body.event).toBeNull();
      expect(reputationOf(reporter.id)).toMatchObject({ points: 0, pendingComplaints: 1 });

      const resolved = await setStatus(authority, id, 'resolved');
      expect(resolved.body.event).toBe('resolved');
      expect(reputationOf(reporter.id)).toMatchObject({ points: 10, pendingComplaints: 0 });
    });

    it('releases the pending slot on rejection without points', async () => {
      const id = insertTestComplaint(reporter.id);

      const res = await setStatus(admin, id, 'rejected');

      expect(res.body.event).toBe('rejected');
      expect(res.body.reporter).toMatchObject({ points: 0, resolvedComplaints: 0, pendingComplaints: 0 });
    });

    it('treats closing like rejection', async () => {
      const id = insertTestComplaint(reporter.id);
      const res = await setStatus(admin, id, 'closed');
      expect(res.body.event).toBe('rejected');
    });

    it('refuses to change a complaint that is no longer pending', async () => {
      const id = insertTestComplaint(reporter.id, { status: 'resolved' });

      const res = await setStatus(authority, id, 'rejected');

      expect(res.status).toBe(409);
      expect(res.body.error).toEqual({
        code: 'INVALID_TRANSITION',
        message: 'Complaint is already resolved; only pending complaints can be changed',
      });
      expect(reputationOf(reporter.id)).toMatchObject({ points: 0, pendingComplaints: 1 });
    });

    it('rejects an unknown status', async () => {
      const id = insertTestComplaint(reporter.id);
      const res = await setStatus(authority, id, 'done');
      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
    });

    it('returns 404 for an unknown complaint', async () => {
      const res = await setStatus(authority, 'deadbeef', 'resolved');
      expect(res.status).toBe(404);
    });

    it('is not open to citizens', async () => {
      const id = insertTestComplaint(reporter.id);
      const res = await setStatus(reporter, id, 'resolved');
      expect(res.status).toBe(403);
      expect(res.body.error.code).toBe('FORBIDDEN');
    });

    it('does not reward a complaint the detector marked fake', async () => {
      const id = insertTestComplaint(reporter.id, { fake: true });

      const res = await setStatus(authority, id, 'resolved');

      expect(res.body.event).toBe('resolved');
      expect(res.body.reporter).toMatchObject({ points: 0, resolvedComplaints: 0, pendingComplaints: 0 });
    });
  });

  describe('fake flags', () => {
    it('penalizes the reporter once', async () => {
      const id = insertTestComplaint(reporter.id);

      const res = await flagFake(authority, id);

      expect(res.status).toBe(200);
      expect(res.body.reporterBanned).toBe(false);
      expect(res.body.complaint).toMatchObject({ id, fake: true, fakePenaltyApplied: true, status: 'submitted' });
      expect(res.body.reporter).toEqual({
        points: -5,
        totalComplaints: 1,
        resolvedComplaints: 0,
        fakeComplaints: 1,
        pendingComplaints: 0,
      });

      const again = await flagFake(authority, id);
      expect(again.status).toBe(409);
      expect(again.body.error.code).toBe('ALREADY_FLAGGED');
      expect(reputationOf(reporter.id).points).toBe(-5);
    });

    it('does not touch the balance again when a flagged complaint is closed', async () => {
      const id = insertTestComplaint(reporter.id);
      await flagFake(authority, id);

      const res = await setStatus(authority, id, 'resolved');

      expect(res.status).toBe(200);
      expect(res.body.event).toBeNull();
      expect(res.body.reporter).toMatchObject({ points: -5, resolvedComplaints: 0, fakeComplaints: 1, pendingComplaints: 0 });
    });

    it('refuses to flag a closed complaint', async () => {
      const id = insertTestComplaint(reporter.id, { status: 'rejected' });
      const res = await flagFake(authority, id);
      expect(res.status).toBe(409);
      expect(res.body.error.code).toBe('INVALID_TRANSITION');
    });

    it('bans the reporter whose balance reaches the ban threshold', async () => {
      const risky = createTestUser({ reputation: { points: -35, totalComplaints: 1, pendingComplaints: 1 } });
      const id = insertTestComplaint(risky.id);

      const res = await flagFake(authority, id);

      expect(res.body.reporter.points).toBe(-40);
      expect(res.body.reporterBanned).toBe(true);

      const session = await request(app).get('/api/v1/users/me').set('Authorization', bearer(risky));
      expect(session.status).toBe(401);
      expect(session.body.forceLogout).toBe(true);
    });

    it('restricts a citizen after four fake complaints', async () => {
      const citizen = createTestUser();

      for (let i = 0; i < 4; i++) {
        const filed = await request(app)
          .post('/api/v1/complaints')
          .set('Authorization', bearer(citizen))
          .send({ description: `Made-up report ${i}` });
        expect(filed.status).toBe(201);
        expect((await flagFake(authority, filed.body.complaint.id)).status).toBe(200);
      }

      expect(reputationOf(citizen.id)).toEqual({
        points: -20,
        totalComplaints: 4,
        resolvedComplaints: 0,
        fakeComplaints: 4,
        pendingComplaints: 0,
      });

      const blocked = await request(app)
        .post('/api/v1/complaints')
        .set('Authorization', bearer(citizen))
        .send({ description: 'One more' });
      expect(blocked.status).toBe(403);
      expect(blocked.body.error.code).toBe('REGISTRATION_RESTRICTED');
    });
  });

  describe('deletion', () => {
    it('frees the pending slot of a deleted open complaint', async () => {
      const id = insertTestComplaint(reporter.id);

      const res = await request(app).delete(`/api/v1/admin/complaints/${id}`).set('Authorization', bearer(admin));

      expect(res.status).toBe(200);
      expect(res.body.success).toBe(true);
      expect(res.body.reporter).toMatchObject({ pendingComplaints: 0, totalComplaints: 1, points: 0 });
      expect((await request(app).get(`/api/v1/complaints/${id}`)).status).toBe(404);
    });

    it('keeps the balance when a closed complaint is deleted', async () => {
      const resolved = createTestUser({ reputation: { points: 10, totalComplaints: 1, resolvedComplaints: 1 } });
      const id = insertTestComplaint(resolved.id, { status: 'resolved' });

      const res = await request(app).delete(`/api/v1/admin/complaints/${id}`).set('Authorization', bearer(admin));

      expect(res.body.reporter).toEqual({
        points: 10,
        totalComplaints: 1,
        resolvedComplaints: 1,
        fakeComplaints: 0,
        pendingComplaints: 0,
      });
    });

    it('is reserved for admins', async () => {
      const id = insertTestComplaint(reporter.id);
      const res = await request(app).delete(`/api/v1/admin/complaints/${id}`).set('Authorization', bearer(authority));
      expect(res.status).toBe(403);
    });
  });

  describe('point adjustments', () => {
    const adjust = (userId: string, body: object) =>
      request(app).post(`/api/v1/admin/users/${userId}/adjust-points`).set('Authorization', bearer(admin)).send(body);

    it('applies and records manual adjustments', async () => {
      const first = await adjust(reporter.id, { points_delta: 15, reason: 'Helped the survey' });
      expect(first.status).toBe(200);
      expect(first.body).toEqual({ success: true, newPoints: 15, banned: false });

      const second = await adjust(reporter.id, { points_delta: -60 });
      expect(second.body).toEqual({ success: true, newPoints: -45, banned: true });

      const audit = db
        .prepare<[string], { delta: number; actor_id: string; reason: string | null }>(
          'SELECT delta, actor_id, reason FROM point_adjustments WHERE user_id = ? ORDER BY delta DESC'
        )
        .all(reporter.id);
      expect(audit).toEqual([
        { delta: 15, actor_id: admin.id, reason: 'Helped the survey' },
        { delta: -60, actor_id: admin.id, reason: null },
      ]);

      const manual = db.prepare<[string], { manual_points: number }>('SELECT manual_points FROM users WHERE id = ?').get(reporter.id);
      expect(manual).toEqual({ manual_points: -45 });
    });

    it('requires a non-zero integer delta', async () => {
      expect((await adjust(reporter.id, { points_delta: 0 })).status).toBe(400);
      expect((await adjust(reporter.id, { points_delta: 'many' })).status).toBe(400);
      expect((await adjust(reporter.id, { points_delta: 2.5 })).status).toBe(400);
      expect((await adjust(reporter.id, { points_delta: 1e300 })).status).toBe(400);
      expect((await adjust(reporter.id, { points_delta: 2 ** 53 })).status).toBe(400);
      expect(reputationOf(reporter.id).points).toBe(0);
    });

    it('keeps the balance a safe integer', async () => {
      setPoints(reporter.id, Number.MAX_SAFE_INTEGER - 1);

      const res = await adjust(reporter.id, { points_delta: 5 });

      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe('points_delta would take the balance out of range');
      expect(reputationOf(reporter.id).points).toBe(Number.MAX_SAFE_INTEGER - 1);
      const audit = db.prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM point_adjustments WHERE user_id = ?').get(reporter.id);
      expect(audit).toEqual({ count: 0 });
    });

    it('returns 404 for an unknown user', async () => {
      const res = await adjust('00000000-0000-0000-0000-000000000000', { points_delta: 5 });
      expect(res.status).toBe(404);
    });
  });

  it('lists users with their stats', async () => {
    const res = await request(app).get('/api/v1/admin/users').set('Authorization', bearer(admin));

    expect(res.status).toBe(200);
    expect(res.body.total).toBe(3);
    const row = res.body.data.find((u: { id: string }) => u.id === reporter.id);
    expect(row).toMatchObject({
      username: reporter.username,
      role: 'citizen',
      manualPoints: 0,
      stats: { points: 0, pendingComplaints: 1, level: 'Novice Citizen', canRegister: true },
    });
  });
});
