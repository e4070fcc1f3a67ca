/**
 * E2E TEST - Admin API
 *
 * HTTP Request → ServiceRoleAuthority → AdminController → Services → Repositories → SQLite (in-memory)
 */

import { NestFastifyApplication } from '@nestjs/platform-fastify';
import request from 'supertest';
import { buildApplicantInput, COLLECTOR_ID } from '@/testing';
import { createTestApp, TEST_SERVICE_ROLE_KEY } from '@/testing/test-app';

describe('Admin API (E2E)', () => {
  let app: NestFastifyApplication;

  const createApplicant = async (overrides: Record<string, unknown> = {}) => {
    const response = await request(app.getHttpServer()).post('/applicants').send(buildApplicantInput(overrides));
    return response.body;
  };

  beforeAll(async () => {
    app = await createTestApp();
  }, 30000);

  afterAll(async () => {
    await app?.close();
  }, 10000);

  // ============================================================
  // Service role key
  // ============================================================

  describe('service role key', () => {
    it('should return 403 without the key', async () => {
      const response = await request(app.getHttpServer())
        .post('/admin/users')
        .send({ email: 'nokey@example.com', passwordHash: 'hash-placeholder', role: 'collector' });

      expect(response.status).toBe(403);
      expect(response.body.message).toBe('A valid service role key is required');
    });

    it('should return 403 with a wrong key', async () => {
      const response = await request(app.getHttpServer())
        .get('/admin/users/anyone@example.com')
        .set('x-service-role-key', 'wrong-key');

      expect(response.status).toBe(403);
    });
  });

  // ============================================================
  // Users
  // ============================================================

  describe('POST /admin/users', () => {
    it('should create a user with a normalized email and hide the hash', async () => {
      const response = await request(app.getHttpServer())
        .post('/admin/users')
        .set('x-service-role-key', TEST_SERVICE_ROLE_KEY)
        .send({ email: '  Tigist@Example.COM ', passwordHash: 'hash-placeholder', role: 'collector' });

      expect(response.status).toBe(201);
      expect(response.body).toMatchObject({ email: 'tigist@example.com', role: 'collector' });
      expect(response.body.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(response.body).not.toHaveProperty('passwordHash');
    });

    it('should return 409 for an email differing only in case', async () => {
      const response = await request(app.getHttpServer())
        .post('/admin/users')
        .set('x-service-role-key', TEST_SERVICE_ROLE_KEY)
        .send({ email: 'TIGIST@example.com', passwordHash: 'other-hash', role: 'admin' });

      expect(response.status).toBe(409);
      expect(response.body).toMatchObject({
        statusCode: 409,
        error: 'Conflict',
        message: 'email is already registered',
        field: 'email',
      });
    });

    it('should return 400 for a role outside the closed set', async () => {
      const response = await request(app.getHttpServer())
        .post('/admin/users')
        .set('x-service-role-key', TEST_SERVICE_ROLE_KEY)
        .send({ email: 'auditor@example.com', passwordHash: 'hash-placeholder', role: 'auditor' });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        message: 'role must be one of: admin, collector',
        field: 'role',
        value: 'auditor',
      });
    });
  });

  describe('GET /admin/users/:email', () => {
    it('should return the stored credentials for any letter case', async () => {
      const response = await request(app.getHttpServer())
        .get(`/admin/users/${encodeURIComponent('Tigist@example.com')}`)
        .set('x-service-role-key', TEST_SERVICE_ROLE_KEY);

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        email: 'tigist@example.com',
        passwordHash: 'hash-placeholder',
        role: 'collector',
      });
    });

    it('should return 404 for an unknown email', async () => {
      const response = await request(app.getHttpServer())
        .get('/admin/users/ghost@example.com')
        .set('x-service-role-key', TEST_SERVICE_ROLE_KEY);

      expect(response.status).toBe(404);
    });
  });

  // ============================================================
  // Applicants
  // ============================================================

  describe('PATCH /admin/applicants/:id', () => {
    it('should apply the change and recompute total employees', async () => {
      const created = await createApplicant();

      const response = await request(app.getHttpServer())
        .patch(`/admin/applicants/${created.id}`)
        .set('x-service-role-key', TEST_SERVICE_ROLE_KEY)
        .send({ femaleEmployees: 6, cbeBranch: 'Bahir Dar' });

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        id: created.id,
        autoNumber: created.autoNumber,
        maleEmployees: 3,
        femaleEmployees: 6,
        totalEmployees: 9,
        cbeBranch: 'Bahir Dar',
      });
    });

    it('should clear the collector when the patch sets it to null', async () => {
      const created = await createApplicant({ collectedBy: COLLECTOR_ID });

      const response = await request(app.getHttpServer())
        .patch(`/admin/applicants/${created.id}`)
        .set('x-service-role-key', TEST_SERVICE_ROLE_KEY)
        .send({ collectedBy: null });

      expect(created.collectedBy).toBe(COLLECTOR_ID);
      expect(response.status).toBe(200);
      expect(response.body.collectedBy).toBeNull();
    });

    it('should keep the collector when the patch leaves it out', async () => {
      const created = await createApplicant({ collectedBy: COLLECTOR_ID });

      const response = await request(app.getHttpServer())
        .patch(`/admin/applicants/${created.id}`)
        .set('x-service-role-key', TEST_SERVICE_ROLE_KEY)
        .send({ batch: 'B-07' });

      expect(response.status).toBe(200);
      expect(response.body.collectedBy).toBe(COLLECTOR_ID);
    });

    it('should return 400 for an impossible collection date', async () => {
      const created = await createApplicant();

      const response = await request(app.getHttpServer())
        .patch(`/admin/applicants/${created.id}`)
        .set('x-service-role-key', TEST_SERVICE_ROLE_KEY)
        .send({ dateCollected: '2024-04-31' });

      expect(response.status).toBe(400);
      expect(response.body.field).toBe('dateCollected');
    });

    it('should return 400 when totalEmployees is supplied', async () => {
      const created = await createApplicant();

      const response = await request(app.getHttpServer())
        .patch(`/admin/applicants/${created.id}`)
        .set('x-service-role-key', TEST_SERVICE_ROLE_KEY)
        .send({ totalEmployees: 40 });

      expect(response.status).toBe(400);
      expect(response.body.field).toBe('totalEmployees');
    });

    it('should return 403 without the key and leave the record unchanged', async () => {
      const created = await createApplicant();

      const response = await request(app.getHttpServer())
        .patch(`/admin/applicants/${created.id}`)
        .send({ maleEmployees: 10 });
      const stored = await request(app.getHttpServer()).get(`/applicants/${created.autoNumber}`);

      expect(response.status).toBe(403);
      expect(stored.body.maleEmployees).toBe(3);
    });

    it('should return 404 for an unknown id', async () => {
      const response = await request(app.getHttpServer())
        .patch('/admin/applicants/0b6e2f4c-1a3d-4e5f-9a7b-8c9d0e1f2a3b')
        .set('x-service-role-key', TEST_SERVICE_ROLE_KEY)
        .send({ maleEmployees: 1 });

      expect(response.status).toBe(404);
    });
  });

  describe('DELETE /admin/applicants/:id', () => {
    it('should remove the record', async () => {
      const created = await createApplicant();

      const response = await request(app.getHttpServer())
        .delete(`/admin/applicants/${created.id}`)
        .set('x-service-role-key', TEST_SERVICE_ROLE_KEY);
      const lookup = await request(app.getHttpServer()).get(`/applicants/${created.autoNumber}`);

      expect(response.status).toBe(204);
      expect(lookup.status).toBe(404);
    });

    it('should return 404 for an unknown id', async () => {
      const response = await request(app.getHttpServer())
        .delete('/admin/applicants/0b6e2f4c-1a3d-4e5f-9a7b-8c9d0e1f2a3b')
        .set('x-service-role-key', TEST_SERVICE_ROLE_KEY);

      expect(response.status).toBe(404);
    });

    it('should return 400 for a malformed id', async () => {
      const response = await request(app.getHttpServer())
        .delete('/admin/applicants/not-a-uuid')
        .set('x-service-role-key', TEST_SERVICE_ROLE_KEY);

      expect(response.status).toBe(400);
    });
  });
});
