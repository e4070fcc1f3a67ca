/**
 * E2E TEST - Applicants API
 *
 * HTTP Request → Controller → Service → Policy → Sequence → Repository → SQLite (in-memory)
 */

import { NestFastifyApplication } from '@nestjs/platform-fastify';
import request from 'supertest';
import { UserRole } from '@/domain/models';
import type { UserRepository } from '@/domain/repositories';
import { USER_REPOSITORY } from '@/domain/repositories';
import { buildApplicantInput } from '@/testing';
import { createTestApp } from '@/testing/test-app';

describe('Applicants API (E2E)', () => {
  let app: NestFastifyApplication;
  let collectorId: string;

  const post = (body: Record<string, unknown>, userId: string = collectorId) =>
    request(app.getHttpServer()).post('/applicants').set('x-user-id', userId).send(body);

  beforeAll(async () => {
    app = await createTestApp();

    const users = app.get<UserRepository>(USER_REPOSITORY);
    const collector = await users.create({
      email: 'collector@example.com',
      passwordHash: 'hash-placeholder',
      role: UserRole.COLLECTOR,
    });
    collectorId = collector.id;
  }, 30000);

  afterAll(async () => {
    await app?.close();
  }, 10000);

  // ============================================================
  // POST /applicants
  // ============================================================

  describe('POST /applicants', () => {
    it('should store an applicant and return 201 with the assigned number', async () => {
      const response = await post(buildApplicantInput({ maleEmployees: 4, femaleEmployees: 1 }));

      expect(response.status).toBe(201);
      expect(response.body).toMatchObject({
        region: 'Amhara',
        firstName: 'Abebe',
        maleEmployees: 4,
        femaleEmployees: 1,
        totalEmployees: 5,
        collectedBy: collectorId,
      });
      expect(response.body.autoNumber).toEqual(expect.any(Number));
      expect(response.body.id).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should assign increasing numbers to sequential inserts', async () => {
      const first = await post(buildApplicantInput());
      const second = await post(buildApplicantInput());

      expect(second.body.autoNumber).toBeGreaterThan(first.body.autoNumber);
    });

    it('should assign distinct numbers to concurrent inserts', async () => {
      const responses = await Promise.all(Array.from({ length: 8 }, () => post(buildApplicantInput())));

      expect(responses.every((response) => response.status === 201)).toBe(true);
      const numbers = responses.map((response) => response.body.autoNumber);
      expect(new Set(numbers).size).toBe(8);
    });

    it('should accept anonymous inserts under the open policy', async () => {
      const response = await request(app.getHttpServer()).post('/applicants').send(buildApplicantInput());

      expect(response.status).toBe(201);
      expect(response.body.collectedBy).toBeNull();
    });

    it('should return 400 with the field for a value outside a closed set', async () => {
      const response = await post(buildApplicantInput({ sex: 'x' }));

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        statusCode: 400,
        error: 'Bad Request',
        message: 'sex must be one of: m, f',
        field: 'sex',
        value: 'x',
        path: '/applicants',
      });
    });

    it.each(['m', 'f'])('should accept sex %s', async (sex) => {
      const response = await post(buildApplicantInput({ sex }));

      expect(response.status).toBe(201);
      expect(response.body.sex).toBe(sex);
    });

    it.each(['2024-02-31', '1990-13-45', '0000-00-00'])(
      'should return 400 for the impossible date of birth %s',
      async (dateOfBirth) => {
        const response = await post(buildApplicantInput({ dateOfBirth }));

        expect(response.status).toBe(400);
        expect(response.body).toMatchObject({
          message: 'dateOfBirth must be a date in YYYY-MM-DD format',
          field: 'dateOfBirth',
          value: dateOfBirth,
        });
      },
    );

    it('should keep an explicit null collector for a known caller', async () => {
      const response = await post(buildApplicantInput({ collectedBy: null }));

      expect(response.status).toBe(201);
      expect(response.body.collectedBy).toBeNull();
    });

    it('should return 400 when totalEmployees is supplied', async () => {
      const response = await post(buildApplicantInput({ totalEmployees: 99 }));

      expect(response.status).toBe(400);
      expect(response.body.field).toBe('totalEmployees');
    });

    it('should return 400 when a required field is missing', async () => {
      const input = buildApplicantInput();
      delete input.cbeAccountNumber;

      const response = await post(input);

      expect(response.status).toBe(400);
      expect(response.body.field).toBe('cbeAccountNumber');
    });
  });

  // ============================================================
  // GET /applicants, GET /applicants/:auto_number
  // ============================================================

  describe('GET /applicants', () => {
    it('should return a page ordered by auto number', async () => {
      const response = await request(app.getHttpServer()).get('/applicants').query({ page: 1, limit: 3 });

      expect(response.status).toBe(200);
      expect(response.body.page).toBe(1);
      expect(response.body.limit).toBe(3);
      expect(response.body.data).toHaveLength(3);
      const numbers: number[] = response.body.data.map((row: { autoNumber: number }) => row.autoNumber);
      expect(numbers).toEqual([...numbers].sort((a, b) => a - b));
    });

    it('should filter by region', async () => {
      await post(buildApplicantInput({ region: 'Sidama' }));

      const response = await request(app.getHttpServer()).get('/applicants').query({ region: 'Sidama' });

      expect(response.status).toBe(200);
      expect(response.body.total).toBe(1);
      expect(response.body.data[0].region).toBe('Sidama');
    });

    it('should return 400 for an impossible date bound', async () => {
      const response = await request(app.getHttpServer()).get('/applicants').query({ collected_from: '2024-02-30' });

      expect(response.status).toBe(400);
      expect(response.body.field).toBe('collected_from');
    });

    it('should return 400 for an invalid limit', async () => {
      const response = await request(app.getHttpServer()).get('/applicants').query({ limit: 500 });

      expect(response.status).toBe(400);
      expect(response.body.field).toBe('limit');
    });
  });

  describe('GET /applicants/:auto_number', () => {
    it('should return the applicant', async () => {
      const created = await post(buildApplicantInput({ firstName: 'Hana' }));

      const response = await request(app.getHttpServer()).get(`/applicants/${created.body.autoNumber}`);

      expect(response.status).toBe(200);
      expect(response.body.id).toBe(created.body.id);
      expect(response.body.firstName).toBe('Hana');
    });

    it('should return 404 for an unknown number', async () => {
      const response = await request(app.getHttpServer()).get('/applicants/999999');

      expect(response.status).toBe(404);
    });
  });

  // ============================================================
  // GET /applicants/export/csv
  // ============================================================

  describe('GET /applicants/export/csv', () => {
    it('should stream a CSV with a header and one line per match', async () => {
      await post(buildApplicantInput({ region: 'Gambela', registeredAddress: 'Market, Stall 4' }));
      await post(buildApplicantInput({ region: 'Gambela' }));

      const response = await request(app.getHttpServer()).get('/applicants/export/csv').query({ region: 'Gambela' });

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toContain('text/csv');
      const lines = response.text.trimEnd().split('\n');
      expect(lines).toHaveLength(3);
      expect(lines[0].startsWith('auto_number,id,region,')).toBe(true);
      expect(lines[1]).toContain(',Gambela,');
      expect(lines[1]).toContain('"Market, Stall 4"');
    });
  });
});

describe('Applicants API with role-scoped inserts (E2E)', () => {
  let app: NestFastifyApplication;

  beforeAll(async () => {
    app = await createTestApp({ insertRoles: [UserRole.COLLECTOR] });
  }, 30000);

  afterAll(async () => {
    await app?.close();
  }, 10000);

  it('should return 403 for anonymous inserts', async () => {
    const response = await request(app.getHttpServer()).post('/applicants').send(buildApplicantInput());

    expect(response.status).toBe(403);
    expect(response.body.message).toBe('Not authorized to insert applicants');
  });

  it('should accept inserts from collectors', async () => {
    const users = app.get<UserRepository>(USER_REPOSITORY);
    const collector = await users.create({
      email: 'scoped@example.com',
      passwordHash: 'hash-placeholder',
      role: UserRole.COLLECTOR,
    });

    const response = await request(app.getHttpServer())
      .post('/applicants')
      .set('x-user-id', collector.id)
      .send(buildApplicantInput());

    expect(response.status).toBe(201);
    expect(response.body.autoNumber).toBe(1);
  });
});
