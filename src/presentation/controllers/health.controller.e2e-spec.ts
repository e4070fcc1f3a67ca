import { NestFastifyApplication } from '@nestjs/platform-fastify';
import request from 'supertest';
import { buildApplicantInput } from '@/testing';
import { createTestApp } from '@/testing/test-app';

describe('Health API (E2E)', () => {
  let app: NestFastifyApplication;

  beforeAll(async () => {
    app = await createTestApp();
  }, 30000);

  afterAll(async () => {
    await app?.close();
  }, 10000);

  it('should report a healthy database and the last auto number', async () => {
    await request(app.getHttpServer()).post('/applicants').send(buildApplicantInput());
    await request(app.getHttpServer()).post('/applicants').send(buildApplicantInput());

    const response = await request(app.getHttpServer()).get('/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('healthy');
    expect(response.body.database).toMatchObject({ status: 'healthy', lastAutoNumber: 2 });
  });
});
