import request from 'supertest';
import { Application } from 'express';
import { createApp } from '../src/app';
import { healthService } from '../src/services';

describe('Health routes', () => {
  let app: Application;

  beforeAll(() => {
    app = createApp();
  });

  it('GET /api/v1/health reports process status as JSON', async () => {
    const response = await request(app).get('/api/v1/health');

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toMatch(/application\/json/);
    expect(response.body.message).toBe('Service is healthy');
    expect(response.body.data).toMatchObject({ status: 'healthy', environment: 'test' });
  });

  it('GET /api/v1/health/ready is ready against the migrated test database', async () => {
    const response = await request(app).get('/api/v1/health/ready');

    expect(response.status).toBe(200);
    expect(response.body.data).toEqual({
      ready: true,
      checks: { server: true, database: true, migrations: true },
      pendingMigrations: [],
    });
  });

  it('GET /api/v1/health/ready answers 503 naming the failing checks', async () => {
    const spy = jest.spyOn(healthService, 'checkReadiness').mockResolvedValue({
      ready: false,
      checks: { server: true, database: false, migrations: false },
      pendingMigrations: [],
    });

    try {
      const response = await request(app).get('/api/v1/health/ready');

      expect(response.status).toBe(503);
      expect(response.body).toMatchObject({
        success: false,
        error: 'Service is not ready: database, migrations',
        code: 'SERVICE_UNAVAILABLE',
      });
    } finally {
      spy.mockRestore();
    }
  });

  it('GET /api/v1/health/live answers without touching the database', async () => {
    const response = await request(app).get('/api/v1/health/live');

    expect(response.status).toBe(200);
    expect(response.body.data).toEqual({ alive: true });
  });
});
