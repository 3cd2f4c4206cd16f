// =============================================================================
// COURSEWORK — Test Suite 01: Health & Connectivity
// =============================================================================

import request from 'supertest';
import { createApp } from '../src/app';
import { buildContext, JWT_SECRET } from './helpers';

describe('Health & Connectivity', () => {
  const ctx = buildContext();

  test('GET /api/health returns healthy status', async () => {
    const res = await request(ctx.app).get('/api/health');
    expect(res.status).toBe(200);
    expect(res.body.status).toBe('healthy');
    expect(res.body.service).toBe('coursework');
    expect(res.body.version).toBe('0.1.0');
    expect(res.body.checks.database.status).toBe('not_configured');
    expect(typeof res.body.uptime).toBe('number');
  });

  test('failing database check reports degraded with 503', async () => {
    const app = createApp(ctx.services, {
      jwtSecret: JWT_SECRET,
      jwtExpirySeconds: 600,
      importMaxBytes: 1024,
      submissionMaxBytes: 1024,
      rateLimitAuthMax: 1000,
      rateLimitApiMax: 1000,
      corsOrigin: '*',
      version: '0.1.0',
      ping: async () => {
        throw new Error('connect ECONNREFUSED');
      },
    });
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    const res = await request(app).get('/api/health');
    errorSpy.mockRestore();

    expect(res.status).toBe(503);
    expect(res.body.status).toBe('degraded');
    expect(res.body.checks.database.status).toBe('unhealthy');
  });

  test('Unknown route returns 404', async () => {
    const res = await request(ctx.app).get('/api/nonexistent');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Not found', code: 'NOT_FOUND' });
  });

  test('Protected route without token returns 401', async () => {
    const res = await request(ctx.app).get('/api/assignments');
    expect(res.status).toBe(401);
    expect(res.body.code).toBe('AUTHENTICATION_REQUIRED');
  });

  test('request id is echoed back', async () => {
    const res = await request(ctx.app).get('/api/health').set('X-Request-ID', 'req-123');
    expect(res.headers['x-request-id']).toBe('req-123');
  });

  test('malformed request id is replaced', async () => {
    const res = await request(ctx.app).get('/api/health').set('X-Request-ID', 'bad id with spaces');
    expect(res.headers['x-request-id']).not.toBe('bad id with spaces');
    expect(res.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
  });

  test('malformed JSON body returns 400', async () => {
    const res = await request(ctx.app)
      .post('/api/auth/login')
      .set('Content-Type', 'application/json')
      .send('{"username": ');
    expect(res.status).toBe(400);
    expect(res.body.code).toBe('MALFORMED_BODY');
  });
});
