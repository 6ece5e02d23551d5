import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import { ZodError } from 'zod';
import { setupTestApp, teardownTestApp, type TestContext } from '../test/test-app.js';
import { loadConfig } from '../config.js';

describe('App', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = setupTestApp();
  });

  afterEach(() => {
    teardownTestApp(ctx);
  });

  it('should describe itself at the root', async () => {
    const response = await request(ctx.app).get('/');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ success: true, data: { message: 'Foodgram API', version: '1.0.0' } });
  });

  it('should return a 404 envelope for unknown routes', async () => {
    const response = await request(ctx.app).get('/api/nothing-here');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      success: false,
      error: { code: 'NOT_FOUND', message: 'Route GET /api/nothing-here not found' },
    });
  });

  it('should reject malformed JSON', async () => {
    const response = await request(ctx.app)
      .post('/api/auth/token/login')
      .set('Content-Type', 'application/json')
      .send('{"email":');

    expect(response.status).toBe(400);
    expect(response.body.error).toEqual({ code: 'VALIDATION_ERROR', message: 'Malformed JSON body' });
  });

  it('should reject a body over the size limit', async () => {
    const response = await request(ctx.app)
      .post('/api/recipes')
      .set('Content-Type', 'application/json')
      .send(JSON.stringify({ name: 'x'.repeat(11 * 1024 * 1024) }));

    expect(response.status).toBe(413);
    expect(response.body).toEqual({
      success: false,
      error: { code: 'PAYLOAD_TOO_LARGE', message: 'Request body too large' },
    });
  });

  it('should reject an unsupported body charset', async () => {
    const response = await request(ctx.app)
      .post('/api/auth/token/login')
      .set('Content-Type', 'application/json; charset=koi8-r')
      .send('{}');

    expect(response.status).toBe(415);
    expect(response.body.error).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'unsupported charset "KOI8-R"',
    });
  });
});

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      databasePath: './data/foodgram.db',
      publicUrl: 'http://localhost:3001',
      pageSize: 6,
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      DATABASE_PATH: '/tmp/food.db',
      PUBLIC_URL: 'https://food.example',
      PAGE_SIZE: '12',
    });

    expect(config).toEqual({
      port: 8080,
      databasePath: '/tmp/food.db',
      publicUrl: 'https://food.example',
      pageSize: 12,
    });
  });

  it('should reject an out-of-range page size', () => {
    expect(() => loadConfig({ PAGE_SIZE: '0' })).toThrow(ZodError);
  });
});
