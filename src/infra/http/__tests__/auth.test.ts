import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import type express from 'express';
import Database from 'better-sqlite3';
import { createApp } from '../app.js';
import { CookieManager } from '../cookieManager.js';
import { SqliteExecutor } from '../../db/sqliteExecutor.js';
import { SqlUserStore } from '../../db/sqlUserStore.js';
import { JwtSessionTokens } from '../../../application/auth/sessionTokens.js';
import { Argon2Digest } from '../../../domain/auth/digest.js';

const JWT_SECRET = 'test-secret';

function sessionCookie(response: request.Response): string {
  const header = response.headers['set-cookie'];
  const cookies = Array.isArray(header) ? header : [header];
  const session = cookies.find((c) => c.startsWith('web_authenticate_session='));
  if (!session) {
    throw new Error('no session cookie set');
  }
  return session.split(';')[0];
}

describe('Auth API', () => {
  let db: Database.Database;
  let app: express.Application;
  let logger: { info: ReturnType<typeof vi.fn>; warn: ReturnType<typeof vi.fn>; error: ReturnType<typeof vi.fn> };

  function buildApp(options: { loginRateLimit?: number; healthCheck?: () => Promise<unknown> } = {}) {
    const userStore = new SqlUserStore(new SqliteExecutor(db), {
      extraColumns: ['display_name'],
      digest: new Argon2Digest({ timeCost: 2, memoryCost: 4096, parallelism: 1 }),
      logger,
    });
    return createApp({
      userStore,
      cookies: new CookieManager({ path: '/', httpOnly: true, sameSite: 'lax' }),
      sessions: new JwtSessionTokens(JWT_SECRET, 3600),
      session: { cookieName: 'session', ttlSeconds: 3600 },
      writableColumns: ['display_name'],
      logger,
      ...options,
    });
  }

  beforeEach(() => {
    db = new Database(':memory:');
    db.exec(`
      CREATE TABLE users (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        username TEXT NOT NULL UNIQUE,
        password TEXT NOT NULL,
        display_name TEXT,
        is_admin INTEGER NOT NULL DEFAULT 0
      )
    `);
    logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    app = buildApp();
  });

  afterEach(() => {
    db.close();
  });

  describe('POST /api/auth/register', () => {
    it('should register a new user', async () => {
      const response = await request(app)
        .post('/api/auth/register')
        .send({ username: 'alice', password: 'password123', values: { display_name: 'Alice' } });

      expect(response.status).toBe(201);
      expect(response.body).toEqual({ id: 1, row: { display_name: 'Alice' } });
    });

    it('should only write configured columns', async () => {
      await request(app)
        .post('/api/auth/register')
        .send({ username: 'mallory', password: 'password123', values: { is_admin: 1 } });

      expect(db.prepare('SELECT is_admin FROM users WHERE username = ?').get('mallory')).toEqual({
        is_admin: 0,
      });
    });

    it('should reject short password', async () => {
      const response = await request(app)
        .post('/api/auth/register')
        .send({ username: 'alice', password: 'short' });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({ code: 'VALIDATION_ERROR', message: 'Validation failed' });
      expect(response.body.details.issues[0].path).toBe('password');
    });

    it('should reject duplicate username', async () => {
      await request(app).post('/api/auth/register').send({ username: 'dup', password: 'password123' });

      const response = await request(app)
        .post('/api/auth/register')
        .send({ username: 'dup', password: 'password123' });

      expect(response.status).toBe(409);
      expect(response.body).toEqual({
        code: 'CONFLICT',
        message: 'User with this username already exists',
      });
    });
  });

  describe('POST /api/auth/login', () => {
    beforeEach(async () => {
      await request(app)
        .post('/api/auth/register')
        .send({ username: 'loginuser', password: 'password123', values: { display_name: 'Login' } });
    });

    it('should set the session cookie for valid credentials', async () => {
      const response = await request(app)
        .post('/api/auth/login')
        .send({ username: 'loginuser', password: 'password123' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ id: 1, row: { display_name: 'Login' } });
      const header = response.headers['set-cookie'][0];
      expect(header).toMatch(/^web_authenticate_session=[^;]+; Max-Age=3600; Path=\/; Expires=/);
      expect(header).toContain('; HttpOnly');
      expect(header).toContain('; SameSite=Lax');
    });

    it('should give the same answer for wrong password and unknown user', async () => {
      const wrongPassword = await request(app)
        .post('/api/auth/login')
        .send({ username: 'loginuser', password: 'wrongpassword' });
      const unknownUser = await request(app)
        .post('/api/auth/login')
        .send({ username: 'nobody', password: 'password123' });

      expect(wrongPassword.status).toBe(401);
      expect(unknownUser.status).toBe(401);
      expect(wrongPassword.body).toEqual({ code: 'UNAUTHORIZED', message: 'Invalid username or password' });
      expect(unknownUser.body).toEqual(wrongPassword.body);
      expect(wrongPassword.headers['set-cookie']).toBeUndefined();
      expect(logger.warn).toHaveBeenCalledTimes(2);
    });

    it('should enforce rate limit on login', async () => {
      app = buildApp({ loginRateLimit: 2 });
      const attempt = () =>
        request(app).post('/api/auth/login').send({ username: 'loginuser', password: 'wrongpassword' });

      expect((await attempt()).status).toBe(401);
      expect((await attempt()).status).toBe(401);
      const limited = await attempt();

      expect(limited.status).toBe(429);
      expect(limited.text).toBe('Too many login attempts, please try again later.');
    });
  });

  describe('session cookie', () => {
    let cookie: string;

    beforeEach(async () => {
      await request(app)
        .post('/api/auth/register')
        .send({ username: 'protected', password: 'password123', values: { display_name: 'P' } });
      const login = await request(app)
        .post('/api/auth/login')
        .send({ username: 'protected', password: 'password123' });
      cookie = sessionCookie(login);
    });

    it('should return the current user for a valid session', async () => {
      const response = await request(app).get('/api/auth/me').set('Cookie', cookie);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ id: 1, row: { display_name: 'P' } });
    });

    it('should reject request without cookie', async () => {
      const response = await request(app).get('/api/auth/me');

      expect(response.status).toBe(401);
      expect(response.body).toEqual({ code: 'UNAUTHORIZED', message: 'Not logged in' });
    });

    it('should reject a tampered session value', async () => {
      const response = await request(app)
        .get('/api/auth/me')
        .set('Cookie', 'web_authenticate_session=invalid-token');

      expect(response.status).toBe(401);
    });

    it('should ignore an unprefixed cookie of the same name', async () => {
      const value = cookie.slice('web_authenticate_session='.length);
      const response = await request(app).get('/api/auth/me').set('Cookie', `session=${value}`);

      expect(response.status).toBe(401);
    });

    it('should expire the cookie on logout', async () => {
      const response = await request(app).post('/api/auth/logout').set('Cookie', cookie);

      expect(response.status).toBe(204);
      expect(response.headers['set-cookie'][0]).toMatch(
        /^web_authenticate_session=; Max-Age=-123456789; Path=\/; Expires=/
      );
    });
  });

  describe('GET /healthz', () => {
    it('should report ok when the check passes', async () => {
      app = buildApp({ healthCheck: async () => 1 });

      const response = await request(app).get('/healthz');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'ok' });
    });

    it('should report the database as unavailable when the check fails', async () => {
      app = buildApp({ healthCheck: async () => Promise.reject(new Error('down')) });

      const response = await request(app).get('/healthz');

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ code: 'DB_UNAVAILABLE', message: 'Database unavailable' });
    });

    it('should not exist without a health check', async () => {
      expect((await request(app).get('/healthz')).status).toBe(404);
    });
  });

  it('should serve the OpenAPI document', async () => {
    const response = await request(app).get('/docs.json');

    expect(response.status).toBe(200);
    expect(response.body.openapi).toBe('3.0.0');
    expect(Object.keys(response.body.paths)).toEqual(
      expect.arrayContaining(['/api/auth/register', '/api/auth/login', '/api/auth/logout', '/api/auth/me'])
    );
  });
});
