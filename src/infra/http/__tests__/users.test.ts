import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../app.js';
import { UserService } from '../../../application/users/userService.js';
import { InMemoryUserRepo } from '../../memory/inMemoryUserRepo.js';
import { createLogger } from '../../logging/logger.js';

describe('Users API', () => {
  const T0 = '2024-01-01T00:00:00.000Z';
  let app: Express;

  beforeEach(() => {
    app = createApp({
      userService: new UserService(new InMemoryUserRepo(), () => new Date(T0)),
      logger: createLogger({ level: 'silent', pretty: false }),
      healthCheck: async () => undefined,
      corsOrigins: ['http://localhost:4200'],
      rateLimitPerMinute: 1000,
    });
  });

  const createAlice = () =>
    request(app)
      .post('/api/v1/users')
      .send({ email: 'a@x.com', username: 'alice', fullName: 'A' });

  describe('POST /api/v1/users', () => {
    it('should create a user', async () => {
      const res = await createAlice();

      expect(res.status).toBe(201);
      expect(res.body).toEqual({
        id: 1,
        email: 'a@x.com',
        username: 'alice',
        fullName: 'A',
        isActive: true,
        createdAt: T0,
        updatedAt: T0,
      });
    });

    it('should map a duplicate email to 409 CONFLICT', async () => {
      await createAlice();

      const res = await request(app)
        .post('/api/v1/users')
        .send({ email: 'a@x.com', username: 'bobby', fullName: 'B' });

      expect(res.status).toBe(409);
      expect(res.body).toEqual({
        code: 'CONFLICT',
        message: 'User with this email already exists',
        details: { field: 'email' },
      });
    });

    it('should map an invalid command to 400 VALIDATION_ERROR', async () => {
      const res = await request(app)
        .post('/api/v1/users')
        .send({ email: 'a@x.com', username: 'x'.repeat(51), fullName: 'A' });

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('VALIDATION_ERROR');
      expect(res.body.message).toBe('Validation failed');
      expect(res.body.details.issues).toHaveLength(1);
      expect(res.body.details.issues[0].path).toBe('username');
    });

    it('should reject malformed JSON with 400 INVALID_JSON', async () => {
      const res = await request(app)
        .post('/api/v1/users')
        .set('Content-Type', 'application/json')
        .send('{"email": ');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        code: 'INVALID_JSON',
        message: 'Request body is not valid JSON',
      });
    });
  });

  describe('GET /api/v1/users/:id', () => {
    it('should return the user', async () => {
      await createAlice();

      const res = await request(app).get('/api/v1/users/1');

      expect(res.status).toBe(200);
      expect(res.body.username).toBe('alice');
    });

    it('should map a missing user to 404 NOT_FOUND', async () => {
      const res = await request(app).get('/api/v1/users/42');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ code: 'NOT_FOUND', message: 'User with id 42 not found' });
    });

    it('should reject a non-numeric id', async () => {
      const res = await request(app).get('/api/v1/users/abc');

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('VALIDATION_ERROR');
      expect(res.body.details.issues[0].path).toBe('id');
    });
  });

  describe('lookups by natural key', () => {
    beforeEach(async () => {
      await createAlice();
    });

    it('should find a user by email', async () => {
      const res = await request(app).get('/api/v1/users/by-email/a@x.com');

      expect(res.status).toBe(200);
      expect(res.body.id).toBe(1);
    });

    it('should find a user by username', async () => {
      const res = await request(app).get('/api/v1/users/by-username/alice');

      expect(res.status).toBe(200);
      expect(res.body.email).toBe('a@x.com');
    });

    it('should 404 an unknown username', async () => {
      const res = await request(app).get('/api/v1/users/by-username/nobody');

      expect(res.status).toBe(404);
      expect(res.body.message).toBe('User with username nobody not found');
    });
  });

  describe('GET /api/v1/users', () => {
    it('should return a page of users', async () => {
      await createAlice();
      await request(app)
        .post('/api/v1/users')
        .send({ email: 'b@x.com', username: 'bob', fullName: 'B' });

      const res = await request(app).get('/api/v1/users').query({ limit: 1, orderBy: 'username', order: 'desc' });

      expect(res.status).toBe(200);
      expect(res.body.total).toBe(2);
      expect(res.body.offset).toBe(0);
      expect(res.body.limit).toBe(1);
      expect(res.body.users.map((u: { username: string }) => u.username)).toEqual(['bob']);
    });

    it('should reject an unknown order field', async () => {
      const res = await request(app).get('/api/v1/users').query({ orderBy: 'password' });

      expect(res.status).toBe(400);
      expect(res.body.details.issues[0].path).toBe('orderBy');
    });
  });

  describe('PATCH /api/v1/users/:id', () => {
    it('should update the full name', async () => {
      await createAlice();

      const res = await request(app).patch('/api/v1/users/1').send({ fullName: 'Alice Liddell' });

      expect(res.status).toBe(200);
      expect(res.body.fullName).toBe('Alice Liddell');
      expect(res.body.updatedAt).toBe('2024-01-01T00:00:00.001Z');
    });

    it('should not allow reactivation through an update', async () => {
      await createAlice();

      const res = await request(app).patch('/api/v1/users/1').send({ isActive: true });

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('POST /api/v1/users/:id/deactivate', () => {
    it('should deactivate the user', async () => {
      await createAlice();

      const res = await request(app).post('/api/v1/users/1/deactivate');

      expect(res.status).toBe(200);
      expect(res.body.isActive).toBe(false);
      expect(res.body.updatedAt).toBe('2024-01-01T00:00:00.001Z');
    });

    it('should 404 an unknown user', async () => {
      const res = await request(app).post('/api/v1/users/7/deactivate');

      expect(res.status).toBe(404);
      expect(res.body.code).toBe('NOT_FOUND');
    });
  });

  it('should echo the request id header', async () => {
    const res = await request(app).get('/api/v1/users').set('x-request-id', 'req-123');

    expect(res.headers['x-request-id']).toBe('req-123');
  });
});
