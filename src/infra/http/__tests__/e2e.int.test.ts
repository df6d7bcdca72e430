import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import request from 'supertest';
import { resolve } from 'path';
import type { Express } from 'express';
import type { Pool } from 'pg';
import dotenv from 'dotenv';
import { createApp } from '../app.js';
import { createPool } from '../../db/pool.js';
import { runMigrations } from '../../db/migrate.js';
import { PgUserRepo } from '../../db/pgUserRepo.js';
import { createLogger } from '../../logging/logger.js';
import { UserService } from '../../../application/users/userService.js';

dotenv.config();

const describeDb = process.env.DATABASE_URL ? describe : describe.skip;

describeDb('E2E: user lifecycle', () => {
  const logger = createLogger({ level: 'silent', pretty: false });
  let pool: Pool;
  let app: Express;
  let userId: number | undefined;

  beforeAll(async () => {
    pool = createPool(
      {
        url: process.env.DATABASE_URL ?? '',
        poolMax: 5,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
      },
      logger
    );
    await runMigrations(pool, resolve(process.cwd(), 'migrations'), logger);

    app = createApp({
      userService: new UserService(new PgUserRepo(pool)),
      logger,
      healthCheck: () => pool.query('SELECT 1'),
      corsOrigins: ['http://localhost:4200'],
      rateLimitPerMinute: 1000,
    });
  });

  afterAll(async () => {
    if (userId !== undefined) {
      await pool.query('DELETE FROM users WHERE id = $1', [userId]);
    }
    await pool.end();
  });

  it('should create, read, update and deactivate a user', async () => {
    const stamp = Date.now();
    const email = `e2e-${stamp}@example.com`;

    // 1. Create
    const createRes = await request(app)
      .post('/api/v1/users')
      .send({ email, username: `e2e_${stamp}`, fullName: 'E2E User' });

    expect(createRes.status).toBe(201);
    expect(createRes.body.isActive).toBe(true);
    userId = createRes.body.id;

    // 2. Duplicate email
    const dupRes = await request(app)
      .post('/api/v1/users')
      .send({ email, username: `e2e_other_${stamp}`, fullName: 'Other' });

    expect(dupRes.status).toBe(409);
    expect(dupRes.body.details).toEqual({ field: 'email' });

    // 3. Lookup by email
    const byEmailRes = await request(app).get(`/api/v1/users/by-email/${email}`);
    expect(byEmailRes.status).toBe(200);
    expect(byEmailRes.body.id).toBe(userId);

    // 4. Rename
    const patchRes = await request(app)
      .patch(`/api/v1/users/${userId}`)
      .send({ fullName: 'Renamed' });

    expect(patchRes.status).toBe(200);
    expect(patchRes.body.fullName).toBe('Renamed');

    // 5. Deactivate
    const deactivateRes = await request(app).post(`/api/v1/users/${userId}/deactivate`);

    expect(deactivateRes.status).toBe(200);
    expect(deactivateRes.body.isActive).toBe(false);
    expect(Date.parse(deactivateRes.body.updatedAt)).toBeGreaterThan(
      Date.parse(patchRes.body.updatedAt)
    );
  });

  it('should report the database as healthy', async () => {
    const res = await request(app).get('/healthz');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok' });
  });
});
