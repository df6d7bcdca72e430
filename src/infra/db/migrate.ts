import { readdir, readFile } from 'fs/promises';
import { join, resolve } from 'path';
import { createHash } from 'crypto';
import { AppConfig, ConfigError, DatabaseConfig } from '../../config/env.js';
import type { Logger } from '../logging/logger.js';
import { createPool } from './pool.js';
import { ConnectionPool, Queryable, withTransaction } from './transaction.js';

const MIGRATION_FILENAME = /^V(\d+)__(.+)\.sql$/;

export interface Migration {
  version: number;
  description: string;
  filename: string;
  sql: string;
  checksum: string;
}

export interface AppliedMigration {
  version: number;
  checksum: string;
}

export class MigrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MigrationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Split `V<n>__<description>.sql` into its version and description.
 * Underscores in the description read as spaces.
 */
export function parseMigrationFilename(filename: string): { version: number; description: string } {
  const match = filename.match(MIGRATION_FILENAME);
  if (!match) {
    throw new MigrationError(`Invalid migration filename: ${filename}`);
  }

  return {
    version: parseInt(match[1], 10),
    description: match[2].replace(/_/g, ' '),
  };
}

export function checksum(sql: string): string {
  return createHash('sha256').update(sql).digest('hex');
}

/**
 * Read every .sql file in `dir`, ordered by version.
 */
export async function loadMigrations(dir: string): Promise<Migration[]> {
  const files = (await readdir(dir)).filter((f) => f.endsWith('.sql'));

  const migrations: Migration[] = [];
  for (const filename of files) {
    const { version, description } = parseMigrationFilename(filename);
    const sql = await readFile(join(dir, filename), 'utf-8');
    migrations.push({ version, description, filename, sql, checksum: checksum(sql) });
  }

  migrations.sort((a, b) => a.version - b.version);

  for (let i = 1; i < migrations.length; i++) {
    if (migrations[i].version === migrations[i - 1].version) {
      throw new MigrationError(
        `Duplicate migration version ${migrations[i].version}: ` +
          `${migrations[i - 1].filename}, ${migrations[i].filename}`
      );
    }
  }

  return migrations;
}

/**
 * Decide which migrations still have to run.
 *
 * Applied migrations are immutable: a changed checksum, an applied version
 * missing from disk, or a new file numbered below the latest applied version
 * all fail before anything is applied.
 */
export function planMigrations(available: Migration[], applied: AppliedMigration[]): Migration[] {
  const byVersion = new Map(available.map((m) => [m.version, m]));

  for (const record of applied) {
    const migration = byVersion.get(record.version);
    if (!migration) {
      throw new MigrationError(`Applied migration ${record.version} not found on disk`);
    }
    if (migration.checksum !== record.checksum) {
      throw new MigrationError(
        `Checksum mismatch for migration ${record.version} (${migration.filename}); ` +
          'applied migrations must not be edited'
      );
    }
  }

  const appliedVersions = new Set(applied.map((r) => r.version));
  const latestApplied = Math.max(-1, ...applied.map((r) => r.version));
  const pending = available.filter((m) => !appliedVersions.has(m.version));

  const outOfOrder = pending.find((m) => m.version < latestApplied);
  if (outOfOrder) {
    throw new MigrationError(
      `Migration ${outOfOrder.filename} is older than applied version ${latestApplied}`
    );
  }

  return pending;
}

async function ensureMigrationsTable(db: Queryable): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      description TEXT NOT NULL,
      checksum TEXT NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedMigrations(db: Queryable): Promise<AppliedMigration[]> {
  const result = await db.query<AppliedMigration>(
    'SELECT version, checksum FROM schema_migrations ORDER BY version'
  );
  return result.rows.map((row) => ({
    version: row.version,
    checksum: row.checksum,
  }));
}

async function applyMigration(pool: ConnectionPool, migration: Migration): Promise<void> {
  await withTransaction(pool, async (client) => {
    await client.query(migration.sql);
    await client.query(
      'INSERT INTO schema_migrations (version, description, checksum) VALUES ($1, $2, $3)',
      [migration.version, migration.description, migration.checksum]
    );
  });
}

/**
 * Apply pending migrations from `dir` in ascending version order, each in
 * its own transaction. Returns the migrations that were applied.
 */
export async function runMigrations(
  pool: ConnectionPool,
  dir: string,
  logger: Logger
): Promise<Migration[]> {
  logger.info({ dir }, 'Starting migrations');

  await ensureMigrationsTable(pool);
  const available = await loadMigrations(dir);
  const applied = await getAppliedMigrations(pool);
  const pending = planMigrations(available, applied);

  if (pending.length === 0) {
    logger.info('No pending migrations');
    return [];
  }

  logger.info({ count: pending.length }, 'Found pending migrations');

  for (const migration of pending) {
    await applyMigration(pool, migration);
    logger.info(
      { version: migration.version, filename: migration.filename },
      'Applied migration'
    );
  }

  return pending;
}

export interface ClosablePool extends ConnectionPool {
  end(): Promise<void>;
}

/**
 * `npm run migrate`: open a pool from config, apply pending migrations and
 * close it. Failures are logged and reported as `false`.
 */
export async function migrateDatabase(
  config: AppConfig,
  logger: Logger,
  openPool: (database: DatabaseConfig, logger: Logger) => ClosablePool = createPool
): Promise<boolean> {
  try {
    if (config.storage.kind !== 'postgres') {
      throw new ConfigError(['USER_STORE']);
    }

    const pool = openPool(config.storage.database, logger);
    try {
      const applied = await runMigrations(pool, resolve(process.cwd(), config.migrationsDir), logger);
      logger.info({ applied: applied.length }, 'Migrations complete');
    } finally {
      await pool.end();
    }
    return true;
  } catch (err: unknown) {
    logger.error({ err }, 'Migration failed');
    return false;
  }
}
