import { z } from 'zod';

const booleanString = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),

    // Storage
    USER_STORE: z.enum(['postgres', 'memory']).default('postgres'),
    DATABASE_URL: z.string().url().optional(),
    DATABASE_POOL_MAX: z.coerce.number().int().positive().default(20),
    DATABASE_IDLE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(30000),
    DATABASE_CONNECTION_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(2000),
    MIGRATIONS_DIR: z.string().min(1).default('migrations'),

    // Logging
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),
    LOG_PRETTY: booleanString,

    // HTTP
    CORS_ORIGINS: z.string().default('http://localhost:4200'),
    RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(60),
  })
  .superRefine((env, ctx) => {
    if (env.USER_STORE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when USER_STORE=postgres',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export type LogLevel = Env['LOG_LEVEL'];

export interface DatabaseConfig {
  url: string;
  poolMax: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
}

export type StorageConfig =
  | { kind: 'memory' }
  | { kind: 'postgres'; database: DatabaseConfig };

export interface LogConfig {
  level: LogLevel;
  pretty: boolean;
}

export interface AppConfig {
  env: Env['NODE_ENV'];
  http: {
    port: number;
    corsOrigins: string[];
    rateLimitPerMinute: number;
  };
  storage: StorageConfig;
  migrationsDir: string;
  log: LogConfig;
}

export class ConfigError extends Error {
  constructor(public readonly variables: string[]) {
    super(`Invalid environment variables: ${variables.join(', ')}`);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Validate the environment and build the application config.
 * Values are never echoed in the error, only the variable names.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const variables = [...new Set(parsed.error.errors.map((e) => e.path.join('.')))];
    throw new ConfigError(variables);
  }

  const env = parsed.data;

  let storage: StorageConfig = { kind: 'memory' };
  if (env.USER_STORE === 'postgres' && env.DATABASE_URL) {
    storage = {
      kind: 'postgres',
      database: {
        url: env.DATABASE_URL,
        poolMax: env.DATABASE_POOL_MAX,
        idleTimeoutMillis: env.DATABASE_IDLE_TIMEOUT_MS,
        connectionTimeoutMillis: env.DATABASE_CONNECTION_TIMEOUT_MS,
      },
    };
  }

  return {
    env: env.NODE_ENV,
    http: {
      port: env.PORT,
      corsOrigins: env.CORS_ORIGINS.split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
      rateLimitPerMinute: env.RATE_LIMIT_PER_MINUTE,
    },
    storage,
    migrationsDir: env.MIGRATIONS_DIR,
    log: {
      level: env.LOG_LEVEL,
      pretty: env.LOG_PRETTY,
    },
  };
}
