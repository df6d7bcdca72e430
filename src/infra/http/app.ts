import express, { type Express } from 'express';
import cors from 'cors';
import { UserService } from '../../application/users/userService.js';
import type { Logger } from '../logging/logger.js';
import { createUserRoutes } from './routes/users.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { errorHandler } from './middleware/errorHandler.js';
import { apiRateLimiter } from './middleware/rateLimit.js';
import { requestLogger } from './middleware/requestLogger.js';

export interface AppDependencies {
  userService: UserService;
  logger: Logger;
  /** Resolves when the backing store is reachable. */
  healthCheck: () => Promise<unknown>;
  corsOrigins: string[];
  rateLimitPerMinute: number;
}

/**
 * @openapi
 * /healthz:
 *   get:
 *     tags: [Health]
 *     summary: Liveness and store reachability
 *     responses:
 *       200: { description: OK }
 *       500:
 *         description: Database unavailable
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const HEALTH_CHECK_TIMEOUT_MS = 2000;

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  return Promise.race([
    promise,
    new Promise<T>((_, reject) => {
      timer = setTimeout(() => reject(new Error('timeout')), ms);
    }),
  ]).finally(() => clearTimeout(timer));
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  // Middleware
  app.use(requestLogger(deps.logger));
  app.use(cors({ origin: deps.corsOrigins }));
  app.use(express.json());

  app.get('/healthz', (_req, res, next) => {
    withTimeout(deps.healthCheck(), HEALTH_CHECK_TIMEOUT_MS)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch((err: unknown) => {
        deps.logger.warn({ err }, 'Health check failed');
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  // Swagger/OpenAPI docs
  app.use(createSwaggerRoutes());

  app.use('/api', apiRateLimiter(deps.rateLimitPerMinute));
  app.use('/api/v1/users', createUserRoutes(deps.userService));

  // Error handler (must be last)
  app.use(errorHandler(deps.logger));

  return app;
}
