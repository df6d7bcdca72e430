import dotenv from 'dotenv';
import { loadConfig } from '../../config/env.js';
import { createLogger } from '../logging/logger.js';
import { createPool } from '../db/pool.js';
import { PgUserRepo } from '../db/pgUserRepo.js';
import { InMemoryUserRepo } from '../memory/inMemoryUserRepo.js';
import { UserRepository } from '../../domain/user/userRepository.js';
import { UserService } from '../../application/users/userService.js';
import { createApp } from './app.js';

dotenv.config();

function main(): void {
  const config = loadConfig();
  const logger = createLogger(config.log);

  let userRepo: UserRepository;
  let healthCheck: () => Promise<unknown>;
  let closeStore: () => Promise<void>;

  if (config.storage.kind === 'postgres') {
    const pool = createPool(config.storage.database, logger);
    userRepo = new PgUserRepo(pool);
    healthCheck = () => pool.query('SELECT 1');
    closeStore = () => pool.end();
  } else {
    logger.warn('Using in-memory user store; data is lost on restart');
    userRepo = new InMemoryUserRepo();
    healthCheck = async () => undefined;
    closeStore = async () => undefined;
  }

  const app = createApp({
    userService: new UserService(userRepo),
    logger,
    healthCheck,
    corsOrigins: config.http.corsOrigins,
    rateLimitPerMinute: config.http.rateLimitPerMinute,
  });

  const server = app.listen(config.http.port, () => {
    logger.info(`Server running on http://localhost:${config.http.port}`);
    logger.info(`API docs: http://localhost:${config.http.port}/docs`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => {
      closeStore()
        .then(() => {
          logger.info('Shutdown complete');
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error({ err }, 'Failed to close user store');
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main();
