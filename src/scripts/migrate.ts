import dotenv from 'dotenv';
import { loadConfig } from '../config/env.js';
import { createLogger } from '../infra/logging/logger.js';
import { migrateDatabase } from '../infra/db/migrate.js';

dotenv.config();

const config = loadConfig();
const logger = createLogger(config.log);

migrateDatabase(config, logger)
  .then((ok) => {
    if (!ok) {
      process.exitCode = 1;
    }
  })
  .catch((err: unknown) => {
    logger.error({ err }, 'Migration failed');
    process.exitCode = 1;
  });
