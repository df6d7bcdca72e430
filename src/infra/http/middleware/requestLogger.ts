import { pinoHttp } from 'pino-http';
import { randomUUID } from 'crypto';
import type { Logger } from '../../logging/logger.js';

const UNLOGGED_PATHS = new Set(['/healthz', '/favicon.ico']);

/**
 * Request logging. Reuses an incoming x-request-id or assigns one, and echoes
 * it back on the response.
 */
export function requestLogger(logger: Logger) {
  return pinoHttp({
    logger,
    genReqId: (req, res) => {
      const header = req.headers['x-request-id'];
      const id = (Array.isArray(header) ? header[0] : header) || randomUUID();
      res.setHeader('x-request-id', id);
      return id;
    },
    customLogLevel: (_req, res, err) => {
      if (err || res.statusCode >= 500) return 'error';
      if (res.statusCode >= 400) return 'warn';
      return 'info';
    },
    autoLogging: {
      ignore: (req) => UNLOGGED_PATHS.has(req.url ?? ''),
    },
  });
}
