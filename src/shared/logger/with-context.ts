/**
 * src/shared/logger/with-context.ts
 *
 * WHY:
 * - Request logs should carry the requestId so one request can be traced end to end.
 * - Handlers should not repeat the same fields manually.
 *
 * HOW TO USE:
 * - In a request handler: `withRequestContext(req).info('msg', { flow: '...' })`
 */

import type { FastifyRequest } from 'fastify';
import { logger } from './logger';

export type LogMeta = Record<string, unknown>;

export type ContextLogger = {
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
  debug: (msg: string, meta?: LogMeta) => void;
};

export function withRequestContext(req: FastifyRequest): ContextLogger {
  const base = {
    requestId: req.requestContext?.requestId,
    method: req.method,
    url: req.url,
  };

  return {
    info: (msg, meta = {}) => logger.info(msg, { ...base, ...meta }),
    warn: (msg, meta = {}) => logger.warn(msg, { ...base, ...meta }),
    error: (msg, meta = {}) => logger.error(msg, { ...base, ...meta }),
    debug: (msg, meta = {}) => logger.debug(msg, { ...base, ...meta }),
  };
}
