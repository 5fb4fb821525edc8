/**
 * src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - Clients only ever see a status code plus a short JSON string.
 * - Internal details (meta, driver messages, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → .status + .message.
 * - Fastify client errors (bad content type, malformed body, ...) → their 4xx status.
 * - Unexpected errors → 500 with generic message.
 * - Unknown routes → 404.
 * - Log all errors with request context for debugging.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { AppError } from './errors';
import { replyJson } from './reply';
import { withRequestContext } from '../logger/with-context';
import { serializeError } from '../logger/logger';

function clientErrorStatus(err: Error): number | null {
  if (!('statusCode' in err)) return null;

  const status = err.statusCode;
  if (typeof status !== 'number') return null;
  return status >= 400 && status < 500 ? status : null;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: Error, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      const meta = {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        reason: err.message,
        meta: err.meta,
      };

      if (err.status >= 500) log.error('app_error', meta);
      else log.warn('app_error', meta);

      return replyJson(reply, err.status, err.message);
    }

    // 2) Fastify / request-shape errors
    const status = clientErrorStatus(err);
    if (status !== null) {
      log.warn('client_error', { flow: 'http.error', status, error: serializeError(err) });
      return replyJson(reply, status, 'Bad request');
    }

    // 3) Unexpected errors — never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      error: serializeError(err),
    });

    return replyJson(reply, 500, 'Internal server error');
  });

  app.setNotFoundHandler((req: FastifyRequest, reply: FastifyReply) => {
    withRequestContext(req).info('route_not_found', { flow: 'http.not_found' });
    return replyJson(reply, 404, 'Not found');
  });
}
