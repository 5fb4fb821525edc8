/**
 * src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * RULES:
 * - Synchronous on purpose: a Fastify instance is thenable, so returning it from an
 *   async function would await (boot) it before routes are registered.
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerErrorHandler } from '../shared/http/error-handler';

export function buildServer(opts: { config: AppConfig }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  registerRequestContext(app);
  registerErrorHandler(app);

  app.addHook('onRequest', (req, _reply, done) => {
    logger.info('request', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
      service: opts.config.serviceName,
    });
    done();
  });

  app.addHook('onResponse', (req, reply, done) => {
    logger.info('request.completed', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
      statusCode: reply.statusCode,
      durationMs: Date.now() - req.requestContext.startedAt,
    });
    done();
  });

  return app;
}
