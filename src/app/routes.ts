/**
 * src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/health liveness, /health/db readiness)
 *   - module routes (users)
 *
 * RULES:
 * - No business logic here.
 * - /health must never touch the database.
 */

import type { FastifyInstance } from 'fastify';

import type { AppDeps } from './di';
import { pingDb } from '../shared/db/db';
import { AppError } from '../shared/http/errors';
import { replyJson } from '../shared/http/reply';
import { withRequestContext } from '../shared/logger/with-context';
import { serializeError } from '../shared/logger/logger';

export const HEALTH_MESSAGE = 'Server is running!';
export const DB_REACHABLE_MESSAGE = 'Database is reachable';
export const DB_UNREACHABLE_MESSAGE = 'Database is unreachable';

export function registerRoutes(app: FastifyInstance, opts: { deps: AppDeps }) {
  // Liveness: process is up and serving
  app.get('/health', (req, reply) => {
    withRequestContext(req).info('health.check', { flow: 'health' });
    return replyJson(reply, 200, HEALTH_MESSAGE);
  });

  // Readiness: pool can hand out a working connection
  app.get('/health/db', async (req, reply) => {
    try {
      await pingDb(opts.deps.db);
    } catch (err) {
      throw AppError.serviceUnavailable(DB_UNREACHABLE_MESSAGE, {
        flow: 'health.db',
        error: serializeError(err),
      });
    }

    withRequestContext(req).info('health.db_ok', { flow: 'health.db' });
    return replyJson(reply, 200, DB_REACHABLE_MESSAGE);
  });

  // Module routes
  opts.deps.users.registerRoutes(app);
}
