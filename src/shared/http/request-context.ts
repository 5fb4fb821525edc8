/**
 * src/shared/http/request-context.ts
 *
 * WHY:
 * - We want a stable requestId for logs, debugging and tracing.
 * - A caller (proxy, load balancer) may already have assigned one; we keep it.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export const REQUEST_ID_HEADER = 'x-request-id';

export type RequestContext = {
  requestId: string;
  startedAt: number;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

export function resolveRequestId(raw: unknown): string {
  if (typeof raw !== 'string') return randomUUID();

  const trimmed = raw.trim();
  return trimmed ? trimmed : randomUUID();
}

export function registerRequestContext(app: FastifyInstance) {
  app.decorateRequest('requestContext', null);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, reply, done) => {
    const requestId = resolveRequestId(req.headers[REQUEST_ID_HEADER]);

    req.requestContext = {
      requestId,
      startedAt: Date.now(),
    };
    reply.header(REQUEST_ID_HEADER, requestId);

    done();
  });
}
