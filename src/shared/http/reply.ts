/**
 * src/shared/http/reply.ts
 *
 * Fastify sends a string payload as-is, and as text/plain unless told otherwise.
 * Bodies here are JSON values, including bare JSON strings like "Server is running!",
 * so handlers serialize through this helper and return the result.
 *
 * HOW TO USE:
 * - `return replyJson(reply, 200, value);`
 */

import type { FastifyReply } from 'fastify';

export const JSON_CONTENT_TYPE = 'application/json; charset=utf-8';

export function replyJson(reply: FastifyReply, status: number, value: unknown): string {
  reply.status(status).type(JSON_CONTENT_TYPE);
  return JSON.stringify(value);
}
