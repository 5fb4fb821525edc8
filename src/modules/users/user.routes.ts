/**
 * src/modules/users/user.routes.ts
 *
 * WHY:
 * - Declares Users module endpoints.
 * - Keeps routing separate from controller logic.
 */

import type { FastifyInstance } from 'fastify';
import type { UserController } from './user.controller';

export function registerUserRoutes(app: FastifyInstance, controller: UserController) {
  app.get('/users', controller.listUsers.bind(controller));
}
