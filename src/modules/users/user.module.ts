/**
 * src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { RowMappingMode } from '../../app/config';

import { UserController } from './user.controller';
import { UserService } from './user.service';
import { registerUserRoutes } from './user.routes';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: { db: DbExecutor; rowMapping: RowMappingMode }) {
  const userService = new UserService({ db: deps.db, rowMapping: deps.rowMapping });
  const controller = new UserController(userService);

  return {
    userService,
    registerRoutes(app: FastifyInstance) {
      registerUserRoutes(app, controller);
    },
  };
}
