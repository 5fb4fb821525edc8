/**
 * src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call -> response shape.
 *
 * RULES:
 * - No DB access here.
 * - Query params are ignored (no filters, no pagination).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { withRequestContext } from '../../shared/logger/with-context';
import { replyJson } from '../../shared/http/reply';
import type { UserService } from './user.service';
import { toUserResponse } from './user.types';

export class UserController {
  constructor(private readonly userService: UserService) {}

  async listUsers(req: FastifyRequest, reply: FastifyReply) {
    const users = await this.userService.listUsers(withRequestContext(req));

    return replyJson(reply, 200, users.map(toUserResponse));
  }
}
