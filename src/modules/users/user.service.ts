/**
 * src/modules/users/user.service.ts
 *
 * WHY:
 * - Orchestrates the users listing: run the fixed query, then shape rows.
 * - Separates "query failed" from "result processing failed" so each maps to its own 500.
 *
 * RULES:
 * - No raw DB access outside DAL.
 * - Driver errors are logged with detail and never forwarded to the client.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { RowMappingMode } from '../../app/config';
import type { ContextLogger } from '../../shared/logger/with-context';
import { serializeError } from '../../shared/logger/logger';

import { selectUsersSql, type UserRow } from './dal/user.query-sql';
import { mapUserRows, type MappedUsers } from './queries/user.queries';
import { UserErrors } from './user.errors';
import type { User } from './user.types';

const flow = 'users.list';

export class UserService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      rowMapping: RowMappingMode;
    },
  ) {}

  async listUsers(log: ContextLogger): Promise<User[]> {
    log.info('users.list.start', { flow });

    // pool checkout happens inside the query; this marks the point the request waits on it
    log.info('users.list.query_start', { flow });

    let rows: UserRow[];
    try {
      rows = await selectUsersSql(this.deps.db);
    } catch (err) {
      log.error('users.list.query_failed', { flow, error: serializeError(err) });
      throw UserErrors.queryFailed({ flow });
    }

    log.info('users.list.query_ok', { flow, rowCount: rows.length });

    let mapped: MappedUsers;
    try {
      mapped = mapUserRows(rows, this.deps.rowMapping);
    } catch (err) {
      log.error('users.list.materialize_failed', {
        flow,
        rowMapping: this.deps.rowMapping,
        error: serializeError(err),
      });
      throw UserErrors.resultProcessingFailed({ flow });
    }

    for (const { rowIndex, columns } of mapped.defaulted) {
      log.warn('users.list.columns_defaulted', { flow, rowIndex, columns });
    }

    log.info('users.list.done', { flow, count: mapped.users.length });

    return mapped.users;
  }
}
