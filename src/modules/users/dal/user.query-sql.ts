/**
 * src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for users (raw SQL access).
 *
 * RULES:
 * - No AppError.
 * - No row shaping; the driver's values are returned untouched.
 * - Datetime columns are deliberately not selected.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UsersTable } from '../../../shared/db/schema';

export const USER_COLUMNS = ['id', 'username', 'email', 'full_name'] as const;

export type UserColumn = (typeof USER_COLUMNS)[number];

export type UserRow = Pick<Selectable<UsersTable>, UserColumn>;

export async function selectUsersSql(db: DbExecutor): Promise<UserRow[]> {
  return db.selectFrom('users').select(USER_COLUMNS).execute();
}
