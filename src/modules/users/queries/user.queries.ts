/**
 * src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Shapes raw DB rows into User domain types.
 * - The driver's row is treated as untrusted: a column can be missing or come back
 *   with an unexpected type (e.g. a bigint id arrives as a string from pg).
 *
 * MODES:
 * - lenient: a bad id becomes 0, a bad string column becomes "" and the column
 *   is reported in `defaultedColumns` so the caller can log it.
 * - strict: a bad column throws RowMappingError.
 *
 * RULES:
 * - Pure: no DB access, no logging, no AppError.
 */

import { z } from 'zod';

import type { RowMappingMode } from '../../../app/config';
import { USER_COLUMNS, type UserColumn } from '../dal/user.query-sql';
import { RowMappingError } from '../user.errors';
import type { User } from '../user.types';

const userIdSchema = z.union([
  z.number().int(),
  z
    .string()
    .regex(/^-?\d+$/)
    .transform(Number)
    .pipe(z.number().int().safe()),
]);

const userRowSchema = z.object({
  id: userIdSchema,
  username: z.string(),
  email: z.string(),
  full_name: z.string(),
});

const lenientUserRowSchema = z.object({
  id: userIdSchema.catch(0),
  username: z.string().catch(''),
  email: z.string().catch(''),
  full_name: z.string().catch(''),
});

type ParsedUserRow = z.infer<typeof userRowSchema>;

export type MappedUser = {
  user: User;
  defaultedColumns: UserColumn[];
};

export type MappedUsers = {
  users: User[];
  defaulted: Array<{ rowIndex: number; columns: UserColumn[] }>;
};

function isUserColumn(key: unknown): key is UserColumn {
  return USER_COLUMNS.some((column) => column === key);
}

function invalidColumns(error: z.ZodError): UserColumn[] {
  const columns = new Set<UserColumn>();
  for (const issue of error.issues) {
    const key = issue.path[0];
    if (isUserColumn(key)) columns.add(key);
  }
  // keep declaration order for stable logs/messages
  return USER_COLUMNS.filter((column) => columns.has(column));
}

function fromRow(row: ParsedUserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    fullName: row.full_name,
    createdAt: null,
    updatedAt: null,
  };
}

export function toUser(row: unknown, mode: RowMappingMode, rowIndex = 0): MappedUser {
  const source = typeof row === 'object' && row !== null ? row : {};

  const parsed = userRowSchema.safeParse(source);
  if (parsed.success) {
    return { user: fromRow(parsed.data), defaultedColumns: [] };
  }

  const columns = invalidColumns(parsed.error);

  if (mode === 'strict') {
    throw new RowMappingError({ columns, rowIndex });
  }

  return {
    user: fromRow(lenientUserRowSchema.parse(source)),
    defaultedColumns: columns,
  };
}

export function mapUserRows(rows: readonly unknown[], mode: RowMappingMode): MappedUsers {
  const users: User[] = [];
  const defaulted: MappedUsers['defaulted'] = [];

  rows.forEach((row, rowIndex) => {
    const mapped = toUser(row, mode, rowIndex);
    users.push(mapped.user);
    if (mapped.defaultedColumns.length > 0) {
      defaulted.push({ rowIndex, columns: mapped.defaultedColumns });
    }
  });

  return { users, defaulted };
}
