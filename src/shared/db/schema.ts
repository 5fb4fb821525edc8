/**
 * src/shared/db/schema.ts
 *
 * Kysely table interfaces for the tables this service reads.
 * The service owns no schema (no migrations); `users` is created and filled elsewhere:
 *
 *   id          integer generated always as identity primary key
 *   username    text not null unique
 *   email       text not null unique
 *   full_name   text not null
 *   created_at  timestamptz default now()
 *   updated_at  timestamptz default now()
 */

import type { ColumnType, Generated } from 'kysely';

export type UsersTable = {
  id: Generated<number>;
  username: string;
  email: string;
  full_name: string;
  created_at: ColumnType<Date, string | undefined, never>;
  updated_at: ColumnType<Date, string | undefined, never>;
};

export type DB = {
  users: UsersTable;
};
