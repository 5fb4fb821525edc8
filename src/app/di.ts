/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates the DB handle ONCE and injects it into modules (no process-wide singleton).
 * - Startup fails here if the database is unreachable or rejects the credentials.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 */

import type { AppConfig } from './config';
import { createDb, verifyDbConnection } from '../shared/db/db';
import type { Db } from '../shared/db/db';

import { createUserModule } from '../modules/users';
import type { UserModule } from '../modules/users';

export type AppDeps = {
  db: Db;

  // modules
  users: UserModule;

  // lifecycle
  close: () => Promise<void>;
};

/**
 * Wires modules around an existing DB handle. Tests call this with an in-process fake.
 */
export function wireDeps(config: AppConfig, db: Db): AppDeps {
  const users = createUserModule({ db, rowMapping: config.users.rowMapping });

  return {
    db,
    users,
    close: async () => {
      await db.destroy();
    },
  };
}

export async function buildDeps(config: AppConfig): Promise<AppDeps> {
  const db = createDb(config.db);

  try {
    await verifyDbConnection(db, config.db);
  } catch (err) {
    await db.destroy();
    throw err;
  }

  return wireDeps(config, db);
}
