/**
 * src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB handle over a bounded pg pool.
 * - Each query checks a connection out of the pool and returns it when done,
 *   so concurrent requests never share a session mid-query.
 *
 * RULES:
 * - Certificate trust is never implicit: `trustServerCertificate` must be set
 *   explicitly (and only makes sense with `ssl`).
 * - The handle is created once in app/di.ts and injected; no module-level singleton.
 */

import pg from 'pg';
import type { Pool, PoolConfig } from 'pg';
import { Kysely, PostgresDialect, sql } from 'kysely';

import type { DbConfig } from '../../app/config';
import { logger, serializeError } from '../logger/logger';
import type { DB } from './schema';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 */
export type DbExecutor = Kysely<DB>;

export function buildSslOptions(db: Pick<DbConfig, 'ssl' | 'trustServerCertificate'>) {
  if (!db.ssl) return false;
  return { rejectUnauthorized: !db.trustServerCertificate };
}

export function buildPoolConfig(db: DbConfig): PoolConfig {
  return {
    host: db.host,
    port: db.port,
    database: db.database,
    user: db.user,
    password: db.password,
    ssl: buildSslOptions(db),

    max: db.poolMax,
    idleTimeoutMillis: db.idleTimeoutMs,
    connectionTimeoutMillis: db.connectionTimeoutMs,
  };
}

export function createPool(db: DbConfig): Pool {
  const pool = new pg.Pool(buildPoolConfig(db));
  pool.on('error', (err) => logger.error('db.idle_client_error', { error: serializeError(err) }));
  return pool;
}

export function createDb(db: DbConfig): Db {
  if (db.ssl && db.trustServerCertificate) {
    logger.warn('db.tls_certificate_not_verified', {
      host: db.host,
      port: db.port,
    });
  }

  const pool = createPool(db);

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}

export async function pingDb(db: DbExecutor): Promise<void> {
  await sql`select 1`.execute(db);
}

/**
 * Startup check: fails fast (no retry) if the server is unreachable or rejects the credentials.
 */
export async function verifyDbConnection(
  db: DbExecutor,
  target: Pick<DbConfig, 'host' | 'port' | 'database'>,
): Promise<void> {
  const meta = { host: target.host, port: target.port, database: target.database };

  logger.info('db.connecting', meta);

  try {
    await pingDb(db);
  } catch (err) {
    logger.error('db.connection_failed', { ...meta, error: serializeError(err) });
    throw err;
  }

  logger.info('db.connected', meta);
}
