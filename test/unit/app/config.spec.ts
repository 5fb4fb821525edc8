import { describe, it, expect } from 'vitest';
import { buildConfig } from '../../../src/app/config';

const baseEnv = {
  DB_HOST: 'db.internal',
  DB_PORT: '5432',
  DB_NAME: 'directory',
  DB_USER: 'directory_reader',
  DB_PASSWORD: 'test-secret',
};

describe('buildConfig', () => {
  it('parses required DB settings and applies defaults', () => {
    const config = buildConfig({ ...baseEnv });

    expect(config).toEqual({
      nodeEnv: 'development',
      host: '127.0.0.1',
      port: 8080,
      db: {
        host: 'db.internal',
        port: 5432,
        database: 'directory',
        user: 'directory_reader',
        password: 'test-secret',
        ssl: false,
        trustServerCertificate: false,
        poolMax: 10,
        connectionTimeoutMs: 10_000,
        idleTimeoutMs: 30_000,
      },
      users: { rowMapping: 'lenient' },
      logLevel: 'info',
      serviceName: 'user-directory',
    });
  });

  it.each(['DB_HOST', 'DB_PORT', 'DB_NAME', 'DB_USER', 'DB_PASSWORD'] as const)(
    'fails when %s is missing',
    (name) => {
      const env: Record<string, string> = { ...baseEnv };
      delete env[name];

      expect(() => buildConfig(env)).toThrow(`${name} environment variable not set`);
    },
  );

  it('fails when a required string is empty', () => {
    expect(() => buildConfig({ ...baseEnv, DB_NAME: '' })).toThrow(
      'DB_NAME environment variable not set',
    );
  });

  it.each(['abc', '-1', '70000', '54.32', ''])('rejects DB_PORT=%j', (port) => {
    expect(() => buildConfig({ ...baseEnv, DB_PORT: port })).toThrow(
      'DB_PORT must be a valid port number',
    );
  });

  it('accepts the full unsigned 16-bit range for DB_PORT', () => {
    expect(buildConfig({ ...baseEnv, DB_PORT: '0' }).db.port).toBe(0);
    expect(buildConfig({ ...baseEnv, DB_PORT: '65535' }).db.port).toBe(65535);
  });

  it('keeps certificate trust off unless explicitly enabled', () => {
    const config = buildConfig({ ...baseEnv, DB_SSL: 'true' });

    expect(config.db.ssl).toBe(true);
    expect(config.db.trustServerCertificate).toBe(false);
  });

  it('enables certificate trust when requested together with SSL', () => {
    const config = buildConfig({ ...baseEnv, DB_SSL: 'true', DB_TRUST_SERVER_CERT: 'true' });

    expect(config.db.trustServerCertificate).toBe(true);
  });

  it('rejects certificate trust without SSL', () => {
    expect(() => buildConfig({ ...baseEnv, DB_TRUST_SERVER_CERT: 'true' })).toThrow(
      'DB_TRUST_SERVER_CERT requires DB_SSL=true',
    );
  });

  it('does not coerce arbitrary strings into booleans', () => {
    expect(() => buildConfig({ ...baseEnv, DB_SSL: 'yes' })).toThrow();
    expect(buildConfig({ ...baseEnv, DB_SSL: 'false' }).db.ssl).toBe(false);
  });

  it('reads pool sizing, bind address and row mapping mode', () => {
    const config = buildConfig({
      ...baseEnv,
      DB_POOL_MAX: '1',
      HOST: '0.0.0.0',
      PORT: '3000',
      USERS_ROW_MAPPING: 'strict',
      NODE_ENV: 'production',
    });

    expect(config.db.poolMax).toBe(1);
    expect(config.host).toBe('0.0.0.0');
    expect(config.port).toBe(3000);
    expect(config.users.rowMapping).toBe('strict');
    expect(config.nodeEnv).toBe('production');
  });

  it.each(['DB_POOL_MAX', 'DB_CONNECTION_TIMEOUT_MS', 'DB_IDLE_TIMEOUT_MS'] as const)(
    'rejects an empty or blank %s instead of reading it as 0',
    (name) => {
      expect(() => buildConfig({ ...baseEnv, [name]: '' })).toThrow(`${name} must be an integer`);
      expect(() => buildConfig({ ...baseEnv, [name]: ' ' })).toThrow(`${name} must be an integer`);
    },
  );

  it.each(['0', '101', '-1', '2.5', 'ten'])('rejects DB_POOL_MAX=%j', (value) => {
    expect(() => buildConfig({ ...baseEnv, DB_POOL_MAX: value })).toThrow(
      'DB_POOL_MAX must be an integer',
    );
  });

  it('reads connection and idle timeouts', () => {
    const config = buildConfig({
      ...baseEnv,
      DB_CONNECTION_TIMEOUT_MS: '0',
      DB_IDLE_TIMEOUT_MS: '1500',
    });

    expect(config.db.connectionTimeoutMs).toBe(0);
    expect(config.db.idleTimeoutMs).toBe(1500);
  });

  it('rejects an unknown row mapping mode', () => {
    expect(() => buildConfig({ ...baseEnv, USERS_ROW_MAPPING: 'loose' })).toThrow();
  });
});
