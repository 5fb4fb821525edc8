/**
 * src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - A missing or malformed DB_* value must stop the process before it serves anything.
 *
 * HOW TO USE:
 * - In dev, we load .env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * RULES:
 * - Boolean flags accept only "true" / "false". z.coerce.boolean() turns "false" into true,
 *   so it is not used here.
 * - DB_TRUST_SERVER_CERT is opt-in and only valid together with DB_SSL=true.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const RowMappingSchema = z.enum(['lenient', 'strict']).default('lenient');

const requiredString = (name: string) =>
  z.string({ required_error: `${name} environment variable not set` }).min(1, {
    message: `${name} environment variable not set`,
  });

const portNumber = (name: string) =>
  z
    .string({ required_error: `${name} environment variable not set` })
    .regex(/^\d+$/, { message: `${name} must be a valid port number` })
    .transform(Number)
    .pipe(z.number().int().min(0).max(65535, { message: `${name} must be a valid port number` }));

const integer = (name: string, bounds: { min: number; max?: number }) => {
  const message = `${name} must be an integer`;
  const base = z.number().int().min(bounds.min, { message });
  return z
    .string()
    .regex(/^\d+$/, { message })
    .transform(Number)
    .pipe(bounds.max === undefined ? base : base.max(bounds.max, { message }));
};

const flag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

const ConfigSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,
    HOST: z.string().min(1).default('127.0.0.1'),
    PORT: portNumber('PORT').default('8080'),

    DB_HOST: requiredString('DB_HOST'),
    DB_PORT: portNumber('DB_PORT'),
    DB_NAME: requiredString('DB_NAME'),
    DB_USER: requiredString('DB_USER'),
    DB_PASSWORD: requiredString('DB_PASSWORD'),

    DB_SSL: flag,
    DB_TRUST_SERVER_CERT: flag,

    DB_POOL_MAX: integer('DB_POOL_MAX', { min: 1, max: 100 }).default('10'),
    DB_CONNECTION_TIMEOUT_MS: integer('DB_CONNECTION_TIMEOUT_MS', { min: 0 }).default('10000'),
    DB_IDLE_TIMEOUT_MS: integer('DB_IDLE_TIMEOUT_MS', { min: 0 }).default('30000'),

    USERS_ROW_MAPPING: RowMappingSchema,

    // Logging / service identity
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
    SERVICE_NAME: z.string().default('user-directory'),
  })
  .superRefine((env, ctx) => {
    if (env.DB_TRUST_SERVER_CERT && !env.DB_SSL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DB_TRUST_SERVER_CERT'],
        message: 'DB_TRUST_SERVER_CERT requires DB_SSL=true',
      });
    }
  });

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type RowMappingMode = z.infer<typeof RowMappingSchema>;

export type DbConfig = {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;

  ssl: boolean;
  trustServerCertificate: boolean;

  poolMax: number;
  connectionTimeoutMs: number;
  idleTimeoutMs: number;
};

export type AppConfig = {
  nodeEnv: NodeEnv;
  host: string;
  port: number;

  db: DbConfig;

  users: {
    rowMapping: RowMappingMode;
  };

  logLevel: string;
  serviceName: string;
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.HOST,
    port: parsed.PORT,

    db: {
      host: parsed.DB_HOST,
      port: parsed.DB_PORT,
      database: parsed.DB_NAME,
      user: parsed.DB_USER,
      password: parsed.DB_PASSWORD,

      ssl: parsed.DB_SSL,
      trustServerCertificate: parsed.DB_TRUST_SERVER_CERT,

      poolMax: parsed.DB_POOL_MAX,
      connectionTimeoutMs: parsed.DB_CONNECTION_TIMEOUT_MS,
      idleTimeoutMs: parsed.DB_IDLE_TIMEOUT_MS,
    },

    users: {
      rowMapping: parsed.USERS_ROW_MAPPING,
    },

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,
  };
}
