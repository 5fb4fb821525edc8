/**
 * src/shared/logger/logger.ts
 *
 * WHY:
 * - Central logger instance (structured JSON logs).
 * - Keeps logging consistent across app/modules.
 * - Adds stable metadata (service, env) for log querying.
 *
 * HOW TO USE:
 * - Import `logger` anywhere you need logs.
 * - The entrypoint calls `configureLogger(config)` once the env is validated; until then
 *   the raw env (or defaults) is used, so config errors can still be logged.
 * - Prefer using `withRequestContext(req)` when logging inside request handlers.
 * - Do not log raw Error objects only—pass `{ err }` so stack/message is preserved.
 */

import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'user-directory';
const level = process.env.LOG_LEVEL ?? 'info';

export const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }), // ensures Error.stack is serialized
    winston.format.json(),
  ),
  defaultMeta: {
    service,
    env: nodeEnv,
  },
  transports: [new winston.transports.Console()],
});

export type Logger = typeof logger;

export function configureLogger(opts: { logLevel: string; serviceName: string; nodeEnv: string }) {
  logger.level = opts.logLevel;
  logger.defaultMeta = {
    service: opts.serviceName,
    env: opts.nodeEnv,
  };
}

/**
 * winston's errors() format only unwraps a top-level Error, not one nested in meta.
 * Use this when logging a caught error as a field.
 */
export function serializeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const code = 'code' in err ? err.code : undefined;
    return { name: err.name, message: err.message, code, stack: err.stack };
  }
  return { message: String(err) };
}
