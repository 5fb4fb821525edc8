/**
 * src/shared/http/errors.ts
 *
 * WHY:
 * - Central error primitive used across controllers/services.
 * - Keeps API error responses consistent.
 *
 * RULES:
 * - This file MUST stay small.
 * - `message` is what the client sees. Put driver/internal detail in `meta` (log-only).
 */

export const APP_ERROR_CODES = ['SERVICE_UNAVAILABLE', 'INTERNAL'] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly status: number;
  readonly meta?: AppErrorMeta;

  constructor(opts: { code: AppErrorCode; message: string; status: number; meta?: AppErrorMeta }) {
    super(opts.message);
    this.name = 'AppError';
    this.code = opts.code;
    this.status = opts.status;
    this.meta = opts.meta;
  }

  static serviceUnavailable(message = 'Service unavailable', meta?: AppErrorMeta) {
    return new AppError({ code: 'SERVICE_UNAVAILABLE', status: 503, message, meta });
  }

  static internal(message = 'Internal error', meta?: AppErrorMeta) {
    return new AppError({ code: 'INTERNAL', status: 500, message, meta });
  }
}
