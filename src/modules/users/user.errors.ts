/**
 * src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its failure semantics.
 * - Client-facing messages are fixed strings; the cause goes into meta (log-only).
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const UserErrors = {
  queryFailed(meta?: AppErrorMeta) {
    return AppError.internal('Database query failed', meta);
  },

  resultProcessingFailed(meta?: AppErrorMeta) {
    return AppError.internal('Failed to process query results', meta);
  },
} as const;

/**
 * Thrown by strict row mapping when a row is missing a column or has one of the wrong type.
 */
export class RowMappingError extends Error {
  readonly columns: readonly string[];
  readonly rowIndex: number;

  constructor(opts: { columns: readonly string[]; rowIndex: number }) {
    super(`Row ${opts.rowIndex} has missing or invalid columns: ${opts.columns.join(', ')}`);
    this.name = 'RowMappingError';
    this.columns = opts.columns;
    this.rowIndex = opts.rowIndex;
  }
}
