/**
 * src/app/shutdown.ts
 *
 * WHY:
 * - SIGINT/SIGTERM can arrive more than once (Ctrl+C twice, orchestrator retries).
 *   Closing twice would end the pg pool twice, which pg rejects.
 *
 * RULES:
 * - Only the first signal closes the app; later ones are logged and ignored.
 */

import { logger, serializeError } from '../shared/logger/logger';

export function createShutdownHandler(opts: {
  close: () => Promise<void>;
  exit: (code: number) => void;
}) {
  let shuttingDown = false;

  return async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logger.info('server.shutdown_in_progress', { signal });
      return;
    }
    shuttingDown = true;

    logger.info('server.shutdown', { signal });
    try {
      await opts.close();
      opts.exit(0);
    } catch (err) {
      logger.error('server.shutdown_failed', { signal, error: serializeError(err) });
      opts.exit(1);
    }
  };
}
