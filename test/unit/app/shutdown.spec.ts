import { describe, it, expect, vi } from 'vitest';

import { createShutdownHandler } from '../../../src/app/shutdown';
import { logger } from '../../../src/shared/logger/logger';

describe('createShutdownHandler', () => {
  it('closes once and exits 0 when signals arrive twice', async () => {
    const close = vi.fn(async () => {});
    const exit = vi.fn();
    const info = vi.spyOn(logger, 'info');
    const shutdown = createShutdownHandler({ close, exit });

    await Promise.all([shutdown('SIGINT'), shutdown('SIGTERM')]);

    expect(close).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
    expect(info).toHaveBeenCalledWith('server.shutdown', { signal: 'SIGINT' });
    expect(info).toHaveBeenCalledWith('server.shutdown_in_progress', { signal: 'SIGTERM' });
  });

  it('exits 1 when closing fails', async () => {
    const close = vi.fn(async () => {
      throw new Error('pool already ended');
    });
    const exit = vi.fn();
    const error = vi.spyOn(logger, 'error');
    const shutdown = createShutdownHandler({ close, exit });

    await shutdown('SIGTERM');

    expect(exit).toHaveBeenCalledWith(1);
    expect(error).toHaveBeenCalledWith(
      'server.shutdown_failed',
      expect.objectContaining({ signal: 'SIGTERM' }),
    );
  });
});
