import { describe, it, expect } from 'vitest';

import { configureLogger, logger } from '../../../../src/shared/logger/logger';

describe('configureLogger', () => {
  it('applies the validated level and service identity', () => {
    const originalLevel = logger.level;
    const originalMeta: unknown = logger.defaultMeta;

    try {
      configureLogger({ logLevel: 'debug', serviceName: 'svc-test', nodeEnv: 'test' });

      expect(logger.level).toBe('debug');
      expect(logger.defaultMeta).toEqual({ service: 'svc-test', env: 'test' });
      expect(logger.isDebugEnabled()).toBe(true);
    } finally {
      logger.level = originalLevel;
      logger.defaultMeta = originalMeta;
    }
  });
});
