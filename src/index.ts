/**
 * src/index.ts
 *
 * WHY:
 * - Single entrypoint for the service.
 * - Keeps startup logic small: load config -> build deps -> build server -> listen.
 * - Any config or connection error aborts startup; nothing is served half-initialized.
 */

import { buildConfig } from './app/config';
import { buildApp } from './app/build-app';
import { createShutdownHandler } from './app/shutdown';
import { configureLogger, logger, serializeError } from './shared/logger/logger';

async function main(): Promise<void> {
  const config = buildConfig();
  configureLogger(config);

  const { app, close } = await buildApp(config);

  await app.listen({ port: config.port, host: config.host });

  logger.info('server.listening', {
    host: config.host,
    port: config.port,
    env: config.nodeEnv,
    service: config.serviceName,
  });

  const shutdown = createShutdownHandler({ close, exit: (code) => process.exit(code) });

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

void main().catch((err: unknown) => {
  logger.error('server.fatal_startup_error', { error: serializeError(err) });
  process.exit(1);
});
