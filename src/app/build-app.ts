/**
 * src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes
 * - Makes E2E tests simple (compose with fake deps, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps } from './di';
import type { AppDeps } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';

export function composeApp(opts: { config: AppConfig; deps: AppDeps }) {
  const app = buildServer({ config: opts.config });

  registerRoutes(app, { deps: opts.deps });

  const close = async () => {
    await app.close();
    await opts.deps.close();
  };

  return { app, deps: opts.deps, close };
}

export async function buildApp(config: AppConfig) {
  const deps = await buildDeps(config);
  return composeApp({ config, deps });
}
