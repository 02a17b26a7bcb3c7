/**
 * Server entry point
 */

import { env } from './config/env.js';
import { buildApp } from './app.js';

async function main(): Promise<void> {
  const app = buildApp();

  const shutdown = async (signal: string) => {
    app.log.info(`[Server] Received ${signal}, shutting down...`);
    await app.close();
    process.exit(0);
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        console.error('[Server] Shutdown failed:', err);
        process.exit(1);
      });
    });
  }

  await app.listen({ port: env.PORT, host: env.HOST });
  app.log.info(`[Server] Site decision engine listening on ${env.HOST}:${env.PORT}`);
}

main().catch((err) => {
  console.error('[Server] Fatal error:', err);
  process.exit(1);
});
