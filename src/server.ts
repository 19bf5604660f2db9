/**
 * Lootpool service entrypoint
 *
 * Run: npx tsx src/server.ts
 */

import 'dotenv/config';
import { env } from './config/env.js';
import { buildApp } from './app.js';

async function main(): Promise<void> {
  const app = buildApp();

  const shutdown = (signal: string) => {
    console.log(`[BOOT] ${signal} received, closing server...`);
    app.close()
      .then(() => process.exit(0))
      .catch((err) => {
        console.error('[BOOT] Shutdown failed:', err);
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await app.listen({ port: env.PORT, host: env.HOST });
  console.log(`[BOOT] Lootpool service listening on ${env.HOST}:${env.PORT}`);
}

main().catch((err) => {
  console.error('[BOOT] Failed to start:', err);
  process.exit(1);
});
