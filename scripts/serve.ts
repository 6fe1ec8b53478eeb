/**
 * Serve the HTTP API
 *
 * Usage:
 *   npx tsx scripts/serve.ts
 */

import * as dotenv from 'dotenv';
import * as path from 'path';

dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

import { serve } from '@hono/node-server';
import { getSettings } from '@/src/config/settings';
import { closeDbClient } from '@/src/lib/db/driver';
import { logger } from '@/src/lib/logger';
import { createPipelineContext, createPipelineRunner } from '@/src/lib/pipeline/context';
import { createApiApp } from '@/src/server/app';

async function main() {
  try {
    const settings = getSettings();
    const context = await createPipelineContext(settings);
    const app = createApiApp({
      store: context.store,
      runner: createPipelineRunner(context),
      archive: context.archive,
    });

    const server = serve({ fetch: app.fetch, port: settings.SERVER_PORT }, (info) => {
      logger.info(`[SERVER] Listening on http://localhost:${info.port}`);
    });

    const shutdown = async (signal: string) => {
      logger.info(`[SERVER] ${signal} received, shutting down`);
      server.close();
      await closeDbClient();
      process.exit(0);
    };
    process.once('SIGINT', () => void shutdown('SIGINT'));
    process.once('SIGTERM', () => void shutdown('SIGTERM'));
  } catch (error) {
    logger.error('[SERVER] Failed to start', error);
    await closeDbClient();
    process.exit(1);
  }
}

void main();
