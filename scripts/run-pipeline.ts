/**
 * Run the digest pipeline once
 *
 * Usage:
 *   npx tsx scripts/run-pipeline.ts                  # ingest, then generate
 *   npx tsx scripts/run-pipeline.ts --ingest-only
 *   npx tsx scripts/run-pipeline.ts --generate-only
 */

import * as dotenv from 'dotenv';
import * as path from 'path';

// Settings are read lazily, so loading here still precedes first use
dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

import { getSettings } from '@/src/config/settings';
import { closeDbClient } from '@/src/lib/db/driver';
import { logger } from '@/src/lib/logger';
import { createPipelineContext, createPipelineRunner } from '@/src/lib/pipeline/context';
import type { PipelineMode } from '@/src/lib/pipeline/runner';

function parseMode(args: string[]): PipelineMode {
  const ingestOnly = args.includes('--ingest-only');
  const generateOnly = args.includes('--generate-only');
  if (ingestOnly && generateOnly) {
    throw new Error('--ingest-only and --generate-only are mutually exclusive');
  }
  if (ingestOnly) return 'ingest';
  if (generateOnly) return 'generate';
  return 'full';
}

async function main() {
  try {
    const mode = parseMode(process.argv.slice(2));
    logger.info(`[PIPELINE-SCRIPT] Starting (${mode})`);

    const context = await createPipelineContext(getSettings());
    const report = await createPipelineRunner(context).runNow(mode);

    if (report.ingestion) {
      const { fetched, saved, duplicates, irrelevant, failedSources } = report.ingestion;
      console.log('\n✓ Ingestion complete');
      console.log(`  Fetched: ${fetched}, saved: ${saved}, duplicates: ${duplicates}, irrelevant: ${irrelevant}`);
      if (failedSources.length > 0) {
        console.log(`  Failed sources: ${failedSources.join(', ')}`);
      }
    }

    if (report.generation) {
      const { candidates, batches, failedBatches, sections, archivePath, delivered } = report.generation;
      console.log('\n✓ Digest generated');
      console.log(`  Candidates: ${candidates}, batches: ${batches} (${failedBatches} failed)`);
      console.log(
        `  Sections: ${Object.entries(sections).map(([persona, entries]) => `${persona}=${entries.length}`).join(', ')}`
      );
      if (archivePath) console.log(`  Archived: ${archivePath}`);
      if (delivered.length > 0) console.log(`  Delivered via: ${delivered.join(', ')}`);
    }

    await closeDbClient();
  } catch (error) {
    logger.error('[PIPELINE-SCRIPT] Fatal error', error);
    console.error('\n✗ Pipeline failed:', error instanceof Error ? error.message : String(error));
    await closeDbClient();
    process.exit(1);
  }
}

void main();
