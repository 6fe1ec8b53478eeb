/**
 * Wires the pipeline's collaborators from settings
 */

import type { Settings } from "../../config/settings";
import { resolveDataPath } from "../../config/settings";
import { getEmbeddingProvider, type EmbeddingProvider } from "../embeddings";
import { getLlmClient, type LlmClient } from "../llm/client";
import { VectorIndex, defaultIndexPaths } from "../vector/store";
import { createDatabaseStore } from "../db/store";
import { createDefaultAdapters, type SourceAdapter } from "../sources";
import { createEmailChannel } from "../delivery/email";
import { createTelegramChannel } from "../delivery/telegram";
import type { DeliveryChannel } from "../delivery/types";
import { LocalDigestArchive, type DigestArchive } from "../storage/local";
import { createPersonaEvaluators, type PersonaEvaluators } from "./evaluate";
import { runGeneration, type GenerationReport } from "./generate";
import { runIngestion, type IngestionReport } from "./ingest";
import { SemanticPrefilter } from "./prefilter";
import { PipelineRunner, type PipelinePhases } from "./runner";
import type { PipelineQueryStore } from "./store";

export interface PipelineContext {
  settings: Settings;
  store: PipelineQueryStore;
  provider: EmbeddingProvider;
  llm: LlmClient;
  index: VectorIndex;
  prefilter: SemanticPrefilter;
  evaluators: PersonaEvaluators;
  adapters: SourceAdapter[];
  delivery: DeliveryChannel[];
  archive: DigestArchive;
}

/**
 * Build every collaborator. Embedding or database initialization failures
 * reject here; nothing later retries them.
 */
export async function createPipelineContext(settings: Settings): Promise<PipelineContext> {
  const provider = await getEmbeddingProvider();
  const llm = await getLlmClient();
  const store = await createDatabaseStore(settings);

  return {
    settings,
    store,
    provider,
    llm,
    index: VectorIndex.open(provider, defaultIndexPaths(resolveDataPath(settings))),
    prefilter: new SemanticPrefilter(provider, {
      threshold: settings.PREFILTER_THRESHOLD,
      engagementBypass: settings.HIGH_ENGAGEMENT_THRESHOLD,
    }),
    evaluators: createPersonaEvaluators({
      provider,
      llm,
      semanticThreshold: settings.SEMANTIC_THRESHOLD,
    }),
    adapters: createDefaultAdapters(),
    delivery: [createEmailChannel(settings, store), createTelegramChannel(settings)],
    archive: new LocalDigestArchive(resolveDataPath(settings, "digests")),
  };
}

export function pipelinePhases(context: PipelineContext): PipelinePhases {
  const { settings } = context;
  return {
    ingest: (): Promise<IngestionReport> =>
      runIngestion({
        adapters: context.adapters,
        store: context.store,
        provider: context.provider,
        index: context.index,
        prefilter: context.prefilter,
        lookbackHours: settings.INGEST_LOOKBACK_HOURS,
        duplicateThreshold: settings.DUPLICATE_THRESHOLD,
      }),
    generate: (): Promise<GenerationReport> =>
      runGeneration({
        store: context.store,
        llm: context.llm,
        evaluators: context.evaluators,
        delivery: context.delivery,
        archive: context.archive,
        batchSize: settings.EVAL_BATCH_SIZE,
        maxConcurrent: settings.EVAL_MAX_CONCURRENT,
        topN: settings.DIGEST_TOP_N,
        candidatesPerSource: settings.CANDIDATES_PER_SOURCE,
        poolLimit: settings.CANDIDATE_POOL_LIMIT,
      }),
  };
}

export function createPipelineRunner(context: PipelineContext): PipelineRunner {
  return new PipelineRunner(pipelinePhases(context));
}
