/**
 * Ingestion phase
 * Fetch from every enabled source, drop repeats and near-duplicates, gate on
 * the semantic prefilter, save what is left and remember it in the vector index
 */

import type { IngestedItem } from "../model";
import type { EmbeddingProvider } from "../embeddings";
import type { SourceAdapter } from "../sources/types";
import type { VectorIndex } from "../vector/store";
import { DEFAULT_DUPLICATE_THRESHOLD } from "../vector/store";
import { logger } from "../logger";
import { contentKey, embeddingText } from "./normalize";
import type { SemanticPrefilter } from "./prefilter";
import { isPreferenceEnabled, type PipelineStore } from "./store";

export interface IngestionDeps {
  adapters: SourceAdapter[];
  store: PipelineStore;
  provider: EmbeddingProvider;
  index: VectorIndex;
  prefilter: SemanticPrefilter;
  lookbackHours?: number;
  duplicateThreshold?: number;
}

export interface IngestionReport {
  sources: string[];
  failedSources: string[];
  fetched: number;
  saved: number;
  duplicates: number;
  irrelevant: number;
}

export async function runIngestion(deps: IngestionDeps): Promise<IngestionReport> {
  const lookbackHours = deps.lookbackHours ?? 24;
  const duplicateThreshold = deps.duplicateThreshold ?? DEFAULT_DUPLICATE_THRESHOLD;

  const report: IngestionReport = {
    sources: [],
    failedSources: [],
    fetched: 0,
    saved: 0,
    duplicates: 0,
    irrelevant: 0,
  };

  const enabled: SourceAdapter[] = [];
  for (const adapter of deps.adapters) {
    if (await isPreferenceEnabled(deps.store, adapter.preferenceKey)) {
      enabled.push(adapter);
    } else {
      logger.info(`[INGEST] Source ${adapter.name} disabled by preference`);
    }
  }
  if (enabled.length === 0) {
    logger.warn("[INGEST] No sources enabled, skipping ingestion");
    return report;
  }

  const fetched = await Promise.allSettled(
    enabled.map((adapter) => adapter.fetchItems(lookbackHours))
  );
  const items: IngestedItem[] = [];
  fetched.forEach((outcome, i) => {
    const adapter = enabled[i];
    if (outcome.status === "fulfilled") {
      report.sources.push(adapter.name);
      items.push(...outcome.value);
    } else {
      report.failedSources.push(adapter.name);
      logger.error(`[INGEST] Source ${adapter.name} failed`, outcome.reason);
    }
  });
  report.fetched = items.length;
  logger.info(`[INGEST] Fetched ${items.length} raw items from ${report.sources.length} sources`);

  // Cheap exact checks first: repeats within this run, then ids already indexed
  const seenKeys = new Set<string>();
  const fresh: IngestedItem[] = [];
  for (const item of items) {
    const key = contentKey(item);
    if (seenKeys.has(key)) {
      report.duplicates++;
      continue;
    }
    seenKeys.add(key);

    if (deps.index.hasId(item.id)) {
      report.duplicates++;
      continue;
    }
    fresh.push(item);
  }

  if (fresh.length > 0) {
    const vectors = await deps.provider.embedBatch(fresh.map(embeddingText));
    const relevant = await deps.prefilter.relevanceMask(fresh, vectors);

    for (let i = 0; i < fresh.length; i++) {
      const item = fresh[i];
      const vector = vectors[i];

      // Items saved earlier in this loop are already indexed, so this also
      // catches near-duplicates within the run
      if (
        deps.index.hasId(item.id) ||
        (await deps.index.isDuplicate(embeddingText(item), duplicateThreshold, vector))
      ) {
        report.duplicates++;
        continue;
      }
      if (!relevant[i]) {
        report.irrelevant++;
        continue;
      }

      if (await deps.store.saveItem({ ...item, embedding: vector })) {
        report.saved++;
        await deps.index.add(item.id, vector);
      }
    }
  }

  if (deps.index.persistent) {
    try {
      deps.index.save();
    } catch (error) {
      logger.error("[INGEST] Failed to persist vector index", error);
    }
  }

  logger.info(
    `[INGEST] Complete: saved ${report.saved} new items ` +
      `(dropped ${report.duplicates} duplicates, ${report.irrelevant} irrelevant)`
  );
  return report;
}
