/**
 * Generation phase
 * Candidate pool -> persona evaluation (persona x batch, bounded concurrency)
 * -> exclusive assignment and ranking -> summary -> markdown -> archive and
 * delivery. A failed LLM request costs only its own batch; embedding and
 * storage failures abort the run.
 */

import type { PersonaName, PersonaSections } from "../model";
import type { LlmClient } from "../llm/client";
import type { DeliveryChannel } from "../delivery/types";
import type { DigestArchive } from "../storage/local";
import { createLimiter } from "../concurrency";
import { LlmRequestError, toError } from "../errors";
import { logger } from "../logger";
import { SOURCE_PREFERENCE_KEYS, isEnabledValue, PREFERENCE_DEFAULT } from "../../config/preferences";
import { DEFAULT_TOP_N, selectDigestSections, type BatchOutcome } from "./assign";
import { buildCandidatePool, DEFAULT_CANDIDATES_PER_SOURCE } from "./candidates";
import { generateExecutiveSummary, selectedEntries } from "./digest";
import type { PersonaEvaluators } from "./evaluate";
import { formatDigest, formatDigestDate, DIGEST_TITLE } from "./format";
import { PERSONAS, PERSONA_ORDER } from "./personas";
import { isPreferenceEnabled, type DigestRecord, type PipelineStore } from "./store";

export const DEFAULT_BATCH_SIZE = 12;
export const DEFAULT_MAX_CONCURRENT = 4;
export const DEFAULT_POOL_LIMIT = 1000;

export interface GenerationDeps {
  store: PipelineStore;
  llm: LlmClient;
  evaluators: PersonaEvaluators;
  delivery?: DeliveryChannel[];
  archive?: DigestArchive;
  batchSize?: number;
  maxConcurrent?: number;
  topN?: number;
  candidatesPerSource?: number;
  poolLimit?: number;
  now?: () => Date;
}

export interface GenerationReport {
  candidates: number;
  personas: PersonaName[];
  batches: number;
  failedBatches: number;
  evaluations: number;
  sections: PersonaSections;
  summary: string;
  markdown: string;
  digest?: DigestRecord;
  archivePath?: string;
  delivered: string[];
}

export function chunk<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

async function loadDisabledSources(store: PipelineStore): Promise<Set<string>> {
  const disabled = new Set<string>();
  for (const [source, key] of Object.entries(SOURCE_PREFERENCE_KEYS)) {
    if (!isEnabledValue(await store.getPreference(key, PREFERENCE_DEFAULT))) {
      disabled.add(source);
    }
  }
  return disabled;
}

export async function runGeneration(deps: GenerationDeps): Promise<GenerationReport> {
  const batchSize = deps.batchSize ?? DEFAULT_BATCH_SIZE;
  const now = deps.now ?? (() => new Date());

  const recent = await deps.store.getRecentItems(deps.poolLimit ?? DEFAULT_POOL_LIMIT);
  const disabledSources = await loadDisabledSources(deps.store);
  const candidates = buildCandidatePool(recent, {
    perSource: deps.candidatesPerSource ?? DEFAULT_CANDIDATES_PER_SOURCE,
    isSourceEnabled: (source) => !disabledSources.has(source),
  });

  const personas: PersonaName[] = [];
  for (const persona of PERSONA_ORDER) {
    if (await isPreferenceEnabled(deps.store, PERSONAS[persona].preferenceKey)) {
      personas.push(persona);
    }
  }
  logger.info(`[GENERATE] ${candidates.length} candidates, active personas: ${personas.join(", ") || "none"}`);

  const batches = chunk(candidates, batchSize);
  const limit = createLimiter(deps.maxConcurrent ?? DEFAULT_MAX_CONCURRENT);
  const total = personas.length * batches.length;
  let finished = 0;
  let failedBatches = 0;

  const tasks = personas.flatMap((persona) =>
    batches.map((items) =>
      limit(async (): Promise<BatchOutcome> => {
        try {
          const results = await deps.evaluators[persona].evaluateBatch(items);
          return { persona, items, results };
        } catch (error) {
          if (!(error instanceof LlmRequestError)) throw error;
          failedBatches++;
          logger.error(`[${persona}] Batch of ${items.length} items failed`, error);
          return { persona, items, results: [] };
        } finally {
          finished++;
          logger.debug(`[GENERATE] Evaluated ${finished}/${total} batches`);
        }
      })
    )
  );
  // Let in-flight batches finish before a fatal error propagates
  const settled = await Promise.allSettled(tasks);
  const outcomes: BatchOutcome[] = [];
  for (const result of settled) {
    if (result.status === "rejected") throw toError(result.reason);
    outcomes.push(result.value);
  }

  const evaluations = outcomes.flatMap((outcome) => outcome.results);
  try {
    await deps.store.saveEvaluations(evaluations);
  } catch (error) {
    logger.error("[GENERATE] Failed to save evaluations", error);
  }

  const sections = selectDigestSections(outcomes, deps.topN ?? DEFAULT_TOP_N);
  const summary = await generateExecutiveSummary(sections, deps.llm);
  const createdAt = now();
  const markdown = formatDigest(sections, summary, createdAt);
  const itemCount = selectedEntries(sections).length;

  const report: GenerationReport = {
    candidates: candidates.length,
    personas,
    batches: total,
    failedBatches,
    evaluations: evaluations.length,
    sections,
    summary,
    markdown,
    delivered: [],
  };

  try {
    report.digest = await deps.store.saveDigest({ createdAt, markdown, summary, itemCount });
  } catch (error) {
    logger.error("[GENERATE] Failed to save digest", error);
  }

  if (deps.archive) {
    try {
      report.archivePath = await deps.archive.write(formatDigestDate(createdAt), markdown);
    } catch (error) {
      logger.error("[GENERATE] Failed to archive digest", error);
    }
  }

  const subject = `${DIGEST_TITLE} - ${formatDigestDate(createdAt)}`;
  for (const channel of deps.delivery ?? []) {
    if (!channel.enabled) continue;
    if (!(await isPreferenceEnabled(deps.store, channel.preferenceKey))) {
      logger.info(`[GENERATE] Delivery via ${channel.name} disabled by preference`);
      continue;
    }
    try {
      await channel.send(subject, markdown);
      report.delivered.push(channel.name);
    } catch (error) {
      logger.error(`[GENERATE] Delivery via ${channel.name} failed`, error);
    }
  }

  logger.info(
    `[GENERATE] Digest ready: ${itemCount} items ` +
      `(${PERSONA_ORDER.map((p) => `${p}=${sections[p].length}`).join(", ")})`
  );
  return report;
}
