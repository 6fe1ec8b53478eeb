/**
 * Two-stage persona evaluation
 *
 * Stage 1 compares each item with the persona anchor and discards anything
 * below the semantic threshold without calling the LLM. Stage 2 sends the
 * survivors to the LLM in one prompt and parses one line per item. Survivors
 * the reply does not cover are kept with a neutral score.
 */

import {
  createEvaluationResult,
  type EvaluationResult,
  type IngestedItem,
  type PersonaName,
} from "../model";
import type { EmbeddingProvider } from "../embeddings";
import { dotProduct } from "../embeddings";
import type { LlmClient } from "../llm/client";
import { createSharedResource, type SharedResource } from "../shared-resource";
import { logger } from "../logger";
import { LlmRequestError, toError } from "../errors";
import { embeddingText } from "./normalize";
import { PERSONAS, lineItemId, parseEvaluationLine } from "./personas";

export const DEFAULT_SEMANTIC_THRESHOLD = 0.15;
export const PROMPT_CONTENT_LIMIT = 400;
export const FALLBACK_SCORE = 5;
export const FALLBACK_REASONING = "Passed semantic filter, pending review";

export interface EvaluatorDeps {
  provider: EmbeddingProvider;
  llm: LlmClient;
  semanticThreshold?: number;
}

/**
 * One prompt line per item; content is cut to PROMPT_CONTENT_LIMIT characters
 * with newlines flattened
 */
export function toPromptLine(item: IngestedItem): string {
  const content = (item.content ?? "").slice(0, PROMPT_CONTENT_LIMIT).replace(/\r?\n/g, " ");
  return `ID: ${item.id} | TITLE: ${item.title} | SOURCE: ${item.source} | CONTENT: ${content}`;
}

export class PersonaEvaluator {
  readonly semanticThreshold: number;
  private readonly anchorVector: SharedResource<number[]>;

  constructor(
    readonly persona: PersonaName,
    private readonly deps: EvaluatorDeps
  ) {
    this.semanticThreshold = deps.semanticThreshold ?? DEFAULT_SEMANTIC_THRESHOLD;
    const anchor = PERSONAS[persona].anchor;
    this.anchorVector = createSharedResource(`${persona} anchor`, () =>
      deps.provider.embed(anchor)
    );
  }

  async semanticScores(items: IngestedItem[]): Promise<number[]> {
    if (items.length === 0) return [];
    const anchor = await this.anchorVector.get();
    const vectors = await this.deps.provider.embedBatch(items.map(embeddingText));
    return vectors.map((vector) => dotProduct(vector, anchor));
  }

  /**
   * Evaluate a batch with at most one LLM request. Rejects with
   * LlmRequestError when that request fails; unparseable lines are logged
   * and skipped.
   */
  async evaluateBatch(items: IngestedItem[]): Promise<EvaluationResult[]> {
    if (items.length === 0) return [];

    const scores = await this.semanticScores(items);
    const results: EvaluationResult[] = [];
    const survivors = new Map<string, { item: IngestedItem; semanticScore: number }>();

    items.forEach((item, i) => {
      const semanticScore = scores[i];
      if (semanticScore < this.semanticThreshold) {
        results.push(
          createEvaluationResult({
            itemId: item.id,
            persona: this.persona,
            score: 0,
            decision: "DISCARD",
            reasoning: `Low relevance (cosine=${semanticScore.toFixed(2)})`,
            details: { semantic_score: semanticScore },
          })
        );
      } else if (!survivors.has(item.id)) {
        survivors.set(item.id, { item, semanticScore });
      }
    });

    if (survivors.size === 0) {
      return results;
    }

    const itemsContent = Array.from(survivors.values())
      .map(({ item }) => toPromptLine(item))
      .join("\n");
    const prompt = PERSONAS[this.persona].buildPrompt(itemsContent);

    logger.debug(`[${this.persona}] Sending ${survivors.size}/${items.length} items to LLM`);
    let reply: string;
    try {
      reply = await this.deps.llm.generateText(prompt);
    } catch (error) {
      throw new LlmRequestError(
        `[${this.persona}] LLM evaluation failed: ${toError(error).message}`,
        { cause: error }
      );
    }

    const parsed = new Map<string, EvaluationResult>();
    for (const rawLine of reply.split("\n")) {
      const line = rawLine.trim();
      if (!line) continue;

      const itemId = lineItemId(line);
      if (!itemId) continue;

      const survivor = survivors.get(itemId);
      if (!survivor) {
        logger.debug(`[${this.persona}] Ignoring reply line for unknown id ${itemId}`);
        continue;
      }
      if (parsed.has(itemId)) continue;

      try {
        parsed.set(
          itemId,
          parseEvaluationLine(this.persona, itemId, line, survivor.semanticScore)
        );
      } catch (error) {
        const errorMsg = error instanceof Error ? error.message : String(error);
        logger.warn(`[${this.persona}] Skipping unparseable reply line`, { line, error: errorMsg });
      }
    }

    for (const [itemId, { semanticScore }] of survivors) {
      const result = parsed.get(itemId);
      if (result) {
        results.push(result);
      } else {
        results.push(
          createEvaluationResult({
            itemId,
            persona: this.persona,
            score: FALLBACK_SCORE,
            decision: "KEEP",
            reasoning: FALLBACK_REASONING,
            details: { semantic_score: semanticScore, fallback: true },
          })
        );
      }
    }

    return results;
  }

  async evaluate(item: IngestedItem): Promise<EvaluationResult> {
    const [result] = await this.evaluateBatch([item]);
    return result;
  }
}

export type PersonaEvaluators = Record<PersonaName, PersonaEvaluator>;

/**
 * One evaluator per persona, sharing the embedding provider and LLM client.
 * Anchor embeddings are cached on each evaluator, so build these once.
 */
export function createPersonaEvaluators(deps: EvaluatorDeps): PersonaEvaluators {
  return {
    GENAI_NEWS: new PersonaEvaluator("GENAI_NEWS", deps),
    PRODUCT_IDEAS: new PersonaEvaluator("PRODUCT_IDEAS", deps),
    FINANCIAL_ANALYSIS: new PersonaEvaluator("FINANCIAL_ANALYSIS", deps),
  };
}
