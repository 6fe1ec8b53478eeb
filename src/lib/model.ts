/**
 * Core data models for the persona digest
 */

export type PersonaName = "GENAI_NEWS" | "PRODUCT_IDEAS" | "FINANCIAL_ANALYSIS";

export type Decision = "KEEP" | "DISCARD";

export interface IngestedItem {
  id: string; // Stable, derived from the URL
  url: string;
  source: string; // e.g. "HackerNews", "Reddit", "RSS"
  title: string;
  content?: string;
  author?: string;
  createdAt: Date;
  rawScore: number; // Engagement (upvotes, points)
  metadata: Record<string, unknown>;
  embedding?: number[]; // Cached vector
}

export interface EvaluationResult {
  readonly itemId: string;
  readonly persona: PersonaName;
  readonly score: number; // 0–10
  readonly decision: Decision;
  readonly reasoning: string;
  readonly details: Readonly<Record<string, unknown>>;
}

export interface DigestEntry {
  item: IngestedItem;
  result: EvaluationResult;
}

export type PersonaSections = Record<PersonaName, DigestEntry[]>;

/**
 * Build an evaluation result. Results are frozen once created.
 */
export function createEvaluationResult(result: EvaluationResult): EvaluationResult {
  return Object.freeze({ ...result, details: Object.freeze({ ...result.details }) });
}
