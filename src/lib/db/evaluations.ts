/**
 * Evaluation persistence
 * One row per (item, persona); a later evaluation replaces the earlier one
 */

import type { EvaluationResult } from "../model";
import type { DatabaseClient } from "./driver";
import { nowSeconds } from "./driver";

export async function saveEvaluations(
  client: DatabaseClient,
  results: EvaluationResult[]
): Promise<void> {
  const evaluatedAt = nowSeconds();
  for (const result of results) {
    await client.run(
      `INSERT INTO evaluations (item_id, persona, score, decision, reasoning, details, evaluated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT (item_id, persona) DO UPDATE SET
         score = excluded.score,
         decision = excluded.decision,
         reasoning = excluded.reasoning,
         details = excluded.details,
         evaluated_at = excluded.evaluated_at`,
      [
        result.itemId,
        result.persona,
        result.score,
        result.decision,
        result.reasoning,
        JSON.stringify(result.details),
        evaluatedAt,
      ]
    );
  }
}
