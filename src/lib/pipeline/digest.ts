/**
 * Executive summary generation
 * One LLM call over every selected item; failures degrade to a fixed message
 */

import type { DigestEntry, PersonaSections } from "../model";
import type { LlmClient } from "../llm/client";
import { logger } from "../logger";
import { PERSONA_ORDER } from "./personas";

export const NO_ITEMS_SUMMARY = "No relevant items were found in this run matching your criteria.";
export const SUMMARY_FAILED = "Error generating summary: LLM request failed.";

export function selectedEntries(sections: PersonaSections): DigestEntry[] {
  return PERSONA_ORDER.flatMap((persona) => sections[persona]);
}

export function buildSummaryPrompt(entries: DigestEntry[]): string {
  const findings = entries.map(({ item, result }) => `- ${item.title}: ${result.reasoning}`);
  return [
    "Summarize the following findings into a cohesive executive summary.",
    "Write two or three short paragraphs for a busy reader; highlight the most important developments first.",
    "",
    ...findings,
  ].join("\n");
}

export async function generateExecutiveSummary(
  sections: PersonaSections,
  llm: LlmClient
): Promise<string> {
  const entries = selectedEntries(sections);
  if (entries.length === 0) {
    return NO_ITEMS_SUMMARY;
  }

  try {
    const summary = (await llm.generateText(buildSummaryPrompt(entries))).trim();
    if (!summary) {
      logger.warn("Executive summary came back empty");
      return SUMMARY_FAILED;
    }
    return summary;
  } catch (error) {
    logger.error("Failed to generate executive summary", error);
    return SUMMARY_FAILED;
  }
}
