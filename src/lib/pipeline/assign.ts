/**
 * Exclusive persona assignment and ranking
 *
 * An item accepted by several personas appears only in the section of the
 * persona that scored it highest. Ties go to the persona listed first in
 * PERSONA_ORDER.
 */

import type {
  DigestEntry,
  EvaluationResult,
  IngestedItem,
  PersonaName,
  PersonaSections,
} from "../model";
import { KEEP_THRESHOLD, PERSONA_ORDER } from "./personas";

export const DEFAULT_TOP_N = 5;

export interface BatchOutcome {
  persona: PersonaName;
  items: IngestedItem[];
  results: EvaluationResult[];
}

export function emptySections(): PersonaSections {
  return { GENAI_NEWS: [], PRODUCT_IDEAS: [], FINANCIAL_ANALYSIS: [] };
}

export function isAccepted(result: EvaluationResult): boolean {
  return result.decision === "KEEP" && result.score >= KEEP_THRESHOLD;
}

/**
 * item id -> persona -> accepted entry (the higher score wins if one persona
 * saw the same item twice)
 */
export function collectAcceptances(
  outcomes: BatchOutcome[]
): Map<string, Map<PersonaName, DigestEntry>> {
  const accepted = new Map<string, Map<PersonaName, DigestEntry>>();

  for (const outcome of outcomes) {
    const itemsById = new Map(outcome.items.map((item) => [item.id, item]));
    for (const result of outcome.results) {
      if (!isAccepted(result)) continue;
      const item = itemsById.get(result.itemId);
      if (!item) continue;

      let byPersona = accepted.get(item.id);
      if (!byPersona) {
        byPersona = new Map();
        accepted.set(item.id, byPersona);
      }
      const existing = byPersona.get(result.persona);
      if (!existing || result.score > existing.result.score) {
        byPersona.set(result.persona, { item, result });
      }
    }
  }

  return accepted;
}

/**
 * Place each accepted item in exactly one section
 */
export function assignExclusive(
  accepted: Map<string, Map<PersonaName, DigestEntry>>,
  personaOrder: readonly PersonaName[] = PERSONA_ORDER
): PersonaSections {
  const sections = emptySections();

  for (const byPersona of accepted.values()) {
    let best: DigestEntry | undefined;
    for (const persona of personaOrder) {
      const entry = byPersona.get(persona);
      if (entry && (!best || entry.result.score > best.result.score)) {
        best = entry;
      }
    }
    if (best) {
      sections[best.result.persona].push(best);
    }
  }

  return sections;
}

/**
 * Sort each section by score, highest first, and keep the top N
 */
export function rankSections(sections: PersonaSections, topN: number = DEFAULT_TOP_N): PersonaSections {
  const ranked = emptySections();
  for (const persona of PERSONA_ORDER) {
    ranked[persona] = [...sections[persona]]
      .sort((a, b) => b.result.score - a.result.score)
      .slice(0, topN);
  }
  return ranked;
}

export function selectDigestSections(
  outcomes: BatchOutcome[],
  topN: number = DEFAULT_TOP_N,
  personaOrder: readonly PersonaName[] = PERSONA_ORDER
): PersonaSections {
  return rankSections(assignExclusive(collectAcceptances(outcomes), personaOrder), topN);
}
