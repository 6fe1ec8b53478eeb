/**
 * Markdown rendering for a finished digest
 * Pure: the same sections, summary and date always render the same text
 */

import type { DigestEntry, PersonaName, PersonaSections } from "../model";
import { PERSONAS, PERSONA_ORDER } from "./personas";

export const DIGEST_TITLE = "AI Intelligence Digest";

export function formatDigestDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function escapeLinkText(text: string): string {
  return text.replace(/[[\]]/g, "\\$&");
}

function renderEntry(persona: PersonaName, { item, result }: DigestEntry): string[] {
  const lines = [
    `### [${escapeLinkText(item.title)}](${item.url})`,
    `**Source:** ${item.source}`,
    `**Insight:** ${result.reasoning}`,
  ];
  const extra = PERSONAS[persona].extraField;
  const extraValue = extra ? result.details[extra.detailKey] : undefined;
  if (extra && typeof extraValue === "string" && extraValue) {
    lines.push(`**${extra.label}:** ${extraValue}`);
  }
  lines.push("");
  return lines;
}

/**
 * Render sections in persona order, entries in the order given. Empty
 * sections are left out; an empty summary drops the summary block.
 */
export function formatDigest(sections: PersonaSections, summary: string, date: Date): string {
  const lines = [`# ${DIGEST_TITLE} - ${formatDigestDate(date)}`, ""];

  const trimmed = summary.trim();
  if (trimmed) {
    lines.push("## 📝 Executive Summary", "");
    for (const line of trimmed.split(/\r?\n/)) {
      lines.push(line.trim() ? `> ${line}` : ">");
    }
    lines.push("", "---", "");
  }

  for (const persona of PERSONA_ORDER) {
    const entries = sections[persona];
    if (entries.length === 0) continue;
    lines.push(`## ${PERSONAS[persona].heading}`, "");
    for (const entry of entries) {
      lines.push(...renderEntry(persona, entry));
    }
  }

  return lines.join("\n");
}
