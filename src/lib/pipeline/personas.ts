/**
 * Persona definitions
 *
 * Each persona is a variant of PersonaName with an entry in the PERSONAS
 * lookup table: its semantic anchor, its batch prompt, and how a line of the
 * model's pipe-delimited reply becomes an EvaluationResult.
 */

import {
  createEvaluationResult,
  type Decision,
  type EvaluationResult,
  type PersonaName,
} from "../model";

export interface PersonaExtraField {
  key: string; // Field name in the model output, e.g. "TECH"
  detailKey: string; // Key under EvaluationResult.details
  label: string; // Label rendered in the digest
}

export interface PersonaDefinition {
  name: PersonaName;
  label: string;
  heading: string;
  preferenceKey: string;
  anchor: string;
  extraField?: PersonaExtraField;
  buildPrompt(itemsContent: string): string;
}

/**
 * Priority order: section order in the digest and the tie-break when one item
 * scores equally for several personas
 */
export const PERSONA_ORDER: readonly PersonaName[] = [
  "GENAI_NEWS",
  "PRODUCT_IDEAS",
  "FINANCIAL_ANALYSIS",
];

/**
 * Minimum score for a KEEP to stand
 */
export const KEEP_THRESHOLD = 5;

function outputFormat(extra?: PersonaExtraField, extraHint?: string): string {
  const base = "ID: <ID> | SCORE: <0-10> | DECISION: <KEEP/DISCARD> | INSIGHT: <4 sentences explaining why this matters>";
  if (!extra || !extraHint) return base;
  return `${base} | ${extra.key}: <${extraHint}>`;
}

function batchPrompt(
  role: string,
  guidelines: string[],
  itemsContent: string,
  extra?: PersonaExtraField,
  extraHint?: string
): string {
  const lines = [
    role,
    "",
    "GUIDELINES:",
    ...guidelines.map((g) => `- ${g}`),
    "- IGNORE duplicates.",
    "",
    "INPUT ITEMS:",
    itemsContent,
    "",
    "OUTPUT FORMAT:",
    "For EACH item, output a SINGLE LINE in this exact format:",
    outputFormat(extra, extraHint),
  ];
  if (extra) {
    lines.push(`The ${extra.key} field is optional; omit it when there is nothing concrete to report.`);
  }
  lines.push("Output ONLY these lines, one per item, with no extra commentary.");
  return lines.join("\n");
}

const TECH_FIELD: PersonaExtraField = {
  key: "TECH",
  detailKey: "technical_details",
  label: "Technical Details",
};

const METRICS_FIELD: PersonaExtraField = {
  key: "METRICS",
  detailKey: "key_metrics",
  label: "Metrics",
};

export const PERSONAS: Record<PersonaName, PersonaDefinition> = {
  GENAI_NEWS: {
    name: "GENAI_NEWS",
    label: "GenAI Tech News",
    heading: "🤖 GenAI Tech News",
    preferenceKey: "PERSONA_GENAI_NEWS_ENABLED",
    anchor:
      "Large Language Models, LLM, GPT, Claude, Llama, Gemini, AI, machine learning, deep learning, " +
      "neural networks, transformers, AI agents, RAG, embeddings, fine-tuning, training, inference, " +
      "CUDA, GPU, PyTorch, TensorFlow, AI research, model releases, open source AI, prompt engineering.",
    extraField: TECH_FIELD,
    buildPrompt: (itemsContent) =>
      batchPrompt(
        "You are an expert AI editor. Analyze the following list of content items.",
        [
          "Select items relevant to a Generative AI engineer.",
          "STRICTLY DISCARD generic, non-technical news.",
        ],
        itemsContent,
        TECH_FIELD,
        "models, architectures or techniques involved"
      ),
  },
  PRODUCT_IDEAS: {
    name: "PRODUCT_IDEAS",
    label: "Product Opportunities",
    heading: "💡 Product Opportunities",
    preferenceKey: "PERSONA_PRODUCT_IDEAS_ENABLED",
    anchor:
      "Startup, product launch, SaaS, app, software, developer tools, market opportunity, business idea, " +
      "MVP, growth, entrepreneurship, indie hacker, bootstrapping, API, platform, marketplace.",
    buildPrompt: (itemsContent) =>
      batchPrompt(
        "You are a product scout. Analyze the following list of content items.",
        [
          "Look for startup ideas, unaddressed problems, or market gaps.",
          "DISCARD items with no product angle.",
        ],
        itemsContent
      ),
  },
  FINANCIAL_ANALYSIS: {
    name: "FINANCIAL_ANALYSIS",
    label: "Financial Analysis",
    heading: "💰 Financial Analysis",
    preferenceKey: "PERSONA_FINANCE_ENABLED",
    anchor:
      "Revenue, earnings, funding, Series A, venture capital, IPO, stock, valuation, investment, " +
      "financial report, quarterly results, market cap, acquisition, merger, tech stocks.",
    extraField: METRICS_FIELD,
    buildPrompt: (itemsContent) =>
      batchPrompt(
        "You are a financial analyst. Analyze the following list of content items.",
        [
          "Look for revenue, funding, IPOs and market data.",
          "DISCARD items without a financial angle.",
        ],
        itemsContent,
        METRICS_FIELD,
        "key figures such as amounts, valuations or growth rates"
      ),
  },
};

/**
 * Split "ID: x | SCORE: 7 | ..." into upper-cased keys and trimmed values.
 * Anything but letters is dropped from keys, so bullets and bold markers are ignored.
 */
export function parseFields(line: string): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const part of line.split("|")) {
    const separator = part.indexOf(":");
    if (separator === -1) continue;
    const key = part
      .slice(0, separator)
      .replace(/[^A-Za-z]/g, "")
      .toUpperCase();
    if (!key) continue;
    const value = part
      .slice(separator + 1)
      .trim()
      .replace(/^\*+|\*+$/g, "")
      .trim();
    fields[key] = value;
  }
  return fields;
}

/**
 * Read the line's ID field, if any
 */
export function lineItemId(line: string): string | undefined {
  const id = parseFields(line).ID;
  if (!id) return undefined;
  const cleaned = id.replace(/^<|>$/g, "").trim();
  return cleaned || undefined;
}

/**
 * Missing score reads as 0; anything present must be numeric
 */
export function parseScore(value: string | undefined): number {
  if (value === undefined) return 0;
  const score = Number(value);
  if (value.trim() === "" || Number.isNaN(score)) {
    throw new Error(`Unparseable score: "${value}"`);
  }
  return score;
}

/**
 * KEEP stands only when the decision text says KEEP and the score reaches
 * KEEP_THRESHOLD
 */
export function normalizeDecision(decisionText: string | undefined, score: number): Decision {
  const saysKeep = (decisionText ?? "DISCARD").toUpperCase().includes("KEEP");
  return saysKeep && score >= KEEP_THRESHOLD ? "KEEP" : "DISCARD";
}

/**
 * Turn one reply line into a result for the given item.
 * Throws when the score is not numeric.
 */
export function parseEvaluationLine(
  persona: PersonaName,
  itemId: string,
  line: string,
  semanticScore?: number
): EvaluationResult {
  const definition = PERSONAS[persona];
  const fields = parseFields(line);
  const score = parseScore(fields.SCORE);

  const details: Record<string, unknown> = { raw_line: line };
  if (semanticScore !== undefined) {
    details.semantic_score = semanticScore;
  }
  const extra = definition.extraField;
  if (extra && fields[extra.key]) {
    details[extra.detailKey] = fields[extra.key];
  }

  return createEvaluationResult({
    itemId,
    persona,
    score,
    decision: normalizeDecision(fields.DECISION, score),
    reasoning: fields.INSIGHT ?? "",
    details,
  });
}

export function isPersonaName(value: string): value is PersonaName {
  return Object.hasOwn(PERSONAS, value);
}
