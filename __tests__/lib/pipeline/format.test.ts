/**
 * Tests for markdown digest rendering
 */

import { describe, it, expect } from "vitest";
import { formatDigest, formatDigestDate } from "../../../src/lib/pipeline/format";
import { emptySections } from "../../../src/lib/pipeline/assign";
import { createEvaluationResult } from "../../../src/lib/model";
import { makeItem } from "../../helpers/fakes";

const date = new Date("2026-10-19T08:30:00Z");

describe("formatDigestDate", () => {
  it("uses the UTC calendar date", () => {
    expect(formatDigestDate(new Date("2026-10-19T23:59:00Z"))).toBe("2026-10-19");
  });
});

describe("formatDigest", () => {
  it("renders the summary and non-empty sections", () => {
    const sections = emptySections();
    sections.GENAI_NEWS.push({
      item: makeItem({ id: "g1", title: "New [beta] model", url: "https://example.com/a", source: "HackerNews" }),
      result: createEvaluationResult({
        itemId: "g1",
        persona: "GENAI_NEWS",
        score: 9,
        decision: "KEEP",
        reasoning: "Big deal",
        details: { technical_details: "MoE" },
      }),
    });
    sections.PRODUCT_IDEAS.push({
      item: makeItem({ id: "p1", title: "Invoice bot", url: "https://example.com/b", source: "Reddit: r/SaaS" }),
      result: createEvaluationResult({
        itemId: "p1",
        persona: "PRODUCT_IDEAS",
        score: 7,
        decision: "KEEP",
        reasoning: "Clear demand",
        details: {},
      }),
    });

    const markdown = formatDigest(sections, "Line one\n\nLine two", date);

    expect(markdown).toBe(
      [
        "# AI Intelligence Digest - 2026-10-19",
        "",
        "## 📝 Executive Summary",
        "",
        "> Line one",
        ">",
        "> Line two",
        "",
        "---",
        "",
        "## 🤖 GenAI Tech News",
        "",
        "### [New \\[beta\\] model](https://example.com/a)",
        "**Source:** HackerNews",
        "**Insight:** Big deal",
        "**Technical Details:** MoE",
        "",
        "## 💡 Product Opportunities",
        "",
        "### [Invoice bot](https://example.com/b)",
        "**Source:** Reddit: r/SaaS",
        "**Insight:** Clear demand",
        "",
      ].join("\n")
    );
  });

  it("renders only the title and summary when no sections have entries", () => {
    const markdown = formatDigest(emptySections(), "Nothing today.", date);
    expect(markdown).toBe(
      [
        "# AI Intelligence Digest - 2026-10-19",
        "",
        "## 📝 Executive Summary",
        "",
        "> Nothing today.",
        "",
        "---",
        "",
      ].join("\n")
    );
  });

  it("leaves out the summary block for an empty summary", () => {
    expect(formatDigest(emptySections(), "  ", date)).toBe("# AI Intelligence Digest - 2026-10-19\n");
  });
});
