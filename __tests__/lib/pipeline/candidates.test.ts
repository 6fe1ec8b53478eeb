/**
 * Tests for the generation candidate pool
 */

import { describe, it, expect } from "vitest";
import { buildCandidatePool } from "../../../src/lib/pipeline/candidates";
import { makeItem } from "../../helpers/fakes";

describe("buildCandidatePool", () => {
  it("keeps the most engaging items per source family", () => {
    const items = [
      makeItem({ title: "hn low", source: "HackerNews", rawScore: 10 }),
      makeItem({ title: "hn high", source: "HackerNews", rawScore: 300 }),
      makeItem({ title: "hn mid", source: "HackerNews", rawScore: 50 }),
      makeItem({ title: "reddit one", source: "Reddit: r/LocalLLaMA", rawScore: 0 }),
      makeItem({ title: "reddit two", source: "Reddit: r/SaaS", rawScore: 5 }),
    ];

    const pool = buildCandidatePool(items, { perSource: 2 });

    expect(pool.map((item) => item.title)).toEqual(["hn high", "hn mid", "reddit two", "reddit one"]);
  });

  it("drops repeated titles across sources, first occurrence wins", () => {
    const items = [
      makeItem({ title: "Same Story!", source: "HackerNews", url: "https://a.example/1" }),
      makeItem({ title: "same story", source: "RSS: Blog", url: "https://b.example/2" }),
    ];

    const pool = buildCandidatePool(items);

    expect(pool).toHaveLength(1);
    expect(pool[0].url).toBe("https://a.example/1");
  });

  it("skips disabled source families", () => {
    const items = [
      makeItem({ title: "hn", source: "HackerNews" }),
      makeItem({ title: "rss", source: "RSS: Blog" }),
    ];

    const pool = buildCandidatePool(items, { isSourceEnabled: (source) => source !== "RSS" });

    expect(pool.map((item) => item.title)).toEqual(["hn"]);
  });

  it("returns an empty pool for no items", () => {
    expect(buildCandidatePool([])).toEqual([]);
  });
});
