/**
 * Tests for the Hacker News adapter
 */

import { describe, it, expect, vi } from "vitest";
import { HN_API_BASE, HackerNewsAdapter } from "../../../src/lib/sources/hackernews";
import { itemIdFromUrl } from "../../../src/lib/pipeline/normalize";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function fakeApi(routes: Record<string, unknown>, failing: string[] = []) {
  return vi.fn(async (input: string) => {
    const path = input.slice(HN_API_BASE.length);
    if (failing.includes(path)) return jsonResponse({ error: "unavailable" }, 503);
    if (path in routes) return jsonResponse(routes[path]);
    return jsonResponse(null, 404);
  });
}

describe("HackerNewsAdapter", () => {
  const nowSeconds = Math.floor(Date.now() / 1000);

  it("collects recent stories from both lists", async () => {
    const fetchFn = fakeApi(
      {
        "/topstories.json": [1, 2, 3, 5],
        "/showstories.json": [3, 4],
        "/item/1.json": {
          id: 1,
          type: "story",
          title: "Open weights model",
          url: "https://example.com/one",
          by: "alice",
          time: nowSeconds - 3600,
          score: 120,
          descendants: 40,
        },
        "/item/2.json": { id: 2, type: "comment", text: "nice", time: nowSeconds - 60 },
        "/item/3.json": { id: 3, type: "story", title: "Show HN: My tool", text: "Built this", time: nowSeconds - 7200, score: 8 },
        "/item/4.json": { id: 4, type: "story", title: "Old story", url: "https://example.com/old", time: nowSeconds - 3 * 86400 },
      },
      ["/item/5.json"]
    );

    const items = await new HackerNewsAdapter(fetchFn).fetchItems(24);

    expect(items.map((item) => item.title)).toEqual(["Open weights model", "Show HN: My tool"]);
    expect(items[0]).toMatchObject({
      id: itemIdFromUrl("https://example.com/one"),
      source: "HackerNews",
      url: "https://example.com/one",
      author: "alice",
      rawScore: 120,
      metadata: { hn_id: 1, comments: 40, score: 120 },
    });
    expect(items[1]).toMatchObject({
      url: "https://news.ycombinator.com/item?id=3",
      content: "Built this",
      rawScore: 8,
    });
    // Story 3 appears in both lists but is fetched once
    expect(fetchFn.mock.calls.filter(([url]) => url.endsWith("/item/3.json"))).toHaveLength(1);
  });

  it("skips dead and deleted stories", async () => {
    const fetchFn = fakeApi({
      "/topstories.json": [1, 2],
      "/showstories.json": [],
      "/item/1.json": { id: 1, type: "story", title: "Dead", time: nowSeconds, dead: true },
      "/item/2.json": { id: 2, type: "story", title: "Deleted", time: nowSeconds, deleted: true },
    });

    expect(await new HackerNewsAdapter(fetchFn).fetchItems(24)).toEqual([]);
  });

  it("rejects when a story list cannot be read", async () => {
    const fetchFn = fakeApi({}, ["/topstories.json"]);

    await expect(new HackerNewsAdapter(fetchFn).fetchItems(24)).rejects.toThrow(
      `GET ${HN_API_BASE}/topstories.json failed with status 503`
    );
  });
});
