/**
 * Tests for the HTTP API
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Hono } from "hono";
import { z } from "zod";
import { createApiApp } from "../../src/server/app";
import { PipelineRunner, type PipelinePhases } from "../../src/lib/pipeline/runner";
import type { GenerationReport } from "../../src/lib/pipeline/generate";
import type { IngestionReport } from "../../src/lib/pipeline/ingest";
import type { DigestArchive } from "../../src/lib/storage/local";
import { MemoryStore } from "../helpers/fakes";

class MemoryArchive implements DigestArchive {
  files = new Map<string, string>();

  async write(date: string, markdown: string): Promise<string> {
    this.files.set(`digest_${date}.md`, markdown);
    return `/archive/digest_${date}.md`;
  }

  async list(): Promise<string[]> {
    return [...this.files.keys()].sort().reverse();
  }

  async read(fileName: string): Promise<string | null> {
    return this.files.get(fileName) ?? null;
  }
}

/**
 * Phases that stay pending until released
 */
class GatedPhases implements PipelinePhases {
  private release: () => void = () => undefined;
  private readonly gate = new Promise<void>((resolve) => {
    this.release = resolve;
  });
  calls: string[] = [];

  async ingest(): Promise<IngestionReport> {
    this.calls.push("ingest");
    await this.gate;
    return { sources: [], failedSources: [], fetched: 0, saved: 0, duplicates: 0, irrelevant: 0 };
  }

  async generate(): Promise<GenerationReport> {
    this.calls.push("generate");
    await this.gate;
    throw new Error("not used");
  }

  open(): void {
    this.release();
  }
}

const JobResponseSchema = z.object({
  job: z.object({ id: z.string(), mode: z.string(), status: z.string() }),
});

function postJson(app: Hono, path: string, body: unknown) {
  return app.request(path, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("API", () => {
  let store: MemoryStore;
  let archive: MemoryArchive;
  let phases: GatedPhases;
  let runner: PipelineRunner;
  let app: Hono;

  beforeEach(() => {
    store = new MemoryStore();
    archive = new MemoryArchive();
    phases = new GatedPhases();
    runner = new PipelineRunner(phases);
    app = createApiApp({ store, runner, archive });
  });

  it("reports an idle runner", async () => {
    const res = await app.request("/api/status");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, state: { status: "idle" }, lastJob: null });
  });

  it("lists every preference with defaults", async () => {
    await store.setPreference("SOURCE_RSS_ENABLED", "false");

    const res = await app.request("/api/preferences");

    expect(await res.json()).toEqual({
      ok: true,
      preferences: {
        SOURCE_HN_ENABLED: "true",
        SOURCE_REDDIT_ENABLED: "true",
        SOURCE_RSS_ENABLED: "false",
        PERSONA_GENAI_NEWS_ENABLED: "true",
        PERSONA_PRODUCT_IDEAS_ENABLED: "true",
        PERSONA_FINANCE_ENABLED: "true",
        DELIVERY_EMAIL_ENABLED: "true",
        DELIVERY_TELEGRAM_ENABLED: "true",
        DELIVERY_EMAIL_CUSTOM_RECIPIENTS: "",
      },
    });
  });

  it("stores normalized preference updates", async () => {
    const res = await postJson(app, "/api/preferences", [
      { key: "PERSONA_FINANCE_ENABLED", value: "FALSE" },
      { key: "DELIVERY_TELEGRAM_ENABLED", value: false },
    ]);

    expect(res.status).toBe(200);
    expect(store.preferences.get("PERSONA_FINANCE_ENABLED")).toBe("false");
    expect(store.preferences.get("DELIVERY_TELEGRAM_ENABLED")).toBe("false");
  });

  it("accepts an object of updates", async () => {
    const res = await postJson(app, "/api/preferences", { SOURCE_HN_ENABLED: "False" });

    expect(res.status).toBe(200);
    expect(store.preferences.get("SOURCE_HN_ENABLED")).toBe("false");
  });

  it("rejects a bad value and stores nothing from the batch", async () => {
    const res = await postJson(app, "/api/preferences", [
      { key: "SOURCE_HN_ENABLED", value: "false" },
      { key: "SOURCE_REDDIT_ENABLED", value: "flase" },
    ]);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      ok: false,
      error: { message: 'Invalid value "flase" for SOURCE_REDDIT_ENABLED: expected true or false' },
    });
    expect(store.preferences.size).toBe(0);
  });

  it("rejects a malformed payload", async () => {
    const res = await postJson(app, "/api/preferences", "true");
    expect(res.status).toBe(400);
  });

  it("lists digests newest first without their markdown", async () => {
    await store.saveDigest({ createdAt: new Date("2026-10-18T07:00:00Z"), markdown: "# a", summary: "a", itemCount: 1 });
    await store.saveDigest({ createdAt: new Date("2026-10-19T07:00:00Z"), markdown: "# b", summary: "b", itemCount: 2 });

    const res = await app.request("/api/digests?limit=1");

    expect(await res.json()).toEqual({
      ok: true,
      digests: [{ id: "digest-2", createdAt: "2026-10-19T07:00:00.000Z", summary: "b", itemCount: 2 }],
    });
  });

  it("returns one digest by id", async () => {
    await store.saveDigest({ createdAt: new Date("2026-10-19T07:00:00Z"), markdown: "# b", summary: "b", itemCount: 2 });

    const found = await app.request("/api/digests/digest-1");
    const missing = await app.request("/api/digests/digest-9");

    expect(await found.json()).toMatchObject({ ok: true, digest: { id: "digest-1", markdown: "# b" } });
    expect(missing.status).toBe(404);
  });

  it("serves archived digest files", async () => {
    await archive.write("2026-10-19", "# archived");

    const list = await app.request("/api/archive");
    const file = await app.request("/api/archive/digest_2026-10-19.md");
    const missing = await app.request("/api/archive/digest_2026-10-01.md");

    expect(await list.json()).toEqual({ ok: true, files: ["digest_2026-10-19.md"] });
    expect(await file.json()).toEqual({ ok: true, fileName: "digest_2026-10-19.md", content: "# archived" });
    expect(missing.status).toBe(404);
  });

  it("starts a run in the background and refuses a second one", async () => {
    const first = await postJson(app, "/api/run", { mode: "ingest" });
    const second = await postJson(app, "/api/run", {});

    expect(first.status).toBe(202);
    const { job } = JobResponseSchema.parse(await first.json());
    expect(job).toMatchObject({ mode: "ingest", status: "running" });

    expect(second.status).toBe(409);
    expect(await second.json()).toMatchObject({ ok: false, error: { details: { activeJobId: job.id } } });

    const status = await app.request("/api/status");
    expect(await status.json()).toMatchObject({ state: { status: "running", jobId: job.id, mode: "ingest" } });

    phases.open();
    await runner.lastJob?.result;
    expect(phases.calls).toEqual(["ingest"]);
    expect(runner.state).toEqual({ status: "idle" });
  });

  it("runs the full pipeline when no mode is given", async () => {
    const res = await app.request("/api/run", { method: "POST" });

    expect(res.status).toBe(202);
    expect(await res.json()).toMatchObject({ ok: true, job: { mode: "full" } });
    phases.open();
    await runner.lastJob?.result;
  });

  it("rejects an unknown mode", async () => {
    const res = await postJson(app, "/api/run", { mode: "everything" });
    expect(res.status).toBe(400);
  });
});
