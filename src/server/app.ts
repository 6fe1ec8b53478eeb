/**
 * HTTP API over the pipeline: status, preferences, digest history, the
 * markdown archive and background runs
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { z } from "zod";
import {
  EMAIL_RECIPIENTS_KEY,
  PREFERENCE_DEFAULT,
  PREFERENCE_KEYS,
  parsePreferenceValue,
} from "../config/preferences";
import { PipelineAlreadyRunningError } from "../lib/errors";
import { logger } from "../lib/logger";
import type { PipelineJob, PipelineRunner } from "../lib/pipeline/runner";
import type { DigestRecord, PipelineQueryStore } from "../lib/pipeline/store";
import type { DigestArchive } from "../lib/storage/local";
import { formatZodError, jsonError, readJsonBody } from "./http";

export interface ApiDeps {
  store: PipelineQueryStore;
  runner: PipelineRunner;
  archive: DigestArchive;
  corsOrigin?: string;
}

const PreferenceValueSchema = z.union([z.string(), z.boolean()]).transform(String);

const PreferenceUpdateSchema = z.union([
  z.array(z.object({ key: z.string(), value: PreferenceValueSchema })),
  z.record(PreferenceValueSchema).transform((map) => Object.entries(map).map(([key, value]) => ({ key, value }))),
]);

const RunRequestSchema = z
  .object({ mode: z.enum(["full", "ingest", "generate"]).default("full") })
  .default({});

const DigestListQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(100).default(20),
});

function jobView(job: PipelineJob) {
  return { id: job.id, mode: job.mode, startedAt: job.startedAt, status: job.status };
}

function digestSummaryView(digest: DigestRecord) {
  return { id: digest.id, createdAt: digest.createdAt, summary: digest.summary, itemCount: digest.itemCount };
}

/**
 * Every toggle (defaulting to enabled) plus the custom recipient list
 */
async function currentPreferences(store: PipelineQueryStore): Promise<Record<string, string>> {
  const preferences: Record<string, string> = {};
  for (const key of Object.values(PREFERENCE_KEYS)) {
    preferences[key] = PREFERENCE_DEFAULT;
  }
  preferences[EMAIL_RECIPIENTS_KEY] = "";
  for (const stored of await store.listPreferences()) {
    preferences[stored.key] = stored.value;
  }
  return preferences;
}

export function createApiApp(deps: ApiDeps) {
  const app = new Hono();

  app.use(
    "*",
    cors({
      origin: deps.corsOrigin ?? "*",
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type"],
    })
  );

  app.get("/api/status", (c) => {
    const lastJob = deps.runner.lastJob;
    return c.json({
      ok: true,
      state: deps.runner.state,
      lastJob: lastJob ? jobView(lastJob) : null,
    });
  });

  app.get("/api/preferences", async (c) => {
    return c.json({ ok: true, preferences: await currentPreferences(deps.store) });
  });

  app.post("/api/preferences", async (c) => {
    const parsed = PreferenceUpdateSchema.safeParse(await readJsonBody(c));
    if (!parsed.success) {
      return jsonError(c, 400, "Invalid preferences payload", formatZodError(parsed.error));
    }

    // Validate the whole batch before storing any of it
    const updates: Array<{ key: string; value: string }> = [];
    for (const { key, value } of parsed.data) {
      try {
        updates.push({ key, value: parsePreferenceValue(key, value) });
      } catch (error) {
        return jsonError(c, 400, error instanceof Error ? error.message : String(error));
      }
    }

    for (const { key, value } of updates) {
      await deps.store.setPreference(key, value);
    }
    logger.info(`Updated ${updates.length} preference(s)`, { keys: updates.map((u) => u.key) });
    return c.json({ ok: true, preferences: await currentPreferences(deps.store) });
  });

  app.get("/api/digests", async (c) => {
    const query = DigestListQuerySchema.safeParse({ limit: c.req.query("limit") });
    if (!query.success) {
      return jsonError(c, 400, "Invalid query", formatZodError(query.error));
    }
    const digests = await deps.store.listDigests(query.data.limit);
    return c.json({ ok: true, digests: digests.map(digestSummaryView) });
  });

  app.get("/api/digests/:id", async (c) => {
    const digest = await deps.store.getDigest(c.req.param("id"));
    if (!digest) {
      return jsonError(c, 404, "Digest not found");
    }
    return c.json({ ok: true, digest });
  });

  app.get("/api/archive", async (c) => {
    return c.json({ ok: true, files: await deps.archive.list() });
  });

  app.get("/api/archive/:file", async (c) => {
    const fileName = c.req.param("file");
    const content = await deps.archive.read(fileName);
    if (content === null) {
      return jsonError(c, 404, "Digest file not found");
    }
    return c.json({ ok: true, fileName, content });
  });

  app.post("/api/run", async (c) => {
    const parsed = RunRequestSchema.safeParse((await readJsonBody(c)) ?? undefined);
    if (!parsed.success) {
      return jsonError(c, 400, "Invalid run request", formatZodError(parsed.error));
    }

    try {
      const job = deps.runner.start(parsed.data.mode);
      return c.json({ ok: true, job: jobView(job) }, 202);
    } catch (error) {
      if (error instanceof PipelineAlreadyRunningError) {
        return jsonError(c, 409, error.message, { activeJobId: error.activeJobId });
      }
      throw error;
    }
  });

  app.onError((error, c) => {
    logger.error(`Request failed: ${c.req.method} ${c.req.path}`, error);
    return jsonError(c, 500, "Internal server error");
  });

  return app;
}
