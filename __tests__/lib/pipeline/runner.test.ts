/**
 * Tests for the pipeline runner
 */

import { describe, it, expect, vi } from "vitest";
import { PipelineRunner, type PipelinePhases } from "../../../src/lib/pipeline/runner";
import type { GenerationReport } from "../../../src/lib/pipeline/generate";
import type { IngestionReport } from "../../../src/lib/pipeline/ingest";
import { PipelineAlreadyRunningError } from "../../../src/lib/errors";
import { emptySections } from "../../../src/lib/pipeline/assign";

const ingestion: IngestionReport = {
  sources: ["HackerNews"],
  failedSources: [],
  fetched: 2,
  saved: 1,
  duplicates: 1,
  irrelevant: 0,
};

const generation: GenerationReport = {
  candidates: 1,
  personas: ["GENAI_NEWS"],
  batches: 1,
  failedBatches: 0,
  evaluations: 1,
  sections: emptySections(),
  summary: "Summary.",
  markdown: "# Digest",
  delivered: [],
};

function phases(overrides: Partial<PipelinePhases> = {}): PipelinePhases {
  return {
    ingest: vi.fn(async () => ingestion),
    generate: vi.fn(async () => generation),
    ...overrides,
  };
}

describe("PipelineRunner", () => {
  it("runs both phases in full mode", async () => {
    const p = phases();
    const report = await new PipelineRunner(p).runNow("full");

    expect(report).toEqual({ ingestion, generation });
    expect(p.ingest).toHaveBeenCalledTimes(1);
    expect(p.generate).toHaveBeenCalledTimes(1);
  });

  it("runs a single phase when asked", async () => {
    const p = phases();
    const runner = new PipelineRunner(p);

    expect(await runner.runNow("ingest")).toEqual({ ingestion });
    expect(await runner.runNow("generate")).toEqual({ generation });
    expect(p.ingest).toHaveBeenCalledTimes(1);
    expect(p.generate).toHaveBeenCalledTimes(1);
  });

  it("refuses to start while a run is in progress", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const runner = new PipelineRunner(
      phases({
        ingest: async () => {
          await gate;
          return ingestion;
        },
      })
    );

    const job = runner.start("ingest");
    expect(runner.state.status).toBe("running");
    expect(runner.state).toMatchObject({ status: "running", jobId: job.id, mode: "ingest" });
    expect(() => runner.start()).toThrow(PipelineAlreadyRunningError);
    expect(() => runner.start()).toThrow(`Pipeline is already running (job ${job.id})`);

    release();
    const outcome = await job.result;

    expect(outcome.ok).toBe(true);
    expect(job.status).toBe("succeeded");
    expect(runner.state).toEqual({ status: "idle" });
    expect(runner.lastJob).toBe(job);
  });

  it("reports a failed run without rejecting the job and returns to idle", async () => {
    const runner = new PipelineRunner(
      phases({
        generate: async () => {
          throw new Error("disk full");
        },
      })
    );

    const job = runner.start("generate");
    const outcome = await job.result;

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.message).toBe("disk full");
    }
    expect(job.status).toBe("failed");
    expect(runner.state.status).toBe("idle");
  });

  it("rejects runNow with the run's error", async () => {
    const runner = new PipelineRunner(
      phases({
        ingest: async () => {
          throw new Error("no network");
        },
      })
    );

    await expect(runner.runNow()).rejects.toThrow("no network");
    expect(runner.state).toEqual({ status: "idle" });
  });
});
