/**
 * Pipeline runner
 * Owns the idle/running state, refuses overlapping runs and hands out job
 * handles for runs started in the background
 */

import { v4 as uuidv4 } from "uuid";
import { logger } from "../logger";
import { PipelineAlreadyRunningError, toError } from "../errors";
import type { GenerationReport } from "./generate";
import type { IngestionReport } from "./ingest";

export type PipelineMode = "full" | "ingest" | "generate";

export type PipelineState =
  | { status: "idle" }
  | { status: "running"; jobId: string; mode: PipelineMode; startedAt: Date };

export interface PipelineRunReport {
  ingestion?: IngestionReport;
  generation?: GenerationReport;
}

export type PipelineOutcome =
  | { ok: true; report: PipelineRunReport; finishedAt: Date }
  | { ok: false; error: Error; finishedAt: Date };

export type JobStatus = "running" | "succeeded" | "failed";

export interface PipelineJob {
  readonly id: string;
  readonly mode: PipelineMode;
  readonly startedAt: Date;
  readonly status: JobStatus;
  /** Settles with the outcome; never rejects */
  readonly result: Promise<PipelineOutcome>;
}

export interface PipelinePhases {
  ingest(): Promise<IngestionReport>;
  generate(): Promise<GenerationReport>;
}

export class PipelineRunner {
  private current: PipelineState = { status: "idle" };
  private last: PipelineJob | null = null;

  constructor(private readonly phases: PipelinePhases) {}

  get state(): PipelineState {
    return this.current;
  }

  get lastJob(): PipelineJob | null {
    return this.last;
  }

  /**
   * Start a run in the background. Throws PipelineAlreadyRunningError when a
   * run is in progress.
   */
  start(mode: PipelineMode = "full"): PipelineJob {
    if (this.current.status === "running") {
      throw new PipelineAlreadyRunningError(this.current.jobId);
    }

    const id = uuidv4();
    const startedAt = new Date();
    this.current = { status: "running", jobId: id, mode, startedAt };
    logger.info(`Pipeline job ${id} started`, { mode });

    let status: JobStatus = "running";
    const result = this.execute(mode).then(
      (report): PipelineOutcome => {
        status = "succeeded";
        logger.info(`Pipeline job ${id} finished`);
        return { ok: true, report, finishedAt: new Date() };
      },
      (error: unknown): PipelineOutcome => {
        status = "failed";
        logger.error(`Pipeline job ${id} failed`, error);
        return { ok: false, error: toError(error), finishedAt: new Date() };
      }
    ).finally(() => {
      this.current = { status: "idle" };
    });

    const job: PipelineJob = {
      id,
      mode,
      startedAt,
      get status() {
        return status;
      },
      result,
    };
    this.last = job;
    return job;
  }

  /**
   * Run to completion; rejects with the run's error
   */
  async runNow(mode: PipelineMode = "full"): Promise<PipelineRunReport> {
    const outcome = await this.start(mode).result;
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.report;
  }

  private async execute(mode: PipelineMode): Promise<PipelineRunReport> {
    const report: PipelineRunReport = {};
    if (mode !== "generate") {
      report.ingestion = await this.phases.ingest();
    }
    if (mode !== "ingest") {
      report.generation = await this.phases.generate();
    }
    return report;
  }
}
