// server/services/jobs.ts
// Research job lifecycle: pending → running → completed | failed.
// Jobs run in the background with a bounded number in flight.

import path from "path";
import type {
  FileUrls,
  JobStatusResponse,
  JobSubmitResponse,
  ResearchRequest,
  ResearchResponse,
} from "@shared/schema";
import { config } from "../config";
import type { IJobStore, JobPatch } from "../storage";
import { getErrorMessage } from "../utils/errors";
import { fileStorage } from "../utils/fileStorage";
import { logger as defaultLogger, type Logger } from "../utils/logger";
import { pLimit, type Limiter } from "../utils/pLimit";

/* ─────────────────────────── Types ─────────────────────────── */

export interface ResearchOutcome {
  response: ResearchResponse;
  pdfPath?: string;
  pptxPath?: string;
  visualizationPath?: string;
}

export type ResearchRunner = (request: ResearchRequest, jobId: string) => Promise<ResearchOutcome>;

export type StatusListener = (job: JobStatusResponse) => void;

export interface JobServiceOptions {
  concurrency?: number;
  logger?: Logger;
  publicUrl?: (filename: string) => string;
}

/* ─────────────────────────── Service ─────────────────────────── */

export class JobService {
  private readonly limit: Limiter;
  private readonly logger: Logger;
  private readonly publicUrl: (filename: string) => string;
  private statusCallbacks: StatusListener[] = [];
  private inflight = new Set<Promise<void>>();

  constructor(
    private readonly store: IJobStore,
    private readonly runner: ResearchRunner,
    options: JobServiceOptions = {},
  ) {
    this.limit = pLimit(options.concurrency ?? config.maxConcurrentJobs);
    this.logger = options.logger ?? defaultLogger;
    this.publicUrl = options.publicUrl ?? ((name) => fileStorage.getPublicUrl(name));
  }

  onStatusUpdate(callback: StatusListener): () => void {
    this.statusCallbacks.push(callback);
    return () => {
      this.statusCallbacks = this.statusCallbacks.filter((cb) => cb !== callback);
    };
  }

  async submit(request: ResearchRequest): Promise<JobSubmitResponse> {
    const job = await this.store.createJob();
    this.emit(job);
    await this.logger.trace(job.job_id, `Job queued: ${request.query}`);

    const run = this.limit(() => this.process(job.job_id, request));
    this.inflight.add(run);
    run
      .catch((err: unknown) => console.error(`[jobs] ${job.job_id} crashed:`, err))
      .finally(() => this.inflight.delete(run));

    return {
      job_id: job.job_id,
      status: "pending",
      message: "Research job submitted successfully. Use job_id to check status.",
    };
  }

  get(jobId: string): Promise<JobStatusResponse | undefined> {
    return this.store.getJob(jobId);
  }

  list(): Promise<JobStatusResponse[]> {
    return this.store.listJobs();
  }

  /** Resolves once every job submitted so far has settled. */
  async idle(): Promise<void> {
    while (this.inflight.size) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  private async process(jobId: string, request: ResearchRequest): Promise<void> {
    const started = Date.now();
    await this.update(jobId, {
      status: "running",
      progress: `Processing research query: ${request.query.slice(0, 50)}...`,
    });
    await this.logger.stepStart(jobId, "Research");

    try {
      const outcome = await this.runner(request, jobId);
      const fileUrls = this.fileUrls(outcome);
      await this.update(jobId, {
        status: "completed",
        progress: "Research completed successfully",
        result: outcome.response,
        file_urls: fileUrls,
      });
      await this.logger.stepEnd(jobId, "Research", Date.now() - started);
      const names = Object.values(fileUrls).filter((u): u is string => Boolean(u));
      if (names.length) await this.logger.delivery(jobId, names.join(", "));
    } catch (err) {
      const message = `Research failed: ${getErrorMessage(err)}`;
      await this.logger.trace(jobId, message);
      await this.update(jobId, { status: "failed", progress: "Job failed", error: message });
    }
  }

  private fileUrls(outcome: ResearchOutcome): FileUrls {
    const urls: FileUrls = {};
    if (outcome.pdfPath) urls.pdf = this.publicUrl(path.basename(outcome.pdfPath));
    if (outcome.pptxPath) urls.pptx = this.publicUrl(path.basename(outcome.pptxPath));
    if (outcome.visualizationPath) urls.visualization = this.publicUrl(path.basename(outcome.visualizationPath));
    return urls;
  }

  private async update(jobId: string, patch: JobPatch) {
    const job = await this.store.updateJob(jobId, patch);
    if (job) this.emit(job);
  }

  private emit(job: JobStatusResponse) {
    for (const cb of this.statusCallbacks) {
      try {
        cb(job);
      } catch (err) {
        console.error("Status listener failed:", err);
      }
    }
  }
}
