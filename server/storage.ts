// server/storage.ts
import { nanoid } from "nanoid";
import type { JobStatusResponse } from "@shared/schema";

export type JobPatch = Partial<Omit<JobStatusResponse, "job_id">>;

export interface IJobStore {
  createJob(): Promise<JobStatusResponse>;
  getJob(jobId: string): Promise<JobStatusResponse | undefined>;
  updateJob(jobId: string, patch: JobPatch): Promise<JobStatusResponse | undefined>;
  listJobs(): Promise<JobStatusResponse[]>;
}

/** Jobs live for the lifetime of the process. Reads hand out copies. */
export class MemJobStore implements IJobStore {
  private jobs = new Map<string, JobStatusResponse>();

  async createJob(): Promise<JobStatusResponse> {
    const job: JobStatusResponse = {
      job_id: nanoid(),
      status: "pending",
      progress: "Job created, waiting to start",
      result: null,
      file_urls: null,
      error: null,
    };
    this.jobs.set(job.job_id, job);
    return { ...job };
  }

  async getJob(jobId: string): Promise<JobStatusResponse | undefined> {
    const job = this.jobs.get(jobId);
    return job ? { ...job } : undefined;
  }

  async updateJob(jobId: string, patch: JobPatch): Promise<JobStatusResponse | undefined> {
    const job = this.jobs.get(jobId);
    if (!job) return undefined;
    const next = { ...job, ...patch };
    this.jobs.set(jobId, next);
    return { ...next };
  }

  async listJobs(): Promise<JobStatusResponse[]> {
    return Array.from(this.jobs.values(), (job) => ({ ...job }));
  }
}

export const jobStore = new MemJobStore();
