import { describe, it, expect, jest } from '@jest/globals';
import * as os from 'os';
import type { JobStatusResponse, ResearchRequest } from '@shared/schema';
import { JobService, type ResearchOutcome } from '../../server/services/jobs';
import { MemJobStore } from '../../server/storage';
import { Logger } from '../../server/utils/logger';

const quietLogger = () => new Logger({ logsDir: os.tmpdir(), toConsole: false, toFile: false });

const REQUEST: ResearchRequest = {
  query: 'Impact of remote work on city centres',
  output_formats: ['pdf', 'pptx'],
  theme: 'navy-teal',
  include_visualization: false,
};

const OUTCOME: ResearchOutcome = {
  response: { topic: 'Remote work', summary: 'Offices emptied.', sources: ['https://a.test'], tools_used: ['search_web'] },
  pdfPath: '/tmp/out/remote_work.pdf',
  pptxPath: '/tmp/out/remote_work_presentation.pptx',
};

function service(runner: () => Promise<ResearchOutcome>, concurrency = 2) {
  const store = new MemJobStore();
  const jobs = new JobService(store, runner, {
    concurrency,
    logger: quietLogger(),
    publicUrl: (name) => `/api/outputs/${name}`,
  });
  return { store, jobs };
}

describe('JobService', () => {
  it('acknowledges a submission as pending', async () => {
    const { jobs } = service(async () => OUTCOME);
    const ack = await jobs.submit(REQUEST);

    expect(ack.status).toBe('pending');
    expect(ack.message).toBe('Research job submitted successfully. Use job_id to check status.');
    expect(ack.job_id.length).toBeGreaterThan(0);
    await jobs.idle();
  });

  it('completes with the result and public file URLs', async () => {
    const { jobs } = service(async () => OUTCOME);
    const { job_id } = await jobs.submit(REQUEST);
    await jobs.idle();

    expect(await jobs.get(job_id)).toEqual({
      job_id,
      status: 'completed',
      progress: 'Research completed successfully',
      result: OUTCOME.response,
      file_urls: {
        pdf: '/api/outputs/remote_work.pdf',
        pptx: '/api/outputs/remote_work_presentation.pptx',
      },
      error: null,
    });
  });

  it('records a failed run with the error message', async () => {
    const { jobs } = service(async () => {
      throw new Error('model unavailable');
    });
    const { job_id } = await jobs.submit(REQUEST);
    await jobs.idle();

    const job = await jobs.get(job_id);
    expect(job?.status).toBe('failed');
    expect(job?.progress).toBe('Job failed');
    expect(job?.error).toBe('Research failed: model unavailable');
    expect(job?.result).toBeNull();
  });

  it('emits every status transition to listeners', async () => {
    const { jobs } = service(async () => OUTCOME);
    const seen: JobStatusResponse[] = [];
    jobs.onStatusUpdate((job) => seen.push(job));

    await jobs.submit(REQUEST);
    await jobs.idle();

    expect(seen.map((j) => j.status)).toEqual(['pending', 'running', 'completed']);
    expect(seen[1].progress).toBe('Processing research query: Impact of remote work on city centres...');
  });

  it('stops notifying after unsubscribe', async () => {
    const { jobs } = service(async () => OUTCOME);
    const seen: string[] = [];
    const off = jobs.onStatusUpdate((job) => seen.push(job.status));
    off();

    await jobs.submit(REQUEST);
    await jobs.idle();
    expect(seen).toEqual([]);
  });

  it('keeps running when a listener throws', async () => {
    const { jobs } = service(async () => OUTCOME);
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jobs.onStatusUpdate(() => {
      throw new Error('listener broke');
    });

    const { job_id } = await jobs.submit(REQUEST);
    await jobs.idle();

    expect((await jobs.get(job_id))?.status).toBe('completed');
    errorSpy.mockRestore();
  });

  it('runs no more jobs at once than the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    const { jobs } = service(async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((r) => setTimeout(r, 10));
      active--;
      return OUTCOME;
    }, 1);

    await Promise.all([jobs.submit(REQUEST), jobs.submit(REQUEST), jobs.submit(REQUEST)]);
    await jobs.idle();

    expect(peak).toBe(1);
    const all = await jobs.list();
    expect(all.map((j) => j.status)).toEqual(['completed', 'completed', 'completed']);
  });

  it('returns undefined for an unknown job', async () => {
    const { jobs } = service(async () => OUTCOME);
    expect(await jobs.get('missing')).toBeUndefined();
  });

  it('omits URLs for formats that produced no file', async () => {
    const { jobs } = service(async () => ({ response: OUTCOME.response, pdfPath: '/tmp/out/only.pdf' }));
    const { job_id } = await jobs.submit(REQUEST);
    await jobs.idle();

    expect((await jobs.get(job_id))?.file_urls).toEqual({ pdf: '/api/outputs/only.pdf' });
  });
});
