// server/index.ts
import { createApp, log } from "./app";
import { config } from "./config";
import { researchAgent } from "./services/agent";
import { JobService } from "./services/jobs";
import { jobStore } from "./storage";
import { fileStorage } from "./utils/fileStorage";
import { logger } from "./utils/logger";

// ────────── bootstrap ──────────
(async () => {
  const jobs = new JobService(jobStore, (request, jobId) => researchAgent.run(request, jobId), {
    concurrency: config.maxConcurrentJobs,
    logger,
  });

  const { server } = await createApp({ jobs, storage: fileStorage, logger });

  if (!config.openaiApiKey) log("OPENAI_API_KEY is not set; research jobs will fail", "config");

  server.listen({ port: config.port, host: "0.0.0.0" }, () => log(`serving on port ${config.port}`));
})().catch((error) => {
  console.error("FATAL: Server startup failed", error);
  process.exit(1);
});
