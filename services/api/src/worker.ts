import { Job, Worker } from "bullmq";
import { createChatCompletion } from "./lib/ai/llm";
import { errorMessage } from "./lib/errors";
import { createLogger } from "./lib/logger";
import { redisConnection, SummarizeJobData, summarizationQueueName, summarizeJobName } from "./lib/queue";
import { getSettings } from "./lib/settings";
import { FileDocumentStore } from "./lib/storage";
import { loadSystemPrompt, markSummaryFailed, processSummaryJob, SummarizeDeps } from "./lib/summarize";

const logger = createLogger("worker");
const settings = getSettings();

const deps: SummarizeDeps = {
  store: new FileDocumentStore(settings.storeDir),
  complete: createChatCompletion(settings.llm),
  systemPrompt: () => loadSystemPrompt(settings.systemPromptFile)
};

const worker = new Worker<SummarizeJobData>(
  summarizationQueueName,
  async (job) => {
    if (job.name !== summarizeJobName) {
      logger.warn("Skipping unknown job.", { jobId: job.id, name: job.name });
      return;
    }
    const view = await processSummaryJob(job.data.documentId, deps);
    logger.info("Summary done.", { jobId: job.id, documentId: view.id });
  },
  { connection: redisConnection(settings.redisUrl) }
);

async function recordFailure(job: Job<SummarizeJobData>, err: Error): Promise<void> {
  const attempts = job.opts.attempts ?? 1;
  const willRetry = job.attemptsMade < attempts;
  await markSummaryFailed(deps.store, job.data.documentId, err.message, willRetry);
  logger.warn("Summary job failed.", { jobId: job.id, attemptsMade: job.attemptsMade, attempts, willRetry, error: err.message });
}

worker.on("failed", (job, err) => {
  if (!job) {
    logger.error("Job failed without job data.", { error: err.message });
    return;
  }
  recordFailure(job, err).catch((e: unknown) => {
    logger.error("Could not record job failure.", { jobId: job.id, error: errorMessage(e) });
  });
});

worker.on("error", (err) => {
  logger.error("Worker error.", { error: err.message });
});

logger.info("Worker started.", { queue: summarizationQueueName });

const shutdown = () => {
  worker
    .close()
    .then(() => process.exit(0))
    .catch((e: unknown) => {
      logger.error("Worker did not close cleanly.", { error: errorMessage(e) });
      process.exit(1);
    });
};
process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
