import { ConnectionOptions, Queue } from "bullmq";
import { createLogger } from "./logger";

const logger = createLogger("queue");

export const summarizationQueueName = "summarization";
export const summarizeJobName = "summarize";

export type SummarizeJobData = { documentId: string };

export function redisConnection(redisUrl: string): ConnectionOptions {
  const u = new URL(redisUrl);
  const db = Number(u.pathname.replace(/^\//, "") || "0");
  return {
    host: u.hostname || "localhost",
    port: Number(u.port || "6379"),
    username: u.username ? decodeURIComponent(u.username) : undefined,
    password: u.password ? decodeURIComponent(u.password) : undefined,
    db: Number.isInteger(db) ? db : 0,
    ...(u.protocol === "rediss:" ? { tls: {} } : {}),
    // bullmq workers block on Redis; ioredis must not give up on them.
    maxRetriesPerRequest: null
  };
}

let queue: Queue<SummarizeJobData> | null = null;

export function getSummarizationQueue(redisUrl: string): Queue<SummarizeJobData> {
  if (!queue) {
    queue = new Queue<SummarizeJobData>(summarizationQueueName, {
      connection: redisConnection(redisUrl),
      defaultJobOptions: {
        attempts: 3,
        backoff: { type: "exponential", delay: 2_000 },
        removeOnComplete: 1_000,
        removeOnFail: 5_000
      }
    });
  }
  return queue;
}

export function createEnqueue(redisUrl: string): (documentId: string) => Promise<void> {
  return async (documentId) => {
    const job = await getSummarizationQueue(redisUrl).add(summarizeJobName, { documentId });
    logger.debug("Added job.", { jobId: job.id, documentId });
  };
}

export async function closeSummarizationQueue(): Promise<void> {
  if (!queue) return;
  const q = queue;
  queue = null;
  await q.close();
}
