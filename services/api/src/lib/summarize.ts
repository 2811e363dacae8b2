import fs from "node:fs/promises";
import { TextCompletion } from "./ai/llm";
import { errorMessage, StoreError } from "./errors";
import { sha256 } from "./hash";
import { createLogger } from "./logger";
import { DocumentStore, SearchHit } from "./storage";

const logger = createLogger("summarization");

export const SUMMARIZATION_INDEX = "summarization";

export type SummaryStatus = "pending" | "running" | "done" | "failed";

export type SummarizationRecord = {
  report: string;
  reportHash: string;
  status: SummaryStatus;
  summary: string | null;
  error: string | null;
};

export type SummaryView = {
  id: string;
  status: SummaryStatus;
  summary: string | null;
  error: string | null;
};

export type SummarizeDeps = {
  store: DocumentStore;
  complete: TextCompletion;
  systemPrompt: () => Promise<string>;
};

export type SummarizeResult = {
  id: string;
  summary: string;
  cached: boolean;
};

const promptCache = new Map<string, Promise<string>>();

export function loadSystemPrompt(filePath: string): Promise<string> {
  let p = promptCache.get(filePath);
  if (!p) {
    logger.info("Getting system prompt.", { filePath });
    p = fs.readFile(filePath, "utf8");
    promptCache.set(filePath, p);
    void p.catch(() => promptCache.delete(filePath));
  }
  return p;
}

export async function findExistingRecord(
  store: DocumentStore,
  report: string
): Promise<SearchHit<SummarizationRecord> | null> {
  const found = await store.search<SummarizationRecord>(SUMMARIZATION_INDEX, { reportHash: sha256(report) });
  if (found.total === 0) {
    logger.debug("Request was not made before.");
    return null;
  }
  if (found.total === 1) {
    logger.debug("Request was made before.");
    return found.hits[0] ?? null;
  }
  logger.error("More than one document was found for the request.", { total: found.total });
  throw new StoreError("More than one document was found for the request.");
}

function newRecord(report: string, status: SummaryStatus): SummarizationRecord {
  return { report, reportHash: sha256(report), status, summary: null, error: null };
}

export async function runSummary(documentId: string, report: string, deps: SummarizeDeps): Promise<SummarizeResult> {
  logger.debug("Sending report to the language model.", { documentId });
  try {
    const summary = await deps.complete({ system: await deps.systemPrompt(), user: report });
    logger.debug("Saving summary.", { documentId });
    await deps.store.update(SUMMARIZATION_INDEX, documentId, { status: "done", summary, error: null });
    return { id: documentId, summary, cached: false };
  } catch (e) {
    await deps.store.update(SUMMARIZATION_INDEX, documentId, { status: "failed", error: errorMessage(e) });
    throw e;
  }
}

const reportLocks = new Map<string, Promise<void>>();

// Requests for the same report text run one after the other, so the
// lookup and the record creation can't interleave.
async function withReportLock<T>(report: string, fn: () => Promise<T>): Promise<T> {
  const key = sha256(report);
  const run = async (): Promise<T> => await fn();
  const p = (reportLocks.get(key) ?? Promise.resolve()).then(run, run);
  const tail = p.then(
    () => undefined,
    () => undefined
  );
  reportLocks.set(key, tail);
  void tail.then(() => {
    if (reportLocks.get(key) === tail) reportLocks.delete(key);
  });
  return p;
}

export async function summarizeReport(report: string, deps: SummarizeDeps): Promise<SummarizeResult> {
  return withReportLock(report, async () => {
    const existing = await findExistingRecord(deps.store, report);
    if (existing && existing._source.status === "done" && existing._source.summary !== null) {
      return { id: existing._id, summary: existing._source.summary, cached: true };
    }

    let documentId: string;
    if (existing) {
      documentId = existing._id;
      await deps.store.update(SUMMARIZATION_INDEX, documentId, { status: "running", error: null });
    } else {
      logger.debug("Creating request document.");
      documentId = (await deps.store.create(SUMMARIZATION_INDEX, newRecord(report, "running")))._id;
    }
    return await runSummary(documentId, report, deps);
  });
}

export async function queueSummary(
  report: string,
  deps: { store: DocumentStore; enqueue: (documentId: string) => Promise<void> }
): Promise<SummaryView> {
  return withReportLock(report, async () => {
    const existing = await findExistingRecord(deps.store, report);
    if (existing && existing._source.status !== "failed") return toView(existing._id, existing._source);

    let documentId: string;
    if (existing) {
      documentId = existing._id;
      await deps.store.update(SUMMARIZATION_INDEX, documentId, { status: "pending", error: null });
    } else {
      documentId = (await deps.store.create(SUMMARIZATION_INDEX, newRecord(report, "pending")))._id;
    }
    await deps.enqueue(documentId);
    logger.info("Queued summary.", { documentId });
    return { id: documentId, status: "pending", summary: null, error: null };
  });
}

export async function processSummaryJob(documentId: string, deps: SummarizeDeps): Promise<SummaryView> {
  const record = await deps.store.read<SummarizationRecord>(SUMMARIZATION_INDEX, documentId);
  if (record.status === "done") return toView(documentId, record);
  await deps.store.update(SUMMARIZATION_INDEX, documentId, { status: "running" });
  const result = await runSummary(documentId, record.report, deps);
  return { id: documentId, status: "done", summary: result.summary, error: null };
}

export async function markSummaryFailed(store: DocumentStore, documentId: string, error: string, willRetry: boolean) {
  await store.update(SUMMARIZATION_INDEX, documentId, { status: willRetry ? "pending" : "failed", error });
}

export async function getSummary(store: DocumentStore, documentId: string): Promise<SummaryView> {
  const record = await store.read<SummarizationRecord>(SUMMARIZATION_INDEX, documentId);
  return toView(documentId, record);
}

function toView(id: string, record: SummarizationRecord): SummaryView {
  return { id, status: record.status, summary: record.summary, error: record.error };
}
