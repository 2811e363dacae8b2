import express, { NextFunction, Request, Response } from "express";
import multer from "multer";
import { z } from "zod";
import { anonymizeDocument } from "./lib/anonymizer";
import { TextCompletion } from "./lib/ai/llm";
import {
  createDiagnosis,
  deleteDiagnosis,
  listDiagnoses,
  newDiagnosisSchema,
  parseBody,
  updateDiagnosis,
  updateDiagnosisSchema
} from "./lib/diagnoses";
import { isDocxUpload, parseReportDocx } from "./lib/docx";
import { AppError, BadRequestError, errorMessage } from "./lib/errors";
import { createLogger, requestLogger } from "./lib/logger";
import { Settings } from "./lib/settings";
import { DocumentStore } from "./lib/storage";
import { getSummary, queueSummary, summarizeReport } from "./lib/summarize";

const logger = createLogger("api");

export type AppDeps = {
  settings: Settings;
  store: DocumentStore;
  complete: TextCompletion;
  systemPrompt: () => Promise<string>;
  // Absent when no queue is configured; `?mode=async` is then refused.
  enqueue?: (documentId: string) => Promise<void>;
};

const summarizeBodySchema = z.object({ text: z.string().regex(/\S/, "text must not be empty") });

type Handler = (req: Request, res: Response) => Promise<unknown>;

export function sendError(res: Response, e: unknown) {
  if (e instanceof AppError) {
    if (e.status >= 500) logger.error(e.message, { name: e.name, status: e.status });
    return res.status(e.status).json({ message: e.message });
  }
  if (e instanceof multer.MulterError) {
    return res.status(e.code === "LIMIT_FILE_SIZE" ? 413 : 400).json({ message: e.message });
  }
  logger.error("Unhandled error", { error: errorMessage(e), stack: e instanceof Error ? e.stack : undefined });
  return res.status(500).json({ message: "Internal server error" });
}

function route(fn: Handler) {
  return (req: Request, res: Response) => {
    fn(req, res).catch((e: unknown) => sendError(res, e));
  };
}

export function createApp(deps: AppDeps) {
  const { settings, store } = deps;
  const app = express();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: settings.maxUploadMb * 1024 * 1024 }
  });

  // CORS
  app.use((req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Headers", "*");
    res.header("Access-Control-Allow-Methods", "GET,POST,PATCH,DELETE,OPTIONS");
    if (req.method === "OPTIONS") {
      return res.sendStatus(204);
    }
    next();
  });

  app.use(requestLogger(logger));
  app.use(express.json({ limit: "2mb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get(
    "/api/v1/diagnoses",
    route(async (_req, res) => res.json(await listDiagnoses(store)))
  );

  app.post(
    "/api/v1/diagnoses",
    route(async (req, res) => {
      const body = parseBody(newDiagnosisSchema, req.body);
      res.status(201).json(await createDiagnosis(store, body));
    })
  );

  app.post(
    "/api/v1/diagnoses/:diagnosisId",
    route(async (req, res) => {
      const body = parseBody(newDiagnosisSchema, req.body);
      res.status(201).json(await createDiagnosis(store, body, req.params.diagnosisId));
    })
  );

  app.patch(
    "/api/v1/diagnoses/:diagnosisId",
    route(async (req, res) => {
      const body = parseBody(updateDiagnosisSchema, req.body);
      res.json(await updateDiagnosis(store, req.params.diagnosisId, body));
    })
  );

  app.delete(
    "/api/v1/diagnoses/:diagnosisId",
    route(async (req, res) => {
      await deleteDiagnosis(store, req.params.diagnosisId);
      res.sendStatus(204);
    })
  );

  app.post(
    "/api/v1/summarization/anonymize_report",
    (req: Request, res: Response, next: NextFunction) => {
      upload.single("docx_file")(req, res, (err?: unknown) => (err ? sendError(res, err) : next()));
    },
    route(async (req, res) => {
      const file = req.file;
      if (!file) throw new BadRequestError("Missing file field 'docx_file'.");
      if (!isDocxUpload({ mimeType: file.mimetype, fileName: file.originalname })) {
        throw new BadRequestError("The uploaded file is not a .docx document.");
      }
      const document = await parseReportDocx(file.buffer);
      res.json(anonymizeDocument(document, { sections: settings.sectionsOfInterest }));
    })
  );

  app.post(
    "/api/v1/summarization/summarize_report",
    route(async (req, res) => {
      const { text } = parseBody(summarizeBodySchema, req.body);
      if (req.query.mode === "async") {
        if (!deps.enqueue) throw new BadRequestError("Asynchronous summarization is not available.");
        const view = await queueSummary(text, { store, enqueue: deps.enqueue });
        return res.status(202).json({ id: view.id, status: view.status, pollUrl: `/api/v1/summarization/reports/${view.id}` });
      }
      const result = await summarizeReport(text, deps);
      res.status(result.cached ? 200 : 201).json(result.summary);
    })
  );

  app.get(
    "/api/v1/summarization/reports/:reportId",
    route(async (req, res) => res.json(await getSummary(store, req.params.reportId)))
  );

  return app;
}
