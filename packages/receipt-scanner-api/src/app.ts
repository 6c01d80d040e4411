import type { Express } from "express";
import {
  ClaimJobResponseSchema,
  CreateSessionResponseSchema,
  FailJobRequestSchema,
  HealthResponseSchema,
  JobResultRequestSchema,
  JobResultResponseSchema,
  JobStatusResponseSchema,
  ReceiptUploadRequestSchema,
  ReceiptUploadResponseSchema,
  ResetSessionResponseSchema,
  ScanStatusResponseSchema,
  StartScanResponseSchema,
  type HealthResponse,
} from "@receipt-scanner/contracts";
import { buildExportRows, formatRawOcrLog, toCsv } from "@receipt-scanner/worker";
import express from "express";
import type { ApiConfig } from "./config/env.js";
import type { ScanSessionStore } from "./types/scan-store.js";
import {
  parseBody,
  parseParam,
  requireWorkerToken,
  respondWithStoreError,
  sessionNotFound,
} from "./routes/http-utils.js";

export type ApiLogger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

type CreateAppParams = {
  config: ApiConfig;
  store: ScanSessionStore;
  logger?: ApiLogger;
};

const LOG_PREFIX = "[receipt-scanner-api]";

export const CSV_EXPORT_FILENAME = "receipts_data.csv";
export const RAW_LOG_FILENAME = "ocr_raw_data.txt";

const silentLogger: ApiLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function createApp(params: CreateAppParams): Express {
  const { config, store } = params;
  const logger = params.logger ?? silentLogger;
  const app = express();
  // A session upload carries the full OCR line dump of one receipt.
  app.use(express.json({ limit: "5mb" }));

  app.get("/health", (_req, res) => {
    const payload: HealthResponse = {
      ok: true,
      service: "receipt-scanner-api",
      now: new Date().toISOString(),
    };
    HealthResponseSchema.parse(payload);
    res.json(payload);
  });

  app.post("/v1/sessions", (_req, res) => {
    const session = store.createSession();
    res.status(201).json(CreateSessionResponseSchema.parse({ session }));
  });

  app.get("/v1/sessions/:sessionId/status", (req, res) => {
    const sessionId = parseParam(req.params.sessionId, "sessionId", res);
    if (!sessionId) {
      return;
    }

    const status = store.getStatus(sessionId);
    if (!status) {
      sessionNotFound(res, sessionId);
      return;
    }
    res.json(ScanStatusResponseSchema.parse(status));
  });

  app.post("/v1/sessions/:sessionId/receipts", (req, res) => {
    const sessionId = parseParam(req.params.sessionId, "sessionId", res);
    if (!sessionId) {
      return;
    }
    const body = parseBody(ReceiptUploadRequestSchema, req, res);
    if (!body) {
      return;
    }

    try {
      const uploaded = store.uploadReceipt(sessionId, body);
      if (!uploaded) {
        sessionNotFound(res, sessionId);
        return;
      }
      res.status(201).json(ReceiptUploadResponseSchema.parse(uploaded));
    } catch (error) {
      respondWithStoreError(error, res);
    }
  });

  app.post("/v1/sessions/:sessionId/reset", (req, res) => {
    const sessionId = parseParam(req.params.sessionId, "sessionId", res);
    if (!sessionId) {
      return;
    }

    try {
      const reset = store.resetSession(sessionId);
      if (!reset) {
        sessionNotFound(res, sessionId);
        return;
      }
      res.json(ResetSessionResponseSchema.parse(reset));
    } catch (error) {
      respondWithStoreError(error, res);
    }
  });

  app.post("/v1/sessions/:sessionId/scan", (req, res) => {
    const sessionId = parseParam(req.params.sessionId, "sessionId", res);
    if (!sessionId) {
      return;
    }

    try {
      const started = store.startScan(sessionId);
      if (!started) {
        sessionNotFound(res, sessionId);
        return;
      }
      logger.info(`${LOG_PREFIX} scan started for ${sessionId}: ${started.total} receipts`);
      res.status(202).json(StartScanResponseSchema.parse(started));
    } catch (error) {
      respondWithStoreError(error, res);
    }
  });

  app.get("/v1/sessions/:sessionId/export.csv", (req, res) => {
    const sessionId = parseParam(req.params.sessionId, "sessionId", res);
    if (!sessionId) {
      return;
    }

    const records = store.getResults(sessionId);
    if (!records) {
      sessionNotFound(res, sessionId);
      return;
    }
    if (records.length === 0) {
      res.status(404).json({ error: "not_found", message: "no scan results to export" });
      return;
    }

    res
      .status(200)
      .attachment(CSV_EXPORT_FILENAME)
      .type("text/csv; charset=utf-8")
      .send(toCsv(buildExportRows(records)));
  });

  app.get("/v1/sessions/:sessionId/raw.txt", (req, res) => {
    const sessionId = parseParam(req.params.sessionId, "sessionId", res);
    if (!sessionId) {
      return;
    }

    const scanned = store.getScannedReceipts(sessionId);
    if (!scanned) {
      sessionNotFound(res, sessionId);
      return;
    }
    if (scanned.length === 0) {
      res.status(404).json({ error: "not_found", message: "no scanned receipts to log" });
      return;
    }

    res
      .status(200)
      .attachment(RAW_LOG_FILENAME)
      .type("text/plain; charset=utf-8")
      .send(formatRawOcrLog(scanned));
  });

  app.get("/v1/jobs/:jobId", (req, res) => {
    const jobId = parseParam(req.params.jobId, "jobId", res);
    if (!jobId) {
      return;
    }

    const job = store.getJob(jobId);
    if (!job) {
      res.status(404).json({ error: "not_found", message: `job not found: ${jobId}` });
      return;
    }
    res.json(JobStatusResponseSchema.parse({ job }));
  });

  app.post("/internal/jobs/claim", (req, res) => {
    if (!requireWorkerToken(req, res, config.workerToken)) {
      return;
    }

    const claimed = store.claimNextJob();
    res.json(ClaimJobResponseSchema.parse({ job: claimed }));
  });

  app.post("/internal/jobs/:jobId/result", (req, res) => {
    if (!requireWorkerToken(req, res, config.workerToken)) {
      return;
    }
    const jobId = parseParam(req.params.jobId, "jobId", res);
    if (!jobId) {
      return;
    }

    const body = parseBody(JobResultRequestSchema, req, res);
    if (!body) {
      return;
    }

    const result = store.submitJobResult(jobId, body);
    if (!result) {
      res.status(404).json({ error: "not_found", message: `job not found: ${jobId}` });
      return;
    }

    res.json(JobResultResponseSchema.parse(result));
  });

  app.post("/internal/jobs/:jobId/fail", (req, res) => {
    if (!requireWorkerToken(req, res, config.workerToken)) {
      return;
    }
    const jobId = parseParam(req.params.jobId, "jobId", res);
    if (!jobId) {
      return;
    }

    const body = parseBody(FailJobRequestSchema, req, res);
    if (!body) {
      return;
    }

    const job = store.failJob(jobId, body.error);
    if (!job) {
      res.status(404).json({ error: "not_found", message: `job not found: ${jobId}` });
      return;
    }

    if (job.status === "failed") {
      logger.warn(`${LOG_PREFIX} ${job.filename} failed after ${job.attempts} attempts: ${body.error}`);
    }
    res.json(JobStatusResponseSchema.parse({ job }));
  });

  return app;
}
