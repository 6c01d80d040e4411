import { WORKER_TOKEN_HEADER } from "@receipt-scanner/contracts";
import type { Request, Response } from "express";
import type { ZodType } from "zod";
import { ScanConflictError, ScanRequestError } from "../types/scan-store.js";

export function parseBody<T>(
  schema: ZodType<T>,
  req: Request,
  res: Response,
): T | null {
  const result = schema.safeParse(req.body);
  if (!result.success) {
    res.status(400).json({
      error: "invalid_request",
      issues: result.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
    });
    return null;
  }
  return result.data;
}

export function parseParam(
  value: string | undefined,
  field: string,
  res: Response,
): string | null {
  if (!value || value.length === 0) {
    res.status(400).json({ error: "invalid_request", message: `missing path parameter: ${field}` });
    return null;
  }
  return value;
}

export function requireWorkerToken(req: Request, res: Response, expectedToken: string): boolean {
  const provided = req.header(WORKER_TOKEN_HEADER) ?? "";
  if (provided !== expectedToken) {
    res.status(401).json({ error: "unauthorized" });
    return false;
  }
  return true;
}

export function sessionNotFound(res: Response, sessionId: string): void {
  res.status(404).json({ error: "not_found", message: `scan session not found: ${sessionId}` });
}

/**
 * Maps store rejections onto 400/409; anything else is rethrown for express's
 * error handler.
 */
export function respondWithStoreError(error: unknown, res: Response): void {
  if (error instanceof ScanConflictError) {
    res.status(409).json({ error: "conflict", message: error.message });
    return;
  }
  if (error instanceof ScanRequestError) {
    res.status(400).json({ error: "invalid_request", message: error.message });
    return;
  }
  throw error;
}
