import type {
  ClaimedJob,
  JobResultRequest,
  JobResultResponse,
  ReceiptRecord,
  ReceiptUploadRequest,
  ReceiptUploadResponse,
  ResetSessionResponse,
  ScanJob,
  ScanSession,
  ScanStatusResponse,
  StartScanResponse,
  UploadedReceipt,
} from "@receipt-scanner/contracts";
import { randomUUID } from "node:crypto";
import {
  ScanConflictError,
  ScanRequestError,
  type ScanSessionStore,
  type ScannedReceipt,
} from "../types/scan-store.js";

export const SCANNABLE_EXTENSIONS = [".jpg", ".jpeg", ".png", ".bmp", ".tiff"] as const;

type InMemoryScanStoreOptions = {
  maxJobAttempts?: number;
  /** How long a claimed job may stay processing before it counts as a failed attempt; 0 disables it. */
  claimTimeoutMs?: number;
  now?: () => Date;
};

type SessionState = {
  session: ScanSession;
  receipts: Map<string, UploadedReceipt>;
  jobIds: string[];
  error: string | null;
};

type JobState = {
  job: ScanJob;
  receipt: UploadedReceipt;
  record: ReceiptRecord | null;
  claimedAt: number | null;
};

function clone<T>(value: T): T {
  return structuredClone(value);
}

export function receiptBaseName(filename: string): string {
  const segments = filename.split(/[\\/]/);
  return (segments[segments.length - 1] ?? "").trim();
}

export function isScannableFilename(filename: string): boolean {
  const lower = filename.toLowerCase();
  return SCANNABLE_EXTENSIONS.some((extension) => lower.endsWith(extension));
}

function isFinished(job: ScanJob): boolean {
  return job.status === "completed" || job.status === "failed";
}

export class InMemoryScanStore implements ScanSessionStore {
  private readonly sessions = new Map<string, SessionState>();
  private readonly jobs = new Map<string, JobState>();
  private readonly queue: string[] = [];
  private readonly maxJobAttempts: number;
  private readonly claimTimeoutMs: number;
  private readonly now: () => Date;

  constructor(options: InMemoryScanStoreOptions = {}) {
    this.maxJobAttempts = Math.max(1, options.maxJobAttempts ?? 2);
    this.claimTimeoutMs = Math.max(0, options.claimTimeoutMs ?? 300_000);
    this.now = options.now ?? (() => new Date());
  }

  createSession(): ScanSession {
    const now = this.nowIso();
    const session: ScanSession = {
      sessionId: `session_${randomUUID()}`,
      createdAt: now,
      updatedAt: now,
    };

    this.sessions.set(session.sessionId, {
      session,
      receipts: new Map(),
      jobIds: [],
      error: null,
    });
    return clone(session);
  }

  uploadReceipt(sessionId: string, request: ReceiptUploadRequest): ReceiptUploadResponse | null {
    const state = this.sessions.get(sessionId);
    if (!state) {
      return null;
    }

    const filename = receiptBaseName(request.filename);
    if (filename.length === 0) {
      throw new ScanRequestError(`filename has no base name: ${request.filename}`);
    }

    const now = this.nowIso();
    const receipt: UploadedReceipt = {
      sessionId,
      filename,
      lines: [...request.lines],
      uploadedAt: now,
    };

    // Map.set on an existing key keeps its original position.
    state.receipts.set(filename, receipt);
    this.touch(state, now);

    return {
      receipt: clone(receipt),
      uploaded: state.receipts.size,
    };
  }

  resetSession(sessionId: string): ResetSessionResponse | null {
    const state = this.sessions.get(sessionId);
    if (!state) {
      return null;
    }
    this.expireStaleClaims();
    if (this.isScanning(state)) {
      throw new ScanConflictError("cannot reset a session while a scan is running");
    }

    const cleared = state.receipts.size;
    state.receipts.clear();
    this.dropJobs(state);
    state.error = null;
    this.touch(state, this.nowIso());

    return { sessionId, cleared };
  }

  startScan(sessionId: string): StartScanResponse | null {
    const state = this.sessions.get(sessionId);
    if (!state) {
      return null;
    }
    this.expireStaleClaims();
    if (this.isScanning(state)) {
      throw new ScanConflictError("a scan is already running for this session");
    }

    const scannable = [...state.receipts.values()].filter((receipt) =>
      isScannableFilename(receipt.filename),
    );
    if (scannable.length === 0) {
      throw new ScanRequestError("no scannable receipts uploaded");
    }

    this.dropJobs(state);
    state.error = null;

    const now = this.nowIso();
    const jobs = scannable.map((receipt): ScanJob => {
      const job: ScanJob = {
        jobId: `scan_${randomUUID()}`,
        sessionId,
        filename: receipt.filename,
        status: "queued",
        attempts: 0,
        createdAt: now,
        updatedAt: now,
      };
      this.jobs.set(job.jobId, { job, receipt: clone(receipt), record: null, claimedAt: null });
      this.queue.push(job.jobId);
      state.jobIds.push(job.jobId);
      return job;
    });
    this.touch(state, now);

    return {
      sessionId,
      total: jobs.length,
      jobs: clone(jobs),
    };
  }

  getStatus(sessionId: string): ScanStatusResponse | null {
    const state = this.sessions.get(sessionId);
    if (!state) {
      return null;
    }

    this.expireStaleClaims();
    const jobs = this.jobsOf(state);
    return {
      sessionId,
      isScanning: this.isScanning(state),
      total: jobs.length,
      current: jobs.filter((entry) => isFinished(entry.job)).length,
      results: this.completedRecords(jobs),
      error: state.error,
    };
  }

  getJob(jobId: string): ScanJob | null {
    const entry = this.jobs.get(jobId);
    return entry ? clone(entry.job) : null;
  }

  getResults(sessionId: string): ReceiptRecord[] | null {
    const state = this.sessions.get(sessionId);
    if (!state) {
      return null;
    }
    return this.completedRecords(this.jobsOf(state));
  }

  getScannedReceipts(sessionId: string): ScannedReceipt[] | null {
    const state = this.sessions.get(sessionId);
    if (!state) {
      return null;
    }

    return this.jobsOf(state)
      .filter((entry) => entry.job.status === "completed")
      .map((entry) => ({ filename: entry.receipt.filename, lines: [...entry.receipt.lines] }));
  }

  claimNextJob(): ClaimedJob | null {
    this.expireStaleClaims();
    while (this.queue.length > 0) {
      const jobId = this.queue.shift();
      if (!jobId) {
        continue;
      }

      const entry = this.jobs.get(jobId);
      if (!entry || entry.job.status !== "queued") {
        continue;
      }

      const claimedAt = this.now();
      entry.claimedAt = claimedAt.getTime();
      entry.job = {
        ...entry.job,
        status: "processing",
        attempts: entry.job.attempts + 1,
        updatedAt: claimedAt.toISOString(),
      };

      return {
        job: clone(entry.job),
        receipt: clone(entry.receipt),
      };
    }

    return null;
  }

  submitJobResult(jobId: string, result: JobResultRequest): JobResultResponse | null {
    const entry = this.jobs.get(jobId);
    if (!entry) {
      return null;
    }

    // A retried submit after success returns the stored record unchanged.
    if (entry.job.status === "completed" && entry.record) {
      return { job: clone(entry.job), record: clone(entry.record) };
    }
    if (entry.job.status !== "processing" && entry.job.status !== "queued") {
      return null;
    }

    const now = this.nowIso();
    const record: ReceiptRecord = { ...result.record, filename: entry.job.filename };
    entry.record = record;
    entry.job = {
      ...entry.job,
      status: "completed",
      updatedAt: now,
      ...(result.locale ? { locale: result.locale } : {}),
    };

    const state = this.sessions.get(entry.job.sessionId);
    if (state) {
      this.touch(state, now);
    }

    return { job: clone(entry.job), record: clone(record) };
  }

  failJob(jobId: string, error: string): ScanJob | null {
    const entry = this.jobs.get(jobId);
    if (!entry) {
      return null;
    }
    if (isFinished(entry.job)) {
      return clone(entry.job);
    }

    this.recordFailure(entry, error);
    return clone(entry.job);
  }

  /** Re-queues the job while attempts remain; otherwise fails it and reports it on the session. */
  private recordFailure(entry: JobState, error: string): void {
    const now = this.nowIso();
    entry.claimedAt = null;
    if (entry.job.attempts < this.maxJobAttempts) {
      entry.job = { ...entry.job, status: "queued", error, updatedAt: now };
      this.queue.push(entry.job.jobId);
      return;
    }

    entry.job = { ...entry.job, status: "failed", error, updatedAt: now };
    const state = this.sessions.get(entry.job.sessionId);
    if (state) {
      state.error = `${entry.job.filename}: ${error}`;
      this.touch(state, now);
    }
  }

  // A worker that dies mid-job never reports back; its claim lapses instead.
  private expireStaleClaims(): void {
    if (this.claimTimeoutMs === 0) {
      return;
    }

    const now = this.now().getTime();
    for (const entry of this.jobs.values()) {
      if (
        entry.job.status === "processing" &&
        entry.claimedAt !== null &&
        now - entry.claimedAt >= this.claimTimeoutMs
      ) {
        this.recordFailure(entry, `claim expired after ${this.claimTimeoutMs}ms`);
      }
    }
  }

  private nowIso(): string {
    return this.now().toISOString();
  }

  private jobsOf(state: SessionState): JobState[] {
    return state.jobIds.flatMap((jobId) => {
      const entry = this.jobs.get(jobId);
      return entry ? [entry] : [];
    });
  }

  private completedRecords(jobs: JobState[]): ReceiptRecord[] {
    return jobs.flatMap((entry) =>
      entry.job.status === "completed" && entry.record ? [clone(entry.record)] : [],
    );
  }

  private isScanning(state: SessionState): boolean {
    return this.jobsOf(state).some((entry) => !isFinished(entry.job));
  }

  private dropJobs(state: SessionState): void {
    for (const jobId of state.jobIds) {
      this.jobs.delete(jobId);
    }
    state.jobIds = [];
  }

  private touch(state: SessionState, now: string): void {
    state.session = { ...state.session, updatedAt: now };
  }
}
