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
} from "@receipt-scanner/contracts";

export type ScannedReceipt = {
  filename: string;
  lines: string[];
};

/** The request is well-formed but cannot be applied to the session as it stands. */
export class ScanRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScanRequestError";
  }
}

/** The session is mid-scan and the request would disturb it. */
export class ScanConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScanConflictError";
  }
}

export type ScanSessionStore = {
  createSession: () => ScanSession;
  uploadReceipt: (sessionId: string, request: ReceiptUploadRequest) => ReceiptUploadResponse | null;
  resetSession: (sessionId: string) => ResetSessionResponse | null;
  startScan: (sessionId: string) => StartScanResponse | null;
  getStatus: (sessionId: string) => ScanStatusResponse | null;
  getJob: (jobId: string) => ScanJob | null;
  getResults: (sessionId: string) => ReceiptRecord[] | null;
  getScannedReceipts: (sessionId: string) => ScannedReceipt[] | null;
  claimNextJob: () => ClaimedJob | null;
  submitJobResult: (jobId: string, result: JobResultRequest) => JobResultResponse | null;
  failJob: (jobId: string, error: string) => ScanJob | null;
};
