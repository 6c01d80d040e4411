import { z } from "zod";

export const LocaleSchema = z.enum(["IT", "EN"]);
export const CurrencySchema = z.enum(["EUR", "USD"]);
export const JobStatusSchema = z.enum(["queued", "processing", "completed", "failed"]);

export const WORKER_TOKEN_HEADER = "x-receipt-scanner-worker-token";

export const IdSchema = z.string().min(1).max(128);
export const FilenameSchema = z.string().min(1).max(255);

// Two fraction digits, always.
export const AmountSchema = z.string().regex(/^\d+\.\d{2}$/);

export const OcrLinesSchema = z.array(z.string().max(2000)).max(2000);

export const ReceiptRecordSchema = z.object({
  filename: FilenameSchema,
  vendor: z.string().min(1).max(2000).nullable(),
  location: z.string().min(1).max(4001).nullable(),
  date: z.string().min(1).max(2000).nullable(),
  total: AmountSchema.nullable(),
  currency: CurrencySchema.nullable(),
});

export const ExportRowSchema = z.object({
  filename: z.string(),
  vendor: z.string(),
  location: z.string(),
  date: z.string(),
  total: z.string(),
  currency: z.string(),
});

export const ScanSessionSchema = z.object({
  sessionId: IdSchema,
  createdAt: z.iso.datetime(),
  updatedAt: z.iso.datetime(),
});

export const CreateSessionResponseSchema = z.object({
  session: ScanSessionSchema,
});

export const ReceiptUploadRequestSchema = z.object({
  filename: FilenameSchema,
  lines: OcrLinesSchema,
});

export const UploadedReceiptSchema = z.object({
  sessionId: IdSchema,
  filename: FilenameSchema,
  lines: OcrLinesSchema,
  uploadedAt: z.iso.datetime(),
});

export const ReceiptUploadResponseSchema = z.object({
  receipt: UploadedReceiptSchema,
  uploaded: z.number().int().min(0),
});

export const ScanJobSchema = z.object({
  jobId: IdSchema,
  sessionId: IdSchema,
  filename: FilenameSchema,
  status: JobStatusSchema,
  attempts: z.number().int().min(0),
  createdAt: z.iso.datetime(),
  updatedAt: z.iso.datetime(),
  error: z.string().optional(),
  locale: LocaleSchema.optional(),
});

export const StartScanResponseSchema = z.object({
  sessionId: IdSchema,
  total: z.number().int().min(1),
  jobs: z.array(ScanJobSchema).min(1),
});

export const ScanStatusResponseSchema = z.object({
  sessionId: IdSchema,
  isScanning: z.boolean(),
  total: z.number().int().min(0),
  current: z.number().int().min(0),
  results: z.array(ReceiptRecordSchema),
  error: z.string().nullable(),
});

export const ResetSessionResponseSchema = z.object({
  sessionId: IdSchema,
  cleared: z.number().int().min(0),
});

export const ClaimedJobSchema = z.object({
  job: ScanJobSchema,
  receipt: UploadedReceiptSchema,
});

export const ClaimJobResponseSchema = z.object({
  job: ClaimedJobSchema.nullable(),
});

export const JobStatusResponseSchema = z.object({
  job: ScanJobSchema,
});

export const JobResultRequestSchema = z.object({
  record: ReceiptRecordSchema,
  locale: LocaleSchema.nullable(),
});

export const JobResultResponseSchema = z.object({
  job: ScanJobSchema,
  record: ReceiptRecordSchema,
});

export const FailJobRequestSchema = z.object({
  error: z.string().min(1).max(2000),
});

export const HealthResponseSchema = z.object({
  ok: z.literal(true),
  service: z.string().min(1),
  now: z.iso.datetime(),
});

export type Locale = z.infer<typeof LocaleSchema>;
export type Currency = z.infer<typeof CurrencySchema>;
export type JobStatus = z.infer<typeof JobStatusSchema>;
export type ReceiptRecord = z.infer<typeof ReceiptRecordSchema>;
export type ExportRow = z.infer<typeof ExportRowSchema>;
export type ScanSession = z.infer<typeof ScanSessionSchema>;
export type CreateSessionResponse = z.infer<typeof CreateSessionResponseSchema>;
export type ReceiptUploadRequest = z.infer<typeof ReceiptUploadRequestSchema>;
export type UploadedReceipt = z.infer<typeof UploadedReceiptSchema>;
export type ReceiptUploadResponse = z.infer<typeof ReceiptUploadResponseSchema>;
export type ScanJob = z.infer<typeof ScanJobSchema>;
export type StartScanResponse = z.infer<typeof StartScanResponseSchema>;
export type ScanStatusResponse = z.infer<typeof ScanStatusResponseSchema>;
export type ResetSessionResponse = z.infer<typeof ResetSessionResponseSchema>;
export type ClaimedJob = z.infer<typeof ClaimedJobSchema>;
export type ClaimJobResponse = z.infer<typeof ClaimJobResponseSchema>;
export type JobStatusResponse = z.infer<typeof JobStatusResponseSchema>;
export type JobResultRequest = z.infer<typeof JobResultRequestSchema>;
export type JobResultResponse = z.infer<typeof JobResultResponseSchema>;
export type FailJobRequest = z.infer<typeof FailJobRequestSchema>;
export type HealthResponse = z.infer<typeof HealthResponseSchema>;
