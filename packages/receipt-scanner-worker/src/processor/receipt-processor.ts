import {
  JobResultRequestSchema,
  type ClaimedJob,
  type JobResultRequest,
} from "@receipt-scanner/contracts";
import { DEFAULT_TOTAL_OPTIONS, type TotalExtractionOptions } from "./total-extractor.js";
import { HeuristicFieldExtractor } from "./heuristic-extractor.js";
import { toReceiptRecord } from "./normalization.js";
import type { ReceiptFieldExtractor } from "./types.js";

export type ReceiptProcessor = {
  process: (claimedJob: ClaimedJob) => Promise<JobResultRequest>;
};

type ReceiptProcessorOptions = {
  extractor: ReceiptFieldExtractor;
};

export class ReceiptFieldProcessor implements ReceiptProcessor {
  private readonly extractor: ReceiptFieldExtractor;

  constructor(options: ReceiptProcessorOptions) {
    this.extractor = options.extractor;
  }

  async process(claimedJob: ClaimedJob): Promise<JobResultRequest> {
    const filename = claimedJob.receipt.filename.trim();
    if (filename.length === 0) {
      throw new Error(`job ${claimedJob.job.jobId} has no receipt filename`);
    }

    const fields = this.extractor.extract({ lines: claimedJob.receipt.lines });

    return JobResultRequestSchema.parse({
      record: toReceiptRecord(filename, fields),
      locale: fields.locale,
    });
  }
}

export function createReceiptFieldProcessorFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): ReceiptProcessor {
  return new ReceiptFieldProcessor({
    extractor: new HeuristicFieldExtractor(resolveExtractionOptionsFromEnv(env)),
  });
}

export function resolveExtractionOptionsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): TotalExtractionOptions {
  return {
    explicitTotalWindow: parseIntegerEnv(
      env,
      "RECEIPT_SCANNER_TOTAL_WINDOW",
      DEFAULT_TOTAL_OPTIONS.explicitTotalWindow,
      1,
    ),
    blindTailLines: parseIntegerEnv(
      env,
      "RECEIPT_SCANNER_BLIND_TAIL",
      DEFAULT_TOTAL_OPTIONS.blindTailLines,
      0,
    ),
  };
}

function parseIntegerEnv(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  minimum: number,
): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value < minimum) {
    throw new Error(`invalid ${name}: ${raw}`);
  }
  return value;
}
