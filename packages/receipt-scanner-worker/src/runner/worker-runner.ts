import type { ClaimedJob, JobResultRequest } from "@receipt-scanner/contracts";
import type { WorkerApiClient } from "../client/api-client.js";
import type { ReceiptProcessor } from "../processor/receipt-processor.js";

export type WorkerRunnerLogger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export type WorkerRunnerOptions = {
  client: WorkerApiClient;
  processor: ReceiptProcessor;
  pollIntervalMs?: number;
  maxSubmitAttempts?: number;
  submitRetryBaseMs?: number;
  /**
   * Per-receipt processing budget; 0 disables it. It bounds processors that yield while
   * working: synchronous extraction finishes before the timer can fire, and its result is kept.
   */
  jobTimeoutMs?: number;
  logger?: WorkerRunnerLogger;
};

const LOG_PREFIX = "[receipt-scanner-worker]";

export const consoleLogger: WorkerRunnerLogger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

export class WorkerRunner {
  private readonly client: WorkerApiClient;
  private readonly processor: ReceiptProcessor;
  private readonly pollIntervalMs: number;
  private readonly maxSubmitAttempts: number;
  private readonly submitRetryBaseMs: number;
  private readonly jobTimeoutMs: number;
  private readonly logger: WorkerRunnerLogger;

  constructor(options: WorkerRunnerOptions) {
    this.client = options.client;
    this.processor = options.processor;
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.maxSubmitAttempts = Math.max(1, options.maxSubmitAttempts ?? 3);
    this.submitRetryBaseMs = Math.max(0, options.submitRetryBaseMs ?? 250);
    this.jobTimeoutMs = Math.max(0, options.jobTimeoutMs ?? 30_000);
    this.logger = options.logger ?? consoleLogger;
  }

  /** Claims and handles at most one scan job; false when the queue was empty. */
  async runOnce(): Promise<boolean> {
    const claimed = await this.client.claimJob();
    if (!claimed) {
      return false;
    }

    await this.processClaimedJob(claimed);
    return true;
  }

  async runUntil(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let handled: boolean;
      try {
        handled = await this.runOnce();
      } catch (error) {
        this.logger.warn(`${LOG_PREFIX} claim failed: ${errorMessage(error)}`);
        handled = false;
      }
      if (!handled) {
        await sleepUntilAborted(this.pollIntervalMs, signal);
      }
    }
  }

  private async processClaimedJob(claimed: ClaimedJob): Promise<void> {
    const { jobId } = claimed.job;
    const { filename } = claimed.receipt;

    try {
      this.logger.info(`${LOG_PREFIX} scanning ${filename} (${jobId})`);
      const result = await this.processWithTimeout(claimed);
      await this.submitResultWithRetries(jobId, result);
      this.logger.info(
        `${LOG_PREFIX} completed ${filename}: total=${result.record.total ?? "null"} currency=${result.record.currency ?? "null"}`,
      );
    } catch (error) {
      const message = errorMessage(error);
      try {
        await this.client.failJob(jobId, message);
      } catch (reportError) {
        this.logger.error(`${LOG_PREFIX} failed to report ${jobId}: ${errorMessage(reportError)}`);
      }
      this.logger.error(`${LOG_PREFIX} failed ${filename} (${jobId}): ${message}`);
    }
  }

  // Races the processor against a timer; only effective once the processor awaits something.
  private async processWithTimeout(claimed: ClaimedJob): Promise<JobResultRequest> {
    if (this.jobTimeoutMs === 0) {
      return this.processor.process(claimed);
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`scan timed out after ${this.jobTimeoutMs}ms`));
      }, this.jobTimeoutMs);
    });

    try {
      return await Promise.race([this.processor.process(claimed), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async submitResultWithRetries(jobId: string, result: JobResultRequest): Promise<void> {
    let attempt = 1;
    while (attempt <= this.maxSubmitAttempts) {
      try {
        await this.client.submitJobResult(jobId, result);
        return;
      } catch (error) {
        if (attempt >= this.maxSubmitAttempts) {
          throw error;
        }

        const waitMs = this.submitRetryBaseMs * 2 ** (attempt - 1);
        this.logger.warn(
          `${LOG_PREFIX} submit attempt ${attempt} failed for ${jobId}; retrying in ${waitMs}ms`,
        );
        await sleep(waitMs);
        attempt += 1;
      }
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function sleepUntilAborted(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return;
  }

  await new Promise<void>((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

async function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return;
  }

  await new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });
}
