import {
  ClaimJobResponseSchema,
  FailJobRequestSchema,
  JobResultRequestSchema,
  WORKER_TOKEN_HEADER,
  type ClaimedJob,
  type JobResultRequest,
} from "@receipt-scanner/contracts";

export type WorkerApiClient = {
  claimJob: () => Promise<ClaimedJob | null>;
  submitJobResult: (jobId: string, result: JobResultRequest) => Promise<void>;
  failJob: (jobId: string, error: string) => Promise<void>;
};

export type HttpWorkerApiClientOptions = {
  baseUrl: string;
  workerToken: string;
  fetchImpl?: typeof fetch;
};

export class WorkerApiError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(`${message}: ${status}`);
    this.name = "WorkerApiError";
    this.status = status;
  }
}

export class HttpWorkerApiClient implements WorkerApiClient {
  private readonly baseUrl: string;
  private readonly workerToken: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpWorkerApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.workerToken = options.workerToken;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async claimJob(): Promise<ClaimedJob | null> {
    const response = await this.post("/internal/jobs/claim", {});
    if (!response.ok) {
      throw new WorkerApiError("failed to claim scan job", response.status);
    }

    const payload: unknown = await response.json();
    return ClaimJobResponseSchema.parse(payload).job;
  }

  async submitJobResult(jobId: string, result: JobResultRequest): Promise<void> {
    const response = await this.post(
      `/internal/jobs/${encodeURIComponent(jobId)}/result`,
      JobResultRequestSchema.parse(result),
    );
    if (!response.ok) {
      throw new WorkerApiError(`failed to submit record for job ${jobId}`, response.status);
    }
  }

  async failJob(jobId: string, error: string): Promise<void> {
    const response = await this.post(
      `/internal/jobs/${encodeURIComponent(jobId)}/fail`,
      FailJobRequestSchema.parse({ error: error.slice(0, 2000) || "unknown error" }),
    );
    if (!response.ok) {
      throw new WorkerApiError(`failed to report failure for job ${jobId}`, response.status);
    }
  }

  private post(path: string, body: unknown): Promise<Response> {
    return this.fetchImpl(`${this.baseUrl}${path}`, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        [WORKER_TOKEN_HEADER]: this.workerToken,
      },
      body: JSON.stringify(body),
    });
  }
}
