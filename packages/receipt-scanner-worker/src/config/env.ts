export type WorkerConfig = {
  apiBaseUrl: string;
  workerToken: string;
  pollIntervalMs: number;
  jobTimeoutMs: number;
};

export function readWorkerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  return {
    apiBaseUrl: env.RECEIPT_SCANNER_API_BASE_URL?.trim() || "http://127.0.0.1:8790",
    workerToken: env.RECEIPT_SCANNER_WORKER_TOKEN?.trim() || "local-worker-token",
    pollIntervalMs: readMilliseconds(env, "RECEIPT_SCANNER_WORKER_POLL_INTERVAL_MS", 1000),
    jobTimeoutMs: readMilliseconds(env, "RECEIPT_SCANNER_JOB_TIMEOUT_MS", 30_000),
  };
}

function readMilliseconds(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`invalid ${name}: ${raw}`);
  }
  return value;
}
