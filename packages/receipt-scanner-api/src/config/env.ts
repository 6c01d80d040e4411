export type ApiConfig = {
  port: number;
  workerToken: string;
  maxJobAttempts: number;
  claimTimeoutMs: number;
};

export function readApiConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const portRaw = env.RECEIPT_SCANNER_API_PORT ?? "8790";
  const port = Number.parseInt(portRaw, 10);
  if (!Number.isFinite(port) || port <= 0) {
    throw new Error(`invalid RECEIPT_SCANNER_API_PORT: ${portRaw}`);
  }

  const attemptsRaw = env.RECEIPT_SCANNER_MAX_JOB_ATTEMPTS ?? "2";
  const maxJobAttempts = Number.parseInt(attemptsRaw, 10);
  if (!Number.isFinite(maxJobAttempts) || maxJobAttempts < 1) {
    throw new Error(`invalid RECEIPT_SCANNER_MAX_JOB_ATTEMPTS: ${attemptsRaw}`);
  }

  const claimTimeoutRaw = env.RECEIPT_SCANNER_CLAIM_TIMEOUT_MS ?? "300000";
  const claimTimeoutMs = Number.parseInt(claimTimeoutRaw, 10);
  if (!Number.isFinite(claimTimeoutMs) || claimTimeoutMs < 0) {
    throw new Error(`invalid RECEIPT_SCANNER_CLAIM_TIMEOUT_MS: ${claimTimeoutRaw}`);
  }

  return {
    port,
    workerToken: env.RECEIPT_SCANNER_WORKER_TOKEN ?? "local-worker-token",
    maxJobAttempts,
    claimTimeoutMs,
  };
}
