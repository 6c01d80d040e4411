import { HttpWorkerApiClient } from "./client/api-client.js";
import { readWorkerConfigFromEnv } from "./config/env.js";
import { createReceiptFieldProcessorFromEnv } from "./processor/receipt-processor.js";
import { consoleLogger, WorkerRunner } from "./runner/worker-runner.js";

async function main() {
  const config = readWorkerConfigFromEnv();
  const runner = new WorkerRunner({
    client: new HttpWorkerApiClient({
      baseUrl: config.apiBaseUrl,
      workerToken: config.workerToken,
    }),
    processor: createReceiptFieldProcessorFromEnv(),
    pollIntervalMs: config.pollIntervalMs,
    jobTimeoutMs: config.jobTimeoutMs,
    logger: consoleLogger,
  });

  const controller = new AbortController();
  const shutdown = () => controller.abort();
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  consoleLogger.info(`[receipt-scanner-worker] polling ${config.apiBaseUrl}`);
  await runner.runUntil(controller.signal);
}

main().catch((error: unknown) => {
  consoleLogger.error(
    `[receipt-scanner-worker] fatal: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exitCode = 1;
});
