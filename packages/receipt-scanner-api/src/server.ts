import { createApp, type ApiLogger } from "./app.js";
import { readApiConfigFromEnv } from "./config/env.js";
import { InMemoryScanStore } from "./storage/in-memory-scan-store.js";

const consoleLogger: ApiLogger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

async function main() {
  const config = readApiConfigFromEnv();
  const store = new InMemoryScanStore({
    maxJobAttempts: config.maxJobAttempts,
    claimTimeoutMs: config.claimTimeoutMs,
  });
  const app = createApp({ config, store, logger: consoleLogger });

  app.listen(config.port, () => {
    consoleLogger.info(`[receipt-scanner-api] listening on :${config.port}`);
  });
}

main().catch((error: unknown) => {
  consoleLogger.error(
    `[receipt-scanner-api] fatal: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exitCode = 1;
});
