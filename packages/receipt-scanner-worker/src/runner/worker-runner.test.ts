import type { ClaimedJob, JobResultRequest } from "@receipt-scanner/contracts";
import { describe, expect, it, vi } from "vitest";
import type { WorkerApiClient } from "../client/api-client.js";
import type { ReceiptProcessor } from "../processor/receipt-processor.js";
import { WorkerRunner } from "./worker-runner.js";

function createClaimedJob(): ClaimedJob {
  return {
    job: {
      jobId: "job_1",
      sessionId: "session_1",
      filename: "receipt.jpg",
      status: "processing",
      attempts: 1,
      createdAt: "2026-02-08T12:00:00.000Z",
      updatedAt: "2026-02-08T12:01:00.000Z",
    },
    receipt: {
      sessionId: "session_1",
      filename: "receipt.jpg",
      lines: ["BAR CENTRALE", "TOTALE", "3,20"],
      uploadedAt: "2026-02-08T12:00:00.000Z",
    },
  };
}

function createResult(): JobResultRequest {
  return {
    record: {
      filename: "receipt.jpg",
      vendor: "BAR CENTRALE",
      location: null,
      date: null,
      total: "3.20",
      currency: "EUR",
    },
    locale: "IT",
  };
}

function createLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("WorkerRunner", () => {
  it("submits extracted records for claimed jobs", async () => {
    const client: WorkerApiClient = {
      claimJob: vi.fn(async () => createClaimedJob()),
      submitJobResult: vi.fn(async () => {}),
      failJob: vi.fn(async () => {}),
    };
    const processor: ReceiptProcessor = {
      process: vi.fn(async () => createResult()),
    };
    const logger = createLogger();

    const runner = new WorkerRunner({ client, processor, pollIntervalMs: 1, logger });
    const handled = await runner.runOnce();

    expect(handled).toBe(true);
    expect(processor.process).toHaveBeenCalledWith(createClaimedJob());
    expect(client.submitJobResult).toHaveBeenCalledWith("job_1", createResult());
    expect(client.failJob).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenLastCalledWith(
      "[receipt-scanner-worker] completed receipt.jpg: total=3.20 currency=EUR",
    );
  });

  it("fails the job when the processor throws", async () => {
    const client: WorkerApiClient = {
      claimJob: vi.fn(async () => createClaimedJob()),
      submitJobResult: vi.fn(async () => {}),
      failJob: vi.fn(async () => {}),
    };
    const processor: ReceiptProcessor = {
      process: vi.fn(async () => {
        throw new Error("unreadable receipt");
      }),
    };
    const logger = createLogger();

    const runner = new WorkerRunner({ client, processor, pollIntervalMs: 1, logger });
    const handled = await runner.runOnce();

    expect(handled).toBe(true);
    expect(client.failJob).toHaveBeenCalledWith("job_1", "unreadable receipt");
    expect(client.submitJobResult).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledWith(
      "[receipt-scanner-worker] failed receipt.jpg (job_1): unreadable receipt",
    );
  });

  it("fails the job when processing outlasts the timeout", async () => {
    const client: WorkerApiClient = {
      claimJob: vi.fn(async () => createClaimedJob()),
      submitJobResult: vi.fn(async () => {}),
      failJob: vi.fn(async () => {}),
    };
    const processor: ReceiptProcessor = {
      process: vi.fn(() => new Promise<JobResultRequest>(() => undefined)),
    };

    const runner = new WorkerRunner({
      client,
      processor,
      jobTimeoutMs: 5,
      logger: createLogger(),
    });
    await runner.runOnce();

    expect(client.failJob).toHaveBeenCalledWith("job_1", "scan timed out after 5ms");
    expect(client.submitJobResult).not.toHaveBeenCalled();
  });

  it("keeps the result of synchronous processing that runs past the timeout", async () => {
    const client: WorkerApiClient = {
      claimJob: vi.fn(async () => createClaimedJob()),
      submitJobResult: vi.fn(async () => {}),
      failJob: vi.fn(async () => {}),
    };
    const processor: ReceiptProcessor = {
      process: vi.fn(async () => {
        const startedAt = Date.now();
        let spins = 0;
        while (Date.now() - startedAt < 10) {
          spins += 1;
        }
        expect(spins).toBeGreaterThan(0);
        return createResult();
      }),
    };

    const runner = new WorkerRunner({
      client,
      processor,
      jobTimeoutMs: 1,
      logger: createLogger(),
    });
    await runner.runOnce();

    expect(client.submitJobResult).toHaveBeenCalledWith("job_1", createResult());
    expect(client.failJob).not.toHaveBeenCalled();
  });

  it("returns false when no job is available", async () => {
    const client: WorkerApiClient = {
      claimJob: vi.fn(async () => null),
      submitJobResult: vi.fn(async () => {}),
      failJob: vi.fn(async () => {}),
    };
    const processor: ReceiptProcessor = {
      process: vi.fn(async () => createResult()),
    };

    const runner = new WorkerRunner({ client, processor, pollIntervalMs: 1, logger: createLogger() });
    const handled = await runner.runOnce();

    expect(handled).toBe(false);
    expect(processor.process).not.toHaveBeenCalled();
  });

  it("retries submit failures before succeeding", async () => {
    const client: WorkerApiClient = {
      claimJob: vi.fn(async () => createClaimedJob()),
      submitJobResult: vi
        .fn()
        .mockRejectedValueOnce(new Error("submit timeout"))
        .mockRejectedValueOnce(new Error("submit timeout"))
        .mockResolvedValue(undefined),
      failJob: vi.fn(async () => {}),
    };
    const processor: ReceiptProcessor = {
      process: vi.fn(async () => createResult()),
    };
    const logger = createLogger();

    const runner = new WorkerRunner({
      client,
      processor,
      maxSubmitAttempts: 3,
      submitRetryBaseMs: 0,
      logger,
    });
    const handled = await runner.runOnce();

    expect(handled).toBe(true);
    expect(client.submitJobResult).toHaveBeenCalledTimes(3);
    expect(client.failJob).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it("logs a report failure when failJob itself errors", async () => {
    const client: WorkerApiClient = {
      claimJob: vi.fn(async () => createClaimedJob()),
      submitJobResult: vi.fn(async () => {
        throw new Error("submit unavailable");
      }),
      failJob: vi.fn(async () => {
        throw new Error("fail endpoint unavailable");
      }),
    };
    const processor: ReceiptProcessor = {
      process: vi.fn(async () => createResult()),
    };
    const logger = createLogger();

    const runner = new WorkerRunner({
      client,
      processor,
      maxSubmitAttempts: 1,
      submitRetryBaseMs: 0,
      logger,
    });
    const handled = await runner.runOnce();

    expect(handled).toBe(true);
    expect(client.submitJobResult).toHaveBeenCalledTimes(1);
    expect(client.failJob).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledTimes(2);
  });

  it("keeps polling after a claim error until aborted", async () => {
    const controller = new AbortController();
    const client: WorkerApiClient = {
      claimJob: vi.fn(async () => {
        controller.abort();
        throw new Error("api unavailable");
      }),
      submitJobResult: vi.fn(async () => {}),
      failJob: vi.fn(async () => {}),
    };
    const processor: ReceiptProcessor = {
      process: vi.fn(async () => createResult()),
    };
    const logger = createLogger();

    const runner = new WorkerRunner({ client, processor, pollIntervalMs: 10_000, logger });
    await runner.runUntil(controller.signal);

    expect(client.claimJob).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      "[receipt-scanner-worker] claim failed: api unavailable",
    );
  });
});
