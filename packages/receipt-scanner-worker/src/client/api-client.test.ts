import { WORKER_TOKEN_HEADER, type ClaimedJob } from "@receipt-scanner/contracts";
import { describe, expect, it, vi } from "vitest";
import { HttpWorkerApiClient, WorkerApiError } from "./api-client.js";

const claimed: ClaimedJob = {
  job: {
    jobId: "job_1",
    sessionId: "session_1",
    filename: "a.jpg",
    status: "processing",
    attempts: 1,
    createdAt: "2026-02-08T12:00:00.000Z",
    updatedAt: "2026-02-08T12:01:00.000Z",
  },
  receipt: {
    sessionId: "session_1",
    filename: "a.jpg",
    lines: ["TOTALE", "3,20"],
    uploadedAt: "2026-02-08T12:00:00.000Z",
  },
};

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

describe("HttpWorkerApiClient", () => {
  it("claims jobs with the worker token", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse(200, { job: claimed }));
    const client = new HttpWorkerApiClient({
      baseUrl: "http://api.test/",
      workerToken: "test-worker-token",
      fetchImpl,
    });

    await expect(client.claimJob()).resolves.toEqual(claimed);

    const call = fetchImpl.mock.calls[0];
    expect(call?.[0]).toBe("http://api.test/internal/jobs/claim");
    expect(call?.[1]?.method).toBe("POST");
    expect(call?.[1]?.headers).toEqual({
      "content-type": "application/json",
      [WORKER_TOKEN_HEADER]: "test-worker-token",
    });
  });

  it("raises the status when a call is rejected", async () => {
    const client = new HttpWorkerApiClient({
      baseUrl: "http://api.test",
      workerToken: "wrong",
      fetchImpl: vi.fn<typeof fetch>(async () => jsonResponse(401, { error: "unauthorized" })),
    });

    const failure = client.claimJob();
    await expect(failure).rejects.toBeInstanceOf(WorkerApiError);
    await expect(failure).rejects.toThrow("failed to claim scan job: 401");
  });

  it("truncates long failure reports", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse(200, { job: claimed.job }));
    const client = new HttpWorkerApiClient({
      baseUrl: "http://api.test",
      workerToken: "test-worker-token",
      fetchImpl,
    });

    await client.failJob("job_1", "x".repeat(2500));

    const call = fetchImpl.mock.calls[0];
    expect(call?.[0]).toBe("http://api.test/internal/jobs/job_1/fail");
    expect(call?.[1]?.body).toBe(JSON.stringify({ error: "x".repeat(2000) }));
  });
});
