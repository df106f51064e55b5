import type { Server } from "http";
import type { AddressInfo } from "net";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { createApp } from "../src/app";
import { ExtractionScheduler } from "../src/services/extractionScheduler";
import { runExtraction } from "../src/services/extractionJob";
import { StoreConnectionError } from "../src/lib/errors";
import type { AppConfig } from "../src/lib/config";
import type { StoreFactory } from "../src/services/resultStore";
import type { RunSummary } from "../src/types";
import { createMemoryDatabase, type MemoryDatabase } from "./helpers/memoryResultStore";
import { createTempDir, testConfig, type TempDir } from "./helpers/fixtures";

interface TestServer {
  baseUrl: string;
  close(): Promise<void>;
}

async function listen(
  config: AppConfig,
  scheduler: ExtractionScheduler,
  openStore: StoreFactory
): Promise<TestServer> {
  const app = createApp({ config, scheduler, openStore });
  const server: Server = await new Promise((resolve) => {
    const started = app.listen(0, () => resolve(started));
  });
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Test server is not listening on a TCP port");
  }
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

describe("HTTP API", () => {
  let tmp: TempDir;
  let db: MemoryDatabase;
  let server: TestServer | null = null;

  beforeEach(async () => {
    tmp = await createTempDir();
    db = createMemoryDatabase();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    await server?.close();
    server = null;
    await tmp.cleanup();
  });

  async function start(
    env: NodeJS.ProcessEnv = {},
    runJob?: (config: AppConfig) => Promise<RunSummary>,
    openStore: StoreFactory = db.openStore
  ) {
    const config = testConfig(env);
    const scheduler = new ExtractionScheduler(config, {
      runJob: runJob ?? ((cfg) => runExtraction(cfg, { openStore })),
    });
    server = await listen(config, scheduler, openStore);
    return { baseUrl: server.baseUrl, scheduler };
  }

  it("should report health", async () => {
    const { baseUrl } = await start();

    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toEqual({ status: "ok", timestamp: expect.any(String) });
  });

  it("should list stored addresses with their total", async () => {
    db.collections.private = ["192.168.0.1", "10.0.0.1"];
    db.collections.public = ["8.8.8.8"];
    const { baseUrl } = await start();

    const privateRes = await fetch(`${baseUrl}/api/ips/private`);
    const publicRes = await fetch(`${baseUrl}/api/ips/public`);

    expect(privateRes.status).toBe(200);
    await expect(privateRes.json()).resolves.toEqual({
      ips: ["10.0.0.1", "192.168.0.1"],
      total: 2,
    });
    await expect(publicRes.json()).resolves.toEqual({ ips: ["8.8.8.8"], total: 1 });
    expect(db.closed).toBe(db.opened);
  });

  it("should answer 500 when the store cannot be reached", async () => {
    const openStore: StoreFactory = async () => {
      throw new StoreConnectionError("Failed to connect to MongoDB: connection refused");
    };
    const { baseUrl } = await start({}, undefined, openStore);

    const res = await fetch(`${baseUrl}/api/ips/public`);

    expect(res.status).toBe(500);
    await expect(res.json()).resolves.toEqual({
      error: "Failed to connect to MongoDB: connection refused",
    });
  });

  it("should run an extraction on demand and serve its results", async () => {
    const file = await tmp.write("access.log", "10.0.0.7 - GET /\n8.8.4.4 - GET /\n");
    const { baseUrl } = await start({ LOG_FILE_PATH: file });

    const runRes = await fetch(`${baseUrl}/api/extraction/run`, { method: "POST" });

    expect(runRes.status).toBe(200);
    await expect(runRes.json()).resolves.toMatchObject({
      status: "succeeded",
      filePath: file,
      privateCount: 1,
      publicCount: 1,
    });
    await expect((await fetch(`${baseUrl}/api/ips/private`)).json()).resolves.toEqual({
      ips: ["10.0.0.7"],
      total: 1,
    });

    const statusRes = await fetch(`${baseUrl}/api/extraction/status`);
    await expect(statusRes.json()).resolves.toMatchObject({
      running: false,
      isProcessing: false,
      mode: "interval",
      totalRuns: 1,
      failedRuns: 0,
    });
  });

  it("should answer 409 while a run is in progress", async () => {
    let finish: (summary: RunSummary) => void = () => {};
    const runJob = () =>
      new Promise<RunSummary>((resolve) => {
        finish = resolve;
      });
    const { baseUrl, scheduler } = await start({}, runJob);

    const inProgress = scheduler.runNow();
    const res = await fetch(`${baseUrl}/api/extraction/run`, { method: "POST" });

    expect(res.status).toBe(409);
    await expect(res.json()).resolves.toEqual({
      error: "An extraction run is already in progress",
    });

    finish({
      status: "succeeded",
      filePath: "data/access.log",
      startedAt: "2024-03-12T10:00:00.000Z",
      finishedAt: "2024-03-12T10:00:00.010Z",
      durationMs: 10,
      privateCount: 0,
      publicCount: 0,
    });
    await inProgress;
  });

  it("should answer unknown routes with 404", async () => {
    const { baseUrl } = await start();

    const res = await fetch(`${baseUrl}/api/unknown`);

    expect(res.status).toBe(404);
    await expect(res.json()).resolves.toEqual({ message: "Route not found", path: "/api/unknown" });
  });
});
