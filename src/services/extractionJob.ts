import type { AppConfig } from "../lib/config";
import { errorMessage } from "../lib/errors";
import { InlineChunkExecutor, WorkerPool, type ChunkExecutor } from "../lib/workerPool";
import { extractIpsFromFile, type ExtractOptions } from "./ipExtractor";
import { openResultStore, type ResultStore, type StoreFactory } from "./resultStore";
import type { ExtractionResult, RunSummary } from "../types";

export interface ExtractionJobDeps {
  openStore?: StoreFactory;
  extract?: (filePath: string, options: ExtractOptions) => Promise<ExtractionResult>;
  createExecutor?: () => ChunkExecutor;
}

/**
 * Worker threads per config: 0 keeps scanning on the main thread
 */
export function executorFactoryFor(config: AppConfig): () => ChunkExecutor {
  if (config.workerCount === 0) {
    return () => new InlineChunkExecutor();
  }
  return () => new WorkerPool({ size: config.workerCount });
}

/**
 * One extraction run: connect, extract, replace both collections, report.
 *
 * Never throws. A store that cannot be reached aborts the run before
 * anything is extracted or written.
 */
export async function runExtraction(
  config: AppConfig,
  deps: ExtractionJobDeps = {}
): Promise<RunSummary> {
  const openStore = deps.openStore ?? openResultStore;
  const extract = deps.extract ?? extractIpsFromFile;
  const createExecutor = deps.createExecutor ?? executorFactoryFor(config);

  const startTime = Date.now();
  const startedAt = new Date(startTime).toISOString();
  const summarize = (
    fields: Pick<RunSummary, "status" | "privateCount" | "publicCount" | "error">
  ): RunSummary => ({
    ...fields,
    filePath: config.filePath,
    startedAt,
    finishedAt: new Date().toISOString(),
    durationMs: Date.now() - startTime,
  });

  console.log(`🕐 [${startedAt}] Starting IP extraction run...`);
  console.log(`   File: ${config.filePath}`);

  let store: ResultStore | null = null;
  try {
    store = await openStore(config);

    const { privateIps, publicIps } = await extract(config.filePath, {
      chunkSize: config.chunkSizeBytes,
      createExecutor,
    });

    await store.replaceAll("private", privateIps);
    await store.replaceAll("public", publicIps);

    const summary = summarize({
      status: "succeeded",
      privateCount: privateIps.length,
      publicCount: publicIps.length,
    });
    console.log(`   🔒 Private IPs: ${summary.privateCount}`);
    console.log(`   🌐 Public IPs: ${summary.publicCount}`);
    console.log(`   ⏱️  Duration: ${summary.durationMs}ms`);
    console.log(`✅ [${summary.finishedAt}] Extraction run completed`);
    return summary;
  } catch (error) {
    const summary = summarize({
      status: "failed",
      privateCount: 0,
      publicCount: 0,
      error: errorMessage(error),
    });
    console.error(
      `❌ [${summary.finishedAt}] Extraction run error (${summary.durationMs}ms):`,
      error
    );
    return summary;
  } finally {
    if (store) {
      try {
        await store.close();
      } catch (error) {
        console.error("⚠️  [Result Store] Failed to close connection:", error);
      }
    }
  }
}
