import { open, stat } from "fs/promises";
import { DEFAULT_CHUNK_SIZE } from "../constants/ipRanges";
import { InputError } from "../lib/errors";
import { WorkerPool, type ChunkExecutor } from "../lib/workerPool";
import type { ChunkResult, ExtractionResult } from "../types";

export interface ExtractOptions {
  /** Bytes per chunk (default 1 MiB) */
  chunkSize?: number;
  createExecutor?: () => ChunkExecutor;
  /** Chunks submitted but not yet merged; defaults to twice the executor's concurrency */
  maxInFlight?: number;
}

/**
 * Sort addresses as plain strings: "100.0.0.1" comes before "2.2.2.2"
 */
export function toSortedList(ips: Iterable<string>): string[] {
  return Array.from(ips).sort();
}

async function assertReadableLogFile(filePath: string): Promise<void> {
  let size: number;
  try {
    const stats = await stat(filePath);
    if (!stats.isFile()) {
      throw new InputError(`Invalid file: ${filePath} is not a regular file`, filePath);
    }
    size = stats.size;
  } catch (error) {
    if (error instanceof InputError) {
      throw error;
    }
    throw new InputError(`Invalid file: ${filePath} does not exist or cannot be read`, filePath, {
      cause: error,
    });
  }

  if (size === 0) {
    throw new InputError(`Invalid file: ${filePath} is empty`, filePath);
  }
}

/**
 * Extract private and public IPv4 addresses from a log file.
 *
 * The file is read in fixed-size chunks that are scanned and classified
 * independently; results are merged as chunks complete. Any failure yields
 * two empty lists, never a partial result.
 */
export async function extractIpsFromFile(
  filePath: string,
  options: ExtractOptions = {}
): Promise<ExtractionResult> {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const createExecutor = options.createExecutor ?? (() => new WorkerPool());

  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    console.error(`❌ [IP Extractor] Invalid chunk size: ${chunkSize}`);
    return { privateIps: [], publicIps: [] };
  }

  try {
    await assertReadableLogFile(filePath);
  } catch (error) {
    console.error(`❌ [IP Extractor] ${error instanceof Error ? error.message : error}`);
    return { privateIps: [], publicIps: [] };
  }

  const privateIps = new Set<string>();
  const publicIps = new Set<string>();
  const merge = (result: ChunkResult) => {
    result.privateIps.forEach((ip) => privateIps.add(ip));
    result.publicIps.forEach((ip) => publicIps.add(ip));
  };

  try {
    const file = await open(filePath, "r");
    try {
      const executor = createExecutor();
      try {
        const maxInFlight = Math.max(1, options.maxInFlight ?? executor.concurrency * 2);
        const pending = new Set<Promise<void>>();
        const state: { failure: { error: unknown } | null } = { failure: null };

        const submit = (chunk: Uint8Array) => {
          const settled: Promise<void> = executor
            .run(chunk)
            .then(merge, (error: unknown) => {
              state.failure ??= { error };
            })
            .finally(() => pending.delete(settled));
          pending.add(settled);
        };

        let position = 0;
        while (state.failure === null) {
          const buffer = Buffer.alloc(chunkSize);
          const { bytesRead } = await file.read(buffer, 0, chunkSize, position);
          if (bytesRead === 0) {
            break;
          }
          position += bytesRead;
          submit(buffer.subarray(0, bytesRead));

          if (pending.size >= maxInFlight) {
            await Promise.race(pending);
          }
        }

        await Promise.all(pending);
        if (state.failure !== null) {
          throw state.failure.error;
        }
      } finally {
        await executor.close();
      }
    } finally {
      await file.close();
    }
  } catch (error) {
    console.error("❌ [IP Extractor] Processing error:", error);
    return { privateIps: [], publicIps: [] };
  }

  return {
    privateIps: toSortedList(privateIps),
    publicIps: toSortedList(publicIps),
  };
}
