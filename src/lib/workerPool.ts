import { EventEmitter } from "events";
import os from "os";
import path from "path";
import { Worker } from "worker_threads";
import {
  DEFAULT_CLASSIFICATION_RULES,
  type ClassificationRules,
} from "../constants/ipRanges";
import { processChunk } from "../services/chunkScanner";
import { createAddressClassifier } from "../utils/ipClassification";
import { chunkReplySchema, type ChunkTask, type ChunkWorkerData } from "../workers/chunkMessages";
import type { AddressClassifier, ChunkResult } from "../types";

/**
 * Runs scan + classify over chunks, possibly in parallel.
 * Results settle in completion order, not submission order.
 */
export interface ChunkExecutor {
  readonly concurrency: number;
  run(chunk: Uint8Array): Promise<ChunkResult>;
  close(): Promise<void>;
}

/**
 * The part of a worker_threads Worker the pool relies on
 */
export interface ChunkWorkerHandle extends EventEmitter {
  postMessage(message: ChunkTask): void;
  terminate(): Promise<number>;
}

export type ChunkWorkerFactory = (rules: ClassificationRules) => ChunkWorkerHandle;

export interface WorkerPoolOptions {
  size?: number;
  rules?: ClassificationRules;
  createWorker?: ChunkWorkerFactory;
}

interface PendingTask {
  id: number;
  chunk: Uint8Array;
  resolve: (result: ChunkResult) => void;
  reject: (error: Error) => void;
}

interface WorkerSlot {
  worker: ChunkWorkerHandle;
  task: PendingTask | null;
}

/**
 * Start a chunk worker thread. From sources (dev, tsx) the worker is a .ts file
 * and needs the tsx CommonJS hook; the compiled build loads plain .js.
 */
export const createChunkWorker: ChunkWorkerFactory = (rules) => {
  const extension = path.extname(__filename);
  const filename = path.join(__dirname, "..", "workers", `chunkWorker${extension}`);
  const workerData: ChunkWorkerData = {
    rules: {
      privateNetworks: [...rules.privateNetworks],
      excludedNetworks: [...rules.excludedNetworks],
    },
  };

  return new Worker(filename, {
    workerData,
    execArgv: extension === ".ts" ? ["--require", "tsx/cjs"] : undefined,
  });
};

export function defaultPoolSize(): number {
  return Math.max(1, os.availableParallelism());
}

/**
 * Fixed-size pool of chunk worker threads fed from a FIFO queue.
 * Each worker holds at most one chunk at a time.
 */
export class WorkerPool implements ChunkExecutor {
  readonly concurrency: number;
  private readonly rules: ClassificationRules;
  private readonly createWorker: ChunkWorkerFactory;
  private readonly slots: WorkerSlot[] = [];
  private readonly queue: PendingTask[] = [];
  private nextTaskId = 0;
  private closed = false;

  constructor(options: WorkerPoolOptions = {}) {
    this.concurrency = Math.max(1, options.size ?? defaultPoolSize());
    this.rules = options.rules ?? DEFAULT_CLASSIFICATION_RULES;
    this.createWorker = options.createWorker ?? createChunkWorker;

    try {
      for (let i = 0; i < this.concurrency; i++) {
        this.slots.push(this.spawn());
      }
    } catch (error) {
      this.closed = true;
      for (const slot of this.slots) {
        slot.worker.terminate().catch((terminateError: unknown) => {
          console.error("[Worker Pool] Failed to stop chunk worker:", terminateError);
        });
      }
      throw error;
    }
  }

  run(chunk: Uint8Array): Promise<ChunkResult> {
    if (this.closed) {
      return Promise.reject(new Error("Worker pool is closed"));
    }

    return new Promise<ChunkResult>((resolve, reject) => {
      this.queue.push({ id: this.nextTaskId++, chunk, resolve, reject });
      this.dispatch();
    });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const closedError = new Error("Worker pool closed before the chunk was processed");
    for (const task of this.queue.splice(0)) {
      task.reject(closedError);
    }
    for (const slot of this.slots) {
      slot.task?.reject(closedError);
      slot.task = null;
    }

    await Promise.all(this.slots.map((slot) => slot.worker.terminate()));
  }

  private spawn(): WorkerSlot {
    const slot: WorkerSlot = { worker: this.createWorker(this.rules), task: null };

    slot.worker.on("message", (message: unknown) => {
      const task = slot.task;
      const reply = chunkReplySchema.safeParse(message);
      if (!task || !reply.success || reply.data.id !== task.id) {
        console.error("[Worker Pool] Unexpected message from chunk worker");
        return;
      }

      slot.task = null;
      if ("error" in reply.data) {
        task.reject(new Error(`Chunk worker failed: ${reply.data.error}`));
      } else {
        task.resolve(reply.data.result);
      }
      this.dispatch();
    });

    slot.worker.on("error", (error: Error) => {
      slot.task?.reject(error);
      slot.task = null;
    });

    slot.worker.on("exit", (code: number) => {
      if (this.closed) {
        return;
      }
      slot.task?.reject(new Error(`Chunk worker exited with code ${code}`));
      slot.task = null;

      // Replace the dead worker so the pool keeps its size
      const index = this.slots.indexOf(slot);
      if (index !== -1) {
        this.slots[index] = this.spawn();
        this.dispatch();
      }
    });

    return slot;
  }

  private dispatch(): void {
    for (const slot of this.slots) {
      if (this.queue.length === 0) {
        return;
      }
      if (slot.task) {
        continue;
      }

      const task = this.queue.shift();
      if (!task) {
        return;
      }
      slot.task = task;
      slot.worker.postMessage({ id: task.id, chunk: task.chunk });
    }
  }
}

/**
 * Same contract as WorkerPool, executed on the calling thread
 */
export class InlineChunkExecutor implements ChunkExecutor {
  readonly concurrency = 1;
  private readonly classify: AddressClassifier;
  private closed = false;

  constructor(rules: ClassificationRules = DEFAULT_CLASSIFICATION_RULES) {
    this.classify = createAddressClassifier(rules);
  }

  async run(chunk: Uint8Array): Promise<ChunkResult> {
    if (this.closed) {
      throw new Error("Executor is closed");
    }
    return processChunk(chunk, this.classify);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
