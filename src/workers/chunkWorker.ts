import { parentPort, workerData } from "worker_threads";
import { processChunk } from "../services/chunkScanner";
import { createAddressClassifier } from "../utils/ipClassification";
import { errorMessage } from "../lib/errors";
import { chunkTaskSchema, chunkWorkerDataSchema, type ChunkReply } from "./chunkMessages";

/**
 * Worker thread: scans and classifies one chunk per message.
 * Started by WorkerPool, never run directly.
 */

if (!parentPort) {
  throw new Error("chunkWorker must be started as a worker thread");
}

const port = parentPort;
const { rules } = chunkWorkerDataSchema.parse(workerData);
const classify = createAddressClassifier(rules);

port.on("message", (message: unknown) => {
  const task = chunkTaskSchema.safeParse(message);
  if (!task.success) {
    console.error("[Chunk Worker] Ignoring malformed task:", task.error.message);
    return;
  }

  const { id, chunk } = task.data;
  let reply: ChunkReply;
  try {
    reply = { id, result: processChunk(chunk, classify) };
  } catch (error) {
    reply = { id, error: errorMessage(error) };
  }
  port.postMessage(reply);
});
