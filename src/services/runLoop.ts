import { setTimeout as delay } from "timers/promises";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RunForeverOptions {
  /** Stops the loop once the current run (or sleep) ends */
  signal?: AbortSignal;
  sleep?: Sleep;
}

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Call runOnce, wait a fixed interval, repeat.
 *
 * Errors are logged and the loop carries on: no backoff, no failure cap.
 * The interval is measured from the end of one run to the start of the next.
 */
export async function runForever(
  intervalMs: number,
  runOnce: () => Promise<unknown>,
  options: RunForeverOptions = {}
): Promise<void> {
  const { signal, sleep = defaultSleep } = options;

  while (!signal?.aborted) {
    try {
      await runOnce();
    } catch (error) {
      console.error("❌ Extraction run failed:", error);
    }

    if (signal?.aborted) {
      break;
    }

    console.log(`💤 Sleeping for ${intervalMs / 1000} seconds`);
    try {
      await sleep(intervalMs, signal);
    } catch (error) {
      if (signal?.aborted) {
        break;
      }
      throw error;
    }
  }
}
