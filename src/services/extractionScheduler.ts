import * as cron from "node-cron";
import type { AppConfig } from "../lib/config";
import { runExtraction } from "./extractionJob";
import { runForever } from "./runLoop";
import type { RunSummary } from "../types";

export type SchedulerMode = "interval" | "cron";

export interface SchedulerStatus {
  running: boolean;
  isProcessing: boolean;
  mode: SchedulerMode;
  schedule: string;
  lastRun: RunSummary | null;
  totalRuns: number;
  failedRuns: number;
}

export interface SchedulerDeps {
  runJob?: (config: AppConfig) => Promise<RunSummary>;
  runLoop?: typeof runForever;
}

/**
 * Runs extraction on a fixed interval, or on a cron schedule when
 * EXTRACTION_CRON_SCHEDULE is set. Only one run is ever in progress, so
 * writes of two runs are never interleaved; a manual run triggered while
 * another is in progress is skipped.
 */
export class ExtractionScheduler {
  private task: cron.ScheduledTask | null = null;
  private loop: AbortController | null = null;
  private loopDone: Promise<void> | null = null;
  private isRunning = false;
  private inFlight: Promise<void> | null = null;
  private lastRun: RunSummary | null = null;
  private totalRuns = 0;
  private failedRuns = 0;
  private readonly runJob: (config: AppConfig) => Promise<RunSummary>;
  private readonly runLoop: typeof runForever;

  constructor(
    private readonly config: AppConfig,
    deps: SchedulerDeps = {}
  ) {
    this.runJob = deps.runJob ?? ((config) => runExtraction(config));
    this.runLoop = deps.runLoop ?? runForever;
  }

  get mode(): SchedulerMode {
    return this.config.cronSchedule !== undefined ? "cron" : "interval";
  }

  /**
   * Run one extraction now; resolves null when a run is already in progress
   */
  async runNow(): Promise<RunSummary | null> {
    if (this.isRunning) {
      console.log("⏳ IP extraction already in progress, skipping this run...");
      return null;
    }

    this.isRunning = true;
    try {
      const run = this.runJob(this.config);
      this.inFlight = run.then(
        () => undefined,
        () => undefined
      );
      const summary = await run;
      this.lastRun = summary;
      this.totalRuns++;
      if (summary.status === "failed") {
        this.failedRuns++;
      }
      return summary;
    } finally {
      this.isRunning = false;
      this.inFlight = null;
    }
  }

  /**
   * Start the scheduler
   */
  start(): void {
    if (this.task || this.loop) {
      return;
    }

    const schedule = this.config.cronSchedule;
    if (schedule !== undefined) {
      if (!cron.validate(schedule)) {
        console.error(`❌ Invalid cron schedule: ${schedule}`);
        return;
      }

      console.log(`⏰ Starting IP extraction cron scheduler with schedule: ${schedule}`);
      this.task = cron.schedule(
        schedule,
        async () => {
          try {
            await this.runNow();
          } catch (error) {
            console.error(`❌ [${new Date().toISOString()}] Cron job error:`, error);
          }
        },
        {
          scheduled: true,
          timezone: "UTC",
        }
      );
      console.log("✅ IP extraction cron scheduler started successfully");
      return;
    }

    const intervalMs = this.config.runIntervalSeconds * 1000;
    console.log(`⏰ Starting IP extraction loop, ${this.config.runIntervalSeconds}s between runs`);
    const controller = new AbortController();
    this.loop = controller;
    this.loopDone = this.runLoop(intervalMs, () => this.runNow(), {
      signal: controller.signal,
    }).catch((error: unknown) => {
      console.error("❌ IP extraction loop stopped unexpectedly:", error);
    });
  }

  /**
   * Stop the scheduler; waits for the loop and any run in progress to finish
   */
  async stop(): Promise<void> {
    if (this.task) {
      this.task.stop();
      this.task = null;
      console.log("⏹️  IP extraction cron scheduler stopped");
    }

    if (this.loop) {
      this.loop.abort();
      this.loop = null;
      await this.loopDone;
      this.loopDone = null;
      console.log("⏹️  IP extraction loop stopped");
    }

    if (this.inFlight) {
      console.log("⏳ Waiting for the current extraction run to finish...");
      await this.inFlight;
    }
  }

  /**
   * Get scheduler status
   */
  getStatus(): SchedulerStatus {
    return {
      running: this.task !== null || this.loop !== null,
      isProcessing: this.isRunning,
      mode: this.mode,
      schedule:
        this.config.cronSchedule ?? `every ${this.config.runIntervalSeconds}s after the previous run`,
      lastRun: this.lastRun,
      totalRuns: this.totalRuns,
      failedRuns: this.failedRuns,
    };
  }
}
