import dotenv from "dotenv";
import { loadConfig } from "../lib/config";
import { ExtractionScheduler } from "../services/extractionScheduler";

/**
 * Headless process: runs extraction forever on the configured schedule,
 * without the HTTP API. Run as: npm run worker:extract
 */
dotenv.config();

const config = loadConfig();
const scheduler = new ExtractionScheduler(config);

console.log("🚀 IP Extraction Worker started");
console.log(`   Log file: ${config.filePath}`);
console.log(`   Chunk size: ${config.chunkSizeBytes} bytes`);
console.log(`   Database: ${config.databaseName}`);
console.log(`   Schedule: ${scheduler.getStatus().schedule}`);

scheduler.start();

async function shutdown(): Promise<void> {
  console.log("\n🛑 Shutting down worker...");
  await scheduler.stop();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown().catch((error: unknown) => {
      console.error("Fatal worker error:", error);
      process.exit(1);
    });
  });
}
