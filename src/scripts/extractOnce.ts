import dotenv from "dotenv";
import { loadConfig } from "../lib/config";
import { runExtraction } from "../services/extractionJob";

/**
 * Single extraction run, for cron, systemd timers or manual use.
 *
 * Usage:
 *   npm run extract:once
 *   LOG_FILE_PATH=/var/log/nginx/access.log npm run extract:once
 */
async function main() {
  dotenv.config();
  const config = loadConfig();

  const summary = await runExtraction(config);
  if (summary.status === "failed") {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(`❌ [${new Date().toISOString()}] Extraction script error:`, error);
  process.exitCode = 1;
});
