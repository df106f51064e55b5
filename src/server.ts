import dotenv from "dotenv";
import { createApp } from "./app";
import { loadConfig } from "./lib/config";
import { ExtractionScheduler } from "./services/extractionScheduler";

// Load environment variables
dotenv.config();

const config = loadConfig();
const scheduler = new ExtractionScheduler(config);
const app = createApp({ config, scheduler });

const server = app.listen(config.port, () => {
  console.log(`🚀 Server is running on http://localhost:${config.port}`);
  console.log(`📚 API Documentation available at http://localhost:${config.port}/docs`);
  scheduler.start();
});

async function shutdown(signal: string): Promise<void> {
  console.log(`\n🛑 Received ${signal}, shutting down...`);
  await scheduler.stop();
  server.close(() => process.exit(0));
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      console.error("Shutdown error:", error);
      process.exit(1);
    });
  });
}

export default app;
