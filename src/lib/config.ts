import { z } from "zod";
import { DEFAULT_CHUNK_SIZE } from "../constants/ipRanges";
import { ConfigError } from "./errors";

/**
 * Environment variables:
 *   - LOG_FILE_PATH: log file scanned on each run (default: data/access.log)
 *   - CHUNK_SIZE_BYTES: bytes handed to a worker at a time (default: 1 MiB)
 *   - MONGODB_URI, DATABASE_NAME, PRIVATE_COLLECTION_NAME, PUBLIC_COLLECTION_NAME
 *   - RUN_INTERVAL_SECONDS: idle time between two runs (default: 10)
 *   - EXTRACTION_CRON_SCHEDULE: cron expression, replaces the fixed interval when set
 *   - EXTRACTION_WORKERS: worker threads per run, 0 scans on the main thread
 *     (default: available parallelism)
 *   - PORT, FRONTEND_URL: HTTP API
 */
const envSchema = z
  .object({
    LOG_FILE_PATH: z.string().default("data/access.log"),
    CHUNK_SIZE_BYTES: z.coerce.number().int().positive().default(DEFAULT_CHUNK_SIZE),
    MONGODB_URI: z.string().startsWith("mongodb").default("mongodb://localhost:27017"),
    DATABASE_NAME: z.string().default("ip_extraction"),
    PRIVATE_COLLECTION_NAME: z.string().default("private_ips"),
    PUBLIC_COLLECTION_NAME: z.string().default("public_ips"),
    RUN_INTERVAL_SECONDS: z.coerce.number().positive().default(10),
    EXTRACTION_CRON_SCHEDULE: z.string().optional(),
    EXTRACTION_WORKERS: z.coerce.number().int().min(0).optional(),
    PORT: z.coerce.number().int().min(0).max(65535).default(3001),
    FRONTEND_URL: z.string().default("http://localhost:3000"),
    NODE_ENV: z.string().default("development"),
  })
  .transform((env) => ({
    filePath: env.LOG_FILE_PATH,
    chunkSizeBytes: env.CHUNK_SIZE_BYTES,
    storeConnectionURI: env.MONGODB_URI,
    databaseName: env.DATABASE_NAME,
    privateCollectionName: env.PRIVATE_COLLECTION_NAME,
    publicCollectionName: env.PUBLIC_COLLECTION_NAME,
    runIntervalSeconds: env.RUN_INTERVAL_SECONDS,
    cronSchedule: env.EXTRACTION_CRON_SCHEDULE,
    workerCount: env.EXTRACTION_WORKERS,
    port: env.PORT,
    frontendUrl: env.FRONTEND_URL,
    nodeEnv: env.NODE_ENV,
  }));

export type AppConfig = Readonly<z.output<typeof envSchema>>;

/**
 * Read and validate configuration. Empty variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  return Object.freeze(parsed.data);
}
