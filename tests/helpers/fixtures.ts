import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { loadConfig, type AppConfig } from "../../src/lib/config";

export interface TempDir {
  dir: string;
  write(name: string, contents: string | Uint8Array): Promise<string>;
  cleanup(): Promise<void>;
}

export async function createTempDir(): Promise<TempDir> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "ip-harvester-"));
  return {
    dir,
    async write(name, contents) {
      const filePath = path.join(dir, name);
      await writeFile(filePath, contents);
      return filePath;
    },
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

export function testConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({ EXTRACTION_WORKERS: "0", ...env });
}
