/**
 * Environment configuration
 *
 * MEMOSHELF_DATA_DIR  directory for the database and persisted settings
 * MEMOSHELF_DB_PATH   explicit database file (overrides the data dir default)
 */
import { homedir } from "node:os";
import { join } from "node:path";

export interface AppConfig {
  /** null keeps settings in memory only */
  dataDir: string | null;
  databasePath: string;
}

export const DATABASE_FILENAME = "memoshelf.db";
export const SETTINGS_FILENAME = "settings.json";

export function defaultDataDir(): string {
  return join(homedir(), ".memoshelf");
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = env.MEMOSHELF_DATA_DIR?.trim() || null;
  const databasePath =
    env.MEMOSHELF_DB_PATH?.trim() || join(dataDir ?? defaultDataDir(), DATABASE_FILENAME);
  return { dataDir, databasePath };
}
