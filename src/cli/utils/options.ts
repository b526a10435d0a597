import { loadConfig, type SyncConfig } from "../../config.js";
import { ConfigError } from "../../errors.js";

export interface DatabaseOptions {
  staging?: string;
  cristin?: string;
  batchSize?: string;
}

/**
 * Environment configuration with command-line flags taking precedence.
 * Flags go through the same validation as the environment.
 */
export function resolveConfig(options: DatabaseOptions): SyncConfig {
  const env: Record<string, string | undefined> = { ...process.env };
  if (options.staging !== undefined) env.NVA_STAGING_DB = options.staging;
  if (options.cristin !== undefined) env.CRISTIN_DATABASE_URL = options.cristin;
  if (options.batchSize !== undefined) env.SYNC_BATCH_SIZE = options.batchSize;
  return loadConfig(env);
}

/**
 * Print the individual problems of a configuration error
 */
export function printErrorDetails(error: unknown): void {
  if (error instanceof ConfigError) {
    for (const detail of error.details) {
      console.error(`  - ${detail}`);
    }
  }
}
