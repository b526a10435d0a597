import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError } from "./errors.js";

// ============================================================================
// Schema
// ============================================================================

export const DEFAULT_REGISTRATION_BASE_URL = "https://nva.sikt.no/registration/";

const EnvSchema = Type.Object({
  NVA_STAGING_DB: Type.String({ minLength: 1, default: "./data/nva_sync.db" }),
  CRISTIN_DATABASE_URL: Type.String({
    minLength: 1,
    default: "./data/cristin.db",
  }),
  NVA_REGISTRATION_BASE_URL: Type.String({
    pattern: "^https?://",
    default: DEFAULT_REGISTRATION_BASE_URL,
  }),
  SYNC_BATCH_SIZE: Type.Integer({ minimum: 1, maximum: 5000, default: 200 }),
});

type Env = Static<typeof EnvSchema>;

export interface SyncConfig {
  stagingDbPath: string;
  cristinDatabaseUrl: string;
  registrationBaseUrl: string;
  batchSize: number;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Read the sync configuration from environment variables.
 *
 * Unset or empty variables take their defaults; anything else must pass the
 * schema or a ConfigError listing every problem is thrown.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): SyncConfig {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.properties)) {
    const value = env[key]?.trim();
    if (value !== undefined && value !== "") {
      raw[key] = value;
    }
  }

  const candidate = Value.Convert(EnvSchema, Value.Default(EnvSchema, raw));

  if (!Value.Check(EnvSchema, candidate)) {
    const details = [...Value.Errors(EnvSchema, candidate)].map(
      (error) => `${error.path.replace(/^\//, "")}: ${error.message}`
    );
    throw new ConfigError("Invalid sync configuration", details);
  }

  return toSyncConfig(candidate);
}

function toSyncConfig(env: Env): SyncConfig {
  return {
    stagingDbPath: env.NVA_STAGING_DB,
    cristinDatabaseUrl: env.CRISTIN_DATABASE_URL,
    registrationBaseUrl: env.NVA_REGISTRATION_BASE_URL,
    batchSize: env.SYNC_BATCH_SIZE,
  };
}
