/**
 * Run-fatal errors raised by the sync engine and its adapters.
 *
 * Record-level problems (missing title, duplicates, unmapped languages) are
 * not errors; they end up in the SyncReport.
 */

// ============================================================================
// Custom Error Classes
// ============================================================================

export class SourceUnavailableError extends Error {
  code = "SOURCE_UNAVAILABLE" as const;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SourceUnavailableError";
  }
}

export class TargetUnavailableError extends Error {
  code = "TARGET_UNAVAILABLE" as const;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TargetUnavailableError";
  }
}

export class PersistenceError extends Error {
  code = "PERSISTENCE_FAILURE" as const;
  attemptedRows: number;

  constructor(message: string, attemptedRows: number, options?: ErrorOptions) {
    super(message, options);
    this.name = "PersistenceError";
    this.attemptedRows = attemptedRows;
  }
}

export class SyncAbortedError extends Error {
  code = "SYNC_ABORTED" as const;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SyncAbortedError";
  }
}

export class ConfigError extends Error {
  code = "CONFIG_ERROR" as const;
  details: string[];

  constructor(message: string, details: string[]) {
    super(message);
    this.name = "ConfigError";
    this.details = details;
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
