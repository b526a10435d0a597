// Sync Services - Re-exports
export {
  SyncOrchestrator,
  synchronize,
  type CristinTarget,
  type StagingSource,
  type SyncOptions,
  type SyncProgress,
  type SyncState,
} from "./orchestrator.js";
export {
  SchemaMapper,
  type CandidateRow,
  type MappingOutcome,
  type SchemaMapperOptions,
} from "./mapper.js";
export {
  FIELD_MAPPINGS,
  REQUIRED_FIELDS,
  formatIsoDateTime,
  type FieldMappingTable,
  type FieldRule,
  type MappedField,
  type MappedRow,
  type MappingNote,
  type RequiredField,
  type Transform,
  type TransformContext,
} from "./field-mapping.js";
export {
  ABSENT,
  extractFirst,
  extractPath,
  type Absent,
  type StagingRecord,
  type StagingValue,
} from "./field-path.js";
export { AuthorNameFormatter, type FormattedAuthors } from "./authors.js";
export {
  LANGUAGE_CODES,
  LanguageCodeResolver,
  type LanguageResolution,
} from "./language.js";
export {
  Deduplicator,
  identityKey,
  normalizeTitle,
  type DedupVerdict,
  type IdentityKey,
} from "./dedup.js";
export { IdAllocator } from "./id-allocator.js";
export {
  SyncReportBuilder,
  type MappingGap,
  type SkipEntry,
  type SyncReport,
  type SyncWarning,
} from "./report.js";
export {
  closeDatabase,
  openCristinDatabase,
  openStagingDatabase,
} from "../../db/connection.js";
export { CristinStore, type CristinStoreOptions } from "../../db/cristin-store.js";
export { ensureCristinTable, hasCristinTable } from "../../db/migrate.js";
export { NvaStagingSource } from "../../db/nva-staging.js";
export * from "../../errors.js";
