/**
 * Schema Mapper - one NVA staging record to one Cristin candidate row
 *
 * Interprets the FieldMapping table. Missing optional values fall back to
 * the rule's default; a record is rejected only when a required column
 * (Tittel, Publiseringsaar) ends up empty.
 */

import { syncLogger } from "../../logger.js";
import { CRISTIN_COLUMNS } from "../../db/schema.js";
import { AuthorNameFormatter } from "./authors.js";
import { identityKey, type IdentityKey } from "./dedup.js";
import {
  FIELD_MAPPINGS,
  REQUIRED_FIELDS,
  type FieldMappingTable,
  type FieldRule,
  type MappedField,
  type MappedRow,
  type MappingNote,
  type RequiredField,
  type TransformContext,
} from "./field-mapping.js";
import {
  ABSENT,
  extractFirst,
  type StagingRecord,
} from "./field-path.js";
import { LanguageCodeResolver } from "./language.js";

// ============================================================================
// Types
// ============================================================================

/** A mapped row that carries every required column; PubID comes later */
export interface CandidateRow extends MappedRow {
  Tittel: string;
  Publiseringsaar: number;
}

export type MappingOutcome =
  | {
      ok: true;
      recordId: string;
      row: CandidateRow;
      identity: IdentityKey;
      notes: MappingNote[];
    }
  | {
      ok: false;
      recordId: string;
      missing: RequiredField[];
      notes: MappingNote[];
    };

export interface SchemaMapperOptions {
  registrationBaseUrl: string;
  languages?: LanguageCodeResolver;
  authors?: AuthorNameFormatter;
  mappings?: FieldMappingTable;
}

const RECORD_ID_PATHS = ["identifier", "id", "_dlt_id"] as const;

const REQUIRED: ReadonlySet<MappedField> = new Set<MappedField>(REQUIRED_FIELDS);

// ============================================================================
// Schema Mapper
// ============================================================================

export class SchemaMapper {
  private readonly languages: LanguageCodeResolver;
  private readonly authors: AuthorNameFormatter;
  private readonly mappings: FieldMappingTable;
  private readonly registrationBaseUrl: string;

  constructor(options: SchemaMapperOptions) {
    this.languages = options.languages ?? new LanguageCodeResolver();
    this.authors = options.authors ?? new AuthorNameFormatter();
    this.mappings = options.mappings ?? FIELD_MAPPINGS;
    this.registrationBaseUrl = options.registrationBaseUrl;
  }

  /**
   * Identifier used in skip reasons and logs
   */
  recordId(record: StagingRecord): string {
    const value = extractFirst(record, RECORD_ID_PATHS);
    return typeof value === "string" || typeof value === "number"
      ? String(value)
      : "<unknown>";
  }

  mapRecord(record: StagingRecord): MappingOutcome {
    const recordId = this.recordId(record);
    const notes: MappingNote[] = [];
    const row = emptyRow();

    for (const column of CRISTIN_COLUMNS) {
      if (column.name === "PubID") continue;
      this.applyRule(record, recordId, row, column.name, notes);
    }

    const missing = REQUIRED_FIELDS.filter((field) => row[field] === null);
    const { Tittel: title, Publiseringsaar: year } = row;

    if (title === null || year === null) {
      return { ok: false, recordId, missing, notes };
    }

    return {
      ok: true,
      recordId,
      row: { ...row, Tittel: title, Publiseringsaar: year },
      identity: identityKey(title, year),
      notes,
    };
  }

  private applyRule<K extends MappedField>(
    record: StagingRecord,
    recordId: string,
    row: MappedRow,
    field: K,
    notes: MappingNote[]
  ): void {
    const rule: FieldRule<NonNullable<MappedRow[K]>> = this.mappings[field];

    if (rule.kind === "constant") {
      row[field] = rule.value;
      return;
    }

    const raw = extractFirst(record, rule.paths);
    if (raw === ABSENT) {
      // Required fields are reported through the invalid outcome instead
      if (!REQUIRED.has(field)) {
        syncLogger.debug({ recordId, field }, "Optional source value absent");
      }
      row[field] = rule.default;
      return;
    }

    const context: TransformContext = {
      field,
      languages: this.languages,
      authors: this.authors,
      registrationBaseUrl: this.registrationBaseUrl,
      note: (note) => notes.push(note),
    };

    const value = rule.transform(raw, context);
    if (value === ABSENT) {
      syncLogger.debug(
        { recordId, field, paths: rule.paths },
        "Source value could not be transformed, using default"
      );
      row[field] = rule.default;
      return;
    }

    row[field] = value;
  }
}

function emptyRow(): MappedRow {
  return {
    Tittel: null,
    Publiseringsaar: null,
    DatoRegistrert: null,
    DatoEndret: null,
    Kategori: null,
    URL: null,
    KategoriNavn: null,
    Underkategori: null,
    Rapportserie: null,
    Tidsskrift: null,
    TidsskriftNiva: null,
    hefte: null,
    volum: null,
    sider: null,
    issn: null,
    ForedragArr: null,
    Foredragsdato: null,
    Authors: null,
    Skjul: null,
    Featured: null,
    Timestamp: null,
    Tekst: null,
    Eier: null,
    DateLastModified: null,
    isbn: null,
    Forlag: null,
    BokNiva: null,
    Referanse: null,
    doi: null,
    TilPubliste: null,
    Utgiver: null,
    sprak: null,
  };
}
