/**
 * Field Mapping - how each Cristin column is filled from an NVA record
 *
 * The table is data: one rule per column, either a constant or a list of
 * source paths (primary first, then fallbacks for the alternate result
 * shape) with a transform and a default. SchemaMapper interprets it.
 */

import {
  ABSENT,
  isStagingObject,
  type Absent,
  type StagingValue,
} from "./field-path.js";

import type { AuthorNameFormatter } from "./authors.js";
import type { LanguageCodeResolver } from "./language.js";
import type { CristinTable } from "../../db/schema.js";

// ============================================================================
// Types
// ============================================================================

export type MappedField = Exclude<keyof CristinTable, "PubID">;
export type MappedRow = Omit<CristinTable, "PubID">;

export type MappingNote =
  | { kind: "UNRECOGNIZED_LANGUAGE_CODE"; field: MappedField; value: string }
  | { kind: "UNFORMATTABLE_AUTHOR_NAME"; field: MappedField; value: string };

export interface TransformContext {
  field: MappedField;
  languages: LanguageCodeResolver;
  authors: AuthorNameFormatter;
  registrationBaseUrl: string;
  note: (note: MappingNote) => void;
}

export type Transform<T> = (
  value: StagingValue,
  context: TransformContext
) => T | Absent;

export interface ConstantRule<T> {
  kind: "constant";
  value: T;
}

export interface ExtractRule<T> {
  kind: "extract";
  paths: readonly string[];
  transform: Transform<T>;
  default: T | null;
}

/** Rule for a column holding `T | null` */
export type FieldRule<T> = ConstantRule<T | null> | ExtractRule<T>;

export type FieldMappingTable = {
  readonly [K in MappedField]: FieldRule<NonNullable<MappedRow[K]>>;
};

export const REQUIRED_FIELDS = ["Tittel", "Publiseringsaar"] as const;
export type RequiredField = (typeof REQUIRED_FIELDS)[number];

// ============================================================================
// Transforms
// ============================================================================

export const text: Transform<string> = (value) => {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? ABSENT : trimmed;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return ABSENT;
};

export const integer: Transform<number> = (value) => {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) ? value : ABSENT;
  }
  if (typeof value === "string" && /^[+-]?\d+$/.test(value.trim())) {
    const parsed = Number(value.trim());
    return Number.isSafeInteger(parsed) ? parsed : ABSENT;
  }
  return ABSENT;
};

const ISO_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?(?:Z|[+-]\d{2}(?::?\d{2})?)?)?$/i;

/**
 * "2024-03-05T08:09:10.123Z" -> "2024-03-05 08:09:10".
 *
 * The wall-clock time is kept as written; the offset is dropped.
 */
export function formatIsoDateTime(value: string): string | null {
  const match = ISO_DATE_TIME.exec(value.trim());
  if (match === null) {
    return null;
  }

  const [, year, month, day, hours = "00", minutes = "00", seconds = "00"] =
    match;
  if (year === undefined || month === undefined || day === undefined) {
    return null;
  }

  const date = new Date(
    Date.UTC(Number(year), Number(month) - 1, Number(day))
  );
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day) ||
    Number(hours) > 23 ||
    Number(minutes) > 59 ||
    Number(seconds) > 59
  ) {
    return null;
  }

  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds}`;
}

export const isoDateTime: Transform<string> = (value) => {
  if (typeof value !== "string") {
    return ABSENT;
  }
  return formatIsoDateTime(value) ?? ABSENT;
};

export const pageRange: Transform<string> = (value, context) => {
  if (!isStagingObject(value)) {
    return text(value, context);
  }

  const begin = readText(value.begin, context);
  const end = readText(value.end, context);

  if (begin !== ABSENT && end !== ABSENT) {
    return `${begin}-${end}`;
  }
  return begin !== ABSENT ? begin : end;
};

export const volume: Transform<string> = (value, context) => {
  if (isStagingObject(value)) {
    return readText(value.start, context);
  }
  return text(value, context);
};

export const languageCode: Transform<string> = (value, context) => {
  if (typeof value !== "string") {
    return ABSENT;
  }

  const resolution = context.languages.resolve(value);
  switch (resolution.status) {
    case "mapped":
      return resolution.code;
    case "unmapped":
      context.note({
        kind: "UNRECOGNIZED_LANGUAGE_CODE",
        field: context.field,
        value: resolution.uri,
      });
      return ABSENT;
    case "absent":
      return ABSENT;
  }
};

export const authorList: Transform<string> = (value, context) => {
  const values = Array.isArray(value) ? value : [value];
  const names = values.filter(
    (name): name is string => typeof name === "string"
  );

  const formatted = context.authors.format(names);
  if (formatted === ABSENT) {
    return ABSENT;
  }

  for (const name of formatted.unformattable) {
    context.note({
      kind: "UNFORMATTABLE_AUTHOR_NAME",
      field: context.field,
      value: name,
    });
  }
  return formatted.text;
};

/**
 * Public landing page of a registration. Accepts the bare identifier or the
 * full API id and keeps its last path segment.
 */
export const registrationUrl: Transform<string> = (value, context) => {
  const identifier = text(value, context);
  if (identifier === ABSENT) {
    return ABSENT;
  }

  const segment = identifier
    .split("/")
    .filter((part) => part !== "")
    .at(-1);
  if (segment === undefined) {
    return ABSENT;
  }

  const base = context.registrationBaseUrl.endsWith("/")
    ? context.registrationBaseUrl
    : `${context.registrationBaseUrl}/`;
  return `${base}${segment}`;
};

function readText(
  value: StagingValue | null | undefined,
  context: TransformContext
): string | Absent {
  return value === null || value === undefined ? ABSENT : text(value, context);
}

// ============================================================================
// Rule Builders
// ============================================================================

function constant<T>(value: T): ConstantRule<T> {
  return { kind: "constant", value };
}

function extract<T>(
  paths: string | readonly string[],
  transform: Transform<T>
): ExtractRule<T> {
  return {
    kind: "extract",
    paths: typeof paths === "string" ? [paths] : paths,
    transform,
    default: null,
  };
}

// ============================================================================
// Mapping Table
// ============================================================================

const REFERENCE = "entity_description.reference";
const CONTEXT = `${REFERENCE}.publication_context`;
const INSTANCE = `${REFERENCE}.publication_instance`;

export const FIELD_MAPPINGS: FieldMappingTable = {
  Tittel: extract("entity_description.main_title", text),
  Publiseringsaar: extract("entity_description.publication_date.year", integer),
  DatoRegistrert: extract("created_date", isoDateTime),
  DatoEndret: extract("modified_date", isoDateTime),
  Kategori: extract(`${CONTEXT}.type`, text),
  URL: extract(["identifier", "id"], registrationUrl),
  KategoriNavn: constant(null),
  Underkategori: extract(`${INSTANCE}.type`, text),
  Rapportserie: extract(`${CONTEXT}.series_number`, text),
  // Journal or series name only; the publisher goes to Utgiver
  Tidsskrift: extract(`${CONTEXT}.name`, text),
  TidsskriftNiva: constant(null),
  hefte: extract(`${INSTANCE}.issue`, text),
  volum: extract(`${INSTANCE}.volume`, volume),
  sider: extract(`${INSTANCE}.pages`, pageRange),
  issn: extract(
    [
      `${CONTEXT}.series.online_issn`,
      `${CONTEXT}.series.print_issn`,
      `${CONTEXT}.online_issn`,
      `${CONTEXT}.print_issn`,
    ],
    text
  ),
  ForedragArr: constant(null),
  Foredragsdato: constant(null),
  Authors: extract("entity_description.contributors[].identity.name", authorList),
  Skjul: constant(null),
  Featured: constant(null),
  Timestamp: constant(null),
  Tekst: extract("entity_description.abstract", text),
  Eier: extract("resource_owner.owner", text),
  DateLastModified: extract("modified_date", isoDateTime),
  isbn: extract([`${CONTEXT}.isbn_list[0]`, `${CONTEXT}.isbn`], text),
  Forlag: constant(null),
  BokNiva: constant(null),
  Referanse: constant(null),
  doi: extract(`${REFERENCE}.doi`, text),
  TilPubliste: constant(null),
  Utgiver: extract(`${CONTEXT}.publisher.name`, text),
  sprak: extract("entity_description.language", languageCode),
};
