import type { Insertable } from "kysely";

// ============================================================================
// Cristin (target)
// ============================================================================

export interface CristinTable {
  PubID: number;
  Tittel: string | null;
  Publiseringsaar: number | null;
  DatoRegistrert: string | null;
  DatoEndret: string | null;
  Kategori: string | null;
  URL: string | null;
  KategoriNavn: string | null;
  Underkategori: string | null;
  Rapportserie: string | null;
  Tidsskrift: string | null;
  TidsskriftNiva: string | null;
  hefte: string | null;
  volum: string | null;
  sider: string | null;
  issn: string | null;
  ForedragArr: string | null;
  Foredragsdato: string | null;
  Authors: string | null;
  Skjul: number | null;
  Featured: number | null;
  Timestamp: string | null;
  Tekst: string | null;
  Eier: string | null;
  DateLastModified: string | null;
  isbn: string | null;
  Forlag: string | null;
  BokNiva: string | null;
  Referanse: string | null;
  doi: string | null;
  TilPubliste: string | null;
  Utgiver: string | null;
  sprak: string | null;
}

export type CristinColumn = keyof CristinTable;

/**
 * Column order of the Cristin table, with the SQL type each column is
 * created with.
 */
export const CRISTIN_COLUMNS = [
  { name: "PubID", type: "integer" },
  { name: "Tittel", type: "text" },
  { name: "Publiseringsaar", type: "integer" },
  { name: "DatoRegistrert", type: "text" },
  { name: "DatoEndret", type: "text" },
  { name: "Kategori", type: "text" },
  { name: "URL", type: "text" },
  { name: "KategoriNavn", type: "text" },
  { name: "Underkategori", type: "text" },
  { name: "Rapportserie", type: "text" },
  { name: "Tidsskrift", type: "text" },
  { name: "TidsskriftNiva", type: "text" },
  { name: "hefte", type: "text" },
  { name: "volum", type: "text" },
  { name: "sider", type: "text" },
  { name: "issn", type: "text" },
  { name: "ForedragArr", type: "text" },
  { name: "Foredragsdato", type: "text" },
  { name: "Authors", type: "text" },
  { name: "Skjul", type: "integer" },
  { name: "Featured", type: "integer" },
  { name: "Timestamp", type: "text" },
  { name: "Tekst", type: "text" },
  { name: "Eier", type: "text" },
  { name: "DateLastModified", type: "text" },
  { name: "isbn", type: "text" },
  { name: "Forlag", type: "text" },
  { name: "BokNiva", type: "text" },
  { name: "Referanse", type: "text" },
  { name: "doi", type: "text" },
  { name: "TilPubliste", type: "text" },
  { name: "Utgiver", type: "text" },
  { name: "sprak", type: "text" },
] as const satisfies readonly {
  name: CristinColumn;
  type: "integer" | "text";
}[];

export interface CristinDatabase {
  Cristin: CristinTable;
}

export type NewCristinRow = Insertable<CristinTable>;

// ============================================================================
// NVA staging (written by the harvester)
// ============================================================================

// The harvester flattens nested objects into `a__b__c` columns and moves
// lists into child tables linked by `_dlt_parent_id`.
export const NVA_RESOURCES_TABLE = "resources";
export const NVA_CONTRIBUTORS_TABLE =
  "resources__entity_description__contributors";
export const NVA_ISBN_LIST_TABLE =
  "resources__entity_description__reference__publication_context__isbn_list";

export interface NvaResourcesTable {
  _dlt_id: string;
  _dlt_load_id: string | null;
  identifier: string | null;
  id: string | null;
  entity_description__main_title: string | null;
  entity_description__publication_date__year: string | null;
  created_date: string | null;
  modified_date: string | null;
}

export interface NvaChildTable {
  _dlt_id: string;
  _dlt_parent_id: string;
  _dlt_list_idx: number;
}

export interface NvaContributorsTable extends NvaChildTable {
  identity__name: string | null;
}

export interface NvaIsbnListTable extends NvaChildTable {
  value: string | null;
}

export interface NvaDatabase {
  [NVA_RESOURCES_TABLE]: NvaResourcesTable;
  [NVA_CONTRIBUTORS_TABLE]: NvaContributorsTable;
  [NVA_ISBN_LIST_TABLE]: NvaIsbnListTable;
}
