/**
 * NVA Staging Source - rebuilds harvested publications as record trees
 *
 * The harvester lands each NVA resource as one row with `a__b__c` columns,
 * and every list as a child table keyed by `_dlt_parent_id`. This reader
 * turns both back into nested records so the mapper can address values by
 * dotted path.
 */

import { sql, type Kysely } from "kysely";

import { SourceUnavailableError, errorMessage } from "../errors.js";
import { dbLogger } from "../logger.js";
import {
  isStagingObject,
  type StagingObject,
  type StagingRecord,
  type StagingValue,
} from "../services/sync/field-path.js";
import {
  NVA_CONTRIBUTORS_TABLE,
  NVA_ISBN_LIST_TABLE,
  NVA_RESOURCES_TABLE,
  type NvaDatabase,
} from "./schema.js";

import type { StagingSource } from "../services/sync/orchestrator.js";

// ============================================================================
// Types
// ============================================================================

interface ChildTable {
  table: string;
  /** Where the ordered list is attached in the parent record */
  path: readonly string[];
}

const CHILD_TABLES: readonly ChildTable[] = [
  {
    table: NVA_CONTRIBUTORS_TABLE,
    path: ["entity_description", "contributors"],
  },
  {
    table: NVA_ISBN_LIST_TABLE,
    path: [
      "entity_description",
      "reference",
      "publication_context",
      "isbn_list",
    ],
  },
];

const COLUMN_SEPARATOR = "__";

type RawRow = Record<string, unknown>;

// ============================================================================
// Row Conversion
// ============================================================================

function toStagingValue(value: unknown): StagingValue | null {
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return null;
}

/**
 * Create intermediate objects along `keys` and return the innermost one,
 * or null when a scalar already sits on the way.
 */
function descend(
  target: StagingObject,
  keys: readonly string[]
): StagingObject | null {
  let node = target;
  for (const key of keys) {
    const next = node[key];
    if (next === undefined || next === null) {
      const created: StagingObject = {};
      node[key] = created;
      node = created;
    } else if (isStagingObject(next)) {
      node = next;
    } else {
      return null;
    }
  }
  return node;
}

/**
 * `{ "a__b": 1, "a__c": null }` -> `{ a: { b: 1 } }`
 */
export function unflattenRow(
  row: RawRow,
  options: { dropInternal?: boolean } = {}
): StagingObject {
  const record: StagingObject = {};

  for (const [column, raw] of Object.entries(row)) {
    if (options.dropInternal === true && column.startsWith("_dlt_")) continue;

    const value = toStagingValue(raw);
    if (value === null) continue;

    const keys = column.split(COLUMN_SEPARATOR);
    const leaf = keys.pop();
    if (leaf === undefined || leaf === "") continue;

    const parent = descend(record, keys);
    if (parent === null || isStagingObject(parent[leaf])) {
      dbLogger.debug({ column }, "Conflicting staging column skipped");
      continue;
    }
    parent[leaf] = value;
  }

  return record;
}

/**
 * A child row holding a scalar list item has a single `value` column.
 */
function childValue(row: RawRow): StagingValue | null {
  const item = unflattenRow(row, { dropInternal: true });
  const keys = Object.keys(item);
  if (keys.length === 1 && keys[0] === "value") {
    return item.value ?? null;
  }
  return keys.length > 0 ? item : null;
}

// ============================================================================
// Staging Source
// ============================================================================

export class NvaStagingSource implements StagingSource {
  constructor(private readonly db: Kysely<NvaDatabase>) {}

  async loadRecords(): Promise<StagingRecord[]> {
    const tables = await this.listTables();

    if (!tables.has(NVA_RESOURCES_TABLE)) {
      throw new SourceUnavailableError(
        `Staging table "${NVA_RESOURCES_TABLE}" not found; has the NVA harvest run?`
      );
    }

    const result = await sql<RawRow>`
      SELECT * FROM ${sql.table(NVA_RESOURCES_TABLE)}
    `.execute(this.db);

    const records: StagingRecord[] = [];
    const byDltId = new Map<string, StagingObject>();

    for (const row of result.rows) {
      const record = unflattenRow(row);
      records.push(record);
      if (typeof row._dlt_id === "string") {
        byDltId.set(row._dlt_id, record);
      }
    }

    for (const child of CHILD_TABLES) {
      if (!tables.has(child.table)) {
        dbLogger.debug({ table: child.table }, "Child table not present");
        continue;
      }
      await this.attachChildren(child, byDltId);
    }

    dbLogger.info({ records: records.length }, "Read NVA staging records");
    return records;
  }

  async countRecords(): Promise<number> {
    const tables = await this.listTables();
    if (!tables.has(NVA_RESOURCES_TABLE)) {
      return 0;
    }
    const result = await this.db
      .selectFrom(NVA_RESOURCES_TABLE)
      .select((eb) => eb.fn.countAll<number>().as("count"))
      .executeTakeFirst();
    return Number(result?.count ?? 0);
  }

  private async listTables(): Promise<Set<string>> {
    try {
      const tables = await this.db.introspection.getTables();
      return new Set(tables.map((table) => table.name));
    } catch (error) {
      throw new SourceUnavailableError(
        `Cannot inspect NVA staging database: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  private async attachChildren(
    child: ChildTable,
    parents: ReadonlyMap<string, StagingObject>
  ): Promise<void> {
    const result = await sql<RawRow>`
      SELECT * FROM ${sql.table(child.table)}
      ORDER BY _dlt_parent_id, _dlt_list_idx
    `.execute(this.db);

    const listKey = child.path.at(-1);
    if (listKey === undefined) {
      return;
    }

    let orphans = 0;
    for (const row of result.rows) {
      const parent =
        typeof row._dlt_parent_id === "string"
          ? parents.get(row._dlt_parent_id)
          : undefined;
      if (parent === undefined) {
        orphans++;
        continue;
      }

      const value = childValue(row);
      const holder = descend(parent, child.path.slice(0, -1));
      if (value === null || holder === null) continue;

      const list = holder[listKey];
      if (Array.isArray(list)) {
        list.push(value);
      } else {
        holder[listKey] = [value];
      }
    }

    if (orphans > 0) {
      dbLogger.warn(
        { table: child.table, orphans },
        "Child rows without a parent resource"
      );
    }
  }
}
