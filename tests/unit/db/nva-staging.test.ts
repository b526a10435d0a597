import { sql, type Kysely } from "kysely";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { NvaStagingSource, unflattenRow } from "../../../src/db/nva-staging.js";
import { NVA_CONTRIBUTORS_TABLE, NVA_ISBN_LIST_TABLE } from "../../../src/db/schema.js";
import { SourceUnavailableError } from "../../../src/errors.js";
import {
  createContributorsTable,
  createIsbnListTable,
  createResourcesTable,
  memoryStagingDb,
  stageResources,
} from "../../mocks/databases.js";

import type { NvaDatabase } from "../../../src/db/schema.js";

vi.mock("../../../src/logger.js", () => {
  const log = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
  return { logger: log, syncLogger: log, dbLogger: log, cliLogger: log };
});

describe("db/nva-staging", () => {
  describe("unflattenRow", () => {
    it("should nest double-underscore columns and drop nulls", () => {
      expect(
        unflattenRow({
          _dlt_id: "d1",
          a__b: 1,
          a__c: null,
          x: "y",
          only__null: null,
        })
      ).toEqual({ _dlt_id: "d1", a: { b: 1 }, x: "y" });
    });

    it("should keep the first value when columns collide", () => {
      expect(unflattenRow({ a: "x", a__b: "y" })).toEqual({ a: "x" });
    });

    it("should convert bigints and dates", () => {
      expect(
        unflattenRow({
          n: BigInt(42),
          at: new Date("2024-01-02T03:04:05.000Z"),
          flag: true,
        })
      ).toEqual({ n: 42, at: "2024-01-02T03:04:05.000Z", flag: true });
    });

    it("should drop staging bookkeeping columns on request", () => {
      expect(
        unflattenRow(
          { _dlt_id: "c1", _dlt_parent_id: "d1", identity__name: "Kari Berg" },
          { dropInternal: true }
        )
      ).toEqual({ identity: { name: "Kari Berg" } });
    });
  });

  describe("NvaStagingSource", () => {
    let db: Kysely<NvaDatabase>;

    beforeEach(() => {
      db = memoryStagingDb();
    });

    afterEach(async () => {
      await db.destroy();
    });

    it("should rebuild records with their child lists in order", async () => {
      await createResourcesTable(db);
      await createContributorsTable(db);
      await createIsbnListTable(db);
      await stageResources(db, [
        {
          dltId: "d1",
          identifier: "rec-1",
          title: "Fish",
          year: "2020",
          contributors: ["Kari Berg", "Ola Nordmann"],
        },
        { dltId: "d2", identifier: "rec-2", title: "Lakes", year: "2021" },
      ]);
      await sql`
        INSERT INTO ${sql.table(NVA_CONTRIBUTORS_TABLE)}
          (_dlt_id, _dlt_parent_id, _dlt_list_idx, identity__name, role__type)
        VALUES ('c-b', 'd2', 1, 'Second Author', 'Creator'),
               ('c-a', 'd2', 0, 'First Author', NULL),
               ('c-x', 'missing', 0, 'Orphan Author', NULL)
      `.execute(db);
      await sql`
        INSERT INTO ${sql.table(NVA_ISBN_LIST_TABLE)}
          (_dlt_id, _dlt_parent_id, _dlt_list_idx, value)
        VALUES ('i-1', 'd2', 0, '978-82-000-0000-3')
      `.execute(db);

      const records = await new NvaStagingSource(db).loadRecords();

      expect(records).toEqual([
        {
          _dlt_id: "d1",
          identifier: "rec-1",
          entity_description: {
            main_title: "Fish",
            publication_date: { year: "2020" },
            contributors: [
              { identity: { name: "Kari Berg" } },
              { identity: { name: "Ola Nordmann" } },
            ],
          },
        },
        {
          _dlt_id: "d2",
          identifier: "rec-2",
          entity_description: {
            main_title: "Lakes",
            publication_date: { year: "2021" },
            contributors: [
              { identity: { name: "First Author" } },
              { identity: { name: "Second Author" }, role: { type: "Creator" } },
            ],
            reference: {
              publication_context: { isbn_list: ["978-82-000-0000-3"] },
            },
          },
        },
      ]);
    });

    it("should read records when child tables are missing", async () => {
      await createResourcesTable(db);
      await stageResources(db, [
        { dltId: "d1", identifier: "rec-1", title: "Fish", year: "2020" },
      ]);

      const records = await new NvaStagingSource(db).loadRecords();

      expect(records).toEqual([
        {
          _dlt_id: "d1",
          identifier: "rec-1",
          entity_description: {
            main_title: "Fish",
            publication_date: { year: "2020" },
          },
        },
      ]);
    });

    it("should fail when the resources table is missing", async () => {
      await expect(new NvaStagingSource(db).loadRecords()).rejects.toThrow(
        SourceUnavailableError
      );
    });

    it("should count staged resources", async () => {
      const source = new NvaStagingSource(db);
      expect(await source.countRecords()).toBe(0);

      await createResourcesTable(db);
      await stageResources(db, [
        { dltId: "d1", identifier: "rec-1" },
        { dltId: "d2", identifier: "rec-2" },
      ]);

      expect(await source.countRecords()).toBe(2);
    });
  });
});
