import { describe, it, expect, vi, beforeEach } from "vitest";

import { syncLogger } from "../../../../src/logger.js";
import { SchemaMapper } from "../../../../src/services/sync/mapper.js";
import {
  FULL_RECORD,
  LEXVO,
  TEST_REGISTRATION_BASE_URL,
  nvaRecord,
} from "../../../fixtures/nva.js";

vi.mock("../../../../src/logger.js", () => {
  const log = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
  return { logger: log, syncLogger: log, dbLogger: log, cliLogger: log };
});

describe("services/sync/mapper", () => {
  const mapper = new SchemaMapper({
    registrationBaseUrl: TEST_REGISTRATION_BASE_URL,
  });

  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe("mapRecord", () => {
    it("should map every column of a complete record", () => {
      const outcome = mapper.mapRecord(FULL_RECORD);

      expect(outcome).toEqual({
        ok: true,
        recordId: "0198cc2a-1111-4bd5-9c1e-000000000001",
        identity: { title: "salmon habitat in northern rivers", year: 2023 },
        notes: [],
        row: {
          Tittel: "Salmon habitat in northern rivers",
          Publiseringsaar: 2023,
          DatoRegistrert: "2024-03-05 08:09:10",
          DatoEndret: "2024-04-01 12:00:00",
          Kategori: "Journal",
          URL: "https://nva.test/registration/0198cc2a-1111-4bd5-9c1e-000000000001",
          KategoriNavn: null,
          Underkategori: "AcademicArticle",
          Rapportserie: null,
          Tidsskrift: "Test Journal of Ecology",
          TidsskriftNiva: null,
          hefte: "4",
          volum: "12",
          sider: "101-118",
          issn: "1234-5678",
          ForedragArr: null,
          Foredragsdato: null,
          Authors: "Aas, Ø., Einum, S., Klemetsen, A. & Skurdal, J.",
          Skjul: null,
          Featured: null,
          Timestamp: null,
          Tekst: "Test abstract.",
          Eier: "test-owner@100.0.0.0",
          DateLastModified: "2024-04-01 12:00:00",
          isbn: "978-82-000-0000-1",
          Forlag: null,
          BokNiva: null,
          Referanse: null,
          doi: "https://doi.org/10.1234/test.5678",
          TilPubliste: null,
          Utgiver: "Test Publisher",
          sprak: "NOB",
        },
      });
    });

    it("should fill optional columns with null when absent", () => {
      const outcome = mapper.mapRecord(
        nvaRecord({ identifier: "rec-1", title: "Only a title", year: 2021 })
      );

      expect(outcome.ok).toBe(true);
      if (!outcome.ok) return;
      expect(outcome.row.Authors).toBeNull();
      expect(outcome.row.sprak).toBeNull();
      expect(outcome.row.isbn).toBeNull();
      expect(outcome.row.URL).toBe("https://nva.test/registration/rec-1");
    });

    it("should use the fallback paths of the alternate record shape", () => {
      const outcome = mapper.mapRecord({
        id: "https://api.nva.test/publication/alt-7",
        entity_description: {
          main_title: "Alternate shape",
          publication_date: { year: 2022 },
          reference: {
            publication_context: {
              isbn: "978-82-000-0000-2",
              online_issn: "3333-4444",
              series: { print_issn: "1111-2222" },
            },
          },
        },
      });

      expect(outcome.ok).toBe(true);
      if (!outcome.ok) return;
      expect(outcome.recordId).toBe("https://api.nva.test/publication/alt-7");
      expect(outcome.row.URL).toBe("https://nva.test/registration/alt-7");
      expect(outcome.row.isbn).toBe("978-82-000-0000-2");
      expect(outcome.row.issn).toBe("1111-2222");
    });

    it("should reject a record without a title", () => {
      expect(mapper.mapRecord(nvaRecord({ identifier: "rec-2", year: 2020 }))).toEqual({
        ok: false,
        recordId: "rec-2",
        missing: ["Tittel"],
        notes: [],
      });
    });

    it("should reject a record whose year is not a number", () => {
      const outcome = mapper.mapRecord(
        nvaRecord({ identifier: "rec-3", title: "Undated", year: "n.d." })
      );

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.missing).toEqual(["Publiseringsaar"]);
    });

    it("should list every missing required field", () => {
      const outcome = mapper.mapRecord(nvaRecord({ identifier: "rec-4", title: "   " }));

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.missing).toEqual(["Tittel", "Publiseringsaar"]);
    });

    it("should collect notes for unmapped languages and odd author names", () => {
      const outcome = mapper.mapRecord(
        nvaRecord({
          identifier: "rec-5",
          title: "Notes",
          year: 2020,
          language: LEXVO.swe,
          contributors: ["Plato", "Kari Berg"],
        })
      );

      expect(outcome.ok).toBe(true);
      if (!outcome.ok) return;
      expect(outcome.row.sprak).toBeNull();
      expect(outcome.row.Authors).toBe("Plato & Berg, K.");
      expect(outcome.notes).toEqual([
        { kind: "UNFORMATTABLE_AUTHOR_NAME", field: "Authors", value: "Plato" },
        { kind: "UNRECOGNIZED_LANGUAGE_CODE", field: "sprak", value: LEXVO.swe },
      ]);
    });
  });

  describe("logging", () => {
    it("should log absent optional fields but not absent required ones", () => {
      mapper.mapRecord(nvaRecord({ identifier: "rec-6" }));

      const fields = vi
        .mocked(syncLogger.debug)
        .mock.calls.filter(
          ([, message]) => message === "Optional source value absent"
        )
        .map(([context]) => context);

      expect(fields).toContainEqual({ recordId: "rec-6", field: "Authors" });
      expect(fields).not.toContainEqual({ recordId: "rec-6", field: "Tittel" });
      expect(fields).not.toContainEqual({
        recordId: "rec-6",
        field: "Publiseringsaar",
      });
    });
  });

  describe("recordId", () => {
    it("should fall back to the staging row id", () => {
      expect(mapper.recordId({ _dlt_id: "dlt-9" })).toBe("dlt-9");
      expect(mapper.recordId({})).toBe("<unknown>");
    });
  });
});
