import { describe, it, expect } from "vitest";

import {
  ABSENT,
  extractFirst,
  extractPath,
  parsePath,
  type StagingRecord,
} from "../../../../src/services/sync/field-path.js";

const record: StagingRecord = {
  identifier: "rec-1",
  empty_list: [],
  nothing: null,
  entity_description: {
    main_title: "A title",
    contributors: [
      { identity: { name: "Kari Nordmann" } },
      { identity: {} },
      null,
      { identity: { name: "Ola Nordmann" } },
    ],
    reference: {
      publication_context: { isbn_list: ["978-0", "978-1"] },
    },
  },
};

describe("services/sync/field-path", () => {
  describe("parsePath", () => {
    it("should parse keys, indexes and wildcards", () => {
      expect(parsePath("a.b[2].c[]")).toEqual([
        { key: "a", kind: "key" },
        { key: "b", kind: "index", index: 2 },
        { key: "c", kind: "wildcard" },
      ]);
    });

    it("should return null for malformed paths", () => {
      expect(parsePath("a..b")).toBeNull();
      expect(parsePath("a[x]")).toBeNull();
      expect(parsePath("[0]")).toBeNull();
    });
  });

  describe("extractPath", () => {
    it("should read nested values", () => {
      expect(extractPath(record, "entity_description.main_title")).toBe(
        "A title"
      );
    });

    it("should read indexed list elements", () => {
      expect(
        extractPath(
          record,
          "entity_description.reference.publication_context.isbn_list[1]"
        )
      ).toBe("978-1");
      expect(
        extractPath(
          record,
          "entity_description.reference.publication_context.isbn_list[5]"
        )
      ).toBe(ABSENT);
    });

    it("should collect present values under a wildcard", () => {
      expect(
        extractPath(record, "entity_description.contributors[].identity.name")
      ).toEqual(["Kari Nordmann", "Ola Nordmann"]);
    });

    it("should return ABSENT when a wildcard matches nothing", () => {
      expect(
        extractPath(record, "entity_description.contributors[].orcid")
      ).toBe(ABSENT);
    });

    it("should treat missing, null and empty values as ABSENT", () => {
      expect(extractPath(record, "entity_description.abstract")).toBe(ABSENT);
      expect(extractPath(record, "nothing")).toBe(ABSENT);
      expect(extractPath(record, "empty_list")).toBe(ABSENT);
      expect(extractPath(record, "nothing.deeper")).toBe(ABSENT);
    });

    it("should not descend through scalars", () => {
      expect(extractPath(record, "identifier.value")).toBe(ABSENT);
      expect(extractPath(record, "identifier[0]")).toBe(ABSENT);
    });

    it("should return ABSENT for a malformed path", () => {
      expect(extractPath(record, "entity_description..main_title")).toBe(
        ABSENT
      );
    });
  });

  describe("extractFirst", () => {
    it("should fall back to later paths", () => {
      expect(
        extractFirst(record, ["id", "entity_description.main_title"])
      ).toBe("A title");
    });

    it("should prefer the primary path", () => {
      expect(extractFirst(record, ["identifier", "entity_description.main_title"])).toBe(
        "rec-1"
      );
    });

    it("should return ABSENT when no path is present", () => {
      expect(extractFirst(record, ["id", "doi"])).toBe(ABSENT);
      expect(extractFirst(record, [])).toBe(ABSENT);
    });
  });
});
