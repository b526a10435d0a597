import { describe, it, expect } from "vitest";

import { AuthorNameFormatter } from "../../../../src/services/sync/authors.js";
import { ABSENT } from "../../../../src/services/sync/field-path.js";

describe("services/sync/authors", () => {
  const formatter = new AuthorNameFormatter();

  describe("formatName", () => {
    it("should put the last name first followed by initials", () => {
      expect(formatter.formatName("Anne Marie Olsen")).toEqual({
        text: "Olsen, A. M.",
        unformattable: false,
      });
    });

    it("should collapse extra whitespace", () => {
      expect(formatter.formatName("  Kari   Nordmann ")).toEqual({
        text: "Nordmann, K.",
        unformattable: false,
      });
    });

    it("should keep a single token as-is", () => {
      expect(formatter.formatName("Plato")).toEqual({
        text: "Plato",
        unformattable: true,
      });
    });
  });

  describe("format", () => {
    it("should join authors with commas and a final ampersand", () => {
      expect(
        formatter.format([
          "Øyvind Aas",
          "Sigurd Einum",
          "Anders Klemetsen",
          "Jostein Skurdal",
        ])
      ).toEqual({
        text: "Aas, Ø., Einum, S., Klemetsen, A. & Skurdal, J.",
        unformattable: [],
      });
    });

    it("should format a single author without separators", () => {
      expect(formatter.format(["Anne Marie Olsen"])).toEqual({
        text: "Olsen, A. M.",
        unformattable: [],
      });
    });

    it("should join two authors with an ampersand only", () => {
      expect(formatter.format(["Anne Marie Olsen", "Kari Berg"])).toEqual({
        text: "Olsen, A. M. & Berg, K.",
        unformattable: [],
      });
    });

    it("should report single-token names", () => {
      expect(formatter.format(["Plato", "Kari Berg"])).toEqual({
        text: "Plato & Berg, K.",
        unformattable: ["Plato"],
      });
    });

    it("should skip blank names", () => {
      expect(formatter.format(["", "Kari Berg", "  "])).toEqual({
        text: "Berg, K.",
        unformattable: [],
      });
    });

    it("should return ABSENT without any usable name", () => {
      expect(formatter.format([])).toBe(ABSENT);
      expect(formatter.format([" ", ""])).toBe(ABSENT);
    });
  });
});
