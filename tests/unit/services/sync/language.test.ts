import { describe, it, expect } from "vitest";

import { LanguageCodeResolver } from "../../../../src/services/sync/language.js";
import { LEXVO } from "../../../fixtures/nva.js";

describe("services/sync/language", () => {
  const resolver = new LanguageCodeResolver();

  it("should map the supported lexvo URIs", () => {
    expect(resolver.resolve(LEXVO.eng)).toEqual({ status: "mapped", code: "EN" });
    expect(resolver.resolve(LEXVO.nor)).toEqual({ status: "mapped", code: "NO" });
    expect(resolver.resolve(LEXVO.nob)).toEqual({
      status: "mapped",
      code: "NOB",
    });
  });

  it("should ignore surrounding whitespace", () => {
    expect(resolver.resolve(`  ${LEXVO.eng} `)).toEqual({
      status: "mapped",
      code: "EN",
    });
  });

  it("should report URIs missing from the table as unmapped", () => {
    expect(resolver.resolve(LEXVO.swe)).toEqual({
      status: "unmapped",
      uri: LEXVO.swe,
    });
  });

  it("should not match on a partial URI", () => {
    expect(resolver.resolve("eng")).toEqual({ status: "unmapped", uri: "eng" });
  });

  it("should treat empty input as absent", () => {
    expect(resolver.resolve("")).toEqual({ status: "absent" });
    expect(resolver.resolve("   ")).toEqual({ status: "absent" });
    expect(resolver.resolve(null)).toEqual({ status: "absent" });
    expect(resolver.resolve(undefined)).toEqual({ status: "absent" });
  });

  it("should accept a custom table", () => {
    const custom = new LanguageCodeResolver({ [LEXVO.swe]: "SV" });
    expect(custom.resolve(LEXVO.swe)).toEqual({ status: "mapped", code: "SV" });
    expect(custom.resolve(LEXVO.eng).status).toBe("unmapped");
  });
});
