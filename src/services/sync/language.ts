/**
 * Language Code Resolver - NVA lexvo URIs to Cristin language codes
 *
 * Every supported language is listed explicitly. URIs that are not in the
 * table are reported back as unmapped so the caller can record the gap.
 */

// ============================================================================
// Mapping Table
// ============================================================================

export const LANGUAGE_CODES: Readonly<Record<string, string>> = {
  "http://lexvo.org/id/iso639-3/eng": "EN",
  "http://lexvo.org/id/iso639-3/nor": "NO",
  "http://lexvo.org/id/iso639-3/nob": "NOB",
};

// ============================================================================
// Types
// ============================================================================

export type LanguageResolution =
  | { status: "mapped"; code: string }
  | { status: "unmapped"; uri: string }
  | { status: "absent" };

// ============================================================================
// Resolver
// ============================================================================

export class LanguageCodeResolver {
  private readonly codes: ReadonlyMap<string, string>;

  constructor(table: Readonly<Record<string, string>> = LANGUAGE_CODES) {
    this.codes = new Map(Object.entries(table));
  }

  resolve(uri: string | null | undefined): LanguageResolution {
    const trimmed = uri?.trim() ?? "";
    if (trimmed === "") {
      return { status: "absent" };
    }

    const code = this.codes.get(trimmed);
    return code !== undefined
      ? { status: "mapped", code }
      : { status: "unmapped", uri: trimmed };
  }
}
