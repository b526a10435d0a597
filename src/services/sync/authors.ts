/**
 * Author Name Formatter
 *
 * Renders ordered contributor names as Cristin's single author string:
 * "Aas, Ø., Einum, S., Klemetsen, A. & Skurdal, J."
 */

import { ABSENT, type Absent } from "./field-path.js";

// ============================================================================
// Types
// ============================================================================

export interface FormattedName {
  text: string;
  /** True when no last name could be split off */
  unformattable: boolean;
}

export interface FormattedAuthors {
  text: string;
  /** Names rendered verbatim because they had a single token */
  unformattable: string[];
}

// ============================================================================
// Formatter
// ============================================================================

export class AuthorNameFormatter {
  /**
   * "Anne Marie Olsen" -> "Olsen, A. M."; single tokens pass through.
   */
  formatName(name: string): FormattedName {
    const tokens = name.trim().split(/\s+/).filter((token) => token !== "");
    const lastName = tokens.at(-1);

    if (tokens.length < 2 || lastName === undefined) {
      return { text: tokens.join(" "), unformattable: true };
    }

    const initials = tokens
      .slice(0, -1)
      .map((token) => `${Array.from(token)[0] ?? ""}.`)
      .join(" ");

    return { text: `${lastName}, ${initials}`, unformattable: false };
  }

  /**
   * Join contributors with ", " and the final pair with " & ".
   * Returns ABSENT when there is no usable name.
   */
  format(names: readonly string[]): FormattedAuthors | Absent {
    const rendered: string[] = [];
    const unformattable: string[] = [];

    for (const name of names) {
      if (name.trim() === "") continue;

      const formatted = this.formatName(name);
      rendered.push(formatted.text);
      if (formatted.unformattable) {
        unformattable.push(formatted.text);
      }
    }

    const last = rendered.pop();
    if (last === undefined) {
      return ABSENT;
    }

    const text =
      rendered.length === 0 ? last : `${rendered.join(", ")} & ${last}`;

    return { text, unformattable };
  }
}
