/**
 * Deduplicator - (normalized title, year) fingerprints
 *
 * Seeded once per run with the identity keys already in Cristin. Keys
 * admitted during the run are added immediately, so the first occurrence of
 * a publication in the staging data wins and later copies are duplicates.
 */

// ============================================================================
// Types
// ============================================================================

export interface IdentityKey {
  title: string;
  year: number | null;
}

export type DedupVerdict = "NEW" | "DUPLICATE";

/** Where the matching key of a duplicate came from */
export type DuplicateOrigin = "CRISTIN" | "STAGING";

// ============================================================================
// Key Computation
// ============================================================================

export function normalizeTitle(title: string): string {
  return title.trim().toLowerCase();
}

export function identityKey(title: string, year: number | null): IdentityKey {
  return { title: normalizeTitle(title), year };
}

function fingerprint(key: IdentityKey): string {
  return `${key.year === null ? "N" : String(key.year)}\u0000${key.title}`;
}

// ============================================================================
// Deduplicator
// ============================================================================

export class Deduplicator {
  private readonly existing = new Set<string>();
  private readonly seen = new Set<string>();

  constructor(existing: Iterable<IdentityKey>) {
    for (const key of existing) {
      const print = fingerprint(identityKey(key.title, key.year));
      this.existing.add(print);
      this.seen.add(print);
    }
  }

  get size(): number {
    return this.seen.size;
  }

  /**
   * CRISTIN when the key was seeded, STAGING when it was admitted earlier
   * in this run, null when it is unknown.
   */
  origin(key: IdentityKey): DuplicateOrigin | null {
    const print = fingerprint(identityKey(key.title, key.year));
    if (this.existing.has(print)) {
      return "CRISTIN";
    }
    return this.seen.has(print) ? "STAGING" : null;
  }

  check(key: IdentityKey): DedupVerdict {
    return this.seen.has(fingerprint(identityKey(key.title, key.year)))
      ? "DUPLICATE"
      : "NEW";
  }

  /**
   * Check a candidate and, when it is new, record it for the rest of the run.
   */
  admit(key: IdentityKey): DedupVerdict {
    const print = fingerprint(identityKey(key.title, key.year));
    if (this.seen.has(print)) {
      return "DUPLICATE";
    }
    this.seen.add(print);
    return "NEW";
  }
}
