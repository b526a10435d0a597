/**
 * Field Path Extractor - safe reads out of nested staging records
 *
 * Paths are dotted segments. A segment may carry an index (`isbn_list[0]`)
 * or a wildcard (`contributors[]`), in which case the rest of the path is
 * applied to every element and the present results are collected.
 *
 * Anything missing, null, empty or malformed yields ABSENT; extraction never
 * throws.
 */

// ============================================================================
// Types
// ============================================================================

export type StagingScalar = string | number | boolean;

export type StagingValue = StagingScalar | StagingArray | StagingObject;

export type StagingArray = (StagingValue | null)[];

export interface StagingObject {
  [key: string]: StagingValue | null | undefined;
}

/** One harvested NVA publication */
export type StagingRecord = StagingObject;

export const ABSENT: unique symbol = Symbol("absent");
export type Absent = typeof ABSENT;

export type PathSegment =
  | { key: string; kind: "key" }
  | { key: string; kind: "index"; index: number }
  | { key: string; kind: "wildcard" };

// ============================================================================
// Path Parsing
// ============================================================================

const SEGMENT_PATTERN = /^([^[\]]+)(?:\[(\d*)\])?$/;

const parsedPaths = new Map<string, PathSegment[] | null>();

/**
 * Parse a dotted path into segments; null when the path is malformed.
 */
export function parsePath(path: string): PathSegment[] | null {
  const cached = parsedPaths.get(path);
  if (cached !== undefined) {
    return cached;
  }

  const segments: PathSegment[] = [];
  for (const part of path.split(".")) {
    const match = SEGMENT_PATTERN.exec(part);
    const key = match?.[1];
    if (match === null || key === undefined) {
      parsedPaths.set(path, null);
      return null;
    }

    const index = match[2];
    if (index === undefined) {
      segments.push({ key, kind: "key" });
    } else if (index === "") {
      segments.push({ key, kind: "wildcard" });
    } else {
      segments.push({ key, kind: "index", index: Number(index) });
    }
  }

  parsedPaths.set(path, segments);
  return segments;
}

// ============================================================================
// Extraction
// ============================================================================

export function isStagingObject(value: unknown): value is StagingObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function present(
  value: StagingValue | null | undefined
): StagingValue | Absent {
  if (value === null || value === undefined) {
    return ABSENT;
  }
  if (Array.isArray(value) && value.length === 0) {
    return ABSENT;
  }
  return value;
}

function walk(
  value: StagingValue,
  segments: readonly PathSegment[]
): StagingValue | Absent {
  const [segment, ...rest] = segments;
  if (segment === undefined) {
    return value;
  }
  if (!isStagingObject(value)) {
    return ABSENT;
  }

  const child = present(value[segment.key]);
  if (child === ABSENT) {
    return ABSENT;
  }

  switch (segment.kind) {
    case "key":
      return walk(child, rest);

    case "index": {
      if (!Array.isArray(child)) {
        return ABSENT;
      }
      const element = present(child[segment.index]);
      return element === ABSENT ? ABSENT : walk(element, rest);
    }

    case "wildcard": {
      if (!Array.isArray(child)) {
        return ABSENT;
      }
      const collected: StagingValue[] = [];
      for (const item of child) {
        const element = present(item);
        if (element === ABSENT) continue;
        const result = walk(element, rest);
        if (result !== ABSENT) {
          collected.push(result);
        }
      }
      return collected.length > 0 ? collected : ABSENT;
    }
  }
}

/**
 * Read the value at `path`, or ABSENT.
 */
export function extractPath(
  record: StagingRecord,
  path: string
): StagingValue | Absent {
  const segments = parsePath(path);
  if (segments === null || segments.length === 0) {
    return ABSENT;
  }
  return walk(record, segments);
}

/**
 * Try the primary path, then each fallback, returning the first present value.
 */
export function extractFirst(
  record: StagingRecord,
  paths: readonly string[]
): StagingValue | Absent {
  for (const path of paths) {
    const value = extractPath(record, path);
    if (value !== ABSENT) {
      return value;
    }
  }
  return ABSENT;
}
