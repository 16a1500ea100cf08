import { StructuralInputError } from "../core/errors.js";

export type JobIndex = number & { readonly __brand: "JobIndex" };

export const TAG_INDEX_LIMIT = 10000;

/**
 * Array index for a lane (the position itself) or a plex (position followed
 * by the tag index as four decimal digits). Lanes stay below 10000 and plexes
 * above it, so the two never collide.
 */
export function jobIndexFor(position: number | null | undefined, tagIndex?: number | null): JobIndex {
  if (position === null || position === undefined || position === 0) {
    throw new StructuralInputError("position undefined or zero");
  }
  if (!Number.isInteger(position) || position < 0 || position >= TAG_INDEX_LIMIT) {
    throw new StructuralInputError(`invalid position: ${position}`);
  }
  if (tagIndex === null || tagIndex === undefined) {
    return position as JobIndex;
  }
  if (!Number.isInteger(tagIndex) || tagIndex < 0 || tagIndex >= TAG_INDEX_LIMIT) {
    throw new StructuralInputError(`tag index ${tagIndex} outside 0..${TAG_INDEX_LIMIT - 1} (position ${position})`);
  }
  return (position * TAG_INDEX_LIMIT + tagIndex) as JobIndex;
}

export function parseJobIndex(value: string): JobIndex | null {
  if (!/^[1-9]\d*$/.test(value)) return null;
  const n = Number.parseInt(value, 10);
  return Number.isSafeInteger(n) ? (n as JobIndex) : null;
}

/**
 * LSF array dimension, e.g. "[1-3,5,30001-30002]".
 */
export function formatArraySpec(indices: Iterable<number>): string {
  const sorted = [...new Set(indices)].sort((a, b) => a - b);
  if (sorted.length === 0) throw new Error("array spec needs at least one index");

  const ranges: string[] = [];
  let start = sorted[0] ?? 0;
  let prev = start;
  for (const n of sorted.slice(1)) {
    if (n === prev + 1) {
      prev = n;
      continue;
    }
    ranges.push(start === prev ? String(start) : `${start}-${prev}`);
    start = n;
    prev = n;
  }
  ranges.push(start === prev ? String(start) : `${start}-${prev}`);
  return `[${ranges.join(",")}]`;
}
