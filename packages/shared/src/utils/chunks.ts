import {
  DuplicatePartError,
  IncompletePartSetError,
  MalformedPartError,
  PartCountMismatchError,
} from "../errors.js";
import type { Part, PartMetadata, PartRange } from "../types.js";

/**
 * Number of parts needed for `size` bytes. An empty file still takes one
 * (empty) part so that it round-trips.
 */
export function partCount(size: number, maxPartSize: number): number {
  assertMaxPartSize(maxPartSize);
  if (!Number.isSafeInteger(size) || size < 0) {
    throw new RangeError(`size must be a non-negative integer, got ${size}`);
  }
  return Math.max(1, Math.ceil(size / maxPartSize));
}

/** Byte ranges of every part of a `size`-byte file, in index order. */
export function partRanges(size: number, maxPartSize: number): PartRange[] {
  const count = partCount(size, maxPartSize);
  const ranges: PartRange[] = [];
  for (let index = 0; index < count; index++) {
    const start = index * maxPartSize;
    ranges.push({ index, start, end: Math.min(size, start + maxPartSize) });
  }
  return ranges;
}

/**
 * Split a buffer into part payloads. Every payload but the last is exactly
 * `maxPartSize` bytes. Payloads are views into `data`, not copies.
 */
export function splitIntoParts(data: Buffer, maxPartSize: number): Buffer[] {
  return partRanges(data.length, maxPartSize).map((range) =>
    data.subarray(range.start, range.end)
  );
}

/**
 * Reassemble a logical file from its parts, in any order.
 *
 * Identical duplicates of an index are tolerated; conflicting ones are not.
 * Nothing is ever guessed: a set that is not exactly [0, totalParts) throws.
 */
export function joinParts(parts: readonly Part[]): Buffer {
  if (parts.length === 0) {
    throw new RangeError("joinParts needs at least one part");
  }

  const name = parts[0].name;
  const declaredCounts = [...new Set(parts.map((p) => p.totalParts))];
  if (declaredCounts.length > 1) {
    throw new PartCountMismatchError(name, declaredCounts.sort((a, b) => a - b));
  }
  const totalParts = declaredCounts[0];

  const payloads = new Map<number, Buffer>();
  for (const part of parts) {
    if (!Number.isInteger(part.index) || part.index < 0 || part.index >= totalParts) {
      throw new MalformedPartError(
        name,
        `part index ${part.index} is outside [0, ${totalParts})`
      );
    }

    const existing = payloads.get(part.index);
    if (existing === undefined) {
      payloads.set(part.index, part.payload);
    } else if (!existing.equals(part.payload)) {
      throw new DuplicatePartError(name, part.index);
    }
  }

  if (payloads.size !== totalParts) {
    const missing: number[] = [];
    for (let index = 0; index < totalParts; index++) {
      if (!payloads.has(index)) missing.push(index);
    }
    throw new IncompletePartSetError(name, totalParts, payloads.size, missing);
  }

  const ordered: Buffer[] = [];
  for (let index = 0; index < totalParts; index++) {
    const payload = payloads.get(index);
    if (payload !== undefined) ordered.push(payload);
  }
  return Buffer.concat(ordered);
}

export interface PartSetSummary {
  /** Distinct totalParts values, ascending. More than one means the set is corrupt. */
  declaredCounts: number[];
  /** Distinct indices, ascending. */
  present: number[];
  /** Indices in [0, totalParts) with no part. Empty when the counts disagree. */
  missing: number[];
}

/** Describe a part set from metadata alone, without payloads. */
export function inspectPartSet(parts: readonly PartMetadata[]): PartSetSummary {
  const declaredCounts = [...new Set(parts.map((p) => p.totalParts))].sort((a, b) => a - b);
  const present = [...new Set(parts.map((p) => p.index))].sort((a, b) => a - b);

  const missing: number[] = [];
  if (declaredCounts.length === 1) {
    const seen = new Set(present);
    for (let index = 0; index < declaredCounts[0]; index++) {
      if (!seen.has(index)) missing.push(index);
    }
  }
  return { declaredCounts, present, missing };
}

/**
 * Throw if a part set can't be reassembled whatever the payloads are:
 * disagreeing totals or missing indices. Lets callers fail before fetching.
 */
export function assertPartSetComplete(parts: readonly PartMetadata[]): void {
  if (parts.length === 0) {
    throw new RangeError("a part set needs at least one part");
  }
  const name = parts[0].name;
  const { declaredCounts, present, missing } = inspectPartSet(parts);

  if (declaredCounts.length > 1) {
    throw new PartCountMismatchError(name, declaredCounts);
  }
  if (missing.length > 0) {
    const observed = present.filter((index) => index < declaredCounts[0]).length;
    throw new IncompletePartSetError(name, declaredCounts[0], observed, missing);
  }
}

function assertMaxPartSize(maxPartSize: number): void {
  if (!Number.isSafeInteger(maxPartSize) || maxPartSize < 1) {
    throw new RangeError(`maxPartSize must be a positive integer, got ${maxPartSize}`);
  }
}
