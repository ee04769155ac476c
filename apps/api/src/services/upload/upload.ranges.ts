// src/services/upload/upload.ranges.ts

import type { ByteRange } from "../../types/upload.js";

export const rangeLength = (r: ByteRange) => r.end - r.start + 1;

/**
 * Insert `range` into a sorted, disjoint interval list. Overlapping and
 * adjacent intervals collapse into one. Returns a new list.
 */
export function mergeRange(ranges: readonly ByteRange[], range: ByteRange): ByteRange[] {
  const out: ByteRange[] = [];
  let start = range.start;
  let end = range.end;
  let placed = false;

  for (const r of ranges) {
    if (r.end + 1 < start) {
      out.push({ ...r });
    } else if (end + 1 < r.start) {
      if (!placed) {
        out.push({ start, end });
        placed = true;
      }
      out.push({ ...r });
    } else {
      start = Math.min(start, r.start);
      end = Math.max(end, r.end);
    }
  }

  if (!placed) out.push({ start, end });
  return out;
}

export function normalizeRanges(ranges: readonly ByteRange[]): ByteRange[] {
  return ranges.reduce<ByteRange[]>((acc, r) => mergeRange(acc, r), []);
}

export function coveredBytes(ranges: readonly ByteRange[]): number {
  return ranges.reduce((sum, r) => sum + rangeLength(r), 0);
}

/** Gaps of `ranges` inside `[0, totalSize-1]`. */
export function missingRanges(ranges: readonly ByteRange[], totalSize: number): ByteRange[] {
  const gaps: ByteRange[] = [];
  let cursor = 0;

  for (const r of ranges) {
    if (r.start > cursor) gaps.push({ start: cursor, end: r.start - 1 });
    cursor = Math.max(cursor, r.end + 1);
  }

  if (cursor < totalSize) gaps.push({ start: cursor, end: totalSize - 1 });
  return gaps;
}

export function nextExpectedByte(ranges: readonly ByteRange[], totalSize: number): number {
  const [gap] = missingRanges(ranges, totalSize);
  return gap ? gap.start : totalSize;
}

export function isFullyCovered(ranges: readonly ByteRange[], totalSize: number): boolean {
  return ranges.length === 1 && ranges[0].start === 0 && ranges[0].end === totalSize - 1;
}

export function containsRange(ranges: readonly ByteRange[], range: ByteRange): boolean {
  return ranges.some((r) => r.start <= range.start && r.end >= range.end);
}

export function intersect(a: ByteRange, b: ByteRange): ByteRange | null {
  const start = Math.max(a.start, b.start);
  const end = Math.min(a.end, b.end);
  return start <= end ? { start, end } : null;
}

export function isValidRange(r: ByteRange): boolean {
  return (
    Number.isSafeInteger(r.start) &&
    Number.isSafeInteger(r.end) &&
    r.start >= 0 &&
    r.start <= r.end
  );
}
