/**
 * Page range parsing
 * Turns "1-3,5,7,10-15" into an ordered, duplicate-free list of pages
 */

import { IndexOutOfBoundsError, InvalidRangeSpecError } from "./errors";

/**
 * Inclusive page interval; a single page has start === end
 */
export interface PageRange {
  start: number;
  end: number;
}

const INTEGER = /^\d+$/;

function parseBound(token: string, value: string): number {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new InvalidRangeSpecError(token, "missing bound");
  }
  if (!INTEGER.test(trimmed)) {
    throw new InvalidRangeSpecError(token, `"${trimmed}" is not an integer`);
  }
  const page = Number(trimmed);
  if (!Number.isSafeInteger(page)) {
    throw new InvalidRangeSpecError(token, `${trimmed} is too large`);
  }
  if (page < 1) {
    throw new InvalidRangeSpecError(token, "pages start at 1");
  }
  return page;
}

/**
 * Parse a range expression into intervals, in the order written
 *
 * Nothing is expanded here, so the size of a range never matters.
 * Throws InvalidRangeSpecError on the first malformed token.
 */
export function parseRangeSpec(spec: string): PageRange[] {
  const ranges: PageRange[] = [];

  for (const raw of spec.split(",")) {
    const token = raw.trim();
    if (!token) {
      throw new InvalidRangeSpecError(raw, "empty range");
    }

    const dash = token.indexOf("-");
    if (dash === -1) {
      const page = parseBound(token, token);
      ranges.push({ start: page, end: page });
      continue;
    }

    const start = parseBound(token, token.slice(0, dash));
    const end = parseBound(token, token.slice(dash + 1));
    if (start > end) {
      throw new InvalidRangeSpecError(
        token,
        `${start} must not be greater than ${end}`,
      );
    }
    ranges.push({ start, end });
  }

  return ranges;
}

/**
 * Resolve the pages to download for an album of `pageCount` pages
 *
 * No spec means every page. Every interval is checked against the album
 * before anything is expanded; the lowest page past the end is reported.
 */
export function expandRange(
  spec: string | readonly PageRange[] | undefined,
  pageCount: number,
): number[] {
  if (spec === undefined) {
    return Array.from({ length: pageCount }, (_, i) => i + 1);
  }

  const ranges = typeof spec === "string" ? parseRangeSpec(spec) : spec;

  let outside: number | undefined;
  for (const { start, end } of ranges) {
    if (end > pageCount) {
      const first = Math.max(start, pageCount + 1);
      outside = outside === undefined ? first : Math.min(outside, first);
    }
  }
  if (outside !== undefined) {
    throw new IndexOutOfBoundsError(outside, pageCount);
  }

  const pages = new Set<number>();
  for (const { start, end } of ranges) {
    for (let page = start; page <= end; page++) {
      pages.add(page);
    }
  }
  return [...pages].sort((a, b) => a - b);
}
