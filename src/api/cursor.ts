// ============================================================================
// Pagination Cursor Codec
// ============================================================================
// Cursors are opaque to callers: base64url over a small versioned record that
// carries the next offset and a fingerprint of the filters that produced it.
// ============================================================================

import { createHash } from 'crypto';
import { z } from 'zod';
import { invalid } from './errors.js';

export const DEFAULT_PAGE_SIZE = 25;
const CURSOR_VERSION = 1;

export type FilterValue = string | number | boolean | null | undefined;
export type Filters = Record<string, FilterValue>;

export interface DecodedCursor {
  offset: number;
  fingerprint: string;
}

const CursorPayloadSchema = z.object({
  v: z.literal(CURSOR_VERSION),
  o: z.number().int().nonnegative().safe(),
  f: z.string().regex(/^[0-9a-f]{16}$/),
}).strict();

// ============================================================================
// Fingerprint
// ============================================================================

/**
 * Canonical fingerprint of a filter set. Keys are sorted and absent values
 * dropped, so `{ a: 1 }` and `{ a: 1, b: undefined }` match.
 */
export function fingerprint(filters: Filters): string {
  const canonical = Object.keys(filters)
    .filter(key => filters[key] !== undefined && filters[key] !== null && filters[key] !== '')
    .sort()
    .map(key => [key, filters[key]]);
  return createHash('sha256').update(JSON.stringify(canonical)).digest('hex').slice(0, 16);
}

// ============================================================================
// Encode / Decode
// ============================================================================

export function encodeCursor(offset: number, filterFingerprint: string): string {
  // Fixed key order keeps tokens stable across decode/encode.
  const json = JSON.stringify({ v: CURSOR_VERSION, o: offset, f: filterFingerprint });
  return Buffer.from(json, 'utf8').toString('base64url');
}

export function decodeCursor(token: string): DecodedCursor {
  if (!/^[A-Za-z0-9_-]+$/.test(token)) {
    throw invalid('Malformed pagination cursor');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(token, 'base64url').toString('utf8'));
  } catch {
    throw invalid('Malformed pagination cursor');
  }

  const parsed = CursorPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    throw invalid('Malformed pagination cursor');
  }
  return { offset: parsed.data.o, fingerprint: parsed.data.f };
}

/**
 * Turn an optional caller cursor into a starting offset, rejecting cursors
 * minted for a different filter set.
 */
export function resolveCursor(token: string | undefined, filters: Filters): number {
  if (token === undefined) return 0;
  const decoded = decodeCursor(token);
  if (decoded.fingerprint !== fingerprint(filters)) {
    throw invalid('Pagination cursor does not match the supplied filters; restart the search without a cursor');
  }
  return decoded.offset;
}

// ============================================================================
// Page Arithmetic
// ============================================================================

export function clampLimit(limit: number | undefined, max: number): number {
  if (limit === undefined) return Math.min(DEFAULT_PAGE_SIZE, max);
  if (!Number.isInteger(limit)) {
    throw invalid('limit must be an integer');
  }
  return Math.min(Math.max(limit, 1), max);
}

export interface PageWindow {
  offset: number;
  limit: number;
  /** Number of items the remote returned, before any local filtering */
  remoteCount: number;
  totalCount?: number;
  /** Whether the remote signalled another page by its own means */
  remoteHasMore: boolean;
}

/** Cursor for the next page, or undefined when the listing is exhausted. */
export function nextCursor(window: PageWindow, filters: Filters): string | undefined {
  const nextOffset = window.offset + window.remoteCount;
  if (window.remoteCount === 0) return undefined;
  const hasMore = window.totalCount !== undefined
    ? nextOffset < window.totalCount
    : window.remoteHasMore || window.remoteCount >= window.limit;
  return hasMore ? encodeCursor(nextOffset, fingerprint(filters)) : undefined;
}
