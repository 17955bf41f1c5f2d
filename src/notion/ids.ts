import { InvalidInputError } from '../utils/errors.js';

const HEX_ID = /^[0-9a-f]{32}$/i;
const TRAILING_HEX_ID = /([0-9a-f]{32})$/i;

export type NotionIdKind = 'page' | 'database';

/**
 * Extract the 32-character hex id from a bare id, a dashed UUID, or a Notion
 * URL whose last path segment ends with one (`Title-<id>`, `<id>?v=...`). The
 * URL scheme may be left out.
 */
export function extractNotionId(input: string, kind: NotionIdKind = 'page'): string {
  const trimmed = input.trim();
  const compact = trimmed.replace(/-/g, '');

  if (HEX_ID.test(compact)) {
    return compact.toLowerCase();
  }

  const candidate = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  if (/^https?:\/\//i.test(candidate)) {
    let url: URL | null = null;
    try {
      url = new URL(candidate);
    } catch {
      url = null;
    }

    const segments = url ? url.pathname.split('/').filter(Boolean) : [];
    const lastSegment = segments[segments.length - 1] ?? '';
    const match = lastSegment.replace(/-/g, '').match(TRAILING_HEX_ID);
    if (match?.[1]) {
      return match[1].toLowerCase();
    }
  }

  throw new InvalidInputError(`Invalid Notion ${kind} URL or ID: ${input}`);
}

export function extractPageId(input: string): string {
  return extractNotionId(input, 'page');
}

export function extractDatabaseId(input: string): string {
  return extractNotionId(input, 'database');
}

export function sameNotionId(a: string, b: string): boolean {
  return a.replace(/-/g, '').toLowerCase() === b.replace(/-/g, '').toLowerCase();
}
