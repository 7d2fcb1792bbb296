import * as cheerio from 'cheerio';
import type { EmployerSource, Posting } from '../types.js';
import { normalizeWhitespace, truncate } from '../utils/text.js';

export const SNIPPET_LENGTH = 200;

export interface NormalizeResult {
  postings: Posting[];
  /** Records dropped because they lacked an id, a title or a URL, or failed to parse. */
  skipped: number;
  /** Set when the payload as a whole was not the expected shape. */
  payloadError?: string;
}

export function emptyResult(): NormalizeResult {
  return { postings: [], skipped: 0 };
}

export function rejectedPayload(payloadError: string): NormalizeResult {
  return { ...emptyResult(), payloadError };
}

/**
 * Plain text of an HTML fragment. Greenhouse escapes its `content` field, so the
 * entity-decoded text is parsed a second time to drop the markup it contained.
 */
export function htmlToText(html: string): string {
  if (!html) {
    return '';
  }
  const decoded = cheerio.load(html).text();
  return normalizeWhitespace(cheerio.load(decoded).text());
}

export function makeSnippet(text: string): string {
  return truncate(normalizeWhitespace(text), SNIPPET_LENGTH);
}

export function isoDatePrefix(value: string | null | undefined): string {
  return value ? value.slice(0, 10) : '';
}

export function dateFromEpochMs(value: number | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? '' : date.toISOString().slice(0, 10);
}

export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Returns the posting when it carries the fields scoring and dedup rely on. */
export function completePosting(posting: Posting): Posting | null {
  if (!posting.source_local_id || !posting.title || !posting.url) {
    return null;
  }
  return posting;
}

export function basePosting(source: EmployerSource): Pick<Posting, 'source_kind' | 'source_identifier' | 'employer_name'> {
  return {
    source_kind: source.sourceKind,
    source_identifier: source.sourceIdentifier,
    employer_name: source.employerName,
  };
}
