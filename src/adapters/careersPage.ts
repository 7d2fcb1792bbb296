import * as cheerio from 'cheerio';
import { careersPageLocalId } from '../dedup/identity.js';
import type { EmployerSource, Posting, TextFetcher } from '../types.js';
import type { RunLogger } from '../utils/logger.js';
import { normalizeWhitespace } from '../utils/text.js';
import { cleanUrl, isHttpUrl, toAbsoluteUrl } from '../utils/url.js';
import { basePosting, completePosting, emptyResult } from './common.js';
import type { NormalizeResult } from './common.js';

const CANDIDATE_SELECTOR = 'h1, h2, h3, h4, a, div';
const CANDIDATE_CLASS = /job|position|title/i;
const MAX_CANDIDATES = 20;
const MIN_TITLE_LENGTH = 6;

interface Candidate {
  /** Entity-decoded, whitespace-collapsed text for display and scoring. */
  title: string;
  /** The text exactly as written in the page source, trimmed. Identity is derived from this. */
  rawTitle: string;
  href: string;
}

/** Text between the end of the opening tag and the next tag, as written in the source. */
function rawLeadingText(source: string, openTagEnd: number | undefined, innerHtml: string): string | undefined {
  const tail = openTagEnd === undefined ? innerHtml : source.slice(openTagEnd);
  return tail.match(/^[^<]+(?=<)/)?.[0];
}

/**
 * Candidate titles are the text an element opens with, for headings, links
 * and divs whose class mentions a job, position or title. Only the first
 * candidates in document order are considered.
 */
export function collectCandidates(html: string): Candidate[] {
  const $ = cheerio.load(html, { sourceCodeLocationInfo: true });
  const out: Candidate[] = [];

  $(CANDIDATE_SELECTOR).each((_, element) => {
    if (out.length >= MAX_CANDIDATES) {
      return false;
    }

    const node = $(element);
    if (!CANDIDATE_CLASS.test(node.attr('class') ?? '')) {
      return;
    }

    const lead = rawLeadingText(html, element.sourceCodeLocation?.startTag?.endOffset, node.html() ?? '');
    if (lead === undefined) {
      return;
    }

    const link = node.is('a[href]') ? node : node.closest('a[href]').add(node.find('a[href]')).first();
    out.push({
      title: normalizeWhitespace(cheerio.load(lead).text()),
      rawTitle: lead.trim(),
      href: (link.attr('href') ?? '').trim(),
    });
  });

  return out;
}

export function normalizeCareersPage(html: string, source: EmployerSource): NormalizeResult {
  const result = emptyResult();
  const careersUrl = cleanUrl(source.sourceIdentifier);
  const seenTitles = new Set<string>();

  for (const candidate of collectCandidates(html)) {
    if (candidate.rawTitle.length < MIN_TITLE_LENGTH || seenTitles.has(candidate.rawTitle)) {
      continue;
    }
    seenTitles.add(candidate.rawTitle);

    const absolute = candidate.href ? toAbsoluteUrl(candidate.href, careersUrl) : '';
    const posting = completePosting({
      ...basePosting(source),
      source_local_id: careersPageLocalId(source.employerName, candidate.rawTitle),
      title: candidate.title,
      location: '',
      url: isHttpUrl(absolute) ? cleanUrl(absolute) : careersUrl,
      description_snippet: '',
      posted_date: '',
      salary: '',
    });

    if (posting) {
      result.postings.push(posting);
    } else {
      result.skipped += 1;
    }
  }

  return result;
}

export async function scrapeCareersPage(
  source: EmployerSource,
  fetcher: TextFetcher,
  logger: RunLogger,
): Promise<Posting[]> {
  await logger.info(`Fetching careers page ${source.sourceIdentifier}`);

  const html = await fetcher.fetchText(source.sourceIdentifier);
  if (html === null) {
    await logger.warn(`No data from careers page ${source.sourceIdentifier} (${source.employerName})`);
    return [];
  }

  return normalizeCareersPage(html, source).postings;
}
