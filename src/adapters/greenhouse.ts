import { z } from 'zod';
import type { EmployerSource, Posting, TextFetcher } from '../types.js';
import type { RunLogger } from '../utils/logger.js';
import { normalizeWhitespace } from '../utils/text.js';
import {
  basePosting,
  completePosting,
  emptyResult,
  htmlToText,
  isoDatePrefix,
  makeSnippet,
  parseJson,
  rejectedPayload,
} from './common.js';
import type { NormalizeResult } from './common.js';

const greenhouseJobSchema = z.object({
  id: z.union([z.number(), z.string()]),
  title: z.string().nullish(),
  absolute_url: z.string().nullish(),
  location: z.object({ name: z.string().nullish() }).nullish(),
  updated_at: z.string().nullish(),
  content: z.string().nullish(),
});

const greenhouseBoardSchema = z.object({
  jobs: z.array(z.unknown()),
});

export function greenhouseBoardUrl(boardToken: string): string {
  return `https://boards-api.greenhouse.io/v1/boards/${encodeURIComponent(boardToken)}/jobs?content=true`;
}

export function normalizeGreenhouseBoard(payload: unknown, source: EmployerSource): NormalizeResult {
  const board = greenhouseBoardSchema.safeParse(payload);
  if (!board.success) {
    return rejectedPayload('payload has no jobs list');
  }

  const result = emptyResult();
  for (const record of board.data.jobs) {
    const parsed = greenhouseJobSchema.safeParse(record);
    if (!parsed.success) {
      result.skipped += 1;
      continue;
    }

    const job = parsed.data;
    const posting = completePosting({
      ...basePosting(source),
      source_local_id: String(job.id).trim(),
      title: normalizeWhitespace(job.title ?? ''),
      location: normalizeWhitespace(job.location?.name ?? ''),
      url: (job.absolute_url ?? '').trim(),
      description_snippet: makeSnippet(htmlToText(job.content ?? '')),
      posted_date: isoDatePrefix(job.updated_at),
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

export async function scrapeGreenhouse(
  source: EmployerSource,
  fetcher: TextFetcher,
  logger: RunLogger,
): Promise<Posting[]> {
  const url = greenhouseBoardUrl(source.sourceIdentifier);
  await logger.info(`Fetching Greenhouse board ${source.sourceIdentifier}`);

  const body = await fetcher.fetchText(url);
  if (body === null) {
    await logger.warn(`No data from Greenhouse board ${source.sourceIdentifier} (${source.employerName})`);
    return [];
  }

  const payload = parseJson(body);
  if (payload === undefined) {
    await logger.warn(`Greenhouse board ${source.sourceIdentifier} (${source.employerName}) did not return JSON`);
    return [];
  }

  const { postings, skipped, payloadError } = normalizeGreenhouseBoard(payload, source);
  if (payloadError) {
    await logger.warn(`Unexpected Greenhouse response for ${source.employerName}: ${payloadError}`);
  }
  if (skipped > 0) {
    await logger.warn(`Skipped ${skipped} malformed Greenhouse record(s) for ${source.employerName}`);
  }
  return postings;
}
