import { z } from 'zod';
import type { EmployerSource, Posting, TextFetcher } from '../types.js';
import type { RunLogger } from '../utils/logger.js';
import { normalizeWhitespace } from '../utils/text.js';
import {
  basePosting,
  completePosting,
  dateFromEpochMs,
  emptyResult,
  makeSnippet,
  parseJson,
  rejectedPayload,
} from './common.js';
import type { NormalizeResult } from './common.js';

const leverSalarySchema = z.object({
  currency: z.string().nullish(),
  interval: z.string().nullish(),
  min: z.number().nullish(),
  max: z.number().nullish(),
});

const leverPostingSchema = z.object({
  id: z.string(),
  text: z.string().nullish(),
  hostedUrl: z.string().nullish(),
  applyUrl: z.string().nullish(),
  categories: z
    .object({
      location: z.string().nullish(),
    })
    .nullish(),
  descriptionPlain: z.string().nullish(),
  createdAt: z.number().nullish(),
  salaryRange: leverSalarySchema.nullish(),
});

type LeverSalary = z.infer<typeof leverSalarySchema>;

export function leverPostingsUrl(slug: string): string {
  return `https://api.lever.co/v0/postings/${encodeURIComponent(slug)}?mode=json`;
}

export function formatLeverSalary(salary: LeverSalary | null | undefined): string {
  if (!salary || (salary.min == null && salary.max == null)) {
    return '';
  }
  const range =
    salary.min != null && salary.max != null && salary.min !== salary.max
      ? `${salary.min}-${salary.max}`
      : String(salary.min ?? salary.max);
  return [salary.currency ?? '', range, salary.interval ?? ''].filter(Boolean).join(' ');
}

export function normalizeLeverPostings(payload: unknown, source: EmployerSource): NormalizeResult {
  if (!Array.isArray(payload)) {
    return rejectedPayload('payload is not a list of postings');
  }

  const result = emptyResult();
  for (const record of payload) {
    const parsed = leverPostingSchema.safeParse(record);
    if (!parsed.success) {
      result.skipped += 1;
      continue;
    }

    const job = parsed.data;
    const posting = completePosting({
      ...basePosting(source),
      source_local_id: job.id.trim(),
      title: normalizeWhitespace(job.text ?? ''),
      location: normalizeWhitespace(job.categories?.location ?? ''),
      url: (job.hostedUrl || job.applyUrl || '').trim(),
      description_snippet: makeSnippet(job.descriptionPlain ?? ''),
      posted_date: dateFromEpochMs(job.createdAt),
      salary: formatLeverSalary(job.salaryRange),
    });

    if (posting) {
      result.postings.push(posting);
    } else {
      result.skipped += 1;
    }
  }

  return result;
}

export async function scrapeLever(source: EmployerSource, fetcher: TextFetcher, logger: RunLogger): Promise<Posting[]> {
  await logger.info(`Fetching Lever postings ${source.sourceIdentifier}`);

  const body = await fetcher.fetchText(leverPostingsUrl(source.sourceIdentifier));
  if (body === null) {
    await logger.warn(`No data from Lever ${source.sourceIdentifier} (${source.employerName})`);
    return [];
  }

  const payload = parseJson(body);
  if (payload === undefined) {
    await logger.warn(`Lever ${source.sourceIdentifier} (${source.employerName}) did not return JSON`);
    return [];
  }

  const { postings, skipped, payloadError } = normalizeLeverPostings(payload, source);
  if (payloadError) {
    await logger.warn(`Unexpected Lever response for ${source.employerName}: ${payloadError}`);
  }
  if (skipped > 0) {
    await logger.warn(`Skipped ${skipped} malformed Lever record(s) for ${source.employerName}`);
  }
  return postings;
}
