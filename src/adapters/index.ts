import type { EmployerSource, Posting, SourceKind, TextFetcher } from '../types.js';
import type { RunLogger } from '../utils/logger.js';
import { scrapeCareersPage } from './careersPage.js';
import { scrapeGreenhouse } from './greenhouse.js';
import { scrapeLever } from './lever.js';

type ScraperFn = (source: EmployerSource, fetcher: TextFetcher, logger: RunLogger) => Promise<Posting[]>;

const SCRAPER_BY_KIND: Record<SourceKind, ScraperFn> = {
  greenhouse: scrapeGreenhouse,
  lever: scrapeLever,
  careers_page: scrapeCareersPage,
};

export function describeSource(source: EmployerSource): string {
  return `${source.employerName} [${source.sourceKind}:${source.sourceIdentifier}]`;
}

export async function runAdapter(source: EmployerSource, fetcher: TextFetcher, logger: RunLogger): Promise<Posting[]> {
  return SCRAPER_BY_KIND[source.sourceKind](source, fetcher, logger);
}
