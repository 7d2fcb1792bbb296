import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { literalPattern, regexPattern } from '../src/config/patterns.js';
import type { RelevancePolicy } from '../src/scoring/relevance.js';
import type { Posting, ScoredPosting, TextFetcher } from '../src/types.js';
import { RunLogger } from '../src/utils/logger.js';

export function makePolicy(overrides: Partial<RelevancePolicy> = {}): RelevancePolicy {
  return {
    highPriority: [],
    mediumPriority: [],
    requiredKeywords: [],
    excludeKeywords: [],
    preferredLocations: [],
    excludedLocations: [],
    ...overrides,
  };
}

export { literalPattern, regexPattern };

export function makePosting(overrides: Partial<Posting> = {}): Posting {
  return {
    source_kind: 'greenhouse',
    source_local_id: '1',
    source_identifier: 'acme',
    employer_name: 'Acme',
    title: 'Data Scientist',
    location: 'Remote',
    url: 'https://boards.greenhouse.io/acme/jobs/1',
    description_snippet: '',
    posted_date: '',
    salary: '',
    ...overrides,
  };
}

export function makeScored(overrides: Partial<ScoredPosting> = {}): ScoredPosting {
  return {
    ...makePosting(overrides),
    relevance_score: 50,
    matched_reasons: ['title:data scientist'],
    ...overrides,
  };
}

export async function makeTempDir(prefix = 'job-monitor-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function makeLogger(dir: string): Promise<RunLogger> {
  const logger = new RunLogger(join(dir, 'test.log'));
  await logger.init();
  return logger;
}

/** Serves canned bodies by exact URL; anything else is "no data". */
export class FakeFetcher implements TextFetcher {
  readonly requested: string[] = [];

  constructor(private readonly responses: Record<string, string>) {}

  async fetchText(url: string): Promise<string | null> {
    this.requested.push(url);
    return this.responses[url] ?? null;
  }
}
