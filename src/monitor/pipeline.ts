import { describeSource, runAdapter } from '../adapters/index.js';
import type { MonitorConfig } from '../config/load.js';
import { filterNew, recordNew } from '../dedup/tracker.js';
import { mergePostings } from '../ranking/aggregate.js';
import { scoreRelevance } from '../scoring/relevance.js';
import type { RelevancePolicy } from '../scoring/relevance.js';
import type { SeenStore } from '../storage/seenStore.js';
import type { EmployerSource, Posting, ScoredPosting, TextFetcher } from '../types.js';
import type { RunLogger } from '../utils/logger.js';
import type { MonitorRunResult, RunTotals, SourceTotals } from './types.js';

export interface CoreRunOptions {
  config: MonitorConfig;
  store: SeenStore;
  fetcher: TextFetcher;
  logger: RunLogger;
  /** `YYYY-MM-DD`, stamped on seen records created by this run. */
  runDate: string;
  concurrency?: number;
}

export function scorePostings(
  postings: Posting[],
  policy: RelevancePolicy,
): { matches: ScoredPosting[]; disqualified: number } {
  const matches: ScoredPosting[] = [];
  let disqualified = 0;

  for (const posting of postings) {
    // Only title and location are scored; the snippet is for display.
    const result = scoreRelevance(posting.title, '', posting.location, policy);
    if (result.status === 'disqualified') {
      disqualified += 1;
      continue;
    }
    matches.push({
      ...posting,
      relevance_score: result.score,
      matched_reasons: result.reasons,
    });
  }

  return { matches, disqualified };
}

/**
 * Runs `task` over `items` with at most `lanes` calls in flight. Lanes pull from
 * one shared iterator; results land at their item's index.
 */
export async function runInLanes<T, R>(
  items: readonly T[],
  lanes: number,
  task: (item: T) => Promise<R>,
): Promise<R[]> {
  if (!Number.isInteger(lanes) || lanes < 1) {
    throw new Error(`concurrency must be a positive integer, got ${lanes}`);
  }

  const results = new Array<R>(items.length);
  const queue = items.entries();
  const lane = async (): Promise<void> => {
    for (const [index, item] of queue) {
      results[index] = await task(item);
    }
  };

  await Promise.all(Array.from({ length: Math.min(lanes, items.length) }, lane));
  return results;
}

interface SourceOutcome {
  matches: ScoredPosting[];
  disqualified: number;
  totals: SourceTotals;
}

async function scrapeSource(
  source: EmployerSource,
  policy: RelevancePolicy,
  fetcher: TextFetcher,
  logger: RunLogger,
): Promise<SourceOutcome> {
  const totals: SourceTotals = {
    employer_name: source.employerName,
    source_kind: source.sourceKind,
    source_identifier: source.sourceIdentifier,
    fetched_count: 0,
    matching_count: 0,
    failed: false,
  };

  let postings: Posting[];
  try {
    postings = await runAdapter(source, fetcher, logger);
  } catch (error) {
    await logger.warn(`Adapter failed for ${describeSource(source)}: ${String(error)}`);
    totals.failed = true;
    return { matches: [], disqualified: 0, totals };
  }

  const { matches, disqualified } = scorePostings(postings, policy);
  totals.fetched_count = postings.length;
  totals.matching_count = matches.length;
  await logger.info(`${describeSource(source)}: ${postings.length} fetched, ${matches.length} matching`);

  return { matches, disqualified, totals };
}

/**
 * One monitoring pass. The seen map is loaded before any fetch and saved once
 * after the merge; a failed save is reported in the result instead of thrown so
 * the caller can still emit this run's reports.
 */
export async function runMonitorCore(options: CoreRunOptions): Promise<MonitorRunResult> {
  const { config, store, fetcher, logger, runDate } = options;
  const concurrency = options.concurrency ?? 1;

  const seenBefore = await store.load();
  await logger.info(`Previously seen: ${seenBefore.size} posting(s)`);

  for (const name of config.unreachableCompanies) {
    await logger.warn(`Company ${name} has no greenhouse_id, lever_id or careers_url; skipped`);
  }

  // Outcomes come back in source order whatever the concurrency.
  const outcomes = await runInLanes(config.sources, concurrency, (source) =>
    scrapeSource(source, config.policy, fetcher, logger),
  );

  const allMatchingPostings = mergePostings(outcomes.map((outcome) => outcome.matches));
  const { fresh, seen: previouslySeen } = filterNew(allMatchingPostings, seenBefore);
  const seenAfter = recordNew(seenBefore, fresh, runDate);

  let stateSaved = true;
  try {
    await store.save(seenAfter);
  } catch (error) {
    stateSaved = false;
    await logger.error(
      `Could not save seen state (${String(error)}); the ${fresh.length} new posting(s) of this run will be reported again next run`,
    );
  }

  const totals: RunTotals = {
    companies_count: config.companies.length,
    sources_count: config.sources.length,
    sources_failed_count: outcomes.filter((outcome) => outcome.totals.failed).length,
    postings_fetched_count: outcomes.reduce((sum, outcome) => sum + outcome.totals.fetched_count, 0),
    disqualified_count: outcomes.reduce((sum, outcome) => sum + outcome.disqualified, 0),
    matching_postings_count: allMatchingPostings.length,
    new_postings_count: fresh.length,
    previously_seen_count: previouslySeen.length,
    seen_state_size: seenAfter.size,
  };

  return {
    runDate,
    newPostings: fresh,
    allMatchingPostings,
    hasNewPostings: fresh.length > 0,
    stateSaved,
    seen: seenAfter,
    totals,
    sources: outcomes.map((outcome) => outcome.totals),
  };
}
