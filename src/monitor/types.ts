import type { SeenMap } from '../storage/seenStore.js';
import type { ScoredPosting, SourceKind } from '../types.js';

export interface SourceTotals {
  employer_name: string;
  source_kind: SourceKind;
  source_identifier: string;
  fetched_count: number;
  matching_count: number;
  failed: boolean;
}

export interface RunTotals {
  companies_count: number;
  sources_count: number;
  sources_failed_count: number;
  postings_fetched_count: number;
  disqualified_count: number;
  matching_postings_count: number;
  new_postings_count: number;
  previously_seen_count: number;
  seen_state_size: number;
}

export interface MonitorRunResult {
  runDate: string;
  /** Matches whose GlobalId was not in the seen map, in merge order. */
  newPostings: ScoredPosting[];
  /** Every surviving match of this run, in merge order. */
  allMatchingPostings: ScoredPosting[];
  hasNewPostings: boolean;
  stateSaved: boolean;
  seen: SeenMap;
  totals: RunTotals;
  sources: SourceTotals[];
}
