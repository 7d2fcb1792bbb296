import type { SeenMap, SeenRecord } from '../storage/seenStore.js';
import type { ScoredPosting } from '../types.js';
import { globalIdFor } from './identity.js';

export interface DedupSplit {
  fresh: ScoredPosting[];
  seen: ScoredPosting[];
}

export function isNew(globalId: string, seen: ReadonlyMap<string, SeenRecord>): boolean {
  return !seen.has(globalId);
}

/**
 * Splits postings into never-seen and already-seen, keeping input order in both.
 * A GlobalId repeated inside the batch is fresh only the first time.
 */
export function filterNew(postings: ScoredPosting[], seen: ReadonlyMap<string, SeenRecord>): DedupSplit {
  const fresh: ScoredPosting[] = [];
  const already: ScoredPosting[] = [];
  const batchIds = new Set<string>();

  for (const posting of postings) {
    const id = globalIdFor(posting);
    if (isNew(id, seen) && !batchIds.has(id)) {
      fresh.push(posting);
    } else {
      already.push(posting);
    }
    batchIds.add(id);
  }

  return { fresh, seen: already };
}

export function seenRecordFor(posting: ScoredPosting, firstSeen: string): SeenRecord {
  return {
    title: posting.title,
    company: posting.employer_name,
    first_seen: firstSeen,
    url: posting.url,
  };
}

/**
 * Returns a copy of `seen` with a record for every fresh posting. Ids outside
 * the batch are carried over untouched; nothing is ever pruned.
 */
export function recordNew(
  seen: ReadonlyMap<string, SeenRecord>,
  fresh: ScoredPosting[],
  firstSeen: string,
): SeenMap {
  const updated: SeenMap = new Map(seen);
  for (const posting of fresh) {
    updated.set(globalIdFor(posting), seenRecordFor(posting, firstSeen));
  }
  return updated;
}
