import type { ScoredPosting } from '../types.js';

export interface EmployerGroup {
  employerName: string;
  postings: ScoredPosting[];
}

export function mergePostings(batches: ScoredPosting[][]): ScoredPosting[] {
  return batches.flat();
}

// Array.prototype.sort is stable, so equal scores keep encounter order.
export function rankByRelevance(postings: readonly ScoredPosting[]): ScoredPosting[] {
  return [...postings].sort((a, b) => b.relevance_score - a.relevance_score);
}

export function topByRelevance(postings: readonly ScoredPosting[], limit: number): ScoredPosting[] {
  return rankByRelevance(postings).slice(0, Math.max(0, limit));
}

/**
 * Groups by employer name. Larger groups first, ties in order of first
 * appearance; each group ranked by relevance.
 */
export function groupByEmployer(postings: readonly ScoredPosting[]): EmployerGroup[] {
  const map = new Map<string, ScoredPosting[]>();
  for (const posting of postings) {
    const list = map.get(posting.employer_name) ?? [];
    list.push(posting);
    map.set(posting.employer_name, list);
  }

  return [...map.entries()]
    .map(([employerName, list]) => ({ employerName, postings: rankByRelevance(list) }))
    .sort((a, b) => b.postings.length - a.postings.length);
}
