import type { ScoredPosting } from '../types.js';

export const REASONS_SHOWN = 3;

export function reasonsSummary(posting: ScoredPosting): string {
  return posting.matched_reasons.slice(0, REASONS_SHOWN).join(', ');
}

export function displayLocation(posting: ScoredPosting): string {
  return posting.location || 'See posting';
}

export function reportStatus(isNew: boolean): string {
  return isNew ? 'NEW' : 'All Matching';
}
