import type { TitlePattern } from '../config/patterns.js';

export const HIGH_PRIORITY_BONUS = 50;
export const MEDIUM_PRIORITY_BONUS = 30;
export const KEYWORD_BONUS = 10;
export const PREFERRED_LOCATION_BONUS = 10;

export interface RelevancePolicy {
  readonly highPriority: readonly TitlePattern[];
  readonly mediumPriority: readonly TitlePattern[];
  readonly requiredKeywords: readonly string[];
  readonly excludeKeywords: readonly string[];
  readonly preferredLocations: readonly string[];
  readonly excludedLocations: readonly string[];
}

export type DisqualifyRule = 'exclude_keyword' | 'exclude_location' | 'no_signal';

export type RelevanceResult =
  | { status: 'disqualified'; score: 0; reasons: []; rule: DisqualifyRule }
  | { status: 'scored'; score: number; reasons: string[] };

function disqualified(rule: DisqualifyRule): RelevanceResult {
  return { status: 'disqualified', score: 0, reasons: [], rule };
}

function safeTest(pattern: TitlePattern, text: string): boolean {
  try {
    return pattern.test(text);
  } catch {
    // One broken pattern counts as a miss for this posting only.
    return false;
  }
}

function firstMatch(patterns: readonly TitlePattern[], text: string): TitlePattern | undefined {
  return patterns.find((pattern) => safeTest(pattern, text));
}

/**
 * Scores a posting against the policy. Order of the checks is significant:
 * exclusions are absolute and run before any bonus, and the qualification gate
 * runs before the location bonus so a location alone never qualifies a posting.
 */
export function scoreRelevance(
  title: string,
  description: string,
  location: string,
  policy: RelevancePolicy,
): RelevanceResult {
  const titleLower = title.toLowerCase();
  const descriptionLower = description.toLowerCase();
  const locationLower = location.toLowerCase();
  const combined = `${titleLower} ${descriptionLower} ${locationLower}`;

  if (policy.excludeKeywords.some((keyword) => titleLower.includes(keyword.toLowerCase()))) {
    return disqualified('exclude_keyword');
  }

  const isRemote = locationLower.includes('remote');
  if (!isRemote && policy.excludedLocations.some((loc) => locationLower.includes(loc.toLowerCase()))) {
    return disqualified('exclude_location');
  }

  let score = 0;
  const reasons: string[] = [];

  const high = firstMatch(policy.highPriority, titleLower);
  if (high) {
    score += HIGH_PRIORITY_BONUS;
    reasons.push(`title:${high.source}`);
  }

  const medium = firstMatch(policy.mediumPriority, titleLower);
  if (medium) {
    score += MEDIUM_PRIORITY_BONUS;
    reasons.push(`title:${medium.source}`);
  }

  let keywordFound = false;
  for (const keyword of policy.requiredKeywords) {
    if (combined.includes(keyword.toLowerCase())) {
      score += KEYWORD_BONUS;
      reasons.push(keyword);
      keywordFound = true;
    }
  }

  if (!keywordFound && score < HIGH_PRIORITY_BONUS) {
    return disqualified('no_signal');
  }

  const preferred = policy.preferredLocations.find((loc) => locationLower.includes(loc.toLowerCase()));
  if (preferred !== undefined) {
    score += PREFERRED_LOCATION_BONUS;
    reasons.push(`location:${preferred}`);
  }

  return { status: 'scored', score, reasons };
}
