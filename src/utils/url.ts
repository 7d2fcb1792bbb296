import { URL } from 'node:url';

// Campaign and board-referral parameters; they never identify a posting.
const TRACKING_PARAMS = new Set([
  'utm_source',
  'utm_medium',
  'utm_campaign',
  'utm_term',
  'utm_content',
  'gclid',
  'fbclid',
  'gh_src',
  'lever-source',
]);

export function isHttpUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

function withScheme(value: string): string {
  if (value.startsWith('//')) {
    return `https:${value}`;
  }
  return isHttpUrl(value) ? value : `https://${value}`;
}

export function toAbsoluteUrl(value: string, base: string): string {
  try {
    return new URL(value, base).toString();
  } catch {
    return value;
  }
}

/**
 * Canonical form for fetching and reporting: scheme added when missing, host
 * lowercased, fragment and tracking parameters removed.
 */
export function cleanUrl(rawUrl: string): string {
  const trimmed = rawUrl.trim();
  if (!trimmed) {
    return '';
  }

  let url: URL;
  try {
    url = new URL(withScheme(trimmed));
  } catch {
    return trimmed;
  }

  const tracking = [...url.searchParams.keys()].filter((key) => TRACKING_PARAMS.has(key.toLowerCase()));
  for (const key of tracking) {
    url.searchParams.delete(key);
  }
  url.hash = '';
  url.hostname = url.hostname.toLowerCase();
  return url.toString();
}
