export type SourceKind = 'greenhouse' | 'lever' | 'careers_page';

export interface EmployerSource {
  employerName: string;
  sourceKind: SourceKind;
  /** Board token, Lever slug or careers page URL. */
  sourceIdentifier: string;
}

/**
 * Canonical posting shared by every source. Unknown values are empty strings.
 */
export interface Posting {
  source_kind: SourceKind;
  source_local_id: string;
  source_identifier: string;
  employer_name: string;
  title: string;
  location: string;
  url: string;
  description_snippet: string;
  posted_date: string;
  salary: string;
}

export interface ScoredPosting extends Posting {
  relevance_score: number;
  matched_reasons: string[];
}

export interface FetchResult {
  status: number;
  url: string;
  headers: Record<string, string>;
  body: string;
  contentType: string;
}

/**
 * Anything that can fetch a URL as text. `null` means no data for any reason.
 */
export interface TextFetcher {
  fetchText(url: string): Promise<string | null>;
}
