import { topByRelevance } from '../ranking/aggregate.js';
import type { ScoredPosting } from '../types.js';
import { formatTimestamp } from '../utils/text.js';
import { displayLocation, reasonsSummary, reportStatus } from './format.js';

export const CONSOLE_LIMIT = 20;
const RULE = '='.repeat(70);

export interface ConsoleReportOptions {
  isNew: boolean;
  generatedAt: Date;
}

export function renderConsoleReport(postings: readonly ScoredPosting[], options: ConsoleReportOptions): string {
  const lines = [
    '',
    RULE,
    `  JOB MONITOR RESULTS - ${reportStatus(options.isNew)}`,
    `  Generated: ${formatTimestamp(options.generatedAt)}`,
    `  Total Jobs: ${postings.length}`,
    RULE,
  ];

  if (postings.length === 0) {
    lines.push('', '  No new matching jobs found today.', '  Keep checking - the right role will appear!', '');
    return lines.join('\n');
  }

  for (const posting of topByRelevance(postings, CONSOLE_LIMIT)) {
    lines.push(
      '',
      `  * ${posting.title}`,
      `     Company:  ${posting.employer_name}`,
      `     Location: ${displayLocation(posting)}`,
      `     Score:    ${posting.relevance_score} (${reasonsSummary(posting)})`,
      `     URL:      ${posting.url}`,
    );
  }

  lines.push('', RULE, '');
  return lines.join('\n');
}
