import { groupByEmployer, topByRelevance } from '../ranking/aggregate.js';
import type { ScoredPosting } from '../types.js';
import { formatTimestamp } from '../utils/text.js';
import { displayLocation, reasonsSummary, reportStatus } from './format.js';

export const QUICK_APPLY_LIMIT = 10;

export interface MarkdownReportOptions {
  isNew: boolean;
  generatedAt: Date;
}

export function renderMarkdownReport(postings: readonly ScoredPosting[], options: MarkdownReportOptions): string {
  const lines = [
    `# Job Monitor Results - ${reportStatus(options.isNew)}`,
    `**Generated:** ${formatTimestamp(options.generatedAt)}`,
    `**Total Jobs:** ${postings.length}`,
    '',
  ];

  if (postings.length === 0) {
    lines.push('No new matching jobs found today.', '', 'Keep checking - the right role will appear!');
    return lines.join('\n');
  }

  for (const group of groupByEmployer(postings)) {
    lines.push(`## ${group.employerName} (${group.postings.length} jobs)`, '');
    for (const posting of group.postings) {
      lines.push(`### [${posting.title}](${posting.url})`);
      lines.push(`- **Location:** ${displayLocation(posting)}`);
      lines.push(`- **Relevance:** ${posting.relevance_score} (${reasonsSummary(posting)})`);
      if (posting.salary) {
        lines.push(`- **Salary:** ${posting.salary}`);
      }
      if (posting.posted_date) {
        lines.push(`- **Posted:** ${posting.posted_date}`);
      }
      if (posting.description_snippet) {
        lines.push(`- **Summary:** ${posting.description_snippet}`);
      }
      lines.push('');
    }
  }

  lines.push('---', '## Quick Apply Links', '');
  for (const posting of topByRelevance(postings, QUICK_APPLY_LIMIT)) {
    lines.push(`- [${posting.employer_name}: ${posting.title}](${posting.url})`);
  }

  return lines.join('\n');
}
