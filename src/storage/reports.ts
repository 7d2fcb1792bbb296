import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { globalIdFor } from '../dedup/identity.js';
import type { ScoredPosting } from '../types.js';

export const MATCHES_CSV_HEADER = [
  'global_id',
  'employer_name',
  'title',
  'location',
  'relevance_score',
  'matched_reasons',
  'posted_date',
  'salary',
  'source_kind',
  'url',
] as const;

function escapeCsvCell(value: string): string {
  if (/[",\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function renderMatchesCsv(postings: readonly ScoredPosting[]): string {
  const rows = postings.map((posting) => [
    globalIdFor(posting),
    posting.employer_name,
    posting.title,
    posting.location,
    String(posting.relevance_score),
    posting.matched_reasons.join('; '),
    posting.posted_date,
    posting.salary,
    posting.source_kind,
    posting.url,
  ]);

  const lines = [[...MATCHES_CSV_HEADER], ...rows].map((row) => row.map((cell) => escapeCsvCell(cell)).join(','));
  return `${lines.join('\n')}\n`;
}

export async function writeReportFile(filePath: string, content: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, content.endsWith('\n') ? content : `${content}\n`, 'utf8');
}
