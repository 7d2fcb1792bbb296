import { createHash } from 'node:crypto';
import type { Posting } from '../types.js';

/**
 * Local id for a careers page posting that has no upstream id. Any edit to the
 * title text yields a new id, so a retitled posting shows up as new again.
 */
export function careersPageLocalId(employerName: string, title: string): string {
  return createHash('md5').update(`${employerName}_${title.trim()}`).digest('hex').slice(0, 12);
}

export function globalIdFor(posting: Posting): string {
  switch (posting.source_kind) {
    case 'greenhouse':
      return `gh_${posting.source_identifier}_${posting.source_local_id}`;
    case 'lever':
      return `lever_${posting.source_identifier}_${posting.source_local_id}`;
    case 'careers_page':
      return `web_${posting.source_local_id}`;
  }
}
