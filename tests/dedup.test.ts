import { describe, expect, it } from 'vitest';
import { careersPageLocalId, globalIdFor } from '../src/dedup/identity.js';
import { filterNew, recordNew } from '../src/dedup/tracker.js';
import type { SeenRecord } from '../src/storage/seenStore.js';
import { makePosting, makeScored } from './helpers.js';

describe('globalIdFor', () => {
  it('prefixes API postings with the source and its board identifier', () => {
    expect(globalIdFor(makePosting({ source_kind: 'greenhouse', source_identifier: 'acme', source_local_id: '4012' }))).toBe(
      'gh_acme_4012',
    );
    expect(
      globalIdFor(makePosting({ source_kind: 'lever', source_identifier: 'acme-co', source_local_id: 'abc-123' })),
    ).toBe('lever_acme-co_abc-123');
  });

  it('keeps the same posting id on different boards apart', () => {
    const a = globalIdFor(makePosting({ source_identifier: 'one', source_local_id: '7' }));
    const b = globalIdFor(makePosting({ source_identifier: 'two', source_local_id: '7' }));
    expect(a).not.toBe(b);
  });

  it('hashes careers page titles into a stable 12 character id', () => {
    const id = careersPageLocalId('Acme', 'Data Engineer');

    expect(id).toMatch(/^[0-9a-f]{12}$/);
    expect(careersPageLocalId('Acme', '  Data Engineer ')).toBe(id);
    expect(careersPageLocalId('Acme', 'Data Engineer II')).not.toBe(id);
    expect(careersPageLocalId('Other', 'Data Engineer')).not.toBe(id);
    expect(globalIdFor(makePosting({ source_kind: 'careers_page', source_local_id: id }))).toBe(`web_${id}`);
  });
});

describe('filterNew', () => {
  const record: SeenRecord = { title: 'Old', company: 'Acme', first_seen: '2026-01-01', url: 'https://example.com/1' };

  it('splits postings by presence in the seen map and keeps order', () => {
    const postings = [
      makeScored({ source_local_id: '1' }),
      makeScored({ source_local_id: '2' }),
      makeScored({ source_local_id: '3' }),
    ];
    const seen = new Map([['gh_acme_2', record]]);

    const { fresh, seen: already } = filterNew(postings, seen);

    expect(fresh.map((p) => p.source_local_id)).toEqual(['1', '3']);
    expect(already.map((p) => p.source_local_id)).toEqual(['2']);
  });

  it('treats a repeat inside the batch as already seen', () => {
    const first = makeScored({ source_local_id: '9', title: 'First' });
    const repeat = makeScored({ source_local_id: '9', title: 'Repeat' });

    const { fresh, seen } = filterNew([first, repeat], new Map());

    expect(fresh).toEqual([first]);
    expect(seen).toEqual([repeat]);
  });
});

describe('recordNew', () => {
  it('adds a record per fresh posting without touching the input map', () => {
    const existing: SeenRecord = {
      title: 'Old',
      company: 'Acme',
      first_seen: '2026-01-01',
      url: 'https://example.com/old',
      notes: 'kept',
    };
    const seen = new Map([['gh_acme_1', existing]]);
    const fresh = [
      makeScored({ source_local_id: '2', title: 'Data Scientist', url: 'https://example.com/2' }),
    ];

    const updated = recordNew(seen, fresh, '2026-03-04');

    expect(seen.size).toBe(1);
    expect(updated.get('gh_acme_1')).toBe(existing);
    expect(updated.get('gh_acme_2')).toEqual({
      title: 'Data Scientist',
      company: 'Acme',
      first_seen: '2026-03-04',
      url: 'https://example.com/2',
    });
  });
});
