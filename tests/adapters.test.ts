import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { collectCandidates, normalizeCareersPage } from '../src/adapters/careersPage.js';
import { htmlToText } from '../src/adapters/common.js';
import { greenhouseBoardUrl, normalizeGreenhouseBoard, scrapeGreenhouse } from '../src/adapters/greenhouse.js';
import { describeSource, runAdapter } from '../src/adapters/index.js';
import { formatLeverSalary, leverPostingsUrl, normalizeLeverPostings, scrapeLever } from '../src/adapters/lever.js';
import { careersPageLocalId } from '../src/dedup/identity.js';
import type { EmployerSource } from '../src/types.js';
import { FakeFetcher, makeLogger, makeTempDir } from './helpers.js';

async function fixture(name: string): Promise<string> {
  return readFile(new URL(`./fixtures/${name}`, import.meta.url), 'utf8');
}

const greenhouseSource: EmployerSource = { employerName: 'Acme', sourceKind: 'greenhouse', sourceIdentifier: 'acme' };
const leverSource: EmployerSource = { employerName: 'Sample Labs', sourceKind: 'lever', sourceIdentifier: 'sample' };
const careersSource: EmployerSource = {
  employerName: 'Acme Analytics',
  sourceKind: 'careers_page',
  sourceIdentifier: 'https://careers.acme-analytics.example/jobs',
};

describe('htmlToText', () => {
  it('strips markup that arrives entity-escaped', () => {
    expect(htmlToText('&lt;p&gt;Hello &lt;em&gt;world&lt;/em&gt;&lt;/p&gt;')).toBe('Hello world');
  });
});

describe('greenhouse', () => {
  it('builds the board URL with content included', () => {
    expect(greenhouseBoardUrl('acme')).toBe('https://boards-api.greenhouse.io/v1/boards/acme/jobs?content=true');
  });

  it('normalizes jobs and skips incomplete records', async () => {
    const payload: unknown = JSON.parse(await fixture('greenhouse-board.json'));

    const { postings, skipped } = normalizeGreenhouseBoard(payload, greenhouseSource);

    expect(skipped).toBe(2);
    expect(postings).toEqual([
      {
        source_kind: 'greenhouse',
        source_local_id: '4012',
        source_identifier: 'acme',
        employer_name: 'Acme',
        title: 'Senior Data Scientist',
        location: 'Remote - US',
        url: 'https://boards.greenhouse.io/acme/jobs/4012',
        description_snippet: 'Build forecasting models with Python & SQL.',
        posted_date: '2026-03-01',
        salary: '',
      },
      {
        source_kind: 'greenhouse',
        source_local_id: '4013',
        source_identifier: 'acme',
        employer_name: 'Acme',
        title: 'Machine Learning Engineer',
        location: '',
        url: 'https://boards.greenhouse.io/acme/jobs/4013',
        description_snippet: '',
        posted_date: '',
        salary: '',
      },
    ]);
  });

  it('yields nothing for a payload without a jobs list', () => {
    expect(normalizeGreenhouseBoard({ error: 'not found' }, greenhouseSource)).toEqual({
      postings: [],
      skipped: 0,
      payloadError: 'payload has no jobs list',
    });
  });

  it('cuts description snippets at 200 characters', () => {
    const payload = {
      jobs: [{ id: 1, title: 'Analyst', absolute_url: 'https://example.com/1', content: 'x'.repeat(500) }],
    };
    const { postings } = normalizeGreenhouseBoard(payload, greenhouseSource);
    expect(postings[0]?.description_snippet).toHaveLength(200);
  });

  it('contributes nothing when the fetch yields no data', async () => {
    const logger = await makeLogger(await makeTempDir());
    const fetcher = new FakeFetcher({});

    expect(await scrapeGreenhouse(greenhouseSource, fetcher, logger)).toEqual([]);
    expect(fetcher.requested).toEqual([greenhouseBoardUrl('acme')]);
  });

  it('warns and contributes nothing when the body is not JSON', async () => {
    const dir = await makeTempDir();
    const logger = await makeLogger(dir);
    const fetcher = new FakeFetcher({ [greenhouseBoardUrl('acme')]: '<html>maintenance</html>' });

    expect(await scrapeGreenhouse(greenhouseSource, fetcher, logger)).toEqual([]);
    expect(await readFile(join(dir, 'test.log'), 'utf8')).toContain(
      '[WARN] Greenhouse board acme (Acme) did not return JSON',
    );
  });

  it('warns when the board has no jobs list', async () => {
    const dir = await makeTempDir();
    const logger = await makeLogger(dir);
    const fetcher = new FakeFetcher({ [greenhouseBoardUrl('acme')]: '{"status":404}' });

    expect(await scrapeGreenhouse(greenhouseSource, fetcher, logger)).toEqual([]);
    expect(await readFile(join(dir, 'test.log'), 'utf8')).toContain(
      '[WARN] Unexpected Greenhouse response for Acme: payload has no jobs list',
    );
  });
});

describe('lever', () => {
  it('builds the postings URL in JSON mode', () => {
    expect(leverPostingsUrl('sample')).toBe('https://api.lever.co/v0/postings/sample?mode=json');
  });

  it('normalizes postings and skips records without an id or link', async () => {
    const payload: unknown = JSON.parse(await fixture('lever-postings.json'));

    const { postings, skipped } = normalizeLeverPostings(payload, leverSource);

    expect(skipped).toBe(2);
    expect(postings).toEqual([
      {
        source_kind: 'lever',
        source_local_id: 'a1b2c3',
        source_identifier: 'sample',
        employer_name: 'Sample Labs',
        title: 'Data Analyst',
        location: 'New York, NY',
        url: 'https://jobs.lever.co/sample/a1b2c3',
        description_snippet: 'Own dashboards and reporting.',
        posted_date: '2026-01-01',
        salary: 'USD 90000-120000 per-year-salary',
      },
      {
        source_kind: 'lever',
        source_local_id: 'd4e5f6',
        source_identifier: 'sample',
        employer_name: 'Sample Labs',
        title: 'Analytics Engineer',
        location: '',
        url: 'https://jobs.lever.co/sample/d4e5f6/apply',
        description_snippet: '',
        posted_date: '',
        salary: 'EUR 70000',
      },
    ]);
  });

  it('falls back to the apply link when the hosted link is blank', () => {
    const { postings, skipped } = normalizeLeverPostings(
      [{ id: 'k1', text: 'Data Analyst', hostedUrl: '', applyUrl: 'https://jobs.lever.co/sample/k1/apply' }],
      leverSource,
    );

    expect(skipped).toBe(0);
    expect(postings.map((p) => p.url)).toEqual(['https://jobs.lever.co/sample/k1/apply']);
  });

  it('warns when the response is not a list', async () => {
    const dir = await makeTempDir();
    const logger = await makeLogger(dir);
    const fetcher = new FakeFetcher({ [leverPostingsUrl('sample')]: '{"ok":false}' });

    expect(await scrapeLever(leverSource, fetcher, logger)).toEqual([]);
    expect(await readFile(join(dir, 'test.log'), 'utf8')).toContain(
      '[WARN] Unexpected Lever response for Sample Labs: payload is not a list of postings',
    );
  });

  it('formats partial salary ranges', () => {
    expect(formatLeverSalary({ min: 50000 })).toBe('50000');
    expect(formatLeverSalary({ max: 80, interval: 'per-hour-wage' })).toBe('80 per-hour-wage');
    expect(formatLeverSalary({ currency: 'USD' })).toBe('');
    expect(formatLeverSalary(null)).toBe('');
  });

  it('yields nothing for a non-array payload', () => {
    expect(normalizeLeverPostings({ ok: false }, leverSource)).toEqual({
      postings: [],
      skipped: 0,
      payloadError: 'payload is not a list of postings',
    });
  });
});

describe('careers page', () => {
  it('collects the leading text of job-like elements', async () => {
    const candidates = collectCandidates(await fixture('careers-page.html'));

    expect(candidates).toEqual([
      { title: 'Jobs', rawTitle: 'Jobs', href: '' },
      { title: 'Data Engineer', rawTitle: 'Data Engineer', href: '/jobs/data-engineer?utm_source=feed#apply' },
      {
        title: 'Machine Learning Lead',
        rawTitle: 'Machine Learning Lead',
        href: 'https://apply.example.com/ml?gh_src=abc',
      },
      { title: 'R&D Analyst', rawTitle: 'R&amp;D Analyst', href: '' },
      { title: 'Data Engineer', rawTitle: 'Data Engineer', href: '/jobs/data-engineer-2' },
    ]);
  });

  it('drops short and repeated titles and resolves links', async () => {
    const { postings } = normalizeCareersPage(await fixture('careers-page.html'), careersSource);

    expect(postings.map((p) => [p.title, p.url, p.source_local_id])).toEqual([
      [
        'Data Engineer',
        'https://careers.acme-analytics.example/jobs/data-engineer',
        careersPageLocalId('Acme Analytics', 'Data Engineer'),
      ],
      ['Machine Learning Lead', 'https://apply.example.com/ml', careersPageLocalId('Acme Analytics', 'Machine Learning Lead')],
      ['R&D Analyst', 'https://careers.acme-analytics.example/jobs', '498e1cd66e49'],
    ]);
    expect(postings.every((p) => p.location === '' && p.description_snippet === '')).toBe(true);
  });

  it('derives ids from the title text exactly as written in the page', () => {
    const page = (title: string) => `<body><h3 class="job-title">${title}</h3></body>`;

    const [collapsed] = normalizeCareersPage(page('Data Engineer'), careersSource).postings;
    const [spaced] = normalizeCareersPage(page('Data   Engineer'), careersSource).postings;
    const [padded] = normalizeCareersPage(page('\n  Data Engineer  \n'), careersSource).postings;

    expect(collapsed?.source_local_id).toBe('e23cd6fd0953');
    expect(spaced?.source_local_id).toBe('4cbcaaba1b7e');
    expect(spaced?.title).toBe('Data Engineer');
    expect(padded?.source_local_id).toBe('e23cd6fd0953');
  });

  it('considers only the first twenty candidates', () => {
    const items = Array.from({ length: 25 }, (_, i) => `<a class="job" href="/j/${i}">Opening number ${i}</a>`).join('');
    const { postings } = normalizeCareersPage(`<body>${items}</body>`, careersSource);

    expect(postings).toHaveLength(20);
    expect(postings[19]?.title).toBe('Opening number 19');
  });

  it('is reached through the adapter registry', async () => {
    const logger = await makeLogger(await makeTempDir());
    const fetcher = new FakeFetcher({ [careersSource.sourceIdentifier]: await fixture('careers-page.html') });

    const postings = await runAdapter(careersSource, fetcher, logger);

    expect(postings.map((p) => p.title)).toEqual(['Data Engineer', 'Machine Learning Lead', 'R&D Analyst']);
    expect(describeSource(careersSource)).toBe(
      'Acme Analytics [careers_page:https://careers.acme-analytics.example/jobs]',
    );
  });
});
