import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import initSqlJs from 'sql.js';
import type { Database, SqlJsStatic } from 'sql.js';
import { globalIdFor } from '../dedup/identity.js';
import type { RunTotals } from '../monitor/types.js';
import type { ScoredPosting } from '../types.js';

type SqlParam = string | number | null;

export interface RunRow {
  run_id: number;
  run_date: string;
  started_at: string;
  finished_at: string | null;
  state_saved: number | null;
  totals_json: string | null;
}

export interface RunMatchRow {
  run_id: number;
  global_id: string;
  employer_name: string;
  title: string;
  url: string;
  relevance_score: number;
  is_new: number;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function asNumber(value: unknown): number {
  return typeof value === 'number' ? value : Number(value);
}

function asString(value: unknown): string {
  return typeof value === 'string' ? value : String(value ?? '');
}

function asNullableString(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value);
}

/**
 * Optional audit trail of runs and the matches each produced. Dedup never reads
 * it; the seen map stays the source of truth for what is new.
 */
export class RunHistoryDatabase {
  private sql!: SqlJsStatic;
  private db!: Database;

  constructor(
    private readonly filePath: string,
    private readonly wasmPath = join(process.cwd(), 'node_modules', 'sql.js', 'dist', 'sql-wasm.wasm'),
  ) {}

  async init(): Promise<void> {
    this.sql = await initSqlJs({
      locateFile: () => this.wasmPath,
    });

    let existing: Uint8Array | undefined;
    try {
      existing = new Uint8Array(await readFile(this.filePath));
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
    }

    this.db = existing ? new this.sql.Database(existing) : new this.sql.Database();
    this.ensureSchema();
  }

  private ensureSchema(): void {
    this.db.run(`
      CREATE TABLE IF NOT EXISTS runs (
        run_id INTEGER PRIMARY KEY AUTOINCREMENT,
        run_date TEXT NOT NULL,
        started_at TEXT NOT NULL,
        finished_at TEXT,
        state_saved INTEGER,
        totals_json TEXT
      );

      CREATE TABLE IF NOT EXISTS run_matches (
        run_id INTEGER NOT NULL,
        position INTEGER NOT NULL,
        global_id TEXT NOT NULL,
        employer_name TEXT NOT NULL,
        title TEXT NOT NULL,
        url TEXT NOT NULL,
        relevance_score INTEGER NOT NULL,
        is_new INTEGER NOT NULL,
        PRIMARY KEY (run_id, position)
      );

      CREATE INDEX IF NOT EXISTS idx_run_matches_global_id ON run_matches(global_id);
    `);
  }

  async save(): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, Buffer.from(this.db.export()));
  }

  close(): void {
    this.db.close();
  }

  createRun(runDate: string, startedAt: string): number {
    this.db.run('INSERT INTO runs (run_date, started_at) VALUES (?, ?)', [runDate, startedAt]);
    return asNumber(this.firstValue('SELECT last_insert_rowid()'));
  }

  /** `fresh` holds the very posting objects that were new this run, so a repeated id is new only once. */
  recordMatches(runId: number, matches: readonly ScoredPosting[], fresh: ReadonlySet<ScoredPosting>): void {
    matches.forEach((posting, position) => {
      const globalId = globalIdFor(posting);
      this.db.run(
        `
        INSERT INTO run_matches (
          run_id, position, global_id, employer_name, title, url, relevance_score, is_new
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        `,
        [
          runId,
          position,
          globalId,
          posting.employer_name,
          posting.title,
          posting.url,
          posting.relevance_score,
          fresh.has(posting) ? 1 : 0,
        ],
      );
    });
  }

  finishRun(runId: number, finishedAt: string, totals: RunTotals, stateSaved: boolean): void {
    this.db.run('UPDATE runs SET finished_at = ?, state_saved = ?, totals_json = ? WHERE run_id = ?', [
      finishedAt,
      stateSaved ? 1 : 0,
      JSON.stringify(totals),
      runId,
    ]);
  }

  listRuns(): RunRow[] {
    return this.queryRows(
      'SELECT run_id, run_date, started_at, finished_at, state_saved, totals_json FROM runs ORDER BY run_id',
    ).map((row) => ({
      run_id: asNumber(row.run_id),
      run_date: asString(row.run_date),
      started_at: asString(row.started_at),
      finished_at: asNullableString(row.finished_at),
      state_saved: row.state_saved === null ? null : asNumber(row.state_saved),
      totals_json: asNullableString(row.totals_json),
    }));
  }

  listMatches(runId: number): RunMatchRow[] {
    return this.queryRows(
      `
      SELECT run_id, global_id, employer_name, title, url, relevance_score, is_new
      FROM run_matches
      WHERE run_id = ?
      ORDER BY position
      `,
      [runId],
    ).map((row) => ({
      run_id: asNumber(row.run_id),
      global_id: asString(row.global_id),
      employer_name: asString(row.employer_name),
      title: asString(row.title),
      url: asString(row.url),
      relevance_score: asNumber(row.relevance_score),
      is_new: asNumber(row.is_new),
    }));
  }

  private queryRows(sql: string, params: SqlParam[] = []): Array<Record<string, unknown>> {
    const stmt = this.db.prepare(sql, params);
    const rows: Array<Record<string, unknown>> = [];
    try {
      while (stmt.step()) {
        rows.push(stmt.getAsObject());
      }
    } finally {
      stmt.free();
    }
    return rows;
  }

  private firstValue(sql: string, params: SqlParam[] = []): unknown {
    const stmt = this.db.prepare(sql, params);
    try {
      return stmt.step() ? stmt.get()[0] : null;
    } finally {
      stmt.free();
    }
  }
}
