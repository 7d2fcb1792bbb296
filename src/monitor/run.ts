import { join } from 'node:path';
import { loadMonitorConfig } from '../config/load.js';
import type { MonitorConfig } from '../config/load.js';
import { RunHistoryDatabase } from '../db/sqlite.js';
import {
  digestSubject,
  renderDigestHtml,
  renderDigestText,
  sendDigestEmail,
  writeEmailRequest,
} from '../email/digest.js';
import type { SmtpSettings } from '../email/digest.js';
import { renderConsoleReport } from '../report/console.js';
import { renderMarkdownReport } from '../report/markdown.js';
import { renderMatchesCsv, writeReportFile } from '../storage/reports.js';
import { JsonSeenStore } from '../storage/seenStore.js';
import type { SeenStore } from '../storage/seenStore.js';
import type { ScoredPosting, TextFetcher } from '../types.js';
import { HttpClient } from '../utils/http.js';
import { RunLogger } from '../utils/logger.js';
import { dateStamp } from '../utils/text.js';
import { runMonitorCore } from './pipeline.js';
import type { MonitorRunResult, RunTotals } from './types.js';

export interface MonitorRunOptions {
  configPath: string;
  statePath: string;
  outputDir: string;
  logDir?: string;
  /** Report every match instead of only the new ones. */
  showAll?: boolean;
  email?: boolean;
  csv?: boolean;
  historyPath?: string;
  concurrency?: number;
  timeoutMs?: number;
  quiet?: boolean;
  /** Injection points; defaults are the real file store, HTTP client and clock. */
  store?: SeenStore;
  fetcher?: TextFetcher;
  now?: () => Date;
  env?: NodeJS.ProcessEnv;
  print?: (text: string) => void;
}

export interface MonitorRunOutcome extends MonitorRunResult {
  reported: ScoredPosting[];
  markdownPath: string;
  csvPath?: string;
  emailRequestPath?: string;
  emailSent: boolean;
}

function smtpFromEnv(env: NodeJS.ProcessEnv): SmtpSettings {
  return {
    host: env.SMTP_HOST,
    port: env.SMTP_PORT,
    user: env.SMTP_USER,
    pass: env.SMTP_PASS,
    from: env.EMAIL_FROM,
  };
}

async function logTotals(logger: RunLogger, totals: RunTotals): Promise<void> {
  for (const [key, value] of Object.entries(totals)) {
    await logger.info(`${key}=${value}`);
  }
}

async function deliverEmail(
  config: MonitorConfig,
  reported: ScoredPosting[],
  generatedAt: Date,
  outputDir: string,
  env: NodeJS.ProcessEnv,
  logger: RunLogger,
): Promise<{ requestPath?: string; sent: boolean }> {
  if (reported.length === 0 && !config.notification.sendEmpty) {
    await logger.info('No postings to email and send_empty is off; email skipped.');
    return { sent: false };
  }

  const to = env.EMAIL_TO || config.notification.email;
  if (!to) {
    await logger.warn('Email requested but neither EMAIL_TO nor notification.email is set.');
    return { sent: false };
  }

  const subject = digestSubject(reported.length, generatedAt);
  const html = renderDigestHtml(reported, generatedAt);
  const text = renderDigestText(reported, generatedAt);

  const requestPath = join(outputDir, 'email_to_send.json');
  await writeEmailRequest(requestPath, { to, subject, body: html, timestamp: generatedAt.toISOString() });
  await writeReportFile(join(outputDir, 'email.html'), html);
  await logger.info(`Email prepared for ${to}`);

  let sent = false;
  try {
    const result = await sendDigestEmail(smtpFromEnv(env), { to, subject, html, text });
    sent = result.sent;
    if (result.sent) {
      await logger.info('Digest email sent.');
    } else {
      await logger.warn(`Email not sent: ${result.reason ?? 'unknown reason'}`);
    }
  } catch (error) {
    await logger.warn(`Email send failed: ${String(error)}`);
  }

  return { requestPath, sent };
}

async function recordHistory(
  historyPath: string,
  result: MonitorRunResult,
  startedAt: string,
  finishedAt: string,
  logger: RunLogger,
): Promise<void> {
  const history = new RunHistoryDatabase(historyPath);
  try {
    await history.init();
  } catch (error) {
    await logger.warn(`Run history not recorded: ${String(error)}`);
    return;
  }

  try {
    const runId = history.createRun(result.runDate, startedAt);
    history.recordMatches(runId, result.allMatchingPostings, new Set(result.newPostings));
    history.finishRun(runId, finishedAt, result.totals, result.stateSaved);
    await history.save();
    await logger.info(`Run ${runId} recorded in ${historyPath}`);
  } catch (error) {
    await logger.warn(`Run history not recorded: ${String(error)}`);
  } finally {
    history.close();
  }
}

/**
 * Full run: config and seen state load (fatal on failure), scrape and dedup,
 * then every report. Reports are emitted even when saving the seen state failed.
 */
export async function runMonitor(options: MonitorRunOptions): Promise<MonitorRunOutcome> {
  const now = options.now ?? (() => new Date());
  const env = options.env ?? process.env;
  const print = options.print ?? ((text: string) => console.log(text));
  const startedAt = now();
  const runDate = dateStamp(startedAt);

  const logger = new RunLogger(join(options.logDir ?? 'logs', `monitor_run_${runDate}.log`), {
    runLabel: 'Monitor run',
    echo: !options.quiet,
  });
  await logger.init();

  try {
    const config = await loadMonitorConfig(options.configPath);
    await logger.info(`Config: ${options.configPath} (${config.companies.length} companies, ${config.sources.length} sources)`);

    const store = options.store ?? new JsonSeenStore(options.statePath);
    const fetcher = options.fetcher ?? new HttpClient(options.timeoutMs ?? 30000, logger);

    const result = await runMonitorCore({
      config,
      store,
      fetcher,
      logger,
      runDate,
      concurrency: options.concurrency,
    });

    await logger.info(`Found ${result.allMatchingPostings.length} matching posting(s), ${result.newPostings.length} new`);

    const isNew = !options.showAll;
    const reported = isNew ? result.newPostings : result.allMatchingPostings;
    const generatedAt = now();

    if (!options.quiet) {
      print(renderConsoleReport(reported, { isNew, generatedAt }));
    }

    const markdownPath = join(options.outputDir, 'new_jobs.md');
    await writeReportFile(markdownPath, renderMarkdownReport(reported, { isNew, generatedAt }));
    await logger.info(`Results saved to ${markdownPath}`);

    let csvPath: string | undefined;
    if (options.csv) {
      csvPath = join(options.outputDir, 'matches.csv');
      await writeReportFile(csvPath, renderMatchesCsv(result.allMatchingPostings));
      await logger.info(`Matches saved to ${csvPath}`);
    }

    let emailRequestPath: string | undefined;
    let emailSent = false;
    if (options.email) {
      const delivery = await deliverEmail(config, reported, generatedAt, options.outputDir, env, logger);
      emailRequestPath = delivery.requestPath;
      emailSent = delivery.sent;
    }

    if (options.historyPath) {
      await recordHistory(options.historyPath, result, startedAt.toISOString(), now().toISOString(), logger);
    }

    await logTotals(logger, result.totals);
    if (!result.stateSaved) {
      await logger.warn('Seen state was not saved; the next run will report these postings as new again.');
    }

    return { ...result, reported, markdownPath, csvPath, emailRequestPath, emailSent };
  } catch (error) {
    await logger.error(`Monitor run failed: ${String(error)}`);
    throw error;
  } finally {
    await logger.close();
  }
}
