import type { MonitorRunOptions } from './run.js';

export const EXIT_NEW_POSTINGS = 0;
export const EXIT_NO_NEW_POSTINGS = 1;
export const EXIT_FATAL = 2;

export type CliArgs = Pick<
  MonitorRunOptions,
  'configPath' | 'statePath' | 'outputDir' | 'showAll' | 'email' | 'csv' | 'historyPath' | 'concurrency' | 'timeoutMs' | 'quiet'
>;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function positiveInt(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isInteger(parsed) || parsed <= 0) {
    throw new CliUsageError(`${flag} expects a positive integer, got ${value ?? 'nothing'}`);
  }
  return parsed;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`${flag} expects a value`);
  }
  return value;
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    configPath: 'config.json',
    statePath: 'seen_jobs.json',
    outputDir: 'output',
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
        args.configPath = requireValue(arg, argv[i + 1]);
        i += 1;
        break;
      case '--state':
        args.statePath = requireValue(arg, argv[i + 1]);
        i += 1;
        break;
      case '--output':
        args.outputDir = requireValue(arg, argv[i + 1]);
        i += 1;
        break;
      case '--history':
        args.historyPath = requireValue(arg, argv[i + 1]);
        i += 1;
        break;
      case '--concurrency':
        args.concurrency = positiveInt(arg, argv[i + 1]);
        i += 1;
        break;
      case '--timeout-ms':
        args.timeoutMs = positiveInt(arg, argv[i + 1]);
        i += 1;
        break;
      case '--all':
        args.showAll = true;
        break;
      case '--email':
        args.email = true;
        break;
      case '--csv':
        args.csv = true;
        break;
      case '--quiet':
        args.quiet = true;
        break;
      default:
        throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  return args;
}

export function exitCodeFor(hasNewPostings: boolean): number {
  return hasNewPostings ? EXIT_NEW_POSTINGS : EXIT_NO_NEW_POSTINGS;
}
