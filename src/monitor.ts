#!/usr/bin/env node
import { EXIT_FATAL, exitCodeFor, parseArgs } from './monitor/cli.js';
import { runMonitor } from './monitor/run.js';

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const outcome = await runMonitor(args);
  process.exitCode = exitCodeFor(outcome.hasNewPostings);
}

main().catch((error) => {
  console.error(`Monitor run failed: ${String(error)}`);
  process.exitCode = EXIT_FATAL;
});
