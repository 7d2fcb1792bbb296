import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { RunLogger } from '../src/utils/logger.js';
import { makeTempDir } from './helpers.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('RunLogger', () => {
  it('writes timestamped, levelled lines between start and finish markers', async () => {
    const dir = await makeTempDir();
    const path = join(dir, 'logs', 'monitor.log');
    const logger = new RunLogger(path, { runLabel: 'Test run' });

    await logger.init();
    await logger.info('fetched 3');
    await logger.warn('board missing');
    await logger.error('save failed');
    await logger.close();

    const lines = (await readFile(path, 'utf8')).trimEnd().split('\n');
    expect(lines).toHaveLength(5);
    expect(lines.map((line) => line.replace(/^\S+ /, ''))).toEqual([
      expect.stringMatching(/^=== Test run started \S+ ===$/),
      '[INFO] fetched 3',
      '[WARN] board missing',
      '[ERROR] save failed',
      expect.stringMatching(/^=== Test run finished \S+ ===$/),
    ]);
  });

  it('mirrors lines to the console when echo is on', async () => {
    const dir = await makeTempDir();
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new RunLogger(join(dir, 'echo.log'), { echo: true });

    await logger.init();
    await logger.info('hello');

    expect(log).toHaveBeenLastCalledWith('[INFO] hello');
  });
});
