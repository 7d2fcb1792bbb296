import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';

// Extra keys written by other versions survive a load/save round trip.
export const seenRecordSchema = z
  .object({
    title: z.string(),
    company: z.string(),
    first_seen: z.string(),
    url: z.string(),
  })
  .passthrough();

export const seenFileSchema = z.record(seenRecordSchema);

export type SeenRecord = z.infer<typeof seenRecordSchema>;
export type SeenMap = Map<string, SeenRecord>;

export class SeenStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SeenStateError';
  }
}

export interface SeenStore {
  load(): Promise<SeenMap>;
  save(seen: ReadonlyMap<string, SeenRecord>): Promise<void>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Seen map kept as one pretty-printed JSON object keyed by GlobalId. Read whole
 * at start and replaced whole at the end of a run.
 */
export class JsonSeenStore implements SeenStore {
  constructor(readonly filePath: string) {}

  async load(): Promise<SeenMap> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return new Map();
      }
      throw new SeenStateError(`Cannot read seen state ${this.filePath}: ${String(error)}`);
    }

    if (content.trim() === '') {
      return new Map();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new SeenStateError(`Seen state ${this.filePath} is not valid JSON: ${String(error)}`);
    }

    const parsed = seenFileSchema.safeParse(raw);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      throw new SeenStateError(
        `Seen state ${this.filePath} has an unexpected shape at ${first?.path.join('.') ?? '(root)'}: ${first?.message ?? 'unknown'}`,
      );
    }

    return new Map(Object.entries(parsed.data));
  }

  async save(seen: ReadonlyMap<string, SeenRecord>): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const data = Object.fromEntries(seen);
    await writeFile(this.filePath, `${JSON.stringify(data, null, 2)}\n`, 'utf8');
  }
}

export class MemorySeenStore implements SeenStore {
  private state: SeenMap;
  saveCount = 0;

  constructor(initial: Iterable<[string, SeenRecord]> = []) {
    this.state = new Map(initial);
  }

  async load(): Promise<SeenMap> {
    return new Map(this.state);
  }

  async save(seen: ReadonlyMap<string, SeenRecord>): Promise<void> {
    this.state = new Map(seen);
    this.saveCount += 1;
  }

  snapshot(): SeenMap {
    return new Map(this.state);
  }
}
