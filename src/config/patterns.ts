export type PatternKind = 'regex' | 'literal';

/**
 * Title pattern compiled once at config load. `source` is the text echoed in
 * match reasons (`title:<source>`).
 */
export interface TitlePattern {
  kind: PatternKind;
  source: string;
  test(text: string): boolean;
}

export class PatternError extends Error {
  constructor(
    readonly pattern: string,
    reason: string,
  ) {
    super(`Invalid title pattern "${pattern}": ${reason}`);
    this.name = 'PatternError';
  }
}

export function literalPattern(source: string): TitlePattern {
  const needle = source.toLowerCase();
  return {
    kind: 'literal',
    source,
    test: (text) => text.toLowerCase().includes(needle),
  };
}

export function regexPattern(source: string): TitlePattern {
  let compiled: RegExp;
  try {
    // No `g` flag: test() must not carry lastIndex between postings.
    compiled = new RegExp(source, 'i');
  } catch (error) {
    throw new PatternError(source, error instanceof Error ? error.message : String(error));
  }

  return {
    kind: 'regex',
    source,
    test: (text) => compiled.test(text),
  };
}
