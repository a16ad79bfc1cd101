import type { DatePattern } from './patterns.js';

export interface DateStrategy {
  readonly name: string;
  extract(content: string): Date[];
}

function collect(pattern: DatePattern, content: string): Date[] {
  const samples: Date[] = [];
  for (const match of content.matchAll(pattern.regex)) {
    const date = pattern.parse(match);
    if (date) samples.push(date);
  }
  return samples;
}

/**
 * Try patterns in priority order and keep only the samples of the first one
 * that produces any. Used for plain-text exports, where the shapes are
 * alternatives for the same timestamps.
 */
export class FirstMatchingPattern implements DateStrategy {
  readonly name = 'first-matching-pattern';
  private readonly patterns: readonly DatePattern[];

  constructor(patterns: readonly DatePattern[]) {
    this.patterns = patterns;
  }

  extract(content: string): Date[] {
    for (const pattern of this.patterns) {
      const samples = collect(pattern, content);
      if (samples.length > 0) return samples;
    }
    return [];
  }
}

/** Apply every pattern and union the results. Used for hypertext exports. */
export class AllPatternsUnion implements DateStrategy {
  readonly name = 'all-patterns-union';
  private readonly patterns: readonly DatePattern[];

  constructor(patterns: readonly DatePattern[]) {
    this.patterns = patterns;
  }

  extract(content: string): Date[] {
    return this.patterns.flatMap(pattern => collect(pattern, content));
  }
}
