import type { DateRange, ExportFormat } from '../types/index.js';
import { compileDatePatterns, type CompiledPatterns } from './patterns.js';
import { AllPatternsUnion, FirstMatchingPattern, type DateStrategy } from './strategies.js';

/** Earliest and latest sample, or undefined when there are none. */
export function toDateRange(samples: readonly Date[]): DateRange | undefined {
  if (samples.length === 0) return undefined;
  const sorted = [...samples].sort((a, b) => a.getTime() - b.getTime());
  return { first: sorted[0], last: sorted[sorted.length - 1] };
}

export class DateExtractor {
  private readonly strategies: Record<ExportFormat, DateStrategy>;

  constructor(patterns: CompiledPatterns = compileDatePatterns()) {
    this.strategies = {
      txt: new FirstMatchingPattern(patterns.txt),
      html: new AllPatternsUnion(patterns.html),
    };
  }

  /** Samples in discovery order. */
  samples(content: string, format: ExportFormat): Date[] {
    return this.strategies[format].extract(content);
  }

  range(content: string, format: ExportFormat): DateRange | undefined {
    return toDateRange(this.samples(content, format));
  }
}

let sharedExtractor: DateExtractor | undefined;

/** Date range of a conversation by file extension; other extensions have none. */
export function extractDateRange(
  content: string,
  extension: string,
  extractor?: DateExtractor,
): DateRange | undefined {
  const format = extension.replace(/^\./, '').toLowerCase();
  if (format !== 'txt' && format !== 'html') return undefined;
  return (extractor ?? (sharedExtractor ??= new DateExtractor())).range(content, format);
}
