import type { ExportFormat } from '../types/index.js';
import { ConfigurationError, describeError } from '../utils/index.js';
import {
  parseInternetDateTime,
  parseIsoLocal,
  parseMonthDayYearAtTime,
  parseMonthDayYearTime,
} from './formats.js';

export type MatchParser = (match: RegExpMatchArray) => Date | null;

export interface DatePatternSpec {
  name: string;
  source: string;
  flags: string;
  parse: MatchParser;
}

export interface DatePattern {
  name: string;
  regex: RegExp;
  parse: MatchParser;
}

export type DatePatternTable = Record<ExportFormat, readonly DatePatternSpec[]>;
export type CompiledPatterns = Record<ExportFormat, readonly DatePattern[]>;

function group(match: RegExpMatchArray, index: number): string {
  return match[index] ?? '';
}

/** Date and time captured separately, rejoined with one space. */
function joined(parse: (text: string) => Date | null): MatchParser {
  return match => parse(`${group(match, 1)} ${group(match, 2)}`);
}

// Plain-text exports put each timestamp on its own line:
//   Nov 28, 2024 11:46:34 AM
//   Nov 29, 2024  2:19:59 PM
// Older exports used ISO dates, sometimes bracketed. Listed in priority order.
const TXT_PATTERNS: readonly DatePatternSpec[] = [
  {
    name: 'line-start month-day-year',
    source: '^(\\w{3} \\d{1,2}, \\d{4})\\s+(\\d{1,2}:\\d{2}:\\d{2} [AP]M)',
    flags: 'gm',
    parse: joined(parseMonthDayYearTime),
  },
  {
    name: 'month-day-year',
    source: '(\\w{3} \\d{1,2}, \\d{4})\\s+(\\d{1,2}:\\d{2}:\\d{2} [AP]M)',
    flags: 'gm',
    parse: joined(parseMonthDayYearTime),
  },
  {
    name: 'bracketed iso',
    source: '\\[(\\d{4}-\\d{2}-\\d{2})[, ]+(\\d{2}:\\d{2}:\\d{2})\\]',
    flags: 'gm',
    parse: joined(text => parseIsoLocal(text)),
  },
  {
    name: 'iso',
    source: '(\\d{4}-\\d{2}-\\d{2}) (\\d{2}:\\d{2}:\\d{2})',
    flags: 'gm',
    parse: joined(text => parseIsoLocal(text)),
  },
];

const HTML_PATTERNS: readonly DatePatternSpec[] = [
  {
    name: 'datetime attribute',
    source: 'datetime="([^"]+)"',
    flags: 'gi',
    parse: match => {
      const value = group(match, 1);
      return parseInternetDateTime(value) ?? parseIsoLocal(value, 'T');
    },
  },
  {
    name: 'timestamp element',
    source: 'class="timestamp"[^>]*>([^<]+)<',
    flags: 'gi',
    parse: match => parseMonthDayYearAtTime(group(match, 1).trim()),
  },
  {
    name: 'iso text',
    source: '(\\d{4}-\\d{2}-\\d{2}[T ]\\d{2}:\\d{2}:\\d{2})',
    flags: 'gi',
    parse: match => parseIsoLocal(group(match, 1).trim()),
  },
  {
    name: 'month-day-year at time',
    source: '(\\w{3} \\d{1,2}, \\d{4}) at (\\d{1,2}:\\d{2}:\\d{2} [AP]M)',
    flags: 'gi',
    parse: joined(parseMonthDayYearTime),
  },
];

export const DATE_PATTERNS: DatePatternTable = {
  txt: TXT_PATTERNS,
  html: HTML_PATTERNS,
};

export function compilePattern(spec: DatePatternSpec): DatePattern {
  const flags = spec.flags.includes('g') ? spec.flags : `${spec.flags}g`;
  let regex: RegExp;
  try {
    regex = new RegExp(spec.source, flags);
  } catch (err) {
    throw new ConfigurationError(`Invalid date pattern "${spec.name}": ${describeError(err)}`);
  }
  return { name: spec.name, regex, parse: spec.parse };
}

/** Compile every pattern up front so a bad one stops the run before any file is touched. */
export function compileDatePatterns(table: DatePatternTable = DATE_PATTERNS): CompiledPatterns {
  return {
    txt: table.txt.map(compilePattern),
    html: table.html.map(compilePattern),
  };
}
