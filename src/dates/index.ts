export { DateExtractor, extractDateRange, toDateRange } from './extract.js';
export {
  compileDatePatterns,
  compilePattern,
  DATE_PATTERNS,
  type CompiledPatterns,
  type DatePattern,
  type DatePatternSpec,
  type DatePatternTable,
} from './patterns.js';
export { AllPatternsUnion, FirstMatchingPattern, type DateStrategy } from './strategies.js';
export {
  parseInternetDateTime,
  parseIsoLocal,
  parseMonthDayYearAtTime,
  parseMonthDayYearTime,
} from './formats.js';
