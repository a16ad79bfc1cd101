export type ExportFormat = 'txt' | 'html';

export interface ExportFile {
  path: string;
  filename: string;
  extension: ExportFormat;
}

export interface DateRange {
  first: Date;
  last: Date;
}

export interface PlannedRename {
  from: string;
  to: string;
}

export interface RenameSummary {
  renamed: number;
  unmatched: number;
  unchanged: number;
  failed: number;
  renames: PlannedRename[];
}

export interface TimestampSummary {
  updated: number;
  noDates: number;
  failed: number;
}
