/**
 * Normalized `YYYY-MM-DD` string used as a destination folder name
 */
export type DateKey = string;

export type ClassificationResult =
  | { matched: false }
  | {
      matched: true;
      dateKey: DateKey;
      isStandard: boolean;
      abbreviation: string;
    };

export type MoveFailurePolicy = 'halt' | 'continue';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'SILENT';

export interface MoveFailureRecord {
  filename: string;
  dateKey: DateKey;
  errorCode: string;
  message: string;
}

export interface RunSummary {
  sourceDir: string;
  totalFiles: number;
  movedFiles: number;
  skippedFiles: number;
  createdFolders: Set<DateKey>;
  nonStandardFiles: string[];
  failedMoves: MoveFailureRecord[];
  reportPath?: string;
}

export interface OrganizerOptions {
  moveFailurePolicy: MoveFailurePolicy;
  reportSuffix: string;
}

export interface ValidationResult {
  isValid: boolean;
  error?: string;
}

export interface LoggingContext {
  sourceDir?: string;
  filename?: string;
  dateKey?: string;
  operation?: string;
  [key: string]: string | number | boolean | undefined;
}
