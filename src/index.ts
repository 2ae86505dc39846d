export { handler, USAGE } from './handlers/organize-by-date';
export { DateOrganizer, organize } from './services/date-organizer';
export { FileMover } from './services/file-mover';
export { classify, isStandardFormat, toDateKey } from './services/filename-classifier';
export { formatReport, getReportPath, ReportWriter } from './services/report-writer';
export type {
  ClassificationResult,
  DateKey,
  MoveFailurePolicy,
  MoveFailureRecord,
  OrganizerOptions,
  RunSummary,
} from './types';
export { loadConfig } from './utils/config';
export type { ErrorCode, ErrorContext, StructuredError } from './utils/error-context';
