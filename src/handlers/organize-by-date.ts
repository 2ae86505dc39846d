#!/usr/bin/env node
import { DateOrganizer } from '../services/date-organizer';
import type { RunSummary } from '../types';
import { createErrorContext, ErrorClassifier } from '../utils/error-context';
import logger from '../utils/logger';
import { validateArguments } from '../utils/validation';

export const USAGE = 'Usage: organize-by-date <source_directory>';

export interface HandlerResult {
  exitCode: number;
  summary?: RunSummary;
}

/**
 * Command line entry point. Exit code 0 when the source directory was processed,
 * however many files were skipped; 1 on a usage error, a missing directory or a halted run.
 */
export function handler(args: string[], organizer?: DateOrganizer): HandlerResult {
  const argumentCheck = validateArguments(args);
  if (!argumentCheck.isValid || argumentCheck.sourceDir === undefined) {
    const usageError = createErrorContext
      .usage(args)
      .createError(argumentCheck.error || USAGE, undefined, {
        errorCode: 'USAGE_ERROR',
        severity: 'low',
      });
    logger.error(USAGE, usageError, { operation: 'usage' });
    return { exitCode: 1 };
  }

  const sourceDir = argumentCheck.sourceDir;
  logger.logRunStart(sourceDir);

  try {
    const summary = (organizer || new DateOrganizer()).organize(sourceDir);
    logger.info('Organization complete!', {
      sourceDir: summary.sourceDir,
      operation: 'organize_done',
    });
    return { exitCode: 0, summary };
  } catch (error) {
    const failure = ErrorClassifier.toError(error);
    logger.logError('organize', failure, {
      sourceDir,
      errorCode: ErrorClassifier.isStructuredError(failure) ? failure.errorCode : undefined,
      severity: ErrorClassifier.getSeverity(failure),
    });
    return { exitCode: 1 };
  }
}

if (require.main === module) {
  process.exitCode = handler(process.argv.slice(2)).exitCode;
}
