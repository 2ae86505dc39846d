import { Logger } from '@aws-lambda-powertools/logger';
import type { DateKey, LoggingContext, RunSummary } from '../types';
import config from './config';
import { ErrorClassifier } from './error-context';

class CustomLogger {
  private logger: Logger;
  private contextKeys: string[] = [];

  constructor() {
    this.logger = new Logger({
      serviceName: 'scan-date-organizer',
      logLevel: config.logLevel,
    });
  }

  debug(message: string, context?: LoggingContext): void {
    if (context) {
      this.logger.debug(message, context);
    } else {
      this.logger.debug(message);
    }
  }

  info(message: string, context?: LoggingContext): void {
    if (context) {
      this.logger.info(message, context);
    } else {
      this.logger.info(message);
    }
  }

  warn(message: string, context?: LoggingContext): void {
    if (context) {
      this.logger.warn(message, context);
    } else {
      this.logger.warn(message);
    }
  }

  error(message: string, error?: Error, context?: LoggingContext): void {
    const logContext = {
      ...context,
      ...(error && {
        error: ErrorClassifier.createErrorSummary(error),
      }),
    };
    this.logger.error(message, logContext);
  }

  addContext(context: LoggingContext): void {
    this.logger.appendKeys(context);
    this.contextKeys.push(...Object.keys(context));
  }

  clearContext(): void {
    this.logger.removeKeys(this.contextKeys);
    this.contextKeys = [];
  }

  // Helper methods for common operations
  logRunStart(sourceDir: string): void {
    this.info(`Organizing files in: ${sourceDir}`, {
      sourceDir,
      operation: 'organize_start',
    });
  }

  logFileSkipped(filename: string): void {
    this.warn(`Could not extract date from '${filename}', skipping`, {
      filename,
      operation: 'file_skipped',
    });
  }

  logFolderCreated(dateKey: DateKey, folderPath: string): void {
    this.info(`Created folder: ${dateKey}`, {
      dateKey,
      folderPath,
      operation: 'folder_created',
    });
  }

  logFileMoved(filename: string, dateKey: DateKey, isStandard: boolean): void {
    this.info(`Moved: ${filename} → ${dateKey}/`, {
      filename,
      dateKey,
      isStandard,
      operation: 'file_moved',
    });
  }

  logMoveFailed(filename: string, dateKey: DateKey, error: Error): void {
    this.error(`Failed to move '${filename}' to ${dateKey}/`, error, {
      filename,
      dateKey,
      operation: 'file_move_failed',
    });
  }

  logReportWritten(count: number, reportPath: string): void {
    this.info(`Reported ${count} non-standard filenames to ${reportPath}`, {
      count,
      reportPath,
      operation: 'report_written',
    });
  }

  logRunSummary(summary: RunSummary): void {
    this.info(
      `Summary: total=${summary.totalFiles} moved=${summary.movedFiles} ` +
        `skipped=${summary.skippedFiles} foldersCreated=${summary.createdFolders.size} ` +
        `nonStandard=${summary.nonStandardFiles.length}`,
      {
        sourceDir: summary.sourceDir,
        totalFiles: summary.totalFiles,
        movedFiles: summary.movedFiles,
        skippedFiles: summary.skippedFiles,
        foldersCreated: summary.createdFolders.size,
        nonStandardFiles: summary.nonStandardFiles.length,
        failedMoves: summary.failedMoves.length,
        operation: 'organize_complete',
      }
    );
  }

  logError(operation: string, error: Error, context?: LoggingContext): void {
    this.error(`Error during ${operation}`, error, {
      ...context,
      operation,
    });
  }
}

// Export singleton instance
export const logger = new CustomLogger();
export default logger;
