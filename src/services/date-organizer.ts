import * as fs from 'node:fs';
import * as path from 'node:path';
import type { OrganizerOptions, RunSummary } from '../types';
import config from '../utils/config';
import { createErrorContext, ErrorClassifier } from '../utils/error-context';
import logger from '../utils/logger';
import { isRegularFile, validateSourceDirectory } from '../utils/validation';
import { FileMover } from './file-mover';
import { classify } from './filename-classifier';
import { ReportWriter } from './report-writer';

export class DateOrganizer {
  public readonly options: OrganizerOptions;
  public fileMover: FileMover;
  public reportWriter: ReportWriter;

  constructor(
    options?: Partial<OrganizerOptions>,
    fileMover?: FileMover,
    reportWriter?: ReportWriter
  ) {
    this.options = {
      moveFailurePolicy: options?.moveFailurePolicy ?? config.moveFailurePolicy,
      reportSuffix: options?.reportSuffix ?? config.reportSuffix,
    };
    this.fileMover = fileMover || new FileMover();
    this.reportWriter = reportWriter || new ReportWriter(this.options.reportSuffix);
  }

  /**
   * Moves every dated file directly inside `sourceDir` into a `YYYY-MM-DD` subfolder.
   * Entries are handled in directory listing order, which is not sorted.
   */
  organize(sourceDir: string): RunSummary {
    const validation = validateSourceDirectory(sourceDir);
    if (!validation.isValid) {
      const message = validation.error || `Source directory '${sourceDir}' does not exist`;
      throw createErrorContext.scan(sourceDir).createError(message, undefined, {
        errorCode: 'DIRECTORY_NOT_FOUND',
        severity: 'medium',
      });
    }

    const root = path.resolve(sourceDir);
    const summary: RunSummary = {
      sourceDir: root,
      totalFiles: 0,
      movedFiles: 0,
      skippedFiles: 0,
      createdFolders: new Set(),
      nonStandardFiles: [],
      failedMoves: [],
    };

    logger.addContext({ sourceDir: root });

    try {
      for (const filename of fs.readdirSync(root)) {
        this.processEntry(root, filename, summary);
      }

      if (summary.nonStandardFiles.length > 0) {
        summary.reportPath = this.reportWriter.write(root, summary.nonStandardFiles);
      }

      logger.logRunSummary(summary);
      return summary;
    } finally {
      logger.clearContext();
    }
  }

  private processEntry(root: string, filename: string, summary: RunSummary): void {
    const filePath = path.join(root, filename);
    if (!isRegularFile(filePath)) {
      return;
    }

    summary.totalFiles++;

    const classification = classify(filename);
    if (!classification.matched) {
      summary.skippedFiles++;
      logger.logFileSkipped(filename);
      return;
    }

    const { dateKey, isStandard } = classification;
    if (!isStandard) {
      summary.nonStandardFiles.push(filename);
    }

    const destinationDir = path.join(root, dateKey);

    try {
      if (!fs.existsSync(destinationDir)) {
        this.createFolder(destinationDir, filename);
        summary.createdFolders.add(dateKey);
        logger.logFolderCreated(dateKey, destinationDir);
      }
      this.fileMover.move(filePath, path.join(destinationDir, filename), filename);
    } catch (error) {
      if (this.options.moveFailurePolicy === 'halt') {
        throw error;
      }

      const failure = ErrorClassifier.toError(error);
      summary.failedMoves.push({
        filename,
        dateKey,
        errorCode:
          (ErrorClassifier.isStructuredError(failure) && failure.errorCode) || 'MOVE_FAILURE',
        message: failure.message,
      });
      logger.logMoveFailed(filename, dateKey, failure);
      return;
    }

    summary.movedFiles++;
    logger.logFileMoved(filename, dateKey, isStandard);
  }

  /**
   * A folder that cannot be created fails the move of the file that needed it
   */
  private createFolder(destinationDir: string, filename: string): void {
    try {
      fs.mkdirSync(destinationDir, { recursive: true });
    } catch (error) {
      const original = ErrorClassifier.toError(error);
      throw createErrorContext
        .mkdir(destinationDir, filename)
        .setMetadata({ systemErrorCode: ErrorClassifier.systemErrorCode(error) })
        .createError(`Failed to create folder ${destinationDir}: ${original.message}`, original, {
          errorCode: 'MOVE_FAILURE',
          severity: 'high',
        });
    }
  }
}

/**
 * Organizes `sourceDir` with the configured options
 */
export function organize(sourceDir: string): RunSummary {
  return new DateOrganizer().organize(sourceDir);
}
