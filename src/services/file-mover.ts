import * as fs from 'node:fs';
import { createErrorContext, ErrorClassifier, type StructuredError } from '../utils/error-context';
import logger from '../utils/logger';

/**
 * Moves single files with rename semantics
 */
export class FileMover {
  /**
   * Moves `source` to `destination`. Same-volume moves are a single rename;
   * cross-device moves fall back to copy followed by delete.
   * An existing file at the destination is never replaced.
   */
  move(source: string, destination: string, filename?: string): void {
    if (fs.existsSync(destination)) {
      throw createErrorContext
        .move(source, destination, filename)
        .createError(`Destination already exists: ${destination}`, undefined, {
          errorCode: 'DESTINATION_EXISTS',
          severity: 'high',
        });
    }

    try {
      fs.renameSync(source, destination);
    } catch (error) {
      if (ErrorClassifier.systemErrorCode(error) === 'EXDEV') {
        logger.debug('Rename crossed devices, copying instead', {
          filename,
          operation: 'file_move_copy_fallback',
        });
        this.copyThenDelete(source, destination, filename);
        return;
      }
      throw this.toMoveFailure(error, source, destination, filename);
    }
  }

  private copyThenDelete(source: string, destination: string, filename?: string): void {
    try {
      fs.copyFileSync(source, destination, fs.constants.COPYFILE_EXCL);
      fs.unlinkSync(source);
    } catch (error) {
      throw this.toMoveFailure(error, source, destination, filename);
    }
  }

  private toMoveFailure(
    error: unknown,
    source: string,
    destination: string,
    filename?: string
  ): StructuredError {
    const original = ErrorClassifier.toError(error);
    return createErrorContext
      .move(source, destination, filename)
      .setMetadata({ systemErrorCode: ErrorClassifier.systemErrorCode(error) })
      .createError(`Failed to move ${source} to ${destination}: ${original.message}`, original, {
        errorCode: 'MOVE_FAILURE',
        severity: 'high',
      });
  }
}
