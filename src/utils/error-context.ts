/**
 * Error context utilities for structured error handling
 * Carries the operation, phase and paths involved alongside the error itself
 */

import { types } from 'node:util';

export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

export type ErrorCode =
  | 'USAGE_ERROR'
  | 'DIRECTORY_NOT_FOUND'
  | 'MOVE_FAILURE'
  | 'DESTINATION_EXISTS'
  | 'REPORT_WRITE_FAILURE';

export interface ErrorContext {
  operation: string;
  phase?: string;
  component?: string;
  path?: string;
  destination?: string;
  filename?: string;
  metadata?: Record<string, unknown>;
}

export interface StructuredError extends Error {
  context?: ErrorContext;
  errorCode?: ErrorCode;
  severity?: ErrorSeverity;
}

export class ErrorContextBuilder {
  private context: ErrorContext;

  constructor(operation: string) {
    this.context = {
      operation,
    };
  }

  /**
   * Sets the processing phase (e.g., 'scan', 'mkdir', 'move', 'write')
   */
  setPhase(phase: string): this {
    this.context.phase = phase;
    return this;
  }

  /**
   * Sets the component where the error occurred
   */
  setComponent(component: string): this {
    this.context.component = component;
    return this;
  }

  setPaths(path: string, destination?: string): this {
    this.context.path = path;
    if (destination) {
      this.context.destination = destination;
    }
    return this;
  }

  setFilename(filename: string): this {
    this.context.filename = filename;
    return this;
  }

  setMetadata(metadata: Record<string, unknown>): this {
    this.context.metadata = { ...this.context.metadata, ...metadata };
    return this;
  }

  build(): ErrorContext {
    return { ...this.context };
  }

  /**
   * Creates a structured error with the built context
   */
  createError(
    message: string,
    originalError?: Error,
    options?: {
      errorCode?: ErrorCode;
      severity?: ErrorSeverity;
    }
  ): StructuredError {
    const error: StructuredError = new Error(message);
    error.context = this.build();
    error.name = originalError?.name || 'StructuredError';

    if (options) {
      error.errorCode = options.errorCode;
      error.severity = options.severity;
    }

    if (originalError?.stack) {
      error.stack = originalError.stack;
    }

    return error;
  }
}

/**
 * Pre-configured error context builders for common scenarios
 */
// biome-ignore lint/complexity/noStaticOnlyClass: Factory class pattern for error context builders
export class CommonErrorContexts {
  /**
   * Creates error context for command line usage problems
   */
  static usage(args: string[]): ErrorContextBuilder {
    return new ErrorContextBuilder('usage')
      .setComponent('OrganizeByDateHandler')
      .setPhase('argument_check')
      .setMetadata({ argumentCount: args.length });
  }

  /**
   * Creates error context for reading the source directory
   */
  static directoryScan(sourceDir: string): ErrorContextBuilder {
    return new ErrorContextBuilder('directory_scan')
      .setComponent('DateOrganizer')
      .setPhase('precondition')
      .setPaths(sourceDir);
  }

  /**
   * Creates error context for moving one file into its date folder
   */
  static fileMove(source: string, destination: string, filename?: string): ErrorContextBuilder {
    const builder = new ErrorContextBuilder('file_move')
      .setComponent('FileMover')
      .setPhase('move')
      .setPaths(source, destination);

    if (filename) {
      builder.setFilename(filename);
    }

    return builder;
  }

  /**
   * Creates error context for creating a date folder ahead of a move
   */
  static folderCreate(destinationDir: string, filename?: string): ErrorContextBuilder {
    const builder = new ErrorContextBuilder('folder_create')
      .setComponent('DateOrganizer')
      .setPhase('mkdir')
      .setPaths(destinationDir);

    if (filename) {
      builder.setFilename(filename);
    }

    return builder;
  }

  /**
   * Creates error context for writing the non-standard filename report
   */
  static reportWrite(reportPath: string, entryCount?: number): ErrorContextBuilder {
    const builder = new ErrorContextBuilder('report_write')
      .setComponent('ReportWriter')
      .setPhase('write')
      .setPaths(reportPath);

    if (entryCount !== undefined) {
      builder.setMetadata({ entryCount });
    }

    return builder;
  }
}

/**
 * Error classification utilities
 */
// biome-ignore lint/complexity/noStaticOnlyClass: Utility class pattern for error classification functions
export class ErrorClassifier {
  /**
   * Type guard for errors created through ErrorContextBuilder
   */
  static isStructuredError(error: unknown): error is StructuredError {
    return types.isNativeError(error) && 'context' in error && error.context !== undefined;
  }

  /**
   * Normalizes a thrown value to an Error. Errors raised by `fs` under a test
   * sandbox belong to another realm, so `instanceof Error` is not used.
   */
  static toError(error: unknown): Error {
    return types.isNativeError(error) ? error : new Error(String(error));
  }

  /**
   * Reads the system error code (ENOENT, EXDEV, ...) from a thrown value
   */
  static systemErrorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error) {
      return typeof error.code === 'string' ? error.code : undefined;
    }
    return undefined;
  }

  /**
   * Determines error severity based on context and error type
   */
  static getSeverity(error: Error | StructuredError): ErrorSeverity {
    if ('severity' in error && error.severity) {
      return error.severity;
    }

    if (error.message.includes('ENOSPC') || error.message.includes('EROFS')) {
      return 'critical';
    }

    if (error.message.includes('EACCES') || error.message.includes('EPERM')) {
      return 'high';
    }

    if (error.message.includes('validation') || error.message.includes('Validation')) {
      return 'low';
    }

    return 'medium';
  }

  /**
   * Creates an error summary for logging
   */
  static createErrorSummary(error: unknown): Record<string, unknown> {
    const normalized = ErrorClassifier.toError(error);

    const summary: Record<string, unknown> = {
      errorName: normalized.name,
      errorMessage: normalized.message,
      severity: ErrorClassifier.getSeverity(normalized),
    };

    if (ErrorClassifier.isStructuredError(normalized)) {
      summary.context = normalized.context;
      if (normalized.errorCode) {
        summary.errorCode = normalized.errorCode;
      }
    }

    if (normalized.stack) {
      summary.stackTrace = normalized.stack;
    }

    return summary;
  }
}

/**
 * Convenience function to create error contexts
 */
export const createErrorContext = {
  usage: CommonErrorContexts.usage,
  scan: CommonErrorContexts.directoryScan,
  move: CommonErrorContexts.fileMove,
  mkdir: CommonErrorContexts.folderCreate,
  report: CommonErrorContexts.reportWrite,
};
