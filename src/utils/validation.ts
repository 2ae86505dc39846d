import * as fs from 'node:fs';
import type { ValidationResult } from '../types';
import { ErrorClassifier } from './error-context';

/**
 * Validates the command line arguments: exactly one source directory
 */
export function validateArguments(args: string[]): ValidationResult & { sourceDir?: string } {
  if (args.length !== 1) {
    return {
      isValid: false,
      error: `Expected exactly one argument (the source directory), received ${args.length}`,
    };
  }

  return { isValid: true, sourceDir: args[0] };
}

/**
 * Validates that a path names an existing directory
 */
export function validateSourceDirectory(sourceDir: string): ValidationResult {
  if (!sourceDir || sourceDir.trim() === '') {
    return {
      isValid: false,
      error: 'Source directory path is empty',
    };
  }

  // Check for null bytes
  if (sourceDir.includes('\0')) {
    return {
      isValid: false,
      error: 'Source directory path contains null bytes',
    };
  }

  let stats: fs.Stats | undefined;
  try {
    stats = fs.statSync(sourceDir, { throwIfNoEntry: false });
  } catch (error) {
    return {
      isValid: false,
      error: `Cannot access source directory '${sourceDir}': ${ErrorClassifier.toError(error).message}`,
    };
  }

  if (!stats) {
    return {
      isValid: false,
      error: `Source directory '${sourceDir}' does not exist`,
    };
  }

  if (!stats.isDirectory()) {
    return {
      isValid: false,
      error: `Source path '${sourceDir}' is not a directory`,
    };
  }

  return { isValid: true };
}

/**
 * Checks whether a directory entry is a regular file, following symbolic links.
 * Entries that cannot be stat'ed (broken or looping links, no permission) are not files.
 */
export function isRegularFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath, { throwIfNoEntry: false })?.isFile() ?? false;
  } catch {
    return false;
  }
}
