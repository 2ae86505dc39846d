import * as fs from 'node:fs';
import * as path from 'node:path';
import { createErrorContext, ErrorClassifier } from '../utils/error-context';
import logger from '../utils/logger';

/**
 * Report path sits beside the source directory: /scans/FGL_1858 → /scans/FGL_1858_non_standard.txt
 */
export function getReportPath(sourceDir: string, suffix: string): string {
  const resolved = path.resolve(sourceDir);
  return path.join(path.dirname(resolved), `${path.basename(resolved)}${suffix}`);
}

export function formatReport(sourceDir: string, filenames: string[]): string {
  const header = `Non-standard filenames found in ${sourceDir}:`;
  return [header, ...filenames].join('\n');
}

export class ReportWriter {
  constructor(private readonly suffix: string) {}

  /**
   * Writes the report, replacing any previous one. Returns the report path.
   */
  write(sourceDir: string, filenames: string[]): string {
    const reportPath = getReportPath(sourceDir, this.suffix);

    try {
      fs.writeFileSync(reportPath, formatReport(sourceDir, filenames), 'utf8');
    } catch (error) {
      const original = ErrorClassifier.toError(error);
      throw createErrorContext
        .report(reportPath, filenames.length)
        .createError(`Failed to write report ${reportPath}: ${original.message}`, original, {
          errorCode: 'REPORT_WRITE_FAILURE',
          severity: 'high',
        });
    }

    logger.logReportWritten(filenames.length, reportPath);
    return reportPath;
  }
}
