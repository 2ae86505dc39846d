import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

/**
 * Creates `<tmp>/batch` with the given empty-content files and returns both paths
 */
export function createBatchDirectory(files: string[] = []): { baseDir: string; sourceDir: string } {
  const baseDir = fs.mkdtempSync(path.join(os.tmpdir(), 'scan-date-organizer-'));
  const sourceDir = path.join(baseDir, 'batch');
  fs.mkdirSync(sourceDir);

  for (const file of files) {
    fs.writeFileSync(path.join(sourceDir, file), `contents of ${file}`);
  }

  return { baseDir, sourceDir };
}

export function removeDirectory(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function listSorted(dir: string): string[] {
  return fs.readdirSync(dir).sort();
}

/**
 * Runs `fn` and returns what it threw
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
