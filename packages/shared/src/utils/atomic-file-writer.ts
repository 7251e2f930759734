import { renameSync, rmSync, writeFileSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';

/**
 * Build the temporary sibling path used while writing `targetPath`.
 *
 * The file lives in the same directory as the target so the final rename
 * never crosses a file system boundary.
 */
export function getTemporaryPath(targetPath: string): string {
  const suffix = `${process.pid}.${Date.now()}`;
  return join(dirname(targetPath), `.${basename(targetPath)}.${suffix}.tmp`);
}

/**
 * Write a file by writing a temporary sibling and renaming it over the target.
 *
 * Readers observe either the previous content or the complete new content.
 * On failure the temporary file is removed and the error is rethrown; the
 * target is left untouched.
 *
 * @example
 * ```typescript
 * writeFileAtomic('/reports/monthly.json', JSON.stringify(doc, null, 2));
 * ```
 */
export function writeFileAtomic(
  targetPath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8',
): void {
  const temporaryPath = getTemporaryPath(targetPath);

  try {
    writeFileSync(temporaryPath, data, encoding);
    renameSync(temporaryPath, targetPath);
  } catch (error) {
    rmSync(temporaryPath, { force: true });
    throw error;
  }
}
