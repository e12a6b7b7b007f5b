/**
 * README Writer
 * Layer: infra
 *
 * Provided ports:
 *   - readmeFile.write
 *
 * Writes the generated README using atomic rename for safe writes.
 */

import * as fs from 'fs';
import * as path from 'path';
import { getTmpPath } from './paths';

// -----------------------------------------------------------------------------
// Port: readmeFile.write
// -----------------------------------------------------------------------------

export interface WriteReadmeResult {
  success: true;
  /** False when the file already held exactly this content */
  changed: boolean;
}

export interface WriteReadmeError {
  success: false;
  error: string;
}

export type WriteReadmeOutcome = WriteReadmeResult | WriteReadmeError;

/**
 * Writes README content to disk atomically.
 * Creates the parent directory if it doesn't exist.
 * Cleans up the temp file on failure to prevent orphaned files.
 *
 * @param readmePath - Absolute path of the README
 * @param content - Full markdown content
 */
export function writeReadme(readmePath: string, content: string): WriteReadmeOutcome {
  const tmpPath = getTmpPath(readmePath);
  const previous = readExisting(readmePath);

  try {
    fs.mkdirSync(path.dirname(readmePath), { recursive: true });
    fs.writeFileSync(tmpPath, content, 'utf-8');
    fs.renameSync(tmpPath, readmePath);

    return { success: true, changed: previous !== content };
  } catch (err) {
    try {
      fs.unlinkSync(tmpPath);
    } catch {
      // Ignore cleanup errors - file may not exist
    }
    const message = err instanceof Error ? err.message : String(err);
    return {
      success: false,
      error: `Failed to write README: ${message}`,
    };
  }
}

function readExisting(readmePath: string): string | null {
  try {
    return fs.readFileSync(readmePath, 'utf-8');
  } catch {
    return null;
  }
}
