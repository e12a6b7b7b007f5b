/**
 * ASCII art panels, read from plain text files so they can be swapped
 * per profile without rebuilding.
 */

import * as fs from 'fs';

/**
 * Reads an art file into lines. Trailing whitespace is trimmed from each
 * line and trailing blank lines are dropped.
 *
 * @throws Error if the file cannot be read
 */
export function loadArt(artPath: string): string[] {
  let content: string;
  try {
    content = fs.readFileSync(artPath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to read art file ${artPath}: ${message}`);
  }

  const lines = content.split(/\r?\n/).map((line) => line.trimEnd());
  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}
