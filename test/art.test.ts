import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { loadArt } from '../src/art';
import { getAssetPath } from '../src/paths';
import { HEADER_ART_FILE_NAME, LANGUAGE_ART_FILE_NAME } from '../src/types';

describe('loadArt', () => {
  let tempDir: string;
  let originalActionPath: string | undefined;

  beforeEach((): void => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'art-test-'));
    originalActionPath = process.env['GITHUB_ACTION_PATH'];
  });

  afterEach((): void => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    if (originalActionPath !== undefined) {
      process.env['GITHUB_ACTION_PATH'] = originalActionPath;
    }
  });

  it('splits lines, trims trailing whitespace and drops trailing blank lines', () => {
    const artPath = path.join(tempDir, 'art.txt');
    fs.writeFileSync(artPath, '  /\\  \r\n /  \\\n\n  ||\n\n\n', 'utf-8');

    expect(loadArt(artPath)).toEqual(['  /\\', ' /  \\', '', '  ||']);
  });

  it('returns no lines for an empty file', () => {
    const artPath = path.join(tempDir, 'empty.txt');
    fs.writeFileSync(artPath, '', 'utf-8');

    expect(loadArt(artPath)).toEqual([]);
  });

  it('throws with the path for a missing file', () => {
    const artPath = path.join(tempDir, 'missing.txt');

    expect(() => loadArt(artPath)).toThrow(`Failed to read art file ${artPath}`);
  });

  it('loads the bundled art panels', () => {
    delete process.env['GITHUB_ACTION_PATH'];

    expect(loadArt(getAssetPath(HEADER_ART_FILE_NAME)).length).toBeGreaterThan(0);
    expect(loadArt(getAssetPath(LANGUAGE_ART_FILE_NAME)).length).toBeGreaterThan(0);
  });
});
