/**
 * Output Renderer Tests
 *
 * Tests for summary rendering and step summary writing.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { render, renderConsole, renderMarkdown, writeStepSummary } from '../src/output';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { ProfileData, SummaryData } from '../src/types';

// -----------------------------------------------------------------------------
// Test helpers
// -----------------------------------------------------------------------------

function makeProfile(): ProfileData {
  return {
    username: 'octo-tester',
    events: [{ type: 'PushEvent', repo_name: 'octo-tester/app', created_at: '2026-01-25T12:00:00Z' }],
    languages: [
      { name: 'TypeScript', percentage: 80 },
      { name: 'Shell', percentage: 20 },
    ],
    stats: {
      total_commits: 150,
      total_prs: 14,
      total_issues: 9,
      total_stars: 15,
      repos_owned: 3,
      contributed_to: 7,
    },
    followers: 256,
  };
}

function makeSummaryData(overrides: Partial<SummaryData> = {}): SummaryData {
  return {
    profile: makeProfile(),
    readme_path: 'README.md',
    changed: true,
    publish: { committed: true, pushed: true },
    warnings: [],
    ...overrides,
  };
}

// -----------------------------------------------------------------------------
// render tests
// -----------------------------------------------------------------------------

describe('render', () => {
  it('returns both markdown and console output', () => {
    const data = makeSummaryData();
    const result = render(data);

    expect(result.markdown).toBe(renderMarkdown(data));
    expect(result.console).toBe(renderConsole(data));
  });
});

// -----------------------------------------------------------------------------
// renderMarkdown tests
// -----------------------------------------------------------------------------

describe('renderMarkdown', () => {
  it('renders header, counts and the file table', () => {
    expect(renderMarkdown(makeSummaryData()).split('\n')).toEqual([
      '## Profile README — octo-tester',
      '',
      '**Followers:** 256 | **Stars:** 15 | **Languages:** 2 | **Events:** 1',
      '',
      '| File | Changed | Commit | Push |',
      '|------|---------|--------|------|',
      '| README.md | yes | created | pushed |',
      '',
    ]);
  });

  it('describes a skipped publish', () => {
    const markdown = renderMarkdown(makeSummaryData({ changed: false, publish: null }));

    expect(markdown).toContain('| README.md | no | skipped | skipped |');
  });

  it('describes a commit with nothing staged and a failed push', () => {
    const markdown = renderMarkdown(
      makeSummaryData({ publish: { committed: false, pushed: false } }),
    );

    expect(markdown).toContain('| README.md | yes | nothing to commit | not pushed |');
  });

  it('lists warnings', () => {
    const lines = renderMarkdown(
      makeSummaryData({ warnings: ['Skipped languages for gone: HTTP 404: Not Found'] }),
    ).split('\n');

    expect(lines.slice(-5)).toEqual([
      '',
      '### Warnings',
      '',
      '- Skipped languages for gone: HTTP 404: Not Found',
      '',
    ]);
  });
});

// -----------------------------------------------------------------------------
// renderConsole tests
// -----------------------------------------------------------------------------

describe('renderConsole', () => {
  it('renders one line without warnings', () => {
    expect(renderConsole(makeSummaryData())).toBe(
      'README updated: README.md (commit: created, push: pushed)',
    );
  });

  it('adds a warning count', () => {
    expect(
      renderConsole(makeSummaryData({ changed: false, publish: null, warnings: ['a', 'b'] })),
    ).toBe('README unchanged: README.md (commit: skipped, push: skipped)\nWarnings: 2');
  });
});

// -----------------------------------------------------------------------------
// writeStepSummary tests
// -----------------------------------------------------------------------------

describe('writeStepSummary', () => {
  let originalEnv: string | undefined;
  let tempDir: string;

  beforeEach((): void => {
    originalEnv = process.env['GITHUB_STEP_SUMMARY'];
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'test-step-summary-'));
  });

  afterEach((): void => {
    if (originalEnv !== undefined) {
      process.env['GITHUB_STEP_SUMMARY'] = originalEnv;
    } else {
      delete process.env['GITHUB_STEP_SUMMARY'];
    }
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('appends markdown with a trailing newline', (): void => {
    const summaryPath = path.join(tempDir, 'summary.md');
    process.env['GITHUB_STEP_SUMMARY'] = summaryPath;

    writeStepSummary('first');
    writeStepSummary('second');

    expect(fs.readFileSync(summaryPath, 'utf-8')).toBe('first\nsecond\n');
  });

  it('does nothing when GITHUB_STEP_SUMMARY is unset', (): void => {
    delete process.env['GITHUB_STEP_SUMMARY'];

    expect(() => writeStepSummary('ignored')).not.toThrow();
    expect(fs.readdirSync(tempDir)).toEqual([]);
  });
});
