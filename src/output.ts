/**
 * Output Renderer
 * Layer: infra
 *
 * Provided ports:
 *   - output.render
 *
 * Generates summary for GitHub step summary and console.
 */

import * as fs from 'fs';
import type { PublishResult, SummaryData } from './types';

// -----------------------------------------------------------------------------
// Port: output.render
// -----------------------------------------------------------------------------

export interface RenderResult {
  /** Markdown for step summary */
  markdown: string;
  /** Plain text for console */
  console: string;
}

/**
 * Renders the summary data to markdown and console formats.
 */
export function render(data: SummaryData): RenderResult {
  return { markdown: renderMarkdown(data), console: renderConsole(data) };
}

// -----------------------------------------------------------------------------
// Markdown rendering
// -----------------------------------------------------------------------------

/**
 * Renders full markdown summary for $GITHUB_STEP_SUMMARY.
 */
export function renderMarkdown(data: SummaryData): string {
  const { profile, warnings } = data;

  const lines: string[] = [];

  lines.push(`## Profile README — ${profile.username}`);
  lines.push('');
  lines.push(
    `**Followers:** ${profile.followers} | **Stars:** ${profile.stats.total_stars} | ` +
      `**Languages:** ${profile.languages.length} | **Events:** ${profile.events.length}`,
  );
  lines.push('');

  lines.push('| File | Changed | Commit | Push |');
  lines.push('|------|---------|--------|------|');
  lines.push(
    `| ${data.readme_path} | ${data.changed ? 'yes' : 'no'} | ${describeCommit(data.publish)} | ${describePush(data.publish)} |`,
  );
  lines.push('');

  if (warnings.length > 0) {
    lines.push('### Warnings');
    lines.push('');
    for (const warning of warnings) {
      lines.push(`- ${warning}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

// -----------------------------------------------------------------------------
// Console rendering
// -----------------------------------------------------------------------------

/**
 * Renders concise console output.
 */
export function renderConsole(data: SummaryData): string {
  const state = data.changed ? 'updated' : 'unchanged';
  let line = `README ${state}: ${data.readme_path} (commit: ${describeCommit(data.publish)}, push: ${describePush(data.publish)})`;
  if (data.warnings.length > 0) {
    line += `\nWarnings: ${data.warnings.length}`;
  }
  return line;
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

function describeCommit(publish: PublishResult | null): string {
  if (!publish) return 'skipped';
  return publish.committed ? 'created' : 'nothing to commit';
}

function describePush(publish: PublishResult | null): string {
  if (!publish) return 'skipped';
  return publish.pushed ? 'pushed' : 'not pushed';
}

// -----------------------------------------------------------------------------
// GitHub Step Summary
// -----------------------------------------------------------------------------

/**
 * Writes markdown to GitHub step summary.
 */
export function writeStepSummary(markdown: string): void {
  const summaryPath = process.env['GITHUB_STEP_SUMMARY'];
  if (summaryPath) {
    fs.appendFileSync(summaryPath, markdown + '\n');
  }
}
