/**
 * ASCII Widgets
 * Layer: core
 *
 * Provided ports:
 *   - ascii.bar
 *   - ascii.badge
 *   - ascii.statsTable
 *   - ascii.activity
 *
 * Fixed-width text widgets rendered inside fenced README blocks.
 */

import type { GitHubEvent, LanguageShare, ProfileStats } from './types';

export const BAR_WIDTH = 20;
export const BADGE_WIDTH = 20;
export const LANGUAGE_NAME_WIDTH = 12;

const BAR_FILLED = '█';
const BAR_EDGE = '▓';
const BAR_EMPTY = '░';

// -----------------------------------------------------------------------------
// Port: ascii.bar
// -----------------------------------------------------------------------------

/**
 * Renders a percentage as a bracketed bar, e.g. `[█████▓░░░░]`.
 * The cell right after the filled run is drawn as the edge marker.
 */
export function createBar(percentage: number, width: number = BAR_WIDTH): string {
  const clamped = Math.min(100, Math.max(0, percentage));
  const filled = Math.round((clamped / 100) * width);

  let bar = '';
  for (let i = 0; i < width; i++) {
    if (i < filled) {
      bar += BAR_FILLED;
    } else if (i === filled) {
      bar += BAR_EDGE;
    } else {
      bar += BAR_EMPTY;
    }
  }
  return `[${bar}]`;
}

/**
 * One row of the languages block: name, bar and share with one decimal.
 */
export function formatLanguageLine(share: LanguageShare): string {
  return `${share.name.padEnd(LANGUAGE_NAME_WIDTH)} ${createBar(share.percentage)} ${share.percentage.toFixed(1)}%`;
}

// -----------------------------------------------------------------------------
// Port: ascii.badge
// -----------------------------------------------------------------------------

/**
 * Renders a three-line rounded badge:
 *
 * ```
 * ╭────────────────────╮
 * │ Stars│ 42          │
 * ╰────────────────────╯
 * ```
 */
export function createBadge(label: string, value: string, width: number = BADGE_WIDTH): string {
  const totalWidth = Math.max(width, label.length + value.length + 4);
  const labelWidth = label.length + 2;
  const valueWidth = totalWidth - labelWidth;

  const edge = '─'.repeat(totalWidth);
  const labelPart = ` ${label}`;
  const valuePart = ` ${value.padEnd(valueWidth - 2)} `;

  return [`╭${edge}╮`, `│${labelPart}│${valuePart}│`, `╰${edge}╯`].join('\n');
}

// -----------------------------------------------------------------------------
// Port: ascii.statsTable
// -----------------------------------------------------------------------------

const STATS_RULE =
  '+-------------+------------------------+----------------+--------------------------------------+';

export function formatStatsTable(stats: ProfileStats): string {
  const row = (leftLabel: string, left: number, rightLabel: string, right: number): string =>
    `| ${leftLabel} | ${String(left).padStart(22)} | ${rightLabel} | ${String(right).padStart(36)} |`;

  return [
    STATS_RULE,
    '|   Metric    |         Value          |     Metric     |                Value                 |',
    STATS_RULE,
    row('  Commits  ', stats.total_commits, 'Issues opened ', stats.total_issues),
    row('PRs opened ', stats.total_prs, 'Stars received', stats.total_stars),
    row('Repos owned', stats.repos_owned, 'Contributed to', stats.contributed_to),
    STATS_RULE,
  ].join('\n');
}

// -----------------------------------------------------------------------------
// Port: ascii.activity
// -----------------------------------------------------------------------------

/**
 * One activity row: `2026-01-25 12:00    | Push            | owner/repo`.
 * Times are UTC; an unparsable timestamp is shown as `now`.
 */
export function formatActivity(event: GitHubEvent, now: Date): string {
  const parsed = new Date(event.created_at);
  const when = Number.isNaN(parsed.getTime()) ? now : parsed;
  const type = event.type.replace('Event', '');
  return `${formatMinute(when).padEnd(16)} | ${type.padEnd(15)} | ${event.repo_name}`;
}

/**
 * `YYYY-MM-DD HH:MM` in UTC.
 */
export function formatMinute(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

/**
 * `YYYY-MM-DD HH:MM:SS` in UTC.
 */
export function formatSecond(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}
