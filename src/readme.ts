/**
 * README Renderer
 * Layer: core
 *
 * Provided ports:
 *   - readme.render
 *
 * Composes the profile README markdown. Pure: data, art and clock are inputs.
 */

import type { ProfileData } from './types';
import {
  createBadge,
  formatActivity,
  formatLanguageLine,
  formatSecond,
  formatStatsTable,
  LANGUAGE_NAME_WIDTH,
} from './ascii';

// -----------------------------------------------------------------------------
// Layout
// -----------------------------------------------------------------------------

/** Header rows above the first badge line */
const BADGE_ROW_OFFSET = 4;
/** Spaces between the widest header art line and the badges */
const HEADER_GUTTER = 2;
/** Column the side art starts after: name + bar + percentage */
const LANGUAGE_LINE_WIDTH = LANGUAGE_NAME_WIDTH + 26;
/** Width the side art is right-aligned in */
const LANGUAGE_ART_COLUMN = 50;
const ACTIVITY_RULE = '-'.repeat(60);

export interface ReadmeInput {
  profile: ProfileData;
  headerArt: string[];
  languageArt: string[];
  /** Line under the header; empty hides it */
  tagline: string;
  activityLimit: number;
  now: Date;
}

// -----------------------------------------------------------------------------
// Port: readme.render
// -----------------------------------------------------------------------------

export function renderReadme(input: ReadmeInput): string {
  const lines: string[] = [
    ...renderHeader(input),
    '---',
    '',
    ...renderLanguages(input),
    '',
    ...renderStats(input),
    '',
    ...renderActivity(input),
    '',
    '> [!NOTE]',
    '> <p align="center">This README is <b>auto-generated</b> by a scheduled GitHub Actions workflow.</p>',
  ];
  return lines.join('\n') + '\n';
}

// -----------------------------------------------------------------------------
// Sections
// -----------------------------------------------------------------------------

/**
 * Header art in a WARNING callout with the follower and star badges
 * alongside, starting a few rows down.
 */
export function renderHeader(input: ReadmeInput): string[] {
  const { profile, headerArt, tagline } = input;

  const badgeLines = [
    createBadge('Followers', String(profile.followers)),
    '',
    createBadge('Stars', String(profile.stats.total_stars)),
  ]
    .join('\n')
    .split('\n');

  const artWidth = headerArt.reduce((max, line) => Math.max(max, line.length), 0);
  const columnWidth = artWidth + HEADER_GUTTER;
  const rowCount = Math.max(headerArt.length, badgeLines.length + BADGE_ROW_OFFSET);

  const lines = ['> [!WARNING]', '> ```'];
  for (let i = 0; i < rowCount; i++) {
    const art = headerArt[i] ?? '';
    const badge = i >= BADGE_ROW_OFFSET ? (badgeLines[i - BADGE_ROW_OFFSET] ?? '') : '';
    lines.push(`> ${art.padEnd(columnWidth)} ${badge}`.trimEnd());
  }
  lines.push('> ```');

  if (tagline) {
    lines.push(`> <p>${escapeHtml(tagline)}</p>`);
  }
  lines.push('');
  return lines;
}

/**
 * Language bars with the side art anchored to the bottom rows.
 * Blank language columns are added when there are fewer languages than art rows.
 */
export function renderLanguages(input: ReadmeInput): string[] {
  const { profile, languageArt } = input;
  const lines = ['#### 🛠️ Languages', '```css'];

  if (profile.languages.length === 0) {
    lines.push('No language data', '```');
    return lines;
  }

  const artWidth = languageArt.reduce((max, line) => Math.max(max, line.length), 0);
  const rowCount = Math.max(profile.languages.length, languageArt.length);
  const artStart = rowCount - languageArt.length;

  for (let i = 0; i < rowCount; i++) {
    const share = profile.languages[i];
    const text = share ? formatLanguageLine(share) : '';
    const art = i >= artStart ? languageArt[i - artStart] : undefined;
    if (art === undefined) {
      lines.push(text);
    } else {
      const aligned = art.padEnd(artWidth).padStart(LANGUAGE_ART_COLUMN);
      lines.push(`${text.padEnd(LANGUAGE_LINE_WIDTH)} ${aligned}`.trimEnd());
    }
  }

  lines.push('```');
  return lines;
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function renderStats(input: ReadmeInput): string[] {
  return ['#### 📊 Stats', '```', formatStatsTable(input.profile.stats), '```'];
}

export function renderActivity(input: ReadmeInput): string[] {
  const { profile, activityLimit, now } = input;
  const events = profile.events.slice(0, activityLimit);

  const lines = ['#### 🔥 Activity', '```', ACTIVITY_RULE];
  if (events.length === 0) {
    lines.push('No recent public activity');
  }
  for (const event of events) {
    lines.push(formatActivity(event, now));
  }
  lines.push(ACTIVITY_RULE, '', `Last updated: ${formatSecond(now)}`, '```');
  return lines;
}
