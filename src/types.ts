/**
 * Boundary types for profile-readme-updater
 *
 * These types define the contracts between modules.
 */

// -----------------------------------------------------------------------------
// GitHubEvent
// One entry from GET /users/{username}/events/public
// -----------------------------------------------------------------------------

export interface GitHubEvent {
  /** Event type, e.g. PushEvent */
  type: string;
  /** Full name of the repository (owner/name) */
  repo_name: string;
  /** ISO timestamp the event was created */
  created_at: string;
}

// -----------------------------------------------------------------------------
// RepoSummary
// The parts of GET /users/{username}/repos this action reads
// -----------------------------------------------------------------------------

export interface RepoSummary {
  name: string;
  fork: boolean;
  /** API URL listing bytes of code per language */
  languages_url: string;
}

/** Bytes of code keyed by language name */
export type LanguageBytes = Record<string, number>;

export interface LanguageShare {
  name: string;
  /** Share of all bytes, 0..100 */
  percentage: number;
}

// -----------------------------------------------------------------------------
// ProfileStats
// Contribution totals derived from the GraphQL user query
// -----------------------------------------------------------------------------

export interface ProfileStats {
  /** Commit contributions including private (restricted) ones */
  total_commits: number;
  total_prs: number;
  total_issues: number;
  /** Stars summed over owned, non-fork repositories */
  total_stars: number;
  repos_owned: number;
  contributed_to: number;
}

// -----------------------------------------------------------------------------
// ProfileData
// Everything needed to render one README
// -----------------------------------------------------------------------------

export interface ProfileData {
  username: string;
  events: GitHubEvent[];
  languages: LanguageShare[];
  stats: ProfileStats;
  followers: number;
}

// -----------------------------------------------------------------------------
// PublishResult
// Outcome of commit-and-push; failures here never fail the job
// -----------------------------------------------------------------------------

export interface PublishResult {
  committed: boolean;
  pushed: boolean;
}

// -----------------------------------------------------------------------------
// SummaryData
// Data passed to output renderer for summary generation
// -----------------------------------------------------------------------------

export interface SummaryData {
  profile: ProfileData;
  /** README path as configured */
  readme_path: string;
  /** True if the written content differs from what was on disk */
  changed: boolean;
  /** Null when committing was disabled */
  publish: PublishResult | null;
  /** Warning messages to display */
  warnings: string[];
}

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

export interface Config {
  /** GitHub token for API authentication */
  token: string;
  /** Login whose profile is rendered */
  username: string;
  /** README file to (re)write, relative to the workspace */
  readme_path: string;
  /** Commit and push the README after writing it */
  commit: boolean;
  commit_message: string;
  /** Number of recent events listed in the activity section */
  activity_limit: number;
  /** Number of languages listed in the languages section */
  language_limit: number;
  /** Skip forked repositories when aggregating languages */
  exclude_forks: boolean;
  /** Line shown under the header; empty hides it */
  tagline: string;
  header_art_path: string;
  language_art_path: string;
}

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

export const API_BASE_URL = 'https://api.github.com';
export const USER_AGENT = 'profile-readme-updater';

/** Timeout for fetch requests to GitHub API (milliseconds) */
export const FETCH_TIMEOUT_MS = 10000;

export const REPOS_PER_PAGE = 100;
/** Largest page the events endpoint serves */
export const MAX_EVENTS_PER_PAGE = 100;
export const MAX_REPO_PAGES = 10;

export const DEFAULT_README_PATH = 'README.md';
export const DEFAULT_COMMIT_MESSAGE = '🔄 Update README';
export const DEFAULT_ACTIVITY_LIMIT = 5;
export const DEFAULT_LANGUAGE_LIMIT = 10;

export const ASSETS_DIR_NAME = 'assets';
export const HEADER_ART_FILE_NAME = 'header.txt';
export const LANGUAGE_ART_FILE_NAME = 'languages.txt';

/** Commit identity used by workflows that push as the Actions bot */
export const BOT_USER_NAME = 'github-actions[bot]';
export const BOT_USER_EMAIL = '41898282+github-actions[bot]@users.noreply.github.com';
