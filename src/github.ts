/**
 * GitHub API Client
 * Layer: infra
 *
 * Provided ports:
 *   - github.fetchPublicEvents
 *   - github.fetchRepos
 *   - github.fetchRepoLanguages
 *   - github.fetchProfileStats
 *   - github.fetchFollowers
 *
 * Fetches profile data from the GitHub REST and GraphQL APIs.
 * Every call resolves to an outcome; nothing throws past this module.
 */

import type { GitHubEvent, LanguageBytes, ProfileStats, RepoSummary } from './types';
import {
  API_BASE_URL,
  FETCH_TIMEOUT_MS,
  MAX_EVENTS_PER_PAGE,
  MAX_REPO_PAGES,
  REPOS_PER_PAGE,
  USER_AGENT,
} from './types';
import { isARealObject, readCount, readString } from './utils';

// -----------------------------------------------------------------------------
// Outcomes
// -----------------------------------------------------------------------------

export interface ApiResult<T> {
  success: true;
  data: T;
}

export interface ApiError {
  success: false;
  error: string;
  /** HTTP status, when the server answered */
  status?: number;
}

export type ApiOutcome<T> = ApiResult<T> | ApiError;

interface RequestOptions {
  method?: 'GET' | 'POST';
  body?: unknown;
}

// -----------------------------------------------------------------------------
// Transport
// -----------------------------------------------------------------------------

/**
 * Performs one authenticated request and decodes the JSON body.
 */
export async function requestJson(
  url: string,
  token: string,
  options: RequestOptions = {},
): Promise<ApiOutcome<unknown>> {
  // Set up abort controller with timeout to prevent indefinite hangs
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), FETCH_TIMEOUT_MS);

  const headers: Record<string, string> = {
    Authorization: `Bearer ${token}`,
    Accept: 'application/vnd.github+json',
    'User-Agent': USER_AGENT,
    'X-GitHub-Api-Version': '2022-11-28',
  };
  if (options.body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      method: options.method ?? 'GET',
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    });

    if (!response.ok) {
      const message = await readErrorMessage(response);
      const statusText = response.statusText || 'Unknown error';
      const error = message
        ? `HTTP ${response.status}: ${statusText} - ${message}`
        : `HTTP ${response.status}: ${statusText}`;
      return { success: false, error, status: response.status };
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') throw err;
      const message = err instanceof Error ? err.message : String(err);
      return { success: false, error: `Failed to parse response body: ${message}` };
    }
    return { success: true, data };
  } catch (err) {
    if (err instanceof Error && err.name === 'AbortError') {
      return {
        success: false,
        error: `Request timeout: GitHub API did not respond within ${FETCH_TIMEOUT_MS}ms`,
      };
    }
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: `Network error: ${message}` };
  } finally {
    clearTimeout(timeoutId);
  }
}

async function readErrorMessage(response: Response): Promise<string | null> {
  try {
    const text = (await response.text()).trim();
    if (!text) return null;
    try {
      const parsed: unknown = JSON.parse(text);
      if (isARealObject(parsed) && typeof parsed['message'] === 'string') {
        return parsed['message'];
      }
    } catch {
      // Fall back to raw text
    }
    return text;
  } catch {
    return null;
  }
}

/**
 * Runs a request and narrows its body with a parser.
 */
async function fetchParsed<T>(
  url: string,
  token: string,
  parse: (raw: unknown) => T | null,
  what: string,
  options?: RequestOptions,
): Promise<ApiOutcome<T>> {
  const outcome = await requestJson(url, token, options);
  if (!outcome.success) {
    return outcome;
  }
  const parsed = parse(outcome.data);
  if (parsed === null) {
    return { success: false, error: `Failed to parse ${what} response` };
  }
  return { success: true, data: parsed };
}

function userUrl(username: string): string {
  return `${API_BASE_URL}/users/${encodeURIComponent(username)}`;
}

// -----------------------------------------------------------------------------
// Port: github.fetchPublicEvents
// -----------------------------------------------------------------------------

/**
 * Fetches the user's most recent public events, newest first.
 * One page is requested, so `limit` is capped at {@link MAX_EVENTS_PER_PAGE}.
 */
export function fetchPublicEvents(
  username: string,
  token: string,
  limit: number,
): Promise<ApiOutcome<GitHubEvent[]>> {
  const perPage = Math.min(MAX_EVENTS_PER_PAGE, Math.max(1, limit));
  const url = `${userUrl(username)}/events/public?per_page=${perPage}`;
  return fetchParsed(url, token, parseEvents, 'events');
}

export function parseEvents(raw: unknown): GitHubEvent[] | null {
  if (!Array.isArray(raw)) {
    return null;
  }
  const events: GitHubEvent[] = [];
  for (const entry of raw) {
    if (!isARealObject(entry)) continue;
    const repo = entry['repo'];
    events.push({
      type: readString(entry, 'type'),
      repo_name: isARealObject(repo) ? readString(repo, 'name') : '',
      created_at: readString(entry, 'created_at'),
    });
  }
  return events;
}

// -----------------------------------------------------------------------------
// Port: github.fetchRepos
// -----------------------------------------------------------------------------

/**
 * Fetches the user's public repositories, following pages until a short one.
 */
export async function fetchRepos(
  username: string,
  token: string,
): Promise<ApiOutcome<RepoSummary[]>> {
  const repos: RepoSummary[] = [];

  for (let page = 1; page <= MAX_REPO_PAGES; page++) {
    const url = `${userUrl(username)}/repos?per_page=${REPOS_PER_PAGE}&page=${page}`;
    const outcome = await requestJson(url, token);
    if (!outcome.success) {
      return outcome;
    }
    const parsed = parseRepos(outcome.data);
    if (parsed === null) {
      return { success: false, error: 'Failed to parse repositories response' };
    }
    repos.push(...parsed);
    if (Array.isArray(outcome.data) && outcome.data.length < REPOS_PER_PAGE) {
      break;
    }
  }

  return { success: true, data: repos };
}

export function parseRepos(raw: unknown): RepoSummary[] | null {
  if (!Array.isArray(raw)) {
    return null;
  }
  const repos: RepoSummary[] = [];
  for (const entry of raw) {
    if (!isARealObject(entry)) continue;
    const languagesUrl = entry['languages_url'];
    if (typeof languagesUrl !== 'string') continue; // Nothing to aggregate
    repos.push({
      name: readString(entry, 'name'),
      fork: entry['fork'] === true,
      languages_url: languagesUrl,
    });
  }
  return repos;
}

// -----------------------------------------------------------------------------
// Port: github.fetchRepoLanguages
// -----------------------------------------------------------------------------

/**
 * Fetches bytes of code per language for one repository.
 *
 * @param languagesUrl - The repository's languages_url
 */
export function fetchRepoLanguages(
  languagesUrl: string,
  token: string,
): Promise<ApiOutcome<LanguageBytes>> {
  return fetchParsed(languagesUrl, token, parseLanguages, 'languages');
}

export function parseLanguages(raw: unknown): LanguageBytes | null {
  if (!isARealObject(raw)) {
    return null;
  }
  const bytes: LanguageBytes = {};
  for (const [language, value] of Object.entries(raw)) {
    if (typeof value === 'number' && Number.isFinite(value) && value >= 0) {
      bytes[language] = value;
    }
  }
  return bytes;
}

// -----------------------------------------------------------------------------
// Port: github.fetchProfileStats
// -----------------------------------------------------------------------------

export const PROFILE_STATS_QUERY = `
  query ($login: String!) {
    user(login: $login) {
      name
      contributionsCollection {
        totalCommitContributions
        totalPullRequestContributions
        totalIssueContributions
        restrictedContributionsCount
      }
      repositories(first: 100, ownerAffiliations: OWNER, isFork: false) {
        totalCount
        nodes {
          stargazerCount
        }
      }
      repositoriesContributedTo(first: 1, contributionTypes: [COMMIT, ISSUE, PULL_REQUEST, REPOSITORY]) {
        totalCount
      }
    }
  }
`;

/**
 * Fetches contribution totals through the GraphQL API.
 */
export async function fetchProfileStats(
  username: string,
  token: string,
): Promise<ApiOutcome<ProfileStats>> {
  const outcome = await requestJson(`${API_BASE_URL}/graphql`, token, {
    method: 'POST',
    body: { query: PROFILE_STATS_QUERY, variables: { login: username } },
  });
  if (!outcome.success) {
    return outcome;
  }

  const graphqlError = readGraphQLError(outcome.data);
  if (graphqlError) {
    return { success: false, error: `GraphQL error: ${graphqlError}` };
  }

  const stats = parseStats(outcome.data);
  if (!stats) {
    return { success: false, error: 'Failed to parse stats response' };
  }
  return { success: true, data: stats };
}

function readGraphQLError(raw: unknown): string | null {
  if (!isARealObject(raw)) return null;
  const errors = raw['errors'];
  if (!Array.isArray(errors) || errors.length === 0) return null;
  const first: unknown = errors[0];
  if (isARealObject(first) && typeof first['message'] === 'string') {
    return first['message'];
  }
  return 'unknown error';
}

/**
 * Parses the GraphQL user query into ProfileStats.
 * Returns null when the response carries no user.
 */
export function parseStats(raw: unknown): ProfileStats | null {
  if (!isARealObject(raw)) {
    return null;
  }
  const data = raw['data'];
  if (!isARealObject(data)) {
    return null;
  }
  const user = data['user'];
  if (!isARealObject(user)) {
    return null;
  }

  const contributions = objectOrEmpty(user['contributionsCollection']);
  const repositories = objectOrEmpty(user['repositories']);
  const contributedTo = objectOrEmpty(user['repositoriesContributedTo']);

  const nodes = repositories['nodes'];
  const totalStars = Array.isArray(nodes)
    ? nodes.reduce<number>(
        (sum, node: unknown) => sum + (isARealObject(node) ? readCount(node, 'stargazerCount') : 0),
        0,
      )
    : 0;

  return {
    total_commits:
      readCount(contributions, 'totalCommitContributions') +
      readCount(contributions, 'restrictedContributionsCount'),
    total_prs: readCount(contributions, 'totalPullRequestContributions'),
    total_issues: readCount(contributions, 'totalIssueContributions'),
    total_stars: totalStars,
    repos_owned: readCount(repositories, 'totalCount'),
    contributed_to: readCount(contributedTo, 'totalCount'),
  };
}

function objectOrEmpty(value: unknown): Record<string, unknown> {
  return isARealObject(value) ? value : {};
}

// -----------------------------------------------------------------------------
// Port: github.fetchFollowers
// -----------------------------------------------------------------------------

/**
 * Fetches the user's follower count.
 */
export function fetchFollowers(username: string, token: string): Promise<ApiOutcome<number>> {
  return fetchParsed(userUrl(username), token, parseFollowers, 'user');
}

export function parseFollowers(raw: unknown): number | null {
  return isARealObject(raw) ? readCount(raw, 'followers') : null;
}
