/**
 * Profile Collector
 * Layer: core
 *
 * Provided ports:
 *   - profile.collect
 *
 * Gathers everything one README needs from the GitHub API.
 *
 * Required ports:
 *   - github.*
 *   - languages.merge
 *   - languages.shares
 */

import * as core from '@actions/core';
import type { Config, LanguageBytes, ProfileData } from './types';
import {
  fetchFollowers,
  fetchProfileStats,
  fetchPublicEvents,
  fetchRepoLanguages,
  fetchRepos,
} from './github';
import { mergeLanguageBytes, toLanguageShares } from './languages';

// -----------------------------------------------------------------------------
// Port: profile.collect
// -----------------------------------------------------------------------------

export interface CollectResult {
  profile: ProfileData;
  /** Non-fatal problems to surface in the summary */
  warnings: string[];
}

type CollectConfig = Pick<
  Config,
  'token' | 'username' | 'activity_limit' | 'language_limit' | 'exclude_forks'
>;

/**
 * Fetches events, languages, stats and followers for the configured user.
 *
 * @throws Error if events, repositories or stats cannot be fetched
 */
export async function collectProfile(config: CollectConfig): Promise<CollectResult> {
  const { token, username } = config;
  const warnings: string[] = [];

  core.info(`Fetching public events for ${username}...`);
  const events = await fetchPublicEvents(username, token, config.activity_limit);
  if (!events.success) {
    throw new Error(`Failed to fetch events: ${events.error}`);
  }

  core.info('Fetching repositories...');
  const repos = await fetchRepos(username, token);
  if (!repos.success) {
    throw new Error(`Failed to fetch repositories: ${repos.error}`);
  }

  const selected = config.exclude_forks ? repos.data.filter((repo) => !repo.fork) : repos.data;
  core.info(`Aggregating languages across ${selected.length} repositories...`);

  const perRepo: LanguageBytes[] = [];
  for (const repo of selected) {
    const languages = await fetchRepoLanguages(repo.languages_url, token);
    if (!languages.success) {
      warnings.push(`Skipped languages for ${repo.name}: ${languages.error}`);
      continue;
    }
    perRepo.push(languages.data);
  }

  core.info('Fetching contribution stats...');
  const stats = await fetchProfileStats(username, token);
  if (!stats.success) {
    throw new Error(`Failed to fetch stats: ${stats.error}`);
  }

  const followers = await fetchFollowers(username, token);
  if (!followers.success) {
    warnings.push(`Follower count unavailable: ${followers.error}`);
  }

  for (const warning of warnings) {
    core.warning(warning);
  }

  return {
    profile: {
      username,
      events: events.data,
      languages: toLanguageShares(mergeLanguageBytes(perRepo), config.language_limit),
      stats: stats.data,
      followers: followers.success ? followers.data : 0,
    },
    warnings,
  };
}
