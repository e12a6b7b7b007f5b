/**
 * Configuration
 * Layer: action
 *
 * Provided ports:
 *   - config.read
 *
 * Reads action inputs (with environment fallbacks) into a Config.
 */

import * as core from '@actions/core';
import type { Config } from './types';
import {
  DEFAULT_ACTIVITY_LIMIT,
  DEFAULT_COMMIT_MESSAGE,
  DEFAULT_LANGUAGE_LIMIT,
  DEFAULT_README_PATH,
  HEADER_ART_FILE_NAME,
  LANGUAGE_ART_FILE_NAME,
} from './types';
import { getAssetPath } from './paths';
import { parseBooleanFlag, parsePositiveInt } from './utils';

// -----------------------------------------------------------------------------
// Port: config.read
// -----------------------------------------------------------------------------

/**
 * Reads and validates the action configuration.
 * Masks the token so it never appears in logs.
 *
 * @throws Error if the token or username cannot be determined, or a numeric
 *   input is not a positive integer
 */
export function readConfig(): Config {
  const token = core.getInput('token') || process.env['GITHUB_TOKEN'];
  if (!token) {
    throw new Error('No token provided. Set the token input or GITHUB_TOKEN environment variable.');
  }
  core.setSecret(token);

  const username = core.getInput('username') || process.env['GITHUB_REPOSITORY_OWNER'];
  if (!username) {
    throw new Error(
      'No username provided. Set the username input or run inside a repository with an owner.',
    );
  }

  const commitRaw = core.getInput('commit');

  return {
    token,
    username,
    readme_path: core.getInput('readme_path') || DEFAULT_README_PATH,
    commit: commitRaw ? parseBooleanFlag(commitRaw) : true,
    commit_message: core.getInput('commit_message') || DEFAULT_COMMIT_MESSAGE,
    activity_limit: readLimit('activity_limit', DEFAULT_ACTIVITY_LIMIT),
    language_limit: readLimit('language_limit', DEFAULT_LANGUAGE_LIMIT),
    exclude_forks: parseBooleanFlag(core.getInput('exclude_forks')),
    tagline: core.getInput('tagline'),
    header_art_path: core.getInput('header_art_path') || getAssetPath(HEADER_ART_FILE_NAME),
    language_art_path:
      core.getInput('language_art_path') || getAssetPath(LANGUAGE_ART_FILE_NAME),
  };
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

function readLimit(name: string, fallback: number): number {
  const raw = core.getInput(name);
  if (!raw) return fallback;
  const parsed = parsePositiveInt(raw);
  if (parsed === null) {
    throw new Error(`Invalid ${name}: '${raw}'. Must be a positive integer.`);
  }
  return parsed;
}
