/**
 * Main Entry Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { run } from '../src/main';
import type { Config } from '../src/types';

vi.mock('@actions/core');
vi.mock('../src/config');
vi.mock('../src/update');

import * as core from '@actions/core';
import { readConfig } from '../src/config';
import { updateReadme } from '../src/update';

const CONFIG: Config = {
  token: 'test-token',
  username: 'octo-tester',
  readme_path: 'README.md',
  commit: true,
  commit_message: '🔄 Update README',
  activity_limit: 5,
  language_limit: 10,
  exclude_forks: false,
  tagline: '',
  header_art_path: '/art/header.txt',
  language_art_path: '/art/languages.txt',
};

beforeEach(() => {
  vi.clearAllMocks();
});

describe('run', () => {
  it('runs the update with the parsed config', async () => {
    vi.mocked(readConfig).mockReturnValue(CONFIG);

    await run();

    expect(updateReadme).toHaveBeenCalledWith(CONFIG);
    expect(core.info).toHaveBeenCalledWith('✅ README.md has been updated successfully.');
    expect(core.setFailed).not.toHaveBeenCalled();
  });

  it('fails the action on configuration errors', async () => {
    vi.mocked(readConfig).mockImplementation(() => {
      throw new Error('No token provided.');
    });

    await run();

    expect(core.setFailed).toHaveBeenCalledWith('No token provided.');
    expect(updateReadme).not.toHaveBeenCalled();
  });

  it('fails the action when the update throws', async () => {
    vi.mocked(readConfig).mockReturnValue(CONFIG);
    vi.mocked(updateReadme).mockRejectedValue(new Error('Failed to fetch stats: HTTP 502'));

    await run();

    expect(core.setFailed).toHaveBeenCalledWith('Failed to fetch stats: HTTP 502');
  });
});
