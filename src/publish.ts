/**
 * Publisher
 * Layer: infra
 *
 * Provided ports:
 *   - publish.commitAndPush
 *
 * Commits the regenerated README and pushes it as the Actions bot.
 * A failed commit (nothing staged) or push is reported and does not fail
 * the job; a failed `git config` or `git add` does.
 */

import * as core from '@actions/core';
import * as exec from '@actions/exec';
import type { PublishResult } from './types';
import { BOT_USER_EMAIL, BOT_USER_NAME } from './types';

// -----------------------------------------------------------------------------
// Port: publish.commitAndPush
// -----------------------------------------------------------------------------

export interface PublishOptions {
  /** README path, relative to cwd or absolute */
  readmePath: string;
  message: string;
  /** Repository working tree */
  cwd: string;
}

/**
 * Stages, commits and pushes the README.
 *
 * @throws Error if git cannot be configured or the file cannot be staged
 */
export async function commitAndPush(options: PublishOptions): Promise<PublishResult> {
  const { readmePath, message, cwd } = options;

  await exec.exec('git', ['config', '--local', 'user.email', BOT_USER_EMAIL], { cwd });
  await exec.exec('git', ['config', '--local', 'user.name', BOT_USER_NAME], { cwd });
  await exec.exec('git', ['add', readmePath], { cwd });

  const commitCode = await exec.exec('git', ['commit', '-m', message], {
    cwd,
    ignoreReturnCode: true,
  });
  const committed = commitCode === 0;
  if (!committed) {
    core.info('No changes to commit');
  }

  const pushCode = await exec.exec('git', ['push'], { cwd, ignoreReturnCode: true });
  const pushed = pushCode === 0;
  if (!pushed) {
    core.info('No changes to push');
  }

  return { committed, pushed };
}
