/**
 * Update handler
 * Layer: action
 *
 * Collects profile data, regenerates the README and publishes it.
 *
 * Required ports:
 *   - profile.collect
 *   - readme.render
 *   - readmeFile.write
 *   - publish.commitAndPush
 *   - output.render
 */

import * as core from '@actions/core';
import * as path from 'path';
import type { Config, PublishResult, SummaryData } from './types';
import { collectProfile } from './profile';
import { loadArt } from './art';
import { renderReadme } from './readme';
import { writeReadme } from './readme-file';
import { commitAndPush } from './publish';
import { render, writeStepSummary } from './output';
import { resolveWorkspacePath } from './paths';

export async function updateReadme(config: Config, now: Date = new Date()): Promise<SummaryData> {
  core.info(`Updating profile README for ${config.username}...`);

  const { profile, warnings } = await collectProfile(config);

  const markdown = renderReadme({
    profile,
    headerArt: loadArt(config.header_art_path),
    languageArt: loadArt(config.language_art_path),
    tagline: config.tagline,
    activityLimit: config.activity_limit,
    now,
  });

  const readmePath = resolveWorkspacePath(config.readme_path);
  const writeResult = writeReadme(readmePath, markdown);
  if (!writeResult.success) {
    throw new Error(writeResult.error);
  }
  core.info(`Wrote ${readmePath}`);

  let publish: PublishResult | null = null;
  if (config.commit) {
    publish = await commitAndPush({
      readmePath,
      message: config.commit_message,
      cwd: path.dirname(readmePath),
    });
  } else {
    core.info('Commit disabled; leaving README uncommitted.');
  }

  core.setOutput('changed', String(writeResult.changed));
  core.setOutput('readme_path', readmePath);

  const summary: SummaryData = {
    profile,
    readme_path: config.readme_path,
    changed: writeResult.changed,
    publish,
    warnings,
  };

  const { markdown: summaryMarkdown, console: consoleText } = render(summary);
  core.info(consoleText);
  writeStepSummary(summaryMarkdown);

  return summary;
}
