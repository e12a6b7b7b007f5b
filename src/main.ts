/**
 * Main Entry
 * Layer: action
 *
 * GitHub Action entry point.
 *
 * Required ports:
 *   - config.read
 *   - update
 */

import * as core from '@actions/core';
import { readConfig } from './config';
import { updateReadme } from './update';

// -----------------------------------------------------------------------------
// Action entry point
// -----------------------------------------------------------------------------

export async function run(): Promise<void> {
  try {
    const config = readConfig();
    await updateReadme(config);
    core.info(`✅ ${config.readme_path} has been updated successfully.`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    core.setFailed(message);
  }
}

// -----------------------------------------------------------------------------
// Run
// -----------------------------------------------------------------------------

if (require.main === module) {
  void run();
}
