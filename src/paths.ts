/**
 * Path Resolver
 * Layer: infra
 *
 * Provided ports:
 *   - paths.assetPath
 *   - paths.readmePath
 *
 * Resolves bundled asset files and the README inside the checked-out workspace.
 */

import * as path from 'path';
import { ASSETS_DIR_NAME } from './types';

// -----------------------------------------------------------------------------
// Port: paths.assetPath
// -----------------------------------------------------------------------------

/**
 * Returns the absolute path to the bundled assets directory.
 * Inside a workflow the action's own checkout is at $GITHUB_ACTION_PATH;
 * otherwise assets sit one level above the compiled (or source) module.
 */
export function getAssetsDir(): string {
  const actionPath = process.env['GITHUB_ACTION_PATH'];
  if (actionPath) {
    return path.resolve(actionPath, ASSETS_DIR_NAME);
  }
  return path.resolve(__dirname, '..', ASSETS_DIR_NAME);
}

/**
 * Returns the absolute path of a bundled asset file.
 */
export function getAssetPath(fileName: string): string {
  return path.join(getAssetsDir(), fileName);
}

// -----------------------------------------------------------------------------
// Port: paths.readmePath
// -----------------------------------------------------------------------------

/**
 * Resolves a workspace-relative path against $GITHUB_WORKSPACE,
 * falling back to the current directory. Absolute paths pass through.
 */
export function resolveWorkspacePath(relative: string): string {
  const workspace = process.env['GITHUB_WORKSPACE'] || process.cwd();
  return path.resolve(workspace, relative);
}

/**
 * Returns the path for the atomic-write temporary file next to the README.
 */
export function getTmpPath(target: string): string {
  return `${target}.tmp`;
}
