/**
 * Paths of the per-project mockwright directory
 */

import { join, resolve } from 'node:path';

/** Project config directory (.mockwright in project) */
export function getProjectConfigDir(projectDir: string): string {
  return join(resolve(projectDir), '.mockwright');
}

/** Project config file path */
export function getProjectConfigPath(projectDir: string): string {
  return join(getProjectConfigDir(projectDir), 'config.yaml');
}
