/**
 * Project configuration loader
 *
 * Reads .mockwright/config.yaml (optional), applies MOCKWRIGHT_* env
 * overrides and validates the result.
 */

import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { MockwrightConfigSchema } from '../../core/models/index.js';
import type { MockwrightConfig } from '../../core/models/index.js';
import { applyConfigEnvOverrides } from './env/config-env-overrides.js';
import { getProjectConfigPath } from './paths.js';

function readRawConfig(configPath: string): Record<string, unknown> {
  const rawConfig: Record<string, unknown> = {};
  if (!existsSync(configPath)) {
    return rawConfig;
  }

  const parsedRaw: unknown = parseYaml(readFileSync(configPath, 'utf-8'));
  if (parsedRaw && typeof parsedRaw === 'object' && !Array.isArray(parsedRaw)) {
    Object.assign(rawConfig, parsedRaw);
  } else if (parsedRaw != null) {
    throw new Error(`Configuration error: ${configPath} must be a YAML object.`);
  }
  return rawConfig;
}

export function loadConfig(projectDir: string): MockwrightConfig {
  const configPath = getProjectConfigPath(projectDir);
  const rawConfig = readRawConfig(configPath);

  applyConfigEnvOverrides(rawConfig);

  const result = MockwrightConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Configuration error: ${details}`);
  }

  const parsed = result.data;
  const logFile = parsed.debug?.log_file;
  return {
    pollIntervalMs: parsed.poll_interval_ms,
    verbose: parsed.verbose,
    debug: {
      enabled: parsed.debug?.enabled ?? false,
      logFile: logFile && !isAbsolute(logFile) ? resolve(projectDir, logFile) : logFile,
    },
  };
}
