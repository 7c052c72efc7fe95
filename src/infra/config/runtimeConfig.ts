/**
 * Runtime configuration
 *
 * RuntimeConfigManager caches the configuration of the current test
 * process. It is loaded lazily from process.cwd() the first time the
 * engine needs a setting, and programmatic overrides from configure()
 * take precedence over the file and environment.
 */

import type { ConfigOverrides, MockwrightConfig } from '../../core/models/index.js';
import { initDebugLogger, setVerboseConsole } from '../../shared/utils/debug.js';
import { loadConfig } from './loadConfig.js';

export class RuntimeConfigManager {
  private static instance: RuntimeConfigManager | null = null;

  private cachedConfig: MockwrightConfig | null = null;
  private overrides: ConfigOverrides = {};
  private projectDir: string | null = null;

  private constructor() {}

  static getInstance(): RuntimeConfigManager {
    if (!RuntimeConfigManager.instance) {
      RuntimeConfigManager.instance = new RuntimeConfigManager();
    }
    return RuntimeConfigManager.instance;
  }

  /** Reset singleton for testing */
  static resetInstance(): void {
    RuntimeConfigManager.instance = null;
  }

  /** Load from another project directory on next access */
  setProjectDir(projectDir: string): void {
    this.projectDir = projectDir;
    this.cachedConfig = null;
  }

  getConfig(): MockwrightConfig {
    if (!this.cachedConfig) {
      const projectDir = this.projectDir ?? process.cwd();
      const loaded = loadConfig(projectDir);
      initDebugLogger(loaded.debug, projectDir);
      this.cachedConfig = loaded;
    }
    const config: MockwrightConfig = { ...this.cachedConfig, ...this.overrides };
    setVerboseConsole(config.verbose);
    return config;
  }

  configure(overrides: ConfigOverrides): void {
    if (overrides.pollIntervalMs !== undefined
      && (!Number.isInteger(overrides.pollIntervalMs) || overrides.pollIntervalMs <= 0)) {
      throw new Error(`Configuration error: pollIntervalMs must be a positive integer, got ${overrides.pollIntervalMs}`);
    }
    // An explicit undefined keeps the current value.
    const next: ConfigOverrides = { ...this.overrides };
    if (overrides.pollIntervalMs !== undefined) {
      next.pollIntervalMs = overrides.pollIntervalMs;
    }
    if (overrides.verbose !== undefined) {
      next.verbose = overrides.verbose;
    }
    this.overrides = next;
  }

  /** Drop overrides and cached values */
  invalidate(): void {
    this.cachedConfig = null;
    this.overrides = {};
  }
}

export function getRuntimeConfig(): MockwrightConfig {
  return RuntimeConfigManager.getInstance().getConfig();
}

/**
 * Override settings for the rest of the process, e.g. in a setup file:
 *
 *   configure({ pollIntervalMs: 5 });
 */
export function configure(overrides: ConfigOverrides): void {
  RuntimeConfigManager.getInstance().configure(overrides);
}

export function resetRuntimeConfig(): void {
  RuntimeConfigManager.getInstance().invalidate();
}
