/**
 * Configuration types
 */

/** Debug log settings */
export interface DebugConfig {
  enabled: boolean;
  logFile?: string;
}

/** Resolved runtime configuration */
export interface MockwrightConfig {
  /** Interval between re-checks of an eventual verification */
  pollIntervalMs: number;
  /** Mirror debug log lines to stderr */
  verbose: boolean;
  debug: DebugConfig;
}

/** Settings that can be changed programmatically via configure() */
export type ConfigOverrides = Partial<Pick<MockwrightConfig, 'pollIntervalMs' | 'verbose'>>;

export const DEFAULT_POLL_INTERVAL_MS = 10;
