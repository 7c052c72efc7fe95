/**
 * Debug logging for the mock engine.
 *
 * Writes timestamped lines to a log file when `debug.enabled` is set and
 * mirrors them to stderr when verbose mode is on. Both are off by
 * default, so a test run without configuration produces no output.
 */

import { appendFileSync, existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { DebugConfig } from '../../core/models/index.js';
import { getErrorMessage } from './error.js';

export type LogLevel = 'DEBUG' | 'INFO' | 'ERROR';

export interface ComponentLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

/**
 * Debug logger singleton.
 * Owns the log file and the verbose console switch.
 */
export class DebugLogger {
  private static instance: DebugLogger | null = null;

  private fileEnabled = false;
  private logFile: string | null = null;
  private initialized = false;
  private verbose = false;

  private constructor() {}

  static getInstance(): DebugLogger {
    if (!DebugLogger.instance) {
      DebugLogger.instance = new DebugLogger();
    }
    return DebugLogger.instance;
  }

  /** Reset singleton for testing */
  static resetInstance(): void {
    DebugLogger.instance = null;
  }

  private static defaultLogFile(projectDir: string): string {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
    return join(projectDir, '.mockwright', 'logs', `debug-${timestamp}.log`);
  }

  /** Initialize from config. Later calls are ignored until reset(). */
  init(config?: DebugConfig, projectDir?: string): void {
    if (this.initialized) {
      return;
    }
    this.initialized = true;

    if (!config?.enabled) {
      return;
    }

    const logFile = config.logFile ?? (projectDir ? DebugLogger.defaultLogFile(projectDir) : null);
    if (!logFile) {
      return;
    }

    const logDir = dirname(logFile);
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }
    writeFileSync(
      logFile,
      [
        '='.repeat(60),
        'mockwright debug log',
        `Started: ${new Date().toISOString()}`,
        `Project: ${projectDir ?? 'N/A'}`,
        '='.repeat(60),
        '',
      ].join('\n'),
      'utf-8',
    );

    this.logFile = logFile;
    this.fileEnabled = true;
  }

  /** Reset state (for testing) */
  reset(): void {
    this.fileEnabled = false;
    this.logFile = null;
    this.initialized = false;
    this.verbose = false;
  }

  setVerbose(enabled: boolean): void {
    this.verbose = enabled;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  isEnabled(): boolean {
    return this.fileEnabled;
  }

  getLogFile(): string | null {
    return this.logFile;
  }

  private static formatFileLine(level: LogLevel, component: string, message: string, data?: unknown): string {
    let line = `[${new Date().toISOString()}] [${level}] [${component}] ${message}`;
    if (data !== undefined) {
      let rendered: string;
      try {
        rendered = typeof data === 'string' ? data : JSON.stringify(data, null, 2);
      } catch {
        rendered = '[Unable to serialize data]';
      }
      line += `\n${rendered}`;
    }
    return line;
  }

  private static formatConsoleLine(level: LogLevel, component: string, message: string): string {
    const time = new Date().toISOString().slice(11, 23);
    return `[${time}] [${level}] [${component}] ${message}`;
  }

  write(level: LogLevel, component: string, message: string, data?: unknown): void {
    if (this.verbose) {
      process.stderr.write(DebugLogger.formatConsoleLine(level, component, message) + '\n');
    }

    if (!this.fileEnabled || !this.logFile) {
      return;
    }

    try {
      appendFileSync(this.logFile, DebugLogger.formatFileLine(level, component, message, data) + '\n', 'utf-8');
    } catch (err) {
      // Stop writing to a file that cannot be appended to; tests must not fail over logging.
      this.fileEnabled = false;
      process.stderr.write(`mockwright: debug log disabled (${getErrorMessage(err)})\n`);
    }
  }

  createLogger(component: string): ComponentLogger {
    return {
      debug: (message, data) => this.write('DEBUG', component, message, data),
      info: (message, data) => this.write('INFO', component, message, data),
      error: (message, data) => this.write('ERROR', component, message, data),
    };
  }
}

export function initDebugLogger(config?: DebugConfig, projectDir?: string): void {
  DebugLogger.getInstance().init(config, projectDir);
}

export function setVerboseConsole(enabled: boolean): void {
  DebugLogger.getInstance().setVerbose(enabled);
}

export function createLogger(component: string): ComponentLogger {
  return DebugLogger.getInstance().createLogger(component);
}
