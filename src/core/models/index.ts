export type { DebugConfig, MockwrightConfig, ConfigOverrides } from './config.js';
export { DEFAULT_POLL_INTERVAL_MS } from './config.js';
export { DebugConfigSchema, MockwrightConfigSchema } from './schemas.js';
export type { RawMockwrightConfig } from './schemas.js';
