/**
 * steel-web-loader
 *
 * Managed remote-browser sessions, a document loader on top of them, and the
 * agent tools built from both.
 */

// Configuration
export {
  resolveLoaderConfig,
  LoaderOptionsSchema,
  ExtractStrategyNameSchema,
  DEFAULT_BASE_URL,
  DEFAULT_CONNECT_URL,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_SESSION_TIMEOUT_MS,
} from './config/loader-config.js';
export type { LoaderOptions, LoaderConfig, ExtractStrategyName } from './config/loader-config.js';
export { loadEnvironment, checkEnvironment } from './config/env.js';

// Sessions
export * from './session/index.js';

// Browser and extraction
export { RemoteBrowser } from './browser/remote-browser.js';
export type { RemoteBrowserOptions, OpenPageOptions, OpenedPage } from './browser/remote-browser.js';
export * from './extraction/index.js';

// Loader
export * from './loader/index.js';

// Tools and agents
export * from './tools/index.js';
export * from './agents/index.js';

// Errors and logging
export * from './shared/errors/index.js';
export { LoggingService, getLogger, setLogger, createLogger } from './shared/services/logging.service.js';
export type { Logger, LogLevel, LogEntry } from './shared/services/logging.service.js';
