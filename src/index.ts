/**
 * Polyglot parser core
 *
 * Language capsule registry, universal parser and source discovery, plus the
 * shared complexity, Halstead and maintainability engines.
 */

export * from './models/Language.js';
export * from './models/ParsedDocument.js';
export * from './models/Metrics.js';
export * from './lib/errors/ParserErrors.js';
export { ok, err, type Result } from './lib/result-types.js';
export { Logger, logger, type LogLevel, type LoggerConfig } from './lib/logger.js';
export {
  ConfigurationManager,
  ConfigError,
  createConfigManager,
  loadCoreConfig,
  DEFAULT_CONFIG,
  type CoreConfig,
} from './lib/env-config.js';
export * from './services/parser/index.js';
export * from './services/discovery/index.js';
export * from './services/metrics/index.js';
