export {
  discoverSources,
  discoveryOptionsFromConfig,
  DEFAULT_DISCOVERY_OPTIONS,
  type DiscoveryOptions,
  type DiscoveryResult,
  type SkippedEntry,
  type SkipReason,
} from './SourceDiscovery.js';
export { classifySource } from './SourceClassifier.js';
export { IgnoreRules, PROJECT_IGNORE_FILE } from './IgnoreRules.js';
