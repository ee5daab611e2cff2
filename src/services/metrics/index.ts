/**
 * Code Metrics Module
 */

export {
  astComplexity,
  tryAstComplexity,
  treeSitterGrammar,
  TreeSitterGrammar,
  NEUTRAL_COMPLEXITY,
  type NodeKinds,
  type SourceGrammar,
  type WalkableNode,
} from './ast-complexity.js';
export { halsteadEstimate, scanTokens, type TokenPattern } from './halstead.js';
export {
  miVisualStudio,
  technicalDebtRatio,
  duplicationPercentage,
  maintainabilityMetrics,
  VOLUME_EPSILON,
} from './maintainability.js';
export { countLines } from './line-counter.js';
export {
  loadComplexityProfiles,
  ComplexityProfileSchema,
  type ComplexityProfile,
} from './profiles.js';
export { LanguageMetrics, loadLanguageMetrics, metricsFor, type AnalyzeOptions } from './LanguageMetrics.js';
