/**
 * Per-language Metrics Facade
 *
 * Binds one complexity profile to the shared engines. The facade adds
 * nothing but configuration and the exit-point floor.
 */

import type {
  CodeMetricsReport,
  ComplexityMetrics,
  HalsteadMetrics,
  LineCounts,
} from '../../models/Metrics.js';
import { NEUTRAL_COMPLEXITY, treeSitterGrammar, tryAstComplexity, type SourceGrammar } from './ast-complexity.js';
import { halsteadEstimate } from './halstead.js';
import { maintainabilityMetrics } from './maintainability.js';
import { countLines } from './line-counter.js';
import { loadComplexityProfiles, type ComplexityProfile } from './profiles.js';
import type { ConfigError } from '../../lib/env-config.js';
import { Result, ok, err } from '../../lib/result-types.js';
import { UnknownLanguageError } from '../../lib/errors/ParserErrors.js';
import { logger } from '../../lib/logger.js';

export interface AnalyzeOptions {
  /** Grammar to parse with instead of the profile's own */
  grammar?: SourceGrammar;
  /** Source lines of code, when already known */
  sloc?: number;
  /** Comment lines of code, when already known */
  cloc?: number;
}

export class LanguageMetrics {
  private readonly branchKinds: ReadonlySet<string>;
  private readonly exitKinds: ReadonlySet<string>;
  private readonly booleanKinds: ReadonlySet<string>;
  private readonly keywords: ReadonlySet<string>;
  private readonly operatorPattern: RegExp;
  private readonly identifierPattern: RegExp;
  private defaultGrammar: SourceGrammar | null | undefined;

  constructor(readonly profile: ComplexityProfile) {
    this.branchKinds = new Set(profile.branchKinds);
    this.exitKinds = new Set(profile.exitKinds);
    this.booleanKinds = new Set(profile.booleanKinds);
    this.keywords = new Set(profile.keywords);
    this.operatorPattern = new RegExp(profile.operatorPattern, 'g');
    this.identifierPattern = new RegExp(profile.identifierPattern, 'g');
  }

  get language(): string {
    return this.profile.language;
  }

  /**
   * Complexity with the exit-point floor applied. `analyzed` is false when
   * no grammar could parse the source.
   */
  complexity(source: string, grammar?: SourceGrammar): { metrics: ComplexityMetrics; analyzed: boolean } {
    const result = tryAstComplexity(
      source,
      grammar ?? this.profileGrammar(),
      this.branchKinds,
      this.exitKinds,
      this.booleanKinds
    );

    if (result.isErr()) {
      logger.debug('Complexity fell back to neutral values', {
        language: this.language,
        reason: result.error.message,
      });
    }

    const metrics = result.unwrapOr({ ...NEUTRAL_COMPLEXITY });
    // The end of a body is an implicit return
    return { metrics: { ...metrics, exitPoints: Math.max(1, metrics.exitPoints) }, analyzed: result.isOk() };
  }

  halstead(source: string): HalsteadMetrics {
    return halsteadEstimate(source, this.operatorPattern, this.identifierPattern, this.keywords);
  }

  countLines(source: string): LineCounts {
    return countLines(source, this.profile.commentPrefixes);
  }

  analyze(source: string, options: AnalyzeOptions = {}): CodeMetricsReport {
    const lines = this.countLines(source);
    const { metrics: complexity, analyzed } = this.complexity(source, options.grammar);
    const halstead = this.halstead(source);

    const sloc = options.sloc ?? lines.source;
    const cloc = options.cloc ?? lines.comment;

    return {
      language: this.language,
      lines,
      complexity,
      halstead,
      maintainability: maintainabilityMetrics(halstead.volume, complexity.cyclomatic, sloc, cloc, source),
      analyzed,
    };
  }

  /**
   * The profile's Tree-sitter grammar, loaded once; undefined when the
   * profile names none or it cannot be loaded
   */
  private profileGrammar(): SourceGrammar | undefined {
    if (this.defaultGrammar === undefined) {
      const grammarId = this.profile.grammar;
      if (grammarId === undefined) {
        this.defaultGrammar = null;
      } else {
        const loaded = treeSitterGrammar(grammarId);
        if (loaded.isErr()) {
          logger.warn('Grammar unavailable for metrics', { language: this.language, error: loaded.error.message });
        }
        this.defaultGrammar = loaded.unwrapOr(null);
      }
    }
    return this.defaultGrammar ?? undefined;
  }
}

// Facade cache, filled on the first successful load
let facadeCache: ReadonlyMap<string, LanguageMetrics> | undefined;

/**
 * Facades for every bundled profile, keyed by language. Built once; later
 * calls return the same facades.
 */
export function loadLanguageMetrics(): Result<ReadonlyMap<string, LanguageMetrics>, ConfigError> {
  if (facadeCache) {
    return ok(facadeCache);
  }
  return loadComplexityProfiles().map((profiles) => {
    facadeCache = new Map(
      profiles.map((profile): [string, LanguageMetrics] => [profile.language, new LanguageMetrics(profile)])
    );
    return facadeCache;
  });
}

/**
 * Facade for one bundled language
 */
export function metricsFor(language: string): Result<LanguageMetrics, ConfigError | UnknownLanguageError> {
  return loadLanguageMetrics().andThen((facades) => {
    const facade = facades.get(language.toLowerCase());
    return facade ? ok(facade) : err(new UnknownLanguageError(language));
  });
}
