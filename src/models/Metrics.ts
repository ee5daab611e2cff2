/**
 * Code Metrics Models
 */

export interface ComplexityMetrics {
  /** Linearly independent paths, at least 1 */
  cyclomatic: number;
  /** Nesting-weighted reading difficulty */
  cognitive: number;
  /** Deepest AST depth at which a branch node occurs */
  nestingDepth: number;
  exitPoints: number;
}

export interface HalsteadMetrics {
  /** N1 */
  totalOperators: number;
  /** N2 */
  totalOperands: number;
  /** n1 */
  uniqueOperators: number;
  /** n2 */
  uniqueOperands: number;
  volume: number;
  difficulty: number;
  effort: number;
}

export interface MaintainabilityMetrics {
  /** Visual Studio maintainability index, within [0, 100] */
  index: number;
  /** Within [0, 1] */
  technicalDebtRatio: number;
  /** Percentage of duplicated lines, within [0, 100] */
  duplicationPercentage: number;
}

export interface LineCounts {
  total: number;
  blank: number;
  /** CLOC */
  comment: number;
  /** SLOC */
  source: number;
}

/**
 * Everything a language facade computes for one source text
 */
export interface CodeMetricsReport {
  language: string;
  lines: LineCounts;
  complexity: ComplexityMetrics;
  halstead: HalsteadMetrics;
  maintainability: MaintainabilityMetrics;
  /** False when the grammar could not load or parse the source */
  analyzed: boolean;
}
