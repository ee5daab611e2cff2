/**
 * Maintainability Index (Visual Studio variant), technical debt ratio and
 * line duplication
 */

import type { MaintainabilityMetrics } from '../../models/Metrics.js';

/** Floor for the Halstead volume inside the logarithm */
export const VOLUME_EPSILON = 1e-10;

/** Trimmed lines shorter than this never count as duplicates */
const MIN_DUPLICATE_LINE_LENGTH = 4;

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Maintainability index in [0, 100]; 100 when there is no source
 */
export function miVisualStudio(volume: number, cyclomatic: number, sloc: number, cloc: number): number {
  if (sloc <= 0) {
    return 100;
  }

  const commentRatio = cloc / sloc;
  const raw = 171 - 5.2 * Math.log(Math.max(volume, VOLUME_EPSILON)) - 0.23 * cyclomatic - 16.2 * Math.log(sloc);
  const mi = (raw * 100) / 171 + 50 * Math.sin(Math.sqrt(commentRatio * 2.4));

  if (!Number.isFinite(mi)) {
    return 0;
  }
  return clamp(mi, 0, 100);
}

export function technicalDebtRatio(maintainabilityIndex: number): number {
  const ratio = (100 - maintainabilityIndex) / 100;
  return Number.isFinite(ratio) ? clamp(ratio, 0, 1) : 1;
}

/**
 * Percentage of meaningful lines whose trimmed text appears more than once
 */
export function duplicationPercentage(source: string): number {
  const lines = source
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length >= MIN_DUPLICATE_LINE_LENGTH);

  if (lines.length === 0) {
    return 0;
  }

  const occurrences = new Map<string, number>();
  for (const line of lines) {
    occurrences.set(line, (occurrences.get(line) ?? 0) + 1);
  }

  const duplicated = lines.filter((line) => (occurrences.get(line) ?? 0) > 1).length;
  return (duplicated / lines.length) * 100;
}

export function maintainabilityMetrics(
  volume: number,
  cyclomatic: number,
  sloc: number,
  cloc: number,
  source: string
): MaintainabilityMetrics {
  const index = miVisualStudio(volume, cyclomatic, sloc, cloc);
  return {
    index,
    technicalDebtRatio: technicalDebtRatio(index),
    duplicationPercentage: duplicationPercentage(source),
  };
}
