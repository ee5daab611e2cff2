/**
 * Complexity Profiles
 *
 * Per-language node kinds and token patterns, read from
 * data/complexity-profiles.json.
 */

import { z } from 'zod';
import { loadDataFile } from '../../lib/data-files.js';
import type { ConfigError } from '../../lib/env-config.js';
import type { Result } from '../../lib/result-types.js';

const PatternSchema = z.string().min(1).superRefine((pattern, ctx) => {
  try {
    new RegExp(pattern, 'g');
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid regular expression: ${error instanceof Error ? error.message : String(error)}`,
    });
  }
});

export const ComplexityProfileSchema = z.object({
  language: z.string().min(1),
  /** Tree-sitter grammar id; absent when no grammar package is available */
  grammar: z.string().min(1).optional(),
  branchKinds: z.array(z.string()),
  exitKinds: z.array(z.string()),
  booleanKinds: z.array(z.string()),
  operatorPattern: PatternSchema,
  identifierPattern: PatternSchema,
  keywords: z.array(z.string()),
  commentPrefixes: z.array(z.string().min(1)),
});

export type ComplexityProfile = z.infer<typeof ComplexityProfileSchema>;

const ProfileFileSchema = z.object({
  profiles: z.array(ComplexityProfileSchema),
});

export const COMPLEXITY_PROFILES_FILE = 'complexity-profiles.json';

export function loadComplexityProfiles(): Result<ComplexityProfile[], ConfigError> {
  return loadDataFile(COMPLEXITY_PROFILES_FILE, ProfileFileSchema).map((file) => file.profiles);
}
