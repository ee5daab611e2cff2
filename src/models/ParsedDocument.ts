/**
 * Parsed Document Model
 *
 * Result of a single capsule parse. Created per call and owned by the caller.
 */

import type { SourceDescriptor } from './Language.js';

// ============================================================================
// Parse Inputs
// ============================================================================

/**
 * Where a parse happens (workspace-level information)
 */
export interface ParseContext {
  /** Root directory of the parse */
  root: string;
  /** Optional workspace or project name */
  workspaceName?: string;
  /** Optional VCS revision the sources come from */
  vcsHead?: string;
}

/**
 * Per-call parsing switches
 */
export interface ParseOptions {
  /** Extract symbols, classes and enums */
  collectSymbols: boolean;
  /** Extract comments and docstrings */
  collectComments: boolean;
  /** Upper bound on source size accepted by a capsule */
  maxBytes?: number;
}

export const DEFAULT_PARSE_OPTIONS: ParseOptions = {
  collectSymbols: true,
  collectComments: true,
};

// ============================================================================
// Location
// ============================================================================

/**
 * Location of a code element
 */
export interface Span {
  /** Starting line number (1-indexed) */
  startLine: number;
  /** Starting column number (0-indexed) */
  startColumn: number;
  /** Ending line number (1-indexed) */
  endLine: number;
  /** Ending column number (0-indexed) */
  endColumn: number;
  startByte: number;
  endByte: number;
}

// ============================================================================
// Extracted Entities
// ============================================================================

export type SymbolKind =
  | 'function'
  | 'method'
  | 'class'
  | 'interface'
  | 'enum'
  | 'type'
  | 'module'
  | 'heading';

export interface DocumentSymbol {
  name: string;
  kind: SymbolKind;
  span: Span;
  /** Name of the enclosing class, impl block or interface */
  container?: string;
}

export interface ClassDefinition {
  name: string;
  span: Span;
  /** Base classes or implemented types, as written */
  bases: string[];
  /** Names of methods declared inside the class */
  methods: string[];
}

export interface EnumDefinition {
  name: string;
  span: Span;
  variants: string[];
}

export type DocstringKind = 'line' | 'block' | 'doc' | 'docstring';

export interface Docstring {
  /** Text without comment delimiters */
  text: string;
  kind: DocstringKind;
  span: Span;
  /** Symbol the documentation belongs to */
  owner?: string;
}

// ============================================================================
// Diagnostics, Metadata, Stats
// ============================================================================

export type DiagnosticSeverity = 'error' | 'warning' | 'info';

export interface Diagnostic {
  message: string;
  severity: DiagnosticSeverity;
  /** Machine-readable code (e.g. "syntax_error") */
  code: string;
  span?: Span;
}

export interface DocumentMetadata {
  parserVersion: string;
  /** ISO 8601 timestamp */
  analyzedAt: string;
  /** Capsule-specific, freeform values */
  additional: Record<string, unknown>;
}

export interface DocumentStats {
  /** UTF-8 byte length of the source */
  byteLength: number;
  totalNodes: number;
  totalTokens: number;
  durationMs: number;
}

/**
 * Complete result of parsing one source file
 */
export interface ParsedDocument {
  descriptor: SourceDescriptor;
  metadata: DocumentMetadata;
  symbols: DocumentSymbol[];
  classes: ClassDefinition[];
  enums: EnumDefinition[];
  docstrings: Docstring[];
  stats: DocumentStats;
  diagnostics: Diagnostic[];
}
