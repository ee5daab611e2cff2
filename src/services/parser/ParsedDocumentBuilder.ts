/**
 * ParsedDocument Builder
 *
 * Collects symbols, classes, enums, docstrings and diagnostics while a
 * capsule walks its input, then assembles the final ParsedDocument.
 */

import type { SourceDescriptor } from '../../models/Language.js';
import type {
  ClassDefinition,
  Diagnostic,
  Docstring,
  DocumentSymbol,
  EnumDefinition,
  ParseContext,
  ParsedDocument,
  Span,
} from '../../models/ParsedDocument.js';

export const PARSER_VERSION = '0.1.0';

/** Maximum distance (lines) between a doc comment and the symbol it documents */
const DOC_ASSOCIATION_WINDOW = 5;

/**
 * Count lines; an empty source has none
 */
export function countSourceLines(source: string): number {
  if (source.length === 0) {
    return 0;
  }
  const lines = source.split('\n').length;
  return source.endsWith('\n') ? lines - 1 : lines;
}

export class ParsedDocumentBuilder {
  private readonly startTime: number;
  private readonly symbols: DocumentSymbol[] = [];
  private readonly classes: ClassDefinition[] = [];
  private readonly enums: EnumDefinition[] = [];
  private readonly docstrings: Docstring[] = [];
  private readonly diagnostics: Diagnostic[] = [];
  private totalNodes = 0;
  private totalTokens = 0;

  constructor(
    private readonly descriptor: SourceDescriptor,
    private readonly context: ParseContext,
    private readonly language: string
  ) {
    this.startTime = performance.now();
  }

  addSymbol(symbol: DocumentSymbol): void {
    this.symbols.push(symbol);
  }

  /**
   * Add a class; its method list is filled from the symbols at build time
   */
  addClass(name: string, span: Span, bases: string[]): void {
    this.classes.push({ name, span, bases, methods: [] });
  }

  addEnum(definition: EnumDefinition): void {
    this.enums.push(definition);
  }

  addDocstring(docstring: Docstring): void {
    this.docstrings.push(docstring);
  }

  addDiagnostic(diagnostic: Diagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  setTreeStats(totalNodes: number, totalTokens: number): void {
    this.totalNodes = totalNodes;
    this.totalTokens = totalTokens;
  }

  /**
   * Attach doc comments to the closest symbol starting at most five lines
   * below them. Docstrings with an owner already are left alone.
   */
  associateDocstrings(): void {
    for (const docstring of this.docstrings) {
      if (docstring.kind !== 'doc' || docstring.owner !== undefined) {
        continue;
      }

      const { startLine, endLine, endColumn } = docstring.span;
      // Line comments may end at column 0 of the following line
      const commentLine = endColumn === 0 && endLine > startLine ? endLine - 1 : endLine;
      let closestSymbol: string | undefined;
      let closestDistance = Infinity;

      for (const symbol of this.symbols) {
        const distance = symbol.span.startLine - commentLine;
        if (distance > 0 && distance < closestDistance && distance <= DOC_ASSOCIATION_WINDOW) {
          closestDistance = distance;
          closestSymbol = symbol.name;
        }
      }

      if (closestSymbol !== undefined) {
        docstring.owner = closestSymbol;
      }
    }
  }

  /**
   * Assemble the document
   *
   * @param additional - Capsule-specific metadata merged over the defaults
   */
  build(source: string, additional: Record<string, unknown> = {}): ParsedDocument {
    this.associateDocstrings();

    const classes = this.classes.map((cls) => ({
      ...cls,
      methods: this.symbols
        .filter((symbol) => symbol.kind === 'method' && symbol.container === cls.name)
        .map((symbol) => symbol.name),
    }));

    const metadata: Record<string, unknown> = {
      language: this.language,
      lineCount: countSourceLines(source),
    };
    if (this.context.workspaceName !== undefined) {
      metadata.workspaceName = this.context.workspaceName;
    }
    if (this.context.vcsHead !== undefined) {
      metadata.vcsHead = this.context.vcsHead;
    }

    return {
      descriptor: this.descriptor,
      metadata: {
        parserVersion: PARSER_VERSION,
        analyzedAt: new Date().toISOString(),
        additional: { ...metadata, ...additional },
      },
      symbols: [...this.symbols],
      classes,
      enums: [...this.enums],
      docstrings: [...this.docstrings],
      stats: {
        byteLength: Buffer.byteLength(source, 'utf-8'),
        totalNodes: this.totalNodes,
        totalTokens: this.totalTokens,
        durationMs: performance.now() - this.startTime,
      },
      diagnostics: [...this.diagnostics],
    };
  }
}
