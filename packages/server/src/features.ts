import {
  CompletionItemKind,
  DiagnosticSeverity as LspDiagnosticSeverity,
  DocumentHighlightKind,
  SymbolKind as LspSymbolKind,
  type CompletionItem,
  type Diagnostic as LspDiagnostic,
  type DocumentHighlight,
  type DocumentSymbol,
  type Hover,
  type Position,
  type Range,
} from 'vscode-languageserver/node';
import type { TextDocument } from 'vscode-languageserver-textdocument';

import {
  ErrorLevel,
  type Decl,
  type Location,
  type ParseError,
  type SourceRange,
  type SymbolKind,
  findDefinitionAt,
  findReferencesAt,
  getCompletions,
  getHoverInfo,
  identifierRange,
} from '@tarn/parser';

export const DIAGNOSTIC_SOURCE = 'tarn';

/**
 * A cursor in parser terms: 1-based line, 0-based column in code points
 */
export interface SourcePosition {
  line: number;
  column: number;
}

/**
 * Parser columns count code points while LSP characters count UTF-16
 * units. Offsets are UTF-16 indices on both sides, so ranges go through them.
 */
export function toLspRange(document: TextDocument, range: SourceRange): Range {
  return {
    start: document.positionAt(range.start.offset),
    end: document.positionAt(range.end.offset),
  };
}

export function toSourcePosition(document: TextDocument, position: Position): SourcePosition {
  const before = document.getText({ start: { line: position.line, character: 0 }, end: position });
  return { line: position.line + 1, column: Array.from(before).length };
}

/**
 * Errors carry a point; highlight the character there
 */
export function errorRange(document: TextDocument, location: Location): Range {
  const codePoint = document.getText().codePointAt(location.offset);
  const width = codePoint === undefined ? 1 : String.fromCodePoint(codePoint).length;
  return {
    start: document.positionAt(location.offset),
    end: document.positionAt(location.offset + width),
  };
}

export function mapSeverity(level: ErrorLevel): LspDiagnosticSeverity {
  switch (level) {
    case ErrorLevel.Error:
      return LspDiagnosticSeverity.Error;
    case ErrorLevel.Warning:
      return LspDiagnosticSeverity.Warning;
    case ErrorLevel.Info:
      return LspDiagnosticSeverity.Information;
  }
}

export function toLspDiagnostic(document: TextDocument, error: ParseError): LspDiagnostic {
  return {
    range: errorRange(document, error.location),
    message: error.message,
    severity: mapSeverity(error.level),
    source: DIAGNOSTIC_SOURCE,
  };
}

/**
 * One symbol per equation
 */
export function documentSymbols(document: TextDocument, decls: Decl[]): DocumentSymbol[] {
  return decls.map((decl) => {
    const range = toLspRange(document, identifierRange(decl.id));
    const arity = decl.predicates.length;
    return {
      name: decl.id.name,
      detail: arity === 1 ? '1 parameter' : `${arity} parameters`,
      kind: LspSymbolKind.Function,
      range,
      selectionRange: range,
    };
  });
}

function completionKind(kind: SymbolKind): CompletionItemKind {
  return kind === 'declaration' ? CompletionItemKind.Function : CompletionItemKind.Variable;
}

export function completionItems(
  document: TextDocument,
  decls: Decl[],
  position: Position
): CompletionItem[] {
  const { line, column } = toSourcePosition(document, position);
  return getCompletions(decls, line, column).map((def) => ({
    label: def.name,
    kind: completionKind(def.kind),
    detail: def.kind,
  }));
}

export function hoverAt(document: TextDocument, decls: Decl[], position: Position): Hover | null {
  const { line, column } = toSourcePosition(document, position);
  const info = getHoverInfo(decls, line, column);
  if (!info) return null;

  return {
    contents: { kind: 'markdown', value: `**${info.kind}** \`${info.name}\`` },
    range: toLspRange(document, info.range),
  };
}

export function definitionRange(
  document: TextDocument,
  decls: Decl[],
  position: Position
): Range | null {
  const { line, column } = toSourcePosition(document, position);
  const def = findDefinitionAt(decls, line, column);
  return def ? toLspRange(document, def.range) : null;
}

export function referenceRanges(document: TextDocument, decls: Decl[], position: Position): Range[] {
  const { line, column } = toSourcePosition(document, position);
  return findReferencesAt(decls, line, column).map((range) => toLspRange(document, range));
}

export function highlights(
  document: TextDocument,
  decls: Decl[],
  position: Position
): DocumentHighlight[] {
  return referenceRanges(document, decls, position).map((range) => ({
    range,
    kind: DocumentHighlightKind.Read,
  }));
}
