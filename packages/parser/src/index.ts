// Types
export * from './types';

// Errors
export { ErrorLevel, ParseError } from './errors';

// Lexer
export {
  Lexer,
  NestingArena,
  NestingKind,
  NO_NESTING,
  tokenize,
  type LexerSnapshot,
  type NestingFrame,
} from './lexer';

// Parser
export { KEYWORDS, MAX_NESTING, Parser, parse, type ParseResult } from './parser';

// Symbol analysis
export {
  analyze,
  findDefinitionAt,
  findReferencesAt,
  getCompletions,
  getHoverInfo,
  identifierRange,
  isPositionInRange,
  type SemanticAnalysis,
  type SourceRange,
  type SymbolDefinition,
  type SymbolKind,
  type SymbolReference,
} from './semantics';
