/**
 * Source location for AST nodes and tokens
 */
export interface Location {
  readonly filename: string;
  readonly line: number;     // 1-indexed
  readonly column: number;   // 0-indexed
  readonly offset: number;   // index into the source buffer
}

export function formatLocation(location: Location): string {
  return `${location.filename}:${location.line}:${location.column}`;
}

/**
 * Lexeme kinds produced by the lexer
 */
export enum LexemeKind {
  // Literals/Identifiers
  Signed = 'Signed',
  Float = 'Float',
  Identifier = 'Identifier',
  QuotedString = 'QuotedString',
  Operator = 'Operator',

  // Punctuation
  LParen = 'LParen',           // (
  RParen = 'RParen',           // )
  LSquare = 'LSquare',         // [
  RSquare = 'RSquare',         // ]
  LCurly = 'LCurly',           // {
  RCurly = 'RCurly',           // }
  Semicolon = 'Semicolon',     // ; or a top-level newline
  Comma = 'Comma',             // ,
}

export type Punctuation =
  | LexemeKind.LParen
  | LexemeKind.RParen
  | LexemeKind.LSquare
  | LexemeKind.RSquare
  | LexemeKind.LCurly
  | LexemeKind.RCurly
  | LexemeKind.Semicolon
  | LexemeKind.Comma;

export type Lexeme =
  | { readonly kind: LexemeKind.Signed; readonly value: bigint }
  | { readonly kind: LexemeKind.Float; readonly value: number }
  | { readonly kind: LexemeKind.Identifier; readonly text: string }
  | { readonly kind: LexemeKind.QuotedString; readonly text: string }
  | { readonly kind: LexemeKind.Operator; readonly text: string }
  | { readonly kind: Punctuation };

/**
 * Lexeme constructors
 */
export const Lexeme = {
  signed: (value: bigint): Lexeme => ({ kind: LexemeKind.Signed, value }),
  float: (value: number): Lexeme => ({ kind: LexemeKind.Float, value }),
  identifier: (text: string): Lexeme => ({ kind: LexemeKind.Identifier, text }),
  quotedString: (text: string): Lexeme => ({ kind: LexemeKind.QuotedString, text }),
  operator: (text: string): Lexeme => ({ kind: LexemeKind.Operator, text }),
  punctuation: (kind: Punctuation): Lexeme => ({ kind }),
};

/**
 * Structural equality: texts and values are compared, positions never are.
 */
export function lexemeEquals(a: Lexeme, b: Lexeme): boolean {
  switch (a.kind) {
    case LexemeKind.Signed:
    case LexemeKind.Float:
      return b.kind === a.kind && b.value === a.value;
    case LexemeKind.Identifier:
    case LexemeKind.QuotedString:
    case LexemeKind.Operator:
      return b.kind === a.kind && b.text === a.text;
    default:
      return b.kind === a.kind;
  }
}

/**
 * Render a lexeme for diagnostics, e.g. `Signed(42)` or `Operator("=>")`
 */
export function describeLexeme(lexeme: Lexeme): string {
  switch (lexeme.kind) {
    case LexemeKind.Signed:
    case LexemeKind.Float:
      return `${lexeme.kind}(${lexeme.value})`;
    case LexemeKind.Identifier:
    case LexemeKind.QuotedString:
    case LexemeKind.Operator:
      return `${lexeme.kind}(${JSON.stringify(lexeme.text)})`;
    default:
      return lexeme.kind;
  }
}

export interface Token {
  location: Location;
  lexeme: Lexeme;
  text: string;      // exact source span
}

/**
 * AST Node types
 */
export enum NodeType {
  // Predicates
  Irrefutable = 'Irrefutable',
  IntegerPredicate = 'IntegerPredicate',
  StringPredicate = 'StringPredicate',
  CtorPredicate = 'CtorPredicate',
  TuplePredicate = 'TuplePredicate',

  // Expressions
  Lambda = 'Lambda',
  Let = 'Let',
  LiteralInteger = 'LiteralInteger',
  LiteralFloat = 'LiteralFloat',
  LiteralString = 'LiteralString',
  Symbol = 'Symbol',
  Match = 'Match',
  Callsite = 'Callsite',
  TupleCtor = 'TupleCtor',
}

/**
 * A bound or referenced name
 */
export interface Identifier {
  name: string;
  location: Location;
}

/**
 * Binds its subject to a name: x
 */
export interface IrrefutablePredicate {
  type: NodeType.Irrefutable;
  id: Identifier;
}

export interface IntegerPredicate {
  type: NodeType.IntegerPredicate;
  location: Location;
  value: bigint;
}

export interface StringPredicate {
  type: NodeType.StringPredicate;
  location: Location;
  value: string;
}

/**
 * Constructor applied to sub-patterns: Cons x xs
 */
export interface CtorPredicate {
  type: NodeType.CtorPredicate;
  ctorId: Identifier;
  dims: Predicate[];
}

/**
 * Parenthesized, comma-separated sub-patterns: (x, y)
 */
export interface TuplePredicate {
  type: NodeType.TuplePredicate;
  location: Location;
  dims: Predicate[];
}

export type Predicate =
  | IrrefutablePredicate
  | IntegerPredicate
  | StringPredicate
  | CtorPredicate
  | TuplePredicate;

export interface LambdaExpr {
  type: NodeType.Lambda;
  location: Location;
  paramNames: Identifier[];
  body: Expr;
}

/**
 * let binding = value in body
 */
export interface LetExpr {
  type: NodeType.Let;
  location: Location;
  binding: Identifier;
  value: Expr;
  body: Expr;
}

export interface LiteralIntegerExpr {
  type: NodeType.LiteralInteger;
  location: Location;
  value: bigint;
}

export interface LiteralFloatExpr {
  type: NodeType.LiteralFloat;
  location: Location;
  value: number;
}

export interface LiteralStringExpr {
  type: NodeType.LiteralString;
  location: Location;
  value: string;
}

/**
 * Reference to a name; operators are names too
 */
export interface SymbolExpr {
  type: NodeType.Symbol;
  id: Identifier;
}

/**
 * One match arm: predicate => expr
 */
export interface PatternExpr {
  predicate: Predicate;
  expr: Expr;
}

export interface MatchExpr {
  type: NodeType.Match;
  location: Location;
  subject: Expr;
  patternExprs: PatternExpr[];
}

/**
 * Application: f x y
 */
export interface CallsiteExpr {
  type: NodeType.Callsite;
  function: Expr;
  arguments: Expr[];
}

export interface TupleCtorExpr {
  type: NodeType.TupleCtor;
  location: Location;
  dims: Expr[];
}

export type Expr =
  | LambdaExpr
  | LetExpr
  | LiteralIntegerExpr
  | LiteralFloatExpr
  | LiteralStringExpr
  | SymbolExpr
  | MatchExpr
  | CallsiteExpr
  | TupleCtorExpr;

/**
 * Top-level declaration: f x (Just y) = body
 */
export interface Decl {
  id: Identifier;
  predicates: Predicate[];
  body: Expr;
}

export function exprLocation(expr: Expr): Location {
  switch (expr.type) {
    case NodeType.Symbol:
      return expr.id.location;
    case NodeType.Callsite:
      return exprLocation(expr.function);
    default:
      return expr.location;
  }
}

export function predicateLocation(predicate: Predicate): Location {
  switch (predicate.type) {
    case NodeType.Irrefutable:
      return predicate.id.location;
    case NodeType.CtorPredicate:
      return predicate.ctorId.location;
    default:
      return predicate.location;
  }
}

export function declLocation(decl: Decl): Location {
  return decl.id.location;
}

/**
 * Parse options
 */
export interface ParseOptions {
  /** Label used in locations; nothing is read from disk */
  filename?: string;
}

export const DEFAULT_FILENAME = 'raw-text';
