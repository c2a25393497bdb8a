import { Lexer } from './lexer';
import { ParseError } from './errors';
import {
  DEFAULT_FILENAME,
  Lexeme,
  LexemeKind,
  NodeType,
  type Decl,
  type Expr,
  type Identifier,
  type Location,
  type ParseOptions,
  type PatternExpr,
  type Predicate,
} from './types';

export const KEYWORDS: ReadonlySet<string> = new Set([
  'if',
  'then',
  'else',
  'do',
  'let',
  'in',
  'match',
]);

const EQUALS = Lexeme.operator('=');
const FAT_ARROW = Lexeme.operator('=>');
const IN = Lexeme.identifier('in');
const RPAREN = Lexeme.punctuation(LexemeKind.RParen);
const COMMA = Lexeme.punctuation(LexemeKind.Comma);

/** Brackets, constructors, lets and matches nested deeper than this are rejected */
export const MAX_NESTING = 1000;

export type ParseResult =
  | { ok: true; decls: Decl[] }
  | { ok: false; error: ParseError };

/**
 * Recursive-descent parser with one token of lookahead.
 *
 * Every rule either returns a node, returns undefined without consuming the
 * token it looked at ("no match here"), or throws a ParseError. The only
 * rule that rolls the lexer back is the match-arm rule, which has to look
 * past a predicate to tell an arm from the next declaration.
 */
export class Parser {
  private readonly lexer: Lexer;
  private nesting = 0;

  constructor(source: string, options: ParseOptions = {}) {
    this.lexer = new Lexer(source, options.filename ?? DEFAULT_FILENAME);
  }

  /**
   * Parse all declarations; throws the first error found
   */
  parse(): Decl[] {
    const decls: Decl[] = [];
    this.lexer.advance();

    while (true) {
      this.lexer.skipSemicolon();
      const token = this.lexer.peek();
      if (!token) {
        return decls;
      }

      const decl = this.parseDecl();
      if (!decl) {
        throw ParseError.unexpected(token, 'a declaration');
      }
      decls.push(decl);
    }
  }

  /**
   * name predicates* = callsite
   */
  private parseDecl(): Decl | undefined {
    const id = this.maybeIdentifier();
    if (!id) {
      return undefined;
    }

    const predicates = this.parseMany(() => this.parsePredicate());
    this.lexer.chomp(EQUALS);
    const body = this.parseCallsite();

    return { id, predicates, body };
  }

  private parsePredicate(): Predicate | undefined {
    const token = this.lexer.peek();
    if (!token) {
      return undefined;
    }

    const { lexeme, location } = token;
    switch (lexeme.kind) {
      case LexemeKind.Signed:
        this.lexer.advance();
        return { type: NodeType.IntegerPredicate, location, value: lexeme.value };

      case LexemeKind.QuotedString:
        this.lexer.advance();
        return { type: NodeType.StringPredicate, location, value: unquote(lexeme.text) };

      case LexemeKind.Identifier: {
        if (KEYWORDS.has(lexeme.text)) {
          return undefined;
        }
        this.lexer.advance();
        const id: Identifier = { name: lexeme.text, location };
        if (isCapitalized(lexeme.text)) {
          const dims = this.nested(location, () => this.parseMany(() => this.parsePredicate()));
          return { type: NodeType.CtorPredicate, ctorId: id, dims };
        }
        return { type: NodeType.Irrefutable, id };
      }

      case LexemeKind.LParen:
        this.lexer.advance();
        return this.nested(location, () => this.parseTuplePredicate(location));

      default:
        return undefined;
    }
  }

  /**
   * After '(': `()` is the empty tuple, `(p)` is just p, `(p, q)` a tuple
   */
  private parseTuplePredicate(location: Location): Predicate {
    if (this.lexer.peekMatches(RPAREN)) {
      this.lexer.advance();
      return { type: NodeType.TuplePredicate, location, dims: [] };
    }

    const first = this.requirePredicate();
    const dims = [first];
    while (this.lexer.peekMatches(COMMA)) {
      this.lexer.advance();
      dims.push(this.requirePredicate());
    }
    this.lexer.chomp(RPAREN);

    if (dims.length === 1) {
      return first;
    }
    return { type: NodeType.TuplePredicate, location, dims };
  }

  private requirePredicate(): Predicate {
    const predicate = this.parsePredicate();
    if (!predicate) {
      throw this.unexpectedHere('a predicate');
    }
    return predicate;
  }

  /**
   * term term* -- a single term is returned as is
   */
  private parseCallsite(): Expr {
    this.lexer.skipSemicolon();

    const fn = this.parseCallsiteTerm();
    if (!fn) {
      throw ParseError.error(this.here(), 'missing function callsite expression');
    }

    const args = this.parseMany(() => this.parseCallsiteTerm());
    if (args.length === 0) {
      return fn;
    }

    return { type: NodeType.Callsite, function: fn, arguments: args };
  }

  private parseCallsiteTerm(): Expr | undefined {
    const token = this.lexer.peek();
    if (!token) {
      return undefined;
    }

    const { lexeme, location } = token;
    switch (lexeme.kind) {
      case LexemeKind.Identifier:
        if (lexeme.text === 'let') {
          this.lexer.advance();
          return this.nested(location, () => this.parseLetExpr(location));
        }
        if (lexeme.text === 'match') {
          this.lexer.advance();
          return this.nested(location, () => this.parseMatchExpr(location));
        }
        if (KEYWORDS.has(lexeme.text)) {
          return undefined;
        }
        this.lexer.advance();
        return { type: NodeType.Symbol, id: { name: lexeme.text, location } };

      case LexemeKind.Operator:
        if (lexeme.text === '=') {
          return undefined;
        }
        this.lexer.advance();
        return { type: NodeType.Symbol, id: { name: lexeme.text, location } };

      case LexemeKind.LParen:
        this.lexer.advance();
        return this.nested(location, () => this.parseParenthesized(location));

      case LexemeKind.QuotedString:
        this.lexer.advance();
        return { type: NodeType.LiteralString, location, value: unquote(lexeme.text) };

      case LexemeKind.Signed:
        this.lexer.advance();
        return { type: NodeType.LiteralInteger, location, value: lexeme.value };

      case LexemeKind.Float:
        this.lexer.advance();
        return { type: NodeType.LiteralFloat, location, value: lexeme.value };

      case LexemeKind.Semicolon:
      case LexemeKind.RParen:
      case LexemeKind.Comma:
        return undefined;

      default:
        throw ParseError.notImplemented(location);
    }
  }

  /**
   * After '(': `()` is the empty tuple, `(e)` is just e, `(e, f)` a tuple
   */
  private parseParenthesized(location: Location): Expr {
    if (this.lexer.peekMatches(RPAREN)) {
      this.lexer.advance();
      return { type: NodeType.TupleCtor, location, dims: [] };
    }

    const first = this.parseCallsite();
    const dims = [first];
    while (this.lexer.peekMatches(COMMA)) {
      this.lexer.advance();
      dims.push(this.parseCallsite());
    }
    this.lexer.chomp(RPAREN);

    if (dims.length === 1) {
      return first;
    }
    return { type: NodeType.TupleCtor, location, dims };
  }

  /**
   * After 'let': name = callsite in callsite
   */
  private parseLetExpr(location: Location): Expr {
    const binding = this.parseIdentifier();
    this.lexer.chomp(EQUALS);
    const value = this.parseCallsite();
    this.lexer.skipSemicolon();
    this.lexer.chomp(IN);
    const body = this.parseCallsite();

    return { type: NodeType.Let, location, binding, value, body };
  }

  /**
   * After 'match': callsite (predicate => callsite)+
   * Arms are separated by semicolons or, outside brackets, newlines.
   */
  private parseMatchExpr(location: Location): Expr {
    const subject = this.parseCallsite();
    const patternExprs = this.parseMany(() => this.parseMatchArm());
    if (patternExprs.length === 0) {
      throw ParseError.error(location, 'match expression has no arms');
    }

    return { type: NodeType.Match, location, subject, patternExprs };
  }

  private parseMatchArm(): PatternExpr | undefined {
    const snapshot = this.lexer.snapshot();
    this.lexer.skipSemicolon();

    // A predicate not followed by '=>' starts whatever comes after the match
    const predicate = this.parsePredicate();
    if (!predicate || !this.lexer.peekMatches(FAT_ARROW)) {
      this.lexer.restore(snapshot);
      return undefined;
    }
    this.lexer.advance(); // consume '=>'

    return { predicate, expr: this.parseCallsite() };
  }

  private parseIdentifier(): Identifier {
    const id = this.maybeIdentifier();
    if (!id) {
      throw this.unexpectedHere('an identifier');
    }
    return id;
  }

  private maybeIdentifier(): Identifier | undefined {
    const token = this.lexer.peek();
    if (!token) {
      return undefined;
    }
    const { lexeme, location } = token;
    if (lexeme.kind !== LexemeKind.Identifier || KEYWORDS.has(lexeme.text)) {
      return undefined;
    }
    this.lexer.advance();
    return { name: lexeme.text, location };
  }

  /**
   * Apply `rule` until it has nothing more to offer
   */
  private parseMany<T>(rule: () => T | undefined): T[] {
    const items: T[] = [];
    for (let item = rule(); item !== undefined; item = rule()) {
      items.push(item);
    }
    return items;
  }

  /**
   * Run `rule` one level deeper, failing at `location` past MAX_NESTING
   * instead of exhausting the call stack
   */
  private nested<T>(location: Location, rule: () => T): T {
    if (this.nesting >= MAX_NESTING) {
      throw ParseError.error(location, `nesting is deeper than ${MAX_NESTING} levels`);
    }
    this.nesting++;
    try {
      return rule();
    } finally {
      this.nesting--;
    }
  }

  private here(): Location {
    return this.lexer.peek()?.location ?? this.lexer.currentLocation();
  }

  private unexpectedHere(expected: string): ParseError {
    return ParseError.unexpected(this.lexer.expectToken(expected), expected);
  }
}

function unquote(text: string): string {
  return text.slice(1, -1);
}

function isCapitalized(name: string): boolean {
  return /^\p{Lu}/u.test(name);
}

/**
 * Parse a source buffer into declarations, or the first error
 */
export function parse(source: string, options: ParseOptions = {}): ParseResult {
  try {
    return { ok: true, decls: new Parser(source, options).parse() };
  } catch (error) {
    if (error instanceof ParseError) {
      return { ok: false, error };
    }
    throw error;
  }
}
