import { ParseError } from './errors';
import {
  DEFAULT_FILENAME,
  Lexeme,
  LexemeKind,
  type Location,
  type Token,
  formatLocation,
  lexemeEquals,
} from './types';

export enum NestingKind {
  Paren = 'Paren',
  Square = 'Square',
  Curly = 'Curly',
}

const OPENERS: Record<NestingKind, string> = {
  [NestingKind.Paren]: '(',
  [NestingKind.Square]: '[',
  [NestingKind.Curly]: '{',
};

const OPERATOR_CHARS = new Set(Array.from('.=><-+!@:$%^&*/?~'));

/**
 * One open bracket. `parent` is the handle of the enclosing frame.
 */
export interface NestingFrame {
  readonly kind: NestingKind;
  readonly location: Location;
  readonly parent: number;
}

/** Handle meaning "no bracket is open" */
export const NO_NESTING = -1;

/**
 * Append-only store of nesting frames. Frames are never removed, so a
 * handle held by an old snapshot stays valid after the lexer moves on.
 */
export class NestingArena {
  private frames: NestingFrame[] = [];

  push(kind: NestingKind, location: Location, parent: number): number {
    this.frames.push({ kind, location, parent });
    return this.frames.length - 1;
  }

  get(handle: number): NestingFrame | undefined {
    return handle === NO_NESTING ? undefined : this.frames[handle];
  }

  depth(handle: number): number {
    let depth = 0;
    for (let frame = this.get(handle); frame; frame = this.get(frame.parent)) {
      depth++;
    }
    return depth;
  }
}

type LexerBuffer =
  | { state: 'started' }
  | { state: 'read'; token: Token }
  | { state: 'eof' };

/**
 * Everything needed to put a lexer back where it was
 */
export interface LexerSnapshot {
  readonly offset: number;
  readonly line: number;
  readonly column: number;
  readonly nesting: number;
  readonly buffer: LexerBuffer;
}

/**
 * Pull-based lexer with a one-token buffer.
 * Newlines are statement separators only when no bracket is open.
 */
export class Lexer {
  private offset: number = 0;
  private line: number = 1;
  private column: number = 0;
  private nesting: number = NO_NESTING;
  private buffer: LexerBuffer = { state: 'started' };
  private readonly arena = new NestingArena();

  constructor(
    private readonly source: string,
    private readonly filename: string = DEFAULT_FILENAME
  ) {}

  /**
   * The buffered token; undefined before the first advance and at end of input
   */
  peek(): Token | undefined {
    return this.buffer.state === 'read' ? this.buffer.token : undefined;
  }

  peekMatches(lexeme: Lexeme): boolean {
    const token = this.peek();
    return token !== undefined && lexemeEquals(token.lexeme, lexeme);
  }

  /**
   * Scan the next token into the buffer. Returns where that token starts,
   * or where input ended. A no-op once end of input is reached.
   */
  advance(): Location {
    if (this.buffer.state === 'eof') {
      return this.currentLocation();
    }
    const token = this.scanToken();
    if (!token) {
      this.buffer = { state: 'eof' };
      return this.currentLocation();
    }
    this.buffer = { state: 'read', token };
    return token.location;
  }

  /**
   * Require the buffered token to equal `expected`, then advance past it
   */
  chomp(expected: Lexeme): void {
    const description = describeExpected(expected);
    const token = this.expectToken(description);
    if (!lexemeEquals(token.lexeme, expected)) {
      throw ParseError.unexpected(token, description);
    }
    this.advance();
  }

  /**
   * The buffered token, or an error saying why there is none
   */
  expectToken(expected: string): Token {
    switch (this.buffer.state) {
      case 'started':
        throw ParseError.error(this.currentLocation(), 'lexer was not started');
      case 'eof':
        throw ParseError.error(this.currentLocation(), `hit EOF but expected ${expected}`);
      case 'read':
        return this.buffer.token;
    }
  }

  skipSemicolon(): void {
    while (this.peekMatches(Lexeme.punctuation(LexemeKind.Semicolon))) {
      this.advance();
    }
  }

  snapshot(): LexerSnapshot {
    return {
      offset: this.offset,
      line: this.line,
      column: this.column,
      nesting: this.nesting,
      buffer: this.buffer,
    };
  }

  restore(snapshot: LexerSnapshot): void {
    this.offset = snapshot.offset;
    this.line = snapshot.line;
    this.column = snapshot.column;
    this.nesting = snapshot.nesting;
    this.buffer = snapshot.buffer;
  }

  currentLocation(): Location {
    return {
      filename: this.filename,
      line: this.line,
      column: this.column,
      offset: this.offset,
    };
  }

  isOpen(): boolean {
    return this.nesting !== NO_NESTING;
  }

  depth(): number {
    return this.arena.depth(this.nesting);
  }

  /**
   * The innermost bracket still open, if any
   */
  openBracket(): NestingFrame | undefined {
    return this.arena.get(this.nesting);
  }

  private scanToken(): Token | undefined {
    // Whitespace, and newlines inside brackets
    while (true) {
      const ch = this.peekChar();
      if (ch === undefined) {
        return undefined;
      }
      if (ch === '\n') {
        if (this.isOpen()) {
          this.consume();
          continue;
        }
        const start = this.currentLocation();
        this.consume();
        return this.makeToken(Lexeme.punctuation(LexemeKind.Semicolon), start);
      }
      if (!isWhitespace(ch)) {
        break;
      }
      this.consume();
    }

    const start = this.currentLocation();
    const ch = this.consume();

    if (isDigit(ch)) {
      return this.scanNumber(start);
    }

    if (ch === '-' && isDigit(this.peekChar())) {
      return this.scanNumber(start);
    }

    if (isIdentifierStart(ch)) {
      while (isIdentifierPart(this.peekChar())) {
        this.consume();
      }
      return this.makeToken(Lexeme.identifier(this.textFrom(start)), start);
    }

    if (OPERATOR_CHARS.has(ch)) {
      while (isOperatorChar(this.peekChar())) {
        this.consume();
      }
      return this.makeToken(Lexeme.operator(this.textFrom(start)), start);
    }

    if (ch === '"') {
      return this.scanString(start);
    }

    switch (ch) {
      case '(':
        this.open(NestingKind.Paren, start);
        return this.makeToken(Lexeme.punctuation(LexemeKind.LParen), start);
      case ')':
        this.close(NestingKind.Paren, ch, start);
        return this.makeToken(Lexeme.punctuation(LexemeKind.RParen), start);
      case '[':
        this.open(NestingKind.Square, start);
        return this.makeToken(Lexeme.punctuation(LexemeKind.LSquare), start);
      case ']':
        this.close(NestingKind.Square, ch, start);
        return this.makeToken(Lexeme.punctuation(LexemeKind.RSquare), start);
      case '{':
        this.open(NestingKind.Curly, start);
        return this.makeToken(Lexeme.punctuation(LexemeKind.LCurly), start);
      case '}':
        this.close(NestingKind.Curly, ch, start);
        return this.makeToken(Lexeme.punctuation(LexemeKind.RCurly), start);
      case ';':
        return this.makeToken(Lexeme.punctuation(LexemeKind.Semicolon), start);
      case ',':
        return this.makeToken(Lexeme.punctuation(LexemeKind.Comma), start);
    }

    throw ParseError.error(start, `unrecognized character '${ch}'`);
  }

  /**
   * Digits, optionally after a leading '-', with an optional fraction
   */
  private scanNumber(start: Location): Token {
    while (isDigit(this.peekChar())) {
      this.consume();
    }

    if (this.peekChar() === '.' && isDigit(this.peekChar(1))) {
      this.consume(); // consume '.'
      while (isDigit(this.peekChar())) {
        this.consume();
      }
      return this.makeToken(Lexeme.float(Number(this.textFrom(start))), start);
    }

    const text = this.textFrom(start);
    const value = BigInt(text);
    if (value < INT64_MIN || value > INT64_MAX) {
      throw ParseError.error(start, `integer literal ${text} is out of range`);
    }
    return this.makeToken(Lexeme.signed(value), start);
  }

  private scanString(start: Location): Token {
    while (true) {
      const ch = this.peekChar();
      if (ch === undefined) {
        throw ParseError.error(start, 'unterminated string literal');
      }
      this.consume();
      if (ch === '"') {
        return this.makeToken(Lexeme.quotedString(this.textFrom(start)), start);
      }
    }
  }

  private open(kind: NestingKind, location: Location): void {
    this.nesting = this.arena.push(kind, location, this.nesting);
  }

  private close(kind: NestingKind, ch: string, location: Location): void {
    const top = this.arena.get(this.nesting);
    if (!top) {
      throw ParseError.error(location, `unexpected '${ch}' with no open bracket`);
    }
    if (top.kind !== kind) {
      throw ParseError.error(
        location,
        `unexpected '${ch}' does not close '${OPENERS[top.kind]}' opened at ${formatLocation(top.location)}`
      );
    }
    this.nesting = top.parent;
  }

  /**
   * Character `ahead` characters past the cursor (code points, not UTF-16 units)
   */
  private peekChar(ahead: number = 0): string | undefined {
    let offset = this.offset;
    for (let i = 0; i < ahead; i++) {
      const cp = this.source.codePointAt(offset);
      if (cp === undefined) return undefined;
      offset += cp > 0xffff ? 2 : 1;
    }
    const cp = this.source.codePointAt(offset);
    return cp === undefined ? undefined : String.fromCodePoint(cp);
  }

  private consume(): string {
    const ch = this.peekChar();
    if (ch === undefined) {
      throw ParseError.error(this.currentLocation(), 'advanced past end of input');
    }
    this.offset += ch.length;
    if (ch === '\n') {
      this.line++;
      this.column = 0;
    } else {
      this.column++;
    }
    return ch;
  }

  private textFrom(start: Location): string {
    return this.source.slice(start.offset, this.offset);
  }

  private makeToken(lexeme: Lexeme, start: Location): Token {
    return { location: start, lexeme, text: this.textFrom(start) };
  }
}

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

function describeExpected(lexeme: Lexeme): string {
  switch (lexeme.kind) {
    case LexemeKind.Identifier:
    case LexemeKind.Operator:
      return `'${lexeme.text}'`;
    default:
      return lexeme.kind;
  }
}

function isWhitespace(ch: string): boolean {
  return /\s/u.test(ch);
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

function isIdentifierStart(ch: string): boolean {
  return ch === '_' || /\p{Alphabetic}/u.test(ch);
}

function isIdentifierPart(ch: string | undefined): boolean {
  return ch !== undefined && (ch === '_' || /[\p{Alphabetic}\p{N}]/u.test(ch));
}

function isOperatorChar(ch: string | undefined): boolean {
  return ch !== undefined && OPERATOR_CHARS.has(ch);
}

/**
 * Scan an entire source into tokens
 */
export function tokenize(source: string, filename: string = DEFAULT_FILENAME): Token[] {
  const lexer = new Lexer(source, filename);
  const tokens: Token[] = [];

  lexer.advance();
  for (let token = lexer.peek(); token; token = lexer.peek()) {
    tokens.push(token);
    lexer.advance();
  }

  const open = lexer.openBracket();
  if (open) {
    throw ParseError.error(open.location, `unclosed '${OPENERS[open.kind]}'`);
  }

  return tokens;
}
