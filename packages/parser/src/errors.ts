import { type Location, type Token, describeLexeme, formatLocation } from './types';

/**
 * Diagnostic severity levels
 */
export enum ErrorLevel {
  Info = 'info',
  Warning = 'warning',
  Error = 'error',
}

/**
 * The single error type of the front end. Lexing and parsing stop at the
 * first one.
 */
export class ParseError extends Error {
  constructor(
    public readonly location: Location,
    public readonly level: ErrorLevel,
    message: string
  ) {
    super(message);
    this.name = 'ParseError';
  }

  static error(location: Location, message: string): ParseError {
    return new ParseError(location, ErrorLevel.Error, message);
  }

  static notImplemented(location: Location): ParseError {
    return new ParseError(location, ErrorLevel.Error, 'parsing this is not implemented');
  }

  static unexpected(token: Token, expected: string): ParseError {
    return new ParseError(
      token.location,
      ErrorLevel.Error,
      `unexpected token (${describeLexeme(token.lexeme)}) found. expected ${expected}`
    );
  }

  /**
   * `file:line:col: level: message`
   */
  toString(): string {
    return `${formatLocation(this.location)}: ${this.level}: ${this.message}`;
  }
}
