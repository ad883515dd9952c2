import type { Position } from './token.js';

/**
 * Error thrown by the lexer or parser when generated source is not
 * well-formed. Carries the position of the offending input.
 */
export class GoSyntaxError extends Error {
  readonly line: number;
  readonly column: number;
  readonly index: number;

  constructor(message: string, position: Position) {
    // columns are reported 1-based
    super(`Error at line ${position.line}, column ${position.column + 1}: ${message}`);
    this.name = 'GoSyntaxError';
    this.line = position.line;
    this.column = position.column;
    this.index = position.index;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GoSyntaxError);
    }
  }
}
