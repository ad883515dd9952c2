/**
 * Syntax gate for generated source: lexer, parser and printer
 */

import { parseSource } from './parser.js';
import { printSource } from './printer.js';

export { Lexer, tokenize } from './lexer.js';
export { Parser, parseSource, type Declaration, type DeclarationKind, type SourceFile } from './parser.js';
export { Printer, printSource } from './printer.js';
export { GoSyntaxError } from './syntax-error.js';
export { TokenType, type Token, type Position, type SourceLocation } from './token.js';

/**
 * Checks that source is a well-formed file and returns it in canonical
 * layout. Formatting its own output returns the same text.
 *
 * @throws {GoSyntaxError} When the source is not well-formed
 */
export function formatSource(source: string): string {
  parseSource(source);
  return printSource(source);
}
