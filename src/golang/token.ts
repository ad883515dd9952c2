/**
 * Position in source code
 */
export interface Position {
  line: number; // Line number (1-based)
  column: number; // Column number (0-based)
  index: number; // Character index (0-based)
}

/**
 * Source location with start and end positions
 */
export interface SourceLocation {
  start: Position;
  end: Position;
}

export const TokenType = {
  IDENT: 'IDENT',
  KEYWORD: 'KEYWORD',
  INT: 'INT',
  FLOAT: 'FLOAT',
  IMAG: 'IMAG',
  CHAR: 'CHAR',
  STRING: 'STRING',
  OPERATOR: 'OPERATOR',
  COMMENT: 'COMMENT',
  SEMICOLON: 'SEMICOLON',
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];

/**
 * Token produced by the lexer
 */
export interface Token {
  type: TokenType;
  value: string; // The lexeme; "\n" for inserted semicolons
  loc: SourceLocation;
  implicit?: boolean; // Semicolon inserted at a line end
}

export const KEYWORDS: ReadonlySet<string> = new Set([
  'break',
  'case',
  'chan',
  'const',
  'continue',
  'default',
  'defer',
  'else',
  'fallthrough',
  'for',
  'func',
  'go',
  'goto',
  'if',
  'import',
  'interface',
  'map',
  'package',
  'range',
  'return',
  'select',
  'struct',
  'switch',
  'type',
  'var',
]);

// Longest operators first so the lexer can match greedily
export const OPERATORS: readonly string[] = [
  '<<=', '>>=', '&^=', '...',
  '&&', '||', '<-', '++', '--', '==', '!=', '<=', '>=', ':=',
  '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '<<', '>>', '&^',
  '+', '-', '*', '/', '%', '&', '|', '^', '<', '>', '=', '!', '~',
  '(', ')', '[', ']', '{', '}', ',', ';', '.', ':',
];

export const OPENING_BRACKETS: ReadonlySet<string> = new Set(['(', '[', '{']);
export const CLOSING_BRACKETS: ReadonlySet<string> = new Set([')', ']', '}']);

export function isOperator(token: Token, value?: string): boolean {
  return token.type === TokenType.OPERATOR && (value === undefined || token.value === value);
}

export function isKeyword(token: Token, value?: string): boolean {
  return token.type === TokenType.KEYWORD && (value === undefined || token.value === value);
}

export function isOpening(token: Token): boolean {
  return token.type === TokenType.OPERATOR && OPENING_BRACKETS.has(token.value);
}

export function isClosing(token: Token): boolean {
  return token.type === TokenType.OPERATOR && CLOSING_BRACKETS.has(token.value);
}

/**
 * Short description of a token for error messages
 */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TokenType.EOF:
      return 'end of file';
    case TokenType.SEMICOLON:
      return token.implicit ? 'newline' : "';'";
    case TokenType.STRING:
    case TokenType.CHAR:
      return `literal ${token.value.length > 20 ? `${token.value.slice(0, 20)}...` : token.value}`;
    default:
      return `'${token.value}'`;
  }
}
