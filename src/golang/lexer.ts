import { GoSyntaxError } from './syntax-error.js';
import { KEYWORDS, OPERATORS, TokenType, type Position, type Token } from './token.js';

const IDENTIFIER = /[\p{L}_][\p{L}\p{N}_]*/uy;
const NUMBER =
  /0[xX][0-9a-fA-F_]+(?:\.[0-9a-fA-F_]*)?(?:[pP][+-]?[0-9_]+)?i?|0[bB][01_]+i?|0[oO][0-7_]+i?|(?:[0-9][0-9_]*(?:\.[0-9_]*)?|\.[0-9][0-9_]*)(?:[eE][+-]?[0-9_]+)?i?/y;
const LETTER = /[\p{L}_]/u;
const ALPHANUMERIC = /[\p{L}\p{N}_]/u;

// A newline after one of these ends the statement
const TERMINATING_KEYWORDS: ReadonlySet<string> = new Set(['break', 'continue', 'fallthrough', 'return']);
const TERMINATING_OPERATORS: ReadonlySet<string> = new Set([')', ']', '}', '++', '--']);

/**
 * Lexer for generated source files
 *
 * Produces the full token stream including comments, and inserts the
 * semicolons the language leaves implicit at line ends.
 */
export class Lexer {
  private input = '';
  private index = 0;
  private line = 1;
  private lineStart = 0;
  private tokens: Token[] = [];
  // Whether a newline at the current point terminates a statement
  private insertSemi = false;

  tokenize(source: string): Token[] {
    this.input = source;
    this.index = 0;
    this.line = 1;
    this.lineStart = 0;
    this.tokens = [];
    this.insertSemi = false;

    while (this.index < this.input.length) {
      const char = this.input[this.index];

      if (char === '\n') {
        this.newline();
      } else if (char === ' ' || char === '\t' || char === '\r') {
        this.index++;
      } else if (char === '/' && this.peekChar(1) === '/') {
        this.scanLineComment();
      } else if (char === '/' && this.peekChar(1) === '*') {
        this.scanBlockComment();
      } else if (LETTER.test(char)) {
        this.scanIdentifier();
      } else if (isDigit(char) || (char === '.' && isDigit(this.peekChar(1)))) {
        this.scanNumber();
      } else if (char === '"') {
        this.scanQuoted('"', TokenType.STRING, 'string literal not terminated');
      } else if (char === "'") {
        this.scanQuoted("'", TokenType.CHAR, 'rune literal not terminated');
      } else if (char === '`') {
        this.scanRawString();
      } else {
        this.scanOperator();
      }
    }

    const end = this.position();
    if (this.insertSemi) {
      this.pushSemicolon(end);
    }
    this.tokens.push({ type: TokenType.EOF, value: '', loc: { start: end, end } });
    return this.tokens;
  }

  private position(): Position {
    return { line: this.line, column: this.index - this.lineStart, index: this.index };
  }

  private peekChar(offset: number): string {
    return this.input.charAt(this.index + offset);
  }

  private push(type: Token['type'], start: Position, value: string): void {
    this.tokens.push({ type, value, loc: { start, end: this.position() } });
  }

  private pushSemicolon(at: Position): void {
    this.tokens.push({ type: TokenType.SEMICOLON, value: '\n', loc: { start: at, end: at }, implicit: true });
    this.insertSemi = false;
  }

  private newline(): void {
    if (this.insertSemi) {
      this.pushSemicolon(this.position());
    }
    this.index++;
    this.line++;
    this.lineStart = this.index;
  }

  /**
   * Moves past `text`, keeping line bookkeeping for embedded newlines
   */
  private advanceOver(text: string): void {
    for (let offset = 0; offset < text.length; offset++) {
      if (text[offset] === '\n') {
        this.line++;
        this.lineStart = this.index + offset + 1;
      }
    }
    this.index += text.length;
  }

  private scanLineComment(): void {
    const start = this.position();
    const newline = this.input.indexOf('\n', this.index);
    const end = newline === -1 ? this.input.length : newline;
    const text = this.input.slice(this.index, end);
    this.index = end;
    this.push(TokenType.COMMENT, start, text);
  }

  private scanBlockComment(): void {
    const start = this.position();
    const close = this.input.indexOf('*/', this.index + 2);
    if (close === -1) {
      throw new GoSyntaxError('comment not terminated', start);
    }

    const text = this.input.slice(this.index, close + 2);
    if (text.includes('\n') && this.insertSemi) {
      this.pushSemicolon(start);
    }
    this.advanceOver(text);
    this.push(TokenType.COMMENT, start, text);
  }

  private scanIdentifier(): void {
    const start = this.position();
    IDENTIFIER.lastIndex = this.index;
    const match = IDENTIFIER.exec(this.input);
    const text = match ? match[0] : this.input.charAt(this.index);
    this.index += text.length;

    if (KEYWORDS.has(text)) {
      this.push(TokenType.KEYWORD, start, text);
      this.insertSemi = TERMINATING_KEYWORDS.has(text);
    } else {
      this.push(TokenType.IDENT, start, text);
      this.insertSemi = true;
    }
  }

  private scanNumber(): void {
    const start = this.position();
    NUMBER.lastIndex = this.index;
    const match = NUMBER.exec(this.input);
    if (!match) {
      throw new GoSyntaxError('invalid number literal', start);
    }

    const text = match[0];
    this.index += text.length;
    if (ALPHANUMERIC.test(this.peekChar(0))) {
      throw new GoSyntaxError(`invalid digit ${JSON.stringify(this.peekChar(0))} in number literal`, this.position());
    }

    const isHex = /^0[xX]/.test(text);
    let type: Token['type'] = TokenType.INT;
    if (text.endsWith('i')) {
      type = TokenType.IMAG;
    } else if (isHex ? /[.pP]/.test(text) : /[.eE]/.test(text)) {
      type = TokenType.FLOAT;
    }
    this.push(type, start, text);
    this.insertSemi = true;
  }

  private scanQuoted(quote: string, type: Token['type'], unterminated: string): void {
    const start = this.position();
    let cursor = this.index + 1;

    for (;;) {
      const char = this.input.charAt(cursor);
      if (char === '' || char === '\n') {
        throw new GoSyntaxError(unterminated, start);
      }
      if (char === '\\') {
        const escaped = this.input.charAt(cursor + 1);
        if (escaped === '' || escaped === '\n') {
          throw new GoSyntaxError(unterminated, start);
        }
        cursor += 2;
        continue;
      }
      if (char === quote) {
        break;
      }
      cursor++;
    }

    const text = this.input.slice(this.index, cursor + 1);
    if (quote === "'" && text === "''") {
      throw new GoSyntaxError('empty rune literal', start);
    }
    this.index = cursor + 1;
    this.push(type, start, text);
    this.insertSemi = true;
  }

  private scanRawString(): void {
    const start = this.position();
    const close = this.input.indexOf('`', this.index + 1);
    if (close === -1) {
      throw new GoSyntaxError('raw string literal not terminated', start);
    }

    const text = this.input.slice(this.index, close + 1);
    this.advanceOver(text);
    this.push(TokenType.STRING, start, text);
    this.insertSemi = true;
  }

  private scanOperator(): void {
    const start = this.position();
    const operator = OPERATORS.find(candidate => this.input.startsWith(candidate, this.index));
    if (operator === undefined) {
      throw new GoSyntaxError(`invalid character ${JSON.stringify(this.input.charAt(this.index))}`, start);
    }

    this.index += operator.length;
    this.push(operator === ';' ? TokenType.SEMICOLON : TokenType.OPERATOR, start, operator);
    this.insertSemi = TERMINATING_OPERATORS.has(operator);
  }
}

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9' && char.length === 1;
}

/**
 * Tokenizes source with a fresh lexer
 */
export function tokenize(source: string): Token[] {
  return new Lexer().tokenize(source);
}
