import { Lexer } from './lexer.js';
import { TokenType, isClosing, isKeyword, isOpening, isOperator, type Token } from './token.js';

/**
 * One output line: the tokens that start on the same source line, plus any
 * multi-line token (raw string, block comment) that continues from them
 */
interface Line {
  tokens: Token[];
  indent: number;
  blankBefore: boolean;
  // Starts outside every bracket, where `func (` opens a receiver
  topLevel: boolean;
  // Struct field or literal key/value split into aligned columns
  cells?: string[];
  // Ends the aligned section above, as gofmt does between keys of very
  // different sizes
  alignBreak: boolean;
}

type FrameKind = 'struct' | 'literal' | 'block';

interface Frame {
  indent: number;
  kind: FrameKind;
  // Key sizes seen so far in a literal, for the alignment break heuristic
  lnsum: number;
  count: number;
  size: number;
}

// Keys up to this size always align
const SMALL_KEY_SIZE = 40;
// Larger keys align while within this ratio of the geometric mean of the
// keys before them
const KEY_SIZE_RATIO = 2.5;

// Tokens written without a space before them
const NO_SPACE_BEFORE: ReadonlySet<string> = new Set([',', ')', ']', ':', '++', '--', '...']);
// Tokens written without a space after them
const NO_SPACE_AFTER: ReadonlySet<string> = new Set(['(', '[', '...']);

/**
 * Canonical layout for generated source
 *
 * - indentation with one tab per open bracket level, case clauses and labels
 *   one level out
 * - no space inside brackets, before a call or parameter list, before `,`
 *   `;` `:` or around a selector; one after `,` and `;`; elsewhere a single
 *   space where the source had any
 * - at most one blank line in a row, none at the edges of a block or file
 * - struct field names, types and tags aligned in columns, and so are the
 *   keys and values of a multi-line composite literal
 * - exactly one trailing newline
 *
 * The printer trusts its input to be well-formed; run it after the parser.
 */
export class Printer {
  constructor(private readonly lexer: Lexer = new Lexer()) {}

  print(source: string): string {
    const tokens = this.lexer
      .tokenize(source)
      .filter(token => token.type !== TokenType.EOF && !token.implicit);

    const lines = groupLines(tokens);
    if (lines.length === 0) {
      return '';
    }

    layout(lines);
    alignColumns(lines);

    const output: string[] = [];
    for (const line of lines) {
      if (line.blankBefore) {
        output.push('');
      }
      const content = line.cells ? line.cells.join('') : joinTokens(line.tokens, line.topLevel);
      output.push('\t'.repeat(line.indent) + content);
    }
    return `${output.join('\n')}\n`;
  }
}

function groupLines(tokens: Token[]): Line[] {
  const lines: Line[] = [];
  let current: Token[] = [];

  for (const token of tokens) {
    const last = current.at(-1);
    if (last !== undefined && token.loc.start.line > last.loc.end.line) {
      lines.push(newLine(current));
      current = [];
    }
    current.push(token);
  }
  if (current.length > 0) {
    lines.push(newLine(current));
  }
  return lines;
}

function newLine(tokens: Token[]): Line {
  return { tokens, indent: 0, blankBefore: false, topLevel: false, alignBreak: false };
}

/**
 * Assigns indentation, blank lines and aligned cells
 */
function layout(lines: Line[]): void {
  const stack: Frame[] = [];
  let previous: Token | undefined;

  lines.forEach((line, index) => {
    const first = line.tokens[0];
    const top = stack.at(-1);

    line.topLevel = top === undefined;
    line.indent = top === undefined ? 0 : top.indent + 1;
    if (
      top !== undefined &&
      (isClosing(first) || isKeyword(first, 'case') || isKeyword(first, 'default') || isLabel(line.tokens))
    ) {
      line.indent = top.indent;
    }

    if (index > 0) {
      line.blankBefore = hasBlankBefore(lines[index - 1], line);
    }

    const element = top !== undefined && first.type !== TokenType.COMMENT && !isClosing(first);
    if (element && top.kind === 'struct' && isBalanced(line.tokens)) {
      line.cells = fieldCells(line.tokens);
    }
    if (element && top.kind === 'literal') {
      layoutElement(line, top);
    }

    for (const token of line.tokens) {
      if (isOpening(token)) {
        stack.push({ indent: line.indent, kind: frameKind(token, previous), lnsum: 0, count: 0, size: 0 });
      } else if (isClosing(token)) {
        stack.pop();
      }
      if (token.type !== TokenType.COMMENT) {
        previous = token;
      }
    }
  });
}

/**
 * What a bracket opens: a struct type, a composite literal or anything else
 */
function frameKind(opening: Token, previous: Token | undefined): FrameKind {
  if (!isOperator(opening, '{') || previous === undefined) {
    return 'block';
  }
  if (isKeyword(previous, 'struct')) {
    return 'struct';
  }

  // `T{`, `[]T{`, `map[K]V{` touch their type
  const touching = opening.loc.start.index === previous.loc.end.index;
  if (touching && (previous.type === TokenType.IDENT || isOperator(previous, ']'))) {
    return 'literal';
  }
  // elided element type: `{{1, 2}, {3, 4}}`, `"k": {`
  const sameLine = opening.loc.start.line === previous.loc.end.line;
  if (sameLine && (isOperator(previous, '{') || isOperator(previous, ',') || isOperator(previous, ':'))) {
    return 'literal';
  }
  return 'block';
}

/**
 * Splits a literal element into key and value cells and decides whether it
 * continues the aligned section above
 */
function layoutElement(line: Line, frame: Frame): void {
  const balanced = isBalanced(line.tokens);
  const colon = balanced ? keyColon(line.tokens) : -1;

  let size = 0;
  if (colon > 0) {
    size = displayWidth(joinTokens(line.tokens.slice(0, colon)));
    line.cells = pairCells(line.tokens, colon);
  } else if (balanced) {
    size = displayWidth(joinTokens(line.tokens));
  }

  const previousSize = frame.size;
  line.alignBreak = true;
  if (previousSize > 0 && size > 0) {
    if (frame.count === 0 || (previousSize <= SMALL_KEY_SIZE && size <= SMALL_KEY_SIZE)) {
      line.alignBreak = false;
    } else {
      const ratio = size / Math.exp(frame.lnsum / frame.count);
      line.alignBreak = KEY_SIZE_RATIO * ratio <= 1 || KEY_SIZE_RATIO <= ratio;
    }
  }

  if (size > 0) {
    frame.lnsum += Math.log(size);
    frame.count++;
  }
  frame.size = size;
}

// Index of the `:` separating key and value, or -1
function keyColon(tokens: Token[]): number {
  let depth = 0;
  for (let index = 0; index < tokens.length; index++) {
    const token = tokens[index];
    if (isOpening(token)) {
      depth++;
    } else if (isClosing(token)) {
      depth--;
    } else if (depth === 0 && isOperator(token, ':')) {
      return index + 1 < tokens.length ? index : -1;
    }
  }
  return -1;
}

function pairCells(tokens: Token[], colon: number): string[] {
  let value = tokens.slice(colon + 1);
  const last = value[value.length - 1];
  const comment = last.type === TokenType.COMMENT && value.length > 1 ? last : undefined;
  if (comment) {
    value = value.slice(0, -1);
  }

  const cells = [joinTokens(tokens.slice(0, colon + 1)), joinTokens(value)];
  if (comment) {
    cells.push(commentText(comment));
  }
  return cells;
}

function hasBlankBefore(previous: Line, line: Line): boolean {
  const last = previous.tokens[previous.tokens.length - 1];
  if (line.tokens[0].loc.start.line <= last.loc.end.line + 1) {
    return false;
  }

  const opener = previous.tokens.filter(token => token.type !== TokenType.COMMENT).at(-1);
  if (opener !== undefined && (isOperator(opener, '{') || isOperator(opener, '('))) {
    return false;
  }
  const first = line.tokens[0];
  return !(isOperator(first, '}') || isOperator(first, ')'));
}

// `name:` alone on its line labels the next statement
function isLabel(tokens: Token[]): boolean {
  return tokens.length === 2 && tokens[0].type === TokenType.IDENT && isOperator(tokens[1], ':');
}

function isBalanced(tokens: Token[]): boolean {
  let depth = 0;
  for (const token of tokens) {
    if (isOpening(token)) {
      depth++;
    } else if (isClosing(token)) {
      depth--;
      if (depth < 0) {
        return false;
      }
    }
  }
  return depth === 0;
}

/**
 * Splits a field line into [names, type, tag, comment] for a named field or
 * [type, tag, comment] for an embedded one, omitting absent parts
 */
function fieldCells(tokens: Token[]): string[] {
  let rest = tokens;
  let comment: Token | undefined;
  const last = rest[rest.length - 1];
  if (last.type === TokenType.COMMENT) {
    comment = last;
    rest = rest.slice(0, -1);
  }

  let tag: Token | undefined;
  const tail = rest.at(-1);
  if (rest.length > 1 && tail !== undefined && tail.type === TokenType.STRING) {
    tag = tail;
    rest = rest.slice(0, -1);
  }

  const cells: string[] = [];
  if (rest.length > 1 && rest[0].type === TokenType.IDENT && !isOperator(rest[1], '.')) {
    let end = 1;
    while (end + 1 < rest.length && isOperator(rest[end], ',') && rest[end + 1].type === TokenType.IDENT) {
      end += 2;
    }
    cells.push(joinTokens(rest.slice(0, end)));
    rest = rest.slice(end);
  }
  if (rest.length > 0) {
    cells.push(joinTokens(rest));
  }
  if (tag) {
    cells.push(tag.value);
  }
  if (comment) {
    cells.push(commentText(comment));
  }
  return cells;
}

/**
 * Pads cells so each column lines up across consecutive aligned lines. A cell
 * belongs to a column only when another cell follows it on its line.
 */
function alignColumns(lines: Line[]): void {
  const inColumn = (line: Line, column: number): boolean =>
    line.cells !== undefined && line.cells.length > column + 1;

  for (let column = 0; ; column++) {
    let found = false;
    let start = 0;

    while (start < lines.length) {
      if (!inColumn(lines[start], column)) {
        start++;
        continue;
      }

      let end = start + 1;
      while (
        end < lines.length &&
        inColumn(lines[end], column) &&
        !lines[end].blankBefore &&
        !lines[end].alignBreak
      ) {
        end++;
      }
      found = true;

      const block = lines.slice(start, end);
      const width = Math.max(...block.map(line => displayWidth(line.cells?.[column] ?? '')));
      if (width > 0) {
        for (const line of block) {
          if (line.cells) {
            const cell = line.cells[column];
            line.cells[column] = cell + ' '.repeat(width + 1 - displayWidth(cell));
          }
        }
      }
      start = end;
    }

    if (!found) {
      return;
    }
  }
}

function joinTokens(tokens: Token[], topLevel = false): string {
  let text = '';
  tokens.forEach((token, index) => {
    if (index > 0) {
      const receiver = topLevel && index === 1 && isKeyword(tokens[0], 'func');
      text += separator(tokens[index - 1], token, receiver);
    }
    text += token.type === TokenType.COMMENT ? commentText(token) : token.value;
  });
  return text;
}

/**
 * Space written between two tokens of a line
 */
function separator(previous: Token, token: Token, receiver: boolean): string {
  const gap = token.loc.start.index > previous.loc.end.index ? ' ' : '';
  if (previous.type === TokenType.COMMENT || token.type === TokenType.COMMENT) {
    return gap;
  }

  if (token.type === TokenType.SEMICOLON || (isOperator(token) && NO_SPACE_BEFORE.has(token.value))) {
    return '';
  }
  // selector, but not the dot of `import . "path"`
  if (isOperator(token, '.')) {
    return previous.type === TokenType.KEYWORD ? gap : '';
  }
  if (isOperator(previous, '.')) {
    return token.type === TokenType.IDENT || isOperator(token, '(') ? '' : gap;
  }
  if (isOperator(previous) && NO_SPACE_AFTER.has(previous.value)) {
    return '';
  }
  if (isOperator(previous, ',') || previous.type === TokenType.SEMICOLON) {
    return ' ';
  }

  if (isOperator(token, '(')) {
    // call, parameters, or type arguments before them
    if (previous.type === TokenType.IDENT || isOperator(previous, ']')) {
      return '';
    }
    // method receiver `func (r T) M()` against literal `func()`
    if (isKeyword(previous, 'func')) {
      return receiver ? ' ' : '';
    }
  }
  return gap;
}

function commentText(token: Token): string {
  return token.value.startsWith('//') ? token.value.trimEnd() : token.value;
}

function displayWidth(text: string): number {
  return [...text].length;
}

/**
 * Lays out source with a fresh printer
 */
export function printSource(source: string): string {
  return new Printer().print(source);
}
